/**
 * Feed controller using Effect.js
 * Drives every item through Processors → Filters → Mappers → validation →
 * serialization, one item at a time
 */
import { Cause, Effect, Exit, Ref, Stream } from "effect"
import { resolveFeedConfig, type AbortPolicy, type FeedConfig } from "./config.js"
import {
  PipelineStageError,
  describeCause,
  type FeedError,
  type IOError,
  type ItemError,
  type StageKind,
} from "./errors.js"
import { FeedMetrics, emitFeedMetrics, measureDuration } from "./metrics.js"
import { Product, validateProduct } from "./product.js"
import type { StageSnapshot } from "./registry.js"
import type {
  DrivenItem,
  FeedResult,
  FeedSink,
  FeedState,
  ItemPhase,
  ItemSource,
  RejectedItem,
} from "./types.js"
import { createItemDriver } from "../inputs/item-driver.js"
import { createXmlSerializer, type FeedSerializer } from "../outputs/xml-serializer.js"

/**
 * Everything a single run needs
 */
export interface FeedDefinition<I> {
  readonly name: string
  readonly config: FeedConfig
  readonly stages: StageSnapshot<I>
  readonly onStateChange?: (state: FeedState) => void
  readonly onItemPhase?: (ordinal: number, phase: ItemPhase) => void
}

type ItemOutcome =
  | { readonly _tag: "Emitted"; readonly bytes: number }
  | { readonly _tag: "Filtered" }
  | { readonly _tag: "Rejected" }

/**
 * Run one stage, turning any failure or defect into a PipelineStageError
 */
const invokeStage = <A>(
  kind: StageKind,
  stage: { readonly index: number; readonly name: string },
  ordinal: number,
  thunk: () => Effect.Effect<A, unknown>
): Effect.Effect<A, PipelineStageError> =>
  Effect.suspend(thunk).pipe(
    Effect.catchAllDefect((defect) => Effect.fail(defect)),
    Effect.mapError(
      (error) =>
        new PipelineStageError(
          `Item #${ordinal}: ${kind} "${stage.name}" (#${stage.index}) failed: ${describeCause(error)}`,
          kind,
          stage.index,
          stage.name,
          ordinal,
          error
        )
    )
  )

/**
 * One pass of the per-item cycle:
 * pulled → processed → filtered → mapped → validated → serialized → flushed
 */
const processItem = <I>(
  definition: FeedDefinition<I>,
  serializer: FeedSerializer,
  { ordinal, item }: DrivenItem<I>
): Effect.Effect<ItemOutcome, ItemError | IOError> =>
  Effect.gen(function* () {
    const { stages } = definition
    const phase = (next: ItemPhase) => definition.onItemPhase?.(ordinal, next)

    phase("pulled")

    let current = item
    for (const stage of stages.processors) {
      const result = yield* invokeStage("processor", stage, ordinal, () => stage.run(current))
      if (result === undefined || result === null) {
        return yield* Effect.fail(
          new PipelineStageError(
            `Item #${ordinal}: processor "${stage.name}" (#${stage.index}) returned no value`,
            "processor",
            stage.index,
            stage.name,
            ordinal
          )
        )
      }
      current = result
    }
    phase("processed")

    for (const stage of stages.filters) {
      const verdict: unknown = yield* invokeStage("filter", stage, ordinal, () => stage.run(current))
      if (typeof verdict !== "boolean") {
        return yield* Effect.fail(
          new PipelineStageError(
            `Item #${ordinal}: filter "${stage.name}" (#${stage.index}) returned ${typeof verdict}, expected boolean`,
            "filter",
            stage.index,
            stage.name,
            ordinal
          )
        )
      }
      if (!verdict) {
        yield* Effect.logDebug(`Item #${ordinal} dropped by filter "${stage.name}"`)
        return { _tag: "Filtered" } as const
      }
    }
    phase("filtered")

    const product = new Product()
    for (const stage of stages.mappers) {
      yield* invokeStage("mapper", stage, ordinal, () => stage.run(current, product))
    }
    phase("mapped")

    const valid = yield* validateProduct(product, ordinal)
    phase("validated")

    const bytes = yield* serializer.writeProduct(valid)
    phase("serialized")
    phase("flushed")

    return { _tag: "Emitted", bytes } as const
  })

/**
 * Apply the abort policy after a failed run. `close` is false when the
 * failure came from closing the sink, which is never attempted twice.
 * Never fails: the original error is what the caller needs to see.
 */
const abort = (
  sink: FeedSink,
  onAbort: AbortPolicy,
  cause: Cause.Cause<unknown>,
  close: boolean
): Effect.Effect<void> =>
  Effect.gen(function* () {
    yield* Effect.logDebug(`Aborting feed to ${sink.destination}`, cause)

    if (close) {
      yield* sink.close().pipe(
        Effect.catchAll((error) =>
          Effect.logError(`Failed to close ${sink.destination} after abort: ${error.message}`)
        )
      )
    }

    if (onAbort === "delete" && sink.discard) {
      yield* sink.discard().pipe(
        Effect.catchAll((error) =>
          Effect.logError(`Failed to remove partial feed ${sink.destination}: ${error.message}`)
        )
      )
    }
  })

/**
 * Run a feed
 * Orchestrates: Configuring → Running (per item cycle) → Completed | Failed
 */
export const run = <I>(
  definition: FeedDefinition<I>,
  source: ItemSource<I>
): Effect.Effect<FeedResult, FeedError> => {
  const setState = (state: FeedState) =>
    Effect.sync(() => definition.onStateChange?.(state)).pipe(
      Effect.zipRight(Effect.logDebug(`Feed ${definition.name}: ${state}`))
    )

  return Effect.gen(function* () {
    yield* setState("configuring")
    const config = yield* resolveFeedConfig(definition.config)
    const { sink } = config

    const driver = createItemDriver(source, `${definition.name}-source`)
    const metrics = new FeedMetrics(definition.name)
    const rejectedRef = yield* Ref.make<ReadonlyArray<RejectedItem>>([])
    const startTime = Date.now()

    yield* setState("running")
    yield* Effect.log(`Starting feed: ${definition.name} -> ${sink.destination}`)

    const reject = (error: ItemError) =>
      Effect.gen(function* () {
        metrics.recordRejected()
        yield* Ref.update(rejectedRef, (rejected) =>
          rejected.length < config.maxRejected
            ? [...rejected, { ordinal: error.ordinal, error }]
            : rejected
        )
        yield* Effect.logWarning(`Skipping item: ${error.message}`)
        return { _tag: "Rejected" } as const
      })

    const handleItem = (serializer: FeedSerializer) => (driven: DrivenItem<I>) =>
      Effect.gen(function* () {
        metrics.recordPulled()

        const attempt = processItem(definition, serializer, driven)
        const guarded: Effect.Effect<ItemOutcome, ItemError | IOError> =
          config.errorPolicy === "skip"
            ? attempt.pipe(
                Effect.catchTags({
                  ValidationError: reject,
                  PipelineStageError: reject,
                })
              )
            : attempt

        const [outcome, duration] = yield* measureDuration(guarded)

        switch (outcome._tag) {
          case "Emitted":
            metrics.recordEmitted(outcome.bytes, duration)
            if (metrics.shouldEmit(config.metricsInterval)) {
              yield* emitFeedMetrics(metrics.snapshot())
            }
            break
          case "Filtered":
            metrics.recordFiltered()
            break
          case "Rejected":
            break
        }
      }).pipe(
        Effect.annotateLogs({ ordinal: driven.ordinal }),
        Effect.withSpan("feed.item", { attributes: { ordinal: driven.ordinal } })
      )

    yield* Effect.acquireUseRelease(
      sink.open(),
      () =>
        Effect.gen(function* () {
          const serializer = createXmlSerializer(sink)
          metrics.recordFraming(yield* serializer.begin(config.metadata))
          yield* Stream.runForEach(driver.stream, handleItem(serializer))
          metrics.recordFraming(yield* serializer.end())
        }),
      (_, exit): Effect.Effect<void, IOError> =>
        Exit.isSuccess(exit)
          ? sink.close().pipe(
              Effect.tapError((error) => abort(sink, config.onAbort, Cause.fail(error), false))
            )
          : abort(sink, config.onAbort, exit.cause, true)
    )

    const snapshot = metrics.snapshot()
    const endTime = Date.now()

    yield* emitFeedMetrics(snapshot)
    yield* Effect.log(
      `Feed completed: ${snapshot.emitted} emitted, ${snapshot.filtered} filtered, ${snapshot.rejected} rejected in ${endTime - startTime}ms`
    )
    yield* setState("completed")

    return {
      success: snapshot.rejected === 0,
      destination: sink.destination,
      stats: {
        pulled: snapshot.pulled,
        emitted: snapshot.emitted,
        filtered: snapshot.filtered,
        rejected: snapshot.rejected,
        bytesWritten: snapshot.bytesWritten,
        duration: endTime - startTime,
        startTime,
        endTime,
      },
      rejected: yield* Ref.get(rejectedRef),
    }
  }).pipe(
    // Defects and interruptions end the run too
    Effect.onExit((exit) =>
      Exit.isSuccess(exit)
        ? Effect.void
        : Effect.logError(
            `Feed ${definition.name} failed: ${describeCause(Cause.squash(exit.cause))}`
          ).pipe(Effect.zipRight(setState("failed")))
    ),
    Effect.withSpan("feed.run", { attributes: { feed: definition.name } })
  )
}
