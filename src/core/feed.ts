/**
 * Feed - registration API and entry point for writing a product feed
 */
import { Cause, Effect, Exit, Logger } from "effect"
import { toLogLevel, type FeedConfig } from "./config.js"
import { ConfigurationError, type FeedError } from "./errors.js"
import { run } from "./pipeline.js"
import { StageRegistry } from "./registry.js"
import type {
  EffectFilterFn,
  EffectMapperFn,
  EffectProcessorFn,
  FeedResult,
  FeedState,
  FilterFn,
  ItemPhase,
  ItemSource,
  MapperFn,
  ProcessorFn,
} from "./types.js"

export interface FeedOptions {
  readonly name?: string
  readonly onStateChange?: (state: FeedState) => void
  readonly onItemPhase?: (ordinal: number, phase: ItemPhase) => void
}

export interface Feed<I> {
  readonly name: string
  readonly state: FeedState
  /**
   * Append a processor. Processors run first, in registration order; each
   * receives the previous one's result.
   */
  addProcessor(fn: ProcessorFn<I>, name?: string): Feed<I>
  /**
   * Append a filter. The first filter returning `false` drops the item.
   */
  addFilter(fn: FilterFn<I>, name?: string): Feed<I>
  /**
   * Append a mapper. Every mapper receives the processed item and the same
   * fresh Product.
   */
  addMapper(fn: MapperFn<I>, name?: string): Feed<I>
  addProcessorEffect(fn: EffectProcessorFn<I>, name?: string): Feed<I>
  addFilterEffect(fn: EffectFilterFn<I>, name?: string): Feed<I>
  addMapperEffect(fn: EffectMapperFn<I>, name?: string): Feed<I>
  writeEffect(source: ItemSource<I>): Effect.Effect<FeedResult, FeedError>
  /**
   * Run the feed to completion. Rejects with the original error when the run
   * fails.
   */
  write(source: ItemSource<I>): Promise<FeedResult>
}

/**
 * Create a feed
 *
 * @example
 * ```typescript
 * const feed = createFeed<Row>({
 *   destination: "file:./out/products.xml",
 *   platform: { name: "Shop", version: "1.2.0" },
 *   attributes: { currency: "EUR" },
 * })
 *   .addProcessor((row) => ({ ...row, price: Number(row.price) }))
 *   .addFilter((row) => row.active)
 *   .addMapper((row, product) => {
 *     product.setReference(row.sku).setName(row.title).setPrice(row.price).setQuantity(row.stock)
 *   })
 *
 * const result = await feed.write(rows())
 * ```
 */
export const createFeed = <I = unknown>(
  config: FeedConfig = {},
  options: FeedOptions = {}
): Feed<I> => {
  const name = options.name ?? "feed"
  const registry = new StageRegistry<I>()
  let state: FeedState = "idle"

  const onStateChange = (next: FeedState) => {
    state = next
    options.onStateChange?.(next)
  }

  const feed: Feed<I> = {
    name,

    get state() {
      return state
    },

    addProcessor(fn, stageName) {
      registry.addProcessor(fn, stageName)
      return feed
    },

    addFilter(fn, stageName) {
      registry.addFilter(fn, stageName)
      return feed
    },

    addMapper(fn, stageName) {
      registry.addMapper(fn, stageName)
      return feed
    },

    addProcessorEffect(fn, stageName) {
      registry.addProcessorEffect(fn, stageName)
      return feed
    },

    addFilterEffect(fn, stageName) {
      registry.addFilterEffect(fn, stageName)
      return feed
    },

    addMapperEffect(fn, stageName) {
      registry.addMapperEffect(fn, stageName)
      return feed
    },

    writeEffect: (source) =>
      Effect.suspend(() => {
        if (state === "configuring" || state === "running") {
          return Effect.fail(
            new ConfigurationError(`Feed "${name}" is already being written`)
          )
        }

        return run(
          {
            name,
            config,
            stages: registry.snapshot(),
            onStateChange,
            onItemPhase: options.onItemPhase,
          },
          source
        )
      }).pipe(Logger.withMinimumLogLevel(toLogLevel(config.logLevel))),

    write: async (source) => {
      const exit = await Effect.runPromiseExit(feed.writeEffect(source))
      if (Exit.isFailure(exit)) {
        throw Cause.squash(exit.cause)
      }
      return exit.value
    },
  }

  return feed
}
