/**
 * Pipeline stage registry - ordered, append-only storage of stages per kind
 *
 * Stages are stored as tagged descriptors wrapping an Effect-returning
 * function. Plain (sync or async) callbacks are lifted at registration time.
 */
import { Effect } from "effect"
import type { StageKind } from "./errors.js"
import type { Product } from "./product.js"
import type {
  Awaitable,
  EffectFilterFn,
  EffectMapperFn,
  EffectProcessorFn,
  FilterFn,
  MapperFn,
  ProcessorFn,
} from "./types.js"

interface StageBase {
  readonly index: number
  readonly name: string
}

export interface ProcessorStage<I> extends StageBase {
  readonly _tag: "Processor"
  readonly run: EffectProcessorFn<I>
}

export interface FilterStage<I> extends StageBase {
  readonly _tag: "Filter"
  readonly run: EffectFilterFn<I>
}

export interface MapperStage<I> extends StageBase {
  readonly _tag: "Mapper"
  readonly run: EffectMapperFn<I>
}

export type PipelineStage<I> = ProcessorStage<I> | FilterStage<I> | MapperStage<I>

/**
 * Immutable view of the registered stages, taken when a run starts
 */
export interface StageSnapshot<I> {
  readonly processors: ReadonlyArray<ProcessorStage<I>>
  readonly filters: ReadonlyArray<FilterStage<I>>
  readonly mappers: ReadonlyArray<MapperStage<I>>
}

export const stageKind = <I>(stage: PipelineStage<I>): StageKind => {
  switch (stage._tag) {
    case "Processor":
      return "processor"
    case "Filter":
      return "filter"
    case "Mapper":
      return "mapper"
  }
}

/**
 * Lift a callback result into an Effect; a synchronous throw and a rejected
 * promise both land in the error channel
 */
export const fromAwaitable = <A>(thunk: () => Awaitable<A>): Effect.Effect<A, unknown> =>
  Effect.tryPromise({
    try: () => new Promise<A>((resolve) => resolve(thunk())),
    catch: (error) => error,
  })

const stageName = (
  kind: StageKind,
  index: number,
  fn: { readonly name: string },
  name?: string
): string => name ?? (fn.name !== "" ? fn.name : `${kind}#${index}`)

export class StageRegistry<I> {
  private readonly processors: ProcessorStage<I>[] = []
  private readonly filters: FilterStage<I>[] = []
  private readonly mappers: MapperStage<I>[] = []

  addProcessor(fn: ProcessorFn<I>, name?: string): ProcessorStage<I> {
    return this.addProcessorEffect(
      (item) => fromAwaitable(() => fn(item)),
      stageName("processor", this.processors.length, fn, name)
    )
  }

  addProcessorEffect(run: EffectProcessorFn<I>, name?: string): ProcessorStage<I> {
    const index = this.processors.length
    const stage: ProcessorStage<I> = {
      _tag: "Processor",
      index,
      name: stageName("processor", index, run, name),
      run,
    }
    this.processors.push(stage)
    return stage
  }

  addFilter(fn: FilterFn<I>, name?: string): FilterStage<I> {
    return this.addFilterEffect(
      (item) => fromAwaitable(() => fn(item)),
      stageName("filter", this.filters.length, fn, name)
    )
  }

  addFilterEffect(run: EffectFilterFn<I>, name?: string): FilterStage<I> {
    const index = this.filters.length
    const stage: FilterStage<I> = {
      _tag: "Filter",
      index,
      name: stageName("filter", index, run, name),
      run,
    }
    this.filters.push(stage)
    return stage
  }

  addMapper(fn: MapperFn<I>, name?: string): MapperStage<I> {
    return this.addMapperEffect(
      (item: I, product: Product) => fromAwaitable(() => fn(item, product)),
      stageName("mapper", this.mappers.length, fn, name)
    )
  }

  addMapperEffect(run: EffectMapperFn<I>, name?: string): MapperStage<I> {
    const index = this.mappers.length
    const stage: MapperStage<I> = {
      _tag: "Mapper",
      index,
      name: stageName("mapper", index, run, name),
      run,
    }
    this.mappers.push(stage)
    return stage
  }

  get size(): number {
    return this.processors.length + this.filters.length + this.mappers.length
  }

  snapshot(): StageSnapshot<I> {
    return {
      processors: [...this.processors],
      filters: [...this.filters],
      mappers: [...this.mappers],
    }
  }
}
