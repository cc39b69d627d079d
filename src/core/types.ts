/**
 * Core types and interfaces for the feed pipeline
 */
import type { Effect, Stream } from "effect"
import type { IOError, ItemError, SourceError } from "./errors.js"
import type { Product } from "./product.js"

/**
 * Value or promise of a value. Stages may be synchronous or asynchronous;
 * either way the controller waits for one stage before starting the next.
 */
export type Awaitable<A> = A | Promise<A>

/**
 * Transforms an item. The returned value replaces the item for the next stage.
 */
export type ProcessorFn<I> = (item: I) => Awaitable<I | null | undefined>

/**
 * Decides whether an item proceeds. `false` drops it.
 */
export type FilterFn<I> = (item: I) => Awaitable<boolean>

/**
 * Populates the product for an item
 */
export type MapperFn<I> = (item: I, product: Product) => Awaitable<void>

/**
 * Effect-native stage variants. They run inside the feed's fiber and so
 * share its log level, annotations and spans.
 */
export type EffectProcessorFn<I> = (item: I) => Effect.Effect<I | null | undefined, unknown>
export type EffectFilterFn<I> = (item: I) => Effect.Effect<boolean, unknown>
export type EffectMapperFn<I> = (item: I, product: Product) => Effect.Effect<void, unknown>

/**
 * A stage built from configuration, ready to be registered on a feed
 */
export interface StageDefinition<F> {
  readonly name: string
  readonly run: F
}

/**
 * Anything the item driver can pull from
 */
export type ItemSource<I> =
  | Iterable<I>
  | AsyncIterable<I>
  | (() => Iterable<I> | AsyncIterable<I>)

/**
 * An item together with its 1-based position in the source
 */
export interface DrivenItem<I> {
  readonly ordinal: number
  readonly item: I
}

/**
 * Lazily pulls items one at a time from a source
 */
export interface ItemDriver<I> {
  readonly name: string
  readonly stream: Stream.Stream<DrivenItem<I>, SourceError>
}

/**
 * Write destination for the serialized feed. Every write is followed by a
 * flush before the next item is pulled; `close` runs exactly once.
 */
export interface FeedSink {
  readonly name: string
  readonly destination: string
  readonly open: () => Effect.Effect<void, IOError>
  readonly write: (chunk: string) => Effect.Effect<void, IOError>
  readonly flush: () => Effect.Effect<void, IOError>
  readonly close: () => Effect.Effect<void, IOError>
  /**
   * Remove whatever has been written. Sinks that cannot take output back
   * (standard output, sockets) leave this undefined.
   */
  readonly discard?: () => Effect.Effect<void, IOError>
}

/**
 * Feed-level metadata written once in the document header
 */
export interface FeedMetadata {
  readonly platform?: {
    readonly name: string
    readonly version?: string
  }
  readonly attributes: ReadonlyArray<readonly [string, string | number | boolean]>
}

/**
 * Controller lifecycle
 */
export type FeedState = "idle" | "configuring" | "running" | "completed" | "failed"

/**
 * Per-item sub-cycle inside the "running" state
 */
export type ItemPhase =
  | "pulled"
  | "processed"
  | "filtered"
  | "mapped"
  | "validated"
  | "serialized"
  | "flushed"

/**
 * An item dropped under the "skip" error policy
 */
export interface RejectedItem {
  readonly ordinal: number
  readonly error: ItemError
}

/**
 * Statistics from a feed run
 */
export interface FeedStats {
  readonly pulled: number
  readonly emitted: number
  readonly filtered: number
  readonly rejected: number
  readonly bytesWritten: number
  readonly duration: number
  readonly startTime: number
  readonly endTime: number
}

/**
 * Feed run result
 */
export interface FeedResult {
  readonly success: boolean
  readonly destination: string
  readonly stats: FeedStats
  readonly rejected: ReadonlyArray<RejectedItem>
}
