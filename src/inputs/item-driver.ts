/**
 * Item Driver - Pulls items lazily, one at a time, from any iterable source
 */
import { Effect, Stream } from "effect";
import type { DrivenItem, ItemDriver, ItemSource } from "../core/types.js";
import { SourceError, describeCause } from "../core/errors.js";

const isAsyncIterable = <I>(
  source: Iterable<I> | AsyncIterable<I>,
): source is AsyncIterable<I> => Symbol.asyncIterator in source;

/**
 * Adapt a synchronous iterable so that an exception thrown mid-iteration
 * surfaces as a rejected `next()` instead of a defect
 */
async function* fromSyncIterable<I>(source: Iterable<I>): AsyncGenerator<I> {
  yield* source;
}

/**
 * Create an item driver
 *
 * The source is opened on the first pull and never materialized. A driver
 * can be consumed once; ordinals start at 1.
 *
 * @example
 * ```typescript
 * async function* rows() {
 *   for (let page = 0; ; page++) {
 *     const batch = await db.products.findMany({ skip: page * 500, take: 500 });
 *     if (batch.length === 0) return;
 *     yield* batch;
 *   }
 * }
 *
 * const driver = createItemDriver(rows);
 * ```
 */
export const createItemDriver = <I>(
  source: ItemSource<I>,
  name = "item-driver",
): ItemDriver<I> => {
  let started = false;
  let lastOrdinal = 0;

  const open = Effect.suspend(() => {
    if (started) {
      return Effect.fail(
        new SourceError(`${name}: item source has already been consumed`, 0),
      );
    }
    started = true;

    return Effect.try({
      try: () => (typeof source === "function" ? source() : source),
      catch: (error) =>
        new SourceError(
          `${name}: failed to open item source: ${describeCause(error)}`,
          0,
          error,
        ),
    });
  });

  const stream: Stream.Stream<DrivenItem<I>, SourceError> = Stream.unwrap(
    Effect.map(open, (iterable) =>
      Stream.fromAsyncIterable(
        isAsyncIterable(iterable) ? iterable : fromSyncIterable(iterable),
        (error) =>
          new SourceError(
            `${name}: item source failed after item #${lastOrdinal}: ${describeCause(error)}`,
            lastOrdinal,
            error,
          ),
      ),
    ),
  ).pipe(
    Stream.zipWithIndex,
    Stream.map(([item, index]) => {
      lastOrdinal = index + 1;
      return { ordinal: lastOrdinal, item };
    }),
  );

  return { name, stream };
};
