/**
 * File Sink - Writes the feed to a local file
 */
import { Effect } from "effect";
import * as fs from "node:fs/promises";
import { dirname } from "node:path";
import { pathToFileURL } from "node:url";
import type { FeedSink } from "../core/types.js";
import { IOError, type SinkOperation, describeCause } from "../core/errors.js";

export interface FileSinkConfig {
  readonly path: string;
  readonly fsync?: boolean; // datasync after every flush (default: false)
  readonly createDirectories?: boolean; // create missing parent directories (default: true)
}

export interface FileSink extends FeedSink {
  readonly discard: () => Effect.Effect<void, IOError>;
}

/**
 * Create a file sink
 *
 * Each `write` awaits the kernel write before returning, so nothing is
 * buffered in process between items. With `fsync` enabled, `flush` also
 * forces the data to disk.
 */
export const createFileSink = (config: FileSinkConfig): FileSink => {
  const destination = pathToFileURL(config.path).href;
  let handle: fs.FileHandle | undefined;
  let closed = false;

  const fail = (operation: SinkOperation, error: unknown) =>
    new IOError(
      `Failed to ${operation} ${config.path}: ${describeCause(error)}`,
      operation,
      destination,
      error,
    );

  const requireHandle = (operation: SinkOperation) =>
    handle !== undefined && !closed
      ? Effect.succeed(handle)
      : Effect.fail(fail(operation, "sink is not open"));

  return {
    name: "file-sink",
    destination,

    open: () =>
      Effect.tryPromise({
        try: async () => {
          if (config.createDirectories ?? true) {
            await fs.mkdir(dirname(config.path), { recursive: true });
          }
          handle = await fs.open(config.path, "w");
          closed = false;
        },
        catch: (error) => fail("open", error),
      }).pipe(Effect.tap(() => Effect.logDebug(`Opened ${config.path}`))),

    write: (chunk: string) =>
      Effect.gen(function* () {
        const file = yield* requireHandle("write");
        yield* Effect.tryPromise({
          try: () => file.write(chunk, null, "utf-8"),
          catch: (error) => fail("write", error),
        });
      }),

    flush: () =>
      Effect.gen(function* () {
        const file = yield* requireHandle("flush");
        if (config.fsync) {
          yield* Effect.tryPromise({
            try: () => file.datasync(),
            catch: (error) => fail("flush", error),
          });
        }
      }),

    close: () =>
      Effect.suspend(() => {
        const file = handle;
        if (file === undefined || closed) {
          return Effect.void;
        }
        closed = true;
        return Effect.tryPromise({
          try: () => file.close(),
          catch: (error) => fail("close", error),
        }).pipe(Effect.tap(() => Effect.logDebug(`Closed ${config.path}`)));
      }),

    discard: () =>
      Effect.tryPromise({
        try: () => fs.rm(config.path, { force: true }),
        catch: (error) => fail("discard", error),
      }).pipe(
        Effect.tap(() => Effect.logWarning(`Removed partial feed ${config.path}`)),
      ),
  };
};
