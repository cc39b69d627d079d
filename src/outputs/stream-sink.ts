/**
 * Stream Sink - Writes the feed to a Node.js writable stream (standard output by default)
 */
import { Effect } from "effect";
import type { Writable } from "node:stream";
import type { FeedSink } from "../core/types.js";
import { IOError, type SinkOperation, describeCause } from "../core/errors.js";

export interface StreamSinkConfig {
  readonly stream: Writable;
  readonly destination?: string; // descriptor reported in results and errors
  readonly end?: boolean; // end the stream on close (default: true)
}

/**
 * Create a sink over a writable stream
 *
 * `write` resolves once the stream has accepted the chunk; `flush` waits for
 * `drain` when the stream's buffer is over its high water mark. From `open`
 * until `close` the sink listens for `error` on the stream and fails the
 * pending operation with it.
 */
export const createStreamSink = (config: StreamSinkConfig): FeedSink => {
  const { stream } = config;
  const destination = config.destination ?? "stream:";
  const end = config.end ?? true;
  let closed = false;
  let streamError: Error | undefined;
  let onFailure: ((error: Error) => void) | undefined;

  const fail = (operation: SinkOperation, error: unknown) =>
    new IOError(
      `Failed to ${operation} ${destination}: ${describeCause(error)}`,
      operation,
      destination,
      error,
    );

  const onStreamError = (error: Error) => {
    streamError ??= error;
    const notify = onFailure;
    onFailure = undefined;
    notify?.(error);
  };

  const detach = () => {
    stream.off("error", onStreamError);
  };

  // A destroyed stream may still emit its error; keep listening until it closes
  const release = () => {
    if (stream.destroyed && !stream.closed) {
      stream.once("close", detach);
    } else {
      detach();
    }
  };

  const ensureWritable = (operation: SinkOperation) =>
    Effect.suspend(() =>
      closed || stream.destroyed || streamError !== undefined
        ? Effect.fail(fail(operation, streamError ?? "stream is closed"))
        : Effect.void,
    );

  /**
   * Wait for a stream callback or event. A stream error reported while
   * waiting fails the operation.
   */
  const awaitStream = (
    operation: SinkOperation,
    start: (done: (error?: Error | null) => void) => (() => void) | void,
  ) =>
    Effect.async<void, IOError>((resume) => {
      let settled = false;
      let cleanup: (() => void) | undefined;
      const done = (error?: Error | null) => {
        if (settled) {
          return;
        }
        settled = true;
        onFailure = undefined;
        cleanup?.();
        resume(error ? Effect.fail(fail(operation, error)) : Effect.void);
      };
      onFailure = done;
      const release = start(done);
      cleanup = typeof release === "function" ? release : undefined;
    });

  return {
    name: "stream-sink",
    destination,

    open: () =>
      Effect.suspend(() => {
        if (stream.destroyed || stream.writableEnded) {
          return Effect.fail(fail("open", "stream is closed"));
        }
        closed = false;
        streamError = undefined;
        detach();
        stream.on("error", onStreamError);
        return Effect.void;
      }),

    write: (chunk: string) =>
      ensureWritable("write").pipe(
        Effect.zipRight(
          awaitStream("write", (done) => {
            stream.write(chunk, "utf-8", done);
          }),
        ),
      ),

    flush: () =>
      ensureWritable("flush").pipe(
        Effect.zipRight(
          awaitStream("flush", (done) => {
            if (!stream.writableNeedDrain) {
              done();
              return;
            }
            const onDrain = () => done();
            stream.once("drain", onDrain);
            return () => stream.off("drain", onDrain);
          }),
        ),
      ),

    close: () =>
      Effect.suspend(() => {
        if (closed) {
          return Effect.void;
        }
        closed = true;

        if (stream.destroyed) {
          release();
          return streamError === undefined
            ? Effect.void
            : Effect.fail(fail("close", streamError));
        }

        if (!end || stream.writableEnded) {
          detach();
          return Effect.void;
        }

        return awaitStream("close", (done) => {
          stream.end((error?: Error | null) => done(error));
        }).pipe(Effect.ensuring(Effect.sync(release)));
      }),
  };
};

/**
 * Standard output sink. Closing it leaves the process stream open.
 */
export const createStdoutSink = (): FeedSink =>
  createStreamSink({
    stream: process.stdout,
    destination: "stdout:",
    end: false,
  });
