/**
 * Capture Sink - Collects feed output in memory for testing assertions
 * Also records sink call accounting so tests can check the write/flush
 * discipline and the memory bound without external dependencies
 */
import { Effect } from "effect";
import { IOError, type SinkOperation } from "../core/errors.js";
import type { FeedSink } from "../core/types.js";

export interface CaptureSinkConfig {
  /**
   * Keep written chunks (default: true). Turn off for large runs where only
   * the accounting matters.
   */
  readonly retain?: boolean;
  readonly destination?: string;
  /**
   * Make the given operation fail, optionally only after N successful calls
   */
  readonly failOn?: {
    readonly operation: SinkOperation;
    readonly after?: number;
  };
}

export interface CaptureSinkStats {
  readonly openCount: number;
  readonly writeCount: number;
  readonly flushCount: number;
  readonly closeCount: number;
  readonly discardCount: number;
  readonly bytesWritten: number;
  /**
   * Largest number of bytes written but not yet flushed at any time
   */
  readonly peakPendingBytes: number;
}

/**
 * Capture Sink instance with methods to inspect what was written
 */
export interface CaptureSink extends FeedSink {
  readonly discard: () => Effect.Effect<void, IOError>;
  /**
   * Everything written so far, concatenated
   */
  getOutput: () => string;
  getChunks: () => readonly string[];
  getStats: () => CaptureSinkStats;
  /**
   * Sink operations in call order
   */
  getCalls: () => readonly SinkOperation[];
}

/**
 * Create Capture Sink
 *
 * @example
 * ```typescript
 * const sink = createCaptureSink();
 * await createFeed({ destination: sink }).addMapper(map).write(items);
 *
 * expect(sink.getOutput()).toContain("<reference>1</reference>");
 * expect(sink.getStats().closeCount).toBe(1);
 * ```
 */
export const createCaptureSink = (config: CaptureSinkConfig = {}): CaptureSink => {
  const retain = config.retain ?? true;
  const destination = config.destination ?? "memory:";

  const chunks: string[] = [];
  const calls: SinkOperation[] = [];
  const counts: Record<SinkOperation, number> = {
    open: 0,
    write: 0,
    flush: 0,
    close: 0,
    discard: 0,
  };
  let bytesWritten = 0;
  let pendingBytes = 0;
  let peakPendingBytes = 0;

  const record = (operation: SinkOperation, apply: () => void) =>
    Effect.suspend(() => {
      calls.push(operation);
      const failOn = config.failOn;
      if (
        failOn !== undefined &&
        failOn.operation === operation &&
        counts[operation] >= (failOn.after ?? 0)
      ) {
        return Effect.fail(
          new IOError(`Simulated ${operation} failure`, operation, destination),
        );
      }
      counts[operation]++;
      apply();
      return Effect.void;
    });

  return {
    name: "capture-sink",
    destination,

    open: () => record("open", () => undefined),

    write: (chunk: string) =>
      record("write", () => {
        const bytes = Buffer.byteLength(chunk, "utf-8");
        bytesWritten += bytes;
        pendingBytes += bytes;
        peakPendingBytes = Math.max(peakPendingBytes, pendingBytes);
        if (retain) {
          chunks.push(chunk);
        }
      }),

    flush: () =>
      record("flush", () => {
        pendingBytes = 0;
      }),

    close: () => record("close", () => undefined),

    discard: () =>
      record("discard", () => {
        chunks.length = 0;
      }),

    getOutput: () => chunks.join(""),

    getChunks: () => [...chunks],

    getStats: () => ({
      openCount: counts.open,
      writeCount: counts.write,
      flushCount: counts.flush,
      closeCount: counts.close,
      discardCount: counts.discard,
      bytesWritten,
      peakPendingBytes,
    }),

    getCalls: () => [...calls],
  };
};
