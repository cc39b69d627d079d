/**
 * Feed metrics collection utilities
 * Metrics are emitted via structured logging for observability
 */
import { Effect } from "effect"

/**
 * Snapshot of a feed run's counters
 */
export interface FeedMetricsSnapshot {
  readonly component: string
  readonly timestamp: number
  readonly pulled: number
  readonly emitted: number
  readonly filtered: number
  readonly rejected: number
  readonly bytesWritten: number
  readonly averageDuration: number  // milliseconds per emitted product
  readonly totalDuration: number    // milliseconds
}

/**
 * Metrics accumulator for a single feed run
 */
export class FeedMetrics {
  private pulled = 0
  private emitted = 0
  private filtered = 0
  private rejected = 0
  private bytesWritten = 0
  private totalDuration = 0
  private sinceLastEmit = 0

  constructor(private readonly componentName: string) {}

  recordPulled(): void {
    this.pulled++
  }

  /**
   * Record a serialized and flushed product
   */
  recordEmitted(bytes: number, durationMs: number = 0): void {
    this.emitted++
    this.bytesWritten += bytes
    this.totalDuration += durationMs
    this.sinceLastEmit++
  }

  recordFiltered(): void {
    this.filtered++
  }

  recordRejected(): void {
    this.rejected++
  }

  /**
   * Bytes written outside of products (document header and footer)
   */
  recordFraming(bytes: number): void {
    this.bytesWritten += bytes
  }

  /**
   * True once `interval` products have been emitted since the last call
   * that returned true
   */
  shouldEmit(interval: number): boolean {
    if (interval <= 0 || this.sinceLastEmit < interval) {
      return false
    }
    this.sinceLastEmit = 0
    return true
  }

  snapshot(): FeedMetricsSnapshot {
    return {
      component: this.componentName,
      timestamp: Date.now(),
      pulled: this.pulled,
      emitted: this.emitted,
      filtered: this.filtered,
      rejected: this.rejected,
      bytesWritten: this.bytesWritten,
      averageDuration:
        this.emitted > 0
          ? Math.round(this.totalDuration / this.emitted)
          : 0,
      totalDuration: Math.round(this.totalDuration),
    }
  }
}

/**
 * Emit feed metrics via structured logging
 */
export const emitFeedMetrics = (
  metrics: FeedMetricsSnapshot
): Effect.Effect<void, never, never> =>
  Effect.logInfo("Feed metrics", {
    component: metrics.component,
    pulled: metrics.pulled,
    emitted: metrics.emitted,
    filtered: metrics.filtered,
    rejected: metrics.rejected,
    bytesWritten: metrics.bytesWritten,
    averageDuration: metrics.averageDuration,
    totalDuration: metrics.totalDuration,
    timestamp: metrics.timestamp,
  })

/**
 * Create a performance timer Effect
 */
export const measureDuration = <A, E, R>(
  effect: Effect.Effect<A, E, R>
): Effect.Effect<[A, number], E, R> =>
  Effect.gen(function* () {
    const start = Date.now()
    const result = yield* effect
    const timed: [A, number] = [result, Date.now() - start]
    return timed
  })
