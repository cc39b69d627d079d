import { describe, it, expect } from "vitest"
import { Effect, Logger, LogLevel } from "effect"
import {
  createLoggingProcessor,
  type LoggingProcessorConfig,
} from "../../../src/processors/logging-processor.js"
import { ConfigurationError } from "../../../src/core/errors.js"

const captureLogs = () => {
  const entries: Array<{ level: LogLevel.LogLevel; message: unknown }> = []
  const logger = Logger.make(({ logLevel, message }) => {
    entries.push({ level: logLevel, message: Array.isArray(message) ? message[0] : message })
  })
  return { entries, layer: Logger.replace(Logger.defaultLogger, logger) }
}

describe("LoggingProcessor", () => {
  it("should pass the item through unchanged", async () => {
    const processor = createLoggingProcessor()
    const item = { sku: 1 }

    const result = await Effect.runPromise(
      processor.run(item).pipe(Logger.withMinimumLogLevel(LogLevel.None))
    )

    expect(result).toBe(item)
  })

  it("should log the item at the configured level", async () => {
    const { entries, layer } = captureLogs()
    const processor = createLoggingProcessor({ level: "warn" })

    await Effect.runPromise(processor.run({ sku: 1 }).pipe(Effect.provide(layer)))

    expect(entries).toEqual([{ level: LogLevel.Warning, message: 'Processing item: {"sku":1}' }])
  })

  it("should leave the item out when includeItem is false", async () => {
    const { entries, layer } = captureLogs()
    const processor = createLoggingProcessor({ includeItem: false })

    await Effect.runPromise(processor.run({ secret: "test-secret" }).pipe(Effect.provide(layer)))

    expect(entries).toEqual([{ level: LogLevel.Info, message: "Processing item" }])
  })

  it("should respect the minimum log level of the fiber", async () => {
    const { entries, layer } = captureLogs()
    const processor = createLoggingProcessor({ level: "debug" })

    await Effect.runPromise(processor.run({ sku: 1 }).pipe(Effect.provide(layer)))

    expect(entries).toEqual([])
  })

  it("should reject an unknown level", () => {
    const config: LoggingProcessorConfig = JSON.parse('{ "level": "verbose" }')

    expect(() => createLoggingProcessor(config)).toThrow(ConfigurationError)
  })

  it("should have correct processor name", () => {
    expect(createLoggingProcessor().name).toBe("logging-processor")
  })
})
