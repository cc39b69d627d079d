/**
 * Main entry point - exports public API
 */

// Core
export * from "./core/types.js"
export * from "./core/feed.js"
export * from "./core/config.js"
export * from "./core/product.js"
export * from "./core/registry.js"
export * from "./core/errors.js"
export * from "./core/metrics.js"
export * from "./core/config-loader.js"
export * from "./core/pipeline-builder.js"
export { compileExpression, type CompiledExpression } from "./core/expression.js"
export { formatError } from "./core/format-error.js"
export { validate } from "./core/validation.js"

// Inputs
export * from "./inputs/item-driver.js"
export * from "./inputs/ndjson-input.js"

// Processors, filters and mappers
export * from "./processors/logging-processor.js"
export * from "./processors/mapping-processor.js"
export * from "./filters/expression-filter.js"
export * from "./mappers/expression-mapper.js"

// Outputs
export * from "./outputs/destination.js"
export * from "./outputs/file-sink.js"
export * from "./outputs/stream-sink.js"
export * from "./outputs/xml-serializer.js"

// Testing Utilities (for building tests and examples)
export * from "./testing/index.js"
