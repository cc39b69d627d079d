/**
 * Mapping Processor - JSONata-based item transformations
 */
import * as Schema from "effect/Schema";
import { compileExpression } from "../core/expression.js";
import type { EffectProcessorFn, StageDefinition } from "../core/types.js";
import { NonEmptyString, validateSync } from "../core/validation.js";

export interface MappingProcessorConfig {
  readonly expression: string;
  /**
   * Extra `$name` variables made available to the expression
   */
  readonly bindings?: Readonly<Record<string, unknown>>;
}

/**
 * Validation schema for Mapping Processor configuration
 */
export const MappingProcessorConfigSchema = Schema.Struct({
  expression: NonEmptyString,
  bindings: Schema.optional(
    Schema.Record({ key: Schema.String, value: Schema.Unknown }),
  ),
});

/**
 * Create a mapping processor using JSONata
 *
 * The expression result replaces the item. An expression that yields
 * nothing for an item is reported by the feed as a failing processor.
 *
 * @example
 * ```typescript
 * const processor = createMappingProcessor({
 *   expression: '$merge([$, { "price": $number(price) }])',
 * });
 * feed.addProcessorEffect(processor.run, processor.name);
 * ```
 */
export const createMappingProcessor = (
  config: MappingProcessorConfig,
): StageDefinition<EffectProcessorFn<unknown>> => {
  validateSync(MappingProcessorConfigSchema, config, "mapping processor configuration");

  // Compile once during processor creation
  const compiled = compileExpression(config.expression, "mapping processor");

  return {
    name: "mapping-processor",
    run: (item) => compiled.evaluate(item, config.bindings),
  };
};
