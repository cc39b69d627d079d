/**
 * Expression Filter - keeps items for which a JSONata expression is truthy
 */
import { Effect } from "effect"
import * as Schema from "effect/Schema"
import { compileExpression } from "../core/expression.js"
import type { EffectFilterFn, StageDefinition } from "../core/types.js"
import { NonEmptyString, validateSync } from "../core/validation.js"

export interface ExpressionFilterConfig {
  readonly expression: string
  readonly bindings?: Readonly<Record<string, unknown>>
}

export const ExpressionFilterConfigSchema = Schema.Struct({
  expression: NonEmptyString,
  bindings: Schema.optional(Schema.Record({ key: Schema.String, value: Schema.Unknown })),
})

/**
 * JSONata truthiness: an empty sequence or a missing value is false
 */
const isTruthy = (value: unknown): boolean =>
  Array.isArray(value) ? value.some(isTruthy) : Boolean(value)

/**
 * Create an expression filter
 *
 * @example
 * ```typescript
 * const filter = createExpressionFilter({ expression: "stock > 0 and active" })
 * feed.addFilterEffect(filter.run, filter.name)
 * ```
 */
export const createExpressionFilter = (
  config: ExpressionFilterConfig
): StageDefinition<EffectFilterFn<unknown>> => {
  validateSync(ExpressionFilterConfigSchema, config, "expression filter configuration")
  const compiled = compileExpression(config.expression, "expression filter")

  return {
    name: "expression-filter",
    run: (item) => compiled.evaluate(item, config.bindings).pipe(Effect.map(isTruthy)),
  }
}
