/**
 * JSONata expressions shared by the declarative stages
 */
import { Effect } from "effect"
import jsonata from "jsonata"
import { ConfigurationError, describeCause } from "./errors.js"

export interface CompiledExpression {
  readonly source: string
  /**
   * Evaluate against an input document. `bindings` become `$name` variables.
   */
  readonly evaluate: (
    input: unknown,
    bindings?: Readonly<Record<string, unknown>>
  ) => Effect.Effect<unknown, unknown>
}

/**
 * Compile a JSONata expression once, at stage creation
 *
 * @throws ConfigurationError when the expression does not parse
 */
export const compileExpression = (expression: string, context: string): CompiledExpression => {
  let compiled: jsonata.Expression

  try {
    compiled = jsonata(expression)
  } catch (error) {
    throw new ConfigurationError(
      `${context}: failed to compile JSONata expression: ${describeCause(error)}`,
      error
    )
  }

  return {
    source: expression,
    evaluate: (input, bindings) =>
      Effect.tryPromise({
        try: async (): Promise<unknown> => compiled.evaluate(input, bindings ? { ...bindings } : undefined),
        catch: (error) => error,
      }),
  }
}
