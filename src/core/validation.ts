/**
 * Configuration validation using Effect Schema
 */
import * as Schema from "effect/Schema"
import { Effect, Either } from "effect"
import { ConfigurationError } from "./errors.js"

/**
 * Validate a value against a schema
 */
export const validate = <A, I>(
  schema: Schema.Schema<A, I>,
  value: unknown,
  context: string
): Effect.Effect<A, ConfigurationError> =>
  Effect.gen(function* () {
    const result = yield* Schema.decodeUnknown(schema)(value).pipe(
      Effect.mapError((error) => {
        const message = `Invalid ${context}: ${error.message}`
        return new ConfigurationError(message, error)
      })
    )
    return result
  })

/**
 * Validate a component configuration when the component is created.
 * Throws the ConfigurationError.
 */
export const validateSync = <A, I>(
  schema: Schema.Schema<A, I>,
  value: unknown,
  context: string
): A => {
  const result = Schema.decodeUnknownEither(schema)(value)
  if (Either.isLeft(result)) {
    throw new ConfigurationError(`Invalid ${context}: ${result.left.message}`, result.left)
  }
  return result.right
}

/**
 * Common validation schemas
 */

// Non-negative integer (quantities)
export const NonNegativeInt = Schema.Int.pipe(
  Schema.nonNegative({
    message: () => "Must be a non-negative integer"
  })
)

// Finite, non-negative number (prices)
export const NonNegativeNumber = Schema.Number.pipe(
  Schema.finite(),
  Schema.nonNegative({
    message: () => "Must be a non-negative number"
  })
)

// Non-empty string
export const NonEmptyString = Schema.String.pipe(
  Schema.minLength(1, {
    message: () => "String cannot be empty"
  })
)

// Identifier: non-empty string or finite number
export const Identifier = Schema.Union(
  NonEmptyString,
  Schema.Number.pipe(Schema.finite())
)

// Attribute value
export const Scalar = Schema.Union(Schema.String, Schema.Number, Schema.Boolean)

// Attribute mapping
export const AttributeMap = Schema.Record({ key: Schema.String, value: Scalar })

// Destination descriptor (URI-like)
export const DestinationDescriptor = Schema.String.pipe(
  Schema.minLength(1, {
    message: () => "Destination cannot be empty"
  })
)
