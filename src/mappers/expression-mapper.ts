/**
 * Expression Mapper - populates a product from a JSONata expression
 *
 * The expression must evaluate to an object shaped like a product:
 *
 *   { reference, name, price, quantity,
 *     attributes: { key: value, ... },
 *     variations: [{ reference, name, price, quantity }, ...] }
 *
 * Every key is optional; absent keys leave the product untouched so that
 * several mappers can each fill in part of it.
 */
import { Effect } from "effect"
import * as Schema from "effect/Schema"
import { compileExpression } from "../core/expression.js"
import type { Product } from "../core/product.js"
import type { EffectMapperFn, StageDefinition } from "../core/types.js"
import { NonEmptyString, Scalar, validateSync } from "../core/validation.js"

export interface ExpressionMapperConfig {
  readonly expression: string
  readonly bindings?: Readonly<Record<string, unknown>>
}

export const ExpressionMapperConfigSchema = Schema.Struct({
  expression: NonEmptyString,
  bindings: Schema.optional(Schema.Record({ key: Schema.String, value: Schema.Unknown })),
})

const Reference = Schema.Union(Schema.String, Schema.Number)

const VariationFields = Schema.Struct({
  reference: Schema.optional(Reference),
  name: Schema.optional(Schema.String),
  price: Schema.optional(Schema.Number),
  quantity: Schema.optional(Schema.Number),
})

/**
 * Shape an expression result must have
 */
export const ProductFields = Schema.Struct({
  reference: Schema.optional(Reference),
  name: Schema.optional(Schema.String),
  price: Schema.optional(Schema.Number),
  quantity: Schema.optional(Schema.Number),
  attributes: Schema.optional(Schema.Record({ key: Schema.String, value: Scalar })),
  variations: Schema.optional(Schema.Array(VariationFields)),
})

export type ProductFields = Schema.Schema.Type<typeof ProductFields>

const decodeProductFields = Schema.decodeUnknown(ProductFields)

/**
 * Apply decoded fields to a product through its setters
 */
export const applyProductFields = (product: Product, fields: ProductFields): void => {
  if (fields.reference !== undefined) product.setReference(fields.reference)
  if (fields.name !== undefined) product.setName(fields.name)
  if (fields.price !== undefined) product.setPrice(fields.price)
  if (fields.quantity !== undefined) product.setQuantity(fields.quantity)

  for (const [key, value] of Object.entries(fields.attributes ?? {})) {
    product.setAttribute(key, value)
  }

  for (const variationFields of fields.variations ?? []) {
    const variation = product.createVariation()
    if (variationFields.reference !== undefined) variation.setReference(variationFields.reference)
    if (variationFields.name !== undefined) variation.setName(variationFields.name)
    if (variationFields.price !== undefined) variation.setPrice(variationFields.price)
    if (variationFields.quantity !== undefined) variation.setQuantity(variationFields.quantity)
  }
}

/**
 * Create an expression mapper
 *
 * @example
 * ```typescript
 * const mapper = createExpressionMapper({
 *   expression: '{ "reference": sku, "name": title, "price": price, "quantity": stock }',
 * })
 * feed.addMapperEffect(mapper.run, mapper.name)
 * ```
 */
export const createExpressionMapper = (
  config: ExpressionMapperConfig
): StageDefinition<EffectMapperFn<unknown>> => {
  validateSync(ExpressionMapperConfigSchema, config, "expression mapper configuration")
  const compiled = compileExpression(config.expression, "expression mapper")

  return {
    name: "expression-mapper",
    run: (item, product) =>
      Effect.gen(function* () {
        const result = yield* compiled.evaluate(item, config.bindings)
        // Nothing matched: leave the product as it is
        if (result === undefined) {
          return
        }
        const fields = yield* decodeProductFields(result)
        applyProductFields(product, fields)
      }),
  }
}
