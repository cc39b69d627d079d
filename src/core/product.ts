/**
 * Product model - the entity populated by mappers for one item
 */
import { Effect, Either, type ParseResult } from "effect"
import * as Schema from "effect/Schema"
import { ValidationError } from "./errors.js"
import {
  Identifier as IdentifierSchema,
  NonEmptyString,
  NonNegativeInt,
  NonNegativeNumber,
} from "./validation.js"

export type Identifier = string | number
export type Scalar = string | number | boolean

/**
 * Read-only view of a variation
 */
export interface VariationData {
  readonly reference?: Identifier
  readonly name?: string
  readonly price?: number
  readonly quantity?: number
}

/**
 * Read-only view of a product, as populated so far
 */
export interface ProductData {
  readonly reference?: Identifier
  readonly name?: string
  readonly price?: number
  readonly quantity?: number
  readonly attributes: ReadonlyArray<readonly [string, Scalar]>
  readonly variations: ReadonlyArray<VariationData>
}

/**
 * A product whose required fields are present and valid
 */
export interface ValidProduct extends ProductData {
  readonly reference: Identifier
  readonly name: string
  readonly price: number
  readonly quantity: number
}

/**
 * Child sub-record of a product. Created through `Product.createVariation()`.
 */
export class Variation {
  private reference?: Identifier
  private name?: string
  private price?: number
  private quantity?: number

  setReference(reference: Identifier): this {
    this.reference = reference
    return this
  }

  setName(name: string): this {
    this.name = name
    return this
  }

  setPrice(price: number): this {
    this.price = price
    return this
  }

  setQuantity(quantity: number): this {
    this.quantity = quantity
    return this
  }

  snapshot(): VariationData {
    return {
      reference: this.reference,
      name: this.name,
      price: this.price,
      quantity: this.quantity,
    }
  }
}

/**
 * One exported record. A new instance is created for every item and
 * discarded once the item has been serialized.
 *
 * @example
 * ```typescript
 * product
 *   .setReference(1)
 *   .setName("Product 1")
 *   .setPrice(5.99)
 *   .setQuantity(3)
 *   .setAttribute("color", "red")
 *
 * product.createVariation().setReference("1-S").setPrice(5.99).setQuantity(1)
 * ```
 */
export class Product {
  private reference?: Identifier
  private name?: string
  private price?: number
  private quantity?: number
  private readonly attributes = new Map<string, Scalar>()
  private readonly variations: Variation[] = []

  setReference(reference: Identifier): this {
    this.reference = reference
    return this
  }

  setName(name: string): this {
    this.name = name
    return this
  }

  setPrice(price: number): this {
    this.price = price
    return this
  }

  setQuantity(quantity: number): this {
    this.quantity = quantity
    return this
  }

  /**
   * Set an attribute. Setting an existing key overwrites its value and keeps
   * its original position.
   */
  setAttribute(key: string, value: Scalar): this {
    this.attributes.set(key, value)
    return this
  }

  /**
   * Create a variation, append it to this product and return it
   */
  createVariation(): Variation {
    const variation = new Variation()
    this.variations.push(variation)
    return variation
  }

  snapshot(): ProductData {
    return {
      reference: this.reference,
      name: this.name,
      price: this.price,
      quantity: this.quantity,
      attributes: [...this.attributes.entries()],
      variations: this.variations.map((variation) => variation.snapshot()),
    }
  }
}

type RequiredField = "reference" | "name" | "price" | "quantity"

/**
 * Required fields, checked in this order
 */
const requiredFields: ReadonlyArray<{
  readonly field: RequiredField
  readonly decode: (value: unknown) => Either.Either<unknown, ParseResult.ParseError>
}> = [
  { field: "reference", decode: Schema.decodeUnknownEither(IdentifierSchema) },
  { field: "name", decode: Schema.decodeUnknownEither(NonEmptyString) },
  { field: "price", decode: Schema.decodeUnknownEither(NonNegativeNumber) },
  { field: "quantity", decode: Schema.decodeUnknownEither(NonNegativeInt) },
]

/**
 * Check that every required field is set and valid
 */
export const validateProduct = (
  product: Product,
  ordinal: number
): Effect.Effect<ValidProduct, ValidationError> => {
  const data = product.snapshot()
  const { reference, name, price, quantity } = data

  for (const { field, decode } of requiredFields) {
    const value = data[field]
    if (value === undefined) {
      return Effect.fail(
        new ValidationError(
          `Item #${ordinal}: product is missing required field "${field}"`,
          field,
          ordinal
        )
      )
    }

    const decoded = decode(value)
    if (Either.isLeft(decoded)) {
      return Effect.fail(
        new ValidationError(
          `Item #${ordinal}: product field "${field}" is invalid: ${decoded.left.message}`,
          field,
          ordinal,
          decoded.left
        )
      )
    }
  }

  if (
    reference === undefined ||
    name === undefined ||
    price === undefined ||
    quantity === undefined
  ) {
    return Effect.fail(
      new ValidationError(`Item #${ordinal}: product is incomplete`, "product", ordinal)
    )
  }

  return Effect.succeed({ ...data, reference, name, price, quantity })
}
