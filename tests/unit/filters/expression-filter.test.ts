import { describe, it, expect } from "vitest"
import { Effect } from "effect"
import { createExpressionFilter } from "../../../src/filters/expression-filter.js"

const verdict = (expression: string, item: unknown, bindings?: Record<string, unknown>) =>
  Effect.runPromise(createExpressionFilter({ expression, bindings }).run(item))

describe("ExpressionFilter", () => {
  it("should pass items for which the expression is true", async () => {
    expect(await verdict("stock > 0", { stock: 5 })).toBe(true)
    expect(await verdict("stock > 0", { stock: 0 })).toBe(false)
  })

  it("should treat a missing value as false", async () => {
    expect(await verdict("active", { sku: 1 })).toBe(false)
  })

  it("should apply JSONata truthiness to other values", async () => {
    expect(await verdict("title", { title: "Lamp" })).toBe(true)
    expect(await verdict("title", { title: "" })).toBe(false)
    expect(await verdict('tags[$ = "sale"]', { tags: ["new", "sale"] })).toBe(true)
    expect(await verdict('tags[$ = "sale"]', { tags: ["new"] })).toBe(false)
  })

  it("should compare against bindings", async () => {
    expect(await verdict("price <= $limit", { price: 10 }, { limit: 20 })).toBe(true)
    expect(await verdict("price <= $limit", { price: 30 }, { limit: 20 })).toBe(false)
  })

  it("should fail when evaluation fails", async () => {
    const filter = createExpressionFilter({ expression: "$number(stock) > 0" })

    const result = await Effect.runPromise(Effect.either(filter.run({ stock: "lots" })))

    expect(result._tag).toBe("Left")
  })

  it("should reject an empty expression", () => {
    expect(() => createExpressionFilter({ expression: "" })).toThrow(
      /^Invalid expression filter configuration: /
    )
  })

  it("should throw on an expression that does not compile", () => {
    expect(() => createExpressionFilter({ expression: "stock >" })).toThrow(
      /^expression filter: failed to compile JSONata expression: /
    )
  })
})
