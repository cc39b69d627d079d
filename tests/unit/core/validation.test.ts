import { describe, it, expect } from "vitest";
import { Effect, Exit } from "effect";
import * as Schema from "effect/Schema";
import {
  AttributeMap,
  Identifier,
  NonNegativeInt,
  NonNegativeNumber,
  validate,
} from "../../../src/core/validation.js";
import { ConfigurationError } from "../../../src/core/errors.js";

const is = <A, I>(schema: Schema.Schema<A, I>, value: unknown) =>
  Schema.is(schema)(value);

describe("Configuration Validation", () => {
  describe("validate()", () => {
    it("should return the decoded value", async () => {
      const value = await Effect.runPromise(
        validate(NonNegativeInt, 3, "quantity"),
      );

      expect(value).toBe(3);
    });

    it("should fail with a ConfigurationError naming the context", async () => {
      const exit = await Effect.runPromiseExit(
        validate(NonNegativeInt, -1, "quantity"),
      );

      expect(Exit.isFailure(exit)).toBe(true);
      if (Exit.isFailure(exit) && exit.cause._tag === "Fail") {
        expect(exit.cause.error).toBeInstanceOf(ConfigurationError);
        expect(exit.cause.error.message).toMatch(/^Invalid quantity: /);
      }
    });
  });

  describe("schemas", () => {
    it("should accept string and number identifiers", () => {
      expect(is(Identifier, "SKU-1")).toBe(true);
      expect(is(Identifier, 1)).toBe(true);
    });

    it("should reject empty and non-finite identifiers", () => {
      expect(is(Identifier, "")).toBe(false);
      expect(is(Identifier, Number.POSITIVE_INFINITY)).toBe(false);
      expect(is(Identifier, true)).toBe(false);
    });

    it("should only accept finite non-negative prices", () => {
      expect(is(NonNegativeNumber, 5.99)).toBe(true);
      expect(is(NonNegativeNumber, 0)).toBe(true);
      expect(is(NonNegativeNumber, -0.01)).toBe(false);
      expect(is(NonNegativeNumber, Number.NaN)).toBe(false);
    });

    it("should only accept whole non-negative quantities", () => {
      expect(is(NonNegativeInt, 3)).toBe(true);
      expect(is(NonNegativeInt, 1.5)).toBe(false);
    });

    it("should accept scalar attribute maps only", () => {
      expect(is(AttributeMap, { currency: "EUR", vat: 21, public: true })).toBe(true);
      expect(is(AttributeMap, { nested: { a: 1 } })).toBe(false);
    });
  });
});
