import { afterEach, beforeEach, describe, it, expect } from "vitest";
import {
  evaluate,
  MAX_NESTING,
  type ReferenceResolver,
} from "./evaluate";
import { setValidatorLogger } from "./logger";
import { validRule, type Rule } from "./rule";

const stringRule: Rule = { kind: "type", expected: "string" };

const fixed = (rule: Rule): ReferenceResolver => ({ resolve: () => rule });

describe("evaluate", () => {
  beforeEach(() => {
    setValidatorLogger(null);
  });

  afterEach(() => {
    setValidatorLogger({ warn: (message) => console.warn(message) });
  });

  it("evaluates references through the resolver", () => {
    const context = { resolver: fixed(stringRule), maxDepth: 5 };
    const ref: Rule = { kind: "ref", reference: "#/definitions/name" };
    expect(evaluate(ref, "a", context)).toEqual({ valid: true });
    expect(evaluate(ref, 1, context)).toEqual({
      valid: false,
      errors: [{ kind: "type", value: 1, expected: "string" }],
    });
  });

  it("stops a chain of distinct references at maxDepth", () => {
    const resolver: ReferenceResolver = {
      resolve: (reference) => ({ kind: "ref", reference: `${reference}/x` }),
    };
    expect(
      evaluate({ kind: "ref", reference: "#" }, null, {
        resolver,
        maxDepth: 3,
      }),
    ).toEqual({
      valid: false,
      errors: [{ kind: "recursionLimit", reference: "#/x/x/x", depth: 4 }],
    });
  });

  it("stops nested rules between references at the nesting limit", () => {
    const resolver: ReferenceResolver = {
      resolve: (reference) => ({
        kind: "allOf",
        rules: [
          {
            kind: "allOf",
            rules: [{ kind: "ref", reference: `${reference}/x` }],
          },
        ],
      }),
    };
    expect(MAX_NESTING).toBe(512);
    expect(
      evaluate({ kind: "ref", reference: "#" }, null, {
        resolver,
        maxDepth: 1000,
      }),
    ).toEqual({
      valid: false,
      errors: [
        {
          kind: "recursionLimit",
          reference: `#${"/x".repeat(171)}`,
          depth: 172,
        },
      ],
    });
  });

  it("does not evaluate anyOf members after the first match", () => {
    const resolver: ReferenceResolver = {
      resolve: () => {
        throw new Error("resolved a reference it did not need");
      },
    };
    const rule: Rule = {
      kind: "anyOf",
      rules: [validRule, { kind: "ref", reference: "#/a" }],
    };
    expect(evaluate(rule, 1, { resolver, maxDepth: 5 })).toEqual({
      valid: true,
    });
  });

  it("evaluates every oneOf member", () => {
    const rule: Rule = {
      kind: "oneOf",
      rules: [validRule, stringRule, validRule],
    };
    const context = { resolver: fixed(validRule), maxDepth: 5 };
    expect(evaluate(rule, "a", context)).toEqual({
      valid: false,
      errors: [{ kind: "oneOf", passed: 3 }],
    });
  });

  it("applies a dependency schema to the whole object", () => {
    const rule: Rule = {
      kind: "dependencySchema",
      key: "a",
      rule: { kind: "required", required: ["b"] },
    };
    const context = { resolver: fixed(validRule), maxDepth: 5 };
    expect(evaluate(rule, { a: 1 }, context)).toEqual({
      valid: false,
      errors: [{ kind: "required", required: ["b"] }],
    });
    expect(evaluate(rule, { c: 1 }, context)).toEqual({ valid: true });
    expect(evaluate(rule, "a", context)).toEqual({ valid: true });
  });
});
