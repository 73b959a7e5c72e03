import { allOf, anyOf, mergeResults, not, oneOf } from "./combinator";
import {
  invalid,
  valid,
  type LengthTarget,
  type ValidationResult,
} from "./error";
import { validatorLogger } from "./logger";
import type { Rule } from "./rule";
import type { JsonObject, JsonValue } from "./type";
import {
  characterLength,
  deepEqual,
  isJsonObject,
  matchSchemaType,
  uniqueItemsEqual,
} from "./util";

/**
 * Default ceiling on nested `$ref` evaluation.
 */
export const DEFAULT_MAX_DEPTH = 128;

/**
 * Ceiling on nested rule evaluation, counted across every rule kind. A
 * `$ref` reached deeper than this fails with `recursionLimit` even when
 * `maxDepth` has not been reached.
 */
export const MAX_NESTING = 512;

export interface ReferenceResolver {
  /**
   * Rule for a `$ref` value. Unresolvable references come back as an
   * always-invalid rule.
   */
  resolve(reference: string): Rule;
}

/**
 * A `$ref` currently being evaluated, linked to the one that led to it.
 */
export interface ReferenceFrame {
  reference: string;
  value: JsonValue;
  depth: number;
  parent?: ReferenceFrame;
}

export interface EvaluationContext {
  resolver: ReferenceResolver;
  maxDepth: number;
  frame?: ReferenceFrame;
  /** Number of enclosing `evaluate` calls. */
  nesting?: number;
}

type RuleOf<K extends Rule["kind"]> = Extract<Rule, { kind: K }>;

/**
 * Evaluate a compiled rule against a value. Every rule of a conjunction is
 * evaluated, so all violations are reported; `anyOf`, `oneOf` and `not`
 * collapse their sub-errors into one summary error.
 */
export function evaluate(
  rule: Rule,
  value: JsonValue,
  context: EvaluationContext,
): ValidationResult {
  const inner: EvaluationContext = {
    ...context,
    nesting: (context.nesting ?? 0) + 1,
  };
  const each = (rules: Rule[]) =>
    rules.map((sub) => evaluate(sub, value, inner));

  switch (rule.kind) {
    case "valid":
      return valid;
    case "invalid":
      return invalid(rule.error);
    case "type":
      return matchSchemaType(value, rule.expected)
        ? valid
        : invalid({ kind: "type", value, expected: rule.expected });
    case "allOf":
      return allOf(each(rule.rules));
    case "anyOf":
      return anyOf(value, lazily(rule.rules, value, inner));
    case "oneOf":
      return oneOf(each(rule.rules));
    case "not":
      return not(value, evaluate(rule.rule, value, inner));
    case "ref":
      return evaluateReference(rule.reference, value, inner);
    case "enum":
      return rule.values.some((candidate) => deepEqual(value, candidate))
        ? valid
        : invalid({ kind: "enum", value, values: rule.values });
    case "length":
      return evaluateLength(rule, value);
    case "pattern":
      return evaluatePattern(rule, value);
    case "multipleOf":
      return evaluateMultipleOf(rule, value);
    case "bounds":
      return evaluateBounds(rule, value);
    case "uniqueItems":
      return evaluateUniqueItems(value);
    case "items":
      return evaluateItems(rule, value, inner);
    case "tupleItems":
      return evaluateTupleItems(rule, value, inner);
    case "required":
      return evaluateRequired(rule, value);
    case "properties":
      return isJsonObject(value)
        ? evaluateProperties(rule, value, inner)
        : valid;
    case "dependencySchema":
      return isJsonObject(value) && Object.hasOwn(value, rule.key)
        ? evaluate(rule.rule, value, inner)
        : valid;
    case "dependencyKeys":
      return evaluateDependencyKeys(rule, value);
    case "format":
      if (typeof value !== "string" || rule.check(value)) {
        return valid;
      }
      return invalid({ kind: "format", format: rule.format, value });
  }
}

function* lazily(
  rules: Rule[],
  value: JsonValue,
  context: EvaluationContext,
): Generator<ValidationResult> {
  for (const rule of rules) {
    yield evaluate(rule, value, context);
  }
}

/**
 * Follow a `$ref`. Evaluation is a pure function of rule and value, so
 * meeting the same reference again for the same value further up the chain
 * can only loop forever; that is reported as a cyclic reference. Long chains
 * that do make progress stop at `maxDepth` hops, or earlier once the rules
 * between hops nest deeper than `MAX_NESTING`.
 */
function evaluateReference(
  reference: string,
  value: JsonValue,
  context: EvaluationContext,
): ValidationResult {
  const depth = (context.frame?.depth ?? 0) + 1;

  for (let frame = context.frame; frame; frame = frame.parent) {
    if (frame.reference === reference && frame.value === value) {
      validatorLogger?.warn(`Cyclic $ref detected: ${reference}`);
      return invalid({ kind: "cyclicReference", reference });
    }
  }

  if (depth > context.maxDepth) {
    validatorLogger?.warn(
      `$ref depth limit (${context.maxDepth}) exceeded at: ${reference}`,
    );
    return invalid({ kind: "recursionLimit", reference, depth });
  }

  if ((context.nesting ?? 0) > MAX_NESTING) {
    validatorLogger?.warn(
      `Evaluation nesting limit (${MAX_NESTING}) exceeded at: ${reference}`,
    );
    return invalid({ kind: "recursionLimit", reference, depth });
  }

  return evaluate(context.resolver.resolve(reference), value, {
    ...context,
    frame: { reference, value, depth, parent: context.frame },
  });
}

function measure(target: LengthTarget, value: JsonValue): number | undefined {
  switch (target) {
    case "string":
      return typeof value === "string" ? characterLength(value) : undefined;
    case "array":
      return Array.isArray(value) ? value.length : undefined;
    case "properties":
      return isJsonObject(value) ? Object.keys(value).length : undefined;
  }
}

function evaluateLength(
  rule: RuleOf<"length">,
  value: JsonValue,
): ValidationResult {
  const size = measure(rule.target, value);
  if (size === undefined) {
    return valid;
  }
  const withinLimit =
    rule.comparison === "tooLarge" ? size <= rule.limit : size >= rule.limit;
  return withinLimit
    ? valid
    : invalid({
        kind: "length",
        target: rule.target,
        comparison: rule.comparison,
        limit: rule.limit,
      });
}

function evaluatePattern(
  rule: RuleOf<"pattern">,
  value: JsonValue,
): ValidationResult {
  if (typeof value !== "string") {
    return valid;
  }
  if (rule.regex === null) {
    return invalid({ kind: "invalidRegex", pattern: rule.pattern });
  }
  return rule.regex.test(value)
    ? valid
    : invalid({ kind: "pattern", value, pattern: rule.pattern });
}

function evaluateMultipleOf(
  rule: RuleOf<"multipleOf">,
  value: JsonValue,
): ValidationResult {
  // Non-positive divisors are not checked at all.
  if (typeof value !== "number" || rule.divisor <= 0) {
    return valid;
  }
  const quotient = value / rule.divisor;
  return quotient === Math.floor(quotient)
    ? valid
    : invalid({ kind: "multipleOf", value, divisor: rule.divisor });
}

function evaluateBounds(
  rule: RuleOf<"bounds">,
  value: JsonValue,
): ValidationResult {
  if (typeof value !== "number") {
    return valid;
  }
  const { comparison, limit, exclusive } = rule;
  const inBounds =
    comparison === "tooSmall"
      ? exclusive
        ? value > limit
        : value >= limit
      : exclusive
        ? value < limit
        : value <= limit;
  return inBounds
    ? valid
    : invalid({ kind: "bounds", comparison, limit, exclusive });
}

function evaluateUniqueItems(value: JsonValue): ValidationResult {
  if (!Array.isArray(value)) {
    return valid;
  }
  for (let i = 0; i < value.length; i++) {
    for (let j = i + 1; j < value.length; j++) {
      if (uniqueItemsEqual(value[i], value[j])) {
        return invalid({ kind: "uniqueItems", value });
      }
    }
  }
  return valid;
}

function evaluateItems(
  rule: RuleOf<"items">,
  value: JsonValue,
  context: EvaluationContext,
): ValidationResult {
  if (!Array.isArray(value)) {
    return valid;
  }
  return mergeResults(value.map((item) => evaluate(rule.rule, item, context)));
}

function evaluateTupleItems(
  rule: RuleOf<"tupleItems">,
  value: JsonValue,
  context: EvaluationContext,
): ValidationResult {
  if (!Array.isArray(value)) {
    return valid;
  }
  return mergeResults(
    value.map((item, index) =>
      evaluate(
        index < rule.rules.length ? rule.rules[index] : rule.additional,
        item,
        context,
      ),
    ),
  );
}

function evaluateRequired(
  rule: RuleOf<"required">,
  value: JsonValue,
): ValidationResult {
  // A value that is not an object has none of the required properties.
  if (isJsonObject(value)) {
    const object: JsonObject = value;
    if (rule.required.every((key) => Object.hasOwn(object, key))) {
      return valid;
    }
  }
  return invalid({ kind: "required", required: rule.required });
}

function evaluateProperties(
  rule: RuleOf<"properties">,
  value: JsonObject,
  context: EvaluationContext,
): ValidationResult {
  const keys = Object.keys(value);
  const known = new Set(rule.properties.keys());
  const results: ValidationResult[] = [];

  for (const [key, propertyRule] of rule.properties) {
    if (Object.hasOwn(value, key)) {
      results.push(evaluate(propertyRule, value[key], context));
    }
  }

  for (const { pattern, regex, rule: patternRule } of rule.patternProperties) {
    if (regex === null) {
      return invalid({ kind: "invalidRegex", pattern });
    }
    for (const key of keys) {
      if (regex.test(key)) {
        known.add(key);
        results.push(evaluate(patternRule, value[key], context));
      }
    }
  }

  for (const key of keys) {
    if (!known.has(key)) {
      results.push(evaluate(rule.additional, value[key], context));
    }
  }

  return mergeResults(results);
}

function evaluateDependencyKeys(
  rule: RuleOf<"dependencyKeys">,
  value: JsonValue,
): ValidationResult {
  if (!isJsonObject(value) || !Object.hasOwn(value, rule.key)) {
    return valid;
  }
  const object: JsonObject = value;
  return mergeResults(
    rule.dependencies.map((dependency) =>
      Object.hasOwn(object, dependency)
        ? valid
        : invalid({ kind: "dependency", key: rule.key, dependency }),
    ),
  );
}
