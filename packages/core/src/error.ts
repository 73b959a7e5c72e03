import type { JsonArray, JsonValue } from "./type";

export type LengthTarget = "string" | "array" | "properties";

export type Comparison = "tooLarge" | "tooSmall";

/**
 * One constraint violation. Each variant carries the data needed to render
 * a message for it; see `i18n.ts` for the default English rendering.
 */
export type ValidationError =
  | { kind: "type"; value: JsonValue; expected: string }
  | { kind: "invalidType"; type: unknown }
  | { kind: "anyOf"; value: JsonValue }
  | { kind: "oneOf"; passed: number }
  | { kind: "not"; value: JsonValue }
  | { kind: "enum"; value: JsonValue; values: unknown[] }
  | {
      kind: "length";
      target: LengthTarget;
      comparison: Comparison;
      limit: number;
    }
  | { kind: "pattern"; value: string; pattern: string }
  | { kind: "invalidRegex"; pattern: string }
  | { kind: "multipleOf"; value: number; divisor: number }
  | {
      kind: "bounds";
      comparison: Comparison;
      limit: number;
      exclusive: boolean;
    }
  | { kind: "uniqueItems"; value: JsonArray }
  | { kind: "required"; required: string[] }
  | { kind: "additional"; target: "array" | "object" }
  | { kind: "dependency"; key: string; dependency: string }
  | { kind: "format"; format: string; value: string }
  | { kind: "formatUnsupported"; format: string }
  | { kind: "referenceNotFound"; reference: string; segment: string }
  | { kind: "remoteReference"; reference: string }
  | { kind: "cyclicReference"; reference: string }
  | { kind: "recursionLimit"; reference: string; depth: number };

export type ValidationErrorKind = ValidationError["kind"];

/**
 * Outcome of evaluating a rule. Errors are kept in evaluation order and are
 * never deduplicated.
 */
export type ValidationResult =
  | { readonly valid: true }
  | { readonly valid: false; readonly errors: ValidationError[] };

export const valid: ValidationResult = { valid: true };

export function invalid(...errors: ValidationError[]): ValidationResult {
  return { valid: false, errors };
}

export function errorsOf(result: ValidationResult): ValidationError[] {
  return result.valid ? [] : result.errors;
}

/**
 * Thrown for misuse of the API itself, such as constructing a context from
 * something that is not a schema object. Schema and value problems are
 * reported through `ValidationResult` instead.
 */
export class SchemaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SchemaError";
  }
}
