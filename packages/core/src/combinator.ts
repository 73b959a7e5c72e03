import {
  errorsOf,
  invalid,
  valid,
  type ValidationError,
  type ValidationResult,
} from "./error";
import type { JsonValue } from "./type";

/**
 * Merge many outcomes into one: valid iff every outcome is valid, otherwise
 * invalid with all errors concatenated in outcome order.
 */
export function mergeResults(
  results: Iterable<ValidationResult>,
): ValidationResult {
  const errors: ValidationError[] = [];
  for (const result of results) {
    errors.push(...errorsOf(result));
  }
  return errors.length === 0 ? valid : { valid: false, errors };
}

export function allOf(results: Iterable<ValidationResult>): ValidationResult {
  return mergeResults(results);
}

/**
 * Valid iff at least one outcome is valid. Sub-errors are dropped in favour
 * of a single summary error.
 */
export function anyOf(
  value: JsonValue,
  results: Iterable<ValidationResult>,
): ValidationResult {
  for (const result of results) {
    if (result.valid) return valid;
  }
  return invalid({ kind: "anyOf", value });
}

export function oneOf(results: Iterable<ValidationResult>): ValidationResult {
  let passed = 0;
  for (const result of results) {
    if (result.valid) passed++;
  }
  return passed === 1 ? valid : invalid({ kind: "oneOf", passed });
}

export function not(
  value: JsonValue,
  result: ValidationResult,
): ValidationResult {
  return result.valid ? invalid({ kind: "not", value }) : valid;
}
