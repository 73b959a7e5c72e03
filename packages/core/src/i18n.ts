import type { ValidationError } from "./error";

/**
 * Structured error message for i18n support.
 * Used by ErrorFormatter to produce localized error strings.
 */
export interface ErrorMessage {
  key: string;
  params?: Record<string, unknown>;
}

/**
 * Default error message templates for i18n support.
 * Keys are translation keys, values are English templates with {param} placeholders.
 */
export const MESSAGES: Record<string, string> = {
  "validation.type": "'{value}' is not of type '{expected}'",
  "validation.invalidType": "'{type}' is not a valid 'type'",
  "validation.anyOf": "'{value}' must match at least one schema",
  "validation.oneOf": "must match exactly one schema, matched {count}",
  "validation.not": "'{value}' must not match schema",
  "validation.enum": "'{value}' must be equal to one of the allowed values",
  "validation.maxLength": "must be shorter than or equal to {value} characters",
  "validation.minLength": "must be longer than or equal to {value} characters",
  "validation.pattern": "'{value}' must match pattern \"{pattern}\"",
  "validation.invalidRegex": "pattern \"{pattern}\" is not a valid regex",
  "validation.multipleOf": "{value} must be multiple of {divisor}",
  "validation.maximum": "must be <= {value}",
  "validation.exclusiveMaximum": "must be < {value}",
  "validation.minimum": "must be >= {value}",
  "validation.exclusiveMinimum": "must be > {value}",
  "validation.maxItems": "must have at most {value} items",
  "validation.minItems": "must have at least {value} items",
  "validation.uniqueItems": "must not contain duplicate items",
  "validation.maxProperties": "must have at most {value} properties",
  "validation.minProperties": "must have at least {value} properties",
  "validation.required": "must have required properties {properties}",
  "validation.additionalItems": "additional items are not permitted",
  "validation.additionalProperties": "additional properties are not permitted",
  "validation.dependency": "property '{source}' requires property '{target}'",
  "validation.format": "'{value}' must match format \"{format}\"",
  "validation.formatUnsupported": "format \"{format}\" is not supported",
  "validation.referenceNotFound":
    "reference {reference} not found at segment '{segment}'",
  "validation.remoteReference": "remote reference {reference} is not supported",
  "validation.cyclicReference": "reference {reference} never terminates",
  "validation.recursionLimit":
    "reference {reference} is nested too deeply ({depth} levels)",
};

/**
 * Formats ErrorMessage to string.
 * Provide a custom implementation for i18n support.
 */
export type ErrorFormatter = (msg: ErrorMessage) => string;

function show(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

const LENGTH_KEYS = {
  string: {
    tooLarge: "validation.maxLength",
    tooSmall: "validation.minLength",
  },
  array: { tooLarge: "validation.maxItems", tooSmall: "validation.minItems" },
  properties: {
    tooLarge: "validation.maxProperties",
    tooSmall: "validation.minProperties",
  },
} as const;

/**
 * Translation key and parameters for a validation error.
 */
export function toErrorMessage(error: ValidationError): ErrorMessage {
  switch (error.kind) {
    case "type":
      return {
        key: "validation.type",
        params: { value: show(error.value), expected: error.expected },
      };
    case "invalidType":
      return {
        key: "validation.invalidType",
        params: { type: show(error.type) },
      };
    case "anyOf":
    case "not":
      return {
        key: `validation.${error.kind}`,
        params: { value: show(error.value) },
      };
    case "oneOf":
      return { key: "validation.oneOf", params: { count: error.passed } };
    case "enum":
      return { key: "validation.enum", params: { value: show(error.value) } };
    case "length":
      return {
        key: LENGTH_KEYS[error.target][error.comparison],
        params: { value: error.limit },
      };
    case "pattern":
      return {
        key: "validation.pattern",
        params: { value: error.value, pattern: error.pattern },
      };
    case "invalidRegex":
      return {
        key: "validation.invalidRegex",
        params: { pattern: error.pattern },
      };
    case "multipleOf":
      return {
        key: "validation.multipleOf",
        params: { value: error.value, divisor: error.divisor },
      };
    case "bounds": {
      const bound = error.comparison === "tooLarge" ? "Maximum" : "Minimum";
      return {
        key: error.exclusive
          ? `validation.exclusive${bound}`
          : `validation.${bound.toLowerCase()}`,
        params: { value: error.limit },
      };
    }
    case "uniqueItems":
      return { key: "validation.uniqueItems" };
    case "required":
      return {
        key: "validation.required",
        params: {
          properties: error.required.map((p) => `'${p}'`).join(", "),
        },
      };
    case "additional":
      return {
        key:
          error.target === "array"
            ? "validation.additionalItems"
            : "validation.additionalProperties",
      };
    case "dependency":
      return {
        key: "validation.dependency",
        params: { source: error.key, target: error.dependency },
      };
    case "format":
      return {
        key: "validation.format",
        params: { value: error.value, format: error.format },
      };
    case "formatUnsupported":
      return {
        key: "validation.formatUnsupported",
        params: { format: error.format },
      };
    case "referenceNotFound":
      return {
        key: "validation.referenceNotFound",
        params: { reference: error.reference, segment: error.segment },
      };
    case "remoteReference":
    case "cyclicReference":
      return {
        key: `validation.${error.kind}`,
        params: { reference: error.reference },
      };
    case "recursionLimit":
      return {
        key: "validation.recursionLimit",
        params: { reference: error.reference, depth: error.depth },
      };
  }
}

/**
 * Default error formatter: looks up template from MESSAGES and interpolates params.
 */
export const defaultErrorFormatter: ErrorFormatter = (msg) => {
  const template = MESSAGES[msg.key] ?? msg.key;
  if (!msg.params) return template;

  let result = template;
  for (const [k, v] of Object.entries(msg.params)) {
    result = result.replace(`{${k}}`, () => String(v));
  }
  return result;
};
