/*
 * Definition of the JSON value model and of the draft-04 schema document.
 * Only the keywords listed here take part in validation; any other key in a
 * schema document is carried along and ignored.
 */

/**
 * A decoded JSON value.
 */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonArray = JsonValue[];

export type JsonObject = { [key: string]: JsonValue };

/**
 * Kinds a JSON value can be classified as. Integers are numbers with a zero
 * fractional part; booleans are never numeric.
 */
export type JsonType =
  | "null"
  | "boolean"
  | "integer"
  | "number"
  | "string"
  | "array"
  | "object";

/**
 * JSON Schema type values
 */
export type SchemaType =
  | "object"
  | "array"
  | "string"
  | "integer"
  | "number"
  | "boolean"
  | "null";

export type Schema = {
  // Core keywords - identifiers
  $schema?: string;
  id?: string;
  $ref?: string;
  definitions?: Record<string, Schema>;

  // Metadata annotations
  title?: string;
  description?: string;
  default?: unknown;

  // Validation keywords - any instance type
  type?: string | string[];
  enum?: unknown[];
  format?: string;

  // Validation keywords - numeric instances
  multipleOf?: number;
  maximum?: number;
  exclusiveMaximum?: boolean;
  minimum?: number;
  exclusiveMinimum?: boolean;

  // Validation keywords - strings
  maxLength?: number;
  minLength?: number;
  pattern?: string;

  // Validation keywords - arrays
  items?: Schema | Schema[];
  additionalItems?: boolean | Schema;
  maxItems?: number;
  minItems?: number;
  uniqueItems?: boolean;

  // Validation keywords - objects
  maxProperties?: number;
  minProperties?: number;
  required?: string[];
  properties?: Record<string, Schema>;
  patternProperties?: Record<string, Schema>;
  additionalProperties?: boolean | Schema;
  dependencies?: Record<string, Schema | string[]>;

  // Applicator keywords
  allOf?: Schema[];
  anyOf?: Schema[];
  oneOf?: Schema[];
  not?: Schema;

  // Unrecognised keys are ignored
  [key: string]: unknown;
};

/**
 * Anything accepted where a schema document is expected: a typed `Schema`
 * or a raw decoded JSON object.
 */
export type SchemaDocument = Schema | JsonObject;

/**
 * Read-only view the compiler works on. Every schema position is an object
 * whose keyword values are narrowed on read.
 */
export type SchemaNode = Readonly<Record<string, unknown>>;
