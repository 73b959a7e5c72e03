import type { FormatRegistry } from "./stringformat";
import {
  conjunction,
  invalidRule,
  validRule,
  type PatternRule,
  type Rule,
} from "./rule";
import type { SchemaNode } from "./type";
import {
  compilePattern,
  isSchemaArray,
  isSchemaNode,
  isStringArray,
} from "./util";

/**
 * Compile a schema node into its ordered rule list, one rule per recognised
 * keyword present. Nested schemas are compiled recursively; `$ref` targets
 * are left to the evaluator. Unrecognised keywords, and recognised ones whose
 * value has the wrong shape, are ignored (except `type`, which fails closed).
 */
export function compileSchema(
  schema: SchemaNode,
  formats: FormatRegistry,
): Rule[] {
  const rules: Rule[] = [];
  const sub = (node: SchemaNode) => compileRule(node, formats);

  if (typeof schema.$ref === "string") {
    rules.push({ kind: "ref", reference: schema.$ref });
  }

  if (schema.type !== undefined) {
    rules.push(compileType(schema.type));
  }

  // Applicators
  if (isSchemaArray(schema.allOf)) {
    for (const node of schema.allOf) {
      rules.push(...compileSchema(node, formats));
    }
  }
  if (isSchemaArray(schema.anyOf)) {
    rules.push({ kind: "anyOf", rules: schema.anyOf.map(sub) });
  }
  if (isSchemaArray(schema.oneOf)) {
    rules.push({ kind: "oneOf", rules: schema.oneOf.map(sub) });
  }
  if (isSchemaNode(schema.not)) {
    rules.push({ kind: "not", rule: sub(schema.not) });
  }

  if (Array.isArray(schema.enum)) {
    rules.push({ kind: "enum", values: schema.enum });
  }

  // Strings
  if (typeof schema.maxLength === "number") {
    rules.push({
      kind: "length",
      target: "string",
      comparison: "tooLarge",
      limit: schema.maxLength,
    });
  }
  if (typeof schema.minLength === "number") {
    rules.push({
      kind: "length",
      target: "string",
      comparison: "tooSmall",
      limit: schema.minLength,
    });
  }
  if (typeof schema.pattern === "string") {
    rules.push({
      kind: "pattern",
      pattern: schema.pattern,
      regex: compilePattern(schema.pattern),
    });
  }

  // Numbers
  if (typeof schema.multipleOf === "number") {
    rules.push({ kind: "multipleOf", divisor: schema.multipleOf });
  }
  if (typeof schema.minimum === "number") {
    rules.push({
      kind: "bounds",
      comparison: "tooSmall",
      limit: schema.minimum,
      exclusive: schema.exclusiveMinimum === true,
    });
  }
  if (typeof schema.maximum === "number") {
    rules.push({
      kind: "bounds",
      comparison: "tooLarge",
      limit: schema.maximum,
      exclusive: schema.exclusiveMaximum === true,
    });
  }

  // Arrays
  if (typeof schema.minItems === "number") {
    rules.push({
      kind: "length",
      target: "array",
      comparison: "tooSmall",
      limit: schema.minItems,
    });
  }
  if (typeof schema.maxItems === "number") {
    rules.push({
      kind: "length",
      target: "array",
      comparison: "tooLarge",
      limit: schema.maxItems,
    });
  }
  if (schema.uniqueItems === true) {
    rules.push({ kind: "uniqueItems" });
  }
  if (isSchemaNode(schema.items)) {
    rules.push({ kind: "items", rule: sub(schema.items) });
  } else if (isSchemaArray(schema.items)) {
    rules.push({
      kind: "tupleItems",
      rules: schema.items.map(sub),
      additional: compileAdditional(schema.additionalItems, "array", sub),
    });
  }

  // Objects
  if (typeof schema.maxProperties === "number") {
    rules.push({
      kind: "length",
      target: "properties",
      comparison: "tooLarge",
      limit: schema.maxProperties,
    });
  }
  if (typeof schema.minProperties === "number") {
    rules.push({
      kind: "length",
      target: "properties",
      comparison: "tooSmall",
      limit: schema.minProperties,
    });
  }
  if (isStringArray(schema.required)) {
    rules.push({ kind: "required", required: schema.required });
  }
  if (
    schema.properties !== undefined ||
    schema.patternProperties !== undefined ||
    schema.additionalProperties !== undefined
  ) {
    rules.push({
      kind: "properties",
      properties: new Map(
        schemaEntries(schema.properties).map(
          ([key, node]): [string, Rule] => [key, sub(node)],
        ),
      ),
      patternProperties: schemaEntries(schema.patternProperties).map(
        ([pattern, node]): PatternRule => ({
          pattern,
          regex: compilePattern(pattern),
          rule: sub(node),
        }),
      ),
      additional: compileAdditional(
        schema.additionalProperties,
        "object",
        sub,
      ),
    });
  }
  if (isSchemaNode(schema.dependencies)) {
    for (const [key, dependency] of Object.entries(schema.dependencies)) {
      if (isSchemaNode(dependency)) {
        rules.push({
          kind: "dependencySchema",
          key,
          rule: sub(dependency),
        });
      } else if (isStringArray(dependency)) {
        rules.push({
          kind: "dependencyKeys",
          key,
          dependencies: dependency,
        });
      }
    }
  }

  if (typeof schema.format === "string") {
    const check = formats.get(schema.format);
    rules.push(
      check
        ? { kind: "format", format: schema.format, check }
        : invalidRule({ kind: "formatUnsupported", format: schema.format }),
    );
  }

  return rules;
}

/**
 * Compile a schema node into the conjunction of its rules.
 */
export function compileRule(
  schema: SchemaNode,
  formats: FormatRegistry,
): Rule {
  return conjunction(compileSchema(schema, formats));
}

function compileType(type: unknown): Rule {
  if (typeof type === "string") {
    return { kind: "type", expected: type };
  }
  if (isStringArray(type)) {
    return {
      kind: "anyOf",
      rules: type.map((expected): Rule => ({ kind: "type", expected })),
    };
  }
  return invalidRule({ kind: "invalidType", type });
}

/**
 * `additionalItems` / `additionalProperties`: a schema, `false` (always
 * invalid) or anything else, absent included (always valid).
 */
function compileAdditional(
  additional: unknown,
  target: "array" | "object",
  sub: (node: SchemaNode) => Rule,
): Rule {
  if (isSchemaNode(additional)) {
    return sub(additional);
  }
  if (additional === false) {
    return invalidRule({ kind: "additional", target });
  }
  return validRule;
}

/**
 * Entries of a keyword mapping names to schemas. The keyword is ignored
 * unless every value is a schema object.
 */
function schemaEntries(map: unknown): [string, SchemaNode][] {
  if (!isSchemaNode(map)) {
    return [];
  }
  const entries: [string, SchemaNode][] = [];
  for (const [key, node] of Object.entries(map)) {
    if (!isSchemaNode(node)) {
      return [];
    }
    entries.push([key, node]);
  }
  return entries;
}
