import { compileRule } from "./compile";
import {
  SchemaError,
  type ValidationError,
  type ValidationResult,
} from "./error";
import {
  DEFAULT_MAX_DEPTH,
  evaluate,
  type ReferenceResolver,
} from "./evaluate";
import {
  defaultErrorFormatter,
  toErrorMessage,
  type ErrorFormatter,
} from "./i18n";
import { resolveReference } from "./reference";
import { invalidRule, type Rule } from "./rule";
import {
  createFormatRegistry,
  type FormatRegistry,
  type FormatRule,
} from "./stringformat";
import type {
  JsonValue,
  SchemaDocument,
  SchemaNode,
  SchemaType,
} from "./type";
import { isSchemaNode } from "./util";

export interface SchemaOptions {
  /**
   * Extra format rules, added to (or replacing) the built-in `ipv4` and
   * `ipv6` checks.
   */
  formats?: Readonly<Record<string, FormatRule>>;
  /**
   * Maximum number of nested `$ref` hops during one evaluation.
   */
  maxDepth?: number;
  errorFormatter?: ErrorFormatter;
}

const SCHEMA_TYPES: readonly SchemaType[] = [
  "object",
  "array",
  "string",
  "integer",
  "number",
  "boolean",
  "null",
];

function isSchemaType(value: unknown): value is SchemaType {
  return SCHEMA_TYPES.some((type) => type === value);
}

/**
 * A schema document ready to validate values. The document is compiled on
 * first use; the compiled rules and every resolved `$ref` are kept for later
 * calls.
 */
export class JsonSchema implements ReferenceResolver {
  readonly title?: string;
  readonly description?: string;
  readonly type: SchemaType[];
  readonly properties?: SchemaNode;

  private readonly document: SchemaNode;
  private readonly formats: FormatRegistry;
  private readonly maxDepth: number;
  private readonly errorFormatter: ErrorFormatter;
  private readonly references = new Map<string, Rule>();
  private compiled?: Rule;

  constructor(document: SchemaDocument, options: SchemaOptions = {}) {
    if (!isSchemaNode(document)) {
      throw new SchemaError("A schema document must be a JSON object");
    }
    const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    if (!Number.isInteger(maxDepth) || maxDepth < 1) {
      throw new SchemaError(`maxDepth must be a positive integer: ${maxDepth}`);
    }

    const node: SchemaNode = document;
    this.document = node;
    this.formats = createFormatRegistry(options.formats);
    this.maxDepth = maxDepth;
    this.errorFormatter = options.errorFormatter ?? defaultErrorFormatter;

    // Introspection only; validation reads the document itself.
    const { title, description, type, properties } = node;
    this.title = typeof title === "string" ? title : undefined;
    this.description =
      typeof description === "string" ? description : undefined;
    this.properties = isSchemaNode(properties) ? properties : undefined;
    if (typeof type === "string") {
      this.type = isSchemaType(type) ? [type] : [];
    } else if (Array.isArray(type)) {
      const names: unknown[] = type;
      this.type = names.filter(isSchemaType);
    } else {
      this.type = [];
    }
  }

  /**
   * Compiled rule of the whole document.
   */
  get rule(): Rule {
    if (!this.compiled) {
      this.compiled = compileRule(this.document, this.formats);
    }
    return this.compiled;
  }

  resolve(reference: string): Rule {
    if (reference === "#") {
      return this.rule;
    }
    let rule = this.references.get(reference);
    if (!rule) {
      const resolution = resolveReference(this.document, reference);
      rule = resolution.found
        ? compileRule(resolution.schema, this.formats)
        : invalidRule(resolution.error);
      this.references.set(reference, rule);
    }
    return rule;
  }

  validate(value: JsonValue): ValidationResult {
    return evaluate(this.rule, value, {
      resolver: this,
      maxDepth: this.maxDepth,
    });
  }

  /**
   * Render an error with the configured formatter.
   */
  formatError(error: ValidationError): string {
    return this.errorFormatter(toErrorMessage(error));
  }
}

/**
 * Validates a value against a draft-04 JSON Schema document.
 */
export function validate(
  value: JsonValue,
  schema: SchemaDocument,
  options?: SchemaOptions,
): ValidationResult {
  return new JsonSchema(schema, options).validate(value);
}
