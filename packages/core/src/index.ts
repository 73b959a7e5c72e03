export * from "./type";
export * from "./error";
export { allOf, anyOf, mergeResults, not, oneOf } from "./combinator";
export { compileRule, compileSchema } from "./compile";
export {
  DEFAULT_MAX_DEPTH,
  evaluate,
  MAX_NESTING,
  type EvaluationContext,
  type ReferenceFrame,
  type ReferenceResolver,
} from "./evaluate";
export * from "./i18n";
export { setValidatorLogger, type ValidatorLogger } from "./logger";
export { parseReferencePointer, resolveReference } from "./reference";
export type { ReferenceResolution } from "./reference";
export * from "./rule";
export * from "./stringformat";
export { deepEqual, detectSchemaType, matchSchemaType } from "./util";
export { JsonSchema, validate, type SchemaOptions } from "./validate";
