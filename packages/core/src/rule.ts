import type { Comparison, LengthTarget, ValidationError } from "./error";
import type { FormatRule } from "./stringformat";

/**
 * Compiled form of a schema document. Rules are plain immutable data; the
 * evaluator in `evaluate.ts` gives them meaning. `ref` rules only name their
 * target, so the tree stays finite for self-referencing schemas.
 */
export type Rule =
  | { kind: "valid" }
  | { kind: "invalid"; error: ValidationError }
  | { kind: "type"; expected: string }
  | { kind: "allOf"; rules: Rule[] }
  | { kind: "anyOf"; rules: Rule[] }
  | { kind: "oneOf"; rules: Rule[] }
  | { kind: "not"; rule: Rule }
  | { kind: "ref"; reference: string }
  | { kind: "enum"; values: unknown[] }
  | {
      kind: "length";
      target: LengthTarget;
      comparison: Comparison;
      limit: number;
    }
  | { kind: "pattern"; pattern: string; regex: RegExp | null }
  | { kind: "multipleOf"; divisor: number }
  | {
      kind: "bounds";
      comparison: Comparison;
      limit: number;
      exclusive: boolean;
    }
  | { kind: "uniqueItems" }
  | { kind: "items"; rule: Rule }
  | { kind: "tupleItems"; rules: Rule[]; additional: Rule }
  | { kind: "required"; required: string[] }
  | {
      kind: "properties";
      properties: ReadonlyMap<string, Rule>;
      patternProperties: PatternRule[];
      additional: Rule;
    }
  | { kind: "dependencySchema"; key: string; rule: Rule }
  | { kind: "dependencyKeys"; key: string; dependencies: string[] }
  | { kind: "format"; format: string; check: FormatRule };

export type RuleKind = Rule["kind"];

export interface PatternRule {
  pattern: string;
  regex: RegExp | null;
  rule: Rule;
}

export const validRule: Rule = { kind: "valid" };

export function invalidRule(error: ValidationError): Rule {
  return { kind: "invalid", error };
}

/**
 * Conjunction of a rule list. A single rule is returned as is.
 */
export function conjunction(rules: Rule[]): Rule {
  return rules.length === 1 ? rules[0] : { kind: "allOf", rules };
}
