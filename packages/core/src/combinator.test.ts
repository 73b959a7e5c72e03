import { describe, it, expect } from "vitest";
import { allOf, anyOf, mergeResults, not, oneOf } from "./combinator";
import { errorsOf, invalid, valid, type ValidationError } from "./error";

const tooShort: ValidationError = {
  kind: "length",
  target: "string",
  comparison: "tooSmall",
  limit: 3,
};
const notString: ValidationError = {
  kind: "type",
  value: 1,
  expected: "string",
};

describe("mergeResults", () => {
  it("is valid when every result is valid", () => {
    expect(mergeResults([valid, valid])).toEqual({ valid: true });
    expect(mergeResults([])).toEqual({ valid: true });
  });

  it("concatenates errors in result order", () => {
    expect(
      mergeResults([invalid(notString), valid, invalid(tooShort, notString)]),
    ).toEqual({ valid: false, errors: [notString, tooShort, notString] });
  });

  it("exposes the errors of a result", () => {
    expect(errorsOf(valid)).toEqual([]);
    expect(errorsOf(invalid(tooShort))).toEqual([tooShort]);
  });

  it("is what allOf returns", () => {
    const results = [invalid(tooShort), invalid(notString)];
    expect(allOf(results)).toEqual(mergeResults(results));
  });
});

describe("anyOf", () => {
  it("passes when one result is valid", () => {
    expect(anyOf("x", [invalid(tooShort), valid])).toEqual({ valid: true });
  });

  it("replaces sub-errors with one summary error", () => {
    expect(anyOf("x", [invalid(tooShort), invalid(notString)])).toEqual({
      valid: false,
      errors: [{ kind: "anyOf", value: "x" }],
    });
  });

  it("fails when there is nothing to match", () => {
    expect(anyOf(null, []).valid).toBe(false);
  });

  it("stops pulling results after the first valid one", () => {
    let pulled = 0;
    function* results() {
      pulled++;
      yield valid;
      pulled++;
      yield invalid(tooShort);
    }
    expect(anyOf("x", results()).valid).toBe(true);
    expect(pulled).toBe(1);
  });
});

describe("oneOf", () => {
  it("passes when exactly one result is valid", () => {
    expect(oneOf([invalid(tooShort), valid])).toEqual({ valid: true });
  });

  it("reports how many results passed", () => {
    expect(oneOf([valid, valid, invalid(tooShort)])).toEqual({
      valid: false,
      errors: [{ kind: "oneOf", passed: 2 }],
    });
    expect(oneOf([invalid(tooShort)])).toEqual({
      valid: false,
      errors: [{ kind: "oneOf", passed: 0 }],
    });
  });
});

describe("not", () => {
  it("inverts the result", () => {
    expect(not(7, invalid(notString))).toEqual({ valid: true });
    expect(not(7, valid)).toEqual({
      valid: false,
      errors: [{ kind: "not", value: 7 }],
    });
  });
});
