import { describe, it, expect } from "vitest";
import {
  characterLength,
  compilePattern,
  deepEqual,
  detectSchemaType,
  isSchemaArray,
  isStringArray,
  jsonPointerUnescape,
  matchSchemaType,
  uniqueItemsEqual,
} from "./util";

describe("matchSchemaType", () => {
  it("matches string", () => {
    expect(matchSchemaType("hello", "string")).toBe(true);
    expect(matchSchemaType(123, "string")).toBe(false);
  });

  it("matches integers as both integer and number", () => {
    expect(matchSchemaType(5, "integer")).toBe(true);
    expect(matchSchemaType(5, "number")).toBe(true);
  });

  it("matches fractional numbers as number only", () => {
    expect(matchSchemaType(5.5, "number")).toBe(true);
    expect(matchSchemaType(5.5, "integer")).toBe(false);
  });

  it("never treats booleans as numbers", () => {
    expect(matchSchemaType(true, "boolean")).toBe(true);
    expect(matchSchemaType(true, "integer")).toBe(false);
    expect(matchSchemaType(false, "number")).toBe(false);
  });

  it("matches object (non-array, non-null)", () => {
    expect(matchSchemaType({ a: 1 }, "object")).toBe(true);
    expect(matchSchemaType([], "object")).toBe(false);
    expect(matchSchemaType(null, "object")).toBe(false);
  });

  it("matches array", () => {
    expect(matchSchemaType([1, 2, 3], "array")).toBe(true);
    expect(matchSchemaType("not array", "array")).toBe(false);
  });

  it("matches null", () => {
    expect(matchSchemaType(null, "null")).toBe(true);
    expect(matchSchemaType(0, "null")).toBe(false);
  });

  it("returns false for unknown type", () => {
    expect(matchSchemaType("x", "foobar")).toBe(false);
    expect(matchSchemaType({}, "any")).toBe(false);
  });
});

describe("detectSchemaType", () => {
  it("classifies every kind of JSON value", () => {
    expect(detectSchemaType(null)).toBe("null");
    expect(detectSchemaType(false)).toBe("boolean");
    expect(detectSchemaType(3)).toBe("integer");
    expect(detectSchemaType(3.25)).toBe("number");
    expect(detectSchemaType("3")).toBe("string");
    expect(detectSchemaType([3])).toBe("array");
    expect(detectSchemaType({ three: 3 })).toBe("object");
  });

  it("treats a zero fractional part as integer", () => {
    expect(detectSchemaType(2.0)).toBe("integer");
    expect(detectSchemaType(-0)).toBe("integer");
  });
});

describe("deepEqual", () => {
  it("compares primitives", () => {
    expect(deepEqual(1, 1)).toBe(true);
    expect(deepEqual("a", "a")).toBe(true);
    expect(deepEqual(null, null)).toBe(true);
    expect(deepEqual(1, "1")).toBe(false);
    expect(deepEqual(null, {})).toBe(false);
  });

  it("keeps numbers and booleans apart", () => {
    expect(deepEqual(1, true)).toBe(false);
    expect(deepEqual(0, false)).toBe(false);
  });

  it("compares arrays element by element", () => {
    expect(deepEqual([1, [2, 3]], [1, [2, 3]])).toBe(true);
    expect(deepEqual([1, 2], [2, 1])).toBe(false);
    expect(deepEqual([1], [1, 1])).toBe(false);
    expect(deepEqual([], {})).toBe(false);
  });

  it("ignores object key order", () => {
    expect(deepEqual({ a: 1, b: { c: 2 } }, { b: { c: 2 }, a: 1 })).toBe(
      true,
    );
    expect(deepEqual({ a: 1 }, { a: 1, b: 2 })).toBe(false);
    expect(deepEqual({ a: 1 }, { b: 1 })).toBe(false);
  });
});

describe("uniqueItemsEqual", () => {
  it("equates 1 with true and 0 with false", () => {
    expect(uniqueItemsEqual(1, true)).toBe(true);
    expect(uniqueItemsEqual(false, 0)).toBe(true);
    expect(uniqueItemsEqual(true, 0)).toBe(false);
    expect(uniqueItemsEqual(2, true)).toBe(false);
  });

  it("keeps distinct booleans distinct", () => {
    expect(uniqueItemsEqual(true, false)).toBe(false);
  });

  it("applies inside arrays and objects", () => {
    expect(uniqueItemsEqual([1, { a: 0 }], [true, { a: false }])).toBe(true);
    expect(uniqueItemsEqual({ a: 1 }, { a: 2 })).toBe(false);
    expect(uniqueItemsEqual([1], { 0: 1 })).toBe(false);
  });
});

describe("type guards", () => {
  it("recognises string arrays", () => {
    expect(isStringArray(["a", "b"])).toBe(true);
    expect(isStringArray([])).toBe(true);
    expect(isStringArray(["a", 1])).toBe(false);
    expect(isStringArray("a")).toBe(false);
  });

  it("recognises arrays of schema objects", () => {
    expect(isSchemaArray([{}, { type: "string" }])).toBe(true);
    expect(isSchemaArray([{}, []])).toBe(false);
    expect(isSchemaArray([null])).toBe(false);
  });
});

describe("jsonPointerUnescape", () => {
  it("unescapes ~1 before ~0", () => {
    expect(jsonPointerUnescape("a~1b")).toBe("a/b");
    expect(jsonPointerUnescape("a~0b")).toBe("a~b");
    expect(jsonPointerUnescape("~01")).toBe("~1");
  });
});

describe("characterLength", () => {
  it("counts astral symbols once", () => {
    expect(characterLength("abc")).toBe(3);
    expect(characterLength("💩")).toBe(1);
    expect(characterLength("")).toBe(0);
  });
});

describe("compilePattern", () => {
  it("returns a regex that searches anywhere in the input", () => {
    const regex = compilePattern("b+");
    expect(regex?.test("abbbc")).toBe(true);
    expect(regex?.test("ac")).toBe(false);
  });

  it("returns null for malformed patterns", () => {
    expect(compilePattern("([a-z")).toBeNull();
  });

  it("reuses compiled patterns", () => {
    expect(compilePattern("^x$")).toBe(compilePattern("^x$"));
  });
});
