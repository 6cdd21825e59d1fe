import { describe, it, expect } from "vitest";
import {
  coerceExpected,
  formatJsonValue,
  jsonValuesEqual,
  toJsonValue,
} from "../../../src/assertions/json-value";
import { ParseError } from "../../../src/errors/step-errors";

describe("assertions", () => {
  describe("json-value", () => {
    it("should classify decoded JSON values", () => {
      expect(toJsonValue(3)).toEqual({ kind: "integer", value: 3 });
      expect(toJsonValue(1.5)).toEqual({ kind: "float", value: 1.5 });
      expect(toJsonValue("x")).toEqual({ kind: "string", value: "x" });
      expect(toJsonValue(false)).toEqual({ kind: "boolean", value: false });
      expect(toJsonValue(null)).toEqual({ kind: "null", value: null });
      expect(toJsonValue([1])).toEqual({ kind: "array", value: [1] });
      expect(toJsonValue({ a: 1 })).toEqual({ kind: "object", value: { a: 1 } });
    });

    it("should read boolean literals", () => {
      const actual = toJsonValue(true);

      expect(coerceExpected("true", actual)).toEqual({ kind: "boolean", value: true });
      expect(coerceExpected("T", actual)).toEqual({ kind: "boolean", value: true });
      expect(coerceExpected("0", actual)).toEqual({ kind: "boolean", value: false });
      expect(() => coerceExpected("yes", actual)).toThrow('cannot parse expected value "yes" as boolean');
    });

    it("should read integers strictly", () => {
      const actual = toJsonValue(2);

      expect(coerceExpected("2", actual)).toEqual({ kind: "integer", value: 2 });
      expect(coerceExpected("-7", actual)).toEqual({ kind: "integer", value: -7 });
      expect(() => coerceExpected("2.0", actual)).toThrow(ParseError);
      expect(() => coerceExpected("two", actual)).toThrow('cannot parse expected value "two" as integer');
    });

    it("should read floats", () => {
      const actual = toJsonValue(2.5);

      expect(coerceExpected("2.5", actual)).toEqual({ kind: "float", value: 2.5 });
      expect(coerceExpected("1e3", actual)).toEqual({ kind: "float", value: 1000 });
      expect(() => coerceExpected("2.5.1", actual)).toThrow("as float");
    });

    it("should take strings verbatim", () => {
      expect(coerceExpected(" padded ", toJsonValue("x"))).toEqual({ kind: "string", value: " padded " });
    });

    it("should compare arrays and objects structurally", () => {
      const object = toJsonValue({ a: 1, b: [true] });
      const expected = coerceExpected('{"b":[true],"a":1}', object);

      expect(jsonValuesEqual(expected, object)).toBe(true);
      expect(() => coerceExpected("[1]", object)).toThrow('cannot parse expected value "[1]" as object');
      expect(coerceExpected("[1, 2]", toJsonValue([1, 2]))).toEqual({ kind: "array", value: [1, 2] });
    });

    it("should only accept null for a null value", () => {
      expect(coerceExpected("null", toJsonValue(null))).toEqual({ kind: "null", value: null });
      expect(() => coerceExpected("", toJsonValue(null))).toThrow("as null");
    });

    it("should format strings bare and everything else as JSON", () => {
      expect(formatJsonValue({ kind: "string", value: "abc" })).toBe("abc");
      expect(formatJsonValue({ kind: "object", value: { b: 1, a: 2 } })).toBe('{"a":2,"b":1}');
      expect(formatJsonValue({ kind: "null", value: null })).toBe("null");
    });
  });
});
