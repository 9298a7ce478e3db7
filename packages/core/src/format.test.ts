import { describe, it, expect } from "vitest";
import { parseJson, stableStringify, toJson } from "./format.js";

describe("format", () => {
  describe("stableStringify()", () => {
    it("should sort object keys and end with a newline", () => {
      expect(stableStringify({ b: 1, a: [2, { d: 3, c: 4 }] }, 0)).toBe('{"a":[2,{"c":4,"d":3}],"b":1}\n');
    });

    it("should tag bigints", () => {
      expect(stableStringify([1n], 0)).toBe('[{"$bigint":"1"}]\n');
    });

    it("should tag non-finite numbers and negative zero", () => {
      expect(stableStringify([Infinity, -0, 0], 0)).toBe('[{"$number":"Infinity"},{"$number":"-0"},0]\n');
    });

    it("should reject cycles", () => {
      const node: Record<string, unknown> = {};
      node.self = node;
      expect(() => stableStringify(node)).toThrow("Circular reference detected in object");
    });

    it("should allow the same object twice when it is not a cycle", () => {
      const shared = { v: 1 };
      expect(stableStringify([shared, shared], 0)).toBe('[{"v":1},{"v":1}]\n');
    });
  });

  describe("parseJson()", () => {
    it("should restore tagged bigints", () => {
      expect(parseJson('[{"$bigint":"-42"}, 7]')).toEqual([-42n, 7]);
    });

    it("should restore tagged special numbers", () => {
      const values = parseJson('[{"$number":"NaN"},{"$number":"-Infinity"},{"$number":"-0"}]');
      expect(values).toEqual([NaN, -Infinity, -0]);
      expect(Array.isArray(values) && Object.is(values[2], -0)).toBe(true);
    });

    it("should keep an unknown special number tag as an object", () => {
      expect(parseJson('{"$number":"huge"}')).toEqual({ $number: "huge" });
    });

    it("should leave objects with other keys alone", () => {
      expect(parseJson('{"$bigint":"1","x":2}')).toEqual({ $bigint: "1", x: 2 });
    });
  });

  describe("toJson()", () => {
    it("should write one line with tagged values", () => {
      expect(toJson(["a", NaN, -Infinity, -0, 2n, null])).toBe(
        '["a",{"$number":"NaN"},{"$number":"-Infinity"},{"$number":"-0"},{"$bigint":"2"},null]'
      );
    });

    it("should leave finite numbers plain", () => {
      expect(toJson(1.5)).toBe("1.5");
      expect(toJson(0)).toBe("0");
    });
  });
});
