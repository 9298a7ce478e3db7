import { describe, it, expect } from "vitest";
import { Frame } from "./frame.js";
import { SchemaMismatchError } from "./errors.js";

function sample(): Frame {
  return Frame.from({
    index: new Int32Array([1, 2, 3, 4, 5]),
    columns: {
      x: new Float64Array([0.5, 1.5, 2.5, 3.5, 4.5]),
      y: ["a", "b", "c", "d", "e"],
    },
  });
}

describe("Frame", () => {
  describe("from()", () => {
    it("should infer dtypes from containers", () => {
      const frame = sample();
      expect(frame.indexDType).toBe("int32");
      expect(frame.dtypes()).toEqual([
        ["x", "float64"],
        ["y", "object"],
      ]);
      expect(frame.length).toBe(5);
    });

    it("should accept explicit datetime columns backed by BigInt64Array", () => {
      const frame = Frame.from({
        index: { dtype: "datetime", values: new BigInt64Array([0n, 1000n]) },
        columns: { v: new Int8Array([1, 2]) },
      });
      expect(frame.indexDType).toBe("datetime");
      expect(frame.keyAt(1)).toBe(1000n);
    });

    it("should store category columns as object values", () => {
      const frame = Frame.from({
        index: new Int32Array([1]),
        columns: { c: { dtype: "category", values: ["a"] } },
      });
      expect(frame.dtype("c")).toBe("object");
    });

    it("should reject a declared dtype that does not match the data", () => {
      expect(() =>
        Frame.from({
          index: new Int32Array([1]),
          columns: { x: { dtype: "float64", values: new Int32Array([1]) } },
        })
      ).toThrow(SchemaMismatchError);
    });

    it("should reject columns of a different length", () => {
      expect(() =>
        Frame.from({
          index: new Int32Array([1, 2]),
          columns: { x: new Int32Array([1]) },
        })
      ).toThrow('Column "x" has 1 rows, index has 2');
    });
  });

  describe("column access", () => {
    it("should throw for unknown columns", () => {
      expect(() => sample().column("nope")).toThrow('Unknown column "nope"');
    });

    it("should select columns in the requested order", () => {
      const frame = sample().select(["y", "x"]);
      expect(frame.columns).toEqual(["y", "x"]);
      expect(frame.index).toEqual(new Int32Array([1, 2, 3, 4, 5]));
    });
  });

  describe("slice() and between()", () => {
    it("should copy a row range", () => {
      const frame = sample().slice(1, 3);
      expect(frame.index).toEqual(new Int32Array([2, 3]));
      expect(frame.column("y")).toEqual(["b", "c"]);
    });

    it("should keep rows with start <= key <= stop", () => {
      const frame = sample().between(2, 4);
      expect(frame.index).toEqual(new Int32Array([2, 3, 4]));
      expect(frame.column("x")).toEqual(new Float64Array([1.5, 2.5, 3.5]));
    });

    it("should treat missing bounds as open", () => {
      expect(sample().between(undefined, 2).index).toEqual(new Int32Array([1, 2]));
      expect(sample().between(4).index).toEqual(new Int32Array([4, 5]));
    });

    it("should return no rows when the range misses", () => {
      expect(sample().between(6, 9).length).toBe(0);
      expect(sample().between(4, 2).length).toBe(0);
    });
  });

  describe("concat()", () => {
    it("should stack frames in order", () => {
      const a = sample().slice(0, 2);
      const b = sample().slice(3);
      const joined = Frame.concat([a, b]);
      expect(joined.index).toEqual(new Int32Array([1, 2, 4, 5]));
      expect(joined.column("x")).toEqual(new Float64Array([0.5, 1.5, 3.5, 4.5]));
      expect(joined.column("y")).toEqual(["a", "b", "d", "e"]);
    });

    it("should reject frames with different layouts", () => {
      const other = sample().select(["x"]);
      expect(() => Frame.concat([sample(), other])).toThrow(SchemaMismatchError);
    });

    it("should reject an empty list", () => {
      expect(() => Frame.concat([])).toThrow(SchemaMismatchError);
    });
  });

  describe("empty()", () => {
    it("should build zero-row columns of each dtype", () => {
      const frame = Frame.empty("datetime", [
        ["n", "int64"],
        ["c", "category"],
      ]);
      expect(frame.length).toBe(0);
      expect(frame.index).toBeInstanceOf(BigInt64Array);
      expect(frame.column("n")).toBeInstanceOf(BigInt64Array);
      expect(frame.column("c")).toEqual([]);
      expect(frame.dtype("c")).toBe("object");
    });
  });

  describe("toRows()", () => {
    it("should materialize rows with the key under the given name", () => {
      const rows = sample().slice(0, 1).toRows("key");
      expect(rows).toEqual([{ key: 1, x: 0.5, y: "a" }]);
    });
  });
});
