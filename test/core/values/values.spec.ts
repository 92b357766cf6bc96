// test/core/values/values.spec.ts
// Tests for exact numbers, lazy sequences and host value helpers

import { describe, it, expect } from "vitest";
import { Rational, BigDecimal } from "../../../src/core/values/numbers";
import { LazySeq } from "../../../src/core/values/lazy";
import { ExprNode, hostSymbol, isEngineFailure, isSequence, nativeEq, type NativeValue } from "../../../src/core/values/values";

describe("Rational", () => {
  it("normalizes sign and common factors", () => {
    const r = Rational.of(6, -4);
    expect(r.numerator).toBe(-3n);
    expect(r.denominator).toBe(2n);
    expect(r.toString()).toBe("-3/2");
  });

  it("compares by value", () => {
    expect(Rational.of(2, 4).equals(Rational.of(1, 2))).toBe(true);
    expect(Rational.of(1, 3).toNumber()).toBeCloseTo(0.3333, 4);
  });

  it("rejects a zero denominator", () => {
    expect(() => Rational.of(1, 0)).toThrow(RangeError);
  });
});

describe("BigDecimal", () => {
  it("keeps trailing zeros in the scale", () => {
    const d = BigDecimal.parse("1.50");
    expect(d.unscaled).toBe(150n);
    expect(d.scale).toBe(2);
    expect(d.toString()).toBe("1.50");
    expect(d.equals(BigDecimal.parse("1.5"))).toBe(false);
  });

  it("handles negative values below one", () => {
    expect(BigDecimal.parse("-0.05").toString()).toBe("-0.05");
    expect(BigDecimal.parse("-0.05").toNumber()).toBe(-0.05);
  });

  it("applies exponents", () => {
    expect(BigDecimal.parse("1.2e3").toString()).toBe("1200");
    expect(BigDecimal.parse("12e-3").toString()).toBe("0.012");
  });

  it("folds a negative scale into the unscaled value", () => {
    const d = BigDecimal.parse("1.5e3");
    expect(d.unscaled).toBe(1500n);
    expect(d.scale).toBe(0);
    expect(d.equals(BigDecimal.parse(d.toString()))).toBe(true);
    expect(new BigDecimal(15n, -2).equals(BigDecimal.parse("1500"))).toBe(true);
  });

  it("rejects non-decimals", () => {
    expect(() => BigDecimal.parse("abc")).toThrow(SyntaxError);
    expect(() => BigDecimal.parse(".")).toThrow(SyntaxError);
  });
});

describe("LazySeq", () => {
  function counted() {
    const seen: number[] = [];
    const seq = LazySeq.from([1, 2, 3], (x) => {
      seen.push(x);
      return x * 10;
    });
    return { seq, seen };
  }

  it("computes nothing until read", () => {
    const { seq, seen } = counted();
    expect(seq.opened).toBe(false);
    expect(seq.realizedCount).toBe(0);
    expect(seen).toEqual([]);
  });

  it("computes each element once", () => {
    const { seq, seen } = counted();
    expect(seq.get(1)).toBe(20);
    expect(seq.get(1)).toBe(20);
    expect(seen).toEqual([2]);
    expect(seq.realizedCount).toBe(1);
  });

  it("returns undefined outside its bounds", () => {
    const { seq } = counted();
    expect(seq.get(3)).toBeUndefined();
    expect(seq.get(-1)).toBeUndefined();
    expect(seq.get(0.5)).toBeUndefined();
  });

  it("iterates in order", () => {
    const { seq } = counted();
    expect(seq.toArray()).toEqual([10, 20, 30]);
    expect([...seq]).toEqual([10, 20, 30]);
    expect(seq.length).toBe(3);
    expect(seq.realizedCount).toBe(3);
  });

  it("defers obtaining the source list", () => {
    let opened = 0;
    const seq = LazySeq.deferred(() => {
      opened++;
      return ["a", "b"];
    }, (s, i) => `${s}${i}`);
    expect(opened).toBe(0);
    expect(seq.length).toBe(2);
    expect(seq.toArray()).toEqual(["a0", "b1"]);
    expect(opened).toBe(1);
  });
});

describe("nativeEq", () => {
  it("compares sequences across representations", () => {
    expect(nativeEq([1, 2], LazySeq.from([1, 2], (x) => x))).toBe(true);
    expect(nativeEq([1, 2], [1, 2, 3])).toBe(false);
  });

  it("compares maps by entries", () => {
    const a = new Map<NativeValue, NativeValue>([[hostSymbol("a"), 1], [hostSymbol("b"), [2]]]);
    const b = new Map<NativeValue, NativeValue>([[hostSymbol("b"), [2]], [hostSymbol("a"), 1]]);
    expect(nativeEq(a, b)).toBe(true);
    expect(nativeEq(a, new Map([[hostSymbol("a"), 1]]))).toBe(false);
  });

  it("compares exact numbers and nodes by value", () => {
    expect(nativeEq(Rational.of(1, 2), Rational.of(2, 4))).toBe(true);
    expect(nativeEq(BigDecimal.parse("1.5"), BigDecimal.parse("1.5"))).toBe(true);
    expect(nativeEq(new ExprNode(hostSymbol("f"), [1]), new ExprNode(hostSymbol("f"), [1]))).toBe(true);
    expect(nativeEq(new ExprNode(hostSymbol("f"), [1]), new ExprNode(hostSymbol("g"), [1]))).toBe(false);
  });

  it("compares integers across number and bigint", () => {
    expect(nativeEq(5, 5n)).toBe(true);
    expect(nativeEq(3000000000n, 3_000_000_000)).toBe(true);
    expect(nativeEq(5.5, 5n)).toBe(false);
    expect(nativeEq(6, 5n)).toBe(false);
    expect(nativeEq([1, 2n], [1n, 2])).toBe(true);
  });

  it("treats NaN as equal to itself", () => {
    expect(nativeEq(NaN, NaN)).toBe(true);
    expect(nativeEq(1, 2)).toBe(false);
  });
});

describe("value predicates", () => {
  it("recognizes engine failures", () => {
    expect(isEngineFailure(hostSymbol("$Failed"))).toBe(true);
    expect(isEngineFailure(hostSymbol("$Aborted"))).toBe(true);
    expect(isEngineFailure(new ExprNode(hostSymbol("Failure"), ["tag"]))).toBe(true);
    expect(isEngineFailure(hostSymbol("Failed"))).toBe(false);
    expect(isEngineFailure(null)).toBe(false);
  });

  it("recognizes sequences", () => {
    expect(isSequence([])).toBe(true);
    expect(isSequence(LazySeq.from([], (x: number) => x))).toBe(true);
    expect(isSequence("abc")).toBe(false);
  });
});
