// src/core/values/values.ts
// Host-side values produced by decoding and accepted by encoding

import type { Expr } from "../expr/expr";
import { BigDecimal, Rational } from "./numbers";
import { LazySeq } from "./lazy";

export type NativeValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | symbol
  | Rational
  | BigDecimal
  | readonly NativeValue[]
  | LazySeq<NativeValue>
  | Map<NativeValue, NativeValue>
  | EngineFunction
  | ExprNode;

/**
 * A callable decoded from a `Function[...]` template. Invoking it evaluates
 * the template applied to the arguments on the link it was decoded from.
 */
export interface EngineFunction {
  (...args: NativeValue[]): Promise<NativeValue>;
  readonly template: Expr;
}

/**
 * Fallback for applications with no dedicated host representation:
 * `f[x, y]` decodes to `ExprNode(f, [x, y])`.
 */
export class ExprNode {
  constructor(
    readonly head: NativeValue,
    readonly args: readonly NativeValue[]
  ) {}
}

export function isEngineFunction(x: unknown): x is EngineFunction {
  return typeof x === "function" && "template" in x;
}

/**
 * Registered symbol for a host identifier.
 */
export function hostSymbol(name: string): symbol {
  return Symbol.for(name);
}

const FAILED = Symbol.for("$Failed");
const ABORTED = Symbol.for("$Aborted");
const FAILURE = Symbol.for("Failure");

/**
 * Whether a decoded value is the engine's way of reporting a failed
 * evaluation: `$Failed`, `$Aborted` or a `Failure[...]` object.
 */
export function isEngineFailure(x: NativeValue): boolean {
  if (x === FAILED || x === ABORTED) return true;
  return x instanceof ExprNode && x.head === FAILURE;
}

/**
 * Structural equality. Lazy sequences compare by their realized elements;
 * callables compare by identity.
 */
export function nativeEq(a: NativeValue, b: NativeValue): boolean {
  if (a === b) return true;
  if (typeof a === "number" && typeof b === "number") return Number.isNaN(a) && Number.isNaN(b);
  // Integers compare by value whichever width they decoded to
  if (typeof a === "bigint" && typeof b === "number") return Number.isInteger(b) && BigInt(b) === a;
  if (typeof a === "number" && typeof b === "bigint") return Number.isInteger(a) && BigInt(a) === b;
  if (a instanceof Rational) return b instanceof Rational && a.equals(b);
  if (a instanceof BigDecimal) return b instanceof BigDecimal && a.equals(b);
  if (a instanceof ExprNode) {
    return b instanceof ExprNode && nativeEq(a.head, b.head) && seqEq(a.args, b.args);
  }
  if (a instanceof Map) {
    if (!(b instanceof Map) || a.size !== b.size) return false;
    for (const [k, v] of a) {
      let found = false;
      for (const [k2, v2] of b) {
        if (nativeEq(k, k2)) { found = nativeEq(v, v2); break; }
      }
      if (!found) return false;
    }
    return true;
  }
  if (isSequence(a) && isSequence(b)) return seqEq(toArray(a), toArray(b));
  return false;
}

export function isSequence(x: NativeValue): x is readonly NativeValue[] | LazySeq<NativeValue> {
  return Array.isArray(x) || x instanceof LazySeq;
}

function toArray(x: readonly NativeValue[] | LazySeq<NativeValue>): readonly NativeValue[] {
  return x instanceof LazySeq ? x.toArray() : x;
}

function seqEq(a: readonly NativeValue[], b: readonly NativeValue[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) if (!nativeEq(a[i]!, b[i]!)) return false;
  return true;
}
