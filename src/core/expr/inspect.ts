// src/core/expr/inspect.ts
// Atom-kind predicates, part access and homogeneous-array probes

import type { Expr } from "./expr";
import { int } from "./expr";

/**
 * Kind of an atomic expression. `integer` is the machine-word case (signed
 * 64-bit); anything wider is `bigInteger`.
 */
export type AtomKind =
  | "integer"
  | "bigInteger"
  | "real"
  | "bigReal"
  | "string"
  | "rational"
  | "symbol";

export const NUMERIC_KINDS: ReadonlySet<AtomKind> = new Set<AtomKind>([
  "integer", "bigInteger", "real", "bigReal",
]);

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

export function atomKind(x: Expr): AtomKind | undefined {
  switch (x.tag) {
    case "Integer": return x.value >= INT64_MIN && x.value <= INT64_MAX ? "integer" : "bigInteger";
    case "Real": return "real";
    case "BigReal": return "bigReal";
    case "String": return "string";
    case "Rational": return "rational";
    case "Symbol": return "symbol";
    case "Normal": return undefined;
  }
}

export function isList(x: Expr): boolean {
  return x.tag === "Normal" && x.head.tag === "Symbol" && x.head.name === "List";
}

export function isAtom(x: Expr): boolean {
  return x.tag !== "Normal";
}

/**
 * Name of the expression's head: the symbol name for applications with a
 * symbolic head, the implicit head for atoms, `undefined` for compound heads.
 */
export function headName(x: Expr): string | undefined {
  switch (x.tag) {
    case "Normal": return x.head.tag === "Symbol" ? x.head.name : undefined;
    case "BigReal": return "Real";
    default: return x.tag;
  }
}

export function argumentsOf(x: Expr): readonly Expr[] {
  return x.tag === "Normal" ? x.args : [];
}

/**
 * One-based part access. Rationals expose their numerator and denominator as
 * parts 1 and 2.
 */
export function part(x: Expr, n: number): Expr | undefined {
  if (x.tag === "Rational") {
    if (n === 1) return int(x.num);
    if (n === 2) return int(x.den);
    return undefined;
  }
  if (x.tag !== "Normal") return undefined;
  if (n === 0) return x.head;
  return x.args[n - 1];
}

/**
 * Element kind of a non-empty one-dimensional list whose elements all share
 * one atom kind.
 */
export function vectorType(x: Expr): AtomKind | undefined {
  if (!isList(x) || x.tag !== "Normal" || x.args.length === 0) return undefined;
  const kind = atomKind(x.args[0]!);
  if (kind === undefined) return undefined;
  for (const a of x.args) if (atomKind(a) !== kind) return undefined;
  return kind;
}

/**
 * Element kind of a rectangular list of equally long vectors of one kind.
 */
export function matrixType(x: Expr): AtomKind | undefined {
  if (!isList(x) || x.tag !== "Normal" || x.args.length === 0) return undefined;
  const first = x.args[0]!;
  const kind = vectorType(first);
  if (kind === undefined) return undefined;
  const width = argumentsOf(first).length;
  for (const row of x.args) {
    if (vectorType(row) !== kind || argumentsOf(row).length !== width) return undefined;
  }
  return kind;
}

/**
 * Bulk coercion of a numeric vector to doubles. Throws on non-numeric
 * elements; callers check `vectorType` first.
 */
export function asDoubleArray(x: Expr): number[] {
  return argumentsOf(x).map(toDouble);
}

function toDouble(x: Expr): number {
  switch (x.tag) {
    case "Integer": return Number(x.value);
    case "Real": return x.value;
    case "BigReal": return Number(x.digits);
    case "Rational": return Number(x.num) / Number(x.den);
    default: throw new TypeError(`not a numeric atom: ${x.tag}`);
  }
}
