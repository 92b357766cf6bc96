// src/core/expr/expr.ts
// Engine expression tree: atoms, applications, structural equality, FullForm printer

export type Expr =
  | { tag: "Integer"; value: bigint }
  | { tag: "Real"; value: number }
  | { tag: "BigReal"; digits: string }
  | { tag: "Rational"; num: bigint; den: bigint }
  | { tag: "String"; s: string }
  | { tag: "Symbol"; name: string }
  | { tag: "Normal"; head: Expr; args: readonly Expr[] };

export type ExprTag = Expr["tag"];

const EXPR_TAGS: ReadonlySet<string> = new Set<ExprTag>([
  "Integer", "Real", "BigReal", "Rational", "String", "Symbol", "Normal",
]);

export function int(value: bigint | number): Expr {
  return { tag: "Integer", value: typeof value === "bigint" ? value : BigInt(value) };
}
export function real(value: number): Expr { return { tag: "Real", value }; }
export function bigReal(digits: string): Expr { return { tag: "BigReal", digits }; }
export function str(s: string): Expr { return { tag: "String", s }; }
export function sym(name: string): Expr { return { tag: "Symbol", name }; }

/**
 * Rational atom. Sign lives on the numerator and the fraction is kept in
 * lowest terms, the way the engine reports it.
 */
export function rational(num: bigint, den: bigint): Expr {
  if (den === 0n) throw new RangeError("rational with zero denominator");
  if (den < 0n) { num = -num; den = -den; }
  const g = gcd(num < 0n ? -num : num, den);
  return { tag: "Rational", num: num / g, den: den / g };
}

export function apply(head: Expr | string, args: readonly Expr[]): Expr {
  return { tag: "Normal", head: typeof head === "string" ? sym(head) : head, args };
}

export function list(items: readonly Expr[]): Expr {
  return apply("List", items);
}

export function isExpr(x: unknown): x is Expr {
  if (typeof x !== "object" || x === null || !("tag" in x)) return false;
  const tag: unknown = x.tag;
  return typeof tag === "string" && EXPR_TAGS.has(tag);
}

export function exprEq(a: Expr, b: Expr): boolean {
  switch (a.tag) {
    case "Integer": return b.tag === "Integer" && a.value === b.value;
    case "Real": return b.tag === "Real" && Object.is(a.value, b.value);
    case "BigReal": return b.tag === "BigReal" && a.digits === b.digits;
    case "Rational": return b.tag === "Rational" && a.num === b.num && a.den === b.den;
    case "String": return b.tag === "String" && a.s === b.s;
    case "Symbol": return b.tag === "Symbol" && a.name === b.name;
    case "Normal": {
      if (b.tag !== "Normal" || a.args.length !== b.args.length) return false;
      if (!exprEq(a.head, b.head)) return false;
      for (let i = 0; i < a.args.length; i++) if (!exprEq(a.args[i]!, b.args[i]!)) return false;
      return true;
    }
  }
}

export function exprToString(x: Expr): string {
  switch (x.tag) {
    case "Integer": return x.value.toString();
    case "Real": {
      const s = String(x.value);
      return /[.e]/.test(s) || !Number.isFinite(x.value) ? s : `${s}.`;
    }
    case "BigReal": return `${x.digits}\``;
    case "Rational": return `Rational[${x.num}, ${x.den}]`;
    case "String": return JSON.stringify(x.s);
    case "Symbol": return x.name;
    case "Normal": {
      if (x.head.tag === "Symbol" && x.head.name === "List") {
        return `{${x.args.map(exprToString).join(", ")}}`;
      }
      return `${exprToString(x.head)}[${x.args.map(exprToString).join(", ")}]`;
    }
  }
}

function gcd(a: bigint, b: bigint): bigint {
  while (b !== 0n) [a, b] = [b, a % b];
  return a === 0n ? 1n : a;
}
