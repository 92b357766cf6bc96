// src/core/expr/reader.ts
// FullForm reader: Head[args], {lists}, numbers, strings and symbols

import type { Expr } from "./expr";
import { apply, bigReal, int, list, rational, real, str, sym } from "./expr";

type Tok =
  | { tag: "LB" }
  | { tag: "RB" }
  | { tag: "LC" }
  | { tag: "RC" }
  | { tag: "COMMA" }
  | { tag: "STR"; s: string }
  | { tag: "ATOM"; s: string };

export function parseFullForm(src: string): Expr {
  const toks = tokenize(src);
  let i = 0;

  function peek(): Tok | undefined { return toks[i]; }
  function take(): Tok {
    const t = toks[i];
    if (!t) throw new SyntaxError("unexpected end of input");
    i++;
    return t;
  }

  function parseSequence(close: "RB" | "RC"): Expr[] {
    const items: Expr[] = [];
    if (peek()?.tag === close) { take(); return items; }
    while (true) {
      items.push(parseOne());
      const t = take();
      if (t.tag === close) return items;
      if (t.tag !== "COMMA") throw new SyntaxError(`expected ',' or closing bracket, got ${t.tag}`);
    }
  }

  function parseOne(): Expr {
    const t = take();
    let out: Expr;
    if (t.tag === "LC") out = list(parseSequence("RC"));
    else if (t.tag === "STR") out = str(t.s);
    else if (t.tag === "ATOM") out = atomToExpr(t.s);
    else throw new SyntaxError(`unexpected ${t.tag}`);

    // Curried heads: f[a][b]
    while (peek()?.tag === "LB") {
      take();
      out = applyHead(out, parseSequence("RB"));
    }
    return out;
  }

  const out = parseOne();
  if (i !== toks.length) throw new SyntaxError("trailing tokens after first expression");
  return out;
}

function applyHead(head: Expr, args: Expr[]): Expr {
  if (head.tag === "Symbol" && head.name === "Rational" && args.length === 2) {
    const [n, d] = args;
    if (n?.tag === "Integer" && d?.tag === "Integer") return rational(n.value, d.value);
  }
  return apply(head, args);
}

function atomToExpr(a: string): Expr {
  if (/^-?\d+$/.test(a)) return int(BigInt(a));
  if (/^-?\d+(\.\d*)?`\d*$/.test(a)) return bigReal(a.slice(0, a.indexOf("`")));
  if (/^-?(\d+\.\d*|\.\d+|\d+(?=e))(e[+-]?\d+)?$/i.test(a)) return real(Number(a));
  if (/^[$A-Za-z][$`\w]*$/.test(a)) return sym(a);
  throw new SyntaxError(`invalid atom: ${a}`);
}

function tokenize(src: string): Tok[] {
  const out: Tok[] = [];
  let i = 0;

  function isWS(c: string) { return c === " " || c === "\t" || c === "\n" || c === "\r"; }
  function isDelim(c: string) { return isWS(c) || "[]{},\"".includes(c); }

  while (i < src.length) {
    const c = src[i]!;
    if (isWS(c)) { i++; continue; }

    if (c === "[") { out.push({ tag: "LB" }); i++; continue; }
    if (c === "]") { out.push({ tag: "RB" }); i++; continue; }
    if (c === "{") { out.push({ tag: "LC" }); i++; continue; }
    if (c === "}") { out.push({ tag: "RC" }); i++; continue; }
    if (c === ",") { out.push({ tag: "COMMA" }); i++; continue; }

    if (c === "\"") {
      i++;
      let s = "";
      let closed = false;
      while (i < src.length) {
        const d = src[i]!;
        if (d === "\"") { i++; closed = true; break; }
        if (d === "\\") {
          i++;
          if (i >= src.length) throw new SyntaxError("unterminated escape");
          const e = src[i]!;
          if (e === "n") s += "\n";
          else if (e === "t") s += "\t";
          else if (e === "r") s += "\r";
          else s += e;
          i++;
          continue;
        }
        s += d;
        i++;
      }
      if (!closed) throw new SyntaxError("unterminated string");
      out.push({ tag: "STR", s });
      continue;
    }

    let a = "";
    while (i < src.length && !isDelim(src[i]!)) {
      a += src[i]!;
      i++;
    }
    out.push({ tag: "ATOM", s: a });
  }

  return out;
}
