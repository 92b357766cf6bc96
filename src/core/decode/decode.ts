// src/core/decode/decode.ts
// Type-directed decoding of engine expressions into host values

import type { Expr } from "../expr/expr";
import { apply, exprToString } from "../expr/expr";
import type { AtomKind } from "../expr/inspect";
import {
  NUMERIC_KINDS,
  argumentsOf,
  asDoubleArray,
  headName,
  isList,
  matrixType,
  part,
  vectorType,
} from "../expr/inspect";
import type { BridgeConfig } from "../config/config";
import { deriveConfig, makeConfig } from "../config/config";
import { DecodeExhaustionError, MalformedMapError, MissingLinkError } from "../errors";
import { withTrace } from "../trace";
import type { EngineFunction, NativeValue } from "../values/values";
import { ExprNode, nativeEq } from "../values/values";
import { BigDecimal, Rational } from "../values/numbers";
import { LazySeq } from "../values/lazy";
import { ExprHandle } from "../channel/handle";
import { requestEvaluation } from "../channel/channel";
import { encode } from "../encode/encode";

const INT32_MIN = -(2n ** 31n);
const INT32_MAX = 2n ** 31n - 1n;

/**
 * Decode an expression into a host value under `config`.
 *
 * Dispatch order:
 * 1. `asFunction`: the whole expression becomes a callable
 * 2. non-list expressions, or any expression under full-form: atoms,
 *    functions, maps, generic nodes
 * 3. homogeneous vectors
 * 4. homogeneous matrices
 * 5. any other list, element by element
 */
export function decode(input: ExprHandle | Expr | null, config: BridgeConfig = makeConfig()): NativeValue {
  if (input === null) return null;
  return parseExpr(input instanceof ExprHandle ? input.expr : input, config, 0);
}

function parseExpr(x: Expr, cfg: BridgeConfig, depth: number): NativeValue {
  if (depth > cfg.maxDepth) throw new DecodeExhaustionError(cfg.maxDepth);

  if (cfg.asFunction) return parseFn(x, cfg);
  if (!isList(x) || cfg.form === "full-form") return parseComplexAtom(x, cfg, depth);

  const vt = vectorType(x);
  if (vt) return withTrace(cfg, "vector", () => parseSimpleVector(x, cfg, vt));

  const mt = matrixType(x);
  if (mt) return withTrace(cfg, "matrix", () => parseSimpleMatrix(x, cfg, mt));

  return parseComplexList(x, cfg, depth);
}

// ─────────────────────────────────────────────────────────────────
// Sequence realization
// ─────────────────────────────────────────────────────────────────

/**
 * Map `f` over `items` under the configured sequence policy. Lazy variants
 * capture the bundle now so later realization sees the same configuration.
 */
function boundMap<S>(
  cfg: BridgeConfig,
  items: readonly S[],
  f: (item: S, cfg: BridgeConfig) => NativeValue
): NativeValue {
  switch (cfg.sequences) {
    case "vectors":
      return items.map((item) => f(item, cfg));
    case "lazy":
      return LazySeq.from(items, (item) => f(item, cfg));
    case "lazy-of-lazy": {
      const enclosed = deriveConfig(cfg, { sequences: "lazy" });
      return LazySeq.deferred(() => items, (item) => f(item, enclosed));
    }
  }
}

// ─────────────────────────────────────────────────────────────────
// Arrays
// ─────────────────────────────────────────────────────────────────

function parseSimpleVector(x: Expr, cfg: BridgeConfig, type: AtomKind): NativeValue {
  if (cfg.numeric && NUMERIC_KINDS.has(type)) {
    const doubles = asDoubleArray(x);
    return cfg.sequences === "vectors" ? doubles : LazySeq.from(doubles, (d) => d);
  }
  return boundMap(cfg, argumentsOf(x), parseSimpleAtom);
}

function parseSimpleMatrix(x: Expr, cfg: BridgeConfig, type: AtomKind): NativeValue {
  // Row type is known; rows skip the vector probe
  return boundMap(cfg, argumentsOf(x), (row, c) => parseSimpleVector(row, c, type));
}

function parseComplexList(x: Expr, cfg: BridgeConfig, depth: number): NativeValue {
  return boundMap(cfg, argumentsOf(x), (item, c) => parseExpr(item, c, depth + 1));
}

// ─────────────────────────────────────────────────────────────────
// Atoms
// ─────────────────────────────────────────────────────────────────

function parseSimpleAtom(x: Expr, cfg: BridgeConfig): NativeValue {
  switch (x.tag) {
    case "Integer": return parseInteger(x.value);
    case "Real": return x.value;
    case "BigReal": return BigDecimal.parse(x.digits);
    case "String": return x.s;
    case "Rational": return parseRational(x);
    case "Symbol": return parseSymbol(x.name, cfg);
    case "Normal": throw new TypeError(`not an atom: ${exprToString(x)}`);
  }
}

function parseComplexAtom(x: Expr, cfg: BridgeConfig, depth: number): NativeValue {
  if (x.tag !== "Normal") return parseSimpleAtom(x, cfg);

  const structured = cfg.form !== "full-form";
  switch (headName(x)) {
    case "Function":
      if (cfg.functions && structured) return parseFn(x, cfg);
      break;
    case "HashMapObject":
      if (cfg.hashMaps && structured) return withTrace(cfg, "map", () => parseHashMap(x, cfg, depth));
      break;
  }
  return parseGeneric(x, cfg, depth);
}

/**
 * Machine integers narrow to `number` inside the signed 32-bit range and
 * stay `bigint` outside it.
 */
export function parseInteger(value: bigint): number | bigint {
  return value >= INT32_MIN && value <= INT32_MAX ? Number(value) : value;
}

function parseRational(x: Expr): Rational {
  const num = part(x, 1);
  const den = part(x, 2);
  if (num?.tag !== "Integer" || den?.tag !== "Integer") {
    throw new TypeError(`not a rational: ${exprToString(x)}`);
  }
  return new Rational(BigInt(parseInteger(num.value)), BigInt(parseInteger(den.value)));
}

/**
 * Aliases first, then the reserved constants, then a registered host symbol
 * with the namespace separator ` rewritten as /.
 */
function parseSymbol(name: string, cfg: BridgeConfig): NativeValue {
  const alias = cfg.foreignToHost.get(name);
  if (alias !== undefined) return Symbol.for(alias);
  switch (name) {
    case "True": return true;
    case "False": return false;
    case "Null": return null;
    default: return Symbol.for(name.replaceAll("`", "/"));
  }
}

// ─────────────────────────────────────────────────────────────────
// Compound forms
// ─────────────────────────────────────────────────────────────────

function parseGeneric(x: Expr, cfg: BridgeConfig, depth: number): ExprNode {
  if (x.tag !== "Normal") return new ExprNode(parseSimpleAtom(x, cfg), []);
  return new ExprNode(
    parseExpr(x.head, cfg, depth + 1),
    x.args.map((arg) => parseExpr(arg, cfg, depth + 1))
  );
}

function parseHashMap(x: Expr, cfg: BridgeConfig, depth: number): Map<NativeValue, NativeValue> {
  const args = argumentsOf(x);
  const inside = args[0];
  if (args.length !== 1 || inside === undefined) {
    throw new MalformedMapError(`expected one rule-set argument, got ${args.length}`);
  }

  let rules: Expr | undefined;
  if (isList(inside)) rules = inside;
  else if (headName(inside) === "Dispatch") rules = argumentsOf(inside)[0];
  if (rules === undefined || !isList(rules)) {
    throw new MalformedMapError(`expected a rule list or Dispatch, got ${exprToString(inside)}`);
  }

  const map = new Map<NativeValue, NativeValue>();
  for (const rule of argumentsOf(rules)) {
    const head = headName(rule);
    const [key, value] = argumentsOf(rule);
    if ((head !== "Rule" && head !== "RuleDelayed") || key === undefined || value === undefined
        || argumentsOf(rule).length !== 2) {
      throw new MalformedMapError(`not a key -> value rule: ${exprToString(rule)}`);
    }
    const k = parseExpr(key, cfg, depth + 2);
    map.set(equalKey(map, k) ?? k, parseExpr(value, cfg, depth + 2));
  }
  return map;
}

/**
 * The key already in `map` that is structurally equal to `k`. Equal keys
 * share one entry; the last rule wins.
 */
function equalKey(map: Map<NativeValue, NativeValue>, k: NativeValue): NativeValue | undefined {
  if (map.has(k)) return k;
  for (const existing of map.keys()) {
    if (nativeEq(existing, k)) return existing;
  }
  return undefined;
}

/**
 * Close over the template, the link and the configuration as they are now.
 * A later call, from whatever context, evaluates `template[args...]` on that
 * link and decodes the answer with that configuration.
 */
function parseFn(x: Expr, cfg: BridgeConfig): EngineFunction {
  return withTrace(cfg, "function", () => {
    const enclosed = deriveConfig(cfg, { asFunction: false });
    const link = cfg.link;
    const call = async (...args: NativeValue[]): Promise<NativeValue> => {
      if (!link) throw new MissingLinkError("Calling an engine function");
      const request = apply(x, args.map((arg) => encode(arg, enclosed)));
      return decode(await requestEvaluation(request, link, enclosed), enclosed);
    };
    return Object.assign(call, { template: x });
  });
}
