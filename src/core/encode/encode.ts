// src/core/encode/encode.ts
// Host values -> engine expressions

import type { Expr } from "../expr/expr";
import { apply, bigReal, int, isExpr, list, rational, real, str, sym } from "../expr/expr";
import type { BridgeConfig } from "../config/config";
import { makeConfig } from "../config/config";
import { UnsupportedValueError, describeType } from "../errors";
import type { NativeValue } from "../values/values";
import { ExprNode, isEngineFunction } from "../values/values";
import { BigDecimal, Rational } from "../values/numbers";
import { ExprHandle } from "../channel/handle";

/**
 * Anything `encode` accepts. Expressions and handles pass through; plain
 * objects are encoded as maps with string keys.
 */
export type Encodable = NativeValue | Expr | ExprHandle | undefined | { readonly [key: string]: Encodable };

/**
 * Convert a host value to an engine expression. Sequences become lists, maps
 * become `HashMapObject[{k -> v, ...}]`, decoded functions give back their
 * template.
 *
 * @throws UnsupportedValueError for values with no engine form
 */
export function encode(value: Encodable, config: BridgeConfig = makeConfig()): Expr {
  if (value === null || value === undefined) return sym("Null");

  switch (typeof value) {
    case "boolean": return sym(value ? "True" : "False");
    case "number": return Number.isInteger(value) ? int(value) : real(value);
    case "bigint": return int(value);
    case "string": return str(value);
    case "symbol": return encodeSymbol(value, config);
    case "function":
      if (isEngineFunction(value)) return value.template;
      throw new UnsupportedValueError("function");
  }

  if (value instanceof ExprHandle) return value.expr;
  if (isExpr(value)) return value;
  if (value instanceof Rational) return rational(value.numerator, value.denominator);
  if (value instanceof BigDecimal) return bigReal(value.toString());
  if (value instanceof ExprNode) {
    return apply(encode(value.head, config), value.args.map((arg) => encode(arg, config)));
  }
  if (value instanceof Map) {
    return encodeMap(Array.from(value, ([k, v]): [Expr, Expr] => [encode(k, config), encode(v, config)]));
  }
  if (isIterable(value)) {
    return list(Array.from(value, (item) => encode(item, config)));
  }
  if (isPlainObject(value)) {
    return encodeMap(Object.entries(value).map(([k, v]): [Expr, Expr] => [str(k), encode(v, config)]));
  }
  throw new UnsupportedValueError(describeType(value));
}

function encodeSymbol(value: symbol, config: BridgeConfig): Expr {
  const name = Symbol.keyFor(value);
  if (name === undefined) throw new UnsupportedValueError("unregistered symbol");
  return sym(config.hostToForeign.get(name) ?? name.replaceAll("/", "`"));
}

function encodeMap(entries: Array<[Expr, Expr]>): Expr {
  return apply("HashMapObject", [list(entries.map(([k, v]) => apply("Rule", [k, v])))]);
}

function isIterable(x: object): x is Iterable<Encodable> {
  return Symbol.iterator in x;
}

function isPlainObject(x: object): x is { readonly [key: string]: Encodable } {
  const proto: unknown = Object.getPrototypeOf(x);
  return proto === Object.prototype || proto === null;
}
