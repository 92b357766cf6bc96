// src/core/channel/handle.ts
// Canonical expression handles and request-input classification

import type { Expr } from "../expr/expr";
import { isExpr } from "../expr/expr";
import { UnsupportedInputTypeError, describeType } from "../errors";

/**
 * Canonical reference to an engine expression, tagged with the request that
 * produced it (`local` when no engine round trip was involved).
 */
export class ExprHandle {
  constructor(
    readonly expr: Expr,
    readonly origin: string = "local"
  ) {}
}

/**
 * Anything the normalizer and channel driver accept: engine source text, an
 * expression, a handle, or an absent value.
 */
export type RequestInput = string | Expr | ExprHandle | null | undefined;

export type InputCase =
  | { shape: "text"; text: string }
  | { shape: "expr"; expr: Expr }
  | { shape: "handle"; handle: ExprHandle }
  | { shape: "nil" };

/**
 * Classify a runtime value into one of the accepted input shapes.
 * @throws UnsupportedInputTypeError for anything else
 */
export function classifyInput(input: unknown): InputCase {
  if (input === null || input === undefined) return { shape: "nil" };
  if (typeof input === "string") return { shape: "text", text: input };
  if (input instanceof ExprHandle) return { shape: "handle", handle: input };
  if (isExpr(input)) return { shape: "expr", expr: input };
  throw new UnsupportedInputTypeError(describeType(input));
}
