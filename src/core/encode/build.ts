// src/core/encode/build.ts
// Construction helpers: applications, assignments, Module blocks

import type { LinkPort } from "../../ports/link";
import type { Expr } from "../expr/expr";
import { apply, list, sym } from "../expr/expr";
import type { BridgeConfig } from "../config/config";
import { makeConfig } from "../config/config";
import type { RequestInput } from "../channel/handle";
import { normalize } from "../channel/normalize";
import type { Encodable } from "./encode";
import { encode } from "./encode";

/**
 * `head[args...]`
 */
export function buildApplication(head: string | Expr, ...args: Expr[]): Expr {
  return apply(head, args);
}

/**
 * `Set[name, value]`, with the value passed through `encode`.
 */
export function buildSet(name: string, value: Encodable, config: BridgeConfig = makeConfig()): Expr {
  return apply("Set", [sym(name), encode(value, config)]);
}

export type BindingOptions = {
  /** `last-output` (default) keeps only the final value; `all-output` lists every value */
  output?: "last-output" | "all-output";
  /** `parallel` wraps the body in ParallelSubmit for asynchronous submission */
  mode?: "serial" | "parallel";
  /** Needed when body items are source text */
  link?: LinkPort;
  config?: BridgeConfig;
};

/**
 * Build a lexically scoped block:
 *
 *   Module[{x = v, ...}, CompoundExpression[body...]]
 *
 * With `all-output` the body is a `List` so every value is returned; with
 * `parallel` it becomes `ParallelSubmit[{x, ...}, body]` so the locals are
 * shipped with the submission.
 */
export async function buildBinding(
  bindings: ReadonlyArray<readonly [string, Encodable]>,
  body: readonly RequestInput[],
  options: BindingOptions = {}
): Promise<Expr> {
  const config = options.config ?? makeConfig();
  const sets = bindings.map(([name, value]) => buildSet(name, value, config));

  const exprs: Expr[] = [];
  for (const item of body) {
    const handle = await normalize(item, options.link ?? config.link);
    exprs.push(handle ? handle.expr : sym("Null"));
  }

  const compounder = options.output === "all-output" ? "List" : "CompoundExpression";
  let block = apply(compounder, exprs);
  if (options.mode === "parallel") {
    block = apply("ParallelSubmit", [list(bindings.map(([name]) => sym(name))), block]);
  }
  return apply("Module", [list(sets), block]);
}
