// src/core/channel/normalize.ts
// Expression normalizer: any accepted input -> canonical handle

import type { LinkPort } from "../../ports/link";
import { apply, str, sym } from "../expr/expr";
import { argumentsOf, headName } from "../expr/inspect";
import { InvalidExpressionError, MissingLinkError } from "../errors";
import type { ExchangeOptions } from "./channel";
import { exchange } from "./channel";
import type { RequestInput } from "./handle";
import { ExprHandle, classifyInput } from "./handle";

/**
 * Turn an input into a handle without evaluating it. Text is parsed by the
 * engine, held unevaluated; expressions are wrapped; handles pass through;
 * `null` stays `null`.
 *
 * @throws MissingLinkError for text without a link
 * @throws InvalidExpressionError when text does not parse to exactly one expression
 */
export async function normalize(
  input: RequestInput,
  link?: LinkPort,
  options?: ExchangeOptions
): Promise<ExprHandle | null> {
  const c = classifyInput(input);
  switch (c.shape) {
    case "nil": return null;
    case "handle": return c.handle;
    case "expr": return new ExprHandle(c.expr);
    case "text": {
      if (!link) throw new MissingLinkError("Normalizing text");
      return parseText(c.text, link, options);
    }
  }
}

/**
 * Have the engine parse `text` into an expression inside `HoldComplete`,
 * so nothing is evaluated.
 */
export async function parseText(
  text: string,
  link: LinkPort,
  options?: ExchangeOptions
): Promise<ExprHandle> {
  const request = apply("ToExpression", [str(text), sym("InputForm"), sym("HoldComplete")]);
  const { requestId, response } = await exchange(link, request, options);
  if (headName(response) !== "HoldComplete") {
    throw new InvalidExpressionError(text, "engine could not parse it");
  }
  const units = argumentsOf(response);
  if (units.length !== 1) {
    throw new InvalidExpressionError(text, `parsed to ${units.length} expressions`);
  }
  return new ExprHandle(units[0]!, requestId);
}
