// src/core/channel/channel.ts
// Channel driver: exclusive request/response exchanges over a link

import { AsyncLocalStorage } from "node:async_hooks";
import type { LinkPort } from "../../ports/link";
import type { Expr } from "../expr/expr";
import { apply, exprToString, str } from "../expr/expr";
import { headName } from "../expr/inspect";
import type { BridgeConfig } from "../config/config";
import { makeConfig } from "../config/config";
import type { TraceSink } from "../trace";
import { stderrTraceSink } from "../trace";
import { BridgeError, EngineEvaluationError, LinkFailureError, LinkReentryError } from "../errors";
import type { MutexEvent } from "./mutex";
import { mutexForLink, withMutex } from "./mutex";
import type { RequestInput } from "./handle";
import { ExprHandle, classifyInput } from "./handle";

export type ExchangeOptions = {
  verbose?: boolean;
  trace?: TraceSink;
  /** Observe lock activity on the link's mutex */
  onEvent?: (event: MutexEvent) => void;
};

// Links held by the current async call chain
const heldLinks = new AsyncLocalStorage<ReadonlySet<LinkPort>>();

let nextRequestId = 0;

function genRequestId(): string {
  return `req-${nextRequestId++}`;
}

/**
 * Reset request id generation (for testing).
 */
export function resetRequestIds(): void {
  nextRequestId = 0;
}

/**
 * Submit one request and read its response while holding the link
 * exclusively. Concurrent callers queue in arrival order; the link is
 * released on every exit path.
 *
 * @throws LinkReentryError when called from inside an exchange on the same link
 * @throws LinkFailureError when the link fails to submit or answer
 */
export async function exchange(
  link: LinkPort,
  request: Expr,
  options: ExchangeOptions = {}
): Promise<{ requestId: string; response: Expr }> {
  const linkId = link.id ?? "link";
  const held = heldLinks.getStore();
  if (held?.has(link)) throw new LinkReentryError(linkId);

  const requestId = genRequestId();
  const sink = options.trace ?? stderrTraceSink;
  const holding = new Set(held ?? []).add(link);

  return withMutex(
    mutexForLink(link),
    requestId,
    () => heldLinks.run(holding, async () => {
      const started = performance.now();
      try {
        await link.submit(request);
        const response = await link.awaitResponse();
        if (options.verbose) {
          sink.emit({ tag: "request", requestId, linkId, durationMs: performance.now() - started });
        }
        return { requestId, response };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        if (options.verbose) sink.emit({ tag: "failure", requestId, linkId, message });
        if (error instanceof BridgeError) throw error;
        throw new LinkFailureError(`${linkId} ${requestId}: ${message}`, { cause: error });
      }
    }),
    options.onEvent
  );
}

/**
 * Evaluate a request on the engine and return the response as a handle.
 * Text is evaluated as engine source; `null` short-circuits without touching
 * the link.
 *
 * @throws EngineEvaluationError in strict mode when the engine reports a failure
 */
export async function requestEvaluation(
  input: RequestInput,
  link: LinkPort,
  config: BridgeConfig = makeConfig(),
  options: { onEvent?: (event: MutexEvent) => void } = {}
): Promise<ExprHandle | null> {
  const request = requestExpr(input);
  if (request === null) return null;

  const { requestId, response } = await exchange(link, request, {
    verbose: config.verbose,
    trace: config.trace,
    onEvent: options.onEvent,
  });
  if (config.strict && isFailureResponse(response)) {
    throw new EngineEvaluationError(exprToString(response));
  }
  return new ExprHandle(response, requestId);
}

function requestExpr(input: RequestInput): Expr | null {
  const c = classifyInput(input);
  switch (c.shape) {
    case "nil": return null;
    case "text": return apply("ToExpression", [str(c.text)]);
    case "expr": return c.expr;
    case "handle": return c.handle.expr;
  }
}

/**
 * Whether a response is the engine reporting a failed evaluation.
 */
export function isFailureResponse(response: Expr): boolean {
  if (response.tag === "Symbol") return response.name === "$Failed" || response.name === "$Aborted";
  return response.tag === "Normal" && headName(response) === "Failure";
}
