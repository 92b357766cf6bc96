import type { Expr } from "../core/expr/expr";
import type { LinkPort } from "./link";

/**
 * Computes the engine's response to one request.
 */
export type LoopbackHandler = (request: Expr) => Expr | Promise<Expr>;

/**
 * Wire-level record of a loopback exchange.
 */
export type LinkEvent =
  | { tag: "submit"; seq: number; request: Expr }
  | { tag: "read"; seq: number; response: Expr };

let nextLoopbackId = 0;

/**
 * Reset loopback id generation (for testing).
 */
export function resetLoopbackIds(): void {
  nextLoopbackId = 0;
}

/**
 * In-process link whose "engine" is a handler function.
 * Like a real link it carries one request at a time: submitting while a
 * response is still unread corrupts the exchange and fails.
 */
export class LoopbackLink implements LinkPort {
  readonly id: string;
  readonly events: LinkEvent[] = [];

  private pending: Promise<Expr> | undefined;
  private seq = 0;
  private closed = false;

  constructor(private readonly handler: LoopbackHandler, options?: { id?: string }) {
    this.id = options?.id ?? `loopback-${nextLoopbackId++}`;
  }

  async submit(request: Expr): Promise<void> {
    if (this.closed) throw new Error(`${this.id}: link is closed`);
    if (this.pending) throw new Error(`${this.id}: request submitted while a response is unread`);
    const seq = ++this.seq;
    this.events.push({ tag: "submit", seq, request });
    this.pending = Promise.resolve(request).then(this.handler);
  }

  async awaitResponse(): Promise<Expr> {
    const pending = this.pending;
    if (!pending) throw new Error(`${this.id}: no request pending`);
    try {
      const response = await pending;
      this.events.push({ tag: "read", seq: this.seq, response });
      return response;
    } finally {
      this.pending = undefined;
    }
  }

  /** Number of requests submitted so far. */
  get requestCount(): number {
    return this.seq;
  }

  close(): void {
    this.closed = true;
  }
}
