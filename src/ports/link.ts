import type { Expr } from "../core/expr/expr";

/**
 * Link port interface.
 * A live, stateful connection to the engine. The link has no request
 * identifiers: a response belongs to whichever request was submitted last,
 * so callers must hold the link exclusively from submit to read.
 */
export interface LinkPort {
  /** Name used in diagnostics */
  readonly id?: string;

  /**
   * Send one request packet.
   * @throws on I/O failure (disconnect, timeout)
   */
  submit(request: Expr): Promise<void>;

  /**
   * Wait for and read the response to the last submitted request.
   * @throws on I/O failure (disconnect, timeout)
   */
  awaitResponse(): Promise<Expr>;
}
