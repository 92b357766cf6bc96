// src/core/trace.ts
// Diagnostic tracing for verbose decoding and link activity

export type TraceEvent =
  | { tag: "decode"; stage: DecodeStage; durationMs: number }
  | { tag: "request"; requestId: string; linkId: string; durationMs: number }
  | { tag: "failure"; requestId: string; linkId: string; message: string };

export type DecodeStage = "vector" | "matrix" | "map" | "function";

/**
 * Trace sink for diagnostic events.
 */
export interface TraceSink {
  emit(event: TraceEvent): void;
}

/**
 * Default sink. Writes to stderr so stdout stays free for the host's own
 * output.
 */
export const stderrTraceSink: TraceSink = {
  emit(event) {
    console.error(`[symbolic-bridge] ${formatTraceEvent(event)}`);
  },
};

export function formatTraceEvent(event: TraceEvent): string {
  switch (event.tag) {
    case "decode": return `${event.stage} decode took ${event.durationMs.toFixed(3)}ms`;
    case "request": return `${event.linkId} ${event.requestId} answered in ${event.durationMs.toFixed(3)}ms`;
    case "failure": return `${event.linkId} ${event.requestId} failed: ${event.message}`;
  }
}

/**
 * Run `fn`, emitting a decode event with its duration when `verbose` is set.
 */
export function withTrace<T>(
  opts: { verbose: boolean; trace?: TraceSink },
  stage: DecodeStage,
  fn: () => T
): T {
  if (!opts.verbose) return fn();
  const started = performance.now();
  try {
    return fn();
  } finally {
    (opts.trace ?? stderrTraceSink).emit({ tag: "decode", stage, durationMs: performance.now() - started });
  }
}
