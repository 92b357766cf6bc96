// src/core/errors.ts
// Error taxonomy for the link and translation layers

export type BridgeErrorCode =
  | "UNSUPPORTED_INPUT"
  | "INVALID_EXPRESSION"
  | "MISSING_LINK"
  | "LINK_FAILURE"
  | "LINK_REENTRY"
  | "ENGINE_EVALUATION"
  | "MALFORMED_MAP"
  | "DECODE_EXHAUSTION"
  | "UNSUPPORTED_VALUE"
  | "CONFIG";

export class BridgeError extends Error {
  constructor(
    message: string,
    public readonly code: BridgeErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "BridgeError";
  }
}

export class UnsupportedInputTypeError extends BridgeError {
  constructor(public readonly inputType: string) {
    super(
      `Input must be text, an expression, an expression handle or null; got ${inputType}`,
      "UNSUPPORTED_INPUT"
    );
    this.name = "UnsupportedInputTypeError";
  }
}

export class InvalidExpressionError extends BridgeError {
  constructor(public readonly source: string, detail?: string) {
    super(`Invalid expression: ${source}${detail ? ` (${detail})` : ""}`, "INVALID_EXPRESSION");
    this.name = "InvalidExpressionError";
  }
}

export class MissingLinkError extends BridgeError {
  constructor(operation: string) {
    super(`${operation} requires a link to the engine`, "MISSING_LINK");
    this.name = "MissingLinkError";
  }
}

export class LinkFailureError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "LINK_FAILURE", options);
    this.name = "LinkFailureError";
  }
}

export class LinkReentryError extends BridgeError {
  constructor(public readonly linkId: string) {
    super(`Link ${linkId} is already held by the current request`, "LINK_REENTRY");
    this.name = "LinkReentryError";
  }
}

export class EngineEvaluationError extends BridgeError {
  constructor(public readonly response: string) {
    super(`Engine reported an evaluation failure: ${response}`, "ENGINE_EVALUATION");
    this.name = "EngineEvaluationError";
  }
}

export class MalformedMapError extends BridgeError {
  constructor(detail: string) {
    super(`Malformed HashMapObject: ${detail}`, "MALFORMED_MAP");
    this.name = "MalformedMapError";
  }
}

export class DecodeExhaustionError extends BridgeError {
  constructor(public readonly maxDepth: number) {
    super(`Expression nesting exceeds the decode depth limit of ${maxDepth}`, "DECODE_EXHAUSTION");
    this.name = "DecodeExhaustionError";
  }
}

export class UnsupportedValueError extends BridgeError {
  constructor(public readonly valueType: string) {
    super(`Cannot encode a value of type ${valueType}`, "UNSUPPORTED_VALUE");
    this.name = "UnsupportedValueError";
  }
}

export class ConfigError extends BridgeError {
  constructor(message: string) {
    super(message, "CONFIG");
    this.name = "ConfigError";
  }
}

/**
 * Runtime type name for error messages.
 */
export function describeType(x: unknown): string {
  if (x === null) return "null";
  if (Array.isArray(x)) return "array";
  if (typeof x === "object") {
    const ctor: unknown = Object.getPrototypeOf(x)?.constructor;
    return typeof ctor === "function" && ctor.name ? ctor.name : "object";
  }
  return typeof x;
}
