// src/index.ts
// Symbolic Bridge - Public API
//
// Translation between a symbolic computation engine's expressions and host values.

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINTS
// ═══════════════════════════════════════════════════════════════════════════════

export { evaluate, parse, createBridge, type Bridge } from "./core/bridge";

// ═══════════════════════════════════════════════════════════════════════════════
// EXPRESSIONS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type Expr,
  type ExprTag,
  type AtomKind,
  int,
  real,
  bigReal,
  rational,
  str,
  sym,
  apply,
  list,
  isExpr,
  exprEq,
  exprToString,
  parseFullForm,
  headName,
  argumentsOf,
  part,
  vectorType,
  matrixType,
} from "./core/expr";

// ═══════════════════════════════════════════════════════════════════════════════
// VALUES & TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type NativeValue,
  type EngineFunction,
  ExprNode,
  Rational,
  BigDecimal,
  LazySeq,
  isEngineFunction,
  isEngineFailure,
  hostSymbol,
  nativeEq,
} from "./core/values";

// ═══════════════════════════════════════════════════════════════════════════════
// TRANSLATION
// ═══════════════════════════════════════════════════════════════════════════════

export { decode } from "./core/decode";
export { type Encodable, type BindingOptions, encode, buildApplication, buildSet, buildBinding } from "./core/encode";

// ═══════════════════════════════════════════════════════════════════════════════
// LINK ACCESS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type RequestInput,
  type ExchangeOptions,
  type MutexEvent,
  ExprHandle,
  normalize,
  exchange,
  requestEvaluation,
} from "./core/channel";

export type { LinkPort } from "./ports/link";
export { LoopbackLink, type LoopbackHandler, type LinkEvent } from "./ports/loopback";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type BridgeOptions,
  type BridgeConfig,
  type ConfigOverrides,
  type SequenceMode,
  type FormMode,
  DEFAULT_OPTIONS,
  makeConfig,
  deriveConfig,
  loadConfig,
  configFromEnv,
  configFromFile,
  configFromObject,
  validateConfig,
} from "./core/config";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS & DIAGNOSTICS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type BridgeErrorCode,
  BridgeError,
  UnsupportedInputTypeError,
  InvalidExpressionError,
  MissingLinkError,
  LinkFailureError,
  LinkReentryError,
  EngineEvaluationError,
  MalformedMapError,
  DecodeExhaustionError,
  UnsupportedValueError,
  ConfigError,
} from "./core/errors";

export { type TraceEvent, type TraceSink, stderrTraceSink, formatTraceEvent } from "./core/trace";
