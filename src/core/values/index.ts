// src/core/values/index.ts
// Host value types

export {
  type NativeValue,
  type EngineFunction,
  ExprNode,
  isEngineFunction,
  isEngineFailure,
  isSequence,
  hostSymbol,
  nativeEq,
} from "./values";

export { Rational, BigDecimal } from "./numbers";
export { LazySeq } from "./lazy";
