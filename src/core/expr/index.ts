// src/core/expr/index.ts
// Engine expression utilities

export {
  type Expr,
  type ExprTag,
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
} from "./expr";

export { parseFullForm } from "./reader";

export {
  type AtomKind,
  NUMERIC_KINDS,
  atomKind,
  isList,
  isAtom,
  headName,
  argumentsOf,
  part,
  vectorType,
  matrixType,
  asDoubleArray,
} from "./inspect";
