// src/core/channel/index.ts
// Link access: handles, normalization, exclusive exchanges

export {
  type RequestInput,
  type InputCase,
  ExprHandle,
  classifyInput,
} from "./handle";

export {
  type ExchangeOptions,
  exchange,
  requestEvaluation,
  isFailureResponse,
  resetRequestIds,
} from "./channel";

export { normalize, parseText } from "./normalize";

export {
  type MutexState,
  type MutexEvent,
  createMutex,
  mutexForLink,
  acquireMutex,
  tryAcquireMutex,
  releaseMutex,
  withMutex,
  resetMutexIds,
} from "./mutex";
