// src/core/encode/index.ts
// Host value encoding and expression construction

export { type Encodable, encode } from "./encode";

export {
  type BindingOptions,
  buildApplication,
  buildSet,
  buildBinding,
} from "./build";
