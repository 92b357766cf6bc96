// src/core/decode/index.ts
// Expression decoding

export { decode, parseInteger } from "./decode";
