// src/core/bridge.ts
// Convert-evaluate-decode entry points

import type { LinkPort } from "../ports/link";
import type { BridgeConfig, ConfigOverrides } from "./config/config";
import { deriveConfig, makeConfig } from "./config/config";
import type { RequestInput } from "./channel/handle";
import { requestEvaluation } from "./channel/channel";
import { normalize } from "./channel/normalize";
import type { MutexEvent } from "./channel/mutex";
import { decode } from "./decode/decode";
import type { NativeValue } from "./values/values";

/**
 * Evaluate `input` on the engine behind `link` and decode the result. The
 * link becomes the active link of the bundle, so decoded functions call back
 * through it.
 */
export async function evaluate(
  input: RequestInput,
  link: LinkPort,
  config: BridgeConfig = makeConfig()
): Promise<NativeValue> {
  const bound = config.link === link ? config : deriveConfig(config, { link });
  return decode(await requestEvaluation(input, link, bound), bound);
}

/**
 * Decode `input` without evaluating it. Text is parsed by the engine, which
 * needs a link; expressions and handles are decoded locally.
 */
export async function parse(
  input: RequestInput,
  link?: LinkPort,
  config: BridgeConfig = makeConfig()
): Promise<NativeValue> {
  const active = link ?? config.link;
  const bound = active && config.link !== active ? deriveConfig(config, { link: active }) : config;
  return decode(await normalize(input, active, { verbose: bound.verbose, trace: bound.trace }), bound);
}

export interface Bridge {
  readonly link: LinkPort;
  readonly config: BridgeConfig;
  evaluate(input: RequestInput, overrides?: ConfigOverrides): Promise<NativeValue>;
  parse(input: RequestInput, overrides?: ConfigOverrides): Promise<NativeValue>;
}

/**
 * Bind a link and a base configuration once. Per-call overrides derive a new
 * bundle for that call only.
 */
export function createBridge(
  link: LinkPort,
  overrides: ConfigOverrides = {},
  options: { onEvent?: (event: MutexEvent) => void } = {}
): Bridge {
  const config = makeConfig({ ...overrides, link });
  const forCall = (o?: ConfigOverrides) => (o ? deriveConfig(config, { ...o, link }) : config);
  return {
    link,
    config,
    async evaluate(input, o) {
      const cfg = forCall(o);
      return decode(await requestEvaluation(input, link, cfg, options), cfg);
    },
    parse(input, o) {
      return parse(input, link, forCall(o));
    },
  };
}
