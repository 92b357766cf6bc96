// src/core/config/config.ts
// Translation configuration: flags, alias tables, loaders

import * as fs from "fs";
import * as path from "path";
import type { LinkPort } from "../../ports/link";
import type { TraceSink } from "../trace";
import { ConfigError } from "../errors";

// =========================================================================
// Configuration Types
// =========================================================================

/** How decoded sequences are realized. */
export type SequenceMode = "vectors" | "lazy" | "lazy-of-lazy";

/** Whether functions and maps get their structured host form. */
export type FormMode = "structured" | "full-form";

export type BridgeOptions = {
  sequences: SequenceMode;
  form: FormMode;
  /** Decode the whole expression as a callable template */
  asFunction: boolean;
  /** Decode `Function[...]` as a callable */
  functions: boolean;
  /** Decode `HashMapObject[...]` as a Map */
  hashMaps: boolean;
  /** Coerce numeric arrays to doubles in bulk */
  numeric: boolean;
  /** Emit decode timing events */
  verbose: boolean;
  /** Raise on engine-reported evaluation failures */
  strict: boolean;
  /** Maximum expression nesting the decoder descends into */
  maxDepth: number;
  /** Foreign symbol name -> host identifier */
  aliases: Readonly<Record<string, string>>;
};

/**
 * Immutable, call-scoped configuration bundle. Closures and lazy sequences
 * created during decoding keep the bundle that was active when they were made.
 */
export type BridgeConfig = Readonly<
  BridgeOptions & {
    /** Foreign name -> host name, reserved names removed */
    foreignToHost: ReadonlyMap<string, string>;
    /** Host name -> foreign name */
    hostToForeign: ReadonlyMap<string, string>;
    trace?: TraceSink;
    link?: LinkPort;
  }
>;

export type ConfigOverrides = Partial<BridgeOptions> & {
  trace?: TraceSink;
  link?: LinkPort;
};

// =========================================================================
// Defaults
// =========================================================================

export const RESERVED_SYMBOLS: ReadonlySet<string> = new Set(["True", "False", "Null"]);

export const SEQUENCE_MODES: readonly SequenceMode[] = ["vectors", "lazy", "lazy-of-lazy"];
export const FORM_MODES: readonly FormMode[] = ["structured", "full-form"];

export const DEFAULT_OPTIONS: BridgeOptions = {
  sequences: "vectors",
  form: "structured",
  asFunction: false,
  functions: true,
  hashMaps: true,
  numeric: false,
  verbose: false,
  strict: false,
  maxDepth: 1024,
  aliases: {},
};

// =========================================================================
// Bundles
// =========================================================================

/**
 * Build a frozen configuration bundle. The alias table is inverted here, once
 * per bundle.
 */
export function makeConfig(overrides: ConfigOverrides = {}): BridgeConfig {
  const options = pickOptions({ ...DEFAULT_OPTIONS, ...stripUndefined(overrides) });
  const { foreignToHost, hostToForeign } = aliasTables(options.aliases);
  return Object.freeze({
    ...options,
    foreignToHost,
    hostToForeign,
    trace: overrides.trace,
    link: overrides.link,
  });
}

/**
 * Derive a new bundle with named overrides. The base is left untouched, and
 * its alias tables are reused unless the aliases change.
 */
export function deriveConfig(base: BridgeConfig, overrides: ConfigOverrides): BridgeConfig {
  const options = pickOptions({ ...base, ...stripUndefined(overrides) });
  const tables = overrides.aliases === undefined || overrides.aliases === base.aliases
    ? { foreignToHost: base.foreignToHost, hostToForeign: base.hostToForeign }
    : aliasTables(options.aliases);
  return Object.freeze({
    ...options,
    ...tables,
    trace: "trace" in overrides ? overrides.trace : base.trace,
    link: "link" in overrides ? overrides.link : base.link,
  });
}

function pickOptions(o: BridgeOptions): BridgeOptions {
  return {
    sequences: o.sequences,
    form: o.form,
    asFunction: o.asFunction,
    functions: o.functions,
    hashMaps: o.hashMaps,
    numeric: o.numeric,
    verbose: o.verbose,
    strict: o.strict,
    maxDepth: o.maxDepth,
    aliases: Object.freeze({ ...o.aliases }),
  };
}

function stripUndefined(o: ConfigOverrides): Partial<BridgeOptions> {
  const out: Partial<BridgeOptions> = {};
  if (o.sequences !== undefined) out.sequences = o.sequences;
  if (o.form !== undefined) out.form = o.form;
  if (o.asFunction !== undefined) out.asFunction = o.asFunction;
  if (o.functions !== undefined) out.functions = o.functions;
  if (o.hashMaps !== undefined) out.hashMaps = o.hashMaps;
  if (o.numeric !== undefined) out.numeric = o.numeric;
  if (o.verbose !== undefined) out.verbose = o.verbose;
  if (o.strict !== undefined) out.strict = o.strict;
  if (o.maxDepth !== undefined) out.maxDepth = o.maxDepth;
  if (o.aliases !== undefined) out.aliases = o.aliases;
  return out;
}

function aliasTables(aliases: Readonly<Record<string, string>>): {
  foreignToHost: ReadonlyMap<string, string>;
  hostToForeign: ReadonlyMap<string, string>;
} {
  const foreignToHost = new Map<string, string>();
  const hostToForeign = new Map<string, string>();
  for (const [foreign, host] of Object.entries(aliases)) {
    // True, False and Null always decode to their host constants
    if (RESERVED_SYMBOLS.has(foreign)) continue;
    foreignToHost.set(foreign, host);
    hostToForeign.set(host, foreign);
  }
  return { foreignToHost, hostToForeign };
}

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Load options from environment variables.
 */
export function configFromEnv(prefix = "BRIDGE"): BridgeOptions {
  const env = (name: string): string | undefined => {
    const v = process.env[`${prefix}_${name}`];
    return v === undefined || v.trim() === "" ? undefined : v.trim();
  };

  const sequences = env("SEQUENCES");
  const form = env("FORM");
  const maxDepth = env("MAX_DEPTH");

  return {
    ...DEFAULT_OPTIONS,
    sequences: sequences ? oneOf(sequences, SEQUENCE_MODES, `${prefix}_SEQUENCES`) : DEFAULT_OPTIONS.sequences,
    form: form ? oneOf(form, FORM_MODES, `${prefix}_FORM`) : DEFAULT_OPTIONS.form,
    numeric: flagFromEnv(env("NUMERIC"), DEFAULT_OPTIONS.numeric),
    verbose: flagFromEnv(env("VERBOSE"), DEFAULT_OPTIONS.verbose),
    strict: flagFromEnv(env("STRICT"), DEFAULT_OPTIONS.strict),
    maxDepth: maxDepth ? positiveInt(Number(maxDepth), `${prefix}_MAX_DEPTH`) : DEFAULT_OPTIONS.maxDepth,
  };
}

/**
 * Load options from a JSON file.
 */
export function configFromFile(filePath: string): Partial<BridgeOptions> {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Config file not found: ${filePath}`);
  }
  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new ConfigError(`Unsupported config file format: ${ext}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigError(`Invalid JSON in config file ${filePath}: ${error.message}`);
    }
    throw error;
  }
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new ConfigError(`Config file ${filePath} must contain a JSON object`);
  }
  return configFromObject(Object.fromEntries(Object.entries(data)));
}

/**
 * Read options from a plain object (e.g. parsed JSON). Accepts camelCase or
 * snake_case keys; unknown keys are ignored.
 */
export function configFromObject(data: Record<string, unknown>): Partial<BridgeOptions> {
  const get = (camel: string, snake: string): unknown => data[camel] ?? data[snake];
  const out: Partial<BridgeOptions> = {};

  const sequences = get("sequences", "sequences");
  if (sequences !== undefined) out.sequences = oneOf(sequences, SEQUENCE_MODES, "sequences");
  const form = get("form", "form");
  if (form !== undefined) out.form = oneOf(form, FORM_MODES, "form");

  const flags = [
    ["asFunction", "as_function"],
    ["functions", "functions"],
    ["hashMaps", "hash_maps"],
    ["numeric", "numeric"],
    ["verbose", "verbose"],
    ["strict", "strict"],
  ] as const;
  for (const [camel, snake] of flags) {
    const v = get(camel, snake);
    if (v === undefined) continue;
    if (typeof v !== "boolean") throw new ConfigError(`"${camel}" must be a boolean`);
    out[camel] = v;
  }

  const maxDepth = get("maxDepth", "max_depth");
  if (maxDepth !== undefined) out.maxDepth = positiveInt(maxDepth, "maxDepth");

  const aliases = get("aliases", "alias_list");
  if (aliases !== undefined) {
    if (typeof aliases !== "object" || aliases === null || Array.isArray(aliases)) {
      throw new ConfigError(`"aliases" must be an object of symbol names`);
    }
    const table: Record<string, string> = {};
    for (const [foreign, host] of Object.entries(aliases)) {
      if (typeof host !== "string") throw new ConfigError(`Alias for "${foreign}" must be a string`);
      table[foreign] = host;
    }
    out.aliases = table;
  }

  return out;
}

/**
 * Merge options with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: Partial<BridgeOptions>[]): BridgeOptions {
  let result: BridgeOptions = { ...DEFAULT_OPTIONS };
  for (const cfg of configs) {
    result = { ...result, ...stripUndefined(cfg) };
  }
  return result;
}

/**
 * Load configuration. A file is read only when `configFile` names one.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: ConfigOverrides;
}): BridgeConfig {
  let merged = configFromEnv();

  if (options?.configFile) {
    merged = mergeConfigs(merged, configFromFile(options.configFile));
  }

  return makeConfig({ ...merged, ...options?.overrides });
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(options: BridgeOptions): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(options.maxDepth) || options.maxDepth < 1) {
    errors.push("maxDepth must be a positive integer");
  } else if (options.maxDepth > 5000) {
    warnings.push("maxDepth above 5000 may overflow the call stack before the limit is reached");
  }

  for (const name of Object.keys(options.aliases)) {
    if (RESERVED_SYMBOLS.has(name)) {
      warnings.push(`Alias for reserved symbol ${name} is ignored`);
    }
  }

  if (options.asFunction && options.form === "full-form") {
    warnings.push("asFunction takes precedence over full-form decoding");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

// =========================================================================
// Helpers
// =========================================================================

function oneOf<T extends string>(value: unknown, allowed: readonly T[], name: string): T {
  const match = allowed.find((a) => a === value);
  if (match === undefined) {
    throw new ConfigError(`Invalid ${name}: ${String(value)} (expected one of ${allowed.join(", ")})`);
  }
  return match;
}

function positiveInt(value: unknown, name: string): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw new ConfigError(`Invalid ${name}: ${String(value)} (expected a positive integer)`);
  }
  return value;
}

function flagFromEnv(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  return ["1", "true", "yes", "on"].includes(value.toLowerCase());
}
