/**
 * Configuration
 *
 * Values are merged from (in priority order):
 *
 * 1. Environment variables: `REFOLD_DEBUG`, `REFOLD_LAWS_ITERATIONS`
 *    (highest priority, for CI overrides)
 * 2. Programmatic: `config.set()` calls
 * 3. Config files found by cosmiconfig: a `refold` key in package.json,
 *    `.refoldrc`, `refold.config.js`, ...
 * 4. Defaults (lowest priority)
 *
 * Sources are read once, on first access. `config.reset()` drops every
 * programmatic value and rereads them.
 *
 * @example
 * ```typescript
 * import { config } from "@refold/schemes";
 *
 * config.get("laws.iterations"); // → 100
 * config.set({ laws: { iterations: 500 } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { ConfigError } from "./errors.js";

// ============================================================================
// Types
// ============================================================================

export interface LawsConfig {
  /** Inputs generated per law by `checkLaws` */
  iterations?: number;
}

export interface RefoldConfig {
  /** Enable debug logging */
  debug?: boolean;
  laws?: LawsConfig;
}

/**
 * Every readable key, by dotted path.
 */
export interface ConfigValues {
  debug: boolean;
  "laws.iterations": number;
}

export type ConfigPath = keyof ConfigValues;

const DEFAULTS: ConfigValues = {
  debug: false,
  "laws.iterations": 100,
};

// ============================================================================
// Global State
// ============================================================================

let configStore: ConfigValues = { ...DEFAULTS };
let configLoaded = false;
let configFilePath: string | undefined;
let envOverrides: Partial<ConfigValues> = {};

// ============================================================================
// Validation
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseIterations(value: unknown, source: string): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw new ConfigError(`"laws.iterations" must be a positive integer, got ${String(value)}`, source);
  }
  return value;
}

/**
 * Validate a config object read from a file.
 */
function parseConfig(raw: unknown, source: string): Partial<ConfigValues> {
  if (!isRecord(raw)) {
    throw new ConfigError("Configuration must be an object", source);
  }
  const values: Partial<ConfigValues> = {};
  if (raw.debug !== undefined) {
    if (typeof raw.debug !== "boolean") {
      throw new ConfigError(`"debug" must be a boolean, got ${String(raw.debug)}`, source);
    }
    values.debug = raw.debug;
  }
  if (raw.laws !== undefined) {
    if (!isRecord(raw.laws)) {
      throw new ConfigError(`"laws" must be an object`, source);
    }
    if (raw.laws.iterations !== undefined) {
      values["laws.iterations"] = parseIterations(raw.laws.iterations, source);
    }
  }
  return values;
}

function flatten(values: RefoldConfig): Partial<ConfigValues> {
  const flat: Partial<ConfigValues> = {};
  if (values.debug !== undefined) flat.debug = values.debug;
  if (values.laws?.iterations !== undefined) {
    flat["laws.iterations"] = parseIterations(values.laws.iterations, "config.set");
  }
  return flat;
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Examples:
 *   REFOLD_DEBUG=1               → { debug: true }
 *   REFOLD_LAWS_ITERATIONS=500   → { laws: { iterations: 500 } }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv): Partial<ConfigValues> {
  const values: Partial<ConfigValues> = {};

  const debug = env.REFOLD_DEBUG;
  if (debug !== undefined) {
    values.debug = debug === "1" || debug === "true";
  }

  const iterations = env.REFOLD_LAWS_ITERATIONS;
  if (iterations !== undefined && iterations !== "") {
    if (!/^\d+$/.test(iterations)) {
      throw new ConfigError(`"laws.iterations" must be a positive integer, got ${iterations}`, "REFOLD_LAWS_ITERATIONS");
    }
    values["laws.iterations"] = parseIterations(parseInt(iterations, 10), "REFOLD_LAWS_ITERATIONS");
  }

  return values;
}

// ============================================================================
// Config File Loading
// ============================================================================

const MODULE_NAME = "refold";

function loadConfigFromFiles(): Partial<ConfigValues> {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `.${MODULE_NAME}rc.js`,
      `.${MODULE_NAME}rc.cjs`,
      `.${MODULE_NAME}rc.mjs`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
      `${MODULE_NAME}.config.mjs`,
    ],
  });
  const result = explorer.search();
  if (result === null || result.isEmpty === true) return {};
  configFilePath = result.filepath;
  const raw: unknown = result.config;
  return parseConfig(raw, result.filepath);
}

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;
  envOverrides = loadConfigFromEnv(process.env);
  configStore = {
    ...DEFAULTS,
    ...loadConfigFromFiles(),
    ...envOverrides,
  };
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

function get<K extends ConfigPath>(path: K): ConfigValues[K] {
  initializeConfig();
  return configStore[path];
}

/**
 * Set configuration values programmatically. Overrides defaults and config
 * files; keys set through `REFOLD_*` variables keep their environment value.
 */
function set(values: RefoldConfig): void {
  initializeConfig();
  configStore = { ...configStore, ...flatten(values), ...envOverrides };
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: ConfigPath): boolean {
  return !!get(path);
}

function getAll(): Readonly<Required<RefoldConfig>> {
  initializeConfig();
  return {
    debug: configStore.debug,
    laws: { iterations: configStore["laws.iterations"] },
  };
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration (mainly for testing). Sources are reread on the next
 * access.
 */
function reset(): void {
  configStore = { ...DEFAULTS };
  configLoaded = false;
  configFilePath = undefined;
  envOverrides = {};
}

export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
};
