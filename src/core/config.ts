/**
 * Configuration
 *
 * Loaded from (in priority order):
 *
 * 1. Environment variables: ODATA_LITERAL_* (highest priority, for CI overrides)
 * 2. Config files: .odataliteralrc, .odataliteralrc.json, odataliteral.config.cjs, etc.
 * 3. package.json: "odataliteral" key
 * 4. Defaults (lowest priority)
 *
 * Programmatic `config.set()` calls merge over whatever was loaded.
 *
 * @example
 * ```typescript
 * import { config, parseLiteral } from "odata-literal";
 *
 * config.getAll().output.format            // → "text" | "json"
 * parseLiteral("'P1D'", config.literalOptions());
 * ```
 *
 * @example Config file (.odataliteralrc.json)
 * ```json
 * { "duration": { "keyword": "required" }, "output": { "format": "json" } }
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import type { LiteralOptions } from "@odata-literal/grammar";
import { createLogger } from "./logger.js";

// ============================================================================
// Types
// ============================================================================

export type DurationKeyword = "optional" | "required";
export type OutputFormat = "text" | "json";

/** The resolved configuration. Every field has a value. */
export interface OdataLiteralConfig {
  /** Verbose logging */
  debug: boolean;
  duration: {
    /** `"required"` only reads durations written as `duration'…'` */
    keyword: DurationKeyword;
  };
  output: {
    /** CLI output format */
    format: OutputFormat;
  };
}

/** What a config file or `config.set()` may supply. */
export interface UserConfig {
  debug?: boolean;
  duration?: { keyword?: DurationKeyword };
  output?: { format?: OutputFormat };
}

type RawConfig = Record<string, unknown>;

const DEFAULTS: OdataLiteralConfig = {
  debug: false,
  duration: { keyword: "optional" },
  output: { format: "text" },
};

// ============================================================================
// Global State
// ============================================================================

let configStore: OdataLiteralConfig = DEFAULTS;
let configLoaded = false;
let configFilePath: string | undefined;

const log = createLogger("config");

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "odataliteral";

function loadConfigFromFiles(searchFrom: string | undefined): RawConfig {
  try {
    const explorer = cosmiconfigSync(MODULE_NAME, {
      searchPlaces: [
        "package.json",
        `.${MODULE_NAME}rc`,
        `.${MODULE_NAME}rc.json`,
        `.${MODULE_NAME}rc.yaml`,
        `.${MODULE_NAME}rc.yml`,
        `.${MODULE_NAME}rc.cjs`,
        `${MODULE_NAME}.config.cjs`,
      ],
    });

    const result = explorer.search(searchFrom);
    if (result && !result.isEmpty) {
      configFilePath = result.filepath;
      const loaded: unknown = result.config;
      if (isRecord(loaded)) return loaded;
      log.warn(`Ignoring ${result.filepath}: expected an object`);
    }
  } catch (error) {
    // A broken config file falls back to defaults
    log.warn(`Failed to load config file: ${error instanceof Error ? error.message : String(error)}`);
  }

  return {};
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Variables prefixed with ODATA_LITERAL_ are parsed into the config object.
 *
 * Examples:
 *   ODATA_LITERAL_DEBUG=1                    → { debug: true }
 *   ODATA_LITERAL_DURATION_KEYWORD=required  → { duration: { keyword: "required" } }
 *   ODATA_LITERAL_OUTPUT__FORMAT=json        → { output: { format: "json" } }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv): RawConfig {
  const envConfig: RawConfig = {};
  const PREFIX = "ODATA_LITERAL_";

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    const configPath = key
      .slice(PREFIX.length)
      .toLowerCase()
      .replace(/__/g, ".")
      .replace(/_/g, ".");

    let parsedValue: unknown;
    if (value === "1" || value === "true") {
      parsedValue = true;
    } else if (value === "0" || value === "false" || value === "") {
      parsedValue = false;
    } else {
      parsedValue = value;
    }

    setNestedValue(envConfig, configPath, parsedValue);
  }

  return envConfig;
}

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is RawConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function setNestedValue(obj: RawConfig, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: RawConfig = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/** Deep merge (right takes precedence). */
function deepMerge(target: RawConfig, source: RawConfig): RawConfig {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];
    result[key] =
      isRecord(sourceValue) && isRecord(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue;
  }

  return result;
}

function pick<T extends string>(value: unknown, allowed: readonly T[], fallback: T): T {
  return allowed.find((candidate) => candidate === value) ?? fallback;
}

/** Keep the known keys with valid values; everything else takes its default. */
function normalize(raw: RawConfig): OdataLiteralConfig {
  const duration = isRecord(raw.duration) ? raw.duration : {};
  const output = isRecord(raw.output) ? raw.output : {};
  return {
    debug: typeof raw.debug === "boolean" ? raw.debug : DEFAULTS.debug,
    duration: {
      keyword: pick(duration.keyword, ["optional", "required"], DEFAULTS.duration.keyword),
    },
    output: {
      format: pick(output.format, ["text", "json"], DEFAULTS.output.format),
    },
  };
}

function toRaw(config: OdataLiteralConfig | UserConfig): RawConfig {
  return {
    debug: config.debug,
    duration: { ...config.duration },
    output: { ...config.output },
  };
}

function dropUndefined(raw: RawConfig): RawConfig {
  const result: RawConfig = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === undefined) continue;
    result[key] = isRecord(value) ? dropUndefined(value) : value;
  }
  return result;
}

// ============================================================================
// Config Initialization
// ============================================================================

/**
 * (Re)load configuration from all sources.
 * Priority: env vars > config files > defaults
 *
 * @param searchFrom - Directory to start the config file search in (default: cwd)
 */
function load(searchFrom?: string): void {
  configFilePath = undefined;
  const fileConfig = loadConfigFromFiles(searchFrom);
  const envConfig = loadConfigFromEnv(process.env);

  configStore = normalize(deepMerge(deepMerge(toRaw(DEFAULTS), fileConfig), envConfig));
  configLoaded = true;
  if (configStore.debug && configFilePath) {
    log.info(`Loaded ${configFilePath}`);
  }
}

function initializeConfig(): void {
  if (!configLoaded) load();
}

// ============================================================================
// Public API
// ============================================================================

/** The resolved configuration. */
function getAll(): Readonly<OdataLiteralConfig> {
  initializeConfig();
  return configStore;
}

/**
 * Set configuration values programmatically.
 * Merges with existing configuration.
 *
 * @example
 * config.set({ duration: { keyword: "required" } });
 */
function set(values: UserConfig): void {
  initializeConfig();
  configStore = normalize(deepMerge(toRaw(configStore), dropUndefined(toRaw(values))));
}

/** Path to the loaded config file, if any. */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/** Parser options derived from the configuration. */
function literalOptions(): LiteralOptions {
  return { requireDurationKeyword: getAll().duration.keyword === "required" };
}

/** Reset configuration to defaults (mainly for testing). */
function reset(): void {
  configStore = DEFAULTS;
  configLoaded = false;
  configFilePath = undefined;
}

export const config = {
  load,
  getAll,
  set,
  getConfigFilePath,
  literalOptions,
  reset,
} as const;

/**
 * Helper for type-safe configuration objects.
 *
 * @example
 * config.set(defineConfig({ output: { format: "json" } }));
 */
export function defineConfig(config: UserConfig): UserConfig {
  return config;
}
