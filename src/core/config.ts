/**
 * Configuration System
 *
 * Settings for the lagrange CLI and formatter. Configuration is loaded from
 * (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: LAGRANGE_* (for CI and shell overrides)
 * 3. Config files: .lagrangerc, .lagrangerc.json, lagrange.config.js, etc.
 * 4. package.json: "lagrange" key
 * 5. Defaults (lowest priority)
 *
 * Command-line flags are applied by the CLI on top of all of these.
 *
 * @example
 * ```typescript
 * import { config } from "lagrange";
 *
 * config.get("maxDenominator"); // → 1000000
 * config.set({ rational: true });
 * ```
 *
 * @example Config file (.lagrangerc.json)
 * ```json
 * { "rational": true, "maxDenominator": 1000 }
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { DEFAULT_MAX_DENOMINATOR } from "../types/rational-approximation.js";
import { DEFAULT_PRECISION } from "../format/polynomial.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Full lagrange configuration schema.
 */
export interface LagrangeConfig {
  /** Print coefficients as fractions */
  rational?: boolean;
  /** Largest denominator used for fractions */
  maxDenominator?: number;
  /** Significant digits of decimal coefficients (1-100) */
  precision?: number;
  /** Name printed for the interpolating polynomial */
  name?: string;
  /** Use ANSI styling on terminals */
  color?: boolean;
  /** Log progress to stderr */
  verbose?: boolean;
}

export type ResolvedConfig = Required<LagrangeConfig>;

type OptionKind = "boolean" | "integer" | "string";

const OPTION_KINDS = {
  rational: "boolean",
  maxDenominator: "integer",
  precision: "integer",
  name: "string",
  color: "boolean",
  verbose: "boolean",
} as const satisfies Record<keyof LagrangeConfig, OptionKind>;

const DEFAULTS: ResolvedConfig = {
  rational: false,
  maxDenominator: DEFAULT_MAX_DENOMINATOR,
  precision: DEFAULT_PRECISION,
  name: "p",
  color: true,
  verbose: false,
};

export interface LoadOptions {
  /** Directory to look for a config file in (default: process.cwd()) */
  searchFrom?: string;
  /** Environment to read LAGRANGE_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

// ============================================================================
// Global State
// ============================================================================

let configStore: ResolvedConfig = { ...DEFAULTS };
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Validation
// ============================================================================

function warn(message: string): void {
  console.warn(`[lagrange] ${message}`);
}

function isBoolean(value: unknown): value is boolean {
  return typeof value === "boolean";
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 1;
}

function isPrecision(value: unknown): value is number {
  return isPositiveInteger(value) && value <= 100;
}

function isString(value: unknown): value is string {
  return typeof value === "string";
}

function readOption<T>(
  entries: Map<string, unknown>,
  key: keyof LagrangeConfig,
  check: (value: unknown) => value is T,
  source: string,
): T | undefined {
  if (!entries.has(key)) return undefined;
  const value = entries.get(key);
  if (check(value)) return value;
  warn(`${source}: ignoring invalid value for "${key}": ${JSON.stringify(value)}`);
  return undefined;
}

/**
 * Keep the recognised, well-typed options of an untrusted object.
 * Everything else is reported and dropped.
 */
function sanitize(raw: unknown, source: string): LagrangeConfig {
  if (raw === null || raw === undefined) return {};
  if (typeof raw !== "object" || Array.isArray(raw)) {
    warn(`${source}: expected an object of options, ignoring it`);
    return {};
  }

  const entries = new Map<string, unknown>(Object.entries(raw));
  for (const key of entries.keys()) {
    if (!(key in OPTION_KINDS)) {
      warn(`${source}: ignoring unknown option "${key}"`);
    }
  }

  return {
    rational: readOption(entries, "rational", isBoolean, source),
    maxDenominator: readOption(entries, "maxDenominator", isPositiveInteger, source),
    precision: readOption(entries, "precision", isPrecision, source),
    name: readOption(entries, "name", isString, source),
    color: readOption(entries, "color", isBoolean, source),
    verbose: readOption(entries, "verbose", isBoolean, source),
  };
}

/**
 * Overlay the options a layer sets on top of a resolved configuration.
 */
function merge(base: ResolvedConfig, layer: LagrangeConfig): ResolvedConfig {
  return {
    rational: layer.rational ?? base.rational,
    maxDenominator: layer.maxDenominator ?? base.maxDenominator,
    precision: layer.precision ?? base.precision,
    name: layer.name ?? base.name,
    color: layer.color ?? base.color,
    verbose: layer.verbose ?? base.verbose,
  };
}

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "lagrange";

/**
 * Load configuration synchronously from files.
 * Uses cosmiconfig to search for config in standard locations.
 */
function loadConfigFromFiles(searchFrom: string): LagrangeConfig {
  try {
    const explorer = cosmiconfigSync(MODULE_NAME, {
      searchPlaces: [
        "package.json",
        `.${MODULE_NAME}rc`,
        `.${MODULE_NAME}rc.json`,
        `.${MODULE_NAME}rc.yaml`,
        `.${MODULE_NAME}rc.yml`,
        `.${MODULE_NAME}rc.js`,
        `.${MODULE_NAME}rc.cjs`,
        `${MODULE_NAME}.config.js`,
        `${MODULE_NAME}.config.cjs`,
      ],
    });

    const result = explorer.search(searchFrom);
    if (result && !result.isEmpty) {
      configFilePath = result.filepath;
      return sanitize(result.config, result.filepath);
    }
  } catch (error) {
    // A broken config file falls back to the other sources.
    warn(`Failed to load config file: ${error instanceof Error ? error.message : String(error)}`);
  }

  return {};
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Environment variable holding an option, e.g. maxDenominator →
 * LAGRANGE_MAX_DENOMINATOR.
 */
export function envName(key: string): string {
  return `LAGRANGE_${key.replace(/[A-Z]/g, (c) => `_${c}`).toUpperCase()}`;
}

function parseEnvValue(value: string, kind: OptionKind): unknown {
  switch (kind) {
    case "boolean":
      if (value === "1" || value === "true") return true;
      if (value === "0" || value === "false" || value === "") return false;
      return value;
    case "integer":
      return /^\d+$/.test(value) ? parseInt(value, 10) : value;
    case "string":
      return value;
  }
}

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   LAGRANGE_RATIONAL=1             → { rational: true }
 *   LAGRANGE_MAX_DENOMINATOR=1000   → { maxDenominator: 1000 }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv): LagrangeConfig {
  const raw: Record<string, unknown> = {};
  for (const [key, kind] of Object.entries(OPTION_KINDS)) {
    const value = env[envName(key)];
    if (value !== undefined) {
      raw[key] = parseEnvValue(value, kind);
    }
  }
  return sanitize(raw, "environment");
}

// ============================================================================
// Config Initialization
// ============================================================================

/**
 * Load configuration from all sources, replacing whatever was loaded before.
 * Priority: env vars > config files > defaults
 */
function load(options: LoadOptions = {}): Readonly<ResolvedConfig> {
  configFilePath = undefined;
  const fileConfig = loadConfigFromFiles(options.searchFrom ?? process.cwd());
  const envConfig = loadConfigFromEnv(options.env ?? process.env);

  configStore = merge(merge(DEFAULTS, fileConfig), envConfig);
  configLoaded = true;
  return configStore;
}

function initializeConfig(): void {
  if (configLoaded) return;
  load();
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value.
 *
 * @example
 * config.get("rational")        // → false
 * config.get("maxDenominator")  // → 1000000
 */
function get<K extends keyof ResolvedConfig>(key: K): ResolvedConfig[K] {
  initializeConfig();
  return configStore[key];
}

/**
 * Set configuration values programmatically.
 * Merges with existing configuration.
 *
 * @example
 * config.set({ rational: true, maxDenominator: 1000 });
 */
function set(values: LagrangeConfig): void {
  initializeConfig();
  configStore = merge(configStore, sanitize(values, "config.set()"));
}

/**
 * Get all configuration values.
 */
function getAll(): Readonly<ResolvedConfig> {
  initializeConfig();
  return configStore;
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = { ...DEFAULTS };
  configLoaded = false;
  configFilePath = undefined;
}

// ============================================================================
// Export: config object
// ============================================================================

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  getAll,
  getConfigFilePath,
  load,
  reset,
} as const;

/**
 * Helper for creating type-safe configuration files.
 *
 * @example
 * // lagrange.config.js
 * import { defineConfig } from "lagrange";
 *
 * export default defineConfig({ rational: true });
 */
export function defineConfig(config: LagrangeConfig): LagrangeConfig {
  return config;
}
