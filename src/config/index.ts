/**
 * Centralized Configuration Module
 *
 * Provides type-safe, validated access to the environment variables the
 * validator and its scripts read. Parsed once on first access and cached.
 */

import { z } from "zod";

/**
 * Custom boolean coercion that handles string "false" and "true"
 */
const booleanString = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    if (typeof val === "number") return val !== 0;
    const lower = val.toLowerCase().trim();
    if (lower === "false" || lower === "0" || lower === "") return false;
    if (lower === "true" || lower === "1") return true;
    return Boolean(val); // fallback
  });

/**
 * Environment enum
 */
const Environment = z.enum(["development", "test", "production"]);

/**
 * Log Level enum
 */
const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

/**
 * Configuration Schema
 */
const ConfigSchema = z.object({
  runtime: z.object({
    nodeEnv: Environment.default("development"),
    logLevel: LogLevel.default("info"),
    isVitest: booleanString.default(false),
  }),

  downmix: z.object({
    // Directory holding layouts.yaml and speakers.yaml
    ontologyDir: z.string().min(1).default("ontology"),
    registryPath: z.string().min(1).default("ontology/policies/downmix.yaml"),
    fixturesDir: z.string().min(1).default("fixtures/policies"),
    // Load policy packs concurrently; issue order is unaffected
    parallelLoad: booleanString.default(true),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse and validate configuration from environment variables
 */
function parseConfig(): Config {
  const env = process.env;

  const rawConfig = {
    runtime: {
      nodeEnv: env.NODE_ENV,
      logLevel: env.LOG_LEVEL,
      isVitest: env.VITEST,
    },
    downmix: {
      ontologyDir: env.DOWNMIX_ONTOLOGY_DIR,
      registryPath: env.DOWNMIX_REGISTRY_PATH,
      fixturesDir: env.DOWNMIX_FIXTURES_DIR,
      parallelLoad: env.DOWNMIX_PARALLEL_LOAD,
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }
  return result.data;
}

let _cachedConfig: Config | null = null;

/**
 * Get configuration, parsing it on first access.
 */
export function getConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

/**
 * Reset cached configuration (for testing only)
 *
 * Clears the cached configuration and forces a fresh parse on next access,
 * so tests can change environment variables with vi.stubEnv().
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}

/**
 * Check if running in production environment
 */
export function isProduction(): boolean {
  return getConfig().runtime.nodeEnv === "production";
}

/**
 * Check if running in test environment
 */
export function isTest(): boolean {
  const { runtime } = getConfig();
  return runtime.nodeEnv === "test" || runtime.isVitest;
}
