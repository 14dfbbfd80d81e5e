/**
 * Centralized Logger Configuration
 *
 * Single source of truth for Pino logger options used by the shared logger
 * in telemetry.ts, which the command-line scripts share.
 */

/**
 * Paths to redact from all log output.
 * Uses Pino's path syntax with wildcards.
 *
 * Coefficient payloads and issue evidence stay out of logs; only counts
 * and file paths are logged.
 */
export const REDACT_PATHS = [
  "*.coefficients",
  "*.evidence",
  "*.issues",
] as const;

/**
 * Redaction censor string
 */
export const REDACT_CENSOR = "[REDACTED]";

/**
 * Create a Pino-compatible redact configuration
 */
export function createRedactConfig() {
  return {
    paths: [...REDACT_PATHS],
    censor: REDACT_CENSOR,
  };
}

/**
 * Create full Pino logger options
 */
export function createLoggerConfig(level: string) {
  return {
    level,
    base: { service: "downmix-policy-validator" },
    redact: createRedactConfig(),
  };
}
