/**
 * Default constants for forkline configuration
 */

/**
 * Engine Configuration
 */
export const ENGINE_DEFAULTS = {
  /** Step bodies allowed to run at once across all branches of a run. */
  MAX_PARALLEL_STEPS: 16 as const,

  EMPTY_FOREACH: "join-empty" as const,
} as const;

/**
 * Logging Configuration
 */
export const LOGGING_DEFAULTS = {
  /** Default log level */
  LEVEL: "info" as const,

  /** Whether to pretty-print logs (enabled in non-production) */
  PRETTY_PRINT: process.env.NODE_ENV !== "production",
} as const;
