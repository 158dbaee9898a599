/**
 * What a foreach split that yields zero elements does:
 * - `join-empty`: the matching join runs at once with no inputs
 * - `fail`: the run fails with `EmptyForeachError`
 */
export type EmptyForeachPolicy = 'join-empty' | 'fail';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface EngineConfig {
  /** Run-wide cap on step bodies executing at the same time. */
  maxParallelSteps: number;
  emptyForeach: EmptyForeachPolicy;
}

export interface LoggingConfig {
  level: LogLevel;
  prettyPrint: boolean;
  name?: string;
}
