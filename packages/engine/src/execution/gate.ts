import type { Logger } from '@forkline/core';

export interface GateInput<T> {
  value: number;
  threshold: number;
  action: () => Promise<T>;
  /** Names the guarded action in log lines. */
  label?: string;
  logger?: Logger;
}

export type GateOutcome<T> =
  | { status: 'fired'; value: number; threshold: number; result: T }
  | { status: 'skipped'; reason: 'threshold-not-met'; value: number; threshold: number };

/**
 * Runs `action` only when `value >= threshold`. A closed gate is a normal
 * outcome; an action that throws fails the caller.
 */
export async function runGated<T>(input: GateInput<T>): Promise<GateOutcome<T>> {
  const { value, threshold, label = 'gated action' } = input;

  if (!(value >= threshold)) {
    input.logger?.info({ value, threshold }, `${label} skipped: ${value.toFixed(2)} is below the threshold ${threshold.toFixed(2)}`);
    return { status: 'skipped', reason: 'threshold-not-met', value, threshold };
  }

  input.logger?.info({ value, threshold }, `${label} running`);
  const result = await input.action();
  return { status: 'fired', value, threshold, result };
}
