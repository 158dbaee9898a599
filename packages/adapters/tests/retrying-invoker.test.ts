import { describe, expect, it, vi } from 'vitest';
import type { StepConfig, StepInvocation } from '@forkline/core';
import { FakeLogger, createRetryingStepInvoker, defaultIsRetryable } from '../src/index';

function invocation(config: StepConfig = {}): StepInvocation {
  return {
    run: { runId: 'r1', flow: 'training', params: {} },
    step: 'train_fold',
    kind: 'linear',
    branch: [{ split: 'cross_validation', index: 2, width: 5 }],
    config
  };
}

describe('createRetryingStepInvoker', () => {
  it('re-runs a body that failed with a transient error', async () => {
    const logger = new FakeLogger();
    const invoke = createRetryingStepInvoker({ maxRetries: 2, baseDelayMs: 0, jitterMs: 0, logger });
    const execute = vi.fn()
      .mockRejectedValueOnce(new Error('network timeout'))
      .mockResolvedValueOnce({ artifacts: { ok: true } });

    await expect(invoke(invocation(), execute)).resolves.toEqual({ artifacts: { ok: true } });
    expect(execute).toHaveBeenCalledTimes(2);
    expect(logger.logs.find((entry) => entry.level === 'warn')).toMatchObject({
      obj: { step: 'train_fold', branch: 'cross_validation[2/5]', attempt: 1, delayMs: 0 },
      msg: 'Retrying step train_fold'
    });
  });

  it('does not retry errors that are not transient', async () => {
    const invoke = createRetryingStepInvoker({ maxRetries: 3, baseDelayMs: 0, jitterMs: 0 });
    const execute = vi.fn().mockRejectedValue(new Error('shape mismatch'));

    await expect(invoke(invocation(), execute)).rejects.toThrow('shape mismatch');
    expect(execute).toHaveBeenCalledTimes(1);
  });

  it('lets the step config override the retry budget', async () => {
    const invoke = createRetryingStepInvoker({ maxRetries: 0, baseDelayMs: 0, jitterMs: 0 });
    const execute = vi.fn().mockRejectedValue(new Error('503 service unavailable'));

    await expect(invoke(invocation({ retries: 2 }), execute)).rejects.toThrow('503');
    expect(execute).toHaveBeenCalledTimes(3);
  });

  it('classifies connection errors as retryable', () => {
    expect(defaultIsRetryable(new Error('connect ECONNREFUSED 127.0.0.1:5000'))).toBe(true);
    expect(defaultIsRetryable(new Error('invalid input'))).toBe(false);
  });
});
