import { formatBranchPath, type Logger, type StepInvoker } from '@forkline/core';

interface RetryIdempotentInput<T> {
  run: () => Promise<T>;
  maxRetries: number;
  baseDelayMs: number;
  jitterMs: number;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function defaultIsRetryable(error: unknown): boolean {
  const message = error instanceof Error ? error.message.toLowerCase() : String(error).toLowerCase();
  return (
    message.includes('timeout')
    || message.includes('temporar')
    || message.includes('network')
    || message.includes('econnreset')
    || message.includes('econnrefused')
    || message.includes('429')
    || message.includes('503')
  );
}

function nextDelayMs(baseDelayMs: number, jitterMs: number, attempt: number): number {
  const expo = baseDelayMs * Math.pow(2, attempt);
  const jitter = jitterMs > 0 ? Math.floor(Math.random() * (jitterMs + 1)) : 0;
  return expo + jitter;
}

export async function retryIdempotent<T>(input: RetryIdempotentInput<T>): Promise<T> {
  const isRetryable = input.isRetryable ?? defaultIsRetryable;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await input.run();
    } catch (error) {
      if (attempt >= input.maxRetries || !isRetryable(error)) {
        throw error;
      }

      const delayMs = nextDelayMs(input.baseDelayMs, input.jitterMs, attempt);
      input.onRetry?.(error, attempt + 1, delayMs);
      await sleep(delayMs);
    }
  }
}

export interface RetryingStepInvokerOptions {
  /** Re-invocations for steps whose config sets no `retries`. */
  maxRetries?: number;
  baseDelayMs?: number;
  jitterMs?: number;
  isRetryable?: (error: unknown) => boolean;
  logger?: Logger;
}

/**
 * Step invoker that re-runs failed bodies with exponential backoff.
 * A step's `config.retries` overrides `maxRetries`.
 */
export function createRetryingStepInvoker(options: RetryingStepInvokerOptions = {}): StepInvoker {
  const { maxRetries = 0, baseDelayMs = 100, jitterMs = 50, isRetryable, logger } = options;

  return (invocation, execute) => {
    const branch = formatBranchPath(invocation.branch);
    const { resources, environment, retries = maxRetries } = invocation.config;

    logger?.trace({ step: invocation.step, branch, resources, environment: Object.keys(environment ?? {}) }, 'Invoking step');

    return retryIdempotent({
      run: execute,
      maxRetries: retries,
      baseDelayMs,
      jitterMs,
      isRetryable,
      onRetry: (error, attempt, delayMs) => {
        logger?.warn({ step: invocation.step, branch, attempt, delayMs, err: error }, `Retrying step ${invocation.step}`);
      }
    });
  };
}
