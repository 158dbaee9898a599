import { PinoLogger, createRetryingStepInvoker } from '@forkline/adapters';
import type { ArtifactStore, EngineConfig, ExecutionHooks, Logger, RunResult, StepInvoker } from '@forkline/core';
import { FlowExecutor } from '@forkline/engine';

import { TRAINING_FLOW, createTrainingFlow, createTrainingInitializer, type TrainingDeps } from './flow';
import { resolveTrainingParams, type TrainingEnv, type TrainingParamsInput } from './params';

export interface RunTrainingPipelineOptions {
  deps: TrainingDeps;
  params?: TrainingParamsInput;
  env?: TrainingEnv;
  runId?: string;
  logger?: Logger;
  engine?: Partial<EngineConfig>;
  store?: ArtifactStore;
  hooks?: ExecutionHooks;
  /** Defaults to a retrying invoker honoring each step's `config.retries`. */
  invokeStep?: StepInvoker;
  random?: () => number;
}

/**
 * Resolves parameters, builds the training flow and runs it once.
 * Invalid parameters throw; everything after that is reported in the result.
 */
export async function runTrainingPipeline(options: RunTrainingPipelineOptions): Promise<RunResult> {
  const env    = options.env    ?? process.env;
  const logger = options.logger ?? new PinoLogger({ name: TRAINING_FLOW });
  const params = resolveTrainingParams(options.params, env);

  const executor = new FlowExecutor(createTrainingFlow(options.deps, { env, random: options.random }), {
    logger,
    store            : options.store,
    hooks            : options.hooks,
    invokeStep       : options.invokeStep ?? createRetryingStepInvoker({ logger }),
    emptyForeach     : options.engine?.emptyForeach,
    maxParallelSteps : options.engine?.maxParallelSteps
  });

  logger.info({ params }, 'Starting training pipeline');
  return executor.run(params, {
    runId      : options.runId,
    initialize : createTrainingInitializer(options.deps.tracker)
  });
}
