import { z } from 'zod';
import { InvalidParametersError } from '@forkline/core';

export const TRAINING_DEFAULTS = {
  TRACKING_URI          : 'http://127.0.0.1:5000',
  TRAINING_EPOCHS       : 50,
  TRAINING_BATCH_SIZE   : 32,
  ACCURACY_THRESHOLD    : 0.7,
  FOLDS                 : 5,
  REGISTERED_MODEL_NAME : 'penguins',
  KERAS_BACKEND         : 'jax'
} as const;

export type TrainingEnv = Readonly<Record<string, string | undefined>>;

export const RunModeSchema = z.enum(['development', 'production']);
export type RunMode = z.infer<typeof RunModeSchema>;

export function resolveRunMode(env: TrainingEnv = process.env): RunMode {
  return env.NODE_ENV === 'production' ? 'production' : 'development';
}

/**
 * Run parameters of the training flow. The tracking server defaults to
 * `MLFLOW_TRACKING_URI` from `env`, the mode to `NODE_ENV`.
 */
export function createTrainingParamsSchema(env: TrainingEnv = process.env) {
  return z.object({
    trackingUri         : z.string().url().default(env.MLFLOW_TRACKING_URI ?? TRAINING_DEFAULTS.TRACKING_URI),
    trainingEpochs      : z.number().int().positive().default(TRAINING_DEFAULTS.TRAINING_EPOCHS),
    trainingBatchSize   : z.number().int().positive().default(TRAINING_DEFAULTS.TRAINING_BATCH_SIZE),
    accuracyThreshold   : z.number().min(0).max(1).default(TRAINING_DEFAULTS.ACCURACY_THRESHOLD),
    folds               : z.number().int().min(2).default(TRAINING_DEFAULTS.FOLDS),
    registeredModelName : z.string().min(1).default(TRAINING_DEFAULTS.REGISTERED_MODEL_NAME),
    mode                : RunModeSchema.default(resolveRunMode(env))
  });
}

export type TrainingParamsSchema = ReturnType<typeof createTrainingParamsSchema>;
export type TrainingParams = z.output<TrainingParamsSchema>;
export type TrainingParamsInput = z.input<TrainingParamsSchema>;

/** Explicit values win over the environment, which wins over defaults. */
export function resolveTrainingParams(input: TrainingParamsInput = {}, env: TrainingEnv = process.env): TrainingParams {
  const parsed = createTrainingParamsSchema(env).safeParse(input);
  if (!parsed.success) {
    throw new InvalidParametersError('training', parsed.error.issues);
  }
  return parsed.data;
}

export function resolveKerasBackend(env: TrainingEnv = process.env): string {
  return env.KERAS_BACKEND ?? TRAINING_DEFAULTS.KERAS_BACKEND;
}
