import { describe, expect, it } from 'vitest';
import { InvalidParametersError } from '@forkline/core';
import { TRAINING_DEFAULTS, createTrainingParamsSchema, resolveKerasBackend, resolveRunMode, resolveTrainingParams } from '../src/index';

describe('resolveTrainingParams', () => {
  it('falls back to defaults', () => {
    expect(resolveTrainingParams({}, {})).toEqual({
      trackingUri: 'http://127.0.0.1:5000',
      trainingEpochs: 50,
      trainingBatchSize: 32,
      accuracyThreshold: 0.7,
      folds: 5,
      registeredModelName: 'penguins',
      mode: 'development'
    });
  });

  it('reads the tracking server from the environment unless given explicitly', () => {
    const env = { MLFLOW_TRACKING_URI: 'http://tracking.test:8080' };

    expect(resolveTrainingParams({}, env).trackingUri).toBe('http://tracking.test:8080');
    expect(resolveTrainingParams({ trackingUri: 'http://other.test:5000' }, env).trackingUri).toBe('http://other.test:5000');
  });

  it('runs in production mode when NODE_ENV says so', () => {
    expect(resolveTrainingParams({}, { NODE_ENV: 'production' }).mode).toBe('production');
    expect(resolveTrainingParams({ mode: 'development' }, { NODE_ENV: 'production' }).mode).toBe('development');
    expect(resolveRunMode({ NODE_ENV: 'test' })).toBe('development');
  });

  it('rejects values outside their ranges', () => {
    expect(() => resolveTrainingParams({ accuracyThreshold: 1.5 }, {})).toThrow(InvalidParametersError);
    expect(() => resolveTrainingParams({ folds: 1 }, {})).toThrow(InvalidParametersError);
    expect(() => resolveTrainingParams({ trackingUri: 'not a url' }, {})).toThrow(InvalidParametersError);
    expect(createTrainingParamsSchema({}).safeParse({ mode: 'staging' }).success).toBe(false);
  });
});

describe('resolveKerasBackend', () => {
  it('prefers the environment', () => {
    expect(resolveKerasBackend({})).toBe(TRAINING_DEFAULTS.KERAS_BACKEND);
    expect(resolveKerasBackend({ KERAS_BACKEND: 'tensorflow' })).toBe('tensorflow');
  });
});
