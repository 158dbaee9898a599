import { describe, expect, it } from 'vitest';
import {
  FakeDatasetLoader,
  FakeExperimentTracker,
  FakeLogger,
  FakeModelFactory,
  FakeModelRegistry,
  FakeTransformerFactory
} from '../src/index';

describe('fake adapters', () => {
  it('nests tracked runs and records metrics and params per run', async () => {
    const tracker = new FakeExperimentTracker();
    const parent = await tracker.startRun('run-1');
    const fold = await tracker.startRun('cross-validation-fold-1', { parentRunId: parent.runId });

    await tracker.logMetrics({ test_accuracy: 0.8 }, fold.runId);
    await tracker.logParams({ epochs: 50 }, parent.runId);

    expect(parent.runId).toBe('tracked-1');
    expect(tracker.find('cross-validation-fold-1')).toMatchObject({ parentRunId: 'tracked-1', metrics: { test_accuracy: 0.8 } });
    expect(tracker.find('run-1')?.params).toEqual({ epochs: 50 });
    await expect(tracker.logMetrics({ loss: 1 }, 'tracked-9')).rejects.toThrow('unknown run tracked-9');
  });

  it('rejects new runs once told the server is unreachable', async () => {
    const tracker = new FakeExperimentTracker();
    tracker.failStartRun();

    await expect(tracker.startRun('run-1')).rejects.toThrow('ECONNREFUSED');
  });

  it('versions models registered under the same name', async () => {
    const registry = new FakeModelRegistry();
    const transformers = new FakeTransformerFactory({ features: ['x'], target: 'y' });
    const input = {
      model: new FakeModelFactory().build(1),
      artifacts: {
        model: new FakeModelFactory().build(1),
        featuresTransformer: transformers.buildFeaturesTransformer(),
        targetTransformer: transformers.buildTargetTransformer()
      },
      signature: { input: { x: 1 }, output: { y: 'a' } },
      requirements: [],
      registeredName: 'penguins',
      runId: 'tracked-1'
    };

    expect(await registry.logModel(input)).toEqual({ name: 'penguins', version: 1 });
    expect(await registry.logModel(input)).toEqual({ name: 'penguins', version: 2 });
    expect(registry.logged).toHaveLength(2);
  });

  it('one-hot encodes categorical columns using the categories seen while fitting', () => {
    const factory = new FakeTransformerFactory({ features: ['island', 'mass'], target: 'species' });
    const features = factory.buildFeaturesTransformer();
    const target = factory.buildTargetTransformer();

    const rows = [
      { island: 'Dream', mass: 3.5, species: 'Adelie' },
      { island: 'Biscoe', mass: 4.1, species: 'Gentoo' }
    ];

    expect(features.fitTransform(rows)).toEqual([[0, 1, 3.5], [1, 0, 4.1]]);
    expect(features.transform([{ island: 'Torgersen', mass: null, species: 'Adelie' }])).toEqual([[0, 0, 0]]);
    expect(target.fitTransform(rows)).toEqual([[1, 0], [0, 1]]);
    expect(() => factory.buildTargetTransformer().transform(rows)).toThrow('before fitTransform');
  });

  it('hands out scripted evaluations in order and fails fits on request', async () => {
    const factory = new FakeModelFactory({
      evaluations: [{ loss: 0.4, accuracy: 0.6 }, { loss: 0.2, accuracy: 0.9 }],
      fitError: (x) => (x.length === 1 ? new Error('diverged') : null)
    });
    const model = factory.build(2);

    const history = await model.fit([[1, 2], [3, 4]], [[1], [0]], { epochs: 3, batchSize: 32 });
    expect(history.loss).toHaveLength(3);
    expect(await model.evaluate([[1, 2]], [[1]])).toEqual({ loss: 0.4, accuracy: 0.6 });
    expect(await model.evaluate([[1, 2]], [[1]])).toEqual({ loss: 0.2, accuracy: 0.9 });
    expect(await model.evaluate([[1, 2]], [[1]])).toEqual({ loss: 0.4, accuracy: 0.6 });
    await expect(factory.build(2).fit([[1, 2]], [[1]], { epochs: 1, batchSize: 1 })).rejects.toThrow('diverged');
  });

  it('counts dataset loads and binds child logger fields', async () => {
    const loader = new FakeDatasetLoader({ columns: ['x'], rows: [{ x: 1 }] });
    await loader.load();
    expect(loader.loads).toBe(1);

    const logger = new FakeLogger();
    logger.child({ step: 'start' }).info({ rows: 1 }, 'Loaded dataset');
    logger.warn('plain');

    expect(logger.logs).toEqual([
      { level: 'info', obj: { step: 'start', rows: 1 }, msg: 'Loaded dataset' },
      { level: 'warn', msg: 'plain' }
    ]);
    expect(logger.messages('warn')).toEqual(['plain']);
  });
});
