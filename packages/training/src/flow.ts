import { z } from 'zod';
import {
  RunInitializationError,
  type Artifacts,
  type DataRow,
  type DatasetLoader,
  type ExperimentTracker,
  type FlowGraph,
  type ModelFactory,
  type ModelRegistry,
  type RunInfo,
  type StepConfig,
  type TransformerFactory
} from '@forkline/core';
import { aggregateMetrics, defineFlow, defineStep, mergeArtifacts, runGated } from '@forkline/engine';

import { DatasetSchema, MatrixSchema, ModelSchema, TransformerSchema } from './artifacts';
import { FoldSchema, createKFold } from './folds';
import { MODEL_REQUIREMENTS, MODEL_SIGNATURE } from './model-package';
import {
  createTrainingParamsSchema,
  resolveKerasBackend,
  type TrainingEnv,
  type TrainingParams,
  type TrainingParamsInput
} from './params';

export const TRAINING_FLOW = 'training';

export interface TrainingDeps {
  dataset: DatasetLoader;
  transformers: TransformerFactory;
  models: ModelFactory;
  tracker: ExperimentTracker;
  registry: ModelRegistry;
}

export interface TrainingFlowOptions {
  env?: TrainingEnv;
  /** Shuffle source used when assigning rows to folds. */
  random?: () => number;
}

const TrackingRunIdSchema = z.string().min(1);
const MetricSchema = z.number();

function pickRows(rows: readonly DataRow[], indices: readonly number[]): DataRow[] {
  return indices.flatMap((index) => {
    const row = rows[index];
    return row ? [row] : [];
  });
}

function last(values: readonly number[]): number {
  return values[values.length - 1] ?? Number.NaN;
}

function formatMetric(value: number): string {
  return value.toFixed(6);
}

/**
 * Starts the tracker run every step logs under, named after the run id.
 */
export function createTrainingInitializer(tracker: ExperimentTracker) {
  return async (run: RunInfo<TrainingParams>): Promise<Artifacts> => {
    try {
      const tracked = await tracker.startRun(run.runId);
      return { trackingRunId: tracked.runId };
    } catch (error) {
      throw new RunInitializationError(`Failed to connect to MLflow server ${run.params.trackingUri}.`, { cause: error });
    }
  };
}

/**
 * Cross-validates the model over k folds while, in parallel, training the
 * final model on the full dataset; the model is registered only when the
 * cross-validated accuracy reaches the threshold.
 *
 * ```
 * start ─┬─ cross_validation ─(foreach fold)─ transform_fold → train_fold → evaluate_fold ─ average_scores ─┬─ register_model → end
 *        └─ transform → train_model ──────────────────────────────────────────────────────────────────────┘
 * ```
 */
export function createTrainingFlow(deps: TrainingDeps, options: TrainingFlowOptions = {}): FlowGraph<TrainingParams, TrainingParamsInput> {
  const env = options.env ?? process.env;
  const trainingConfig: StepConfig = {
    resources: { memoryMb: 4096 },
    environment: { KERAS_BACKEND: resolveKerasBackend(env) }
  };

  return defineFlow({
    name: TRAINING_FLOW,
    params: createTrainingParamsSchema(env),
    steps: [
      defineStep<TrainingParams>({
        name: 'start',
        kind: 'split-static',
        next: ['cross_validation', 'transform'],
        requires: z.object({ trackingRunId: TrackingRunIdSchema }),
        provides: z.object({ data: DatasetSchema }),
        body: async (ctx) => {
          const { mode, trackingUri } = ctx.run.params;
          ctx.logger.info(`Running flow in ${mode} mode.`);
          ctx.logger.info(`MLflow tracking server: ${trackingUri}`);
          const data = await deps.dataset.load();
          ctx.logger.info({ rows: data.rows.length, columns: data.columns.length }, 'Loaded dataset');
          return { artifacts: { mode, data } };
        }
      }),

      defineStep<TrainingParams>({
        name: 'cross_validation',
        kind: 'split-foreach',
        next: ['transform_fold'],
        body: async (ctx) => {
          const data = ctx.artifacts.parse('data', DatasetSchema);
          const folds = createKFold(data.rows.length, ctx.run.params.folds, { shuffle: true, random: options.random });
          return { items: folds };
        }
      }),

      defineStep<TrainingParams>({
        name: 'transform_fold',
        kind: 'linear',
        next: ['train_fold'],
        body: async (ctx) => {
          const { fold, trainIndices, testIndices } = FoldSchema.parse(ctx.input);
          ctx.logger.info(`Transforming fold ${fold}...`);

          const data = ctx.artifacts.parse('data', DatasetSchema);
          const trainRows = pickRows(data.rows, trainIndices);
          const testRows = pickRows(data.rows, testIndices);

          const featuresTransformer = deps.transformers.buildFeaturesTransformer();
          const targetTransformer = deps.transformers.buildTargetTransformer();

          return {
            artifacts: {
              fold,
              xTrain: featuresTransformer.fitTransform(trainRows),
              xTest: featuresTransformer.transform(testRows),
              yTrain: targetTransformer.fitTransform(trainRows),
              yTest: targetTransformer.transform(testRows)
            }
          };
        }
      }),

      defineStep<TrainingParams>({
        name: 'train_fold',
        kind: 'linear',
        next: ['evaluate_fold'],
        config: trainingConfig,
        body: async (ctx) => {
          const { trainingEpochs, trainingBatchSize } = ctx.run.params;
          const fold = ctx.artifacts.parse('fold', MetricSchema);
          const xTrain = ctx.artifacts.parse('xTrain', MatrixSchema);
          const yTrain = ctx.artifacts.parse('yTrain', MatrixSchema);
          ctx.logger.info({ backend: ctx.config.environment?.KERAS_BACKEND }, `Training fold ${fold}...`);

          // one nested tracker run per fold
          const foldRun = await deps.tracker.startRun(`cross-validation-fold-${fold}`, {
            parentRunId: ctx.artifacts.parse('trackingRunId', TrackingRunIdSchema)
          });

          const model = deps.models.build(xTrain[0]?.length ?? 0);
          const history = await model.fit(xTrain, yTrain, { epochs: trainingEpochs, batchSize: trainingBatchSize });

          ctx.logger.info(
            `Fold ${fold} - train_loss: ${formatMetric(last(history.loss))} - train_accuracy: ${formatMetric(last(history.accuracy))}`
          );
          return { artifacts: { model, foldRunId: foldRun.runId } };
        }
      }),

      defineStep<TrainingParams>({
        name: 'evaluate_fold',
        kind: 'linear',
        next: ['average_scores'],
        config: { environment: trainingConfig.environment },
        provides: z.object({ testLoss: MetricSchema, testAccuracy: MetricSchema }),
        body: async (ctx) => {
          const fold = ctx.artifacts.parse('fold', MetricSchema);
          ctx.logger.info(`Evaluating fold ${fold}...`);

          const model = ctx.artifacts.parse('model', ModelSchema);
          const { loss, accuracy } = await model.evaluate(
            ctx.artifacts.parse('xTest', MatrixSchema),
            ctx.artifacts.parse('yTest', MatrixSchema)
          );
          ctx.logger.info(`Fold ${fold} - test_loss: ${formatMetric(loss)} - test_accuracy: ${formatMetric(accuracy)}`);

          await deps.tracker.logMetrics(
            { test_loss: loss, test_accuracy: accuracy },
            ctx.artifacts.parse('foldRunId', TrackingRunIdSchema)
          );
          return { artifacts: { testLoss: loss, testAccuracy: accuracy } };
        }
      }),

      defineStep<TrainingParams>({
        name: 'average_scores',
        kind: 'join',
        inputs: 1,
        split: 'cross_validation',
        next: ['register_model'],
        body: async (ctx) => {
          const summaries = aggregateMetrics(ctx.inputs, ['testAccuracy', 'testLoss']);
          const accuracy = summaries.testAccuracy;
          const loss = summaries.testLoss;
          const scores = {
            testAccuracy: accuracy.value,
            testAccuracyStd: accuracy.spread ?? Number.NaN,
            testLoss: loss.value,
            testLossStd: loss.spread ?? Number.NaN
          };

          ctx.logger.info(`Accuracy: ${formatMetric(scores.testAccuracy)} ±${formatMetric(scores.testAccuracyStd)}`);
          ctx.logger.info(`Loss: ${formatMetric(scores.testLoss)} ±${formatMetric(scores.testLossStd)}`);

          await deps.tracker.logMetrics(
            {
              test_accuracy: scores.testAccuracy,
              test_accuracy_std: scores.testAccuracyStd,
              test_loss: scores.testLoss,
              test_loss_std: scores.testLossStd
            },
            ctx.artifacts.parse('trackingRunId', TrackingRunIdSchema)
          );
          return { artifacts: scores };
        }
      }),

      defineStep<TrainingParams>({
        name: 'transform',
        kind: 'linear',
        next: ['train_model'],
        body: async (ctx) => {
          const data = ctx.artifacts.parse('data', DatasetSchema);
          const featuresTransformer = deps.transformers.buildFeaturesTransformer();
          const targetTransformer = deps.transformers.buildTargetTransformer();

          return {
            artifacts: {
              featuresTransformer,
              targetTransformer,
              x: featuresTransformer.fitTransform(data.rows),
              y: targetTransformer.fitTransform(data.rows)
            }
          };
        }
      }),

      defineStep<TrainingParams>({
        name: 'train_model',
        kind: 'linear',
        next: ['register_model'],
        config: trainingConfig,
        body: async (ctx) => {
          const { trainingEpochs, trainingBatchSize } = ctx.run.params;
          const x = ctx.artifacts.parse('x', MatrixSchema);
          const y = ctx.artifacts.parse('y', MatrixSchema);
          ctx.logger.info({ backend: ctx.config.environment?.KERAS_BACKEND, rows: x.length }, 'Training final model');

          const model = deps.models.build(x[0]?.length ?? 0);
          await model.fit(x, y, { epochs: trainingEpochs, batchSize: trainingBatchSize });

          await deps.tracker.logParams(
            { epochs: trainingEpochs, batch_size: trainingBatchSize },
            ctx.artifacts.parse('trackingRunId', TrackingRunIdSchema)
          );
          return { artifacts: { model } };
        }
      }),

      defineStep<TrainingParams>({
        name: 'register_model',
        kind: 'join',
        inputs: 2,
        split: 'start',
        next: ['end'],
        config: { environment: trainingConfig.environment },
        body: async (ctx) => {
          const { accuracyThreshold, registeredModelName } = ctx.run.params;
          // the dataset and the transformed matrices stay behind
          const merged = mergeArtifacts(ctx.inputs, { exclude: ['data', 'x', 'y'] });

          const model = ModelSchema.parse(merged.model);
          const featuresTransformer = TransformerSchema.parse(merged.featuresTransformer);
          const targetTransformer = TransformerSchema.parse(merged.targetTransformer);
          const runId = TrackingRunIdSchema.parse(merged.trackingRunId);

          const outcome = await runGated({
            value: MetricSchema.parse(merged.testAccuracy),
            threshold: accuracyThreshold,
            label: 'Model registration',
            logger: ctx.logger,
            action: () => deps.registry.logModel({
              model,
              artifacts: { model, featuresTransformer, targetTransformer },
              signature: MODEL_SIGNATURE,
              requirements: MODEL_REQUIREMENTS,
              registeredName: registeredModelName,
              runId
            })
          });

          if (outcome.status === 'fired') {
            ctx.logger.info({ ...outcome.result }, `Registered model ${outcome.result.name} version ${outcome.result.version}`);
          }

          return {
            artifacts: {
              ...merged,
              registration: outcome.status,
              registeredModel: outcome.status === 'fired' ? outcome.result : null
            }
          };
        }
      }),

      defineStep<TrainingParams>({
        name: 'end',
        kind: 'linear',
        body: async (ctx) => {
          ctx.logger.info('The pipeline finished successfully.');
        }
      })
    ]
  });
}
