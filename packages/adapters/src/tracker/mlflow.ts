import { z } from 'zod';
import type { ExperimentTracker, Logger, StartRunOptions, TrackedRun } from '@forkline/core';

export interface MlflowTrackerOptions {
    trackingUri: string;
    /** Experiment new runs are created in; `0` is the server's default experiment. */
    experimentId?: string;
    fetchImpl?: typeof fetch;
    logger?: Logger;
}

export class MlflowRequestError extends Error {
    public constructor(
        public readonly endpoint: string,
        public readonly status: number,
        detail: string
    ) {
        super(`MLflow request ${endpoint} failed with status ${status}${detail ? `: ${detail}` : ''}`);
        this.name = 'MlflowRequestError';
    }
}

const CreateRunResponseSchema = z.object({
    run: z.object({
        info: z.object({
            run_id: z.string(),
            run_name: z.string().optional()
        })
    })
});

/** Tag MLflow uses to nest a run under its parent. */
const PARENT_RUN_TAG = 'mlflow.parentRunId';

/**
 * `ExperimentTracker` speaking the MLflow tracking REST API.
 */
export class MlflowTracker implements ExperimentTracker {
    private readonly baseUrl: string;
    private readonly experimentId: string;
    private readonly fetchImpl: typeof fetch;

    public constructor(private readonly options: MlflowTrackerOptions) {
        this.baseUrl = options.trackingUri.replace(/\/+$/, '');
        this.experimentId = options.experimentId ?? '0';

        const defaultFetch = typeof globalThis.fetch === 'function' ? globalThis.fetch.bind(globalThis) : undefined;
        const fetchImpl = options.fetchImpl ?? defaultFetch;
        if (!fetchImpl) {
            throw new Error('Fetch API is not available. Provide fetchImpl to reach the MLflow server.');
        }
        this.fetchImpl = fetchImpl;
    }

    public async startRun(name: string, options: StartRunOptions = {}): Promise<TrackedRun> {
        const tags = Object.entries(options.tags ?? {}).map(([key, value]) => ({ key, value }));
        if (options.parentRunId !== undefined) {
            tags.push({ key: PARENT_RUN_TAG, value: options.parentRunId });
        }

        const payload = await this.post('runs/create', {
            experiment_id: this.experimentId,
            run_name: name,
            start_time: Date.now(),
            tags
        });
        const { run } = CreateRunResponseSchema.parse(payload);

        this.options.logger?.debug({ runId: run.info.run_id, parentRunId: options.parentRunId }, `Started MLflow run ${name}`);
        return { runId: run.info.run_id, name: run.info.run_name ?? name };
    }

    public async logMetrics(metrics: Record<string, number>, runId: string): Promise<void> {
        const timestamp = Date.now();
        await this.post('runs/log-batch', {
            run_id: runId,
            metrics: Object.entries(metrics).map(([key, value]) => ({ key, value, timestamp, step: 0 }))
        });
    }

    public async logParams(params: Record<string, string | number | boolean>, runId: string): Promise<void> {
        await this.post('runs/log-batch', {
            run_id: runId,
            params: Object.entries(params).map(([key, value]) => ({ key, value: String(value) }))
        });
    }

    private async post(endpoint: string, body: Record<string, unknown>): Promise<unknown> {
        const response = await this.fetchImpl(`${this.baseUrl}/api/2.0/mlflow/${endpoint}`, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
            body: JSON.stringify(body)
        });

        const text = await response.text();
        if (!response.ok) {
            throw new MlflowRequestError(endpoint, response.status, text.slice(0, 200));
        }
        return text.length > 0 ? JSON.parse(text) : {};
    }
}
