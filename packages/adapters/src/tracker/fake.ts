import type { ExperimentTracker, StartRunOptions, TrackedRun } from '@forkline/core';

export interface FakeTrackedRun extends TrackedRun {
    parentRunId?: string;
    tags: Record<string, string>;
    metrics: Record<string, number>;
    params: Record<string, string | number | boolean>;
}

export class FakeExperimentTracker implements ExperimentTracker {
    public readonly runs: FakeTrackedRun[] = [];
    private startError: Error | null = null;

    /** Makes every following `startRun` reject, as an unreachable server would. */
    public failStartRun(error: Error = new Error('connect ECONNREFUSED 127.0.0.1:5000')): void {
        this.startError = error;
    }

    public async startRun(name: string, options: StartRunOptions = {}): Promise<TrackedRun> {
        if (this.startError) throw this.startError;
        if (options.parentRunId !== undefined) this.require(options.parentRunId);

        const run: FakeTrackedRun = {
            runId: `tracked-${this.runs.length + 1}`,
            name,
            parentRunId: options.parentRunId,
            tags: { ...(options.tags ?? {}) },
            metrics: {},
            params: {}
        };
        this.runs.push(run);
        return { runId: run.runId, name };
    }

    public async logMetrics(metrics: Record<string, number>, runId: string): Promise<void> {
        Object.assign(this.require(runId).metrics, metrics);
    }

    public async logParams(params: Record<string, string | number | boolean>, runId: string): Promise<void> {
        Object.assign(this.require(runId).params, params);
    }

    public find(name: string): FakeTrackedRun | undefined {
        return this.runs.find((run) => run.name === name);
    }

    private require(runId: string): FakeTrackedRun {
        const run = this.runs.find((candidate) => candidate.runId === runId);
        if (!run) {
            throw new Error(`FakeExperimentTracker: unknown run ${runId}`);
        }
        return run;
    }
}
