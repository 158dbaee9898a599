export interface TrackedRun {
    runId: string;
    name: string;
}

export interface StartRunOptions {
    /** Starts a nested run under this parent. */
    parentRunId?: string;
    tags?: Record<string, string>;
}

/**
 * Experiment tracking backend. Used for observability only; it never
 * drives control flow.
 */
export interface ExperimentTracker {
    startRun(name: string, options?: StartRunOptions): Promise<TrackedRun>;
    logMetrics(metrics: Record<string, number>, runId: string): Promise<void>;
    logParams(params: Record<string, string | number | boolean>, runId: string): Promise<void>;
}
