import type { Artifacts, BranchPath } from './context';
import type { StepConfig, StepKind } from './graph';
import type { ForeachStepOutput, RunInfo, StepOutput } from './step';

export type RunStatus = 'pending' | 'running' | 'succeeded' | 'failed';

export type StepStatus = 'running' | 'awaiting-join' | 'succeeded' | 'failed' | 'cancelled';

export interface StepRecord {
    step: string;
    kind: StepKind;
    /** Formatted branch path, `''` on the root path. */
    branch: string;
    status: StepStatus;
    startedAt?: Date;
    durationMs?: number;
    /** Branch count spawned by a split. */
    width?: number;
    error?: string;
}

export interface RunFailure {
    /** Name of the originating error class. */
    kind: string;
    message: string;
    step?: string;
    branch?: string;
    error: Error;
}

interface RunResultBase {
    runId: string;
    flow: string;
    steps: readonly StepRecord[];
}

export interface SucceededRun extends RunResultBase {
    status: 'succeeded';
    artifacts: Artifacts;
}

export interface FailedRun extends RunResultBase {
    status: 'failed';
    failure: RunFailure;
}

export type RunResult = SucceededRun | FailedRun;

export interface StepInvocation {
    readonly run: RunInfo;
    readonly step: string;
    readonly kind: StepKind;
    readonly branch: BranchPath;
    readonly config: Readonly<StepConfig>;
}

export type StepBodyOutput = StepOutput | ForeachStepOutput | void;

/**
 * Hook through which an execution substrate wraps every body invocation
 * (retry with backoff, resource placement). Calls to `execute` re-run the body.
 */
export type StepInvoker = (
    invocation: StepInvocation,
    execute: () => Promise<StepBodyOutput>
) => Promise<StepBodyOutput>;

export interface ExecutionHooks {
    onRunStatus?(event: { runId: string; status: RunStatus }): void;
    onStepStart?(event: { step: string; branch: BranchPath; run: RunInfo }): void;
    onStepEnd?(event: { step: string; branch: BranchPath; run: RunInfo; durationMs: number }): void;
    onStepError?(event: { step: string; branch: BranchPath; run: RunInfo; error: unknown }): void;
}
