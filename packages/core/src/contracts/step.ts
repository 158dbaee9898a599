import type { Logger } from '../ports/logger';
import type { Artifacts, ArtifactView, BranchPath, BranchResult } from './context';
import type { StepConfig } from './graph';

export interface RunInfo<TParams = unknown> {
    readonly runId: string;
    readonly flow: string;
    readonly params: Readonly<TParams>;
}

export interface StepContext<TParams = unknown> {
    readonly run: RunInfo<TParams>;
    readonly step: string;
    readonly branch: BranchPath;
    /** Element of the innermost enclosing foreach, `undefined` outside one. */
    readonly input: unknown;
    readonly artifacts: ArtifactView;
    readonly config: Readonly<StepConfig>;
    readonly logger: Logger;
    /** Aborted when a sibling branch of an enclosing region has failed. */
    readonly signal: AbortSignal;
}

export interface JoinStepContext<TParams = unknown> extends StepContext<TParams> {
    /** Completed branches of the closed region, ordered by branch index. */
    readonly inputs: readonly BranchResult[];
}

export interface StepOutput {
    artifacts?: Artifacts;
    /** Explicit successor selection; must name the declared successors. */
    next?: readonly string[];
}

export interface ForeachStepOutput {
    artifacts?: Artifacts;
    /** One branch is spawned per element. */
    items: Iterable<unknown>;
}

export type LinearStepBody<TParams = unknown> = (context: StepContext<TParams>) => Promise<StepOutput | void>;
export type SplitStaticStepBody<TParams = unknown> = (context: StepContext<TParams>) => Promise<StepOutput | void>;
export type SplitForeachStepBody<TParams = unknown> = (context: StepContext<TParams>) => Promise<ForeachStepOutput>;
export type JoinStepBody<TParams = unknown> = (context: JoinStepContext<TParams>) => Promise<StepOutput | void>;
