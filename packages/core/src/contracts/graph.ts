import type { ZodObject, ZodRawShape, ZodType, ZodTypeDef } from 'zod';

import type { JoinStepBody, LinearStepBody, SplitForeachStepBody, SplitStaticStepBody } from './step';

export type StepKind = 'linear' | 'split-static' | 'split-foreach' | 'join';

export type ArtifactSchema = ZodObject<ZodRawShape>;

/**
 * Declarative execution hints attached to a step.
 * The engine carries them to the step invoker untouched; only the
 * execution substrate gives them meaning.
 */
export interface StepConfig {
    resources?: {
        memoryMb?: number;
        cpu?: number;
    };
    environment?: Record<string, string>;
    /** Upper bound on re-invocations a retrying substrate may attempt for this step. */
    retries?: number;
}

interface StepDefinitionBase<TKind extends StepKind, TBody> {
    readonly name: string;
    readonly kind: TKind;
    readonly body: TBody;
    readonly successors: readonly string[];
    readonly config: Readonly<StepConfig>;
    /** Checked against the inherited artifact view before the body runs. */
    readonly requires?: ArtifactSchema;
    /** Checked against the artifacts the body publishes. */
    readonly provides?: ArtifactSchema;
}

export type LinearStepDefinition<TParams = unknown> = StepDefinitionBase<'linear', LinearStepBody<TParams>>;
export type SplitStaticStepDefinition<TParams = unknown> = StepDefinitionBase<'split-static', SplitStaticStepBody<TParams>>;
export type SplitForeachStepDefinition<TParams = unknown> = StepDefinitionBase<'split-foreach', SplitForeachStepBody<TParams>>;

export interface JoinStepDefinition<TParams = unknown> extends StepDefinitionBase<'join', JoinStepBody<TParams>> {
    /** Number of distinct incoming edges the join expects. */
    readonly inputs: number;
    /** Name of the split this join closes, when declared. */
    readonly split?: string;
}

export type StepDefinition<TParams = unknown> =
    | LinearStepDefinition<TParams>
    | SplitStaticStepDefinition<TParams>
    | SplitForeachStepDefinition<TParams>
    | JoinStepDefinition<TParams>;

export interface GraphTopology {
    readonly start: string;
    readonly end: string;
    /** Step names in a topological order (start first, end last). */
    readonly order: readonly string[];
    readonly predecessors: ReadonlyMap<string, readonly string[]>;
    /** split step → the join that closes its region */
    readonly joinOf: ReadonlyMap<string, string>;
    /** join step → the split whose region it closes */
    readonly splitOf: ReadonlyMap<string, string>;
}

export interface FlowGraph<TParams = unknown, TParamsInput = TParams> {
    readonly name: string;
    readonly params: ZodType<TParams, ZodTypeDef, TParamsInput>;
    readonly topology: GraphTopology;
    step(name: string): StepDefinition<TParams>;
    steps(): readonly StepDefinition<TParams>[];
}
