import type {
    ArtifactSchema,
    JoinStepBody,
    LinearStepBody,
    SplitForeachStepBody,
    SplitStaticStepBody,
    StepConfig,
    StepDefinition
} from '@forkline/core';

interface StepInitBase {
    name: string;
    /** Declared successor names; omitted for the end step. */
    next?: readonly string[];
    config?: StepConfig;
    requires?: ArtifactSchema;
    provides?: ArtifactSchema;
}

export type StepInit<TParams = unknown> =
    | (StepInitBase & { kind: 'linear'; body: LinearStepBody<TParams> })
    | (StepInitBase & { kind: 'split-static'; body: SplitStaticStepBody<TParams> })
    | (StepInitBase & { kind: 'split-foreach'; body: SplitForeachStepBody<TParams> })
    | (StepInitBase & { kind: 'join'; body: JoinStepBody<TParams>; inputs: number; split?: string });

/**
 * Declares a step of the graph. Definitions are frozen; structure is only
 * checked once the whole graph is assembled by `defineFlow`.
 */
export function defineStep<TParams = unknown>(init: StepInit<TParams>): StepDefinition<TParams> {
    const common = {
        name       : init.name,
        successors : Object.freeze([...(init.next ?? [])]),
        config     : Object.freeze({ ...(init.config ?? {}) }),
        requires   : init.requires,
        provides   : init.provides
    };

    switch (init.kind) {
        case 'linear':
            return Object.freeze({ ...common, kind: init.kind, body: init.body });
        case 'split-static':
            return Object.freeze({ ...common, kind: init.kind, body: init.body });
        case 'split-foreach':
            return Object.freeze({ ...common, kind: init.kind, body: init.body });
        case 'join':
            return Object.freeze({ ...common, kind: init.kind, body: init.body, inputs: init.inputs, split: init.split });
    }
}
