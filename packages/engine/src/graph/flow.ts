import type { ZodType, ZodTypeDef } from 'zod';
import { GraphError, type FlowGraph, type StepDefinition } from '@forkline/core';

import { validateGraph } from './validate';

export interface FlowInit<TParams, TParamsInput> {
    name: string;
    /** Schema of the run-scoped parameters, parsed once when a run starts. */
    params: ZodType<TParams, ZodTypeDef, TParamsInput>;
    steps: readonly StepDefinition<TParams>[];
}

/**
 * Assembles and validates a step graph. The returned graph is immutable.
 */
export function defineFlow<TParams, TParamsInput = TParams>(init: FlowInit<TParams, TParamsInput>): FlowGraph<TParams, TParamsInput> {
    const topology = validateGraph(init.steps);
    const steps = Object.freeze([...init.steps]);
    const byName = new Map(steps.map((step): [string, StepDefinition<TParams>] => [step.name, step]));

    return Object.freeze({
        name: init.name,
        params: init.params,
        topology,
        step(name: string): StepDefinition<TParams> {
            const step = byName.get(name);
            if (!step) {
                throw new GraphError('dangling-successor', `flow ${init.name} has no step ${name}`, [name]);
            }
            return step;
        },
        steps(): readonly StepDefinition<TParams>[] {
            return steps;
        }
    });
}
