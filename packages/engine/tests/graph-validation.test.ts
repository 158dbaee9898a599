import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { GraphError } from '@forkline/core';
import { defineFlow, defineStep, validateGraph } from '../src/index';

const noop = async () => undefined;

const linear = (name: string, next: string[] = []) => defineStep({ name, kind: 'linear', body: noop, next });
const split = (name: string, next: string[]) => defineStep({ name, kind: 'split-static', body: noop, next });
const foreach = (name: string, next: string) => defineStep({ name, kind: 'split-foreach', body: async () => ({ items: [] }), next: [next] });
const join = (name: string, inputs: number, next: string[] = [], splitName?: string) =>
    defineStep({ name, kind: 'join', body: noop, inputs, next, split: splitName });

function graphErrorOf(run: () => unknown): GraphError {
    try {
        run();
    } catch (error) {
        if (error instanceof GraphError) return error;
        throw error;
    }
    throw new Error('expected a GraphError');
}

describe('validateGraph', () => {
    it('accepts a static split that converges at one join', () => {
        const topology = validateGraph([
            split('start', ['a', 'b']),
            linear('a', ['merge']),
            linear('b', ['merge']),
            join('merge', 2, ['end']),
            linear('end')
        ]);

        expect(topology.start).toBe('start');
        expect(topology.end).toBe('end');
        expect(topology.joinOf.get('start')).toBe('merge');
        expect(topology.splitOf.get('merge')).toBe('start');
        expect(topology.order[0]).toBe('start');
        expect(topology.order[topology.order.length - 1]).toBe('end');
        expect(topology.predecessors.get('merge')).toEqual(['a', 'b']);
    });

    it('pairs nested foreach regions inside sibling branches', () => {
        const topology = validateGraph([
            split('start', ['cross_validation', 'transform']),
            foreach('cross_validation', 'fold'),
            linear('fold', ['average']),
            join('average', 1, ['register'], 'cross_validation'),
            linear('transform', ['train']),
            linear('train', ['register']),
            join('register', 2, ['end'], 'start'),
            linear('end')
        ]);

        expect(topology.joinOf.get('cross_validation')).toBe('average');
        expect(topology.joinOf.get('start')).toBe('register');
        expect(topology.splitOf.get('register')).toBe('start');
    });

    it('rejects a successor that is not defined', () => {
        const error = graphErrorOf(() => validateGraph([linear('start', ['missing'])]));
        expect(error.code).toBe('dangling-successor');
        expect(error.steps).toEqual(['start', 'missing']);
    });

    it('rejects a step defined twice', () => {
        const error = graphErrorOf(() => validateGraph([linear('start', ['end']), linear('end'), linear('end')]));
        expect(error.code).toBe('duplicate-step');
    });

    it('reports the steps of a cycle', () => {
        const error = graphErrorOf(() => validateGraph([
            linear('start', ['a']),
            linear('a', ['b']),
            linear('b', ['a'])
        ]));

        expect(error.code).toBe('cycle');
        expect(error.message).toContain('a → b → a');
    });

    it('rejects more than one start step', () => {
        const error = graphErrorOf(() => validateGraph([linear('s1', ['end']), linear('s2', ['end']), linear('end')]));
        expect(error.code).toBe('start-node');
        expect(error.steps).toEqual(['s1', 's2']);
    });

    it('rejects more than one end step', () => {
        const error = graphErrorOf(() => validateGraph([split('start', ['a', 'b']), linear('a'), linear('b')]));
        expect(error.code).toBe('end-node');
        expect(error.steps).toEqual(['a', 'b']);
    });

    it('rejects a join whose declared inputs differ from its incoming edges', () => {
        const error = graphErrorOf(() => validateGraph([
            split('start', ['a', 'b']),
            linear('a', ['merge']),
            linear('b', ['merge']),
            join('merge', 3, ['end']),
            linear('end')
        ]));

        expect(error.code).toBe('join-arity');
    });

    it('rejects a static split with a single successor', () => {
        const error = graphErrorOf(() => validateGraph([split('start', ['end']), linear('end')]));
        expect(error.code).toBe('successor-count');
    });

    it('rejects a split missing the join for one of its branches before running anything', () => {
        const build = () => defineFlow({
            name: 'broken',
            params: z.object({}),
            steps: [
                split('start', ['a', 'b']),
                linear('a', ['merge']),
                join('merge', 1, ['end']),
                linear('b', ['end']),
                linear('end')
            ]
        });

        expect(build).toThrow(GraphError);
        expect(graphErrorOf(build).code).toBe('unmatched-merge');
    });

    it('rejects a foreach region that never joins', () => {
        const error = graphErrorOf(() => validateGraph([
            linear('start', ['cv']),
            foreach('cv', 'fold'),
            linear('fold', ['end']),
            linear('end')
        ]));

        expect(error.code).toBe('region');
        expect(error.message).toContain('split cv has no matching join before end step end');
    });

    it('rejects a join that merges branches from overlapping regions', () => {
        const error = graphErrorOf(() => validateGraph([
            split('start', ['a', 'b']),
            foreach('a', 'c'),
            linear('c', ['merge']),
            linear('b', ['merge']),
            join('merge', 2, ['end']),
            linear('end')
        ]));

        expect(error.code).toBe('region');
    });

    it('rejects a join that declares a different split than the one it closes', () => {
        const error = graphErrorOf(() => validateGraph([
            split('start', ['a', 'b']),
            linear('a', ['merge']),
            linear('b', ['merge']),
            join('merge', 2, ['end'], 'a'),
            linear('end')
        ]));

        expect(error.code).toBe('region');
        expect(error.message).toContain('declares split a but closes start');
    });
});

describe('defineFlow', () => {
    it('returns an immutable graph', () => {
        const flow = defineFlow({
            name: 'tiny',
            params: z.object({}),
            steps: [linear('start', ['end']), linear('end')]
        });

        expect(Object.isFrozen(flow)).toBe(true);
        expect(Object.isFrozen(flow.steps())).toBe(true);
        expect(Object.isFrozen(flow.step('start'))).toBe(true);
        expect(() => flow.step('nope')).toThrow(GraphError);
    });
});
