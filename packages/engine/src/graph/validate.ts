import { GraphError, type GraphTopology } from '@forkline/core';

/** The structural part of a step definition. */
export type GraphNode =
    | { readonly name: string; readonly kind: 'linear' | 'split-static' | 'split-foreach'; readonly successors: readonly string[] }
    | { readonly name: string; readonly kind: 'join'; readonly successors: readonly string[]; readonly inputs: number; readonly split?: string };

function checkNames(steps: readonly GraphNode[]): Map<string, GraphNode> {
    const byName = new Map<string, GraphNode>();
    for (const step of steps) {
        if (byName.has(step.name)) {
            throw new GraphError('duplicate-step', `step ${step.name} is defined more than once`, [step.name]);
        }
        byName.set(step.name, step);
    }

    for (const step of steps) {
        for (const successor of step.successors) {
            if (!byName.has(successor)) {
                throw new GraphError('dangling-successor', `step ${step.name} names undefined successor ${successor}`, [step.name, successor]);
            }
        }
    }
    return byName;
}

function checkSuccessorCounts(steps: readonly GraphNode[]): void {
    for (const step of steps) {
        const count = step.successors.length;
        if (new Set(step.successors).size !== count) {
            throw new GraphError('successor-count', `step ${step.name} lists a successor more than once`, [step.name]);
        }

        const ok =
            step.kind === 'split-static' ? count >= 2
            : step.kind === 'split-foreach' ? count === 1
            : count <= 1;

        if (!ok) {
            const expected =
                step.kind === 'split-static' ? 'at least 2'
                : step.kind === 'split-foreach' ? 'exactly 1'
                : 'at most 1';
            throw new GraphError('successor-count', `${step.kind} step ${step.name} has ${count} successors, expected ${expected}`, [step.name]);
        }
    }
}

function findCycle(steps: readonly GraphNode[], byName: Map<string, GraphNode>): string[] | null {
    const state = new Map<string, 'visiting' | 'done'>();
    const trail: string[] = [];

    const visit = (name: string): string[] | null => {
        const seen = state.get(name);
        if (seen === 'done') return null;
        if (seen === 'visiting') {
            return [...trail.slice(trail.indexOf(name)), name];
        }

        state.set(name, 'visiting');
        trail.push(name);
        for (const successor of byName.get(name)?.successors ?? []) {
            const cycle = visit(successor);
            if (cycle) return cycle;
        }
        trail.pop();
        state.set(name, 'done');
        return null;
    };

    for (const step of steps) {
        const cycle = visit(step.name);
        if (cycle) return cycle;
    }
    return null;
}

function topologicalOrder(steps: readonly GraphNode[], predecessors: Map<string, string[]>): string[] {
    const remaining = new Map(steps.map((step): [string, number] => [step.name, predecessors.get(step.name)?.length ?? 0]));
    const queue = steps.filter((step) => remaining.get(step.name) === 0).map((step) => step.name);
    const byName = new Map(steps.map((step): [string, GraphNode] => [step.name, step]));
    const order: string[] = [];

    while (queue.length > 0) {
        const name = queue.shift();
        if (name === undefined) break;
        order.push(name);
        for (const successor of byName.get(name)?.successors ?? []) {
            const left = (remaining.get(successor) ?? 0) - 1;
            remaining.set(successor, left);
            if (left === 0) queue.push(successor);
        }
    }
    return order;
}

/**
 * Walks the graph in topological order tracking the stack of open splits.
 * Every join closes the innermost open split; all of its incoming edges
 * must come from inside that one region.
 */
function pairRegions(
    order: readonly string[],
    byName: Map<string, GraphNode>,
    predecessors: Map<string, string[]>,
    end: string
): { joinOf: Map<string, string>; splitOf: Map<string, string> } {
    const stacks = new Map<string, readonly string[]>();
    const joinOf = new Map<string, string>();
    const splitOf = new Map<string, string>();

    const outgoing = (name: string): readonly string[] => {
        const step = byName.get(name);
        const stack = stacks.get(name) ?? [];
        return step && (step.kind === 'split-static' || step.kind === 'split-foreach') ? [...stack, name] : stack;
    };

    for (const name of order) {
        const step = byName.get(name);
        const incoming = (predecessors.get(name) ?? []).map(outgoing);

        if (!step) continue;
        if (step.kind !== 'join') {
            stacks.set(name, incoming[0] ?? []);
            continue;
        }

        const first = incoming[0] ?? [];
        const consistent = incoming.every((stack) => stack.length === first.length && stack.every((entry, i) => entry === first[i]));
        if (!consistent) {
            throw new GraphError('region', `join ${name} merges branches that belong to different parallel regions`, [name]);
        }

        const split = first[first.length - 1];
        if (split === undefined) {
            throw new GraphError('region', `join ${name} has no open split to close`, [name]);
        }
        if (step.split !== undefined && step.split !== split) {
            throw new GraphError('region', `join ${name} declares split ${step.split} but closes ${split}`, [name, split]);
        }

        const existing = joinOf.get(split);
        if (existing !== undefined && existing !== name) {
            throw new GraphError('region', `split ${split} converges at more than one join (${existing}, ${name})`, [split, existing, name]);
        }

        const splitStep = byName.get(split);
        const branches = splitStep?.kind === 'split-static' ? splitStep.successors.length : 1;
        if (incoming.length !== branches) {
            throw new GraphError('region', `join ${name} closes split ${split} with ${branches} branch(es) but has ${incoming.length} incoming edge(s)`, [name, split]);
        }

        joinOf.set(split, name);
        splitOf.set(name, split);
        stacks.set(name, first.slice(0, -1));
    }

    const open = stacks.get(end) ?? [];
    if (open.length > 0) {
        throw new GraphError('region', `split ${open[open.length - 1]} has no matching join before end step ${end}`, [...open]);
    }

    for (const name of order) {
        const step = byName.get(name);
        if (step && (step.kind === 'split-static' || step.kind === 'split-foreach') && !joinOf.has(name)) {
            throw new GraphError('region', `split ${name} has no matching join`, [name]);
        }
    }

    return { joinOf, splitOf };
}

/**
 * Checks the structural invariants of a step graph and returns its
 * topology. Throws `GraphError` on the first defect found.
 */
export function validateGraph(steps: readonly GraphNode[]): GraphTopology {
    const byName = checkNames(steps);
    checkSuccessorCounts(steps);

    const cycle = findCycle(steps, byName);
    if (cycle) {
        throw new GraphError('cycle', `cycle detected: ${cycle.join(' → ')}`, cycle.slice(0, -1));
    }

    const predecessors = new Map(steps.map((step): [string, string[]] => [step.name, []]));
    for (const step of steps) {
        for (const successor of step.successors) {
            predecessors.get(successor)?.push(step.name);
        }
    }

    const starts = steps.filter((step) => (predecessors.get(step.name) ?? []).length === 0).map((step) => step.name);
    if (starts.length !== 1) {
        throw new GraphError('start-node', `expected exactly one start step, found ${starts.length}${starts.length ? ` (${starts.join(', ')})` : ''}`, starts);
    }

    const ends = steps.filter((step) => step.successors.length === 0).map((step) => step.name);
    if (ends.length !== 1) {
        throw new GraphError('end-node', `expected exactly one end step, found ${ends.length}${ends.length ? ` (${ends.join(', ')})` : ''}`, ends);
    }

    for (const step of steps) {
        const incoming = predecessors.get(step.name) ?? [];
        if (step.kind === 'join') {
            if (incoming.length !== step.inputs) {
                throw new GraphError('join-arity', `join ${step.name} declares ${step.inputs} input(s) but has ${incoming.length} incoming edge(s)`, [step.name]);
            }
        } else if (incoming.length > 1) {
            throw new GraphError('unmatched-merge', `step ${step.name} has ${incoming.length} predecessors (${incoming.join(', ')}) but is not a join`, [step.name]);
        }
    }

    const [start] = starts;
    const [end] = ends;
    if (start === undefined || end === undefined) {
        throw new GraphError('start-node', 'graph has no steps');
    }

    const order = topologicalOrder(steps, predecessors);
    const { joinOf, splitOf } = pairRegions(order, byName, predecessors, end);

    return {
        start,
        end,
        order: Object.freeze(order),
        predecessors: new Map([...predecessors].map(([name, list]): [string, readonly string[]] => [name, Object.freeze([...list])])),
        joinOf,
        splitOf
    };
}
