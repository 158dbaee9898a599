import { isDeepStrictEqual } from 'node:util';
import {
    MergeConflictError,
    MissingArtifactError,
    formatBranchPath,
    type Artifacts,
    type BranchResult
} from '@forkline/core';

export interface MergeOptions {
    /** Only these names are forwarded; each must exist in at least one branch. */
    include?: readonly string[];
    /** Names the join resolves itself (aggregates, picks) and leaves out of the merge. */
    exclude?: readonly string[];
}

function sameValue(left: unknown, right: unknown): boolean {
    return Object.is(left, right) || isDeepStrictEqual(left, right);
}

/**
 * Forwards branch artifacts through a join. A name supplied by several
 * branches is forwarded only when every supplier holds the same value;
 * otherwise `MergeConflictError` is thrown and the join has to resolve it.
 */
export function mergeArtifacts(inputs: readonly BranchResult[], options: MergeOptions = {}): Artifacts {
    const exclude = new Set(options.exclude ?? []);
    const names = options.include ?? [...new Set(inputs.flatMap((input) => input.artifacts.names()))];
    const merged: Record<string, unknown> = {};

    for (const name of names) {
        if (exclude.has(name)) continue;

        const suppliers = inputs.filter((input) => input.artifacts.has(name));
        const [first, ...rest] = suppliers;
        if (!first) {
            throw new MissingArtifactError(name, 'any merged branch');
        }

        const value = first.artifacts.get(name);
        if (rest.some((input) => !sameValue(value, input.artifacts.get(name)))) {
            throw new MergeConflictError(name, suppliers.map((input) => formatBranchPath(input.branch)));
        }
        merged[name] = value;
    }

    return Object.freeze(merged);
}

/**
 * Values of one artifact across all branches, in branch-index order.
 */
export function collectArtifact(inputs: readonly BranchResult[], name: string): unknown[] {
    return inputs.map((input) => {
        if (!input.artifacts.has(name)) {
            throw new MissingArtifactError(name, `branch ${formatBranchPath(input.branch)}`);
        }
        return input.artifacts.get(name);
    });
}

/** Picks one branch as the single source of an artifact. */
export function selectArtifact(inputs: readonly BranchResult[], name: string, index: number): unknown {
    const input = inputs.find((candidate) => candidate.index === index);
    if (!input || !input.artifacts.has(name)) {
        throw new MissingArtifactError(name, `branch #${index}`);
    }
    return input.artifacts.get(name);
}
