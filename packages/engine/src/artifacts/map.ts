import type { ZodType, ZodTypeDef } from 'zod';
import { MissingArtifactError, type Artifacts, type ArtifactView } from '@forkline/core';

import { freezeArtifact } from './freeze';

interface ArtifactEntry {
    readonly value: unknown;
    readonly step: string;
}

/**
 * Immutable artifact view. Publishing returns a new map and freezes the
 * published plain data, so a branch that forks from a context holds a
 * snapshot no sibling can change. Class instances are shared by reference.
 */
export class ArtifactMap implements ArtifactView {
    private constructor(private readonly entries: ReadonlyMap<string, ArtifactEntry>) { }

    public static empty(): ArtifactMap {
        return new ArtifactMap(new Map());
    }

    /** Returns a new map with `artifacts` published by `step`, shadowing earlier values. */
    public publish(step: string, artifacts: Artifacts): ArtifactMap {
        const names = Object.keys(artifacts);
        if (names.length === 0) return this;

        const next = new Map(this.entries);
        for (const name of names) {
            next.set(name, { value: freezeArtifact(artifacts[name]), step });
        }
        return new ArtifactMap(next);
    }

    public has(name: string): boolean {
        return this.entries.has(name);
    }

    public get(name: string): unknown {
        const entry = this.entries.get(name);
        if (!entry) {
            throw new MissingArtifactError(name);
        }
        return entry.value;
    }

    public find(name: string): unknown | undefined {
        return this.entries.get(name)?.value;
    }

    public parse<T>(name: string, schema: ZodType<T, ZodTypeDef, unknown>): T {
        return schema.parse(this.get(name));
    }

    public producer(name: string): string | undefined {
        return this.entries.get(name)?.step;
    }

    public names(): readonly string[] {
        return [...this.entries.keys()];
    }

    public toRecord(): Artifacts {
        return Object.freeze(Object.fromEntries([...this.entries].map(([name, entry]) => [name, entry.value])));
    }
}
