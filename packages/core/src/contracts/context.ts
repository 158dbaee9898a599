import type { ZodType, ZodTypeDef } from 'zod';

/** One fork taken at an ancestor split; `index` is 1-based. */
export interface BranchSegment {
    readonly split: string;
    readonly index: number;
    readonly width: number;
}

/** Forks taken from the start node to the current branch, outermost first. */
export type BranchPath = readonly BranchSegment[];

export type Artifacts = Readonly<Record<string, unknown>>;

/**
 * Read-only view of the artifacts visible to a step on its branch.
 */
export interface ArtifactView {
    has(name: string): boolean;
    /** Throws `MissingArtifactError` when the name is not visible. */
    get(name: string): unknown;
    find(name: string): unknown | undefined;
    /** Reads an artifact and validates it against a zod schema. */
    parse<T>(name: string, schema: ZodType<T, ZodTypeDef, unknown>): T;
    /** Name of the step that produced the visible value. */
    producer(name: string): string | undefined;
    names(): readonly string[];
    toRecord(): Artifacts;
}

/**
 * A completed branch as seen by its join.
 */
export interface BranchResult {
    readonly branch: BranchPath;
    readonly index: number;
    /** Foreach element the branch was spawned with; static branches carry the inherited input. */
    readonly input: unknown;
    readonly artifacts: ArtifactView;
}
