export interface ArtifactKey {
    runId: string;
    /** Formatted branch path, `''` on the root path. */
    branch: string;
    step: string;
    name: string;
}

export interface ArtifactRecord extends ArtifactKey {
    value: unknown;
    writtenAt: Date;
}

export interface ArtifactQuery {
    branch?: string;
    step?: string;
    name?: string;
}

/**
 * Run-scoped artifact namespace keyed by `(run, branch, step, name)`.
 * Records are write-once.
 */
export interface ArtifactStore {
    put(record: ArtifactRecord): Promise<void>;
    get(key: ArtifactKey): Promise<ArtifactRecord | null>;
    list(runId: string, query?: ArtifactQuery): Promise<ArtifactRecord[]>;
}
