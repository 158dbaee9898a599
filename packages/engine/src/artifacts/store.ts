import { FlowError, type ArtifactKey, type ArtifactQuery, type ArtifactRecord, type ArtifactStore } from '@forkline/core';

import { freezeArtifact } from './freeze';

function keyOf(key: ArtifactKey): string {
    return JSON.stringify([key.branch, key.step, key.name]);
}

/**
 * In-memory artifact store. Records live as long as the store instance and
 * their plain-data values are frozen on write.
 */
export class InMemoryArtifactStore implements ArtifactStore {
    protected readonly runs = new Map<string, Map<string, ArtifactRecord>>();

    public async put(record: ArtifactRecord): Promise<void> {
        const records = this.runs.get(record.runId) ?? new Map<string, ArtifactRecord>();
        const key = keyOf(record);
        if (records.has(key)) {
            throw new FlowError(`Artifact ${record.name} of step ${record.step} on branch "${record.branch}" was already written in run ${record.runId}`);
        }
        records.set(key, Object.freeze({ ...record, value: freezeArtifact(record.value) }));
        this.runs.set(record.runId, records);
    }

    public async get(key: ArtifactKey): Promise<ArtifactRecord | null> {
        return this.runs.get(key.runId)?.get(keyOf(key)) ?? null;
    }

    public async list(runId: string, query: ArtifactQuery = {}): Promise<ArtifactRecord[]> {
        const records = [...(this.runs.get(runId)?.values() ?? [])];
        return records.filter((record) =>
            (query.branch === undefined || record.branch === query.branch)
            && (query.step === undefined || record.step === query.step)
            && (query.name === undefined || record.name === query.name)
        );
    }
}
