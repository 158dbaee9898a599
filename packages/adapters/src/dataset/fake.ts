import type { DatasetLoader, TabularDataset } from '@forkline/core';

export class FakeDatasetLoader implements DatasetLoader {
    public loads = 0;

    public constructor(private readonly dataset: TabularDataset) { }

    public async load(): Promise<TabularDataset> {
        this.loads += 1;
        return this.dataset;
    }
}
