export type DataValue = string | number | boolean | null;

export type DataRow = Readonly<Record<string, DataValue>>;

export interface TabularDataset {
    readonly columns: readonly string[];
    readonly rows: readonly DataRow[];
}

export interface DatasetLoader {
    load(): Promise<TabularDataset>;
}
