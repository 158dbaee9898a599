import type { DataRow, DataValue, Matrix, Transformer, TransformerFactory } from '@forkline/core';

/**
 * Numeric columns pass through, every other column is one-hot encoded
 * over the categories seen while fitting. Missing values encode as 0.
 */
export class FakeColumnTransformer implements Transformer {
    private categories: Map<string, string[]> | null = null;
    public fitCalls = 0;

    public constructor(private readonly columns: readonly string[]) { }

    public fitTransform(rows: readonly DataRow[]): Matrix {
        this.fitCalls += 1;
        const categories = new Map<string, string[]>();
        for (const column of this.columns) {
            const values = rows.map((row) => row[column]).filter((value): value is string | boolean => typeof value === 'string' || typeof value === 'boolean');
            if (values.length > 0) {
                categories.set(column, [...new Set(values.map(String))].sort());
            }
        }
        this.categories = categories;
        return this.transform(rows);
    }

    public transform(rows: readonly DataRow[]): Matrix {
        const categories = this.categories;
        if (!categories) {
            throw new Error('FakeColumnTransformer: transform called before fitTransform');
        }
        return rows.map((row) => this.columns.flatMap((column) => encode(row[column], categories.get(column))));
    }
}

function encode(value: DataValue | undefined, categories: readonly string[] | undefined): number[] {
    if (categories) {
        return categories.map((category) => (value !== null && value !== undefined && String(value) === category ? 1 : 0));
    }
    return [typeof value === 'number' ? value : 0];
}

export interface FakeTransformerFactoryOptions {
    features: readonly string[];
    target: string;
}

export class FakeTransformerFactory implements TransformerFactory {
    public readonly built: FakeColumnTransformer[] = [];

    public constructor(private readonly options: FakeTransformerFactoryOptions) { }

    public buildFeaturesTransformer(): Transformer {
        return this.track(new FakeColumnTransformer(this.options.features));
    }

    public buildTargetTransformer(): Transformer {
        return this.track(new FakeColumnTransformer([this.options.target]));
    }

    private track(transformer: FakeColumnTransformer): FakeColumnTransformer {
        this.built.push(transformer);
        return transformer;
    }
}
