import type { Evaluation, FitOptions, Matrix, Model, ModelFactory, TrainingHistory } from '@forkline/core';

export interface FakeModelFactoryOptions {
    /** Handed out to `evaluate` calls in call order, cycling when exhausted. */
    evaluations?: readonly Evaluation[];
    /** Returns the error a `fit` on these rows should throw, or null to succeed. */
    fitError?(x: Matrix): Error | null;
}

export class FakeModel implements Model {
    public readonly fits: Array<{ rows: number; options: FitOptions }> = [];

    public constructor(
        public readonly inputWidth: number,
        private readonly factory: FakeModelFactory
    ) { }

    public async fit(x: Matrix, y: Matrix, options: FitOptions): Promise<TrainingHistory> {
        const error = this.factory.options.fitError?.(x) ?? null;
        if (error) throw error;
        if (x.length !== y.length) {
            throw new Error(`FakeModel: ${x.length} feature rows but ${y.length} target rows`);
        }

        this.fits.push({ rows: x.length, options });
        const epochs = Array.from({ length: options.epochs }, (_, epoch) => epoch + 1);
        return {
            loss: epochs.map((epoch) => 1 / (epoch + 1)),
            accuracy: epochs.map((epoch) => epoch / (epoch + 1))
        };
    }

    public async evaluate(): Promise<Evaluation> {
        if (this.fits.length === 0) {
            throw new Error('FakeModel: evaluate called before fit');
        }
        return this.factory.nextEvaluation();
    }
}

export class FakeModelFactory implements ModelFactory {
    public readonly models: FakeModel[] = [];
    private evaluated = 0;

    public constructor(public readonly options: FakeModelFactoryOptions = {}) { }

    public build(inputWidth: number): Model {
        const model = new FakeModel(inputWidth, this);
        this.models.push(model);
        return model;
    }

    public nextEvaluation(): Evaluation {
        const evaluations = this.options.evaluations ?? [];
        const evaluation = evaluations[this.evaluated % Math.max(evaluations.length, 1)] ?? { loss: 0.5, accuracy: 0.8 };
        this.evaluated += 1;
        return { ...evaluation };
    }
}
