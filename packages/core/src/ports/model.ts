import type { Matrix } from './transformer';

export interface FitOptions {
    epochs: number;
    batchSize: number;
}

/** Per-epoch training curves, last entry is the final epoch. */
export interface TrainingHistory {
    loss: readonly number[];
    accuracy: readonly number[];
}

export interface Evaluation {
    loss: number;
    accuracy: number;
}

export interface Model {
    fit(x: Matrix, y: Matrix, options: FitOptions): Promise<TrainingHistory>;
    evaluate(x: Matrix, y: Matrix): Promise<Evaluation>;
}

export interface ModelFactory {
    build(inputWidth: number): Model;
}
