import type { DataRow } from './dataset';

export type Matrix = readonly (readonly number[])[];

/**
 * A fitted-on-demand preprocessing pipeline turning dataset rows into numbers.
 */
export interface Transformer {
    fitTransform(rows: readonly DataRow[]): Matrix;
    /** Applies a transformer previously fitted with `fitTransform`. */
    transform(rows: readonly DataRow[]): Matrix;
}

export interface TransformerFactory {
    buildFeaturesTransformer(): Transformer;
    buildTargetTransformer(): Transformer;
}
