import { z } from 'zod';
import type { BranchResult } from '@forkline/core';

export interface MetricSample {
    value: number;
    weight: number;
}

export interface MetricSummary {
    value: number;
    /** Dispersion around `value` where the aggregator defines one. */
    spread?: number;
}

/**
 * Combines one metric's per-branch samples into a summary.
 * Aggregators receive samples sorted by value, so their floating-point
 * results do not depend on the order in which branches completed.
 */
export type MetricAggregator = (samples: readonly MetricSample[]) => MetricSummary;

function sum(values: readonly number[]): number {
    let total = 0;
    for (const value of values) total += value;
    return total;
}

/** Arithmetic mean with population standard deviation. */
export const meanStd: MetricAggregator = (samples) => {
    if (samples.length === 0) return { value: Number.NaN, spread: Number.NaN };

    const values = samples.map((sample) => sample.value);
    const mean = sum(values) / values.length;
    const variance = sum(values.map((value) => (value - mean) ** 2)) / values.length;
    return { value: mean, spread: Math.sqrt(variance) };
};

export const median: MetricAggregator = (samples) => {
    if (samples.length === 0) return { value: Number.NaN };

    const values = samples.map((sample) => sample.value);
    const middle = Math.floor(values.length / 2);
    const upper = values[middle] ?? Number.NaN;
    if (values.length % 2 === 1) return { value: upper };
    return { value: ((values[middle - 1] ?? Number.NaN) + upper) / 2 };
};

export const maxValue: MetricAggregator = (samples) => {
    const last = samples[samples.length - 1];
    return { value: last ? last.value : Number.NaN };
};

/** Weighted mean with weighted population standard deviation. */
export const weightedMean: MetricAggregator = (samples) => {
    const totalWeight = sum(samples.map((sample) => sample.weight));
    if (samples.length === 0 || totalWeight === 0) return { value: Number.NaN, spread: Number.NaN };

    const mean = sum(samples.map((sample) => sample.value * sample.weight)) / totalWeight;
    const variance = sum(samples.map((sample) => sample.weight * (sample.value - mean) ** 2)) / totalWeight;
    return { value: mean, spread: Math.sqrt(variance) };
};

export function summarize(values: readonly number[], aggregator: MetricAggregator = meanStd, weights?: readonly number[]): MetricSummary {
    const samples = values
        .map((value, i) => ({ value, weight: weights?.[i] ?? 1 }))
        .sort((a, b) => a.value - b.value || a.weight - b.weight);
    return aggregator(samples);
}

export interface AggregateOptions {
    aggregator?: MetricAggregator;
    /** Artifact holding each branch's sample weight; every branch weighs 1 when omitted. */
    weight?: string;
}

const MetricValueSchema = z.number();

/**
 * Summarizes numeric artifacts across the branches reaching a join.
 */
export function aggregateMetrics(
    inputs: readonly BranchResult[],
    names: readonly string[],
    options: AggregateOptions = {}
): Record<string, MetricSummary> {
    const weightName = options.weight;
    const weights = weightName === undefined
        ? undefined
        : inputs.map((input) => input.artifacts.parse(weightName, MetricValueSchema));

    const summaries: Record<string, MetricSummary> = {};
    for (const name of names) {
        const values = inputs.map((input) => input.artifacts.parse(name, MetricValueSchema));
        summaries[name] = summarize(values, options.aggregator, weights);
    }
    return summaries;
}
