import { describe, expect, it } from 'vitest';
import { MergeConflictError, MissingArtifactError, type Artifacts, type BranchResult } from '@forkline/core';
import {
    ArtifactMap,
    aggregateMetrics,
    collectArtifact,
    maxValue,
    meanStd,
    median,
    mergeArtifacts,
    selectArtifact,
    summarize,
    weightedMean
} from '../src/index';

function branches(...published: Artifacts[]): BranchResult[] {
    const width = published.length;
    return published.map((artifacts, i) => ({
        branch: [{ split: 'cv', index: i + 1, width }],
        index: i + 1,
        input: i,
        artifacts: ArtifactMap.empty().publish('fold', artifacts)
    }));
}

describe('aggregateMetrics', () => {
    it('should report zero spread when every fold scores the same', () => {
        const inputs = branches(...Array.from({ length: 5 }, () => ({ accuracy: 0.8 })));

        const { accuracy } = aggregateMetrics(inputs, ['accuracy']);

        expect(accuracy?.value).toBeCloseTo(0.8, 10);
        expect(accuracy?.spread).toBeCloseTo(0, 10);
    });

    it('should compute the mean and population standard deviation', () => {
        const inputs = branches({ accuracy: 0.6, loss: 0.4 }, { accuracy: 0.7, loss: 0.3 }, { accuracy: 0.8, loss: 0.2 });

        const summaries = aggregateMetrics(inputs, ['accuracy', 'loss']);

        expect(summaries.accuracy?.value).toBeCloseTo(0.7, 10);
        expect(summaries.accuracy?.spread).toBeCloseTo(0.08165, 4);
        expect(summaries.loss?.value).toBeCloseTo(0.3, 10);
    });

    it('should not depend on the order branches arrive in', () => {
        const values = [0.61, 0.73, 0.58, 0.9, 0.77];
        const forward = summarize(values);
        const backward = summarize([...values].reverse());

        expect(backward.value).toBe(forward.value);
        expect(backward.spread).toBe(forward.spread);
    });

    it('should reject non-numeric metric artifacts', () => {
        expect(() => aggregateMetrics(branches({ accuracy: 'high' }), ['accuracy'])).toThrow();
    });

    it('should weigh samples by the named artifact', () => {
        const inputs = branches({ accuracy: 0.5, rows: 1 }, { accuracy: 1, rows: 3 });

        const { accuracy } = aggregateMetrics(inputs, ['accuracy'], { aggregator: weightedMean, weight: 'rows' });

        expect(accuracy?.value).toBeCloseTo(0.875, 10);
    });
});

describe('metric aggregators', () => {
    it('should yield NaN for no samples', () => {
        expect(meanStd([]).value).toBeNaN();
        expect(median([]).value).toBeNaN();
        expect(maxValue([]).value).toBeNaN();
    });

    it('should pick the middle value or the average of the two middle values', () => {
        expect(summarize([3, 1, 2], median).value).toBe(2);
        expect(summarize([4, 1, 3, 2], median).value).toBe(2.5);
    });

    it('should pick the largest value', () => {
        expect(summarize([0.2, 0.9, 0.4], maxValue).value).toBe(0.9);
    });
});

describe('mergeArtifacts', () => {
    it('should forward names whose values agree across branches', () => {
        const inputs = branches({ columns: ['a', 'b'], seed: 1 }, { columns: ['a', 'b'] });

        expect(mergeArtifacts(inputs)).toEqual({ columns: ['a', 'b'], seed: 1 });
    });

    it('should reject differing values for the same name', () => {
        const inputs = branches({ model: 'first' }, { model: 'second' });

        expect(() => mergeArtifacts(inputs)).toThrow(MergeConflictError);
        try {
            mergeArtifacts(inputs);
        } catch (error) {
            expect(error).toBeInstanceOf(MergeConflictError);
            if (error instanceof MergeConflictError) {
                expect(error.artifact).toBe('model');
                expect(error.branches).toEqual(['cv[1/2]', 'cv[2/2]']);
            }
        }
    });

    it('should leave excluded names for the join to resolve', () => {
        const inputs = branches({ model: 'first', scaler: 's' }, { model: 'second', scaler: 's' });

        expect(mergeArtifacts(inputs, { exclude: ['model'] })).toEqual({ scaler: 's' });
    });

    it('should forward only included names and require each to exist', () => {
        const inputs = branches({ model: 'm', scaler: 's' }, { scaler: 's' });

        expect(mergeArtifacts(inputs, { include: ['model'] })).toEqual({ model: 'm' });
        expect(() => mergeArtifacts(inputs, { include: ['encoder'] })).toThrow(MissingArtifactError);
    });
});

describe('collectArtifact and selectArtifact', () => {
    it('should read per-branch values in branch order', () => {
        const inputs = branches({ accuracy: 0.6 }, { accuracy: 0.9 });

        expect(collectArtifact(inputs, 'accuracy')).toEqual([0.6, 0.9]);
        expect(selectArtifact(inputs, 'accuracy', 2)).toBe(0.9);
    });

    it('should name the branch that lacks an artifact', () => {
        const inputs = branches({ accuracy: 0.6 }, {});

        expect(() => collectArtifact(inputs, 'accuracy')).toThrow('Artifact "accuracy" is not visible in branch cv[2/2]');
        expect(() => selectArtifact(inputs, 'accuracy', 3)).toThrow(MissingArtifactError);
    });
});
