import { describe, expect, it } from 'vitest';
import { createKFold } from '../src/index';

describe('createKFold', () => {
  it('gives the first folds one extra test row', () => {
    const folds = createKFold(9, 4, { shuffle: false });

    expect(folds.map((fold) => fold.testIndices)).toEqual([[0, 1, 2], [3, 4], [5, 6], [7, 8]]);
    expect(folds.map((fold) => fold.trainIndices.length)).toEqual([6, 7, 7, 7]);
    expect(folds.map((fold) => fold.fold)).toEqual([1, 2, 3, 4]);
  });

  it('covers every row exactly once across shuffled test sets', () => {
    let seed = 7;
    const random = () => {
      seed = (seed * 16807) % 2147483647;
      return (seed - 1) / 2147483646;
    };

    const folds = createKFold(20, 5, { random });
    const tested = folds.flatMap((fold) => fold.testIndices).sort((a, b) => a - b);

    expect(tested).toEqual(Array.from({ length: 20 }, (_, i) => i));
    for (const fold of folds) {
      expect(fold.testIndices).toHaveLength(4);
      expect(fold.trainIndices.filter((index) => fold.testIndices.includes(index))).toEqual([]);
    }
  });

  it('shuffles with the given random source', () => {
    const folds = createKFold(4, 2, { random: () => 0 });

    // always swapping with the front yields [1, 2, 3, 0]
    expect(folds.map((fold) => fold.testIndices)).toEqual([[1, 2], [0, 3]]);
  });

  it('rejects impossible splits', () => {
    expect(() => createKFold(3, 5)).toThrow(RangeError);
    expect(() => createKFold(10, 1)).toThrow(RangeError);
  });
});
