import { z } from 'zod';

export const FoldSchema = z.object({
  /** 1-based, equal to the fold's branch index. */
  fold: z.number().int().positive(),
  trainIndices: z.array(z.number().int().nonnegative()),
  testIndices: z.array(z.number().int().nonnegative())
});

export type Fold = z.infer<typeof FoldSchema>;

export interface KFoldOptions {
  shuffle?: boolean;
  /** Uniform source in [0, 1); `Math.random` by default. */
  random?: () => number;
}

/**
 * Splits `rowCount` row indices into `folds` disjoint test sets. The first
 * `rowCount % folds` test sets hold one extra row; each fold trains on
 * every row outside its test set.
 */
export function createKFold(rowCount: number, folds: number, options: KFoldOptions = {}): Fold[] {
  if (!Number.isInteger(folds) || folds < 2) {
    throw new RangeError(`k-fold cross-validation needs at least 2 folds, got ${folds}`);
  }
  if (!Number.isInteger(rowCount) || rowCount < folds) {
    throw new RangeError(`cannot split ${rowCount} rows into ${folds} folds`);
  }

  const { shuffle = true, random = Math.random } = options;
  const indices = Array.from({ length: rowCount }, (_, i) => i);
  if (shuffle) {
    for (let i = indices.length - 1; i > 0; i -= 1) {
      const j = Math.floor(random() * (i + 1));
      const picked = indices[j];
      const current = indices[i];
      if (picked === undefined || current === undefined) continue;
      indices[i] = picked;
      indices[j] = current;
    }
  }

  const base = Math.floor(rowCount / folds);
  const extra = rowCount % folds;
  const result: Fold[] = [];
  let start = 0;

  for (let fold = 0; fold < folds; fold += 1) {
    const size = base + (fold < extra ? 1 : 0);
    const test = new Set(indices.slice(start, start + size));
    start += size;

    result.push({
      fold: fold + 1,
      trainIndices: indices.filter((index) => !test.has(index)).sort((a, b) => a - b),
      testIndices: [...test].sort((a, b) => a - b)
    });
  }

  return result;
}
