import { z } from 'zod';
import type { Model, Transformer } from '@forkline/core';

const DataValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const DatasetSchema = z.object({
  columns: z.array(z.string()),
  rows: z.array(z.record(DataValueSchema))
});

export const MatrixSchema = z.array(z.array(z.number()));

export const ModelSchema = z.custom<Model>(
  (value) => typeof value === 'object' && value !== null
    && 'fit' in value && typeof value.fit === 'function'
    && 'evaluate' in value && typeof value.evaluate === 'function',
  { message: 'Expected a trained model' }
);

export const TransformerSchema = z.custom<Transformer>(
  (value) => typeof value === 'object' && value !== null
    && 'fitTransform' in value && typeof value.fitTransform === 'function'
    && 'transform' in value && typeof value.transform === 'function',
  { message: 'Expected a fitted transformer' }
);
