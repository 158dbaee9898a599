import type { Model } from './model';
import type { Transformer } from './transformer';

export interface ModelSignature {
    input: Record<string, string | number | boolean | null>;
    output: Record<string, string | number | boolean | null>;
    params?: Record<string, string | number | boolean>;
}

export interface ModelPackageArtifacts {
    model: Model;
    featuresTransformer: Transformer;
    targetTransformer: Transformer;
}

export interface LogModelInput {
    model: Model;
    artifacts: ModelPackageArtifacts;
    signature: ModelSignature;
    requirements: readonly string[];
    registeredName: string;
    runId: string;
}

export interface RegisteredModel {
    name: string;
    version: number;
}

export interface ModelRegistry {
    logModel(input: LogModelInput): Promise<RegisteredModel>;
}
