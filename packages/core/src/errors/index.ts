import type { ZodIssue } from 'zod';

import { formatIssues } from '../utils/issues';

export class FlowError extends Error {
    public constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'FlowError';
    }
}

export type GraphErrorCode =
    | 'duplicate-step'
    | 'dangling-successor'
    | 'cycle'
    | 'start-node'
    | 'end-node'
    | 'successor-count'
    | 'join-arity'
    | 'unmatched-merge'
    | 'region';

/** Structural defect found while validating a step graph. */
export class GraphError extends FlowError {
    public readonly code: GraphErrorCode;
    public readonly steps: readonly string[];

    public constructor(code: GraphErrorCode, message: string, steps: readonly string[] = []) {
        super(`Invalid step graph (${code}): ${message}`);
        this.name  = 'GraphError';
        this.code  = code;
        this.steps = steps;
    }
}

export class InvalidParametersError extends FlowError {
    public readonly issues: ZodIssue[];

    public constructor(flow: string, issues: ZodIssue[]) {
        super(`Invalid run parameters for flow ${flow}: ${formatIssues(issues)}`);
        this.name   = 'InvalidParametersError';
        this.issues = issues;
    }
}

export class RunInitializationError extends FlowError {
    public constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'RunInitializationError';
    }
}

export class StepExecutionError extends FlowError {
    public readonly step: string;
    /** Formatted branch path the step ran on. */
    public readonly branch: string;

    public constructor(options: { step: string; branch: string; message?: string; cause?: unknown }) {
        const where = options.branch ? `${options.step} @ ${options.branch}` : options.step;
        const reason = options.message
            ?? (options.cause instanceof Error ? options.cause.message : String(options.cause));
        super(`Step ${where} failed: ${reason}`, { cause: options.cause });
        this.name   = 'StepExecutionError';
        this.step   = options.step;
        this.branch = options.branch;
    }
}

export class EmptyForeachError extends FlowError {
    public readonly step: string;

    public constructor(step: string) {
        super(`Foreach step ${step} produced no elements`);
        this.name = 'EmptyForeachError';
        this.step = step;
    }
}

/**
 * Raised when branches converging at a join supply different values for an
 * artifact that is forwarded without an explicit resolution.
 */
export class MergeConflictError extends FlowError {
    public readonly artifact: string;
    public readonly branches: readonly string[];

    public constructor(artifact: string, branches: readonly string[]) {
        super(`Artifact "${artifact}" has conflicting values across branches ${branches.join(', ')}; select one source or aggregate it explicitly`);
        this.name     = 'MergeConflictError';
        this.artifact = artifact;
        this.branches = branches;
    }
}

export class MissingArtifactError extends FlowError {
    public readonly artifact: string;

    public constructor(artifact: string, where?: string) {
        super(where ? `Artifact "${artifact}" is not visible in ${where}` : `Artifact "${artifact}" is not visible`);
        this.name     = 'MissingArtifactError';
        this.artifact = artifact;
    }
}

export class StepContractError extends FlowError {
    public readonly step: string;
    public readonly stage: 'requires' | 'provides';
    public readonly issues: ZodIssue[];

    public constructor(options: { step: string; stage: 'requires' | 'provides'; issues: ZodIssue[] }) {
        super(`[${options.step}] ${options.stage} validation failed: ${formatIssues(options.issues)}`);
        this.name   = 'StepContractError';
        this.step   = options.step;
        this.stage  = options.stage;
        this.issues = options.issues;
    }
}
