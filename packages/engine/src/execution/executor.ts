import { randomUUID } from 'node:crypto';
import {
    ENGINE_DEFAULTS,
    EmptyForeachError,
    FlowError,
    InvalidParametersError,
    RunInitializationError,
    StepContractError,
    StepExecutionError,
    formatBranchPath,
    type ArtifactSchema,
    type ArtifactStore,
    type Artifacts,
    type BranchPath,
    type BranchResult,
    type EmptyForeachPolicy,
    type ExecutionHooks,
    type FlowGraph,
    type ForeachStepOutput,
    type JoinStepDefinition,
    type Logger,
    type RunFailure,
    type RunInfo,
    type RunResult,
    type RunStatus,
    type SplitForeachStepDefinition,
    type SplitStaticStepDefinition,
    type StepBodyOutput,
    type StepContext,
    type StepDefinition,
    type StepInvocation,
    type StepInvoker,
    type StepOutput,
    type StepRecord,
    type StepStatus
} from '@forkline/core';

import { InMemoryArtifactStore } from '../artifacts/store';
import { INITIALIZE_STEP, createRootBranch, forkBranch, publishArtifacts, toBranchResult, type BranchState } from './context';
import { silentLogger } from './logger';
import { StepSlots } from './slots';

export interface FlowExecutorOptions {
    logger?: Logger;
    /** Where published artifacts are recorded; an in-memory store by default. */
    store?: ArtifactStore;
    hooks?: ExecutionHooks;
    /** Substrate hook wrapping every body invocation (retries, placement). */
    invokeStep?: StepInvoker;
    emptyForeach?: EmptyForeachPolicy;
    maxParallelSteps?: number;
}

export interface RunOptions<TParams> {
    runId?: string;
    /**
     * Runs before the start step; returned artifacts are visible to every
     * step. A throw fails the run with `RunInitializationError`.
     */
    initialize?(run: RunInfo<TParams>): Promise<Artifacts | void>;
}

const invokeDirectly: StepInvoker = (_invocation, execute) => execute();

/** Raised on branches told to stop because a sibling failed. */
class BranchCancelledError extends FlowError {
    public constructor(branch: string) {
        super(`Branch ${branch || '(root)'} stopped after a sibling branch failed`);
        this.name = 'BranchCancelledError';
    }
}

type SplitStepDefinition<TParams> = SplitStaticStepDefinition<TParams> | SplitForeachStepDefinition<TParams>;

interface StepRun {
    state: BranchState;
    /** Elements produced by a foreach split, empty for other kinds. */
    items: unknown[];
}

function isForeachOutput(output: StepBodyOutput): output is ForeachStepOutput {
    return typeof output === 'object' && output !== null && 'items' in output;
}

function sameMembers(left: readonly string[], right: readonly string[]): boolean {
    return left.length === right.length && left.every((name) => right.includes(name));
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function checkContract(step: string, stage: 'requires' | 'provides', schema: ArtifactSchema, artifacts: Artifacts): void {
    const parsed = schema.safeParse(artifacts);
    if (!parsed.success) {
        throw new StepContractError({ step, stage, issues: parsed.error.issues });
    }
}

function describeFailure(error: unknown): RunFailure {
    if (error instanceof StepExecutionError) {
        const cause = error.cause;
        const kind = cause instanceof FlowError && !(cause instanceof StepExecutionError) ? cause.name : error.name;
        return { kind, message: error.message, step: error.step, branch: error.branch, error };
    }
    const failure = error instanceof Error ? error : new Error(String(error));
    return { kind: failure.name, message: failure.message, error: failure };
}

/**
 * Walks one run of a flow. Sequential paths run step by step; every split
 * spawns one concurrent walk per branch and runs its join once all of them
 * have succeeded.
 */
class FlowRun<TParams, TParamsInput> {
    public readonly records: StepRecord[] = [];

    public constructor(
        private readonly graph: FlowGraph<TParams, TParamsInput>,
        private readonly run: RunInfo<TParams>,
        private readonly store: ArtifactStore,
        private readonly logger: Logger,
        private readonly slots: StepSlots,
        private readonly invokeStep: StepInvoker,
        private readonly emptyForeach: EmptyForeachPolicy,
        private readonly hooks: ExecutionHooks
    ) { }

    /**
     * Runs from `from` until the end step, or until reaching `stopAt`
     * (the join of the region this branch belongs to, which is not run here).
     */
    public async walk(from: string | undefined, state: BranchState, stopAt?: string): Promise<BranchState> {
        let name = from;
        let current = state;

        while (name !== undefined) {
            const step = this.graph.step(name);
            if (step.kind === 'join') {
                if (name === stopAt) return current;
                throw new FlowError(`Reached join ${name} outside of the region it closes`);
            }

            if (current.signal.aborted) {
                throw new BranchCancelledError(formatBranchPath(current.branch));
            }

            if (step.kind === 'linear') {
                current = (await this.execute(step, current)).state;
                name = step.successors[0];
            } else {
                const joined = await this.region(step, current);
                current = joined.state;
                name = joined.next;
            }
        }

        return current;
    }

    private async region(split: SplitStepDefinition<TParams>, state: BranchState): Promise<{ state: BranchState; next: string | undefined }> {
        const join = this.joinFor(split.name);
        const { state: parent, items } = await this.execute(split, state);

        const branches = split.kind === 'split-static'
            ? split.successors.map((successor) => ({ successor, input: parent.input }))
            : items.map((item) => ({ successor: split.successors[0], input: item }));
        const width = branches.length;

        const joinRecord = this.record(join, parent.branch, 'awaiting-join');
        this.logger.debug({ split: split.name, join: join.name, width, branch: formatBranchPath(parent.branch) }, 'Spawning parallel region');

        const controller = new AbortController();
        const relayAbort = (): void => controller.abort();
        parent.signal.addEventListener('abort', relayAbort, { once: true });
        if (parent.signal.aborted) controller.abort();

        const failures: unknown[] = [];
        let settled: PromiseSettledResult<BranchState>[];
        try {
            settled = await Promise.allSettled(branches.map(async (branch, i) => {
                const child = forkBranch(parent, { split: split.name, index: i + 1, width }, branch.input, controller.signal);
                try {
                    return await this.walk(branch.successor, child, join.name);
                } catch (error) {
                    if (!(error instanceof BranchCancelledError)) failures.push(error);
                    controller.abort();
                    throw error;
                }
            }));
        } finally {
            parent.signal.removeEventListener('abort', relayAbort);
        }

        const rejected = settled.find((result): result is PromiseRejectedResult => result.status === 'rejected');
        if (failures.length > 0 || rejected) {
            joinRecord.status = 'cancelled';
            this.logger.warn({ split: split.name, join: join.name, failed: failures.length }, 'Parallel region failed; join will not run');
            throw failures.length > 0 ? failures[0] : rejected?.reason;
        }

        if (parent.signal.aborted) {
            joinRecord.status = 'cancelled';
            throw new BranchCancelledError(formatBranchPath(parent.branch));
        }

        const inputs = settled.flatMap((result) => (result.status === 'fulfilled' ? [toBranchResult(result.value)] : []));
        const joined = await this.execute(join, parent, { inputs, record: joinRecord });
        return { state: joined.state, next: join.successors[0] };
    }

    private joinFor(split: string): JoinStepDefinition<TParams> {
        const name = this.graph.topology.joinOf.get(split);
        const join = name === undefined ? undefined : this.graph.step(name);
        if (!join || join.kind !== 'join') {
            throw new FlowError(`Split ${split} has no matching join`);
        }
        return join;
    }

    private record(step: StepDefinition<TParams>, branch: BranchPath, status: StepStatus): StepRecord {
        const record: StepRecord = { step: step.name, kind: step.kind, branch: formatBranchPath(branch), status };
        this.records.push(record);
        return record;
    }

    private async execute(
        step: StepDefinition<TParams>,
        state: BranchState,
        join?: { inputs: readonly BranchResult[]; record: StepRecord }
    ): Promise<StepRun> {
        const branch = formatBranchPath(state.branch);
        const record = join?.record ?? this.record(step, state.branch, 'running');
        const logger = this.logger.child({ step: step.name, branch });
        const event = { step: step.name, branch: state.branch, run: this.run };
        const startedAt = Date.now();

        record.status = 'running';
        record.startedAt = new Date(startedAt);
        try {
            this.hooks.onStepStart?.(event);
            logger.debug('Step started');

            if (step.requires) {
                checkContract(step.name, 'requires', step.requires, state.artifacts.toRecord());
            }

            const context: StepContext<TParams> = {
                run: this.run,
                step: step.name,
                branch: state.branch,
                input: state.input,
                artifacts: state.artifacts,
                config: step.config,
                logger,
                signal: state.signal
            };
            const invocation: StepInvocation = {
                run: this.run,
                step: step.name,
                kind: step.kind,
                branch: state.branch,
                config: step.config
            };

            // a slot is held only while the body runs, not across invoker retries
            const output = await this.invokeStep(invocation, () =>
                this.slots.run(() => this.callBody(step, context, join?.inputs ?? []))
            );
            const { artifacts, items } = this.interpret(step, output);

            if (step.provides) {
                checkContract(step.name, 'provides', step.provides, artifacts);
            }
            await this.persist(step.name, branch, artifacts);

            const durationMs = Date.now() - startedAt;
            record.status = 'succeeded';
            record.durationMs = durationMs;
            if (step.kind === 'split-static') record.width = step.successors.length;
            if (step.kind === 'split-foreach') record.width = items.length;

            this.hooks.onStepEnd?.({ ...event, durationMs });
            logger.debug({ durationMs, artifacts: Object.keys(artifacts) }, 'Step completed');

            return { state: publishArtifacts(state, step.name, artifacts), items };
        } catch (error) {
            record.status = 'failed';
            record.durationMs = Date.now() - startedAt;
            record.error = errorMessage(error);

            this.hooks.onStepError?.({ ...event, error });
            logger.error({ err: error }, 'Step failed');

            throw new StepExecutionError({ step: step.name, branch, cause: error });
        }
    }

    private async callBody(step: StepDefinition<TParams>, context: StepContext<TParams>, inputs: readonly BranchResult[]): Promise<StepBodyOutput> {
        switch (step.kind) {
            case 'join':
                return step.body({ ...context, inputs });
            default:
                return step.body(context);
        }
    }

    private interpret(step: StepDefinition<TParams>, output: StepBodyOutput): { artifacts: Artifacts; items: unknown[] } {
        if (step.kind === 'split-foreach') {
            if (!isForeachOutput(output)) {
                throw new FlowError(`Foreach step ${step.name} returned no items to iterate`);
            }
            const items = Array.from(output.items);
            if (items.length === 0 && this.emptyForeach === 'fail') {
                throw new EmptyForeachError(step.name);
            }
            return { artifacts: output.artifacts ?? {}, items };
        }

        if (isForeachOutput(output)) {
            throw new FlowError(`Step ${step.name} is ${step.kind} and cannot return foreach items`);
        }

        const result: StepOutput = output ?? {};
        if (result.next !== undefined && !sameMembers(result.next, step.successors)) {
            throw new FlowError(`Step ${step.name} selected [${result.next.join(', ')}] but declares [${step.successors.join(', ')}]`);
        }
        return { artifacts: result.artifacts ?? {}, items: [] };
    }

    private async persist(step: string, branch: string, artifacts: Artifacts): Promise<void> {
        const writtenAt = new Date();
        await Promise.all(
            Object.entries(artifacts).map(([name, value]) =>
                this.store.put({ runId: this.run.runId, branch, step, name, value, writtenAt })
            )
        );
    }
}

/**
 * Executes runs of a validated flow graph.
 */
export class FlowExecutor<TParams, TParamsInput = TParams> {
    private readonly store: ArtifactStore;
    private readonly maxParallelSteps: number;

    public constructor(
        private readonly graph: FlowGraph<TParams, TParamsInput>,
        private readonly options: FlowExecutorOptions = {}
    ) {
        this.store = options.store ?? new InMemoryArtifactStore();
        this.maxParallelSteps = options.maxParallelSteps ?? ENGINE_DEFAULTS.MAX_PARALLEL_STEPS;
        if (!Number.isInteger(this.maxParallelSteps) || this.maxParallelSteps < 1) {
            throw new RangeError(`maxParallelSteps must be a positive integer, got ${this.maxParallelSteps}`);
        }
    }

    public get artifacts(): ArtifactStore {
        return this.store;
    }

    /**
     * Runs the flow once. Step failures are reported in the returned result;
     * parameters that do not match the flow's schema throw
     * `InvalidParametersError` before a run exists.
     */
    public async run(params: TParamsInput, options: RunOptions<TParams> = {}): Promise<RunResult> {
        const parsed = this.graph.params.safeParse(params);
        if (!parsed.success) {
            throw new InvalidParametersError(this.graph.name, parsed.error.issues);
        }

        const run: RunInfo<TParams> = Object.freeze({
            runId: options.runId ?? randomUUID(),
            flow: this.graph.name,
            params: Object.freeze(parsed.data)
        });
        const logger = (this.options.logger ?? silentLogger).child({ runId: run.runId, flow: run.flow });
        const hooks = this.options.hooks ?? {};
        const setStatus = (status: RunStatus): void => hooks.onRunStatus?.({ runId: run.runId, status });

        setStatus('pending');

        let initial: Artifacts = {};
        if (options.initialize) {
            try {
                initial = (await options.initialize(run)) ?? {};
                await this.persistInitial(run.runId, initial);
            } catch (error) {
                const failure = error instanceof RunInitializationError
                    ? error
                    : new RunInitializationError(`Run ${run.runId} failed to initialize: ${errorMessage(error)}`, { cause: error });

                logger.error({ err: failure }, 'Run initialization failed');
                setStatus('failed');
                return {
                    status: 'failed',
                    runId: run.runId,
                    flow: run.flow,
                    steps: [],
                    failure: { kind: failure.name, message: failure.message, error: failure }
                };
            }
        }

        const execution = new FlowRun(
            this.graph,
            run,
            this.store,
            logger,
            new StepSlots(this.maxParallelSteps),
            this.options.invokeStep ?? invokeDirectly,
            this.options.emptyForeach ?? ENGINE_DEFAULTS.EMPTY_FOREACH,
            hooks
        );

        setStatus('running');
        logger.info({ start: this.graph.topology.start }, 'Run started');

        const controller = new AbortController();
        try {
            const final = await execution.walk(this.graph.topology.start, createRootBranch(controller.signal, initial));

            setStatus('succeeded');
            logger.info({ steps: execution.records.length }, 'Run succeeded');
            return {
                status: 'succeeded',
                runId: run.runId,
                flow: run.flow,
                steps: execution.records.map((record) => ({ ...record })),
                artifacts: final.artifacts.toRecord()
            };
        } catch (error) {
            const failure = describeFailure(error);

            setStatus('failed');
            logger.error({ kind: failure.kind, step: failure.step, branch: failure.branch }, `Run failed: ${failure.message}`);
            return {
                status: 'failed',
                runId: run.runId,
                flow: run.flow,
                steps: execution.records.map((record) => ({ ...record })),
                failure
            };
        }
    }

    private async persistInitial(runId: string, initial: Artifacts): Promise<void> {
        const writtenAt = new Date();
        await Promise.all(
            Object.entries(initial).map(([name, value]) =>
                this.store.put({ runId, branch: '', step: INITIALIZE_STEP, name, value, writtenAt })
            )
        );
    }
}
