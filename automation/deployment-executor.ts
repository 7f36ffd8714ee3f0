import { ConfigError, toError } from '../shared/utils/error-handling';
import { DeploymentLogger, MetricsCollector } from '../shared/utils/logging';
import {
    ChangeDecision,
    DeploymentPlan,
    DeployOutcome,
    ResolvedStack,
    StackResult,
    StackStatus
} from './types';

export const DEFAULT_MAX_PARALLEL = 4;

/** Outcomes that let dependents proceed */
const SATISFYING_STATUSES: ReadonlySet<StackStatus> = new Set<StackStatus>(['deployed', 'skipped', 'planned']);

export interface ExecutionHooks {
    resolve(baseName: string): ResolvedStack;
    evaluate(stack: ResolvedStack, force: boolean): Promise<ChangeDecision>;
    deploy(stack: ResolvedStack): Promise<DeployOutcome>;
}

export interface ExecutionOptions {
    dryRun?: boolean;
    force?: boolean;
    maxParallel?: number;
    /** Stop dispatching new stacks after the first failure */
    failFast?: boolean;
    /** Run-level cancellation; in-flight stacks finish */
    signal?: AbortSignal;
}

export interface ExecutionResult {
    results: StackResult[];
    cancelled: boolean;
}

export function countStatuses(results: readonly StackResult[]): Record<StackStatus, number> {
    const counts: Record<StackStatus, number> = { deployed: 0, skipped: 0, planned: 0, failed: 0, aborted: 0 };
    results.forEach(result => counts[result.status]++);
    return counts;
}

/**
 * Runs a deployment plan batch by batch with a bounded worker pool per batch
 */
export class DeploymentExecutor {
    private readonly logger?: DeploymentLogger;
    private readonly metrics?: MetricsCollector;

    constructor(logger?: DeploymentLogger, metrics?: MetricsCollector) {
        this.logger = logger;
        this.metrics = metrics;
    }

    /**
     * Execute the plan
     * @param plan Batches in order plus the dependency map used to propagate aborts
     * @param hooks Resolution, change detection and the deploy call
     * @param options Dry run, force, parallelism, fail-fast and cancellation
     * @returns One result per stack, in plan order
     */
    public async execute(
        plan: DeploymentPlan,
        hooks: ExecutionHooks,
        options: ExecutionOptions = {}
    ): Promise<ExecutionResult> {
        const maxParallel = options.maxParallel ?? DEFAULT_MAX_PARALLEL;
        if (!Number.isInteger(maxParallel) || maxParallel < 1) {
            throw new ConfigError('DeploymentExecutor', 'maxParallel', `maxParallel must be a positive integer, got ${maxParallel}`);
        }

        const results = new Map<string, StackResult>();
        let firstFailure: string | undefined;

        const stopReason = (): string | undefined => {
            if (options.signal?.aborted) {
                return 'run cancelled before dispatch';
            }
            if (options.failFast && firstFailure !== undefined) {
                return `fail-fast after failure of ${firstFailure}`;
            }
            return undefined;
        };

        const totalBatches = plan.batches.length;

        for (let index = 0; index < totalBatches; index++) {
            const batch = plan.batches[index];
            const batchIndex = index + 1;

            const stopped = stopReason();
            if (stopped !== undefined) {
                batch.forEach(name => results.set(name, this.abort(name, hooks, batchIndex, stopped)));
                continue;
            }

            this.logger?.batchStart(batchIndex, totalBatches, [...batch]);

            const runnable: string[] = [];
            for (const name of batch) {
                const blockedBy = [...(plan.dependencies.get(name) ?? [])]
                    .filter(dep => {
                        const status = results.get(dep)?.status;
                        return status === undefined || !SATISFYING_STATUSES.has(status);
                    })
                    .sort();
                if (blockedBy.length > 0) {
                    results.set(name, this.abort(name, hooks, batchIndex, `blocked by ${blockedBy.join(', ')}`, blockedBy));
                } else {
                    runnable.push(name);
                }
            }

            let next = 0;
            const worker = async (): Promise<void> => {
                while (next < runnable.length) {
                    const name = runnable[next++];
                    const stopped = stopReason();
                    if (stopped !== undefined) {
                        results.set(name, this.abort(name, hooks, batchIndex, stopped));
                        continue;
                    }

                    const result = await this.runStack(name, hooks, options, batchIndex, totalBatches);
                    if (result.status === 'failed' && firstFailure === undefined) {
                        firstFailure = name;
                    }
                    results.set(name, result);
                }
            };

            await Promise.all(Array.from({ length: Math.min(maxParallel, runnable.length) }, () => worker()));

            const statuses: Record<string, string> = {};
            batch.forEach(name => {
                statuses[name] = results.get(name)?.status ?? 'aborted';
            });
            this.logger?.batchComplete(batchIndex, statuses);
        }

        const ordered = plan.batches.flatMap(batch => batch.map(name => {
            const result = results.get(name);
            if (!result) {
                throw new Error(`No outcome recorded for ${name}`);
            }
            return result;
        }));

        return { results: ordered, cancelled: options.signal?.aborted ?? false };
    }

    private async runStack(
        name: string,
        hooks: ExecutionHooks,
        options: ExecutionOptions,
        batchIndex: number,
        totalBatches: number
    ): Promise<StackResult> {
        const startTime = Date.now();
        let fullName = name;
        let change: ChangeDecision | undefined;

        try {
            const stack = hooks.resolve(name);
            fullName = stack.spec.fullName;
            this.metrics?.startStack(fullName);

            change = await hooks.evaluate(stack, options.force ?? false);
            if (!change.needsDeploy) {
                this.logger?.stackSkipped(fullName);
                return this.complete({ baseName: name, fullName, status: 'skipped', batchIndex, change, reason: change.reason }, startTime);
            }

            if (options.dryRun) {
                this.logger?.stackPlanned(fullName, change.reason);
                return this.complete({ baseName: name, fullName, status: 'planned', batchIndex, change, reason: change.reason }, startTime);
            }

            this.logger?.stackStart(fullName, batchIndex, totalBatches);
            const outcome = await hooks.deploy(stack);
            if (outcome.success) {
                this.logger?.stackDeployed(fullName, Date.now() - startTime);
                return this.complete({ baseName: name, fullName, status: 'deployed', batchIndex, change, reason: change.reason }, startTime);
            }

            this.logger?.stackFailed(fullName, new Error(outcome.reason), Date.now() - startTime);
            return this.complete({ baseName: name, fullName, status: 'failed', batchIndex, change, reason: outcome.reason }, startTime);
        } catch (error) {
            const failure = toError(error);
            this.logger?.stackFailed(fullName, failure, Date.now() - startTime);
            return this.complete({ baseName: name, fullName, status: 'failed', batchIndex, change, reason: failure.message }, startTime);
        }
    }

    private complete(result: StackResult, startTime: number): StackResult {
        result.duration = Date.now() - startTime;
        this.metrics?.completeStack(result.fullName, result.status, result.status === 'failed' ? result.reason : undefined);
        return result;
    }

    private abort(
        name: string,
        hooks: ExecutionHooks,
        batchIndex: number,
        reason: string,
        blockedBy?: string[]
    ): StackResult {
        let fullName = name;
        try {
            fullName = hooks.resolve(name).spec.fullName;
        } catch (error) {
            this.logger?.debug(`Could not resolve ${name} while aborting it: ${toError(error).message}`);
        }

        this.logger?.stackAborted(fullName, reason);
        this.metrics?.completeStack(fullName, 'aborted', reason);
        return { baseName: name, fullName, status: 'aborted', batchIndex, reason, ...(blockedBy ? { blockedBy } : {}) };
    }
}
