import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { ConfigError, OrchestrationError, toError } from '../shared/utils/error-handling';
import {
    DeploymentLogger,
    LogLevel,
    MetricsCollector,
    PerformanceMonitor
} from '../shared/utils/logging';
import { createAwsClients } from './aws-clients';
import { ChangeDetector } from './change-detector';
import { ConfigManager } from './config-manager';
import { DependencyGraphBuilder } from './dependency-graph';
import { countStatuses, DeploymentExecutor, ExecutionHooks, ExecutionResult } from './deployment-executor';
import { DeploymentPlanner } from './deployment-planner';
import { buildGraphReport, buildPlanReport, GraphReport, PlanReport } from './graph-report';
import { LambdaDeployer } from './lambda-deployer';
import { CatalogResolver } from './parameter-resolver';
import { loadSettings, OrchestratorSettings } from './settings';
import { StackNameMatcher } from './stack-name-matcher';
import { CloudFormationStateStore, FileStateStore } from './state-store';
import { VersionResolver } from './version-resolver';
import {
    DependencyGraph,
    DeployedStateStore,
    DeploymentPlan,
    ExternalDependencyPolicy,
    ResolvedCatalog,
    RunSummary,
    StackCatalog,
    StackDeployer,
    STACK_STATUSES
} from './types';

export interface OrchestrationRequest {
    catalogPath: string;
    /** Versions files consulted before the catalog's own repo_versions_file entries */
    versionFiles?: string[];
    /** Base or full name of a single stack */
    stack?: string;
    dryRun?: boolean;
    force?: boolean;
    maxParallel?: number;
    failFast?: boolean;
    /** Stop dispatching new stacks after this many seconds */
    timeoutSeconds?: number;
    externalDependencies?: ExternalDependencyPolicy;
    overrideGlobalsFile?: string;
    metricsFile?: string;
    signal?: AbortSignal;
    verbose?: boolean;
}

export interface DeployerContext {
    logger: DeploymentLogger;
    metrics: MetricsCollector;
    settings: OrchestratorSettings;
}

export interface OrchestratorOptions {
    settings?: OrchestratorSettings;
    /** Variables for catalog substitution */
    env?: NodeJS.ProcessEnv;
    createDeployer?: (context: DeployerContext) => StackDeployer;
    createStateStore?: (environment: string, settings: OrchestratorSettings) => DeployedStateStore;
    /** Epoch seconds for the __timestamp__ global */
    timestamp?: () => number;
}

export interface ValidationReport {
    environment: string;
    totalStacks: number;
    disabledStacks: string[];
    selectedStacks: string[];
    batches: number;
    versionSources: string[];
    unusedGlobals: string[];
}

interface PreparedRun {
    catalog: StackCatalog;
    resolved: ResolvedCatalog;
    graph: DependencyGraph;
    plan: DeploymentPlan;
    versionSources: string[];
}

/**
 * Deployment orchestration: resolve, select, plan and execute
 */
export class DeploymentOrchestrator {
    private readonly options: OrchestratorOptions;

    constructor(options: OrchestratorOptions = {}) {
        this.options = options;
    }

    /**
     * Plan, detect changes and execute
     * @param request Catalog, selection and execution options
     * @returns Run summary with one result per selected stack
     * @throws Pre-execution errors before any deploy call is made
     */
    public async deploy(request: OrchestrationRequest): Promise<RunSummary> {
        const runId = uuidv4();
        const deploymentName = this.deploymentName(request.catalogPath);
        const logger = this.createLogger(deploymentName, runId, request);
        const metrics = new MetricsCollector(deploymentName, runId);
        const monitor = PerformanceMonitor.start('deploy', logger);
        const settings = this.settings();
        const dryRun = request.dryRun ?? false;

        let prepared: PreparedRun;
        let deployer: StackDeployer | undefined;
        try {
            prepared = this.prepare(request, logger);
            deployer = dryRun ? undefined : this.createDeployer({ logger, metrics, settings });
        } catch (error) {
            logger.error('Deployment could not be prepared', toError(error));
            throw error;
        }

        const { catalog, resolved, plan } = prepared;
        const store = this.createStateStore(catalog.environment, settings);
        try {
            await store.verify?.();
        } catch (error) {
            logger.error('Deployed state could not be read', toError(error));
            throw error;
        }
        const executor = new DeploymentExecutor(logger, metrics);

        const hooks: ExecutionHooks = {
            resolve: name => {
                const stack = resolved.stacks.get(name);
                if (!stack) {
                    throw new OrchestrationError('DeploymentOrchestrator', name, `Stack ${name} was not resolved`);
                }
                return stack;
            },
            evaluate: async (stack, force) => ChangeDetector.evaluate(stack, await store.get(stack.spec.fullName), force),
            deploy: async stack => {
                if (!deployer) {
                    throw new OrchestrationError('DeploymentOrchestrator', stack.spec.fullName, 'No deployer configured');
                }
                const outcome = await deployer.deploy(stack);
                if (outcome.success) {
                    try {
                        await store.record(ChangeDetector.toState(stack));
                    } catch (error) {
                        logger.error(`Failed to record deployed state of ${stack.spec.fullName}`, toError(error));
                    }
                }
                return outcome;
            }
        };

        const controller = new AbortController();
        const abort = (): void => controller.abort();
        request.signal?.addEventListener('abort', abort);
        if (request.signal?.aborted) {
            controller.abort();
        }
        const timer = request.timeoutSeconds !== undefined
            ? setTimeout(abort, request.timeoutSeconds * 1000)
            : undefined;

        const totalStacks = plan.batches.reduce((total, batch) => total + batch.length, 0);
        logger.runStart('deploy', totalStacks, dryRun);

        let execution: ExecutionResult;
        try {
            execution = await executor.execute(plan, hooks, {
                dryRun,
                force: request.force ?? false,
                maxParallel: request.maxParallel ?? catalog.deploymentOptions.maxParallel ?? settings.maxParallel,
                failFast: request.failFast ?? catalog.deploymentOptions.failFast ?? false,
                signal: controller.signal
            });
        } finally {
            if (timer !== undefined) {
                clearTimeout(timer);
            }
            request.signal?.removeEventListener('abort', abort);
        }

        const counts = countStatuses(execution.results);
        const totalDuration = monitor.end({ runId });
        const summary: RunSummary = {
            deploymentName,
            runId,
            dryRun,
            success: counts.failed === 0,
            cancelled: execution.cancelled,
            counts,
            results: execution.results,
            totalDuration
        };

        logger.runComplete(counts, totalDuration);
        this.printSummary(summary);

        if (request.metricsFile) {
            fs.writeFileSync(request.metricsFile, metrics.exportMetrics(), 'utf8');
            logger.info('Deployment metrics written', { metricsFile: request.metricsFile });
        }

        return summary;
    }

    /**
     * Resolve, select and order stacks without change detection or execution
     */
    public async plan(request: OrchestrationRequest): Promise<PlanReport> {
        const logger = this.createLogger(this.deploymentName(request.catalogPath), uuidv4(), request);
        const { catalog, resolved, graph, plan } = this.prepare(request, logger);
        return buildPlanReport(catalog.environment, plan, graph, resolved.stacks);
    }

    /**
     * Dependency graph of the selected stacks
     */
    public async dumpGraph(request: OrchestrationRequest): Promise<GraphReport> {
        const logger = this.createLogger(this.deploymentName(request.catalogPath), uuidv4(), request);
        const { catalog, graph } = this.prepare(request, logger);
        return buildGraphReport(catalog.environment, graph);
    }

    /**
     * Run every pre-execution check
     */
    public async validate(request: OrchestrationRequest): Promise<ValidationReport> {
        const logger = this.createLogger(this.deploymentName(request.catalogPath), uuidv4(), request);
        const { catalog, resolved, plan, versionSources } = this.prepare(request, logger);
        return {
            environment: catalog.environment,
            totalStacks: catalog.stacks.length,
            disabledStacks: catalog.stacks.filter(stack => stack.disabled).map(stack => stack.baseName),
            selectedStacks: plan.batches.flat(),
            batches: plan.batches.length,
            versionSources,
            unusedGlobals: [...resolved.unusedGlobals]
        };
    }

    /**
     * Catalog, version sources, resolution, selection, graph and plan: a fresh set per call
     */
    private prepare(request: OrchestrationRequest, logger: DeploymentLogger): PreparedRun {
        const monitor = PerformanceMonitor.start('prepare', logger);

        const overrideGlobals = request.overrideGlobalsFile
            ? ConfigManager.loadOverrideGlobals(request.overrideGlobalsFile)
            : {};
        const catalog = ConfigManager.loadCatalog(request.catalogPath, {
            env: this.options.env,
            overrideGlobals
        });

        const versionSources = [
            ...(request.versionFiles ?? []).map(file => path.resolve(file)),
            ...catalog.versionFiles
        ];
        const sources = VersionResolver.loadVersionSources(versionSources);
        logger.versionSourcesLoaded(versionSources);

        const resolver = new CatalogResolver(catalog, sources, { timestamp: this.options.timestamp?.() });
        const resolved = resolver.resolve();
        logger.templateSources(resolved.templateSources);
        logger.unusedGlobals([...resolved.unusedGlobals]);

        const enabled = catalog.stacks.filter(stack => !stack.disabled);
        const selected = StackNameMatcher.match(request.stack, enabled);
        logger.stackSelection(request.stack, selected.map(stack => stack.fullName));

        const graph = new DependencyGraphBuilder().build(selected, {
            catalogNames: catalog.stacks.map(stack => stack.baseName),
            externalDependencies: request.externalDependencies ??
                catalog.deploymentOptions.externalDependencies ??
                'error'
        });
        logger.externalDependencies(
            Object.fromEntries([...graph.external.entries()].map(([name, deps]) => [name, [...deps]]))
        );

        const plan = new DeploymentPlanner().plan(graph);
        logger.planComputed(plan.batches.map(batch => [...batch]));

        monitor.end({ stacks: selected.length });
        return { catalog, resolved, graph, plan, versionSources };
    }

    private createDeployer(context: DeployerContext): StackDeployer {
        if (this.options.createDeployer) {
            return this.options.createDeployer(context);
        }

        const functionName = context.settings.functionName;
        if (!functionName) {
            throw new ConfigError(
                'DeploymentOrchestrator',
                'deployer',
                'A deployer function name is required (--function-name or STACK_ORCHESTRATOR_FUNCTION_NAME)'
            );
        }

        const clients = createAwsClients(context.settings.region);
        return new LambdaDeployer({
            functionName,
            lambda: clients.lambda,
            cloudFormation: clients.cloudFormation,
            logger: context.logger,
            onRetry: stackName => context.metrics.recordRetry(stackName)
        });
    }

    private createStateStore(environment: string, settings: OrchestratorSettings): DeployedStateStore {
        if (this.options.createStateStore) {
            return this.options.createStateStore(environment, settings);
        }
        if (settings.stateBackend === 'cloudformation') {
            return new CloudFormationStateStore(createAwsClients(settings.region).cloudFormation);
        }
        return new FileStateStore(settings.stateDirectory, environment);
    }

    private settings(): OrchestratorSettings {
        return this.options.settings ?? loadSettings();
    }

    private createLogger(deploymentName: string, runId: string, request: OrchestrationRequest): DeploymentLogger {
        return new DeploymentLogger(deploymentName, {
            runId,
            minLevel: request.verbose ? LogLevel.DEBUG : undefined
        });
    }

    private deploymentName(catalogPath: string): string {
        return path.basename(catalogPath, path.extname(catalogPath));
    }

    private printSummary(summary: RunSummary): void {
        // Skip printing during tests
        if (process.env.NODE_ENV === 'test' || process.env.JEST_WORKER_ID) {
            return;
        }

        const duration = (summary.totalDuration / 1000).toFixed(1);
        const mode = summary.dryRun ? ' (dry run)' : '';
        const breakdown = STACK_STATUSES
            .filter(status => summary.counts[status] > 0)
            .map(status => `${status} ${summary.counts[status]}`)
            .join(', ');

        console.log(`\n${'='.repeat(60)}`);
        console.log(`📊 ${summary.deploymentName}${mode} | ${breakdown || 'no stacks'} | ${duration}s`);

        for (const status of STACK_STATUSES) {
            const results = summary.results.filter(result => result.status === status);
            if (results.length === 0) {
                continue;
            }
            console.log(`\n${status} (${results.length}):`);
            results.forEach(result => {
                const detail = result.reason ? result.reason.split('\n')[0].substring(0, 60) : '';
                console.log(`   ${result.fullName.padEnd(40)} ${detail}`);
            });
        }
        console.log(`${'='.repeat(60)}`);
    }
}
