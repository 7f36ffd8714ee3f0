import {
    DeploymentOrchestrator,
    GraphFormat,
    OrchestrationRequest,
    OrchestratorOptions,
    PlanReport,
    renderGraph,
    renderPlanText,
    RunSummary,
    ValidationReport
} from './automation';

/**
 * Programmatic entry point for catalog deployments
 */
export class StackOrchestration {
    private orchestrator: DeploymentOrchestrator;

    constructor(options?: OrchestratorOptions) {
        this.orchestrator = new DeploymentOrchestrator(options);
    }

    /**
     * Deploy the stacks of a catalog in dependency order
     */
    async deployFromCatalog(catalogPath: string, options?: Omit<OrchestrationRequest, 'catalogPath'>): Promise<RunSummary> {
        return this.orchestrator.deploy({ ...options, catalogPath });
    }

    /**
     * Report what would be deployed; no deploy calls are made
     */
    async previewCatalog(catalogPath: string, options?: Omit<OrchestrationRequest, 'catalogPath' | 'dryRun'>): Promise<RunSummary> {
        return this.orchestrator.deploy({ ...options, catalogPath, dryRun: true });
    }

    /**
     * Deployment batches of a catalog
     */
    async planCatalog(catalogPath: string, options?: Omit<OrchestrationRequest, 'catalogPath'>): Promise<PlanReport> {
        return this.orchestrator.plan({ ...options, catalogPath });
    }

    /**
     * Deployment batches rendered as text, parameter values included when verbose
     */
    async describePlan(catalogPath: string, options?: Omit<OrchestrationRequest, 'catalogPath'>): Promise<string> {
        const report = await this.planCatalog(catalogPath, options);
        return renderPlanText(report, options?.verbose ?? false);
    }

    /**
     * Dependency graph of a catalog rendered in the given format
     */
    async renderDependencyGraph(
        catalogPath: string,
        format: GraphFormat = 'text',
        options?: Omit<OrchestrationRequest, 'catalogPath'>
    ): Promise<string> {
        const report = await this.orchestrator.dumpGraph({ ...options, catalogPath });
        return renderGraph(report, format);
    }

    /**
     * Run every pre-execution check of a catalog
     */
    async validateCatalog(catalogPath: string, options?: Omit<OrchestrationRequest, 'catalogPath'>): Promise<ValidationReport> {
        return this.orchestrator.validate({ ...options, catalogPath });
    }
}

export * from './automation';
export * from './shared/utils/error-handling';
export { DeploymentLogger, LogLevel, MetricsCollector, PerformanceMonitor } from './shared/utils/logging';
