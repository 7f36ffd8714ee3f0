/**
 * Automation API for dependency-ordered stack deployments
 */

export { DeploymentOrchestrator } from './deployment-orchestrator';
export type {
    DeployerContext,
    OrchestrationRequest,
    OrchestratorOptions,
    ValidationReport
} from './deployment-orchestrator';
export { ConfigManager, DEFAULT_ENVIRONMENT_PRIORITY } from './config-manager';
export { VersionResolver } from './version-resolver';
export { CatalogResolver } from './parameter-resolver';
export { StackNameMatcher } from './stack-name-matcher';
export { DependencyGraphBuilder } from './dependency-graph';
export { DeploymentPlanner } from './deployment-planner';
export { ChangeDetector } from './change-detector';
export { DeploymentExecutor, DEFAULT_MAX_PARALLEL } from './deployment-executor';
export type { ExecutionHooks, ExecutionOptions, ExecutionResult } from './deployment-executor';
export { FileStateStore, CloudFormationStateStore } from './state-store';
export { LambdaDeployer } from './lambda-deployer';
export { VersionsFileUpdater } from './versions-file-updater';
export { buildGraphReport, buildPlanReport, renderGraph, renderPlanText } from './graph-report';
export type { GraphFormat, GraphReport, PlanReport } from './graph-report';
export { loadSettings } from './settings';
export type { OrchestratorSettings } from './settings';
export * from './types';
