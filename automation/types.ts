/**
 * Types shared by the stack orchestration engine
 */

/**
 * Reference to an artifact version, either for a whole repository or for one artifact in it
 */
export type VersionReference =
    | { kind: 'repo-wide'; repo: string }
    | { kind: 'hash-based'; repo: string; artifactKey: string };

/**
 * Read-only version lookup table loaded from one versions document
 */
export interface VersionSource {
    readonly origin: string;
    readonly repoWide: ReadonlyMap<string, string>;
    readonly hashBased: ReadonlyMap<string, ReadonlyMap<string, string>>;
}

export type ParameterValue =
    | { kind: 'literal'; value: string }
    | { kind: 'version'; reference: VersionReference }
    | { kind: 'global'; name: string }
    | { kind: 'substitution'; pattern: string }
    | { kind: 'stack'; baseName: string };

export interface StackSpec {
    readonly baseName: string;
    readonly environment: string;
    /** `${baseName}-${environment}`, computed once when the catalog is loaded */
    readonly fullName: string;
    readonly templateFile: string;
    readonly parameters: ReadonlyMap<string, ParameterValue>;
    readonly dependsOn: readonly string[];
    readonly disabled: boolean;
}

export type ExternalDependencyPolicy = 'error' | 'assume-deployed';

export interface CatalogDeploymentOptions {
    maxParallel?: number;
    failFast?: boolean;
    externalDependencies?: ExternalDependencyPolicy;
}

export interface StackCatalog {
    readonly path: string;
    readonly directory: string;
    readonly environment: string;
    readonly globals: ReadonlyMap<string, ParameterValue>;
    /** Every declared stack, disabled ones included */
    readonly stacks: readonly StackSpec[];
    readonly versionFiles: readonly string[];
    readonly environmentPriority: readonly string[];
    readonly deploymentOptions: Readonly<CatalogDeploymentOptions>;
}

export interface TemplateInfo {
    readonly path: string;
    readonly fileName: string;
    readonly body: string;
    /** sha256 hex digest of the body */
    readonly hash: string;
    readonly sourceEnvironment: string;
    readonly declaredParameters: readonly string[];
    /** Declared parameters that carry a Default */
    readonly optionalParameters: readonly string[];
}

export interface ResolvedStack {
    readonly spec: StackSpec;
    readonly template: TemplateInfo;
    readonly parameters: Readonly<Record<string, string>>;
}

export interface ResolvedCatalog {
    readonly catalog: StackCatalog;
    readonly globals: Readonly<Record<string, string>>;
    readonly stacks: ReadonlyMap<string, ResolvedStack>;
    readonly unusedGlobals: readonly string[];
    /** Template file names grouped by the environment they were found in */
    readonly templateSources: Readonly<Record<string, string[]>>;
}

export type EdgeSource = 'declared' | 'parameter';

export interface DependencyEdge {
    /** The dependent stack */
    readonly from: string;
    /** The stack it depends on */
    readonly to: string;
    readonly source: EdgeSource;
}

export interface DependencyGraph {
    readonly nodes: ReadonlyMap<string, StackSpec>;
    readonly dependencies: ReadonlyMap<string, ReadonlySet<string>>;
    readonly dependents: ReadonlyMap<string, ReadonlySet<string>>;
    readonly edges: readonly DependencyEdge[];
    /** Dependencies outside the selection that were assumed to be deployed */
    readonly external: ReadonlyMap<string, readonly string[]>;
}

export interface DeploymentPlan {
    readonly batches: readonly (readonly string[])[];
    readonly dependencies: ReadonlyMap<string, ReadonlySet<string>>;
}

export interface DeployedState {
    fullName: string;
    templateHash: string;
    parameters: Record<string, string>;
    deployedAt?: string;
}

export type ChangeReason = 'forced' | 'first-deploy' | 'template-changed' | 'parameters-changed' | 'unchanged';

export interface ChangeDecision {
    needsDeploy: boolean;
    reason: ChangeReason;
    changedParameters: string[];
}

export type StackStatus = 'deployed' | 'skipped' | 'failed' | 'aborted' | 'planned';

export const STACK_STATUSES: readonly StackStatus[] = ['deployed', 'skipped', 'planned', 'failed', 'aborted'];

export interface StackResult {
    baseName: string;
    fullName: string;
    status: StackStatus;
    batchIndex: number;
    reason?: string;
    blockedBy?: string[];
    change?: ChangeDecision;
    duration?: number;
}

export interface RunSummary {
    deploymentName: string;
    runId: string;
    dryRun: boolean;
    success: boolean;
    cancelled: boolean;
    counts: Record<StackStatus, number>;
    results: StackResult[];
    totalDuration: number;
}

export type DeployOutcome = { success: true } | { success: false; reason: string };

/**
 * External deploy API: deploys one fully resolved stack
 */
export interface StackDeployer {
    deploy(stack: ResolvedStack): Promise<DeployOutcome>;
}

/**
 * Last known deployed state, keyed by full stack name
 */
export interface DeployedStateStore {
    get(fullName: string): Promise<DeployedState | undefined>;
    record(state: DeployedState): Promise<void>;
    /** Checked before execution; throws ConfigError when the stored state is unreadable */
    verify?(): Promise<void>;
}
