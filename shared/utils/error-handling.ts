/**
 * Error types and recovery helpers shared by the orchestration engine
 */
export class OrchestrationError extends Error {
    public readonly component: string;
    public readonly subject: string;
    public readonly errorCode: string;
    public readonly timestamp: Date;
    public readonly context?: Record<string, unknown>;

    constructor(
        component: string,
        subject: string,
        message: string,
        errorCode: string = 'ORCHESTRATION_ERROR',
        context?: Record<string, unknown>
    ) {
        super(`[${component}:${subject}] ${message}`);
        this.name = 'OrchestrationError';
        this.component = component;
        this.subject = subject;
        this.errorCode = errorCode;
        this.timestamp = new Date();
        this.context = context;
    }
}

/**
 * Malformed catalog, version source or template. Always raised before any deploy call.
 */
export class ConfigError extends OrchestrationError {
    public readonly issues: string[];

    constructor(component: string, subject: string, issues: string[] | string, context?: Record<string, unknown>) {
        const list = Array.isArray(issues) ? issues : [issues];
        const message = list.length === 1
            ? list[0]
            : `${list.length} configuration problems:\n${list.map(issue => `  - ${issue}`).join('\n')}`;

        super(component, subject, message, 'CONFIG_ERROR', { issues: list, ...context });
        this.name = 'ConfigError';
        this.issues = list;
    }
}

export interface UnresolvedReference {
    /** Stack full name, or `globals` for a catalog-level value */
    owner: string;
    parameter?: string;
    reference: string;
    reason: string;
}

export class UnresolvedVersionError extends OrchestrationError {
    public readonly failures: UnresolvedReference[];

    constructor(subject: string, failures: UnresolvedReference[]) {
        const lines = failures.map(failure => {
            const where = failure.parameter ? `${failure.owner}.${failure.parameter}` : failure.owner;
            return `  - ${where}: ${failure.reference} (${failure.reason})`;
        });

        super(
            'VersionResolver',
            subject,
            `${failures.length} version reference(s) could not be resolved:\n${lines.join('\n')}`,
            'UNRESOLVED_VERSION',
            { failures }
        );
        this.name = 'UnresolvedVersionError';
        this.failures = failures;
    }
}

export class StackNotFoundError extends OrchestrationError {
    public readonly requested: string;
    public readonly availableBaseNames: string[];
    public readonly availableFullNames: string[];

    constructor(requested: string, availableBaseNames: string[], availableFullNames: string[]) {
        const message = [
            `Stack name '${requested}' does not match any available stack.`,
            'Available stack names (without environment suffix):',
            ...availableBaseNames.map(name => `  - ${name}`),
            'Available full stack names:',
            ...availableFullNames.map(name => `  - ${name}`),
            'Either the base name or the full name may be used.'
        ].join('\n');

        super('StackNameMatcher', requested, message, 'STACK_NOT_FOUND', {
            availableBaseNames,
            availableFullNames
        });
        this.name = 'StackNotFoundError';
        this.requested = requested;
        this.availableBaseNames = availableBaseNames;
        this.availableFullNames = availableFullNames;
    }
}

export class CyclicDependencyError extends OrchestrationError {
    public readonly cycle: string[];

    constructor(cycle: string[]) {
        const path = [...cycle, cycle[0]].join(' -> ');
        super('DependencyGraphBuilder', cycle[0] ?? 'unknown', `Circular dependency detected: ${path}`, 'CYCLIC_DEPENDENCY', {
            cycle
        });
        this.name = 'CyclicDependencyError';
        this.cycle = cycle;
    }
}

export class DeployCallError extends OrchestrationError {
    public readonly stackName: string;

    constructor(stackName: string, message: string, context?: Record<string, unknown>) {
        super('StackDeployer', stackName, message, 'DEPLOY_CALL_FAILED', context);
        this.name = 'DeployCallError';
        this.stackName = stackName;
    }
}

/**
 * True for errors that stop a run before any stack is dispatched.
 */
export function isPreExecutionError(error: unknown): boolean {
    return error instanceof ConfigError ||
        error instanceof UnresolvedVersionError ||
        error instanceof StackNotFoundError ||
        error instanceof CyclicDependencyError;
}

/**
 * Run a parse step, appending the issues of a ConfigError it throws instead of failing
 */
export function collectConfigIssues(issues: string[], parse: () => void): void {
    try {
        parse();
    } catch (error) {
        if (!(error instanceof ConfigError)) {
            throw error;
        }
        issues.push(...error.issues);
    }
}

export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}

/**
 * Error recovery strategies
 */
export enum RecoveryStrategy {
    RETRY = 'retry',
    FAIL_FAST = 'fail_fast'
}

export interface RecoveryOptions {
    strategy: RecoveryStrategy;
    maxRetries?: number;
    retryDelay?: number;
    backoffMultiplier?: number;
    /** Upper bound of random jitter added to each delay, in milliseconds */
    jitter?: number;
    /** Only errors accepted by this predicate are retried */
    retryCondition?: (error: Error) => boolean;
    onRetry?: (attempt: number, maxAttempts: number, delay: number, error: Error) => void;
}

/**
 * Error handler with retry and back-off
 */
export class ErrorHandler {
    private static readonly DEFAULT_RETRY_DELAY = 1000;
    private static readonly DEFAULT_MAX_RETRIES = 3;
    private static readonly DEFAULT_BACKOFF_MULTIPLIER = 2;

    /**
     * Execute an operation, retrying it according to the recovery options
     */
    public static async executeWithRecovery<T>(
        operation: () => Promise<T>,
        operationName: string,
        component: string,
        subject: string,
        options: RecoveryOptions
    ): Promise<T> {
        const maxRetries = options.maxRetries ?? this.DEFAULT_MAX_RETRIES;
        let attempt = 0;

        while (true) {
            try {
                return await operation();
            } catch (error) {
                const lastError = toError(error);
                attempt++;

                const retryable = options.strategy === RecoveryStrategy.RETRY &&
                    attempt <= maxRetries &&
                    (!options.retryCondition || options.retryCondition(lastError));

                if (!retryable) {
                    throw this.wrapError(lastError, component, subject, operationName, attempt);
                }

                const delay = this.calculateDelay(attempt, options);
                options.onRetry?.(attempt + 1, maxRetries + 1, delay, lastError);
                await this.sleep(delay);
            }
        }
    }

    private static wrapError(
        error: Error,
        component: string,
        subject: string,
        operationName: string,
        attempts: number
    ): OrchestrationError {
        if (error instanceof OrchestrationError) {
            return error;
        }

        return new OrchestrationError(
            component,
            subject,
            `Operation '${operationName}' failed: ${error.message}`,
            'OPERATION_FAILED',
            { operationName, originalError: error.message, attempts }
        );
    }

    /**
     * Exponential back-off: retryDelay * multiplier^(attempt - 1), plus optional jitter
     */
    public static calculateDelay(attempt: number, options: RecoveryOptions): number {
        const baseDelay = options.retryDelay ?? this.DEFAULT_RETRY_DELAY;
        const multiplier = options.backoffMultiplier ?? this.DEFAULT_BACKOFF_MULTIPLIER;
        const jitter = options.jitter ? Math.random() * options.jitter : 0;
        return baseDelay * Math.pow(multiplier, attempt - 1) + jitter;
    }

    private static sleep(ms: number): Promise<void> {
        return new Promise(resolve => setTimeout(resolve, ms));
    }
}
