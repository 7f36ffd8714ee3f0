import * as pulumi from "@pulumi/pulumi";

/**
 * Log levels for structured logging
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3
}

/**
 * Parse a level name; unknown or empty names yield undefined
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
    switch (value?.trim().toUpperCase()) {
        case 'DEBUG': return LogLevel.DEBUG;
        case 'INFO': return LogLevel.INFO;
        case 'WARN': return LogLevel.WARN;
        case 'ERROR': return LogLevel.ERROR;
        default: return undefined;
    }
}

/**
 * Minimum level from STACK_ORCHESTRATOR_LOG_LEVEL, INFO by default
 */
function getMinLogLevel(): LogLevel {
    return parseLogLevel(process.env.STACK_ORCHESTRATOR_LOG_LEVEL) ?? LogLevel.INFO;
}

export interface LogContext {
    operation?: string;
    stackName?: string;
    batchIndex?: number;
    duration?: number;
    [key: string]: unknown;
}

export interface DeploymentLoggerOptions {
    runId?: string;
    /** Overrides the level taken from the environment */
    minLevel?: LogLevel;
}

/**
 * Deployment logger for orchestration runs
 */
export class DeploymentLogger {
    public readonly deploymentName: string;
    private readonly baseContext: LogContext;
    private readonly minLevel?: LogLevel;

    constructor(deploymentName: string, options: DeploymentLoggerOptions = {}) {
        this.deploymentName = deploymentName;
        this.minLevel = options.minLevel;
        this.baseContext = {
            deploymentName,
            runId: options.runId,
            timestamp: new Date().toISOString()
        };
    }

    public runStart(command: string, totalStacks: number, dryRun: boolean): void {
        const mode = dryRun ? ' (dry run)' : '';
        this.log(LogLevel.INFO, `🚀 Starting ${command}${mode}: ${this.deploymentName}`, {
            operation: 'run_start',
            command,
            totalStacks,
            dryRun
        });
    }

    public runComplete(counts: Record<string, number>, duration: number): void {
        const failed = counts.failed ?? 0;
        const aborted = counts.aborted ?? 0;
        const level = failed > 0 || aborted > 0 ? LogLevel.WARN : LogLevel.INFO;
        const emoji = failed > 0 || aborted > 0 ? '⚠️' : '✅';
        const breakdown = Object.entries(counts)
            .filter(([, count]) => count > 0)
            .map(([status, count]) => `${status}=${count}`)
            .join(', ');

        this.log(level, `${emoji} Run completed: ${this.deploymentName} (${breakdown || 'no stacks'})`, {
            operation: 'run_complete',
            ...counts,
            duration
        });
    }

    public versionSourcesLoaded(origins: string[]): void {
        this.log(LogLevel.DEBUG, `Loaded ${origins.length} version source(s): ${origins.join(', ')}`, {
            operation: 'version_sources_loaded',
            origins
        });
    }

    public templateSources(byEnvironment: Record<string, string[]>): void {
        const stats = Object.entries(byEnvironment)
            .map(([environment, files]) => `${environment}: ${files.length} file(s)`)
            .join(', ');
        this.log(LogLevel.INFO, `Templates used from environments: ${stats}`, {
            operation: 'template_sources',
            byEnvironment
        });
    }

    public unusedGlobals(names: string[]): void {
        for (const name of names) {
            this.log(LogLevel.WARN, `Unused global ${name}`, { operation: 'unused_global', global: name });
        }
    }

    public stackSelection(requested: string | undefined, selected: string[]): void {
        const label = requested ? `'${requested}'` : 'all stacks';
        this.log(LogLevel.INFO, `📦 Selected ${selected.length} stack(s) for ${label}`, {
            operation: 'stack_selection',
            requested,
            selected
        });
    }

    public externalDependencies(external: Record<string, string[]>): void {
        for (const [stackName, deps] of Object.entries(external)) {
            this.log(LogLevel.WARN, `Assuming already deployed for ${stackName}: ${deps.join(', ')}`, {
                operation: 'external_dependencies',
                stackName,
                dependencies: deps
            });
        }
    }

    public planComputed(batches: string[][]): void {
        this.log(LogLevel.INFO, `📋 Deployment plan computed: ${batches.length} batches`, {
            operation: 'plan_computed',
            totalBatches: batches.length,
            batches: batches.map((stacks, index) => ({ batchIndex: index + 1, stacks }))
        });
        batches.forEach((stacks, index) => {
            this.log(LogLevel.DEBUG, `Batch ${index + 1}: ${stacks.join(', ')}`, {
                operation: 'plan_batch',
                batchIndex: index + 1
            });
        });
    }

    public batchStart(batchIndex: number, totalBatches: number, stackNames: string[]): void {
        this.log(LogLevel.INFO, `🔄 Batch ${batchIndex}/${totalBatches}: ${stackNames.join(', ')}`, {
            operation: 'batch_start',
            batchIndex,
            totalBatches,
            stackNames
        });
    }

    public batchComplete(batchIndex: number, statuses: Record<string, string>): void {
        const failed = Object.entries(statuses).filter(([, status]) => status === 'failed').map(([name]) => name);
        const level = failed.length > 0 ? LogLevel.WARN : LogLevel.INFO;
        const emoji = failed.length > 0 ? '⚠️' : '✅';

        this.log(level, `${emoji} Batch ${batchIndex} completed`, {
            operation: 'batch_complete',
            batchIndex,
            statuses,
            failed
        });
    }

    public stackStart(stackName: string, batchIndex: number, totalBatches: number): void {
        this.log(LogLevel.INFO, `📦 Deploying stack: ${stackName} (batch ${batchIndex}/${totalBatches})`, {
            operation: 'stack_start',
            stackName,
            batchIndex,
            totalBatches
        });
    }

    public stackDeployed(stackName: string, duration: number): void {
        this.log(LogLevel.INFO, `✅ Stack deployed: ${stackName}`, {
            operation: 'stack_deployed',
            stackName,
            duration
        });
    }

    public stackPlanned(stackName: string, reason: string): void {
        this.log(LogLevel.INFO, `🔍 Would deploy ${stackName} (${reason})`, {
            operation: 'stack_planned',
            stackName,
            reason
        });
    }

    public stackSkipped(stackName: string): void {
        this.log(LogLevel.INFO, `⏭️  Unchanged, skipping: ${stackName}`, {
            operation: 'stack_skipped',
            stackName
        });
    }

    public stackFailed(stackName: string, error: Error, duration: number): void {
        this.log(LogLevel.ERROR, `❌ Stack deployment failed: ${stackName}`, {
            operation: 'stack_failed',
            stackName,
            duration,
            error: {
                name: error.name,
                message: error.message
            }
        });
    }

    public stackAborted(stackName: string, reason: string): void {
        this.log(LogLevel.WARN, `⛔ Stack aborted: ${stackName} (${reason})`, {
            operation: 'stack_aborted',
            stackName,
            reason
        });
    }

    public retryAttempt(operation: string, attempt: number, maxAttempts: number, delay: number): void {
        this.log(LogLevel.WARN, `🔄 Retrying ${operation} (attempt ${attempt}/${maxAttempts}) after ${Math.round(delay)}ms`, {
            operation: 'retry_attempt',
            retryOperation: operation,
            attempt,
            maxAttempts,
            delay
        });
    }

    public debug(message: string, context?: LogContext): void {
        this.log(LogLevel.DEBUG, message, context);
    }

    public info(message: string, context?: LogContext): void {
        this.log(LogLevel.INFO, message, context);
    }

    public warn(message: string, context?: LogContext): void {
        this.log(LogLevel.WARN, message, context);
    }

    public error(message: string, error?: Error, context?: LogContext): void {
        const errorContext = error ? {
            error: {
                name: error.name,
                message: error.message,
                stack: error.stack
            }
        } : {};

        this.log(LogLevel.ERROR, message, { ...errorContext, ...context });
    }

    private log(level: LogLevel, message: string, context?: LogContext): void {
        const minLevel = this.minLevel ?? getMinLogLevel();
        if (level < minLevel) {
            return;
        }

        // Only include context in DEBUG mode or for ERROR level
        const includeContext = minLevel === LogLevel.DEBUG || level === LogLevel.ERROR;
        let contextString = '';

        if (includeContext && context) {
            const fullContext = {
                ...this.baseContext,
                timestamp: new Date().toISOString(),
                ...context
            };
            contextString = ` | Context: ${JSON.stringify(fullContext)}`;
        }

        switch (level) {
            case LogLevel.DEBUG:
                void pulumi.log.info(`DEBUG: ${message}${contextString}`);
                break;
            case LogLevel.INFO:
                void pulumi.log.info(`${message}${contextString}`);
                break;
            case LogLevel.WARN:
                void pulumi.log.warn(`${message}${contextString}`);
                break;
            case LogLevel.ERROR:
                void pulumi.log.error(`${message}${contextString}`);
                break;
        }
    }
}

/**
 * Performance monitoring utilities
 */
export class PerformanceMonitor {
    private readonly startTime: number;
    private readonly operation: string;
    private readonly logger: DeploymentLogger;

    constructor(operation: string, logger: DeploymentLogger) {
        this.operation = operation;
        this.logger = logger;
        this.startTime = Date.now();
    }

    public static start(operation: string, logger: DeploymentLogger): PerformanceMonitor {
        return new PerformanceMonitor(operation, logger);
    }

    /**
     * End timing and log the duration at debug level
     */
    public end(context?: LogContext): number {
        const duration = Date.now() - this.startTime;
        this.logger.debug(`Operation completed: ${this.operation} (${duration}ms)`, {
            operation: this.operation,
            duration,
            ...context
        });
        return duration;
    }

    public getCurrentDuration(): number {
        return Date.now() - this.startTime;
    }
}

export interface StackMetrics {
    stackName: string;
    startTime: number;
    endTime?: number;
    duration?: number;
    status?: string;
    retryCount: number;
    error?: string;
}

export interface DeploymentMetrics {
    deploymentName: string;
    runId?: string;
    startTime: number;
    endTime?: number;
    totalDuration?: number;
    stackMetrics: StackMetrics[];
    totalStacks: number;
    statusCounts: Record<string, number>;
    retryCount: number;
}

/**
 * Metrics collector for deployment runs
 */
export class MetricsCollector {
    private readonly metrics: DeploymentMetrics;

    constructor(deploymentName: string, runId?: string) {
        this.metrics = {
            deploymentName,
            runId,
            startTime: Date.now(),
            stackMetrics: [],
            totalStacks: 0,
            statusCounts: {},
            retryCount: 0
        };
    }

    public startStack(stackName: string): void {
        this.metrics.stackMetrics.push({
            stackName,
            startTime: Date.now(),
            retryCount: 0
        });
        this.metrics.totalStacks++;
    }

    public completeStack(stackName: string, status: string, error?: string): void {
        let stackMetric = this.metrics.stackMetrics.find(s => s.stackName === stackName);
        if (!stackMetric) {
            // aborted stacks never start
            this.startStack(stackName);
            stackMetric = this.metrics.stackMetrics[this.metrics.stackMetrics.length - 1];
        }

        stackMetric.endTime = Date.now();
        stackMetric.duration = stackMetric.endTime - stackMetric.startTime;
        stackMetric.status = status;
        stackMetric.error = error;
        this.metrics.statusCounts[status] = (this.metrics.statusCounts[status] ?? 0) + 1;
    }

    public recordRetry(stackName?: string): void {
        this.metrics.retryCount++;
        if (stackName) {
            const stackMetric = this.metrics.stackMetrics.find(s => s.stackName === stackName);
            if (stackMetric) {
                stackMetric.retryCount++;
            }
        }
    }

    public completeDeployment(): DeploymentMetrics {
        this.metrics.endTime = Date.now();
        this.metrics.totalDuration = this.metrics.endTime - this.metrics.startTime;
        return this.getMetrics();
    }

    public getMetrics(): DeploymentMetrics {
        return {
            ...this.metrics,
            stackMetrics: this.metrics.stackMetrics.map(metric => ({ ...metric })),
            statusCounts: { ...this.metrics.statusCounts }
        };
    }

    public exportMetrics(): string {
        return JSON.stringify(this.completeDeployment(), null, 2);
    }
}
