import { Lambda } from 'aws-sdk';
import { DeployCallError, ErrorHandler, RecoveryStrategy, toError } from '../shared/utils/error-handling';
import { DeploymentLogger } from '../shared/utils/logging';
import { awsErrorCode, bodyToString, CloudFormationPort, LambdaPort } from './aws-clients';
import { isRecord } from './version-resolver';
import { DeployOutcome, ResolvedStack, StackDeployer } from './types';

export const SUCCESS_STATUSES = new Set(['CREATE_COMPLETE', 'UPDATE_COMPLETE']);

export const FAILURE_STATUSES = new Set([
    'ROLLBACK_COMPLETE',
    'CREATE_FAILED',
    'ROLLBACK_FAILED',
    'UPDATE_ROLLBACK_FAILED',
    'UPDATE_ROLLBACK_COMPLETE'
]);

/**
 * Message the deployer function receives, one per stack
 */
export interface DeployMessage {
    stack_name: string;
    template: string;
    parameters: Record<string, string>;
    template_content_hash: string;
}

export interface LambdaDeployerOptions {
    functionName: string;
    lambda: LambdaPort;
    cloudFormation: CloudFormationPort;
    logger?: DeploymentLogger;
    /** Invocation attempts when throttled */
    maxAttempts?: number;
    /** First throttling back-off, in milliseconds */
    initialDelay?: number;
    /** Upper bound of random jitter added to each back-off */
    jitter?: number;
    pollAttempts?: number;
    pollInterval?: number;
    onRetry?: (stackName: string) => void;
}

/**
 * Deploys stacks by invoking a deployer Lambda, then waits for the stack to settle
 */
export class LambdaDeployer implements StackDeployer {
    private readonly options: Required<Omit<LambdaDeployerOptions, 'logger' | 'onRetry'>> &
        Pick<LambdaDeployerOptions, 'logger' | 'onRetry'>;

    constructor(options: LambdaDeployerOptions) {
        this.options = {
            maxAttempts: 8,
            initialDelay: 1000,
            jitter: 1000,
            pollAttempts: 30,
            pollInterval: 10000,
            ...options
        };
    }

    public static createMessage(stack: ResolvedStack): DeployMessage {
        return {
            stack_name: stack.spec.fullName,
            template: stack.template.body,
            parameters: { ...stack.parameters },
            template_content_hash: stack.template.hash
        };
    }

    /**
     * Deploy one stack
     * @returns Failure when the function or the stack reports one
     * @throws DeployCallError when the function cannot be invoked or the stack cannot be described
     */
    async deploy(stack: ResolvedStack): Promise<DeployOutcome> {
        const stackName = stack.spec.fullName;
        const event = { Records: [{ body: JSON.stringify(LambdaDeployer.createMessage(stack)) }] };

        this.options.logger?.debug(`Invoking ${this.options.functionName} for ${stackName}`, { stackName });
        const response = await this.invokeWithBackoff(stackName, JSON.stringify(event));

        const failure = LambdaDeployer.responseFailure(response);
        if (failure) {
            return { success: false, reason: failure };
        }

        return this.waitForStableState(stackName);
    }

    /**
     * Describe a failed invocation, or undefined when the function reported success
     */
    public static responseFailure(response: Lambda.InvocationResponse): string | undefined {
        const text = bodyToString(response.Payload);
        const payload = this.parsePayload(text);

        if (response.FunctionError) {
            return `Deployer function error (${response.FunctionError}): ${this.describe(payload, text)}`;
        }

        if (isRecord(payload)) {
            if (payload.errorMessage !== undefined) {
                return `Deployer reported: ${String(payload.errorMessage)}`;
            }
            if (payload.error !== undefined) {
                return `Deployer reported: ${String(payload.error)}`;
            }
        }

        const entries: unknown[] = Array.isArray(payload) ? payload : [payload];
        const errors = entries.filter(entry => isRecord(entry) && entry.status === 'error');
        if (errors.length > 0) {
            return `Deployer returned status error: ${JSON.stringify(errors)}`;
        }

        return undefined;
    }

    private async invokeWithBackoff(stackName: string, payload: string): Promise<Lambda.InvocationResponse> {
        try {
            return await ErrorHandler.executeWithRecovery(
                () => this.options.lambda.invoke({
                    FunctionName: this.options.functionName,
                    InvocationType: 'RequestResponse',
                    Payload: payload
                }).promise(),
                'invoke-deployer',
                'LambdaDeployer',
                stackName,
                {
                    strategy: RecoveryStrategy.RETRY,
                    maxRetries: this.options.maxAttempts - 1,
                    retryDelay: this.options.initialDelay,
                    backoffMultiplier: 2,
                    jitter: this.options.jitter,
                    retryCondition: error => awsErrorCode(error) === 'TooManyRequestsException',
                    onRetry: (attempt, maxAttempts, delay) => {
                        this.options.logger?.retryAttempt(`invoke ${stackName}`, attempt, maxAttempts, delay);
                        this.options.onRetry?.(stackName);
                    }
                }
            );
        } catch (error) {
            throw new DeployCallError(
                stackName,
                `Failed to invoke ${this.options.functionName}: ${toError(error).message}`,
                { functionName: this.options.functionName }
            );
        }
    }

    /**
     * Poll DescribeStacks until the stack completes, fails or the poll budget runs out
     */
    private async waitForStableState(stackName: string): Promise<DeployOutcome> {
        let status: string | undefined;

        for (let attempt = 0; attempt < this.options.pollAttempts; attempt++) {
            try {
                const description = await this.options.cloudFormation.describeStacks({ StackName: stackName }).promise();
                status = description.Stacks?.[0]?.StackStatus;
            } catch (error) {
                throw new DeployCallError(stackName, `Failed to describe stack: ${toError(error).message}`);
            }

            if (status !== undefined && SUCCESS_STATUSES.has(status)) {
                this.options.logger?.debug(`Stack ${stackName} reached stable state ${status}`, { stackName, status });
                return { success: true };
            }
            if (status !== undefined && FAILURE_STATUSES.has(status)) {
                return { success: false, reason: `Stack ${stackName} in error state ${status}` };
            }

            this.options.logger?.debug(`Stack status of ${stackName} is still ${status ?? 'unknown'}, waiting`, {
                stackName,
                status
            });
            if (attempt < this.options.pollAttempts - 1) {
                await new Promise(resolve => setTimeout(resolve, this.options.pollInterval));
            }
        }

        return { success: false, reason: `Stack never reached stable state, is in state ${status ?? 'unknown'}` };
    }

    private static parsePayload(text: string): unknown {
        if (!text) {
            return undefined;
        }
        try {
            return JSON.parse(text);
        } catch {
            // plain-text payloads are kept as they are
            return text;
        }
    }

    private static describe(payload: unknown, text: string): string {
        if (isRecord(payload) && typeof payload.errorMessage === 'string') {
            return payload.errorMessage;
        }
        return text || 'no payload';
    }
}
