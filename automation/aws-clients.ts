import { CloudFormation, Lambda, S3 } from 'aws-sdk';

/**
 * AWS SDK request handle: the subset of AWS.Request the orchestrator awaits
 */
export interface AwsRequest<T> {
    promise(): Promise<T>;
}

export interface LambdaPort {
    invoke(params: Lambda.InvocationRequest): AwsRequest<Lambda.InvocationResponse>;
}

export interface CloudFormationPort {
    describeStacks(params: CloudFormation.DescribeStacksInput): AwsRequest<CloudFormation.DescribeStacksOutput>;
    getTemplate(params: CloudFormation.GetTemplateInput): AwsRequest<CloudFormation.GetTemplateOutput>;
}

export interface S3Port {
    getObject(params: S3.GetObjectRequest): AwsRequest<S3.GetObjectOutput>;
}

export interface AwsClients {
    lambda: LambdaPort;
    cloudFormation: CloudFormationPort;
    s3: S3Port;
}

export function createAwsClients(region: string): AwsClients {
    return {
        lambda: new Lambda({ region }),
        cloudFormation: new CloudFormation({ region }),
        s3: new S3({ region })
    };
}

/**
 * Error code carried by AWS SDK errors, if any
 */
export function awsErrorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

/**
 * True when DescribeStacks failed because the stack does not exist
 */
export function isStackMissing(error: unknown): boolean {
    return awsErrorCode(error) === 'ValidationError' &&
        error instanceof Error &&
        error.message.includes('does not exist');
}

/**
 * Decode an SDK payload or object body to text
 */
export function bodyToString(body: Lambda.InvocationResponse['Payload'] | S3.GetObjectOutput['Body']): string {
    if (body === undefined || body === null) {
        return '';
    }
    if (typeof body === 'string') {
        return body;
    }
    if (body instanceof Uint8Array) {
        return Buffer.from(body).toString('utf8');
    }
    return String(body);
}
