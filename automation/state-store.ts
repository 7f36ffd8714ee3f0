import { CloudFormation } from 'aws-sdk';
import { promises as fs } from 'fs';
import * as path from 'path';
import { ConfigError } from '../shared/utils/error-handling';
import { CloudFormationPort, isStackMissing } from './aws-clients';
import { hashTemplate } from './templates';
import { isRecord } from './version-resolver';
import { DeployedState, DeployedStateStore } from './types';

interface StateDocument {
    environment: string;
    stacks: Record<string, DeployedState>;
}

function isStringRecord(value: unknown): value is Record<string, string> {
    return isRecord(value) && Object.values(value).every(entry => typeof entry === 'string');
}

function isDeployedState(value: unknown): value is DeployedState {
    return isRecord(value) &&
        typeof value.fullName === 'string' &&
        typeof value.templateHash === 'string' &&
        isStringRecord(value.parameters) &&
        (value.deployedAt === undefined || typeof value.deployedAt === 'string');
}

/**
 * File-backed state store. One JSON document per environment.
 */
export class FileStateStore implements DeployedStateStore {
    private readonly filePath: string;
    private readonly environment: string;
    private pending: Promise<void> = Promise.resolve();

    constructor(directory: string, environment: string) {
        this.environment = environment;
        this.filePath = path.join(directory, `${environment}.state.json`);
    }

    public get path(): string {
        return this.filePath;
    }

    async get(fullName: string): Promise<DeployedState | undefined> {
        await this.pending;
        const document = await this.load();
        return document.stacks[fullName];
    }

    /**
     * Parse and validate the state document without reading any stack
     */
    async verify(): Promise<void> {
        await this.pending;
        await this.load();
    }

    /**
     * Writes are chained so concurrent records never interleave
     */
    record(state: DeployedState): Promise<void> {
        const write = this.pending.then(async () => {
            const document = await this.load();
            document.stacks[state.fullName] = { ...state, parameters: { ...state.parameters } };
            await fs.mkdir(path.dirname(this.filePath), { recursive: true });
            await fs.writeFile(this.filePath, `${JSON.stringify(document, null, 2)}\n`, 'utf8');
        });
        // a failed write must not block later ones
        this.pending = write.catch(() => undefined);
        return write;
    }

    private async load(): Promise<StateDocument> {
        let text: string;
        try {
            text = await fs.readFile(this.filePath, 'utf8');
        } catch (err: unknown) {
            if (isRecord(err) && err.code === 'ENOENT') {
                return { environment: this.environment, stacks: {} };
            }
            throw err;
        }

        let raw: unknown;
        try {
            raw = JSON.parse(text);
        } catch {
            throw new ConfigError('FileStateStore', this.filePath, `Invalid JSON in state file ${this.filePath}`);
        }

        const stacks = isRecord(raw) ? raw.stacks : undefined;
        if (!isRecord(stacks)) {
            throw new ConfigError('FileStateStore', this.filePath, `State file ${this.filePath} has no stacks mapping`);
        }

        const document: StateDocument = { environment: this.environment, stacks: {} };
        for (const [fullName, state] of Object.entries(stacks)) {
            if (!isDeployedState(state)) {
                throw new ConfigError('FileStateStore', this.filePath, `State of ${fullName} in ${this.filePath} is malformed`);
            }
            document.stacks[fullName] = state;
        }
        return document;
    }
}

const STABLE_DEPLOYED_STATUSES = new Set(['CREATE_COMPLETE', 'UPDATE_COMPLETE']);

/**
 * Reads the last deployed state from CloudFormation itself; recording is a no-op
 */
export class CloudFormationStateStore implements DeployedStateStore {
    private readonly client: CloudFormationPort;

    constructor(client: CloudFormationPort) {
        this.client = client;
    }

    async get(fullName: string): Promise<DeployedState | undefined> {
        let description: CloudFormation.DescribeStacksOutput;
        try {
            description = await this.client.describeStacks({ StackName: fullName }).promise();
        } catch (error) {
            if (isStackMissing(error)) {
                return undefined;
            }
            throw error;
        }

        const stack = description.Stacks?.[0];
        if (!stack || !STABLE_DEPLOYED_STATUSES.has(stack.StackStatus)) {
            return undefined;
        }

        const template = await this.client.getTemplate({ StackName: fullName, TemplateStage: 'Original' }).promise();
        const parameters: Record<string, string> = {};
        for (const parameter of stack.Parameters ?? []) {
            if (parameter.ParameterKey !== undefined) {
                parameters[parameter.ParameterKey] = parameter.ParameterValue ?? '';
            }
        }

        return {
            fullName,
            templateHash: hashTemplate(template.TemplateBody ?? ''),
            parameters,
            deployedAt: (stack.LastUpdatedTime ?? stack.CreationTime).toISOString()
        };
    }

    async record(): Promise<void> {
        // CloudFormation already holds the deployed state
    }
}
