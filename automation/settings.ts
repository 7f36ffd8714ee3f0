import { ConfigError } from '../shared/utils/error-handling';
import { DEFAULT_MAX_PARALLEL } from './deployment-executor';

export type StateBackend = 'file' | 'cloudformation';

export interface OrchestratorSettings {
    maxParallel: number;
    functionName?: string;
    region: string;
    stateBackend: StateBackend;
    stateDirectory: string;
}

export const DEFAULT_REGION = 'eu-central-2';
export const DEFAULT_STATE_DIRECTORY = '.stack-state';

export function isStateBackend(value: string): value is StateBackend {
    return value === 'file' || value === 'cloudformation';
}

/**
 * Defaults read from the environment; CLI flags and catalog options take precedence
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): OrchestratorSettings {
    const issues: string[] = [];

    let maxParallel = DEFAULT_MAX_PARALLEL;
    const rawParallel = env.STACK_ORCHESTRATOR_MAX_PARALLEL;
    if (rawParallel !== undefined && rawParallel.trim() !== '') {
        const parsed = Number(rawParallel);
        if (Number.isInteger(parsed) && parsed >= 1) {
            maxParallel = parsed;
        } else {
            issues.push(`STACK_ORCHESTRATOR_MAX_PARALLEL must be a positive integer, got '${rawParallel}'`);
        }
    }

    let stateBackend: StateBackend = 'file';
    const rawBackend = env.STACK_ORCHESTRATOR_STATE_BACKEND?.trim();
    if (rawBackend) {
        if (isStateBackend(rawBackend)) {
            stateBackend = rawBackend;
        } else {
            issues.push(`STACK_ORCHESTRATOR_STATE_BACKEND must be 'file' or 'cloudformation', got '${rawBackend}'`);
        }
    }

    if (issues.length > 0) {
        throw new ConfigError('Settings', 'environment', issues);
    }

    return {
        maxParallel,
        functionName: env.STACK_ORCHESTRATOR_FUNCTION_NAME?.trim() || undefined,
        region: env.AWS_REGION?.trim() || DEFAULT_REGION,
        stateBackend,
        stateDirectory: env.STACK_ORCHESTRATOR_STATE_DIR?.trim() || DEFAULT_STATE_DIRECTORY
    };
}
