import { ConfigError } from '../shared/utils/error-handling';
import { captureError } from '../tests/test-utils';
import { DEFAULT_MAX_PARALLEL } from './deployment-executor';
import { DEFAULT_REGION, DEFAULT_STATE_DIRECTORY, isStateBackend, loadSettings } from './settings';

describe('loadSettings', () => {
    it('should use defaults for an empty environment', () => {
        expect(loadSettings({})).toEqual({
            maxParallel: DEFAULT_MAX_PARALLEL,
            functionName: undefined,
            region: DEFAULT_REGION,
            stateBackend: 'file',
            stateDirectory: DEFAULT_STATE_DIRECTORY
        });
    });

    it('should read every setting from the environment', () => {
        expect(loadSettings({
            STACK_ORCHESTRATOR_MAX_PARALLEL: '8',
            STACK_ORCHESTRATOR_FUNCTION_NAME: ' stack-deployer ',
            AWS_REGION: 'us-east-1',
            STACK_ORCHESTRATOR_STATE_BACKEND: 'cloudformation',
            STACK_ORCHESTRATOR_STATE_DIR: '/var/lib/stacks'
        })).toEqual({
            maxParallel: 8,
            functionName: 'stack-deployer',
            region: 'us-east-1',
            stateBackend: 'cloudformation',
            stateDirectory: '/var/lib/stacks'
        });
    });

    it('should report every invalid setting', () => {
        const error = captureError(() => loadSettings({
            STACK_ORCHESTRATOR_MAX_PARALLEL: '2.5',
            STACK_ORCHESTRATOR_STATE_BACKEND: 'dynamodb'
        }));

        expect(error).toBeInstanceOf(ConfigError);
        expect(error instanceof ConfigError ? error.issues : []).toEqual([
            "STACK_ORCHESTRATOR_MAX_PARALLEL must be a positive integer, got '2.5'",
            "STACK_ORCHESTRATOR_STATE_BACKEND must be 'file' or 'cloudformation', got 'dynamodb'"
        ]);
    });

    it('should recognise state backends', () => {
        expect(isStateBackend('file')).toBe(true);
        expect(isStateBackend('s3')).toBe(false);
    });
});
