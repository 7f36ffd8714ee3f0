import { resolvedStack } from '../tests/test-utils';
import { ChangeDetector } from './change-detector';
import { DeployedState } from './types';

describe('ChangeDetector', () => {
    const stack = resolvedStack('api', { ImageTag: '4f2a9c1', Replicas: '2' }, 'Resources:\n  Queue: {}\n');

    function stateOf(overrides: Partial<DeployedState> = {}): DeployedState {
        return {
            fullName: 'api-staging',
            templateHash: stack.template.hash,
            parameters: { ImageTag: '4f2a9c1', Replicas: '2' },
            ...overrides
        };
    }

    it('should deploy a stack with no recorded state', () => {
        expect(ChangeDetector.evaluate(stack, undefined, false)).toEqual({
            needsDeploy: true,
            reason: 'first-deploy',
            changedParameters: []
        });
    });

    it('should skip an unchanged stack', () => {
        expect(ChangeDetector.needsDeploy(stack, stateOf(), false)).toBe(false);
        expect(ChangeDetector.evaluate(stack, stateOf(), false).reason).toBe('unchanged');
    });

    it('should deploy when forced even if unchanged', () => {
        expect(ChangeDetector.evaluate(stack, stateOf(), true)).toEqual({
            needsDeploy: true,
            reason: 'forced',
            changedParameters: []
        });
    });

    it('should detect a template change', () => {
        expect(ChangeDetector.evaluate(stack, stateOf({ templateHash: 'old-hash' }), false).reason).toBe('template-changed');
    });

    it('should report template changes before parameter changes', () => {
        const decision = ChangeDetector.evaluate(stack, stateOf({
            templateHash: 'old-hash',
            parameters: { ImageTag: '0000000', Replicas: '2' }
        }), false);

        expect(decision.reason).toBe('template-changed');
        expect(decision.changedParameters).toEqual(['ImageTag']);
    });

    it('should list added, removed and changed parameters', () => {
        const decision = ChangeDetector.evaluate(stack, stateOf({
            parameters: { ImageTag: '0000000', Legacy: 'x' }
        }), false);

        expect(decision).toEqual({
            needsDeploy: true,
            reason: 'parameters-changed',
            changedParameters: ['ImageTag', 'Legacy', 'Replicas']
        });
    });

    it('should build the state to record', () => {
        expect(ChangeDetector.toState(stack, new Date('2026-01-02T03:04:05.000Z'))).toEqual({
            fullName: 'api-staging',
            templateHash: stack.template.hash,
            parameters: { ImageTag: '4f2a9c1', Replicas: '2' },
            deployedAt: '2026-01-02T03:04:05.000Z'
        });
    });

    it('should see a recorded state as unchanged', () => {
        expect(ChangeDetector.needsDeploy(stack, ChangeDetector.toState(stack), false)).toBe(false);
    });
});
