import { ChangeDecision, DeployedState, ResolvedStack } from './types';

/**
 * Decides whether a resolved stack differs from its last known deployed state
 */
export class ChangeDetector {
    /**
     * @returns true when forced, on first deploy, or when the template or any resolved parameter changed
     */
    public static needsDeploy(stack: ResolvedStack, lastKnown: DeployedState | undefined, force: boolean): boolean {
        return this.evaluate(stack, lastKnown, force).needsDeploy;
    }

    public static evaluate(stack: ResolvedStack, lastKnown: DeployedState | undefined, force: boolean): ChangeDecision {
        const changedParameters = lastKnown ? this.diffParameters(stack.parameters, lastKnown.parameters) : [];

        if (force) {
            return { needsDeploy: true, reason: 'forced', changedParameters };
        }
        if (!lastKnown) {
            return { needsDeploy: true, reason: 'first-deploy', changedParameters };
        }
        if (lastKnown.templateHash !== stack.template.hash) {
            return { needsDeploy: true, reason: 'template-changed', changedParameters };
        }
        if (changedParameters.length > 0) {
            return { needsDeploy: true, reason: 'parameters-changed', changedParameters };
        }
        return { needsDeploy: false, reason: 'unchanged', changedParameters };
    }

    /**
     * Names of parameters added, removed or changed, sorted
     */
    public static diffParameters(
        current: Readonly<Record<string, string>>,
        previous: Readonly<Record<string, string>>
    ): string[] {
        const names = new Set([...Object.keys(current), ...Object.keys(previous)]);
        return [...names]
            .filter(name => current[name] !== previous[name])
            .sort();
    }

    /**
     * State to record after a successful deploy
     */
    public static toState(stack: ResolvedStack, deployedAt: Date = new Date()): DeployedState {
        return {
            fullName: stack.spec.fullName,
            templateHash: stack.template.hash,
            parameters: { ...stack.parameters },
            deployedAt: deployedAt.toISOString()
        };
    }
}
