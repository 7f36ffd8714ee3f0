import { StackNotFoundError } from '../shared/utils/error-handling';
import { StackSpec } from './types';

/**
 * Selects stacks by exact base name or full (environment-suffixed) name
 */
export class StackNameMatcher {
    /**
     * Match a requested stack name against the catalog
     * @param requested Base or full name; empty or absent selects every stack
     * @param stacks Candidate stacks
     * @returns The matching stacks, never empty
     * @throws StackNotFoundError listing both name forms of every candidate
     */
    public static match(requested: string | undefined, stacks: readonly StackSpec[]): StackSpec[] {
        const name = requested?.trim();
        if (!name) {
            return [...stacks];
        }

        const matches = stacks.filter(stack => stack.baseName === name || stack.fullName === name);
        if (matches.length === 0) {
            throw new StackNotFoundError(
                name,
                stacks.map(stack => stack.baseName),
                stacks.map(stack => stack.fullName)
            );
        }

        return matches;
    }
}
