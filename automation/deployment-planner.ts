import { OrchestrationError } from '../shared/utils/error-handling';
import { DependencyGraph, DeploymentPlan } from './types';

/**
 * Computes concurrency-safe deployment batches from a dependency graph
 */
export class DeploymentPlanner {
    /**
     * Kahn's algorithm: repeatedly peel off every stack without pending dependencies
     * @param graph Acyclic dependency graph
     * @returns Batches in deployment order, each sorted by base name
     */
    public plan(graph: DependencyGraph): DeploymentPlan {
        const inDegree = new Map<string, number>();
        for (const name of graph.nodes.keys()) {
            inDegree.set(name, graph.dependencies.get(name)?.size ?? 0);
        }

        const batches: string[][] = [];
        let ready = [...inDegree.entries()].filter(([, degree]) => degree === 0).map(([name]) => name).sort();

        while (ready.length > 0) {
            batches.push(ready);
            ready.forEach(name => inDegree.delete(name));

            const next: string[] = [];
            for (const name of ready) {
                for (const dependent of graph.dependents.get(name) ?? []) {
                    const degree = inDegree.get(dependent);
                    if (degree === undefined) {
                        continue;
                    }
                    inDegree.set(dependent, degree - 1);
                    if (degree - 1 === 0) {
                        next.push(dependent);
                    }
                }
            }
            ready = next.sort();
        }

        if (inDegree.size > 0) {
            const remaining = [...inDegree.keys()].sort();
            throw new OrchestrationError(
                'DeploymentPlanner',
                'plan',
                `Dependency graph could not be fully ordered; remaining stacks: ${remaining.join(', ')}`,
                'PLAN_INVARIANT_VIOLATION',
                { remaining }
            );
        }

        return { batches, dependencies: graph.dependencies };
    }
}
