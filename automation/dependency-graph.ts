import { ConfigError, CyclicDependencyError } from '../shared/utils/error-handling';
import {
    DependencyEdge,
    DependencyGraph,
    ExternalDependencyPolicy,
    StackSpec
} from './types';

export interface GraphBuildOptions {
    /** Base names of every stack in the catalog, used to tell unknown targets from filtered ones */
    catalogNames?: Iterable<string>;
    externalDependencies?: ExternalDependencyPolicy;
}

/**
 * Builds the dependency graph over a set of stacks
 */
export class DependencyGraphBuilder {
    /**
     * Build the graph from declared dependencies and `$stack` parameters
     * @param stacks Selected stacks
     * @param options Catalog names and the policy for dependencies outside the selection
     * @returns Acyclic dependency graph
     * @throws ConfigError for unknown or excluded targets, CyclicDependencyError for cycles
     */
    public build(stacks: readonly StackSpec[], options: GraphBuildOptions = {}): DependencyGraph {
        const nodes = new Map<string, StackSpec>();
        stacks.forEach(stack => nodes.set(stack.baseName, stack));

        const catalogNames = new Set(options.catalogNames ?? nodes.keys());
        const policy = options.externalDependencies ?? 'error';

        const dependencies = new Map<string, Set<string>>();
        const dependents = new Map<string, Set<string>>();
        for (const name of nodes.keys()) {
            dependencies.set(name, new Set());
            dependents.set(name, new Set());
        }

        const edges: DependencyEdge[] = [];
        const external = new Map<string, string[]>();
        const issues: string[] = [];

        const addEdge = (from: string, to: string, source: DependencyEdge['source']): void => {
            if (!nodes.has(to)) {
                if (!catalogNames.has(to)) {
                    issues.push(`Stack '${from}' depends on '${to}' which does not exist`);
                } else if (policy === 'assume-deployed') {
                    const assumed = external.get(from) ?? [];
                    if (!assumed.includes(to)) {
                        assumed.push(to);
                    }
                    external.set(from, assumed);
                } else {
                    issues.push(`Stack '${from}' depends on '${to}' which is not part of the selected stacks`);
                }
                return;
            }

            const targets = dependencies.get(from);
            if (!targets || targets.has(to)) {
                return;
            }
            targets.add(to);
            dependents.get(to)?.add(from);
            edges.push({ from, to, source });
        };

        for (const stack of stacks) {
            for (const dep of stack.dependsOn) {
                addEdge(stack.baseName, dep, 'declared');
            }
        }

        // Parameter-inferred edges feed the same adjacency as declared ones
        for (const stack of stacks) {
            for (const value of stack.parameters.values()) {
                if (value.kind === 'stack' && value.baseName !== stack.baseName) {
                    addEdge(stack.baseName, value.baseName, 'parameter');
                }
            }
        }

        if (issues.length > 0) {
            throw new ConfigError('DependencyGraphBuilder', 'dependencies', issues);
        }

        this.detectCycles(dependencies);

        return { nodes, dependencies, dependents, edges, external };
    }

    /**
     * Depth-first traversal in lexical order, tracking the recursion stack
     */
    private detectCycles(dependencies: ReadonlyMap<string, ReadonlySet<string>>): void {
        const visited = new Set<string>();
        const stack: string[] = [];
        const onStack = new Set<string>();

        const visit = (node: string): void => {
            if (onStack.has(node)) {
                throw new CyclicDependencyError(stack.slice(stack.indexOf(node)));
            }
            if (visited.has(node)) {
                return;
            }

            stack.push(node);
            onStack.add(node);
            for (const dep of [...(dependencies.get(node) ?? [])].sort()) {
                visit(dep);
            }
            stack.pop();
            onStack.delete(node);
            visited.add(node);
        };

        for (const node of [...dependencies.keys()].sort()) {
            visit(node);
        }
    }
}
