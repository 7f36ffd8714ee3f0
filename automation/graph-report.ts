import { DependencyEdge, DependencyGraph, DeploymentPlan, ResolvedStack } from './types';

export interface PlannedStack {
    baseName: string;
    fullName: string;
    dependencies: string[];
    templateFile: string;
    templateSource: string;
    parameters: Record<string, string>;
}

export interface PlanReport {
    environment: string;
    totalStacks: number;
    batches: { index: number; stacks: PlannedStack[] }[];
    external: Record<string, string[]>;
}

export interface GraphReport {
    environment: string;
    nodes: { baseName: string; fullName: string }[];
    edges: DependencyEdge[];
    external: Record<string, string[]>;
}

export type GraphFormat = 'text' | 'json' | 'dot';

export function isGraphFormat(value: string): value is GraphFormat {
    return value === 'text' || value === 'json' || value === 'dot';
}

export function buildPlanReport(
    environment: string,
    plan: DeploymentPlan,
    graph: DependencyGraph,
    stacks: ReadonlyMap<string, ResolvedStack>
): PlanReport {
    const batches = plan.batches.map((batch, index) => ({
        index: index + 1,
        stacks: batch.map(name => {
            const stack = stacks.get(name);
            return {
                baseName: name,
                fullName: stack?.spec.fullName ?? name,
                dependencies: [...(graph.dependencies.get(name) ?? [])].sort(),
                templateFile: stack?.template.fileName ?? '',
                templateSource: stack?.template.sourceEnvironment ?? '',
                parameters: { ...stack?.parameters }
            };
        })
    }));

    return {
        environment,
        totalStacks: batches.reduce((total, batch) => total + batch.stacks.length, 0),
        batches,
        external: Object.fromEntries([...graph.external.entries()].map(([name, deps]) => [name, [...deps]]))
    };
}

export function buildGraphReport(environment: string, graph: DependencyGraph): GraphReport {
    return {
        environment,
        nodes: [...graph.nodes.values()]
            .map(stack => ({ baseName: stack.baseName, fullName: stack.fullName }))
            .sort((a, b) => a.baseName.localeCompare(b.baseName)),
        edges: [...graph.edges].sort((a, b) => a.from.localeCompare(b.from) || a.to.localeCompare(b.to)),
        external: Object.fromEntries([...graph.external.entries()].map(([name, deps]) => [name, [...deps]]))
    };
}

export function renderPlanText(report: PlanReport, verbose: boolean = false): string {
    const lines = [
        `Deployment plan for ${report.environment}: ${report.batches.length} batch(es), ${report.totalStacks} stack(s)`
    ];

    for (const batch of report.batches) {
        lines.push(`Batch ${batch.index}:`);
        for (const stack of batch.stacks) {
            const after = stack.dependencies.length > 0 ? ` after ${stack.dependencies.join(', ')}` : '';
            lines.push(`  ${stack.fullName} (${stack.templateFile} from ${stack.templateSource})${after}`);
            if (verbose) {
                for (const [name, value] of Object.entries(stack.parameters).sort(([a], [b]) => a.localeCompare(b))) {
                    lines.push(`      ${name} = ${value}`);
                }
            }
        }
    }

    for (const [name, deps] of Object.entries(report.external)) {
        lines.push(`Assumed deployed for ${name}: ${deps.join(', ')}`);
    }

    return lines.join('\n');
}

export function renderGraph(report: GraphReport, format: GraphFormat): string {
    switch (format) {
        case 'json':
            return JSON.stringify(report, null, 2);
        case 'dot':
            return renderGraphDot(report);
        default:
            return renderGraphText(report);
    }
}

function renderGraphText(report: GraphReport): string {
    const lines = [`Dependency graph for ${report.environment}: ${report.nodes.length} stack(s), ${report.edges.length} edge(s)`];
    for (const node of report.nodes) {
        const deps = report.edges
            .filter(edge => edge.from === node.baseName)
            .map(edge => edge.source === 'parameter' ? `${edge.to} (parameter)` : edge.to);
        lines.push(deps.length > 0 ? `  ${node.baseName} -> ${deps.join(', ')}` : `  ${node.baseName}`);
    }
    return lines.join('\n');
}

/**
 * Graphviz output; arrows point from a dependency to the stacks deployed after it
 */
function renderGraphDot(report: GraphReport): string {
    const quote = (value: string): string => `"${value.replace(/"/g, '\\"')}"`;
    const lines = ['digraph stacks {', '  rankdir=LR;'];
    for (const node of report.nodes) {
        lines.push(`  ${quote(node.baseName)} [label=${quote(node.fullName)}];`);
    }
    for (const edge of report.edges) {
        const style = edge.source === 'parameter' ? ' [style=dashed]' : '';
        lines.push(`  ${quote(edge.to)} -> ${quote(edge.from)}${style};`);
    }
    lines.push('}');
    return lines.join('\n');
}
