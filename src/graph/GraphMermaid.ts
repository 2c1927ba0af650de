/**
 * Mermaid flowchart rendering for {@link StateGraph}.
 *
 * ```
 * graph TD
 *     __start__(( ))
 *     __start__ --> plan
 *     plan[plan<br/>Drafts the steps]
 *     act[act]
 *     plan --> act
 *     act -->|done?| act__router{?}
 *     __end__(( ))
 * ```
 *
 * @module
 * @internal
 */
import { type GraphEdge, type GraphNode, START } from './GraphTypes.js';

function edgeLines<S>(edge: GraphEdge<S>): string[] {
    switch (edge.kind) {
        case 'direct':
            return [`    ${edge.from} --> ${edge.to}`];
        case 'conditional':
            return [`    ${edge.from} -->|${edge.description ?? '?'}| ${edge.from}__router{?}`];
        case 'multi-route':
            return [
                ...edge.routes.map(([name]) => `    ${edge.from} -->|${name}| ${name}`),
                `    ${edge.from} -->|default| ${edge.defaultRoute}`,
            ];
        case 'parallel':
            return edge.to.map((target) => `    ${edge.from} -.-> ${target}`);
    }
}

export function renderMermaid<S>(
    nodes: readonly GraphNode<S>[],
    edges: readonly GraphEdge<S>[],
    entryPoint: string | undefined,
): string {
    const lines = ['graph TD'];

    if (entryPoint !== undefined) {
        lines.push(`    ${START}(( ))`, `    ${START} --> ${entryPoint}`);
    }
    for (const node of nodes) {
        const label = node.description ? `${node.name}<br/>${node.description}` : node.name;
        lines.push(`    ${node.name}[${label}]`);
    }
    for (const edge of edges) lines.push(...edgeLines(edge));
    lines.push('    __end__(( ))');

    return lines.join('\n');
}
