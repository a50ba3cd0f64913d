import { CallGraphDiagram, DiagramEdge } from './diagram';

/** Graphviz ids must be plain identifiers here; anything else becomes `_`. */
export function graphId(name: string): string {
    return `callgraph_${name.replace(/[^A-Za-z0-9_]/g, '_')}`;
}

export function escapeLabel(label: string): string {
    return label.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

function edgeAttrs(edge: DiagramEdge): string {
    return edge.kind === 'Potential' ? ' [style=dashed]' : '';
}

/**
 * Render the diagram as Graphviz DOT. Potential calls are dashed.
 */
export function renderDot(diagram: CallGraphDiagram): string {
    const nodes = diagram.nodes().map(n => `  n_${n.id} [label="${escapeLabel(n.label)}"];`);
    const edges = diagram.edges().map(e => `  n_${e.source} -> n_${e.target}${edgeAttrs(e)};`);

    return `digraph ${graphId(diagram.name)} {
${nodes.join('\n')}
${edges.length ? '\n' : ''}${edges.join('\n')}
}
`;
}
