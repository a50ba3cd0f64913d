import { CallGraphDiagram } from '../export/diagram';
import { getHtmlTemplate } from './template';

interface VisNode {
    id: number;
    label: string;
    title: string; // Tooltip
}

interface VisEdge {
    from: number;
    to: number;
    dashes: boolean;
    title: string;
}

/**
 * JSON.stringify output with `<` escaped, so a label such as `</script>`
 * cannot end the inline script.
 */
export function toInlineJson(value: unknown): string {
    return JSON.stringify(value).replace(/</g, '\\u003c');
}

export function generatePlotHtml(diagram: CallGraphDiagram, title: string): string {
    const nodes: VisNode[] = diagram.nodes().map(n => ({
        id: n.id,
        label: n.label,
        title: `${n.label} (#${n.id})`,
    }));

    const edges: VisEdge[] = diagram.edges().map(e => ({
        from: e.source,
        to: e.target,
        dashes: e.kind === 'Potential',
        title: e.kind,
    }));

    return getHtmlTemplate(toInlineJson({ nodes, edges }), title);
}
