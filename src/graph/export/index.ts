import * as fs from 'fs';
import * as path from 'path';
import { DiagramFormat } from '../../common/config';
import { OutputError } from '../../common/errors';
import { generatePlotHtml } from '../plot/generator';
import { CallGraph } from '../types';
import { toDiagram } from './diagram';
import { renderDot } from './dot';

export { formatDump } from './dump';
export { toDiagram, CallGraphDiagram } from './diagram';
export type { DiagramNode, DiagramEdge } from './diagram';
export { renderDot, graphId, escapeLabel } from './dot';

export function renderDiagram(graph: CallGraph, name: string, format: DiagramFormat): string {
    const diagram = toDiagram(graph, name);
    return format === 'html'
        ? generatePlotHtml(diagram, `Call graph: ${name}`)
        : renderDot(diagram);
}

/**
 * Write the diagram in one shot. The handle is closed whether or not the
 * write succeeds; any failure is fatal.
 *
 * @throws OutputError
 */
export function writeDiagram(outputPath: string, content: string): void {
    const target = path.resolve(outputPath);
    let fd: number;
    try {
        fd = fs.openSync(target, 'w');
    } catch (err) {
        throw new OutputError(target, err);
    }
    try {
        fs.writeFileSync(fd, content, 'utf-8');
    } catch (err) {
        throw new OutputError(target, err);
    } finally {
        fs.closeSync(fd);
    }
}
