import { NodeId } from '../../parser/types';
import { CallGraph, CallPair } from '../types';

function sortedEntries(map: ReadonlyMap<NodeId, string>): string[] {
    return Array.from(map.entries())
        .sort(([a], [b]) => a - b)
        .map(([id, name]) => `${id}: ${name}`);
}

function renderCalls(graph: CallGraph, pairs: readonly CallPair[]): string[] {
    return pairs
        .map(({ caller, callee }) => `${graph.callables.get(caller)} -> ${graph.callables.get(callee)}`)
        .sort();
}

/**
 * Plain-text listing of the finalized graph: callables, method declarations,
 * then definite and potential calls as `caller -> callee`.
 */
export function formatDump(graph: CallGraph): string {
    const lines = [
        'Found fns:',
        ...sortedEntries(graph.callables),
        '',
        'Found method decls:',
        ...sortedEntries(graph.declarations),
        '',
        'Found calls:',
        ...renderCalls(graph, graph.definiteCalls),
        '',
        'Found potential calls:',
        ...renderCalls(graph, graph.potentialCalls),
    ];
    return lines.join('\n') + '\n';
}
