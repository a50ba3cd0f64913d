/**
 * Node/edge adapter between the finalized call graph and diagram renderers.
 *
 * Nodes are callables labelled by qualified name. Edges are the union of
 * definite and potential calls, tagged so renderers can style them apart.
 * A multigraph keeps both when the same pair is called both ways.
 */

import { Graph } from 'graphlib';
import { GraphInvariantError } from '../../common/errors';
import { NodeId } from '../../parser/types';
import { CallGraph, CallKind, CallPair } from '../types';

export interface DiagramNode {
    id: NodeId;
    label: string;
}

export interface DiagramEdge {
    source: NodeId;
    target: NodeId;
    kind: CallKind;
}

export class CallGraphDiagram {
    private readonly graph = new Graph({ directed: true, multigraph: true });

    constructor(public readonly name: string, callGraph: CallGraph) {
        for (const [id, label] of callGraph.callables) {
            const node: DiagramNode = { id, label };
            this.graph.setNode(String(id), node);
        }
        this.addEdges(callGraph.definiteCalls, 'Definite');
        this.addEdges(callGraph.potentialCalls, 'Potential');
    }

    private addEdges(pairs: readonly CallPair[], kind: CallKind): void {
        for (const { caller, callee } of pairs) {
            const source = String(caller);
            const target = String(callee);
            // graphlib would silently create missing endpoints
            if (!this.graph.hasNode(source) || !this.graph.hasNode(target)) {
                throw new GraphInvariantError(`${kind} edge ${caller} -> ${callee} has an endpoint outside the node set`);
            }
            const edge: DiagramEdge = { source: caller, target: callee, kind };
            this.graph.setEdge(source, target, edge, kind);
        }
    }

    /** Nodes in ascending identity order. */
    nodes(): DiagramNode[] {
        return this.graph.nodes()
            .map((key): DiagramNode => this.graph.node(key))
            .sort((a, b) => a.id - b.id);
    }

    /** Edges ordered by source, target, then kind. */
    edges(): DiagramEdge[] {
        return this.graph.edges()
            .map((e): DiagramEdge => this.graph.edge(e))
            .sort((a, b) => a.source - b.source || a.target - b.target || a.kind.localeCompare(b.kind));
    }
}

export function toDiagram(callGraph: CallGraph, name: string): CallGraphDiagram {
    return new CallGraphDiagram(name, callGraph);
}
