import * as ts from 'typescript';
import { NodeId } from './types';

/**
 * Hands out identities for compiler nodes. One allocator per analysis run;
 * identities start at 1 and are never reused.
 */
export class NodeIdAllocator {
    private next: NodeId = 1;
    private readonly ids = new Map<ts.Node, NodeId>();
    private readonly nodes = new Map<NodeId, ts.Node>();

    idOf(node: ts.Node): NodeId {
        let id = this.ids.get(node);
        if (id === undefined) {
            id = this.next++;
            this.ids.set(node, id);
            this.nodes.set(id, node);
        }
        return id;
    }

    nodeOf(id: NodeId): ts.Node | undefined {
        return this.nodes.get(id);
    }
}
