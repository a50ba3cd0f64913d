import { NodeId } from '../parser/types';

/** Ordered (caller, callee) pair. */
export interface CallPair {
    readonly caller: NodeId;
    readonly callee: NodeId;
}

/**
 * Whether a call certainly happens (static dispatch) or only might happen
 * (one of the possible receivers of a dynamically dispatched call).
 */
export type CallKind = 'Definite' | 'Potential';

/**
 * Finalized call graph. Produced once by post-processing, read-only for
 * every exporter. Every edge endpoint is a key of `callables`.
 */
export interface CallGraph {
    /** Callable identity -> qualified name */
    readonly callables: ReadonlyMap<NodeId, string>;
    /** Method declaration identity -> qualified name */
    readonly declarations: ReadonlyMap<NodeId, string>;
    /** Method declaration identity -> implementing callables */
    readonly implementations: ReadonlyMap<NodeId, readonly NodeId[]>;
    /** Statically resolved calls */
    readonly definiteCalls: readonly CallPair[];
    /** Dispatched calls expanded to every known implementation */
    readonly potentialCalls: readonly CallPair[];
}
