/**
 * Call Graph Model
 *
 * Accumulates callables, method declarations, implementation links and the
 * two raw edge sets while the builder walks the unit. `postProcess` expands
 * every dispatched call into one edge per known implementation and returns
 * the finalized, read-only CallGraph that exporters consume.
 */

import { GraphInvariantError } from '../common/errors';
import { NodeId } from '../parser/types';
import { CallGraph, CallPair } from './types';

/**
 * Set of (caller, callee) pairs; duplicates collapse.
 */
export class CallPairSet {
    private readonly pairs = new Map<string, CallPair>();

    add(caller: NodeId, callee: NodeId): void {
        const key = `${caller}->${callee}`;
        if (!this.pairs.has(key)) {
            this.pairs.set(key, { caller, callee });
        }
    }

    has(caller: NodeId, callee: NodeId): boolean {
        return this.pairs.has(`${caller}->${callee}`);
    }

    clear(): void {
        this.pairs.clear();
    }

    get size(): number {
        return this.pairs.size;
    }

    values(): CallPair[] {
        return Array.from(this.pairs.values());
    }
}

export class CallGraphModel {
    private readonly callables = new Map<NodeId, string>();
    private readonly declarations = new Map<NodeId, string>();
    private readonly implementations = new Map<NodeId, NodeId[]>();

    private readonly staticCalls = new CallPairSet();
    // (caller, declaration) until postProcess replaces them with their expansion
    private readonly dispatchedCalls = new CallPairSet();
    // (caller, callee) where callee is one of several possible receivers' methods
    private readonly candidateCalls = new CallPairSet();
    private readonly expandedCalls = new CallPairSet();

    // ------------------------------------------------------------------------
    // Registration (write-once per identity)
    // ------------------------------------------------------------------------

    addCallable(id: NodeId, qualifiedName: string): void {
        if (!this.callables.has(id)) {
            this.callables.set(id, qualifiedName);
        }
    }

    addDeclaration(id: NodeId, qualifiedName: string): void {
        if (!this.declarations.has(id)) {
            this.declarations.set(id, qualifiedName);
        }
        this.ensureImplementations(id);
    }

    /**
     * Record that `impl` implements `declaration`. Implementations may be
     * seen before their declaration.
     */
    linkImplementation(declaration: NodeId, impl: NodeId): void {
        const impls = this.ensureImplementations(declaration);
        if (!impls.includes(impl)) {
            impls.push(impl);
        }
    }

    addStaticCall(caller: NodeId, callee: NodeId): void {
        this.staticCalls.add(caller, callee);
    }

    addDispatchedCall(caller: NodeId, declaration: NodeId): void {
        this.dispatchedCalls.add(caller, declaration);
    }

    /** A call that may land on `callee` among other targets. */
    addCandidateCall(caller: NodeId, callee: NodeId): void {
        this.candidateCalls.add(caller, callee);
    }

    get pendingDispatchCount(): number {
        return this.dispatchedCalls.size + this.candidateCalls.size;
    }

    private ensureImplementations(declaration: NodeId): NodeId[] {
        let impls = this.implementations.get(declaration);
        if (!impls) {
            impls = [];
            this.implementations.set(declaration, impls);
        }
        return impls;
    }

    // ------------------------------------------------------------------------
    // Post-processing
    // ------------------------------------------------------------------------

    /**
     * Expand dispatched calls into calls to every implementation of the
     * declaration (a default body implements itself). A declaration with no
     * implementations contributes nothing. Candidate calls join the
     * expanded set as they are.
     *
     * Running this again finds no dispatched calls left and returns the same
     * graph.
     *
     * @throws GraphInvariantError when an edge names an unregistered identity
     */
    postProcess(): CallGraph {
        for (const { caller, callee: declaration } of this.dispatchedCalls.values()) {
            const impls = this.implementations.get(declaration);
            if (!impls) {
                throw new GraphInvariantError(
                    `Dispatched call from ${this.describe(caller)} targets unknown declaration ${declaration}`
                );
            }
            for (const impl of impls) {
                this.expandedCalls.add(caller, impl);
            }
        }
        this.dispatchedCalls.clear();
        for (const { caller, callee } of this.candidateCalls.values()) {
            this.expandedCalls.add(caller, callee);
        }
        this.candidateCalls.clear();

        const definiteCalls = this.staticCalls.values();
        const potentialCalls = this.expandedCalls.values();
        this.assertEndpointsKnown(definiteCalls);
        this.assertEndpointsKnown(potentialCalls);

        const implementations = new Map<NodeId, readonly NodeId[]>();
        for (const [declaration, impls] of this.implementations) {
            implementations.set(declaration, [...impls]);
        }

        return {
            callables: new Map(this.callables),
            declarations: new Map(this.declarations),
            implementations,
            definiteCalls,
            potentialCalls,
        };
    }

    private assertEndpointsKnown(pairs: readonly CallPair[]): void {
        for (const { caller, callee } of pairs) {
            for (const id of [caller, callee]) {
                if (!this.callables.has(id)) {
                    throw new GraphInvariantError(`Call edge ${caller} -> ${callee} references unknown callable ${id}`);
                }
            }
        }
    }

    private describe(id: NodeId): string {
        return this.callables.get(id) ?? String(id);
    }
}
