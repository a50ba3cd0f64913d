/**
 * Builder tests against an in-memory SemanticQuery.
 *
 * Trees are assembled by hand; each node's id doubles as the key the fake
 * facade answers for.
 */

import { strict as assert } from 'assert';
import { test, describe, before, after } from 'node:test';

import { configureLogger, createLogger, resetLogger } from '../../common/logger';
import { SemanticQuery } from '../../parser/interfaces';
import {
    CallResolution,
    Classification,
    CompilationUnit,
    NodeId,
    SourceSpan,
    SyntaxNode,
    TargetResolution,
} from '../../parser/types';
import { CallGraph } from '../types';
import { buildCallGraph } from './builder';
import { TraversalContext } from './context';

// ============================================================================
// Fixtures
// ============================================================================

const silent = createLogger('builder-test');

function span(line: number, file = 'src/main.ts'): SourceSpan {
    return { file, line, column: 1, start: line * 10, end: line * 10 + 5 };
}

function def(id: NodeId, line: number, ...children: SyntaxNode[]): SyntaxNode {
    return { kind: 'definition', id, span: span(line), children };
}

function ref(id: NodeId, line: number): SyntaxNode {
    return { kind: 'reference', id, span: span(line), children: [] };
}

function opaque(line: number, ...children: SyntaxNode[]): SyntaxNode {
    return { kind: 'opaque', span: span(line), children };
}

function unit(...children: SyntaxNode[]): CompilationUnit {
    return { name: 'demo', files: [{ kind: 'unit', span: span(1), children }] };
}

class FakeQuery implements SemanticQuery {
    readonly classifications = new Map<NodeId, Classification>();
    readonly references = new Map<NodeId, CallResolution>();
    readonly generatedLines = new Set<number>();

    fn(id: NodeId, qualifiedName: string): this {
        this.classifications.set(id, { kind: 'function', id, qualifiedName });
        return this;
    }

    decl(id: NodeId, qualifiedName: string, hasDefaultBody = false): this {
        this.classifications.set(id, {
            kind: 'method-declaration', id, qualifiedName, hasDefaultBody, overriddenDeclarations: [],
        });
        return this;
    }

    impl(id: NodeId, qualifiedName: string, overrides: NodeId[], isLocal = true): this {
        this.classifications.set(id, {
            kind: 'method-implementation',
            id,
            qualifiedName,
            overriddenDeclarations: overrides.map(d => ({ id: d, isLocal })),
        });
        return this;
    }

    calls(refId: NodeId, calleeId: NodeId, isLocal = true): this {
        this.references.set(refId, { kind: 'resolved', calleeId, isLocal });
        return this;
    }

    dispatches(refId: NodeId, declarationId: NodeId, isLocal = true): this {
        this.references.set(refId, { kind: 'dispatch', declarationId, isLocal });
        return this;
    }

    either(refId: NodeId, alternatives: TargetResolution[]): this {
        this.references.set(refId, { kind: 'union', alternatives });
        return this;
    }

    classify(id: NodeId): Classification {
        return this.classifications.get(id) ?? { kind: 'other' };
    }

    resolveCallReference(id: NodeId): CallResolution | undefined {
        return this.references.get(id);
    }

    isGeneratedCode(s: SourceSpan): boolean {
        return this.generatedLines.has(s.line);
    }
}

function finalize(tree: CompilationUnit, query: SemanticQuery): { graph: CallGraph; messages: string[] } {
    const { model, diagnostics } = buildCallGraph(tree, query, silent);
    return { graph: model.postProcess(), messages: diagnostics.map(d => d.message) };
}

function names(graph: CallGraph, kind: 'definite' | 'potential'): string[] {
    const pairs = kind === 'definite' ? graph.definiteCalls : graph.potentialCalls;
    return pairs.map(p => `${graph.callables.get(p.caller)} -> ${graph.callables.get(p.callee)}`).sort();
}

// ============================================================================
// Tests
// ============================================================================

describe('CallGraphBuilder', () => {
    before(() => configureLogger({ level: 'silent' }));
    after(() => resetLogger());

    test('records a static call between free functions', () => {
        // fn f() { g(); }  fn g() {}
        const query = new FakeQuery().fn(1, 'f').fn(2, 'g').calls(3, 2);
        const { graph, messages } = finalize(unit(def(1, 1, ref(3, 2)), def(2, 4)), query);

        assert.deepEqual([...graph.callables.entries()], [[1, 'f'], [2, 'g']]);
        assert.deepEqual(names(graph, 'definite'), ['f -> g']);
        assert.deepEqual(graph.potentialCalls, []);
        assert.deepEqual(messages, []);
    });

    test('expands an interface call to every implementer', () => {
        // interface T { m(); }  X.m, Y.m implement it; h calls t.m()
        const query = new FakeQuery()
            .decl(10, 'T.m')
            .impl(11, 'X.m', [10])
            .impl(12, 'Y.m', [10])
            .fn(13, 'h')
            .dispatches(14, 10);
        const tree = unit(
            opaque(1, def(10, 2)),
            opaque(4, def(11, 5)),
            opaque(7, def(12, 8)),
            def(13, 10, ref(14, 11))
        );

        const { graph } = finalize(tree, query);

        assert.deepEqual([...graph.declarations.entries()], [[10, 'T.m']]);
        assert.deepEqual(graph.implementations.get(10), [11, 12]);
        assert.deepEqual(names(graph, 'potential'), ['h -> X.m', 'h -> Y.m']);
        assert.deepEqual(graph.definiteCalls, []);
    });

    test('a default body is both declaration and callable', () => {
        // abstract class T { d() { } }  k calls t.d()
        const query = new FakeQuery().decl(20, 'T.d', true).fn(21, 'k').dispatches(22, 20);
        const { graph } = finalize(unit(opaque(1, def(20, 2)), def(21, 4, ref(22, 5))), query);

        assert.equal(graph.callables.get(20), 'T.d');
        assert.equal(graph.declarations.get(20), 'T.d');
        assert.deepEqual(graph.implementations.get(20), [20]);
        assert.deepEqual(names(graph, 'potential'), ['k -> T.d']);
    });

    test('a call inside a default body has the default body as caller', () => {
        const query = new FakeQuery().decl(20, 'T.d', true).fn(21, 'helper').calls(22, 21);
        const { graph } = finalize(unit(def(20, 1, ref(22, 2)), def(21, 4)), query);

        assert.deepEqual(names(graph, 'definite'), ['T.d -> helper']);
    });

    test('a nested function is the caller inside its own body only', () => {
        // fn outer() { fn inner() { a(); } b(); }
        const query = new FakeQuery()
            .fn(1, 'outer').fn(2, 'inner').fn(3, 'a').fn(4, 'b')
            .calls(5, 3).calls(6, 4);
        const tree = unit(def(1, 1, def(2, 2, ref(5, 3)), ref(6, 5)), def(3, 7), def(4, 8));

        const { graph } = finalize(tree, query);

        assert.deepEqual(names(graph, 'definite'), ['inner -> a', 'outer -> b']);
    });

    test('a call outside any callable is reported and produces no edge', () => {
        const query = new FakeQuery().fn(1, 'g').calls(2, 1);
        const { graph, messages } = finalize(unit(def(1, 1), ref(2, 3)), query);

        assert.deepEqual(graph.definiteCalls, []);
        assert.deepEqual(messages, ['call at src/main.ts:3:1 without known current function']);
    });

    test('a reference inside a body-less declaration has no caller', () => {
        // A facade may resolve a reference under a declaration that has no body
        const query = new FakeQuery().decl(10, 'T.m').fn(11, 'g').calls(12, 11);
        const { graph, messages } = finalize(unit(def(10, 1, ref(12, 1)), def(11, 3)), query);

        assert.deepEqual(graph.definiteCalls, []);
        assert.equal(messages.length, 1);
    });

    test('targets outside the unit are not recorded', () => {
        const query = new FakeQuery()
            .fn(1, 'f')
            .calls(2, 99, false)
            .dispatches(3, 98, false);
        const { graph, messages } = finalize(unit(def(1, 1, ref(2, 2), ref(3, 3))), query);

        assert.deepEqual(graph.definiteCalls, []);
        assert.deepEqual(graph.potentialCalls, []);
        assert.deepEqual(messages, []);
    });

    test('implementations of external declarations are not linked', () => {
        const query = new FakeQuery().impl(11, 'X.toString', [500], false);
        const { graph } = finalize(unit(opaque(1, def(11, 2))), query);

        assert.equal(graph.callables.get(11), 'X.toString');
        assert.equal(graph.implementations.has(500), false);
    });

    test('generated code contributes no callables or edges', () => {
        const query = new FakeQuery().fn(1, 'gen').fn(2, 'f').fn(3, 'g').calls(4, 3).calls(5, 3);
        query.generatedLines.add(1);
        query.generatedLines.add(6);
        // gen() { g(); } is generated; inside f, the call on line 6 is too
        const tree = unit(def(1, 1, ref(4, 2)), def(2, 5, ref(5, 6)), def(3, 8));

        const { graph } = finalize(tree, query);

        assert.deepEqual([...graph.callables.keys()], [2, 3]);
        assert.deepEqual(graph.definiteCalls, []);
    });

    test('a call on a union receiver yields potential edges to each local member', () => {
        // fn f(s: X | I | Ext) { s.m(); }  where Z implements I and Ext is external
        const query = new FakeQuery()
            .fn(1, 'f')
            .impl(2, 'X.m', [])
            .decl(3, 'I.m')
            .impl(4, 'Z.m', [3])
            .either(5, [
                { kind: 'resolved', calleeId: 2, isLocal: true },
                { kind: 'dispatch', declarationId: 3, isLocal: true },
                { kind: 'resolved', calleeId: 99, isLocal: false },
            ]);
        const tree = unit(def(1, 1, ref(5, 2)), opaque(4, def(2, 5)), opaque(7, def(3, 8)), opaque(10, def(4, 11)));

        const { graph } = finalize(tree, query);

        assert.deepEqual(graph.definiteCalls, []);
        assert.deepEqual(names(graph, 'potential'), ['f -> X.m', 'f -> Z.m']);
    });

    test('a union call outside any callable is reported once', () => {
        const query = new FakeQuery().impl(2, 'X.m', []).impl(3, 'Y.m', []).either(5, [
            { kind: 'resolved', calleeId: 2, isLocal: true },
            { kind: 'resolved', calleeId: 3, isLocal: true },
        ]);
        const { graph, messages } = finalize(unit(def(2, 1), def(3, 2), ref(5, 4)), query);

        assert.deepEqual(graph.potentialCalls, []);
        assert.deepEqual(messages, ['call at src/main.ts:4:1 without known current function']);
    });

    test('repeated calls collapse into one edge', () => {
        const query = new FakeQuery().fn(1, 'f').fn(2, 'g').calls(3, 2).calls(4, 2);
        const { graph } = finalize(unit(def(1, 1, ref(3, 2), ref(4, 3)), def(2, 5)), query);

        assert.equal(graph.definiteCalls.length, 1);
    });

    test('definition nodes classified as other are walked through', () => {
        const query = new FakeQuery().fn(1, 'f').fn(2, 'g').calls(3, 2);
        // An unnamed callback (other) inside f still attributes its calls to f
        const { graph } = finalize(unit(def(1, 1, def(50, 2, ref(3, 3))), def(2, 5)), query);

        assert.deepEqual(names(graph, 'definite'), ['f -> g']);
    });
});

describe('TraversalContext', () => {
    test('restores the previous caller after a nested walk', () => {
        const context = new TraversalContext();
        const seen: Array<number | undefined> = [];

        context.enter(1, () => {
            seen.push(context.current);
            context.enter(2, () => seen.push(context.current));
            seen.push(context.current);
        });
        seen.push(context.current);

        assert.deepEqual(seen, [1, 2, 1, undefined]);
    });

    test('restores the caller when the walk throws', () => {
        const context = new TraversalContext();

        assert.throws(() => context.enter(7, () => {
            throw new Error('boom');
        }), /boom/);
        assert.equal(context.current, undefined);
    });
});
