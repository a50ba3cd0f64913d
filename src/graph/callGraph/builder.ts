import { createLogger, Logger } from '../../common/logger';
import { SemanticQuery } from '../../parser/interfaces';
import {
    CallResolution,
    CompilationUnit,
    DeclarationRef,
    DefinitionNode,
    NodeId,
    ReferenceNode,
    SourceSpan,
    SyntaxNode,
} from '../../parser/types';
import { CallGraphModel } from '../model';
import { TraversalContext } from './context';

export interface Diagnostic {
    kind: 'missing-context';
    span: SourceSpan;
    message: string;
}

export interface BuildResult {
    model: CallGraphModel;
    diagnostics: Diagnostic[];
}

export function formatSpan(span: SourceSpan): string {
    return `${span.file}:${span.line}:${span.column}`;
}

/**
 * Walks a compilation unit and records callables, method declarations,
 * implementation links and raw call edges.
 *
 * Only references the facade resolves to a call target are recorded. That
 * includes a function named without being invoked (`const f = helper;`
 * yields an edge to `helper`); a call through such a variable is not seen.
 * Targets outside the unit are never recorded.
 */
export class CallGraphBuilder {
    private readonly model = new CallGraphModel();
    private readonly context = new TraversalContext();
    private readonly diagnostics: Diagnostic[] = [];

    constructor(
        private readonly query: SemanticQuery,
        private readonly log: Logger = createLogger('builder')
    ) {}

    build(unit: CompilationUnit): BuildResult {
        for (const file of unit.files) {
            this.walk(file);
        }
        return { model: this.model, diagnostics: this.diagnostics };
    }

    private walk(node: SyntaxNode): void {
        switch (node.kind) {
            case 'definition':
                this.visitDefinition(node);
                return;
            case 'reference':
                this.visitReference(node);
                return;
            case 'unit':
            case 'opaque':
                this.walkChildren(node);
                return;
        }
    }

    private walkChildren(node: SyntaxNode): void {
        for (const child of node.children) {
            this.walk(child);
        }
    }

    private visitDefinition(node: DefinitionNode): void {
        if (this.query.isGeneratedCode(node.span)) return;

        const info = this.query.classify(node.id);
        switch (info.kind) {
            case 'function':
                this.model.addCallable(info.id, info.qualifiedName);
                this.context.enter(info.id, () => this.walkChildren(node));
                return;

            case 'method-declaration':
                this.model.addDeclaration(info.id, info.qualifiedName);
                if (!info.hasDefaultBody) {
                    // No body to enter; parameters may still hold calls.
                    this.walkChildren(node);
                    return;
                }
                // A default body is a callable that implements its own declaration.
                this.model.addCallable(info.id, info.qualifiedName);
                this.model.linkImplementation(info.id, info.id);
                this.linkOverrides(info.id, info.overriddenDeclarations);
                this.context.enter(info.id, () => this.walkChildren(node));
                return;

            case 'method-implementation':
                this.model.addCallable(info.id, info.qualifiedName);
                this.linkOverrides(info.id, info.overriddenDeclarations);
                this.context.enter(info.id, () => this.walkChildren(node));
                return;

            case 'other':
                this.walkChildren(node);
                return;
        }
    }

    private linkOverrides(impl: NodeId, declarations: readonly DeclarationRef[]): void {
        for (const declaration of declarations) {
            // Implementations of external interfaces are not tracked
            if (declaration.isLocal) {
                this.model.linkImplementation(declaration.id, impl);
            }
        }
    }

    private visitReference(node: ReferenceNode): void {
        if (this.query.isGeneratedCode(node.span)) return;

        const target = this.query.resolveCallReference(node.id);
        if (target) {
            this.recordCall(node.span, target);
        }

        this.walkChildren(node);
    }

    private recordCall(span: SourceSpan, target: CallResolution): void {
        const alternatives = target.kind === 'union' ? target.alternatives : [target];
        const local = alternatives.filter(t => t.isLocal);
        if (local.length === 0) return;

        const caller = this.context.current;
        if (caller === undefined) {
            this.reportMissingContext(span);
            return;
        }

        for (const t of local) {
            if (t.kind === 'dispatch') {
                this.model.addDispatchedCall(caller, t.declarationId);
            } else if (target.kind === 'union') {
                // receiver type not known: only a possible target
                this.model.addCandidateCall(caller, t.calleeId);
            } else {
                this.model.addStaticCall(caller, t.calleeId);
            }
        }
    }

    private reportMissingContext(span: SourceSpan): void {
        const message = `call at ${formatSpan(span)} without known current function`;
        this.diagnostics.push({ kind: 'missing-context', span, message });
        this.log.warn(message);
    }
}

/**
 * Walk `unit` with `query` and return the raw (not yet post-processed) model.
 */
export function buildCallGraph(unit: CompilationUnit, query: SemanticQuery, log?: Logger): BuildResult {
    return new CallGraphBuilder(query, log).build(unit);
}
