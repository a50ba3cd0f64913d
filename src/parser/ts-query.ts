/**
 * Semantic queries over a TypeScript program.
 *
 * Dispatch model:
 * - interface method signatures and abstract methods are declarations
 *   without a body;
 * - non-static, non-private methods with a body in an abstract class are
 *   declarations with a default body (subclasses may override them);
 * - every other method with a body is an implementation, linked to each
 *   declaration of the same name reachable through `extends`/`implements`;
 * - functions, constructors, accessors and function values bound to a name
 *   are plain callables.
 *
 * A call through a declaration is dispatched; a call to anything else is
 * resolved statically, including methods of concrete classes that a
 * subclass happens to override. A call on a union-typed receiver is a
 * `union` of the members' targets.
 */

import * as ts from 'typescript';
import { DEFAULT_GENERATED_MARKERS } from '../common/config';
import { deriveFileId, deriveQualifiedName } from '../graph/utils';
import { SemanticQuery } from './interfaces';
import { NodeIdAllocator } from './node-ids';
import { CallResolution, Classification, DeclarationRef, NodeId, SourceSpan, TargetResolution } from './types';

type MethodOwner = ts.ClassLikeDeclaration | ts.InterfaceDeclaration;

export interface TypeScriptSemanticQueryOptions {
    /** Leading-comment markers that flag a whole file as generated */
    generatedMarkers?: readonly string[];
}

function hasFlag(node: ts.Declaration, flag: ts.ModifierFlags): boolean {
    return (ts.getCombinedModifierFlags(node) & flag) !== 0;
}

function nameText(name: ts.Node | undefined): string | undefined {
    if (!name) return undefined;
    if (ts.isIdentifier(name) || ts.isPrivateIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)) {
        return name.text;
    }
    if (ts.isComputedPropertyName(name)) {
        return `[${name.expression.getText()}]`;
    }
    return undefined;
}

/** `const f = () => {}`, `handler = () => {}`, `{ run: function () {} }` */
function isNamedFunctionValue(node: ts.ArrowFunction | ts.FunctionExpression): boolean {
    const parent = node.parent;
    if (ts.isVariableDeclaration(parent)) {
        return parent.initializer === node && ts.isIdentifier(parent.name);
    }
    if (ts.isPropertyDeclaration(parent) || ts.isPropertyAssignment(parent)) {
        return parent.initializer === node && nameText(parent.name) !== undefined;
    }
    return false;
}

/**
 * Name segment a node contributes to the qualified names of its
 * descendants, or undefined when it contributes none.
 */
function scopeSegment(node: ts.Node): string | undefined {
    if (ts.isFunctionDeclaration(node)) {
        return node.name?.text ?? 'default';
    }
    if (ts.isClassDeclaration(node) || ts.isClassExpression(node)) {
        if (node.name) return node.name.text;
        // the binding supplies the name
        return ts.isVariableDeclaration(node.parent) ? undefined : '<anonymous>';
    }
    if (ts.isConstructorDeclaration(node)) {
        return 'constructor';
    }
    if (
        ts.isInterfaceDeclaration(node)
        || ts.isModuleDeclaration(node)
        || ts.isMethodDeclaration(node)
        || ts.isMethodSignature(node)
        || ts.isGetAccessorDeclaration(node)
        || ts.isSetAccessorDeclaration(node)
        || ts.isVariableDeclaration(node)
        || ts.isPropertyDeclaration(node)
        || ts.isPropertyAssignment(node)
    ) {
        return nameText(node.name);
    }
    return undefined;
}

function isSuperMember(node: ts.Node): boolean {
    const parent = node.parent;
    return ts.isPropertyAccessExpression(parent) && parent.name === node
        && parent.expression.kind === ts.SyntaxKind.SuperKeyword;
}

/**
 * Property of a union or intersection type, synthesized by the checker from
 * each constituent's member. Overloads and merged declarations are not.
 */
function isSyntheticMember(symbol: ts.Symbol): boolean {
    return (symbol.flags & ts.SymbolFlags.Transient) !== 0;
}

function isAbstractClass(owner: ts.ClassLikeDeclaration): boolean {
    return hasFlag(owner, ts.ModifierFlags.Abstract);
}

function isPrivateMember(node: ts.MethodDeclaration): boolean {
    return ts.isPrivateIdentifier(node.name) || hasFlag(node, ts.ModifierFlags.Private);
}

export class TypeScriptSemanticQuery implements SemanticQuery {
    private readonly checker: ts.TypeChecker;
    private readonly unitFiles: Set<ts.SourceFile>;
    private readonly generatedFiles = new Set<string>();

    constructor(
        program: ts.Program,
        unitFiles: readonly ts.SourceFile[],
        private readonly root: string,
        private readonly ids: NodeIdAllocator,
        options: TypeScriptSemanticQueryOptions = {}
    ) {
        this.checker = program.getTypeChecker();
        this.unitFiles = new Set(unitFiles);

        const markers = options.generatedMarkers ?? DEFAULT_GENERATED_MARKERS;
        for (const sf of unitFiles) {
            if (this.hasGeneratedHeader(sf, markers)) {
                this.generatedFiles.add(this.fileIdOf(sf));
            }
        }
    }

    // ------------------------------------------------------------------------
    // SemanticQuery
    // ------------------------------------------------------------------------

    classify(id: NodeId): Classification {
        const node = this.ids.nodeOf(id);
        return node ? this.classifyNode(node) : { kind: 'other' };
    }

    resolveCallReference(id: NodeId): CallResolution | undefined {
        const node = this.ids.nodeOf(id);
        if (!node || !(ts.isIdentifier(node) || ts.isPrivateIdentifier(node))) {
            return undefined;
        }

        const symbol = this.referencedSymbol(node);
        if (!symbol) return undefined;

        const isNewTarget = ts.isNewExpression(node.parent) && node.parent.expression === node;
        if (isNewTarget) {
            const ctor = this.constructorOf(symbol);
            return ctor ? this.resolutionOf(ctor, node) : undefined;
        }

        const targets = this.callableDeclarationsOf(symbol);
        if (targets.length > 1 && isSyntheticMember(symbol)) {
            const alternatives = targets
                .map(target => this.resolutionOf(target, node))
                .filter((r): r is TargetResolution => r !== undefined);
            return alternatives.length > 0 ? { kind: 'union', alternatives } : undefined;
        }
        return targets.length > 0 ? this.resolutionOf(targets[0], node) : undefined;
    }

    isGeneratedCode(span: SourceSpan): boolean {
        return span.start < 0 || this.generatedFiles.has(span.file);
    }

    // ------------------------------------------------------------------------
    // Classification
    // ------------------------------------------------------------------------

    private classifyNode(node: ts.Node): Classification {
        if (
            ts.isFunctionDeclaration(node)
            || ts.isConstructorDeclaration(node)
            || ts.isGetAccessorDeclaration(node)
            || ts.isSetAccessorDeclaration(node)
        ) {
            return node.body ? this.callable(node) : { kind: 'other' };
        }
        if (ts.isArrowFunction(node) || ts.isFunctionExpression(node)) {
            return isNamedFunctionValue(node) ? this.callable(node) : { kind: 'other' };
        }
        if (ts.isMethodSignature(node)) {
            return ts.isInterfaceDeclaration(node.parent) ? this.declaration(node, false, []) : { kind: 'other' };
        }
        if (ts.isMethodDeclaration(node)) {
            return this.classifyMethod(node);
        }
        return { kind: 'other' };
    }

    private classifyMethod(node: ts.MethodDeclaration): Classification {
        const owner = node.parent;
        if (ts.isObjectLiteralExpression(owner)) {
            return node.body ? this.callable(node) : { kind: 'other' };
        }
        if (hasFlag(node, ts.ModifierFlags.Abstract)) {
            return this.declaration(node, false, []);
        }
        if (!node.body) {
            // overload signature
            return { kind: 'other' };
        }
        if (hasFlag(node, ts.ModifierFlags.Static)) {
            return { kind: 'method-implementation', id: this.ids.idOf(node), qualifiedName: this.qualifiedName(node), overriddenDeclarations: [] };
        }

        const overridden = this.overriddenDeclarations(node, owner);
        if (isAbstractClass(owner) && !isPrivateMember(node)) {
            return this.declaration(node, true, overridden);
        }
        return {
            kind: 'method-implementation',
            id: this.ids.idOf(node),
            qualifiedName: this.qualifiedName(node),
            overriddenDeclarations: overridden,
        };
    }

    private callable(node: ts.Node): Classification {
        return { kind: 'function', id: this.ids.idOf(node), qualifiedName: this.qualifiedName(node) };
    }

    private declaration(node: ts.Node, hasDefaultBody: boolean, overridden: DeclarationRef[]): Classification {
        return {
            kind: 'method-declaration',
            id: this.ids.idOf(node),
            qualifiedName: this.qualifiedName(node),
            hasDefaultBody,
            overriddenDeclarations: overridden,
        };
    }

    /**
     * Declarations named like `method` in every class and interface reachable
     * through the owner's heritage clauses.
     */
    private overriddenDeclarations(method: ts.MethodDeclaration, owner: ts.ClassLikeDeclaration): DeclarationRef[] {
        const name = nameText(method.name);
        if (name === undefined || isPrivateMember(method)) return [];

        const found: DeclarationRef[] = [];
        this.collectOverridden(owner, name, found, new Set<ts.Node>([owner]));
        return found;
    }

    private collectOverridden(owner: MethodOwner, name: string, found: DeclarationRef[], visited: Set<ts.Node>): void {
        for (const clause of owner.heritageClauses ?? []) {
            for (const heritage of clause.types) {
                const symbol = this.resolveAlias(this.checker.getSymbolAtLocation(heritage.expression));
                for (const base of symbol?.declarations ?? []) {
                    if (!(ts.isClassLike(base) || ts.isInterfaceDeclaration(base)) || visited.has(base)) continue;
                    visited.add(base);

                    const member = this.findMember(base, name);
                    if (member) {
                        const info = this.classifyNode(member);
                        if (info.kind === 'method-declaration') {
                            found.push({ id: info.id, isLocal: this.isLocalDeclaration(member) });
                        }
                    }
                    this.collectOverridden(base, name, found, visited);
                }
            }
        }
    }

    /** First member of that name that classifies as something (skips overload signatures). */
    private findMember(owner: MethodOwner, name: string): ts.Node | undefined {
        for (const member of owner.members) {
            if ((ts.isMethodDeclaration(member) || ts.isMethodSignature(member)) && nameText(member.name) === name
                && this.classifyNode(member).kind !== 'other') {
                return member;
            }
        }
        return undefined;
    }

    // ------------------------------------------------------------------------
    // Resolution helpers
    // ------------------------------------------------------------------------

    private referencedSymbol(node: ts.Identifier | ts.PrivateIdentifier): ts.Symbol | undefined {
        const parent = node.parent;
        const symbol = ts.isShorthandPropertyAssignment(parent) && parent.name === node
            ? this.checker.getShorthandAssignmentValueSymbol(parent)
            : this.checker.getSymbolAtLocation(node);
        return this.resolveAlias(symbol);
    }

    private resolveAlias(symbol: ts.Symbol | undefined): ts.Symbol | undefined {
        if (symbol && (symbol.flags & ts.SymbolFlags.Alias) !== 0) {
            return this.checker.getAliasedSymbol(symbol);
        }
        return symbol;
    }

    /**
     * Declarations a call through `symbol` may land on, in declaration order:
     * those that classify as a callable or method declaration.
     */
    private callableDeclarationsOf(symbol: ts.Symbol): ts.Node[] {
        const found: ts.Node[] = [];
        for (const decl of symbol.declarations ?? []) {
            const candidate = this.callableNodeOf(decl);
            if (candidate && !found.includes(candidate) && this.classifyNode(candidate).kind !== 'other') {
                found.push(candidate);
            }
        }
        return found;
    }

    private resolutionOf(target: ts.Node, reference: ts.Node): TargetResolution | undefined {
        const info = this.classifyNode(target);
        const isLocal = this.isLocalDeclaration(target);
        switch (info.kind) {
            case 'function':
            case 'method-implementation':
                return { kind: 'resolved', calleeId: info.id, isLocal };
            case 'method-declaration':
                // super.m() runs exactly the base body
                if (info.hasDefaultBody && isSuperMember(reference)) {
                    return { kind: 'resolved', calleeId: info.id, isLocal };
                }
                return { kind: 'dispatch', declarationId: info.id, isLocal };
            case 'other':
                return undefined;
        }
    }

    private callableNodeOf(decl: ts.Declaration): ts.Node | undefined {
        // property reads through accessors are not tracked as calls
        if (ts.isGetAccessorDeclaration(decl) || ts.isSetAccessorDeclaration(decl)) {
            return undefined;
        }
        if (ts.isVariableDeclaration(decl) || ts.isPropertyDeclaration(decl) || ts.isPropertyAssignment(decl)) {
            const init = decl.initializer;
            return init && (ts.isArrowFunction(init) || ts.isFunctionExpression(init)) ? init : undefined;
        }
        return decl;
    }

    private constructorOf(symbol: ts.Symbol): ts.Node | undefined {
        for (const decl of symbol.declarations ?? []) {
            if (!ts.isClassLike(decl)) continue;
            const ctor = decl.members.find(m => ts.isConstructorDeclaration(m) && m.body !== undefined);
            if (ctor) return ctor;
        }
        return undefined;
    }

    // ------------------------------------------------------------------------
    // Locality and naming
    // ------------------------------------------------------------------------

    private isLocalDeclaration(node: ts.Node): boolean {
        const sf = node.getSourceFile();
        return this.unitFiles.has(sf) && !this.generatedFiles.has(this.fileIdOf(sf));
    }

    private fileIdOf(sf: ts.SourceFile): string {
        return deriveFileId(this.root, sf.fileName);
    }

    private qualifiedName(node: ts.Node): string {
        const segments: string[] = [];
        for (let current: ts.Node | undefined = node; current && !ts.isSourceFile(current); current = current.parent) {
            const segment = scopeSegment(current);
            if (segment !== undefined) segments.unshift(segment);
        }
        if (segments.length === 0) segments.push('<anonymous>');
        return deriveQualifiedName(this.fileIdOf(node.getSourceFile()), segments);
    }

    private hasGeneratedHeader(sf: ts.SourceFile, markers: readonly string[]): boolean {
        const text = sf.getFullText();
        const start = text.startsWith('#!') ? Math.max(text.indexOf('\n'), 0) : 0;
        const ranges = ts.getLeadingCommentRanges(text, start) ?? [];
        return ranges.some(r => {
            const comment = text.slice(r.pos, r.end);
            return markers.some(m => comment.includes(m));
        });
    }
}
