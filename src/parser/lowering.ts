/**
 * Lowers TypeScript source files into the builder's syntax tree.
 *
 * Function-like nodes become `definition` nodes, identifiers in value
 * position become `reference` nodes, and class, interface and namespace
 * bodies become `opaque` containers. Everything else is flattened into its
 * parent. Type-only syntax and import/export declarations are dropped: they
 * hold no calls.
 */

import * as ts from 'typescript';
import { deriveFileId } from '../graph/utils';
import { NodeIdAllocator } from './node-ids';
import { CompilationUnit, SourceSpan, SyntaxNode, UnitNode } from './types';

export function spanOf(node: ts.Node, sourceFile: ts.SourceFile, fileId: string): SourceSpan {
    const start = node.getStart(sourceFile);
    const { line, character } = sourceFile.getLineAndCharacterOfPosition(start);
    return { file: fileId, line: line + 1, column: character + 1, start, end: node.getEnd() };
}

function isDefinitionCandidate(node: ts.Node): boolean {
    return ts.isFunctionDeclaration(node)
        || ts.isFunctionExpression(node)
        || ts.isArrowFunction(node)
        || ts.isMethodDeclaration(node)
        || ts.isMethodSignature(node)
        || ts.isConstructorDeclaration(node)
        || ts.isGetAccessorDeclaration(node)
        || ts.isSetAccessorDeclaration(node);
}

function isContainer(node: ts.Node): boolean {
    return ts.isClassDeclaration(node)
        || ts.isClassExpression(node)
        || ts.isInterfaceDeclaration(node)
        || ts.isModuleDeclaration(node);
}

/**
 * `extends mixin(class { ... })` is an ExpressionWithTypeArguments, which
 * counts as a type node, yet it evaluates code. Only a plain name is type-only.
 */
function isTypeOnly(node: ts.Node): boolean {
    if (ts.isExpressionWithTypeArguments(node)) {
        return ts.isEntityNameExpression(node.expression);
    }
    return ts.isTypeNode(node);
}

function isDropped(node: ts.Node): boolean {
    return isTypeOnly(node)
        || ts.isTypeAliasDeclaration(node)
        || ts.isImportDeclaration(node)
        || ts.isImportEqualsDeclaration(node)
        || ts.isExportDeclaration(node)
        || (ts.isExportAssignment(node) && ts.isIdentifier(node.expression));
}

/**
 * True when the identifier names the thing being declared rather than
 * using something (`foo` in `function foo`, `{ foo: 1 }`, `import { foo }`).
 */
export function isDeclarationName(node: ts.Identifier | ts.PrivateIdentifier): boolean {
    const parent = node.parent;
    if (ts.isPropertyAccessExpression(parent) || ts.isShorthandPropertyAssignment(parent)) {
        return false;
    }
    if ('name' in parent && parent.name === node) return true;
    if ('propertyName' in parent && parent.propertyName === node) return true;
    if ('label' in parent && parent.label === node) return true;
    return false;
}

class SourceFileLowering {
    constructor(
        private readonly sourceFile: ts.SourceFile,
        private readonly fileId: string,
        private readonly ids: NodeIdAllocator
    ) {}

    lower(): UnitNode {
        return {
            kind: 'unit',
            span: spanOf(this.sourceFile, this.sourceFile, this.fileId),
            children: this.lowerChildren(this.sourceFile),
        };
    }

    private lowerChildren(node: ts.Node): SyntaxNode[] {
        const out: SyntaxNode[] = [];
        ts.forEachChild(node, child => {
            this.lowerInto(child, out);
        });
        return out;
    }

    private lowerInto(node: ts.Node, out: SyntaxNode[]): void {
        if (isDropped(node)) return;

        const span = () => spanOf(node, this.sourceFile, this.fileId);

        if (isDefinitionCandidate(node)) {
            out.push({ kind: 'definition', id: this.ids.idOf(node), span: span(), children: this.lowerChildren(node) });
        } else if ((ts.isIdentifier(node) || ts.isPrivateIdentifier(node)) && !isDeclarationName(node)) {
            out.push({ kind: 'reference', id: this.ids.idOf(node), span: span(), children: [] });
        } else if (isContainer(node)) {
            out.push({ kind: 'opaque', span: span(), children: this.lowerChildren(node) });
        } else {
            out.push(...this.lowerChildren(node));
        }
    }
}

export function lowerSourceFile(sourceFile: ts.SourceFile, root: string, ids: NodeIdAllocator): UnitNode {
    return new SourceFileLowering(sourceFile, deriveFileId(root, sourceFile.fileName), ids).lower();
}

export function lowerProgram(name: string, files: readonly ts.SourceFile[], root: string, ids: NodeIdAllocator): CompilationUnit {
    return { name, files: files.map(sf => lowerSourceFile(sf, root, ids)) };
}
