/**
 * Opaque per-construct key handed out by the front end. Unique within one
 * analysis run and never reused.
 */
export type NodeId = number;

export interface SourceSpan {
    /** Repo-relative path with forward slashes */
    file: string;
    /** 1-based */
    line: number;
    /** 1-based */
    column: number;
    start: number;
    end: number;
}

// ============================================================================
// Lowered syntax tree
// ============================================================================

/** Root of one source file. */
export interface UnitNode {
    kind: 'unit';
    span: SourceSpan;
    children: SyntaxNode[];
}

/** May introduce a callable or a method declaration; ask the facade which. */
export interface DefinitionNode {
    kind: 'definition';
    id: NodeId;
    span: SourceSpan;
    children: SyntaxNode[];
}

/** May name a call target (identifier, property access, `new` target). */
export interface ReferenceNode {
    kind: 'reference';
    id: NodeId;
    span: SourceSpan;
    children: SyntaxNode[];
}

/** Walked only to reach nested nodes. */
export interface OpaqueNode {
    kind: 'opaque';
    span: SourceSpan;
    children: SyntaxNode[];
}

export type SyntaxNode = UnitNode | DefinitionNode | ReferenceNode | OpaqueNode;

export interface CompilationUnit {
    name: string;
    files: UnitNode[];
}

// ============================================================================
// Facade answers
// ============================================================================

/** A declaration as seen from a use site or an overriding method. */
export interface DeclarationRef {
    id: NodeId;
    isLocal: boolean;
}

export type Classification =
    | { kind: 'function'; id: NodeId; qualifiedName: string }
    | {
        kind: 'method-declaration';
        id: NodeId;
        qualifiedName: string;
        hasDefaultBody: boolean;
        /** Declarations a default body also implements (e.g. an interface method) */
        overriddenDeclarations: DeclarationRef[];
    }
    | {
        kind: 'method-implementation';
        id: NodeId;
        qualifiedName: string;
        /** Every method declaration this implementation overrides, directly or through ancestors */
        overriddenDeclarations: DeclarationRef[];
    }
    | { kind: 'other' };

export type TargetResolution =
    /** Target known precisely: a free function or a method on a known concrete type */
    | { kind: 'resolved'; calleeId: NodeId; isLocal: boolean }
    /** Only the declared signature is known: dynamic dispatch */
    | { kind: 'dispatch'; declarationId: NodeId; isLocal: boolean };

export type CallResolution =
    | TargetResolution
    /**
     * The receiver is one of several unrelated types (`x: A | B`). Each
     * alternative is a possible target; none is certain.
     */
    | { kind: 'union'; alternatives: TargetResolution[] };
