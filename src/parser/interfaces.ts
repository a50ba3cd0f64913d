import { CallResolution, Classification, NodeId, SourceSpan } from './types';

/**
 * Semantic questions the call-graph builder asks about lowered nodes.
 * Implemented per front end; the builder never sees compiler types.
 */
export interface SemanticQuery {
    /**
     * What a definition node introduces.
     * @param id Identity of a `definition` node.
     */
    classify(id: NodeId): Classification;

    /**
     * What a reference node would call, if anything.
     * @param id Identity of a `reference` node.
     */
    resolveCallReference(id: NodeId): CallResolution | undefined;

    isGeneratedCode(span: SourceSpan): boolean;
}
