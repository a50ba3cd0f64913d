/**
 * Library entry point.
 *
 *   import { analyzeProject, formatDump } from 'ts-callgraph';
 *
 *   const { graph } = analyzeProject('./my-project');
 *   process.stdout.write(formatDump(graph));
 */

export * from './common';
export { analyzeProject, analyzeUnit } from './graph';
export type { AnalysisResult, AnalyzeProjectOptions, CallGraph, CallPair, CallKind, Diagnostic } from './graph';
export { CallGraphModel, CallPairSet } from './graph/model';
export { CallGraphBuilder, buildCallGraph } from './graph/callGraph/builder';
export { TraversalContext } from './graph/callGraph/context';
export * from './graph/export';
export { generatePlotHtml } from './graph/plot/generator';
export type { SemanticQuery } from './parser/interfaces';
export type {
    NodeId,
    SourceSpan,
    SyntaxNode,
    UnitNode,
    DefinitionNode,
    ReferenceNode,
    OpaqueNode,
    CompilationUnit,
    DeclarationRef,
    Classification,
    CallResolution,
    TargetResolution,
} from './parser/types';
