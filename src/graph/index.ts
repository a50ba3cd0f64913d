/**
 * Call graph analysis pipeline.
 *
 * load program -> lower source files -> walk (builder) -> post-process.
 * The returned CallGraph is final; exporters only read it.
 */

import * as path from 'path';
import { createLogger, Logger } from '../common/logger';
import { SemanticQuery } from '../parser/interfaces';
import { lowerProgram } from '../parser/lowering';
import { NodeIdAllocator } from '../parser/node-ids';
import { TypeScriptSemanticQuery } from '../parser/ts-query';
import { TypeScriptService } from '../parser/ts-service';
import { CompilationUnit } from '../parser/types';
import { buildCallGraph, Diagnostic } from './callGraph/builder';
import { CallGraph } from './types';

export type { CallGraph, CallPair, CallKind } from './types';
export type { Diagnostic } from './callGraph/builder';

const log = createLogger('analyze');

export interface AnalysisResult {
    unit: CompilationUnit;
    graph: CallGraph;
    diagnostics: Diagnostic[];
}

export interface AnalyzeProjectOptions {
    tsconfigPath?: string;
    generatedMarkers?: readonly string[];
    logger?: Logger;
}

/**
 * Build and finalize the call graph of an already lowered unit.
 */
export function analyzeUnit(unit: CompilationUnit, query: SemanticQuery, logger: Logger = log): Omit<AnalysisResult, 'unit'> {
    const { model, diagnostics } = logger.timeSync('Traversal', () => buildCallGraph(unit, query, logger.child('builder')), {
        files: unit.files.length,
    });
    const pending = model.pendingDispatchCount;
    const graph = logger.timeSync('Post-processing', () => model.postProcess(), { dispatched: pending });

    logger.info('Call graph built', {
        callables: graph.callables.size,
        declarations: graph.declarations.size,
        definite: graph.definiteCalls.length,
        potential: graph.potentialCalls.length,
        warnings: diagnostics.length,
    });

    return { graph, diagnostics };
}

/**
 * Analyze the TypeScript/JavaScript project rooted at `root`.
 *
 * @throws ProjectLoadError when the project cannot be loaded
 */
export function analyzeProject(root: string, options: AnalyzeProjectOptions = {}): AnalysisResult {
    const logger = options.logger ?? log;
    const projectRoot = path.resolve(root);

    const service = logger.timeSync('Program load', () => new TypeScriptService(projectRoot, {
        tsconfigPath: options.tsconfigPath,
    }), { root: projectRoot });

    const ids = new NodeIdAllocator();
    // Creating the checker binds the files, which sets the parent pointers lowering reads.
    const query = new TypeScriptSemanticQuery(service.getProgram(), service.getUnitFiles(), projectRoot, ids, {
        generatedMarkers: options.generatedMarkers,
    });
    const unit = lowerProgram(path.basename(projectRoot), service.getUnitFiles(), projectRoot, ids);

    return { unit, ...analyzeUnit(unit, query, logger) };
}
