/**
 * Error taxonomy.
 *
 * Only a call observed outside any callable body is recoverable, and that is
 * reported as a diagnostic rather than thrown. Everything here aborts the run.
 */

export type CallGraphErrorCode =
    | 'GRAPH_INVARIANT'
    | 'OUTPUT_IO'
    | 'PROJECT_LOAD'
    | 'CONFIG';

export class CallGraphError extends Error {
    constructor(
        message: string,
        public readonly code: CallGraphErrorCode,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * An edge or implementation link names an identity that was never
 * registered. Indicates a front end that breaks the facade contract.
 */
export class GraphInvariantError extends CallGraphError {
    constructor(message: string) {
        super(message, 'GRAPH_INVARIANT');
    }
}

export class OutputError extends CallGraphError {
    constructor(public readonly outputPath: string, cause: unknown) {
        super(`Failed to write ${outputPath}: ${describeError(cause)}`, 'OUTPUT_IO', { cause });
    }
}

export class ProjectLoadError extends CallGraphError {
    constructor(message: string, cause?: unknown) {
        super(message, 'PROJECT_LOAD', { cause });
    }
}

export class ConfigError extends CallGraphError {
    constructor(message: string) {
        super(message, 'CONFIG');
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
