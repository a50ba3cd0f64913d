#!/usr/bin/env node
/**
 * Call graph CLI
 *
 * Analyzes one TypeScript/JavaScript project, prints the textual dump to
 * stdout and writes a diagram (out.dot by default).
 *
 * Usage:
 *   callgraph                       # analyze the current directory
 *   callgraph ./my-project --format html --out graph.html
 */

import { loadConfig, ConfigInput, DiagramFormat, DIAGRAM_FORMATS, ENV_VARS } from './common/config';
import { ConfigError, describeError } from './common/errors';
import { configureLogger, createLogger, LogLevel } from './common/logger';
import { analyzeProject } from './graph';
import { formatDump, renderDiagram, writeDiagram } from './graph/export';

const log = createLogger('cli');

export interface CliArgs {
    project?: string;
    tsconfig?: string;
    out?: string;
    format?: DiagramFormat;
    verbose: boolean;
    quiet: boolean;
    help: boolean;
}

export interface CliIo {
    stdout: (text: string) => void;
    stderr: (text: string) => void;
    env: Record<string, string | undefined>;
}

const defaultIo: CliIo = {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    env: process.env,
};

function isDiagramFormat(value: string): value is DiagramFormat {
    return DIAGRAM_FORMATS.some(format => format === value);
}

/**
 * Parse command line arguments
 *
 * @throws ConfigError on unknown options or missing option values
 */
export function parseArgs(argv: readonly string[]): CliArgs {
    const result: CliArgs = { verbose: false, quiet: false, help: false };

    const valueOf = (i: number, flag: string): string => {
        const value = argv[i];
        if (value === undefined || value.startsWith('-')) {
            throw new ConfigError(`Missing value for ${flag}`);
        }
        return value;
    };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];

        switch (arg) {
            case '--tsconfig':
            case '-p':
                result.tsconfig = valueOf(++i, arg);
                break;

            case '--out':
            case '-o':
                result.out = valueOf(++i, arg);
                break;

            case '--format':
            case '-f': {
                const format = valueOf(++i, arg);
                if (!isDiagramFormat(format)) {
                    throw new ConfigError(`Unknown format: ${format} (expected ${DIAGRAM_FORMATS.join(' or ')})`);
                }
                result.format = format;
                break;
            }

            case '--verbose':
            case '-v':
                result.verbose = true;
                break;

            case '--quiet':
            case '-q':
                result.quiet = true;
                break;

            case '--help':
            case '-h':
                result.help = true;
                break;

            default:
                if (arg.startsWith('-')) {
                    throw new ConfigError(`Unknown option: ${arg}`);
                }
                if (result.project !== undefined) {
                    throw new ConfigError(`Unexpected argument: ${arg}`);
                }
                result.project = arg;
                break;
        }
    }

    return result;
}

export function helpText(): string {
    return `
callgraph - whole-program call graph for a TypeScript/JavaScript project

USAGE:
  callgraph [project-dir] [OPTIONS]

OPTIONS:
  --tsconfig, -p <path>   tsconfig.json to read compiler options from
  --out, -o <path>        Diagram output path (default: out.dot, or out.html)
  --format, -f <fmt>      Diagram format: dot | html (default: dot)
  --verbose, -v           Debug logging
  --quiet, -q             Only log warnings and errors
  --help, -h              Show this help

ENVIRONMENT:
  ${ENV_VARS.PROJECT}, ${ENV_VARS.TSCONFIG}, ${ENV_VARS.OUT}, ${ENV_VARS.FORMAT},
  ${ENV_VARS.GENERATED_MARKERS}, ${ENV_VARS.LOG_LEVEL}, ${ENV_VARS.LOG_FORMAT}
`;
}

function logLevelFor(args: CliArgs): LogLevel | undefined {
    if (args.verbose) return 'debug';
    if (args.quiet) return 'warn';
    return undefined;
}

/**
 * Run the CLI and return the process exit status.
 */
export function run(argv: readonly string[], io: CliIo = defaultIo): number {
    try {
        const args = parseArgs(argv);
        if (args.help) {
            io.stdout(helpText());
            return 0;
        }

        const overrides: Partial<ConfigInput> = {
            projectRoot: args.project,
            tsconfig: args.tsconfig,
            outFile: args.out,
            format: args.format,
            logLevel: logLevelFor(args),
        };
        const config = loadConfig(overrides, io.env);
        configureLogger({ level: config.logLevel, format: config.logFormat });

        const result = analyzeProject(config.projectRoot, {
            tsconfigPath: config.tsconfig,
            generatedMarkers: config.generatedMarkers,
        });

        io.stdout(formatDump(result.graph));
        writeDiagram(config.outFile, renderDiagram(result.graph, result.unit.name, config.format));
        log.info('Diagram written', { path: config.outFile, format: config.format });
        return 0;
    } catch (error) {
        io.stderr(`Error: ${describeError(error)}\n`);
        return 1;
    }
}

// Run if executed directly
if (require.main === module) {
    process.exitCode = run(process.argv.slice(2));
}
