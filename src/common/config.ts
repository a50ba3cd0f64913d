/**
 * Configuration
 *
 * Merges CLI overrides, environment variables and defaults, then validates
 * the result with Zod.
 *
 * Priority:
 * 1. Explicit overrides (CLI flags)
 * 2. Environment variables
 * 3. Defaults
 */

import * as path from 'path';
import { z, ZodError } from 'zod';
import { ConfigError } from './errors';
import { LOG_LEVELS } from './logger';

export const DIAGRAM_FORMATS = ['dot', 'html'] as const;

export type DiagramFormat = (typeof DIAGRAM_FORMATS)[number];

/** Leading-comment markers that flag a file as generated. */
export const DEFAULT_GENERATED_MARKERS = ['@generated', 'DO NOT EDIT'];

/**
 * Default diagram path. Relative paths are resolved against the working
 * directory, not the analyzed project.
 */
export function defaultOutFile(format: DiagramFormat): string {
    return format === 'html' ? 'out.html' : 'out.dot';
}

export const ConfigSchema = z
    .object({
        projectRoot: z.string().min(1),
        tsconfig: z.string().min(1).optional(),
        outFile: z.string().min(1).optional(),
        format: z.enum(DIAGRAM_FORMATS).default('dot'),
        logLevel: z.enum(LOG_LEVELS).default('info'),
        logFormat: z.enum(['pretty', 'json']).default('pretty'),
        generatedMarkers: z.array(z.string().min(1)).default(DEFAULT_GENERATED_MARKERS),
    })
    .transform((raw) => ({
        ...raw,
        projectRoot: path.resolve(raw.projectRoot),
        tsconfig: raw.tsconfig === undefined ? undefined : path.resolve(raw.projectRoot, raw.tsconfig),
        outFile: raw.outFile ?? defaultOutFile(raw.format),
    }));

export type Config = z.output<typeof ConfigSchema>;

export type ConfigInput = z.input<typeof ConfigSchema>;

/**
 * Environment variables read by loadConfig:
 *
 * - CALLGRAPH_PROJECT: project root (default: cwd)
 * - CALLGRAPH_TSCONFIG: tsconfig path, relative to the project root
 * - CALLGRAPH_OUT: diagram output path (default: out.dot / out.html)
 * - CALLGRAPH_FORMAT: dot | html
 * - CALLGRAPH_GENERATED_MARKERS: comma-separated generated-file markers
 * - LOG_LEVEL, LOG_FORMAT: logger settings
 */
export const ENV_VARS = {
    PROJECT: 'CALLGRAPH_PROJECT',
    TSCONFIG: 'CALLGRAPH_TSCONFIG',
    OUT: 'CALLGRAPH_OUT',
    FORMAT: 'CALLGRAPH_FORMAT',
    GENERATED_MARKERS: 'CALLGRAPH_GENERATED_MARKERS',
    LOG_LEVEL: 'LOG_LEVEL',
    LOG_FORMAT: 'LOG_FORMAT',
} as const;

type Env = Record<string, string | undefined>;

function readEnv(env: Env, name: string): string | undefined {
    const value = env[name]?.trim();
    return value ? value : undefined;
}

function readEnvList(env: Env, name: string): string[] | undefined {
    const value = readEnv(env, name);
    if (value === undefined) return undefined;
    return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

function formatIssues(err: ZodError): string {
    return err.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join(', ');
}

/**
 * Build a validated configuration.
 *
 * @throws ConfigError when a value fails validation
 */
export function loadConfig(overrides: Partial<ConfigInput> = {}, env: Env = process.env): Config {
    const raw: Record<string, unknown> = {
        projectRoot: readEnv(env, ENV_VARS.PROJECT) ?? process.cwd(),
        tsconfig: readEnv(env, ENV_VARS.TSCONFIG),
        outFile: readEnv(env, ENV_VARS.OUT),
        format: readEnv(env, ENV_VARS.FORMAT),
        logLevel: readEnv(env, ENV_VARS.LOG_LEVEL),
        logFormat: readEnv(env, ENV_VARS.LOG_FORMAT),
        generatedMarkers: readEnvList(env, ENV_VARS.GENERATED_MARKERS),
    };

    for (const [key, value] of Object.entries(overrides)) {
        if (value !== undefined) raw[key] = value;
    }

    const parsed = ConfigSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
}
