/**
 * Structured Logger
 *
 * Leveled, scoped logging for the call-graph tool. Lines go to stderr by
 * default so the textual dump on stdout stays machine-readable.
 *
 * Usage:
 *   import { createLogger } from './common/logger';
 *
 *   const log = createLogger('builder');
 *   log.warn('call without known current function', { at: 'src/a.ts:3:5' });
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogFormat = 'pretty' | 'json';

export interface LogEntry {
    level: Exclude<LogLevel, 'silent'>;
    scope: string;
    message: string;
    data?: Record<string, unknown>;
    timestamp: string;
    durationMs?: number;
}

export interface LoggerConfig {
    /** Minimum level to log (default: 'info') */
    level: LogLevel;
    format: LogFormat;
    timestamps: boolean;
    /** Sink for formatted lines (default: console.error) */
    output: (line: string) => void;
}

// ============================================================================
// Log Level Utilities
// ============================================================================

const LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

const LEVEL_COLORS: Record<LogEntry['level'], string> = {
    debug: '\x1b[90m',
    info: '\x1b[36m',
    warn: '\x1b[33m',
    error: '\x1b[31m',
};

const LEVEL_LABELS: Record<LogEntry['level'], string> = {
    debug: 'DBG',
    info: 'INF',
    warn: 'WRN',
    error: 'ERR',
};

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

// ============================================================================
// Global Configuration
// ============================================================================

const DEFAULT_CONFIG: LoggerConfig = {
    level: 'info',
    format: 'pretty',
    timestamps: true,
    output: (line) => console.error(line),
};

let globalConfig: LoggerConfig = { ...DEFAULT_CONFIG };

export function configureLogger(config: Partial<LoggerConfig>): void {
    globalConfig = { ...globalConfig, ...config };
}

/**
 * Restore defaults. Tests that swap the output sink call this in `after`.
 */
export function resetLogger(): void {
    globalConfig = { ...DEFAULT_CONFIG };
}

export function setLogLevel(level: LogLevel): void {
    globalConfig.level = level;
}

export function getLogLevel(): LogLevel {
    return globalConfig.level;
}

// ============================================================================
// Formatting
// ============================================================================

function formatTimestamp(): string {
    const now = new Date();
    const h = now.getHours().toString().padStart(2, '0');
    const m = now.getMinutes().toString().padStart(2, '0');
    const s = now.getSeconds().toString().padStart(2, '0');
    const ms = now.getMilliseconds().toString().padStart(3, '0');
    return `${h}:${m}:${s}.${ms}`;
}

function formatData(data: Record<string, unknown>): string {
    const parts: string[] = [];
    for (const [key, value] of Object.entries(data)) {
        if (value === undefined) continue;
        const strVal = typeof value === 'string' ? value : JSON.stringify(value);
        const display = strVal.length > 80 ? strVal.slice(0, 77) + '...' : strVal;
        parts.push(`${key}=${display}`);
    }
    return parts.join(' ');
}

function formatPretty(entry: LogEntry): string {
    const parts: string[] = [];

    if (globalConfig.timestamps) {
        parts.push(`${DIM}${entry.timestamp}${RESET}`);
    }
    parts.push(`${LEVEL_COLORS[entry.level]}${LEVEL_LABELS[entry.level]}${RESET}`);
    if (entry.scope) {
        parts.push(`${DIM}[${entry.scope}]${RESET}`);
    }
    parts.push(entry.message);
    if (entry.durationMs !== undefined) {
        parts.push(`${DIM}(${entry.durationMs}ms)${RESET}`);
    }
    if (entry.data && Object.keys(entry.data).length > 0) {
        parts.push(`${DIM}${formatData(entry.data)}${RESET}`);
    }

    return parts.join(' ');
}

function formatJson(entry: LogEntry): string {
    return JSON.stringify({
        ts: entry.timestamp,
        level: entry.level,
        scope: entry.scope || undefined,
        msg: entry.message,
        ...entry.data,
        durationMs: entry.durationMs,
    });
}

// ============================================================================
// Logger Class
// ============================================================================

export class Logger {
    constructor(private readonly scope: string = '') {}

    private emit(level: LogEntry['level'], message: string, data?: Record<string, unknown>, durationMs?: number): void {
        if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[globalConfig.level]) return;

        const entry: LogEntry = {
            level,
            scope: this.scope,
            message,
            data,
            timestamp: formatTimestamp(),
            durationMs,
        };

        globalConfig.output(globalConfig.format === 'json' ? formatJson(entry) : formatPretty(entry));
    }

    debug(message: string, data?: Record<string, unknown>): void {
        this.emit('debug', message, data);
    }

    info(message: string, data?: Record<string, unknown>): void {
        this.emit('info', message, data);
    }

    warn(message: string, data?: Record<string, unknown>): void {
        this.emit('warn', message, data);
    }

    error(message: string, data?: Record<string, unknown>): void {
        this.emit('error', message, data);
    }

    child(childScope: string): Logger {
        return new Logger(this.scope ? `${this.scope}:${childScope}` : childScope);
    }

    /**
     * Run a synchronous stage and log how long it took. Failures are logged
     * at error level and rethrown.
     */
    timeSync<T>(message: string, fn: () => T, data?: Record<string, unknown>): T {
        const start = Date.now();
        try {
            const result = fn();
            this.emit('debug', message, data, Date.now() - start);
            return result;
        } catch (error) {
            this.emit('error', `${message} (failed)`, {
                ...data,
                error: error instanceof Error ? error.message : String(error),
            }, Date.now() - start);
            throw error;
        }
    }
}

// ============================================================================
// Factory and Default Instance
// ============================================================================

export function createLogger(scope: string): Logger {
    return new Logger(scope);
}

export const logger = new Logger();

export default logger;
