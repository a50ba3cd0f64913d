/**
 * Common utilities shared across modules
 */

export {
    Logger,
    logger,
    createLogger,
    configureLogger,
    resetLogger,
    setLogLevel,
    getLogLevel,
    LOG_LEVELS,
} from './logger';
export type { LogLevel, LogFormat, LogEntry, LoggerConfig } from './logger';

export {
    CallGraphError,
    GraphInvariantError,
    OutputError,
    ProjectLoadError,
    ConfigError,
    describeError,
} from './errors';
export type { CallGraphErrorCode } from './errors';

export { loadConfig, defaultOutFile, ConfigSchema, ENV_VARS, DIAGRAM_FORMATS, DEFAULT_GENERATED_MARKERS } from './config';
export type { Config, ConfigInput, DiagramFormat } from './config';
