/**
 * Structured Logging Utility
 *
 * Module-scoped loggers with a shared minimum level. The level is read from
 * LOG_LEVEL or HEATMAP_LOG_LEVEL when this module loads.
 *
 * @module utils/logger
 */

/**
 * Available log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Log entry structure
 */
export interface LogEntry {
  /** Timestamp in ISO format */
  timestamp: string;

  level: LogLevelName;

  /** Module/component name, e.g. `heatmap:view` */
  module: string;

  message: string;

  /** Additional context data */
  context?: Record<string, unknown>;

  error?: Error;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  minLevel: LogLevel;

  /** Emit each entry as a single JSON line */
  jsonOutput?: boolean;

  includeTimestamp?: boolean;

  /** Custom output handler (default: console) */
  outputHandler?: (entry: LogEntry) => void;
}

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: LogLevel.INFO,
  jsonOutput: false,
  includeTimestamp: true,
};

let globalConfig: LoggerConfig = { ...DEFAULT_CONFIG };

const LEVEL_NAMES: Record<LogLevel, LogLevelName> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.WARN]: 'warn',
  [LogLevel.ERROR]: 'error',
  [LogLevel.SILENT]: 'silent',
};

/**
 * Parse log level from string
 */
export function parseLogLevel(level: string | undefined): LogLevel {
  if (!level) return LogLevel.INFO;

  switch (level.trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'silent':
    case 'none':
      return LogLevel.SILENT;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Configure the global logger
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

/**
 * Reset global configuration to defaults
 */
export function resetLoggerConfig(): void {
  globalConfig = { ...DEFAULT_CONFIG };
}

/**
 * Set log level from LOG_LEVEL or HEATMAP_LOG_LEVEL
 */
export function configureFromEnvironment(env: NodeJS.ProcessEnv = process.env): void {
  const envLevel = env.LOG_LEVEL || env.HEATMAP_LOG_LEVEL;

  if (envLevel) {
    globalConfig.minLevel = parseLogLevel(envLevel);
  }
}

export function setLogLevel(level: LogLevel | LogLevelName): void {
  globalConfig.minLevel = typeof level === 'string' ? parseLogLevel(level) : level;
}

export function getLogLevel(): LogLevel {
  return globalConfig.minLevel;
}

/**
 * Format log entry for console output
 */
export function formatLogEntry(entry: LogEntry, includeTimestamp = true): string {
  const parts: string[] = [];

  if (includeTimestamp) {
    parts.push(`[${entry.timestamp}]`);
  }

  parts.push(`[${entry.level.toUpperCase()}]`);
  parts.push(`[${entry.module}]`);
  parts.push(entry.message);

  if (entry.context && Object.keys(entry.context).length > 0) {
    parts.push(JSON.stringify(entry.context));
  }

  return parts.join(' ');
}

function consoleOutputHandler(entry: LogEntry, config: LoggerConfig): void {
  const output = config.jsonOutput
    ? JSON.stringify({ ...entry, error: entry.error?.message })
    : formatLogEntry(entry, config.includeTimestamp ?? true);

  switch (entry.level) {
    case 'error':
      console.error(output);
      if (entry.error && !config.jsonOutput) {
        console.error(entry.error);
      }
      break;
    case 'warn':
      console.warn(output);
      break;
    case 'debug':
      console.debug(output);
      break;
    default:
      console.log(output);
  }
}

/**
 * Module-specific logger instance.
 *
 * Settings given to the constructor override the global configuration;
 * anything left out follows later calls to {@link configureLogger} and
 * {@link setLogLevel}.
 */
export class Logger {
  private readonly module: string;
  private readonly overrides: Partial<LoggerConfig>;

  constructor(module: string, overrides: Partial<LoggerConfig> = {}) {
    this.module = module;
    this.overrides = overrides;
  }

  get name(): string {
    return this.module;
  }

  private get config(): LoggerConfig {
    return { ...globalConfig, ...this.overrides };
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level >= this.config.minLevel;
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    const config = this.config;
    if (level < config.minLevel || level === LogLevel.SILENT) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LEVEL_NAMES[level],
      module: this.module,
      message,
      context,
      error,
    };

    if (config.outputHandler) {
      config.outputHandler(entry);
    } else {
      consoleOutputHandler(entry, config);
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  /**
   * Create a child logger named `<module>:<subModule>`
   */
  child(subModule: string): Logger {
    return new Logger(`${this.module}:${subModule}`, this.overrides);
  }

  /**
   * Create a logger that merges fixed context into every entry
   */
  withContext(fixedContext: Record<string, unknown>): LoggerWithContext {
    return new LoggerWithContext(this, fixedContext);
  }
}

/**
 * Logger with fixed context that's included in every log
 */
export class LoggerWithContext {
  constructor(
    private readonly logger: Logger,
    private readonly fixedContext: Record<string, unknown>
  ) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.logger.debug(message, { ...this.fixedContext, ...context });
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.logger.info(message, { ...this.fixedContext, ...context });
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.logger.warn(message, { ...this.fixedContext, ...context });
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.logger.error(message, error, { ...this.fixedContext, ...context });
  }
}

export function createLogger(module: string, overrides?: Partial<LoggerConfig>): Logger {
  return new Logger(module, overrides);
}

/**
 * Create a silent logger (for testing)
 */
export function createSilentLogger(module: string): Logger {
  return new Logger(module, { minLevel: LogLevel.SILENT });
}

configureFromEnvironment();
