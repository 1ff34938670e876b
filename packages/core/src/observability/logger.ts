/**
 * Structured logging for Chronicle.
 *
 * A small leveled logger with module prefixes, text or JSON line output,
 * a pluggable handler and a global debug toggle. Every component takes an
 * optional {@link Logger} and derives a child from it.
 *
 * @module observability/logger
 */

/** Log level */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Output format when no handler is set */
export type LogFormat = 'text' | 'json';

/** Structured log entry */
export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: number;
  readonly module: string;
  readonly context?: Record<string, unknown>;
}

/** Logger configuration */
export interface LoggerConfig {
  /** Minimum log level (default: 'info') */
  readonly level?: LogLevel;
  /** Enable debug mode (overrides level to 'debug') */
  readonly debug?: boolean;
  /** Module name prefix */
  readonly module?: string;
  /** Custom log handler (default: console) */
  readonly handler?: (entry: LogEntry) => void;
  /** Console output format (default: 'text') */
  readonly format?: LogFormat;
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let globalDebug = false;

/** Enable/disable global debug mode for all loggers */
export function setDebugMode(enabled: boolean): void {
  globalDebug = enabled;
}

export function isDebugMode(): boolean {
  return globalDebug;
}

function writeText(entry: LogEntry): void {
  const timestamp = new Date(entry.timestamp).toISOString();
  const context = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
  const line = `${timestamp} ${entry.level.toUpperCase()} [${entry.module}] ${entry.message}${context}`;

  switch (entry.level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    default:
      console.log(line);
  }
}

function writeJson(entry: LogEntry): void {
  const consoleFn =
    entry.level === 'error' ? console.error : entry.level === 'warn' ? console.warn : console.log;
  consoleFn(JSON.stringify(entry));
}

/**
 * Structured logger.
 *
 * @example
 * ```typescript
 * const log = createLogger({ module: 'gateway', level: 'debug' });
 * const relayLog = log.child('relay'); // module "gateway:relay"
 *
 * relayLog.info('Subscribed', { topic: 'telemetry/history/#' });
 *
 * const end = log.time('flush');
 * await buffer.flush();
 * end({ records: 120 }); // debug "flush completed" with durationMs
 * ```
 */
export class Logger {
  private readonly config: Required<Omit<LoggerConfig, 'handler'>> &
    Pick<LoggerConfig, 'handler'>;

  constructor(config: LoggerConfig = {}) {
    this.config = {
      level: config.debug ? 'debug' : (config.level ?? 'info'),
      debug: config.debug ?? false,
      module: config.module ?? 'chronicle',
      handler: config.handler,
      format: config.format ?? 'text',
    };
  }

  get module(): string {
    return this.config.module;
  }

  /** Create a child logger with a sub-module prefix */
  child(subModule: string): Logger {
    return new Logger({
      ...this.config,
      module: `${this.config.module}:${subModule}`,
    });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(
      'error',
      message,
      error ? { ...context, error: { message: error.message, stack: error.stack } } : context
    );
  }

  /**
   * Start a timer. The returned function logs `<operation> completed` at debug level.
   */
  time(operation: string): (context?: Record<string, unknown>) => void {
    const start = performance.now();
    return (context?: Record<string, unknown>) => {
      const durationMs = Math.round((performance.now() - start) * 100) / 100;
      this.log('debug', `${operation} completed`, { ...context, durationMs });
    };
  }

  // ── Private ──────────────────────────────────────────────────────────

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    const effectiveLevel = globalDebug ? 'debug' : this.config.level;
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[effectiveLevel]) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      module: this.config.module,
      ...(context ? { context } : {}),
    };

    if (this.config.handler) {
      this.config.handler(entry);
      return;
    }

    if (this.config.format === 'json') {
      writeJson(entry);
    } else {
      writeText(entry);
    }
  }
}

/** Factory function to create a Logger */
export function createLogger(config?: LoggerConfig): Logger {
  return new Logger(config);
}

/** Logger that drops everything below error; the default for library components */
export function createQuietLogger(module: string): Logger {
  return new Logger({ module, level: 'error' });
}
