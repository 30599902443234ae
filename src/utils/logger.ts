/**
 * Logger for the LS3 toolkit
 *
 * Supports log levels, a prefix per subsystem and timing of operations.
 */

/**
 * Log Levels
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  SILENT = 'silent'
}

/**
 * Logger Options Interface
 */
export interface LoggerOptions {
  level?: LogLevel;
  timestamp?: boolean;
  duration?: boolean;
  prefix?: string;
}

/**
 * Logger Context Interface
 */
export interface LoggerContext {
  operation?: string | undefined;
  stage?: string | undefined;
  filePath?: string | undefined;
  fileSize?: number | undefined;
  duration?: number | undefined;
  [key: string]: unknown;
}

const LEVEL_ORDER: readonly LogLevel[] = [
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.WARN,
  LogLevel.ERROR,
  LogLevel.SILENT
];

export class Logger {
  private options: Required<LoggerOptions>;
  private startTimes: Map<string, number> = new Map();

  constructor(options: LoggerOptions = {}) {
    this.options = {
      level: options.level ?? LogLevel.INFO,
      timestamp: options.timestamp ?? true,
      duration: options.duration ?? true,
      prefix: options.prefix ?? 'LS3'
    };
  }

  get level(): LogLevel {
    return this.options.level;
  }

  private formatTimestamp(): string {
    if (!this.options.timestamp) return '';
    return new Date().toISOString().slice(11, 23);
  }

  /**
   * Get colors for terminal output
   */
  private getColor(level: LogLevel): string {
    switch (level) {
      case LogLevel.DEBUG:
        return '\x1b[90m'; // Gray
      case LogLevel.INFO:
        return '\x1b[36m'; // Cyan
      case LogLevel.WARN:
        return '\x1b[33m'; // Yellow
      case LogLevel.ERROR:
        return '\x1b[31m'; // Red
      default:
        return '\x1b[90m';
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.options.level);
  }

  private log(level: LogLevel, message: string, context?: LoggerContext): void {
    if (!this.shouldLog(level)) return;

    const timestamp = this.formatTimestamp();
    const prefix = `${this.options.prefix} [${level.toUpperCase()}]`;
    const timeStr = timestamp ? ` @ ${timestamp}` : '';
    const logMessage = `${this.getColor(level)}${prefix}${timeStr} ${message}\x1b[0m`;

    const write = level === LogLevel.ERROR ? console.error : level === LogLevel.WARN ? console.warn : console.log;
    if (context) {
      write(logMessage, context);
    } else {
      write(logMessage);
    }
  }

  debug(message: string, context?: LoggerContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LoggerContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LoggerContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, context?: LoggerContext): void {
    this.log(LogLevel.ERROR, message, context);
  }

  /**
   * Start timing an operation
   */
  startTiming(operation: string): void {
    this.startTimes.set(operation, Date.now());
    this.debug(`Starting operation: ${operation}`, { operation });
  }

  /**
   * End timing an operation
   */
  endTiming(operation: string, context?: LoggerContext): void {
    const startTime = this.startTimes.get(operation);
    if (startTime === undefined) return;

    this.startTimes.delete(operation);
    this.info(`Completed operation: ${operation}`, {
      operation,
      ...(this.options.duration ? { duration: Date.now() - startTime } : {}),
      ...context
    });
  }

  /**
   * Log operation with timing
   */
  async withTiming<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: LoggerContext
  ): Promise<T> {
    this.startTiming(operation);
    try {
      const result = await fn();
      this.endTiming(operation, { ...context, success: true });
      return result;
    } catch (error) {
      this.endTiming(operation, { ...context, success: false, error: error instanceof Error ? error.message : String(error) });
      throw error;
    }
  }

  logFileOperation(operation: string, filePath: string, fileSize?: number, context?: LoggerContext): void {
    this.info(`File operation: ${operation}`, {
      operation,
      filePath,
      fileSize,
      ...context
    });
  }

  logConversionStage(stage: string, context?: LoggerContext): void {
    this.info(`Conversion stage: ${stage}`, {
      stage,
      ...context
    });
  }

  logConfig(config: Record<string, unknown>, context?: LoggerContext): void {
    this.debug('Configuration loaded', {
      config,
      ...context
    });
  }

  logError(error: Error, context?: LoggerContext): void {
    this.error(`Error occurred: ${error.message}`, {
      error: error.message,
      stack: error.stack,
      ...context
    });
  }
}

/**
 * Create logger with custom options
 */
export function createLogger(options: LoggerOptions): Logger {
  return new Logger(options);
}

/**
 * Logger factory for specific operations
 */
export const LoggerFactory = {
  forExport(): Logger {
    return createLogger({
      level: LogLevel.INFO,
      timestamp: true,
      duration: true,
      prefix: 'LS3-Export'
    });
  },

  forImport(): Logger {
    return createLogger({
      level: LogLevel.INFO,
      timestamp: true,
      duration: true,
      prefix: 'LS3-Import'
    });
  },

  forDebug(): Logger {
    return createLogger({
      level: LogLevel.DEBUG,
      timestamp: true,
      duration: true,
      prefix: 'LS3-Debug'
    });
  },

  /**
   * Logger that drops everything; used where a caller passes no logger.
   */
  silent(): Logger {
    return createLogger({ level: LogLevel.SILENT, prefix: 'LS3' });
  }
};
