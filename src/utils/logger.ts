/**
 * Logger for the SceneGraph interchange library
 *
 * Supports log levels, prefixes, timestamps and timing of operations.
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

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR, LogLevel.SILENT];

/**
 * Logger Class
 */
export class Logger {
  private options: Required<LoggerOptions>;
  private startTimes: Map<string, number> = new Map();

  constructor(options: LoggerOptions = {}) {
    this.options = {
      level: options.level || LogLevel.INFO,
      timestamp: options.timestamp ?? true,
      duration: options.duration ?? true,
      prefix: options.prefix || 'SceneGraph'
    };
  }

  /**
   * Current minimum level
   */
  getLevel(): LogLevel {
    return this.options.level;
  }

  /**
   * Format timestamp
   */
  private formatTimestamp(): string {
    if (!this.options.timestamp) return '';
    return new Date().toISOString().substring(11, 23);
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

  private getLevelPrefix(level: LogLevel): string {
    switch (level) {
      case LogLevel.DEBUG:
        return 'DEBUG';
      case LogLevel.INFO:
        return 'INFO';
      case LogLevel.WARN:
        return 'WARN';
      case LogLevel.ERROR:
        return 'ERROR';
      default:
        return 'LOG';
    }
  }

  /**
   * Check if should log based on level
   */
  private shouldLog(level: LogLevel): boolean {
    if (this.options.level === LogLevel.SILENT) return false;
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.options.level);
  }

  /**
   * Base log method
   */
  private log(level: LogLevel, message: string, context?: LoggerContext, data?: unknown): void {
    if (!this.shouldLog(level)) return;

    const timestamp = this.formatTimestamp();
    const prefix = `${this.options.prefix} [${this.getLevelPrefix(level)}]`;
    const timeStr = timestamp ? ` @ ${timestamp}` : '';
    const logMessage = `${this.getColor(level)}${prefix}${timeStr} ${message}\x1b[0m`;
    const write = level === LogLevel.ERROR ? console.error : level === LogLevel.WARN ? console.warn : console.log;

    if (context) {
      write(logMessage, context);
    } else if (data !== undefined) {
      write(logMessage, data);
    } else {
      write(logMessage);
    }
  }

  debug(message: string, context?: LoggerContext, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, context, data);
  }

  info(message: string, context?: LoggerContext, data?: unknown): void {
    this.log(LogLevel.INFO, message, context, data);
  }

  warn(message: string, context?: LoggerContext, data?: unknown): void {
    this.log(LogLevel.WARN, message, context, data);
  }

  error(message: string, context?: LoggerContext, data?: unknown): void {
    this.log(LogLevel.ERROR, message, context, data);
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
    if (startTime !== undefined) {
      const duration = Date.now() - startTime;
      this.startTimes.delete(operation);
      this.info(`Completed operation: ${operation}`, {
        operation,
        ...(this.options.duration ? { duration } : {}),
        ...context
      });
    }
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

  /**
   * Log file operation
   */
  logFileOperation(operation: string, filePath: string, fileSize?: number, context?: LoggerContext): void {
    this.info(`File operation: ${operation}`, {
      operation,
      filePath,
      fileSize,
      ...context
    });
  }

  /**
   * Log export/import stage
   */
  logStage(stage: string, context?: LoggerContext): void {
    this.info(`Stage: ${stage}`, {
      stage,
      ...context
    });
  }

  /**
   * Log configuration
   */
  logConfig(config: Record<string, unknown>, context?: LoggerContext): void {
    this.debug('Configuration loaded', {
      config,
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
  forExport(level: LogLevel = LogLevel.INFO): Logger {
    return createLogger({
      level,
      timestamp: true,
      duration: true,
      prefix: 'SceneGraph-Export'
    });
  },

  forImport(level: LogLevel = LogLevel.INFO): Logger {
    return createLogger({
      level,
      timestamp: true,
      duration: true,
      prefix: 'SceneGraph-Import'
    });
  },

  forFileOperations(level: LogLevel = LogLevel.INFO): Logger {
    return createLogger({
      level,
      timestamp: true,
      duration: false,
      prefix: 'SceneGraph-File'
    });
  }
};
