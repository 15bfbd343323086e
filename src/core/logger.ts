// Centralized logging service for xml-validate

/**
 * Log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
  /** Sink for formatted lines; stdout is reserved for the report */
  write?: (line: string) => void;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: LogLevel.WARN,
  prefix: '[xml-validate]'
};

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT
};

/**
 * Map a configured level name onto a LogLevel
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  return LEVEL_NAMES[name.toLowerCase()];
}

/**
 * Centralized logger with structured output, written to stderr
 */
export class Logger {
  private readonly config: LoggerConfig;
  private static instance: Logger | null = null;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Get singleton instance
   */
  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  private format(level: string, message: string, context?: Record<string, unknown>): string {
    const parts: string[] = [];

    if (this.config.prefix) {
      parts.push(this.config.prefix);
    }

    parts.push(`[${level}]`);
    parts.push(message);

    if (context && Object.keys(context).length > 0) {
      parts.push(JSON.stringify(context));
    }

    return parts.join(' ');
  }

  private emit(level: LogLevel, label: string, message: string, context?: Record<string, unknown>): void {
    if (this.config.level > level) {
      return;
    }
    const line = this.format(label, message, context);
    if (this.config.write) {
      this.config.write(line);
    } else {
      console.error(line);
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.DEBUG, 'DEBUG', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.INFO, 'INFO', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.WARN, 'WARN', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.emit(LogLevel.ERROR, 'ERROR', message, context);
  }
}
