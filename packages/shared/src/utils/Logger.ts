/**
 * Logging System
 *
 * Provides consistent logging across packages with context, formatting, and filtering.
 * Entries are buffered in memory (bounded) and optionally mirrored to the console.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SYSTEM = 4,
}

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  system?: string;
  error?: Error;
}

export interface LoggerConfig {
  minLevel: LogLevel;
  enableConsole: boolean;
  enableSystemLogs: boolean;
  maxLogEntries: number;
}

export interface SystemStats {
  errors: number;
  warnings: number;
  messages: number;
}

export class LoggerImpl {
  private config: LoggerConfig;
  private logs: LogEntry[] = [];
  private systemStats = new Map<string, SystemStats>();

  constructor(config?: Partial<LoggerConfig>) {
    this.config = {
      minLevel: LogLevel.INFO,
      enableConsole: true,
      enableSystemLogs: true,
      maxLogEntries: 10000,
      ...config,
    };
  }

  public configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
    this.trimLogs();
  }

  public debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  public info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  public error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  public system(systemName: string, message: string, context?: Record<string, unknown>): void {
    if (!this.config.enableSystemLogs) return;
    this.bumpStats(systemName, "messages");
    this.log(LogLevel.SYSTEM, `[${systemName}] ${message}`, context, undefined, systemName);
  }

  public systemDebug(systemName: string, message: string, context?: Record<string, unknown>): void {
    if (!this.config.enableSystemLogs) return;
    this.log(LogLevel.DEBUG, `[${systemName}] ${message}`, context, undefined, systemName);
  }

  public systemWarn(systemName: string, message: string, context?: Record<string, unknown>): void {
    if (!this.config.enableSystemLogs) return;
    this.bumpStats(systemName, "warnings");
    this.log(LogLevel.WARN, `[${systemName}] ${message}`, context, undefined, systemName);
  }

  public systemError(systemName: string, message: string, error?: Error, context?: Record<string, unknown>): void {
    if (!this.config.enableSystemLogs) return;
    this.bumpStats(systemName, "errors");
    this.log(LogLevel.ERROR, `[${systemName}] ${message}`, context, error, systemName);
  }

  private bumpStats(systemName: string, key: keyof SystemStats): void {
    const stats = this.systemStats.get(systemName) ?? { errors: 0, warnings: 0, messages: 0 };
    stats[key]++;
    this.systemStats.set(systemName, stats);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error,
    system?: string,
  ): void {
    if (level < this.config.minLevel) return;

    const entry: LogEntry = {
      timestamp: Date.now(),
      level,
      message,
      context,
      error,
      system,
    };

    this.logs.push(entry);
    this.trimLogs();

    if (this.config.enableConsole) {
      this.outputToConsole(entry);
    }
  }

  private outputToConsole(entry: LogEntry): void {
    const timestamp = new Date(entry.timestamp).toISOString();
    const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : "";
    const logMessage = `[${timestamp}] ${entry.message}${contextStr}`;

    switch (entry.level) {
      case LogLevel.DEBUG:
        console.debug(logMessage);
        break;
      case LogLevel.INFO:
      case LogLevel.SYSTEM:
        console.info(logMessage);
        break;
      case LogLevel.WARN:
        console.warn(logMessage);
        break;
      case LogLevel.ERROR:
        if (entry.error) {
          console.error(logMessage, entry.error);
        } else {
          console.error(logMessage);
        }
        break;
    }
  }

  private trimLogs(): void {
    if (this.logs.length > this.config.maxLogEntries) {
      this.logs.splice(0, this.logs.length - this.config.maxLogEntries);
    }
  }

  // Analytics and reporting methods
  public getSystemStats(): Map<string, SystemStats> {
    return new Map(this.systemStats);
  }

  public getRecentLogs(count: number = 100): LogEntry[] {
    return this.logs.slice(-count);
  }

  public getErrorLogs(count: number = 50): LogEntry[] {
    return this.logs.filter((log) => log.level === LogLevel.ERROR).slice(-count);
  }

  public getSystemLogs(systemName: string, count: number = 100): LogEntry[] {
    return this.logs.filter((log) => log.system === systemName).slice(-count);
  }

  public generateReport(): {
    totalLogs: number;
    logsByLevel: Record<string, number>;
    systemStats: Record<string, SystemStats>;
    recentErrors: LogEntry[];
  } {
    const logsByLevel: Record<string, number> = {};

    for (const log of this.logs) {
      const levelName = LogLevel[log.level];
      logsByLevel[levelName] = (logsByLevel[levelName] ?? 0) + 1;
    }

    return {
      totalLogs: this.logs.length,
      logsByLevel,
      systemStats: Object.fromEntries(this.systemStats),
      recentErrors: this.getErrorLogs(10),
    };
  }

  public clearLogs(): void {
    this.logs = [];
    this.systemStats.clear();
  }

  public setLogLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  public isLevelEnabled(level: LogLevel): boolean {
    return level >= this.config.minLevel;
  }
}

// Export singleton instance
export const Logger = new LoggerImpl();

/**
 * Minimal logger surface a component accepts, so callers can inject their own.
 */
export interface ILogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
}

// Convenience logger for systems
export class SystemLogger implements ILogger {
  constructor(
    private readonly systemName: string,
    private readonly sink: LoggerImpl = Logger,
  ) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.sink.systemDebug(this.systemName, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.sink.system(this.systemName, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.sink.systemWarn(this.systemName, message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.sink.systemError(this.systemName, message, error, context);
  }
}

/**
 * Parse a LOG_LEVEL value such as "warn" or "DEBUG".
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  switch (value.trim().toUpperCase()) {
    case "DEBUG":
      return LogLevel.DEBUG;
    case "INFO":
      return LogLevel.INFO;
    case "WARN":
      return LogLevel.WARN;
    case "ERROR":
      return LogLevel.ERROR;
    case "SYSTEM":
      return LogLevel.SYSTEM;
    default:
      return undefined;
  }
}

/**
 * Logger settings for a given environment. An explicit LOG_LEVEL wins over
 * the NODE_ENV default.
 */
export function resolveLoggerConfig(env: Record<string, string | undefined>): Partial<LoggerConfig> {
  let config: Partial<LoggerConfig>;

  if (env.NODE_ENV === "production") {
    config = { minLevel: LogLevel.WARN, enableConsole: true };
  } else if (env.NODE_ENV === "test") {
    config = { minLevel: LogLevel.ERROR, enableConsole: false };
  } else {
    // Development environment
    config = { minLevel: LogLevel.DEBUG, enableConsole: true, enableSystemLogs: true };
  }

  const level = parseLogLevel(env.LOG_LEVEL);
  if (level !== undefined) {
    config.minLevel = level;
  }

  return config;
}

// Environment-based configuration
if (typeof process !== "undefined" && process.env) {
  Logger.configure(resolveLoggerConfig(process.env));
}

export default Logger;
