/**
 * Structured Logging Module
 *
 * Provides structured JSON logging with sensitive-field masking and
 * correlation ID support.
 *
 * @tested tests/property/comprehensive-logging.property.test.ts
 */

import { z } from 'zod';

/**
 * Log levels supported by the logger
 */
export const LogLevel = {
  DEBUG: 'debug',
  INFO: 'info',
  WARN: 'warn',
  ERROR: 'error',
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/**
 * Patterns for sensitive values embedded in free text.
 * Phone patterns require a leading + or separators so listing ids do not match.
 */
export const SENSITIVE_PATTERNS = {
  email: /[a-zA-Z0-9][a-zA-Z0-9._%+-]*@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
  phone: /\+\d{1,3}[-.\s]?\d{1,4}[-.\s]?\d{3,4}[-.\s]?\d{3,4}\b/g,
  bearer: /Bearer\s+[A-Za-z0-9._~+/-]+=*/g,
} as const;

/**
 * Field names whose values are always masked in log metadata
 */
export const SENSITIVE_FIELD_NAMES = [
  'email',
  'phone',
  'phoneNumber',
  'licensePlate',
  'ownerId',
  'password',
  'secret',
  'token',
  'apiKey',
  'authorization',
] as const;

/**
 * Structured log entry schema
 */
export const LogEntrySchema = z.object({
  timestamp: z.string(),
  level: LogLevelSchema,
  message: z.string(),
  correlationId: z.string().optional(),
  service: z.string(),
  metadata: z.record(z.unknown()).optional(),
  error: z
    .object({
      name: z.string(),
      message: z.string(),
      stack: z.string().optional(),
    })
    .optional(),
});

export type LogEntry = z.infer<typeof LogEntrySchema>;

/**
 * Search log entry recording inputs, tier sizes and outcome
 */
export interface SearchLogEntry {
  correlationId: string;
  domain: string;
  criteria: Record<string, unknown>;
  candidateCount: number;
  resultCount: number;
  relaxed: string[];
  fallback: boolean;
  outcome: string;
  processingTimeMs: number;
}

/**
 * Log sink; defaults to the console
 */
export type LogWriter = (level: LogLevel, line: string) => void;

/**
 * Logger configuration
 */
export interface LoggerConfig {
  serviceName: string;
  minLevel: LogLevel;
  enableConsole: boolean;
  maskSensitive: boolean;
  writer?: LogWriter;
}

/**
 * Default logger configuration
 */
export const defaultLoggerConfig: LoggerConfig = {
  serviceName: 'rentmatch',
  minLevel: LogLevel.INFO,
  enableConsole: true,
  maskSensitive: true,
};

function consoleWriter(level: LogLevel, line: string): void {
  if (level === LogLevel.ERROR) {
    console.error(line);
  } else {
    console.log(line);
  }
}

/**
 * Masks sensitive values in a string
 */
export function maskSensitiveString(value: string): string {
  return value
    .replace(SENSITIVE_PATTERNS.email, '[EMAIL_MASKED]')
    .replace(SENSITIVE_PATTERNS.phone, '[PHONE_MASKED]')
    .replace(SENSITIVE_PATTERNS.bearer, 'Bearer [TOKEN_MASKED]');
}

export function isSensitiveFieldName(fieldName: string): boolean {
  const lower = fieldName.toLowerCase();
  return SENSITIVE_FIELD_NAMES.some((name) => lower === name.toLowerCase());
}

/**
 * Masks sensitive values in an object recursively
 */
export function maskSensitiveObject(obj: unknown, depth = 0): unknown {
  if (depth > 10) {
    return '[MAX_DEPTH_EXCEEDED]';
  }

  if (obj === null || obj === undefined) {
    return obj;
  }

  if (typeof obj === 'string') {
    return maskSensitiveString(obj);
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => maskSensitiveObject(item, depth + 1));
  }

  if (typeof obj === 'object') {
    const masked: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (isSensitiveFieldName(key) && value !== null && value !== undefined) {
        masked[key] = '[MASKED]';
      } else {
        masked[key] = maskSensitiveObject(value, depth + 1);
      }
    }
    return masked;
  }

  return obj;
}

function maskMetadata(metadata: Record<string, unknown>): Record<string, unknown> {
  const masked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(metadata)) {
    masked[key] =
      isSensitiveFieldName(key) && value !== null && value !== undefined
        ? '[MASKED]'
        : maskSensitiveObject(value, 1);
  }
  return masked;
}

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(minLevel);
}

/**
 * Structured Logger
 */
export class Logger {
  private readonly config: LoggerConfig;
  private correlationId?: string;
  private logEntries: LogEntry[] = [];

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...defaultLoggerConfig, ...config };
  }

  setCorrelationId(correlationId: string): void {
    this.correlationId = correlationId;
  }

  getCorrelationId(): string | undefined {
    return this.correlationId;
  }

  /**
   * Creates a child logger bound to a correlation ID. Entries written by the
   * child are not visible through the parent's getLogEntries().
   */
  child(correlationId: string): Logger {
    const childLogger = new Logger(this.config);
    childLogger.setCorrelationId(correlationId);
    return childLogger;
  }

  /**
   * Gets all log entries (for testing)
   */
  getLogEntries(): LogEntry[] {
    return [...this.logEntries];
  }

  clearLogEntries(): void {
    this.logEntries = [];
  }

  private createLogEntry(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: this.config.serviceName,
      correlationId: this.correlationId,
    };

    if (metadata) {
      entry.metadata = this.config.maskSensitive ? maskMetadata(metadata) : metadata;
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: this.config.maskSensitive ? maskSensitiveString(error.message) : error.message,
        stack: error.stack,
      };
    }

    return entry;
  }

  private log(level: LogLevel, message: string, metadata?: Record<string, unknown>, error?: Error): void {
    if (!shouldLog(level, this.config.minLevel)) {
      return;
    }

    const entry = this.createLogEntry(level, message, metadata, error);
    this.logEntries.push(entry);

    if (this.config.enableConsole) {
      const write = this.config.writer ?? consoleWriter;
      write(level, JSON.stringify(entry));
    }
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, metadata);
  }

  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, metadata, error);
  }

  /**
   * Logs a completed search with its inputs and outcome
   */
  logSearch(entry: SearchLogEntry): void {
    this.setCorrelationId(entry.correlationId);

    const metadata: Record<string, unknown> = {
      domain: entry.domain,
      criteria: entry.criteria,
      candidateCount: entry.candidateCount,
      resultCount: entry.resultCount,
      outcome: entry.outcome,
      processingTimeMs: entry.processingTimeMs,
    };

    if (entry.relaxed.length > 0) {
      metadata.relaxed = entry.relaxed;
      metadata.fallback = entry.fallback;
    }

    this.info('Search completed', metadata);
  }

  /**
   * Logs a call to an external dependency
   */
  logDependency(name: string, data: string, duration: number, success: boolean, dependencyType: string): void {
    const metadata: Record<string, unknown> = {
      dependencyName: name,
      dependencyData: data,
      duration,
      success,
      dependencyType,
    };

    if (success) {
      this.info(`Dependency call to ${name} succeeded`, metadata);
    } else {
      this.warn(`Dependency call to ${name} failed`, metadata);
    }
  }
}

export function createLogger(config: Partial<LoggerConfig> = {}): Logger {
  return new Logger(config);
}

let globalLogger: Logger | null = null;

/**
 * Gets the global logger instance
 */
export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = createLogger();
  }
  return globalLogger;
}

export function setLogger(logger: Logger): void {
  globalLogger = logger;
}

/**
 * Resets the global logger (for testing)
 */
export function resetLogger(): void {
  globalLogger = null;
}
