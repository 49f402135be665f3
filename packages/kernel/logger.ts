import { getRequestContext, type ContextSource } from './request-context';
import { sanitizeForLogging } from './redaction';

/**
* Structured Logger
*
* JSON log lines on stderr, one per entry. Loggers are bound to a service
* name and pick up the request or job id from the active request context.
*/

// ============================================================================
// Type Definitions
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  service?: string | undefined;
  /** Request ID or BullMQ job ID */
  correlationId?: string | undefined;
  source?: ContextSource | undefined;
  /** Milliseconds since the request context started */
  duration?: number | undefined;
  errorMessage?: string | undefined;
  errorStack?: string | undefined;
  metadata?: Record<string, unknown> | undefined;
}

export type LogHandler = (entry: LogEntry) => void;

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && LEVELS.some(level => level === value);
}

// ============================================================================
// Level Configuration
// ============================================================================

/**
* Configured level from LOG_LEVEL, defaulting to 'info' in production
* and 'debug' elsewhere. Read on every call so tests can change it.
*/
function getConfiguredLogLevel(): LogLevel {
  const envLevel = process.env['LOG_LEVEL']?.toLowerCase();
  if (isLogLevel(envLevel)) {
    return envLevel;
  }
  return process.env['NODE_ENV'] === 'production' ? 'info' : 'debug';
}

function shouldLog(level: LogLevel): boolean {
  return LEVELS.indexOf(level) >= LEVELS.indexOf(getConfiguredLogLevel());
}

// ============================================================================
// Handlers
// ============================================================================

/**
* Default handler. Everything goes to stderr so stdout stays clean for CLI output.
*/
function consoleHandler(entry: LogEntry): void {
  const output: Record<string, unknown> = {
    time: entry.timestamp,
    level: entry.level.toUpperCase(),
    message: entry.message,
  };

  if (entry.service) output['service'] = entry.service;
  if (entry.correlationId) output['correlationId'] = entry.correlationId;
  if (entry.source) output['source'] = entry.source;
  if (entry.duration !== undefined) output['duration'] = entry.duration;
  if (entry.errorMessage) output['error'] = entry.errorMessage;
  if (entry.errorStack && getConfiguredLogLevel() === 'debug') output['stack'] = entry.errorStack;
  if (entry.metadata && Object.keys(entry.metadata).length > 0) {
    output['metadata'] = sanitizeForLogging(entry.metadata);
  }

  console.error(JSON.stringify(output));
}

let handlers: readonly LogHandler[] = [consoleHandler];

/**
* Add a log handler
* @returns Function that removes the handler again
*/
export function addLogHandler(handler: LogHandler): () => void {
  handlers = [...handlers, handler];
  return () => {
    handlers = handlers.filter(h => h !== handler);
  };
}

/**
* Remove all handlers, including the console handler
*/
export function clearLogHandlers(): void {
  handlers = [];
}

/**
* Restore the default console handler only
*/
export function resetLogHandlers(): void {
  handlers = [consoleHandler];
}

function emit(entry: LogEntry): void {
  for (const handler of handlers) {
    handler(entry);
  }
}

// ============================================================================
// Logger
// ============================================================================

/**
* Logger instance bound to a service name and optional static context
*/
export class Logger {
  private readonly context: Record<string, unknown>;

  constructor(
  private readonly service: string,
  context?: Record<string, unknown>
  ) {
  this.context = context || {};
  }

  private createEntry(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    err?: Error
  ): LogEntry {
    const requestContext = getRequestContext();

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: `[${this.service}] ${message}`,
      service: this.service,
      metadata: { ...this.context, ...metadata },
    };

    if (requestContext) {
      entry.correlationId = requestContext.requestId;
      entry.source = requestContext.source;
      entry.duration = Date.now() - requestContext.startTime;
    }

    if (err) {
      entry.errorMessage = err.message;
      entry.errorStack = err.stack;
    }

    return entry;
  }

  private log(level: LogLevel, message: string, metadata?: Record<string, unknown>, err?: Error): void {
    if (shouldLog(level)) {
      emit(this.createEntry(level, message, metadata, err));
    }
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
  this.log('debug', message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
  this.log('info', message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
  this.log('warn', message, metadata);
  }

  /**
  * Log at error level
  * @param err - Optional error; its message lands in the `error` field
  */
  error(message: string, err?: Error | undefined, metadata?: Record<string, unknown>): void {
  this.log('error', message, metadata, err);
  }

  fatal(message: string, err?: Error | undefined, metadata?: Record<string, unknown>): void {
  this.log('fatal', message, metadata, err);
  }

  /**
  * Create a child logger with additional context
  */
  child(additionalContext: Record<string, unknown>): Logger {
  return new Logger(this.service, { ...this.context, ...additionalContext });
  }
}

/**
* Get logger for service
*/
export function getLogger(service: string): Logger {
  return new Logger(service);
}

/**
* Normalize an unknown thrown value into an Error for logging
*/
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
