import { getRequestContext } from './request-context';

/**
* Structured Logger
*
* Provides structured logging with context support,
* multiple log levels, and custom handlers.
*/

export { getRequestContext };

// ============================================================================
// Type Definitions
// ============================================================================

/** Available log levels */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

/**
* Log entry structure
*/
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  service?: string | undefined;
  /** Request ID / Correlation ID */
  requestId?: string | undefined;
  /** Signed-in principal, when the request has one */
  principalId?: string | undefined;
  /** Milliseconds since the enclosing request started */
  duration?: number | undefined;
  error?: Error | undefined;
  errorMessage?: string | undefined;
  errorStack?: string | undefined;
  metadata?: Record<string, unknown> | undefined;
}

export type LogHandler = (entry: LogEntry) => void;

export interface LoggerOptions {
  service: string;
  /** Correlation ID (overrides request context) */
  correlationId?: string | undefined;
  /** Additional context to include in every log */
  context?: Record<string, unknown> | undefined;
}

// ============================================================================
// Handler Registry
// ============================================================================

let handlers: LogHandler[] = [];

/**
* Get immutable copy of handlers
*/
const getHandlers = (): readonly LogHandler[] => [...handlers];

// ============================================================================
// Log Level Configuration
// ============================================================================

function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some(level => level === value);
}

/**
* Get configured log level from environment
* Defaults to 'info' in production, 'debug' elsewhere
*/
function getConfiguredLogLevel(): LogLevel | 'silent' {
  const envLevel = process.env['LOG_LEVEL']?.toLowerCase();
  if (envLevel === 'silent') return 'silent';
  if (isLogLevel(envLevel)) return envLevel;
  return process.env['NODE_ENV'] === 'production' ? 'info' : 'debug';
}

function shouldLog(level: LogLevel): boolean {
  const configured = getConfiguredLogLevel();
  if (configured === 'silent') return false;
  return LEVELS.indexOf(level) >= LEVELS.indexOf(configured);
}

// ============================================================================
// Default Handler
// ============================================================================

/**
* Default console log handler
* All logs go to stderr so stdout stays clean for tooling
*/
function consoleHandler(entry: LogEntry): void {
  const { level, message, service, requestId, principalId, duration, errorMessage, errorStack, metadata } = entry;

  const logOutput: Record<string, unknown> = {
    level: level.toUpperCase(),
    message,
  };

  if (service) logOutput['service'] = service;
  if (requestId) logOutput['correlationId'] = requestId;
  if (principalId) logOutput['principalId'] = principalId;
  if (duration !== undefined) logOutput['duration'] = duration;
  if (errorMessage) logOutput['error'] = errorMessage;
  if (errorStack && process.env['LOG_LEVEL'] === 'debug') logOutput['stack'] = errorStack;
  if (metadata && Object.keys(metadata).length > 0) logOutput['metadata'] = metadata;

  console.error(JSON.stringify(logOutput));
}

// ============================================================================
// Handler Management
// ============================================================================

/**
* Add a log handler
* @returns Function to remove the handler
*/
export function addLogHandler(handler: LogHandler): () => void {
  handlers = [...handlers, handler];
  return () => {
    handlers = handlers.filter(h => h !== handler);
  };
}

/**
* Remove all log handlers, including the console handler
*/
export function clearLogHandlers(): void {
  handlers = [];
}

/**
* Put the console handler back after clearLogHandlers()
*/
export function restoreDefaultLogHandler(): void {
  if (!handlers.includes(consoleHandler)) {
    handlers = [consoleHandler, ...handlers];
  }
}

handlers = [consoleHandler];

// ============================================================================
// Logger Class
// ============================================================================

/**
* Logger instance with bound service name and context
*/
export class Logger {
  private readonly context: Record<string, unknown>;

  constructor(
    private readonly service: string,
    private readonly correlationId?: string,
    context?: Record<string, unknown>
  ) {
    this.context = context || {};
  }

  private createServiceLogEntry(
    level: LogLevel,
    message: string,
    metadata?: Record<string, unknown>,
    err?: Error
  ): LogEntry {
    const requestContext = getRequestContext();
    const correlationId = this.correlationId || requestContext?.requestId;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: `[${this.service}] ${message}`,
      service: this.service,
      metadata: { ...this.context, ...metadata },
    };

    if (correlationId) entry.requestId = correlationId;
    if (requestContext?.principalId) entry.principalId = requestContext.principalId;
    if (requestContext) entry.duration = Date.now() - requestContext.startTime;

    if (err) {
      entry.error = err;
      entry.errorMessage = err.message;
      entry.errorStack = err.stack;
    }

    return entry;
  }

  private emit(level: LogLevel, message: string, metadata?: Record<string, unknown>, err?: Error): void {
    if (!shouldLog(level)) return;
    const entry = this.createServiceLogEntry(level, message, metadata, err);
    getHandlers().forEach(h => h(entry));
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.emit('debug', message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.emit('info', message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.emit('warn', message, metadata);
  }

  /**
  * Log at error level
  * @param err - Optional error object; its message and stack are attached
  */
  error(message: string, err?: Error | undefined, metadata?: Record<string, unknown>): void {
    this.emit('error', message, metadata, err);
  }

  fatal(message: string, err?: Error | undefined, metadata?: Record<string, unknown>): void {
    this.emit('fatal', message, metadata, err);
  }

  /**
  * Create a child logger with additional context
  */
  child(additionalContext: Record<string, unknown>): Logger {
    return new Logger(
      this.service,
      this.correlationId,
      { ...this.context, ...additionalContext }
    );
  }
}

/**
* Get logger for service
* @param serviceOrOptions - Service name or LoggerOptions object
*/
export function getLogger(serviceOrOptions: string | LoggerOptions): Logger {
  if (typeof serviceOrOptions === 'string') {
    return new Logger(serviceOrOptions);
  }
  return new Logger(
    serviceOrOptions.service,
    serviceOrOptions.correlationId,
    serviceOrOptions.context
  );
}
