/**
 * Structured logging utility for Cart Service
 * Provides JSON-formatted logs for Grafana observability stack
 * Uses OpenTelemetry LoggerProvider to send logs via OTLP
 */

import { config } from './config';
import { trace, context as otelContext } from '@opentelemetry/api';
import { logs, SeverityNumber, AnyValueMap } from '@opentelemetry/api-logs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured context attached to a log entry
 */
export type LogContext = AnyValueMap;

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  context?: LogContext;
  trace_id?: string;
  span_id?: string;
}

/**
 * Log level priority mapping
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Map log level to OpenTelemetry SeverityNumber
 */
const SEVERITY_MAP: Record<LogLevel, SeverityNumber> = {
  debug: SeverityNumber.DEBUG,
  info: SeverityNumber.INFO,
  warn: SeverityNumber.WARN,
  error: SeverityNumber.ERROR,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

/**
 * Get current log level priority from config
 */
function getCurrentLogLevelPriority(): number {
  return isLogLevel(config.logLevel) ? LOG_LEVEL_PRIORITY[config.logLevel] : LOG_LEVEL_PRIORITY.info;
}

/**
 * Check if a log level should be logged based on configured level
 */
function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= getCurrentLogLevelPriority();
}

/**
 * Render an unknown thrown value for a log context
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Format and output a log entry
 */
function log(level: LogLevel, message: string, context?: LogContext): void {
  if (!shouldLog(level)) {
    return;
  }

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    service: config.serviceName,
  };

  if (context && Object.keys(context).length > 0) {
    entry.context = context;
  }

  // Include trace context (trace_id and span_id) if a span is active
  const span = trace.getActiveSpan();
  if (span) {
    const spanContext = span.spanContext();
    entry.trace_id = spanContext.traceId;
    entry.span_id = spanContext.spanId;
  }

  // No-op until instrumentation registers a global LoggerProvider
  logs.getLogger(config.serviceName, config.serviceVersion).emit({
    severityNumber: SEVERITY_MAP[level],
    severityText: level.toUpperCase(),
    body: message,
    attributes: {
      'service.name': config.serviceName,
      'service.version': config.serviceVersion,
      ...(context || {}),
    },
    context: otelContext.active(),
  });

  // Also output to console for local debugging and container logs
  const output = JSON.stringify(entry);
  if (level === 'error') {
    console.error(output);
  } else {
    console.log(output);
  }
}

/**
 * Logger instance with level-specific methods
 */
export const logger = {
  debug(message: string, context?: LogContext): void {
    log('debug', message, context);
  },

  info(message: string, context?: LogContext): void {
    log('info', message, context);
  },

  warn(message: string, context?: LogContext): void {
    log('warn', message, context);
  },

  error(message: string, context?: LogContext): void {
    log('error', message, context);
  },
};
