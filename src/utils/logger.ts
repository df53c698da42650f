/**
 * Structured logging utility for the shopping cart service
 * Writes JSON lines to the console and mirrors each record to the OpenTelemetry logs API
 */

import { config } from './config';
import { trace, context as otelContext } from '@opentelemetry/api';
import { logs, Logger, LogAttributes, SeverityNumber } from '@opentelemetry/api-logs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  context?: LogContext;
  trace_id?: string;
  span_id?: string;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

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
 * Check if a log level should be logged based on configured level
 */
function shouldLog(level: LogLevel): boolean {
  const configured = isLogLevel(config.logLevel) ? LOG_LEVEL_PRIORITY[config.logLevel] : LOG_LEVEL_PRIORITY.info;
  return LOG_LEVEL_PRIORITY[level] >= configured;
}

let otelLogger: Logger | null = null;
function getOtelLogger(): Logger {
  if (!otelLogger) {
    otelLogger = logs.getLoggerProvider().getLogger(config.serviceName, config.serviceVersion);
  }
  return otelLogger;
}

/**
 * OTLP attributes only carry primitives; anything else is sent as JSON.
 */
function toLogAttributes(context: LogContext): LogAttributes {
  const attributes: LogAttributes = {};
  for (const [key, value] of Object.entries(context)) {
    attributes[key] =
      typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'
        ? value
        : JSON.stringify(value);
  }
  return attributes;
}

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

  const span = trace.getActiveSpan();
  if (span) {
    const spanContext = span.spanContext();
    entry.trace_id = spanContext.traceId;
    entry.span_id = spanContext.spanId;
  }

  getOtelLogger().emit({
    severityNumber: SEVERITY_MAP[level],
    severityText: level.toUpperCase(),
    body: message,
    attributes: {
      'service.name': config.serviceName,
      'service.version': config.serviceVersion,
      ...toLogAttributes(context ?? {}),
    },
    context: otelContext.active(),
  });

  // Console output is what container log collectors pick up
  const output = JSON.stringify(entry);
  if (level === 'error') {
    console.error(output);
  } else {
    console.log(output);
  }
}

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
