/**
 * Telemetry Emitter
 *
 * Structured JSON logging and lightweight spans for the tagging pipeline.
 * Spans are emitted as a single log record when they end, which is what
 * CloudWatch Logs Insights queries expect from a Lambda function.
 */

import { randomUUID } from 'node:crypto';
import { pino, type Logger, type LoggerOptions, type LevelWithSilent, type DestinationStream } from 'pino';

/**
 * Telemetry span types
 */
export type SpanType =
  | 'pipeline.invocation'
  | 'pipeline.batch_object'
  | 'tagging.apply'
  | 'log_source.fetch';

/**
 * Telemetry span status
 */
export type SpanStatus = 'ok' | 'error' | 'unset';

export type SpanAttributes = Record<string, string | number | boolean>;

/**
 * Telemetry span
 */
export interface TelemetrySpan {
  trace_id: string;
  span_id: string;
  parent_span_id?: string;
  name: string;
  type: SpanType;
  status: SpanStatus;
  start_time: string;
  end_time?: string;
  duration_ms?: number;
  attributes: SpanAttributes;
  events: Array<{
    name: string;
    timestamp: string;
    attributes?: SpanAttributes;
  }>;
}

export interface TelemetryConfig {
  component: string;
  version: string;
  environment?: string;
  logLevel?: LevelWithSilent;
  /** Defaults to stdout */
  destination?: DestinationStream;
}

export class TelemetryEmitter {
  private readonly logger: Logger;
  private readonly component: string;
  private readonly version: string;
  private readonly environment: string;

  constructor(config: TelemetryConfig, logger?: Logger) {
    this.component = config.component;
    this.version = config.version;
    this.environment = config.environment ?? process.env['NODE_ENV'] ?? 'development';

    const options: LoggerOptions = {
      level: config.logLevel ?? 'info',
      formatters: {
        level: (label: string) => ({ level: label }),
      },
      base: {
        component: this.component,
        version: this.version,
        environment: this.environment,
      },
    };

    this.logger = logger ?? (config.destination ? pino(options, config.destination) : pino(options));
  }

  generateTraceId(): string {
    return randomUUID().replace(/-/g, '');
  }

  generateSpanId(): string {
    return randomUUID().replace(/-/g, '').substring(0, 16);
  }

  startSpan(params: {
    name: string;
    type: SpanType;
    traceId?: string;
    parentSpanId?: string;
    attributes?: SpanAttributes;
  }): TelemetrySpan {
    const span: TelemetrySpan = {
      trace_id: params.traceId ?? this.generateTraceId(),
      span_id: this.generateSpanId(),
      parent_span_id: params.parentSpanId,
      name: params.name,
      type: params.type,
      status: 'unset',
      start_time: new Date().toISOString(),
      attributes: {
        'component': this.component,
        'environment': this.environment,
        ...params.attributes,
      },
      events: [],
    };

    this.logger.debug({ span_id: span.span_id, span_name: span.name }, 'Span started');
    return span;
  }

  addSpanEvent(span: TelemetrySpan, name: string, attributes?: SpanAttributes): void {
    span.events.push({
      name,
      timestamp: new Date().toISOString(),
      attributes,
    });
  }

  endSpan(span: TelemetrySpan, status: SpanStatus = 'ok', error?: Error): void {
    span.end_time = new Date().toISOString();
    span.status = status;
    span.duration_ms = new Date(span.end_time).getTime() - new Date(span.start_time).getTime();

    if (error) {
      span.attributes['error.type'] = error.name;
      span.attributes['error.message'] = error.message;
      this.addSpanEvent(span, 'exception', {
        'exception.type': error.name,
        'exception.message': error.message,
      });
    }

    const record = { type: 'span', span };
    if (span.status === 'error') {
      this.logger.error(record, `Span completed with error: ${span.name}`);
    } else {
      this.logger.info(record, `Span completed: ${span.name}`);
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.logger.debug(context ?? {}, message);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.logger.info(context ?? {}, message);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.logger.warn(context ?? {}, message);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.logger.error(
      { ...context, error: error ? { name: error.name, message: error.message, stack: error.stack } : undefined },
      message
    );
  }
}

export function createTelemetryEmitter(
  component: string,
  version: string,
  options: { logLevel?: LevelWithSilent; environment?: string } = {}
): TelemetryEmitter {
  return new TelemetryEmitter({
    component,
    version,
    environment: options.environment,
    logLevel: options.logLevel ?? 'info',
  });
}

/**
 * Emitter that drops every record
 */
export function createSilentTelemetry(): TelemetryEmitter {
  return new TelemetryEmitter({ component: 'test', version: '0.0.0', environment: 'test', logLevel: 'silent' });
}
