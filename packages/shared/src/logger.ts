import pino from 'pino';
import { trace } from '@opentelemetry/api';

export const logger = pino({
  name: 'batchrun',
  level: process.env.LOG_LEVEL ?? 'info',
  serializers: {
    err: pino.stdSerializers.err,
  },
  // Job environments are logged at debug level; never print their values.
  redact: {
    paths: ['environment.*', 'task.environment.*'],
    censor: '[redacted]',
  },
  mixin() {
    const span = trace.getActiveSpan();
    if (!span) return {};
    const ctx = span.spanContext();
    return {
      traceId: ctx.traceId,
      spanId: ctx.spanId,
    };
  },
});

export type Logger = typeof logger;
