export * from './types.js';
export * from './errors.js';
export {
  SCRATCH_VOLUME,
  mountPointSchema,
  volumeSchema,
  containerSpecSchema,
  formatIssues,
} from './schemas.js';
export { logger, type Logger } from './logger.js';
export { withSpan, spanEvent } from './tracing.js';
export { Semaphore, mapWithConcurrency } from './semaphore.js';
