export {
  createApiMethodExtractor,
  getHttpStatusCodeClass,
  getSlowRequestDurationBucket,
} from './metrics';
export { normalizeError, sanitizeError } from './normalize-error';
export { Redacted } from './redacted';
export { elapsedMilliseconds } from './timing';
