export type * from './types.js';
export { LOG_LEVELS, isLogLevel } from './types.js';

export {
  createRequestId,
  withLogContext,
  withRealmContext,
  getLogContext,
} from './context.js';

export {
  createLogger,
  initObservability,
} from './logger.js';

export {
  redactSecrets,
} from './redaction.js';
