export type * from './types.js';

export {
  createRequestId,
  withLogContext,
  getLogContext,
} from './context.js';

export {
  createLogger,
  closeLogSinks,
} from './logger.js';

export {
  redactSecrets,
  safeSnippet,
} from './redaction.js';
