export { canonicalJson, contentHash, sha256 } from './hash.js';
export { withRetry, type RetryOptions } from './retry.js';
export {
  type Logger,
  noopLogger,
  consoleLogger,
  createConsoleLogger,
  errorMessage,
} from './logger.js';
export { generateDownloadToken, hashDownloadToken, isWellFormedToken } from './crypto.js';
export {
  nextDocumentNumber,
  DEFAULT_NUMBER_PREFIXES,
  type NumberPrefixes,
} from './numbering.js';
