/**
 * Imou Life API Module
 *
 * Exports all API components for use by the platform and by library consumers.
 */

// Constants
export * from './constants.js';

// Types
export * from './types.js';

// Errors
export * from './errors.js';

// Utilities
export {
  buildUrl,
  buildRequest,
  buildSignature,
  md5,
  fetchWithTimeout,
  formatLocalDate,
} from './utils.js';

// Decoding
export { decodeResponse, classifyError, parseEnvelope } from './ResponseDecoder.js';

// Session and client
export { ImouSession } from './ImouSession.js';
export { ImouApiClient } from './ImouApiClient.js';
