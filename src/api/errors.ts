/**
 * Imou Life API Errors
 *
 * Every failure surfaced by the client is an ImouError subclass, so callers
 * can branch on `instanceof` and read the vendor code and message.
 */

export class ImouError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Credentials were refused by the vendor. Not retried. */
export class AuthError extends ImouError {}

/** The access token was refused; the client re-logs in once before surfacing it. */
export class TokenRejectedError extends AuthError {}

/** Connection failure, timeout or cancellation. Safe to retry with backoff. */
export class TransportError extends ImouError {
  constructor(
    message: string,
    public readonly timedOut = false,
    options?: { cause?: unknown },
  ) {
    super(message, timedOut ? 'TIMEOUT' : 'TRANSPORT', options);
  }
}

/** Business-logic failure reported by the vendor, e.g. device offline. */
export class ApiError extends ImouError {}

/** The response did not match any envelope or payload shape we understand. */
export class InvalidResponseError extends ImouError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'INVALID_RESPONSE', options);
  }
}

export class ConfigurationError extends ImouError {
  constructor(message: string) {
    super(message, 'INVALID_CONFIGURATION');
  }
}
