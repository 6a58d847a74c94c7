/**
 * Imou session manager.
 * Signs requests with the app credentials and holds the short-lived access
 * token. Concurrent callers that find the token absent or expired share one
 * login request.
 */

import { DEFAULT_API_URL, DEFAULT_TIMEOUT, TOKEN_REFRESH_MARGIN } from './constants.js';
import { ImouError, TransportError } from './errors.js';
import { decodeResponse, toToken } from './ResponseDecoder.js';
import { buildRequest, buildUrl, fetchWithTimeout } from './utils.js';
import type { Credential, ImouClientConfig, LogFn, RawResponse, RequestOptions, Token } from './types.js';

const noopLog: LogFn = () => undefined;

// ============================================================================
// IMOU SESSION
// ============================================================================

export class ImouSession {
  private readonly credential: Credential;
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly refreshMargin: number;
  private readonly log: LogFn;

  private token: Token | null = null;
  private pendingLogin: Promise<Token> | null = null;
  private readonly inFlight = new Set<AbortController>();
  private closed = false;

  constructor(config: ImouClientConfig) {
    this.credential = Object.freeze({ appId: config.appId, appSecret: config.appSecret });
    this.baseUrl = config.baseUrl ?? DEFAULT_API_URL;
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT;
    this.refreshMargin = config.refreshMargin ?? TOKEN_REFRESH_MARGIN;
    this.log = config.log ?? noopLog;
  }

  get apiUrl(): string {
    return this.baseUrl;
  }

  get requestTimeout(): number {
    return this.timeout;
  }

  /** Whether a token is held and still usable. */
  isConnected(): boolean {
    return this.token !== null && !this.isExpired(this.token);
  }

  /**
   * Return a usable token, logging in first when none is held or the held
   * one is within the refresh margin of its expiry. The login itself runs
   * with the session defaults; each caller waits on it under its own timeout
   * and signal.
   */
  async getValidToken(options: RequestOptions = {}): Promise<Token> {
    this.assertOpen();

    if (this.token && !this.isExpired(this.token)) {
      return this.token;
    }

    if (!this.pendingLogin) {
      this.pendingLogin = this.login().finally(() => {
        this.pendingLogin = null;
      });
    }

    return this.awaitLogin(this.pendingLogin, options);
  }

  /**
   * Drop the held token so the next call logs in again. Given the token a
   * request was rejected with, only that token is dropped.
   */
  invalidate(rejected?: Token): void {
    if (rejected === undefined || this.token === rejected) {
      this.token = null;
    }
  }

  /** Abort in-flight requests and refuse further use. */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.token = null;
    for (const controller of this.inFlight) {
      controller.abort();
    }
    this.inFlight.clear();
    this.log('debug', 'Imou session closed');
  }

  /**
   * POST a signed request to `{baseUrl}/{method}`.
   * Any failure to get a response is surfaced as a TransportError.
   */
  async send(method: string, params: Record<string, unknown>, options: RequestOptions = {}): Promise<RawResponse> {
    this.assertOpen();

    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    if (options.signal?.aborted) {
      throw new TransportError(`Request ${method} aborted`);
    }
    options.signal?.addEventListener('abort', onAbort, { once: true });
    this.inFlight.add(controller);

    try {
      return await fetchWithTimeout(
        buildUrl(this.baseUrl, method),
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(buildRequest(this.credential, params)),
          signal: controller.signal,
        },
        options.timeout ?? this.timeout,
      );
    } catch (error) {
      if (error instanceof ImouError) {
        throw error;
      }
      if (this.closed) {
        throw new TransportError('Session closed', false, { cause: error });
      }
      if (options.signal?.aborted) {
        throw new TransportError(`Request ${method} aborted`, false, { cause: error });
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new TransportError(`Request ${method} failed: ${message}`, false, { cause: error });
    } finally {
      options.signal?.removeEventListener('abort', onAbort);
      this.inFlight.delete(controller);
    }
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  private async login(): Promise<Token> {
    this.log('debug', `Requesting access token from ${this.baseUrl}`);

    const response = await this.send('accessToken', {});
    const result = decodeResponse(response.status, response.body, toToken(Date.now()));
    if (!result.success) {
      this.log('error', `Login failed: ${result.error.message}`);
      throw result.error;
    }

    this.assertOpen();
    this.token = result.data;
    this.log('debug', `Access token valid until ${new Date(result.data.expiresAt).toISOString()}`);
    return result.data;
  }

  private awaitLogin(login: Promise<Token>, options: RequestOptions): Promise<Token> {
    const { signal } = options;
    const timeout = options.timeout ?? this.timeout;
    if (signal?.aborted) {
      return Promise.reject(new TransportError('Request accessToken aborted'));
    }

    return new Promise<Token>((resolve, reject) => {
      const settle = (): void => {
        clearTimeout(timeoutId);
        signal?.removeEventListener('abort', onAbort);
      };
      const onAbort = (): void => {
        settle();
        reject(new TransportError('Request accessToken aborted'));
      };
      const timeoutId = setTimeout(() => {
        settle();
        reject(new TransportError(`Request accessToken timed out after ${timeout}ms`, true));
      }, timeout);
      signal?.addEventListener('abort', onAbort, { once: true });

      login.then(
        token => {
          settle();
          resolve(token);
        },
        (error: unknown) => {
          settle();
          reject(error);
        },
      );
    });
  }

  private isExpired(token: Token): boolean {
    return Date.now() >= token.expiresAt - this.refreshMargin;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new TransportError('Session closed');
    }
  }
}
