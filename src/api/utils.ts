/**
 * Imou Life API Utilities
 */

import crypto from 'crypto';
import { API_VERSION, ERROR_MESSAGES } from './constants.js';
import { TransportError } from './errors.js';
import type { Credential, ImouRequest, RawResponse } from './types.js';

// ============================================================================
// CRYPTO UTILITIES
// ============================================================================

export const md5 = (str: string): string =>
  crypto.createHash('md5').update(str).digest('hex');

export const createNonce = (): string => crypto.randomBytes(16).toString('hex');

export const buildSignature = (time: number, nonce: string, appSecret: string): string =>
  md5(`time:${time},nonce:${nonce},appSecret:${appSecret}`);

// ============================================================================
// REQUEST BUILDING
// ============================================================================

export const buildUrl = (baseUrl: string, method: string): string =>
  `${baseUrl.replace(/\/+$/, '')}/${method}`;

/**
 * Wrap params in the signed envelope every Imou endpoint expects.
 * `time` is in seconds.
 */
export const buildRequest = (
  credential: Credential,
  params: Record<string, unknown>,
  time = Math.floor(Date.now() / 1000),
  nonce = createNonce(),
): ImouRequest => ({
  system: {
    ver: API_VERSION,
    appId: credential.appId,
    sign: buildSignature(time, nonce, credential.appSecret),
    time,
    nonce,
  },
  params,
  id: crypto.randomUUID(),
});

// ============================================================================
// HTTP UTILITIES
// ============================================================================

/**
 * fetch() plus reading the body, both bounded by one timeout and an optional
 * caller signal. A timeout rejects with a TransportError flagged `timedOut`.
 */
export const fetchWithTimeout = async (
  url: string,
  options: RequestInit,
  timeout: number,
): Promise<RawResponse> => {
  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeout);

  const external = options.signal;
  const onAbort = (): void => controller.abort();
  if (external) {
    if (external.aborted) {
      controller.abort();
    } else {
      external.addEventListener('abort', onAbort, { once: true });
    }
  }

  try {
    const response = await fetch(url, { ...options, signal: controller.signal });
    return { status: response.status, body: await response.text() };
  } catch (error) {
    if (timedOut) {
      throw new TransportError(`Request to ${url} timed out after ${timeout}ms`, true, { cause: error });
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
    external?.removeEventListener('abort', onAbort);
  }
};

// ============================================================================
// ERROR HANDLING
// ============================================================================

export const describeErrorCode = (code: string, msg?: string): string => {
  if (msg) {
    return `${code}: ${msg}`;
  }
  return ERROR_MESSAGES[code] ? `${code}: ${ERROR_MESSAGES[code]}` : `Request failed with code ${code}`;
};

// ============================================================================
// DATE UTILITIES
// ============================================================================

const pad = (value: number): string => value.toString().padStart(2, '0');

/** Format as "YYYY-MM-DD HH:mm:ss" in local time, the format the alarm API takes. */
export const formatLocalDate = (date: Date): string =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
  `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

