/**
 * Decodes Imou response envelopes.
 *
 * Imou answers HTTP 200 for most failures and reports the outcome in
 * `result.code`, so the embedded code is checked before anything is treated
 * as a success. Payload mappers turn the loosely typed `data` object into
 * the typed result of each operation.
 */

import { AUTH_ERROR_CODES, SUCCESS_CODE, TOKEN_ERROR_CODES } from './constants.js';
import { ApiError, AuthError, ImouError, InvalidResponseError, TokenRejectedError } from './errors.js';
import { describeErrorCode } from './utils.js';
import type {
  AlarmMessage,
  DecodeResult,
  DeviceDetails,
  DeviceListResult,
  DeviceStatus,
  ImouResultEnvelope,
  Token,
} from './types.js';

type JsonObject = Record<string, unknown>;

// ============================================================================
// FIELD READERS
// ============================================================================

const isObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readString = (data: JsonObject, key: string): string => {
  const value = data[key];
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return value.toString();
  }
  throw new InvalidResponseError(`${key} not found in ${JSON.stringify(data)}`);
};

const readOptionalString = (data: JsonObject, key: string, fallback = ''): string =>
  data[key] === undefined || data[key] === null ? fallback : readString(data, key);

const readNumber = (data: JsonObject, key: string): number => {
  const value = data[key];
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof parsed === 'number' && Number.isFinite(parsed)) {
    return parsed;
  }
  throw new InvalidResponseError(`${key} is not a number in ${JSON.stringify(data)}`);
};

const readObjects = (data: JsonObject, key: string): JsonObject[] => {
  const value = data[key];
  if (!Array.isArray(value)) {
    throw new InvalidResponseError(`${key} not found in ${JSON.stringify(data)}`);
  }
  return value.filter(isObject);
};

/** "1" / "online" / "on" style flags */
const readFlag = (data: JsonObject, key: string, truthy: readonly string[]): boolean =>
  truthy.includes(readString(data, key).toLowerCase());

// ============================================================================
// ENVELOPE
// ============================================================================

export const classifyError = (code: string, msg: string): ImouError => {
  const message = describeErrorCode(code, msg);
  if (TOKEN_ERROR_CODES.has(code)) {
    return new TokenRejectedError(message, code);
  }
  if (AUTH_ERROR_CODES.has(code)) {
    return new AuthError(message, code);
  }
  return new ApiError(message, code);
};

export const parseEnvelope = (body: string): ImouResultEnvelope => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    throw new InvalidResponseError(`Response is not JSON: ${body.slice(0, 200)}`, { cause: error });
  }

  const result = isObject(parsed) ? parsed.result : undefined;
  if (!isObject(result) || (typeof result.code !== 'string' && typeof result.code !== 'number')) {
    throw new InvalidResponseError(`Unrecognized response envelope: ${body.slice(0, 200)}`);
  }

  return {
    code: String(result.code),
    msg: typeof result.msg === 'string' ? result.msg : '',
    data: isObject(result.data) ? result.data : {},
  };
};

/**
 * Turn an HTTP status and raw body into a typed value or a classified error.
 * `map` receives `result.data` only when the embedded code reports success.
 */
export function decodeResponse<T>(
  status: number,
  body: string,
  map: (data: JsonObject) => T,
): DecodeResult<T> {
  if (status < 200 || status >= 300) {
    return {
      success: false,
      error: new ApiError(`Request failed with status ${status}`, `HTTP${status}`),
    };
  }

  try {
    const envelope = parseEnvelope(body);
    if (envelope.code !== SUCCESS_CODE) {
      return { success: false, error: classifyError(envelope.code, envelope.msg) };
    }
    return { success: true, data: map(envelope.data) };
  } catch (error) {
    if (error instanceof ImouError) {
      return { success: false, error };
    }
    return {
      success: false,
      error: new InvalidResponseError(error instanceof Error ? error.message : String(error), { cause: error }),
    };
  }
}

// ============================================================================
// PAYLOAD MAPPERS
// ============================================================================

export const ignoreData = (): void => undefined;

/** `expireTime` is seconds from now */
export const toToken = (now: number) => (data: JsonObject): Token => ({
  accessToken: readString(data, 'accessToken'),
  expiresAt: now + readNumber(data, 'expireTime') * 1000,
});

const toChannelIds = (device: JsonObject): string[] =>
  Array.isArray(device.channels)
    ? device.channels.filter(isObject).map(channel => readString(channel, 'channelId'))
    : [];

export const toDeviceList = (data: JsonObject): DeviceListResult => {
  const devices = readObjects(data, 'deviceList').map(device => ({
    deviceId: readString(device, 'deviceId'),
    channelIds: toChannelIds(device),
  }));
  return {
    count: data.count === undefined ? devices.length : readNumber(data, 'count'),
    devices,
  };
};

export const toDeviceDetails = (data: JsonObject): DeviceDetails[] =>
  readObjects(data, 'deviceList').map(device => ({
    deviceId: readString(device, 'deviceId'),
    name: readString(device, 'name'),
    catalog: readOptionalString(device, 'catalog', 'N.A.'),
    deviceModel: readString(device, 'deviceModel'),
    firmware: readOptionalString(device, 'version', 'N.A.'),
    online: readFlag(device, 'status', ['online']),
    capabilities: readOptionalString(device, 'ability')
      .split(',')
      .map(capability => capability.trim())
      .filter(capability => capability.length > 0),
  }));

export const toDeviceStatus = (data: JsonObject): DeviceStatus => ({
  deviceId: readString(data, 'deviceId'),
  online: readFlag(data, 'onLine', ['1']),
  channels: Array.isArray(data.channels)
    ? data.channels.filter(isObject).map(channel => ({
      channelId: readString(channel, 'channelId'),
      online: readFlag(channel, 'onLine', ['1']),
    }))
    : [],
});

export const toSwitchState = (data: JsonObject): boolean =>
  readFlag(data, 'status', ['on', '1', 'true']);

export const toAlarmMessages = (data: JsonObject): AlarmMessage[] =>
  readObjects(data, 'alarms').map(alarm => ({
    alarmId: readString(alarm, 'alarmId'),
    name: readOptionalString(alarm, 'name'),
    type: alarm.type === undefined ? 0 : readNumber(alarm, 'type'),
    localDate: readString(alarm, 'localDate'),
    time: alarm.time === undefined ? 0 : readNumber(alarm, 'time'),
  }));
