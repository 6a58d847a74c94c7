import type { PlatformConfig } from 'homebridge';

import { DEFAULT_API_URL, DEFAULT_TIMEOUT } from './api/constants.js';
import { ConfigurationError } from './api/errors.js';
import type { ImouClientConfig } from './api/types.js';

/**
 * This is the name of the platform that users will use to register the plugin in the Homebridge config.json
 */
export const PLATFORM_NAME = 'ImouLife';

/**
 * This must match the name of your plugin as defined the package.json `name` property
 */
export const PLUGIN_NAME = 'homebridge-imou-life';

/** Default polling interval in milliseconds */
export const DEFAULT_POLLING_INTERVAL_MS = 30_000;

/** The cloud API rate-limits aggressively; never poll faster than this */
export const MIN_POLLING_INTERVAL_MS = 10_000;

export interface DeviceOverride {
  deviceId: string;
  name?: string;
  enabled?: boolean;
}

export interface ImouLifePlatformConfig extends PlatformConfig {
  appId?: string;
  appSecret?: string;
  apiUrl?: string;
  timeout?: number;
  pollingInterval?: number;
  devices?: DeviceOverride[];
}

export interface ResolvedPlatformConfig {
  client: ImouClientConfig;
  pollingInterval: number;
  devices: DeviceOverride[];
}

const requireString = (value: unknown, key: string): string => {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigurationError(`Missing required "${key}" in ${PLATFORM_NAME} config`);
  }
  return value.trim();
};

const positiveNumber = (value: unknown, key: string, fallback: number): number => {
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`"${key}" must be a positive number`);
  }
  return value;
};

/**
 * Validate the user config and fill in defaults.
 */
export function resolvePlatformConfig(config: ImouLifePlatformConfig): ResolvedPlatformConfig {
  const apiUrl = config.apiUrl === undefined || config.apiUrl === ''
    ? DEFAULT_API_URL
    : requireString(config.apiUrl, 'apiUrl');

  if (!/^https?:\/\//.test(apiUrl)) {
    throw new ConfigurationError(`"apiUrl" must be an http(s) URL, got ${apiUrl}`);
  }

  const devices = Array.isArray(config.devices)
    ? config.devices.map(device => ({ ...device, deviceId: requireString(device.deviceId, 'devices[].deviceId') }))
    : [];

  return {
    client: {
      appId: requireString(config.appId, 'appId'),
      appSecret: requireString(config.appSecret, 'appSecret'),
      baseUrl: apiUrl,
      timeout: positiveNumber(config.timeout, 'timeout', DEFAULT_TIMEOUT),
    },
    pollingInterval: Math.max(
      positiveNumber(config.pollingInterval, 'pollingInterval', DEFAULT_POLLING_INTERVAL_MS),
      MIN_POLLING_INTERVAL_MS,
    ),
    devices,
  };
}
