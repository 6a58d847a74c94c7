/**
 * Imou Life API Types
 */

import type { ImouError } from './errors.js';

export interface Credential {
  readonly appId: string;
  readonly appSecret: string;
}

export interface Token {
  readonly accessToken: string;
  /** Epoch milliseconds after which the token must not be used */
  readonly expiresAt: number;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFn = (level: LogLevel, message: string) => void;

export interface ImouClientConfig extends Credential {
  baseUrl?: string;
  timeout?: number;
  refreshMargin?: number;
  log?: LogFn;
}

/** Status and fully read body of an HTTP exchange */
export interface RawResponse {
  status: number;
  body: string;
}

export interface RequestOptions {
  timeout?: number;
  signal?: AbortSignal;
}

// ============================================================================
// WIRE FORMAT
// ============================================================================

export interface SystemParams {
  ver: string;
  appId: string;
  sign: string;
  time: number;
  nonce: string;
}

export interface ImouRequest {
  system: SystemParams;
  params: Record<string, unknown>;
  id: string;
}

export interface ImouResultEnvelope {
  code: string;
  msg: string;
  data: Record<string, unknown>;
}

export type DecodeResult<T> =
  | { success: true; data: T }
  | { success: false; error: ImouError };

// ============================================================================
// DEVICE TYPES
// ============================================================================

export interface DeviceSummary {
  deviceId: string;
  channelIds: string[];
}

export interface DeviceListResult {
  count: number;
  devices: DeviceSummary[];
}

export interface DeviceDetails {
  deviceId: string;
  name: string;
  catalog: string;
  deviceModel: string;
  firmware: string;
  online: boolean;
  capabilities: string[];
}

export interface ChannelStatus {
  channelId: string;
  online: boolean;
}

export interface DeviceStatus {
  deviceId: string;
  online: boolean;
  channels: ChannelStatus[];
}

export interface AlarmMessage {
  alarmId: string;
  name: string;
  type: number;
  /** Local time as reported by the device, "YYYY-MM-DD HH:mm:ss" */
  localDate: string;
  /** Timestamp as reported by the vendor */
  time: number;
}

export interface AlarmQuery {
  channelId?: string;
  count?: number;
  begin?: Date;
  end?: Date;
}

export type EntityPlatform = 'switch' | 'sensor' | 'binary_sensor';
