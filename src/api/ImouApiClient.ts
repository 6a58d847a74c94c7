/**
 * Imou Life API Client
 * One method per supported device operation on the Imou open platform.
 */

import { ALARM_LOOKBACK } from './constants.js';
import { TokenRejectedError } from './errors.js';
import { ImouSession } from './ImouSession.js';
import {
  decodeResponse,
  ignoreData,
  toAlarmMessages,
  toDeviceDetails,
  toDeviceList,
  toDeviceStatus,
  toSwitchState,
} from './ResponseDecoder.js';
import { formatLocalDate } from './utils.js';
import type {
  AlarmMessage,
  AlarmQuery,
  DeviceDetails,
  DeviceListResult,
  DeviceStatus,
  ImouClientConfig,
  LogFn,
  RequestOptions,
  Token,
} from './types.js';

// ============================================================================
// CONSTANTS
// ============================================================================

/** Page size used when listing devices bound to the account */
const DEVICE_LIST_LIMIT = 128;

/** Devices report their features on channel 0 unless told otherwise */
const DEFAULT_CHANNEL = '0';

// ============================================================================
// CLIENT CLASS
// ============================================================================

export class ImouApiClient {
  private readonly session: ImouSession;
  private readonly log: LogFn;

  constructor(config: ImouClientConfig, session?: ImouSession) {
    this.session = session ?? new ImouSession(config);
    this.log = config.log ?? (() => undefined);
  }

  get baseUrl(): string {
    return this.session.apiUrl;
  }

  get timeout(): number {
    return this.session.requestTimeout;
  }

  isConnected(): boolean {
    return this.session.isConnected();
  }

  /** Log in now instead of on the first operation. */
  connect(options?: RequestOptions): Promise<Token> {
    return this.session.getValidToken(options);
  }

  /** Release the session; further calls fail with a TransportError. */
  close(): void {
    this.session.close();
  }

  // ==========================================================================
  // HTTP LAYER
  // ==========================================================================

  private async call<T>(
    method: string,
    params: Record<string, unknown>,
    map: (data: Record<string, unknown>) => T,
    options: RequestOptions = {},
    retryOnTokenRejection = true,
  ): Promise<T> {
    const token = await this.session.getValidToken(options);
    this.log('debug', `Calling ${method}`);

    const response = await this.session.send(method, { ...params, token: token.accessToken }, options);
    const result = decodeResponse(response.status, response.body, map);
    if (result.success) {
      return result.data;
    }

    if (result.error instanceof TokenRejectedError && retryOnTokenRejection) {
      this.log('debug', `${method}: token rejected (${result.error.code}), logging in again`);
      this.session.invalidate(token);
      return this.call(method, params, map, options, false);
    }

    this.log('debug', `${method} failed: ${result.error.message}`);
    throw result.error;
  }

  // ==========================================================================
  // DEVICES
  // ==========================================================================

  async listDevices(options?: RequestOptions): Promise<DeviceListResult> {
    return this.call(
      'deviceBaseList',
      { bindId: -1, limit: DEVICE_LIST_LIMIT, type: 'bindAndShare', needApInfo: false },
      toDeviceList,
      options,
    );
  }

  async getDeviceDetails(deviceIds: readonly string[], options?: RequestOptions): Promise<DeviceDetails[]> {
    return this.call(
      'deviceBaseDetailList',
      { deviceList: deviceIds.map(deviceId => ({ deviceId })) },
      toDeviceDetails,
      options,
    );
  }

  async getDeviceStatus(deviceId: string, options?: RequestOptions): Promise<DeviceStatus> {
    return this.call('deviceOnline', { deviceId }, toDeviceStatus, options);
  }

  async isDeviceOnline(deviceId: string, options?: RequestOptions): Promise<boolean> {
    const status = await this.getDeviceStatus(deviceId, options);
    return status.online;
  }

  async restartDevice(deviceId: string, options?: RequestOptions): Promise<void> {
    return this.call('restartDevice', { deviceId }, ignoreData, options);
  }

  // ==========================================================================
  // SWITCHES
  // ==========================================================================

  async getSwitchState(deviceId: string, enableType: string, options?: RequestOptions): Promise<boolean> {
    return this.call(
      'getDeviceCameraStatus',
      { deviceId, channelId: DEFAULT_CHANNEL, enableType },
      toSwitchState,
      options,
    );
  }

  async setSwitchState(deviceId: string, enableType: string, on: boolean, options?: RequestOptions): Promise<void> {
    return this.call(
      'setDeviceCameraStatus',
      { deviceId, channelId: DEFAULT_CHANNEL, enableType, enable: on },
      ignoreData,
      options,
    );
  }

  // ==========================================================================
  // ALARMS
  // ==========================================================================

  /**
   * Alarms for a device, newest first. Defaults to the last 30 days.
   */
  async getAlarmMessages(deviceId: string, query: AlarmQuery = {}, options?: RequestOptions): Promise<AlarmMessage[]> {
    const end = query.end ?? new Date();
    const begin = query.begin ?? new Date(end.getTime() - ALARM_LOOKBACK);

    return this.call(
      'getAlarmMessage',
      {
        deviceId,
        channelId: query.channelId ?? DEFAULT_CHANNEL,
        beginTime: formatLocalDate(begin),
        endTime: formatLocalDate(end),
        count: query.count ?? 10,
      },
      toAlarmMessages,
      options,
    );
  }
}
