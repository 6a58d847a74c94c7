import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { PlatformConfig } from 'homebridge';
import { ImouLifePlatform } from '../src/platform.js';
import { ImouApiClient } from '../src/api/ImouApiClient.js';
import type * as UtilsModule from '../src/api/utils.js';
import { createFakeCloud } from './helpers/fakeCloud.js';
import type { FakeCloud } from './helpers/fakeCloud.js';
import {
  asPlatformAccessory,
  createFakeApi,
  createFakeLog,
  FakeAccessory,
  FakeHapStatusError,
  SERVICE_COMMUNICATION_FAILURE,
} from './helpers/fakeHomebridge.js';
import type { FakeApi } from './helpers/fakeHomebridge.js';

// ============================================================================
// MOCKS
// ============================================================================

vi.mock('../src/api/utils.js', async (importOriginal) => {
  const actual = await importOriginal<typeof UtilsModule>();
  return {
    ...actual,
    fetchWithTimeout: vi.fn(),
  };
});

import { fetchWithTimeout } from '../src/api/utils.js';

const mockFetch = vi.mocked(fetchWithTimeout);

const CONFIG: PlatformConfig = {
  platform: 'ImouLife',
  appId: 'test-app',
  appSecret: 'test-secret',
  apiUrl: 'https://imou.example.test/openapi',
};

const DETAILS: Record<string, Record<string, unknown>> = {
  abc123: { deviceId: 'abc123', name: 'Garden', deviceModel: 'IPC-C22', version: '2.680.0', status: 'online', ability: 'WLAN,WhiteLight' },
  def456: { deviceId: 'def456', name: 'Porch', deviceModel: 'IPC-A26', version: '2.800.0', status: 'online', ability: 'WLAN' },
};

const requestedDeviceId = (params: Record<string, unknown>): string => {
  const [entry]: unknown[] = Array.isArray(params.deviceList) ? params.deviceList : [];
  return typeof entry === 'object' && entry !== null && 'deviceId' in entry ? String(entry.deviceId) : '';
};

// ============================================================================
// TEST SUITE
// ============================================================================

describe('ImouLifePlatform', () => {
  let cloud: FakeCloud;
  let fake: FakeApi;
  let log: ReturnType<typeof createFakeLog>['log'];
  let platform: ImouLifePlatform;

  const createPlatform = (config: PlatformConfig = CONFIG) => {
    const fakeLog = createFakeLog();
    log = fakeLog.log;
    return new ImouLifePlatform(fakeLog.asLogging, config, fake.asApi);
  };

  const registered = (): FakeAccessory[] =>
    fake.api.registerPlatformAccessories.mock.calls.flatMap(([, , accessories]) => accessories);

  const onHandler = (accessory: FakeAccessory | undefined, subtype: string) => {
    const handler = accessory?.switchService(subtype)?.getCharacteristic({ UUID: 'on' }).setHandler;
    if (!handler) {
      throw new Error(`No On handler for ${subtype}`);
    }
    return handler;
  };

  beforeEach(() => {
    vi.useFakeTimers();
    cloud = createFakeCloud();
    cloud.on('deviceBaseList', () => ({
      data: { count: 2, deviceList: [{ deviceId: 'abc123' }, { deviceId: 'def456' }] },
    }));
    cloud.on('deviceBaseDetailList', (params) => ({
      data: { deviceList: [DETAILS[requestedDeviceId(params)]] },
    }));
    cloud.on('setDeviceCameraStatus', () => ({}));
    mockFetch.mockReset().mockImplementation(cloud.fetch);
    fake = createFakeApi();
    platform = createPlatform();
  });

  afterEach(() => {
    fake.emit('shutdown');
    vi.useRealTimers();
  });

  // ==========================================================================
  // ACCESSORY REGISTRATION
  // ==========================================================================

  describe('discoverDevices', () => {
    it('should register one accessory per device', async () => {
      await platform.discoverDevices();

      expect(fake.api.registerPlatformAccessories).toHaveBeenCalledTimes(2);
      expect(fake.api.registerPlatformAccessories).toHaveBeenCalledWith('homebridge-imou-life', 'ImouLife', expect.any(Array));
      expect(registered().map(accessory => [accessory.displayName, accessory.UUID, accessory.context.deviceId])).toEqual([
        ['Garden', 'uuid:ImouLife-abc123', 'abc123'],
        ['Porch', 'uuid:ImouLife-def456', 'def456'],
      ]);
      expect([...platform.accessories.keys()]).toEqual(['uuid:ImouLife-abc123', 'uuid:ImouLife-def456']);
    });

    it('should add a Switch service per camera switch', async () => {
      await platform.discoverDevices();
      const [garden] = registered();

      const switches = garden.services.filter(service => service.UUID === 'switch');
      expect(switches.map(service => service.subtype)).toEqual(['motionDetect', 'whiteLight']);
      expect(garden.switchService('whiteLight')?.getCharacteristic({ UUID: 'name' }).value).toBe('Garden White Light');
      expect(garden.getService({ UUID: 'accessory-information' })?.getCharacteristic({ UUID: 'serial-number' }).value)
        .toBe('abc123');
    });

    it('should restore a cached accessory instead of registering it again', async () => {
      const cached = new FakeAccessory('Old Garden', 'uuid:ImouLife-abc123');
      platform.configureAccessory(asPlatformAccessory(cached));

      await platform.discoverDevices();

      expect(fake.api.updatePlatformAccessories).toHaveBeenCalledWith([cached]);
      expect(registered().map(accessory => accessory.UUID)).toEqual(['uuid:ImouLife-def456']);
      expect(cached.context.deviceId).toBe('abc123');
    });

    it('should drop cached Switch services the device no longer reports', async () => {
      const cached = new FakeAccessory('Garden', 'uuid:ImouLife-abc123');
      cached.addService({ UUID: 'switch' }, 'Garden Siren', 'linkageSiren');
      platform.configureAccessory(asPlatformAccessory(cached));

      await platform.discoverDevices();

      expect(cached.switchService('linkageSiren')).toBeUndefined();
      expect(cached.switchService('whiteLight')).toBeDefined();
    });

    it('should remove cached accessories no longer bound to the account', async () => {
      const stale = new FakeAccessory('Old Camera', 'uuid:ImouLife-zzz999');
      platform.configureAccessory(asPlatformAccessory(stale));

      await platform.discoverDevices();

      expect(fake.api.unregisterPlatformAccessories).toHaveBeenCalledWith('homebridge-imou-life', 'ImouLife', [stale]);
      expect(platform.accessories.has('uuid:ImouLife-zzz999')).toBe(false);
    });

    it('should register devices that share a name', async () => {
      cloud.on('deviceBaseDetailList', (params) => ({
        data: { deviceList: [{ ...DETAILS[requestedDeviceId(params)], name: 'IPC-C22' }] },
      }));

      await platform.discoverDevices();

      expect(registered().map(accessory => accessory.UUID)).toEqual(['uuid:ImouLife-abc123', 'uuid:ImouLife-def456']);
    });

    it('should apply per-device overrides', async () => {
      platform = createPlatform({
        ...CONFIG,
        devices: [
          { deviceId: 'abc123', name: 'Back Yard' },
          { deviceId: 'def456', enabled: false },
        ],
      });

      await platform.discoverDevices();

      expect(registered().map(accessory => accessory.displayName)).toEqual(['Back Yard']);
      expect(log.info).toHaveBeenCalledWith('Skipping disabled device:', 'Porch');
    });

    it('should log an invalid config and make no requests', async () => {
      platform = createPlatform({ platform: 'ImouLife', appSecret: 'test-secret' });

      await platform.discoverDevices();

      expect(log.error).toHaveBeenCalledWith('Missing required "appId" in ImouLife config');
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('should log a failed discovery started by Homebridge', async () => {
      cloud.on('deviceBaseList', () => ({ code: 'OP1011', msg: 'busy' }));

      fake.emit('didFinishLaunching');
      await vi.waitFor(() => {
        expect(log.error).toHaveBeenCalledWith('Device discovery failed:', 'OP1011: busy');
      });
    });
  });

  // ==========================================================================
  // SWITCH HANDLERS
  // ==========================================================================

  describe('switch handlers', () => {
    it('should set the camera switch through the cloud', async () => {
      await platform.discoverDevices();
      const [garden] = registered();

      await onHandler(garden, 'whiteLight')(true);

      const call = cloud.calls.find(entry => entry.method === 'setDeviceCameraStatus');
      expect(call?.params).toEqual({ deviceId: 'abc123', channelId: '0', enableType: 'whiteLight', enable: true, token: 'token-1' });
      expect(log.info).toHaveBeenCalledWith('[Garden] White Light: On');
    });

    it('should report a failed set as a HomeKit communication failure', async () => {
      cloud.on('setDeviceCameraStatus', () => ({ code: 'DV1007', msg: 'device offline' }));
      await platform.discoverDevices();
      const [garden] = registered();

      const error = await Promise.resolve(onHandler(garden, 'whiteLight')(true)).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FakeHapStatusError);
      expect(error).toMatchObject({ hapStatus: SERVICE_COMMUNICATION_FAILURE });
      expect(log.error).toHaveBeenCalledWith('[Garden] Failed to set White Light:', 'DV1007: device offline');
    });
  });

  // ==========================================================================
  // SHUTDOWN
  // ==========================================================================

  describe('shutdown', () => {
    it('should stop polling and close the client', async () => {
      const close = vi.spyOn(ImouApiClient.prototype, 'close');
      await platform.discoverDevices();

      fake.emit('shutdown');
      await vi.advanceTimersByTimeAsync(120_000);

      expect(close).toHaveBeenCalledTimes(1);
      expect(cloud.count('deviceOnline')).toBe(0);
      close.mockRestore();
    });
  });
});
