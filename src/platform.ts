import type { API, Characteristic, DynamicPlatformPlugin, Logging, PlatformAccessory, PlatformConfig, Service } from 'homebridge';

import { ImouApiClient } from './api/ImouApiClient.js';
import type { LogFn } from './api/types.js';
import { ImouDiscoverService } from './devices/ImouDiscoverService.js';
import { ImouLifeAccessory } from './platformAccessory.js';
import { PLATFORM_NAME, PLUGIN_NAME, resolvePlatformConfig } from './settings.js';
import type { ResolvedPlatformConfig } from './settings.js';

/**
 * Discovers the devices bound to the configured Imou developer account and
 * registers one accessory per device.
 */
export class ImouLifePlatform implements DynamicPlatformPlugin {
  public readonly Service: typeof Service;
  public readonly Characteristic: typeof Characteristic;

  // this is used to track restored cached accessories
  public readonly accessories: Map<string, PlatformAccessory> = new Map();

  private readonly handlers: ImouLifeAccessory[] = [];
  private client: ImouApiClient | null = null;

  constructor(
    public readonly log: Logging,
    public readonly config: PlatformConfig,
    public readonly api: API,
  ) {
    this.Service = api.hap.Service;
    this.Characteristic = api.hap.Characteristic;

    this.log.debug('Finished initializing platform:', this.config.platform);

    // Only register new accessories once Homebridge has restored the cached ones.
    this.api.on('didFinishLaunching', () => {
      this.log.debug('Executed didFinishLaunching callback');
      this.discoverDevices().catch((error: unknown) => {
        this.log.error('Device discovery failed:', error instanceof Error ? error.message : String(error));
      });
    });

    this.api.on('shutdown', () => this.shutdown());
  }

  /** Level-tagged logger for library code, routed to the Homebridge log. */
  readonly logFn: LogFn = (level, message) => this.log[level](message);

  /**
   * This function is invoked when homebridge restores cached accessories from disk at startup.
   */
  configureAccessory(accessory: PlatformAccessory) {
    this.log.info('Loading accessory from cache:', accessory.displayName);
    this.accessories.set(accessory.UUID, accessory);
  }

  async discoverDevices(): Promise<void> {
    let resolved: ResolvedPlatformConfig;
    try {
      resolved = resolvePlatformConfig(this.config);
    } catch (error) {
      this.log.error(error instanceof Error ? error.message : String(error));
      return;
    }

    this.client = new ImouApiClient({ ...resolved.client, log: this.logFn });
    const devices = await new ImouDiscoverService(this.client, this.logFn).discoverDevices();

    if (!devices.size) {
      this.log.warn('No devices found for this Imou account');
    }

    // Track which UUIDs are still bound to the account
    const discoveredUUIDs = new Set<string>();

    for (const device of devices.values()) {
      const override = resolved.devices.find(entry => entry.deviceId === device.getDeviceId());
      if (override?.enabled === false) {
        this.log.info('Skipping disabled device:', device.getName());
        device.setEnabled(false);
        continue;
      }
      if (override?.name) {
        device.setName(override.name);
      }

      const uuid = this.api.hap.uuid.generate(PLATFORM_NAME + '-' + device.getDeviceId());
      discoveredUUIDs.add(uuid);

      let accessory = this.accessories.get(uuid);
      if (accessory) {
        this.log.info('Restoring existing accessory from cache:', device.getName());
        accessory.context.deviceId = device.getDeviceId();
        this.api.updatePlatformAccessories([accessory]);
      } else {
        this.log.info('Adding new accessory:', device.getName());
        accessory = new this.api.platformAccessory(device.getName(), uuid);
        accessory.context.deviceId = device.getDeviceId();
        this.api.registerPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
        this.accessories.set(uuid, accessory);
      }

      this.handlers.push(new ImouLifeAccessory(this, accessory, device, resolved.pollingInterval));
    }

    // Remove accessories that are no longer bound to the account
    for (const [uuid, accessory] of this.accessories) {
      if (!discoveredUUIDs.has(uuid)) {
        this.log.info('Removing accessory no longer present:', accessory.displayName);
        this.api.unregisterPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
        this.accessories.delete(uuid);
      }
    }
  }

  private shutdown(): void {
    for (const handler of this.handlers) {
      handler.cleanup();
    }
    this.handlers.length = 0;
    this.client?.close();
    this.client = null;
  }
}
