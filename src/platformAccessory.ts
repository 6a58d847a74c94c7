import type { CharacteristicValue, PlatformAccessory, Service } from 'homebridge';

import type { ImouLifePlatform } from './platform.js';
import type { ImouDevice } from './devices/ImouDevice.js';
import type { ImouSwitch } from './devices/ImouEntity.js';
import { DevicePollManager } from './services/DevicePollManager.js';

// ============================================================================
// UTILITIES
// ============================================================================

/**
 * Sanitize a name for HomeKit compatibility.
 * HomeKit only allows alphanumeric, space, and apostrophe characters.
 */
export function sanitizeForHomeKit(name: string): string {
  return name
    .replace(/\+/g, ' Plus')
    .replace(/&/g, ' and ')
    .replace(/[^a-zA-Z0-9 ']/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    || 'Unknown';
}

// ============================================================================
// IMOU LIFE ACCESSORY
// ============================================================================

/**
 * One accessory per Imou device, with a Switch service for every camera
 * feature the device reports.
 */
export class ImouLifeAccessory {
  private readonly switchServices = new Map<string, { service: Service; entity: ImouSwitch }>();
  private readonly pollManager: DevicePollManager;

  constructor(
    private readonly platform: ImouLifePlatform,
    private readonly accessory: PlatformAccessory,
    private readonly device: ImouDevice,
    pollingInterval: number,
  ) {
    this.configureAccessoryInfo();
    this.configureSwitchServices();

    this.pollManager = new DevicePollManager(
      device,
      pollingInterval,
      {
        onUpdate: () => this.syncSwitchStates(),
        onOnlineChange: (online) => this.syncOnline(online),
      },
      this.platform.logFn,
    );
    this.pollManager.start();
  }

  cleanup(): void {
    this.pollManager.cleanup();
  }

  // ==========================================================================
  // ACCESSORS
  // ==========================================================================

  private get Service() {
    return this.platform.Service;
  }

  private get Characteristic() {
    return this.platform.Characteristic;
  }

  // ==========================================================================
  // ACCESSORY CONFIGURATION
  // ==========================================================================

  private configureAccessoryInfo(): void {
    const info = this.accessory.getService(this.Service.AccessoryInformation)
      ?? this.accessory.addService(this.Service.AccessoryInformation);

    info
      .setCharacteristic(this.Characteristic.Manufacturer, this.device.getManufacturer())
      .setCharacteristic(this.Characteristic.Model, this.device.getModel())
      .setCharacteristic(this.Characteristic.SerialNumber, this.device.getDeviceId())
      .setCharacteristic(this.Characteristic.FirmwareRevision, this.device.getFirmware());
  }

  private configureSwitchServices(): void {
    const wanted = new Set(this.device.getSwitches().map(entity => entity.name));

    // Drop services for switches the device no longer reports
    for (const service of [...this.accessory.services]) {
      if (service.UUID === this.Service.Switch.UUID && (!service.subtype || !wanted.has(service.subtype))) {
        this.accessory.removeService(service);
      }
    }

    for (const entity of this.device.getSwitches()) {
      const displayName = sanitizeForHomeKit(`${this.device.getName()} ${entity.description}`);
      const service = this.accessory.getServiceById(this.Service.Switch, entity.name)
        ?? this.accessory.addService(this.Service.Switch, displayName, entity.name);

      service.setCharacteristic(this.Characteristic.Name, displayName);
      service.getCharacteristic(this.Characteristic.On)
        .onGet(() => entity.isOn())
        .onSet((value) => this.setSwitch(entity, value));

      this.switchServices.set(entity.name, { service, entity });
    }
  }

  // ==========================================================================
  // HANDLERS
  // ==========================================================================

  private async setSwitch(entity: ImouSwitch, value: CharacteristicValue): Promise<void> {
    const on = value === true || value === 1;
    try {
      if (on) {
        await entity.turnOn();
      } else {
        await entity.turnOff();
      }
      this.platform.log.info(`[${this.device.getName()}] ${entity.description}: ${on ? 'On' : 'Off'}`);
    } catch (error) {
      this.platform.log.error(
        `[${this.device.getName()}] Failed to set ${entity.description}:`,
        error instanceof Error ? error.message : String(error),
      );
      throw new this.platform.api.hap.HapStatusError(this.platform.api.hap.HAPStatus.SERVICE_COMMUNICATION_FAILURE);
    }
  }

  // ==========================================================================
  // STATE SYNC
  // ==========================================================================

  private syncSwitchStates(): void {
    for (const { service, entity } of this.switchServices.values()) {
      service.updateCharacteristic(this.Characteristic.On, entity.isOn());
    }
  }

  private syncOnline(online: boolean): void {
    for (const { service } of this.switchServices.values()) {
      service.updateCharacteristic(this.Characteristic.StatusActive, online);
    }
  }
}
