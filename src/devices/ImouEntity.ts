import { BINARY_SENSORS, IMOU_SWITCHES, SENSORS } from '../api/constants.js';
import type { ImouApiClient } from '../api/ImouApiClient.js';
import type { EntityPlatform } from '../api/types.js';

// ============================================================================
// BASE ENTITY
// ============================================================================

/**
 * A single piece of device state backed by one API call.
 */
export abstract class ImouEntity {
  abstract readonly platform: EntityPlatform;

  private enabled = true;
  private updated = false;

  constructor(
    protected readonly client: ImouApiClient,
    readonly deviceId: string,
    readonly deviceName: string,
    readonly name: string,
    readonly description: string,
  ) {}

  isEnabled(): boolean {
    return this.enabled;
  }

  setEnabled(value: boolean): void {
    this.enabled = value;
  }

  /** Whether the state has been fetched at least once. */
  isUpdated(): boolean {
    return this.updated;
  }

  async update(): Promise<void> {
    if (!this.enabled) {
      return;
    }
    await this.fetchState();
    this.updated = true;
  }

  abstract get state(): boolean | string | null;

  protected abstract fetchState(): Promise<void>;

  toString(): string {
    return `${this.deviceName} ${this.description}`;
  }
}

// ============================================================================
// SWITCH
// ============================================================================

export class ImouSwitch extends ImouEntity {
  readonly platform = 'switch' as const;
  private on = false;

  constructor(client: ImouApiClient, deviceId: string, deviceName: string, switchType: string) {
    super(client, deviceId, deviceName, switchType, IMOU_SWITCHES[switchType] ?? switchType);
  }

  get state(): boolean {
    return this.on;
  }

  isOn(): boolean {
    return this.on;
  }

  async turnOn(): Promise<void> {
    await this.client.setSwitchState(this.deviceId, this.name, true);
    this.on = true;
  }

  async turnOff(): Promise<void> {
    await this.client.setSwitchState(this.deviceId, this.name, false);
    this.on = false;
  }

  async toggle(): Promise<void> {
    if (this.on) {
      await this.turnOff();
    } else {
      await this.turnOn();
    }
  }

  protected async fetchState(): Promise<void> {
    this.on = await this.client.getSwitchState(this.deviceId, this.name);
  }
}

// ============================================================================
// SENSOR
// ============================================================================

/** Reports the local date of the most recent alarm, or null when there is none. */
export class ImouSensor extends ImouEntity {
  readonly platform = 'sensor' as const;
  private value: string | null = null;

  constructor(client: ImouApiClient, deviceId: string, deviceName: string, sensorType: string) {
    super(client, deviceId, deviceName, sensorType, SENSORS[sensorType] ?? sensorType);
  }

  get state(): string | null {
    return this.value;
  }

  protected async fetchState(): Promise<void> {
    const alarms = await this.client.getAlarmMessages(this.deviceId, { count: 1 });
    this.value = alarms[0]?.localDate ?? null;
  }
}

// ============================================================================
// BINARY SENSOR
// ============================================================================

export class ImouBinarySensor extends ImouEntity {
  readonly platform = 'binary_sensor' as const;
  private on = false;

  constructor(client: ImouApiClient, deviceId: string, deviceName: string, sensorType: string) {
    super(client, deviceId, deviceName, sensorType, BINARY_SENSORS[sensorType] ?? sensorType);
  }

  get state(): boolean {
    return this.on;
  }

  isOn(): boolean {
    return this.on;
  }

  protected async fetchState(): Promise<void> {
    this.on = await this.client.isDeviceOnline(this.deviceId);
  }
}
