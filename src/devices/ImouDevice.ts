import { IMOU_CAPABILITIES, IMOU_SWITCHES, MANUFACTURER } from '../api/constants.js';
import { InvalidResponseError } from '../api/errors.js';
import type { ImouApiClient } from '../api/ImouApiClient.js';
import type { EntityPlatform, LogFn } from '../api/types.js';
import { ImouBinarySensor, ImouSensor, ImouSwitch } from './ImouEntity.js';
import type { ImouEntity } from './ImouEntity.js';

// ============================================================================
// TYPES
// ============================================================================

export interface EntityDiagnostics {
  name: string;
  description: string;
  state: boolean | string | null;
  isEnabled: boolean;
  isUpdated: boolean;
}

export interface DeviceDiagnostics {
  api: {
    baseUrl: string;
    timeout: number;
    isConnected: boolean;
  };
  device: {
    id: string;
    name: string;
    catalog: string;
    givenName: string;
    model: string;
    firmware: string;
    manufacturer: string;
    online: boolean;
  };
  capabilities: { name: string; description: string }[];
  switches: EntityDiagnostics[];
  sensors: EntityDiagnostics[];
  binarySensors: EntityDiagnostics[];
}

const UNKNOWN = 'N.A.';

/** Not listed in "ability" by most cameras, yet every camera supports it */
const IMPLICIT_CAPABILITY = 'motionDetect';

// ============================================================================
// IMOU DEVICE
// ============================================================================

export class ImouDevice {
  private catalog = UNKNOWN;
  private firmware = UNKNOWN;
  private name = UNKNOWN;
  private givenName = '';
  private model = UNKNOWN;
  private online = false;
  private capabilities: string[] = [];
  private switches: ImouSwitch[] = [];
  private sensors: ImouSensor[] = [];
  private onlineSensor: ImouBinarySensor | null = null;

  private initialized = false;
  private enabled = true;

  constructor(
    private readonly client: ImouApiClient,
    private readonly deviceId: string,
    private readonly log: LogFn = () => undefined,
  ) {}

  // ==========================================================================
  // ACCESSORS
  // ==========================================================================

  getDeviceId(): string {
    return this.deviceId;
  }

  /** The name given locally wins over the one reported by the cloud. */
  getName(): string {
    return this.givenName !== '' ? this.givenName : this.name;
  }

  setName(givenName: string): void {
    this.givenName = givenName;
  }

  getModel(): string {
    return this.model;
  }

  getManufacturer(): string {
    return MANUFACTURER;
  }

  getFirmware(): string {
    return this.firmware;
  }

  getCapabilities(): readonly string[] {
    return this.capabilities;
  }

  isOnline(): boolean {
    return this.online;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  setEnabled(value: boolean): void {
    this.enabled = value;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  getSwitches(): readonly ImouSwitch[] {
    return this.switches;
  }

  getAllSensors(): ImouEntity[] {
    return [...this.switches, ...this.sensors, ...(this.onlineSensor ? [this.onlineSensor] : [])];
  }

  getSensorsByPlatform(platform: EntityPlatform): ImouEntity[] {
    return this.getAllSensors().filter(sensor => sensor.platform === platform);
  }

  getSensorByName(name: string): ImouEntity | undefined {
    return this.getAllSensors().find(sensor => sensor.name === name);
  }

  // ==========================================================================
  // LIFECYCLE
  // ==========================================================================

  /**
   * Load the device details and create one entity per supported feature.
   */
  async initialize(): Promise<void> {
    const details = await this.client.getDeviceDetails([this.deviceId]);
    if (details.length !== 1) {
      throw new InvalidResponseError(`Expected one device for ${this.deviceId}, got ${details.length}`);
    }

    const device = details[0];
    this.catalog = device.catalog;
    this.firmware = device.firmware;
    this.name = device.name;
    this.model = device.deviceModel;
    this.online = device.online;
    this.capabilities = [...device.capabilities];
    if (!this.capabilities.includes(IMPLICIT_CAPABILITY)) {
      this.capabilities.push(IMPLICIT_CAPABILITY);
    }

    const lowered = new Set(this.capabilities.map(capability => capability.toLowerCase()));
    this.switches = Object.keys(IMOU_SWITCHES)
      .filter(switchType => lowered.has(switchType.toLowerCase()))
      .map(switchType => new ImouSwitch(this.client, this.deviceId, this.getName(), switchType));
    this.sensors = [new ImouSensor(this.client, this.deviceId, this.getName(), 'lastAlarm')];
    this.onlineSensor = new ImouBinarySensor(this.client, this.deviceId, this.getName(), 'online');

    this.initialized = true;
    this.log('debug', `Retrieved device ${this.toString()}`);
  }

  /**
   * Refresh online state, then every entity when the device is reachable.
   * Returns false when the device is disabled.
   */
  async refresh(): Promise<boolean> {
    if (!this.enabled) {
      return false;
    }
    if (!this.initialized || !this.onlineSensor) {
      await this.initialize();
    }

    this.log('debug', `[${this.getName()}] update requested`);
    if (this.onlineSensor) {
      await this.onlineSensor.update();
      this.online = this.onlineSensor.isOn();
    }

    if (this.online) {
      for (const entity of [...this.switches, ...this.sensors]) {
        await entity.update();
      }
    }
    return true;
  }

  // ==========================================================================
  // DIAGNOSTICS
  // ==========================================================================

  toString(): string {
    return `${this.name} (${this.model}, serial ${this.deviceId})`;
  }

  getDiagnostics(): DeviceDiagnostics {
    const describe = (entity: ImouEntity): EntityDiagnostics => ({
      name: entity.name,
      description: `${entity.description} (${entity.name})`,
      state: entity.state,
      isEnabled: entity.isEnabled(),
      isUpdated: entity.isUpdated(),
    });

    return {
      api: {
        baseUrl: this.client.baseUrl,
        timeout: this.client.timeout,
        isConnected: this.client.isConnected(),
      },
      device: {
        id: this.deviceId,
        name: this.name,
        catalog: this.catalog,
        givenName: this.givenName,
        model: this.model,
        firmware: this.firmware,
        manufacturer: MANUFACTURER,
        online: this.online,
      },
      capabilities: this.capabilities.map(name => ({
        name,
        description: IMOU_CAPABILITIES[name] ? `${IMOU_CAPABILITIES[name]} (${name})` : name,
      })),
      switches: this.switches.map(describe),
      sensors: this.sensors.map(describe),
      binarySensors: this.onlineSensor ? [describe(this.onlineSensor)] : [],
    };
  }

  /** Multi-line, human-readable description of the device and its entities. */
  dump(): string {
    const data = this.getDiagnostics();
    const lines = [
      `- Device ID: ${data.device.id}`,
      `    Name: ${data.device.name}`,
      `    Catalog: ${data.device.catalog}`,
      `    Model: ${data.device.model}`,
      `    Firmware: ${data.device.firmware}`,
      `    Online: ${data.device.online ? 'yes' : 'no'}`,
      '    Capabilities:',
      ...data.capabilities.map(capability => `        - ${capability.description}`),
      '    Switches:',
      ...data.switches.map(entity => `        - ${entity.description}: ${String(entity.state)}`),
      '    Sensors:',
      ...data.sensors.map(entity => `        - ${entity.description}: ${String(entity.state)}`),
      '    Binary Sensors:',
      ...data.binarySensors.map(entity => `        - ${entity.description}: ${String(entity.state)}`),
    ];
    return `${lines.join('\n')}\n`;
  }
}
