import type { ImouApiClient } from '../api/ImouApiClient.js';
import type { LogFn } from '../api/types.js';
import { ImouDevice } from './ImouDevice.js';

/**
 * Lists the devices bound to (or shared with) the account and initializes each.
 */
export class ImouDiscoverService {
  constructor(
    private readonly client: ImouApiClient,
    private readonly log: LogFn = () => undefined,
  ) {}

  /**
   * Returns device id -> initialized device. A device that fails to
   * initialize is logged and left out.
   */
  async discoverDevices(): Promise<Map<string, ImouDevice>> {
    this.log('debug', 'Starting discovery');

    const { count, devices: summaries } = await this.client.listDevices();
    this.log('debug', `Discovered ${count} registered devices`);

    const devices = new Map<string, ImouDevice>();
    for (const summary of summaries) {
      const device = new ImouDevice(this.client, summary.deviceId, this.log);
      try {
        await device.initialize();
      } catch (error) {
        const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
        this.log('warn', `Skipping device ${summary.deviceId}: ${message}`);
        continue;
      }
      this.log('debug', `   - ${device.toString()}`);
      devices.set(device.getDeviceId(), device);
    }
    return devices;
  }
}
