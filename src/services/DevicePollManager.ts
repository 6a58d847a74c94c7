import type { LogFn } from '../api/types.js';
import { ImouError } from '../api/errors.js';
import type { ImouDevice } from '../devices/ImouDevice.js';

// ============================================================================
// CONSTANTS
// ============================================================================

/** Delay before first poll after accessory creation (ms) */
const INITIAL_POLL_DELAY_MS = 5000;

// ============================================================================
// TYPES
// ============================================================================

export interface PollCallbacks {
  onUpdate: (device: ImouDevice) => void;
  onOnlineChange: (online: boolean) => void;
}

// ============================================================================
// DEVICE POLL MANAGER
// ============================================================================

export class DevicePollManager {
  private lastOnline: boolean | null = null;
  private polling = false;
  private startupTimer?: ReturnType<typeof setTimeout>;
  private pollingTimer?: ReturnType<typeof setInterval>;

  constructor(
    private readonly device: ImouDevice,
    private readonly interval: number,
    private readonly callbacks: PollCallbacks,
    private readonly log: LogFn,
  ) {}

  // ==========================================================================
  // PUBLIC API
  // ==========================================================================

  start(): void {
    this.startupTimer = setTimeout(() => {
      this.startupTimer = undefined;
      void this.pollState();
      this.pollingTimer = setInterval(() => void this.pollState(), this.interval);
      this.log('debug', `Interval polling started every ${this.interval}ms`);
    }, INITIAL_POLL_DELAY_MS);

    this.log('debug', `State updates will start in ${INITIAL_POLL_DELAY_MS}ms`);
  }

  cleanup(): void {
    if (this.startupTimer) {
      clearTimeout(this.startupTimer);
      this.startupTimer = undefined;
    }
    if (this.pollingTimer) {
      clearInterval(this.pollingTimer);
      this.pollingTimer = undefined;
    }
  }

  // ==========================================================================
  // STATE POLL
  // ==========================================================================

  /** Refresh the device once. Overlapping calls are skipped. */
  async pollState(): Promise<void> {
    if (this.polling) {
      this.log('debug', `[${this.device.getName()}] previous poll still running, skipping`);
      return;
    }
    this.polling = true;

    try {
      const refreshed = await this.device.refresh();
      if (!refreshed) {
        return;
      }

      const online = this.device.isOnline();
      if (online !== this.lastOnline) {
        this.lastOnline = online;
        this.log('info', `[${this.device.getName()}] ${online ? 'online' : 'offline'}`);
        this.callbacks.onOnlineChange(online);
      }
      this.callbacks.onUpdate(this.device);
    } catch (error) {
      const message = error instanceof ImouError ? `${error.name}: ${error.message}` : String(error);
      this.log('warn', `[${this.device.getName()}] poll failed: ${message}`);
    } finally {
      this.polling = false;
    }
  }
}
