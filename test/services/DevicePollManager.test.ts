import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DevicePollManager } from '../../src/services/DevicePollManager.js';
import type { PollCallbacks } from '../../src/services/DevicePollManager.js';
import type { ImouDevice } from '../../src/devices/ImouDevice.js';
import { TransportError } from '../../src/api/errors.js';

// ============================================================================
// MOCKS
// ============================================================================

function createMockDevice() {
  return {
    getName: vi.fn().mockReturnValue('Garden'),
    refresh: vi.fn().mockResolvedValue(true),
    isOnline: vi.fn().mockReturnValue(true),
  };
}

function createMockCallbacks(): PollCallbacks {
  return {
    onUpdate: vi.fn(),
    onOnlineChange: vi.fn(),
  };
}

const INTERVAL = 30_000;

// ============================================================================
// TEST SUITE
// ============================================================================

describe('DevicePollManager', () => {
  let manager: DevicePollManager;
  let device: ReturnType<typeof createMockDevice>;
  let callbacks: PollCallbacks;
  const log = vi.fn();

  const createManager = () =>
    new DevicePollManager(device as unknown as ImouDevice, INTERVAL, callbacks, log);

  beforeEach(() => {
    vi.useFakeTimers();
    device = createMockDevice();
    callbacks = createMockCallbacks();
    log.mockReset();
    manager = createManager();
  });

  afterEach(() => {
    manager.cleanup();
    vi.useRealTimers();
  });

  // ==========================================================================
  // STARTUP
  // ==========================================================================

  describe('start', () => {
    it('should delay the initial poll', async () => {
      manager.start();

      expect(device.refresh).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(5000);

      expect(device.refresh).toHaveBeenCalledTimes(1);
    });

    it('should poll again every interval', async () => {
      manager.start();

      await vi.advanceTimersByTimeAsync(5000 + INTERVAL * 2);

      expect(device.refresh).toHaveBeenCalledTimes(3);
    });

    it('should stop polling after cleanup', async () => {
      manager.start();
      await vi.advanceTimersByTimeAsync(5000);

      manager.cleanup();
      await vi.advanceTimersByTimeAsync(INTERVAL * 3);

      expect(device.refresh).toHaveBeenCalledTimes(1);
    });

    it('should never poll when cleaned up before the first poll', async () => {
      manager.start();
      manager.cleanup();

      await vi.advanceTimersByTimeAsync(5000 + INTERVAL);

      expect(device.refresh).not.toHaveBeenCalled();
    });
  });

  // ==========================================================================
  // STATE
  // ==========================================================================

  describe('pollState', () => {
    it('should report updates and the first online state', async () => {
      await manager.pollState();

      expect(callbacks.onOnlineChange).toHaveBeenCalledWith(true);
      expect(callbacks.onUpdate).toHaveBeenCalledWith(device);
      expect(log).toHaveBeenCalledWith('info', '[Garden] online');
    });

    it('should only report online changes', async () => {
      await manager.pollState();
      await manager.pollState();
      device.isOnline.mockReturnValue(false);
      await manager.pollState();

      expect(callbacks.onOnlineChange).toHaveBeenCalledTimes(2);
      expect(callbacks.onOnlineChange).toHaveBeenLastCalledWith(false);
      expect(callbacks.onUpdate).toHaveBeenCalledTimes(3);
    });

    it('should not report anything for a disabled device', async () => {
      device.refresh.mockResolvedValue(false);

      await manager.pollState();

      expect(callbacks.onUpdate).not.toHaveBeenCalled();
      expect(callbacks.onOnlineChange).not.toHaveBeenCalled();
    });

    it('should log failures and keep polling', async () => {
      device.refresh.mockRejectedValueOnce(new TransportError('Request deviceOnline failed: fetch failed'));

      await manager.pollState();
      await manager.pollState();

      expect(log).toHaveBeenCalledWith(
        'warn',
        '[Garden] poll failed: TransportError: Request deviceOnline failed: fetch failed',
      );
      expect(callbacks.onUpdate).toHaveBeenCalledTimes(1);
    });

    it('should skip a poll while the previous one is running', async () => {
      let release: (value: boolean) => void = () => undefined;
      device.refresh.mockReturnValueOnce(new Promise<boolean>(resolve => {
        release = resolve;
      }));

      const first = manager.pollState();
      await manager.pollState();
      release(true);
      await first;

      expect(device.refresh).toHaveBeenCalledTimes(1);
    });
  });
});
