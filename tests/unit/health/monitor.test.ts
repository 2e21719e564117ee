import type { PeerSyncService } from '../../../src/peer/syncthing-client.js';
import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from 'vitest';
import { HealthMonitor, type HealthMonitorOptions } from '../../../src/health/monitor.js';

interface FakePeer extends PeerSyncService {
  ping: Mock<(timeoutMs: number, signal?: AbortSignal) => Promise<boolean>>;
  restart: Mock<(signal?: AbortSignal) => Promise<boolean>>;
}

function createPeer(): FakePeer {
  return {
    ping: vi.fn<(timeoutMs: number, signal?: AbortSignal) => Promise<boolean>>().mockResolvedValue(true),
    start: vi.fn<() => Promise<boolean>>().mockResolvedValue(true),
    stop: vi.fn<() => Promise<boolean>>().mockResolvedValue(true),
    restart: vi.fn<(signal?: AbortSignal) => Promise<boolean>>().mockResolvedValue(true),
    waitForIdle: vi.fn<(timeoutMs: number, signal?: AbortSignal) => Promise<boolean>>().mockResolvedValue(true),
  };
}

async function settle(): Promise<void> {
  for (let i = 0; i < 10; i++) {
    await Promise.resolve();
  }
}

const OPTIONS: HealthMonitorOptions = {
  intervalMs: 60_000,
  probeTimeoutMs: 5000,
  failureThreshold: 1,
  restartOnFailure: true,
};

describe('HealthMonitor', () => {
  let peer: FakePeer;
  let monitor: HealthMonitor;

  beforeEach(() => {
    peer = createPeer();
  });

  afterEach(async () => {
    await monitor.stop();
    vi.useRealTimers();
  });

  describe('check', () => {
    it('starts unknown and becomes healthy on a successful probe', async () => {
      monitor = new HealthMonitor(peer, OPTIONS);
      expect(monitor.getState().status).toBe('unknown');

      const state = await monitor.check();

      expect(state).toMatchObject({ status: 'healthy', consecutiveFailures: 0, restarts: 0 });
      expect(state.lastCheckedAt).toBeInstanceOf(Date);
      expect(peer.ping).toHaveBeenCalledWith(5000, expect.any(AbortSignal));
      expect(Object.isFrozen(state)).toBe(true);
    });

    it('restarts exactly once when a healthy service stops answering', async () => {
      monitor = new HealthMonitor(peer, OPTIONS);
      const restarts: boolean[] = [];
      monitor.on('restart', (ok: boolean) => restarts.push(ok));

      await monitor.check();
      peer.ping.mockResolvedValueOnce(false);
      const failed = await monitor.check();

      expect(peer.restart).toHaveBeenCalledTimes(1);
      expect(peer.restart).toHaveBeenCalledWith(expect.any(AbortSignal));
      expect(restarts).toEqual([true]);
      expect(failed).toMatchObject({ status: 'unresponsive', consecutiveFailures: 0, restarts: 1 });

      const recovered = await monitor.check();
      expect(recovered).toMatchObject({ status: 'healthy', restarts: 1 });
      expect(peer.restart).toHaveBeenCalledTimes(1);
    });

    it('only logs when restarting is disabled', async () => {
      monitor = new HealthMonitor(peer, { ...OPTIONS, restartOnFailure: false });
      peer.ping.mockResolvedValue(false);

      await monitor.check();
      const state = await monitor.check();

      expect(peer.restart).not.toHaveBeenCalled();
      expect(state).toMatchObject({ status: 'unresponsive', consecutiveFailures: 2, restarts: 0 });
    });

    it('waits for the failure threshold before acting', async () => {
      monitor = new HealthMonitor(peer, { ...OPTIONS, failureThreshold: 3 });
      await monitor.check();
      peer.ping.mockResolvedValue(false);

      await monitor.check();
      const second = await monitor.check();
      expect(second).toMatchObject({ status: 'healthy', consecutiveFailures: 2 });
      expect(peer.restart).not.toHaveBeenCalled();

      const third = await monitor.check();
      expect(third).toMatchObject({ status: 'unresponsive', consecutiveFailures: 0, restarts: 1 });
      expect(peer.restart).toHaveBeenCalledTimes(1);
    });

    it('treats a throwing probe as a failure', async () => {
      monitor = new HealthMonitor(peer, { ...OPTIONS, restartOnFailure: false });
      peer.ping.mockRejectedValue(new Error('socket hang up'));

      const state = await monitor.check();

      expect(state).toMatchObject({ status: 'unresponsive', consecutiveFailures: 1 });
    });

    it('keeps going when the restart itself fails', async () => {
      monitor = new HealthMonitor(peer, OPTIONS);
      peer.ping.mockResolvedValue(false);
      peer.restart.mockRejectedValue(new Error('systemctl not found'));
      const restarts: boolean[] = [];
      monitor.on('restart', (ok: boolean) => restarts.push(ok));

      const state = await monitor.check();

      expect(restarts).toEqual([false]);
      expect(state).toMatchObject({ status: 'unresponsive', restarts: 1 });
    });
  });

  describe('probe loop', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    it('probes immediately and then once per interval', async () => {
      monitor = new HealthMonitor(peer, OPTIONS);

      monitor.start();
      await settle();
      expect(peer.ping).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(59_999);
      expect(peer.ping).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1);
      await settle();
      expect(peer.ping).toHaveBeenCalledTimes(2);
    });

    it('never overlaps probes', async () => {
      let release: (healthy: boolean) => void = () => {};
      peer.ping.mockImplementationOnce(() => new Promise<boolean>((resolve) => {
        release = resolve;
      }));
      monitor = new HealthMonitor(peer, OPTIONS);

      monitor.start();
      await vi.advanceTimersByTimeAsync(300_000);
      expect(peer.ping).toHaveBeenCalledTimes(1);

      release(true);
      await settle();
      await vi.advanceTimersByTimeAsync(60_000);
      await settle();
      expect(peer.ping).toHaveBeenCalledTimes(2);
    });

    it('aborts an in-flight probe on stop without counting it', async () => {
      peer.ping.mockImplementation((_timeoutMs, signal) => new Promise<boolean>((resolve) => {
        signal?.addEventListener('abort', () => resolve(false));
      }));
      monitor = new HealthMonitor(peer, OPTIONS);

      monitor.start();
      await settle();
      await monitor.stop();

      expect(monitor.getState()).toMatchObject({ status: 'unknown', consecutiveFailures: 0 });
      expect(peer.restart).not.toHaveBeenCalled();
      expect(monitor.active).toBe(false);

      await vi.advanceTimersByTimeAsync(600_000);
      expect(peer.ping).toHaveBeenCalledTimes(1);
    });

    it('interrupts a running restart on stop without counting it', async () => {
      peer.ping.mockResolvedValue(false);
      peer.restart.mockImplementation(signal => new Promise<boolean>((_resolve, reject) => {
        signal?.addEventListener('abort', () => reject(new Error('restart aborted')), { once: true });
      }));
      monitor = new HealthMonitor(peer, OPTIONS);
      const restarts: boolean[] = [];
      monitor.on('restart', (ok: boolean) => restarts.push(ok));

      monitor.start();
      await settle();
      expect(peer.restart).toHaveBeenCalledTimes(1);

      await monitor.stop();

      expect(restarts).toEqual([]);
      expect(monitor.getState()).toMatchObject({ status: 'unresponsive', consecutiveFailures: 1, restarts: 0 });
      expect(monitor.active).toBe(false);
    });
  });
});
