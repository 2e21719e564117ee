import type { Mock } from 'vitest';
import type { ActivitySignal, DaemonConfig } from '../../../src/types/daemon.js';
import type { RcloneCallOptions } from '../../../src/sync/rclone.js';
import type { PeerSyncService } from '../../../src/peer/syncthing-client.js';
import type { ProcessResult } from '../../../src/utils/process.js';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Orchestrator } from '../../../src/daemon/orchestrator.js';
import { SyncExecutor } from '../../../src/sync/executor.js';
import { RcloneClient } from '../../../src/sync/rclone.js';
import { ChangeWatcher } from '../../../src/watch/change-watcher.js';
import { createTestConfig } from '../../helpers/daemon-config.js';
import { processResult } from '../../helpers/process-result.js';

/**
 * A watcher that never touches the disk; tests emit activity by hand.
 */
class ManualWatcher extends ChangeWatcher {
  public readonly calls: string[];

  constructor(calls: string[]) {
    super(['/data/notes']);
    this.calls = calls;
  }

  override async start(): Promise<void> {
    this.calls.push('watch:start');
  }

  override async stop(): Promise<void> {
    this.calls.push('watch:stop');
  }

  touch(path = '/data/notes/todo.md'): void {
    const activity: ActivitySignal = { at: new Date(), watchRoot: '/data/notes', path, kind: 'change' };
    this.emit('activity', activity);
  }
}

interface FakePeer extends PeerSyncService {
  ping: Mock<PeerSyncService['ping']>;
  start: Mock<PeerSyncService['start']>;
  stop: Mock<PeerSyncService['stop']>;
  restart: Mock<PeerSyncService['restart']>;
  waitForIdle: Mock<PeerSyncService['waitForIdle']>;
}

function createFakePeer(): FakePeer {
  return {
    ping: vi.fn<PeerSyncService['ping']>().mockResolvedValue(true),
    start: vi.fn<PeerSyncService['start']>().mockResolvedValue(true),
    stop: vi.fn<PeerSyncService['stop']>().mockResolvedValue(true),
    restart: vi.fn<PeerSyncService['restart']>().mockResolvedValue(true),
    waitForIdle: vi.fn<PeerSyncService['waitForIdle']>().mockResolvedValue(true),
  };
}

/**
 * Resolves once the call's abort signal fires, like a killed rclone.
 */
function untilAborted(options: RcloneCallOptions): Promise<ProcessResult> {
  return new Promise((resolve) => {
    options.signal?.addEventListener('abort', () => {
      resolve(processResult({ exitCode: null, aborted: true }));
    }, { once: true });
  });
}

describe('Orchestrator', () => {
  let calls: string[];
  let config: DaemonConfig;
  let rclone: RcloneClient;
  let watcher: ManualWatcher;
  let orchestrator: Orchestrator | null;

  function build(overrides: Partial<DaemonConfig> = {}, peer: PeerSyncService | null = null): Orchestrator {
    config = createTestConfig({ watchPaths: ['/data/notes'], debounceMs: 20, maxWaitMs: 1000, ...overrides });
    const executor = new SyncExecutor(config, { rclone, peer });
    orchestrator = new Orchestrator(config, { executor, watcher, peer });
    return orchestrator;
  }

  beforeEach(() => {
    calls = [];
    config = createTestConfig();
    rclone = new RcloneClient({ remote: config.rcloneRemote, dest: config.rcloneDest });
    vi.spyOn(rclone, 'mkdir').mockResolvedValue(processResult());
    vi.spyOn(rclone, 'pull').mockImplementation(async () => {
      calls.push('pull');
      return processResult();
    });
    vi.spyOn(rclone, 'bisync').mockImplementation(async () => {
      calls.push('bisync');
      return processResult();
    });
    watcher = new ManualWatcher(calls);
    orchestrator = null;
  });

  afterEach(async () => {
    await orchestrator?.stop(50);
  });

  describe('start', () => {
    it('pulls and bisyncs before watching', async () => {
      const daemon = build();

      const report = await daemon.start();

      expect(report.state).toBe('completed');
      expect(calls).toEqual(['pull', 'bisync', 'watch:start']);
      expect(daemon.lifecycle).toBe('running');
      expect(daemon.getStatus().running).toBe(true);
    });

    it('starts watching even when the startup pull fails', async () => {
      vi.mocked(rclone.pull).mockResolvedValue(processResult({ exitCode: 1, stderr: 'directory not found' }));
      const daemon = build();

      const report = await daemon.start();

      expect(report.state).toBe('degraded');
      expect(calls).toEqual(['bisync', 'watch:start']);
    });

    it('refuses to start twice', async () => {
      const daemon = build({ pullOnStartup: false });
      await daemon.start();

      await expect(daemon.start()).rejects.toMatchObject({ code: 'SW-401' });
    });
  });

  describe('activity', () => {
    it('runs a bisync once the quiet period passes', async () => {
      const daemon = build({ pullOnStartup: false });
      await daemon.start();

      watcher.touch('/data/notes/a.md');
      watcher.touch('/data/notes/b.md');

      await vi.waitFor(() => {
        expect(rclone.bisync).toHaveBeenCalledTimes(1);
      });
      expect(daemon.getStatus().recentAttempts).toHaveLength(1);
    });

    it('ignores activity after stop', async () => {
      const daemon = build({ pullOnStartup: false });
      await daemon.start();
      await daemon.stop();

      watcher.touch();
      await new Promise(resolve => setTimeout(resolve, 60));

      expect(rclone.bisync).not.toHaveBeenCalled();
    });
  });

  describe('stop', () => {
    it('shares one shutdown between callers', async () => {
      const daemon = build({ pullOnStartup: false });
      await daemon.start();

      const first = daemon.stop();
      const second = daemon.stop();

      expect(second).toBe(first);
      await first;
      expect(calls.filter(call => call === 'watch:stop')).toHaveLength(1);
      expect(daemon.lifecycle).toBe('stopped');
      expect(daemon.getStatus().running).toBe(false);
    });

    it('waits for a running sync that finishes within the grace period', async () => {
      let finish: (result: ProcessResult) => void = () => {};
      vi.mocked(rclone.bisync).mockImplementation(() => new Promise((resolve) => {
        finish = resolve;
      }));
      const daemon = build({ pullOnStartup: false });
      await daemon.start();
      watcher.touch();
      await vi.waitFor(() => {
        expect(rclone.bisync).toHaveBeenCalledTimes(1);
      });

      const stopping = daemon.stop(5000);
      setTimeout(() => finish(processResult()), 20);
      await stopping;

      expect(daemon.getStatus().recentAttempts.map(attempt => attempt.outcome)).toEqual(['success']);
    });

    it('kills a sync that outlives the grace period', async () => {
      vi.mocked(rclone.bisync).mockImplementation((_localPath, _resync, options) => untilAborted(options));
      const daemon = build({ pullOnStartup: false });
      await daemon.start();
      watcher.touch();
      await vi.waitFor(() => {
        expect(rclone.bisync).toHaveBeenCalledTimes(1);
      });

      await daemon.stop(30);

      expect(daemon.getStatus().recentAttempts.map(attempt => attempt.outcome)).toEqual(['timeout']);
      expect(daemon.getStatus().syncing).toBe(false);
    });

    it('does not start watching when stopped during startup', async () => {
      vi.mocked(rclone.pull).mockImplementation((_localPath, options) => untilAborted(options));
      const daemon = build();

      const starting = daemon.start();
      await vi.waitFor(() => {
        expect(rclone.pull).toHaveBeenCalledTimes(1);
      });
      await daemon.stop(30);
      const report = await starting;

      expect(report.state).toBe('degraded');
      expect(rclone.bisync).not.toHaveBeenCalled();
      expect(calls).not.toContain('watch:start');
      expect(daemon.lifecycle).toBe('stopped');
    });

    it('bounds the stop by the grace period while startup waits for Syncthing', async () => {
      const peer = createFakePeer();
      let release: (idle: boolean) => void = () => {};
      peer.waitForIdle.mockImplementationOnce(() => new Promise<boolean>((resolve) => {
        release = resolve;
      }));
      const daemon = build({}, peer);

      const starting = daemon.start();
      await vi.waitFor(() => {
        expect(peer.waitForIdle).toHaveBeenCalledTimes(1);
      });
      await daemon.stop(30);

      expect(daemon.lifecycle).toBe('stopped');

      release(true);
      const report = await starting;

      expect(report.state).toBe('degraded');
      expect(rclone.pull).not.toHaveBeenCalled();
      expect(rclone.bisync).not.toHaveBeenCalled();
      expect(calls).not.toContain('watch:start');
    });

    it('interrupts a Syncthing restart on stop', async () => {
      const peer = createFakePeer();
      peer.ping.mockResolvedValue(false);
      peer.restart.mockImplementation(signal => new Promise<boolean>((_resolve, reject) => {
        signal?.addEventListener('abort', () => reject(new Error('restart aborted')), { once: true });
      }));
      const daemon = build({ pullOnStartup: false }, peer);
      await daemon.start();
      await vi.waitFor(() => {
        expect(peer.restart).toHaveBeenCalledTimes(1);
      });

      const startedAt = Date.now();
      await daemon.stop(50);

      expect(Date.now() - startedAt).toBeLessThan(1000);
      expect(daemon.lifecycle).toBe('stopped');
      expect(daemon.getStatus().health.restarts).toBe(0);
    });

    it('does not wait past the grace period for a restart that ignores the abort', async () => {
      const peer = createFakePeer();
      peer.ping.mockResolvedValue(false);
      peer.restart.mockImplementation(() => new Promise<boolean>((resolve) => {
        setTimeout(() => resolve(true), 2000);
      }));
      const daemon = build({ pullOnStartup: false }, peer);
      await daemon.start();
      await vi.waitFor(() => {
        expect(peer.restart).toHaveBeenCalledTimes(1);
      });

      const startedAt = Date.now();
      await daemon.stop(50);

      expect(Date.now() - startedAt).toBeLessThan(1000);
      expect(daemon.lifecycle).toBe('stopped');
    });

    it('leaves Syncthing running when asked to', async () => {
      const peer = createFakePeer();
      const daemon = build({ pullOnStartup: false, stopSyncthingOnExit: true }, peer);
      await daemon.start();

      await daemon.stop(50, { keepPeerRunning: true });

      expect(peer.stop).not.toHaveBeenCalled();
    });

    it('stops Syncthing on exit only when configured to', async () => {
      const peer = createFakePeer();
      const daemon = build({ pullOnStartup: false, stopSyncthingOnExit: true }, peer);
      await daemon.start();

      await daemon.stop();

      expect(peer.stop).toHaveBeenCalledTimes(1);

      const otherPeer = createFakePeer();
      watcher = new ManualWatcher(calls);
      const otherDaemon = build({ pullOnStartup: false }, otherPeer);
      await otherDaemon.start();
      await otherDaemon.stop();

      expect(otherPeer.stop).not.toHaveBeenCalled();
    });
  });

  describe('status', () => {
    it('returns a frozen snapshot', async () => {
      const daemon = build();
      await daemon.start();

      const status = daemon.getStatus();

      expect(Object.isFrozen(status)).toBe(true);
      expect(status.startup?.state).toBe('completed');
      expect(status.health.status).toBe('unknown');
      expect(status.pendingActivity).toBe(false);
      expect(status.recentAttempts).toHaveLength(1);
    });

    it('reports health from the probe loop', async () => {
      const peer = createFakePeer();
      const daemon = build({ pullOnStartup: false }, peer);
      await daemon.start();

      await vi.waitFor(() => {
        expect(daemon.getStatus().health.status).toBe('healthy');
      });
      expect(peer.ping).toHaveBeenCalledWith(config.healthProbeTimeoutMs, expect.any(AbortSignal));
    });
  });
});
