import { ChildProcess, spawn } from 'node:child_process';
import { PassThrough } from 'node:stream';
import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from 'vitest';
import { runProcess } from '../../../src/utils/process.js';

vi.mock('node:child_process', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:child_process')>();
  return {
    ...actual,
    spawn: vi.fn(),
  };
});

function createChild(): { child: ChildProcess; kill: Mock<() => boolean> } {
  const child = new ChildProcess();
  child.stdout = new PassThrough();
  child.stderr = new PassThrough();
  const kill = vi.fn<() => boolean>(() => true);
  child.kill = kill;
  return { child, kill };
}

describe('runProcess', () => {
  let child: ChildProcess;
  let kill: Mock<() => boolean>;

  beforeEach(() => {
    ({ child, kill } = createChild());
    vi.mocked(spawn).mockReturnValue(child);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.clearAllMocks();
  });

  it('captures output and the exit code', async () => {
    const promise = runProcess('rclone', ['bisync', '/a', 'remote:b'], { timeoutMs: 1000 });

    child.stdout?.emit('data', Buffer.from('Transferred: 1 file\n'));
    child.stderr?.emit('data', Buffer.from('NOTICE: done\n'));
    child.emit('close', 0);

    const result = await promise;
    expect(result).toMatchObject({
      exitCode: 0,
      stdout: 'Transferred: 1 file\n',
      stderr: 'NOTICE: done\n',
      timedOut: false,
      aborted: false,
    });
    expect(spawn).toHaveBeenCalledWith('rclone', ['bisync', '/a', 'remote:b'], {
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    });
  });

  it('reports a non-zero exit without rejecting', async () => {
    const promise = runProcess('rclone', [], { timeoutMs: 1000 });

    child.emit('close', 2);

    await expect(promise).resolves.toMatchObject({ exitCode: 2, timedOut: false });
  });

  it('reports a start failure through spawnError', async () => {
    const promise = runProcess('rclone', [], { timeoutMs: 1000 });

    child.emit('error', new Error('spawn rclone ENOENT'));
    child.emit('close', -2);

    const result = await promise;
    expect(result.exitCode).toBeNull();
    expect(result.spawnError?.message).toBe('spawn rclone ENOENT');
  });

  it('sends SIGTERM at the timeout and SIGKILL after the grace period', async () => {
    vi.useFakeTimers();
    const promise = runProcess('rclone', [], { timeoutMs: 1000, killGraceMs: 500 });

    vi.advanceTimersByTime(999);
    expect(kill).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(kill).toHaveBeenCalledWith('SIGTERM');

    vi.advanceTimersByTime(500);
    expect(kill).toHaveBeenLastCalledWith('SIGKILL');

    child.emit('close', null);
    const result = await promise;
    expect(result).toMatchObject({ exitCode: null, timedOut: true, aborted: false, durationMs: 1500 });
  });

  it('skips SIGKILL when the child exits after SIGTERM', async () => {
    vi.useFakeTimers();
    const promise = runProcess('rclone', [], { timeoutMs: 1000, killGraceMs: 500 });

    vi.advanceTimersByTime(1000);
    child.emit('close', null);
    vi.advanceTimersByTime(1000);

    await promise;
    expect(kill).toHaveBeenCalledTimes(1);
    expect(kill).toHaveBeenCalledWith('SIGTERM');
  });

  it('kills the child when the signal aborts', async () => {
    const controller = new AbortController();
    const promise = runProcess('rclone', [], { timeoutMs: 60_000, signal: controller.signal });

    controller.abort();
    expect(kill).toHaveBeenCalledWith('SIGTERM');

    child.emit('close', null);
    await expect(promise).resolves.toMatchObject({ aborted: true, timedOut: false });
  });

  it('kills immediately when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const promise = runProcess('rclone', [], { timeoutMs: 60_000, signal: controller.signal });

    expect(kill).toHaveBeenCalledWith('SIGTERM');
    child.emit('close', null);
    await expect(promise).resolves.toMatchObject({ aborted: true });
  });

  it('keeps only the tail of very large output', async () => {
    const promise = runProcess('rclone', [], { timeoutMs: 1000 });

    child.stdout?.emit('data', Buffer.from('a'.repeat(40 * 1024)));
    child.stdout?.emit('data', Buffer.from('b'.repeat(40 * 1024)));
    child.emit('close', 0);

    const result = await promise;
    expect(result.stdout).toHaveLength(64 * 1024);
    expect(result.stdout.endsWith('b'.repeat(40 * 1024))).toBe(true);
  });
});
