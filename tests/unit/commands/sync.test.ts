import type { MockInstance } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import process from 'node:process';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { syncCommand } from '../../../src/commands/sync.js';
import { SyncthingClient } from '../../../src/peer/syncthing-client.js';
import { RcloneClient } from '../../../src/sync/rclone.js';
import { createProgram, printedLines } from '../../helpers/cli.js';
import { processResult } from '../../helpers/process-result.js';

const SYNC_TIMEOUT_MS = 90_000;

describe('sync command', () => {
  let testDir: string;
  let configPath: string;
  let notesDir: string;
  let papersDir: string;
  let originalEnv: NodeJS.ProcessEnv;
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    originalEnv = { ...process.env };
    delete process.env.SYNCWARDEN_LOG_LEVEL;
    delete process.env.SYNCTHING_API_KEY;
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'syncwarden-sync-'));
    process.env.SYNCWARDEN_HOME = testDir;
    configPath = path.join(testDir, 'config.json');
    notesDir = path.join(testDir, 'notes');
    papersDir = path.join(testDir, 'papers');
    fs.writeFileSync(configPath, JSON.stringify({
      watch_paths: [notesDir, papersDir],
      rclone_remote: 'b2',
      sync_timeout: SYNC_TIMEOUT_MS / 1000,
      syncthing_api_key: 'test-secret',
      log_level: 'ERROR',
    }));

    // Option values stick to the shared command object between parses
    syncCommand.setOptionValue('pull', undefined).setOptionValue('push', undefined);

    vi.spyOn(RcloneClient.prototype, 'bisync').mockResolvedValue(processResult());
    vi.spyOn(RcloneClient.prototype, 'pull').mockResolvedValue(processResult());
    vi.spyOn(RcloneClient.prototype, 'push').mockResolvedValue(processResult());
    vi.spyOn(RcloneClient.prototype, 'mkdir').mockResolvedValue(processResult());
    vi.spyOn(SyncthingClient.prototype, 'waitForIdle').mockResolvedValue(true);
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit');
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.env = originalEnv;
    process.exitCode = undefined;
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  function run(...args: string[]): Promise<unknown> {
    return createProgram(syncCommand).parseAsync(['node', 'syncwarden', '-c', configPath, 'sync', ...args]);
  }

  it('bisyncs every folder and prints a summary', async () => {
    await run();

    expect(RcloneClient.prototype.bisync).toHaveBeenCalledTimes(2);
    expect(RcloneClient.prototype.bisync).toHaveBeenNthCalledWith(1, notesDir, false, expect.objectContaining({
      timeoutMs: SYNC_TIMEOUT_MS,
    }));
    const lines = printedLines(consoleLogSpy);
    expect(lines).toContain(`✔ ${notesDir} (success)`);
    expect(lines).toContain(`✔ ${papersDir} (success)`);
    expect(lines.at(-1)).toMatch(/^2 succeeded, 0 failed in /);
    expect(process.exitCode).toBeUndefined();
  });

  it('only copies remote changes down with --pull', async () => {
    await run('--pull');

    expect(RcloneClient.prototype.pull).toHaveBeenCalledTimes(2);
    expect(RcloneClient.prototype.pull).toHaveBeenCalledWith(papersDir, expect.objectContaining({
      timeoutMs: SYNC_TIMEOUT_MS,
    }));
    expect(RcloneClient.prototype.bisync).not.toHaveBeenCalled();
    expect(RcloneClient.prototype.push).not.toHaveBeenCalled();
  });

  it('only copies local changes up with --push', async () => {
    await run('--push');

    expect(RcloneClient.prototype.push).toHaveBeenCalledTimes(2);
    expect(RcloneClient.prototype.pull).not.toHaveBeenCalled();
    expect(RcloneClient.prototype.bisync).not.toHaveBeenCalled();
  });

  it('refuses --pull together with --push', async () => {
    await expect(run('--pull', '--push')).rejects.toThrow('process.exit');

    const [message] = printedLines(consoleErrorSpy);
    expect(message?.split('\n')[0]).toBe('Error SW-002: --pull and --push cannot be combined');
    expect(process.exit).toHaveBeenCalledWith(1);
    expect(RcloneClient.prototype.bisync).not.toHaveBeenCalled();
  });

  it('sets a failing exit code when a folder fails', async () => {
    vi.mocked(RcloneClient.prototype.bisync).mockResolvedValueOnce(processResult({ exitCode: 1, stderr: 'permission denied' }));

    await run();

    const lines = printedLines(consoleLogSpy);
    expect(lines).toContain(`✖ ${notesDir} (failure)`);
    expect(lines).toContain(`✔ ${papersDir} (success)`);
    expect(process.exitCode).toBe(1);
    expect(printedLines(consoleErrorSpy).some(line => line.startsWith('Error SW-203'))).toBe(false);
  });

  it('reports a timed-out folder as SW-203', async () => {
    vi.mocked(RcloneClient.prototype.bisync).mockResolvedValueOnce(processResult({ exitCode: null, timedOut: true }));

    await run();

    expect(printedLines(consoleLogSpy)).toContain(`⏱ ${notesDir} (timeout)`);
    expect(printedLines(consoleErrorSpy)).toContain([
      `Error SW-203: Sync timed out for ${notesDir}`,
      '',
      'Suggestions:',
      '  • Raise "sync_timeout" in the config for large first syncs',
      '  • Check network connectivity to the remote',
    ].join('\n'));
    expect(process.exitCode).toBe(1);
  });
});
