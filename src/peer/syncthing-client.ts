import { spawn } from 'node:child_process';
import { existsSync } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import process from 'node:process';
import { setTimeout as sleep } from 'node:timers/promises';
import { z } from 'zod';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { runProcess } from '../utils/process.js';

/**
 * What the health monitor and the executor need from the peer-sync service.
 */
export interface PeerSyncService {
  ping: (timeoutMs: number, signal?: AbortSignal) => Promise<boolean>;
  start: (signal?: AbortSignal) => Promise<boolean>;
  stop: (signal?: AbortSignal) => Promise<boolean>;
  restart: (signal?: AbortSignal) => Promise<boolean>;
  waitForIdle: (timeoutMs: number, signal?: AbortSignal) => Promise<boolean>;
}

export interface SyncthingClientOptions {
  apiUrl: string;
  apiKey?: string | null;
  exePath?: string | null;
  /** Where to look for the API key when none is given */
  configXmlPaths?: readonly string[];
  requestTimeoutMs?: number;
  /** Wait after starting before the verifying ping */
  startSettleMs?: number;
  /** Wait after a shutdown request before checking it took */
  stopSettleMs?: number;
  idlePollMs?: number;
}

const folderListSchema = z.array(z.object({
  id: z.string(),
  path: z.string().optional(),
}).passthrough());

const folderStatusSchema = z.object({
  state: z.string().default('unknown'),
}).passthrough();

// States in which Syncthing is not moving data
const SETTLED_STATES = new Set(['idle', 'error']);

const COMMAND_TIMEOUT_MS = 15_000;

export function defaultConfigXmlPaths(): string[] {
  if (process.platform === 'win32') {
    const localAppData = process.env.LOCALAPPDATA ?? path.join(os.homedir(), 'AppData', 'Local');
    return [path.join(localAppData, 'Syncthing', 'config.xml')];
  }
  return [
    path.join(os.homedir(), '.config', 'syncthing', 'config.xml'),
    path.join(os.homedir(), '.local', 'state', 'syncthing', 'config.xml'),
  ];
}

/**
 * Pull the GUI API key out of Syncthing's config.xml.
 */
export function extractApiKey(xml: string): string | null {
  const match = /<apikey>\s*([^<\s]+)\s*<\/apikey>/.exec(xml);
  return match?.[1] ?? null;
}

/**
 * Client for the local Syncthing REST API plus the process controls used to
 * bring it back when it stops answering.
 */
export class SyncthingClient implements PeerSyncService {
  private readonly apiUrl: string;
  private readonly exePath: string;
  private readonly configXmlPaths: readonly string[];
  private readonly requestTimeoutMs: number;
  private readonly startSettleMs: number;
  private readonly stopSettleMs: number;
  private readonly idlePollMs: number;
  private apiKey: string | null;
  private apiKeyResolved: boolean;

  constructor(options: SyncthingClientOptions) {
    this.apiUrl = options.apiUrl.replace(/\/+$/, '');
    this.exePath = options.exePath ?? 'syncthing';
    this.configXmlPaths = options.configXmlPaths ?? defaultConfigXmlPaths();
    this.requestTimeoutMs = options.requestTimeoutMs ?? 5000;
    this.startSettleMs = options.startSettleMs ?? 5000;
    this.stopSettleMs = options.stopSettleMs ?? 2000;
    this.idlePollMs = options.idlePollMs ?? 2000;
    this.apiKey = options.apiKey ?? null;
    this.apiKeyResolved = this.apiKey !== null;
  }

  /**
   * GET /rest/system/ping. Any 2xx within the timeout counts as alive; every
   * other outcome, including a network error, is false.
   */
  async ping(timeoutMs: number = this.requestTimeoutMs, signal?: AbortSignal): Promise<boolean> {
    try {
      const response = await this.request('GET', '/rest/system/ping', timeoutMs, signal);
      return response.ok;
    }
    catch (error) {
      logger.debug(`Syncthing ping failed: ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * Aborting `signal` rejects with the abort reason once the current step
   * gives way.
   */
  async start(signal?: AbortSignal): Promise<boolean> {
    if (await this.ping(this.requestTimeoutMs, signal)) {
      return true;
    }
    signal?.throwIfAborted();

    logger.info('Starting Syncthing...');

    if (path.isAbsolute(this.exePath) && !existsSync(this.exePath)) {
      logger.error(`Syncthing executable not found: ${this.exePath}`);
      return false;
    }

    let started = false;
    if (process.platform !== 'win32') {
      const result = await runProcess('systemctl', ['--user', 'start', 'syncthing'], { timeoutMs: COMMAND_TIMEOUT_MS, signal });
      started = result.exitCode === 0;
      if (!started) {
        logger.debug('systemctl could not start syncthing, launching it directly');
      }
    }
    signal?.throwIfAborted();
    if (!started) {
      this.launchDetached();
    }

    await sleep(this.startSettleMs, undefined, { signal });
    const healthy = await this.ping(this.requestTimeoutMs, signal);
    if (!healthy) {
      logger.error('Syncthing did not come up after start');
    }
    return healthy;
  }

  /**
   * Ask Syncthing to shut down through the API; kill the process if it is
   * still answering afterwards. Resolves true once it no longer answers.
   */
  async stop(signal?: AbortSignal): Promise<boolean> {
    logger.info('Stopping Syncthing...');

    try {
      await this.request('POST', '/rest/system/shutdown', this.requestTimeoutMs, signal);
      await sleep(this.stopSettleMs, undefined, { signal });
      if (!(await this.ping(this.requestTimeoutMs, signal))) {
        return true;
      }
    }
    catch (error) {
      signal?.throwIfAborted();
      logger.debug(`Syncthing shutdown request failed: ${errorMessage(error)}`);
    }

    const result = process.platform === 'win32'
      ? await runProcess('taskkill', ['/f', '/im', 'syncthing.exe'], { timeoutMs: COMMAND_TIMEOUT_MS, signal })
      : await runProcess('pkill', ['syncthing'], { timeoutMs: COMMAND_TIMEOUT_MS, signal });
    if (result.spawnError) {
      logger.warn(`Could not kill Syncthing: ${result.spawnError.message}`);
    }

    await sleep(this.stopSettleMs, undefined, { signal });
    return !(await this.ping(this.requestTimeoutMs, signal));
  }

  async restart(signal?: AbortSignal): Promise<boolean> {
    logger.warn('Restarting Syncthing...');
    await this.stop(signal);
    await sleep(this.stopSettleMs, undefined, { signal });
    return this.start(signal);
  }

  /**
   * Folder ID to state (`idle`, `scanning`, `syncing`, ...). Folders whose
   * status cannot be read are left out.
   */
  async getFolderStatuses(signal?: AbortSignal): Promise<Map<string, string>> {
    const statuses = new Map<string, string>();

    const foldersResponse = await this.request('GET', '/rest/config/folders', this.requestTimeoutMs, signal);
    if (!foldersResponse.ok) {
      logger.warn(`Could not list Syncthing folders (HTTP ${foldersResponse.status})`);
      return statuses;
    }
    const folders = folderListSchema.parse(await foldersResponse.json());

    for (const folder of folders) {
      const query = `?folder=${encodeURIComponent(folder.id)}`;
      const statusResponse = await this.request('GET', `/rest/db/status${query}`, this.requestTimeoutMs, signal);
      if (!statusResponse.ok) {
        continue;
      }
      const status = folderStatusSchema.parse(await statusResponse.json());
      statuses.set(folder.id, status.state);
    }

    return statuses;
  }

  /**
   * True when every folder is idle or errored. An unreachable service or an
   * empty folder list counts as idle: there is nothing to wait for.
   */
  async isIdle(signal?: AbortSignal): Promise<boolean> {
    if (!(await this.ping(this.requestTimeoutMs, signal))) {
      return true;
    }

    let statuses: Map<string, string>;
    try {
      statuses = await this.getFolderStatuses(signal);
    }
    catch (error) {
      logger.warn(`Failed to get Syncthing folder statuses: ${errorMessage(error)}`);
      return true;
    }

    for (const [folderId, state] of statuses) {
      if (!SETTLED_STATES.has(state)) {
        logger.debug(`Syncthing folder ${folderId} is ${state}`);
        return false;
      }
    }
    return true;
  }

  async waitForIdle(timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;

    while (!signal?.aborted) {
      const idle = await this.isIdle(signal);
      if (signal?.aborted) {
        return false;
      }
      if (idle) {
        return true;
      }
      if (Date.now() + this.idlePollMs > deadline) {
        break;
      }
      logger.debug('Waiting for Syncthing to idle...');
      try {
        await sleep(this.idlePollMs, undefined, { signal });
      }
      catch (error) {
        if (error instanceof Error && error.name === 'AbortError') {
          return false;
        }
        throw error;
      }
    }

    logger.warn(`Syncthing did not idle within ${Math.round(timeoutMs / 1000)}s`);
    return false;
  }

  private launchDetached(): void {
    const child = spawn(this.exePath, ['serve', '--no-browser'], {
      detached: true,
      stdio: 'ignore',
      windowsHide: true,
    });
    child.on('error', (error) => {
      logger.error(`Failed to launch ${this.exePath}: ${error.message}`);
    });
    child.unref();
  }

  private async request(method: 'GET' | 'POST', endpoint: string, timeoutMs: number, signal?: AbortSignal): Promise<Response> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    const apiKey = await this.resolveApiKey();
    if (apiKey) {
      headers['X-API-Key'] = apiKey;
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    if (signal?.aborted) {
      controller.abort();
    }

    try {
      return await fetch(`${this.apiUrl}${endpoint}`, {
        method,
        headers,
        signal: controller.signal,
      });
    }
    catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new Error(`Request to ${endpoint} timed out after ${timeoutMs}ms`);
      }
      throw error;
    }
    finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private async resolveApiKey(): Promise<string | null> {
    if (this.apiKeyResolved) {
      return this.apiKey;
    }
    this.apiKeyResolved = true;

    for (const candidate of this.configXmlPaths) {
      try {
        const key = extractApiKey(await fs.readFile(candidate, 'utf-8'));
        if (key) {
          logger.debug(`Read Syncthing API key from ${candidate}`);
          this.apiKey = key;
          return key;
        }
      }
      catch (error) {
        if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
          logger.warn(`Could not read Syncthing API key from ${candidate}: ${errorMessage(error)}`);
        }
      }
    }
    return null;
  }
}
