import * as path from 'node:path';
import { type ProcessResult, runProcess } from '../utils/process.js';

export type { ProcessResult };

// Output fragments meaning bisync has no usable prior listing for the path
const RESYNC_MARKERS = ['Must run --resync', 'cannot find prior'];

export function needsResync(result: ProcessResult): boolean {
  if (result.exitCode === 0 || result.timedOut || result.aborted) {
    return false;
  }
  const output = `${result.stderr}\n${result.stdout}`;
  return RESYNC_MARKERS.some(marker => output.includes(marker));
}

/**
 * Last non-empty lines of the process output, for log messages.
 */
export function summarizeOutput(result: ProcessResult, lines = 3): string {
  const source = result.stderr.trim() || result.stdout.trim();
  if (!source) {
    return '(no output)';
  }
  return source.split(/\r?\n/).filter(line => line.trim() !== '').slice(-lines).join(' | ');
}

export interface RcloneClientOptions {
  remote: string;
  dest: string;
  flags?: readonly string[];
  executable?: string;
}

export interface RcloneCallOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Thin command builder around the rclone CLI. Each local folder maps to
 * `<remote>:<dest>/<folder name>`.
 */
export class RcloneClient {
  private readonly remote: string;
  private readonly dest: string;
  private readonly flags: readonly string[];
  private readonly executable: string;

  constructor(options: RcloneClientOptions) {
    this.remote = options.remote;
    this.dest = options.dest.replace(/\/+$/, '');
    this.flags = options.flags ?? ['--verbose'];
    this.executable = options.executable ?? 'rclone';
  }

  public get command(): string {
    return this.executable;
  }

  public remotePathFor(localPath: string): string {
    return `${this.remote}:${this.dest}/${path.basename(localPath)}`;
  }

  public bisyncArgs(localPath: string, resync: boolean): string[] {
    const args = ['bisync', localPath, this.remotePathFor(localPath), ...this.flags];

    // Files rewritten mid-transfer (editor workspace state) would fail checksum
    if (!args.includes('--ignore-checksum')) {
      args.push('--ignore-checksum');
    }

    // Newer modification time wins, no conflict copies kept
    args.push('--conflict-resolve', 'newer', '--conflict-loser', 'delete');

    if (resync) {
      args.push('--resync');
    }
    return args;
  }

  public pullArgs(localPath: string): string[] {
    return ['copy', this.remotePathFor(localPath), localPath, '--update', '--verbose'];
  }

  public pushArgs(localPath: string): string[] {
    return ['copy', localPath, this.remotePathFor(localPath), '--update', '--verbose'];
  }

  public mkdirArgs(localPath: string): string[] {
    return ['mkdir', this.remotePathFor(localPath)];
  }

  bisync(localPath: string, resync: boolean, options: RcloneCallOptions): Promise<ProcessResult> {
    return runProcess(this.executable, this.bisyncArgs(localPath, resync), options);
  }

  pull(localPath: string, options: RcloneCallOptions): Promise<ProcessResult> {
    return runProcess(this.executable, this.pullArgs(localPath), options);
  }

  push(localPath: string, options: RcloneCallOptions): Promise<ProcessResult> {
    return runProcess(this.executable, this.pushArgs(localPath), options);
  }

  mkdir(localPath: string, options: RcloneCallOptions): Promise<ProcessResult> {
    return runProcess(this.executable, this.mkdirArgs(localPath), options);
  }
}
