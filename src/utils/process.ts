import { spawn } from 'node:child_process';

export interface ProcessResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** Killed because the wall-clock timeout elapsed */
  timedOut: boolean;
  /** Killed because the caller's AbortSignal fired */
  aborted: boolean;
  durationMs: number;
  /** Set when the process could not be started at all */
  spawnError?: Error;
}

export interface RunOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  /** Time between SIGTERM and SIGKILL once a kill starts */
  killGraceMs?: number;
}

const MAX_CAPTURED_OUTPUT = 64 * 1024;
const DEFAULT_KILL_GRACE_MS = 5000;

function appendCapped(buffer: string, chunk: Buffer | string): string {
  const next = buffer + chunk.toString();
  return next.length > MAX_CAPTURED_OUTPUT ? next.slice(-MAX_CAPTURED_OUTPUT) : next;
}

/**
 * Run a command to completion with a hard timeout. Never rejects: start
 * failures, timeouts and aborts are all reported through the result.
 */
export function runProcess(command: string, args: readonly string[], options: RunOptions): Promise<ProcessResult> {
  const startedAt = Date.now();
  const killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;

  return new Promise((resolve) => {
    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let aborted = false;
    let settled = false;
    let timeoutId: NodeJS.Timeout | null = null;
    let killTimer: NodeJS.Timeout | null = null;

    const child = spawn(command, [...args], {
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    });

    const cleanup = () => {
      if (timeoutId !== null) {
        clearTimeout(timeoutId);
        timeoutId = null;
      }
      if (killTimer !== null) {
        clearTimeout(killTimer);
        killTimer = null;
      }
      options.signal?.removeEventListener('abort', onAbort);
    };

    const settle = (result: Omit<ProcessResult, 'stdout' | 'stderr' | 'timedOut' | 'aborted' | 'durationMs'>) => {
      if (settled) {
        return;
      }
      settled = true;
      cleanup();
      resolve({
        ...result,
        stdout,
        stderr,
        timedOut,
        aborted,
        durationMs: Date.now() - startedAt,
      });
    };

    const terminate = () => {
      if (killTimer !== null || child.exitCode !== null) {
        return;
      }
      child.kill('SIGTERM');
      killTimer = setTimeout(() => {
        child.kill('SIGKILL');
      }, killGraceMs);
    };

    function onAbort() {
      aborted = true;
      terminate();
    }

    child.stdout?.on('data', (chunk: Buffer) => {
      stdout = appendCapped(stdout, chunk);
    });
    child.stderr?.on('data', (chunk: Buffer) => {
      stderr = appendCapped(stderr, chunk);
    });

    child.on('error', (error) => {
      settle({ exitCode: null, spawnError: error });
    });

    child.on('close', (code) => {
      settle({ exitCode: code });
    });

    timeoutId = setTimeout(() => {
      timedOut = true;
      terminate();
    }, options.timeoutMs);

    if (options.signal) {
      if (options.signal.aborted) {
        onAbort();
      }
      else {
        options.signal.addEventListener('abort', onAbort, { once: true });
      }
    }
  });
}
