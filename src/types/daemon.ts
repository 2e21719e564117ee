import type { LogLevelSetting } from '../config/schemas.js';

/**
 * Runtime settings, derived once from the config file and frozen. Durations
 * are in milliseconds.
 */
export interface DaemonConfig {
  readonly configPath: string;
  readonly watchPaths: readonly string[];
  readonly rcloneRemote: string;
  readonly rcloneDest: string;
  readonly rcloneFlags: readonly string[];
  readonly pullOnStartup: boolean;
  readonly startupPullTimeoutMs: number;
  readonly syncTimeoutMs: number;
  readonly debounceMs: number;
  readonly maxWaitMs: number;
  readonly healthCheckIntervalMs: number;
  readonly healthProbeTimeoutMs: number;
  readonly healthFailureThreshold: number;
  readonly restartSyncthingOnFailure: boolean;
  readonly stopSyncthingOnExit: boolean;
  readonly syncthingApi: string;
  readonly syncthingApiKey: string | null;
  readonly syncthingExe: string | null;
  readonly peerIdleTimeoutMs: number;
  readonly ignorePatterns: readonly string[];
  readonly logLevel: LogLevelSetting;
  readonly logFile: string;
}

export type ActivityKind = 'add' | 'change' | 'unlink' | 'unlinkDir';

/**
 * "Something changed under a watched path." Only `at` matters to the
 * debouncer; path and kind are carried for debug logging.
 */
export interface ActivitySignal {
  readonly at: Date;
  readonly watchRoot: string;
  readonly path: string;
  readonly kind: ActivityKind;
}

export type SyncOutcome = 'success' | 'failure' | 'timeout';

export interface SyncAttempt {
  readonly localPath: string;
  readonly remotePath: string;
  readonly startedAt: Date;
  readonly finishedAt: Date;
  readonly outcome: SyncOutcome;
  readonly resync: boolean;
  /** True when this attempt is the automatic --resync retry of a failed one */
  readonly recovery: boolean;
  readonly exitCode: number | null;
}

export type HealthStatus = 'unknown' | 'healthy' | 'unresponsive';

export interface HealthState {
  readonly status: HealthStatus;
  readonly lastCheckedAt: Date | null;
  readonly consecutiveFailures: number;
  readonly restarts: number;
}

export type StartupState = 'completed' | 'skipped' | 'degraded';

export interface PullResult {
  readonly localPath: string;
  readonly remotePath: string;
  readonly outcome: SyncOutcome;
  readonly exitCode: number | null;
}

export interface StartupReport {
  readonly state: StartupState;
  readonly pulls: readonly PullResult[];
  readonly attempts: readonly SyncAttempt[];
}

export interface DaemonStatus {
  readonly running: boolean;
  readonly startup: StartupReport | null;
  readonly health: HealthState;
  readonly syncing: boolean;
  readonly pendingActivity: boolean;
  readonly recentAttempts: readonly SyncAttempt[];
}
