import type { PullResult, SyncAttempt } from '../types/daemon.js';
import process from 'node:process';
import chalk from 'chalk';
import { Command } from 'commander';
import ora from 'ora';
import { SyncthingClient } from '../peer/syncthing-client.js';
import { SyncExecutor } from '../sync/executor.js';
import { handleError, SyncWardenError } from '../utils/errors.js';
import { formatDuration } from '../utils/formatters.js';
import { exitWithError, globalOptions, loadDaemonConfig } from './shared.js';

type Direction = 'bisync' | 'pull' | 'push';

interface SyncCommandOptions {
  pull?: boolean;
  push?: boolean;
}

export const syncCommand = new Command('sync')
  .description('Run one sync of every watched folder and exit')
  .option('--pull', 'Only copy remote changes down (rclone copy --update)')
  .option('--push', 'Only copy local changes up (rclone copy --update)')
  .action(async (options: SyncCommandOptions, command: Command) => {
    const spinner = ora();
    const startTime = Date.now();

    try {
      if (options.pull && options.push) {
        throw new SyncWardenError('SW-002', '--pull and --push cannot be combined');
      }
      const direction: Direction = options.pull ? 'pull' : options.push ? 'push' : 'bisync';

      const config = await loadDaemonConfig(command, { logToFile: true });
      const peer = new SyncthingClient({
        apiUrl: config.syncthingApi,
        apiKey: config.syncthingApiKey,
        exePath: config.syncthingExe,
      });
      const executor = new SyncExecutor(config, { peer });

      spinner.start(`Running ${direction} for ${config.watchPaths.length} folder(s)...`);
      const results = await runDirection(executor, direction, config.watchPaths, config.syncTimeoutMs);
      spinner.stop();

      displaySummary(results, startTime);

      const timedOut = results.filter(result => result.outcome === 'timeout');
      if (timedOut.length > 0) {
        handleError(
          new SyncWardenError('SW-203', `Sync timed out for ${timedOut.map(result => result.localPath).join(', ')}`),
          globalOptions(command).verbose ?? false,
        );
      }
      if (results.some(result => result.outcome !== 'success')) {
        process.exitCode = 1;
      }
    }
    catch (error) {
      spinner.fail('Sync failed');
      exitWithError(error, command);
    }
  });

async function runDirection(
  executor: SyncExecutor,
  direction: Direction,
  paths: readonly string[],
  timeoutMs: number,
): Promise<ReadonlyArray<SyncAttempt | PullResult>> {
  if (direction === 'bisync') {
    return executor.syncAll();
  }
  if (direction === 'pull') {
    return executor.pullAll(timeoutMs);
  }
  const results: PullResult[] = [];
  for (const localPath of paths) {
    results.push(await executor.push(localPath, timeoutMs));
  }
  return results;
}

/**
 * Display a per-folder summary of the run
 */
function displaySummary(results: ReadonlyArray<SyncAttempt | PullResult>, startTime: number): void {
  console.log(chalk.bold('\nSync Summary'));
  console.log(chalk.gray('─'.repeat(50)));

  for (const result of results) {
    const mark = result.outcome === 'success'
      ? chalk.green('✔')
      : result.outcome === 'timeout' ? chalk.yellow('⏱') : chalk.red('✖');
    console.log(`${mark} ${result.localPath} ${chalk.gray(`(${result.outcome})`)}`);
  }

  const failed = results.filter(result => result.outcome !== 'success').length;
  console.log(chalk.gray('─'.repeat(50)));
  console.log(`${results.length - failed} succeeded, ${failed} failed in ${formatDuration(Date.now() - startTime)}`);
}
