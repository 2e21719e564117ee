import type { DaemonConfig } from '../types/daemon.js';
import process from 'node:process';
import { Command } from 'commander';
import { ShutdownHandler } from '../daemon/shutdown.js';
import { Supervisor } from '../daemon/supervisor.js';
import { SyncWardenError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { configureLogging, exitWithError, loadDaemonConfig } from './shared.js';

export const runCommand = new Command('run')
  .description('Run the daemon in the foreground, reloading when the config file changes')
  .option('--grace <seconds>', 'Seconds to wait for a running sync on shutdown', '15')
  .action(async (options: { grace: string }, command: Command) => {
    const shutdown = new ShutdownHandler();

    try {
      const graceSeconds = Number.parseFloat(options.grace);
      if (Number.isNaN(graceSeconds) || graceSeconds < 0) {
        throw new SyncWardenError('SW-002', 'Invalid grace period. Must be a non-negative number of seconds.');
      }

      const config = await loadDaemonConfig(command, { logToFile: true });
      const supervisor = new Supervisor(config, { graceMs: graceSeconds * 1000 });
      supervisor.on('reload', (next: DaemonConfig) => {
        configureLogging(next, command, { logToFile: true });
      });

      shutdown
        .onShutdown(() => supervisor.stop())
        .registerCleanup(() => supervisor.stopPeer())
        .install();

      await supervisor.start();
      await shutdown.wait();
      logger.debug('Exiting');
    }
    catch (error) {
      shutdown.uninstall();
      exitWithError(error, command);
    }
    process.exit(0);
  });
