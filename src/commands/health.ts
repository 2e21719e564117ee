import process from 'node:process';
import chalk from 'chalk';
import { Command } from 'commander';
import { SyncthingClient } from '../peer/syncthing-client.js';
import { getVersion } from '../utils/package-info.js';
import { exitWithError, loadDaemonConfig } from './shared.js';

export const healthCommand = new Command('health')
  .description('Probe Syncthing once and report whether it answers')
  .action(async (_options: Record<string, never>, command: Command) => {
    try {
      const config = await loadDaemonConfig(command);
      const client = new SyncthingClient({
        apiUrl: config.syncthingApi,
        apiKey: config.syncthingApiKey,
        exePath: config.syncthingExe,
      });

      console.log(chalk.gray(`syncwarden v${getVersion()}`));
      const healthy = await client.ping(config.healthProbeTimeoutMs);
      if (healthy) {
        console.log(chalk.green(`✔ Syncthing is responding at ${config.syncthingApi}`));
        return;
      }

      console.log(chalk.red(`✖ Syncthing is not responding at ${config.syncthingApi}`));
      process.exitCode = 1;
    }
    catch (error) {
      exitWithError(error, command);
    }
  });
