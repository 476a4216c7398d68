/**
 * Watch Command
 *
 * Runs the sync engine until SIGINT/SIGTERM and prints every change
 * notification.
 *
 * Usage:
 *   building-sync watch [--fixed-interval]
 *
 * Examples:
 *   BUILDING_SYNC_TOKEN=test-token building-sync watch --endpoint https://buildings.example.com/api
 *   building-sync --json watch --fixed-interval
 */

import type { Command } from 'commander';
import type { GlobalOptions } from '../lib/context.js';
import { createCliContext } from '../lib/context.js';
import { formatNotification, notificationToJson } from '../lib/format.js';

interface WatchOptions {
  readonly fixedInterval?: boolean;
}

export function registerWatchCommand(program: Command): void {
  program
    .command('watch')
    .description('Poll the building endpoint and print changes until interrupted')
    .option('--fixed-interval', 'Disable adaptive slow-down and always poll at the fast interval')
    .action(async (options: WatchOptions, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      await executeWatch({
        ...globals,
        ...(options.fixedInterval === true ? { adaptive: false } : {}),
      });
    });
}

async function executeWatch(options: GlobalOptions): Promise<void> {
  const context = createCliContext(options);
  const { engine } = context;

  if (!context.json) {
    console.log(`Watching ${context.endpointUrl}`);
    console.log(
      `Intervals: ${context.config.polling.fastIntervalSeconds}s fast, ` +
        `${context.config.polling.slowIntervalSeconds}s slow` +
        (options.adaptive === false ? ' (adaptive off)' : '')
    );
  }

  engine.subscribe((notification) => {
    console.log(context.json ? notificationToJson(notification) : formatNotification(notification));
  });

  await new Promise<void>((resolve) => {
    const shutdown = (): void => {
      process.off('SIGINT', shutdown);
      process.off('SIGTERM', shutdown);
      engine.stop();
      resolve();
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
    engine.start();
  });

  if (context.verbose) {
    engine.logCacheStatistics();
  }
  const status = engine.getStatus();
  if (!context.json) {
    console.log(
      `Stopped after ${status.cycles} cycles (${status.failedCycles} failed), ` +
        `${status.cache.entities} buildings cached`
    );
  }
}
