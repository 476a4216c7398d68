/**
 * Building Sync CLI
 *
 * @module cli
 */

import { Command } from 'commander';
import { registerOnceCommand } from './commands/once.js';
import { registerWatchCommand } from './commands/watch.js';

export { EXIT_CODES, type ExitCode } from './exit-codes.js';
export { createCliContext, type CliContext, type GlobalOptions } from './lib/context.js';
export {
  formatChange,
  formatNotification,
  formatReport,
  formatWarning,
  notificationToJson,
  reportToJson,
} from './lib/format.js';
export { exitCodeFor } from './commands/once.js';

export const CLI_NAME = 'building-sync';

export function createProgram(version: string): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Keep a local building snapshot in sync with a remote energy data source')
    .version(version, '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable debug logging')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .building-syncrc)')
    .option('--endpoint <url>', 'Building endpoint URL (default: BUILDING_SYNC_ENDPOINT)')
    .option('--token <token>', 'Bearer token (default: BUILDING_SYNC_TOKEN)');

  registerWatchCommand(program);
  registerOnceCommand(program);

  return program;
}
