/**
 * Once Command
 *
 * Runs a single sync cycle against an empty cache and prints the report.
 * Every building comes back NEW, so this doubles as a payload check.
 *
 * Usage:
 *   building-sync once
 *
 * Exit codes: 0 applied, 1 applied with warnings, 4 transport failure,
 * 5 malformed payload.
 */

import type { Command } from 'commander';
import type { GlobalOptions } from '../lib/context.js';
import { createCliContext } from '../lib/context.js';
import { formatReport, reportToJson } from '../lib/format.js';
import type { CycleReport } from '../../sync/sync-engine.js';
import { EXIT_CODES, type ExitCode } from '../exit-codes.js';

export function exitCodeFor(report: CycleReport): ExitCode {
  switch (report.status) {
    case 'transport_failure':
      return EXIT_CODES.NETWORK_ERROR;
    case 'malformed_payload':
      return EXIT_CODES.DATA_INTEGRITY_ERROR;
    case 'discarded':
      return EXIT_CODES.ERRORS;
    case 'applied':
      return report.warnings.length > 0 ? EXIT_CODES.WARNINGS : EXIT_CODES.SUCCESS;
  }
}

export function registerOnceCommand(program: Command): void {
  program
    .command('once')
    .description('Run one sync cycle and print the report')
    .action(async (_options: Record<string, never>, command: Command) => {
      const exitCode = await executeOnce(command.optsWithGlobals<GlobalOptions>());
      process.exitCode = exitCode;
    });
}

async function executeOnce(options: GlobalOptions): Promise<ExitCode> {
  const context = createCliContext(options);
  const report = await context.engine.runCycle();

  console.log(context.json ? reportToJson(report) : formatReport(report));
  if (context.verbose) {
    context.engine.logCacheStatistics();
  }
  return exitCodeFor(report);
}
