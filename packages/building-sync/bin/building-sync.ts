#!/usr/bin/env tsx
/**
 * Building Sync CLI Entry Point
 *
 * @module building-sync-cli
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { EXIT_CODES, createProgram } from '../src/cli/index.js';
import { isConfigurationError } from '../src/core/errors.js';
import { logger } from '../src/core/utils/logger.js';
import { isRecord } from '../src/core/type-guards.js';

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    return isRecord(packageJson) && typeof packageJson.version === 'string'
      ? packageJson.version
      : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

async function main(): Promise<void> {
  const program = createProgram(getVersion());

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (isConfigurationError(error)) {
      console.error(error.toLogString());
      process.exit(EXIT_CODES.CONFIG_ERROR);
    }
    logger.error('Command failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(EXIT_CODES.ERRORS);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
