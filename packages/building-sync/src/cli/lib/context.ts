/**
 * CLI engine construction
 *
 * Resolves configuration, endpoint and token from CLI flags, environment
 * and config file, then builds an engine over the HTTP fetcher.
 *
 * Endpoint precedence: --endpoint, BUILDING_SYNC_ENDPOINT, config file.
 * Token precedence: --token, BUILDING_SYNC_TOKEN.
 *
 * @module cli/lib/context
 */

import type { DeepPartial, EngineConfig } from '../../core/config.js';
import { loadConfig } from '../../core/config.js';
import { ConfigurationError } from '../../core/errors.js';
import { setDefaultLogLevel } from '../../core/utils/logger.js';
import { HttpBuildingFetcher, staticTokenProvider } from '../../fetch/building-fetcher.js';
import { BuildingSyncEngine } from '../../sync/sync-engine.js';

/**
 * Global options shared by every command
 */
export interface GlobalOptions {
  readonly config?: string;
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly endpoint?: string;
  readonly token?: string;
  readonly adaptive?: boolean;
}

export interface CliContext {
  readonly engine: BuildingSyncEngine;
  readonly config: EngineConfig;
  readonly configPath: string | null;
  readonly endpointUrl: string;
  readonly json: boolean;
  readonly verbose: boolean;
}

type Env = Readonly<Record<string, string | undefined>>;

/**
 * @throws ConfigurationError when configuration is invalid or no endpoint
 *   or token can be found
 */
export function createCliContext(options: GlobalOptions, env: Env = process.env): CliContext {
  if (options.verbose === true) {
    setDefaultLogLevel('debug');
  }

  const overrides: DeepPartial<EngineConfig> = {
    polling: { adaptive: options.adaptive },
    http: { endpointUrl: options.endpoint },
  };
  const { config, configPath } = loadConfig({ configPath: options.config, env, overrides });

  const endpointUrl = config.http.endpointUrl;
  if (endpointUrl === undefined) {
    throw new ConfigurationError(
      'No endpoint configured: pass --endpoint, set BUILDING_SYNC_ENDPOINT or http.endpointUrl in the config file'
    );
  }

  const token = options.token ?? env.BUILDING_SYNC_TOKEN;
  if (token === undefined || token.trim() === '') {
    throw new ConfigurationError('No token configured: pass --token or set BUILDING_SYNC_TOKEN');
  }

  const fetcher = new HttpBuildingFetcher({
    endpointUrl,
    tokenProvider: staticTokenProvider(token),
    http: { timeoutMs: config.http.timeoutMs, maxRetries: config.http.maxRetries },
  });

  return {
    engine: new BuildingSyncEngine({ fetcher, config }),
    config,
    configPath,
    endpointUrl,
    json: options.json === true,
    verbose: options.verbose === true,
  };
}
