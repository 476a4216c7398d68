/**
 * Building Sync Engine Configuration
 *
 * Typed, immutable engine configuration with defaults, deep-partial
 * overrides and schema validation.
 *
 * Configuration precedence (highest to lowest):
 * 1. Explicit overrides (CLI flags, constructor arguments)
 * 2. Environment variables (BUILDING_SYNC_*)
 * 3. Config file (.building-syncrc or --config path, YAML or JSON)
 * 4. Default values
 *
 * @module core/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from './errors.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * What happens to an entity whose key disappears from the source
 */
export type RemovalPolicy = 'retain' | 'evict';

export interface PollingConfig {
  /** Interval while changes are flowing */
  readonly fastIntervalSeconds: number;
  /** Interval after a run of quiet cycles */
  readonly slowIntervalSeconds: number;
  /** Consecutive quiet cycles before slowing down */
  readonly quietCyclesBeforeSlowdown: number;
  /** When false the fast interval is always used */
  readonly adaptive: boolean;
}

export interface SpatialConfig {
  /** Bounding box expansion used by coordinate lookup, in meters */
  readonly toleranceMeters: number;
}

export interface SyncConfig {
  readonly removalPolicy: RemovalPolicy;
}

export interface HttpConfig {
  /** Remote building endpoint; required only by the HTTP fetcher */
  readonly endpointUrl?: string;
  readonly timeoutMs: number;
  readonly maxRetries: number;
}

export interface EngineConfig {
  readonly polling: PollingConfig;
  readonly spatial: SpatialConfig;
  readonly sync: SyncConfig;
  readonly http: HttpConfig;
}

/**
 * Default configuration
 *
 * - 1 second fast cadence, 5 second slow cadence
 * - slow down after 10 quiet cycles
 * - 10 meter pick tolerance
 * - removed buildings stay cached until explicitly cleared
 */
export const DEFAULT_CONFIG: EngineConfig = {
  polling: {
    fastIntervalSeconds: 1,
    slowIntervalSeconds: 5,
    quietCyclesBeforeSlowdown: 10,
    adaptive: true,
  },
  spatial: {
    toleranceMeters: 10,
  },
  sync: {
    removalPolicy: 'retain',
  },
  http: {
    timeoutMs: 30_000,
    maxRetries: 2,
  },
};

/**
 * Deep partial type for nested configuration objects
 */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

// ============================================================================
// Validation
// ============================================================================

const EngineConfigSchema = z
  .object({
    polling: z.object({
      fastIntervalSeconds: z.number().positive(),
      slowIntervalSeconds: z.number().positive(),
      quietCyclesBeforeSlowdown: z.number().int().min(1),
      adaptive: z.boolean(),
    }),
    spatial: z.object({
      toleranceMeters: z.number().min(0),
    }),
    sync: z.object({
      removalPolicy: z.enum(['retain', 'evict']),
    }),
    http: z.object({
      endpointUrl: z.string().url().optional(),
      timeoutMs: z.number().int().positive(),
      maxRetries: z.number().int().min(0),
    }),
  })
  .refine((config) => config.polling.slowIntervalSeconds >= config.polling.fastIntervalSeconds, {
    message: 'slowIntervalSeconds must be greater than or equal to fastIntervalSeconds',
    path: ['polling', 'slowIntervalSeconds'],
  });

/**
 * Validate a fully merged configuration
 *
 * @throws ConfigurationError listing every failed constraint
 */
export function validateConfig(config: EngineConfig): EngineConfig {
  const result = EngineConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ConfigurationError('Invalid engine configuration', issues);
  }
  return config;
}

/**
 * Create configuration by merging overrides into defaults
 *
 * @throws ConfigurationError when the merged result is invalid
 */
export function createConfig(
  overrides: DeepPartial<EngineConfig> = {},
  base: EngineConfig = DEFAULT_CONFIG
): EngineConfig {
  return validateConfig(mergeLayer(base, overrides));
}

function stripUndefined<T extends object>(value: T | undefined): Partial<T> {
  if (value === undefined) return {};
  const result: Partial<T> = {};
  for (const key of Object.keys(value)) {
    if (isKeyOf(value, key) && value[key] !== undefined) {
      result[key] = value[key];
    }
  }
  return result;
}

function isKeyOf<T extends object>(value: T, key: PropertyKey): key is keyof T {
  return key in value;
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = [
  '.building-syncrc',
  '.building-syncrc.yaml',
  '.building-syncrc.yml',
  '.building-syncrc.json',
];

/**
 * File shape accepted by the loader. Unknown keys are rejected so typos do
 * not silently fall back to defaults.
 */
const ConfigFileSchema = z
  .object({
    polling: z
      .object({
        fastIntervalSeconds: z.number(),
        slowIntervalSeconds: z.number(),
        quietCyclesBeforeSlowdown: z.number(),
        adaptive: z.boolean(),
      })
      .partial()
      .strict()
      .optional(),
    spatial: z.object({ toleranceMeters: z.number() }).partial().strict().optional(),
    sync: z.object({ removalPolicy: z.enum(['retain', 'evict']) }).partial().strict().optional(),
    http: z
      .object({
        endpointUrl: z.string(),
        timeoutMs: z.number(),
        maxRetries: z.number(),
      })
      .partial()
      .strict()
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Find config file in the directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = resolve(dir, '..');
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Parse config file content (YAML, which also covers plain JSON)
 */
export function parseConfigFile(content: string, source: string): ConfigFile {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigurationError(`Cannot parse config file ${source}: ${errorMessage(error)}`);
  }

  // An empty file parses to null
  if (raw === null || raw === undefined) return {};

  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid config file ${source}`,
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

type Env = Readonly<Record<string, string | undefined>>;

function envNumber(env: Env, name: string): number | undefined {
  const value = env[`BUILDING_SYNC_${name}`];
  if (value === undefined || value.trim() === '') return undefined;
  const num = Number(value);
  if (!Number.isFinite(num)) {
    throw new ConfigurationError(`BUILDING_SYNC_${name} is not a number: ${value}`);
  }
  return num;
}

function envBool(env: Env, name: string): boolean | undefined {
  const value = env[`BUILDING_SYNC_${name}`];
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

function envRemovalPolicy(env: Env): RemovalPolicy | undefined {
  const value = env.BUILDING_SYNC_REMOVAL_POLICY;
  if (value === undefined) return undefined;
  if (value === 'retain' || value === 'evict') return value;
  throw new ConfigurationError(`BUILDING_SYNC_REMOVAL_POLICY must be "retain" or "evict", got: ${value}`);
}

/**
 * Read BUILDING_SYNC_* overrides
 */
export function configFromEnv(env: Env = process.env): DeepPartial<EngineConfig> {
  return {
    polling: {
      fastIntervalSeconds: envNumber(env, 'FAST_INTERVAL_SECONDS'),
      slowIntervalSeconds: envNumber(env, 'SLOW_INTERVAL_SECONDS'),
      quietCyclesBeforeSlowdown: envNumber(env, 'QUIET_CYCLES'),
      adaptive: envBool(env, 'ADAPTIVE_POLLING'),
    },
    spatial: {
      toleranceMeters: envNumber(env, 'TOLERANCE_METERS'),
    },
    sync: {
      removalPolicy: envRemovalPolicy(env),
    },
    http: {
      endpointUrl: env.BUILDING_SYNC_ENDPOINT,
      timeoutMs: envNumber(env, 'TIMEOUT_MS'),
      maxRetries: envNumber(env, 'MAX_RETRIES'),
    },
  };
}

export interface LoadConfigOptions {
  /** Explicit config file path; must exist */
  readonly configPath?: string;
  /** Directory to search upwards from (default: cwd) */
  readonly cwd?: string;
  /** Environment (default: process.env) */
  readonly env?: Env;
  /** Highest-precedence overrides */
  readonly overrides?: DeepPartial<EngineConfig>;
}

export interface LoadedConfig {
  readonly config: EngineConfig;
  /** Resolved config file path, null when none was used */
  readonly configPath: string | null;
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigurationError on a missing explicit file, bad file content,
 *   bad environment values or an invalid merged result
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const env = options.env ?? process.env;
  let configPath: string | null = null;

  if (options.configPath !== undefined) {
    configPath = resolve(options.configPath);
    if (!existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`);
    }
  } else {
    const envConfigPath = env.BUILDING_SYNC_CONFIG;
    if (envConfigPath !== undefined && existsSync(resolve(envConfigPath))) {
      configPath = resolve(envConfigPath);
    } else if (envConfigPath === undefined) {
      configPath = findConfigFile(options.cwd ?? process.cwd());
    }
  }

  const fileConfig: ConfigFile =
    configPath === null ? {} : parseConfigFile(readFileSync(configPath, 'utf-8'), configPath);

  // Each layer is validated only once fully merged
  const fromFile = mergeLayer(DEFAULT_CONFIG, fileConfig);
  const fromEnv = mergeLayer(fromFile, configFromEnv(env));
  const config = createConfig(options.overrides ?? {}, fromEnv);

  return { config, configPath };
}

function mergeLayer(base: EngineConfig, layer: DeepPartial<EngineConfig>): EngineConfig {
  return {
    polling: { ...base.polling, ...stripUndefined(layer.polling) },
    spatial: { ...base.spatial, ...stripUndefined(layer.spatial) },
    sync: { ...base.sync, ...stripUndefined(layer.sync) },
    http: { ...base.http, ...stripUndefined(layer.http) },
  };
}
