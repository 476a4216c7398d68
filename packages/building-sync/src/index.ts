/**
 * Building Sync
 *
 * Keeps a local, queryable snapshot of remote building energy data fresh:
 * - Adaptive polling that slows down when the source goes quiet
 * - Differential change detection per building
 * - Dual-key identity resolution (modified_gml_id / gml_id)
 * - Pick-point lookup against building footprints
 *
 * @packageDocumentation
 */

// Engine facade
export {
  BuildingSyncEngine,
  type BuildingSyncEngineOptions,
  type CycleReport,
  type CycleStatus,
  type EngineStatus,
} from './sync/sync-engine.js';

// Domain types
export {
  EMPTY_FOOTPRINT,
  type BBox,
  type ChangeKind,
  type ChangeNotification,
  type ChangeRecord,
  type EnergyFigures,
  type Entity,
  type Footprint,
  type HexColor,
  type KeyMapping,
  type KeySource,
  type PickPoint,
  type Point2D,
  type RGB,
  type Ring,
  type SyncWarning,
  type SyncWarningType,
} from './core/types.js';

// Errors
export {
  ConfigurationError,
  MalformedPayloadError,
  MalformedRecordError,
  TransportFailureError,
  isConfigurationError,
  isMalformedPayloadError,
  isMalformedRecordError,
  isTransportFailureError,
} from './core/errors.js';

// Configuration
export {
  DEFAULT_CONFIG,
  configFromEnv,
  createConfig,
  findConfigFile,
  loadConfig,
  parseConfigFile,
  validateConfig,
  type DeepPartial,
  type EngineConfig,
  type HttpConfig,
  type LoadConfigOptions,
  type LoadedConfig,
  type PollingConfig,
  type RemovalPolicy,
  type SpatialConfig,
  type SyncConfig,
} from './core/config.js';

// Identity and spatial lookup
export { IdentityResolver, deriveSecondary, type IdentityResolverStats } from './identity/identity-resolver.js';
export { SpatialIndex, computeBBox, footprintContains, isMatchable } from './spatial/spatial-index.js';
export { parseFootprint, type FootprintParseResult } from './spatial/footprint-parser.js';

// Cache
export { EntityCache, coordinateHash, type CacheStats, type EntityCacheOptions } from './cache/entity-cache.js';

// Ingestion and diffing
export { extractRecords } from './ingestion/payload.js';
export { parseRecord, PRIMARY_KEY_FIELD, SECONDARY_KEY_FIELD, type ParsedRecord } from './ingestion/record-parser.js';
export { DEFAULT_COLOR, DEFAULT_COLOR_HEX, parseHexColor, rgbToHex } from './ingestion/color.js';
export { Differencer, classifyChange, hasChanges, type DiffResult } from './sync/differencer.js';

// Polling
export {
  initialPollingState,
  nextPollingState,
  type CycleOutcome,
  type PollingMode,
  type PollingState,
} from './sync/polling-state.js';
export { AdaptivePoller, type AdaptivePollerOptions, type CycleContext, type CycleRunner } from './sync/adaptive-poller.js';

// Notification
export { ChangeNotifier, buildNotification, type ChangeListener } from './notify/change-notifier.js';

// Fetching
export {
  HttpBuildingFetcher,
  staticTokenProvider,
  type BuildingFetcher,
  type HttpBuildingFetcherOptions,
  type TokenProvider,
} from './fetch/building-fetcher.js';
export { HTTPClient, type FetchOptions, type HTTPClientConfig } from './core/http-client.js';

// Logging
export { Logger, createLogger, logger, setDefaultLogLevel, type LogLevel } from './core/utils/logger.js';
