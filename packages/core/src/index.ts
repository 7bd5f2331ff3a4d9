/**
 * @dropsort/core
 * 
 * Core package containing:
 * - Configuration schema and loader
 * - Error handling
 * - Shared delivery types
 */

// Configuration
export {
  loadConfig,
  parseEndpoint,
  normalizePrefix,
  DEFAULT_HISTORY_FILENAME,
  LOG_LEVELS,
} from './config/index.js';

export type {
  AppConfig,
  SourceConfig,
  LocalSourceConfig,
  RemoteSourceConfig,
  DestinationConfig,
  DriveSuffixConfig,
  IntervalConfig,
  LogLevel,
} from './config/index.js';

// Types
export type {
  SourceKind,
  DeliveryRecord,
  SourceItem,
  ItemIdentity,
  DeliveryStats,
} from './types/delivery.js';

// Errors
export {
  DropsortError,
  ConfigurationError,
  DestinationResolutionError,
  LedgerPersistenceError,
  SourceUnavailableError,
  isDropsortError,
  getErrorMessage,
} from './errors/index.js';
