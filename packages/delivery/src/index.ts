/**
 * @dropsort/delivery
 * 
 * Change detection and idempotent delivery:
 * - Identity fingerprints for local files and remote objects
 * - Destination templating (year prefix, drive suffix)
 * - Persisted delivery ledger
 * - Local and remote source providers
 * - Delivery engine
 * - Watch-and-debounce and listing-diff triggers
 */

export {
  computeIdentity,
  identifyLocalFile,
  identifyRemoteObject,
  type IdentitySubject,
} from './identity/identityComputer.js';

export {
  DestinationResolver,
  resolveDestination,
  extractYear,
  type ResolvedTarget,
} from './destination/destinationResolver.js';

export { Ledger, type ExistenceCheck } from './ledger/ledger.js';

export type { SourceProvider } from './sources/sourceProvider.js';
export { LocalSource, type LocalSourceOptions } from './sources/localSource.js';
export {
  RemoteSource,
  parentPrefix,
  keyName,
  type RemoteSourceOptions,
} from './sources/remoteSource.js';
export {
  MinioObjectStore,
  isObjectNotFound,
  normalizeEtag,
  type ListOptions,
  type ObjectStore,
  type ObjectSummary,
} from './sources/objectStore.js';

export {
  DeliveryEngine,
  type DeliveryEngineOptions,
  type DirectoryOutcome,
  type DirectoryReport,
  type ScanReport,
} from './engine/deliveryEngine.js';
export { SerialQueue } from './engine/serialQueue.js';

export {
  FolderWatcher,
  type WatcherConfig,
  type WatchEvent,
  type WatchEventType,
  type WatchFailure,
} from './watcher/folderWatcher.js';

export { LocalTrigger, type LocalTriggerOptions } from './triggers/localTrigger.js';
export { RemoteTrigger, type RemoteTriggerOptions, type PollResult } from './triggers/remoteTrigger.js';
export {
  diffListings,
  changedDirectories,
  toListing,
  type Listing,
  type ListingDiff,
  type ListingEntry,
} from './triggers/listingDiff.js';

export { Orchestrator, isLedgerFile, type OrchestratorOverrides } from './orchestrator.js';
