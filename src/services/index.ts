/**
 * Services Index
 *
 * Public surface of the indexer service. main.ts wires these together;
 * embedders can do the same with their own config.
 */

export { loadConfig, type IndexerConfig, type Timings } from './indexer/src/config';
export { openDatabase, type CatalogDb } from './indexer/src/database';
export { IndexerError, type IndexerErrorCode } from './indexer/src/errors';
export { registerAllRoutes, type RouteDeps } from './indexer/src/routes';

export { CatalogStore, type CatalogEntry, type NewCatalogEntry } from './indexer/src/services/catalog.service';
export { DiscoveryQueue, type DiscoveryBatchResult } from './indexer/src/services/discovery.service';
export { PreviewCaptureQueue, type CaptureItem, type PreviewSnapshot } from './indexer/src/services/capture.service';
export { launchChromium, type PreviewBrowser, type BrowserFactory } from './indexer/src/services/browser.service';
export { ForegroundSupervisor, type SupervisorStatus, type StopOutcome } from './indexer/src/services/supervisor.service';
export { StaticServerRegistry, type StaticServerInfo } from './indexer/src/services/static-servers.service';
export { EnrichmentService } from './indexer/src/services/enrichment.service';
export { Orchestrator, type LiveLaunchResult } from './indexer/src/services/orchestrator.service';
export { allocatePort } from './indexer/src/services/ports.service';

// Shared constants and logger
export * from './shared';
