/**
 * Routes Module Index
 *
 * - health.routes.ts   - /health, /capabilities
 * - scan.routes.ts     - Folder discovery and its progress
 * - preview.routes.ts  - Screenshot capture and its progress
 * - live.routes.ts     - Foreground app and static page servers
 * - catalog.routes.ts  - Catalog listing, search and maintenance
 */

import type { Hono } from 'hono';
import { createLogger, errorMessage } from '../../../shared/logger';
import { IndexerError } from '../errors';
import type { CatalogStore } from '../services/catalog.service';
import type { EnrichmentService } from '../services/enrichment.service';
import type { Orchestrator } from '../services/orchestrator.service';
import { registerCatalogRoutes } from './catalog.routes';
import { registerHealthRoutes } from './health.routes';
import { registerLiveRoutes } from './live.routes';
import { registerPreviewRoutes } from './preview.routes';
import { registerScanRoutes } from './scan.routes';

const log = createLogger('routes');

export interface RouteDeps {
  orchestrator: Orchestrator;
  store: CatalogStore;
  enrichment?: EnrichmentService;
}

/**
 * Register all routes on the Hono app
 */
export function registerAllRoutes(app: Hono, deps: RouteDeps): void {
  registerHealthRoutes(app, { enrichment: deps.enrichment?.isEnabled() ?? false });
  registerScanRoutes(app, deps.orchestrator);
  registerPreviewRoutes(app, deps.orchestrator);
  registerLiveRoutes(app, deps.orchestrator, deps.store);
  registerCatalogRoutes(app, deps);

  app.onError((err, c) => {
    if (err instanceof IndexerError) {
      return c.json({ error: err.message, code: err.code }, err.status);
    }
    log.error('unhandled route error', { path: c.req.path, error: errorMessage(err) });
    return c.json({ error: 'Internal server error' }, 500);
  });
}

export {
  registerHealthRoutes,
  registerScanRoutes,
  registerPreviewRoutes,
  registerLiveRoutes,
  registerCatalogRoutes,
};
