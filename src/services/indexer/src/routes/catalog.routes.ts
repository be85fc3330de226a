/**
 * Catalog Routes
 *
 * Endpoints:
 * - GET  /api/items                      - All entries (missing previews cleared)
 * - GET  /search?q=&tags=&category=      - Text search with optional filters
 * - GET  /api/tags                       - Tag usage counts
 * - GET  /api/favourites                 - Favourite entries
 * - POST /api/cleanup                    - Drop entries whose files are gone
 * - POST /remove_item                    - Remove one entry
 * - POST /remove_folder                  - Remove every entry in a folder
 * - POST /api/toggle-favourite/:id
 * - POST /api/update-description/:id
 * - GET  /api/export                     - Project list for other tools
 * - POST /api/process-llm/:id            - Queue enrichment for one entry
 * - POST /api/process-llm-all            - Queue enrichment for every entry not yet enriched
 * - POST /api/purge-database             - Stop everything and empty the catalog
 */

import type { Hono } from 'hono';
import { z } from 'zod';
import { IndexerError } from '../errors';
import type { CatalogStore } from '../services/catalog.service';
import type { EnrichmentService } from '../services/enrichment.service';
import type { Orchestrator } from '../services/orchestrator.service';
import { parseBody, parseId } from './validation';

const removeItemBody = z.object({
  id: z.union([z.number().int().positive(), z.string().min(1)]),
});

const removeFolderBody = z.object({
  folderPath: z.string().min(1),
});

const descriptionBody = z.object({
  description: z.string().max(2000),
});

export interface CatalogRouteDeps {
  orchestrator: Orchestrator;
  store: CatalogStore;
  enrichment?: EnrichmentService;
}

export function registerCatalogRoutes(app: Hono, deps: CatalogRouteDeps): void {
  const { orchestrator, store, enrichment } = deps;

  app.get('/api/items', (c) => {
    const items = orchestrator.listEntries();
    return c.json({ items, count: items.length });
  });

  app.get('/search', (c) => {
    const q = c.req.query('q') ?? '';
    const tags = (c.req.query('tags') ?? '')
      .split(',')
      .map((t) => t.trim())
      .filter(Boolean);
    const items = store.search(q, { tags, category: c.req.query('category') || undefined });
    return c.json({ items, count: items.length });
  });

  app.get('/api/tags', (c) => c.json({ tags: store.getAvailableTags() }));

  app.get('/api/favourites', (c) => c.json({ items: store.getFavourites() }));

  app.get('/api/export', (c) => c.json({ projects: store.exportProjects() }));

  app.post('/api/cleanup', (c) => c.json({ status: 'cleaned', removed: orchestrator.sweepMissing() }));

  app.post('/remove_item', async (c) => {
    const { id } = await parseBody(c, removeItemBody);
    const entry = await orchestrator.removeEntry(id);
    return c.json({ status: 'removed', id: entry.id, shortId: entry.shortId });
  });

  app.post('/remove_folder', async (c) => {
    const { folderPath } = await parseBody(c, removeFolderBody);
    const removed = await orchestrator.removeFolder(folderPath);
    return c.json({ status: 'removed', removed });
  });

  app.post('/api/toggle-favourite/:id', (c) => {
    const id = parseId(c.req.param('id'));
    if (!store.toggleFavourite(id)) throw new IndexerError('not_found', `No entry ${id}`);
    return c.json({ id, favourite: store.getById(id)?.favourite ?? false });
  });

  app.post('/api/update-description/:id', async (c) => {
    const id = parseId(c.req.param('id'));
    const { description } = await parseBody(c, descriptionBody);
    if (!store.updateDescription(id, description)) throw new IndexerError('not_found', `No entry ${id}`);
    return c.json({ id, description });
  });

  app.post('/api/process-llm/:id', (c) => {
    const entry = orchestrator.findEntry(parseId(c.req.param('id')));
    if (!enrichment?.isEnabled()) return c.json({ status: 'disabled', id: entry.id });
    enrichment.enrich(entry.id);
    return c.json({ status: 'queued', id: entry.id }, 202);
  });

  app.post('/api/process-llm-all', (c) => {
    if (!enrichment?.isEnabled()) return c.json({ status: 'disabled', queued: 0 });
    return c.json({ status: 'queued', queued: enrichment.enrichAll() }, 202);
  });

  app.post('/api/purge-database', async (c) => {
    const removed = await orchestrator.purge();
    return c.json({ status: 'purged', removed });
  });
}
