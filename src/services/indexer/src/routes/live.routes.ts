/**
 * Live Routes
 *
 * Interactive launches: one foreground app at a time, any number of
 * static page servers.
 *
 * Endpoints:
 * - GET  /serve/:shortId        - Launch and redirect to the live URL
 * - POST /launch/:encodedPath   - Launch by base64url-encoded file path
 * - GET  /status                - Foreground app and static servers
 * - POST /stop                  - Stop the foreground app
 * - POST /api/clean-apps        - Stop everything that is running
 */

import * as path from 'path';
import type { Hono } from 'hono';
import { IndexerError } from '../errors';
import type { CatalogStore } from '../services/catalog.service';
import type { Orchestrator } from '../services/orchestrator.service';

function decodePath(encoded: string): string {
  const decoded = Buffer.from(encoded, 'base64url').toString('utf8');
  if (!path.isAbsolute(decoded)) throw new IndexerError('invalid_request', 'Encoded path must be absolute');
  return decoded;
}

export function registerLiveRoutes(app: Hono, orchestrator: Orchestrator, store: CatalogStore): void {
  app.get('/serve/:shortId', async (c) => {
    const { url } = await orchestrator.liveLaunch(c.req.param('shortId'));
    return c.redirect(url, 302);
  });

  app.post('/launch/:encodedPath', async (c) => {
    const filePath = decodePath(c.req.param('encodedPath'));
    const entry = store.getByPrimaryOrInterfacePath(filePath);
    if (!entry) throw new IndexerError('not_found', `Not in catalog: ${filePath}`);

    const { url, shortId, reused } = await orchestrator.liveLaunch(entry.id);
    return c.json({ url, shortId, reused, status: 'launched' });
  });

  app.get('/status', async (c) => c.json(await orchestrator.liveStatus()));

  app.post('/stop', async (c) => c.json(await orchestrator.liveStop()));

  app.post('/api/clean-apps', async (c) => {
    const freed = await orchestrator.freeAllResources();
    return c.json({ status: 'cleaned', ...freed });
  });
}
