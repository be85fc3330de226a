/**
 * Preview Routes
 *
 * Endpoints:
 * - POST /api/regenerate-previews  - Queue captures (all missing, or the given ids)
 * - GET  /progress                 - Capture snapshot for polling
 * - GET  /api/preview/:shortId     - Stored screenshot
 */

import * as fs from 'fs';
import type { Hono } from 'hono';
import { z } from 'zod';
import { IndexerError } from '../errors';
import type { CatalogEntry } from '../services/catalog.service';
import type { Orchestrator } from '../services/orchestrator.service';
import { parseBody } from './validation';

const regenerateBody = z.object({
  ids: z.array(z.number().int().positive()).optional(),
});

export function registerPreviewRoutes(app: Hono, orchestrator: Orchestrator): void {
  app.post('/api/regenerate-previews', async (c) => {
    const { ids } = await parseBody(c, regenerateBody);
    const entries: CatalogEntry[] | undefined = ids?.map((id) => orchestrator.findEntry(id));
    return c.json(orchestrator.previewStart(entries));
  });

  app.get('/progress', (c) => c.json(orchestrator.previewProgress()));

  app.get('/api/preview/:shortId', (c) => {
    const entry = orchestrator.findEntry(c.req.param('shortId'));
    if (!entry.previewPath || !fs.existsSync(entry.previewPath)) {
      throw new IndexerError('not_found', `No preview for ${entry.shortId}`);
    }
    return c.body(new Uint8Array(fs.readFileSync(entry.previewPath)), 200, {
      'Content-Type': 'image/png',
      'Cache-Control': 'no-store',
    });
  });
}
