/**
 * Scan Routes
 *
 * Endpoints:
 * - POST /scan               - Queue discovery of a folder
 * - GET  /scanning-progress  - Discovery snapshot for polling
 */

import type { Hono } from 'hono';
import { z } from 'zod';
import type { Orchestrator } from '../services/orchestrator.service';
import { parseBody } from './validation';

const scanBody = z.object({
  folderPath: z.string().min(1),
});

export function registerScanRoutes(app: Hono, orchestrator: Orchestrator): void {
  app.post('/scan', async (c) => {
    const { folderPath } = await parseBody(c, scanBody);
    const { status, rootDir } = orchestrator.scanStart(folderPath);
    return c.json({ status, rootDir }, 202);
  });

  app.get('/scanning-progress', (c) => c.json(orchestrator.scanProgress()));
}
