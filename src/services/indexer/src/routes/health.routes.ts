/**
 * Health Routes
 *
 * Service health check and capability discovery.
 */

import type { Hono } from 'hono';
import { VERSION, getCapabilities } from '../../../../version';

/**
 * Register health routes on Hono app
 */
export function registerHealthRoutes(app: Hono, options: { enrichment: boolean }): void {
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      service: 'applet-shelf',
      version: VERSION.release,
      timestamp: Date.now(),
    });
  });

  app.get('/capabilities', (c) => c.json(getCapabilities(options)));
}
