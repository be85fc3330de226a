#!/usr/bin/env node
/**
 * Applet Shelf Indexer - Main Entry Point
 *
 * Catalogs locally developed mini web apps and standalone pages, keeps
 * screenshots of them current, and launches them on demand.
 * Runs on port 5055 by default and provides:
 *
 * - Folder scans (executable apps + companion pages, standalone pages)
 * - Headless preview capture
 * - One foreground app and any number of static page servers
 * - Catalog search, favourites and optional model-based enrichment
 */

import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { loadConfig } from './config';
import { openDatabase } from './database';
import { registerAllRoutes } from './routes';
import { launchChromium } from './services/browser.service';
import { PreviewCaptureQueue } from './services/capture.service';
import { CatalogStore } from './services/catalog.service';
import { DiscoveryQueue } from './services/discovery.service';
import { EnrichmentService } from './services/enrichment.service';
import { Orchestrator } from './services/orchestrator.service';
import { StaticServerRegistry } from './services/static-servers.service';
import { ForegroundSupervisor } from './services/supervisor.service';
import { errorMessage } from '../../shared/logger';

const config = loadConfig();
const db = openDatabase(config.dbPath);
const store = new CatalogStore(db);

const supervisor: ForegroundSupervisor = new ForegroundSupervisor({
  interpreter: config.interpreter,
  scratchDir: config.scratchDir,
  timings: config.timings,
  portBusy: (port) => capture.activePort() === port,
});

const capture: PreviewCaptureQueue = new PreviewCaptureQueue({
  store,
  browserFactory: () =>
    launchChromium({ executablePath: config.chromePath, ...config.screenshot }),
  previewsDir: config.previewsDir,
  scratchDir: config.scratchDir,
  interpreter: config.interpreter,
  timings: config.timings,
  portReserved: (port) => supervisor.holdsPort(port),
});

const enrichment = new EnrichmentService(store, { url: config.enrichUrl, model: config.enrichModel });

const orchestrator = new Orchestrator({
  store,
  discovery: new DiscoveryQueue(store),
  capture,
  supervisor,
  statics: new StaticServerRegistry({ listenTimeoutMs: config.timings.staticListenTimeoutMs }),
  enrichment,
  autoCapture: config.autoCapture,
});

const app = new Hono();
registerAllRoutes(app, { orchestrator, store, enrichment });

console.log(`[indexer] Starting Applet Shelf indexer on port ${config.port}...`);
console.log(`[indexer] Data directory: ${config.dataDir}`);
console.log(`[indexer] Interpreter: ${config.interpreter}`);
if (!enrichment.isEnabled()) {
  console.log('[indexer] ENRICH_URL not set, enrichment disabled');
}

serve({
  fetch: app.fetch,
  port: config.port,
  hostname: config.host,
}, (info) => {
  console.log(`[indexer] Indexer running on http://${config.host}:${info.port}`);
});

process.on('uncaughtException', (err) => {
  console.error('[indexer] Uncaught exception:', err.message);
  console.error(err.stack);
});

process.on('unhandledRejection', (reason) => {
  console.error('[indexer] Unhandled rejection:', errorMessage(reason));
});

let shuttingDown = false;

function shutdown(signal: string): void {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`[indexer] Received ${signal}, stopping launched apps...`);

  orchestrator
    .shutdown()
    .catch((e) => console.error('[indexer] Shutdown failed:', errorMessage(e)))
    .finally(() => {
      db.close();
      process.exit(0);
    });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
