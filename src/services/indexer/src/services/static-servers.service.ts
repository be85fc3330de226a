/**
 * Static Server Registry
 *
 * One ephemeral file server per static target, keyed by target path.
 * Each server is rooted at the target's directory and answers `/` with
 * the target itself. The pending start is registered synchronously, so
 * concurrent getOrStart calls for one target share a single server.
 */

import * as fs from 'fs';
import * as http from 'http';
import * as net from 'net';
import * as path from 'path';
import { Hono } from 'hono';
import { getMimeType } from 'hono/utils/mime';
import { serve, type ServerType } from '@hono/node-server';
import { createLogger, errorMessage } from '../../../shared/logger';
import { IndexerError } from '../errors';
import { safeStat, withTimeout } from '../utils';
import { allocatePort } from './ports.service';

const log = createLogger('static-servers');

const BIND_HOST = '127.0.0.1';

interface StaticServerHandle {
  targetPath: string;
  port: number;
  server: ServerType;
  startedAt: string;
}

export interface StaticServerInfo {
  targetPath: string;
  port: number;
  startedAt: string;
}

export interface StaticServerRegistryOptions {
  listenTimeoutMs: number;
  allocate?: () => Promise<number>;
}

/**
 * File-serving app for one target. Paths resolving outside `root` are 404.
 */
export function createStaticApp(root: string, targetPath: string): Hono {
  const app = new Hono();

  app.get('*', (c) => {
    let requested: string;
    try {
      requested = decodeURIComponent(c.req.path);
    } catch {
      return c.text('Not found', 404);
    }

    const filePath = requested === '/' ? targetPath : path.resolve(root, `.${requested}`);
    if (filePath !== targetPath && !filePath.startsWith(root + path.sep)) {
      return c.text('Not found', 404);
    }
    if (!safeStat(filePath)?.isFile()) {
      return c.text('Not found', 404);
    }

    const body = new Uint8Array(fs.readFileSync(filePath));
    return c.body(body, 200, {
      'Content-Type': getMimeType(filePath) ?? 'application/octet-stream',
      'Cache-Control': 'no-store',
    });
  });

  return app;
}

function closeServer(server: ServerType): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
    // Keep-alive sockets from the browser would hold close() open
    if (server instanceof http.Server) server.closeAllConnections();
  });
}

/**
 * Resolve with the bound port once `server` listens. Rejects after
 * `timeoutMs`; a server that binds after that is closed on the spot.
 */
export function whenListening(server: net.Server, timeoutMs: number, target: string): Promise<number> {
  return new Promise((resolve, reject) => {
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      reject(new IndexerError('start_timeout', `Static server for ${target} did not start listening`));
    }, timeoutMs);

    server.once('listening', () => {
      if (timedOut) {
        log.warn('static server listened after its timeout, closing', { target });
        server.close();
        return;
      }
      clearTimeout(timer);
      const address = server.address();
      if (address && typeof address === 'object') resolve(address.port);
      else reject(new IndexerError('start_timeout', `Static server for ${target} has no TCP address`));
    });
    server.once('error', (err) => {
      clearTimeout(timer);
      reject(new IndexerError('port_conflict', `Static server for ${target} failed: ${err.message}`));
    });
  });
}

export class StaticServerRegistry {
  private readonly pending = new Map<string, Promise<StaticServerHandle>>();
  private readonly allocate: () => Promise<number>;

  constructor(private readonly options: StaticServerRegistryOptions) {
    this.allocate = options.allocate ?? (() => allocatePort(BIND_HOST));
  }

  getOrStart(targetPath: string): Promise<number> {
    const key = path.resolve(targetPath);
    const existing = this.pending.get(key);
    if (existing) {
      log.info('reusing static server', { target: key });
      return existing.then((h) => h.port);
    }

    const starting = this.start(key);
    this.pending.set(key, starting);
    starting.catch((e) => {
      if (this.pending.get(key) === starting) this.pending.delete(key);
      log.warn('static server failed to start', { target: key, error: errorMessage(e) });
    });
    return starting.then((h) => h.port);
  }

  /**
   * Close the server for `targetPath`. The entry leaves the registry
   * before the close starts, so a getOrStart issued meanwhile starts a
   * fresh server. Resolves false when nothing was registered.
   */
  async stop(targetPath: string): Promise<boolean> {
    const key = path.resolve(targetPath);
    const starting = this.pending.get(key);
    if (!starting) return false;
    this.pending.delete(key);

    try {
      const handle = await starting;
      const closed = await withTimeout(
        closeServer(handle.server).then(() => true),
        this.options.listenTimeoutMs,
        false,
      );
      if (!closed) log.warn('static server did not close in time', { target: key, port: handle.port });
      else log.info('static server stopped', { target: key, port: handle.port });
    } catch (e) {
      log.warn('static server stop failed', { target: key, error: errorMessage(e) });
    }
    return true;
  }

  async stopAll(): Promise<number> {
    const keys = [...this.pending.keys()];
    const stopped = await Promise.all(keys.map((k) => this.stop(k)));
    return stopped.filter(Boolean).length;
  }

  async list(): Promise<StaticServerInfo[]> {
    const settled = await Promise.allSettled(this.pending.values());
    const infos: StaticServerInfo[] = [];
    for (const s of settled) {
      if (s.status === 'fulfilled') {
        infos.push({ targetPath: s.value.targetPath, port: s.value.port, startedAt: s.value.startedAt });
      }
    }
    return infos;
  }

  private async start(targetPath: string): Promise<StaticServerHandle> {
    if (!safeStat(targetPath)?.isFile()) {
      throw new IndexerError('not_found', `Static page not found: ${targetPath}`);
    }
    const port = await this.allocate();
    const app = createStaticApp(path.dirname(targetPath), targetPath);

    const server = serve({ fetch: app.fetch, port, hostname: BIND_HOST });
    const bound = await whenListening(server, this.options.listenTimeoutMs, targetPath);
    log.info('static server listening', { target: targetPath, port: bound });
    return { targetPath, port: bound, server, startedAt: new Date().toISOString() };
  }
}
