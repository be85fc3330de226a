/**
 * Orchestrator
 *
 * Facade over the discovery and capture queues, the foreground
 * supervisor and the static server registry. Routes talk to this, never
 * to the components directly. A finished scan feeds its new entries
 * into the capture queue when auto-capture is on.
 */

import * as fs from 'fs';
import { PORTS } from '../../../shared/constants';
import { createLogger } from '../../../shared/logger';
import { IndexerError } from '../errors';
import { safeStat } from '../utils';
import type { CatalogEntry, CatalogStore } from './catalog.service';
import type { CaptureItem, PreviewCaptureQueue, PreviewSnapshot } from './capture.service';
import { PHASE_DESCRIPTIONS, type DiscoveryBatchResult, type DiscoveryQueue } from './discovery.service';
import type { EnrichmentService } from './enrichment.service';
import { progressPercentage, recentErrors, type JobState, type RecentError } from './job-progress';
import { formatShortId, kindForPrefix, parseShortId } from './short-id';
import type { StaticServerInfo, StaticServerRegistry } from './static-servers.service';
import type { ForegroundSupervisor, StopOutcome, SupervisorStatus } from './supervisor.service';

const log = createLogger('orchestrator');

export interface OrchestratorDeps {
  store: CatalogStore;
  discovery: DiscoveryQueue;
  capture: PreviewCaptureQueue;
  supervisor: ForegroundSupervisor;
  statics: StaticServerRegistry;
  enrichment?: EnrichmentService;
  autoCapture: boolean;
}

export interface ScanSnapshot extends JobState {
  isScanning: boolean;
  progressPercentage: number;
  phaseDescription: string;
  recentErrors: RecentError[];
}

export type PreviewStartResult =
  | { status: 'started'; count: number; batchId: number }
  | { status: 'up_to_date'; count: 0 };

export interface LiveLaunchResult {
  url: string;
  shortId: string;
  kind: CatalogEntry['kind'];
  /** The same app was already in the foreground */
  reused: boolean;
}

export interface LiveStatus {
  foreground: SupervisorStatus;
  staticServers: StaticServerInfo[];
}

export interface FreeResult {
  foreground: StopOutcome;
  staticServersStopped: number;
  /** Foreground app (when one ran) plus static servers */
  count: number;
}

export function toCaptureItem(entry: CatalogEntry): CaptureItem {
  return {
    kind: entry.kind,
    name: entry.name,
    primaryPath: entry.primaryPath,
    shortId: entry.shortId,
    port: entry.port,
  };
}

export class Orchestrator {
  constructor(private readonly deps: OrchestratorDeps) {
    deps.discovery.onBatchComplete((result) => this.afterScan(result));
  }

  scanStart(rootDir: string): { status: 'started'; rootDir: string; batchId: number } {
    if (!safeStat(rootDir)?.isDirectory()) {
      throw new IndexerError('invalid_request', `Not a directory: ${rootDir}`);
    }
    return this.deps.discovery.start(rootDir);
  }

  scanProgress(): ScanSnapshot {
    const state = this.deps.discovery.snapshot();
    return {
      ...state,
      isScanning: this.deps.discovery.progress.isActive(),
      progressPercentage: progressPercentage(state),
      phaseDescription: PHASE_DESCRIPTIONS[state.phase] ?? state.phase,
      recentErrors: recentErrors(state),
    };
  }

  /**
   * Queue previews for `entries`, or for every entry whose preview is
   * missing when none are given.
   */
  previewStart(entries?: CatalogEntry[]): PreviewStartResult {
    const items = (entries ?? this.deps.store.entriesNeedingPreview()).map(toCaptureItem);
    if (items.length === 0) return { status: 'up_to_date', count: 0 };
    return this.deps.capture.start(items);
  }

  previewProgress(): PreviewSnapshot {
    return this.deps.capture.snapshot();
  }

  /**
   * Resolve an entry by catalog id or short id.
   */
  findEntry(ref: number | string): CatalogEntry {
    const { store } = this.deps;
    if (typeof ref === 'number' || /^\d+$/.test(ref)) {
      const entry = store.getById(Number(ref));
      if (!entry) throw new IndexerError('not_found', `No entry ${ref}`);
      return entry;
    }

    const parsed = parseShortId(ref);
    const kind = parsed ? kindForPrefix(parsed.prefix.toUpperCase()) : null;
    if (!parsed || !kind) throw new IndexerError('invalid_request', `Malformed short id: ${ref}`);
    const shortId = formatShortId(kind, parsed.value);
    const entry = store.getByShortId(shortId);
    if (!entry) throw new IndexerError('not_found', `No entry ${shortId}`);
    return entry;
  }

  /**
   * Start an entry for interactive use. An executable replaces the
   * foreground app unless it already is the foreground app; a static
   * page gets (or reuses) its own file server.
   */
  async liveLaunch(ref: number | string): Promise<LiveLaunchResult> {
    const entry = this.findEntry(ref);
    const base = { shortId: entry.shortId, kind: entry.kind };

    if (entry.kind === 'static') {
      const port = await this.deps.statics.getOrStart(entry.primaryPath);
      return { ...base, url: `http://localhost:${port}`, reused: false };
    }

    const status = this.deps.supervisor.status();
    if (status.running && status.path === entry.primaryPath) {
      log.info('app already in foreground', { shortId: entry.shortId, url: status.url });
      return { ...base, url: status.url, reused: true };
    }

    const url = await this.deps.supervisor.launch(entry.primaryPath, entry.port ?? PORTS.APP_DEFAULT);
    return { ...base, url, reused: false };
  }

  liveStop(): Promise<StopOutcome> {
    return this.deps.supervisor.stop();
  }

  async liveStatus(): Promise<LiveStatus> {
    return { foreground: this.deps.supervisor.status(), staticServers: await this.deps.statics.list() };
  }

  async freeAllResources(): Promise<FreeResult> {
    const foreground = await this.deps.supervisor.stop();
    const staticServersStopped = await this.deps.statics.stopAll();
    const count = staticServersStopped + (foreground.status === 'not_running' ? 0 : 1);
    log.info('resources freed', { count });
    return { foreground, staticServersStopped, count };
  }

  /**
   * Every entry, with preview paths that point at deleted files cleared.
   */
  listEntries(): CatalogEntry[] {
    const { store } = this.deps;
    let cleared = 0;
    for (const entry of store.getAll()) {
      if (entry.previewPath && !fs.existsSync(entry.previewPath)) {
        store.setPreviewPath(entry.id, null);
        cleared++;
      }
    }
    if (cleared > 0) log.info('cleared missing preview paths', { count: cleared });
    return store.getAll();
  }

  sweepMissing(): number {
    return this.deps.store.removeIfMissing();
  }

  async removeEntry(ref: number | string): Promise<CatalogEntry> {
    const entry = this.findEntry(ref);
    await this.releaseLive(entry);
    this.deps.store.removeById(entry.id);
    return entry;
  }

  async removeFolder(folderPath: string): Promise<number> {
    for (const entry of this.deps.store.getAll().filter((e) => e.folderPath === folderPath)) {
      await this.releaseLive(entry);
    }
    return this.deps.store.removeByFolder(folderPath);
  }

  /** Stop everything and empty the catalog. */
  async purge(): Promise<number> {
    await this.freeAllResources();
    const removed = this.deps.store.removeAll();
    log.info('catalog purged', { removed });
    return removed;
  }

  async shutdown(): Promise<void> {
    const { count } = await this.freeAllResources();
    log.info('shutdown complete', { stopped: count });
  }

  private async releaseLive(entry: CatalogEntry): Promise<void> {
    if (entry.kind === 'static') {
      await this.deps.statics.stop(entry.primaryPath);
      return;
    }
    const status = this.deps.supervisor.status();
    if (status.running && status.path === entry.primaryPath) await this.deps.supervisor.stop();
  }

  private afterScan(result: DiscoveryBatchResult): void {
    const ids = new Set(result.persisted.map((d) => d.entryId).filter((id): id is number => id !== undefined));
    const { enrichment } = this.deps;

    if (enrichment?.isEnabled()) {
      for (const id of ids) {
        if (!this.deps.store.getById(id)?.enriched) enrichment.enrich(id);
      }
    }

    if (!this.deps.autoCapture) return;
    const pending = this.deps.store.entriesNeedingPreview().filter((e) => ids.has(e.id));
    if (pending.length === 0) return;
    const { batchId } = this.deps.capture.start(pending.map(toCaptureItem));
    log.info('auto capture queued', { rootDir: result.rootDir, count: pending.length, batch: batchId });
  }
}
