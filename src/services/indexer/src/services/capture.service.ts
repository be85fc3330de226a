/**
 * Preview Capture Service
 *
 * Sequential worker that renders each queued entry in a shared headless
 * browser and saves a screenshot. Executable entries run in a disposable
 * process that is always torn down after the item, success or not. The
 * browser is started on the first item and closed when the queue drains.
 */

import * as fs from 'fs';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { PORTS, type EntryKind } from '../../../shared/constants';
import { createLogger, errorMessage } from '../../../shared/logger';
import type { Timings } from '../config';
import { sleep as defaultSleep } from '../utils';
import { BatchQueue, type Batch } from './batch-queue';
import type { BrowserFactory, PreviewBrowser } from './browser.service';
import type { CatalogStore } from './catalog.service';
import {
  JobProgress,
  estimateEtaSeconds,
  progressPercentage,
  recentErrors,
  type CurrentItem,
  type JobState,
} from './job-progress';
import { describeEarlyExit, spawnApp, terminateProcess, type LaunchedApp } from './process.service';
import { previewFileName } from './short-id';

const log = createLogger('capture');

export const CAPTURE_PHASE = 'capturing';

export interface CaptureItem {
  kind: EntryKind;
  name: string;
  primaryPath: string;
  shortId: string;
  /** Declared port of an executable entry */
  port: number | null;
}

export interface CaptureError {
  key: string;
  name: string;
  kind: EntryKind | 'unknown';
  error: string;
}

export interface PreviewSnapshot extends JobState {
  isProcessing: boolean;
  progressPercentage: number;
  etaSeconds: number;
  currentItem: CurrentItem | null;
  recentErrors: CaptureError[];
  queuedBatches: number;
}

export interface CaptureQueueOptions {
  store: CatalogStore;
  browserFactory: BrowserFactory;
  previewsDir: string;
  scratchDir: string;
  interpreter: string;
  timings: Pick<Timings, 'captureSettleMs' | 'executableRenderMs' | 'staticRenderMs' | 'terminateGraceMs'>;
  /** True while the foreground app holds `port` or is about to */
  portReserved?: (port: number) => boolean;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export function captureKey(item: Pick<CaptureItem, 'kind' | 'primaryPath'>): string {
  return `${item.kind}:${item.primaryPath}`;
}

export class PreviewCaptureQueue {
  readonly progress: JobProgress;
  private readonly queue: BatchQueue<CaptureItem>;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly labels = new Map<string, CaptureItem>();
  private browser: Promise<PreviewBrowser> | null = null;
  private busyPort: number | null = null;

  constructor(private readonly options: CaptureQueueOptions) {
    this.sleep = options.sleep ?? defaultSleep;
    this.progress = new JobProgress('capture', options.now);
    this.queue = new BatchQueue<CaptureItem>('capture-queue', {
      onBatchStart: (batch) => this.beginBatch(batch),
      runTask: (item) => this.runItem(item),
      onBatchEnd: () => this.progress.channel.emit('batch-end', {}),
      onIdle: () => this.closeBrowser(),
    });
  }

  /**
   * Queue a capture batch. Returns at once; failures show up in the snapshot.
   */
  start(items: CaptureItem[]): { status: 'started'; count: number; batchId: number } {
    const batchId = this.queue.enqueue(items);
    return { status: 'started', count: items.length, batchId };
  }

  /** Port a capture process currently holds, if any. */
  activePort(): number | null {
    return this.busyPort;
  }

  drained(): Promise<void> {
    return this.queue.drained();
  }

  snapshot(): PreviewSnapshot {
    const state = this.progress.snapshot();
    return {
      ...state,
      isProcessing: this.progress.isActive(),
      progressPercentage: progressPercentage(state),
      etaSeconds: estimateEtaSeconds(state),
      currentItem: state.current,
      recentErrors: recentErrors(state).map((e) => {
        const item = this.labels.get(e.key);
        return { key: e.key, name: item?.name ?? 'Unknown', kind: item?.kind ?? 'unknown', error: e.error };
      }),
      queuedBatches: this.queue.pendingBatches(),
    };
  }

  private beginBatch(batch: Batch<CaptureItem>): void {
    this.labels.clear();
    for (const item of batch.tasks) this.labels.set(captureKey(item), item);
    this.progress.channel.emit('batch-start', { total: batch.tasks.length });
    this.progress.channel.emit('phase', { phase: CAPTURE_PHASE });
    log.info('capture batch started', { batch: batch.id, items: batch.tasks.length });
  }

  private async runItem(item: CaptureItem): Promise<void> {
    const { channel } = this.progress;
    const key = captureKey(item);
    const started = Date.now();
    channel.emit('item-start', { key, label: item.name });

    try {
      if (item.kind === 'executable') await this.captureExecutable(item);
      else await this.captureStatic(item);

      const duration = (Date.now() - started) / 1000;
      channel.emit('result', { key, outcome: { success: true, error: null, duration } });
      log.info('preview captured', { item: item.name, shortId: item.shortId, duration });
    } catch (e) {
      const duration = (Date.now() - started) / 1000;
      channel.emit('result', { key, outcome: { success: false, error: errorMessage(e), duration } });
      log.warn('preview capture failed', { item: item.name, shortId: item.shortId, error: errorMessage(e) });
    }
    channel.emit('advance', {});
  }

  private async captureExecutable(item: CaptureItem): Promise<void> {
    const { timings } = this.options;
    const port = item.port ?? PORTS.APP_DEFAULT;
    if (this.options.portReserved?.(port)) {
      throw new Error(`port ${port} is in use by the foreground app`);
    }
    // Claimed before the spawn so a live launch sees it from here on
    this.busyPort = port;

    let app: LaunchedApp | null = null;
    try {
      app = await spawnApp(item.primaryPath, {
        interpreter: this.options.interpreter,
        port,
        cwd: this.options.scratchDir,
        captureOutput: true,
      });
      await this.sleep(timings.captureSettleMs);
      if (app.hasExited()) {
        throw new Error(await describeEarlyExit(app));
      }
      const outputPath = this.outputPathFor(item);
      const browser = await this.getBrowser();
      const { title } = await browser.capture(`http://localhost:${port}`, {
        renderDelayMs: timings.executableRenderMs,
        outputPath,
      });
      log.debug('page rendered', { item: item.name, title });
      this.recordPreview(item, outputPath);
    } finally {
      if (app) {
        const outcome = await terminateProcess(app, timings.terminateGraceMs);
        log.debug('capture process stopped', { item: item.name, pid: app.pid, outcome });
      }
      this.busyPort = null;
    }
  }

  private async captureStatic(item: CaptureItem): Promise<void> {
    if (!fs.existsSync(item.primaryPath)) {
      throw new Error(`Page does not exist: ${item.primaryPath}`);
    }
    const outputPath = this.outputPathFor(item);
    const browser = await this.getBrowser();
    const { title } = await browser.capture(pathToFileURL(item.primaryPath).href, {
      renderDelayMs: this.options.timings.staticRenderMs,
      outputPath,
    });
    log.debug('page rendered', { item: item.name, title });
    this.recordPreview(item, outputPath);
  }

  private outputPathFor(item: CaptureItem): string {
    fs.mkdirSync(this.options.previewsDir, { recursive: true });
    return path.join(this.options.previewsDir, previewFileName(item.shortId));
  }

  private recordPreview(item: CaptureItem, outputPath: string): void {
    if (!fs.existsSync(outputPath)) {
      throw new Error(`Screenshot was not written: ${outputPath}`);
    }
    const entry = this.options.store.getByPrimaryOrInterfacePath(item.primaryPath);
    if (!entry) {
      log.warn('no catalog entry for captured item', { path: item.primaryPath });
      return;
    }
    this.options.store.setPreviewPath(entry.id, outputPath);
  }

  private getBrowser(): Promise<PreviewBrowser> {
    if (!this.browser) {
      const starting = this.options.browserFactory();
      this.browser = starting;
      starting.catch(() => {
        if (this.browser === starting) this.browser = null;
      });
    }
    return this.browser;
  }

  private async closeBrowser(): Promise<void> {
    const current = this.browser;
    this.browser = null;
    if (!current) return;
    try {
      await (await current).close();
    } catch (e) {
      log.warn('browser did not close cleanly', { error: errorMessage(e) });
    }
  }
}
