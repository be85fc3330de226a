/**
 * Discovery Service
 *
 * Scan pipeline: find_executables → find_static → persist, run as one
 * batch on a single worker. Stage two excludes pages stage one claimed
 * as companions; persist sees both result sets. The batch total is
 * published once, after find_static, and stays fixed.
 */

import * as path from 'path';
import { createLogger, errorMessage } from '../../../shared/logger';
import { BatchQueue, type Batch } from './batch-queue';
import type { CatalogStore, NewCatalogEntry } from './catalog.service';
import {
  extractDependencies,
  fileMetadata,
  findExecutables,
  findStaticPages,
  hasMissingDependencies,
  primaryPathOf,
  type AppDescriptor,
  type ExecutableDescriptor,
  type StaticDescriptor,
} from './detection.service';
import { JobProgress, type JobState } from './job-progress';

const log = createLogger('discovery');

export type DiscoveryTaskType = 'find_executables' | 'find_static' | 'persist';

export interface DiscoveryTask {
  type: DiscoveryTaskType;
  rootDir: string;
}

export const DISCOVERY_PHASES: Record<DiscoveryTaskType, string> = {
  find_executables: 'finding_executables',
  find_static: 'finding_static',
  persist: 'saving_database',
};

export const PHASE_DESCRIPTIONS: Record<string, string> = {
  initializing: 'Initializing scan...',
  finding_executables: 'Finding executable web apps...',
  finding_static: 'Finding standalone pages...',
  saving_database: 'Saving items to database...',
  idle: 'Idle',
};

export interface DiscoveryBatchResult {
  rootDir: string;
  executables: ExecutableDescriptor[];
  statics: StaticDescriptor[];
  /** Persisted descriptors, each carrying its short id and entry id */
  persisted: AppDescriptor[];
}

interface WorkingSet {
  rootDir: string;
  executables: ExecutableDescriptor[];
  statics: StaticDescriptor[];
  persisted: AppDescriptor[];
}

export type BatchCompleteListener = (result: DiscoveryBatchResult) => void;

function toCatalogEntry(d: AppDescriptor): NewCatalogEntry {
  const primaryPath = primaryPathOf(d);
  const folderPath = path.dirname(primaryPath);
  const meta = fileMetadata(primaryPath);

  if (d.kind === 'executable') {
    const dependencies = extractDependencies(d.scriptPath);
    return {
      kind: 'executable',
      name: d.name,
      folderPath,
      primaryPath,
      interfacePath: d.interfacePath,
      port: d.port,
      fileSize: meta.fileSize,
      lastModified: meta.lastModified,
      dependencies,
      missingDependencies: hasMissingDependencies(dependencies, folderPath),
    };
  }
  return {
    kind: 'static',
    name: d.name,
    folderPath,
    primaryPath,
    fileSize: meta.fileSize,
    lastModified: meta.lastModified,
    dependencies: null,
  };
}

export class DiscoveryQueue {
  readonly progress: JobProgress;
  private readonly queue: BatchQueue<DiscoveryTask>;
  private readonly working = new Map<number, WorkingSet>();
  private readonly listeners: BatchCompleteListener[] = [];

  constructor(private readonly store: CatalogStore, now?: () => Date) {
    this.progress = new JobProgress('discovery', now);
    this.queue = new BatchQueue<DiscoveryTask>('discovery-queue', {
      onBatchStart: (batch) => this.beginBatch(batch),
      runTask: (task, batch) => this.runTask(task, batch),
      onBatchEnd: (batch) => this.endBatch(batch),
    });
  }

  /**
   * Queue a scan of `rootDir`. Returns at once; progress is polled.
   */
  start(rootDir: string): { status: 'started'; rootDir: string; batchId: number } {
    const resolved = path.resolve(rootDir);
    const batchId = this.queue.enqueue([
      { type: 'find_executables', rootDir: resolved },
      { type: 'find_static', rootDir: resolved },
      { type: 'persist', rootDir: resolved },
    ]);
    log.info('scan queued', { rootDir: resolved, batch: batchId });
    return { status: 'started', rootDir: resolved, batchId };
  }

  onBatchComplete(listener: BatchCompleteListener): void {
    this.listeners.push(listener);
  }

  snapshot(): JobState {
    return this.progress.snapshot();
  }

  drained(): Promise<void> {
    return this.queue.drained();
  }

  private beginBatch(batch: Batch<DiscoveryTask>): void {
    const rootDir = batch.tasks[0]?.rootDir ?? '';
    this.working.set(batch.id, { rootDir, executables: [], statics: [], persisted: [] });
    this.progress.channel.emit('batch-start', { total: 0 });
  }

  private async runTask(task: DiscoveryTask, batch: Batch<DiscoveryTask>): Promise<void> {
    const set = this.working.get(batch.id);
    if (!set) return;

    const { channel } = this.progress;
    channel.emit('phase', { phase: DISCOVERY_PHASES[task.type] });
    const started = Date.now();

    try {
      switch (task.type) {
        case 'find_executables':
          set.executables = findExecutables(task.rootDir);
          log.info('found executable apps', { count: set.executables.length });
          break;
        case 'find_static':
          set.statics = findStaticPages(task.rootDir, set.executables);
          log.info('found standalone pages', { count: set.statics.length });
          channel.emit('total', { total: set.executables.length + set.statics.length });
          break;
        case 'persist':
          this.persist(set);
          break;
      }
      channel.emit('result', {
        key: task.type,
        outcome: { success: true, error: null, duration: (Date.now() - started) / 1000 },
      });
    } catch (e) {
      log.error('scan task failed', { task: task.type, error: errorMessage(e) });
      channel.emit('result', {
        key: task.type,
        outcome: { success: false, error: errorMessage(e), duration: (Date.now() - started) / 1000 },
      });
    }
  }

  private persist(set: WorkingSet): void {
    const { channel } = this.progress;
    for (const d of [...set.executables, ...set.statics]) {
      const primaryPath = primaryPathOf(d);
      channel.emit('item-start', { key: primaryPath, label: d.name });
      try {
        const saved = this.store.upsert(toCatalogEntry(d));
        d.shortId = saved.shortId;
        d.entryId = saved.id;
        set.persisted.push(d);
      } catch (e) {
        log.error('could not save entry', { path: primaryPath, error: errorMessage(e) });
        channel.emit('result', { key: `save:${primaryPath}`, outcome: { success: false, error: errorMessage(e), duration: 0 } });
      }
      channel.emit('advance', {});
    }
    log.info('saved scan results', { saved: set.persisted.length });
  }

  private endBatch(batch: Batch<DiscoveryTask>): void {
    const set = this.working.get(batch.id);
    this.working.delete(batch.id);
    this.progress.channel.emit('batch-end', {});
    if (!set) return;

    const result: DiscoveryBatchResult = {
      rootDir: set.rootDir,
      executables: set.executables,
      statics: set.statics,
      persisted: set.persisted,
    };
    for (const listener of this.listeners) {
      try {
        listener(result);
      } catch (e) {
        log.error('batch-complete listener failed', { error: errorMessage(e) });
      }
    }
  }
}
