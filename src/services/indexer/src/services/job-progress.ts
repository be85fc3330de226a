/**
 * Job Progress
 *
 * Holder for one job's state. Workers never touch the state directly:
 * they emit events on the progress channel and the holder applies them.
 * Readers get deep-copied snapshots.
 */

import { EventEmitter } from 'events';
import { createLogger, type Logger } from '../../../shared/logger';

export interface ItemOutcome {
  success: boolean;
  error: string | null;
  /** Seconds */
  duration: number;
}

export interface CurrentItem {
  key: string;
  label: string;
  startedAt: string;
}

export interface JobState {
  phase: string;
  total: number;
  completed: number;
  results: Record<string, ItemOutcome>;
  current: CurrentItem | null;
  startedAt: string | null;
  finishedAt: string | null;
}

export interface ProgressEvents {
  'batch-start': { total: number };
  phase: { phase: string };
  total: { total: number };
  'item-start': { key: string; label: string };
  result: { key: string; outcome: ItemOutcome };
  advance: Record<string, never>;
  'batch-end': Record<string, never>;
}

export type ProgressEvent = keyof ProgressEvents;

export const IDLE_PHASE = 'idle';

/**
 * Typed wrapper over EventEmitter for progress events.
 */
export class ProgressChannel {
  private readonly emitter = new EventEmitter();

  emit<E extends ProgressEvent>(event: E, payload: ProgressEvents[E]): void {
    this.emitter.emit(event, payload);
  }

  on<E extends ProgressEvent>(event: E, listener: (payload: ProgressEvents[E]) => void): () => void {
    this.emitter.on(event, listener);
    return () => this.emitter.off(event, listener);
  }
}

function emptyState(): JobState {
  return {
    phase: IDLE_PHASE,
    total: 0,
    completed: 0,
    results: {},
    current: null,
    startedAt: null,
    finishedAt: null,
  };
}

export class JobProgress {
  readonly channel = new ProgressChannel();
  private state: JobState = emptyState();
  private readonly log: Logger;

  constructor(name: string, private readonly now: () => Date = () => new Date()) {
    this.log = createLogger(`${name}-progress`);

    this.channel.on('batch-start', ({ total }) => {
      this.state = { ...emptyState(), phase: 'initializing', total, startedAt: this.now().toISOString() };
    });
    this.channel.on('phase', ({ phase }) => {
      this.state.phase = phase;
    });
    this.channel.on('total', ({ total }) => {
      if (total < this.state.total || total < this.state.completed) {
        this.log.warn('ignored shrinking total', { total, current: this.state.total, completed: this.state.completed });
        return;
      }
      this.state.total = total;
    });
    this.channel.on('item-start', ({ key, label }) => {
      this.state.current = { key, label, startedAt: this.now().toISOString() };
    });
    this.channel.on('result', ({ key, outcome }) => {
      this.state.results[key] = { ...outcome };
    });
    this.channel.on('advance', () => {
      if (this.state.completed >= this.state.total) {
        this.log.warn('completed would pass total', { completed: this.state.completed, total: this.state.total });
        return;
      }
      this.state.completed += 1;
    });
    this.channel.on('batch-end', () => {
      this.state.phase = IDLE_PHASE;
      this.state.current = null;
      this.state.finishedAt = this.now().toISOString();
    });
  }

  snapshot(): JobState {
    return structuredClone(this.state);
  }

  /** True from batch-start until batch-end. */
  isActive(): boolean {
    return this.state.phase !== IDLE_PHASE;
  }
}

export const RECENT_ERROR_LIMIT = 5;
const ERROR_TEXT_LIMIT = 100;

export interface RecentError {
  key: string;
  error: string;
}

/** Completed share of total, one decimal place. */
export function progressPercentage(state: Pick<JobState, 'total' | 'completed'>): number {
  if (state.total <= 0) return 0;
  return Math.round((state.completed / state.total) * 1000) / 10;
}

/**
 * Mean duration of successful items times the items still to go, in whole seconds.
 */
export function estimateEtaSeconds(state: Pick<JobState, 'total' | 'completed' | 'results'>): number {
  const durations = Object.values(state.results)
    .filter((r) => r.success)
    .map((r) => r.duration);
  if (state.completed === 0 || durations.length === 0) return 0;

  const mean = durations.reduce((sum, d) => sum + d, 0) / durations.length;
  return Math.round(mean * Math.max(state.total - state.completed, 0));
}

export function truncateError(text: string): string {
  return text.length > ERROR_TEXT_LIMIT ? `${text.slice(0, ERROR_TEXT_LIMIT)}...` : text;
}

/** The latest failures, oldest first, with their text shortened. */
export function recentErrors(state: Pick<JobState, 'results'>, limit = RECENT_ERROR_LIMIT): RecentError[] {
  return Object.entries(state.results)
    .filter(([, r]) => !r.success && r.error)
    .slice(-limit)
    .map(([key, r]) => ({ key, error: truncateError(r.error ?? '') }));
}
