/**
 * Foreground Supervisor
 *
 * Owns the single foreground app slot. Replacing is destructive then
 * constructive: the old process is fully torn down before the new one
 * is recorded. launch and stop are serialized by a promise mutex;
 * status reads a single immutable record.
 */

import type { Timings } from '../config';
import { createLogger, errorMessage } from '../../../shared/logger';
import { IndexerError } from '../errors';
import { Mutex, sleep as defaultSleep } from '../utils';
import { spawnApp, terminateProcess, type LaunchedApp } from './process.service';

const log = createLogger('supervisor');

export interface RunningProcess {
  readonly app: LaunchedApp;
  readonly path: string;
  readonly url: string;
  readonly port: number;
  readonly startedAt: string;
}

export type SupervisorStatus =
  | { running: true; path: string; url: string; pid: number; port: number; startedAt: string }
  | { running: false };

export type StopOutcome =
  | { status: 'stopped' | 'killed'; path: string }
  | { status: 'not_running' };

export interface SupervisorOptions {
  interpreter: string;
  scratchDir: string;
  timings: Pick<Timings, 'launchSettleMs' | 'terminateGraceMs'>;
  /** True while another owner (a preview capture) holds `port` */
  portBusy?: (port: number) => boolean;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export class ForegroundSupervisor {
  private current: RunningProcess | null = null;
  /** Ports of launches that are queued or starting, with a count per port */
  private readonly reserved = new Map<number, number>();
  private readonly mutex = new Mutex();
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(private readonly options: SupervisorOptions) {
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Replace whatever is running with `scriptPath` on `port`.
   * Resolves with the app URL once the settle delay has passed.
   */
  launch(scriptPath: string, port: number): Promise<string> {
    this.reserve(port);
    return this.mutex
      .runExclusive(async () => {
        if (this.options.portBusy?.(port)) {
          throw new IndexerError('port_conflict', `port ${port} is in use by a preview capture`);
        }
        await this.teardown();

        const app = await spawnApp(scriptPath, {
          interpreter: this.options.interpreter,
          port,
          cwd: this.options.scratchDir,
        });
        const record: RunningProcess = Object.freeze({
          app,
          path: scriptPath,
          url: `http://localhost:${port}`,
          port,
          startedAt: this.now().toISOString(),
        });
        this.current = record;
        log.info('foreground app started', { path: scriptPath, pid: app.pid, port });

        app.exited
          .then((info) => {
            if (this.current !== record) return;
            this.current = null;
            log.info('foreground app exited on its own', { path: scriptPath, code: info.code, signal: info.signal });
          })
          .catch((e) => log.error('exit watcher failed', { error: errorMessage(e) }));

        await this.sleep(this.options.timings.launchSettleMs);

        if (app.hasExited()) {
          throw new IndexerError('app_exited', `App exited during startup: ${scriptPath}`);
        }
        return record.url;
      })
      .finally(() => this.release(port));
  }

  status(): SupervisorStatus {
    const record = this.current;
    if (!record) return { running: false };
    return {
      running: true,
      path: record.path,
      url: record.url,
      pid: record.app.pid,
      port: record.port,
      startedAt: record.startedAt,
    };
  }

  /**
   * True when the foreground app holds `port` or a launch on it is queued.
   * Reservations are taken synchronously in launch(), so a capture asking
   * afterwards always sees them.
   */
  holdsPort(port: number): boolean {
    return this.current?.port === port || this.reserved.has(port);
  }

  stop(): Promise<StopOutcome> {
    return this.mutex.runExclusive(() => this.teardown());
  }

  private reserve(port: number): void {
    this.reserved.set(port, (this.reserved.get(port) ?? 0) + 1);
  }

  private release(port: number): void {
    const count = (this.reserved.get(port) ?? 0) - 1;
    if (count > 0) this.reserved.set(port, count);
    else this.reserved.delete(port);
  }

  private async teardown(): Promise<StopOutcome> {
    const record = this.current;
    if (!record) return { status: 'not_running' };

    const outcome = await terminateProcess(record.app, this.options.timings.terminateGraceMs);
    if (this.current === record) this.current = null;
    log.info('foreground app stopped', { path: record.path, outcome });

    return { status: outcome === 'killed' ? 'killed' : 'stopped', path: record.path };
  }
}
