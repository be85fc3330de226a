/**
 * Process Service
 *
 * Spawning and tearing down app processes. Shared by the foreground
 * supervisor and the preview capture worker.
 */

import * as fs from 'fs';
import { spawn, type ChildProcess } from 'child_process';
import { IndexerError } from '../errors';
import { errorMessage } from '../../../shared/logger';
import { withTimeout } from '../utils';

// Captured output kept per process; older bytes are dropped first
const MAX_CAPTURED_BYTES = 64 * 1024;

// Wait for stdio to flush after exit before reading captured output
const OUTPUT_FLUSH_MS = 1000;

export interface ExitInfo {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface LaunchedApp {
  child: ChildProcess;
  pid: number;
  scriptPath: string;
  port: number;
  /** Resolves once the process has exited */
  exited: Promise<ExitInfo>;
  hasExited(): boolean;
  /** Captured stdout then stderr; empty unless spawned with captureOutput */
  output(): Promise<{ stdout: string; stderr: string }>;
}

export interface SpawnAppOptions {
  interpreter: string;
  port: number;
  cwd: string;
  captureOutput?: boolean;
  /** Environment the minimal app environment is derived from */
  sourceEnv?: NodeJS.ProcessEnv;
}

export type TerminateOutcome = 'already_exited' | 'terminated' | 'killed';

/**
 * Minimal, explicit environment for launched apps.
 * Only PATH, interpreter search path, HOME, USER and PORT cross over.
 */
export function buildAppEnv(port: number, source: NodeJS.ProcessEnv = process.env): Record<string, string> {
  return {
    PORT: String(port),
    FLASK_DEBUG: '0',
    PATH: source.PATH ?? '',
    PYTHONPATH: source.PYTHONPATH ?? '',
    HOME: source.HOME ?? '',
    USER: source.USER ?? '',
  };
}

class OutputBuffer {
  private chunks: Buffer[] = [];
  private size = 0;

  push(chunk: Buffer): void {
    this.chunks.push(chunk);
    this.size += chunk.length;
    while (this.size > MAX_CAPTURED_BYTES && this.chunks.length > 1) {
      const dropped = this.chunks.shift();
      this.size -= dropped?.length ?? 0;
    }
  }

  toString(): string {
    return Buffer.concat(this.chunks).toString('utf8');
  }
}

/**
 * Start `interpreter scriptPath` in its own process group.
 * Resolves once the OS reports the process spawned; spawn errors and a
 * missing script reject with an IndexerError.
 */
export async function spawnApp(scriptPath: string, options: SpawnAppOptions): Promise<LaunchedApp> {
  if (!fs.existsSync(scriptPath)) {
    throw new IndexerError('not_found', `Script not found: ${scriptPath}`);
  }
  fs.mkdirSync(options.cwd, { recursive: true });

  const child = spawn(options.interpreter, [scriptPath], {
    cwd: options.cwd,
    env: buildAppEnv(options.port, options.sourceEnv),
    stdio: options.captureOutput ? ['ignore', 'pipe', 'pipe'] : 'ignore',
    detached: process.platform !== 'win32',
  });

  const stdout = new OutputBuffer();
  const stderr = new OutputBuffer();
  child.stdout?.on('data', (d: Buffer) => stdout.push(d));
  child.stderr?.on('data', (d: Buffer) => stderr.push(d));

  const exited = new Promise<ExitInfo>((resolve) => {
    child.once('exit', (code, signal) => resolve({ code, signal }));
  });
  const closed = new Promise<void>((resolve) => {
    child.once('close', () => resolve());
  });

  try {
    await new Promise<void>((resolve, reject) => {
      child.once('spawn', () => resolve());
      child.once('error', reject);
    });
  } catch (e) {
    throw new IndexerError('spawn_failed', `Failed to start ${scriptPath}: ${errorMessage(e)}`);
  }

  const pid = child.pid;
  if (pid === undefined) {
    throw new IndexerError('spawn_failed', `Failed to start ${scriptPath}: no pid assigned`);
  }

  return {
    child,
    pid,
    scriptPath,
    port: options.port,
    exited,
    hasExited: () => child.exitCode !== null || child.signalCode !== null,
    output: async () => {
      await withTimeout(closed, OUTPUT_FLUSH_MS, undefined);
      return { stdout: stdout.toString(), stderr: stderr.toString() };
    },
  };
}

/**
 * Signal the app's whole process group, falling back to the child alone.
 */
function signalApp(app: LaunchedApp, signal: NodeJS.Signals): void {
  if (process.platform !== 'win32') {
    try {
      process.kill(-app.pid, signal);
      return;
    } catch {
      // Group already gone; the direct kill below reports nothing either
    }
  }
  app.child.kill(signal);
}

/**
 * Bounded terminate: SIGTERM, wait up to `graceMs` for exit, then SIGKILL.
 */
export async function terminateProcess(app: LaunchedApp, graceMs: number): Promise<TerminateOutcome> {
  if (app.hasExited()) return 'already_exited';

  signalApp(app, 'SIGTERM');
  const exitedInTime = await withTimeout(app.exited.then(() => true), graceMs, false);
  if (exitedInTime) return 'terminated';

  signalApp(app, 'SIGKILL');
  await withTimeout(app.exited, graceMs, null);
  return 'killed';
}

/**
 * Diagnostic for an app that quit during its settle delay.
 */
export async function describeEarlyExit(app: LaunchedApp): Promise<string> {
  const info = await app.exited;
  const { stdout, stderr } = await app.output();
  const status = info.signal ? `signal ${info.signal}` : `exit code ${info.code}`;
  return `App failed to start (${status})\nSTDOUT: ${stdout.trim()}\nSTDERR: ${stderr.trim()}`;
}
