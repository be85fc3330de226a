/**
 * Indexer Configuration
 *
 * Constants and paths for the catalog/preview/launch service, plus
 * environment overrides validated with zod.
 */

import * as path from 'path';
import { z } from 'zod';
import { PORTS, PROCESS_TIMINGS, SCREENSHOT_SIZE, SHELF_DIR } from '../../shared/constants';

// Directories never descended into while scanning
export const EXCLUDED_DIRS = new Set([
  '.venv',
  'venv',
  'site-packages',
  'node_modules',
  '__pycache__',
  '.git',
]);

// Conventional companion page locations, in order of preference
export const COMPANION_CANDIDATES = [
  'index.html',
  'templates/index.html',
  'static/index.html',
  'public/index.html',
  'frontend/index.html',
] as const;

// Imports that say nothing about an app's dependencies
export const STDLIB_MODULES = new Set(['os', 'sys', 'json', 'time', 'datetime', 'pathlib']);

const msSetting = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

const envSchema = z.object({
  SHELF_PORT: z.coerce.number().int().min(1).max(65535).default(PORTS.INDEXER),
  SHELF_HOST: z.string().default('127.0.0.1'),
  SHELF_DATA_DIR: z.string().default(SHELF_DIR),
  SHELF_DB_PATH: z.string().optional(),
  PYTHON_BIN: z.string().default('python3'),
  CHROME_PATH: z.string().optional(),
  ENRICH_URL: z.string().url().optional(),
  ENRICH_MODEL: z.string().default('llama3.1'),
  AUTO_CAPTURE: z
    .enum(['0', '1', 'true', 'false'])
    .default('1')
    .transform((v) => v === '1' || v === 'true'),
  LAUNCH_SETTLE_MS: msSetting(PROCESS_TIMINGS.LAUNCH_SETTLE_MS),
  CAPTURE_SETTLE_MS: msSetting(PROCESS_TIMINGS.CAPTURE_SETTLE_MS),
  EXECUTABLE_RENDER_MS: msSetting(PROCESS_TIMINGS.EXECUTABLE_RENDER_MS),
  STATIC_RENDER_MS: msSetting(PROCESS_TIMINGS.STATIC_RENDER_MS),
  TERMINATE_GRACE_MS: msSetting(PROCESS_TIMINGS.TERMINATE_GRACE_MS),
  STATIC_LISTEN_TIMEOUT_MS: msSetting(PROCESS_TIMINGS.STATIC_LISTEN_TIMEOUT_MS),
});

export interface Timings {
  launchSettleMs: number;
  captureSettleMs: number;
  executableRenderMs: number;
  staticRenderMs: number;
  terminateGraceMs: number;
  staticListenTimeoutMs: number;
}

export interface IndexerConfig {
  port: number;
  host: string;
  dataDir: string;
  dbPath: string;
  previewsDir: string;
  /** Working directory handed to every launched app */
  scratchDir: string;
  interpreter: string;
  chromePath?: string;
  enrichUrl?: string;
  enrichModel: string;
  autoCapture: boolean;
  timings: Timings;
  screenshot: { width: number; height: number };
}

/**
 * Build the service config from environment variables.
 * Throws with every offending variable listed when validation fails.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): IndexerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;
  const dataDir = path.resolve(e.SHELF_DATA_DIR);

  return {
    port: e.SHELF_PORT,
    host: e.SHELF_HOST,
    dataDir,
    dbPath: e.SHELF_DB_PATH ?? path.join(dataDir, 'catalog.db'),
    previewsDir: path.join(dataDir, 'previews'),
    scratchDir: path.join(dataDir, 'apps-debris'),
    interpreter: e.PYTHON_BIN,
    chromePath: e.CHROME_PATH,
    enrichUrl: e.ENRICH_URL,
    enrichModel: e.ENRICH_MODEL,
    autoCapture: e.AUTO_CAPTURE,
    timings: {
      launchSettleMs: e.LAUNCH_SETTLE_MS,
      captureSettleMs: e.CAPTURE_SETTLE_MS,
      executableRenderMs: e.EXECUTABLE_RENDER_MS,
      staticRenderMs: e.STATIC_RENDER_MS,
      terminateGraceMs: e.TERMINATE_GRACE_MS,
      staticListenTimeoutMs: e.STATIC_LISTEN_TIMEOUT_MS,
    },
    screenshot: { ...SCREENSHOT_SIZE },
  };
}
