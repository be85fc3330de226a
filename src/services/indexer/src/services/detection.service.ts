/**
 * Detection Service
 *
 * Finds launchable web apps (a script plus a companion page) and
 * standalone pages under a root directory, and reads the file metadata
 * stored with each catalog entry.
 */

import * as path from 'path';
import { PORTS } from '../../../shared/constants';
import { createLogger } from '../../../shared/logger';
import { COMPANION_CANDIDATES, STDLIB_MODULES } from '../config';
import { safeReadFile, safeStat, walkFiles } from '../utils';

const log = createLogger('detection');

export type Framework = 'flask' | 'django' | 'unknown';

export interface ScriptInfo {
  scriptPath: string;
  port: number;
  framework: Framework;
  name: string;
}

export interface ExecutableDescriptor extends ScriptInfo {
  kind: 'executable';
  interfacePath: string;
  /** Filled in once the descriptor is persisted */
  shortId?: string;
  entryId?: number;
}

export interface StaticDescriptor {
  kind: 'static';
  pagePath: string;
  name: string;
  shortId?: string;
  entryId?: number;
}

export type AppDescriptor = ExecutableDescriptor | StaticDescriptor;

export interface FileMetadata {
  fileSize: number;
  lastModified: string | null;
}

const SERVER_START = /app\.run\(/;
const DECLARED_PORT = /app\.run\(.*?port\s*=\s*(\d+)/;
const MAIN_GUARD = 'if __name__ == "__main__":';

export function primaryPathOf(d: AppDescriptor): string {
  return d.kind === 'executable' ? d.scriptPath : d.pagePath;
}

/**
 * File stem as a display name: `weather_dash.py` → `Weather Dash`.
 */
export function displayName(filePath: string): string {
  const stem = path.basename(filePath, path.extname(filePath)).replace(/_/g, ' ');
  return stem.toLowerCase().replace(/(^|[^a-z])([a-z])/g, (_m, before: string, ch: string) => before + ch.toUpperCase());
}

/**
 * Decide whether a script is a launchable web app.
 * Needs a server-start call; a `main()` without the main guard is a utility script.
 */
export function inspectScript(scriptPath: string): ScriptInfo | null {
  const content = safeReadFile(scriptPath);
  if (content === null) {
    log.warn('could not read script', { path: scriptPath });
    return null;
  }
  if (!SERVER_START.test(content)) return null;
  if (content.includes('def main():') && !content.includes(MAIN_GUARD)) return null;

  const portMatch = DECLARED_PORT.exec(content);
  const port = portMatch?.[1] ? parseInt(portMatch[1], 10) : PORTS.APP_DEFAULT;

  let framework: Framework = 'unknown';
  if (content.includes('from flask') || content.includes('import flask')) framework = 'flask';
  else if (content.includes('from django') || content.includes('import django')) framework = 'django';

  return { scriptPath, port, framework, name: displayName(scriptPath) };
}

/**
 * First page anywhere under `appDir`, else a conventional location.
 */
export function findCompanionPage(appDir: string): string | null {
  const [first] = walkFiles(appDir, ['.html']);
  if (first) return first;

  for (const candidate of COMPANION_CANDIDATES) {
    const full = path.join(appDir, candidate);
    if (safeStat(full)?.isFile()) return full;
  }
  return null;
}

export function findExecutables(rootDir: string): ExecutableDescriptor[] {
  const apps: ExecutableDescriptor[] = [];
  for (const scriptPath of walkFiles(rootDir, ['.py'])) {
    const info = inspectScript(scriptPath);
    if (!info) continue;

    const interfacePath = findCompanionPage(path.dirname(scriptPath));
    if (!interfacePath) {
      log.warn('no companion page for app', { path: scriptPath });
      continue;
    }
    apps.push({ kind: 'executable', ...info, interfacePath });
  }
  return apps;
}

/**
 * Pages under `rootDir` that no executable claimed as its companion.
 */
export function findStaticPages(rootDir: string, executables: ExecutableDescriptor[]): StaticDescriptor[] {
  const claimed = new Set(executables.map((e) => e.interfacePath));
  return walkFiles(rootDir, ['.html'])
    .filter((p) => !claimed.has(p))
    .map((pagePath): StaticDescriptor => ({ kind: 'static', pagePath, name: displayName(pagePath) }));
}

export function fileMetadata(filePath: string): FileMetadata {
  const stat = safeStat(filePath);
  if (!stat) return { fileSize: 0, lastModified: null };
  return { fileSize: stat.size, lastModified: stat.mtime.toISOString() };
}

/**
 * Top-level modules a script imports, minus the common standard library.
 * Sorted and comma separated; null when there are none.
 */
export function extractDependencies(scriptPath: string): string | null {
  const content = safeReadFile(scriptPath);
  if (content === null) return null;

  const modules = new Set<string>();
  for (const raw of content.split('\n')) {
    const line = raw.trim();
    if (!line.startsWith('import ') && !line.startsWith('from ')) continue;
    const module = line.split(/\s+/)[1]?.split('.')[0]?.replace(/,$/, '');
    if (module && !STDLIB_MODULES.has(module)) modules.add(module);
  }
  return modules.size > 0 ? [...modules].sort().join(', ') : null;
}

/**
 * Whether any declared dependency is absent from the app's requirements.txt.
 * Without a requirements file nothing can be confirmed, so that counts as missing.
 */
export function hasMissingDependencies(dependencies: string | null, appDir: string): boolean {
  if (!dependencies) return false;

  const requirements = safeReadFile(path.join(appDir, 'requirements.txt'));
  if (requirements === null) return true;

  const available = new Set(
    requirements
      .split('\n')
      .map((l) => l.trim())
      .filter((l) => l && !l.startsWith('#'))
      .map((l) => (l.split(/[\s=<>!~\[;]/)[0] ?? '').toLowerCase()),
  );
  return dependencies.split(',').some((d) => !available.has(d.trim().toLowerCase()));
}
