import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { openDatabase } from '../database';
import { sleep } from '../utils';
import type { CaptureOptions, PreviewBrowser } from './browser.service';
import { CatalogStore } from './catalog.service';
import { PreviewCaptureQueue, captureKey, type CaptureItem } from './capture.service';
import { truncateError } from './job-progress';

class FakeBrowser implements PreviewBrowser {
  urls: string[] = [];
  closed = 0;
  failWith: string | null = null;

  async capture(url: string, options: CaptureOptions): Promise<{ title: string }> {
    this.urls.push(url);
    if (this.failWith) throw new Error(this.failWith);
    fs.writeFileSync(options.outputPath, 'png');
    return { title: 'Fake page' };
  }

  async close(): Promise<void> {
    this.closed++;
  }
}

let dir: string;
let store: CatalogStore;
let browser: FakeBrowser;
let launches: number;
let foreground: number | null;
let queue: PreviewCaptureQueue;

function write(rel: string, content: string): string {
  const full = path.join(dir, rel);
  fs.mkdirSync(path.dirname(full), { recursive: true });
  fs.writeFileSync(full, content);
  return full;
}

function staticItem(name: string): CaptureItem {
  const page = write(`pages/${name}.html`, `<h1>${name}</h1>`);
  const saved = store.upsert({
    kind: 'static',
    name,
    folderPath: path.dirname(page),
    primaryPath: page,
    fileSize: 1,
    lastModified: null,
    dependencies: null,
  });
  return { kind: 'static', name, primaryPath: page, shortId: saved.shortId, port: null };
}

function executableItem(name: string, body: string, port = 5400): CaptureItem {
  const script = write(`${name}/app.js`, body);
  const saved = store.upsert({
    kind: 'executable',
    name,
    folderPath: path.dirname(script),
    primaryPath: script,
    interfacePath: write(`${name}/index.html`, '<p>ui</p>'),
    port,
    fileSize: 1,
    lastModified: null,
    dependencies: null,
  });
  return { kind: 'executable', name, primaryPath: script, shortId: saved.shortId, port };
}

function pidScript(pidFile: string): string {
  return `require("fs").writeFileSync(${JSON.stringify(pidFile)}, String(process.pid)); setInterval(() => {}, 1000);`;
}

function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

async function waitForFile(file: string): Promise<void> {
  for (let i = 0; i < 250 && !fs.existsSync(file); i++) await sleep(20);
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'shelf-capture-'));
  store = new CatalogStore(openDatabase(':memory:'));
  browser = new FakeBrowser();
  launches = 0;
  foreground = null;
  queue = new PreviewCaptureQueue({
    store,
    browserFactory: async () => {
      launches++;
      return browser;
    },
    previewsDir: path.join(dir, 'previews'),
    scratchDir: path.join(dir, 'apps-debris'),
    interpreter: process.execPath,
    timings: { captureSettleMs: 1000, executableRenderMs: 0, staticRenderMs: 0, terminateGraceMs: 500 },
    portReserved: (port) => port === foreground,
  });
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('PreviewCaptureQueue', () => {
  it('captures a static page and records the preview path', async () => {
    const item = staticItem('gallery');

    expect(queue.start([item])).toMatchObject({ status: 'started', count: 1 });
    await queue.drained();

    const preview = path.join(dir, 'previews', 'B00001.png');
    expect(browser.urls).toEqual([pathToFileURL(item.primaryPath).href]);
    expect(store.getByShortId('B001')?.previewPath).toBe(preview);
    expect(fs.existsSync(preview)).toBe(true);
    expect(queue.snapshot()).toMatchObject({ phase: 'idle', total: 1, completed: 1, isProcessing: false });
    expect(queue.snapshot().results[captureKey(item)]).toMatchObject({ success: true, error: null });
  });

  it('shares one browser across the batch and closes it when drained', async () => {
    queue.start([staticItem('one'), staticItem('two'), staticItem('three')]);
    await queue.drained();

    expect(launches).toBe(1);
    expect(browser.urls).toHaveLength(3);
    expect(browser.closed).toBe(1);
    expect(queue.snapshot()).toMatchObject({ total: 3, completed: 3, progressPercentage: 100 });
  });

  it('fails an app that exits during the settle delay with its output', async () => {
    const item = executableItem('crashy', 'console.error("ImportError: no module named flask"); process.exit(1);');

    queue.start([item]);
    await queue.drained();

    const result = queue.snapshot().results[captureKey(item)];
    expect(result?.success).toBe(false);
    expect(result?.error).toBe(
      'App failed to start (exit code 1)\nSTDOUT: \nSTDERR: ImportError: no module named flask',
    );
    expect(browser.urls).toEqual([]);
    expect(store.getByShortId(item.shortId)?.previewPath).toBeNull();
  });

  it('tears the app down when rendering fails', async () => {
    const pidFile = path.join(dir, 'render-fail.pid');
    const item = executableItem('renderfail', pidScript(pidFile));
    browser.failWith = 'navigation timeout';

    queue.start([item]);
    await queue.drained();
    await waitForFile(pidFile);

    expect(queue.snapshot().results[captureKey(item)]).toMatchObject({ success: false, error: 'navigation timeout' });
    expect(isAlive(Number(fs.readFileSync(pidFile, 'utf8')))).toBe(false);
  });

  it('captures a running app over HTTP and stops it afterwards', async () => {
    const pidFile = path.join(dir, 'ok.pid');
    const item = executableItem('weather', pidScript(pidFile), 5401);

    queue.start([item]);
    await queue.drained();
    await waitForFile(pidFile);

    expect(browser.urls).toEqual(['http://localhost:5401']);
    expect(store.getByShortId('A001')?.previewPath).toBe(path.join(dir, 'previews', 'A00001.png'));
    expect(isAlive(Number(fs.readFileSync(pidFile, 'utf8')))).toBe(false);
    expect(queue.activePort()).toBeNull();
  });

  it('refuses the port the foreground app holds', async () => {
    const item = executableItem('clash', 'setInterval(() => {}, 1000);', 5402);
    foreground = 5402;

    queue.start([item]);
    await queue.drained();

    expect(queue.snapshot().results[captureKey(item)]).toMatchObject({
      success: false,
      error: 'port 5402 is in use by the foreground app',
    });
  });

  it('gives every item exactly one outcome and reports failures by name', async () => {
    const good = staticItem('good');
    const missing: CaptureItem = { kind: 'static', name: 'Gone', primaryPath: path.join(dir, 'gone.html'), shortId: 'B099', port: null };

    queue.start([good, missing]);
    await queue.drained();

    const snap = queue.snapshot();
    expect(Object.keys(snap.results)).toEqual([captureKey(good), captureKey(missing)]);
    expect(snap.completed).toBe(2);
    expect(snap.recentErrors).toEqual([
      {
        key: captureKey(missing),
        name: 'Gone',
        kind: 'static',
        error: truncateError(`Page does not exist: ${missing.primaryPath}`),
      },
    ]);
  });

  it('retries the browser launch after a failed start', async () => {
    let attempts = 0;
    const flaky = new PreviewCaptureQueue({
      store,
      browserFactory: async () => {
        attempts++;
        if (attempts === 1) throw new Error('chromium missing');
        return browser;
      },
      previewsDir: path.join(dir, 'previews'),
      scratchDir: path.join(dir, 'apps-debris'),
      interpreter: process.execPath,
      timings: { captureSettleMs: 0, executableRenderMs: 0, staticRenderMs: 0, terminateGraceMs: 100 },
    });
    const first = staticItem('first');
    const second = staticItem('second');

    flaky.start([first, second]);
    await flaky.drained();

    const results = flaky.snapshot().results;
    expect(results[captureKey(first)]).toMatchObject({ success: false, error: 'chromium missing' });
    expect(results[captureKey(second)]).toMatchObject({ success: true });
    expect(attempts).toBe(2);
  });
});
