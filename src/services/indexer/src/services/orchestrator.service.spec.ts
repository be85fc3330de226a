import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { openDatabase } from '../database';
import { IndexerError } from '../errors';
import { sleep } from '../utils';
import type { CaptureOptions, PreviewBrowser } from './browser.service';
import { CatalogStore } from './catalog.service';
import { PreviewCaptureQueue, captureKey } from './capture.service';
import { DiscoveryQueue } from './discovery.service';
import { Orchestrator } from './orchestrator.service';
import { StaticServerRegistry } from './static-servers.service';
import { ForegroundSupervisor } from './supervisor.service';

class FakeBrowser implements PreviewBrowser {
  urls: string[] = [];

  async capture(url: string, options: CaptureOptions): Promise<{ title: string }> {
    this.urls.push(url);
    fs.writeFileSync(options.outputPath, 'png');
    return { title: 'Fake page' };
  }

  async close(): Promise<void> {}
}

let dir: string;
let store: CatalogStore;
let browser: FakeBrowser;
let discovery: DiscoveryQueue;
let capture: PreviewCaptureQueue;
let supervisor: ForegroundSupervisor;
let statics: StaticServerRegistry;
let orchestrator: Orchestrator;

function write(rel: string, content: string): string {
  const full = path.join(dir, rel);
  fs.mkdirSync(path.dirname(full), { recursive: true });
  fs.writeFileSync(full, content);
  return full;
}

function pidScript(pidFile: string): string {
  return `require("fs").writeFileSync(${JSON.stringify(pidFile)}, String(process.pid)); setInterval(() => {}, 1000);`;
}

function addExecutable(name: string, port: number, body: string): string {
  const script = write(`${name}/app.js`, body);
  return store.upsert({
    kind: 'executable',
    name,
    folderPath: path.dirname(script),
    primaryPath: script,
    interfacePath: write(`${name}/index.html`, '<p>ui</p>'),
    port,
    fileSize: 1,
    lastModified: null,
    dependencies: null,
  }).shortId;
}

function addStatic(name: string): string {
  const page = write(`pages/${name}.html`, `<h1>${name}</h1>`);
  return store.upsert({
    kind: 'static',
    name,
    folderPath: path.dirname(page),
    primaryPath: page,
    fileSize: 1,
    lastModified: null,
    dependencies: null,
  }).shortId;
}

function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

async function readPid(pidFile: string): Promise<number> {
  for (let i = 0; i < 250 && !fs.existsSync(pidFile); i++) await sleep(20);
  return Number(fs.readFileSync(pidFile, 'utf8'));
}

function build(options: { autoCapture?: boolean; captureSettleMs?: number } = {}): void {
  discovery = new DiscoveryQueue(store);
  supervisor = new ForegroundSupervisor({
    interpreter: process.execPath,
    scratchDir: path.join(dir, 'apps-debris'),
    timings: { launchSettleMs: 300, terminateGraceMs: 500 },
    portBusy: (port) => capture.activePort() === port,
  });
  statics = new StaticServerRegistry({ listenTimeoutMs: 1000 });
  capture = new PreviewCaptureQueue({
    store,
    browserFactory: async () => browser,
    previewsDir: path.join(dir, 'previews'),
    scratchDir: path.join(dir, 'apps-debris'),
    interpreter: process.execPath,
    timings: {
      captureSettleMs: options.captureSettleMs ?? 300,
      executableRenderMs: 0,
      staticRenderMs: 0,
      terminateGraceMs: 500,
    },
    portReserved: (port) => supervisor.holdsPort(port),
  });
  orchestrator = new Orchestrator({
    store,
    discovery,
    capture,
    supervisor,
    statics,
    autoCapture: options.autoCapture ?? false,
  });
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'shelf-orch-'));
  store = new CatalogStore(openDatabase(':memory:'));
  browser = new FakeBrowser();
  build();
});

afterEach(async () => {
  await capture.drained();
  await orchestrator.shutdown();
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('Orchestrator scanning and previews', () => {
  it('feeds a finished scan straight into the capture queue', async () => {
    build({ autoCapture: true });
    write('weather/app.py', 'var port;\nconst app = { run() { setInterval(() => {}, 1000); } };\napp.run(port=5410);\n');
    write('weather/index.html', '<p>ui</p>');
    const gallery = write('pages/gallery.html', '<p>gallery</p>');

    expect(orchestrator.scanStart(dir)).toMatchObject({ status: 'started', rootDir: dir });
    await discovery.drained();
    await capture.drained();

    expect(orchestrator.scanProgress()).toMatchObject({
      phase: 'idle',
      total: 2,
      completed: 2,
      progressPercentage: 100,
      isScanning: false,
      phaseDescription: 'Idle',
      recentErrors: [],
    });
    expect(browser.urls).toEqual(['http://localhost:5410', pathToFileURL(gallery).href]);
    expect(store.getByShortId('A001')?.previewPath).toBe(path.join(dir, 'previews', 'A00001.png'));
    expect(store.getByShortId('B001')?.previewPath).toBe(path.join(dir, 'previews', 'B00001.png'));
    expect(orchestrator.previewProgress()).toMatchObject({ total: 2, completed: 2, isProcessing: false });
  });

  it('leaves previews alone without auto capture', async () => {
    write('pages/gallery.html', '<p>gallery</p>');

    orchestrator.scanStart(dir);
    await discovery.drained();

    expect(browser.urls).toEqual([]);
    expect(orchestrator.previewProgress().total).toBe(0);
  });

  it('refuses to scan something that is not a directory', () => {
    const file = write('notes.txt', 'x');

    expect(() => orchestrator.scanStart(file)).toThrow(IndexerError);
    expect(() => orchestrator.scanStart(file)).toThrow(`Not a directory: ${file}`);
  });

  it('reports up_to_date when every preview exists', async () => {
    const shortId = addStatic('gallery');

    expect(orchestrator.previewStart()).toMatchObject({ status: 'started', count: 1 });
    await capture.drained();

    expect(store.getByShortId(shortId)?.previewPath).toBe(path.join(dir, 'previews', 'B00001.png'));
    expect(orchestrator.previewStart()).toEqual({ status: 'up_to_date', count: 0 });
  });

  it('clears preview paths whose files are gone when listing', () => {
    const shortId = addStatic('gallery');
    const entry = store.getByShortId(shortId);
    expect(entry).not.toBeNull();
    if (!entry) return;
    store.setPreviewPath(entry.id, path.join(dir, 'previews', 'deleted.png'));

    const listed = orchestrator.listEntries();
    expect(listed.map((e) => [e.shortId, e.previewPath])).toEqual([[shortId, null]]);
  });
});

describe('Orchestrator live launches', () => {
  it('replaces the foreground app and kills the previous one', async () => {
    const firstPid = path.join(dir, 'first.pid');
    const secondPid = path.join(dir, 'second.pid');
    addExecutable('first', 5420, pidScript(firstPid));
    addExecutable('second', 5421, pidScript(secondPid));

    expect(await orchestrator.liveLaunch('A002')).toEqual({
      url: 'http://localhost:5421',
      shortId: 'A002',
      kind: 'executable',
      reused: false,
    });
    const replaced = await readPid(secondPid);

    expect(await orchestrator.liveLaunch('a001')).toMatchObject({ url: 'http://localhost:5420', shortId: 'A001' });
    const current = await readPid(firstPid);

    expect(isAlive(replaced)).toBe(false);
    expect(isAlive(current)).toBe(true);
    expect(supervisor.status()).toMatchObject({ running: true, pid: current, port: 5420 });
  });

  it('reuses the running app when the same entry is launched again', async () => {
    const pidFile = path.join(dir, 'same.pid');
    addExecutable('same', 5422, pidScript(pidFile));

    await orchestrator.liveLaunch('A001');
    const pid = await readPid(pidFile);
    const again = await orchestrator.liveLaunch('A001');

    expect(again).toMatchObject({ url: 'http://localhost:5422', reused: true });
    expect(supervisor.status()).toMatchObject({ running: true, pid });
  });

  it('refuses a launch on the port a capture is using', async () => {
    build({ captureSettleMs: 1500 });
    addExecutable('captured', 5430, 'setInterval(() => {}, 1000);');
    addExecutable('other', 5430, 'setInterval(() => {}, 1000);');

    const captured = store.getByShortId('A001');
    expect(captured).not.toBeNull();
    if (!captured) return;

    orchestrator.previewStart([captured]);
    for (let i = 0; i < 100 && capture.activePort() === null; i++) await sleep(10);

    await expect(orchestrator.liveLaunch('A002')).rejects.toMatchObject({ code: 'port_conflict' });
    expect(supervisor.status()).toEqual({ running: false });
  });

  it('refuses a capture on the port of a launch still waiting its turn', async () => {
    addExecutable('first', 5450, 'setInterval(() => {}, 1000);');
    addExecutable('second', 5451, 'setInterval(() => {}, 1000);');
    addExecutable('third', 5451, 'setInterval(() => {}, 1000);');
    const third = store.getByShortId('A003');
    expect(third).not.toBeNull();
    if (!third) return;

    const first = orchestrator.liveLaunch('A001');
    const second = orchestrator.liveLaunch('A002');
    orchestrator.previewStart([third]);

    await first;
    expect(await second).toMatchObject({ url: 'http://localhost:5451', shortId: 'A002' });
    await capture.drained();

    expect(capture.snapshot().results[captureKey(third)]).toMatchObject({
      success: false,
      error: 'port 5451 is in use by the foreground app',
    });
    expect(capture.activePort()).toBeNull();
    expect(supervisor.status()).toMatchObject({ running: true, port: 5451 });
  });

  it('refuses a queued launch once a capture has claimed its port', async () => {
    build({ captureSettleMs: 1500 });
    addExecutable('first', 5460, 'setInterval(() => {}, 1000);');
    addExecutable('second', 5461, 'setInterval(() => {}, 1000);');
    addExecutable('captured', 5461, 'setInterval(() => {}, 1000);');
    const captured = store.getByShortId('A003');
    expect(captured).not.toBeNull();
    if (!captured) return;

    orchestrator.previewStart([captured]);
    for (let i = 0; i < 100 && capture.activePort() === null; i++) await sleep(10);
    expect(capture.activePort()).toBe(5461);

    const [first, second] = await Promise.allSettled([orchestrator.liveLaunch('A001'), orchestrator.liveLaunch('A002')]);

    expect(first).toMatchObject({ status: 'fulfilled', value: { url: 'http://localhost:5460' } });
    expect(second).toMatchObject({ status: 'rejected', reason: { code: 'port_conflict' } });
    expect(supervisor.status()).toMatchObject({ running: true, port: 5460 });
  });

  it('serves a static page on its own port and stops it on removal', async () => {
    const shortId = addStatic('gallery');

    const { url } = await orchestrator.liveLaunch(shortId);
    const res = await fetch(url.replace('localhost', '127.0.0.1'));
    expect(await res.text()).toBe('<h1>gallery</h1>');
    expect((await orchestrator.liveLaunch(shortId)).url).toBe(url);

    await orchestrator.removeEntry(shortId);
    expect(await statics.list()).toEqual([]);
    expect(store.getByShortId(shortId)).toBeNull();
  });

  it('rejects an unknown entry', async () => {
    await expect(orchestrator.liveLaunch('B404')).rejects.toMatchObject({ code: 'not_found' });
  });

  it('normalizes short ids and rejects malformed ones', () => {
    const shortId = addStatic('gallery');

    expect(orchestrator.findEntry('b1').shortId).toBe(shortId);
    expect(() => orchestrator.findEntry('Z001')).toThrow('Malformed short id: Z001');
  });

  it('frees the foreground app and every static server', async () => {
    addExecutable('busy', 5440, 'setInterval(() => {}, 1000);');
    await orchestrator.liveLaunch('A001');
    await orchestrator.liveLaunch(addStatic('one'));
    await orchestrator.liveLaunch(addStatic('two'));

    const freed = await orchestrator.freeAllResources();
    expect(freed).toMatchObject({ foreground: { status: 'stopped' }, staticServersStopped: 2, count: 3 });
    expect(await orchestrator.liveStatus()).toEqual({ foreground: { running: false }, staticServers: [] });
  });
});
