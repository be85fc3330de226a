/**
 * Enrichment Service
 *
 * Fills in descriptions, tech stack, tags and category for catalog
 * entries by asking a local Ollama server. Disabled when no URL is
 * configured. Runs fire-and-forget: failures are logged, never thrown
 * to the caller of enrich().
 */

import * as path from 'path';
import { z } from 'zod';
import { createLogger, errorMessage } from '../../../shared/logger';
import { safeReadDir, safeReadFile, safeStat, walkFiles } from '../utils';
import type { CatalogEntry, CatalogStore, EnrichmentData } from './catalog.service';

const log = createLogger('enrichment');

const REQUEST_TIMEOUT_MS = 120_000;
const README_NAMES = new Set(['readme.md']);
const DOCS_DIRS = ['docs', 'documentation', 'wiki', '.github'];
const CONFIG_FILES = ['requirements.txt', 'package.json', 'setup.py', 'pyproject.toml', 'Pipfile'];
const CATEGORIES = new Set(['web', 'api', 'tool', 'other']);

const SYSTEM_PROMPT =
  'You are an expert software analyst. Analyze the provided code and documentation to generate metadata for a web application indexer.';

const generateReplySchema = z.object({
  response: z.string(),
});

export interface CodeFeatures {
  imports: string[];
  functions: string[];
  classes: string[];
  comments: string[];
}

export interface EnrichmentContext {
  name: string;
  kind: string;
  contentType: 'markdown' | 'code';
  primaryContent: string;
  features: CodeFeatures;
  relatedFiles: string[];
}

export interface EnrichmentOptions {
  /** Base URL of the Ollama server; enrichment is off without it */
  url?: string;
  model: string;
  fetchImpl?: typeof fetch;
}

export function extractCodeFeatures(code: string): CodeFeatures {
  const all = (re: RegExp) => [...code.matchAll(re)].map((m) => m[1] ?? '').filter(Boolean);
  return {
    imports: all(/^(?:import|from)\s+([^\n]+)/gm),
    functions: all(/def\s+(\w+)\s*\(/g),
    classes: all(/class\s+(\w+)/g),
    comments: all(/#\s*([^\n]+)/g).slice(0, 10),
  };
}

/**
 * Markdown near the entry: README first, then other root-level *.md,
 * then anything under the usual docs folders.
 */
export function readMarkdown(folder: string): string {
  const parts: string[] = [];
  const rootFiles = safeReadDir(folder)
    .filter((d) => d.isFile() && d.name.toLowerCase().endsWith('.md'))
    .map((d) => d.name)
    .sort();

  for (const name of rootFiles.filter((n) => README_NAMES.has(n.toLowerCase()))) {
    const content = safeReadFile(path.join(folder, name));
    if (content) parts.push(`README: ${content.slice(0, 1000)}`);
  }
  for (const name of rootFiles.filter((n) => !README_NAMES.has(n.toLowerCase()))) {
    const content = safeReadFile(path.join(folder, name));
    if (content) parts.push(`${name}: ${content.slice(0, 800)}`);
  }
  for (const docs of DOCS_DIRS) {
    for (const file of walkFiles(path.join(folder, docs), ['.md'])) {
      const content = safeReadFile(file);
      if (content) parts.push(`${path.relative(folder, file)}: ${content.slice(0, 600)}`);
    }
  }
  return parts.join('\n\n');
}

export function findRelatedFiles(folder: string): string[] {
  const related = CONFIG_FILES.filter((f) => safeStat(path.join(folder, f))?.isFile());
  const scripts = walkFiles(folder, ['.py'])
    .slice(0, 5)
    .map((f) => path.relative(folder, f));
  return [...related, ...scripts].slice(0, 10);
}

export function gatherContext(entry: CatalogEntry): EnrichmentContext {
  const mainContent = safeReadFile(entry.primaryPath) ?? '';
  const markdown = readMarkdown(entry.folderPath);
  return {
    name: entry.name,
    kind: entry.kind,
    contentType: markdown ? 'markdown' : 'code',
    primaryContent: markdown ? markdown.slice(0, 2500) : mainContent.slice(0, 2000),
    features: extractCodeFeatures(mainContent),
    relatedFiles: findRelatedFiles(entry.folderPath),
  };
}

export function buildPrompt(ctx: EnrichmentContext): string {
  const label = ctx.contentType === 'markdown' ? 'Markdown documentation' : 'Source code';
  return [
    `Analyze this ${ctx.kind} project and generate metadata:`,
    '',
    `Project Name: ${ctx.name}`,
    '',
    `${label} Content:`,
    ctx.primaryContent,
    '',
    'Code Features:',
    `- Imports: ${ctx.features.imports.slice(0, 10).join(', ')}`,
    `- Functions: ${ctx.features.functions.slice(0, 10).join(', ')}`,
    `- Classes: ${ctx.features.classes.slice(0, 5).join(', ')}`,
    `- Comments: ${ctx.features.comments.slice(0, 5).join(', ')}`,
    '',
    `Related Files: ${ctx.relatedFiles.join(', ')}`,
    '',
    'Please provide:',
    '1. Description: Rich description (2-3 sentences)',
    '2. Short Description: One-line summary',
    '3. Tech Stack: Comma-separated technologies',
    '4. Tags: Comma-separated relevant tags',
    '5. Category: One of (web, api, tool, other)',
    '',
    'Format your response as:',
    'Description: [description]',
    'Short: [short desc]',
    'Tech: [tech1, tech2, tech3]',
    'Tags: [tag1, tag2, tag3]',
    'Category: [category]',
  ].join('\n');
}

/**
 * Parse the `Label: value` reply. Returns null when no field was found.
 */
export function parseReply(reply: string): EnrichmentData | null {
  const data: EnrichmentData = { description: null, shortDesc: null, techStack: null, tags: null, category: null };
  let found = false;

  for (const raw of reply.split('\n')) {
    const m = /^(Description|Short|Tech|Tags|Category):\s*(.*)$/.exec(raw.trim());
    if (!m?.[1]) continue;
    const value = (m[2] ?? '').trim().replace(/^\[(.*)\]$/, '$1').trim();
    if (!value) continue;
    found = true;

    switch (m[1]) {
      case 'Description':
        data.description = value;
        break;
      case 'Short':
        data.shortDesc = value;
        break;
      case 'Tech':
        data.techStack = value;
        break;
      case 'Tags':
        data.tags = value;
        break;
      case 'Category': {
        const category = value.toLowerCase();
        data.category = CATEGORIES.has(category) ? category : 'other';
        break;
      }
    }
  }
  return found ? data : null;
}

export function splitTags(tags: string | null): string[] {
  if (!tags) return [];
  return [...new Set(tags.split(',').map((t) => t.trim().toLowerCase()).filter(Boolean))];
}

export class EnrichmentService {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly store: CatalogStore, private readonly options: EnrichmentOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  isEnabled(): boolean {
    return Boolean(this.options.url);
  }

  /** Fire-and-forget enrichment of one entry. */
  enrich(id: number): void {
    this.process(id).catch((e) => log.error('enrichment failed', { id, error: errorMessage(e) }));
  }

  /**
   * Enrich one entry and store the result. Resolves null when disabled,
   * when the entry is gone, or when the reply held nothing usable.
   */
  async process(id: number): Promise<EnrichmentData | null> {
    if (!this.options.url) {
      log.info('enrichment disabled, skipping', { id });
      return null;
    }
    const entry = this.store.getById(id);
    if (!entry) return null;

    const reply = await this.generate(buildPrompt(gatherContext(entry)));
    const data = parseReply(reply);
    if (!data) {
      log.warn('model reply had no metadata', { id });
      return null;
    }

    this.store.setEnrichment(id, data);
    this.store.addTagUsage(splitTags(data.tags));
    log.info('entry enriched', { id, category: data.category });
    return data;
  }

  /**
   * Fire-and-forget enrichment of every entry not yet enriched.
   * Returns how many entries were queued.
   */
  enrichAll(): number {
    const pending = this.store.getAll().filter((e) => !e.enriched).length;
    this.processAll()
      .then((done) => log.info('batch enrichment finished', { pending, enriched: done }))
      .catch((e) => log.error('batch enrichment failed', { error: errorMessage(e) }));
    return pending;
  }

  /** Enrich every entry not yet enriched, one at a time. */
  async processAll(): Promise<number> {
    let done = 0;
    for (const entry of this.store.getAll().filter((e) => !e.enriched)) {
      try {
        if (await this.process(entry.id)) done++;
      } catch (e) {
        log.warn('enrichment failed', { id: entry.id, error: errorMessage(e) });
      }
    }
    return done;
  }

  private async generate(prompt: string): Promise<string> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS);
    try {
      const res = await this.fetchImpl(new URL('/api/generate', this.options.url).href, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.options.model,
          system: SYSTEM_PROMPT,
          prompt,
          stream: false,
          options: { temperature: 0.2, num_predict: 1000 },
        }),
        signal: controller.signal,
      });
      if (!res.ok) throw new Error(`Model server answered ${res.status}`);

      const parsed = generateReplySchema.safeParse(await res.json());
      if (!parsed.success) throw new Error('Unexpected reply from model server');
      return parsed.data.response.trim();
    } finally {
      clearTimeout(timeout);
    }
  }
}
