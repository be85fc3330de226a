/**
 * Applet Shelf Version & Capabilities
 *
 * Two independent systems:
 *
 * 1. CAPABILITIES: what this indexer supports (endpoints + feature flags).
 *    Exposed at GET /capabilities so a front end can decide which controls
 *    to show.
 *
 * 2. VERSION: semver component versions. The catalog schema version is
 *    checked when a database written by another release is opened.
 */

export interface ComponentVersions {
  indexer: string;
  catalogSchema: string;
}

export interface VersionManifest {
  /** Unified release version, for display */
  release: string;
  components: ComponentVersions;
  /** Oldest catalog schema this release can open */
  minCompatible: {
    catalogSchema: string;
  };
}

// ---------------------------------------------------------------------------
// 1. CAPABILITIES
//
// Rules: add freely, edit carefully (bump endpoint version), remove never.
// ---------------------------------------------------------------------------

export const CAPABILITIES = {
  endpoints: {
    '/health': 1,
    '/capabilities': 1,
    '/scan': 1,
    '/scanning-progress': 1,
    '/api/regenerate-previews': 1,
    '/progress': 1,
    '/api/preview/:shortId': 1,
    '/serve/:shortId': 1,
    '/launch/:encodedPath': 1,
    '/status': 1,
    '/stop': 1,
    '/api/clean-apps': 1,
    '/api/items': 1,
    '/search': 1,
    '/api/tags': 1,
    '/api/favourites': 1,
    '/api/export': 1,
    '/api/cleanup': 1,
    '/remove_item': 1,
    '/remove_folder': 1,
    '/api/toggle-favourite/:id': 1,
    '/api/update-description/:id': 1,
    '/api/process-llm/:id': 1,
    '/api/process-llm-all': 1,
    '/api/purge-database': 1,
  },
  features: ['discovery', 'preview-capture', 'live-launch', 'static-servers', 'favourites', 'enrichment'] as const,
};

export type Feature = (typeof CAPABILITIES.features)[number];

export type ShelfCapabilities = {
  version: string;
  endpoints: Record<string, number>;
  features: Feature[];
};

/**
 * Capabilities of this process. Enrichment is listed only when a model
 * server is configured.
 */
export function getCapabilities(options: { enrichment: boolean }): ShelfCapabilities {
  return {
    version: VERSION.release,
    endpoints: { ...CAPABILITIES.endpoints },
    features: CAPABILITIES.features.filter((f) => f !== 'enrichment' || options.enrichment),
  };
}

// ---------------------------------------------------------------------------
// 2. VERSION
// ---------------------------------------------------------------------------

export const VERSION: VersionManifest = {
  release: "0.4.0",

  components: {
    indexer: "0.4.0",
    catalogSchema: "1.2.0",
  },

  minCompatible: {
    catalogSchema: "1.0.0",
  },
};

/**
 * Whether a catalog written with schema `version` can be opened.
 */
export function isSchemaCompatible(version: string | null | undefined): boolean {
  if (!version) return false;
  return compareVersions(version, VERSION.minCompatible.catalogSchema) >= 0;
}

/**
 * Compare two semver versions.
 * Returns: -1 if a < b, 0 if a == b, 1 if a > b
 */
export function compareVersions(a: string, b: string): number {
  const partsA = a.split(".").map((n) => parseInt(n, 10) || 0);
  const partsB = b.split(".").map((n) => parseInt(n, 10) || 0);

  for (let i = 0; i < 3; i++) {
    const numA = partsA[i] || 0;
    const numB = partsB[i] || 0;

    if (numA < numB) return -1;
    if (numA > numB) return 1;
  }

  return 0;
}
