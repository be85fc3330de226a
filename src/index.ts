/**
 * applet-shelf
 *
 * Catalog, preview and launch locally developed mini web apps.
 *
 * This package provides:
 * - Version management and capability discovery
 * - The indexer components (discovery, capture, supervisor, static servers)
 *   for embedding in another process
 *
 * Usage:
 *   import { Orchestrator, CatalogStore, openDatabase } from 'applet-shelf';
 */

// Version utilities
export {
  VERSION,
  CAPABILITIES,
  compareVersions,
  getCapabilities,
  isSchemaCompatible,
  type VersionManifest,
  type ComponentVersions,
  type ShelfCapabilities,
} from './version';

// Indexer components
export * from './services';
