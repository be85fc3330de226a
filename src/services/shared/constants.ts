/**
 * Shared constants for shelf services.
 * Used by the indexer service and the package entry point.
 */

import * as os from 'os';

// Derive all runtime paths from the operator's home directory
export const HOME = os.homedir();
export const SHELF_DIR = `${HOME}/.applet-shelf`;

// Ports
export const PORTS = {
  INDEXER: 5055,
  // Port an executable app gets when its script declares none
  APP_DEFAULT: 5000,
} as const;

// Entry kinds and their short-id prefixes
export const ENTRY_KINDS = {
  EXECUTABLE: 'executable',
  STATIC: 'static',
} as const;

export type EntryKind = typeof ENTRY_KINDS[keyof typeof ENTRY_KINDS];

export const SHORT_ID_PREFIX: Record<EntryKind, string> = {
  executable: 'A',
  static: 'B',
};

// Display ids use 3 digits, preview image filenames use 5
export const SHORT_ID_DISPLAY_DIGITS = 3;
export const SHORT_ID_FILE_DIGITS = 5;

// Process lifecycle defaults (ms)
export const PROCESS_TIMINGS = {
  LAUNCH_SETTLE_MS: 5000,       // foreground app bind time before redirect
  CAPTURE_SETTLE_MS: 8000,      // disposable capture app bind time
  EXECUTABLE_RENDER_MS: 3000,   // page render wait for served apps
  STATIC_RENDER_MS: 2000,       // page render wait for file:// pages
  TERMINATE_GRACE_MS: 5000,     // SIGTERM → SIGKILL escalation
  STATIC_LISTEN_TIMEOUT_MS: 1000,
} as const;

export const SCREENSHOT_SIZE = { width: 1024, height: 768 } as const;
