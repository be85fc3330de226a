/**
 * Short identifiers: one monotonically increasing sequence per entry kind,
 * rendered as prefix + zero-padded decimal (A001, B014).
 */

import {
  ENTRY_KINDS,
  SHORT_ID_DISPLAY_DIGITS,
  SHORT_ID_FILE_DIGITS,
  SHORT_ID_PREFIX,
  type EntryKind,
} from '../../../shared/constants';

export interface ParsedShortId {
  prefix: string;
  value: number;
}

export function formatShortId(kind: EntryKind, value: number): string {
  return `${SHORT_ID_PREFIX[kind]}${String(value).padStart(SHORT_ID_DISPLAY_DIGITS, '0')}`;
}

export function parseShortId(shortId: string): ParsedShortId | null {
  const m = /^([A-Za-z])(\d+)$/.exec(shortId);
  if (!m?.[1] || !m[2]) return null;
  return { prefix: m[1], value: parseInt(m[2], 10) };
}

export function kindForPrefix(prefix: string): EntryKind | null {
  return Object.values(ENTRY_KINDS).find((kind) => SHORT_ID_PREFIX[kind] === prefix) ?? null;
}

/**
 * Preview image filename for a short id: A001 → A00001.png.
 * Ids that do not parse are used as-is.
 */
export function previewFileName(shortId: string): string {
  const parsed = parseShortId(shortId);
  if (!parsed) return `${shortId}.png`;
  return `${parsed.prefix}${String(parsed.value).padStart(SHORT_ID_FILE_DIGITS, '0')}.png`;
}
