/**
 * Document identity
 *
 * The registry's identifier is often missing. The letter itself usually
 * carries its file number near the top; failing that, a deterministic
 * placeholder is derived from the registry key so reruns land on the same id.
 */

import { createHash } from 'node:crypto';
import type { IdSource, RegistryEntry } from '../types';
import { logger } from '../logger';
import { FILE_NUMBER_PATTERN } from '../citations/patterns';

const RECOVERY_SEARCH_CHARS = 3000;
const PLACEHOLDER_PREFIX = 'UNK-';

export interface ResolvedId {
  id: string;
  source: IdSource;
  notes: string[];
}

export interface StoredIdentity {
  id: string;
  id_source: IdSource;
}

export function isPlaceholderId(id: string): boolean {
  return id.startsWith(PLACEHOLDER_PREFIX);
}

/** "File No. 90-753" -> "A-90-753"; the prefix defaults to the advice series */
export function recoverLetterId(text: string): string | null {
  const m = FILE_NUMBER_PATTERN.exec(text.slice(0, RECOVERY_SEARCH_CHARS));
  if (!m) return null;
  const prefix = m[1] ? m[1].toUpperCase() : 'A';
  return `${prefix}-${m[2]}-${m[3]}`;
}

/**
 * Collision-free placeholder: a digest of the whole registry key. Used when
 * the key is not a single number, and when the short form is already taken.
 */
export function hashedPlaceholderId(registryKey: string, year: number | null): string {
  const digest = createHash('sha1').update(registryKey).digest('hex').slice(0, 10);
  return `${PLACEHOLDER_PREFIX}${placeholderYear(year)}-${digest}`;
}

/**
 * "reg-0042" -> "UNK-90-00042". Keys with more than one number, or none,
 * get the hashed form, since no single number identifies them.
 */
export function placeholderId(registryKey: string, year: number | null): string {
  const runs = registryKey.match(/\d+/g) ?? [];
  if (runs.length !== 1) return hashedPlaceholderId(registryKey, year);
  return `${PLACEHOLDER_PREFIX}${placeholderYear(year)}-${runs[0].padStart(5, '0')}`;
}

function placeholderYear(year: number | null): string {
  return year === null ? '00' : String(year % 100).padStart(2, '0');
}

/**
 * Pick the identifier for a document.
 *
 * - a real registry id is kept
 * - otherwise a file number read from the text is used
 * - otherwise a placeholder, unless a different placeholder is already
 *   stored, in which case the stored one stays
 *
 * `existing` is the identity of the stored record, if any. A stored placeholder is
 * upgraded when a real id becomes available.
 */
export function resolveDocumentId(
  entry: RegistryEntry,
  text: string,
  existing: StoredIdentity | null = null
): ResolvedId {
  const notes: string[] = [];
  const stored = existing?.id ?? null;

  const registryId = entry.letter_id?.trim();
  if (registryId && !isPlaceholderId(registryId)) {
    return { id: registryId, source: 'registry', notes };
  }

  if (existing && !isPlaceholderId(existing.id)) {
    return { id: existing.id, source: existing.id_source, notes };
  }

  const recovered = text ? recoverLetterId(text) : null;
  if (recovered) {
    if (stored) {
      notes.push(`Placeholder ${stored} upgraded to ${recovered}`);
      logger.info('Placeholder identifier upgraded', { from: stored, to: recovered });
    }
    return { id: recovered, source: 'recovered', notes };
  }

  const generated = placeholderId(entry.registry_key, entry.year);
  if (stored && stored !== generated) {
    notes.push(`Kept placeholder ${stored}; derived placeholder ${generated} not applied`);
    logger.warn('Refusing to replace one placeholder with another', {
      stored,
      generated,
      registry_key: entry.registry_key,
    });
    return { id: stored, source: 'placeholder', notes };
  }
  return { id: generated, source: 'placeholder', notes };
}
