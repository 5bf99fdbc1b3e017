/**
 * Reference word list for dictionary sampling.
 *
 * Loaded once from data/wordlist.txt (one lowercase word per line, '#' for
 * comments). An unreadable list yields an empty set, which the scorer treats
 * as "dictionary check unavailable".
 */

import fs from 'fs';
import path from 'path';
import { logger } from '../logger';

let cached: ReadonlySet<string> | null = null;

function candidatePaths(): string[] {
  const paths = [
    // Source tree
    path.join(__dirname, '../../data/wordlist.txt'),
    // Compiled output under dist/packages/shared/src/quality
    path.join(__dirname, '../../../../../packages/shared/data/wordlist.txt'),
    path.join(process.cwd(), 'packages/shared/data/wordlist.txt'),
  ];
  if (process.env.WORDLIST_PATH) {
    paths.unshift(process.env.WORDLIST_PATH);
  }
  return paths;
}

export function parseWordList(content: string): Set<string> {
  const words = new Set<string>();
  for (const line of content.split(/\r?\n/)) {
    const word = line.trim().toLowerCase();
    if (word && !word.startsWith('#')) {
      words.add(word);
    }
  }
  return words;
}

export function loadDictionary(): ReadonlySet<string> {
  if (cached) return cached;

  for (const candidate of candidatePaths()) {
    if (fs.existsSync(candidate)) {
      cached = parseWordList(fs.readFileSync(candidate, 'utf-8'));
      logger.debug('Loaded reference word list', { path: candidate, words: cached.size });
      return cached;
    }
  }

  logger.warn('Reference word list not found, dictionary sampling disabled');
  cached = new Set<string>();
  return cached;
}
