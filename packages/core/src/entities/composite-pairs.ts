import { ConfigurationError } from '../exceptions.js';
import type { CompositePair } from '../models/entity.js';

const VERSE_NUMBER_RE = /^\d+$/;
const PAIR_SUBJECT = 'composite pair';

/**
 * Parses a comma-separated list of `A-B` pairs, e.g. `58-59,104-105`.
 * Blank entries are ignored; any other malformed entry throws ConfigurationError.
 */
export function parseCompositePairs(list: string): CompositePair[] {
  const trimmed = list.trim();
  if (trimmed === '') return [];

  const pairs: CompositePair[] = [];
  const seen = new Set<number>();

  for (const chunk of trimmed.split(',')) {
    const entry = chunk.trim();
    if (entry === '') continue;

    const pair = parsePairEntry(entry);
    for (const n of [pair.first, pair.second]) {
      if (seen.has(n)) {
        throw new ConfigurationError(
          PAIR_SUBJECT,
          entry,
          `verse ${n} already belongs to another pair`,
        );
      }
      seen.add(n);
    }
    pairs.push(pair);
  }

  return pairs;
}

function parsePairEntry(entry: string): CompositePair {
  const parts = entry.split('-');
  if (parts.length !== 2) {
    throw new ConfigurationError(PAIR_SUBJECT, entry, 'expected A-B');
  }

  const [first, second] = parts.map((p) => parseVerseNumber(entry, p.trim()));
  if (first === second) {
    throw new ConfigurationError(PAIR_SUBJECT, entry, 'a pair needs two different verses');
  }
  return { first, second };
}

function parseVerseNumber(entry: string, text: string): number {
  if (!VERSE_NUMBER_RE.test(text)) {
    throw new ConfigurationError(PAIR_SUBJECT, entry, `"${text}" is not a verse number`);
  }
  const value = Number.parseInt(text, 10);
  if (!Number.isSafeInteger(value)) {
    throw new ConfigurationError(PAIR_SUBJECT, entry, `"${text}" is not a verse number`);
  }
  if (value <= 0) {
    throw new ConfigurationError(PAIR_SUBJECT, entry, 'verse numbers start at 1');
  }
  return value;
}
