import type { CompositePair, EntityAssembly, TextEntity, VerseMapping } from '../models/entity.js';
import type { EntityOrder } from '../options.js';
import { DEFAULT_ENTITY_ORDER } from '../options.js';

export const COMPOSITE_LABEL_SEPARATOR = '–';

interface EntityDraft {
  readonly label: string;
  readonly body: string;
  readonly verseNumbers: readonly number[];
}

export interface AssembleOptions {
  readonly order?: EntityOrder;
}

/**
 * Groups verses into text entities: one per configured pair that has at least
 * one side present, then one per remaining verse in ascending order.
 * Ids are 1-based and follow emission order.
 */
export function assembleEntities(
  verses: ReadonlyMap<number, string>,
  pairs: readonly CompositePair[],
  options: AssembleOptions = {},
): EntityAssembly {
  const consumed = new Set<number>();
  const drafts: EntityDraft[] = [];

  for (const pair of pairs) {
    const draft = compositeDraft(verses, pair);
    if (!draft) continue;

    drafts.push(draft);
    consumed.add(pair.first);
    consumed.add(pair.second);
  }

  const singles = [...verses.keys()]
    .filter((n) => !consumed.has(n))
    .sort((a, b) => a - b);
  for (const n of singles) {
    drafts.push({ label: String(n), body: verses.get(n) ?? '', verseNumbers: [n] });
  }

  const order = options.order ?? DEFAULT_ENTITY_ORDER;
  if (order === 'by-verse') {
    // Array#sort is stable, so composites keep configuration order on ties.
    drafts.sort((a, b) => lowestVerse(a) - lowestVerse(b));
  }

  return toAssembly(drafts);
}

function compositeDraft(
  verses: ReadonlyMap<number, string>,
  pair: CompositePair,
): EntityDraft | null {
  const firstText = verses.get(pair.first);
  const secondText = verses.get(pair.second);
  if (firstText === undefined && secondText === undefined) return null;

  const body = [firstText, secondText]
    .filter((t): t is string => t !== undefined && t.trim() !== '')
    .join(' ')
    .trim();

  return {
    label: `${pair.first}${COMPOSITE_LABEL_SEPARATOR}${pair.second}`,
    body,
    verseNumbers: [pair.first, pair.second],
  };
}

function lowestVerse(draft: EntityDraft): number {
  return Math.min(...draft.verseNumbers);
}

function toAssembly(drafts: readonly EntityDraft[]): EntityAssembly {
  const entities: TextEntity[] = [];
  const mappings: VerseMapping[] = [];

  drafts.forEach((draft, index) => {
    const id = index + 1;
    entities.push({ id, label: draft.label, body: draft.body });
    for (const verseNumber of draft.verseNumbers) {
      mappings.push({ entityId: id, verseNumber });
    }
  });

  return { entities, mappings };
}
