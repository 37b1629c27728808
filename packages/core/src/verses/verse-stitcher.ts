import type { Line, PageLayout } from '../models/line.js';
import { joinTokens } from './punctuation.js';
import type { VerseAccumulator } from './verse-accumulator.js';

export type StitcherState =
  | { readonly kind: 'idle' }
  | { readonly kind: 'open'; readonly verseNumber: number; readonly buffer: readonly string[] };

const IDLE: StitcherState = { kind: 'idle' };
const VERSE_NUMBER_RE = /^\d+$/;

/** A bare integer token that fits a safe integer, or null. */
export function parseVerseMarker(text: string): number | null {
  if (!VERSE_NUMBER_RE.test(text)) return null;
  const value = Number.parseInt(text, 10);
  return Number.isSafeInteger(value) ? value : null;
}

export interface StitchStats {
  versesOpened: number;
  orphanLines: number;
}

/**
 * Walks cleaned lines and assembles verse-number-prefixed text spans.
 * A line opens a verse when its first word is a bare integer at the left margin;
 * every other line continues the open verse, or is dropped when none is open.
 */
export class VerseStitcher {
  private current: StitcherState = IDLE;
  private readonly stats: StitchStats = { versesOpened: 0, orphanLines: 0 };

  constructor(private readonly accumulator: VerseAccumulator) {}

  get state(): StitcherState {
    return this.current;
  }

  getStats(): StitchStats {
    return { ...this.stats };
  }

  /** Feeds every line of the page, then flushes so verses close at the page boundary. */
  processPage(page: PageLayout): void {
    for (const line of page.lines) {
      this.processLine(line, page.leftMarginCutoff);
    }
    this.flush();
  }

  processLine(line: Line, leftMarginCutoff: number): void {
    const [first, ...rest] = line.words;
    if (!first) return;

    const verseNumber = first.x <= leftMarginCutoff ? parseVerseMarker(first.text) : null;
    if (verseNumber !== null) {
      this.flush();
      this.current = {
        kind: 'open',
        verseNumber,
        buffer: rest.map((w) => w.text),
      };
      this.stats.versesOpened++;
      return;
    }

    if (this.current.kind === 'idle') {
      this.stats.orphanLines++;
      return;
    }

    this.current = {
      ...this.current,
      buffer: [...this.current.buffer, ...line.words.map((w) => w.text)],
    };
  }

  flush(): void {
    if (this.current.kind === 'open' && this.current.buffer.length > 0) {
      this.accumulator.append(this.current.verseNumber, joinTokens(this.current.buffer));
    }
    this.current = IDLE;
  }
}
