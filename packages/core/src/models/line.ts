import type { BoundingBox } from './bounding-box.js';

export interface Word {
  /** Left edge of the word box */
  readonly x: number;
  readonly text: string;
}

export interface Line {
  readonly box: BoundingBox;
  /** Sorted by ascending x */
  readonly words: readonly Word[];
}

export interface PageLayout {
  readonly box: BoundingBox;
  readonly pageNumber: number | null;
  /** Lines whose top sits at or below this y are footnotes */
  readonly footnoteCutoff: number;
  /** A verse number must start at or left of this x */
  readonly leftMarginCutoff: number;
  readonly lines: readonly Line[];
}
