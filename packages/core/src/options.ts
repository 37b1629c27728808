export interface LayoutOptions {
  /** Fraction of page height below which lines are treated as footnotes */
  readonly footnoteFraction: number;
  /** Fraction of page width within which a verse number must start */
  readonly leftMarginFraction: number;
  /** Words whose top rises more than this many pixels above the line top are superscripts */
  readonly superscriptRisePx: number;
}

/** Inclusive range of hOCR page numbers to read */
export interface PageWindow {
  readonly min: number;
  readonly max: number;
}

/**
 * `composites-first` emits every composite pair before the singles.
 * `by-verse` interleaves composites among singles by their lowest verse number.
 */
export type EntityOrder = 'composites-first' | 'by-verse';

export const DEFAULT_LAYOUT_OPTIONS: LayoutOptions = {
  footnoteFraction: 0.82,
  leftMarginFraction: 0.2,
  superscriptRisePx: 5,
};

export const DEFAULT_ENTITY_ORDER: EntityOrder = 'composites-first';
