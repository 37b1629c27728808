import { buildPageLayout } from './layout/line-builder.js';
import { isPageInWindow } from './layout/page-window.js';
import { parsePageNumber } from './models/bounding-box.js';
import type { MarkupDocument } from './models/markup.js';
import type { LayoutOptions, PageWindow } from './options.js';
import { DEFAULT_LAYOUT_OPTIONS } from './options.js';
import type { Logger } from './ports/logger.js';
import { VerseAccumulator } from './verses/verse-accumulator.js';
import { VerseStitcher } from './verses/verse-stitcher.js';

export interface ExtractVersesOptions {
  readonly layout?: Partial<LayoutOptions>;
  readonly pageWindow?: PageWindow;
  readonly logger?: Logger;
}

export interface ExtractionReport {
  readonly pagesRead: number;
  readonly pagesOutsideWindow: number;
  readonly pagesWithoutBox: number;
  readonly linesKept: number;
  readonly versesOpened: number;
  readonly orphanLines: number;
  /** Verse numbers whose text was assembled from more than one flush */
  readonly reopenedVerses: readonly number[];
}

export interface VerseExtraction {
  /** Verse number to text, ascending */
  readonly verses: ReadonlyMap<number, string>;
  readonly report: ExtractionReport;
}

export function extractVerses(
  document: MarkupDocument,
  options: ExtractVersesOptions = {},
): VerseExtraction {
  const layoutOptions: LayoutOptions = { ...DEFAULT_LAYOUT_OPTIONS, ...options.layout };
  const accumulator = new VerseAccumulator();
  const stitcher = new VerseStitcher(accumulator);

  let pagesRead = 0;
  let pagesOutsideWindow = 0;
  let pagesWithoutBox = 0;
  let linesKept = 0;

  for (const page of document.pages) {
    if (!isPageInWindow(parsePageNumber(page.title), options.pageWindow)) {
      pagesOutsideWindow++;
      continue;
    }
    const layout = buildPageLayout(page, layoutOptions);
    if (!layout) {
      pagesWithoutBox++;
      continue;
    }

    pagesRead++;
    linesKept += layout.lines.length;
    stitcher.processPage(layout);
  }

  const reopenedVerses = accumulator.reopenedVerses;
  for (const n of reopenedVerses) {
    options.logger?.warn(`Verse ${n} appeared more than once; fragments were joined`);
  }

  return {
    verses: accumulator.toMap(),
    report: {
      pagesRead,
      pagesOutsideWindow,
      pagesWithoutBox,
      linesKept,
      ...stitcher.getStats(),
      reopenedVerses,
    },
  };
}
