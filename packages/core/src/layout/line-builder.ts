import type { BoundingBox } from '../models/bounding-box.js';
import { boxHeight, boxWidth, parseBoundingBox, parsePageNumber } from '../models/bounding-box.js';
import type { Line, PageLayout, Word } from '../models/line.js';
import type { MarkupLine, MarkupPage } from '../models/markup.js';
import type { LayoutOptions } from '../options.js';
import { DEFAULT_LAYOUT_OPTIONS } from '../options.js';

/**
 * Builds the cleaned lines of one page: footnote-region lines and superscript
 * words are dropped, and words are put in left-to-right order.
 * Returns null when the page has no bounding box.
 */
export function buildPageLayout(
  page: MarkupPage,
  options: LayoutOptions = DEFAULT_LAYOUT_OPTIONS,
): PageLayout | null {
  const box = parseBoundingBox(page.title);
  if (!box) return null;

  const footnoteCutoff = box.y0 + Math.trunc(boxHeight(box) * options.footnoteFraction);
  const leftMarginCutoff = box.x0 + Math.trunc(boxWidth(box) * options.leftMarginFraction);

  const lines: Line[] = [];
  for (const rawLine of page.lines) {
    const line = buildLine(rawLine, footnoteCutoff, options.superscriptRisePx);
    if (line) lines.push(line);
  }

  return {
    box,
    pageNumber: parsePageNumber(page.title),
    footnoteCutoff,
    leftMarginCutoff,
    lines,
  };
}

export function buildLine(
  rawLine: MarkupLine,
  footnoteCutoff: number,
  superscriptRisePx: number,
): Line | null {
  const box = parseBoundingBox(rawLine.title);
  if (!box || box.y0 >= footnoteCutoff) return null;

  const words: Word[] = [];
  for (const rawWord of rawLine.words) {
    const wordBox = parseBoundingBox(rawWord.title);
    if (!wordBox) continue;

    const text = rawWord.text.trim();
    if (text.length === 0) continue;
    if (isSuperscript(wordBox, box, superscriptRisePx)) continue;

    words.push({ x: wordBox.x0, text });
  }

  if (words.length === 0) return null;

  words.sort((a, b) => a.x - b.x);
  return { box, words };
}

export function isSuperscript(
  wordBox: BoundingBox,
  lineBox: BoundingBox,
  superscriptRisePx: number,
): boolean {
  return wordBox.y0 < lineBox.y0 - superscriptRisePx;
}
