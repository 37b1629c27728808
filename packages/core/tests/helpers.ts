import type { MarkupLine, MarkupPage, MarkupWord } from '../src/models/index.js';

export function bboxTitle(x0: number, y0: number, x1: number, y1: number): string {
  return `bbox ${x0} ${y0} ${x1} ${y1}`;
}

export function createWord(text: string, x: number, y: number, width = 40): MarkupWord {
  return { title: `${bboxTitle(x, y, x + width, y + 20)}; x_wconf 95`, text };
}

export function createLine(y: number, words: MarkupWord[]): MarkupLine {
  return { title: `${bboxTitle(10, y, 900, y + 30)}; baseline 0 -5`, words };
}

export interface PageShape {
  width?: number;
  height?: number;
  pageNumber?: number;
}

export function createPage(lines: MarkupLine[], shape: PageShape = {}): MarkupPage {
  const { width = 1000, height = 1000, pageNumber } = shape;
  const pageNo = pageNumber === undefined ? '' : `; ppageno ${pageNumber}`;
  return { title: `image "page.png"; ${bboxTitle(0, 0, width, height)}${pageNo}`, lines };
}

/** A line of words laid out left to right, 60px apart, starting at x */
export function createTextLine(y: number, text: string, x = 10): MarkupLine {
  const words = text.split(' ').map((token, i) => createWord(token, x + i * 60, y));
  return createLine(y, words);
}
