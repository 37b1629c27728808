export interface BoundingBox {
  readonly x0: number;
  readonly y0: number;
  readonly x1: number;
  readonly y1: number;
}

const BBOX_RE = /bbox\s+(\d+)\s+(\d+)\s+(\d+)\s+(\d+)/;
const PAGE_NUMBER_RE = /ppageno\s+(\d+)/;

/** Unparseable numerals, and ones too long to hold exactly, become 0. */
export function parseLenientInt(text: string): number {
  const value = Number.parseInt(text, 10);
  return Number.isSafeInteger(value) ? value : 0;
}

/**
 * Reads the `bbox x0 y0 x1 y1` property out of an hOCR title attribute.
 * Returns null when the property is missing so the caller can skip the element.
 */
export function parseBoundingBox(title: string): BoundingBox | null {
  const match = title.match(BBOX_RE);
  if (!match) return null;

  return {
    x0: parseLenientInt(match[1]),
    y0: parseLenientInt(match[2]),
    x1: parseLenientInt(match[3]),
    y1: parseLenientInt(match[4]),
  };
}

/** Null means the page carries no page-number constraint. */
export function parsePageNumber(title: string): number | null {
  const match = title.match(PAGE_NUMBER_RE);
  return match ? parseLenientInt(match[1]) : null;
}

export function boxWidth(box: BoundingBox): number {
  return box.x1 - box.x0;
}

export function boxHeight(box: BoundingBox): number {
  return box.y1 - box.y0;
}
