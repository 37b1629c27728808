import type { PageWindow } from '../options.js';

// Pages without a page number are always read.
export function isPageInWindow(pageNumber: number | null, window?: PageWindow): boolean {
  if (pageNumber === null || !window) return true;
  return pageNumber >= window.min && pageNumber <= window.max;
}
