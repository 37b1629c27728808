export type { BoundingBox } from './bounding-box.js';
export {
  boxHeight,
  boxWidth,
  parseBoundingBox,
  parseLenientInt,
  parsePageNumber,
} from './bounding-box.js';
export type { MarkupDocument, MarkupLine, MarkupPage, MarkupWord } from './markup.js';
export type { Line, PageLayout, Word } from './line.js';
export type { CompositePair, EntityAssembly, TextEntity, VerseMapping } from './entity.js';
