export * from './models/index.js';

export type {
  EntityGeneratorPort,
  GeneratedFile,
  GeneratorOutput,
  Logger,
  MarkupParserPort,
  SourceChangeEvent,
  WatcherPort,
} from './ports/index.js';

export {
  ConfigurationError,
  ExtractionError,
  FileSystemError,
  InvalidFileFormatError,
  ParseError,
} from './exceptions.js';
export type { ExtractionPhase, FileSystemOperation } from './exceptions.js';

export { DEFAULT_ENTITY_ORDER, DEFAULT_LAYOUT_OPTIONS } from './options.js';
export type { EntityOrder, LayoutOptions, PageWindow } from './options.js';

export { buildLine, buildPageLayout, isSuperscript } from './layout/line-builder.js';
export { isPageInWindow } from './layout/page-window.js';

export { joinTokens, normalizePunctuationSpacing } from './verses/punctuation.js';
export { VerseAccumulator } from './verses/verse-accumulator.js';
export { parseVerseMarker, VerseStitcher } from './verses/verse-stitcher.js';
export type { StitcherState, StitchStats } from './verses/verse-stitcher.js';

export { parseCompositePairs } from './entities/composite-pairs.js';
export { assembleEntities, COMPOSITE_LABEL_SEPARATOR } from './entities/entity-assembler.js';
export type { AssembleOptions } from './entities/entity-assembler.js';

export { extractVerses } from './extract.js';
export type { ExtractionReport, ExtractVersesOptions, VerseExtraction } from './extract.js';

export { ExtractionService } from './extraction-service.js';
export type { ExtractionResult, ExtractionServiceOptions } from './extraction-service.js';
