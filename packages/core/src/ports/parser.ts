import type { MarkupDocument } from '../models/index.js';

export interface MarkupParserPort {
  /** Unique identifier for this parser */
  readonly id: string;

  /** Supported file extensions */
  readonly extensions: string[];

  /** Parse source markup into page/line/word elements */
  parse(source: string): MarkupDocument | Promise<MarkupDocument>;
}
