import { assembleEntities } from './entities/entity-assembler.js';
import { parseCompositePairs } from './entities/composite-pairs.js';
import { ExtractionError } from './exceptions.js';
import type { ExtractionReport, VerseExtraction } from './extract.js';
import { extractVerses } from './extract.js';
import type { CompositePair, EntityAssembly, MarkupDocument } from './models/index.js';
import type { EntityOrder, LayoutOptions, PageWindow } from './options.js';
import type { EntityGeneratorPort, GeneratorOutput } from './ports/entity-generator.js';
import type { Logger } from './ports/logger.js';
import type { MarkupParserPort } from './ports/parser.js';

export interface ExtractionServiceOptions {
  readonly layout: LayoutOptions;
  readonly pageWindow?: PageWindow;
  /** Composite pair list such as `58-59,104-105` */
  readonly pairs: string;
  readonly entityOrder: EntityOrder;
}

export interface ExtractionResult {
  readonly verses: ReadonlyMap<number, string>;
  readonly assembly: EntityAssembly;
  readonly report: ExtractionReport;
  readonly output: GeneratorOutput;
}

export class ExtractionService {
  private readonly pairs: CompositePair[];

  /** Throws ConfigurationError for a malformed pair list. */
  constructor(
    private readonly parser: MarkupParserPort,
    private readonly generator: EntityGeneratorPort,
    private readonly options: ExtractionServiceOptions,
    private readonly logger?: Logger,
  ) {
    this.pairs = parseCompositePairs(options.pairs);
  }

  /** Whether the parser claims files with this extension, e.g. `.hocr`. */
  supportsExtension(extension: string): boolean {
    return this.parser.extensions.some(
      (supportedExt) => supportedExt.toLowerCase() === extension.toLowerCase(),
    );
  }

  async run(source: string): Promise<ExtractionResult> {
    let document: MarkupDocument;
    try {
      document = await this.parser.parse(source);
    } catch (error) {
      throw new ExtractionError('parse', error);
    }

    let extraction: VerseExtraction;
    try {
      extraction = extractVerses(document, {
        layout: this.options.layout,
        pageWindow: this.options.pageWindow,
        logger: this.logger,
      });
    } catch (error) {
      throw new ExtractionError('extract', error);
    }

    let assembly: EntityAssembly;
    try {
      assembly = assembleEntities(extraction.verses, this.pairs, {
        order: this.options.entityOrder,
      });
    } catch (error) {
      throw new ExtractionError('assemble', error);
    }

    let output: GeneratorOutput;
    try {
      output = await this.generator.generate(assembly);
    } catch (error) {
      throw new ExtractionError('generate', error);
    }

    const { report } = extraction;
    this.logger?.info(
      `Extracted ${extraction.verses.size} verses into ${assembly.entities.length} text entities ` +
        `(${report.pagesRead} pages read, ${report.pagesOutsideWindow} outside window, ` +
        `${report.orphanLines} orphan lines) using ${this.parser.id} parser and ` +
        `${this.generator.displayName} output`,
    );

    return { verses: extraction.verses, assembly, report, output };
  }
}
