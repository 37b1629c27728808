import { describe, expect, it, vi } from 'vitest';
import { ConfigurationError, ExtractionError, ParseError } from '../src/exceptions.js';
import { ExtractionService } from '../src/extraction-service.js';
import type { ExtractionServiceOptions } from '../src/extraction-service.js';
import type { EntityAssembly, MarkupDocument } from '../src/models/index.js';
import { DEFAULT_LAYOUT_OPTIONS } from '../src/options.js';
import type { EntityGeneratorPort } from '../src/ports/entity-generator.js';
import type { Logger } from '../src/ports/logger.js';
import type { MarkupParserPort } from '../src/ports/parser.js';
import { createPage, createTextLine } from './helpers.js';

const DOCUMENT: MarkupDocument = {
  pages: [
    createPage(
      [createTextLine(100, '57 alone'), createTextLine(140, '58 first ,'), createTextLine(180, '59 second .')],
      { width: 500, height: 1000, pageNumber: 60 },
    ),
  ],
};

function createMockParserPort(document: MarkupDocument = DOCUMENT): MarkupParserPort {
  return {
    id: 'test-parser',
    extensions: ['.html'],
    parse: vi.fn().mockReturnValue(document),
  };
}

function createMockGeneratorPort(): EntityGeneratorPort {
  return {
    id: 'test-generator',
    displayName: 'Test Generator',
    generate: vi.fn().mockReturnValue({ files: [{ path: 'out.csv', content: 'x' }] }),
  };
}

function createMockLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const OPTIONS: ExtractionServiceOptions = {
  layout: DEFAULT_LAYOUT_OPTIONS,
  pageWindow: { min: 60, max: 96 },
  pairs: '58-59',
  entityOrder: 'composites-first',
};

describe('ExtractionService', () => {
  it('parses, stitches, assembles and generates output', async () => {
    const parser = createMockParserPort();
    const generator = createMockGeneratorPort();
    const service = new ExtractionService(parser, generator, OPTIONS);

    const result = await service.run('<html></html>');

    const expected: EntityAssembly = {
      entities: [
        { id: 1, label: '58–59', body: 'first, second.' },
        { id: 2, label: '57', body: 'alone' },
      ],
      mappings: [
        { entityId: 1, verseNumber: 58 },
        { entityId: 1, verseNumber: 59 },
        { entityId: 2, verseNumber: 57 },
      ],
    };
    expect(parser.parse).toHaveBeenCalledWith('<html></html>');
    expect(result.assembly).toEqual(expected);
    expect(generator.generate).toHaveBeenCalledWith(expected);
    expect(result.output.files).toEqual([{ path: 'out.csv', content: 'x' }]);
  });

  it('logs a summary line', async () => {
    const logger = createMockLogger();
    const service = new ExtractionService(
      createMockParserPort(),
      createMockGeneratorPort(),
      OPTIONS,
      logger,
    );

    await service.run('');

    expect(logger.info).toHaveBeenCalledWith(
      'Extracted 3 verses into 2 text entities (1 pages read, 0 outside window, 0 orphan lines) ' +
        'using test-parser parser and Test Generator output',
    );
  });

  it('matches source extensions against the parser, ignoring case', () => {
    const service = new ExtractionService(createMockParserPort(), createMockGeneratorPort(), OPTIONS);

    expect(service.supportsExtension('.html')).toBe(true);
    expect(service.supportsExtension('.HTML')).toBe(true);
    expect(service.supportsExtension('.txt')).toBe(false);
    expect(service.supportsExtension('')).toBe(false);
  });

  it('rejects a malformed pair list at construction', () => {
    expect(
      () =>
        new ExtractionService(createMockParserPort(), createMockGeneratorPort(), {
          ...OPTIONS,
          pairs: '58-59,60',
        }),
    ).toThrow(ConfigurationError);
  });

  it('wraps parser failures as a parse-phase ExtractionError', async () => {
    const parser = createMockParserPort();
    const cause = new ParseError('broken markup');
    vi.mocked(parser.parse).mockImplementation(() => {
      throw cause;
    });
    const service = new ExtractionService(parser, createMockGeneratorPort(), OPTIONS);

    const promise = service.run('<html>');

    await expect(promise).rejects.toBeInstanceOf(ExtractionError);
    await expect(promise).rejects.toMatchObject({
      phase: 'parse',
      cause,
      message: 'Extraction failed at parse: broken markup',
    });
  });

  it('wraps generator failures as a generate-phase ExtractionError', async () => {
    const generator = createMockGeneratorPort();
    vi.mocked(generator.generate).mockRejectedValue(new Error('disk full'));
    const service = new ExtractionService(createMockParserPort(), generator, OPTIONS);

    await expect(service.run('')).rejects.toMatchObject({ phase: 'generate' });
  });

  it('honours the entity order option', async () => {
    const service = new ExtractionService(createMockParserPort(), createMockGeneratorPort(), {
      ...OPTIONS,
      entityOrder: 'by-verse',
    });

    const result = await service.run('');

    expect(result.assembly.entities.map((e) => e.label)).toEqual(['57', '58–59']);
  });
});
