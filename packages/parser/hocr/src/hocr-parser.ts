import type { MarkupDocument, MarkupLine, MarkupPage, MarkupParserPort, MarkupWord } from '@hocr-verses/core';
import { InvalidFileFormatError, ParseError } from '@hocr-verses/core';
import type { Cheerio, CheerioAPI } from 'cheerio';
import { load } from 'cheerio';
import type { Element } from 'domhandler';

const PAGE_SELECTOR = '.ocr_page';
const LINE_SELECTOR = '.ocr_line';
const WORD_SELECTOR = '.ocrx_word';

/**
 * Reads hOCR markup (as written by Tesseract and similar engines) into
 * page/line/word elements. Geometry stays in the raw `title` strings;
 * interpreting it is left to the layout pass.
 */
export class HocrParser implements MarkupParserPort {
  readonly id = 'hocr';
  readonly extensions = ['.html', '.hocr'];

  parse(source: string): MarkupDocument {
    if (source.trim() === '') {
      throw new ParseError('Empty hOCR document');
    }

    const $ = load(source);
    const pages = $(PAGE_SELECTOR)
      .toArray()
      .map((el) => this.readPage($, $(el)));

    if (pages.length === 0) {
      throw new InvalidFileFormatError('No ocr_page elements found');
    }

    return { pages };
  }

  private readPage($: CheerioAPI, page: Cheerio<Element>): MarkupPage {
    const lines = page
      .find(LINE_SELECTOR)
      .toArray()
      .map((el) => this.readLine($, $(el)));
    return { title: page.attr('title') ?? '', lines };
  }

  private readLine($: CheerioAPI, line: Cheerio<Element>): MarkupLine {
    const words = line
      .find(WORD_SELECTOR)
      .toArray()
      .map((el): MarkupWord => {
        const word = $(el);
        return { title: word.attr('title') ?? '', text: word.text() };
      });
    return { title: line.attr('title') ?? '', words };
  }
}
