import type { EntityOrder } from '@hocr-verses/core';
import { Command, InvalidArgumentError } from 'commander';
import type { ExtractionSettings } from './settings.js';
import { DEFAULT_SETTINGS, ENTITY_ORDER_OPTIONS } from './settings.js';

type CliOptions = {
  in: string;
  texts: string;
  textVerses: string;
  pageMin: number;
  pageMax: number;
  pairs: string;
  footnoteFraction: number;
  leftMarginFraction: number;
  superscriptRise: number;
  order: EntityOrder;
  watch: boolean;
};

function parseInteger(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return Number.parseInt(value, 10);
}

function parseFraction(value: string): number {
  const fraction = Number(value);
  if (value.trim() === '' || !Number.isFinite(fraction) || fraction < 0 || fraction > 1) {
    throw new InvalidArgumentError('Expected a number between 0 and 1.');
  }
  return fraction;
}

function parseEntityOrder(value: string): EntityOrder {
  const order = ENTITY_ORDER_OPTIONS.find((o) => o === value);
  if (!order) {
    throw new InvalidArgumentError(`Expected one of: ${ENTITY_ORDER_OPTIONS.join(', ')}.`);
  }
  return order;
}

export function createProgram(): Command {
  const { layout } = DEFAULT_SETTINGS;
  return new Command()
    .name('hocr-verses')
    .description('Extract numbered verses from an hOCR document into CSV tables')
    .option('--in <path>', 'hOCR HTML file', DEFAULT_SETTINGS.input)
    .option('--texts <path>', 'output CSV for texts (id,label,text_body)', DEFAULT_SETTINGS.textsOutput)
    .option(
      '--text-verses <path>',
      'output CSV for text_verses (text_id,verse_number)',
      DEFAULT_SETTINGS.mappingsOutput,
    )
    .option('--page-min <n>', 'first hOCR page number to read (inclusive)', parseInteger, DEFAULT_SETTINGS.pageMin)
    .option('--page-max <n>', 'last hOCR page number to read (inclusive)', parseInteger, DEFAULT_SETTINGS.pageMax)
    .option('--pairs <list>', 'comma-separated composite pairs A-B', DEFAULT_SETTINGS.pairs)
    .option(
      '--footnote-fraction <f>',
      'lines starting below this fraction of page height are footnotes',
      parseFraction,
      layout.footnoteFraction,
    )
    .option(
      '--left-margin-fraction <f>',
      'verse numbers must start within this fraction of page width',
      parseFraction,
      layout.leftMarginFraction,
    )
    .option(
      '--superscript-rise <px>',
      'words rising more than this above the line top are superscripts',
      parseInteger,
      layout.superscriptRisePx,
    )
    .option('--order <order>', 'entity order: composites-first or by-verse', parseEntityOrder, DEFAULT_SETTINGS.entityOrder)
    .option('--watch', 're-run whenever the input file changes', DEFAULT_SETTINGS.watch);
}

/** Parses user arguments (without the node and script entries) into settings. */
export function parseSettings(
  argv: readonly string[],
  program: Command = createProgram(),
): ExtractionSettings {
  program.parse([...argv], { from: 'user' });
  const opts = program.opts<CliOptions>();

  if (opts.pageMin > opts.pageMax) {
    program.error('error: --page-min must not exceed --page-max');
  }

  return {
    input: opts.in,
    textsOutput: opts.texts,
    mappingsOutput: opts.textVerses,
    pageMin: opts.pageMin,
    pageMax: opts.pageMax,
    pairs: opts.pairs,
    layout: {
      footnoteFraction: opts.footnoteFraction,
      leftMarginFraction: opts.leftMarginFraction,
      superscriptRisePx: opts.superscriptRise,
    },
    entityOrder: opts.order,
    watch: opts.watch,
  };
}
