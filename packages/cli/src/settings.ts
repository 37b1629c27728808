import type { EntityOrder, ExtractionServiceOptions, LayoutOptions } from '@hocr-verses/core';
import { DEFAULT_ENTITY_ORDER, DEFAULT_LAYOUT_OPTIONS } from '@hocr-verses/core';

export interface ExtractionSettings {
  input: string;
  textsOutput: string;
  mappingsOutput: string;
  pageMin: number;
  pageMax: number;
  pairs: string;
  layout: LayoutOptions;
  entityOrder: EntityOrder;
  watch: boolean;
}

export const ENTITY_ORDER_OPTIONS: EntityOrder[] = ['composites-first', 'by-verse'];

export const DEFAULT_SETTINGS: ExtractionSettings = {
  input: 'book_hocr.html',
  textsOutput: 'texts.csv',
  mappingsOutput: 'text_verses.csv',
  pageMin: 60,
  pageMax: 96,
  pairs: '58-59,104-105,153-154,195-196,229-230,256-257,268-269,271-272',
  layout: DEFAULT_LAYOUT_OPTIONS,
  entityOrder: DEFAULT_ENTITY_ORDER,
  watch: false,
};

export function toServiceOptions(settings: ExtractionSettings): ExtractionServiceOptions {
  return {
    layout: settings.layout,
    pageWindow: { min: settings.pageMin, max: settings.pageMax },
    pairs: settings.pairs,
    entityOrder: settings.entityOrder,
  };
}
