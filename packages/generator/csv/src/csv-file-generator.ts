import type {
  EntityAssembly,
  EntityGeneratorPort,
  GeneratorOutput,
  TextEntity,
  VerseMapping,
} from '@hocr-verses/core';

export interface CsvFileGeneratorOptions {
  readonly textsPath: string;
  readonly mappingsPath: string;
}

export const DEFAULT_CSV_PATHS: CsvFileGeneratorOptions = {
  textsPath: 'texts.csv',
  mappingsPath: 'text_verses.csv',
};

const TEXTS_HEADER = 'id,label,text_body';
const MAPPINGS_HEADER = 'text_id,verse_number';

export function quoteField(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

/**
 * Writes the two tables a downstream store imports: one row per text entity,
 * and the join table from entity id to verse number.
 */
export class CsvFileGenerator implements EntityGeneratorPort {
  readonly id = 'csv';
  readonly displayName = 'CSV';

  constructor(private readonly options: CsvFileGeneratorOptions = DEFAULT_CSV_PATHS) {}

  generate(assembly: EntityAssembly): GeneratorOutput {
    return {
      files: [
        { path: this.options.textsPath, content: this.renderTexts(assembly.entities) },
        { path: this.options.mappingsPath, content: this.renderMappings(assembly.mappings) },
      ],
    };
  }

  private renderTexts(entities: readonly TextEntity[]): string {
    const rows = entities.map((e) => `${e.id},${quoteField(e.label)},${quoteField(e.body)}`);
    return toCsv(TEXTS_HEADER, rows);
  }

  private renderMappings(mappings: readonly VerseMapping[]): string {
    const rows = mappings.map((m) => `${m.entityId},${m.verseNumber}`);
    return toCsv(MAPPINGS_HEADER, rows);
  }
}

function toCsv(header: string, rows: string[]): string {
  return `${[header, ...rows].join('\n')}\n`;
}
