export { CsvFileGenerator, DEFAULT_CSV_PATHS, quoteField } from './csv-file-generator.js';
export type { CsvFileGeneratorOptions } from './csv-file-generator.js';
