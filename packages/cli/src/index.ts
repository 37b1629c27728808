export { main } from './main.js';
export { createProgram, parseSettings } from './program.js';
export { DEFAULT_SETTINGS, toServiceOptions } from './settings.js';
export type { ExtractionSettings } from './settings.js';
export { createExtractionService, extractOnce, WatchSession } from './extraction-runner.js';
export { NodeFileWriter, readSource, saveGeneratorOutput } from './file-writer.js';
export type { FileWriter } from './file-writer.js';
export { formatExtractionError } from './format-extraction-error.js';
export { createLogger } from './logger.js';
