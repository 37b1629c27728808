export type {
  EntityGeneratorPort,
  GeneratedFile,
  GeneratorOutput,
} from './entity-generator.js';
export type { Logger } from './logger.js';
export type { MarkupParserPort } from './parser.js';
export type { SourceChangeEvent, WatcherPort } from './watcher.js';
