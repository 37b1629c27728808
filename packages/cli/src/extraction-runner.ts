import type { Logger, SourceChangeEvent, WatcherPort } from '@hocr-verses/core';
import { ExtractionService } from '@hocr-verses/core';
import { CsvFileGenerator } from '@hocr-verses/generator-csv';
import { HocrParser } from '@hocr-verses/parser-hocr';
import type { FileWriter } from './file-writer.js';
import { saveGeneratorOutput } from './file-writer.js';
import { formatExtractionError } from './format-extraction-error.js';
import type { ExtractionSettings } from './settings.js';
import { toServiceOptions } from './settings.js';

/** Throws ConfigurationError when the pair list is malformed. */
export function createExtractionService(
  settings: ExtractionSettings,
  logger?: Logger,
): ExtractionService {
  const generator = new CsvFileGenerator({
    textsPath: settings.textsOutput,
    mappingsPath: settings.mappingsOutput,
  });
  return new ExtractionService(new HocrParser(), generator, toServiceOptions(settings), logger);
}

export async function extractOnce(
  service: ExtractionService,
  source: string,
  writer: FileWriter,
): Promise<string[]> {
  const result = await service.run(source);
  return saveGeneratorOutput(result.output, writer);
}

/**
 * Re-runs extraction whenever the watched source changes. Runs are queued so
 * two change events never write the outputs concurrently.
 */
export class WatchSession {
  private lastMtime: number | undefined;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly watcher: WatcherPort,
    private readonly service: ExtractionService,
    private readonly writer: FileWriter,
    private readonly logger: Logger,
  ) {}

  async start(): Promise<void> {
    this.watcher.onSourceChange((event) => this.enqueue(event));
    this.watcher.onError((error) => this.logger.error('Watcher error', error));
    await this.watcher.start();
  }

  stop(): Promise<void> {
    return this.watcher.stop();
  }

  private enqueue(event: SourceChangeEvent): Promise<void> {
    this.queue = this.queue.then(() => this.handle(event));
    return this.queue;
  }

  private async handle(event: SourceChangeEvent): Promise<void> {
    if (this.lastMtime !== undefined && event.mtime <= this.lastMtime) {
      this.logger.info(`Skipped (up-to-date): ${event.name}`);
      return;
    }
    this.lastMtime = event.mtime;

    try {
      const source = await event.readText();
      const written = await extractOnce(this.service, source, this.writer);
      this.logger.info(`Wrote ${written.join(', ')}`);
    } catch (error) {
      this.logger.error(formatExtractionError(event.name, error), error);
    }
  }
}
