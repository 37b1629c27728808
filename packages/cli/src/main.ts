import * as path from 'node:path';
import type { ExtractionService } from '@hocr-verses/core';
import { ChokidarWatcher } from '@hocr-verses/watcher-chokidar';
import { createExtractionService, extractOnce, WatchSession } from './extraction-runner.js';
import { NodeFileWriter, readSource } from './file-writer.js';
import { formatExtractionError } from './format-extraction-error.js';
import { createLogger } from './logger.js';
import { parseSettings } from './program.js';

const log = createLogger('Extract');

/** Returns the process exit code. In watch mode it resolves once watching has started. */
export async function main(argv: readonly string[]): Promise<number> {
  const settings = parseSettings(argv);

  let service: ExtractionService;
  try {
    service = createExtractionService(settings, log);
  } catch (error) {
    log.error(formatExtractionError(settings.input, error));
    return 2;
  }

  if (!service.supportsExtension(path.extname(settings.input))) {
    log.warn(`Unexpected extension for ${settings.input}; parsing it as hOCR anyway`);
  }

  const writer = new NodeFileWriter();

  if (settings.watch) {
    const session = new WatchSession(
      new ChokidarWatcher(settings.input),
      service,
      writer,
      createLogger('Watch'),
    );
    await session.start();
    process.once('SIGINT', () => {
      session.stop().catch((error: unknown) => log.error('Failed to stop watcher', error));
    });
    return 0;
  }

  try {
    const source = await readSource(settings.input);
    const written = await extractOnce(service, source, writer);
    createLogger('Save').info(`Wrote ${written.join(', ')}`);
    return 0;
  } catch (error) {
    log.error(formatExtractionError(settings.input, error), error);
    return 1;
  }
}
