import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { SourceChangeEvent, WatcherPort } from '@hocr-verses/core';
import type { FSWatcher } from 'chokidar';
import { watch } from 'chokidar';

function normalizeError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/** Watches one source document and reports each write to it. */
export class ChokidarWatcher implements WatcherPort {
  private watcher: FSWatcher | null = null;
  private changeHandler: ((event: SourceChangeEvent) => Promise<void>) | null = null;
  private errorHandler: ((error: Error) => void) | null = null;

  constructor(private readonly sourcePath: string) {}

  onSourceChange(handler: (event: SourceChangeEvent) => Promise<void>): void {
    this.changeHandler = handler;
  }

  onError(handler: (error: Error) => void): void {
    this.errorHandler = handler;
  }

  start(): Promise<void> {
    this.watcher = watch(this.sourcePath, {
      persistent: true,
      ignoreInitial: false,
      alwaysStat: true,
      awaitWriteFinish: { stabilityThreshold: 200, pollInterval: 50 },
    });

    const changeListener = (filePath: string, stats?: { mtimeMs: number }): void => {
      void this.handleChange(filePath, stats);
    };
    this.watcher.on('add', changeListener);
    this.watcher.on('change', changeListener);
    this.watcher.on('error', (error: unknown) => {
      this.errorHandler?.(normalizeError(error));
    });

    return Promise.resolve();
  }

  async stop(): Promise<void> {
    await this.watcher?.close();
    this.watcher = null;
  }

  private async handleChange(
    filePath: string,
    stats: { mtimeMs: number } | undefined,
  ): Promise<void> {
    const event: SourceChangeEvent = {
      id: filePath,
      name: path.basename(filePath),
      mtime: stats?.mtimeMs ?? Date.now(),
      readText: () => fs.readFile(filePath, 'utf8'),
    };

    try {
      await this.changeHandler?.(event);
    } catch (error) {
      const cause = normalizeError(error);
      this.errorHandler?.(new Error(`${event.name}: ${cause.message}`, { cause }));
    }
  }
}
