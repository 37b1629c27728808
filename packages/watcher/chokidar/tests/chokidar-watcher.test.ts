import type { SourceChangeEvent } from '@hocr-verses/core';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ChokidarWatcher } from '../src/chokidar-watcher.js';

type EventHandler = (...args: unknown[]) => Promise<void> | void;

const mockWatcher = {
  on: vi.fn().mockReturnThis(),
  close: vi.fn().mockResolvedValue(undefined),
};

vi.mock('chokidar', () => ({
  watch: vi.fn(() => mockWatcher),
}));

vi.mock('node:fs/promises', () => ({
  readFile: vi.fn().mockResolvedValue('<html></html>'),
}));

describe('ChokidarWatcher', () => {
  let watcher: ChokidarWatcher;
  let handlers: Map<string, EventHandler>;

  function emit(event: string, ...args: unknown[]) {
    const handler = handlers.get(event);
    if (!handler) throw new Error(`No handler for event: ${event}`);
    return handler(...args);
  }

  beforeEach(() => {
    vi.clearAllMocks();
    handlers = new Map();

    mockWatcher.on.mockImplementation((event: string, handler: EventHandler) => {
      handlers.set(event, handler);
      return mockWatcher;
    });
    mockWatcher.close.mockResolvedValue(undefined);

    watcher = new ChokidarWatcher('/books/source.hocr.html');
  });

  afterEach(async () => {
    await watcher.stop();
  });

  it('watches the source file with stat and write-finish options', async () => {
    const { watch } = await import('chokidar');

    await watcher.start();

    expect(watch).toHaveBeenCalledWith('/books/source.hocr.html', {
      persistent: true,
      ignoreInitial: false,
      alwaysStat: true,
      awaitWriteFinish: { stabilityThreshold: 200, pollInterval: 50 },
    });
  });

  it('emits a SourceChangeEvent on add', async () => {
    const events: SourceChangeEvent[] = [];
    watcher.onSourceChange(async (event) => {
      events.push(event);
    });

    await watcher.start();
    await emit('add', '/books/source.hocr.html', { mtimeMs: 1700000000000 });

    expect(events).toHaveLength(1);
    expect(events[0].id).toBe('/books/source.hocr.html');
    expect(events[0].name).toBe('source.hocr.html');
    expect(events[0].mtime).toBe(1700000000000);
  });

  it('emits a SourceChangeEvent on change', async () => {
    const events: SourceChangeEvent[] = [];
    watcher.onSourceChange(async (event) => {
      events.push(event);
    });

    await watcher.start();
    await emit('change', '/books/source.hocr.html', { mtimeMs: 1700000001000 });

    expect(events).toHaveLength(1);
    expect(events[0].mtime).toBe(1700000001000);
  });

  it('readText() reads the file as UTF-8', async () => {
    const { readFile } = await import('node:fs/promises');

    const events: SourceChangeEvent[] = [];
    watcher.onSourceChange(async (event) => {
      events.push(event);
    });

    await watcher.start();
    await emit('add', '/books/source.hocr.html', { mtimeMs: 1700000000000 });

    const text = await events[0].readText();
    expect(readFile).toHaveBeenCalledWith('/books/source.hocr.html', 'utf8');
    expect(text).toBe('<html></html>');
  });

  it('uses Date.now() when stats are missing', async () => {
    const dateNowSpy = vi.spyOn(Date, 'now').mockReturnValue(9999999999999);

    const events: SourceChangeEvent[] = [];
    watcher.onSourceChange(async (event) => {
      events.push(event);
    });

    await watcher.start();
    await emit('add', '/books/source.hocr.html', undefined);

    expect(events[0].mtime).toBe(9999999999999);

    dateNowSpy.mockRestore();
  });

  it('reports handler failures under the source name', async () => {
    const handlerError = new Error('handler failed');
    const errors: Error[] = [];

    watcher.onSourceChange(async () => {
      throw handlerError;
    });
    watcher.onError((error) => {
      errors.push(error);
    });

    await watcher.start();
    await emit('change', '/books/source.hocr.html', { mtimeMs: 1700000000000 });

    expect(errors).toHaveLength(1);
    expect(errors[0].message).toBe('source.hocr.html: handler failed');
    expect(errors[0].cause).toBe(handlerError);
  });

  it('listens for writes to the source but not for its removal', async () => {
    await watcher.start();

    expect([...handlers.keys()]).toEqual(['add', 'change', 'error']);
  });

  it('hands each write of the source to the handler in turn', async () => {
    const mtimes: number[] = [];
    watcher.onSourceChange(async (event) => {
      mtimes.push(event.mtime);
    });

    await watcher.start();
    await emit('add', '/books/source.hocr.html', { mtimeMs: 1700000000000 });
    await emit('change', '/books/source.hocr.html', { mtimeMs: 1700000002000 });
    await emit('change', '/books/source.hocr.html', { mtimeMs: 1700000004000 });

    expect(mtimes).toEqual([1700000000000, 1700000002000, 1700000004000]);
  });

  it('wraps non-Error objects raised by chokidar', async () => {
    const errors: Error[] = [];
    watcher.onError((error) => {
      errors.push(error);
    });

    await watcher.start();
    emit('error', 'string error');

    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(Error);
    expect(errors[0].message).toBe('string error');
  });

  it('closes the watcher on stop', async () => {
    await watcher.start();
    await watcher.stop();

    expect(mockWatcher.close).toHaveBeenCalledOnce();
  });

  it('is safe to call stop before start', async () => {
    await expect(watcher.stop()).resolves.toBeUndefined();
  });
});
