import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { GeneratorOutput } from '@hocr-verses/core';
import { ExtractionError, FileSystemError } from '@hocr-verses/core';

export interface FileWriter {
  writeFile(filePath: string, content: string): Promise<void>;
}

export class NodeFileWriter implements FileWriter {
  async writeFile(filePath: string, content: string): Promise<void> {
    const dir = path.dirname(filePath);
    try {
      await fs.mkdir(dir, { recursive: true });
    } catch (error) {
      throw new FileSystemError('mkdir', dir, error);
    }

    try {
      await fs.writeFile(filePath, content, 'utf8');
    } catch (error) {
      throw new FileSystemError('write', filePath, error);
    }
  }
}

export async function readSource(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new FileSystemError('read', filePath, error);
  }
}

/** Writes every generated file and returns their paths in order. */
export async function saveGeneratorOutput(
  output: GeneratorOutput,
  writer: FileWriter,
): Promise<string[]> {
  const written: string[] = [];
  try {
    for (const file of output.files) {
      await writer.writeFile(file.path, file.content);
      written.push(file.path);
    }
  } catch (error) {
    if (error instanceof ExtractionError) throw error;
    throw new ExtractionError('save', error);
  }
  return written;
}
