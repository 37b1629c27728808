import { ConfigurationError, ExtractionError, FileSystemError } from '@hocr-verses/core';

export function formatExtractionError(fileName: string, error: unknown): string {
  if (error instanceof ConfigurationError) {
    return `Invalid configuration: ${error.message}`;
  }
  if (error instanceof FileSystemError) {
    return `File ${error.operation} failed: ${error.path}`;
  }
  if (error instanceof ExtractionError) {
    switch (error.phase) {
      case 'parse': return `Parse failed: ${fileName}`;
      case 'extract': return `Verse extraction failed: ${fileName}`;
      case 'assemble': return `Entity assembly failed: ${fileName}`;
      case 'generate': return `Generate failed: ${fileName}`;
      case 'save':
        return error.cause instanceof FileSystemError
          ? `Save failed: ${error.cause.path}`
          : `Save failed: ${fileName}`;
    }
  }
  return `Extraction failed: ${fileName}`;
}
