export class InvalidFileFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidFileFormatError';
  }
}

export class ParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ParseError';
  }
}

export class ConfigurationError extends Error {
  readonly subject: string;
  readonly entry: string;

  /** `subject` names the setting, e.g. `composite pair`. */
  constructor(subject: string, entry: string, message: string) {
    super(`Invalid ${subject} "${entry}": ${message}`);
    this.name = 'ConfigurationError';
    this.subject = subject;
    this.entry = entry;
  }
}

export type ExtractionPhase = 'parse' | 'extract' | 'assemble' | 'generate' | 'save';

export class ExtractionError extends Error {
  readonly phase: ExtractionPhase;

  constructor(phase: ExtractionPhase, cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(`Extraction failed at ${phase}: ${message}`);
    this.name = 'ExtractionError';
    this.phase = phase;
    this.cause = cause;
  }
}

export type FileSystemOperation = 'read' | 'write' | 'mkdir';

export class FileSystemError extends Error {
  readonly operation: FileSystemOperation;
  readonly path: string;

  constructor(operation: FileSystemOperation, filePath: string, cause?: unknown) {
    super(`File system ${operation} failed: ${filePath}`);
    this.name = 'FileSystemError';
    this.operation = operation;
    this.path = filePath;
    this.cause = cause;
  }
}
