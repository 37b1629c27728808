export interface SourceChangeEvent {
  readonly id: string;
  readonly name: string;
  readonly mtime: number;
  readText(): Promise<string>;
}

export interface WatcherPort {
  onSourceChange(handler: (event: SourceChangeEvent) => Promise<void>): void;
  onError(handler: (error: Error) => void): void;
  start(): Promise<void>;
  stop(): Promise<void>;
}
