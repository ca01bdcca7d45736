export type LogLevel = 'info' | 'warn' | 'error';

export interface ProgressUpdateEvent {
  type: 'progress';
  fraction: number;
  description: string;
}

export interface LogEvent {
  type: 'log';
  level: LogLevel;
  message: string;
  meta?: Record<string, unknown>;
}

export interface HttpRequestEvent {
  type: 'http:request';
  url: string;
  attempt: number;
  maxAttempts: number;
  status?: number;
  error?: string;
  duration: number;
}

export interface BookAcquiredEvent {
  type: 'book:acquired';
  recordPath: string;
  title: string;
  totalChapters: number;
  skippedChapters: number;
}

export interface EpubAssembledEvent {
  type: 'epub:assembled';
  outputPath: string;
  totalVolumes: number;
  totalChapters: number;
  totalImages: number;
}

export interface ProcessingCompleteEvent {
  type: 'processing:complete';
  outputPath: string;
}

export type ProgressEvent =
  | ProgressUpdateEvent
  | LogEvent
  | HttpRequestEvent
  | BookAcquiredEvent
  | EpubAssembledEvent
  | ProcessingCompleteEvent;

export type EventListener = (event: ProgressEvent) => void;
