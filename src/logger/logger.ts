import { createWriteStream, type WriteStream } from 'node:fs';
import { join } from 'node:path';
import fse from 'fs-extra';
import type { HttpRequestEvent, LogLevel, ProgressEvent } from '../events/types.ts';

export class Logger {
  private readonly logFile: WriteStream;
  private readonly requestLogFile: WriteStream;

  private constructor(logFile: WriteStream, requestLogFile: WriteStream) {
    this.logFile = logFile;
    this.requestLogFile = requestLogFile;
  }

  static async open(logDir = './logs'): Promise<Logger> {
    await fse.ensureDir(logDir);

    return new Logger(
      createWriteStream(join(logDir, 'ranobe2epub.log'), { flags: 'a' }),
      createWriteStream(join(logDir, 'requests.log'), { flags: 'a' }),
    );
  }

  private writeToFile(file: WriteStream, message: string): void {
    const timestamp = new Date().toISOString();
    file.write(`${timestamp} | ${message}\n`);
  }

  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    const suffix = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    this.writeToFile(this.logFile, `${level.toUpperCase()}: ${message}${suffix}`);
  }

  error(message: string, error?: unknown, meta?: Record<string, unknown>): void {
    const errorInfo = error instanceof Error ? { error: error.message, stack: error.stack } : { error: String(error) };
    this.log('error', message, { ...errorInfo, ...meta });
  }

  logRequest(event: HttpRequestEvent): void {
    const outcome = event.status !== undefined ? `HTTP ${event.status}` : `FAILED ${event.error ?? ''}`.trim();
    this.writeToFile(
      this.requestLogFile,
      `GET ${event.url} - ${outcome} (${event.duration}ms) attempt ${event.attempt}/${event.maxAttempts}`,
    );
  }

  listen(event: ProgressEvent): void {
    switch (event.type) {
      case 'log':
        this.log(event.level, event.message, event.meta);
        break;
      case 'http:request':
        this.logRequest(event);
        break;
      case 'book:acquired':
        this.log('info', `Record saved: ${event.recordPath}`, {
          chapters: event.totalChapters,
          skipped: event.skippedChapters,
        });
        break;
      case 'processing:complete':
        this.log('info', `EPUB created: ${event.outputPath}`);
        break;
    }
  }

  close(): Promise<void> {
    return Promise.all([endStream(this.logFile), endStream(this.requestLogFile)]).then(() => undefined);
  }
}

function endStream(stream: WriteStream): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.once('error', reject);
    stream.end(() => resolve());
  });
}
