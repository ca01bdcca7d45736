import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Logger } from '../logger.ts';

const TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z \| /;

async function lines(path: string): Promise<string[]> {
  const text = await readFile(path, 'utf8');
  return text.trimEnd().split('\n').map((line) => line.replace(TIMESTAMP, ''));
}

describe('Logger', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ranobe-logs-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes pipeline events and requests to separate files', async () => {
    const logger = await Logger.open(join(dir, 'logs'));

    logger.listen({ type: 'log', level: 'warn', message: 'Cover download failed', meta: { id: '7' } });
    logger.listen({
      type: 'http:request',
      url: 'https://api.test/a',
      attempt: 1,
      maxAttempts: 3,
      status: 503,
      duration: 12,
    });
    logger.listen({
      type: 'http:request',
      url: 'https://api.test/b',
      attempt: 2,
      maxAttempts: 3,
      error: 'socket hang up',
      duration: 5,
    });
    logger.listen({ type: 'progress', fraction: 0.5, description: 'ignored' });
    logger.listen({ type: 'processing:complete', outputPath: 'out/book.epub' });
    await logger.close();

    expect(await lines(join(dir, 'logs', 'ranobe2epub.log'))).toEqual([
      'WARN: Cover download failed {"id":"7"}',
      'INFO: EPUB created: out/book.epub',
    ]);
    expect(await lines(join(dir, 'logs', 'requests.log'))).toEqual([
      'GET https://api.test/a - HTTP 503 (12ms) attempt 1/3',
      'GET https://api.test/b - FAILED socket hang up (5ms) attempt 2/3',
    ]);
  });

  it('records the error message with failures', async () => {
    const logger = await Logger.open(dir);

    logger.error('Run failed', new Error('disk full'));
    await logger.close();

    const [line] = await lines(join(dir, 'ranobe2epub.log'));
    expect(line).toMatch(/^ERROR: Run failed \{"error":"disk full","stack":"Error: disk full/);
  });
});
