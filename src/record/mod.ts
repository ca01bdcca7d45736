import { join } from 'node:path';
import { readFile } from 'node:fs/promises';
import fse from 'fs-extra';
import { PipelineError, describeError } from '../errors.ts';
import { type Book, bookSchema } from './types.ts';

export type { Attachment, Book, Chapter } from './types.ts';

export async function saveRecord(book: Book, outputDir: string, fileName = 'ranobe.json'): Promise<string> {
  const recordPath = join(outputDir, fileName);
  try {
    await fse.outputJson(recordPath, book, { spaces: 2 });
  } catch (error) {
    throw new PipelineError('WriteFailed', `Cannot write ${recordPath}: ${describeError(error)}`, { cause: error });
  }
  return recordPath;
}

export async function loadRecord(recordPath: string): Promise<Book> {
  if (!(await fse.pathExists(recordPath))) {
    throw new PipelineError('NotFound', `Record not found: ${recordPath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(recordPath, 'utf-8'));
  } catch (error) {
    throw new PipelineError('ParseError', `Cannot parse ${recordPath}: ${describeError(error)}`, { cause: error });
  }

  const result = bookSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new PipelineError('ParseError', `Invalid record ${recordPath}${where}: ${issue?.message ?? 'unknown error'}`);
  }
  return result.data;
}
