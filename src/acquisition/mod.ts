import { extname, join } from 'node:path';
import type { AxiosInstance } from 'axios';
import fse from 'fs-extra';
import { type PipelineOptions, resolveOptions } from '../config.ts';
import { PipelineError, describeError } from '../errors.ts';
import { EventEmitter } from '../events/emitter.ts';
import { saveRecord } from '../record/mod.ts';
import type { Attachment, Book, Chapter } from '../record/types.ts';
import { type ChapterStub, RanobeClient, createHttpClient } from './client.ts';
import { classifyContent, imageFileName, normalizeContent } from './content.ts';
import { resolveBookId } from './reference.ts';

export {
  RanobeClient,
  attachmentFileName,
  attachmentIdentifier,
  chapterNumberParam,
  createHttpClient,
} from './client.ts';
export type { BookInfo, ChapterBody, ChapterStub, ImageFetcher } from './client.ts';
export { classifyContent, imageFileName, normalizeContent } from './content.ts';
export type { ChapterContent, NormalizeContext } from './content.ts';
export { resolveBookId } from './reference.ts';
export { retry } from './retry.ts';

export interface AcquireContext {
  options?: PipelineOptions;
  events?: EventEmitter;
  http?: AxiosInstance;
}

const CHAPTERS_START = 0.15;
const CHAPTERS_END = 0.95;

/**
 * Downloads a book and writes the Intermediate Record (`ranobe.json` plus the
 * `imgs/` directory) into `outputDir`. Returns the record path.
 */
export async function acquire(reference: string, outputDir: string, context: AcquireContext = {}): Promise<string> {
  const options = context.options ?? resolveOptions();
  const events = context.events ?? new EventEmitter();
  const client = new RanobeClient(context.http ?? createHttpClient(), options, events);
  const imagesDir = join(outputDir, options.imagesDirName);

  events.progress(0, 'Preparing directories');
  try {
    await fse.ensureDir(imagesDir);
  } catch (error) {
    throw new PipelineError('WriteFailed', `Cannot create ${imagesDir}: ${describeError(error)}`, { cause: error });
  }

  events.progress(0.05, 'Fetching book info');
  const bookId = resolveBookId(reference);
  const info = await client.fetchBookInfo(bookId);
  events.info(`Book: ${info.title}`, { id: bookId });

  events.progress(0.1, 'Downloading cover');
  let coverImage: string | null = null;
  if (info.coverUrl) {
    const coverFileName = `cover${extname(imageFileName(info.coverUrl, options.siteOrigin)) || '.jpg'}`;
    if (await client.fetchImage(info.coverUrl, join(imagesDir, coverFileName))) {
      coverImage = `${options.imagesDirName}/${coverFileName}`;
    } else {
      events.warn(`Cover download failed: ${info.coverUrl}`);
    }
  }

  events.progress(CHAPTERS_START, 'Fetching chapter list');
  const stubs = await client.fetchChapterList(bookId);
  events.info(`Found ${stubs.length} chapters`);

  const chapters: Chapter[] = [];
  for (const [index, stub] of stubs.entries()) {
    const chapter = await acquireChapter(bookId, stub, client, imagesDir, options, events);
    if (chapter) {
      chapters.push(chapter);
    }
    events.progress(
      CHAPTERS_START + (CHAPTERS_END - CHAPTERS_START) * (index + 1) / stubs.length,
      `Downloaded chapter ${index + 1}/${stubs.length}`,
    );
  }

  events.progress(CHAPTERS_END, 'Saving record');
  const book: Book = {
    id: bookId,
    title: info.title || options.labels.untitled,
    original_title: info.originalTitle,
    description: info.description,
    cover_image: coverImage,
    chapters,
  };
  const recordPath = await saveRecord(book, outputDir, options.recordFileName);

  events.emit({
    type: 'book:acquired',
    recordPath,
    title: book.title,
    totalChapters: chapters.length,
    skippedChapters: stubs.length - chapters.length,
  });
  events.progress(1, 'Download complete');

  return recordPath;
}

async function acquireChapter(
  bookId: string,
  stub: ChapterStub,
  client: RanobeClient,
  imagesDir: string,
  options: PipelineOptions,
  events: EventEmitter,
): Promise<Chapter | null> {
  const body = await client.fetchChapterBody(bookId, stub.volume, stub.number);
  if (!body) {
    events.warn(`Skipping chapter ${stub.volume}/${stub.number}: download failed`, { id: stub.id });
    return null;
  }

  await downloadAttachments(body.attachments, client, imagesDir, events);

  const content = await normalizeContent(classifyContent(body.content), body.attachments, {
    images: client,
    imagesDir,
    imagesDirName: options.imagesDirName,
    siteOrigin: options.siteOrigin,
    events,
  });

  return {
    id: body.id,
    volume: body.volume,
    chapter: body.number,
    name: body.name,
    attachments: body.attachments,
    content,
  };
}

async function downloadAttachments(
  attachments: Attachment[],
  client: RanobeClient,
  imagesDir: string,
  events: EventEmitter,
): Promise<void> {
  for (const attachment of attachments) {
    if (!(await client.fetchImage(attachment.url, join(imagesDir, attachment.filename)))) {
      events.warn(`Attachment download failed: ${attachment.url}`, { filename: attachment.filename });
    }
  }
}
