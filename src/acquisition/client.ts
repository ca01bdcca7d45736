import { basename } from 'node:path';
import axios, { type AxiosInstance, type AxiosResponse, type ResponseType } from 'axios';
import fse from 'fs-extra';
import { z } from 'zod';
import type { PipelineOptions } from '../config.ts';
import { PipelineError, describeError } from '../errors.ts';
import type { EventEmitter } from '../events/emitter.ts';
import { byVolumeThenChapter } from '../record/ordering.ts';
import type { Attachment } from '../record/types.ts';
import { type Attempt, retry } from './retry.ts';

export interface BookInfo {
  id: string;
  title: string;
  originalTitle: string;
  description: string;
  coverUrl: string | null;
}

export interface ChapterStub {
  id: string;
  volume: string;
  number: string;
  name: string;
}

export interface ChapterBody extends ChapterStub {
  content?: unknown;
  attachments: Attachment[];
}

export interface ImageFetcher {
  fetchImage(url: string, destPath: string): Promise<boolean>;
}

const label = z.union([z.string(), z.number()]).transform((value) => String(value));
const optionalText = z.string().nullish().transform((value) => value ?? '');

const bookInfoResponse = z.object({
  data: z.object({
    rus_name: z.string().nullish(),
    eng_name: z.string().nullish(),
    name: z.string().nullish(),
    summary: z.string().nullish(),
    cover: z.object({ default: z.string().nullish() }).nullish(),
  }),
});

const chapterListResponse = z.object({
  data: z.array(z.object({
    id: label,
    volume: label,
    number: label,
    name: optionalText,
  })),
});

const attachmentPayload = z.object({
  name: z.string().nullish(),
  filename: z.string(),
  url: z.string(),
});

const chapterBodyResponse = z.object({
  data: z.object({
    id: label,
    volume: label,
    number: label,
    name: optionalText,
    content: z.unknown(),
    attachments: z.array(attachmentPayload).nullish(),
  }),
});

export function createHttpClient(): AxiosInstance {
  return axios.create({
    headers: { Accept: 'application/json, image/*;q=0.9, */*;q=0.8' },
  });
}

/** "12.0" and "12" address the same chapter; the API only accepts the latter. */
export function chapterNumberParam(number: string): string {
  return number.endsWith('.0') ? number.slice(0, -2) : number;
}

/** Last path segment only, so a payload filename can never leave the images directory. */
export function attachmentFileName(filename: string): string {
  const name = basename(filename.replace(/\\/g, '/'));
  return name === '' || name === '.' || name === '..' ? 'img_unknown.jpg' : name;
}

export function attachmentIdentifier(filename: string): string {
  const dot = filename.lastIndexOf('.');
  return dot > 0 ? filename.slice(0, dot) : filename;
}

interface RequestAttempt {
  attempt: number;
  maxAttempts: number;
  responseType?: ResponseType;
}

const SINGLE_ATTEMPT: RequestAttempt = { attempt: 1, maxAttempts: 1 };

type ClientOptions = Pick<PipelineOptions, 'apiBaseUrl' | 'siteOrigin' | 'retry'>;

export class RanobeClient implements ImageFetcher {
  private readonly http: AxiosInstance;
  private readonly options: ClientOptions;
  private readonly events: EventEmitter;

  constructor(http: AxiosInstance, options: ClientOptions, events: EventEmitter) {
    this.http = http;
    this.options = options;
    this.events = events;
  }

  async fetchBookInfo(id: string): Promise<BookInfo> {
    const url = `${this.options.apiBaseUrl}/api/manga/${id}?fields[]=summary`;

    let response: AxiosResponse<unknown>;
    try {
      response = await this.get(url);
    } catch (error) {
      throw new PipelineError('NotFound', `Cannot fetch book info for ${id}: ${describeError(error)}`, {
        cause: error,
      });
    }

    if (response.status !== 200) {
      throw new PipelineError('NotFound', `Book ${id} not found (HTTP ${response.status})`);
    }

    const parsed = bookInfoResponse.safeParse(response.data);
    if (!parsed.success) {
      throw new PipelineError('NotFound', `Unexpected book info payload for ${id}`);
    }

    const data = parsed.data.data;
    return {
      id,
      title: data.rus_name || data.name || data.eng_name || '',
      originalTitle: data.name ?? '',
      description: data.summary ?? '',
      coverUrl: data.cover?.default || null,
    };
  }

  async fetchChapterList(id: string): Promise<ChapterStub[]> {
    const url = `${this.options.apiBaseUrl}/api/manga/${id}/chapters`;

    try {
      const response = await this.get(url);
      if (response.status !== 200) {
        this.events.warn(`Chapter list unavailable (HTTP ${response.status})`, { id });
        return [];
      }

      const parsed = chapterListResponse.safeParse(response.data);
      if (!parsed.success) {
        this.events.warn('Unexpected chapter list payload', { id });
        return [];
      }

      return parsed.data.data.toSorted(byVolumeThenChapter);
    } catch (error) {
      this.events.warn(`Chapter list request failed: ${describeError(error)}`, { id });
      return [];
    }
  }

  fetchChapterBody(id: string, volume: string, number: string): Promise<ChapterBody | null> {
    const query = `number=${encodeURIComponent(chapterNumberParam(number))}&volume=${encodeURIComponent(volume)}`;
    const url = `${this.options.apiBaseUrl}/api/manga/${id}/chapter?${query}`;
    const { maxAttempts } = this.options.retry;

    return retry(
      this.options.retry,
      async (attempt): Promise<Attempt<ChapterBody>> => {
        const response = await this.get(url, { attempt, maxAttempts });
        if (response.status !== 200) {
          return { ok: false, reason: `HTTP ${response.status}` };
        }

        const parsed = chapterBodyResponse.safeParse(response.data);
        if (!parsed.success) {
          return { ok: false, reason: 'unexpected chapter payload' };
        }

        const { attachments, ...chapter } = parsed.data.data;
        return {
          ok: true,
          value: {
            ...chapter,
            attachments: (attachments ?? []).map((attachment) => {
              const filename = attachmentFileName(attachment.filename);
              return { name: attachment.name || attachmentIdentifier(filename), filename, url: attachment.url };
            }),
          },
        };
      },
      (reason, attempt) => {
        this.events.warn(
          `Chapter ${volume}/${number} attempt ${attempt}/${maxAttempts} failed: ${reason}`,
          { attempt },
        );
      },
    );
  }

  async fetchImage(url: string, destPath: string): Promise<boolean> {
    let absoluteUrl: string;
    try {
      absoluteUrl = new URL(url, this.options.siteOrigin).toString();
    } catch {
      this.events.warn(`Invalid image URL: ${url}`);
      return false;
    }

    const { maxAttempts } = this.options.retry;
    const saved = await retry(
      this.options.retry,
      async (attempt): Promise<Attempt<string>> => {
        const response = await this.get(absoluteUrl, { attempt, maxAttempts, responseType: 'arraybuffer' });
        if (response.status !== 200) {
          return { ok: false, reason: `HTTP ${response.status}` };
        }

        const bytes = toBuffer(response.data);
        if (!bytes) {
          return { ok: false, reason: 'empty response body' };
        }

        await fse.outputFile(destPath, bytes);
        return { ok: true, value: destPath };
      },
      (reason, attempt) => {
        this.events.warn(`Image ${absoluteUrl} attempt ${attempt}/${maxAttempts} failed: ${reason}`, { attempt });
      },
    );

    return saved !== null;
  }

  private async get(url: string, request: RequestAttempt = SINGLE_ATTEMPT): Promise<AxiosResponse<unknown>> {
    const { attempt, maxAttempts, responseType = 'json' } = request;
    const startTime = Date.now();

    try {
      const response = await this.http.get<unknown>(url, { responseType, validateStatus: () => true });
      this.events.emit({
        type: 'http:request',
        url,
        attempt,
        maxAttempts,
        status: response.status,
        duration: Date.now() - startTime,
      });
      return response;
    } catch (error) {
      this.events.emit({
        type: 'http:request',
        url,
        attempt,
        maxAttempts,
        error: describeError(error),
        duration: Date.now() - startTime,
      });
      throw error;
    }
  }
}

function toBuffer(data: unknown): Buffer | null {
  if (Buffer.isBuffer(data)) return data.length > 0 ? data : null;
  if (data instanceof ArrayBuffer) return data.byteLength > 0 ? Buffer.from(data) : null;
  if (ArrayBuffer.isView(data)) {
    return data.byteLength > 0 ? Buffer.from(data.buffer, data.byteOffset, data.byteLength) : null;
  }
  return null;
}
