import { readFile } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import sharp from 'sharp';
import { describeError } from '../errors.ts';
import type { EventEmitter } from '../events/emitter.ts';

export type ImageEncoder = (path: string, quality: number) => Promise<Buffer>;

/** Flattens onto white, converts to sRGB and re-encodes as JPEG. */
export const encodeJpeg: ImageEncoder = (path, quality) =>
  sharp(path)
    .flatten({ background: '#ffffff' })
    .toColourspace('srgb')
    .jpeg({ quality, optimiseCoding: true })
    .toBuffer();

/**
 * Per-run cache of compressed images keyed by absolute source path, so every
 * source file is encoded at most once.
 */
export class ImageCompressor {
  private readonly cache = new Map<string, Promise<Buffer>>();
  private readonly quality: number;
  private readonly events: EventEmitter;
  private readonly encode: ImageEncoder;

  constructor(quality: number, events: EventEmitter, encode: ImageEncoder = encodeJpeg) {
    this.quality = quality;
    this.events = events;
    this.encode = encode;
  }

  get size(): number {
    return this.cache.size;
  }

  compress(path: string): Promise<Buffer> {
    const key = resolve(path);
    const cached = this.cache.get(key);
    if (cached) {
      return cached;
    }

    const pending = this.encodeOrReadRaw(key);
    this.cache.set(key, pending);
    return pending;
  }

  private async encodeOrReadRaw(path: string): Promise<Buffer> {
    try {
      return await this.encode(path, this.quality);
    } catch (error) {
      this.events.warn(`Image compression failed, using original bytes: ${path}`, { error: describeError(error) });
      return await readFile(path);
    }
  }
}

const MEDIA_TYPES: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.svg': 'image/svg+xml',
};

export interface ImageFormat {
  mediaType: string;
  extension: string;
}

/** Format of the bytes actually produced: JPEG when encoded, otherwise whatever the source file was. */
export function detectImageFormat(data: Uint8Array, sourcePath: string): ImageFormat | null {
  if (data[0] === 0xff && data[1] === 0xd8 && data[2] === 0xff) {
    return { mediaType: 'image/jpeg', extension: '.jpg' };
  }

  const extension = extname(sourcePath).toLowerCase();
  const mediaType = MEDIA_TYPES[extension];
  return mediaType ? { mediaType, extension } : null;
}
