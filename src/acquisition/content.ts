import { basename, join } from 'node:path';
import { z } from 'zod';
import type { EventEmitter } from '../events/emitter.ts';
import type { Attachment } from '../record/types.ts';
import { escapeXml, findImages, parseFragment, toHtml } from '../utils/html.ts';
import type { ImageFetcher } from './client.ts';

export interface StructuredDoc {
  type: 'doc';
  content: unknown[];
}

export type ChapterContent =
  | { kind: 'markup'; html: string }
  | { kind: 'structured'; doc: StructuredDoc }
  | { kind: 'unknown'; raw: unknown };

export interface NormalizeContext {
  images: ImageFetcher;
  /** Local directory downloaded images are written to. */
  imagesDir: string;
  /** Prefix written into `src`, relative to the record. */
  imagesDirName: string;
  siteOrigin: string;
  events: EventEmitter;
}

const structuredDocSchema = z.object({
  type: z.literal('doc'),
  content: z.array(z.unknown()).default([]),
});

const paragraphNodeSchema = z.object({
  type: z.literal('paragraph'),
  content: z.array(z.object({ type: z.string(), text: z.string().nullish() })).nullish(),
});

const imageNodeSchema = z.object({
  type: z.literal('image'),
  attrs: z.object({
    images: z.array(z.object({ image: z.string().nullish() })).nullish(),
  }).nullish(),
});

export function classifyContent(raw: unknown): ChapterContent {
  if (typeof raw === 'string') {
    return { kind: 'markup', html: raw };
  }

  const doc = structuredDocSchema.safeParse(raw);
  if (doc.success) {
    return { kind: 'structured', doc: doc.data };
  }

  return { kind: 'unknown', raw };
}

export async function normalizeContent(
  content: ChapterContent,
  attachments: Attachment[],
  context: NormalizeContext,
): Promise<string> {
  switch (content.kind) {
    case 'markup':
      return await localizeMarkupImages(content.html, context);
    case 'structured':
      return renderStructured(content.doc, attachments, context);
    case 'unknown':
      context.events.warn('Unsupported chapter content shape, content dropped', { shape: describeShape(content.raw) });
      return '';
  }
}

/** Anything but an existing local copy or inline data is fetched; relative paths resolve against the site. */
function needsDownload(src: string, imagesDirName: string): boolean {
  return !src.startsWith(`${imagesDirName}/`) && !/^data:/i.test(src);
}

export function imageFileName(src: string, siteOrigin: string): string {
  try {
    const name = basename(decodeURIComponent(new URL(src, siteOrigin).pathname));
    return name || 'img_unknown.jpg';
  } catch {
    return 'img_unknown.jpg';
  }
}

async function localizeMarkupImages(html: string, context: NormalizeContext): Promise<string> {
  const document = parseFragment(html);

  for (const img of findImages(document)) {
    delete img.attribs.loading;

    const src = img.attribs.src;
    if (!src || !needsDownload(src, context.imagesDirName)) {
      continue;
    }

    const filename = imageFileName(src, context.siteOrigin);
    if (await context.images.fetchImage(src, join(context.imagesDir, filename))) {
      img.attribs.src = `${context.imagesDirName}/${filename}`;
    } else {
      context.events.warn(`Image download failed, keeping remote source: ${src}`);
    }
  }

  return toHtml(document);
}

function renderStructured(doc: StructuredDoc, attachments: Attachment[], context: NormalizeContext): string {
  const filenames = new Map(attachments.map((attachment) => [attachment.name, attachment.filename]));
  const parts: string[] = [];

  for (const node of doc.content) {
    const paragraph = paragraphNodeSchema.safeParse(node);
    if (paragraph.success) {
      const text = (paragraph.data.content ?? [])
        .filter((inline) => inline.type === 'text')
        .map((inline) => inline.text ?? '')
        .join('');
      if (text.trim()) {
        parts.push(`<p>${escapeXml(text)}</p>`);
      }
      continue;
    }

    const image = imageNodeSchema.safeParse(node);
    if (image.success) {
      for (const { image: identifier } of image.data.attrs?.images ?? []) {
        if (!identifier) continue;

        const filename = filenames.get(identifier);
        if (filename) {
          parts.push(`<img src="${context.imagesDirName}/${escapeXml(filename)}" />`);
        } else {
          context.events.warn(`No attachment matches image ${identifier}`);
        }
      }
    }
    // Other node types (headings, lists, rules...) are not rendered.
  }

  return parts.join('\n');
}

function describeShape(raw: unknown): string {
  if (raw === null) return 'null';
  if (Array.isArray(raw)) return 'array';
  return typeof raw;
}
