import { basename, dirname, extname, join } from 'node:path';
import fse from 'fs-extra';
import { removeElement } from 'domutils';
import { type PipelineOptions, resolveOptions } from '../config.ts';
import { PipelineError, describeError } from '../errors.ts';
import { EventEmitter } from '../events/emitter.ts';
import { EpubPackage, type TocEntry } from '../epub/mod.ts';
import { loadRecord } from '../record/mod.ts';
import { compareLabels, sortLabels } from '../record/ordering.ts';
import type { Book, Chapter } from '../record/types.ts';
import { escapeXml, findImages, parseFragment, toXhtml } from '../utils/html.ts';
import { detectImageFormat, ImageCompressor } from './images.ts';

export { detectImageFormat, encodeJpeg, ImageCompressor } from './images.ts';
export type { ImageEncoder, ImageFormat } from './images.ts';

export interface AssembleContext {
  options?: PipelineOptions;
  events?: EventEmitter;
  compressor?: ImageCompressor;
}

export interface Volume {
  label: string;
  chapters: Chapter[];
}

export interface ChapterAnchor {
  anchor: string;
  title: string;
}

export interface VolumeSection {
  label: string;
  title: string;
  fileName: string;
  anchor: string;
  chapters: ChapterAnchor[];
  body: string;
}

/** Groups chapters by volume label; volumes and chapters come back in reading order. */
export function groupVolumes(chapters: Chapter[]): Volume[] {
  const volumes = new Map<string, Chapter[]>();
  for (const chapter of chapters) {
    const list = volumes.get(chapter.volume) ?? [];
    list.push(chapter);
    volumes.set(chapter.volume, list);
  }

  return sortLabels(volumes.keys()).map((label) => ({
    label,
    chapters: (volumes.get(label) ?? []).toSorted((a, b) => compareLabels(a.chapter, b.chapter)),
  }));
}

function slug(value: string): string {
  return value.replace(/[^\w-]/g, '_') || '_';
}

export function outputFileName(title: string, fallback: string): string {
  const name = title.replace(/[\\/:*?"<>|\u0000-\u001f]/g, '_').trim();
  return `${name || fallback}.epub`;
}

export class EpubAssembler {
  private readonly book: Book;
  private readonly baseDir: string;
  private readonly options: PipelineOptions;
  private readonly events: EventEmitter;
  private readonly compressor: ImageCompressor;
  private readonly epub: EpubPackage;
  private readonly imageHrefs = new Map<string, string>();
  private readonly volumeSlugs = new Map<string, string>();

  constructor(book: Book, baseDir: string, context: AssembleContext = {}) {
    this.book = book;
    this.baseDir = baseDir;
    this.options = context.options ?? resolveOptions();
    this.events = context.events ?? new EventEmitter();
    this.compressor = context.compressor ?? new ImageCompressor(this.options.imageQuality, this.events);
    this.epub = new EpubPackage({
      identifier: `ranobe_${book.id}`,
      title: book.title || this.options.labels.untitled,
      language: this.options.language,
      description: book.description,
    });
  }

  static async load(recordPath: string, context: AssembleContext = {}): Promise<EpubAssembler> {
    const book = await loadRecord(recordPath);
    return new EpubAssembler(book, dirname(recordPath), context);
  }

  get epubPackage(): EpubPackage {
    return this.epub;
  }

  async buildCover(): Promise<boolean> {
    if (!this.book.cover_image) {
      return false;
    }

    const coverPath = join(this.baseDir, this.book.cover_image);
    if (!(await fse.pathExists(coverPath))) {
      this.events.warn(`Cover file not found: ${coverPath}`);
      return false;
    }

    try {
      const data = await this.compressor.compress(coverPath);
      const format = detectImageFormat(data, coverPath);
      if (!format) {
        throw new Error(`unsupported image type ${extname(coverPath)}`);
      }

      const href = `images/cover${format.extension}`;
      this.epub.addItem({
        id: 'cover-image',
        href,
        mediaType: format.mediaType,
        content: data,
        properties: 'cover-image',
      });
      this.imageHrefs.set(coverPath, href);
      const body = `<div class="centered"><img src="${href}" alt="cover"/></div>`;
      this.epub.addPage('cover', 'cover.xhtml', this.options.labels.cover, body);
      return true;
    } catch (error) {
      this.events.warn(`Cover processing failed: ${describeError(error)}`);
      return false;
    }
  }

  buildTitlePage(volumes: Volume[]): void {
    const { labels } = this.options;
    const first = volumes[0];
    const link = first ? `${this.volumeFileName(first.label)}#${this.volumeAnchor(first.label)}` : '#';

    const body = [
      `<h1 class="centered">${escapeXml(this.book.title || labels.untitled)}</h1>`,
      `<h2 class="centered">${escapeXml(this.book.original_title)}</h2>`,
      `<h3>${escapeXml(labels.description)}</h3>`,
      `<p>${escapeXml(this.book.description)}</p>`,
      `<p class="centered"><a href="${escapeXml(link)}">${escapeXml(labels.next)} »</a></p>`,
      `<h3>${escapeXml(labels.contents)}</h3>`,
      `<p>${escapeXml(labels.contentsHint)}</p>`,
    ].join('\n');

    this.epub.addPage('title_page', 'title_page.xhtml', labels.titlePage, body);
  }

  async buildVolumeSection(volume: Volume): Promise<VolumeSection> {
    const { labels } = this.options;
    const title = `${labels.volume} ${volume.label}`;
    const anchor = this.volumeAnchor(volume.label);
    const fileName = this.volumeFileName(volume.label);

    const parts = [`<h2 id="${anchor}">${escapeXml(title)}</h2>`];
    const chapters: ChapterAnchor[] = [];

    for (const chapter of volume.chapters) {
      const chapterAnchor = `chapter_${slug(chapter.id)}`;
      const numbered = `${labels.chapter} ${chapter.chapter}`;
      const chapterTitle = chapter.name ? `${numbered} - ${chapter.name}` : numbered;

      parts.push(`<h3 id="${chapterAnchor}">${escapeXml(chapterTitle)}</h3>`);
      try {
        parts.push(await this.renderChapterContent(chapter.content));
      } catch (error) {
        this.events.warn(
          `Chapter ${chapter.volume}/${chapter.chapter} content dropped: ${describeError(error)}`,
          { id: chapter.id },
        );
      }
      chapters.push({ anchor: chapterAnchor, title: chapterTitle });
    }

    const body = parts.join('\n');
    this.epub.addPage(anchor, fileName, title, body);

    return { label: volume.label, title, fileName, anchor, chapters, body };
  }

  buildToc(sections: VolumeSection[]): TocEntry[] {
    return sections.map((section) => ({
      title: section.title,
      href: section.fileName,
      children: section.chapters.map((chapter) => ({
        title: chapter.title,
        href: `${section.fileName}#${chapter.anchor}`,
        children: [],
      })),
    }));
  }

  async assemble(outputPath?: string): Promise<string> {
    const target = outputPath ?? join(this.baseDir, outputFileName(this.book.title, `ranobe_${this.book.id}`));

    this.events.progress(0.05, 'Building cover');
    await this.buildCover();

    const volumes = groupVolumes(this.book.chapters);
    this.events.progress(0.1, 'Building title page');
    this.buildTitlePage(volumes);

    const sections: VolumeSection[] = [];
    for (const [index, volume] of volumes.entries()) {
      sections.push(await this.buildVolumeSection(volume));
      this.events.progress(0.1 + 0.8 * (index + 1) / volumes.length, `Assembled volume ${volume.label}`);
    }

    this.epub.setToc(this.buildToc(sections));

    this.events.progress(0.9, 'Writing EPUB');
    try {
      await this.epub.write(target);
    } catch (error) {
      throw new PipelineError('WriteFailed', `Cannot write ${target}: ${describeError(error)}`, { cause: error });
    }

    this.events.emit({
      type: 'epub:assembled',
      outputPath: target,
      totalVolumes: sections.length,
      totalChapters: sections.reduce((sum, section) => sum + section.chapters.length, 0),
      totalImages: this.imageHrefs.size,
    });
    this.events.progress(1, 'EPUB ready');

    return target;
  }

  private volumeAnchor(label: string): string {
    return `volume_${this.volumeSlug(label)}`;
  }

  private volumeFileName(label: string): string {
    return `volume_${this.volumeSlug(label)}.xhtml`;
  }

  /** Labels like "1 a" and "1_a" would collide once slugged; later ones get a numeric suffix. */
  private volumeSlug(label: string): string {
    const known = this.volumeSlugs.get(label);
    if (known) {
      return known;
    }

    const taken = new Set(this.volumeSlugs.values());
    let candidate = slug(label);
    for (let counter = 2; taken.has(candidate); counter++) {
      candidate = `${slug(label)}_${counter}`;
    }
    this.volumeSlugs.set(label, candidate);
    return candidate;
  }

  private async renderChapterContent(html: string): Promise<string> {
    const document = parseFragment(html);
    const localPrefix = `${this.options.imagesDirName}/`;

    for (const img of findImages(document)) {
      const src = img.attribs.src ?? '';

      if (src.startsWith(localPrefix)) {
        const href = await this.addImage(join(this.baseDir, src));
        if (href) {
          img.attribs.src = href;
        } else {
          removeElement(img);
        }
      } else {
        this.events.warn(`Dropping image without a local copy: ${src || '(empty src)'}`);
        removeElement(img);
      }
    }

    return toXhtml(document.children);
  }

  private async addImage(sourcePath: string): Promise<string | null> {
    const known = this.imageHrefs.get(sourcePath);
    if (known) {
      return known;
    }

    if (!(await fse.pathExists(sourcePath))) {
      this.events.warn(`Image file not found, skipping: ${sourcePath}`);
      return null;
    }

    try {
      const data = await this.compressor.compress(sourcePath);
      const format = detectImageFormat(data, sourcePath);
      if (!format) {
        this.events.warn(`Unsupported image type, skipping: ${sourcePath}`);
        return null;
      }

      const href = this.uniqueImageHref(basename(sourcePath, extname(sourcePath)), format.extension);
      this.epub.addItem({ id: `img_${this.imageHrefs.size + 1}`, href, mediaType: format.mediaType, content: data });
      this.imageHrefs.set(sourcePath, href);
      return href;
    } catch (error) {
      this.events.warn(`Image processing failed, skipping: ${sourcePath}`, { error: describeError(error) });
      return null;
    }
  }

  private uniqueImageHref(stem: string, extension: string): string {
    const base = `images/${stem.replace(/[^\w.-]/g, '_')}`;
    let href = `${base}${extension}`;
    for (let counter = 2; this.epub.hasHref(href); counter++) {
      href = `${base}_${counter}${extension}`;
    }
    return href;
  }
}

/** Builds `<title>.epub` beside the record and returns its path. */
export async function assemble(recordPath: string, context: AssembleContext = {}): Promise<string> {
  const events = context.events ?? new EventEmitter();
  events.progress(0, 'Loading record');
  const assembler = await EpubAssembler.load(recordPath, { ...context, events });
  return await assembler.assemble();
}
