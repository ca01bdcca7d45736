import { configure, TextReader, Uint8ArrayReader, Uint8ArrayWriter, ZipWriter } from '@zip.js/zip.js';
import fse from 'fs-extra';
import {
  CONTAINER_XML,
  renderNav,
  renderNcx,
  renderOpf,
  renderPage,
  STYLESHEET,
  STYLESHEET_HREF,
} from './templates.ts';

configure({ useWebWorkers: false });

export interface EpubMetadata {
  identifier: string;
  title: string;
  language: string;
  description?: string;
}

export interface ManifestItem {
  id: string;
  href: string;
  mediaType: string;
  content: string | Uint8Array;
  properties?: string;
}

export interface TocEntry {
  title: string;
  href: string;
  children: TocEntry[];
}

const CONTENT_DIR = 'OEBPS';

export class EpubPackage {
  readonly metadata: EpubMetadata;
  private readonly items = new Map<string, ManifestItem>();
  private readonly spine: string[] = [];
  private toc: TocEntry[] = [];

  constructor(metadata: EpubMetadata) {
    this.metadata = metadata;
    this.addItem({ id: 'style', href: STYLESHEET_HREF, mediaType: 'text/css', content: STYLESHEET });
  }

  get manifest(): readonly ManifestItem[] {
    return [...this.items.values()];
  }

  get readingOrder(): readonly string[] {
    return this.spine;
  }

  get tableOfContents(): readonly TocEntry[] {
    return this.toc;
  }

  hasHref(href: string): boolean {
    return [...this.items.values()].some((item) => item.href === href);
  }

  addItem(item: ManifestItem): void {
    if (this.items.has(item.id)) {
      throw new Error(`Duplicate manifest id: ${item.id}`);
    }
    if (this.hasHref(item.href)) {
      throw new Error(`Duplicate manifest href: ${item.href}`);
    }
    this.items.set(item.id, item);
  }

  /** Adds an XHTML document wrapped in the page template and appends it to the spine. */
  addPage(id: string, href: string, title: string, body: string): void {
    const content = renderPage(title, body, this.metadata.language);
    this.addItem({ id, href, mediaType: 'application/xhtml+xml', content });
    this.spine.push(id);
  }

  setToc(toc: TocEntry[]): void {
    this.toc = toc;
  }

  async toBytes(modified = new Date()): Promise<Uint8Array> {
    const items: ManifestItem[] = [
      ...this.items.values(),
      {
        id: 'nav',
        href: 'nav.xhtml',
        mediaType: 'application/xhtml+xml',
        content: renderNav(this.metadata, this.toc),
        properties: 'nav',
      },
      {
        id: 'ncx',
        href: 'toc.ncx',
        mediaType: 'application/x-dtbncx+xml',
        content: renderNcx(this.metadata, this.toc),
      },
    ];

    const zipWriter = new ZipWriter(new Uint8ArrayWriter());

    // The mimetype entry must come first, uncompressed and without extra fields.
    await zipWriter.add('mimetype', new TextReader('application/epub+zip'), {
      level: 0,
      extendedTimestamp: false,
      dataDescriptor: false,
    });
    await zipWriter.add('META-INF/container.xml', new TextReader(CONTAINER_XML));
    const opf = renderOpf(this.metadata, items, this.spine, modified);
    await zipWriter.add(`${CONTENT_DIR}/content.opf`, new TextReader(opf));

    for (const item of items) {
      const reader = typeof item.content === 'string'
        ? new TextReader(item.content)
        : new Uint8ArrayReader(item.content);
      await zipWriter.add(`${CONTENT_DIR}/${item.href}`, reader);
    }

    return await zipWriter.close();
  }

  async write(outputPath: string): Promise<void> {
    await fse.outputFile(outputPath, await this.toBytes());
  }
}
