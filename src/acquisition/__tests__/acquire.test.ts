import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import fse from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createFakeApi, routes } from '../../__tests__/fake-api.ts';
import { resolveOptions } from '../../config.ts';
import { EventEmitter } from '../../events/emitter.ts';
import type { ProgressEvent } from '../../events/types.ts';
import { loadRecord } from '../../record/mod.ts';
import { acquire } from '../mod.ts';

const API = 'https://api.test/api/manga/7--book';

const bookRoutes = {
  [`${API}?fields[]=summary`]: {
    status: 200,
    data: {
      data: { rus_name: 'Книга', name: 'Book', summary: 'About', cover: { default: '/uploads/cover.png' } },
    },
  },
  'https://site.test/uploads/cover.png': { status: 200, data: Buffer.from('cover') },
  [`${API}/chapters`]: {
    status: 200,
    data: {
      data: [
        { id: 3, volume: 2, number: '1', name: '' },
        { id: 2, volume: 1, number: '2', name: 'Two' },
        { id: 1, volume: 1, number: '1', name: 'One' },
      ],
    },
  },
  [`${API}/chapter?number=1&volume=1`]: {
    status: 200,
    data: {
      data: {
        id: 1,
        volume: 1,
        number: 1,
        name: 'One',
        content: '<p>Hi</p><img src="https://cdn.test/a.png">',
        attachments: [],
      },
    },
  },
  [`${API}/chapter?number=2&volume=1`]: { status: 500 },
  [`${API}/chapter?number=1&volume=2`]: {
    status: 200,
    data: {
      data: {
        id: 3,
        volume: 2,
        number: 1,
        name: null,
        content: { type: 'doc', content: [{ type: 'image', attrs: { images: [{ image: 'pic' }] } }] },
        attachments: [{ filename: 'pic.jpg', url: '/uploads/pic.jpg' }],
      },
    },
  },
  'https://cdn.test/a.png': { status: 200, data: Buffer.from('a') },
  'https://site.test/uploads/pic.jpg': { status: 200, data: Buffer.from('pic') },
};

const options = resolveOptions({
  apiBaseUrl: 'https://api.test',
  siteOrigin: 'https://site.test',
  retry: { maxAttempts: 2, delayMs: 0 },
});

describe('acquire', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ranobe-acquire-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the record and its images, skipping chapters that never download', async () => {
    const api = createFakeApi(routes(bookRoutes));
    const events = new EventEmitter();
    const seen: ProgressEvent[] = [];
    events.subscribe((event) => seen.push(event));

    const reference = 'https://ranobelib.me/ru/book/7--book?section=info';
    const recordPath = await acquire(reference, dir, { options, events, http: api.http });

    expect(recordPath).toBe(join(dir, 'ranobe.json'));
    expect(await loadRecord(recordPath)).toEqual({
      id: '7--book',
      title: 'Книга',
      original_title: 'Book',
      description: 'About',
      cover_image: 'imgs/cover.png',
      chapters: [
        {
          id: '1',
          volume: '1',
          chapter: '1',
          name: 'One',
          attachments: [],
          content: '<p>Hi</p><img src="imgs/a.png">',
        },
        {
          id: '3',
          volume: '2',
          chapter: '1',
          name: '',
          attachments: [{ name: 'pic', filename: 'pic.jpg', url: '/uploads/pic.jpg' }],
          content: '<img src="imgs/pic.jpg" />',
        },
      ],
    });

    expect(await readFile(join(dir, 'imgs', 'cover.png'), 'utf8')).toBe('cover');
    expect(await readFile(join(dir, 'imgs', 'a.png'), 'utf8')).toBe('a');
    expect(await readFile(join(dir, 'imgs', 'pic.jpg'), 'utf8')).toBe('pic');
    expect(api.count(`${API}/chapter?number=2&volume=1`)).toBe(2);

    expect(seen).toContainEqual({
      type: 'log',
      level: 'warn',
      message: 'Skipping chapter 1/2: download failed',
      meta: { id: '2' },
    });
    expect(seen).toContainEqual({
      type: 'book:acquired',
      recordPath,
      title: 'Книга',
      totalChapters: 2,
      skippedChapters: 1,
    });
  });

  it('reports progress from 0 to 1 without going backwards', async () => {
    const api = createFakeApi(routes(bookRoutes));
    const events = new EventEmitter();
    const fractions: number[] = [];
    events.subscribe((event) => {
      if (event.type === 'progress') fractions.push(event.fraction);
    });

    await acquire('https://ranobelib.me/ru/book/7--book', dir, { options, events, http: api.http });

    expect(fractions[0]).toBe(0);
    expect(fractions.at(-1)).toBe(1);
    expect(fractions).toEqual(fractions.toSorted((a, b) => a - b));
  });

  it('keeps attachment downloads inside the images directory', async () => {
    const outputDir = join(dir, 'out');
    const api = createFakeApi(routes({
      ...bookRoutes,
      [`${API}/chapters`]: { status: 200, data: { data: [{ id: 1, volume: 1, number: '1', name: 'One' }] } },
      [`${API}/chapter?number=1&volume=1`]: {
        status: 200,
        data: {
          data: {
            id: 1,
            volume: 1,
            number: 1,
            name: 'One',
            content: { type: 'doc', content: [{ type: 'image', attrs: { images: [{ image: 'escaped' }] } }] },
            attachments: [{ filename: '../../escaped.jpg', url: '/uploads/pic.jpg' }],
          },
        },
      },
    }));

    const recordPath = await acquire('https://ranobelib.me/ru/book/7--book', outputDir, { options, http: api.http });

    expect(await fse.pathExists(join(dir, 'escaped.jpg'))).toBe(false);
    expect(await readFile(join(outputDir, 'imgs', 'escaped.jpg'), 'utf8')).toBe('pic');
    expect((await loadRecord(recordPath)).chapters[0]?.content).toBe('<img src="imgs/escaped.jpg" />');
  });

  it('records an empty chapter list when the list is unavailable', async () => {
    const api = createFakeApi(routes({ ...bookRoutes, [`${API}/chapters`]: { status: 503 } }));

    const recordPath = await acquire('https://ranobelib.me/ru/book/7--book', dir, { options, http: api.http });

    expect((await loadRecord(recordPath)).chapters).toEqual([]);
  });

  it('fails before touching the network when the reference has no book id', async () => {
    const api = createFakeApi(routes(bookRoutes));

    await expect(acquire('https://ranobelib.me/ru/catalog', dir, { options, http: api.http }))
      .rejects.toMatchObject({ code: 'NotResolvable' });
    expect(api.requests).toEqual([]);
  });
});
