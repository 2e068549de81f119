import { promises as fs } from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { assembleEpub, type AssembleInput } from '../epub-assembler';
import { UnsupportedFormatError } from '../errors';
import { inspectEpub } from '../epub-zip';
import {
  mediaInfoSchema,
  openbookSchema,
  parsePayload,
  type LoanManifest,
  type OpenBook,
} from '../loan-types';
import { RecordingLogger, exists, makeTempDir, removeDir, testClient } from './helpers';

const page = (body: string) =>
  `<?xml version="1.0" encoding="utf-8"?><html xmlns="http://www.w3.org/1999/xhtml"><head><title>p</title></head><body>${body}</body></html>`;

const ROUTES = {
  'https://cdn.test/ch1.xhtml': page('<p>One</p>'),
  'https://cdn.test/ch2.xhtml': page('<p id="s1">Two</p>'),
  'https://cdn.test/cover.xhtml': page('<img src="images/cover.jpg" alt="cover"/>'),
  'https://cdn.test/images/cover.jpg': Buffer.from([0xff, 0xd8, 0xff]),
  'https://cdn.test/style.css': 'p { margin: 0; }',
  'https://cdn.test/_d/tracking.js': 'ignored',
};

const LOAN: LoanManifest = {
  id: '1234567',
  cardId: '42',
  type: 'ebook',
  title: 'Test Book',
  creators: [{ name: 'Ann Author', role: 'author' }],
  languages: ['en'],
  subjects: [],
  covers: [],
  formats: [],
};

const OPENBOOK: OpenBook = parsePayload(
  openbookSchema,
  {
    title: { main: 'Test Book' },
    creator: [{ name: 'Ann Author', role: 'author' }],
    nav: {
      toc: [
        { title: 'Cover', path: 'cover.xhtml' },
        { title: 'Chapter One', path: 'ch1.xhtml' },
        { title: 'Chapter Two', path: 'ch2.xhtml#s1' },
      ],
      landmarks: [{ type: 'cover', title: 'Cover', path: 'cover.xhtml' }],
    },
    spine: [
      { path: 'ch2.xhtml', '-odread-original-path': 'ch2.xhtml', '-odread-spine-position': 2 },
      { path: 'cover.xhtml', '-odread-original-path': 'cover.xhtml', '-odread-spine-position': 0 },
      { path: 'ch1.xhtml', '-odread-original-path': 'ch1.xhtml', '-odread-spine-position': 1 },
    ],
  },
  'openbook'
);

const MEDIA_INFO = parsePayload(
  mediaInfoSchema,
  { id: '1234567', title: 'Test Book', type: { id: 'ebook' }, creators: [{ id: 1, name: 'Ann Author', role: 'Author' }] },
  'media info'
);

describe('assembleEpub', () => {
  let dir: string;
  let logger: RecordingLogger;

  beforeEach(async () => {
    dir = await makeTempDir();
    logger = new RecordingLogger();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  function input(overrides: Partial<AssembleInput> = {}): AssembleInput {
    return {
      loan: LOAN,
      mediaInfo: MEDIA_INFO,
      openbook: OPENBOOK,
      roster: [{ group: 'title-content', entries: Object.keys(ROUTES).map((url) => ({ url })) }],
      bookFolder: dir,
      epubPath: path.join(dir, 'Test Book.epub'),
      coverPath: null,
      ...overrides,
    };
  }

  it('packages the roster into a readable EPUB', async () => {
    const { client, requests } = testClient(ROUTES);
    const result = await assembleEpub({ transport: client, logger }, input());

    expect(result).toEqual({
      status: 'created',
      path: path.join(dir, 'Test Book.epub'),
      opfPath: undefined,
      coverImageId: 'imagescoverjpg',
      manifestCount: 7,
      spineCount: 3,
    });
    expect(requests.map((r) => r.url)).not.toContain('https://cdn.test/_d/tracking.js');

    const epub = await inspectEpub(result.path);
    expect(epub.mimetypeFirst).toBe(true);
    expect(epub.mimetypeStored).toBe(true);
    expect(epub.opfPath).toBe('OEBPS/package.opf');
    expect(epub.manifestIds).toEqual([
      'ch1xhtml',
      'ch2xhtml',
      'coverxhtml',
      'imagescoverjpg',
      'stylecss',
      'nav',
      'ncx',
    ]);
    expect(epub.coverImageIds).toEqual(['imagescoverjpg']);
    expect(epub.spineIdrefs).toEqual(['coverxhtml', 'ch1xhtml', 'ch2xhtml']);
    expect(epub.navEntries).toEqual(['Cover', 'Chapter One', 'Chapter Two']);

    // working folders are removed after zipping
    expect(await exists(path.join(dir, 'OEBPS'))).toBe(false);
    expect(await exists(path.join(dir, 'META-INF'))).toBe(false);
  });

  it('exports the metadata-only package when asked', async () => {
    const { client } = testClient(ROUTES);
    const opfPath = path.join(dir, 'Test Book.opf');

    const result = await assembleEpub({ transport: client, logger }, input({ exportOpfPath: opfPath }));
    const opf = await fs.readFile(opfPath, 'utf8');

    expect(result.opfPath).toBe(opfPath);
    expect(opf).toContain('Test Book');
    expect(opf).not.toContain('<manifest');
  });

  it('leaves an existing EPUB alone', async () => {
    const epubPath = path.join(dir, 'Test Book.epub');
    await fs.writeFile(epubPath, 'done');
    const { client, requests } = testClient(ROUTES);

    const result = await assembleEpub({ transport: client, logger }, input());

    expect(result.status).toBe('already-exists');
    expect(requests).toHaveLength(0);
    expect(await fs.readFile(epubPath, 'utf8')).toBe('done');
  });

  it('flags a single cover when the feature image and the cover page disagree', async () => {
    const routes = {
      'https://cdn.test/cover.xhtml': page('<img src="images/acover.jpg" alt="cover"/>'),
      'https://cdn.test/story.xhtml': page('<p>Story</p>'),
      'https://cdn.test/images/acover.jpg': Buffer.from('landmark-image'),
      'https://cdn.test/images/zfeature.jpg': Buffer.from('feature-image'),
    };
    const magazine = parsePayload(
      openbookSchema,
      {
        title: { main: 'Mag' },
        nav: {
          toc: [
            { title: 'Cover', path: 'cover.xhtml', pageRange: 'Cover', featureImage: 'images/zfeature.jpg' },
            { title: 'Story', path: 'story.xhtml' },
          ],
          landmarks: [{ type: 'cover', title: 'Cover', path: 'cover.xhtml' }],
        },
        spine: [
          { path: 'cover.xhtml', '-odread-original-path': 'cover.xhtml', '-odread-spine-position': 0 },
          { path: 'story.xhtml', '-odread-original-path': 'story.xhtml', '-odread-spine-position': 1 },
        ],
      },
      'openbook'
    );
    const { client } = testClient(routes);
    const coverPath = path.join(dir, 'cover.jpg');

    const result = await assembleEpub(
      { transport: client, logger },
      input({
        loan: { ...LOAN, type: 'magazine' },
        openbook: magazine,
        roster: [{ group: 'title-content', entries: Object.keys(routes).map((url) => ({ url })) }],
        coverPath,
      })
    );

    expect(result.coverImageId).toBe('imageszfeaturejpg');
    const epub = await inspectEpub(result.path);
    expect(epub.coverImageIds).toEqual(['imageszfeaturejpg']);
    expect(await fs.readFile(coverPath, 'utf8')).toBe('feature-image');
  });

  it('rejects fixed-layout magazines', async () => {
    const { client } = testClient(ROUTES);
    const magazine = parsePayload(
      openbookSchema,
      { title: { main: 'Mag' }, nav: { toc: [{ title: 'All Pages', path: 'page.xhtml' }] } },
      'openbook'
    );

    await expect(
      assembleEpub({ transport: client, logger }, input({ loan: { ...LOAN, type: 'magazine' }, openbook: magazine }))
    ).rejects.toBeInstanceOf(UnsupportedFormatError);
  });
});
