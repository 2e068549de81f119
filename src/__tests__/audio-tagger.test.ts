import { promises as fs } from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  applyChapters,
  applyTagFields,
  markersToSpans,
  toId3Languages,
  writeChapters,
  writeTags,
  type TagFields,
  type TagWriteOptions,
} from '../audio-tagger';
import { getTextFrame, getUserText, readTag, tagLength, type Id3Tag } from '../id3-tags';
import { makeTempDir, removeDir } from './helpers';

function fields(overrides: Partial<TagFields> = {}): TagFields {
  return { title: 'Test Book', authors: ['Ann Author'], narrators: [], genres: [], languages: [], ...overrides };
}

const KEEP: TagWriteOptions = { alwaysOverwrite: false, delimiter: ';', version: 4 };
const OVERWRITE: TagWriteOptions = { ...KEEP, alwaysOverwrite: true };

describe('applyTagFields', () => {
  it('numbers parts and records identifiers', () => {
    const tag = applyTagFields(
      null,
      fields({
        part: { number: 3, total: 12 },
        mediaId: '98765',
        isbn: '9780000000001',
        series: 'Saga',
        languages: ['en', 'fr'],
        authors: ['Ann Author', 'Bob Writer'],
      }),
      KEEP
    );

    expect(getTextFrame(tag, 'TRCK')).toBe('03/12');
    expect(getTextFrame(tag, 'TPE1')).toBe('Ann Author;Bob Writer');
    expect(getTextFrame(tag, 'TLAN')).toBe('eng;fre');
    expect(getUserText(tag, 'OverDrive Media ID')).toBe('98765');
    expect(getUserText(tag, 'ISBN')).toBe('9780000000001');
    expect(getUserText(tag, 'Series')).toBe('Saga');
  });

  it('labels a non-numeric id as a reserve id', () => {
    const tag = applyTagFields(null, fields({ mediaId: 'aaaa-bbbb' }), KEEP);
    expect(getUserText(tag, 'OverDrive Reserve ID')).toBe('aaaa-bbbb');
    expect(getUserText(tag, 'OverDrive Media ID')).toBeUndefined();
  });

  it('writes the release year for v2.3 and the date for v2.4', () => {
    const v3 = applyTagFields(null, fields({ releaseDate: '2021-05-04' }), { ...KEEP, version: 3 });
    const v4 = applyTagFields(null, fields({ releaseDate: '2021-05-04' }), KEEP);
    expect(getTextFrame(v3, 'TYER')).toBe('2021');
    expect(getTextFrame(v4, 'TDRL')).toBe('2021-05-04');
  });

  it('replaces the title of a merged file even when not overwriting', () => {
    const first = applyTagFields(null, fields({ title: 'Part Title', authors: ['First'] }), KEEP);
    const merged = applyTagFields(first, fields({ title: 'Book Title', authors: ['Second'] }), {
      ...KEEP,
      overwriteTitle: true,
    });
    expect(getTextFrame(merged, 'TIT2')).toBe('Book Title');
    expect(getTextFrame(merged, 'TPE1')).toBe('First');
  });

  it('embeds the cover as the front cover picture', () => {
    const tag = applyTagFields(null, fields({ cover: Buffer.from([0xff, 0xd8]) }), KEEP);
    const pictures = tag.frames.filter((f) => f.kind === 'picture');
    expect(pictures).toEqual([
      { kind: 'picture', mimeType: 'image/jpeg', pictureType: 3, description: 'Cover', data: Buffer.from([0xff, 0xd8]) },
    ]);
  });
});

describe('toId3Languages', () => {
  it('maps known codes and leaves the list alone otherwise', () => {
    expect(toId3Languages(['en', 'de'])).toEqual(['eng', 'ger']);
    expect(toId3Languages(['en', 'zz'])).toEqual(['en', 'zz']);
  });
});

describe('applyChapters', () => {
  const existing: Id3Tag = {
    version: 4,
    frames: [
      { kind: 'toc', elementId: 'toc', topLevel: true, ordered: true, childIds: [], subFrames: [] },
    ],
  };

  it('sorts chapters and numbers them from ch0', () => {
    const tag = applyChapters(
      null,
      [
        { title: 'Two', startMs: 5000, endMs: 9000 },
        { title: 'One', startMs: 0, endMs: 5000 },
      ],
      { overwrite: false, version: 4 }
    );

    expect(tag?.frames).toEqual([
      {
        kind: 'toc',
        elementId: 'toc',
        topLevel: true,
        ordered: true,
        childIds: ['ch0', 'ch1'],
        subFrames: [{ kind: 'text', id: 'TIT2', value: 'Table of Contents' }],
      },
      { kind: 'chapter', elementId: 'ch0', startMs: 0, endMs: 5000, subFrames: [{ kind: 'text', id: 'TIT2', value: 'One' }] },
      { kind: 'chapter', elementId: 'ch1', startMs: 5000, endMs: 9000, subFrames: [{ kind: 'text', id: 'TIT2', value: 'Two' }] },
    ]);
  });

  it('leaves an existing table of contents alone unless overwriting', () => {
    expect(applyChapters(existing, [{ title: 'One', startMs: 0, endMs: 10 }], { overwrite: false, version: 4 })).toBeNull();
    const replaced = applyChapters(existing, [{ title: 'One', startMs: 0, endMs: 10 }], { overwrite: true, version: 4 });
    expect(replaced?.frames.filter((f) => f.kind === 'toc')).toHaveLength(1);
  });

  it('converts second markers to rounded milliseconds', () => {
    expect(markersToSpans([{ title: 'One', partName: '', start: 0.0004, end: 12.3456 }], 'seconds')).toEqual([
      { title: 'One', startMs: 0, endMs: 12346 },
    ]);
  });
});

describe('tag files', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    file = path.join(dir, 'part.mp3');
    await fs.writeFile(file, 'AUDIO');
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  async function audioAfterTag(): Promise<string> {
    const data = await fs.readFile(file);
    return data.subarray(tagLength(data)).toString('latin1');
  }

  it('keeps populated fields unless overwriting', async () => {
    await writeTags(file, fields({ title: 'First', authors: ['A'] }), KEEP);
    await writeTags(file, fields({ title: 'Second', authors: ['B'] }), KEEP);

    let tag = await readTag(file);
    expect(tag && getTextFrame(tag, 'TIT2')).toBe('First');
    expect(tag && getTextFrame(tag, 'TPE1')).toBe('A');

    await writeTags(file, fields({ title: 'Second', authors: ['B'] }), OVERWRITE);

    tag = await readTag(file);
    expect(tag && getTextFrame(tag, 'TIT2')).toBe('Second');
    expect(tag && getTextFrame(tag, 'TPE1')).toBe('B');
    expect(await audioAfterTag()).toBe('AUDIO');
  });

  it('retags a v2.3 file as v2.4 with a single new table of contents', async () => {
    await writeTags(file, fields({ title: 'Old Title', releaseDate: '2021-05-04' }), { ...KEEP, version: 3 });
    await writeChapters(
      file,
      [
        { title: 'One', startMs: 0, endMs: 1000 },
        { title: 'Two', startMs: 1000, endMs: 2000 },
        { title: 'Three', startMs: 2000, endMs: 3000 },
      ],
      { overwrite: false, version: 3 }
    );
    expect((await readTag(file))?.version).toBe(3);

    await writeTags(file, fields({ title: 'New Title' }), OVERWRITE);
    const written = await writeChapters(
      file,
      [
        { title: 'Alpha', startMs: 0, endMs: 1500 },
        { title: 'Beta', startMs: 1500, endMs: 3000 },
      ],
      { overwrite: true, version: 4 }
    );

    const tag = await readTag(file);
    expect(written).toBe(true);
    expect(tag?.version).toBe(4);
    expect(tag && getTextFrame(tag, 'TIT2')).toBe('New Title');

    const tocs = tag?.frames.filter((f) => f.kind === 'toc') ?? [];
    expect(tocs).toHaveLength(1);
    expect(tocs[0].kind === 'toc' && tocs[0].childIds).toEqual(['ch0', 'ch1']);

    const chapters = (tag?.frames ?? []).flatMap((f) =>
      f.kind === 'chapter' ? [[f.elementId, f.startMs, f.endMs]] : []
    );
    expect(chapters).toEqual([
      ['ch0', 0, 1500],
      ['ch1', 1500, 3000],
    ]);
    expect(await audioAfterTag()).toBe('AUDIO');
  });

  it('reports a kept table of contents', async () => {
    await writeChapters(file, [{ title: 'One', startMs: 0, endMs: 1000 }], { overwrite: false, version: 4 });
    expect(await writeChapters(file, [{ title: 'Two', startMs: 0, endMs: 1000 }], { overwrite: false, version: 4 })).toBe(false);
  });
});
