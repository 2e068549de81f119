/**
 * Audio Tagger
 *
 * Field and chapter policies on top of the ID3 model. Both operations are
 * pure transforms of a tag (applyTagFields / applyChapters) with thin file
 * wrappers, so the overwrite rules can be exercised without audio files.
 */

import { parseFile } from 'music-metadata';
import languageCodes from './data/languages.json';
import {
  PICTURE_TYPE_FRONT_COVER,
  convertTagVersion,
  emptyTag,
  getTextFrame,
  readTag,
  removeFrames,
  setFrame,
  writeTag,
  type Id3Frame,
  type Id3Tag,
  type Id3Version,
} from './id3-tags';
import { markerBoundsMs, type TimeUnit } from './chapter-timeline';
import type { ChapterMarker } from './loan-types';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface TagFields {
  title: string;
  subtitle?: string;
  authors: string[];
  narrators: string[];
  publisher?: string;
  description?: string;
  genres: string[];
  languages: string[];
  releaseDate?: string;
  series?: string;
  // per-part files only
  part?: { number: number; total: number };
  mediaId?: string;
  isbn?: string;
  cover?: Buffer | null;
}

export interface TagWriteOptions {
  alwaysOverwrite: boolean;
  // merged files always take the book title
  overwriteTitle?: boolean;
  delimiter: string;
  version: Id3Version;
}

export interface ChapterWriteOptions {
  overwrite: boolean;
  version: Id3Version;
}

export interface ChapterSpan {
  title: string;
  startMs: number;
  endMs: number;
}

export interface AudioInfo {
  bitrateKbps: number;
  variableBitrate: boolean;
  durationSeconds: number;
}

const LANGUAGE_CODES: Record<string, string> = languageCodes;

export const TOC_ELEMENT_ID = 'toc';

// ─────────────────────────────────────────────────────────────────────────────
// Fields
// ─────────────────────────────────────────────────────────────────────────────

/**
 * ISO 639-1 codes to the bibliographic ISO 639-2 codes ID3 expects
 */
export function toId3Languages(languages: string[]): string[] {
  const mapped: Array<string | undefined> = languages.map((lang) => LANGUAGE_CODES[lang.toLowerCase()]);
  if (mapped.every((code): code is string => code !== undefined)) {
    return mapped;
  }
  return languages;
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Apply `fields` to a tag. A field is only written when the tag has no value
 * for it yet, unless `alwaysOverwrite` is set. The cover and the identifier
 * frames are always refreshed.
 */
export function applyTagFields(existing: Id3Tag | null, fields: TagFields, options: TagWriteOptions): Id3Tag {
  let tag = convertTagVersion(existing ?? emptyTag(options.version), options.version);
  const delimiter = options.delimiter || ';';

  const writeText = (id: string, value: string | undefined, force: boolean = false) => {
    if (!value) return;
    if (options.alwaysOverwrite || force || !getTextFrame(tag, id)) {
      tag = setFrame(tag, { kind: 'text', id, value });
    }
  };
  const always = (frame: Id3Frame) => {
    tag = setFrame(tag, frame);
  };

  writeText('TIT2', fields.title, options.overwriteTitle);
  writeText('TIT3', fields.subtitle);
  writeText('TALB', fields.title);
  writeText('TPE1', fields.authors.join(delimiter));
  writeText('TPE2', fields.authors.join(delimiter));
  if (fields.part && fields.part.number > 0) {
    writeText('TRCK', `${pad2(fields.part.number)}/${pad2(fields.part.total)}`);
  }
  writeText('TPE3', fields.narrators.join(delimiter));
  writeText('TPUB', fields.publisher);

  if (fields.description && (options.alwaysOverwrite || !tag.frames.some((f) => f.kind === 'comment'))) {
    always({ kind: 'comment', language: 'XXX', description: 'Description', text: fields.description });
  }

  writeText('TCON', fields.genres.join(delimiter));
  writeText('TLAN', toId3Languages(fields.languages).join(delimiter));

  if (fields.releaseDate) {
    if (options.version === 4) {
      writeText('TDRL', fields.releaseDate);
    } else {
      writeText('TYER', fields.releaseDate.slice(0, 4));
    }
  }

  if (fields.cover && fields.cover.length > 0) {
    always({
      kind: 'picture',
      mimeType: 'image/jpeg',
      pictureType: PICTURE_TYPE_FRONT_COVER,
      description: 'Cover',
      data: fields.cover,
    });
  }
  if (fields.series) {
    always({ kind: 'txxx', description: 'Series', value: fields.series });
  }
  if (fields.mediaId) {
    always({
      kind: 'txxx',
      description: /^\d+$/.test(fields.mediaId) ? 'OverDrive Media ID' : 'OverDrive Reserve ID',
      value: fields.mediaId,
    });
  }
  if (fields.isbn) {
    always({ kind: 'txxx', description: 'ISBN', value: fields.isbn });
  }

  return tag;
}

export async function writeTags(filePath: string, fields: TagFields, options: TagWriteOptions): Promise<void> {
  const existing = await readTag(filePath);
  await writeTag(filePath, applyTagFields(existing, fields, options));
}

// ─────────────────────────────────────────────────────────────────────────────
// Chapters
// ─────────────────────────────────────────────────────────────────────────────

export function hasTableOfContents(tag: Id3Tag | null): boolean {
  return tag !== null && tag.frames.some((f) => f.kind === 'toc');
}

/**
 * Replace the tag's chapter list with one top-level ordered TOC.
 *
 * Returns null (nothing to do) when a TOC exists and `overwrite` is off.
 * Otherwise every existing CTOC and CHAP frame is dropped first: a file may
 * only carry one top-level TOC.
 */
export function applyChapters(
  existing: Id3Tag | null,
  chapters: ReadonlyArray<ChapterSpan>,
  options: ChapterWriteOptions
): Id3Tag | null {
  if (hasTableOfContents(existing) && !options.overwrite) {
    return null;
  }

  let tag = convertTagVersion(existing ?? emptyTag(options.version), options.version);
  tag = removeFrames(tag, (f) => f.kind === 'toc' || f.kind === 'chapter');

  const sorted = [...chapters].sort((a, b) => a.startMs - b.startMs);
  const chapterFrames: Id3Frame[] = sorted.map((chapter, i) => ({
    kind: 'chapter',
    elementId: `ch${i}`,
    startMs: chapter.startMs,
    endMs: chapter.endMs,
    subFrames: [{ kind: 'text', id: 'TIT2', value: chapter.title }],
  }));

  const toc: Id3Frame = {
    kind: 'toc',
    elementId: TOC_ELEMENT_ID,
    topLevel: true,
    ordered: true,
    childIds: sorted.map((_, i) => `ch${i}`),
    subFrames: [{ kind: 'text', id: 'TIT2', value: 'Table of Contents' }],
  };

  return { ...tag, frames: [...tag.frames, toc, ...chapterFrames] };
}

export function markersToSpans(markers: ReadonlyArray<ChapterMarker>, unit: TimeUnit): ChapterSpan[] {
  return markers.map((marker) => {
    const { start, end } = markerBoundsMs(marker, unit);
    return { title: marker.title, startMs: start, endMs: end };
  });
}

/**
 * @returns false when the file already had a TOC that was left alone
 */
export async function writeChapters(
  filePath: string,
  chapters: ReadonlyArray<ChapterSpan>,
  options: ChapterWriteOptions
): Promise<boolean> {
  const updated = applyChapters(await readTag(filePath), chapters, options);
  if (!updated) {
    return false;
  }
  await writeTag(filePath, updated);
  return true;
}

// ─────────────────────────────────────────────────────────────────────────────
// Audio info
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Bit rate and duration of an audio file. VBR files report a 0 bit rate so
 * that merge and transcode fall back to their fixed default.
 */
export async function readAudioInfo(filePath: string): Promise<AudioInfo> {
  const metadata = await parseFile(filePath, { duration: true, skipCovers: true });
  const profile = metadata.format.codecProfile ?? '';
  const variableBitrate = profile === 'VBR' || /^V\d/.test(profile);
  const bitrate = metadata.format.bitrate ?? 0;

  return {
    bitrateKbps: variableBitrate ? 0 : Math.round(bitrate / 1000),
    variableBitrate,
    durationSeconds: metadata.format.duration ?? 0,
  };
}
