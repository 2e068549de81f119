/**
 * ID3v2 Tags
 *
 * Immutable model of an ID3v2.3 / v2.4 tag with a pure renderer and parser.
 * Covers the frames the audio tagger writes (text, TXXX, COMM, APIC, CHAP,
 * CTOC); anything else survives a parse/render cycle as an opaque frame.
 *
 * Layout references: id3.org id3v2.3.0, id3v2.4.0-structure/frames and the
 * ID3v2 Chapter Frame Addendum.
 */

import { createReadStream, createWriteStream, promises as fs } from 'fs';
import { pipeline } from 'stream/promises';
import { ParseError } from './errors';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type Id3Version = 3 | 4;

export interface TextFrame {
  kind: 'text';
  id: string;
  value: string;
}

export interface UserTextFrame {
  kind: 'txxx';
  description: string;
  value: string;
}

export interface CommentFrame {
  kind: 'comment';
  language: string;
  description: string;
  text: string;
}

export interface PictureFrame {
  kind: 'picture';
  mimeType: string;
  pictureType: number;
  description: string;
  data: Buffer;
}

export interface ChapterFrame {
  kind: 'chapter';
  elementId: string;
  startMs: number;
  endMs: number;
  subFrames: Id3Frame[];
}

export interface TocFrame {
  kind: 'toc';
  elementId: string;
  topLevel: boolean;
  ordered: boolean;
  childIds: string[];
  subFrames: Id3Frame[];
}

/**
 * A frame kept byte for byte. Frames with compression, encryption or
 * grouping only render back into the version they were read from.
 */
export interface OpaqueFrame {
  kind: 'opaque';
  id: string;
  formatFlags: number;
  sourceVersion: Id3Version;
  data: Buffer;
}

export type Id3Frame =
  | TextFrame
  | UserTextFrame
  | CommentFrame
  | PictureFrame
  | ChapterFrame
  | TocFrame
  | OpaqueFrame;

export interface Id3Tag {
  version: Id3Version;
  frames: Id3Frame[];
}

export const PICTURE_TYPE_FRONT_COVER = 3;

const HEADER_SIZE = 10;
const NO_OFFSET = 0xffffffff;

// Text encodings
const LATIN1 = 0;
const UTF16_BOM = 1;
const UTF16_BE = 2;
const UTF8 = 3;

// ─────────────────────────────────────────────────────────────────────────────
// Frame identity
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Frames with the same key replace one another
 */
export function frameKey(frame: Id3Frame): string {
  switch (frame.kind) {
    case 'text':
      return frame.id;
    case 'txxx':
      return `TXXX:${frame.description}`;
    case 'comment':
      return `COMM:${frame.description}:${frame.language}`;
    case 'picture':
      return `APIC:${frame.description}`;
    case 'chapter':
      return `CHAP:${frame.elementId}`;
    case 'toc':
      return `CTOC:${frame.elementId}`;
    case 'opaque':
      return frame.id;
  }
}

export function emptyTag(version: Id3Version): Id3Tag {
  return { version, frames: [] };
}

/**
 * Add a frame, replacing any frame with the same key in place
 */
export function setFrame(tag: Id3Tag, frame: Id3Frame): Id3Tag {
  const key = frameKey(frame);
  const index = tag.frames.findIndex((f) => f.kind !== 'opaque' && frameKey(f) === key);
  if (index < 0) {
    return { ...tag, frames: [...tag.frames, frame] };
  }
  const frames = [...tag.frames];
  frames[index] = frame;
  return { ...tag, frames };
}

export function removeFrames(tag: Id3Tag, predicate: (frame: Id3Frame) => boolean): Id3Tag {
  return { ...tag, frames: tag.frames.filter((f) => !predicate(f)) };
}

export function getTextFrame(tag: Id3Tag, id: string): string | undefined {
  for (const frame of tag.frames) {
    if (frame.kind === 'text' && frame.id === id) {
      return frame.value;
    }
  }
  return undefined;
}

export function getUserText(tag: Id3Tag, description: string): string | undefined {
  for (const frame of tag.frames) {
    if (frame.kind === 'txxx' && frame.description === description) {
      return frame.value;
    }
  }
  return undefined;
}

// ─────────────────────────────────────────────────────────────────────────────
// Version conversion
// ─────────────────────────────────────────────────────────────────────────────

const V23_ONLY = new Set(['TYER', 'TDAT', 'TIME', 'TORY', 'TRDA', 'TSIZ', 'IPLS', 'EQUA', 'RVAD']);
const V24_ONLY = new Set([
  'TDRC', 'TDRL', 'TDOR', 'TDEN', 'TDTG', 'TSOA', 'TSOP', 'TSOT',
  'TMOO', 'TPRO', 'TSST', 'TIPL', 'TMCL', 'ASPI', 'EQU2', 'RVA2', 'SEEK', 'SIGN',
]);

function convertFrames(frames: Id3Frame[], version: Id3Version): Id3Frame[] {
  const text = (id: string) => frames.find((f): f is TextFrame => f.kind === 'text' && f.id === id)?.value;
  const result: Id3Frame[] = [];

  for (const frame of frames) {
    if (frame.kind === 'chapter' || frame.kind === 'toc') {
      result.push({ ...frame, subFrames: convertFrames(frame.subFrames, version) });
      continue;
    }
    if (frame.kind !== 'text') {
      result.push(frame);
      continue;
    }

    if (version === 4 && V23_ONLY.has(frame.id)) {
      if (frame.id === 'TYER' && text('TDRC') === undefined) {
        result.push({ kind: 'text', id: 'TDRC', value: frame.value });
      } else if (frame.id === 'TORY' && text('TDOR') === undefined) {
        result.push({ kind: 'text', id: 'TDOR', value: frame.value });
      }
      continue;
    }

    if (version === 3 && V24_ONLY.has(frame.id)) {
      if (frame.id === 'TDRC' && text('TYER') === undefined) {
        result.push({ kind: 'text', id: 'TYER', value: frame.value.slice(0, 4) });
      } else if (frame.id === 'TDRL' && text('TYER') === undefined && text('TDRC') === undefined) {
        result.push({ kind: 'text', id: 'TYER', value: frame.value.slice(0, 4) });
      } else if (frame.id === 'TDOR' && text('TORY') === undefined) {
        result.push({ kind: 'text', id: 'TORY', value: frame.value.slice(0, 4) });
      }
      continue;
    }

    result.push(frame);
  }
  return result;
}

/**
 * Rewrite frames that only exist in the other version
 */
export function convertTagVersion(tag: Id3Tag, version: Id3Version): Id3Tag {
  if (tag.version === version) {
    return tag;
  }
  return { version, frames: convertFrames(tag.frames, version) };
}

// ─────────────────────────────────────────────────────────────────────────────
// Low-level encoding
// ─────────────────────────────────────────────────────────────────────────────

export function decodeSyncsafe(buf: Buffer, offset: number): number {
  return (
    ((buf[offset] & 0x7f) << 21) |
    ((buf[offset + 1] & 0x7f) << 14) |
    ((buf[offset + 2] & 0x7f) << 7) |
    (buf[offset + 3] & 0x7f)
  );
}

export function encodeSyncsafe(value: number): Buffer {
  if (value < 0 || value >= 2 ** 28) {
    throw new RangeError(`Size ${value} does not fit a syncsafe integer`);
  }
  return Buffer.from([(value >> 21) & 0x7f, (value >> 14) & 0x7f, (value >> 7) & 0x7f, value & 0x7f]);
}

function removeUnsynchronisation(data: Buffer): Buffer {
  const out = Buffer.alloc(data.length);
  let length = 0;
  for (let i = 0; i < data.length; i++) {
    out[length++] = data[i];
    if (data[i] === 0xff && data[i + 1] === 0x00) {
      i++;
    }
  }
  return out.subarray(0, length);
}

function pickEncoding(version: Id3Version, ...texts: string[]): number {
  if (version === 4) {
    return UTF8;
  }
  return texts.every((t) => /^[\x00-\xff]*$/.test(t)) ? LATIN1 : UTF16_BOM;
}

function encodeText(text: string, encoding: number): Buffer {
  switch (encoding) {
    case LATIN1:
      return Buffer.from(text, 'latin1');
    case UTF16_BOM:
      return Buffer.concat([Buffer.from([0xff, 0xfe]), Buffer.from(text, 'utf16le')]);
    default:
      return Buffer.from(text, 'utf8');
  }
}

function terminator(encoding: number): Buffer {
  return encoding === UTF16_BOM || encoding === UTF16_BE ? Buffer.alloc(2) : Buffer.alloc(1);
}

function decodeUtf16Be(bytes: Buffer): string {
  const copy = Buffer.from(bytes.subarray(0, bytes.length - (bytes.length % 2)));
  copy.swap16();
  return copy.toString('utf16le');
}

function decodeText(bytes: Buffer, encoding: number): string {
  switch (encoding) {
    case LATIN1:
      return bytes.toString('latin1');
    case UTF16_BOM:
      if (bytes[0] === 0xfe && bytes[1] === 0xff) {
        return decodeUtf16Be(bytes.subarray(2));
      }
      if (bytes[0] === 0xff && bytes[1] === 0xfe) {
        return bytes.subarray(2, bytes.length - (bytes.length % 2)).toString('utf16le');
      }
      return bytes.subarray(0, bytes.length - (bytes.length % 2)).toString('utf16le');
    case UTF16_BE:
      return decodeUtf16Be(bytes);
    case UTF8:
      return bytes.toString('utf8');
    default:
      throw new ParseError(`Unknown ID3 text encoding ${encoding}`);
  }
}

/**
 * Read one terminated string; an unterminated string runs to the end
 */
function readTerminated(data: Buffer, offset: number, encoding: number): { text: string; next: number } {
  if (encoding === UTF16_BOM || encoding === UTF16_BE) {
    for (let i = offset; i + 1 < data.length; i += 2) {
      if (data[i] === 0 && data[i + 1] === 0) {
        return { text: decodeText(data.subarray(offset, i), encoding), next: i + 2 };
      }
    }
  } else {
    const end = data.indexOf(0, offset);
    if (end >= 0) {
      return { text: decodeText(data.subarray(offset, end), encoding), next: end + 1 };
    }
  }
  return { text: decodeText(data.subarray(offset), encoding), next: data.length };
}

function readLatin1Terminated(data: Buffer, offset: number): { text: string; next: number } {
  return readTerminated(data, offset, LATIN1);
}

function stripNulls(text: string): string {
  return text.replace(/\u0000+$/, '');
}

// ─────────────────────────────────────────────────────────────────────────────
// Rendering
// ─────────────────────────────────────────────────────────────────────────────

function frameBody(frame: Exclude<Id3Frame, OpaqueFrame>, version: Id3Version): Buffer {
  switch (frame.kind) {
    case 'text': {
      const enc = pickEncoding(version, frame.value);
      return Buffer.concat([Buffer.from([enc]), encodeText(frame.value, enc)]);
    }
    case 'txxx': {
      const enc = pickEncoding(version, frame.description, frame.value);
      return Buffer.concat([
        Buffer.from([enc]),
        encodeText(frame.description, enc),
        terminator(enc),
        encodeText(frame.value, enc),
      ]);
    }
    case 'comment': {
      const enc = pickEncoding(version, frame.description, frame.text);
      return Buffer.concat([
        Buffer.from([enc]),
        Buffer.from(frame.language.padEnd(3, ' ').slice(0, 3), 'latin1'),
        encodeText(frame.description, enc),
        terminator(enc),
        encodeText(frame.text, enc),
      ]);
    }
    case 'picture': {
      const enc = pickEncoding(version, frame.description);
      return Buffer.concat([
        Buffer.from([enc]),
        Buffer.from(frame.mimeType, 'latin1'),
        Buffer.alloc(1),
        Buffer.from([frame.pictureType]),
        encodeText(frame.description, enc),
        terminator(enc),
        frame.data,
      ]);
    }
    case 'chapter': {
      const times = Buffer.alloc(16);
      times.writeUInt32BE(frame.startMs, 0);
      times.writeUInt32BE(frame.endMs, 4);
      times.writeUInt32BE(NO_OFFSET, 8);
      times.writeUInt32BE(NO_OFFSET, 12);
      return Buffer.concat([
        Buffer.from(frame.elementId, 'latin1'),
        Buffer.alloc(1),
        times,
        ...frame.subFrames.map((f) => renderFrame(f, version)),
      ]);
    }
    case 'toc': {
      if (frame.childIds.length > 255) {
        throw new RangeError(`Table of contents ${frame.elementId} has more than 255 entries`);
      }
      const flags = (frame.topLevel ? 0x02 : 0) | (frame.ordered ? 0x01 : 0);
      return Buffer.concat([
        Buffer.from(frame.elementId, 'latin1'),
        Buffer.alloc(1),
        Buffer.from([flags, frame.childIds.length]),
        ...frame.childIds.map((id) => Buffer.concat([Buffer.from(id, 'latin1'), Buffer.alloc(1)])),
        ...frame.subFrames.map((f) => renderFrame(f, version)),
      ]);
    }
  }
}

function frameId(frame: Id3Frame): string {
  switch (frame.kind) {
    case 'text':
    case 'opaque':
      return frame.id;
    case 'txxx':
      return 'TXXX';
    case 'comment':
      return 'COMM';
    case 'picture':
      return 'APIC';
    case 'chapter':
      return 'CHAP';
    case 'toc':
      return 'CTOC';
  }
}

function renderFrame(frame: Id3Frame, version: Id3Version): Buffer {
  let body: Buffer;
  let formatFlags = 0;
  if (frame.kind === 'opaque') {
    if (frame.formatFlags !== 0 && frame.sourceVersion !== version) {
      // flag layout differs between versions
      return Buffer.alloc(0);
    }
    body = frame.data;
    formatFlags = frame.formatFlags;
  } else {
    body = frameBody(frame, version);
  }

  const header = Buffer.alloc(HEADER_SIZE);
  header.write(frameId(frame), 0, 'latin1');
  if (version === 4) {
    encodeSyncsafe(body.length).copy(header, 4);
  } else {
    header.writeUInt32BE(body.length, 4);
  }
  header[8] = 0;
  header[9] = formatFlags;
  return Buffer.concat([header, body]);
}

/**
 * Serialize a tag, header included. Frames are written in the given order.
 */
export function renderTags(tag: Id3Tag, options: { padding?: number } = {}): Buffer {
  const frames = Buffer.concat(tag.frames.map((f) => renderFrame(f, tag.version)));
  const padding = Buffer.alloc(options.padding ?? 0);

  const header = Buffer.alloc(HEADER_SIZE);
  header.write('ID3', 0, 'latin1');
  header[3] = tag.version;
  header[4] = 0;
  header[5] = 0;
  encodeSyncsafe(frames.length + padding.length).copy(header, 6);

  return Buffer.concat([header, frames, padding]);
}

// ─────────────────────────────────────────────────────────────────────────────
// Parsing
// ─────────────────────────────────────────────────────────────────────────────

function decodeFrame(id: string, data: Buffer, version: Id3Version): Id3Frame {
  if (id === 'TXXX') {
    const enc = data[0];
    const description = readTerminated(data, 1, enc);
    return {
      kind: 'txxx',
      description: description.text,
      value: stripNulls(decodeText(data.subarray(description.next), enc)),
    };
  }

  if (id.startsWith('T')) {
    const enc = data[0];
    const values: string[] = [];
    let offset = 1;
    while (offset < data.length) {
      const part = readTerminated(data, offset, enc);
      if (part.text.length > 0) {
        values.push(part.text);
      }
      offset = part.next;
    }
    return { kind: 'text', id, value: values.join('/') };
  }

  if (id === 'COMM') {
    if (data.length < 4) {
      throw new ParseError('Truncated COMM frame');
    }
    const enc = data[0];
    const description = readTerminated(data, 4, enc);
    return {
      kind: 'comment',
      language: data.toString('latin1', 1, 4),
      description: description.text,
      text: stripNulls(decodeText(data.subarray(description.next), enc)),
    };
  }

  if (id === 'APIC') {
    const enc = data[0];
    const mime = readLatin1Terminated(data, 1);
    if (mime.next >= data.length) {
      throw new ParseError('Truncated APIC frame');
    }
    const description = readTerminated(data, mime.next + 1, enc);
    return {
      kind: 'picture',
      mimeType: mime.text,
      pictureType: data[mime.next],
      description: description.text,
      data: Buffer.from(data.subarray(description.next)),
    };
  }

  if (id === 'CHAP') {
    const element = readLatin1Terminated(data, 0);
    if (element.next + 16 > data.length) {
      throw new ParseError(`Truncated CHAP frame ${element.text}`);
    }
    return {
      kind: 'chapter',
      elementId: element.text,
      startMs: data.readUInt32BE(element.next),
      endMs: data.readUInt32BE(element.next + 4),
      subFrames: parseFrames(data, element.next + 16, data.length, version),
    };
  }

  if (id === 'CTOC') {
    const element = readLatin1Terminated(data, 0);
    if (element.next + 2 > data.length) {
      throw new ParseError(`Truncated CTOC frame ${element.text}`);
    }
    const flags = data[element.next];
    const count = data[element.next + 1];
    const childIds: string[] = [];
    let offset = element.next + 2;
    for (let i = 0; i < count; i++) {
      const child = readLatin1Terminated(data, offset);
      childIds.push(child.text);
      offset = child.next;
    }
    return {
      kind: 'toc',
      elementId: element.text,
      topLevel: (flags & 0x02) !== 0,
      ordered: (flags & 0x01) !== 0,
      childIds,
      subFrames: parseFrames(data, offset, data.length, version),
    };
  }

  return { kind: 'opaque', id, formatFlags: 0, sourceVersion: version, data: Buffer.from(data) };
}

function parseFrames(buf: Buffer, start: number, end: number, version: Id3Version): Id3Frame[] {
  const frames: Id3Frame[] = [];
  let offset = start;

  while (offset + HEADER_SIZE <= end) {
    const id = buf.toString('latin1', offset, offset + 4);
    if (!/^[A-Z0-9]{4}$/.test(id)) {
      // padding
      break;
    }
    const size = version === 4 ? decodeSyncsafe(buf, offset + 4) : buf.readUInt32BE(offset + 4);
    const formatFlags = buf[offset + 9];
    const dataStart = offset + HEADER_SIZE;
    const dataEnd = dataStart + size;
    if (dataEnd > end) {
      throw new ParseError(`ID3 frame ${id} overruns the tag`);
    }
    let data = buf.subarray(dataStart, dataEnd);

    // v2.4: grouping 0x40, compression 0x08, encryption 0x04; v2.3: 0x20, 0x80, 0x40
    const opaque = version === 4 ? (formatFlags & 0x4c) !== 0 : (formatFlags & 0xe0) !== 0;
    if (opaque) {
      frames.push({ kind: 'opaque', id, formatFlags, sourceVersion: version, data: Buffer.from(data) });
    } else {
      if (version === 4 && formatFlags & 0x01) {
        data = data.subarray(4);
      }
      if (version === 4 && formatFlags & 0x02) {
        data = removeUnsynchronisation(data);
      }
      frames.push(decodeFrame(id, data, version));
    }
    offset = dataEnd;
  }

  return frames;
}

/**
 * Bytes taken by the tag at the start of `buf`, 0 when there is none
 */
export function tagLength(buf: Buffer): number {
  if (buf.length < HEADER_SIZE || buf.toString('latin1', 0, 3) !== 'ID3') {
    return 0;
  }
  const footer = buf[5] & 0x10 ? HEADER_SIZE : 0;
  return HEADER_SIZE + decodeSyncsafe(buf, 6) + footer;
}

/**
 * Parse the tag at the start of `buf`. Returns null when there is no
 * ID3v2.3/2.4 tag.
 */
export function parseTag(buf: Buffer): Id3Tag | null {
  if (tagLength(buf) === 0) {
    return null;
  }
  const major = buf[3];
  const version: Id3Version | null = major === 3 ? 3 : major === 4 ? 4 : null;
  if (version === null) {
    return null;
  }
  const flags = buf[5];
  const size = decodeSyncsafe(buf, 6);
  if (HEADER_SIZE + size > buf.length) {
    throw new ParseError('ID3 tag is truncated');
  }

  let body = buf.subarray(HEADER_SIZE, HEADER_SIZE + size);
  if (version === 3 && flags & 0x80) {
    body = removeUnsynchronisation(body);
  }

  let start = 0;
  if (flags & 0x40) {
    start = version === 3 ? 4 + body.readUInt32BE(0) : decodeSyncsafe(body, 0);
  }

  return { version, frames: parseFrames(body, start, body.length, version) };
}

// ─────────────────────────────────────────────────────────────────────────────
// Files
// ─────────────────────────────────────────────────────────────────────────────

async function readHead(filePath: string): Promise<Buffer> {
  const handle = await fs.open(filePath, 'r');
  try {
    const header = Buffer.alloc(HEADER_SIZE);
    const { bytesRead } = await handle.read(header, 0, HEADER_SIZE, 0);
    const length = tagLength(header.subarray(0, bytesRead));
    if (length === 0) {
      return Buffer.alloc(0);
    }
    const tag = Buffer.alloc(length);
    const read = await handle.read(tag, 0, length, 0);
    return tag.subarray(0, read.bytesRead);
  } finally {
    await handle.close();
  }
}

export async function readTag(filePath: string): Promise<Id3Tag | null> {
  const head = await readHead(filePath);
  return head.length > 0 ? parseTag(head) : null;
}

/**
 * Replace the file's leading tag (if any) with `tag`
 */
export async function writeTag(filePath: string, tag: Id3Tag, options: { padding?: number } = {}): Promise<void> {
  const head = await readHead(filePath);
  const rendered = renderTags(tag, { padding: options.padding ?? 1024 });
  const tempPath = `${filePath}.tagging`;

  try {
    const out = createWriteStream(tempPath);
    out.write(rendered);
    await pipeline(createReadStream(filePath, { start: head.length }), out);
    await fs.rename(tempPath, filePath);
  } catch (err) {
    await fs.rm(tempPath, { force: true });
    throw err;
  }
}
