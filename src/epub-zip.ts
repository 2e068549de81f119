/**
 * EPUB Zip
 *
 * Minimal ZIP reading and writing for EPUB containers. The writer emits the
 * `mimetype` entry first and uncompressed, as EPUB readers require.
 */

import * as cheerio from 'cheerio';
import { XMLParser } from 'fast-xml-parser';
import { promises as fs } from 'fs';
import * as path from 'path';
import { promisify } from 'util';
import * as zlib from 'zlib';
import { z } from 'zod';
import { ParseError } from './errors';
import { parsePayload } from './loan-types';

const inflateRaw = promisify(zlib.inflateRaw);
const deflateRaw = promisify(zlib.deflateRaw);

export const EPUB_MIMETYPE = 'application/epub+zip';

const LOCAL_HEADER_SIGNATURE = 0x04034b50;
const CENTRAL_ENTRY_SIGNATURE = 0x02014b50;
const END_OF_CENTRAL_DIR_SIGNATURE = 0x06054b50;

interface ZipEntry {
  name: string;
  compressedSize: number;
  uncompressedSize: number;
  compressionMethod: number;
  localHeaderOffset: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// CRC32
// ─────────────────────────────────────────────────────────────────────────────

let crc32Table: number[] | null = null;

function getCrc32Table(): number[] {
  if (crc32Table) return crc32Table;

  const table: number[] = [];
  for (let i = 0; i < 256; i++) {
    let c = i;
    for (let j = 0; j < 8; j++) {
      c = (c & 1) ? (0xEDB88320 ^ (c >>> 1)) : (c >>> 1);
    }
    table[i] = c >>> 0;
  }
  crc32Table = table;
  return table;
}

export function crc32(data: Buffer): number {
  const table = getCrc32Table();
  let crc = 0xFFFFFFFF;
  for (const byte of data) {
    crc = (crc >>> 8) ^ table[(crc ^ byte) & 0xFF];
  }
  return (crc ^ 0xFFFFFFFF) >>> 0;
}

// ─────────────────────────────────────────────────────────────────────────────
// Reading
// ─────────────────────────────────────────────────────────────────────────────

export class ZipReader {
  private entries: Map<string, ZipEntry> = new Map();

  private constructor(private readonly data: Buffer) {
    this.readCentralDirectory();
  }

  static async open(filePath: string): Promise<ZipReader> {
    return new ZipReader(await fs.readFile(filePath));
  }

  static fromBuffer(data: Buffer): ZipReader {
    return new ZipReader(data);
  }

  /**
   * Entry names in central directory order
   */
  getEntries(): string[] {
    return Array.from(this.entries.keys());
  }

  getEntry(name: string): ZipEntry | undefined {
    return this.entries.get(name);
  }

  async readEntry(name: string): Promise<Buffer> {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new ParseError(`Entry not found: ${name}`);
    }

    const offset = entry.localHeaderOffset;
    if (offset + 30 > this.data.length || this.data.readUInt32LE(offset) !== LOCAL_HEADER_SIGNATURE) {
      throw new ParseError(`Invalid local file header for ${name}`);
    }

    const fileNameLength = this.data.readUInt16LE(offset + 26);
    const extraFieldLength = this.data.readUInt16LE(offset + 28);
    const dataOffset = offset + 30 + fileNameLength + extraFieldLength;
    const compressed = this.data.subarray(dataOffset, dataOffset + entry.compressedSize);

    if (entry.compressionMethod === 0) {
      return Buffer.from(compressed);
    }
    if (entry.compressionMethod === 8) {
      return inflateRaw(compressed);
    }
    throw new ParseError(`Unsupported compression method ${entry.compressionMethod} for ${name}`);
  }

  async readText(name: string): Promise<string> {
    return (await this.readEntry(name)).toString('utf8');
  }

  private readCentralDirectory(): void {
    const size = this.data.length;

    // the end record sits in the last 64KB + 22 bytes
    let eocdOffset = -1;
    for (let i = size - 22; i >= Math.max(0, size - 65557); i--) {
      if (this.data.readUInt32LE(i) === END_OF_CENTRAL_DIR_SIGNATURE) {
        eocdOffset = i;
        break;
      }
    }
    if (eocdOffset === -1) {
      throw new ParseError('End of central directory not found');
    }

    const entryCount = this.data.readUInt16LE(eocdOffset + 10);
    let offset = this.data.readUInt32LE(eocdOffset + 16);

    for (let i = 0; i < entryCount; i++) {
      if (this.data.readUInt32LE(offset) !== CENTRAL_ENTRY_SIGNATURE) {
        throw new ParseError('Invalid central directory entry');
      }

      const compressionMethod = this.data.readUInt16LE(offset + 10);
      const compressedSize = this.data.readUInt32LE(offset + 20);
      const uncompressedSize = this.data.readUInt32LE(offset + 24);
      const fileNameLength = this.data.readUInt16LE(offset + 28);
      const extraFieldLength = this.data.readUInt16LE(offset + 30);
      const commentLength = this.data.readUInt16LE(offset + 32);
      const localHeaderOffset = this.data.readUInt32LE(offset + 42);
      const name = this.data.toString('utf8', offset + 46, offset + 46 + fileNameLength);

      this.entries.set(name, { name, compressedSize, uncompressedSize, compressionMethod, localHeaderOffset });
      offset += 46 + fileNameLength + extraFieldLength + commentLength;
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Writing
// ─────────────────────────────────────────────────────────────────────────────

interface PackedEntry {
  name: Buffer;
  method: number;
  crc: number;
  stored: Buffer;
  size: number;
  offset: number;
}

const LOCAL_HEADER_SIZE = 30;
const CENTRAL_HEADER_SIZE = 46;
const ZIP_VERSION = 20;

/**
 * Fields shared by the local header and the central directory record,
 * from "version needed" through "extra field length"
 */
function writeCommonFields(header: Buffer, at: number, entry: PackedEntry): void {
  header.writeUInt16LE(ZIP_VERSION, at);
  header.writeUInt16LE(0, at + 2); // flags
  header.writeUInt16LE(entry.method, at + 4);
  header.writeUInt32LE(0, at + 6); // DOS time and date
  header.writeUInt32LE(entry.crc, at + 10);
  header.writeUInt32LE(entry.stored.length, at + 14);
  header.writeUInt32LE(entry.size, at + 18);
  header.writeUInt16LE(entry.name.length, at + 22);
  header.writeUInt16LE(0, at + 24); // extra
}

function localHeader(entry: PackedEntry): Buffer {
  const header = Buffer.alloc(LOCAL_HEADER_SIZE + entry.name.length);
  header.writeUInt32LE(LOCAL_HEADER_SIGNATURE, 0);
  writeCommonFields(header, 4, entry);
  entry.name.copy(header, LOCAL_HEADER_SIZE);
  return header;
}

function centralHeader(entry: PackedEntry): Buffer {
  // comment length, disk and attributes stay zero
  const header = Buffer.alloc(CENTRAL_HEADER_SIZE + entry.name.length);
  header.writeUInt32LE(CENTRAL_ENTRY_SIGNATURE, 0);
  header.writeUInt16LE(ZIP_VERSION, 4); // made by
  writeCommonFields(header, 6, entry);
  header.writeUInt32LE(entry.offset, 42);
  entry.name.copy(header, CENTRAL_HEADER_SIZE);
  return header;
}

function endOfCentralDirectory(count: number, size: number, offset: number): Buffer {
  const record = Buffer.alloc(22);
  record.writeUInt32LE(END_OF_CENTRAL_DIR_SIGNATURE, 0);
  record.writeUInt16LE(count, 8);
  record.writeUInt16LE(count, 10);
  record.writeUInt32LE(size, 12);
  record.writeUInt32LE(offset, 16);
  return record;
}

export class ZipWriter {
  private entries: Array<{ name: string; data: Buffer; compress: boolean }> = [];

  addFile(name: string, data: Buffer, compress: boolean = true): void {
    this.entries.push({ name, data, compress });
  }

  get size(): number {
    return this.entries.length;
  }

  async toBuffer(): Promise<Buffer> {
    const packed: PackedEntry[] = [];
    let offset = 0;

    for (const entry of this.entries) {
      const deflate = entry.compress && entry.data.length > 0;
      const item: PackedEntry = {
        name: Buffer.from(entry.name, 'utf8'),
        method: deflate ? 8 : 0,
        crc: crc32(entry.data),
        stored: deflate ? await deflateRaw(entry.data) : entry.data,
        size: entry.data.length,
        offset,
      };
      packed.push(item);
      offset += LOCAL_HEADER_SIZE + item.name.length + item.stored.length;
    }

    const body = packed.flatMap((item) => [localHeader(item), item.stored]);
    const central = packed.map(centralHeader);
    const centralSize = central.reduce((sum, b) => sum + b.length, 0);

    return Buffer.concat([...body, ...central, endOfCentralDirectory(packed.length, centralSize, offset)]);
  }

  /**
   * Write next to the target and rename into place
   */
  async write(outputPath: string): Promise<void> {
    const tempPath = `${outputPath}.part`;
    await fs.writeFile(tempPath, await this.toBuffer());
    await fs.rename(tempPath, outputPath);
  }
}

/**
 * A writer that already holds the stored `mimetype` entry
 */
export function createEpubWriter(): ZipWriter {
  const writer = new ZipWriter();
  writer.addFile('mimetype', Buffer.from(EPUB_MIMETYPE, 'ascii'), false);
  return writer;
}

// ─────────────────────────────────────────────────────────────────────────────
// Inspection
// ─────────────────────────────────────────────────────────────────────────────

export interface EpubInspection {
  entries: string[];
  mimetypeFirst: boolean;
  mimetypeStored: boolean;
  opfPath: string;
  manifestIds: string[];
  coverImageIds: string[];
  spineIdrefs: string[];
  navEntries: string[];
}

const containerSchema = z.object({
  container: z.object({
    rootfiles: z.object({
      rootfile: z.array(z.object({ '@_full-path': z.string() })).min(1),
    }),
  }),
});

const opfSchema = z.object({
  package: z.object({
    manifest: z.object({
      item: z
        .array(
          z.object({
            '@_id': z.string(),
            '@_href': z.string(),
            '@_media-type': z.string().optional(),
            '@_properties': z.string().optional(),
          })
        )
        .default([]),
    }),
    spine: z
      .union([z.literal(''), z.object({ itemref: z.array(z.object({ '@_idref': z.string() })).default([]) })])
      .transform((spine) => (spine === '' ? { itemref: [] } : spine)),
  }),
});

const ARRAY_NODES = new Set(['rootfile', 'item', 'itemref']);

function createPackageParser(): XMLParser {
  return new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    textNodeName: '#text',
    isArray: (name) => ARRAY_NODES.has(name),
  });
}

function hasProperty(properties: string | undefined, name: string): boolean {
  return (properties ?? '').split(/\s+/).includes(name);
}

/**
 * Reopen an EPUB and report what a reader will see: the container entry
 * order, cover image manifest items, spine and nav entries.
 */
export async function inspectEpub(epubPath: string): Promise<EpubInspection> {
  const zip = await ZipReader.open(epubPath);
  const entries = zip.getEntries();
  const mimetype = zip.getEntry('mimetype');
  const parser = createPackageParser();

  const container = parsePayload(
    containerSchema,
    parser.parse(await zip.readText('META-INF/container.xml')),
    'container.xml'
  );
  const opfPath = container.container.rootfiles.rootfile[0]['@_full-path'];
  const opf = parsePayload(opfSchema, parser.parse(await zip.readText(opfPath)), 'package document');
  const items = opf.package.manifest.item;

  const navEntries: string[] = [];
  const navItem = items.find((item) => hasProperty(item['@_properties'], 'nav'));
  if (navItem) {
    const navPath = path.posix.join(path.posix.dirname(opfPath), navItem['@_href']);
    const $ = cheerio.load(await zip.readText(navPath), { xmlMode: true });
    $('nav')
      .filter((_, el) => $(el).attr('epub:type') === 'toc')
      .find('a')
      .each((_, el) => {
        navEntries.push($(el).text().trim());
      });
  }

  return {
    entries,
    mimetypeFirst: entries[0] === 'mimetype' && mimetype?.localHeaderOffset === 0,
    mimetypeStored: mimetype?.compressionMethod === 0,
    opfPath,
    manifestIds: items.map((item) => item['@_id']),
    coverImageIds: items.filter((item) => hasProperty(item['@_properties'], 'cover-image')).map((item) => item['@_id']),
    spineIdrefs: opf.package.spine.itemref.map((ref) => ref['@_idref']),
    navEntries,
  };
}
