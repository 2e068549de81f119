import { describe, expect, it } from 'vitest';
import { ZipReader, ZipWriter, createEpubWriter, crc32 } from '../epub-zip';

describe('crc32', () => {
  it('matches the standard check value', () => {
    expect(crc32(Buffer.from('123456789', 'ascii'))).toBe(0xcbf43926);
  });
});

describe('ZipWriter', () => {
  it('writes entries a reader can list and read back', async () => {
    const writer = createEpubWriter();
    writer.addFile('OEBPS/ch1.xhtml', Buffer.from('<p>One</p>'.repeat(20)));
    writer.addFile('OEBPS/empty.css', Buffer.alloc(0));

    const reader = ZipReader.fromBuffer(await writer.toBuffer());

    expect(reader.getEntries()).toEqual(['mimetype', 'OEBPS/ch1.xhtml', 'OEBPS/empty.css']);
    expect(reader.getEntry('mimetype')).toMatchObject({ compressionMethod: 0, localHeaderOffset: 0, uncompressedSize: 20 });
    expect(reader.getEntry('OEBPS/ch1.xhtml')?.compressionMethod).toBe(8);
    expect(reader.getEntry('OEBPS/empty.css')?.compressionMethod).toBe(0);
    expect(await reader.readText('mimetype')).toBe('application/epub+zip');
    expect(await reader.readText('OEBPS/ch1.xhtml')).toBe('<p>One</p>'.repeat(20));
    expect(await reader.readText('OEBPS/empty.css')).toBe('');
  });

  it('places each local header right after the previous entry', async () => {
    const writer = new ZipWriter();
    writer.addFile('a.txt', Buffer.from('abc'), false);
    writer.addFile('b.txt', Buffer.from('de'), false);

    const data = await writer.toBuffer();
    const reader = ZipReader.fromBuffer(data);

    // 30 byte header + 5 byte name + 3 bytes of data
    expect(reader.getEntry('b.txt')?.localHeaderOffset).toBe(38);
    expect(data.readUInt32LE(38)).toBe(0x04034b50);
    expect(reader.getEntry('a.txt')).toMatchObject({ compressedSize: 3, uncompressedSize: 3 });
  });
});
