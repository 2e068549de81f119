import { promises as fs } from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { fetchAsset, planDownload, type FetcherContext } from '../asset-fetcher';
import { TransferError } from '../errors';
import type { ExternalEncoder } from '../ffmpeg-bridge';
import { CopyEncoder, RecordingLogger, exists, makeTempDir, removeDir, testClient, type Route } from './helpers';

const URL_A = 'https://cdn.example.test/asset.bin';

describe('fetchAsset', () => {
  let dir: string;
  let destination: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    destination = path.join(dir, 'asset.bin');
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  function context(routes: Record<string, Route>, encoder: ExternalEncoder = new CopyEncoder()) {
    const { client, requests } = testClient(routes);
    const logger = new RecordingLogger();
    const ctx: FetcherContext = { transport: client, encoder, logger, ffmpegLogLevel: 'fatal' };
    return { ctx, requests, logger };
  }

  it('downloads into place and leaves no partial file', async () => {
    const { ctx } = context({ [URL_A]: Buffer.from('abcdef') });

    const outcome = await fetchAsset(ctx, { url: URL_A, destination, expectedSize: 6 });

    expect(outcome).toEqual({ status: 'created', path: destination });
    expect(await fs.readFile(destination, 'utf8')).toBe('abcdef');
    expect(await exists(`${destination}.part`)).toBe(false);
  });

  it('resumes a partial download with a range request', async () => {
    await fs.writeFile(`${destination}.part`, 'abc');
    const { ctx, requests } = context({
      [URL_A]: (init) =>
        init.headers?.Range === 'bytes=3-'
          ? new Response('def', { status: 206 })
          : new Response('unexpected', { status: 500 }),
    });

    const outcome = await fetchAsset(ctx, { url: URL_A, destination, expectedSize: 6 });

    expect(outcome.status).toBe('created');
    expect(requests[0].headers.Range).toBe('bytes=3-');
    const stat = await fs.stat(destination);
    expect(stat.size).toBe(6);
    expect(await fs.readFile(destination, 'utf8')).toBe('abcdef');
  });

  it('starts over when the server ignores the range', async () => {
    await fs.writeFile(`${destination}.part`, 'abc');
    const { ctx } = context({ [URL_A]: Buffer.from('abcdef') });

    await fetchAsset(ctx, { url: URL_A, destination, expectedSize: 6 });

    expect(await fs.readFile(destination, 'utf8')).toBe('abcdef');
  });

  it('treats an unsatisfiable range as a finished download', async () => {
    await fs.writeFile(`${destination}.part`, 'abcdef');
    const { ctx } = context({ [URL_A]: () => new Response(null, { status: 416 }) });

    const outcome = await fetchAsset(ctx, { url: URL_A, destination });

    expect(outcome.status).toBe('created');
    expect(await fs.readFile(destination, 'utf8')).toBe('abcdef');
  });

  it('skips a file that is already saved', async () => {
    await fs.writeFile(destination, 'done');
    const { ctx, requests } = context({ [URL_A]: Buffer.from('abcdef') });

    const outcome = await fetchAsset(ctx, { url: URL_A, destination, expectedSize: 6 });

    expect(outcome).toEqual({ status: 'already-exists', path: destination });
    expect(requests).toHaveLength(0);
    expect(await fs.readFile(destination, 'utf8')).toBe('done');
  });

  it('fails on an HTTP error and keeps the partial file', async () => {
    await fs.writeFile(`${destination}.part`, 'abc');
    const { ctx } = context({ [URL_A]: () => new Response('nope', { status: 500 }) });

    await expect(fetchAsset(ctx, { url: URL_A, destination, expectedSize: 6 })).rejects.toBeInstanceOf(TransferError);
    expect(await fs.readFile(`${destination}.part`, 'utf8')).toBe('abc');
    expect(await exists(destination)).toBe(false);
  });

  it('releases the response body of a failed request', async () => {
    let cancelled = false;
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode('nope'));
      },
      cancel() {
        cancelled = true;
      },
    });
    const { ctx } = context({ [URL_A]: () => new Response(body, { status: 503 }) });

    await expect(fetchAsset(ctx, { url: URL_A, destination })).rejects.toThrow(`HTTP 503 downloading ${URL_A}`);
    expect(cancelled).toBe(true);
  });

  it('starts over when the partial file is larger than the asset', async () => {
    await fs.writeFile(`${destination}.part`, 'abcdefghij');
    const { ctx, requests, logger } = context({ [URL_A]: Buffer.from('abcdef') });

    const outcome = await fetchAsset(ctx, { url: URL_A, destination, expectedSize: 6 });

    expect(outcome.status).toBe('created');
    expect(requests[0].headers.Range).toBeUndefined();
    expect(await fs.readFile(destination, 'utf8')).toBe('abcdef');
    expect(logger.messages('WARN')).toEqual([
      `[FETCH] Discarding ${destination}.part: 10 bytes exceeds the expected 6`,
    ]);
  });

  it('fails when fewer bytes arrive than expected', async () => {
    const { ctx } = context({ [URL_A]: Buffer.from('abcdef') });

    await expect(fetchAsset(ctx, { url: URL_A, destination, expectedSize: 10 })).rejects.toThrow(
      `Incomplete download for ${URL_A}: 6 of 10 bytes`
    );
    expect(await exists(destination)).toBe(false);
    expect((await fs.stat(`${destination}.part`)).size).toBe(6);
  });

  it('remuxes audio through the encoder', async () => {
    const encoder = new CopyEncoder();
    const { ctx } = context({ [URL_A]: Buffer.from('audio-bytes') }, encoder);

    await fetchAsset(ctx, { url: URL_A, destination, isAudio: true });

    expect(encoder.calls).toHaveLength(1);
    expect(encoder.calls[0]).toContain('-c:a');
    expect(encoder.calls[0][encoder.calls[0].indexOf('-i') + 1]).toBe(`${destination}.part`);
    expect(await fs.readFile(destination, 'utf8')).toBe('audio-bytes');
    expect(await exists(`${destination}.part`)).toBe(false);
  });

  it('keeps the raw download when the remux fails', async () => {
    const { ctx, logger } = context({ [URL_A]: Buffer.from('audio-bytes') }, new CopyEncoder(() => 1));

    const outcome = await fetchAsset(ctx, { url: URL_A, destination, isAudio: true });

    expect(outcome.status).toBe('created');
    expect(await fs.readFile(destination, 'utf8')).toBe('audio-bytes');
    expect(logger.messages('WARN')).toEqual(['[FFMPEG] Remux exited with code 1, keeping original download']);
  });
});

describe('planDownload', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('reports the resume offset from the partial file', async () => {
    const destination = path.join(dir, 'x.mp3');
    await fs.writeFile(`${destination}.part`, Buffer.alloc(42));

    expect(await planDownload({ url: URL_A, destination, expectedSize: 100 })).toEqual({
      url: URL_A,
      destination,
      tempPath: `${destination}.part`,
      expectedSize: 100,
      resumeFrom: 42,
    });
  });
});
