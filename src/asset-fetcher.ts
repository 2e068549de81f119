/**
 * Resumable Asset Fetcher
 *
 * Downloads one binary resource into `<destination>.part` and moves it into
 * place once complete. The final path only ever holds a finished file; an
 * interrupted run leaves the `.part` behind and the next run resumes it with
 * a byte-range request.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { TransferError } from './errors';
import { remuxAudio, type ExternalEncoder } from './ffmpeg-bridge';
import type { HttpTransport } from './http-client';
import type { Logger } from './rolling-logger';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface DownloadTask {
  url: string;
  destination: string;
  tempPath: string;
  expectedSize: number;
  resumeFrom: number;
}

export type ProgressSink = (received: number, total: number) => void;

export interface FetchAssetOptions {
  url: string;
  destination: string;
  expectedSize?: number;
  headers?: Record<string, string>;
  // audio parts are remuxed before being moved into place
  isAudio?: boolean;
  onProgress?: ProgressSink;
}

export type FetchStatus = 'created' | 'already-exists';

export interface FetchOutcome {
  status: FetchStatus;
  path: string;
}

export interface FetcherContext {
  transport: HttpTransport;
  encoder: ExternalEncoder;
  logger: Logger;
  ffmpegLogLevel: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Planning
// ─────────────────────────────────────────────────────────────────────────────

async function fileSize(filePath: string): Promise<number | null> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile() ? stat.size : null;
  } catch {
    return null;
  }
}

/**
 * Work out where a download stands. Returns null when the final file is
 * already on disk.
 */
export async function planDownload(options: FetchAssetOptions): Promise<DownloadTask | null> {
  if ((await fileSize(options.destination)) !== null) {
    return null;
  }
  const tempPath = `${options.destination}.part`;
  return {
    url: options.url,
    destination: options.destination,
    tempPath,
    expectedSize: options.expectedSize ?? 0,
    resumeFrom: (await fileSize(tempPath)) ?? 0,
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Transfer
// ─────────────────────────────────────────────────────────────────────────────

async function streamToFile(
  response: Response,
  task: DownloadTask,
  append: boolean,
  onProgress?: ProgressSink
): Promise<number> {
  const handle = await fs.open(task.tempPath, append ? 'a' : 'w');
  let received = append ? task.resumeFrom : 0;
  const total = task.expectedSize || received + Number(response.headers.get('content-length') ?? 0);

  try {
    if (response.body) {
      for await (const chunk of response.body) {
        const bytes: Uint8Array = chunk;
        await handle.write(bytes);
        received += bytes.byteLength;
        onProgress?.(received, total);
      }
    }
  } catch (err) {
    throw new TransferError(`Download interrupted for ${task.url}`, task.url, response.status, err);
  } finally {
    await handle.close();
  }
  return received;
}

/**
 * Fetch one asset, resuming a previous partial download when there is one
 */
export async function fetchAsset(ctx: FetcherContext, options: FetchAssetOptions): Promise<FetchOutcome> {
  const planned = await planDownload(options);
  if (!planned) {
    ctx.logger.info(`[FETCH] Already saved ${options.destination}`);
    return { status: 'already-exists', path: options.destination };
  }

  let task = planned;
  if (task.expectedSize > 0 && task.resumeFrom > task.expectedSize) {
    ctx.logger.warn(`[FETCH] Discarding ${task.tempPath}: ${task.resumeFrom} bytes exceeds the expected ${task.expectedSize}`);
    await fs.rm(task.tempPath, { force: true });
    task = { ...task, resumeFrom: 0 };
  }

  await fs.mkdir(path.dirname(task.destination), { recursive: true });

  const complete = task.expectedSize > 0 && task.resumeFrom >= task.expectedSize;
  if (!complete) {
    const headers: Record<string, string> = { ...(options.headers ?? {}) };
    if (task.resumeFrom > 0) {
      headers.Range = `bytes=${task.resumeFrom}-`;
      ctx.logger.debug(`[FETCH] Resuming ${task.tempPath} from byte ${task.resumeFrom}`);
    }

    const response = await ctx.transport.request(task.url, { headers });

    // the range already covers the whole resource
    if (response.status === 416 && task.resumeFrom > 0) {
      await response.body?.cancel();
      ctx.logger.debug(`[FETCH] Range not satisfiable, treating ${task.tempPath} as complete`);
    } else {
      if (!response.ok) {
        await response.body?.cancel();
        throw new TransferError(`HTTP ${response.status} downloading ${task.url}`, task.url, response.status);
      }
      // a server that ignores Range sends the whole body again
      const append = task.resumeFrom > 0 && response.status === 206;
      const received = await streamToFile(response, task, append, options.onProgress);

      if (task.expectedSize > 0 && received < task.expectedSize) {
        throw new TransferError(
          `Incomplete download for ${task.url}: ${received} of ${task.expectedSize} bytes`,
          task.url,
          response.status
        );
      }
    }
  }

  if (options.isAudio) {
    await remuxAudio(ctx.encoder, task.tempPath, task.destination, { logLevel: ctx.ffmpegLogLevel }, ctx.logger);
  } else {
    await fs.rename(task.tempPath, task.destination);
  }

  ctx.logger.info(`[FETCH] Saved ${task.destination}`);
  return { status: 'created', path: task.destination };
}
