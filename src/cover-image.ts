/**
 * Cover image download for a loan.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { TransferError, errorMessage } from './errors';
import type { HttpTransport } from './http-client';
import type { CoverCandidate } from './loan-types';
import type { Logger } from './rolling-logger';

export const COVER_FILE_NAME = 'cover.jpg';

const RESIZE_ENDPOINT = 'https://ic.od-cdn.com/resize';

export interface CoverResult {
  path: string;
  data: Buffer | null;
}

export function getBestCoverUrl(covers: ReadonlyArray<CoverCandidate>): string | null {
  let best: CoverCandidate | null = null;
  for (const cover of covers) {
    if (!best || cover.width > best.width) {
      best = cover;
    }
  }
  return best ? best.url : null;
}

/**
 * The CDN's resize endpoint returns a square 510x510 rendition of any cover
 */
export function squareCoverUrl(coverUrl: string): string {
  const params = new URLSearchParams({
    type: 'auto',
    width: '510',
    height: '510',
    force: 'true',
    quality: '80',
    url: new URL(coverUrl).pathname,
  });
  return `${RESIZE_ENDPOINT}?${params.toString()}`;
}

async function readIfExists(filePath: string): Promise<Buffer | null> {
  try {
    return await fs.readFile(filePath);
  } catch {
    return null;
  }
}

/**
 * Download `cover.jpg` into the book folder unless it is already there.
 * Download problems are logged and leave `data` null.
 */
export async function downloadCover(
  transport: HttpTransport,
  bookFolder: string,
  coverUrl: string | null,
  logger: Logger,
  options: { forceSquare?: boolean; headers?: Record<string, string> } = {}
): Promise<CoverResult> {
  const coverPath = path.join(bookFolder, COVER_FILE_NAME);
  const existing = await readIfExists(coverPath);
  if (existing || !coverUrl) {
    return { path: coverPath, data: existing };
  }

  const forceSquare = options.forceSquare ?? true;
  const attempts = forceSquare ? [squareCoverUrl(coverUrl), coverUrl] : [coverUrl];

  for (const url of attempts) {
    try {
      const data = await transport.getBuffer(url, options.headers);
      await fs.writeFile(coverPath, data);
      return { path: coverPath, data };
    } catch (err) {
      if (!(err instanceof TransferError)) {
        throw err;
      }
      const label = url === coverUrl ? 'cover' : 'square cover';
      logger.warn(`[COVER] Error downloading ${label}: ${errorMessage(err)}`);
    }
  }

  return { path: coverPath, data: null };
}
