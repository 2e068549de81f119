/**
 * Ebook Processor
 *
 * Builds the EPUB for an ebook or magazine loan inside its book folder.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { AppContext } from './app-context';
import type { ProcessOutcome } from './audiobook-processor';
import { ensureBookFolder } from './book-paths';
import { downloadCover, getBestCoverUrl } from './cover-image';
import { assembleEpub } from './epub-assembler';
import { inspectEpub } from './epub-zip';
import { extractAuthors, type LoanManifest, type MediaInfo, type OpenBook, type Roster } from './loan-types';

export interface EbookJob {
  loan: LoanManifest;
  openbook: OpenBook;
  rosters: Roster[];
  mediaInfo: MediaInfo;
  headers?: Record<string, string>;
}

export async function processEbookLoan(ctx: AppContext, job: EbookJob): Promise<ProcessOutcome> {
  const { config, logger } = ctx;
  const { loan } = job;
  const authors = extractAuthors(loan.creators);

  logger.info(`[EPUB] Downloading "${loan.title}" by "${authors.join(', ')}"...`);

  const paths = await ensureBookFolder(
    {
      id: loan.id,
      title: loan.title,
      authors,
      series: loan.series,
      edition: loan.edition,
      readingOrder: job.mediaInfo.detailedSeries?.readingOrder ?? undefined,
    },
    config,
    logger
  );

  const cover = await downloadCover(ctx.transport, paths.folder, getBestCoverUrl(loan.covers), logger, {
    forceSquare: false,
    headers: job.headers,
  });

  const result = await assembleEpub(
    { transport: ctx.transport, logger, headers: job.headers },
    {
      loan,
      mediaInfo: job.mediaInfo,
      openbook: job.openbook,
      roster: job.rosters,
      bookFolder: paths.folder,
      epubPath: paths.epubPath,
      coverPath: cover.path,
      exportOpfPath: config.generateOpf ? paths.opfPath : null,
      keepWorkingFiles: config.debug,
    }
  );

  if (result.status === 'created' && logger.isDebugEnabled()) {
    const inspection = await inspectEpub(result.path);
    logger.debug(
      `[EPUB] ${inspection.entries.length} entries, spine ${inspection.spineIdrefs.length}, ` +
        `nav ${inspection.navEntries.length}, cover ${inspection.coverImageIds.join(', ') || '(none)'}`
    );
  }

  if (config.writeJson) {
    const debugPath = path.join(paths.folder, 'debug.json');
    const debugMeta = {
      meta: { title: loan.title, coverUrl: getBestCoverUrl(loan.covers), authors, publisher: loan.publisher ?? '' },
      openbook: job.openbook,
      rosters: job.rosters,
    };
    await fs.writeFile(debugPath, JSON.stringify(debugMeta, null, 2), 'utf8');
  }

  if (!config.alwaysKeepCover) {
    await fs.rm(cover.path, { force: true });
  }

  const outputs = [result.path];
  if (result.opfPath) {
    outputs.push(result.opfPath);
  }
  return { status: result.status, outputs };
}
