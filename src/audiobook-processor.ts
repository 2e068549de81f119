/**
 * Audiobook Processor
 *
 * Downloads every part of an audiobook loan, tags each one, and optionally
 * merges them into a single MP3 or M4B with a book-level chapter list.
 *
 * Tagging problems never fail the loan: they are logged and the cover is
 * kept on disk so it can be applied by hand.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { encodeOptions, fetcherContext, progressSink, type AppContext } from './app-context';
import { fetchAsset } from './asset-fetcher';
import {
  markersToSpans,
  readAudioInfo,
  writeChapters,
  writeTags,
  type TagFields,
} from './audio-tagger';
import { ensureBookFolder, type BookPaths } from './book-paths';
import { mergeTimelines, partsToTimeline } from './chapter-timeline';
import { downloadCover, getBestCoverUrl } from './cover-image';
import { errorMessage } from './errors';
import { mergeParts, transcode } from './ffmpeg-bridge';
import { readTag } from './id3-tags';
import {
  extractAuthors,
  extractNarrators,
  type ChapterMarker,
  type LoanManifest,
  type MediaInfo,
  type PartMeta,
} from './loan-types';
import { mediaMarkerTimeline, readMediaMarkers } from './odm-markers';
import { LOAN_FORMATS, createAudiobookOpf, extractIsbn } from './opf-builder';
import { pluralize, slugify } from './sanitize';
import { serializeXml } from './xml-tree';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface AudiobookJob {
  loan: LoanManifest;
  parts: PartMeta[];
  // only needed for the OPF sidecar
  mediaInfo?: MediaInfo | null;
  headers?: Record<string, string>;
}

export interface ProcessOutcome {
  status: 'created' | 'already-exists';
  outputs: string[];
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

export function partFileName(title: string, partNumber: number): string {
  return `${slugify(`${title} - Part ${pad2(partNumber)}`, true)}.mp3`;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export function tagFieldsFor(loan: LoanManifest, cover: Buffer | null): TagFields {
  return {
    title: loan.title,
    subtitle: loan.subtitle,
    authors: extractAuthors(loan.creators),
    narrators: extractNarrators(loan.creators),
    publisher: loan.publisher,
    description: loan.description,
    genres: loan.subjects,
    languages: loan.languages,
    releaseDate: loan.publishDate,
    series: loan.series,
    mediaId: loan.id,
    isbn: extractIsbn(loan.formats, [LOAN_FORMATS.audiobookMp3]) || undefined,
    cover,
  };
}

/**
 * Chapters for a part whose toc names none, read from the part's own
 * media markers. Returned in seconds like the toc-derived chapters.
 */
async function legacyChapters(
  filePath: string,
  part: PartMeta,
  continuingTitle: string | undefined
): Promise<ChapterMarker[]> {
  const markers = readMediaMarkers(await readTag(filePath));
  if (markers.length === 0) {
    return [];
  }
  const durationMs = Math.round(part.durationSeconds * 1000);
  return mediaMarkerTimeline(markers, durationMs, part.name, continuingTitle).map((marker) => ({
    ...marker,
    start: marker.start / 1000,
    end: marker.end / 1000,
  }));
}

// ─────────────────────────────────────────────────────────────────────────────
// Processing
// ─────────────────────────────────────────────────────────────────────────────

export async function processAudiobookLoan(ctx: AppContext, job: AudiobookJob): Promise<ProcessOutcome> {
  const { config, logger } = ctx;
  const { loan } = job;
  const authors = extractAuthors(loan.creators);

  logger.info(
    `[AUDIO] Downloading "${loan.title}" by "${authors.join(', ')}" in ${job.parts.length} ${pluralize(job.parts.length, 'part')}...`
  );

  const paths: BookPaths = await ensureBookFolder(
    { id: loan.id, title: loan.title, authors, series: loan.series, edition: loan.edition },
    config,
    logger
  );
  const mergedTarget = config.mergeFormat === 'mp3' ? paths.mp3Path : paths.m4bPath;

  if (config.mergeOutput && (await exists(mergedTarget))) {
    logger.warn(`[AUDIO] Already saved "${mergedTarget}"`);
    return { status: 'already-exists', outputs: [mergedTarget] };
  }

  const cover = await downloadCover(ctx.transport, paths.folder, getBestCoverUrl(loan.covers), logger, {
    headers: job.headers,
  });
  const fields = tagFieldsFor(loan, cover.data);
  const tagOptions = { alwaysOverwrite: config.overwriteTags, delimiter: config.tagDelimiter, version: config.id3v2Version };
  const chapterOptions = { overwrite: config.overwriteTags, version: config.id3v2Version };

  let keepCover = config.alwaysKeepCover;
  let bitrateKbps = 0;
  let created = false;
  const files: string[] = [];
  const partsWithChapters: PartMeta[] = [];

  // ── Parts ─────────────────────────────────────────────────────────────────
  for (const part of job.parts) {
    const partNumber = part.spinePosition + 1;
    const partPath = path.join(paths.folder, partFileName(loan.title, partNumber));

    const outcome = await fetchAsset(fetcherContext(ctx), {
      url: part.url,
      destination: partPath,
      expectedSize: part.fileLength,
      headers: job.headers,
      isAudio: true,
      onProgress: progressSink(config, `Part ${pad2(partNumber)}`),
    });
    created = created || outcome.status === 'created';

    let chapters = part.chapters;
    if (chapters.length === 0) {
      const previous = partsWithChapters[partsWithChapters.length - 1];
      const continuing = previous?.chapters[previous.chapters.length - 1]?.title;
      try {
        chapters = await legacyChapters(partPath, part, continuing);
      } catch (err) {
        logger.warn(`[ID3] Unreadable media markers in "${partPath}": ${errorMessage(err)}`);
        chapters = [];
      }
    }

    try {
      bitrateKbps = (await readAudioInfo(partPath)).bitrateKbps;
    } catch (err) {
      logger.warn(`[AUDIO] Unable to read the bitrate of "${partPath}": ${errorMessage(err)}`);
    }

    try {
      await writeTags(partPath, { ...fields, part: { number: partNumber, total: job.parts.length } }, tagOptions);

      if (config.addChapters && !config.mergeOutput && chapters.length > 0) {
        const written = await writeChapters(partPath, markersToSpans(chapters, 'seconds'), chapterOptions);
        logger.debug(`[ID3] ${written ? 'Added' : 'Kept existing'} chapters in "${partPath}"`);
      }
    } catch (err) {
      logger.warn(`[ID3] Error saving ID3: ${errorMessage(err)}`);
      keepCover = true;
    }

    partsWithChapters.push({ ...part, chapters });
    files.push(partPath);
    logger.info(`[AUDIO] Saved "${partPath}"`);
  }

  let outputs = files;
  const mergedMarkers = mergeTimelines(partsToTimeline(partsWithChapters));

  // ── Merge ─────────────────────────────────────────────────────────────────
  if (config.mergeOutput) {
    logger.info(`[AUDIO] Generating "${mergedTarget}"...`);
    const options = encodeOptions(config);
    await mergeParts(ctx.encoder, files, bitrateKbps, paths.mp3Path, options, logger);

    try {
      await writeTags(paths.mp3Path, fields, { ...tagOptions, overwriteTitle: true });
      if (config.addChapters) {
        await writeChapters(paths.mp3Path, markersToSpans(mergedMarkers, 'seconds'), chapterOptions);
      }
    } catch (err) {
      logger.warn(`[ID3] Error saving ID3: ${errorMessage(err)}`);
      keepCover = true;
    }

    if (config.mergeFormat === 'm4b') {
      // the encoder carries the merged MP3's CHAP frames into the MP4 chapter list
      await transcode(ctx.encoder, paths.mp3Path, cover.path, config.mergeCodec, bitrateKbps, paths.m4bPath, options, logger);
    }

    if (!config.keepMp3) {
      for (const file of files) {
        await fs.rm(file, { force: true });
      }
    }
    outputs = [mergedTarget];
    created = true;
  }

  // ── Sidecars ──────────────────────────────────────────────────────────────
  if (!keepCover && (await exists(cover.path))) {
    await fs.rm(cover.path, { force: true });
  }

  if (config.generateOpf && job.mediaInfo) {
    const opfPath = path.join(paths.folder, `${slugify(loan.title, true)}.opf`);
    const coverFile = keepCover && (await exists(cover.path)) ? cover.path : null;
    await fs.writeFile(opfPath, serializeXml(createAudiobookOpf(job.mediaInfo, coverFile, outputs)), 'utf8');
    logger.info(`[AUDIO] Saved "${opfPath}"`);
  }

  if (config.writeJson) {
    const debugPath = path.join(paths.folder, 'debug.json');
    const debugMeta = {
      meta: { title: loan.title, coverUrl: getBestCoverUrl(loan.covers), authors, publisher: loan.publisher ?? '' },
      downloadParts: partsWithChapters.map((p) => ({
        url: p.url,
        audioDuration: p.durationSeconds,
        fileLength: p.fileLength,
        spinePosition: p.spinePosition,
        chapters: p.chapters.map((m) => ({ title: m.title, start: m.start, end: m.end })),
      })),
      fileTracks: files,
      mergedMarkers: mergedMarkers.map((m) => ({ title: m.title, start: m.start, end: m.end })),
    };
    await fs.writeFile(debugPath, JSON.stringify(debugMeta, null, 2), 'utf8');
  }

  return { status: created ? 'created' : 'already-exists', outputs };
}
