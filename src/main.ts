#!/usr/bin/env node
/**
 * loanpack command line
 *
 *   loanpack libby [options]   list loans, pick some, download them
 *   loanpack info              print the resolved settings
 */

import { Command, InvalidArgumentError } from 'commander';
import { createAppContext } from './app-context';
import { validateTemplate } from './book-paths';
import { LoanpackError, errorMessage } from './errors';
import { extractAuthors, type LoanManifest } from './loan-types';
import { exportLoans, parseSelection, planLoans, processLoans, selectLoans } from './pipeline';
import { RollingLogger } from './rolling-logger';
import { getDefaultSettingsFolder, resolveConfig, type ProcessingConfig } from './settings';
import { getFfmpegPath } from './tool-paths';
import { LibbyClient, readIdentity } from './vendor-client';

const VERSION = '0.4.0';

type CommonOptions = {
  settings?: string;
  verbose?: boolean;
};

type LibbyOptions = CommonOptions & {
  downloadDir?: string;
  bookFolderFormat?: string;
  bookFileFormat?: string;
  bookFolder?: boolean;
  merge?: boolean;
  mergeFormat?: 'mp3' | 'm4b';
  mergeCodec?: string;
  keepMp3?: boolean;
  chapters?: boolean;
  overwriteTags?: boolean;
  tagDelimiter?: string;
  id3v2Version?: 3 | 4;
  keepCover?: boolean;
  opf?: boolean;
  hideProgress?: boolean;
  timeout?: number;
  retries?: number;
  writeJson?: boolean;
  ffmpeg?: string;
  select?: number[];
  latest?: number;
  all?: boolean;
  dryRun?: boolean;
  exportLoans?: string;
};

// ─────────────────────────────────────────────────────────────────────────────
// Option parsing
// ─────────────────────────────────────────────────────────────────────────────

function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive number.');
  }
  return parsed;
}

function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a whole number.');
  }
  return parsed;
}

function parseMergeFormat(value: string): 'mp3' | 'm4b' {
  if (value !== 'mp3' && value !== 'm4b') {
    throw new InvalidArgumentError('Expected mp3 or m4b.');
  }
  return value;
}

function parseId3Version(value: string): 3 | 4 {
  if (value === '3') return 3;
  if (value === '4') return 4;
  throw new InvalidArgumentError('Expected 3 or 4.');
}

function parseLoanNumbers(value: string): number[] {
  try {
    return parseSelection(value);
  } catch (err) {
    throw new InvalidArgumentError(errorMessage(err));
  }
}

/**
 * Flags left unset stay undefined so the settings file can supply them
 */
export function toOverrides(options: LibbyOptions): Record<string, unknown> {
  return {
    downloadDir: options.downloadDir,
    bookFolderFormat: options.bookFolderFormat,
    bookFileFormat: options.bookFileFormat,
    noBookFolder: options.bookFolder === false ? true : undefined,
    mergeOutput: options.merge,
    mergeFormat: options.mergeFormat,
    mergeCodec: options.mergeCodec,
    keepMp3: options.keepMp3,
    addChapters: options.chapters,
    overwriteTags: options.overwriteTags,
    tagDelimiter: options.tagDelimiter,
    id3v2Version: options.id3v2Version,
    alwaysKeepCover: options.keepCover,
    generateOpf: options.opf,
    hideProgress: options.hideProgress,
    timeout: options.timeout,
    retries: options.retries,
    writeJson: options.writeJson,
    debug: options.verbose,
    ffmpegPath: options.ffmpeg,
  };
}

function loadConfig(options: LibbyOptions): { config: ProcessingConfig; settingsFolder: string } {
  const settingsFolder = options.settings ?? getDefaultSettingsFolder();
  const config = resolveConfig({ overrides: toOverrides(options), settingsFolder });
  validateTemplate(config.bookFolderFormat);
  validateTemplate(config.bookFileFormat);
  return { config, settingsFolder };
}

// ─────────────────────────────────────────────────────────────────────────────
// Commands
// ─────────────────────────────────────────────────────────────────────────────

function describeLoan(loan: LoanManifest, position: number): string {
  const authors = extractAuthors(loan.creators).join(', ') || 'Unknown';
  return `${String(position).padStart(3)}. ${loan.title} - ${authors} (${loan.type})`;
}

async function runLibby(options: LibbyOptions): Promise<void> {
  const { config, settingsFolder } = loadConfig(options);
  const logger = new RollingLogger({ name: 'loanpack', consoleLevel: options.verbose ? 'DEBUG' : 'INFO' });
  await logger.init();

  try {
    const ctx = createAppContext(config, logger);
    const vendor = new LibbyClient(ctx.transport, readIdentity(settingsFolder), logger);
    const loans = await vendor.listLoans();

    if (options.exportLoans) {
      await exportLoans(loans, options.exportLoans);
      logger.info(`[LIBBY] Saved ${loans.length} loans to "${options.exportLoans}"`);
      return;
    }

    if (loans.length === 0) {
      logger.info('[LIBBY] No downloadable loans found.');
      return;
    }

    if (!options.all && options.latest === undefined && !options.select?.length) {
      loans.forEach((loan, i) => console.log(describeLoan(loan, i + 1)));
      console.log('\nChoose loans with --select, --latest or --all.');
      return;
    }

    const selected = selectLoans(loans, { select: options.select, latest: options.latest, all: options.all });

    if (options.dryRun) {
      for (const { loan, paths } of planLoans(selected, ctx)) {
        console.log(`${loan.title}\n  folder: ${paths.folder}\n  file:   ${paths.fileStem}`);
      }
      return;
    }

    const results = await processLoans(selected, { ...ctx, vendor });
    for (const result of results) {
      const detail = result.status === 'failed' ? result.reason : result.outputs?.join(', ');
      console.log(`[${result.status}] ${result.title}${detail ? `: ${detail}` : ''}`);
    }
    if (results.some((r) => r.status === 'failed')) {
      process.exitCode = 1;
    }
  } finally {
    await logger.close();
  }
}

function runInfo(options: CommonOptions): void {
  const { config, settingsFolder } = loadConfig(options);
  const info = {
    version: VERSION,
    settingsFolder,
    logDirectory: RollingLogger.getLogDirectory(),
    ffmpeg: getFfmpegPath(config.ffmpegPath),
    config,
  };
  console.log(JSON.stringify(info, null, 2));
}

function reportError(err: unknown, verbose: boolean): void {
  if (err instanceof LoanpackError) {
    console.error(`Error: ${err.message}`);
  } else {
    console.error(`Unexpected error: ${errorMessage(err)}`);
  }
  if (verbose && err instanceof Error && err.stack) {
    console.error(err.stack);
  }
  process.exitCode = 1;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('loanpack')
    .description('Download library loans as tagged audiobooks and EPUB files')
    .version(VERSION)
    .option('--settings <folder>', 'Settings folder (loanpack.json, libby.json)')
    .option('-v, --verbose', 'Debug output, keeps EPUB working files');

  program
    .command('libby')
    .description('List Libby loans and download the selected ones')
    .option('-d, --download-dir <folder>', 'Download folder')
    .option('--book-folder-format <template>', 'Book folder name template, e.g. "%(Title)s - %(Author)s"')
    .option('--book-file-format <template>', 'Merged file name template')
    .option('--no-book-folder', 'Save files directly into the download folder')
    .option('-m, --merge', 'Merge audiobook parts into one file')
    .option('--merge-format <format>', 'mp3 or m4b', parseMergeFormat)
    .option('--merge-codec <codec>', 'Audio codec for m4b (default aac)')
    .option('-k, --keep-mp3', 'Keep part files after merging')
    .option('-c, --chapters', 'Add chapter markers')
    .option('--overwrite-tags', 'Replace tags that are already set')
    .option('--tag-delimiter <delimiter>', 'Delimiter for multi-value tags')
    .option('--id3v2-version <version>', '3 or 4', parseId3Version)
    .option('--keep-cover', 'Keep the downloaded cover image')
    .option('--opf', 'Write an OPF metadata file')
    .option('--hide-progress', 'No download progress')
    .option('--timeout <seconds>', 'Request timeout', parsePositiveNumber)
    .option('--retries <count>', 'Retries per request', parseCount)
    .option('-j, --write-json', 'Write debug.json beside the output')
    .option('--ffmpeg <path>', 'ffmpeg binary')
    .option('-s, --select <numbers>', 'Loans to download, e.g. 1,3', parseLoanNumbers)
    .option('--latest <count>', 'Download the most recent loans', parseCount)
    .option('--all', 'Download every loan')
    .option('--dry-run', 'Show where files would be saved')
    .option('--export-loans <file>', 'Save the loan list as JSON and exit')
    .action(async (_options: LibbyOptions, command: Command) => {
      const options: LibbyOptions = command.optsWithGlobals();
      try {
        await runLibby(options);
      } catch (err) {
        reportError(err, options.verbose ?? false);
      }
    });

  program
    .command('info')
    .description('Print the resolved settings')
    .action((_options: CommonOptions, command: Command) => {
      const options: CommonOptions = command.optsWithGlobals();
      try {
        runInfo(options);
      } catch (err) {
        reportError(err, options.verbose ?? false);
      }
    });

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => reportError(err, false));
}
