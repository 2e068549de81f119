/**
 * Book Paths
 *
 * Folder and file names for a loan, computed from the naming templates.
 * Templates use `%(Field)s` placeholders (Title, Author, Series, Edition,
 * ID, ReadingOrder) and `%%` for a literal percent sign.
 *
 * The same inputs always give the same paths; skip-if-exists checks rely on it.
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigError } from './errors';
import type { Logger } from './rolling-logger';
import { sanitizePath } from './sanitize';
import type { ProcessingConfig } from './settings';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface BookNameInput {
  id: string;
  title: string;
  authors: string[];
  series?: string;
  edition?: string;
  readingOrder?: string;
}

export interface BookPaths {
  folder: string;
  // base name shared by the merged outputs, no extension
  fileStem: string;
  mp3Path: string;
  m4bPath: string;
  epubPath: string;
  opfPath: string;
}

export type NamingConfig = Pick<ProcessingConfig, 'downloadDir' | 'bookFolderFormat' | 'bookFileFormat' | 'noBookFolder'>;

export const TEMPLATE_FIELDS = ['Title', 'Author', 'Series', 'Edition', 'ID', 'ReadingOrder'] as const;

export type TemplateField = (typeof TEMPLATE_FIELDS)[number];

// ─────────────────────────────────────────────────────────────────────────────
// Templates
// ─────────────────────────────────────────────────────────────────────────────

function isTemplateField(name: string): name is TemplateField {
  return TEMPLATE_FIELDS.some((field) => field === name);
}

export function formatTemplate(template: string, values: Record<TemplateField, string>): string {
  return template.replace(/%(?:\(([^)]*)\)s|%)/g, (match, name: string | undefined) => {
    if (name === undefined) {
      return '%';
    }
    if (!isTemplateField(name)) {
      throw new ConfigError(`Unknown field "${name}" in naming template "${template}"`);
    }
    return values[name];
  });
}

/**
 * Check a template before any loan is processed
 */
export function validateTemplate(template: string): void {
  formatTemplate(template, { Title: '', Author: '', Series: '', Edition: '', ID: '', ReadingOrder: '' });
}

// ─────────────────────────────────────────────────────────────────────────────
// Paths
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Compute the paths without touching the file system
 */
export function generateBookPaths(input: BookNameInput, config: NamingConfig): BookPaths {
  const author = input.authors.join(', ');

  // folder fields are sanitized one by one so a template may nest folders
  const folderName = formatTemplate(config.bookFolderFormat, {
    Title: sanitizePath(input.title),
    Author: sanitizePath(author),
    Series: sanitizePath(input.series ?? ''),
    Edition: sanitizePath(input.edition ?? ''),
    ID: sanitizePath(input.id),
    ReadingOrder: sanitizePath(input.readingOrder ?? ''),
  });

  // the file name is a single segment, so the whole result is sanitized
  const fileStem = sanitizePath(
    formatTemplate(config.bookFileFormat, {
      Title: input.title,
      Author: author,
      Series: input.series ?? '',
      Edition: input.edition ?? '',
      ID: sanitizePath(input.id),
      ReadingOrder: input.readingOrder ?? '',
    })
  );

  const folder = config.noBookFolder ? config.downloadDir : path.join(config.downloadDir, folderName);

  return {
    folder,
    fileStem,
    mp3Path: path.join(folder, `${fileStem}.mp3`),
    m4bPath: path.join(folder, `${fileStem}.m4b`),
    epubPath: path.join(folder, `${fileStem}.epub`),
    opfPath: path.join(folder, `${fileStem}.opf`),
  };
}

function isNameTooLong(err: unknown): boolean {
  if (!(err instanceof Error) || !('code' in err)) {
    return false;
  }
  if (err.code === 'ENAMETOOLONG') {
    return true;
  }
  return os.platform() === 'win32' && err.code === 'EINVAL';
}

/**
 * Compute the paths and create the book folder. When the folder name is
 * too long for the file system, only the first author is used.
 */
export async function ensureBookFolder(input: BookNameInput, config: NamingConfig, logger: Logger): Promise<BookPaths> {
  const paths = generateBookPaths(input, config);
  try {
    await fs.mkdir(paths.folder, { recursive: true });
    return paths;
  } catch (err) {
    if (!isNameTooLong(err)) {
      throw err;
    }
  }

  const shortened = generateBookPaths({ ...input, authors: input.authors.slice(0, 1) }, config);
  logger.warn(`[PATHS] Book folder name is too long. Files will be saved in "${shortened.folder}" instead.`);
  await fs.mkdir(shortened.folder, { recursive: true });
  return shortened;
}
