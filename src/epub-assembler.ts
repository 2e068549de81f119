/**
 * EPUB Assembler
 *
 * Mirrors a loan's title-content roster into <book folder>/OEBPS, fixes up
 * each page, synthesizes whatever navigation the loan lacks, writes the
 * package document and zips META-INF/ and OEBPS/ behind a stored mimetype.
 *
 * Assets already on disk are reused, so an interrupted assembly resumes
 * without downloading finished files again.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { UnsupportedFormatError } from './errors';
import {
  FALLBACK_MEDIA_TYPE,
  buildNavDocument,
  cleanupPage,
  compareRosterEntries,
  contentPath,
  filterContent,
  findCoverImage,
  guessMediaType,
  hasSvg,
  hasTocNav,
  isPageMediaType,
  loadPage,
  patchMagazineCss,
  relativeAssetPath,
  replaceSvgCover,
  restoreScriptPayload,
  serializePage,
  spineComparator,
  tocPages,
} from './epub-content';
import { createEpubWriter, type ZipWriter } from './epub-zip';
import type { HttpTransport } from './http-client';
import type { LoanManifest, MediaInfo, OpenBook, Roster } from './loan-types';
import {
  LOAN_FORMATS,
  NCX_MEDIA_TYPE,
  buildContainer,
  buildNcx,
  buildOpfPackage,
  type EpubVersion,
} from './opf-builder';
import type { Logger } from './rolling-logger';
import { sanitizeOpfId } from './sanitize';
import { appendChild, element, findChild, serializeXml } from './xml-tree';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export const EPUB_VERSION: EpubVersion = '3.0';

const META_FOLDER = 'META-INF';
const CONTENT_FOLDER = 'OEBPS';
const PACKAGE_FILE = 'package.opf';
const TITLE_CONTENT_GROUP = 'title-content';

export interface AssembleInput {
  loan: LoanManifest;
  mediaInfo: MediaInfo;
  openbook: OpenBook;
  roster: Roster[];
  bookFolder: string;
  epubPath: string;
  // cover already downloaded from the loan, if any
  coverPath: string | null;
  // also write the metadata-only package next to the EPUB
  exportOpfPath?: string | null;
  keepWorkingFiles?: boolean;
}

export interface AssembleContext {
  transport: HttpTransport;
  logger: Logger;
  headers?: Record<string, string>;
}

export interface AssembleResult {
  status: 'created' | 'already-exists';
  path: string;
  opfPath?: string;
  coverImageId: string | null;
  manifestCount: number;
  spineCount: number;
}

interface ManifestEntry {
  id: string;
  href: string;
  mediaType: string;
  properties?: string;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function addFolderToZip(zip: ZipWriter, root: string, folder: string): Promise<void> {
  const entries = await fs.readdir(path.join(root, folder), { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const entry of entries) {
    const relative = path.posix.join(folder, entry.name);
    if (entry.isDirectory()) {
      await addFolderToZip(zip, root, relative);
    } else if (entry.isFile()) {
      zip.addFile(relative, await fs.readFile(path.join(root, relative)));
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Assembly
// ─────────────────────────────────────────────────────────────────────────────

export async function assembleEpub(ctx: AssembleContext, input: AssembleInput): Promise<AssembleResult> {
  const { loan, mediaInfo, openbook } = input;
  const logger = ctx.logger;

  if (await exists(input.epubPath)) {
    logger.info(`[EPUB] Already saved "${input.epubPath}"`);
    return { status: 'already-exists', path: input.epubPath, coverImageId: null, manifestCount: 0, spineCount: 0 };
  }

  const isMagazine = loan.type === 'magazine';
  const toc = openbook.nav.toc;
  if (isMagazine && toc.length <= 1) {
    throw new UnsupportedFormatError('Unsupported fixed-layout (pre-paginated) format.');
  }

  const metaFolder = path.join(input.bookFolder, META_FOLDER);
  const contentFolder = path.join(input.bookFolder, CONTENT_FOLDER);
  await fs.mkdir(metaFolder, { recursive: true });
  await fs.mkdir(contentFolder, { recursive: true });

  const coverTocItem = toc.find((item) => item.pageRange === 'Cover' && item.featureImage) ?? null;
  const coverLandmark = openbook.nav.landmarks.find((landmark) => landmark.type === 'cover') ?? null;
  const pages = tocPages(toc);

  const titleContent = input.roster.find((r) => r.group === TITLE_CONTENT_GROUP);
  const entries = (titleContent?.entries ?? [])
    .filter((entry) => filterContent(entry.url, loan.type, pages))
    .sort(compareRosterEntries);

  const headers = { ...ctx.headers, Accept: '*/*' };
  const manifestEntries: ManifestEntry[] = [];
  const assetPaths = new Map<string, string>();
  let featureCoverId: string | null = null;
  let landmarkCoverId: string | null = null;
  let hasNcx = false;
  let hasNav = false;

  // ── Mirror the roster ─────────────────────────────────────────────────────
  for (const entry of entries) {
    const href = contentPath(entry.url);
    const mediaType = guessMediaType(href) ?? FALLBACK_MEDIA_TYPE;
    const isNcx = mediaType === NCX_MEDIA_TYPE;
    hasNcx = hasNcx || isNcx;

    const manifestEntry: ManifestEntry = { id: isNcx ? 'ncx' : sanitizeOpfId(href), href, mediaType };

    // magazine cover: the toc's feature image, once it is known to be in the roster
    if (coverTocItem?.featureImage && manifestEntry.id === sanitizeOpfId(coverTocItem.featureImage)) {
      featureCoverId = manifestEntry.id;
    }

    const assetPath = path.join(contentFolder, ...href.split('/'));
    assetPaths.set(manifestEntry.id, assetPath);
    await fs.mkdir(path.dirname(assetPath), { recursive: true });

    let page: ReturnType<typeof loadPage> | null = null;
    if (await exists(assetPath)) {
      logger.debug(`[EPUB] Already saved ${href}`);
      if (isPageMediaType(mediaType)) {
        page = loadPage(await fs.readFile(assetPath, 'utf8'));
      }
    } else if (isMagazine && mediaType === 'text/css') {
      await fs.writeFile(assetPath, patchMagazineCss(await ctx.transport.getText(entry.url, headers)), 'utf8');
    } else if (isPageMediaType(mediaType)) {
      page = loadPage(await ctx.transport.getText(entry.url, headers));
      if (!restoreScriptPayload(page)) {
        logger.warn(`[EPUB] Unable to extract content string for /${href}`);
      }
      cleanupPage(page, EPUB_VERSION);
      if (coverTocItem?.featureImage && manifestEntry.id === sanitizeOpfId(coverTocItem.path)) {
        replaceSvgCover(page, relativeAssetPath(href, coverTocItem.featureImage));
      }
      await fs.writeFile(assetPath, serializePage(page, EPUB_VERSION), 'utf8');
    } else {
      await fs.writeFile(assetPath, await ctx.transport.getBuffer(entry.url, headers));
    }

    if (page) {
      if (!landmarkCoverId && coverLandmark && coverLandmark.path === href) {
        const image = findCoverImage(page, coverLandmark.path);
        if (image) {
          landmarkCoverId = sanitizeOpfId(image);
        }
      } else if (!hasNav && hasTocNav(page)) {
        manifestEntry.properties = 'nav';
        hasNav = true;
      } else if (hasSvg(page)) {
        manifestEntry.properties = 'svg';
      }
    }

    manifestEntries.push(manifestEntry);
  }
  logger.debug(`[EPUB] Mirrored ${entries.length} roster entries`);

  // ── Cover ─────────────────────────────────────────────────────────────────
  // the toc's feature image wins over the cover landmark's <img>
  let coverImageId: string | null = null;
  for (const candidate of [featureCoverId, landmarkCoverId]) {
    const coverEntry = candidate ? manifestEntries.find((entry) => entry.id === candidate) : undefined;
    const coverAsset = coverEntry ? assetPaths.get(coverEntry.id) : undefined;
    if (coverEntry && coverAsset) {
      coverEntry.properties = 'cover-image';
      coverImageId = coverEntry.id;
      if (input.coverPath) {
        await fs.copyFile(coverAsset, input.coverPath);
      }
      break;
    }
  }

  // ── Navigation ────────────────────────────────────────────────────────────
  if (!hasNav) {
    const navName = `nav_${loan.id}.xhtml`;
    await fs.writeFile(path.join(contentFolder, navName), buildNavDocument(loan.title, toc), 'utf8');
    manifestEntries.push({ id: 'nav', href: navName, mediaType: 'application/xhtml+xml', properties: 'nav' });
  }
  if (!hasNcx) {
    const ncxName = `toc_${loan.id}.ncx`;
    await fs.writeFile(path.join(contentFolder, ncxName), serializeXml(buildNcx(mediaInfo, openbook)), 'utf8');
    manifestEntries.push({ id: 'ncx', href: ncxName, mediaType: NCX_MEDIA_TYPE });
  }

  // ── Package document ──────────────────────────────────────────────────────
  const pkg = buildOpfPackage(
    mediaInfo,
    EPUB_VERSION,
    isMagazine ? LOAN_FORMATS.magazineOverdrive : LOAN_FORMATS.ebookOverdrive
  );
  if (input.exportOpfPath) {
    // manifest and spine mean nothing outside the EPUB, so export before adding them
    await fs.writeFile(input.exportOpfPath, serializeXml(pkg), 'utf8');
    logger.info(`[EPUB] Saved "${input.exportOpfPath}"`);
  }

  const manifest = appendChild(pkg, element('manifest'));
  for (const entry of manifestEntries) {
    const attributes: Record<string, string> = { href: entry.href, id: entry.id, 'media-type': entry.mediaType };
    if (entry.properties) {
      attributes.properties = entry.properties;
    }
    appendChild(manifest, element('item', attributes));
  }

  if (!coverImageId) {
    if (input.coverPath && (await exists(input.coverPath))) {
      const coverName = `cover_${Math.floor(Date.now() / 1000)}.jpg`;
      await fs.copyFile(input.coverPath, path.join(contentFolder, coverName));
      coverImageId = 'coverimage';
      appendChild(
        manifest,
        element('item', { id: coverImageId, href: coverName, 'media-type': 'image/jpeg', properties: 'cover-image' })
      );
    }
  }

  const metadata = findChild(pkg, 'metadata');
  if (coverImageId && metadata) {
    appendChild(metadata, element('meta', { name: 'cover', content: coverImageId }));
  }

  const spine = appendChild(pkg, element('spine', { toc: 'ncx' }));
  const spineEntries = openbook.spine
    .filter((item) => !(isMagazine && !pages.includes(item.originalPath)))
    .sort(spineComparator(pages));
  for (const item of spineEntries) {
    appendChild(spine, element('itemref', { idref: sanitizeOpfId(item.originalPath) }));
  }

  if (openbook.nav.landmarks.length > 0) {
    const guide = appendChild(pkg, element('guide'));
    for (const landmark of openbook.nav.landmarks) {
      appendChild(guide, element('reference', { href: landmark.path, title: landmark.title, type: landmark.type }));
    }
  }

  await fs.writeFile(path.join(contentFolder, PACKAGE_FILE), serializeXml(pkg), 'utf8');
  await fs.writeFile(
    path.join(metaFolder, 'container.xml'),
    serializeXml(buildContainer(`${CONTENT_FOLDER}/${PACKAGE_FILE}`)),
    'utf8'
  );

  // ── Zip ───────────────────────────────────────────────────────────────────
  const zip = createEpubWriter();
  await addFolderToZip(zip, input.bookFolder, META_FOLDER);
  await addFolderToZip(zip, input.bookFolder, CONTENT_FOLDER);
  await zip.write(input.epubPath);
  logger.info(`[EPUB] Saved "${input.epubPath}"`);

  if (!input.keepWorkingFiles) {
    await fs.rm(contentFolder, { recursive: true, force: true });
    await fs.rm(metaFolder, { recursive: true, force: true });
  }

  return {
    status: 'created',
    path: input.epubPath,
    opfPath: input.exportOpfPath ?? undefined,
    coverImageId,
    manifestCount: manifest.children.length,
    spineCount: spine.children.length,
  };
}
