/**
 * OPF Builder
 *
 * Package document metadata (EPUB 2.0 and 3.0), the NCX navigation file,
 * META-INF/container.xml and the audiobook OPF sidecar. Everything here is
 * built as an XmlElement tree; callers add manifest and spine and serialize.
 */

import * as path from 'path';
import type { MediaInfo, OpenBook } from './loan-types';
import { slugify } from './sanitize';
import { appendChild, element, type XmlElement } from './xml-tree';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type EpubVersion = '2.0' | '3.0';

export const LOAN_FORMATS = {
  audiobookMp3: 'audiobook-mp3',
  ebookOverdrive: 'ebook-overdrive',
  magazineOverdrive: 'magazine-overdrive',
} as const;

export type LoanFormat = (typeof LOAN_FORMATS)[keyof typeof LOAN_FORMATS];

const DIRECT_EPUB_FORMATS: ReadonlyArray<LoanFormat> = [LOAN_FORMATS.ebookOverdrive, LOAN_FORMATS.magazineOverdrive];

export interface FormatLike {
  id: string;
  isbn?: string | null;
  identifiers: ReadonlyArray<{ type: string; value: string }>;
}

export const OPF_NAMESPACE = 'http://www.idpf.org/2007/opf';
const DC_NAMESPACE = 'http://purl.org/dc/elements/1.1/';
const NCX_NAMESPACE = 'http://www.daisy.org/z3986/2005/ncx/';
const CONTAINER_NAMESPACE = 'urn:oasis:names:tc:opendocument:xmlns:container';

export const NCX_MEDIA_TYPE = 'application/x-dtbncx+xml';
export const OPF_MEDIA_TYPE = 'application/oebps-package+xml';

// Creator roles in output order, with their MARC relator codes
const CREATOR_ROLES: ReadonlyArray<[string, string]> = [
  ['Author', 'aut'],
  ['Narrator', 'nrt'],
  ['Editor', 'edt'],
  ['Translator', 'trl'],
  ['Illustrator', 'ill'],
  ['Photographer', 'pht'],
  ['Artist', 'art'],
  ['Collaborator', 'clb'],
  ['Other', 'oth'],
  ['Publisher', 'pbl'],
];

// ─────────────────────────────────────────────────────────────────────────────
// Identifiers
// ─────────────────────────────────────────────────────────────────────────────

function identifierValue(format: FormatLike, type: string): string {
  return format.identifiers.find((identifier) => identifier.type === type)?.value ?? '';
}

/**
 * A format's `isbn` field wins; otherwise a LibraryISBN identifier, then an ISBN one
 */
export function extractIsbn(formats: ReadonlyArray<FormatLike>, formatTypes: ReadonlyArray<string>): string {
  const candidates = formats.filter((format) => formatTypes.includes(format.id));

  const direct = candidates.find((format) => format.isbn)?.isbn;
  if (direct) {
    return direct;
  }

  for (const isbnType of ['LibraryISBN', 'ISBN']) {
    for (const format of candidates) {
      const value = identifierValue(format, isbnType);
      if (value) {
        return value;
      }
    }
  }
  return '';
}

export function extractAsin(formats: ReadonlyArray<FormatLike>): string {
  for (const format of formats) {
    const value = identifierValue(format, 'ASIN');
    if (value) {
      return value;
    }
  }
  return '';
}

/**
 * Two-digit year and day of year, e.g. 24045 for 14 Feb 2024
 */
export function releaseDateReadingOrder(isoDate: string): string | null {
  const date = new Date(isoDate);
  if (Number.isNaN(date.getTime())) {
    return null;
  }
  const yearStart = Date.UTC(date.getUTCFullYear(), 0, 1);
  const dayOfYear = Math.floor((date.getTime() - yearStart) / 86_400_000) + 1;
  const year = String(date.getUTCFullYear() % 100).padStart(2, '0');
  return `${year}${String(dayOfYear).padStart(3, '0')}`;
}

// ─────────────────────────────────────────────────────────────────────────────
// Package
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Build the `<package>` element with its `<metadata>`. Manifest, spine and
 * guide are appended by the caller.
 */
export function buildOpfPackage(mediaInfo: MediaInfo, version: EpubVersion, loanFormat: LoanFormat): XmlElement {
  const isMagazine = loanFormat === LOAN_FORMATS.magazineOverdrive;
  const isDirectEpub = DIRECT_EPUB_FORMATS.includes(loanFormat);
  const v3 = version === '3.0';

  const pkg = element('package', { version, xmlns: OPF_NAMESPACE, 'unique-identifier': 'publication-id' });
  const metadata = appendChild(pkg, element('metadata', { 'xmlns:dc': DC_NAMESPACE, 'xmlns:opf': OPF_NAMESPACE }));
  const add = (name: string, attributes: Record<string, string>, text?: string) =>
    appendChild(metadata, element(name, attributes, text));
  const refine = (id: string, property: string, text: string, extra: Record<string, string> = {}) =>
    add('meta', { refines: `#${id}`, property, ...extra }, text);

  // Titles
  const title = isMagazine && mediaInfo.edition ? `${mediaInfo.title} - ${mediaInfo.edition}` : mediaInfo.title;
  const titleElement = add('dc:title', {}, title);
  if (v3) {
    titleElement.attributes.id = 'main-title';
    refine('main-title', 'title-type', 'main');
  }
  if (!v3 && !isDirectEpub && mediaInfo.subtitle) {
    add('dc:subtitle', {}, mediaInfo.subtitle);
  }
  if (v3 && mediaInfo.subtitle) {
    add('dc:title', { id: 'sub-title' }, mediaInfo.subtitle);
    refine('sub-title', 'title-type', 'subtitle');
  }
  if (v3 && mediaInfo.edition) {
    add('dc:title', { id: 'edition' }, mediaInfo.edition);
    refine('edition', 'title-type', 'edition');
  }

  if (mediaInfo.languages.length > 0) {
    add('dc:language', {}, mediaInfo.languages[0].id);
  }

  // Identifiers
  const isbn = extractIsbn(mediaInfo.formats, [loanFormat]);
  if (isbn) {
    add('dc:identifier', v3 ? { id: 'publication-id' } : { id: 'publication-id', 'opf:scheme': 'ISBN' }, isbn);
    if (v3 && (isbn.length === 10 || isbn.length === 13)) {
      refine('publication-id', 'identifier-type', isbn.length === 13 ? '15' : '02', { scheme: 'onix:codelist5' });
    }
  } else {
    add('dc:identifier', v3 ? { id: 'publication-id' } : { id: 'publication-id', 'opf:scheme': 'overdrive' }, mediaInfo.id);
  }

  const asin = extractAsin(mediaInfo.formats);
  if (asin) {
    add('dc:identifier', v3 ? { id: 'asin' } : { id: 'asin', 'opf:scheme': 'ASIN' }, asin);
    if (v3) {
      refine('asin', 'identifier-type', 'ASIN');
    }
  }

  add('dc:identifier', v3 ? { id: 'overdrive-id' } : { id: 'overdrive-id', 'opf:scheme': 'OverDriveId' }, mediaInfo.id);
  add(
    'dc:identifier',
    v3 ? { id: 'overdrive-reserve-id' } : { id: 'overdrive-reserve-id', 'opf:scheme': 'OverDriveReserveId' },
    mediaInfo.reserveId
  );
  if (v3) {
    refine('overdrive-id', 'identifier-type', 'overdrive-id');
    refine('overdrive-reserve-id', 'identifier-type', 'overdrive-reserve-id');
  }

  // Creators. Magazines list none, so the publisher stands in.
  const publisherName = mediaInfo.publisher?.name ?? '';
  const creators: MediaInfo['creators'] =
    mediaInfo.creators.length === 0 && publisherName
      ? [{ id: mediaInfo.publisher?.id ?? '', name: publisherName, role: 'Publisher', sortName: null }]
      : mediaInfo.creators;

  for (const [role, relator] of CREATOR_ROLES) {
    for (const creator of creators.filter((c) => c.role === role)) {
      if (v3) {
        const creatorId = `creator_${creator.id}`;
        add('dc:creator', { id: creatorId }, creator.name);
        if (creator.sortName) {
          refine(creatorId, 'file-as', creator.sortName);
        }
        refine(creatorId, 'role', relator, { scheme: 'marc:relators' });
      } else {
        const attributes: Record<string, string> = { 'opf:role': relator };
        if (creator.sortName) {
          attributes['opf:file-as'] = creator.sortName;
        }
        add('dc:creator', attributes, creator.name);
      }
    }
  }

  if (publisherName) {
    add('dc:publisher', {}, publisherName);
  }
  if (mediaInfo.description) {
    add('dc:description', {}, mediaInfo.description);
  }
  for (const subject of mediaInfo.subject) {
    add('dc:subject', {}, subject.name);
  }
  if (!v3 && !isDirectEpub) {
    for (const keyword of mediaInfo.keywords) {
      add('dc:tag', {}, keyword);
    }
  }
  if (v3) {
    mediaInfo.bisac.forEach((bisac, index) => {
      const subjectId = `subject_${index + 1}`;
      add('dc:subject', { id: subjectId }, bisac.description);
      refine(subjectId, 'authority', 'BISAC');
      refine(subjectId, 'term', bisac.code);
    });
  }

  const publishDate = mediaInfo.publishDate || mediaInfo.estimatedReleaseDate;
  if (publishDate) {
    add('dc:date', v3 ? {} : { 'opf:event': 'publication' }, publishDate);
    if (v3) {
      add('meta', { property: 'dcterms:modified' }, publishDate);
    }
  }

  // Series
  if (mediaInfo.detailedSeries || mediaInfo.series || isMagazine) {
    const seriesName =
      mediaInfo.detailedSeries?.seriesName || mediaInfo.series || (isMagazine ? mediaInfo.title : undefined);
    if (seriesName) {
      add('meta', { name: 'calibre:series', content: seriesName });
      if (v3) {
        add('meta', { id: 'series-name', property: 'belongs-to-collection' }, seriesName);
        refine('series-name', 'collection-type', 'series');
      }
    }

    let readingOrder = mediaInfo.detailedSeries?.readingOrder ?? '';
    if (!readingOrder && isMagazine && mediaInfo.estimatedReleaseDate) {
      readingOrder = releaseDateReadingOrder(mediaInfo.estimatedReleaseDate) ?? '';
    }
    if (readingOrder) {
      add('meta', { name: 'calibre:series_index', content: readingOrder });
      if (v3) {
        refine('series-name', 'group-position', readingOrder);
      }
    }
  }

  return pkg;
}

// ─────────────────────────────────────────────────────────────────────────────
// Navigation & Container
// ─────────────────────────────────────────────────────────────────────────────

/**
 * NCX table of contents for EPUB 2 readers, one navPoint per toc entry
 */
export function buildNcx(mediaInfo: MediaInfo, openbook: OpenBook): XmlElement {
  const uid =
    extractIsbn(mediaInfo.formats, [LOAN_FORMATS.ebookOverdrive, LOAN_FORMATS.magazineOverdrive]) || mediaInfo.id;

  const ncx = element('ncx', { version: '2005-1', xmlns: NCX_NAMESPACE, 'xml:lang': 'en' });
  appendChild(ncx, element('head', {}, [element('meta', { content: uid, name: 'dtb:uid' })]));
  appendChild(ncx, element('docTitle', {}, [element('text', {}, openbook.title.main)]));
  if (openbook.creator.length > 0) {
    appendChild(ncx, element('docAuthor', {}, [element('text', {}, openbook.creator[0].name)]));
  }

  const navMap = appendChild(ncx, element('navMap'));
  openbook.nav.toc.forEach((item, index) => {
    appendChild(
      navMap,
      element('navPoint', { id: `navPoint${index + 1}` }, [
        element('navLabel', {}, [element('text', {}, item.title)]),
        element('content', { src: item.path }),
      ])
    );
  });
  return ncx;
}

export function buildContainer(opfFullPath: string): XmlElement {
  return element('container', { version: '1.0', xmlns: CONTAINER_NAMESPACE }, [
    element('rootfiles', {}, [element('rootfile', { 'full-path': opfFullPath, 'media-type': OPF_MEDIA_TYPE })]),
  ]);
}

// ─────────────────────────────────────────────────────────────────────────────
// Audiobook Sidecar
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Version 2.0 package listing the audio files (and cover) next to it
 */
export function createAudiobookOpf(mediaInfo: MediaInfo, coverFile: string | null, audioFiles: string[]): XmlElement {
  const pkg = buildOpfPackage(mediaInfo, '2.0', LOAN_FORMATS.audiobookMp3);
  const manifest = appendChild(pkg, element('manifest'));
  const spine = appendChild(pkg, element('spine'));

  if (coverFile) {
    appendChild(manifest, element('item', { id: 'cover', href: path.basename(coverFile), 'media-type': 'image/jpeg' }));
  }
  for (const file of audioFiles) {
    const fileName = path.basename(file);
    const fileId = slugify(path.parse(fileName).name);
    appendChild(manifest, element('item', { id: fileId, href: fileName, 'media-type': 'audio/mpeg' }));
    appendChild(spine, element('itemref', { idref: fileId }));
  }
  return pkg;
}
