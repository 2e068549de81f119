/**
 * EPUB Content
 *
 * Rules for the title-content roster (which entries to keep, in which order)
 * and the fix-ups applied to each downloaded page before it is packaged.
 */

import * as cheerio from 'cheerio';
import * as path from 'path';
import type { LoanType, TocItem } from './loan-types';
import type { EpubVersion } from './opf-builder';

type Document = cheerio.CheerioAPI;

// ─────────────────────────────────────────────────────────────────────────────
// Media Types
// ─────────────────────────────────────────────────────────────────────────────

const MEDIA_TYPES: Record<string, string> = {
  '.xhtml': 'application/xhtml+xml',
  '.html': 'text/html',
  '.htm': 'text/html',
  '.css': 'text/css',
  '.js': 'application/javascript',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.svg': 'image/svg+xml',
  '.webp': 'image/webp',
  '.ncx': 'application/x-dtbncx+xml',
  '.opf': 'application/oebps-package+xml',
  '.xml': 'application/xml',
  '.smil': 'application/smil+xml',
  '.ttf': 'font/ttf',
  '.otf': 'font/otf',
  '.woff': 'font/woff',
  '.woff2': 'font/woff2',
  '.mp3': 'audio/mpeg',
  '.mp4': 'video/mp4',
};

export const FALLBACK_MEDIA_TYPE = 'application/octet-stream';

export function guessMediaType(filePath: string): string | undefined {
  return MEDIA_TYPES[path.posix.extname(filePath).toLowerCase()];
}

export function isPageMediaType(mediaType: string | undefined): boolean {
  return mediaType === 'application/xhtml+xml' || mediaType === 'text/html';
}

// ─────────────────────────────────────────────────────────────────────────────
// Roster & Spine
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Path of a roster URL without the leading slash, as it sits inside OEBPS/
 */
export function contentPath(url: string): string {
  return new URL(url).pathname.slice(1);
}

/**
 * Toc page paths without fragments
 */
export function tocPages(toc: ReadonlyArray<TocItem>): string[] {
  return toc.map((item) => item.path.split('#')[0]);
}

/**
 * Magazines skip page scans, thumbnails and pages the toc does not list.
 * Everything under /_d/ is skipped for all loans.
 */
export function filterContent(url: string, loanType: LoanType, pages: ReadonlyArray<string>): boolean {
  const urlPath = new URL(url).pathname;
  const mediaType = guessMediaType(urlPath);

  if (loanType === 'magazine' && mediaType) {
    if (mediaType.startsWith('image/') && (urlPath.startsWith('/pages/') || urlPath.startsWith('/thumbnails/'))) {
      return false;
    }
    if (isPageMediaType(mediaType) && !pages.includes(urlPath.slice(1))) {
      return false;
    }
  }

  return !urlPath.startsWith('/_d/');
}

const EXTENSION_RANK = ['.xhtml', '.html', '.htm', '.jpg', '.jpeg', '.png', '.gif'];

function rank(list: ReadonlyArray<string>, value: string): number {
  const index = list.indexOf(value);
  return index === -1 ? 999 : index;
}

/**
 * Pages first so the cover image can be found from page markup before images
 * are reached; then by extension and path.
 */
export function compareRosterEntries(a: { url: string }, b: { url: string }): number {
  const aPath = new URL(a.url).pathname;
  const bPath = new URL(b.url).pathname;
  const aExt = path.posix.extname(aPath);
  const bExt = path.posix.extname(bPath);

  const byRank = rank(EXTENSION_RANK, aExt) - rank(EXTENSION_RANK, bExt);
  if (byRank !== 0) return byRank;
  if (aExt !== bExt) return aExt < bExt ? -1 : 1;
  if (aPath === bPath) return 0;
  return aPath < bPath ? -1 : 1;
}

/**
 * Toc order first, spine position for anything the toc does not list
 */
export function spineComparator(
  pages: ReadonlyArray<string>
): (a: { originalPath: string; spinePosition: number }, b: { originalPath: string; spinePosition: number }) => number {
  return (a, b) => {
    const byToc = rank(pages, a.originalPath) - rank(pages, b.originalPath);
    if (byToc !== 0) return byToc;
    return a.spinePosition - b.spinePosition;
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Page Fix-ups
// ─────────────────────────────────────────────────────────────────────────────

const SCRIPT_PAYLOAD_RE = /parent\.__bif_cfc0\(self,'(.+)'\)/;

const MAGAZINE_CSS_RE = /(#article-body\s*\{[^{}]+?)overflow-x:\s*hidden;([^{}]+?})/g;

const XHTML_NAMESPACE = 'http://www.w3.org/1999/xhtml';

const XHTML11_DOCTYPE =
  '<!DOCTYPE html PUBLIC "-//W3C//DTD XHTML 1.1//EN" "http://www.w3.org/TR/xhtml11/DTD/xhtml11.dtd">';

// EPUB 2 readers reject these
const V2_REMOVED_ATTRIBUTES = [
  'aria-label',
  'data-loc',
  'data-epub-type',
  'data-document-status',
  'data-xml-lang',
  'lang',
  'role',
  'epub:type',
  'epub:prefix',
];

export const COVER_IMAGE_STYLE = 'img { max-width: 100%; margin-left: auto; margin-right: auto; }';

export function loadPage(markup: string): Document {
  return cheerio.load(markup, { xmlMode: true });
}

/**
 * Serialize a page. EPUB 2 pages get the XHTML 1.1 doctype.
 */
export function serializePage($: Document, version: EpubVersion): string {
  const xml = $.xml();
  return version === '2.0' ? xml.replace(/<!DOCTYPE[^>]*>/i, XHTML11_DOCTYPE) : xml;
}

/**
 * Some pages ship their body base64-encoded inside a script call. Replace the
 * placeholder body with the decoded one.
 *
 * @returns false when a script is present but carries no payload
 */
export function restoreScriptPayload($: Document): boolean {
  const script = $('script[type="text/javascript"]').first();
  if (script.length === 0) {
    return true;
  }

  const match = SCRIPT_PAYLOAD_RE.exec(script.text());
  if (!match) {
    return false;
  }

  const decoded = cheerio.load(Buffer.from(match[1], 'base64').toString('utf8'));
  $('body').replaceWith(decoded.xml(decoded('body')));
  return true;
}

/**
 * Version fix-ups for downloaded pages
 */
export function cleanupPage($: Document, version: EpubVersion): void {
  if (version === '2.0') {
    $('*').each((_, el) => {
      for (const attribute of V2_REMOVED_ATTRIBUTES) {
        $(el).removeAttr(attribute);
      }
    });
    $('nav, section').each((_, el) => {
      el.tagName = 'div';
    });
  }

  $('svg').each((_, el) => {
    const svg = $(el);
    if (!svg.attr('xmlns')) {
      svg.attr('xmlns', 'http://www.w3.org/2000/svg');
    }
    if (!svg.attr('xmlns:xlink')) {
      svg.attr('xmlns:xlink', 'http://www.w3.org/1999/xlink');
    }
  });
  $('figcaption').each((_, el) => {
    el.tagName = 'div';
  });
  $('base').remove();

  const html = $('html').first();
  if (html.length > 0 && !html.attr('xmlns')) {
    html.attr('xmlns', XHTML_NAMESPACE);
  }
}

/**
 * Magazine cover pages draw the cover with an SVG. Replace the body with a
 * plain image of the feature image.
 *
 * @returns false when the page has no SVG
 */
export function replaceSvgCover($: Document, imageSrc: string): boolean {
  if ($('svg').length === 0) {
    return false;
  }
  $('svg').first().remove();
  const body = $('body');
  body.children().remove();
  body.append($('<img/>').attr({ src: imageSrc, alt: 'Cover' }));
  $('head').append($('<style/>').text(COVER_IMAGE_STYLE));
  return true;
}

/**
 * Relative link from a page to an image, both given relative to OEBPS/
 */
export function relativeAssetPath(fromPage: string, toAsset: string): string {
  return path.posix.relative(path.posix.dirname(fromPage), toAsset);
}

/**
 * Drop `overflow-x: hidden` from `#article-body`; it breaks paged reading
 */
export function patchMagazineCss(css: string): string {
  return css.replace(MAGAZINE_CSS_RE, '$1$2');
}

export function hasTocNav($: Document): boolean {
  return $('*').filter((_, el) => $(el).attr('epub:type') === 'toc').length > 0;
}

export function hasSvg($: Document): boolean {
  return $('svg').length > 0;
}

/**
 * First image on a cover page, resolved against the page's path
 */
export function findCoverImage($: Document, pagePath: string): string | null {
  const src = $('img[src]').first().attr('src');
  if (!src) {
    return null;
  }
  const clean = src.split(/[?#]/)[0];
  return path.posix.normalize(path.posix.join(path.posix.dirname(pagePath), clean));
}

// ─────────────────────────────────────────────────────────────────────────────
// Nav Document
// ─────────────────────────────────────────────────────────────────────────────

const NAV_TEMPLATE = `<!DOCTYPE html>
<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops">
<head>
<title></title>
</head>
<body>
<nav epub:type="toc">
<h1>Contents</h1>
<ol id="toc"></ol>
</nav>
</body>
</html>`;

/**
 * Navigation document listing the toc entries, for loans that ship none
 */
export function buildNavDocument(title: string, toc: ReadonlyArray<TocItem>): string {
  const $ = loadPage(NAV_TEMPLATE);
  $('title').text(title);
  const list = $('#toc');
  for (const item of toc) {
    const link = $('<a/>').attr('href', item.path).text(item.title);
    list.append($('<li/>').append(link));
  }
  return $.xml().trim();
}
