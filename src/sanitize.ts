/**
 * Text helpers for file names, manifest ids and ffmpeg metadata.
 */

// Characters that are invalid in a file name on at least one of the supported platforms
const ILLEGAL_PATH_CHARS_RE = /[<>:"/\\|?*\u0000-\u001f]/g;

/**
 * Make a single path segment safe on every platform
 */
export function sanitizePath(text: string, substitute: string = '-'): string {
  return text
    .replace(ILLEGAL_PATH_CHARS_RE, substitute)
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/[. ]+$/, '');
}

/**
 * Lowercase, hyphen-separated slug. With `allowUnicode` letters outside
 * ASCII are kept, otherwise they are folded to ASCII or dropped.
 */
export function slugify(value: string, allowUnicode: boolean = false): string {
  let text: string;
  if (allowUnicode) {
    text = value.normalize('NFKC').replace(/[^\p{L}\p{N}_\s-]/gu, '');
  } else {
    text = value
      .normalize('NFKD')
      .replace(/[^\x00-\x7f]/g, '')
      .replace(/[^\w\s-]/g, '');
  }
  return text.trim().toLowerCase().replace(/[-\s]+/g, '-');
}

/**
 * Manifest ids may not start with a digit
 */
export function sanitizeOpfId(value: string): string {
  const id = slugify(value);
  if (/^\d/.test(id)) {
    return `id_${id}`;
  }
  return id;
}

export function pluralize(count: number, noun: string): string {
  return count === 1 ? noun : `${noun}s`;
}
