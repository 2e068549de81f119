/**
 * Chapter Timeline Builder
 *
 * Turns per-part chapter offsets into contiguous per-part timelines and
 * reconciles them into one book-level timeline. Chapters routinely span
 * part boundaries, so a part may begin in the middle of a chapter.
 *
 * Units are whatever the caller supplies (seconds for openbook loans,
 * milliseconds for legacy media markers). Rounding to integer milliseconds
 * happens only when writing tags.
 */

import { ParseError } from './errors';
import type { ChapterMarker, PartMeta, SpineItem, TocItem } from './loan-types';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A labelled offset into a part, as listed in the loan's table of contents
 */
export interface TocEntry {
  title: string;
  partName: string;
  start: number;
}

export interface TimelinePart {
  duration: number;
  markers: ChapterMarker[];
}

export type TimeUnit = 'seconds' | 'milliseconds';

// e.g. {AAAAAAAA-BBBB-CCCC-9999-ABCDEF123456}Fmt425-Part03.mp3#3000
const FILE_PART_RE = /^(?<partName>\{[A-F0-9-]{36}\}[^#]+)(?:#(?<stamp>\d+(?:\.\d+)?))?$/i;

const TIMESTAMP_HMS_RE = /^(\d+):([0-5]?\d):([0-5]\d)(?:\.(\d+))?$/;
const TIMESTAMP_MS_RE = /^(\d+):([0-5]\d)(?:\.(\d+))?$/;

// ─────────────────────────────────────────────────────────────────────────────
// Parsing
// ─────────────────────────────────────────────────────────────────────────────

function fraction(digits: string | undefined): number {
  return digits ? Number(`0.${digits}`) : 0;
}

/**
 * Parse `H:MM:SS[.fff]` or `MM:SS[.fff]` into seconds
 */
export function parseTimestamp(text: string): number {
  const value = text.trim();

  const hms = TIMESTAMP_HMS_RE.exec(value);
  if (hms) {
    return Number(hms[1]) * 3600 + Number(hms[2]) * 60 + Number(hms[3]) + fraction(hms[4]);
  }

  const ms = TIMESTAMP_MS_RE.exec(value);
  if (ms) {
    return Number(ms[1]) * 60 + Number(ms[2]) + fraction(ms[3]);
  }

  throw new ParseError(`Unrecognised timestamp: "${text}"`);
}

export function parseTimestampMs(text: string): number {
  return toMilliseconds(parseTimestamp(text));
}

/**
 * Split a toc path into its part name and start offset in seconds
 */
export function parsePartPath(title: string, partPath: string): TocEntry {
  const match = FILE_PART_RE.exec(partPath);
  if (!match || !match.groups) {
    throw new ParseError(`Unexpected part path format: ${partPath}`);
  }
  const stamp = match.groups.stamp;
  return {
    title,
    partName: match.groups.partName,
    start: stamp ? Number(stamp) : 0,
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Per-part timelines
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Build contiguous markers for one part.
 *
 * Marker i ends where marker i+1 starts and the last marker ends at the part
 * duration. When the first offset is past 0 the part opens mid-chapter, and a
 * leading marker carrying `continuingTitle` covers the gap. Without a
 * continuing chapter the first marker is stretched back to 0 instead.
 */
export function buildPartTimeline(
  entries: ReadonlyArray<Pick<TocEntry, 'title' | 'start'>>,
  partDuration: number,
  partName: string = '',
  continuingTitle?: string
): ChapterMarker[] {
  if (!(partDuration > 0)) {
    throw new ParseError(`Invalid part duration for ${partName || 'part'}: ${partDuration}`);
  }

  const offsets: Array<{ title: string; start: number }> = [];
  for (const entry of entries) {
    if (entry.start < 0 || !Number.isFinite(entry.start)) {
      throw new ParseError(`Invalid chapter offset ${entry.start} in ${partName || 'part'}`);
    }
    if (entry.start >= partDuration) {
      // marker past the end of the audio, nothing left to label
      continue;
    }
    const previous = offsets[offsets.length - 1];
    if (previous) {
      if (entry.start < previous.start) {
        throw new ParseError(
          `Chapter offsets out of order in ${partName || 'part'}: ${entry.start} after ${previous.start}`
        );
      }
      if (entry.start === previous.start) {
        continue;
      }
    }
    offsets.push({ title: entry.title, start: entry.start });
  }

  if (offsets.length === 0) {
    return continuingTitle !== undefined
      ? [{ title: continuingTitle, partName, start: 0, end: partDuration }]
      : [];
  }

  if (offsets[0].start > 0) {
    if (continuingTitle !== undefined) {
      offsets.unshift({ title: continuingTitle, start: 0 });
    } else {
      offsets[0] = { ...offsets[0], start: 0 };
    }
  }

  return offsets.map((offset, i) => ({
    title: offset.title,
    partName,
    start: offset.start,
    end: i < offsets.length - 1 ? offsets[i + 1].start : partDuration,
  }));
}

/**
 * Reduce an openbook toc + spine to downloadable parts with per-part timelines.
 *
 * Nested `contents` entries are filed under their parent's title so that
 * repeated marks for the same chapter inside one part collapse into one.
 */
export function parseOpenbookToc(baseUrl: string, toc: TocItem[], spine: SpineItem[]): PartMeta[] {
  const entriesByPart = new Map<string, TocEntry[]>();

  const addEntry = (entry: TocEntry) => {
    const list = entriesByPart.get(entry.partName) ?? [];
    // the vendor sometimes stamps the same chapter several times in one part,
    // e.g. "Chapter 2 (00:00)" and "Chapter 2 (12:34)"
    if (list.length > 0 && list[list.length - 1].title === entry.title) {
      return;
    }
    list.push(entry);
    entriesByPart.set(entry.partName, list);
  };

  for (const item of toc) {
    addEntry(parsePartPath(item.title, item.path));
    for (const content of item.contents) {
      addEntry(parsePartPath(item.title, content.path));
    }
  }

  const orderedSpine = [...spine].sort((a, b) => a.spinePosition - b.spinePosition);
  const parts: PartMeta[] = [];
  let continuingTitle: string | undefined;

  for (const item of orderedSpine) {
    const entries = entriesByPart.get(item.originalPath) ?? [];
    const chapters = buildPartTimeline(entries, item.audioDuration, item.originalPath, continuingTitle);
    if (chapters.length > 0) {
      continuingTitle = chapters[chapters.length - 1].title;
    }
    parts.push({
      name: item.originalPath,
      url: new URL(item.path, baseUrl).toString(),
      fileLength: item.fileBytes,
      durationSeconds: item.audioDuration,
      spinePosition: item.spinePosition,
      chapters,
    });
  }

  return parts;
}

// ─────────────────────────────────────────────────────────────────────────────
// Book-level timeline
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Lay the parts end to end and coalesce chapters that continue across a
 * part boundary (last title of one part equals first title of the next).
 *
 * Two genuinely different chapters that share a title and meet at a part
 * boundary are merged as well; titles are all the vendor gives us.
 */
export function mergeTimelines(orderedParts: ReadonlyArray<TimelinePart>): ChapterMarker[] {
  const merged: ChapterMarker[] = [];
  let offset = 0;

  for (const part of orderedParts) {
    part.markers.forEach((marker, i) => {
      const start = offset + marker.start;
      const end = offset + marker.end;
      const previous = merged[merged.length - 1];

      if (i === 0 && previous && previous.title === marker.title) {
        merged[merged.length - 1] = { ...previous, end };
        return;
      }
      merged.push({ title: marker.title, partName: '', start, end });
    });
    offset += part.duration;
  }

  return merged;
}

export function partsToTimeline(parts: ReadonlyArray<PartMeta>): TimelinePart[] {
  return parts.map((p) => ({ duration: p.durationSeconds, markers: p.chapters }));
}

// ─────────────────────────────────────────────────────────────────────────────
// Units
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Seconds to integer milliseconds, rounding half away from zero
 */
export function toMilliseconds(seconds: number): number {
  return Math.round(seconds * 1000);
}

export function markerBoundsMs(marker: ChapterMarker, unit: TimeUnit): { start: number; end: number } {
  if (unit === 'milliseconds') {
    return { start: Math.round(marker.start), end: Math.round(marker.end) };
  }
  return { start: toMilliseconds(marker.start), end: toMilliseconds(marker.end) };
}

/**
 * Human-readable H:MM:SS.fff for log output
 */
export function formatTimestamp(value: number, unit: TimeUnit = 'seconds'): string {
  const totalMs = unit === 'seconds' ? toMilliseconds(value) : Math.round(value);
  const hours = Math.floor(totalMs / 3_600_000);
  const minutes = Math.floor((totalMs % 3_600_000) / 60_000);
  const seconds = Math.floor((totalMs % 60_000) / 1000);
  const millis = totalMs % 1000;
  return `${hours}:${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}.${String(millis).padStart(3, '0')}`;
}
