/**
 * Media Markers
 *
 * Older audio parts carry their chapter list inside a user text frame
 * ("OverDrive MediaMarkers") as a small XML document:
 *
 *   <Markers><Marker><Name>Chapter 1</Name><Time>0:00.000</Time></Marker>...</Markers>
 *
 * These are used when the loan's table of contents names no chapter for a
 * part. Offsets are in milliseconds.
 */

import { XMLParser } from 'fast-xml-parser';
import htmlEntities from './data/html-entities.json';
import { buildPartTimeline, parseTimestampMs } from './chapter-timeline';
import { ParseError, errorMessage } from './errors';
import { getUserText, type Id3Tag } from './id3-tags';
import type { ChapterMarker } from './loan-types';

export const MEDIA_MARKERS_DESCRIPTION = 'OverDrive MediaMarkers';

const ENTITIES: Record<string, string> = htmlEntities;

export interface MediaMarker {
  title: string;
  startMs: number;
}

/**
 * Replace named entities the XML parser does not know and bare ampersands
 */
export function patchMarkerXml(xml: string): string {
  return xml
    .replace(/\s&\s/g, ' &amp; ')
    .replace(/&([A-Za-z][A-Za-z0-9]*);/g, (match, name: string) => ENTITIES[name] ?? match);
}

function collectMarkers(node: unknown, found: unknown[]): void {
  if (Array.isArray(node)) {
    node.forEach((child) => collectMarkers(child, found));
    return;
  }
  if (typeof node !== 'object' || node === null) {
    return;
  }
  for (const [key, value] of Object.entries(node)) {
    if (key === 'Marker') {
      if (Array.isArray(value)) {
        found.push(...value);
      } else {
        found.push(value);
      }
    } else {
      collectMarkers(value, found);
    }
  }
}

function textOf(node: unknown, key: string): string {
  if (typeof node !== 'object' || node === null) {
    return '';
  }
  const value: unknown = Object.entries(node).find(([k]) => k === key)?.[1];
  if (typeof value === 'string' || typeof value === 'number') {
    return String(value).trim();
  }
  return '';
}

/**
 * Parse a MediaMarkers document into ordered markers
 */
export function parseMediaMarkers(xml: string): MediaMarker[] {
  const parser = new XMLParser({
    ignoreAttributes: true,
    parseTagValue: false,
    trimValues: true,
    processEntities: true,
    htmlEntities: true,
  });

  let doc: unknown;
  try {
    doc = parser.parse(patchMarkerXml(xml), true);
  } catch (err) {
    throw new ParseError(`Unreadable media markers: ${errorMessage(err)}`, err);
  }

  const nodes: unknown[] = [];
  collectMarkers(doc, nodes);

  return nodes.map((node) => ({
    title: textOf(node, 'Name'),
    startMs: parseTimestampMs(textOf(node, 'Time')),
  }));
}

export function readMediaMarkers(tag: Id3Tag | null): MediaMarker[] {
  const xml = tag ? getUserText(tag, MEDIA_MARKERS_DESCRIPTION) : undefined;
  return xml ? parseMediaMarkers(xml) : [];
}

/**
 * Per-part timeline in milliseconds from a part's media markers
 */
export function mediaMarkerTimeline(
  markers: MediaMarker[],
  partDurationMs: number,
  partName: string,
  continuingTitle?: string
): ChapterMarker[] {
  const entries = markers.map((m) => ({ title: m.title, start: m.startMs }));
  return buildPartTimeline(entries, partDurationMs, partName, continuingTitle);
}
