/**
 * Loan Types
 *
 * Vendor payloads arrive as loosely-typed JSON. They are validated here with
 * zod and mapped onto the records the rest of the pipeline works with, so
 * the timeline, tag and EPUB modules never touch raw payloads.
 */

import { z } from 'zod';
import { ParseError } from './errors';

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type LoanType = 'audiobook' | 'ebook' | 'magazine';

export interface Creator {
  name: string;
  role: string;
  id?: string;
  sortName?: string;
}

export interface Identifier {
  type: string;
  value: string;
}

export interface FormatDescriptor {
  id: string;
  isbn?: string;
  identifiers: Identifier[];
  bundledContent: string[];
}

export interface CoverCandidate {
  url: string;
  width: number;
}

/**
 * Identifies one title on loan. Immutable once fetched.
 */
export interface LoanManifest {
  id: string;
  cardId: string;
  type: LoanType;
  title: string;
  subtitle?: string;
  series?: string;
  edition?: string;
  creators: Creator[];
  languages: string[];
  subjects: string[];
  publisher?: string;
  description?: string;
  publishDate?: string;
  covers: CoverCandidate[];
  formats: FormatDescriptor[];
}

/**
 * One chapter span. `start`/`end` are in whatever unit the caller works in
 * (seconds on the direct loan path, milliseconds on the legacy marker path).
 * `partName` is empty once merged into a book-level timeline.
 */
export interface ChapterMarker {
  title: string;
  partName: string;
  start: number;
  end: number;
}

/**
 * One downloadable audio segment
 */
export interface PartMeta {
  name: string;
  url: string;
  fileLength: number;
  durationSeconds: number;
  spinePosition: number;
  chapters: ChapterMarker[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Vendor Payload Schemas
// ─────────────────────────────────────────────────────────────────────────────

const nameSchema = z.object({ name: z.string().optional() });

export const loanSchema = z.object({
  id: z.string(),
  cardId: z.string().default(''),
  title: z.string(),
  subtitle: z.string().nullish(),
  series: z.string().nullish(),
  edition: z.string().nullish(),
  type: z.object({ id: z.string() }),
  firstCreatorName: z.string().nullish(),
  covers: z
    .record(z.object({ href: z.string(), width: z.number().default(0) }))
    .default({}),
  subjects: z.array(nameSchema).default([]),
  publishDate: z.string().nullish(),
  publisherAccount: nameSchema.nullish(),
  languages: z.array(z.object({ id: z.string() })).default([]),
  formats: z
    .array(
      z.object({
        id: z.string(),
        isbn: z.string().nullish(),
        identifiers: z.array(z.object({ type: z.string(), value: z.string() })).default([]),
        bundledContent: z.array(z.object({ titleId: z.union([z.string(), z.number()]) })).default([]),
      })
    )
    .default([]),
  checkoutDate: z.string().nullish(),
});

export type RawLoan = z.infer<typeof loanSchema>;

const tocItemSchema = z.object({
  title: z.string(),
  path: z.string(),
  pageRange: z.string().nullish(),
  featureImage: z.string().nullish(),
  contents: z.array(z.object({ title: z.string().nullish(), path: z.string() })).default([]),
});

export type TocItem = z.infer<typeof tocItemSchema>;

const spineItemSchema = z
  .object({
    path: z.string(),
    '-odread-original-path': z.string(),
    '-odread-spine-position': z.number(),
    'audio-duration': z.number().nullish(),
    '-odread-file-bytes': z.number().nullish(),
    'media-type': z.string().nullish(),
  })
  .transform((s) => ({
    path: s.path,
    originalPath: s['-odread-original-path'],
    spinePosition: s['-odread-spine-position'],
    audioDuration: s['audio-duration'] ?? 0,
    fileBytes: s['-odread-file-bytes'] ?? 0,
    mediaType: s['media-type'] ?? undefined,
  }));

export type SpineItem = z.infer<typeof spineItemSchema>;

const landmarkSchema = z.object({
  type: z.string(),
  title: z.string().default(''),
  path: z.string(),
});

export type Landmark = z.infer<typeof landmarkSchema>;

export const openbookSchema = z.object({
  title: z.object({ main: z.string(), subtitle: z.string().nullish() }),
  creator: z.array(z.object({ name: z.string(), role: z.string().default('') })).default([]),
  language: z.string().nullish(),
  description: z
    .object({ full: z.string().nullish(), short: z.string().nullish() })
    .nullish(),
  nav: z.object({
    toc: z.array(tocItemSchema).default([]),
    landmarks: z.array(landmarkSchema).default([]),
  }),
  spine: z.array(spineItemSchema).default([]),
});

export type OpenBook = z.infer<typeof openbookSchema>;

export const mediaInfoSchema = z.object({
  id: z.string(),
  reserveId: z.string().default(''),
  title: z.string(),
  subtitle: z.string().nullish(),
  edition: z.string().nullish(),
  series: z.string().nullish(),
  type: z.object({ id: z.string() }),
  languages: z.array(z.object({ id: z.string(), name: z.string().nullish() })).default([]),
  formats: z
    .array(
      z.object({
        id: z.string(),
        isbn: z.string().nullish(),
        identifiers: z.array(z.object({ type: z.string(), value: z.string() })).default([]),
      })
    )
    .default([]),
  creators: z
    .array(
      z.object({
        id: z.union([z.string(), z.number()]).transform(String).default(''),
        name: z.string(),
        role: z.string().default(''),
        sortName: z.string().nullish(),
      })
    )
    .default([]),
  publisher: z
    .object({ id: z.union([z.string(), z.number()]).transform(String).nullish(), name: z.string().nullish() })
    .nullish(),
  description: z.string().nullish(),
  subject: z.array(z.object({ name: z.string() })).default([]),
  bisac: z.array(z.object({ code: z.string(), description: z.string() })).default([]),
  keywords: z.array(z.string()).default([]),
  publishDate: z.string().nullish(),
  estimatedReleaseDate: z.string().nullish(),
  detailedSeries: z
    .object({
      seriesName: z.string().nullish(),
      readingOrder: z.union([z.string(), z.number()]).transform(String).nullish(),
    })
    .nullish(),
});

export type MediaInfo = z.infer<typeof mediaInfoSchema>;

export const rosterSchema = z.object({
  group: z.string(),
  entries: z.array(z.object({ url: z.string() })).default([]),
});

export type Roster = z.infer<typeof rosterSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Ingestion
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Validate a payload against a schema, turning zod issues into a ParseError
 */
export function parsePayload<S extends z.ZodTypeAny>(schema: S, payload: unknown, label: string): z.output<S> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new ParseError(`Invalid ${label}: ${where}: ${issue?.message ?? 'unexpected shape'}`, result.error);
  }
  return result.data;
}

export function toLoanType(typeId: string): LoanType {
  if (typeId === 'audiobook' || typeId === 'magazine') {
    return typeId;
  }
  return 'ebook';
}

/**
 * Build the loan manifest from a sync loan, enriched by the openbook when it is known
 */
export function toLoanManifest(raw: RawLoan, openbook?: OpenBook): LoanManifest {
  const manifest: LoanManifest = {
    id: raw.id,
    cardId: raw.cardId,
    type: toLoanType(raw.type.id),
    title: raw.title,
    subtitle: raw.subtitle ?? undefined,
    series: raw.series ?? undefined,
    edition: raw.edition ?? undefined,
    creators: raw.firstCreatorName ? [{ name: raw.firstCreatorName, role: 'author' }] : [],
    languages: raw.languages.map((l) => l.id),
    subjects: raw.subjects.map((s) => s.name).filter((n): n is string => !!n),
    publisher: raw.publisherAccount?.name || undefined,
    description: undefined,
    publishDate: raw.publishDate ?? undefined,
    covers: Object.values(raw.covers).map((c) => ({ url: c.href, width: c.width })),
    formats: raw.formats.map((f) => ({
      id: f.id,
      isbn: f.isbn ?? undefined,
      identifiers: f.identifiers,
      bundledContent: f.bundledContent.map((b) => String(b.titleId)),
    })),
  };
  return openbook ? withOpenBook(manifest, openbook) : manifest;
}

/**
 * The openbook's creators, language and description replace the sync loan's
 */
export function withOpenBook(manifest: LoanManifest, openbook: OpenBook): LoanManifest {
  return {
    ...manifest,
    creators:
      openbook.creator.length > 0 ? openbook.creator.map((c) => ({ name: c.name, role: c.role })) : manifest.creators,
    languages: openbook.language ? [openbook.language] : manifest.languages,
    description: openbook.description?.full || openbook.description?.short || manifest.description,
  };
}

/**
 * Authors first, then editors, then anyone credited
 */
export function extractAuthors(creators: Creator[]): string[] {
  const byRole = (role: string) => creators.filter((c) => c.role.toLowerCase() === role).map((c) => c.name);
  const authors = byRole('author');
  if (authors.length > 0) return authors;
  const editors = byRole('editor');
  if (editors.length > 0) return editors;
  return creators.map((c) => c.name);
}

export function extractNarrators(creators: Creator[]): string[] {
  return creators.filter((c) => c.role.toLowerCase() === 'narrator').map((c) => c.name);
}
