/**
 * Vendor Client
 *
 * The loan source the pipeline reads from. `LibbyClient` talks to the Libby
 * and OverDrive web APIs with an identity token stored by a previous sign-in
 * (libby.json in the settings folder); signing in is not handled here.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { parseOpenbookToc } from './chapter-timeline';
import { ConfigError } from './errors';
import type { HttpTransport } from './http-client';
import {
  loanSchema,
  mediaInfoSchema,
  openbookSchema,
  parsePayload,
  rosterSchema,
  toLoanManifest,
  type LoanManifest,
  type MediaInfo,
  type OpenBook,
  type PartMeta,
  type RawLoan,
  type Roster,
} from './loan-types';
import type { Logger } from './rolling-logger';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface OpenedLoan {
  openbook: OpenBook;
  // audio parts with their chapters; empty for ebooks
  parts: PartMeta[];
}

export interface VendorClient {
  listLoans(): Promise<LoanManifest[]>;
  fetchLoanManifest(loanId: string): Promise<LoanManifest>;
  fetchOpenBookAndToc(loan: LoanManifest): Promise<OpenedLoan>;
  fetchRosters(loan: LoanManifest): Promise<Roster[]>;
  fetchMediaInfo(titleId: string): Promise<MediaInfo>;
  // headers content downloads need (session cookie, user agent)
  contentHeaders(): Record<string, string>;
  readonly transport: HttpTransport;
}

export const LIBBY_SETTINGS_FILE = 'libby.json';

export const USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4 Safari/605.1.15';

const SENTRY_URL = 'https://sentry-read.svc.overdrive.com';
const THUNDER_URL = 'https://thunder.api.overdrive.com/v2';
const SITE_URL = 'https://libbyapp.com';
const CLIENT_ID = 'dewey';

const identitySchema = z.object({ identity: z.string().min(1) });

const syncSchema = z.object({
  loans: z.array(loanSchema).default([]),
});

const openMetaSchema = z.object({
  message: z.string().default(''),
  urls: z.object({
    web: z.string(),
    openbook: z.string(),
    rosters: z.string().nullish(),
  }),
});

type OpenMeta = z.infer<typeof openMetaSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Identity
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Read the stored identity token
 */
export function readIdentity(settingsFolder: string): string {
  const identityPath = path.join(settingsFolder, LIBBY_SETTINGS_FILE);
  if (!fs.existsSync(identityPath)) {
    throw new ConfigError(`No Libby identity found at ${identityPath}. Sign in with Libby first.`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(identityPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Unable to read ${identityPath}`, err);
  }
  const result = identitySchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(`${identityPath} holds no identity token`, result.error);
  }
  return result.data.identity;
}

// ─────────────────────────────────────────────────────────────────────────────
// Libby
// ─────────────────────────────────────────────────────────────────────────────

export class LibbyClient implements VendorClient {
  private readonly cookies = new Map<string, string>();
  private readonly opened = new Map<string, OpenMeta>();

  constructor(
    readonly transport: HttpTransport,
    private readonly identity: string,
    private readonly logger: Logger
  ) {}

  private authHeaders(): Record<string, string> {
    return {
      'User-Agent': USER_AGENT,
      Accept: 'application/json',
      Authorization: `Bearer ${this.identity}`,
    };
  }

  contentHeaders(): Record<string, string> {
    const headers: Record<string, string> = { 'User-Agent': USER_AGENT };
    if (this.cookies.size > 0) {
      headers.Cookie = Array.from(this.cookies, ([name, value]) => `${name}=${value}`).join('; ');
    }
    return headers;
  }

  private rememberCookies(res: Response): void {
    for (const cookie of res.headers.getSetCookie()) {
      const pair = cookie.split(';')[0];
      const separator = pair.indexOf('=');
      if (separator > 0) {
        this.cookies.set(pair.slice(0, separator).trim(), pair.slice(separator + 1).trim());
      }
    }
  }

  private async syncedLoans(): Promise<RawLoan[]> {
    const payload = await this.transport.getJson(`${SENTRY_URL}/chip/sync`, this.authHeaders());
    const sync = parsePayload(syncSchema, payload, 'sync response');
    // oldest checkout first, so the most recent loan is listed last
    return [...sync.loans].sort((a, b) => (a.checkoutDate ?? '').localeCompare(b.checkoutDate ?? ''));
  }

  async listLoans(): Promise<LoanManifest[]> {
    const loans = await this.syncedLoans();
    this.logger.debug(`[LIBBY] Synced ${loans.length} loans`);
    return loans.map((loan) => toLoanManifest(loan));
  }

  async fetchLoanManifest(loanId: string): Promise<LoanManifest> {
    const loan = (await this.syncedLoans()).find((l) => l.id === loanId);
    if (!loan) {
      throw new ConfigError(`No loan with id ${loanId}`);
    }
    return toLoanManifest(loan);
  }

  /**
   * Open a loan. The web reader URL sets the cookie content downloads need.
   */
  private async open(loan: LoanManifest): Promise<OpenMeta> {
    const cached = this.opened.get(loan.id);
    if (cached) {
      return cached;
    }

    const kind = loan.type === 'audiobook' ? 'audiobook' : 'book';
    const payload = await this.transport.getJson(
      `${SENTRY_URL}/open/${kind}/card/${loan.cardId}/title/${loan.id}`,
      this.authHeaders()
    );
    const meta = parsePayload(openMetaSchema, payload, 'open response');

    const webUrl = meta.message ? `${meta.urls.web}?${meta.message}` : meta.urls.web;
    const res = await this.transport.requestOk(webUrl, { headers: { 'User-Agent': USER_AGENT, Accept: '*/*' } });
    this.rememberCookies(res);

    this.opened.set(loan.id, meta);
    return meta;
  }

  async fetchOpenBookAndToc(loan: LoanManifest): Promise<OpenedLoan> {
    const meta = await this.open(loan);
    const payload = await this.transport.getJson(meta.urls.openbook, {
      ...this.authHeaders(),
      ...this.contentHeaders(),
    });
    const openbook = parsePayload(openbookSchema, payload, 'openbook');
    const parts =
      loan.type === 'audiobook' ? parseOpenbookToc(meta.urls.web, openbook.nav.toc, openbook.spine) : [];
    return { openbook, parts };
  }

  async fetchRosters(loan: LoanManifest): Promise<Roster[]> {
    const meta = await this.open(loan);
    const rostersUrl = meta.urls.rosters ?? new URL('rosters.json', meta.urls.openbook).toString();
    const payload = await this.transport.getJson(rostersUrl, { ...this.authHeaders(), ...this.contentHeaders() });
    return parsePayload(z.array(rosterSchema), payload, 'rosters');
  }

  async fetchMediaInfo(titleId: string): Promise<MediaInfo> {
    const url = `${THUNDER_URL}/media/${encodeURIComponent(titleId)}?x-client-id=${CLIENT_ID}`;
    const payload = await this.transport.getJson(url, {
      'User-Agent': USER_AGENT,
      Referer: `${SITE_URL}/`,
      Origin: SITE_URL,
    });
    return parsePayload(mediaInfoSchema, payload, 'media info');
  }
}
