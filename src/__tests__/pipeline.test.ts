import { promises as fs } from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError, TransferError } from '../errors';
import type { HttpClient } from '../http-client';
import {
  mediaInfoSchema,
  openbookSchema,
  parsePayload,
  type LoanManifest,
  type MediaInfo,
  type OpenBook,
  type Roster,
} from '../loan-types';
import { exportLoans, parseSelection, planLoans, processLoans, selectLoans } from '../pipeline';
import type { OpenedLoan, VendorClient } from '../vendor-client';
import { exists, makeTempDir, removeDir, testClient, testConfig, testContext } from './helpers';

function loan(id: string, title: string): LoanManifest {
  return {
    id,
    cardId: '42',
    type: 'ebook',
    title,
    creators: [{ name: 'Ann Author', role: 'author' }],
    languages: ['en'],
    subjects: [],
    covers: [],
    formats: [],
  };
}

const LOANS = [loan('1', 'First'), loan('2', 'Second'), loan('3', 'Third')];

const OPENBOOK: OpenBook = parsePayload(
  openbookSchema,
  {
    title: { main: 'Second' },
    creator: [{ name: 'Ann Author', role: 'author' }],
    nav: { toc: [{ title: 'Chapter One', path: 'ch1.xhtml' }] },
    spine: [{ path: 'ch1.xhtml', '-odread-original-path': 'ch1.xhtml', '-odread-spine-position': 0 }],
  },
  'openbook'
);

const CHAPTER_URL = 'https://cdn.test/ch1.xhtml';

/**
 * Vendor stand-in: loan "1" cannot be opened, every other loan opens to OPENBOOK
 */
class FakeVendor implements VendorClient {
  constructor(readonly transport: HttpClient) {}

  async listLoans(): Promise<LoanManifest[]> {
    return LOANS;
  }

  async fetchLoanManifest(loanId: string): Promise<LoanManifest> {
    return loan(loanId, 'Fetched');
  }

  async fetchOpenBookAndToc(manifest: LoanManifest): Promise<OpenedLoan> {
    if (manifest.id === '1') {
      throw new TransferError('HTTP 403 for https://vendor.test/open/1', 'https://vendor.test/open/1', 403);
    }
    return { openbook: OPENBOOK, parts: [] };
  }

  async fetchRosters(): Promise<Roster[]> {
    return [{ group: 'title-content', entries: [{ url: CHAPTER_URL }] }];
  }

  async fetchMediaInfo(titleId: string): Promise<MediaInfo> {
    return parsePayload(mediaInfoSchema, { id: titleId, title: 'Second', type: { id: 'ebook' } }, 'media info');
  }

  contentHeaders(): Record<string, string> {
    return { Cookie: 'session=test' };
  }
}

describe('loan selection', () => {
  it('parses comma separated positions', () => {
    expect(parseSelection('1, 3,4')).toEqual([1, 3, 4]);
    expect(() => parseSelection('1,x')).toThrow(ConfigError);
  });

  it('selects by position, deduplicated and in list order', () => {
    expect(selectLoans(LOANS, { select: [3, 1, 3] }).map((l) => l.id)).toEqual(['1', '3']);
    expect(() => selectLoans(LOANS, { select: [4] })).toThrow('Invalid loan number 4: choose between 1 and 3');
  });

  it('selects the latest loans or all of them', () => {
    expect(selectLoans(LOANS, { latest: 2 }).map((l) => l.id)).toEqual(['2', '3']);
    expect(selectLoans(LOANS, { all: true })).toHaveLength(3);
    expect(() => selectLoans(LOANS, { latest: 0 })).toThrow(ConfigError);
  });
});

describe('processLoans', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('exports the loan list as JSON', async () => {
    const filePath = path.join(dir, 'exports', 'loans.json');

    await exportLoans(LOANS, filePath);

    const saved: unknown = JSON.parse(await fs.readFile(filePath, 'utf8'));
    expect(saved).toEqual(LOANS);
  });

  it('plans paths without touching the disk', () => {
    const { client } = testClient({});
    const ctx = testContext(testConfig({ downloadDir: dir }), client);

    const [plan] = planLoans([loan('2', 'Second')], ctx);
    expect(plan.paths.epubPath).toBe(path.join(dir, 'Second - Ann Author', 'Second - Ann Author.epub'));
  });

  it('keeps going after a failed loan', async () => {
    const { client, requests } = testClient({
      [CHAPTER_URL]: '<html xmlns="http://www.w3.org/1999/xhtml"><head><title>c</title></head><body><p>One</p></body></html>',
    });
    const ctx = testContext(testConfig({ downloadDir: dir }), client);
    const epubPath = path.join(dir, 'Second - Ann Author', 'Second - Ann Author.epub');

    const results = await processLoans([loan('1', 'First'), loan('2', 'Second')], { ...ctx, vendor: new FakeVendor(client) });

    expect(results).toEqual([
      { status: 'failed', loanId: '1', title: 'First', reason: 'HTTP 403 for https://vendor.test/open/1' },
      { status: 'created', loanId: '2', title: 'Second', outputs: [epubPath] },
    ]);
    expect(await exists(epubPath)).toBe(true);
    expect(requests[0].headers.Cookie).toBe('session=test');
    expect(ctx.logger.messages('ERROR')).toEqual(['[PIPELINE] Failed "First": HTTP 403 for https://vendor.test/open/1']);
    expect(ctx.logger.messages('INFO').at(-1)).toBe('[PIPELINE] Done: 1 succeeded, 1 failed');
  });
});
