import { promises as fs } from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError } from '../errors';
import { LIBBY_SETTINGS_FILE, LibbyClient, readIdentity } from '../vendor-client';
import { RecordingLogger, jsonResponse, makeTempDir, removeDir, testClient } from './helpers';

const SENTRY = 'https://sentry-read.svc.overdrive.com';
const WEB_URL = 'https://read.test/book/';

const ROUTES = {
  [`${SENTRY}/chip/sync`]: () =>
    jsonResponse({
      loans: [
        { id: '2', cardId: '42', title: 'Newer', type: { id: 'ebook' }, checkoutDate: '2024-03-01T00:00:00Z' },
        { id: '1', cardId: '42', title: 'Older', type: { id: 'audiobook' }, checkoutDate: '2024-01-01T00:00:00Z' },
      ],
    }),
  [`${SENTRY}/open/book/card/42/title/2`]: () =>
    jsonResponse({ message: 'token=abc', urls: { web: WEB_URL, openbook: `${WEB_URL}openbook.json` } }),
  [`${WEB_URL}?token=abc`]: () =>
    new Response('ok', {
      status: 200,
      headers: [
        ['set-cookie', '_sscl_d=abc; Path=/'],
        ['set-cookie', 'other=1; Secure'],
      ],
    }),
  [`${WEB_URL}openbook.json`]: () =>
    jsonResponse({
      title: { main: 'Newer' },
      creator: [{ name: 'Ann Author', role: 'author' }],
      nav: { toc: [{ title: 'One', path: 'ch1.xhtml' }] },
    }),
  [`${WEB_URL}rosters.json`]: () =>
    jsonResponse([{ group: 'title-content', entries: [{ url: `${WEB_URL}ch1.xhtml` }] }]),
};

describe('LibbyClient', () => {
  it('lists loans oldest checkout first', async () => {
    const { client, requests } = testClient(ROUTES);
    const libby = new LibbyClient(client, 'test-identity', new RecordingLogger());

    const loans = await libby.listLoans();

    expect(loans.map((l) => [l.id, l.type])).toEqual([
      ['1', 'audiobook'],
      ['2', 'ebook'],
    ]);
    expect(requests[0].headers.Authorization).toBe('Bearer test-identity');
  });

  it('opens a loan once and reuses its session cookies', async () => {
    const { client, requests } = testClient(ROUTES);
    const libby = new LibbyClient(client, 'test-identity', new RecordingLogger());
    const loan = await libby.fetchLoanManifest('2');

    const opened = await libby.fetchOpenBookAndToc(loan);
    const rosters = await libby.fetchRosters(loan);

    expect(opened.openbook.title.main).toBe('Newer');
    expect(opened.parts).toEqual([]);
    expect(rosters).toEqual([{ group: 'title-content', entries: [{ url: `${WEB_URL}ch1.xhtml` }] }]);
    expect(libby.contentHeaders().Cookie).toBe('_sscl_d=abc; other=1');
    expect(requests.filter((r) => r.url === `${WEB_URL}?token=abc`)).toHaveLength(1);
    expect(requests.find((r) => r.url === `${WEB_URL}rosters.json`)?.headers.Cookie).toBe('_sscl_d=abc; other=1');
  });

  it('reports a loan that is not in the sync list', async () => {
    const { client } = testClient(ROUTES);
    const libby = new LibbyClient(client, 'test-identity', new RecordingLogger());
    await expect(libby.fetchLoanManifest('9')).rejects.toThrow('No loan with id 9');
  });
});

describe('readIdentity', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('reads the stored token', async () => {
    await fs.writeFile(path.join(dir, LIBBY_SETTINGS_FILE), JSON.stringify({ identity: 'test-identity' }));
    expect(readIdentity(dir)).toBe('test-identity');
  });

  it('asks for a sign-in when there is no token', async () => {
    expect(() => readIdentity(dir)).toThrow(ConfigError);
    await fs.writeFile(path.join(dir, LIBBY_SETTINGS_FILE), JSON.stringify({ identity: '' }));
    expect(() => readIdentity(dir)).toThrow('holds no identity token');
  });
});
