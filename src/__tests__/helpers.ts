/**
 * In-process stand-ins shared by the tests: a recording logger, a scripted
 * fetch function, and an encoder that copies its input instead of running ffmpeg.
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { AppContext } from '../app-context';
import type { ExitStatus, ExternalEncoder } from '../ffmpeg-bridge';
import { HttpClient, type FetchFn, type HttpRequestInit } from '../http-client';
import type { Logger, LogLevel } from '../rolling-logger';
import { resolveConfig, type ProcessingConfig } from '../settings';

// ─────────────────────────────────────────────────────────────────────────────
// Logger
// ─────────────────────────────────────────────────────────────────────────────

export class RecordingLogger implements Logger {
  readonly entries: Array<{ level: LogLevel; message: string }> = [];

  debug(message: string): void {
    this.entries.push({ level: 'DEBUG', message });
  }
  info(message: string): void {
    this.entries.push({ level: 'INFO', message });
  }
  warn(message: string): void {
    this.entries.push({ level: 'WARN', message });
  }
  error(message: string): void {
    this.entries.push({ level: 'ERROR', message });
  }
  isDebugEnabled(): boolean {
    return false;
  }

  messages(level: LogLevel): string[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.message);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Network
// ─────────────────────────────────────────────────────────────────────────────

export type RouteHandler = (init: HttpRequestInit) => Response;
export type Route = RouteHandler | string | Buffer;

export interface RecordedRequest {
  url: string;
  headers: Record<string, string>;
}

/**
 * fetch replacement answering from a URL table; unknown URLs get a 404
 */
export function scriptedFetch(routes: Record<string, Route>): { fetchFn: FetchFn; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const fetchFn: FetchFn = async (url, init) => {
    requests.push({ url, headers: init.headers ?? {} });
    const route = routes[url];
    if (route === undefined) {
      return new Response('not found', { status: 404 });
    }
    if (typeof route === 'function') {
      return route(init);
    }
    return new Response(route, { status: 200 });
  };
  return { fetchFn, requests };
}

export function jsonResponse(payload: unknown, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(payload), {
    status: 200,
    headers: { 'content-type': 'application/json', ...headers },
  });
}

export function testClient(routes: Record<string, Route>): { client: HttpClient; requests: RecordedRequest[] } {
  const { fetchFn, requests } = scriptedFetch(routes);
  return { client: new HttpClient({ timeoutSeconds: 5, retries: 0, fetchFn, backoffSeconds: 0 }), requests };
}

// ─────────────────────────────────────────────────────────────────────────────
// Encoder
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Writes the last argument (the output path) with the bytes of every input.
 * `concat:a|b` inputs are joined in order.
 */
export class CopyEncoder implements ExternalEncoder {
  readonly calls: string[][] = [];

  constructor(private readonly exitCode: (args: string[]) => number = () => 0) {}

  async run(args: string[]): Promise<ExitStatus> {
    this.calls.push(args);
    const code = this.exitCode(args);
    if (code !== 0) {
      return { code, stderr: 'encoder failed' };
    }
    const input = args[args.indexOf('-i') + 1];
    const sources = input.startsWith('concat:') ? input.slice('concat:'.length).split('|') : [input];
    const data = Buffer.concat(await Promise.all(sources.map((source) => fs.readFile(source))));
    await fs.writeFile(args[args.length - 1], data);
    return { code: 0, stderr: '' };
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Context
// ─────────────────────────────────────────────────────────────────────────────

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'loanpack-'));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function testConfig(overrides: Record<string, unknown> = {}): ProcessingConfig {
  return resolveConfig({ overrides: { hideProgress: true, ...overrides }, env: {} });
}

export function testContext(
  config: ProcessingConfig,
  client: HttpClient,
  encoder: ExternalEncoder = new CopyEncoder()
): AppContext & { logger: RecordingLogger } {
  return { config, transport: client, encoder, logger: new RecordingLogger() };
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
