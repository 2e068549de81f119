/**
 * App Context
 *
 * Everything a loan processor needs, passed explicitly instead of living in
 * module state: logger, network transport, external encoder and settings.
 */

import type { FetcherContext, ProgressSink } from './asset-fetcher';
import { SpawnEncoder, type EncodeOptions, type ExternalEncoder } from './ffmpeg-bridge';
import { HttpClient, type HttpTransport } from './http-client';
import type { Logger } from './rolling-logger';
import { ffmpegLogLevel, type ProcessingConfig } from './settings';
import { getFfmpegPath } from './tool-paths';

export interface AppContext {
  logger: Logger;
  transport: HttpTransport;
  encoder: ExternalEncoder;
  config: ProcessingConfig;
}

export function createAppContext(
  config: ProcessingConfig,
  logger: Logger,
  overrides: Partial<Pick<AppContext, 'transport' | 'encoder'>> = {}
): AppContext {
  return {
    logger,
    config,
    transport: overrides.transport ?? new HttpClient({ timeoutSeconds: config.timeout, retries: config.retries, logger }),
    encoder: overrides.encoder ?? new SpawnEncoder(getFfmpegPath(config.ffmpegPath), logger),
  };
}

export function encodeOptions(config: ProcessingConfig): EncodeOptions {
  return { logLevel: ffmpegLogLevel(config), showProgress: !config.hideProgress };
}

export function fetcherContext(ctx: AppContext, transport: HttpTransport = ctx.transport): FetcherContext {
  return {
    transport,
    encoder: ctx.encoder,
    logger: ctx.logger,
    ffmpegLogLevel: ffmpegLogLevel(ctx.config),
  };
}

/**
 * Single-line download progress on stderr, or nothing when progress is hidden
 */
export function progressSink(config: ProcessingConfig, label: string): ProgressSink | undefined {
  if (config.hideProgress || !process.stderr.isTTY) {
    return undefined;
  }
  let lastPercent = -1;
  return (received, total) => {
    if (total <= 0) return;
    const percent = Math.min(100, Math.floor((received / total) * 100));
    if (percent === lastPercent) return;
    lastPercent = percent;
    process.stderr.write(`\r${label} ${String(percent).padStart(3)}%${percent === 100 ? '\n' : ''}`);
  };
}
