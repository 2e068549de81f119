/**
 * FFmpeg Bridge
 *
 * All container-level audio work goes through the external ffmpeg binary:
 * remuxing downloaded parts, concatenating parts into one MP3, transcoding
 * to M4B. Nothing here decodes audio itself.
 */

import { spawn } from 'child_process';
import { promises as fs } from 'fs';
import * as path from 'path';
import { EncodingError, errorMessage } from './errors';
import type { Logger } from './rolling-logger';

// ─────────────────────────────────────────────────────────────────────────────
// Encoder Interface
// ─────────────────────────────────────────────────────────────────────────────

export interface ExitStatus {
  code: number | null;
  stderr: string;
}

/**
 * Narrow seam over the ffmpeg process so callers (and tests) only deal in
 * argument lists and exit codes
 */
export interface ExternalEncoder {
  run(args: string[]): Promise<ExitStatus>;
}

export class SpawnEncoder implements ExternalEncoder {
  constructor(
    private readonly ffmpegPath: string,
    private readonly logger?: Logger
  ) {}

  run(args: string[]): Promise<ExitStatus> {
    return new Promise((resolve, reject) => {
      this.logger?.debug(`[FFMPEG] ${this.ffmpegPath} ${args.join(' ')}`);

      const proc = spawn(this.ffmpegPath, args, { stdio: ['ignore', 'pipe', 'pipe'] });
      let stderr = '';

      proc.stdout?.on('data', (data: Buffer) => {
        this.logger?.debug(`[FFMPEG] ${data.toString().trim()}`);
      });

      proc.stderr?.on('data', (data: Buffer) => {
        const text = data.toString();
        stderr += text;
        // -stats progress lines end with \r
        process.stderr.write(text);
      });

      proc.on('close', (code) => {
        resolve({ code, stderr });
      });

      proc.on('error', (err) => {
        reject(new EncodingError(`Unable to start ffmpeg: ${err.message}`, [this.ffmpegPath, ...args].join(' '), null, err));
      });
    });
  }
}

export interface EncodeOptions {
  logLevel: string;
  showProgress?: boolean;
}

function baseArgs(options: EncodeOptions): string[] {
  const args = ['-y', '-nostdin', '-hide_banner', '-loglevel', options.logLevel];
  if (options.showProgress) {
    args.push('-stats');
  }
  return args;
}

function bitrateArg(bitrateKbps: number): string {
  // 0 means unknown or variable
  return bitrateKbps > 0 ? `${bitrateKbps}k` : '64k';
}

async function replaceFile(from: string, to: string): Promise<void> {
  try {
    await fs.rename(from, to);
  } catch (err) {
    if (err instanceof Error && 'code' in err && (err.code === 'EEXIST' || err.code === 'EPERM')) {
      await fs.rm(to, { force: true });
      await fs.rename(from, to);
      return;
    }
    throw err;
  }
}

async function runOrThrow(encoder: ExternalEncoder, args: string[], logger: Logger, what: string): Promise<void> {
  const status = await encoder.run(args);
  if (status.code !== 0) {
    logger.error(`[FFMPEG] ${what} exited with code ${status.code}`, { args, stderr: status.stderr.slice(-2000) });
    throw new EncodingError(`ffmpeg ${what} exited with a non-zero code`, args.join(' '), status.code);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Remux
// ─────────────────────────────────────────────────────────────────────────────

export function remuxArgs(input: string, output: string, options: EncodeOptions): string[] {
  return [...baseArgs({ logLevel: options.logLevel }), '-i', input, '-c:a', 'copy', '-c:v', 'copy', output];
}

/**
 * Rewrite a freshly downloaded part into `output` with stream copy, dropping
 * the malformed trailing frames some origin encoders leave behind.
 * When ffmpeg fails the untouched download is moved into place instead.
 *
 * @returns true when the remuxed copy was kept
 */
export async function remuxAudio(
  encoder: ExternalEncoder,
  input: string,
  output: string,
  options: EncodeOptions,
  logger: Logger
): Promise<boolean> {
  const parsed = path.parse(output);
  const staged = path.join(parsed.dir, `${parsed.name}.remux${parsed.ext}`);
  const args = remuxArgs(input, staged, options);
  let status: ExitStatus;
  try {
    status = await encoder.run(args);
  } catch (err) {
    logger.warn(`[FFMPEG] Remux failed to run, keeping original download: ${errorMessage(err)}`);
    await fs.rm(staged, { force: true });
    await replaceFile(input, output);
    return false;
  }

  if (status.code !== 0) {
    logger.warn(`[FFMPEG] Remux exited with code ${status.code}, keeping original download`, { args });
    await fs.rm(staged, { force: true });
    await replaceFile(input, output);
    return false;
  }

  await replaceFile(staged, output);
  await fs.rm(input, { force: true });
  return true;
}

// ─────────────────────────────────────────────────────────────────────────────
// Merge / Transcode
// ─────────────────────────────────────────────────────────────────────────────

export function mergeArgs(files: string[], bitrateKbps: number, output: string, options: EncodeOptions): string[] {
  return [
    ...baseArgs(options),
    '-i', `concat:${files.join('|')}`,
    '-acodec', 'copy',
    '-b:a', bitrateArg(bitrateKbps),
    '-f', 'mp3',
    output,
  ];
}

/**
 * Concatenate parts into one MP3 without re-encoding
 */
export async function mergeParts(
  encoder: ExternalEncoder,
  files: string[],
  bitrateKbps: number,
  destination: string,
  options: EncodeOptions,
  logger: Logger
): Promise<string> {
  const temp = replaceExtension(destination, '.part');
  await runOrThrow(encoder, mergeArgs(files, bitrateKbps, temp, options), logger, 'merge');
  await replaceFile(temp, destination);
  logger.info(`[FFMPEG] Merged ${files.length} parts into ${destination}`);
  return destination;
}

export function transcodeArgs(
  input: string,
  coverPath: string | null,
  codec: string,
  bitrateKbps: number,
  output: string,
  options: EncodeOptions
): string[] {
  const args = [...baseArgs(options), '-i', input];
  if (coverPath) {
    args.push('-i', coverPath);
  }
  args.push('-map', '0:a', '-c:a', codec, '-b:a', bitrateArg(bitrateKbps));
  if (coverPath) {
    args.push('-map', '1:v', '-c:v', 'copy', '-disposition:v:0', 'attached_pic');
  }
  args.push('-f', 'mp4', output);
  return args;
}

/**
 * Re-encode the merged MP3 into an MP4 audiobook with the cover attached.
 * The source MP3 is deleted only once the M4B is in place.
 */
export async function transcode(
  encoder: ExternalEncoder,
  input: string,
  coverPath: string | null,
  codec: string,
  bitrateKbps: number,
  destination: string,
  options: EncodeOptions,
  logger: Logger
): Promise<string> {
  const cover = coverPath && (await exists(coverPath)) ? coverPath : null;
  const temp = replaceExtension(destination, '.part');
  await runOrThrow(encoder, transcodeArgs(input, cover, codec, bitrateKbps, temp, options), logger, 'transcode');
  await replaceFile(temp, destination);
  logger.info(`[FFMPEG] Transcoded into ${destination}`);

  try {
    await fs.unlink(input);
  } catch (err) {
    logger.warn(`[FFMPEG] Error deleting ${input}: ${errorMessage(err)}`);
  }
  return destination;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

export function replaceExtension(filePath: string, extension: string): string {
  const parsed = path.parse(filePath);
  return path.join(parsed.dir, `${parsed.name}${extension}`);
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
