/**
 * Settings
 *
 * Resolves the processing configuration handed to the pipeline.
 *
 * Priority order:
 * 1. Options given on the command line
 * 2. Settings file (<settings folder>/loanpack.json)
 * 3. Environment variables
 * 4. Defaults
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';

// ─────────────────────────────────────────────────────────────────────────────
// Schema
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_FORMAT = '%(Title)s - %(Author)s';

export const processingConfigSchema = z.object({
  downloadDir: z.string().default('.'),
  bookFolderFormat: z.string().min(1).default(DEFAULT_FORMAT),
  bookFileFormat: z.string().min(1).default(DEFAULT_FORMAT),
  noBookFolder: z.boolean().default(false),

  // audiobooks
  mergeOutput: z.boolean().default(false),
  mergeFormat: z.enum(['mp3', 'm4b']).default('mp3'),
  mergeCodec: z.string().min(1).default('aac'),
  keepMp3: z.boolean().default(false),
  addChapters: z.boolean().default(false),
  overwriteTags: z.boolean().default(false),
  tagDelimiter: z.string().default(';'),
  id3v2Version: z.union([z.literal(3), z.literal(4)]).default(4),
  alwaysKeepCover: z.boolean().default(false),

  // ebooks
  generateOpf: z.boolean().default(false),

  // runtime
  hideProgress: z.boolean().default(false),
  timeout: z.number().positive().default(10),
  retries: z.number().int().min(0).default(1),
  writeJson: z.boolean().default(false),
  debug: z.boolean().default(false),
  ffmpegPath: z.string().optional(),
});

export type ProcessingConfig = z.infer<typeof processingConfigSchema>;
export type ProcessingConfigInput = z.input<typeof processingConfigSchema>;

export const SETTINGS_FILE_NAME = 'loanpack.json';

// ─────────────────────────────────────────────────────────────────────────────
// Locations
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Default folder for the settings file and the stored vendor identity
 */
export function getDefaultSettingsFolder(): string {
  const platform = os.platform();
  if (platform === 'win32') {
    const appData = process.env.APPDATA || path.join(os.homedir(), 'AppData', 'Roaming');
    return path.join(appData, 'loanpack');
  }
  if (platform === 'darwin') {
    return path.join(os.homedir(), 'Library', 'Application Support', 'loanpack');
  }
  return path.join(process.env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config'), 'loanpack');
}

// ─────────────────────────────────────────────────────────────────────────────
// Loading
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Read the settings file, returning an empty object when there is none
 */
export function readSettingsFile(settingsFolder: string): Record<string, unknown> {
  const settingsPath = path.join(settingsFolder, SETTINGS_FILE_NAME);
  if (!fs.existsSync(settingsPath)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(settingsPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Unable to read settings file ${settingsPath}`, err);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Settings file ${settingsPath} must contain a JSON object`);
  }
  return { ...parsed };
}

function fromEnvironment(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  if (env.LOANPACK_DOWNLOAD_DIR) {
    values.downloadDir = env.LOANPACK_DOWNLOAD_DIR;
  }
  if (env.FFMPEG_PATH) {
    values.ffmpegPath = env.FFMPEG_PATH;
  }
  return values;
}

function withoutUndefined(values: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Merge the configuration layers and validate the result
 */
export function resolveConfig(options: {
  overrides?: Record<string, unknown>;
  settingsFolder?: string;
  env?: NodeJS.ProcessEnv;
} = {}): ProcessingConfig {
  const fileValues = options.settingsFolder ? readSettingsFile(options.settingsFolder) : {};
  const merged = {
    ...fromEnvironment(options.env ?? process.env),
    ...withoutUndefined(fileValues),
    ...withoutUndefined(options.overrides ?? {}),
  };

  const result = processingConfigSchema.safeParse(merged);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigError(
      `Invalid setting "${issue?.path.join('.') || '(root)'}": ${issue?.message ?? 'invalid value'}`,
      result.error
    );
  }
  return result.data;
}

/**
 * ffmpeg's own verbosity follows ours
 */
export function ffmpegLogLevel(config: ProcessingConfig): string {
  return config.debug ? 'info' : 'fatal';
}
