import { promises as fs } from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError } from '../errors';
import { DEFAULT_FORMAT, SETTINGS_FILE_NAME, ffmpegLogLevel, resolveConfig } from '../settings';
import { makeTempDir, removeDir } from './helpers';

describe('resolveConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('fills in defaults', () => {
    const config = resolveConfig({ env: {} });

    expect(config.downloadDir).toBe('.');
    expect(config.bookFolderFormat).toBe(DEFAULT_FORMAT);
    expect(config.mergeFormat).toBe('mp3');
    expect(config.mergeCodec).toBe('aac');
    expect(config.id3v2Version).toBe(4);
    expect(config.tagDelimiter).toBe(';');
    expect(config.timeout).toBe(10);
    expect(config.retries).toBe(1);
    expect(config.ffmpegPath).toBeUndefined();
  });

  it('layers command line over file over environment', async () => {
    await fs.writeFile(
      path.join(dir, SETTINGS_FILE_NAME),
      JSON.stringify({ downloadDir: '/from-file', mergeFormat: 'm4b', retries: 3 })
    );

    const config = resolveConfig({
      settingsFolder: dir,
      env: { LOANPACK_DOWNLOAD_DIR: '/from-env', FFMPEG_PATH: '/opt/ffmpeg' },
      overrides: { retries: 5, mergeOutput: undefined },
    });

    expect(config.downloadDir).toBe('/from-file');
    expect(config.ffmpegPath).toBe('/opt/ffmpeg');
    expect(config.mergeFormat).toBe('m4b');
    expect(config.retries).toBe(5);
    expect(config.mergeOutput).toBe(false);
  });

  it('works without a settings file', () => {
    expect(resolveConfig({ settingsFolder: dir, env: { LOANPACK_DOWNLOAD_DIR: '/from-env' } }).downloadDir).toBe(
      '/from-env'
    );
  });

  it('rejects invalid values', () => {
    expect(() => resolveConfig({ env: {}, overrides: { mergeFormat: 'flac' } })).toThrow(ConfigError);
    expect(() => resolveConfig({ env: {}, overrides: { id3v2Version: 2 } })).toThrow('Invalid setting "id3v2Version"');
  });

  it('rejects an unreadable settings file', async () => {
    await fs.writeFile(path.join(dir, SETTINGS_FILE_NAME), '{ not json');
    expect(() => resolveConfig({ settingsFolder: dir, env: {} })).toThrow(ConfigError);

    await fs.writeFile(path.join(dir, SETTINGS_FILE_NAME), '[1, 2]');
    expect(() => resolveConfig({ settingsFolder: dir, env: {} })).toThrow('must contain a JSON object');
  });
});

describe('ffmpegLogLevel', () => {
  it('follows debug mode', () => {
    expect(ffmpegLogLevel(resolveConfig({ env: {} }))).toBe('fatal');
    expect(ffmpegLogLevel(resolveConfig({ env: {}, overrides: { debug: true } }))).toBe('info');
  });
});
