/**
 * Tool Paths
 *
 * Locates the external encoder (ffmpeg).
 *
 * Priority order:
 * 1. Configured path (settings file or --ffmpeg option)
 * 2. FFMPEG_PATH environment variable
 * 3. Auto-detected paths (searches common locations)
 * 4. Plain `ffmpeg`, resolved through PATH by the OS
 */

import * as os from 'os';
import * as path from 'path';
import * as fs from 'fs';

/**
 * Find first existing path from a list of candidates
 */
function findExistingPath(candidates: string[]): string | null {
  for (const candidate of candidates) {
    try {
      if (fs.existsSync(candidate)) {
        return candidate;
      }
    } catch {
      // Ignore access errors
    }
  }
  return null;
}

/**
 * Get common ffmpeg installation paths for current platform
 */
function getFfmpegCandidates(): string[] {
  const platform = os.platform();
  const homeDir = os.homedir();

  if (platform === 'win32') {
    return [
      path.join(homeDir, 'scoop', 'shims', 'ffmpeg.exe'),
      'C:\\Program Files\\ffmpeg\\bin\\ffmpeg.exe',
      'C:\\ffmpeg\\bin\\ffmpeg.exe',
      path.join(homeDir, 'ffmpeg', 'bin', 'ffmpeg.exe'),
    ];
  } else if (platform === 'darwin') {
    return [
      '/opt/homebrew/bin/ffmpeg',
      '/usr/local/bin/ffmpeg',
    ];
  }
  return [
    '/usr/bin/ffmpeg',
    '/usr/local/bin/ffmpeg',
    path.join(homeDir, '.local', 'bin', 'ffmpeg'),
  ];
}

/**
 * Get ffmpeg executable path
 */
export function getFfmpegPath(configured?: string, env: NodeJS.ProcessEnv = process.env): string {
  if (configured && fs.existsSync(configured)) {
    return configured;
  }

  if (env.FFMPEG_PATH && fs.existsSync(env.FFMPEG_PATH)) {
    return env.FFMPEG_PATH;
  }

  const detected = findExistingPath(getFfmpegCandidates());
  if (detected) {
    return detected;
  }

  return 'ffmpeg';
}
