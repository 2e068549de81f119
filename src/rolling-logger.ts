/**
 * Rolling Logger
 *
 * Platform-aware file logger with automatic rotation:
 * - Mac: ~/Library/Logs/loanpack/
 * - Windows: %APPDATA%/loanpack/logs/
 * - Linux: ~/.local/share/loanpack/logs/
 *
 * Rotation policy:
 * - At 2MB, current log moves to .backup
 * - If backup exists when rotating, delete it first
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

// Maximum log file size before rotation (2MB)
const MAX_LOG_SIZE = 2 * 1024 * 1024;

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_RANK: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

/**
 * What every component receives in its context
 */
export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  isDebugEnabled(): boolean;
}

interface LoggerConfig {
  name: string;              // Log file base name (e.g., 'loanpack' -> loanpack.log)
  logDir?: string;           // Overrides the platform log directory
  maxSize?: number;          // Max size in bytes (default: 2MB)
  consoleOutput?: boolean;   // Also log to console (default: true)
  consoleLevel?: LogLevel;   // Lowest level echoed to console (default: INFO)
  fileOutput?: boolean;      // Write the JSON-lines file (default: true)
}

interface LogRecord {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: unknown;
}

class RollingLogger implements Logger {
  private logDir: string;
  private logPath: string;
  private backupPath: string;
  private maxSize: number;
  private consoleOutput: boolean;
  private consoleLevel: LogLevel;
  private fileOutput: boolean;
  private writeStream: fs.WriteStream | null = null;
  private currentSize: number = 0;
  private initialized: boolean = false;
  private pending: Promise<void> = Promise.resolve();

  constructor(config: LoggerConfig) {
    this.logDir = config.logDir || RollingLogger.getLogDirectory();
    this.logPath = path.join(this.logDir, `${config.name}.log`);
    this.backupPath = path.join(this.logDir, `${config.name}.backup.log`);
    this.maxSize = config.maxSize || MAX_LOG_SIZE;
    this.consoleOutput = config.consoleOutput ?? true;
    this.consoleLevel = config.consoleLevel ?? 'INFO';
    this.fileOutput = config.fileOutput ?? true;
  }

  /**
   * Get platform-specific log directory
   */
  static getLogDirectory(): string {
    const platform = os.platform();

    if (platform === 'darwin') {
      return path.join(os.homedir(), 'Library', 'Logs', 'loanpack');
    } else if (platform === 'win32') {
      const appData = process.env.APPDATA || path.join(os.homedir(), 'AppData', 'Roaming');
      return path.join(appData, 'loanpack', 'logs');
    } else {
      return path.join(os.homedir(), '.local', 'share', 'loanpack', 'logs');
    }
  }

  /**
   * Create directory and open file stream
   */
  async init(): Promise<void> {
    if (this.initialized) return;
    this.initialized = true;
    if (!this.fileOutput) return;

    await fs.promises.mkdir(this.logDir, { recursive: true });

    try {
      const stats = await fs.promises.stat(this.logPath);
      this.currentSize = stats.size;
      if (this.currentSize >= this.maxSize) {
        await this.rotate();
      }
    } catch {
      // no log file yet
      this.currentSize = 0;
    }

    if (!this.writeStream) {
      this.writeStream = fs.createWriteStream(this.logPath, { flags: 'a' });
    }
  }

  /**
   * Rotate log files
   */
  private async rotate(): Promise<void> {
    await this.endStream();

    await fs.promises.rm(this.backupPath, { force: true });
    try {
      await fs.promises.rename(this.logPath, this.backupPath);
    } catch {
      // current log does not exist
    }

    this.currentSize = 0;
    this.writeStream = fs.createWriteStream(this.logPath, { flags: 'a' });
  }

  private async write(record: LogRecord): Promise<void> {
    if (!this.initialized) {
      await this.init();
    }
    if (!this.fileOutput) return;

    const line = JSON.stringify(record) + '\n';
    const lineSize = Buffer.byteLength(line, 'utf8');

    if (this.currentSize + lineSize >= this.maxSize) {
      await this.rotate();
    }

    if (this.writeStream) {
      this.writeStream.write(line);
      this.currentSize += lineSize;
    }
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    const record: LogRecord = { timestamp: new Date().toISOString(), level, message };
    if (data !== undefined) {
      record.data = data instanceof Error ? { message: data.message, stack: data.stack } : data;
    }

    if (this.consoleOutput && LEVEL_RANK[level] >= LEVEL_RANK[this.consoleLevel]) {
      const consoleMsg = record.data !== undefined
        ? `${message} ${JSON.stringify(record.data)}`
        : message;

      switch (level) {
        case 'ERROR':
          console.error(consoleMsg);
          break;
        case 'WARN':
          console.warn(consoleMsg);
          break;
        case 'DEBUG':
          console.debug(consoleMsg);
          break;
        default:
          console.log(consoleMsg);
      }
    }

    // Chain writes so lines land in call order
    this.pending = this.pending
      .then(() => this.write(record))
      .catch((err: unknown) => {
        console.error('[LOGGER] Failed to write log file:', err);
      });
  }

  debug(message: string, data?: unknown): void {
    this.log('DEBUG', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('INFO', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log('WARN', message, data);
  }

  error(message: string, data?: unknown): void {
    this.log('ERROR', message, data);
  }

  isDebugEnabled(): boolean {
    return this.consoleLevel === 'DEBUG';
  }

  getLogPath(): string {
    return this.logPath;
  }

  private endStream(): Promise<void> {
    const stream = this.writeStream;
    this.writeStream = null;
    if (!stream) return Promise.resolve();
    return new Promise((resolve) => {
      stream.end(() => resolve());
    });
  }

  /**
   * Flush and close the logger
   */
  async close(): Promise<void> {
    await this.pending;
    await this.endStream();
    this.initialized = false;
  }
}

/**
 * Logger that only echoes to the console, used before settings are resolved
 */
export function createConsoleLogger(verbose: boolean = false): RollingLogger {
  return new RollingLogger({
    name: 'loanpack',
    fileOutput: false,
    consoleLevel: verbose ? 'DEBUG' : 'INFO',
  });
}

export { RollingLogger };
export type { LoggerConfig };
