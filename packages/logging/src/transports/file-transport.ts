import { promises as fs } from 'fs';
import path from 'path';

import { parseSize } from '@bucketferry/common';

import { formatJson, formatText } from '../format.js';
import { LogEntry, LogTransport, FileTransportConfig } from '../types.js';

/**
 * File transport for logging to files with rotation support
 */
export class FileTransport implements LogTransport {
  public readonly name = 'file';
  private config: Required<FileTransportConfig>;
  private maxSizeBytes: number;
  private directoryReady: Promise<void> | null = null;
  // Appends are chained so rotation never races a pending write
  private queue: Promise<void> = Promise.resolve();

  constructor(config: FileTransportConfig) {
    this.config = {
      maxSize: '50MB',
      maxFiles: 5,
      format: 'text',
      ...config,
    };

    this.maxSizeBytes = parseSize(this.config.maxSize);
  }

  log(entry: LogEntry): Promise<void> {
    const next = this.queue.then(() => this.write(entry));
    this.queue = next;
    return next;
  }

  async close(): Promise<void> {
    await this.queue;
  }

  private async write(entry: LogEntry): Promise<void> {
    try {
      await this.ensureLogDirectory();

      if (await this.needsRotation()) {
        await this.rotateLogFile();
      }

      const logLine = this.config.format === 'json' ? formatJson(entry) : formatText(entry);

      await fs.appendFile(this.config.filename, `${logLine}\n`);
    } catch (error) {
      // Fallback to console if file logging fails
      // eslint-disable-next-line no-console
      console.error(`Failed to write to log file: ${error}`);
    }
  }

  private ensureLogDirectory(): Promise<void> {
    if (!this.directoryReady) {
      this.directoryReady = fs
        .mkdir(path.dirname(this.config.filename), { recursive: true })
        .then(() => undefined);
    }
    return this.directoryReady;
  }

  private async needsRotation(): Promise<boolean> {
    try {
      const stats = await fs.stat(this.config.filename);
      return stats.size >= this.maxSizeBytes;
    } catch {
      // File doesn't exist yet
      return false;
    }
  }

  private async rotateLogFile(): Promise<void> {
    await fs.rm(`${this.config.filename}.${this.config.maxFiles}`, { force: true });

    for (let i = this.config.maxFiles - 1; i >= 1; i--) {
      await this.renameIfPresent(`${this.config.filename}.${i}`, `${this.config.filename}.${i + 1}`);
    }

    await this.renameIfPresent(this.config.filename, `${this.config.filename}.1`);
  }

  private async renameIfPresent(from: string, to: string): Promise<void> {
    try {
      await fs.rename(from, to);
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        throw error;
      }
    }
  }
}
