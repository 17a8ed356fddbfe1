import { randomUUID } from 'node:crypto';
import { constants as fsConstants } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';

import type { FileStatus } from './documentCache';
import { FileNotFoundError, RemoteUnavailableError, errnoCode, mapFsError } from './errors';

export interface MaterializeOptions {
  timeoutMs: number;
  pollIntervalMs?: number;
  maxPollIntervalMs?: number;
  signal?: AbortSignal;
}

/**
 * File-system surface used by the sync engine. Paths are absolute.
 */
export interface DocumentStorage {
  stat(filePath: string): Promise<FileStatus>;
  /**
   * Waits until evicted content is locally available. Throws
   * `FileNotFoundError` for missing files and `RemoteUnavailableError` when
   * the timeout elapses.
   */
  materialize(filePath: string, options: MaterializeOptions): Promise<void>;
  read(filePath: string): Promise<Buffer>;
  /**
   * Replaces the file in one step. On failure the previous content is intact.
   */
  writeAtomic(filePath: string, bytes: Uint8Array): Promise<void>;
  isWritable(filePath: string): Promise<boolean>;
  setModifiedTime(filePath: string, modifiedMs: number): Promise<void>;
  remove(filePath: string): Promise<void>;
}

const DEFAULT_POLL_INTERVAL_MS = 250;
const DEFAULT_MAX_POLL_INTERVAL_MS = 2000;

/**
 * Placeholder a cloud drive leaves beside a file whose content was offloaded:
 * `dir/.name.ext.icloud` for `dir/name.ext`.
 */
export function evictionPlaceholderPath(filePath: string): string {
  return path.join(path.dirname(filePath), `.${path.basename(filePath)}.icloud`);
}

export class LocalFileStorage implements DocumentStorage {
  async stat(filePath: string): Promise<FileStatus> {
    try {
      const stats = await fs.stat(filePath);
      return { state: 'present', modifiedMs: stats.mtimeMs };
    } catch (err) {
      if (errnoCode(err) !== 'ENOENT') {
        throw mapFsError(err, filePath);
      }
    }

    try {
      const placeholder = await fs.stat(evictionPlaceholderPath(filePath));
      return { state: 'evicted', modifiedMs: placeholder.mtimeMs };
    } catch (err) {
      if (errnoCode(err) !== 'ENOENT') {
        throw mapFsError(err, filePath);
      }
    }
    return { state: 'missing' };
  }

  async materialize(filePath: string, options: MaterializeOptions): Promise<void> {
    const { timeoutMs, signal } = options;
    const maxInterval = options.maxPollIntervalMs ?? DEFAULT_MAX_POLL_INTERVAL_MS;
    let interval = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      signal?.throwIfAborted();
      const status = await this.stat(filePath);
      if (status.state === 'present') {
        return;
      }
      if (status.state === 'missing') {
        throw new FileNotFoundError(filePath);
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new RemoteUnavailableError(
          filePath,
          `content not downloaded within ${timeoutMs}ms`,
        );
      }
      await delay(Math.min(interval, remaining), undefined, signal ? { signal } : undefined);
      interval = Math.min(interval * 2, maxInterval);
    }
  }

  async read(filePath: string): Promise<Buffer> {
    try {
      return await fs.readFile(filePath);
    } catch (err) {
      throw mapFsError(err, filePath);
    }
  }

  async writeAtomic(filePath: string, bytes: Uint8Array): Promise<void> {
    const tempPath = path.join(
      path.dirname(filePath),
      `.${path.basename(filePath)}.${randomUUID()}.tmp`,
    );
    try {
      await fs.writeFile(tempPath, bytes);
      await fs.rename(tempPath, filePath);
    } catch (err) {
      await fs.rm(tempPath, { force: true });
      throw mapFsError(err, filePath);
    }
  }

  async isWritable(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath, fsConstants.W_OK);
      return true;
    } catch (err) {
      if (errnoCode(err) !== 'ENOENT') {
        return false;
      }
    }
    try {
      await fs.access(path.dirname(filePath), fsConstants.W_OK);
      return true;
    } catch {
      return false;
    }
  }

  async setModifiedTime(filePath: string, modifiedMs: number): Promise<void> {
    const modified = new Date(modifiedMs);
    try {
      await fs.utimes(filePath, modified, modified);
    } catch (err) {
      throw mapFsError(err, filePath);
    }
  }

  async remove(filePath: string): Promise<void> {
    try {
      await fs.rm(filePath);
    } catch (err) {
      throw mapFsError(err, filePath);
    }
  }
}
