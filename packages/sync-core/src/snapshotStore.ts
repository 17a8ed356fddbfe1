import { createHash } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';

import type { ListDocument } from '@listsync/shared';

import { decodeListDocument, encodeListDocument } from './codec';
import { errnoCode } from './errors';
import type { Logger } from './logger';

export interface SnapshotStoreOptions {
  dataDir: string;
  logger?: Logger;
}

/**
 * Last known good copy of each synced file, for read-only display while the
 * file itself is unavailable. Never a source for merges.
 */
export class SnapshotStore {
  private readonly baseDir: string;
  private readonly logger: Logger;

  constructor(options: SnapshotStoreOptions) {
    this.baseDir = path.join(options.dataDir, 'snapshots');
    this.logger = options.logger ?? console;
  }

  snapshotPath(filePath: string): string {
    const digest = createHash('sha256').update(path.resolve(filePath)).digest('hex');
    return path.join(this.baseDir, `${digest}.json`);
  }

  async save(filePath: string, document: ListDocument): Promise<void> {
    const target = this.snapshotPath(filePath);
    await fs.mkdir(this.baseDir, { recursive: true });
    await fs.writeFile(target, encodeListDocument(document));
  }

  /**
   * Corrupt snapshots are deleted and reported as absent.
   */
  async load(filePath: string): Promise<ListDocument | undefined> {
    const target = this.snapshotPath(filePath);
    let bytes: Buffer;
    try {
      bytes = await fs.readFile(target);
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') {
        return undefined;
      }
      throw err;
    }

    try {
      return decodeListDocument(bytes).document;
    } catch (err) {
      this.logger.warn(`[cache] discarding corrupt snapshot for ${filePath}: ${String(err)}`);
      await fs.rm(target, { force: true });
      return undefined;
    }
  }

  async remove(filePath: string): Promise<void> {
    await fs.rm(this.snapshotPath(filePath), { force: true });
  }

  async clear(): Promise<void> {
    await fs.rm(this.baseDir, { recursive: true, force: true });
  }
}
