import fs from 'node:fs/promises';
import path from 'node:path';

import { errnoCode, mapFsError } from './errors';
import type { DocumentStorage } from './storage';

/**
 * One on-disk version of a file: the current content or a concurrent copy
 * left behind by a sync service.
 */
export interface FileVersion {
  readonly id: string;
  read(): Promise<Buffer>;
  getModificationTime(): Promise<number>;
  markResolved(): Promise<void>;
}

export interface FileVersionStore {
  listConflictVersions(filePath: string): Promise<FileVersion[]>;
  getCurrentVersion(filePath: string): Promise<FileVersion | undefined>;
  /**
   * Removes every conflict version that has been marked resolved.
   */
  removeOtherVersions(filePath: string): Promise<void>;
}

export const CURRENT_VERSION_ID = 'current';

class StoredFileVersion implements FileVersion {
  constructor(
    readonly id: string,
    private readonly filePath: string,
    private readonly onResolved: () => void,
  ) {}

  async read(): Promise<Buffer> {
    try {
      return await fs.readFile(this.filePath);
    } catch (err) {
      throw mapFsError(err, this.filePath);
    }
  }

  async getModificationTime(): Promise<number> {
    try {
      const stats = await fs.stat(this.filePath);
      return stats.mtimeMs;
    } catch (err) {
      throw mapFsError(err, this.filePath);
    }
  }

  async markResolved(): Promise<void> {
    this.onResolved();
  }
}

/**
 * True when `candidate` is a conflict copy of `fileName` as written by common
 * sync services:
 *
 * - `Groceries (conflicted copy 2024-03-01).listsync`
 * - `Groceries (Laptop's conflicted copy 2024-03-01).listsync`
 * - `Groceries.sync-conflict-20240301-101500-ABCDEFG.listsync`
 */
export function isConflictCopyName(fileName: string, candidate: string): boolean {
  const extension = path.extname(fileName);
  if (candidate === fileName || path.extname(candidate) !== extension) {
    return false;
  }
  const stem = fileName.slice(0, fileName.length - extension.length);
  const candidateStem = candidate.slice(0, candidate.length - extension.length);

  if (candidateStem.startsWith(`${stem}.sync-conflict-`)) {
    return true;
  }
  if (candidateStem.startsWith(`${stem} (`) && candidateStem.endsWith(')')) {
    const note = candidateStem.slice(stem.length + 2, -1);
    return /(^|\s)conflicted copy(\s|$)/i.test(note);
  }
  return false;
}

/**
 * Discovers conflict copies as sibling files of the document.
 */
export class FsFileVersionStore implements FileVersionStore {
  private readonly resolved = new Map<string, Set<string>>();

  async listConflictVersions(filePath: string): Promise<FileVersion[]> {
    const directory = path.dirname(filePath);
    const fileName = path.basename(filePath);
    let entries: string[];
    try {
      entries = await fs.readdir(directory);
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') {
        return [];
      }
      throw mapFsError(err, directory);
    }

    return entries
      .filter((entry) => isConflictCopyName(fileName, entry))
      .sort()
      .map((entry) => {
        const copyPath = path.join(directory, entry);
        return new StoredFileVersion(entry, copyPath, () =>
          this.markCopyResolved(filePath, copyPath),
        );
      });
  }

  async getCurrentVersion(filePath: string): Promise<FileVersion | undefined> {
    try {
      await fs.access(filePath);
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') {
        return undefined;
      }
      throw mapFsError(err, filePath);
    }
    return new StoredFileVersion(CURRENT_VERSION_ID, filePath, () => undefined);
  }

  async removeOtherVersions(filePath: string): Promise<void> {
    const copies = this.resolved.get(filePath);
    if (!copies) {
      return;
    }
    for (const copyPath of [...copies]) {
      try {
        await fs.rm(copyPath, { force: true });
      } catch (err) {
        throw mapFsError(err, copyPath);
      }
      copies.delete(copyPath);
    }
    this.resolved.delete(filePath);
  }

  private markCopyResolved(filePath: string, copyPath: string): void {
    const copies = this.resolved.get(filePath) ?? new Set<string>();
    copies.add(copyPath);
    this.resolved.set(filePath, copies);
  }
}

/**
 * Version store for locations no sync service writes to.
 */
export class NoConflictVersionStore implements FileVersionStore {
  constructor(private readonly storage: DocumentStorage) {}

  async listConflictVersions(): Promise<FileVersion[]> {
    return [];
  }

  async getCurrentVersion(filePath: string): Promise<FileVersion | undefined> {
    const status = await this.storage.stat(filePath);
    if (status.state === 'missing') {
      return undefined;
    }
    const storage = this.storage;
    return {
      id: CURRENT_VERSION_ID,
      read: () => storage.read(filePath),
      getModificationTime: async () => (await storage.stat(filePath)).modifiedMs ?? 0,
      markResolved: async () => undefined,
    };
  }

  async removeOtherVersions(): Promise<void> {
    return undefined;
  }
}
