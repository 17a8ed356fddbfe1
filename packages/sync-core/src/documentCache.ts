import type { ListDocument } from '@listsync/shared';
import { cloneListDocument } from '@listsync/shared';

import type { Logger } from './logger';

export const DEFAULT_CACHE_TTL_MS = 30_000;

export type FileState = 'present' | 'evicted' | 'missing';

export interface FileStatus {
  state: FileState;
  /**
   * Present for `present` files, and for `evicted` files when the placeholder
   * reports one.
   */
  modifiedMs?: number;
}

export interface DocumentCacheOptions {
  ttlMs?: number;
  now?: () => number;
  logger?: Logger;
}

interface CacheEntry {
  document?: ListDocument;
  insertedAt: number;
  diskModifiedMs?: number;
}

/**
 * Time-bounded cache of decoded documents keyed by absolute path. Callers
 * always receive copies. Every method is synchronous, so each call is atomic
 * with respect to other tasks.
 */
export class DocumentCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly logger: Logger | undefined;

  constructor(options: DocumentCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
    this.logger = options.logger;
  }

  get(path: string): ListDocument | undefined {
    const entry = this.entries.get(path);
    if (!entry?.document) {
      this.logger?.debug?.(`[cache] miss ${path}`);
      return undefined;
    }
    if (this.isExpired(entry)) {
      delete entry.document;
      this.logger?.debug?.(`[cache] expired ${path}`);
      return undefined;
    }
    this.logger?.debug?.(`[cache] hit ${path}`);
    return cloneListDocument(entry.document);
  }

  /**
   * Fresh document without pruning. No I/O, no side effects.
   */
  peek(path: string): ListDocument | undefined {
    const entry = this.entries.get(path);
    if (!entry?.document || this.isExpired(entry)) {
      return undefined;
    }
    return cloneListDocument(entry.document);
  }

  /**
   * Last cached document regardless of age, unless it has been pruned.
   */
  snapshot(path: string): ListDocument | undefined {
    const document = this.entries.get(path)?.document;
    return document ? cloneListDocument(document) : undefined;
  }

  put(path: string, document: ListDocument, diskModifiedMs?: number): void {
    const previous = this.entries.get(path);
    const entry: CacheEntry = {
      document: cloneListDocument(document),
      insertedAt: this.now(),
    };
    const tracked = diskModifiedMs ?? previous?.diskModifiedMs;
    if (tracked !== undefined) {
      entry.diskModifiedMs = tracked;
    }
    this.entries.set(path, entry);
  }

  knownModification(path: string): number | undefined {
    return this.entries.get(path)?.diskModifiedMs;
  }

  /**
   * True only when the file is present and strictly newer than the last
   * recorded read or write. An evicted file is a storage-tier change, not a
   * content change.
   */
  hasExternalChange(path: string, status: FileStatus): boolean {
    if (status.state !== 'present' || status.modifiedMs === undefined) {
      return false;
    }
    const known = this.knownModification(path);
    if (known === undefined) {
      return false;
    }
    return status.modifiedMs > known;
  }

  invalidate(path: string): void {
    this.entries.delete(path);
  }

  /**
   * Drops expired documents. Tracked modification times are kept.
   */
  pruneExpired(): number {
    let pruned = 0;
    for (const entry of this.entries.values()) {
      if (entry.document && this.isExpired(entry)) {
        delete entry.document;
        pruned += 1;
      }
    }
    return pruned;
  }

  /**
   * Paths holding a fresh document.
   */
  openedFiles(): string[] {
    const paths: string[] = [];
    for (const [path, entry] of this.entries) {
      if (entry.document && !this.isExpired(entry)) {
        paths.push(path);
      }
    }
    return paths.sort();
  }

  clear(): void {
    this.entries.clear();
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.now() - entry.insertedAt >= this.ttlMs;
  }
}
