import { EventEmitter } from 'node:events';
import path from 'node:path';

import type { ListDocument } from '@listsync/shared';
import { CURRENT_DOCUMENT_VERSION, cloneListDocument, normalizeListId } from '@listsync/shared';

import type { BookmarkRegistry } from './bookmarkRegistry';
import type { DecodedListDocument } from './codec';
import { decodeListDocument, encodeListDocument } from './codec';
import type { SyncEngineSettings } from './config';
import { DEFAULT_ENGINE_SETTINGS } from './config';
import type { ConflictResolutionOutcome } from './conflictResolver';
import { ConflictResolver } from './conflictResolver';
import { DocumentCache } from './documentCache';
import { DocumentDecodeError, FileNotFoundError, PermissionDeniedError } from './errors';
import type { SyncEvent, SyncEventListener } from './events';
import type { FileAccessProvider } from './fileAccess';
import { OpenFileAccess, withFileAccess } from './fileAccess';
import type { FileVersionStore } from './fileVersions';
import { KeyedQueue } from './keyedQueue';
import type { Logger } from './logger';
import { formatMergeSummary, mergeListDocuments, summarizeMerge } from './merge';
import type { SnapshotStore } from './snapshotStore';
import type { DocumentStorage } from './storage';

export interface ListSyncEngineOptions {
  storage: DocumentStorage;
  versions: FileVersionStore;
  settings?: Partial<SyncEngineSettings>;
  access?: FileAccessProvider;
  bookmarks?: BookmarkRegistry;
  snapshots?: SnapshotStore;
  cache?: DocumentCache;
  logger?: Logger;
  now?: () => Date;
}

export interface OpenOptions {
  forceReload?: boolean;
  signal?: AbortSignal;
}

export interface SaveOptions {
  bypassOptimisticCheck?: boolean;
  signal?: AbortSignal;
}

export interface SyncOptions {
  signal?: AbortSignal;
}

export interface SaveResult {
  document: ListDocument;
  /**
   * True when the file had changed on disk and the saved document is the
   * merge of the caller's document with that change.
   */
  raceResolved: boolean;
}

interface DiskDocument {
  document: ListDocument;
  modifiedMs: number | undefined;
}

interface SyncOutcome {
  document: ListDocument;
  disk: DiskDocument;
  merged: boolean;
}

const EVENT_NAME = 'sync';

function withCanonicalId(document: ListDocument): ListDocument {
  const copy = cloneListDocument(document);
  copy.version = CURRENT_DOCUMENT_VERSION;
  copy.list.id = normalizeListId(copy.list.id);
  return copy;
}

/**
 * Entry point for reading and writing list files. Operations on one path are
 * serialized; different paths proceed in parallel. Callers only ever receive
 * copies of cached documents.
 */
export class ListSyncEngine {
  private readonly storage: DocumentStorage;
  private readonly versions: FileVersionStore;
  private readonly settings: SyncEngineSettings;
  private readonly access: FileAccessProvider;
  private readonly bookmarks: BookmarkRegistry | undefined;
  private readonly snapshots: SnapshotStore | undefined;
  private readonly cache: DocumentCache;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly resolver: ConflictResolver;
  private readonly queue = new KeyedQueue();
  private readonly emitter = new EventEmitter();

  constructor(options: ListSyncEngineOptions) {
    this.storage = options.storage;
    this.versions = options.versions;
    this.settings = { ...DEFAULT_ENGINE_SETTINGS, ...options.settings };
    this.access = options.access ?? new OpenFileAccess();
    this.bookmarks = options.bookmarks;
    this.snapshots = options.snapshots;
    this.logger = options.logger ?? console;
    this.now = options.now ?? (() => new Date());
    this.cache =
      options.cache ?? new DocumentCache({ ttlMs: this.settings.cacheTtlMs, logger: this.logger });
    this.resolver = new ConflictResolver({
      storage: this.storage,
      versions: this.versions,
      toleranceMs: this.settings.timestampToleranceMs,
      logger: this.logger,
      emit: (event) => this.emit(event),
      now: this.now,
    });
  }

  subscribe(listener: SyncEventListener): () => void {
    this.emitter.on(EVENT_NAME, listener);
    return () => {
      this.emitter.off(EVENT_NAME, listener);
    };
  }

  async open(filePath: string, options: OpenOptions = {}): Promise<ListDocument> {
    const key = path.resolve(filePath);
    return this.queue.run(key, () => this.openUnlocked(key, options));
  }

  async save(
    document: ListDocument,
    filePath: string,
    options: SaveOptions = {},
  ): Promise<SaveResult> {
    const key = path.resolve(filePath);
    return this.queue.run(key, () => this.saveUnlocked(document, key, options));
  }

  /**
   * Merges the cached document (if any) with the file's current content and
   * writes the result back. Without a cached document this is a reload.
   */
  async sync(filePath: string, options: SyncOptions = {}): Promise<ListDocument> {
    const key = path.resolve(filePath);
    return this.queue.run(key, async () => {
      const outcome = await this.syncUnlocked(key, undefined, options.signal);
      if (!outcome.merged) {
        this.commit(key, outcome.document, outcome.disk.modifiedMs);
        return cloneListDocument(outcome.document);
      }
      const saved = await this.saveUnlocked(outcome.document, key, {
        bypassOptimisticCheck: true,
        ...(options.signal ? { signal: options.signal } : {}),
      });
      return saved.document;
    });
  }

  async resolveConflicts(
    filePath: string,
    options: SyncOptions = {},
  ): Promise<ConflictResolutionOutcome> {
    const key = path.resolve(filePath);
    return this.queue.run(key, () =>
      withFileAccess(this.access, key, () => this.resolver.resolve(key, options)),
    );
  }

  /**
   * Writes a new list file. Fails when something already exists at the path.
   */
  async createFile(filePath: string, document: ListDocument): Promise<ListDocument> {
    const key = path.resolve(filePath);
    return this.queue.run(key, () =>
      withFileAccess(this.access, key, async () => {
        const status = await this.storage.stat(key);
        if (status.state !== 'missing') {
          throw new Error(`File already exists: ${key}`);
        }
        if (!(await this.storage.isWritable(key))) {
          throw new PermissionDeniedError(key);
        }
        const written = await this.writeDocument(key, document, undefined);
        await this.rememberBookmark(key);
        return written;
      }),
    );
  }

  async deleteFile(filePath: string): Promise<void> {
    const key = path.resolve(filePath);
    await this.queue.run(key, () =>
      withFileAccess(this.access, key, async () => {
        const status = await this.storage.stat(key);
        if (status.state === 'missing') {
          throw new FileNotFoundError(key);
        }
        if (!(await this.storage.isWritable(key))) {
          throw new PermissionDeniedError(key);
        }
        await this.storage.remove(key);
        this.cache.invalidate(key);
        await this.bestEffort(`remove snapshot for ${key}`, async () => {
          await this.snapshots?.remove(key);
        });
        await this.bestEffort(`forget bookmark for ${key}`, async () => {
          await this.bookmarks?.forget(key);
        });
        this.logger.info(`[sync] deleted ${key}`);
      }),
    );
  }

  async closeFile(filePath: string): Promise<void> {
    const key = path.resolve(filePath);
    await this.queue.run(key, async () => {
      this.cache.invalidate(key);
    });
  }

  invalidate(filePath: string): void {
    this.cache.invalidate(path.resolve(filePath));
  }

  /**
   * Cached document, if fresh. No I/O.
   */
  getOpenedFile(filePath: string): ListDocument | undefined {
    return this.cache.peek(path.resolve(filePath));
  }

  getOpenedFiles(): string[] {
    return this.cache.openedFiles();
  }

  async hasFileChanged(filePath: string): Promise<boolean> {
    const key = path.resolve(filePath);
    const status = await this.storage.stat(key);
    return this.cache.hasExternalChange(key, status);
  }

  async isFileWritable(filePath: string): Promise<boolean> {
    return this.storage.isWritable(path.resolve(filePath));
  }

  /**
   * Last known good copy for read-only display. Never merged or saved.
   */
  async loadSnapshot(filePath: string): Promise<ListDocument | undefined> {
    return this.snapshots?.load(path.resolve(filePath));
  }

  private async openUnlocked(key: string, options: OpenOptions): Promise<ListDocument> {
    if (!options.forceReload) {
      const cached = this.cache.get(key);
      if (cached) {
        return cached;
      }
    }

    const disk = await this.readFromDisk(key, options.signal);
    this.commit(key, disk.document, disk.modifiedMs);
    await this.rememberBookmark(key);
    return cloneListDocument(disk.document);
  }

  private async saveUnlocked(
    document: ListDocument,
    key: string,
    options: SaveOptions,
  ): Promise<SaveResult> {
    return withFileAccess(this.access, key, async () => {
      if (!(await this.storage.isWritable(key))) {
        throw new PermissionDeniedError(key);
      }

      if (!options.bypassOptimisticCheck) {
        const status = await this.storage.stat(key);
        if (this.cache.hasExternalChange(key, status)) {
          this.logger.warn(`[sync] ${key} changed on disk since it was read; merging before save`);
          const outcome = await this.syncUnlocked(key, document, options.signal);
          const saved = await this.saveUnlocked(outcome.document, key, {
            bypassOptimisticCheck: true,
            ...(options.signal ? { signal: options.signal } : {}),
          });
          this.emit({ type: 'concurrency_race_resolved', path: key });
          return { document: saved.document, raceResolved: true };
        }
      }

      await this.resolver.resolve(key, options.signal ? { signal: options.signal } : {});
      const written = await this.writeDocument(key, document, options.signal);
      return { document: written, raceResolved: false };
    });
  }

  /**
   * Merges `local` (or the cached document) into the file's current content.
   * Nothing is written and the cache is left untouched.
   */
  private async syncUnlocked(
    key: string,
    local: ListDocument | undefined,
    signal: AbortSignal | undefined,
  ): Promise<SyncOutcome> {
    const incoming = local ?? this.cache.snapshot(key);
    const disk = await this.readFromDisk(key, signal);
    if (!incoming) {
      this.logger.debug?.(`[sync] nothing cached for ${key}; reloaded from disk`);
      return { document: disk.document, disk, merged: false };
    }

    const options = { toleranceMs: this.settings.timestampToleranceMs };
    const merged = mergeListDocuments(incoming, disk.document, options);
    const summary = summarizeMerge(incoming, disk.document, options);
    this.logger.debug?.(`[sync] merged ${key}: ${formatMergeSummary(summary)}`);
    return { document: merged, disk, merged: true };
  }

  private async readFromDisk(key: string, signal: AbortSignal | undefined): Promise<DiskDocument> {
    return withFileAccess(this.access, key, async () => {
      const status = await this.storage.stat(key);
      if (status.state === 'missing') {
        throw new FileNotFoundError(key);
      }
      if (status.state === 'evicted') {
        this.logger.info(`[sync] waiting for ${key} to download`);
        await this.storage.materialize(key, {
          timeoutMs: this.settings.materializeTimeoutMs,
          pollIntervalMs: this.settings.materializePollIntervalMs,
          maxPollIntervalMs: this.settings.materializeMaxPollIntervalMs,
          ...(signal ? { signal } : {}),
        });
      }
      signal?.throwIfAborted();

      await this.resolver.resolve(key, signal ? { signal } : {});
      // Stat before reading: a write landing in between must look like drift.
      const stat = await this.storage.stat(key);
      const bytes = await this.storage.read(key);
      signal?.throwIfAborted();

      let decoded: DecodedListDocument;
      try {
        decoded = decodeListDocument(bytes, { now: this.now() });
      } catch (err) {
        throw err instanceof DocumentDecodeError ? err.withPath(key) : err;
      }

      const notices = [...decoded.notices];
      const document = withCanonicalId(decoded.document);
      if (document.list.id !== decoded.document.list.id) {
        notices.push(`list id: removed legacy prefix from ${decoded.document.list.id}`);
      }
      if (notices.length > 0) {
        this.logger.warn(`[sync] repaired ${key} on load: ${notices.join('; ')}`);
        this.emit({
          type: 'document_repaired',
          path: key,
          sourceVersion: decoded.sourceVersion,
          notices,
        });
      }
      return { document, modifiedMs: stat.modifiedMs };
    });
  }

  /**
   * Encodes and atomically writes `document`, then records it in the cache.
   * The tracked modification time always moves forward.
   */
  private async writeDocument(
    key: string,
    document: ListDocument,
    signal: AbortSignal | undefined,
  ): Promise<ListDocument> {
    const canonical = withCanonicalId(document);
    const before = await this.storage.stat(key);
    const floor = Math.max(this.cache.knownModification(key) ?? 0, before.modifiedMs ?? 0);
    signal?.throwIfAborted();
    await this.storage.writeAtomic(key, encodeListDocument(canonical));

    let status = await this.storage.stat(key);
    if (floor > 0 && (status.modifiedMs ?? 0) <= floor) {
      await this.storage.setModifiedTime(key, Math.floor(floor) + 1);
      status = await this.storage.stat(key);
    }

    this.commit(key, canonical, status.modifiedMs);
    await this.bestEffort(`save snapshot for ${key}`, async () => {
      await this.snapshots?.save(key, canonical);
    });
    this.logger.debug?.(`[sync] wrote ${key}`);
    return cloneListDocument(canonical);
  }

  private commit(key: string, document: ListDocument, modifiedMs: number | undefined): void {
    this.cache.put(key, document, modifiedMs);
  }

  private async rememberBookmark(key: string): Promise<void> {
    await this.bestEffort(`remember bookmark for ${key}`, async () => {
      await this.bookmarks?.remember(key);
    });
  }

  private async bestEffort(description: string, task: () => Promise<void>): Promise<void> {
    try {
      await task();
    } catch (err) {
      this.logger.warn(`[sync] failed to ${description}: ${String(err)}`);
    }
  }

  private emit(event: SyncEvent): void {
    try {
      this.emitter.emit(EVENT_NAME, event);
    } catch (err) {
      this.logger.error(`[sync] event listener failed for ${event.type}: ${String(err)}`);
    }
  }
}
