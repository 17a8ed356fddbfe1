import type { ListDocument } from '@listsync/shared';

import { decodeListDocument, encodeListDocument } from './codec';
import { DocumentDecodeError } from './errors';
import type { SyncEvent } from './events';
import type { FileVersion, FileVersionStore } from './fileVersions';
import type { Logger } from './logger';
import { DEFAULT_TIMESTAMP_TOLERANCE_MS, mergeListDocuments } from './merge';
import type { DocumentStorage } from './storage';

export type ConflictResolutionOutcome =
  | { status: 'clean' }
  | {
      status: 'merged';
      /**
       * Conflict versions whose content is part of the surviving file.
       */
      mergedVersionIds: string[];
      skippedVersionIds: string[];
      /**
       * False when the current content was kept byte for byte.
       */
      wroteBack: boolean;
      degraded: boolean;
    }
  | {
      status: 'fallback_newest';
      chosenVersionId: string;
      skippedVersionIds: string[];
      degraded: true;
    };

export interface ConflictResolverOptions {
  storage: DocumentStorage;
  versions: FileVersionStore;
  toleranceMs?: number;
  logger?: Logger;
  emit?: (event: SyncEvent) => void;
  now?: () => Date;
}

export interface ResolveOptions {
  signal?: AbortSignal;
}

interface LoadedVersion {
  version: FileVersion;
  isCurrent: boolean;
  bytes: Buffer;
  modifiedMs: number;
  document?: ListDocument;
}

function byModificationTime(a: LoadedVersion, b: LoadedVersion): number {
  if (a.modifiedMs !== b.modifiedMs) {
    return a.modifiedMs - b.modifiedMs;
  }
  return a.version.id < b.version.id ? -1 : a.version.id > b.version.id ? 1 : 0;
}

/**
 * Collapses concurrent on-disk versions of a file into one. Versions that
 * fail to decode are skipped; if none decodes, the newest by modification
 * time survives verbatim.
 */
export class ConflictResolver {
  private readonly storage: DocumentStorage;
  private readonly versions: FileVersionStore;
  private readonly toleranceMs: number;
  private readonly logger: Logger;
  private readonly emit: (event: SyncEvent) => void;
  private readonly now: () => Date;

  constructor(options: ConflictResolverOptions) {
    this.storage = options.storage;
    this.versions = options.versions;
    this.toleranceMs = options.toleranceMs ?? DEFAULT_TIMESTAMP_TOLERANCE_MS;
    this.logger = options.logger ?? console;
    this.emit = options.emit ?? (() => undefined);
    this.now = options.now ?? (() => new Date());
  }

  async resolve(
    filePath: string,
    options: ResolveOptions = {},
  ): Promise<ConflictResolutionOutcome> {
    const conflicts = await this.versions.listConflictVersions(filePath);
    if (conflicts.length === 0) {
      return { status: 'clean' };
    }

    this.logger.info(`[resolver] ${conflicts.length} conflict version(s) for ${filePath}`);

    const current = await this.versions.getCurrentVersion(filePath);
    const loadedCurrent = current ? await this.load(filePath, current, true) : undefined;
    const loadedConflicts: LoadedVersion[] = [];
    for (const version of conflicts) {
      loadedConflicts.push(await this.load(filePath, version, false));
    }
    loadedConflicts.sort(byModificationTime);

    const skippedVersionIds = [...(loadedCurrent ? [loadedCurrent] : []), ...loadedConflicts]
      .filter((entry) => !entry.document)
      .map((entry) => entry.version.id);

    const seed =
      loadedCurrent?.document !== undefined
        ? loadedCurrent
        : loadedConflicts.find((entry) => entry.document !== undefined);

    let outcome: ConflictResolutionOutcome;
    if (!seed?.document) {
      outcome = await this.fallbackToNewest(filePath, loadedCurrent, loadedConflicts, options);
    } else {
      let merged = seed.document;
      const mergedVersionIds: string[] = seed.isCurrent ? [] : [seed.version.id];
      for (const entry of loadedConflicts) {
        if (entry === seed || !entry.document) {
          continue;
        }
        merged = mergeListDocuments(entry.document, merged, { toleranceMs: this.toleranceMs });
        mergedVersionIds.push(entry.version.id);
      }

      const wroteBack = !(seed.isCurrent && mergedVersionIds.length === 0);
      if (wroteBack) {
        options.signal?.throwIfAborted();
        await this.storage.writeAtomic(filePath, encodeListDocument(merged));
      }
      outcome = {
        status: 'merged',
        mergedVersionIds,
        skippedVersionIds,
        wroteBack,
        degraded: skippedVersionIds.length > 0,
      };
    }

    for (const version of conflicts) {
      await version.markResolved();
    }
    await this.versions.removeOtherVersions(filePath);

    this.emit({
      type: 'conflicts_resolved',
      path: filePath,
      status: outcome.status === 'fallback_newest' ? 'fallback_newest' : 'merged',
      versionCount: conflicts.length,
    });
    if (outcome.status !== 'clean' && outcome.degraded) {
      const fallback = outcome.status === 'fallback_newest';
      const skipped = outcome.skippedVersionIds.join(', ');
      this.logger.warn(
        `[resolver] degraded resolution for ${filePath}: skipped ${skipped}` +
          (fallback ? ' (kept newest version verbatim)' : ''),
      );
      this.emit({
        type: 'conflict_resolution_degraded',
        path: filePath,
        skippedVersionIds: outcome.skippedVersionIds,
        fallback,
      });
    }
    return outcome;
  }

  private async fallbackToNewest(
    filePath: string,
    current: LoadedVersion | undefined,
    conflicts: LoadedVersion[],
    options: ResolveOptions,
  ): Promise<ConflictResolutionOutcome> {
    const candidates = [...(current ? [current] : []), ...conflicts].sort(byModificationTime);
    const newest = candidates[candidates.length - 1];
    if (!newest) {
      throw new Error(`No versions available for ${filePath}`);
    }
    if (!newest.isCurrent) {
      options.signal?.throwIfAborted();
      await this.storage.writeAtomic(filePath, newest.bytes);
    }
    return {
      status: 'fallback_newest',
      chosenVersionId: newest.version.id,
      skippedVersionIds: candidates
        .filter((entry) => entry !== newest)
        .map((entry) => entry.version.id),
      degraded: true,
    };
  }

  private async load(
    filePath: string,
    version: FileVersion,
    isCurrent: boolean,
  ): Promise<LoadedVersion> {
    const bytes = await version.read();
    const modifiedMs = await version.getModificationTime();
    const loaded: LoadedVersion = { version, isCurrent, bytes, modifiedMs };
    try {
      loaded.document = decodeListDocument(bytes, { now: this.now() }).document;
    } catch (err) {
      if (!(err instanceof DocumentDecodeError)) {
        throw err;
      }
      this.logger.warn(`[resolver] skipping version ${version.id} of ${filePath}: ${err.reason}`);
    }
    return loaded;
  }
}
