import { createHash } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

import { errnoCode } from './errors';
import type { Logger } from './logger';

const BookmarkEntrySchema = z.object({
  key: z.string().min(1),
  path: z.string().min(1),
  createdAt: z.string(),
});

const BookmarkFileSchema = z.object({
  bookmarks: z.array(BookmarkEntrySchema),
});

export type BookmarkEntry = z.infer<typeof BookmarkEntrySchema>;

export type BookmarkAvailability = 'available' | 'missing' | 'trashed';

export interface UnavailableBookmark {
  entry: BookmarkEntry;
  reason: Exclude<BookmarkAvailability, 'available'>;
}

export interface BookmarkRefreshReport {
  unavailable: UnavailableBookmark[];
  /**
   * Keys dropped because another entry resolves to the same file.
   */
  duplicatesRemoved: string[];
}

export interface BookmarkRegistryOptions {
  dataDir: string;
  logger?: Logger;
  now?: () => Date;
}

const TRASH_MARKERS = ['/.Trash/', '/.local/share/Trash/', '$RECYCLE.BIN'];

export function isInTrash(filePath: string): boolean {
  const normalised = filePath.split(path.sep).join('/');
  return TRASH_MARKERS.some((marker) => normalised.includes(marker));
}

export function bookmarkKey(filePath: string): string {
  return createHash('sha256').update(path.resolve(filePath)).digest('hex').slice(0, 16);
}

/**
 * Persisted set of user-picked list files, kept so they can be reopened
 * after a restart.
 */
export class BookmarkRegistry {
  private readonly filePath: string;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(options: BookmarkRegistryOptions) {
    this.filePath = path.join(options.dataDir, 'bookmarks.json');
    this.logger = options.logger ?? console;
    this.now = options.now ?? (() => new Date());
  }

  async list(): Promise<BookmarkEntry[]> {
    await this.writeQueue;
    return this.readEntries();
  }

  async remember(filePath: string): Promise<BookmarkEntry> {
    const resolved = path.resolve(filePath);
    return this.update((entries) => {
      const existing = entries.find((entry) => entry.path === resolved);
      if (existing) {
        return { entries, result: existing };
      }
      const entry: BookmarkEntry = {
        key: bookmarkKey(resolved),
        path: resolved,
        createdAt: this.now().toISOString(),
      };
      return { entries: [...entries, entry], result: entry };
    });
  }

  async forget(filePath: string): Promise<boolean> {
    const resolved = path.resolve(filePath);
    return this.update((entries) => {
      const remaining = entries.filter((entry) => entry.path !== resolved);
      return { entries: remaining, result: remaining.length !== entries.length };
    });
  }

  async resolve(key: string): Promise<string | undefined> {
    const entries = await this.list();
    return entries.find((entry) => entry.key === key)?.path;
  }

  /**
   * Reports entries whose file is gone or sits in a trash folder, and drops
   * entries that point at the same file as an earlier one.
   */
  async refreshAvailability(): Promise<BookmarkRefreshReport> {
    const entries = await this.list();
    const unavailable: UnavailableBookmark[] = [];
    const seenTargets = new Set<string>();
    const duplicates: string[] = [];

    for (const entry of entries) {
      let target = entry.path;
      try {
        target = await fs.realpath(entry.path);
      } catch (err) {
        if (errnoCode(err) !== 'ENOENT') {
          this.logger.warn(`[bookmarks] failed to resolve ${entry.path}: ${String(err)}`);
        }
        unavailable.push({ entry, reason: 'missing' });
        continue;
      }

      if (seenTargets.has(target)) {
        duplicates.push(entry.key);
        continue;
      }
      seenTargets.add(target);

      if (isInTrash(target)) {
        unavailable.push({ entry, reason: 'trashed' });
      }
    }

    if (duplicates.length > 0) {
      await this.update((current) => ({
        entries: current.filter((entry) => !duplicates.includes(entry.key)),
        result: undefined,
      }));
      this.logger.info(`[bookmarks] removed ${duplicates.length} duplicate bookmark(s)`);
    }

    return { unavailable, duplicatesRemoved: duplicates };
  }

  async removeUnavailable(key: string): Promise<boolean> {
    return this.update((entries) => {
      const remaining = entries.filter((entry) => entry.key !== key);
      return { entries: remaining, result: remaining.length !== entries.length };
    });
  }

  private async readEntries(): Promise<BookmarkEntry[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf8');
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') {
        return [];
      }
      this.logger.error(`[bookmarks] failed to read ${this.filePath}: ${String(err)}`);
      return [];
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err) {
      this.logger.error(`[bookmarks] failed to parse ${this.filePath}: ${String(err)}`);
      return [];
    }

    const parsed = BookmarkFileSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.error(`[bookmarks] invalid bookmark file ${this.filePath}`);
      return [];
    }
    return parsed.data.bookmarks;
  }

  private async update<T>(
    mutate: (entries: BookmarkEntry[]) => { entries: BookmarkEntry[]; result: T },
  ): Promise<T> {
    const run = async (): Promise<T> => {
      const current = await this.readEntries();
      const { entries, result } = mutate(current);
      if (entries !== current) {
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        const json = JSON.stringify({ bookmarks: entries }, null, 2);
        await fs.writeFile(this.filePath, `${json}\n`, 'utf8');
      }
      return result;
    };

    const next = this.writeQueue.catch(() => undefined).then(run);
    this.writeQueue = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }
}
