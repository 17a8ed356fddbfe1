import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { ListDocument, ListItem } from '@listsync/shared';

import { BookmarkRegistry } from './bookmarkRegistry';
import { decodeListDocument, encodeListDocument } from './codec';
import {
  DocumentDecodeError,
  FileNotFoundError,
  PermissionDeniedError,
  RemoteUnavailableError,
} from './errors';
import type { SyncEvent } from './events';
import { FsFileVersionStore } from './fileVersions';
import { silentLogger } from './logger';
import { SnapshotStore } from './snapshotStore';
import { LocalFileStorage, evictionPlaceholderPath } from './storage';
import { ListSyncEngine } from './syncEngine';

const T = Date.parse('2024-03-01T10:00:00.000Z');

function at(offsetMs: number): string {
  return new Date(T + offsetMs).toISOString();
}

function item(id: string, note: string, offsetMs: number): ListItem {
  return {
    id,
    note,
    quantity: 1,
    checked: false,
    modifiedAt: at(offsetMs),
    isDeleted: false,
  };
}

function documentWith(items: ListItem[], listId = 'list-1'): ListDocument {
  return {
    version: 2,
    list: { id: listId, name: 'Groceries', modifiedAt: at(0), icon: 'checklist' },
    items,
    labels: [],
  };
}

class ReadOnlyStorage extends LocalFileStorage {
  writes = 0;

  override async isWritable(): Promise<boolean> {
    return false;
  }

  override async writeAtomic(filePath: string, bytes: Uint8Array): Promise<void> {
    this.writes += 1;
    await super.writeAtomic(filePath, bytes);
  }
}

class RacingStorage extends LocalFileStorage {
  private pendingWrite: (() => Promise<void>) | undefined;

  writeAfterNextRead(write: () => Promise<void>): void {
    this.pendingWrite = write;
  }

  override async read(filePath: string): Promise<Buffer> {
    const bytes = await super.read(filePath);
    const write = this.pendingWrite;
    this.pendingWrite = undefined;
    if (write) {
      await write();
    }
    return bytes;
  }
}

async function readDocument(filePath: string): Promise<ListDocument> {
  return decodeListDocument(await fs.readFile(filePath)).document;
}

async function touchFuture(filePath: string, aheadMs = 60_000): Promise<number> {
  const future = Date.now() + aheadMs;
  await fs.utimes(filePath, new Date(future), new Date(future));
  return future;
}

describe('ListSyncEngine', () => {
  let dir: string;
  let dataDir: string;
  let filePath: string;
  let events: SyncEvent[];

  function createEngine(storage = new LocalFileStorage()): ListSyncEngine {
    const engine = new ListSyncEngine({
      storage,
      versions: new FsFileVersionStore(),
      settings: { materializeTimeoutMs: 50, materializePollIntervalMs: 10 },
      bookmarks: new BookmarkRegistry({ dataDir, logger: silentLogger }),
      snapshots: new SnapshotStore({ dataDir, logger: silentLogger }),
      logger: silentLogger,
      now: () => new Date(T),
    });
    engine.subscribe((event) => events.push(event));
    return engine;
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'listsync-engine-'));
    dataDir = path.join(dir, 'data');
    filePath = path.join(dir, 'Groceries.listsync');
    events = [];
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('creates, opens and caches a list file', async () => {
    const engine = createEngine();

    await engine.createFile(filePath, documentWith([item('1', 'Milk', 0)]));
    const opened = await engine.open(filePath);

    expect(opened.items.map((entry) => entry.note)).toEqual(['Milk']);
    expect(engine.getOpenedFiles()).toEqual([filePath]);
    expect(engine.getOpenedFile(filePath)?.list.id).toBe('list-1');
    await expect(engine.loadSnapshot(filePath)).resolves.toEqual(opened);
  });

  it('refuses to create over an existing file', async () => {
    const engine = createEngine();
    await fs.writeFile(filePath, encodeListDocument(documentWith([])));

    await expect(engine.createFile(filePath, documentWith([]))).rejects.toThrow(
      `File already exists: ${filePath}`,
    );
  });

  it('merges an external change into a save instead of overwriting it', async () => {
    const engine = createEngine();
    await engine.createFile(filePath, documentWith([item('1', 'Milk', 0)]));

    await fs.writeFile(
      filePath,
      encodeListDocument(documentWith([item('1', 'Milk', 0), item('2', 'Eggs', 5000)])),
    );
    const externalMtime = await touchFuture(filePath);

    const local = documentWith([item('1', 'Milk', 0), item('3', 'Bread', 10_000)]);
    const result = await engine.save(local, filePath);

    expect(result.raceResolved).toBe(true);
    expect(result.document.items.map((entry) => entry.id)).toEqual(['3', '2', '1']);
    expect((await readDocument(filePath)).items.map((entry) => entry.id)).toEqual([
      '3',
      '2',
      '1',
    ]);
    expect((await fs.stat(filePath)).mtimeMs).toBeGreaterThan(externalMtime);
    expect(events).toContainEqual({ type: 'concurrency_race_resolved', path: filePath });
    await expect(engine.hasFileChanged(filePath)).resolves.toBe(false);
  });

  it('keeps a write that lands while the file is being read', async () => {
    const storage = new RacingStorage();
    const engine = createEngine(storage);
    await fs.writeFile(filePath, encodeListDocument(documentWith([item('1', 'Milk', 0)])));
    storage.writeAfterNextRead(async () => {
      await fs.writeFile(
        filePath,
        encodeListDocument(documentWith([item('1', 'Milk', 0), item('2', 'Eggs', 5000)])),
      );
      await touchFuture(filePath);
    });

    const opened = await engine.open(filePath);
    expect(opened.items.map((entry) => entry.id)).toEqual(['1']);

    const result = await engine.save(
      documentWith([item('1', 'Milk', 0), item('3', 'Bread', 10_000)]),
      filePath,
    );

    expect(result.raceResolved).toBe(true);
    expect((await readDocument(filePath)).items.map((entry) => entry.id)).toEqual([
      '3',
      '2',
      '1',
    ]);
  });

  it('saves directly when nothing changed on disk', async () => {
    const engine = createEngine();
    await engine.createFile(filePath, documentWith([item('1', 'Milk', 0)]));

    const result = await engine.save(documentWith([item('1', 'Oat milk', 2000)]), filePath);

    expect(result.raceResolved).toBe(false);
    expect((await readDocument(filePath)).items[0]?.note).toBe('Oat milk');
  });

  it('rejects saves to read-only files before writing', async () => {
    const storage = new ReadOnlyStorage();
    const engine = createEngine(storage);
    const original = encodeListDocument(documentWith([item('1', 'Milk', 0)]));
    await fs.writeFile(filePath, original);

    await expect(engine.save(documentWith([]), filePath)).rejects.toBeInstanceOf(
      PermissionDeniedError,
    );
    expect(storage.writes).toBe(0);
    expect((await fs.readFile(filePath)).equals(original)).toBe(true);
    await expect(engine.isFileWritable(filePath)).resolves.toBe(false);
  });

  it('reports missing files', async () => {
    const engine = createEngine();
    await expect(engine.open(filePath)).rejects.toBeInstanceOf(FileNotFoundError);
  });

  it('attributes decode failures to the file', async () => {
    const engine = createEngine();
    await fs.writeFile(filePath, 'not a list');

    const failure = engine.open(filePath);

    await expect(failure).rejects.toBeInstanceOf(DocumentDecodeError);
    await expect(failure).rejects.toMatchObject({ kind: 'decode_failed', path: filePath });
  });

  it('gives up on evicted files that never download', async () => {
    const engine = createEngine();
    await fs.writeFile(evictionPlaceholderPath(filePath), '');

    await expect(engine.open(filePath)).rejects.toBeInstanceOf(RemoteUnavailableError);
  });

  it('reloads from disk when syncing a file that is not cached', async () => {
    const engine = createEngine();
    const bytes = encodeListDocument(documentWith([item('1', 'Milk', 0)]));
    await fs.writeFile(filePath, bytes);
    const before = (await fs.stat(filePath)).mtimeMs;

    const synced = await engine.sync(filePath);

    expect(synced.items.map((entry) => entry.id)).toEqual(['1']);
    expect((await fs.readFile(filePath)).equals(bytes)).toBe(true);
    expect((await fs.stat(filePath)).mtimeMs).toBe(before);
    expect(engine.getOpenedFile(filePath)?.items).toHaveLength(1);
  });

  it('merges the cached document with the file when syncing', async () => {
    const engine = createEngine();
    await engine.createFile(filePath, documentWith([item('1', 'Milk', 0)]));

    await fs.writeFile(filePath, encodeListDocument(documentWith([item('2', 'Eggs', 0)])));
    await touchFuture(filePath);

    const synced = await engine.sync(filePath);

    expect(synced.items.map((entry) => entry.id)).toEqual(['1', '2']);
    expect((await readDocument(filePath)).items.map((entry) => entry.id)).toEqual(['1', '2']);
  });

  it('normalises legacy list ids on open and reports the repair', async () => {
    const engine = createEngine();
    await fs.writeFile(filePath, encodeListDocument(documentWith([], 'local-abc')));

    const opened = await engine.open(filePath);

    expect(opened.list.id).toBe('abc');
    expect(events).toEqual([
      {
        type: 'document_repaired',
        path: filePath,
        sourceVersion: 2,
        notices: ['list id: removed legacy prefix from local-abc'],
      },
    ]);
  });

  it('folds conflict copies into the file on open', async () => {
    const engine = createEngine();
    const copyPath = path.join(dir, 'Groceries (conflicted copy 2024-03-01).listsync');
    await fs.writeFile(filePath, encodeListDocument(documentWith([item('1', 'Milk', 0)])));
    await fs.writeFile(copyPath, encodeListDocument(documentWith([item('2', 'Eggs', 0)])));

    const opened = await engine.open(filePath);

    expect(opened.items.map((entry) => entry.id)).toEqual(['1', '2']);
    await expect(fs.access(copyPath)).rejects.toThrow();
    expect(events).toContainEqual({
      type: 'conflicts_resolved',
      path: filePath,
      status: 'merged',
      versionCount: 1,
    });
  });

  it('runs operations on one file in call order', async () => {
    const engine = createEngine();
    await engine.createFile(filePath, documentWith([item('1', 'Milk', 0)]));

    const saving = engine.save(documentWith([item('1', 'Oat milk', 2000)]), filePath);
    const reopening = engine.open(filePath, { forceReload: true });

    await saving;
    expect((await reopening).items[0]?.note).toBe('Oat milk');
  });

  it('does not treat an evicted file as changed', async () => {
    const engine = createEngine();
    await engine.createFile(filePath, documentWith([]));
    await touchFuture(filePath);
    await expect(engine.hasFileChanged(filePath)).resolves.toBe(true);

    await fs.rm(filePath);
    await fs.writeFile(evictionPlaceholderPath(filePath), '');
    await touchFuture(evictionPlaceholderPath(filePath), 120_000);

    await expect(engine.hasFileChanged(filePath)).resolves.toBe(false);
  });

  it('deletes files along with their snapshot and bookmark', async () => {
    const engine = createEngine();
    const bookmarks = new BookmarkRegistry({ dataDir, logger: silentLogger });
    await engine.createFile(filePath, documentWith([]));
    expect((await bookmarks.list()).map((entry) => entry.path)).toEqual([filePath]);

    await engine.deleteFile(filePath);

    await expect(fs.access(filePath)).rejects.toThrow();
    expect(engine.getOpenedFile(filePath)).toBeUndefined();
    await expect(engine.loadSnapshot(filePath)).resolves.toBeUndefined();
    await expect(bookmarks.list()).resolves.toEqual([]);
    await expect(engine.deleteFile(filePath)).rejects.toBeInstanceOf(FileNotFoundError);
  });

  it('stops reading when the signal is aborted', async () => {
    const engine = createEngine();
    await fs.writeFile(filePath, encodeListDocument(documentWith([])));
    const controller = new AbortController();
    controller.abort();

    await expect(engine.open(filePath, { signal: controller.signal })).rejects.toMatchObject({
      name: 'AbortError',
    });
    expect(engine.getOpenedFile(filePath)).toBeUndefined();
  });

  it('drops cached documents on close', async () => {
    const engine = createEngine();
    await engine.createFile(filePath, documentWith([]));

    await engine.closeFile(filePath);

    expect(engine.getOpenedFiles()).toEqual([]);
  });
});
