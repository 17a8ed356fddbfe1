import fs from 'node:fs/promises';
import path from 'node:path';

import { normalizeListId } from '@listsync/shared';

import { LIST_FILE_EXTENSIONS } from './codec';
import type { SyncConfig } from './config';
import { errnoCode } from './errors';

export function privateListsDir(config: Pick<SyncConfig, 'dataDir'>): string {
  return path.join(config.dataDir, 'lists');
}

/**
 * Location of a list kept in app-private storage.
 */
export function privateListPath(
  config: Pick<SyncConfig, 'dataDir' | 'fileExtension'>,
  listId: string,
): string {
  const id = normalizeListId(listId);
  if (!/^[A-Za-z0-9._-]+$/.test(id) || id === '.' || id === '..') {
    throw new Error(`Invalid list id: ${listId}`);
  }
  return path.join(privateListsDir(config), `${id}.${config.fileExtension}`);
}

export function isListFile(
  filePath: string,
  extensions: readonly string[] = LIST_FILE_EXTENSIONS,
): boolean {
  const extension = path.extname(filePath).slice(1).toLowerCase();
  const name = path.basename(filePath);
  return !name.startsWith('.') && extensions.includes(extension);
}

/**
 * List documents directly inside `dir`, sorted by name. A missing directory
 * has no lists.
 */
export async function discoverListFiles(
  dir: string,
  extensions: readonly string[] = LIST_FILE_EXTENSIONS,
): Promise<string[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') {
      return [];
    }
    throw err;
  }
  return entries
    .filter((entry) => isListFile(entry, extensions))
    .sort()
    .map((entry) => path.join(dir, entry));
}
