import fs from 'node:fs/promises';
import path from 'node:path';

import type { ListDocument, ListItem } from '@listsync/shared';
import {
  COMMON_LABEL_PRESETS,
  DEFAULT_LABEL_COLOR,
  activeItems,
  addItem,
  createLabel,
  createListDocument,
  deletedItems,
  findItem,
  groupItemsByLabel,
  isHexColor,
  normalizeListId,
  purgeExpiredDeletedItems,
  restoreItem,
  softDeleteItem,
  sortItemsForDisplay,
  toggleItemChecked,
} from '@listsync/shared';
import type {
  BookmarkRegistry,
  ConflictResolutionOutcome,
  FileVersionStore,
  ListSyncEngine,
  SyncConfig,
} from '@listsync/sync-core';
import {
  discoverListFiles,
  isListSyncError,
  privateListPath,
  privateListsDir,
} from '@listsync/sync-core';

export type OutputFn = (line: string) => void;

export interface CliContext {
  config: SyncConfig;
  engine: ListSyncEngine;
  bookmarks: BookmarkRegistry;
  versions: FileVersionStore;
  cwd: string;
  output: OutputFn;
  now: () => Date;
}

/**
 * A bare list id names a file in the private lists directory; anything that
 * looks like a path is resolved against the working directory.
 */
export function resolveListTarget(context: CliContext, target: string): string {
  const extension = path.extname(target).slice(1).toLowerCase();
  const looksLikePath =
    target.includes('/') ||
    target.includes(path.sep) ||
    extension === context.config.fileExtension ||
    extension === 'json';
  if (looksLikePath) {
    return path.resolve(context.cwd, target);
  }
  return privateListPath(context.config, target);
}

function isPrivateTarget(context: CliContext, filePath: string): boolean {
  return path.dirname(filePath) === privateListsDir(context.config);
}

function formatItem(item: ListItem): string {
  const box = item.checked ? '[x]' : '[ ]';
  const quantity = item.quantity === 1 ? '' : ` x${item.quantity}`;
  return `${box} ${item.note}${quantity} (${item.id})`;
}

function formatDocument(document: ListDocument, includeAll: boolean): string[] {
  const lines = [`# ${document.list.name}`];
  const groups = groupItemsByLabel(document, { includeHidden: includeAll });
  if (groups.length === 0) {
    lines.push('(no items)');
  }
  for (const group of groups) {
    lines.push('', group.label ? `## ${group.label.name}` : '## No label');
    lines.push(...group.items.map(formatItem));
  }
  if (includeAll) {
    const deleted = sortItemsForDisplay(deletedItems(document));
    if (deleted.length > 0) {
      lines.push('', '## Deleted');
      lines.push(...deleted.map(formatItem));
    }
  }
  return lines;
}

function requireItem(document: ListDocument, itemId: string): ListItem {
  const item = findItem(document, itemId);
  if (!item) {
    throw new Error(`Item not found: ${itemId}`);
  }
  return item;
}

async function saveAndReport(
  context: CliContext,
  filePath: string,
  document: ListDocument,
): Promise<ListDocument> {
  const result = await context.engine.save(document, filePath);
  if (result.raceResolved) {
    context.output('Merged with changes made to the file since it was read');
  }
  return result.document;
}

export async function createCommand(
  context: CliContext,
  args: { file: string; name: string; icon?: string; presets?: boolean },
): Promise<void> {
  const filePath = resolveListTarget(context, args.file);
  const privateTarget = isPrivateTarget(context, filePath);
  let document = createListDocument(
    {
      name: args.name,
      ...(args.icon ? { icon: args.icon } : {}),
      ...(privateTarget ? { id: normalizeListId(path.parse(filePath).name) } : {}),
    },
    context.now(),
  );
  if (args.presets) {
    for (const preset of COMMON_LABEL_PRESETS) {
      document = createLabel(document, preset, context.now()).document;
    }
  }
  if (privateTarget) {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
  }
  const created = await context.engine.createFile(filePath, document);
  context.output(`Created ${created.list.name} (${created.list.id}) at ${filePath}`);
  if (created.labels.length > 0) {
    context.output(`Labels: ${created.labels.map((label) => label.name).join(', ')}`);
  }
}

export async function showCommand(
  context: CliContext,
  args: { file: string; all?: boolean; json?: boolean },
): Promise<void> {
  const document = await context.engine.open(resolveListTarget(context, args.file));
  if (args.json) {
    context.output(JSON.stringify(document, null, 2));
    return;
  }
  for (const line of formatDocument(document, args.all === true)) {
    context.output(line);
  }
}

export async function addCommand(
  context: CliContext,
  args: { file: string; note: string; quantity?: number; label?: string },
): Promise<void> {
  const filePath = resolveListTarget(context, args.file);
  const document = await context.engine.open(filePath);

  let labelId: string | undefined;
  if (args.label) {
    const wanted = args.label.trim().toLowerCase();
    const label = document.labels.find(
      (candidate) => candidate.id === args.label || candidate.name.toLowerCase() === wanted,
    );
    if (!label) {
      throw new Error(`Label not found: ${args.label}`);
    }
    labelId = label.id;
  }

  const { document: next, item } = addItem(
    document,
    {
      note: args.note,
      ...(args.quantity !== undefined ? { quantity: args.quantity } : {}),
      ...(labelId ? { labelId } : {}),
    },
    context.now(),
  );
  await saveAndReport(context, filePath, next);
  context.output(`Added ${item.note} (${item.id})`);
}

export async function checkCommand(
  context: CliContext,
  args: { file: string; itemId: string },
): Promise<void> {
  const filePath = resolveListTarget(context, args.file);
  const document = await context.engine.open(filePath);
  requireItem(document, args.itemId);
  const saved = await saveAndReport(
    context,
    filePath,
    toggleItemChecked(document, args.itemId, context.now()),
  );
  const item = requireItem(saved, args.itemId);
  context.output(`${item.checked ? 'Checked' : 'Unchecked'} ${item.note}`);
}

export async function deleteCommand(
  context: CliContext,
  args: { file: string; itemId: string },
): Promise<void> {
  const filePath = resolveListTarget(context, args.file);
  const document = await context.engine.open(filePath);
  const item = requireItem(document, args.itemId);
  if (item.isDeleted) {
    context.output(`${item.note} is already deleted`);
    return;
  }
  await saveAndReport(context, filePath, softDeleteItem(document, args.itemId, context.now()));
  context.output(`Deleted ${item.note}`);
}

export async function restoreCommand(
  context: CliContext,
  args: { file: string; itemId: string },
): Promise<void> {
  const filePath = resolveListTarget(context, args.file);
  const document = await context.engine.open(filePath);
  const item = requireItem(document, args.itemId);
  if (!item.isDeleted) {
    context.output(`${item.note} is not deleted`);
    return;
  }
  await saveAndReport(context, filePath, restoreItem(document, args.itemId, context.now()));
  context.output(`Restored ${item.note}`);
}

export async function labelCommand(
  context: CliContext,
  args: { file: string; name: string; color?: string },
): Promise<void> {
  const color = args.color ?? DEFAULT_LABEL_COLOR;
  if (!isHexColor(color)) {
    throw new Error(`Invalid color: ${color}`);
  }
  const filePath = resolveListTarget(context, args.file);
  const document = await context.engine.open(filePath);
  const { document: next, label } = createLabel(
    document,
    { name: args.name, color },
    context.now(),
  );
  await saveAndReport(context, filePath, next);
  context.output(`Created label ${label.name} (${label.id})`);
}

export async function cleanupCommand(
  context: CliContext,
  args: { file: string; days?: number },
): Promise<void> {
  const filePath = resolveListTarget(context, args.file);
  const document = await context.engine.open(filePath);
  const { document: next, purged } = purgeExpiredDeletedItems(document, {
    retentionDays: args.days ?? context.config.deletedItemRetentionDays,
    now: context.now(),
  });
  if (purged.length === 0) {
    context.output('Nothing to purge');
    return;
  }
  await saveAndReport(context, filePath, next);
  context.output(`Purged ${purged.length} item(s)`);
}

export async function syncCommand(context: CliContext, args: { file: string }): Promise<void> {
  const document = await context.engine.sync(resolveListTarget(context, args.file));
  context.output(`Synced ${document.list.name}: ${activeItems(document).length} item(s)`);
}

export function formatResolution(outcome: ConflictResolutionOutcome): string[] {
  switch (outcome.status) {
    case 'clean':
      return ['No conflicts'];
    case 'merged': {
      const lines = [`Merged ${outcome.mergedVersionIds.length} conflict version(s)`];
      if (outcome.skippedVersionIds.length > 0) {
        lines.push(`Skipped unreadable: ${outcome.skippedVersionIds.join(', ')}`);
      }
      return lines;
    }
    case 'fallback_newest':
      return [
        `No version could be read; kept the newest (${outcome.chosenVersionId})`,
        `Skipped unreadable: ${outcome.skippedVersionIds.join(', ')}`,
      ];
  }
}

export async function resolveCommand(context: CliContext, args: { file: string }): Promise<void> {
  const outcome = await context.engine.resolveConflicts(resolveListTarget(context, args.file));
  for (const line of formatResolution(outcome)) {
    context.output(line);
  }
}

export async function statusCommand(context: CliContext, args: { file: string }): Promise<void> {
  const filePath = resolveListTarget(context, args.file);
  const conflicts = await context.versions.listConflictVersions(filePath);

  let document: ListDocument;
  try {
    document = await context.engine.open(filePath);
  } catch (err) {
    const snapshot = isListSyncError(err, 'remote_unavailable')
      ? await context.engine.loadSnapshot(filePath)
      : undefined;
    if (!snapshot) {
      throw err;
    }
    context.output('File unavailable; showing the last synced copy');
    document = snapshot;
  }

  const writable = await context.engine.isFileWritable(filePath);
  context.output(`List: ${document.list.name} (${document.list.id})`);
  context.output(`Path: ${filePath}`);
  context.output(
    `Items: ${activeItems(document).length} active, ${deletedItems(document).length} deleted`,
  );
  context.output(`Labels: ${document.labels.length}`);
  context.output(`Modified: ${document.list.modifiedAt}`);
  context.output(`Writable: ${writable ? 'yes' : 'no'}`);
  context.output(`Conflict copies: ${conflicts.length}`);
}

export async function listsCommand(context: CliContext): Promise<void> {
  const extensions = [context.config.fileExtension, 'json'];
  const files = await discoverListFiles(privateListsDir(context.config), extensions);
  if (files.length === 0) {
    context.output('No lists');
    return;
  }
  for (const filePath of files) {
    try {
      const document = await context.engine.open(filePath);
      const count = activeItems(document).length;
      context.output(`${document.list.id}\t${document.list.name}\t${count} item(s)`);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      context.output(`${path.basename(filePath)}\tunreadable: ${message}`);
    }
  }
}

export async function bookmarksCommand(
  context: CliContext,
  args: { prune?: boolean },
): Promise<void> {
  const report = await context.bookmarks.refreshAvailability();
  const unavailable = new Map(report.unavailable.map((entry) => [entry.entry.key, entry.reason]));

  if (args.prune) {
    for (const key of unavailable.keys()) {
      await context.bookmarks.removeUnavailable(key);
    }
  }

  const entries = await context.bookmarks.list();
  if (entries.length === 0) {
    context.output('No bookmarks');
  }
  for (const entry of entries) {
    const reason = unavailable.get(entry.key);
    context.output(`${entry.key}\t${entry.path}${reason ? ` (${reason})` : ''}`);
  }
  if (args.prune && unavailable.size > 0) {
    context.output(`Removed ${unavailable.size} unavailable bookmark(s)`);
  }
  if (report.duplicatesRemoved.length > 0) {
    context.output(`Removed ${report.duplicatesRemoved.length} duplicate bookmark(s)`);
  }
}
