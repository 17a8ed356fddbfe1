import { randomUUID } from 'node:crypto';

import type {
  ListDocument,
  ListItem,
  ListLabel,
  ListSummary,
  ReminderRepeatInterval,
  ReminderRepeatMode,
} from './listDocument';
import {
  CURRENT_DOCUMENT_VERSION,
  DEFAULT_LIST_ICON,
  cloneListDocument,
  normalizeListId,
} from './listDocument';
import { makeUniqueLabelId, slugifyLabelName } from './labels';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Returns `now` as ISO 8601, or `previous` when the clock reads earlier, so
 * modification times never move backwards.
 */
export function nextTimestamp(previous: string | undefined, now: Date = new Date()): string {
  const nowMs = now.getTime();
  const previousMs = previous ? Date.parse(previous) : Number.NaN;
  if (Number.isFinite(previousMs) && previousMs > nowMs) {
    return new Date(previousMs).toISOString();
  }
  return new Date(nowMs).toISOString();
}

function requireNote(note: string): string {
  const trimmed = note.trim();
  if (!trimmed) {
    throw new Error('Item note must not be empty');
  }
  return trimmed;
}

function requireQuantity(quantity: number): number {
  if (!Number.isFinite(quantity) || quantity < 0) {
    throw new Error(`Invalid quantity: ${quantity}`);
  }
  return quantity;
}

/**
 * Stores reminder dates in the same ISO 8601 form the document codec reads
 * back.
 */
function requireReminderDate(value: string): string {
  const ms = Date.parse(value);
  if (!Number.isFinite(ms) || ms <= 0) {
    throw new Error(`Invalid reminder date: ${value}`);
  }
  return new Date(ms).toISOString();
}

function requireLabelColor(color: string): string {
  const trimmed = color.trim();
  if (!trimmed) {
    throw new Error('Label color must not be empty');
  }
  return trimmed;
}

function touchList(list: ListSummary, now: Date): ListSummary {
  return { ...list, modifiedAt: nextTimestamp(list.modifiedAt, now) };
}

function withItem(
  document: ListDocument,
  itemId: string,
  now: Date,
  update: (item: ListItem, timestamp: string) => ListItem,
): ListDocument {
  const index = document.items.findIndex((item) => item.id === itemId);
  const current = document.items[index];
  if (!current) {
    throw new Error(`Item not found: ${itemId}`);
  }
  const next = cloneListDocument(document);
  next.items[index] = update({ ...current }, nextTimestamp(current.modifiedAt, now));
  next.list = touchList(next.list, now);
  return next;
}

function findLabelIndex(document: ListDocument, labelId: string): number {
  const index = document.labels.findIndex((label) => label.id === labelId);
  if (index === -1) {
    throw new Error(`Label not found: ${labelId}`);
  }
  return index;
}

// List operations

export function createListDocument(
  params: { name: string; icon?: string; id?: string },
  now: Date = new Date(),
): ListDocument {
  const name = params.name.trim();
  if (!name) {
    throw new Error('List name must not be empty');
  }
  const list: ListSummary = {
    id: normalizeListId(params.id ?? randomUUID()),
    name,
    modifiedAt: now.toISOString(),
  };
  // An empty icon means none, as in updateListSettings.
  const icon = params.icon ?? DEFAULT_LIST_ICON;
  if (icon) {
    list.icon = icon;
  }
  return { version: CURRENT_DOCUMENT_VERSION, list, items: [], labels: [] };
}

export function updateListSettings(
  document: ListDocument,
  params: { name?: string; icon?: string | null; hiddenLabels?: string[] | null },
  now: Date = new Date(),
): ListDocument {
  const next = cloneListDocument(document);
  const list: ListSummary = touchList(next.list, now);

  if (params.name !== undefined) {
    const name = params.name.trim();
    if (!name) {
      throw new Error('List name must not be empty');
    }
    list.name = name;
  }

  if (params.icon !== undefined) {
    if (params.icon === null || params.icon === '') {
      delete list.icon;
    } else {
      list.icon = params.icon;
    }
  }

  if (params.hiddenLabels !== undefined) {
    const hidden = Array.from(new Set(params.hiddenLabels ?? [])).filter((id) => id.length > 0);
    if (hidden.length === 0) {
      delete list.hiddenLabels;
    } else {
      list.hiddenLabels = hidden;
    }
  }

  next.list = list;
  return next;
}

// Item operations

export interface AddItemParams {
  note: string;
  quantity?: number;
  checked?: boolean;
  labelId?: string;
  markdownNotes?: string;
  reminderDate?: string;
  reminderRepeatInterval?: ReminderRepeatInterval;
  reminderRepeatMode?: ReminderRepeatMode;
}

export function addItem(
  document: ListDocument,
  params: AddItemParams,
  now: Date = new Date(),
): { document: ListDocument; item: ListItem } {
  const item: ListItem = {
    id: randomUUID(),
    note: requireNote(params.note),
    quantity: requireQuantity(params.quantity ?? 1),
    checked: params.checked ?? false,
    modifiedAt: now.toISOString(),
    isDeleted: false,
    ...(params.labelId ? { labelId: params.labelId } : {}),
    ...(params.markdownNotes ? { markdownNotes: params.markdownNotes } : {}),
    ...(params.reminderDate ? { reminderDate: requireReminderDate(params.reminderDate) } : {}),
    ...(params.reminderRepeatInterval
      ? { reminderRepeatInterval: params.reminderRepeatInterval }
      : {}),
    ...(params.reminderRepeatMode ? { reminderRepeatMode: params.reminderRepeatMode } : {}),
  };

  const next = cloneListDocument(document);
  next.items.push(item);
  next.list = touchList(next.list, now);
  return { document: next, item: { ...item } };
}

export interface ItemPatch {
  note?: string;
  quantity?: number;
  checked?: boolean;
  labelId?: string | null;
  markdownNotes?: string | null;
  reminderDate?: string | null;
  reminderRepeatInterval?: ReminderRepeatInterval | null;
  reminderRepeatMode?: ReminderRepeatMode | null;
}

export function updateItem(
  document: ListDocument,
  itemId: string,
  patch: ItemPatch,
  now: Date = new Date(),
): ListDocument {
  return withItem(document, itemId, now, (item, modifiedAt) => {
    if (patch.note !== undefined) {
      item.note = requireNote(patch.note);
    }
    if (patch.quantity !== undefined) {
      item.quantity = requireQuantity(patch.quantity);
    }
    if (patch.checked !== undefined) {
      item.checked = patch.checked;
    }
    if (patch.labelId !== undefined) {
      if (patch.labelId === null || patch.labelId === '') {
        delete item.labelId;
      } else {
        item.labelId = patch.labelId;
      }
    }
    if (patch.markdownNotes !== undefined) {
      if (patch.markdownNotes === null || patch.markdownNotes === '') {
        delete item.markdownNotes;
      } else {
        item.markdownNotes = patch.markdownNotes;
      }
    }
    if (patch.reminderDate !== undefined) {
      if (patch.reminderDate === null || patch.reminderDate === '') {
        delete item.reminderDate;
      } else {
        item.reminderDate = requireReminderDate(patch.reminderDate);
      }
    }
    if (patch.reminderRepeatInterval !== undefined) {
      if (patch.reminderRepeatInterval === null) {
        delete item.reminderRepeatInterval;
      } else {
        item.reminderRepeatInterval = patch.reminderRepeatInterval;
      }
    }
    if (patch.reminderRepeatMode !== undefined) {
      if (patch.reminderRepeatMode === null) {
        delete item.reminderRepeatMode;
      } else {
        item.reminderRepeatMode = patch.reminderRepeatMode;
      }
    }
    item.modifiedAt = modifiedAt;
    return item;
  });
}

export function toggleItemChecked(
  document: ListDocument,
  itemId: string,
  now: Date = new Date(),
): ListDocument {
  return withItem(document, itemId, now, (item, modifiedAt) => ({
    ...item,
    checked: !item.checked,
    modifiedAt,
  }));
}

/**
 * Checks or unchecks every active item. Items already in the requested state
 * keep their timestamps.
 */
export function setAllItemsChecked(
  document: ListDocument,
  checked: boolean,
  now: Date = new Date(),
): { document: ListDocument; changed: number } {
  const next = cloneListDocument(document);
  let changed = 0;
  next.items = next.items.map((item) => {
    if (item.isDeleted || item.checked === checked) {
      return item;
    }
    changed += 1;
    return { ...item, checked, modifiedAt: nextTimestamp(item.modifiedAt, now) };
  });
  if (changed > 0) {
    next.list = touchList(next.list, now);
  }
  return { document: next, changed };
}

export function softDeleteItem(
  document: ListDocument,
  itemId: string,
  now: Date = new Date(),
): ListDocument {
  return withItem(document, itemId, now, (item, modifiedAt) => ({
    ...item,
    isDeleted: true,
    deletedAt: modifiedAt,
    modifiedAt,
  }));
}

export function restoreItem(
  document: ListDocument,
  itemId: string,
  now: Date = new Date(),
): ListDocument {
  return withItem(document, itemId, now, (item, modifiedAt) => {
    const restored: ListItem = { ...item, isDeleted: false, modifiedAt };
    delete restored.deletedAt;
    return restored;
  });
}

export function purgeItem(
  document: ListDocument,
  itemId: string,
  now: Date = new Date(),
): ListDocument {
  if (!document.items.some((item) => item.id === itemId)) {
    throw new Error(`Item not found: ${itemId}`);
  }
  const next = cloneListDocument(document);
  next.items = next.items.filter((item) => item.id !== itemId);
  next.list = touchList(next.list, now);
  return next;
}

/**
 * Permanently removes soft-deleted items older than the retention window.
 * Items deleted before `deletedAt` existed fall back to `modifiedAt`.
 */
export function purgeExpiredDeletedItems(
  document: ListDocument,
  options: { retentionDays: number; now?: Date },
): { document: ListDocument; purged: ListItem[] } {
  const now = options.now ?? new Date();
  const cutoff = now.getTime() - options.retentionDays * DAY_MS;

  const purged = document.items.filter((item) => {
    if (!item.isDeleted) {
      return false;
    }
    const deletedMs = Date.parse(item.deletedAt ?? item.modifiedAt);
    return Number.isFinite(deletedMs) && deletedMs < cutoff;
  });

  if (purged.length === 0) {
    return { document: cloneListDocument(document), purged: [] };
  }

  const purgedIds = new Set(purged.map((item) => item.id));
  const next = cloneListDocument(document);
  next.items = next.items.filter((item) => !purgedIds.has(item.id));
  next.list = touchList(next.list, now);
  return { document: next, purged: purged.map((item) => ({ ...item })) };
}

// Label operations

export function createLabel(
  document: ListDocument,
  params: { name: string; color: string },
  now: Date = new Date(),
): { document: ListDocument; label: ListLabel } {
  const name = params.name.trim();
  if (!name) {
    throw new Error('Label name must not be empty');
  }
  const usedIds = new Set(document.labels.map((label) => label.id));
  const label: ListLabel = {
    id: makeUniqueLabelId(slugifyLabelName(name), usedIds),
    name,
    color: requireLabelColor(params.color),
  };

  const next = cloneListDocument(document);
  next.labels.push(label);
  next.list = touchList(next.list, now);
  return { document: next, label: { ...label } };
}

export function updateLabel(
  document: ListDocument,
  labelId: string,
  params: { name?: string; color?: string },
  now: Date = new Date(),
): ListDocument {
  const index = findLabelIndex(document, labelId);
  const next = cloneListDocument(document);
  const label = next.labels[index];
  if (!label) {
    throw new Error(`Label not found: ${labelId}`);
  }
  if (params.name !== undefined) {
    const name = params.name.trim();
    if (!name) {
      throw new Error('Label name must not be empty');
    }
    label.name = name;
  }
  if (params.color !== undefined) {
    label.color = requireLabelColor(params.color);
  }
  next.list = touchList(next.list, now);
  return next;
}

/**
 * Removes a label. Items referencing it keep the reference, which then reads
 * as "no label".
 */
export function deleteLabel(
  document: ListDocument,
  labelId: string,
  now: Date = new Date(),
): ListDocument {
  findLabelIndex(document, labelId);
  const next = cloneListDocument(document);
  next.labels = next.labels.filter((label) => label.id !== labelId);

  const list = touchList(next.list, now);
  if (list.hiddenLabels) {
    const hidden = list.hiddenLabels.filter((id) => id !== labelId);
    if (hidden.length === 0) {
      delete list.hiddenLabels;
    } else {
      list.hiddenLabels = hidden;
    }
  }
  next.list = list;
  return next;
}
