export const CURRENT_DOCUMENT_VERSION = 2 as const;

/**
 * Prefix carried by list ids written by the first app generation.
 * Identity comparisons always go through {@link normalizeListId}.
 */
export const LEGACY_ID_PREFIX = 'local-';

export const DEFAULT_LIST_NAME = 'Unnamed List';
export const DEFAULT_LIST_ICON = 'checklist';

export const REMINDER_REPEAT_INTERVALS = [
  'none',
  'daily',
  'weekly',
  'biweekly',
  'monthly',
  'yearly',
] as const;
export type ReminderRepeatInterval = (typeof REMINDER_REPEAT_INTERVALS)[number];

export const REMINDER_REPEAT_MODES = ['fixed', 'afterComplete'] as const;
export type ReminderRepeatMode = (typeof REMINDER_REPEAT_MODES)[number];

export interface ListSummary {
  id: string;
  name: string;
  modifiedAt: string; // ISO 8601
  icon?: string;
  /**
   * Label ids whose items are hidden from the default view.
   */
  hiddenLabels?: string[];
}

export interface ListItem {
  id: string; // Merge key, never regenerated
  note: string;
  quantity: number;
  checked: boolean;
  /**
   * Reference to a label in the same document. May dangle after the label is
   * deleted; a dangling reference reads as "no label".
   */
  labelId?: string;
  modifiedAt: string; // ISO 8601
  isDeleted: boolean;
  deletedAt?: string; // ISO 8601
  markdownNotes?: string;
  // Reminder fields are carried through merges untouched.
  reminderDate?: string; // ISO 8601
  reminderRepeatInterval?: ReminderRepeatInterval;
  reminderRepeatMode?: ReminderRepeatMode;
}

export interface ListLabel {
  id: string;
  name: string;
  color: string; // Hex, e.g. #4CAF50
}

export interface ListDocument {
  version: number;
  list: ListSummary;
  items: ListItem[];
  labels: ListLabel[];
}

export function normalizeListId(id: string): string {
  return id.startsWith(LEGACY_ID_PREFIX) ? id.slice(LEGACY_ID_PREFIX.length) : id;
}

export function isReminderRepeatInterval(value: unknown): value is ReminderRepeatInterval {
  return (
    typeof value === 'string' && REMINDER_REPEAT_INTERVALS.some((interval) => interval === value)
  );
}

export function isReminderRepeatMode(value: unknown): value is ReminderRepeatMode {
  return typeof value === 'string' && REMINDER_REPEAT_MODES.some((mode) => mode === value);
}

export function cloneListSummary(list: ListSummary): ListSummary {
  return {
    ...list,
    ...(list.hiddenLabels ? { hiddenLabels: [...list.hiddenLabels] } : {}),
  };
}

export function cloneListDocument(document: ListDocument): ListDocument {
  return {
    version: document.version,
    list: cloneListSummary(document.list),
    items: document.items.map((item) => ({ ...item })),
    labels: document.labels.map((label) => ({ ...label })),
  };
}

export function activeItems(document: ListDocument): ListItem[] {
  return document.items.filter((item) => !item.isDeleted);
}

export function deletedItems(document: ListDocument): ListItem[] {
  return document.items.filter((item) => item.isDeleted);
}

export function findItem(document: ListDocument, itemId: string): ListItem | undefined {
  return document.items.find((item) => item.id === itemId);
}

/**
 * Unchecked items first, then alphabetical by note.
 */
export function sortItemsForDisplay(items: ListItem[]): ListItem[] {
  return [...items].sort((a, b) => {
    if (a.checked !== b.checked) {
      return a.checked ? 1 : -1;
    }
    return a.note.localeCompare(b.note);
  });
}
