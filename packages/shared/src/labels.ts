import type { ListDocument, ListItem, ListLabel } from './listDocument';
import { activeItems, sortItemsForDisplay } from './listDocument';

export const DEFAULT_LABEL_COLOR = '#808080';

const HEX_COLOR_PATTERN = /^#(?:[0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/;

/**
 * Common grocery labels offered when a list is created.
 */
export const COMMON_LABEL_PRESETS: ReadonlyArray<{ name: string; color: string }> = [
  { name: 'Produce', color: '#4CAF50' },
  { name: 'Dairy', color: '#2196F3' },
  { name: 'Meat', color: '#F44336' },
  { name: 'Bakery', color: '#FF9800' },
  { name: 'Frozen', color: '#00BCD4' },
  { name: 'Pantry', color: '#9C27B0' },
  { name: 'Snacks', color: '#FFEB3B' },
  { name: 'Beverages', color: '#795548' },
  { name: 'Household', color: '#607D8B' },
  { name: 'Personal Care', color: '#E91E63' },
];

export function isHexColor(value: string): boolean {
  return HEX_COLOR_PATTERN.test(value);
}

export function slugifyLabelName(name: string): string {
  const slug = name
    .trim()
    .toLowerCase()
    .replace(/\s+/g, '-')
    .replace(/[^\p{L}\p{N}-]/gu, '')
    .replace(/-{2,}/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug || 'label';
}

/**
 * Extends `baseId` with `-1`, `-2`, ... until it no longer collides.
 * The chosen id is added to `usedIds`.
 */
export function makeUniqueLabelId(baseId: string, usedIds: Set<string>): string {
  let candidate = baseId;
  let counter = 1;
  while (usedIds.has(candidate)) {
    candidate = `${baseId}-${counter}`;
    counter += 1;
  }
  usedIds.add(candidate);
  return candidate;
}

export function labelForItem(document: ListDocument, item: ListItem): ListLabel | undefined {
  if (!item.labelId) {
    return undefined;
  }
  return document.labels.find((label) => label.id === item.labelId);
}

export interface LabelGroup {
  /**
   * `undefined` for the "no label" group, which also collects items whose
   * label reference dangles.
   */
  label: ListLabel | undefined;
  items: ListItem[];
}

export function groupItemsByLabel(
  document: ListDocument,
  options: { includeHidden?: boolean } = {},
): LabelGroup[] {
  const hidden = new Set(options.includeHidden ? [] : (document.list.hiddenLabels ?? []));
  const byLabel = new Map<string, ListItem[]>();
  const unlabeled: ListItem[] = [];

  for (const item of activeItems(document)) {
    const label = labelForItem(document, item);
    if (!label) {
      unlabeled.push(item);
      continue;
    }
    if (hidden.has(label.id)) {
      continue;
    }
    const bucket = byLabel.get(label.id);
    if (bucket) {
      bucket.push(item);
    } else {
      byLabel.set(label.id, [item]);
    }
  }

  const groups: LabelGroup[] = [...document.labels]
    .filter((label) => byLabel.has(label.id))
    .sort((a, b) => a.name.localeCompare(b.name))
    .map((label) => ({ label, items: sortItemsForDisplay(byLabel.get(label.id) ?? []) }));

  if (unlabeled.length > 0) {
    groups.push({ label: undefined, items: sortItemsForDisplay(unlabeled) });
  }
  return groups;
}
