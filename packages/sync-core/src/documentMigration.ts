import type { ListDocument, ListItem, ListLabel } from '@listsync/shared';
import {
  CURRENT_DOCUMENT_VERSION,
  makeUniqueLabelId,
  normalizeListId,
  slugifyLabelName,
} from '@listsync/shared';

/**
 * Fields first-generation documents kept in free-form `extras` maps or
 * embedded label objects.
 */
export interface LegacyHints {
  listExtras: Record<string, string>;
  items: Map<string, { embeddedLabelId?: string; extras: Record<string, string> }>;
}

const LEGACY_ICON_KEY = 'listsForMealieListIcon';
const LEGACY_HIDDEN_LABELS_KEY = 'hiddenLabels';
const LEGACY_MARKDOWN_NOTES_KEY = 'markdownNotes';

export function needsMigration(sourceVersion: number): boolean {
  return sourceVersion < CURRENT_DOCUMENT_VERSION;
}

/**
 * Upgrades a first-generation document: strips the legacy list id prefix,
 * lifts extras into typed fields and re-identifies labels by their names.
 * Item label references are remapped; unknown references stay dangling.
 */
export function upgradeLegacyDocument(
  document: ListDocument,
  hints: LegacyHints,
  notices: string[],
): ListDocument {
  const list = { ...document.list, id: normalizeListId(document.list.id) };
  if (list.id !== document.list.id) {
    notices.push(`list id: removed legacy prefix from ${document.list.id}`);
  }

  const icon = hints.listExtras[LEGACY_ICON_KEY];
  if (!list.icon && icon) {
    list.icon = icon;
  }

  const hiddenRaw = hints.listExtras[LEGACY_HIDDEN_LABELS_KEY];
  const labelIdMap = new Map<string, string>();
  const usedIds = new Set<string>();
  const labels: ListLabel[] = document.labels.map((label) => {
    const id = makeUniqueLabelId(slugifyLabelName(label.name), usedIds);
    labelIdMap.set(label.id, id);
    labelIdMap.set(normalizeListId(label.id), id);
    return { ...label, id };
  });

  if (!list.hiddenLabels && hiddenRaw) {
    const hidden = hiddenRaw
      .split(',')
      .map((value) => value.trim())
      .filter((value) => value.length > 0)
      .map((value) => labelIdMap.get(value) ?? value);
    if (hidden.length > 0) {
      list.hiddenLabels = hidden;
    }
  } else if (list.hiddenLabels) {
    list.hiddenLabels = list.hiddenLabels.map((value) => labelIdMap.get(value) ?? value);
  }

  const items: ListItem[] = document.items.map((item) => {
    const hint = hints.items.get(item.id);
    const upgraded: ListItem = { ...item };

    const sourceLabelId = hint?.embeddedLabelId ?? item.labelId;
    if (sourceLabelId) {
      upgraded.labelId =
        labelIdMap.get(sourceLabelId) ??
        labelIdMap.get(normalizeListId(sourceLabelId)) ??
        sourceLabelId;
    }

    const markdownNotes = hint?.extras[LEGACY_MARKDOWN_NOTES_KEY];
    if (!upgraded.markdownNotes && markdownNotes) {
      upgraded.markdownNotes = markdownNotes;
    }
    return upgraded;
  });

  notices.push(
    `upgraded from version ${document.version} (${items.length} items, ${labels.length} labels)`,
  );

  return {
    version: CURRENT_DOCUMENT_VERSION,
    list,
    items,
    labels,
  };
}
