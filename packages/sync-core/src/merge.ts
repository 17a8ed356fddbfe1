import type { ListDocument, ListItem, ListLabel } from '@listsync/shared';
import { CURRENT_DOCUMENT_VERSION, cloneListSummary } from '@listsync/shared';

/**
 * Timestamps closer than this are treated as equal, so clock jitter between
 * devices does not register as an edit.
 */
export const DEFAULT_TIMESTAMP_TOLERANCE_MS = 1000;

export interface MergeOptions {
  toleranceMs?: number;
}

export type MergeWinner = 'incoming' | 'baseline';

function timeOf(iso: string): number {
  const ms = Date.parse(iso);
  return Number.isFinite(ms) ? ms : 0;
}

/**
 * `incoming` wins only when it is newer by at least the tolerance; anything
 * closer, or older, keeps the baseline.
 */
export function pickNewer(
  incomingModifiedAt: string,
  baselineModifiedAt: string,
  toleranceMs: number,
): MergeWinner {
  return timeOf(incomingModifiedAt) - timeOf(baselineModifiedAt) >= toleranceMs
    ? 'incoming'
    : 'baseline';
}

function compareItemsNewestFirst(a: ListItem, b: ListItem): number {
  const delta = timeOf(b.modifiedAt) - timeOf(a.modifiedAt);
  if (delta !== 0) {
    return delta;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Merges two item sequences by id. Items from either side without a
 * counterpart are kept as they are. Output is sorted by `modifiedAt`
 * descending, then by id.
 */
export function mergeItems(
  incoming: readonly ListItem[],
  baseline: readonly ListItem[],
  options: MergeOptions = {},
): ListItem[] {
  const toleranceMs = options.toleranceMs ?? DEFAULT_TIMESTAMP_TOLERANCE_MS;
  const merged = new Map<string, ListItem>();
  for (const item of baseline) {
    merged.set(item.id, { ...item });
  }
  for (const item of incoming) {
    const existing = merged.get(item.id);
    if (!existing || pickNewer(item.modifiedAt, existing.modifiedAt, toleranceMs) === 'incoming') {
      merged.set(item.id, { ...item });
    }
  }
  return Array.from(merged.values()).sort(compareItemsNewestFirst);
}

/**
 * Union by id. Labels carry no timestamp, so the baseline copy always wins a
 * collision.
 */
export function mergeLabels(
  incoming: readonly ListLabel[],
  baseline: readonly ListLabel[],
): ListLabel[] {
  const merged = baseline.map((label) => ({ ...label }));
  const seen = new Set(merged.map((label) => label.id));
  for (const label of incoming) {
    if (!seen.has(label.id)) {
      seen.add(label.id);
      merged.push({ ...label });
    }
  }
  return merged;
}

export function mergeListDocuments(
  incoming: ListDocument,
  baseline: ListDocument,
  options: MergeOptions = {},
): ListDocument {
  const toleranceMs = options.toleranceMs ?? DEFAULT_TIMESTAMP_TOLERANCE_MS;
  const header =
    pickNewer(incoming.list.modifiedAt, baseline.list.modifiedAt, toleranceMs) === 'incoming'
      ? incoming.list
      : baseline.list;
  return {
    version: CURRENT_DOCUMENT_VERSION,
    list: cloneListSummary(header),
    items: mergeItems(incoming.items, baseline.items, { toleranceMs }),
    labels: mergeLabels(incoming.labels, baseline.labels),
  };
}

export interface MergeSummary {
  incomingWins: number;
  baselineWins: number;
  incomingOnly: number;
  baselineOnly: number;
  labelsAdded: number;
  labelCollisions: number;
  listHeader: MergeWinner;
}

/**
 * Counts how each id was decided by {@link mergeListDocuments}.
 */
export function summarizeMerge(
  incoming: ListDocument,
  baseline: ListDocument,
  options: MergeOptions = {},
): MergeSummary {
  const toleranceMs = options.toleranceMs ?? DEFAULT_TIMESTAMP_TOLERANCE_MS;
  const baselineItems = new Map(baseline.items.map((item) => [item.id, item]));
  const incomingIds = new Set<string>();
  const summary: MergeSummary = {
    incomingWins: 0,
    baselineWins: 0,
    incomingOnly: 0,
    baselineOnly: 0,
    labelsAdded: 0,
    labelCollisions: 0,
    listHeader: pickNewer(incoming.list.modifiedAt, baseline.list.modifiedAt, toleranceMs),
  };

  for (const item of incoming.items) {
    incomingIds.add(item.id);
    const existing = baselineItems.get(item.id);
    if (!existing) {
      summary.incomingOnly += 1;
    } else if (pickNewer(item.modifiedAt, existing.modifiedAt, toleranceMs) === 'incoming') {
      summary.incomingWins += 1;
    } else {
      summary.baselineWins += 1;
    }
  }
  for (const item of baseline.items) {
    if (!incomingIds.has(item.id)) {
      summary.baselineOnly += 1;
    }
  }

  const baselineLabels = new Set(baseline.labels.map((label) => label.id));
  for (const label of incoming.labels) {
    if (baselineLabels.has(label.id)) {
      summary.labelCollisions += 1;
    } else {
      summary.labelsAdded += 1;
    }
  }
  return summary;
}

export function formatMergeSummary(summary: MergeSummary): string {
  return (
    `items: ${summary.incomingWins} incoming / ${summary.baselineWins} baseline wins, ` +
    `${summary.incomingOnly} incoming-only, ${summary.baselineOnly} baseline-only; ` +
    `labels: ${summary.labelsAdded} added, ${summary.labelCollisions} collisions; ` +
    `list header from ${summary.listHeader}`
  );
}
