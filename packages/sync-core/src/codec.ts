import { z } from 'zod';

import type { ListDocument, ListItem, ListLabel, ListSummary } from '@listsync/shared';
import {
  CURRENT_DOCUMENT_VERSION,
  DEFAULT_LABEL_COLOR,
  DEFAULT_LIST_NAME,
  isHexColor,
  isReminderRepeatInterval,
  isReminderRepeatMode,
} from '@listsync/shared';

import { DocumentDecodeError } from './errors';
import type { LegacyHints } from './documentMigration';
import { needsMigration, upgradeLegacyDocument } from './documentMigration';

/**
 * Extension of the app's own document format. Plain `.json` files decode
 * through the same codec.
 */
export const LIST_FILE_EXTENSION = 'listsync';
export const LIST_FILE_EXTENSIONS = [LIST_FILE_EXTENSION, 'json'] as const;

const NonEmptyStringSchema = z.string().trim().min(1);

const RawListSchema = z.object({
  id: NonEmptyStringSchema,
  name: z.unknown(),
  modifiedAt: z.unknown(),
  icon: z.unknown(),
  hiddenLabels: z.unknown(),
  extras: z.unknown(),
});

const RawItemSchema = z.object({
  id: NonEmptyStringSchema,
  note: z.string(),
  quantity: z.unknown(),
  checked: z.unknown(),
  labelId: z.unknown(),
  label: z.unknown(),
  modifiedAt: z.unknown(),
  isDeleted: z.unknown(),
  deletedAt: z.unknown(),
  markdownNotes: z.unknown(),
  reminderDate: z.unknown(),
  reminderRepeatInterval: z.unknown(),
  reminderRepeatMode: z.unknown(),
  extras: z.unknown(),
});

const RawLabelSchema = z.object({
  id: NonEmptyStringSchema,
  name: z.unknown(),
  color: z.unknown(),
});

const RawDocumentSchema = z.object({
  version: z.unknown(),
  list: RawListSchema,
  items: z.array(RawItemSchema),
  labels: z.array(RawLabelSchema).optional(),
});

type RawItem = z.infer<typeof RawItemSchema>;
type RawLabel = z.infer<typeof RawLabelSchema>;
type RawList = z.infer<typeof RawListSchema>;

export interface DecodedListDocument {
  document: ListDocument;
  /**
   * One entry per fallback applied while decoding.
   */
  notices: string[];
  /**
   * Version found in the input (1 when absent).
   */
  sourceVersion: number;
}

export type SafeDecodeResult =
  | { success: true; value: DecodedListDocument }
  | { success: false; error: DocumentDecodeError };

export interface DecodeOptions {
  /**
   * Fallback for missing or invalid timestamps. Defaults to the current time.
   */
  now?: Date;
}

// Encoding

function sortKeysDeep(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((entry) => sortKeysDeep(entry));
  }
  if (value !== null && typeof value === 'object') {
    const entries: Array<[string, unknown]> = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const sorted: Record<string, unknown> = {};
    for (const [key, entry] of entries) {
      if (entry !== undefined) {
        sorted[key] = sortKeysDeep(entry);
      }
    }
    return sorted;
  }
  return value;
}

/**
 * Serializes deterministically: keys sorted at every depth, two-space
 * indentation, current version number.
 */
export function encodeListDocument(document: ListDocument): Buffer {
  const envelope = { ...document, version: CURRENT_DOCUMENT_VERSION };
  return Buffer.from(JSON.stringify(sortKeysDeep(envelope), null, 2), 'utf8');
}

// Decoding

function bytesToText(bytes: Uint8Array | string): string {
  const text =
    typeof bytes === 'string'
      ? bytes
      : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('utf8');
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return 'invalid document';
  }
  const location = issue.path.length > 0 ? issue.path.join('.') : 'document';
  return `${location}: ${issue.message}`;
}

function readExtras(value: unknown): Record<string, string> {
  const extras: Record<string, string> = {};
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return extras;
  }
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'string') {
      extras[key] = entry;
    }
  }
  return extras;
}

function readOptionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

class FieldReader {
  constructor(
    private readonly notices: string[],
    private readonly nowIso: string,
  ) {}

  timestamp(value: unknown, field: string): string {
    const parsed = this.parseTimestamp(value);
    if (parsed !== undefined) {
      return parsed;
    }
    this.notices.push(
      value === undefined
        ? `${field}: missing timestamp, using current time`
        : `${field}: invalid timestamp ${JSON.stringify(value)}, using current time`,
    );
    return this.nowIso;
  }

  optionalTimestamp(value: unknown, field: string): string | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }
    const parsed = this.parseTimestamp(value);
    if (parsed === undefined) {
      this.notices.push(`${field}: invalid timestamp ${JSON.stringify(value)}, dropped`);
    }
    return parsed;
  }

  boolean(value: unknown, field: string): boolean {
    if (typeof value === 'boolean') {
      return value;
    }
    if (value !== undefined && value !== null) {
      this.notices.push(`${field}: expected boolean, using false`);
    }
    return false;
  }

  quantity(value: unknown, field: string): number {
    if (typeof value === 'number' && Number.isFinite(value) && value >= 0) {
      return value;
    }
    if (value !== undefined && value !== null) {
      this.notices.push(`${field}: invalid quantity ${JSON.stringify(value)}, using 1`);
    }
    return 1;
  }

  unknownValue(value: unknown, field: string): void {
    if (value !== undefined && value !== null) {
      this.notices.push(`${field}: unknown value ${JSON.stringify(value)}, dropped`);
    }
  }

  private parseTimestamp(value: unknown): string | undefined {
    if (typeof value !== 'string' || value.trim().length === 0) {
      return undefined;
    }
    const ms = Date.parse(value);
    if (!Number.isFinite(ms) || ms <= 0) {
      return undefined;
    }
    return new Date(ms).toISOString();
  }
}

function readVersion(value: unknown, notices: string[]): number {
  if (typeof value === 'number' && Number.isInteger(value) && value >= 1) {
    return value;
  }
  notices.push(
    value === undefined
      ? 'version: missing, assuming 1'
      : `version: invalid ${JSON.stringify(value)}, assuming 1`,
  );
  return 1;
}

function readList(raw: RawList, reader: FieldReader, notices: string[]): ListSummary {
  let name = DEFAULT_LIST_NAME;
  if (typeof raw.name === 'string' && raw.name.trim().length > 0) {
    name = raw.name;
  } else {
    notices.push(`list name: missing, using "${DEFAULT_LIST_NAME}"`);
  }

  const list: ListSummary = {
    id: raw.id,
    name,
    modifiedAt: reader.timestamp(raw.modifiedAt, 'list modifiedAt'),
  };

  const icon = readOptionalString(raw.icon);
  if (icon) {
    list.icon = icon;
  }

  if (Array.isArray(raw.hiddenLabels)) {
    const hidden = raw.hiddenLabels.filter(
      (entry): entry is string => typeof entry === 'string' && entry.length > 0,
    );
    if (hidden.length > 0) {
      list.hiddenLabels = hidden;
    }
  }

  return list;
}

function readItem(raw: RawItem, reader: FieldReader): ListItem {
  const field = (name: string) => `item ${raw.id} ${name}`;
  const item: ListItem = {
    id: raw.id,
    note: raw.note,
    quantity: reader.quantity(raw.quantity, field('quantity')),
    checked: reader.boolean(raw.checked, field('checked')),
    modifiedAt: reader.timestamp(raw.modifiedAt, field('modifiedAt')),
    isDeleted: reader.boolean(raw.isDeleted, field('isDeleted')),
  };

  const labelId = readOptionalString(raw.labelId);
  if (labelId) {
    item.labelId = labelId;
  }
  const deletedAt = reader.optionalTimestamp(raw.deletedAt, field('deletedAt'));
  if (deletedAt) {
    item.deletedAt = deletedAt;
  }
  const markdownNotes = readOptionalString(raw.markdownNotes);
  if (markdownNotes) {
    item.markdownNotes = markdownNotes;
  }
  const reminderDate = reader.optionalTimestamp(raw.reminderDate, field('reminderDate'));
  if (reminderDate) {
    item.reminderDate = reminderDate;
  }
  if (isReminderRepeatInterval(raw.reminderRepeatInterval)) {
    item.reminderRepeatInterval = raw.reminderRepeatInterval;
  } else {
    reader.unknownValue(raw.reminderRepeatInterval, field('reminderRepeatInterval'));
  }
  if (isReminderRepeatMode(raw.reminderRepeatMode)) {
    item.reminderRepeatMode = raw.reminderRepeatMode;
  } else {
    reader.unknownValue(raw.reminderRepeatMode, field('reminderRepeatMode'));
  }
  return item;
}

function readLabel(raw: RawLabel, notices: string[]): ListLabel {
  let name = raw.id;
  if (typeof raw.name === 'string' && raw.name.length > 0) {
    name = raw.name;
  } else {
    notices.push(`label ${raw.id} name: missing, using id`);
  }

  let color = DEFAULT_LABEL_COLOR;
  if (typeof raw.color === 'string' && raw.color.length > 0) {
    color = raw.color;
    if (!isHexColor(color)) {
      notices.push(`label ${raw.id} color: ${color} is not a hex color`);
    }
  } else {
    notices.push(`label ${raw.id} color: missing, using ${DEFAULT_LABEL_COLOR}`);
  }

  return { id: raw.id, name, color };
}

function collectLegacyHints(rawList: RawList, rawItems: RawItem[]): LegacyHints {
  const items: LegacyHints['items'] = new Map();
  for (const raw of rawItems) {
    const embedded = raw.label;
    let embeddedLabelId: string | undefined;
    if (embedded !== null && typeof embedded === 'object' && 'id' in embedded) {
      embeddedLabelId = readOptionalString(embedded.id);
    }
    items.set(raw.id, {
      ...(embeddedLabelId ? { embeddedLabelId } : {}),
      extras: readExtras(raw.extras),
    });
  }
  return { listExtras: readExtras(rawList.extras), items };
}

/**
 * Tolerant decode. Every field has a fallback; only input that is not a JSON
 * object, lacks `list.id`, or has an item without `id`/`note` is rejected.
 * Unknown fields are ignored.
 */
export function decodeListDocument(
  bytes: Uint8Array | string,
  options: DecodeOptions = {},
): DecodedListDocument {
  let json: unknown;
  try {
    json = JSON.parse(bytesToText(bytes));
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new DocumentDecodeError(`not valid JSON (${detail})`, undefined, { cause: err });
  }

  if (json === null || typeof json !== 'object' || Array.isArray(json)) {
    throw new DocumentDecodeError('top-level value is not an object');
  }

  const parsed = RawDocumentSchema.safeParse(json);
  if (!parsed.success) {
    throw new DocumentDecodeError(describeIssue(parsed.error), undefined, {
      cause: parsed.error,
    });
  }

  const raw = parsed.data;
  const notices: string[] = [];
  const reader = new FieldReader(notices, (options.now ?? new Date()).toISOString());
  const sourceVersion = readVersion(raw.version, notices);

  if (raw.labels === undefined) {
    notices.push('labels: missing, using none');
  }

  const document: ListDocument = {
    version: sourceVersion,
    list: readList(raw.list, reader, notices),
    items: raw.items.map((item) => readItem(item, reader)),
    labels: (raw.labels ?? []).map((label) => readLabel(label, notices)),
  };

  if (needsMigration(sourceVersion)) {
    const upgraded = upgradeLegacyDocument(
      document,
      collectLegacyHints(raw.list, raw.items),
      notices,
    );
    return { document: upgraded, notices, sourceVersion };
  }

  document.version = CURRENT_DOCUMENT_VERSION;
  return { document, notices, sourceVersion };
}

export function safeDecodeListDocument(
  bytes: Uint8Array | string,
  options: DecodeOptions = {},
): SafeDecodeResult {
  try {
    return { success: true, value: decodeListDocument(bytes, options) };
  } catch (err) {
    if (err instanceof DocumentDecodeError) {
      return { success: false, error: err };
    }
    throw err;
  }
}
