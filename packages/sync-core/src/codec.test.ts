import { describe, expect, it } from 'vitest';

import type { ListDocument } from '@listsync/shared';
import {
  addItem,
  createLabel,
  createListDocument,
  softDeleteItem,
  updateItem,
  updateLabel,
} from '@listsync/shared';

import { decodeListDocument, encodeListDocument, safeDecodeListDocument } from './codec';
import { DocumentDecodeError } from './errors';

const T0 = new Date('2024-03-01T10:00:00.000Z');
const T1 = new Date('2024-03-01T10:05:00.000Z');

function decodeError(input: string): DocumentDecodeError {
  const result = safeDecodeListDocument(input);
  if (result.success) {
    throw new Error('Expected decoding to fail');
  }
  return result.error;
}

describe('encodeListDocument', () => {
  it('sorts keys at every depth and indents by two spaces', () => {
    const document: ListDocument = {
      version: 2,
      list: { name: 'Groceries', modifiedAt: '2024-03-01T10:00:00.000Z', id: 'list-1' },
      labels: [],
      items: [],
    };

    expect(encodeListDocument(document).toString('utf8')).toBe(
      [
        '{',
        '  "items": [],',
        '  "labels": [],',
        '  "list": {',
        '    "id": "list-1",',
        '    "modifiedAt": "2024-03-01T10:00:00.000Z",',
        '    "name": "Groceries"',
        '  },',
        '  "version": 2',
        '}',
      ].join('\n'),
    );
  });

  it('produces identical bytes regardless of property order', () => {
    const a: ListDocument = {
      version: 2,
      list: { id: 'list-1', name: 'Groceries', modifiedAt: '2024-03-01T10:00:00.000Z' },
      items: [
        {
          id: '1',
          note: 'Milk',
          quantity: 1,
          checked: false,
          modifiedAt: '2024-03-01T10:00:00.000Z',
          isDeleted: false,
        },
      ],
      labels: [{ id: 'dairy', name: 'Dairy', color: '#2196F3' }],
    };
    const b: ListDocument = {
      labels: [{ color: '#2196F3', name: 'Dairy', id: 'dairy' }],
      items: [
        {
          isDeleted: false,
          modifiedAt: '2024-03-01T10:00:00.000Z',
          checked: false,
          quantity: 1,
          note: 'Milk',
          id: '1',
        },
      ],
      list: { modifiedAt: '2024-03-01T10:00:00.000Z', name: 'Groceries', id: 'list-1' },
      version: 2,
    };

    expect(encodeListDocument(a).equals(encodeListDocument(b))).toBe(true);
  });

  it('always writes the current version', () => {
    const document = createListDocument({ name: 'Old', id: 'list-1' }, T0);
    document.version = 1;
    const json: unknown = JSON.parse(encodeListDocument(document).toString('utf8'));
    expect(json).toMatchObject({ version: 2 });
  });
});

describe('decodeListDocument', () => {
  it('round-trips documents built through the mutation API', () => {
    let document = createListDocument({ name: 'Groceries', id: 'list-1' }, T0);
    const label = createLabel(document, { name: 'Dairy', color: '#2196F3' }, T0);
    const milk = addItem(
      label.document,
      {
        note: 'Milk',
        quantity: 2,
        labelId: label.label.id,
        markdownNotes: '**2%**',
        reminderDate: '2024-03-02T08:00:00.000Z',
        reminderRepeatInterval: 'weekly',
        reminderRepeatMode: 'afterComplete',
      },
      T0,
    );
    const eggs = addItem(milk.document, { note: 'Eggs', checked: true }, T0);
    document = softDeleteItem(eggs.document, eggs.item.id, T1);

    const decoded = decodeListDocument(encodeListDocument(document));

    expect(decoded.document).toEqual(document);
    expect(decoded.notices).toEqual([]);
    expect(decoded.sourceVersion).toBe(2);
  });

  it('round-trips values the mutation API normalizes', () => {
    const created = createListDocument({ name: 'Groceries', id: 'list-1', icon: '' }, T0);
    const labeled = createLabel(created, { name: 'Dairy', color: ' #2196F3 ' }, T0);
    const milk = addItem(
      labeled.document,
      { note: 'Milk', reminderDate: '2024-03-02T09:00:00+01:00' },
      T0,
    );
    const bread = addItem(milk.document, { note: 'Bread' }, T0);
    const document = updateItem(
      bread.document,
      bread.item.id,
      { reminderDate: 'Sat, 02 Mar 2024 12:30:00 GMT' },
      T1,
    );

    expect(document.list).not.toHaveProperty('icon');
    expect(labeled.label.color).toBe('#2196F3');
    expect(milk.item.reminderDate).toBe('2024-03-02T08:00:00.000Z');
    expect(document.items[1]?.reminderDate).toBe('2024-03-02T12:30:00.000Z');

    const decoded = decodeListDocument(encodeListDocument(document));

    expect(decoded.document).toEqual(document);
    expect(decoded.notices).toEqual([]);
  });

  it('rejects values the document format cannot hold', () => {
    const document = createListDocument({ name: 'Groceries', id: 'list-1' }, T0);
    const milk = addItem(document, { note: 'Milk' }, T0);
    const labeled = createLabel(document, { name: 'Dairy', color: '#2196F3' }, T0);

    expect(() => addItem(document, { note: 'Eggs', reminderDate: 'tomorrow' }, T0)).toThrow(
      'Invalid reminder date: tomorrow',
    );
    expect(() => updateItem(milk.document, milk.item.id, { reminderDate: 'tomorrow' }, T1)).toThrow(
      'Invalid reminder date: tomorrow',
    );
    expect(() => createLabel(document, { name: 'Dairy', color: '' }, T0)).toThrow(
      'Label color must not be empty',
    );
    expect(() => updateLabel(labeled.document, labeled.label.id, { color: ' ' }, T1)).toThrow(
      'Label color must not be empty',
    );
  });

  it('applies fallbacks and records a notice for each', () => {
    const input = JSON.stringify({
      list: { id: 'abc' },
      items: [{ id: '1', note: 'Milk', quantity: -2, checked: 'yes', modifiedAt: 'not a date' }],
    });

    const decoded = decodeListDocument(input, { now: T0 });

    expect(decoded.sourceVersion).toBe(1);
    expect(decoded.document).toEqual({
      version: 2,
      list: { id: 'abc', name: 'Unnamed List', modifiedAt: '2024-03-01T10:00:00.000Z' },
      items: [
        {
          id: '1',
          note: 'Milk',
          quantity: 1,
          checked: false,
          modifiedAt: '2024-03-01T10:00:00.000Z',
          isDeleted: false,
        },
      ],
      labels: [],
    });
    expect(decoded.notices).toEqual([
      'version: missing, assuming 1',
      'labels: missing, using none',
      'list name: missing, using "Unnamed List"',
      'list modifiedAt: missing timestamp, using current time',
      'item 1 quantity: invalid quantity -2, using 1',
      'item 1 checked: expected boolean, using false',
      'item 1 modifiedAt: invalid timestamp "not a date", using current time',
      'upgraded from version 1 (1 items, 0 labels)',
    ]);
  });

  it('replaces epoch timestamps with the current time', () => {
    const input = JSON.stringify({
      version: 2,
      list: { id: 'abc', name: 'Groceries', modifiedAt: '1970-01-01T00:00:00Z' },
      items: [],
      labels: [],
    });

    const decoded = decodeListDocument(input, { now: T1 });

    expect(decoded.document.list.modifiedAt).toBe('2024-03-01T10:05:00.000Z');
    expect(decoded.notices).toEqual([
      'list modifiedAt: invalid timestamp "1970-01-01T00:00:00Z", using current time',
    ]);
  });

  it('ignores unknown fields and a byte order mark', () => {
    const input =
      '\uFEFF' +
      JSON.stringify({
        version: 3,
        future: { flag: true },
        list: { id: 'abc', name: 'Groceries', modifiedAt: '2024-03-01T10:00:00.000Z', theme: 'x' },
        items: [],
        labels: [{ id: 'dairy', name: 'Dairy', color: '#2196F3', emoji: 'milk' }],
      });

    const decoded = decodeListDocument(input);

    expect(decoded.sourceVersion).toBe(3);
    expect(decoded.document.labels).toEqual([{ id: 'dairy', name: 'Dairy', color: '#2196F3' }]);
    expect(decoded.document.list).toEqual({
      id: 'abc',
      name: 'Groceries',
      modifiedAt: '2024-03-01T10:00:00.000Z',
    });
    expect(decoded.notices).toEqual([]);
  });

  it('keeps dangling label references and drops unknown reminder values', () => {
    const input = JSON.stringify({
      version: 2,
      list: { id: 'abc', name: 'Groceries', modifiedAt: '2024-03-01T10:00:00.000Z' },
      items: [
        {
          id: '1',
          note: 'Soap',
          quantity: 1,
          checked: false,
          isDeleted: false,
          modifiedAt: '2024-03-01T10:00:00.000Z',
          labelId: 'deleted-label',
          reminderRepeatInterval: 'hourly',
        },
      ],
      labels: [],
    });

    const decoded = decodeListDocument(input);
    const item = decoded.document.items[0];

    expect(item?.labelId).toBe('deleted-label');
    expect(item).not.toHaveProperty('reminderRepeatInterval');
    expect(decoded.notices).toEqual([
      'item 1 reminderRepeatInterval: unknown value "hourly", dropped',
    ]);
  });

  it('fills in label names and colors', () => {
    const input = JSON.stringify({
      version: 2,
      list: { id: 'abc', name: 'Groceries', modifiedAt: '2024-03-01T10:00:00.000Z' },
      items: [],
      labels: [{ id: 'misc' }, { id: 'odd', name: 'Odd', color: 'purple' }],
    });

    const decoded = decodeListDocument(input);

    expect(decoded.document.labels).toEqual([
      { id: 'misc', name: 'misc', color: '#808080' },
      { id: 'odd', name: 'Odd', color: 'purple' },
    ]);
    expect(decoded.notices).toEqual([
      'label misc name: missing, using id',
      'label misc color: missing, using #808080',
      'label odd color: purple is not a hex color',
    ]);
  });

  it('rejects input that is not JSON', () => {
    expect(() => decodeListDocument('{ not json')).toThrow(DocumentDecodeError);
  });

  it('rejects a top-level value that is not an object', () => {
    expect(decodeError('[]').reason).toBe('top-level value is not an object');
  });

  it('rejects a document without a list id', () => {
    expect(decodeError(JSON.stringify({ list: { name: 'x' }, items: [] })).reason).toBe(
      'list.id: Required',
    );
  });

  it('rejects an item without a note', () => {
    const input = JSON.stringify({ version: 2, list: { id: 'abc' }, items: [{ id: '1' }] });
    const error = decodeError(input);
    expect(error.reason).toBe('items.0.note: Required');
    expect(error.message).toBe('Failed to decode list document: items.0.note: Required');
  });
});

describe('legacy documents', () => {
  const legacy = JSON.stringify({
    list: {
      id: 'local-abc',
      name: 'Groceries',
      modifiedAt: '2024-03-01T10:00:00Z',
      extras: { listsForMealieListIcon: 'cart', hiddenLabels: 'old-1, old-2' },
    },
    labels: [
      { id: 'old-1', name: 'Dairy', color: '#2196F3' },
      { id: 'old-2', name: 'Dairy', color: '#000000' },
    ],
    items: [
      {
        id: '1',
        note: 'Milk',
        quantity: 1,
        checked: false,
        isDeleted: false,
        modifiedAt: '2024-03-01T10:00:00Z',
        label: { id: 'old-1', name: 'Dairy' },
        extras: { markdownNotes: '2%' },
      },
      {
        id: '2',
        note: 'Soap',
        quantity: 1,
        checked: false,
        isDeleted: false,
        modifiedAt: '2024-03-01T10:00:00Z',
        labelId: 'gone',
      },
    ],
  });

  it('upgrades ids, labels and extras', () => {
    const decoded = decodeListDocument(legacy);

    expect(decoded.sourceVersion).toBe(1);
    expect(decoded.document.version).toBe(2);
    expect(decoded.document.list).toEqual({
      id: 'abc',
      name: 'Groceries',
      modifiedAt: '2024-03-01T10:00:00.000Z',
      icon: 'cart',
      hiddenLabels: ['dairy', 'dairy-1'],
    });
    expect(decoded.document.labels.map((label) => label.id)).toEqual(['dairy', 'dairy-1']);
    expect(decoded.document.items[0]?.labelId).toBe('dairy');
    expect(decoded.document.items[0]?.markdownNotes).toBe('2%');
    expect(decoded.document.items[1]?.labelId).toBe('gone');
    expect(decoded.notices).toContain('list id: removed legacy prefix from local-abc');
  });

  it('encodes upgraded documents as the current version', () => {
    const upgraded = decodeListDocument(legacy).document;
    const again = decodeListDocument(encodeListDocument(upgraded));

    expect(again.sourceVersion).toBe(2);
    expect(again.document).toEqual(upgraded);
  });
});
