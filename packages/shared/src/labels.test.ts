import { describe, expect, it } from 'vitest';

import type { ListDocument } from './listDocument';
import {
  groupItemsByLabel,
  isHexColor,
  labelForItem,
  makeUniqueLabelId,
  slugifyLabelName,
} from './labels';

function item(id: string, note: string, labelId?: string, extra: { checked?: boolean } = {}) {
  return {
    id,
    note,
    quantity: 1,
    checked: extra.checked ?? false,
    isDeleted: false,
    modifiedAt: '2024-01-01T00:00:00.000Z',
    ...(labelId ? { labelId } : {}),
  };
}

function sampleDocument(): ListDocument {
  return {
    version: 2,
    list: { id: 'list-1', name: 'Groceries', modifiedAt: '2024-01-01T00:00:00.000Z' },
    items: [
      item('1', 'Milk', 'dairy'),
      item('2', 'Apples', 'produce'),
      item('3', 'Soap', 'household'),
      item('4', 'Batteries'),
      item('5', 'Cheese', 'dairy', { checked: true }),
      { ...item('6', 'Old', 'dairy'), isDeleted: true },
      item('7', 'Butter', 'dairy'),
    ],
    labels: [
      { id: 'produce', name: 'Produce', color: '#4CAF50' },
      { id: 'dairy', name: 'Dairy', color: '#2196F3' },
    ],
  };
}

describe('slugifyLabelName', () => {
  it('lowercases and dashes names', () => {
    expect(slugifyLabelName('Personal Care')).toBe('personal-care');
  });

  it('drops punctuation', () => {
    expect(slugifyLabelName("Kid's  Stuff!")).toBe('kids-stuff');
  });

  it('falls back to "label" for empty slugs', () => {
    expect(slugifyLabelName('!!!')).toBe('label');
  });
});

describe('makeUniqueLabelId', () => {
  it('extends colliding ids with a counter', () => {
    const used = new Set(['need', 'need-1']);
    expect(makeUniqueLabelId('need', used)).toBe('need-2');
    expect(used.has('need-2')).toBe(true);
  });
});

describe('isHexColor', () => {
  it('accepts six and eight digit colors', () => {
    expect(isHexColor('#4CAF50')).toBe(true);
    expect(isHexColor('#4CAF50FF')).toBe(true);
    expect(isHexColor('green')).toBe(false);
  });
});

describe('labelForItem', () => {
  it('treats dangling references as no label', () => {
    const document = sampleDocument();
    const soap = document.items.find((entry) => entry.id === '3');
    expect(soap).toBeDefined();
    if (soap) {
      expect(labelForItem(document, soap)).toBeUndefined();
    }
  });
});

describe('groupItemsByLabel', () => {
  it('groups active items by label name with a trailing no-label group', () => {
    const groups = groupItemsByLabel(sampleDocument());

    expect(groups.map((group) => group.label?.id ?? null)).toEqual(['dairy', 'produce', null]);
    expect(groups[0]?.items.map((entry) => entry.note)).toEqual(['Butter', 'Milk', 'Cheese']);
    expect(groups[2]?.items.map((entry) => entry.note)).toEqual(['Batteries', 'Soap']);
  });

  it('omits hidden labels unless asked', () => {
    const document = sampleDocument();
    document.list.hiddenLabels = ['dairy'];

    expect(groupItemsByLabel(document).map((group) => group.label?.id ?? null)).toEqual([
      'produce',
      null,
    ]);
    expect(
      groupItemsByLabel(document, { includeHidden: true }).map((group) => group.label?.id ?? null),
    ).toEqual(['dairy', 'produce', null]);
  });
});
