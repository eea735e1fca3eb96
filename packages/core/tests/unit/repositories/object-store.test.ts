/**
 * Object Store Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { InMemoryObjectStore, compareBy } from '../../../src/repositories/object-store';

interface Item {
  id: string;
  name: string;
  rank: number;
  at: Date;
}

const items: Item[] = [
  { id: '1', name: 'beta', rank: 2, at: new Date('2026-01-02T00:00:00Z') },
  { id: '2', name: 'alpha', rank: 1, at: new Date('2026-01-03T00:00:00Z') },
  { id: '3', name: 'gamma', rank: 2, at: new Date('2026-01-01T00:00:00Z') },
];

describe('InMemoryObjectStore', () => {
  it('should keep insertion order without sort keys', () => {
    const store = new InMemoryObjectStore<Item>();
    items.forEach((item) => store.insert(item));

    expect(store.query().map((i) => i.id)).toEqual(['1', '2', '3']);
  });

  it('should filter and sort by several keys', () => {
    const store = new InMemoryObjectStore<Item>();
    items.forEach((item) => store.insert(item));

    const result = store.query(
      (item) => item.name !== 'alpha',
      [
        { key: 'rank', order: 'desc' },
        { key: 'at', order: 'asc' },
      ],
    );

    expect(result.map((i) => i.id)).toEqual(['3', '1']);
  });

  it('should delete and look up by id', () => {
    const store = new InMemoryObjectStore<Item>();
    items.forEach((item) => store.insert(item));

    store.delete(items[0]);

    expect(store.get('1')).toBeUndefined();
    expect(store.get('2')).toBe(items[1]);
    store.clear();
    expect(store.query()).toEqual([]);
  });
});

describe('compareBy', () => {
  it('should compare strings with localeCompare', () => {
    const sorted = [...items].sort(compareBy<Item>([{ key: 'name', order: 'asc' }]));

    expect(sorted.map((i) => i.name)).toEqual(['alpha', 'beta', 'gamma']);
  });

  it('should compare dates by time', () => {
    const sorted = [...items].sort(compareBy<Item>([{ key: 'at', order: 'desc' }]));

    expect(sorted.map((i) => i.id)).toEqual(['2', '1', '3']);
  });
});
