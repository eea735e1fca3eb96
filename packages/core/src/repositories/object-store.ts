/**
 * 对象存储接口
 *
 * 核心逻辑只依赖 insert / delete / query 三个操作，
 * 具体实现可以是内存、本地快照或任何外部数据库。
 */

import type { SortOrder } from '@wordmemo/shared';

export interface SortDescriptor<T> {
  key: keyof T & string;
  order: SortOrder;
}

export interface ObjectStore<T extends { id: string }> {
  insert(record: T): void;
  delete(record: T): void;
  get(id: string): T | undefined;
  query(predicate?: (record: T) => boolean, sortKeys?: readonly SortDescriptor<T>[]): T[];
}

type Comparable = number | string;

function toComparable(value: unknown): Comparable {
  if (value instanceof Date) return value.getTime();
  if (typeof value === 'number' || typeof value === 'string') return value;
  return Number.NEGATIVE_INFINITY;
}

function compareValues(a: unknown, b: unknown): number {
  const left = toComparable(a);
  const right = toComparable(b);
  if (typeof left === 'string' && typeof right === 'string') {
    return left.localeCompare(right);
  }
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

/**
 * 按多个排序键比较，前一个键相等时才看下一个
 */
export function compareBy<T>(sortKeys: readonly SortDescriptor<T>[]): (a: T, b: T) => number {
  return (a, b) => {
    for (const { key, order } of sortKeys) {
      const result = compareValues(a[key], b[key]);
      if (result !== 0) {
        return order === 'asc' ? result : -result;
      }
    }
    return 0;
  };
}

/**
 * 内存实现，保持插入顺序
 */
export class InMemoryObjectStore<T extends { id: string }> implements ObjectStore<T> {
  private records = new Map<string, T>();

  insert(record: T): void {
    this.records.set(record.id, record);
  }

  delete(record: T): void {
    this.records.delete(record.id);
  }

  get(id: string): T | undefined {
    return this.records.get(id);
  }

  query(predicate: (record: T) => boolean = () => true, sortKeys: readonly SortDescriptor<T>[] = []): T[] {
    const matched = [...this.records.values()].filter(predicate);
    return sortKeys.length > 0 ? matched.sort(compareBy(sortKeys)) : matched;
  }

  clear(): void {
    this.records.clear();
  }
}
