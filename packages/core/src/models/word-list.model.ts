import { randomUUID } from 'crypto';
import type { WordList } from '@wordmemo/shared';

export const WORD_LIST_SCHEMA_VERSION = 1;

export const DEFAULT_LIST_NAME = 'Default List';
export const NEW_LIST_NAME = 'New List';

/**
 * 创建空单词本，空白名称回退为默认名
 */
export function createWordList(name: string, now: Date): WordList {
  const trimmed = name.trim();
  return {
    id: randomUUID(),
    name: trimmed.length > 0 ? trimmed : NEW_LIST_NAME,
    createdAt: now,
    updatedAt: now,
    lastUsedAt: now,
    schemaVersion: WORD_LIST_SCHEMA_VERSION,
    entries: [],
  };
}

/**
 * 推进 updatedAt，时间只增不减
 */
export function markUpdated(list: WordList, at: Date): void {
  if (at.getTime() > list.updatedAt.getTime()) {
    list.updatedAt = at;
  }
}

/**
 * 记录一次使用（选中单词本）
 */
export function touchUsage(list: WordList, at: Date): void {
  list.lastUsedAt = at.getTime() < list.createdAt.getTime() ? list.createdAt : at;
  markUpdated(list, at);
}

export function findEntry(list: WordList, entryId: string) {
  return list.entries.find((e) => e.id === entryId);
}
