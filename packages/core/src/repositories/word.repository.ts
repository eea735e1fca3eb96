/**
 * 单词本仓库
 *
 * 单词本独占词条：
 * - 删除单词本时级联删除其全部词条
 * - 单独删除词条时先解除原型 / 派生关系（nullify），再从单词本移除
 */

import type { WordEntry, WordList, WordMemoSnapshot } from '@wordmemo/shared';
import { SNAPSHOT_VERSION } from '@wordmemo/shared';
import { AppError } from '../errors';
import { storeLogger } from '../logger';
import { RelationGraphService } from '../services/relation-graph.service';
import { InMemoryObjectStore, type ObjectStore, type SortDescriptor } from './object-store';

/** 单词本默认排序：最近使用优先 */
export const LIST_SORT_KEYS: readonly SortDescriptor<WordList>[] = [
  { key: 'lastUsedAt', order: 'desc' },
  { key: 'createdAt', order: 'desc' },
];

export class WordRepository {
  constructor(
    private readonly lists: ObjectStore<WordList> = new InMemoryObjectStore<WordList>(),
    private readonly graph: RelationGraphService = new RelationGraphService(),
  ) {}

  insertList(list: WordList): void {
    this.lists.insert(list);
  }

  /**
   * 删除单词本（级联删除词条）
   */
  deleteList(list: WordList): void {
    const count = list.entries.length;
    for (const entry of list.entries) {
      entry.listId = null;
    }
    list.entries = [];
    this.lists.delete(list);
    storeLogger.debug({ listId: list.id, entries: count }, 'word list deleted with entries');
  }

  getList(listId: string): WordList {
    const list = this.lists.get(listId);
    if (!list) {
      throw AppError.notFound(`单词本 ${listId} 不存在`);
    }
    return list;
  }

  findList(listId: string): WordList | undefined {
    return this.lists.get(listId);
  }

  queryLists(
    predicate?: (list: WordList) => boolean,
    sortKeys: readonly SortDescriptor<WordList>[] = LIST_SORT_KEYS,
  ): WordList[] {
    return this.lists.query(predicate, sortKeys);
  }

  insertEntry(list: WordList, entry: WordEntry): void {
    entry.listId = list.id;
    list.entries.push(entry);
  }

  /**
   * 删除词条，关系指针置空
   */
  deleteEntry(list: WordList, entry: WordEntry): void {
    this.graph.detachEntry(list, entry);
    list.entries = list.entries.filter((e) => e.id !== entry.id);
    entry.listId = null;
  }

  queryEntries(
    list: WordList,
    predicate: (entry: WordEntry) => boolean = () => true,
  ): WordEntry[] {
    return list.entries.filter(predicate);
  }

  // ==================== 快照 ====================

  toSnapshot(savedAt: Date): WordMemoSnapshot {
    return {
      version: SNAPSHOT_VERSION,
      savedAt,
      lists: this.lists.query(undefined, LIST_SORT_KEYS),
    };
  }

  /**
   * 用快照内容替换当前数据
   *
   * 关系索引不一致的词条会被修复：丢弃悬空引用，并按 lemmaId 重建派生词集合
   */
  loadSnapshot(snapshot: WordMemoSnapshot): void {
    for (const existing of this.lists.query()) {
      this.lists.delete(existing);
    }

    for (const list of snapshot.lists) {
      repairRelations(list);
      this.lists.insert(list);
    }
  }
}

function repairRelations(list: WordList): void {
  const ids = new Set(list.entries.map((e) => e.id));
  let repaired = 0;

  for (const entry of list.entries) {
    entry.listId = list.id;
    if (entry.lemmaId !== null && (entry.lemmaId === entry.id || !ids.has(entry.lemmaId))) {
      entry.lemmaId = null;
      repaired++;
    }
  }

  for (const entry of list.entries) {
    const rebuilt = list.entries.filter((e) => e.lemmaId === entry.id).map((e) => e.id);
    if (rebuilt.length !== entry.derivativeIds.length || rebuilt.some((id) => !entry.derivativeIds.includes(id))) {
      entry.derivativeIds = rebuilt;
      repaired++;
    }
  }

  if (repaired > 0) {
    storeLogger.warn({ listId: list.id, repaired }, 'repaired relation index from snapshot');
  }
}
