/**
 * Word List Service
 * 单词本管理：首次启动、新建、选择、删除与首页计数
 */

import {
  CreateWordListSchema,
  type DueSummary,
  type WordEntry,
  WordSortKeySchema,
  type WordList,
} from '@wordmemo/shared';
import { resolveStudyConfig } from '../config/study.config';
import { eventBus as defaultEventBus, type EventBus } from '../core/event-bus';
import { AppError } from '../errors';
import { serviceLogger } from '../logger';
import { createWordEntry, isDue, type WordEntryInput } from '../models/word-entry.model';
import { createWordList, DEFAULT_LIST_NAME, touchUsage } from '../models/word-list.model';
import type { WordRepository } from '../repositories/word.repository';
import { isSameLocalDay, systemClock, type Clock } from '../utils/clock';
import { sortedEntries } from './word-sort.service';

const logger = serviceLogger.child({ module: 'word-list' });

/** 首次启动的示例词条 */
export const SAMPLE_WORDS: readonly WordEntryInput[] = [
  { term: 'serendipity', pronunciation: '[ˌserənˈdɪpəti]', partOfSpeech: 'n.', definition: '意外收获' },
  { term: 'contemplate', pronunciation: '[ˈkɒntəmpleɪt]', partOfSpeech: 'v.', definition: '沉思' },
  { term: 'ubiquitous', pronunciation: '[juːˈbɪkwɪtəs]', partOfSpeech: 'adj.', definition: '无所不在的' },
  { term: 'synergy', pronunciation: '[ˈsɪnərdʒi]', partOfSpeech: 'n.', definition: '协同效应' },
];

export interface WordListDeps {
  repository: WordRepository;
  clock?: Clock;
  events?: EventBus;
  dueThreshold?: number;
}

export class WordListService {
  private readonly repository: WordRepository;
  private readonly clock: Clock;
  private readonly events: EventBus;
  private readonly dueThreshold: number;

  constructor(deps: WordListDeps) {
    this.repository = deps.repository;
    this.clock = deps.clock ?? systemClock;
    this.events = deps.events ?? defaultEventBus;
    this.dueThreshold = deps.dueThreshold ?? resolveStudyConfig().dueThreshold;
  }

  /**
   * 首次启动时创建默认单词本并写入示例词条，否则返回最近使用的单词本
   */
  bootstrap(): WordList {
    const [recent] = this.repository.queryLists();
    if (recent) {
      return recent;
    }

    const now = this.clock.now();
    const list = createWordList(DEFAULT_LIST_NAME, now);
    this.repository.insertList(list);
    for (const sample of SAMPLE_WORDS) {
      this.repository.insertEntry(list, createWordEntry(sample, list.id, now));
    }

    this.events.publish({ type: 'LIST_CHANGED', payload: { listId: list.id, reason: 'created', timestamp: now } });
    logger.info({ listId: list.id, entries: list.entries.length }, 'bootstrapped default word list');
    return list;
  }

  createList(name: string): WordList {
    const parsed = CreateWordListSchema.safeParse({ name });
    if (!parsed.success) {
      throw AppError.fromZod(parsed.error);
    }

    const now = this.clock.now();
    const list = createWordList(parsed.data.name, now);
    this.repository.insertList(list);
    this.events.publish({ type: 'LIST_CHANGED', payload: { listId: list.id, reason: 'created', timestamp: now } });
    return list;
  }

  /**
   * 选中单词本，记录使用时间
   */
  selectList(listId: string): WordList {
    const list = this.repository.getList(listId);
    const now = this.clock.now();
    touchUsage(list, now);
    this.events.publish({ type: 'LIST_CHANGED', payload: { listId, reason: 'used', timestamp: now } });
    return list;
  }

  deleteList(listId: string): void {
    const list = this.repository.getList(listId);
    this.repository.deleteList(list);
    this.events.publish({
      type: 'LIST_CHANGED',
      payload: { listId, reason: 'deleted', timestamp: this.clock.now() },
    });
  }

  listLists(): WordList[] {
    return this.repository.queryLists();
  }

  /**
   * 按排序方式列出词条，排序方式来自调用方输入，先校验
   */
  entries(listId: string, sortKey: string): WordEntry[] {
    const parsed = WordSortKeySchema.safeParse(sortKey);
    if (!parsed.success) {
      throw AppError.fromZod(parsed.error);
    }
    return sortedEntries(this.repository.getList(listId), parsed.data);
  }

  dueEntries(list: WordList): WordEntry[] {
    return this.repository.queryEntries(list, (entry) => isDue(entry, this.dueThreshold));
  }

  /**
   * 首页计数：今天尚未复习的待学词条 / 待学词条总数
   */
  dueSummary(list: WordList): DueSummary {
    const now = this.clock.now();
    const due = this.dueEntries(list);
    return {
      remaining: due.filter((e) => e.lastReviewedAt === null || !isSameLocalDay(e.lastReviewedAt, now)).length,
      total: due.length,
    };
  }
}
