import type { ID } from './common';

/**
 * 单词条目
 *
 * `lemmaId` 与 `derivativeIds` 互为索引：A 出现在 B 的 derivativeIds 中，
 * 当且仅当 A.lemmaId === B.id。两侧只能经由关系图服务写入。
 */
export interface WordEntry {
  id: ID;
  /** 所属单词本，脱离单词本后为 null */
  listId: ID | null;
  term: string;
  pronunciation: string;
  partOfSpeech: string;
  definition: string;
  /** 熟练度 [0,100] */
  proficiency: number;
  modifiedAt: Date;
  lastReviewedAt: Date | null;
  /** 原型词 */
  lemmaId: ID | null;
  /** 派生词 */
  derivativeIds: ID[];
}

/**
 * 单词本，独占其词条（删除时级联删除）
 */
export interface WordList {
  id: ID;
  name: string;
  createdAt: Date;
  updatedAt: Date;
  lastUsedAt: Date;
  schemaVersion: number;
  entries: WordEntry[];
}

/**
 * 词条列表排序方式
 */
export type WordSortKey = 'alphabetical' | 'proficiency' | 'modifiedAt' | 'lastReviewedAt';

/**
 * 复习进度概览（首页计数）
 */
export interface DueSummary {
  /** 今天尚未复习的待学词条数 */
  remaining: number;
  /** 待学词条总数 */
  total: number;
}
