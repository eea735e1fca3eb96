/**
 * 词条排序
 *
 * Array.prototype.sort 为稳定排序，比较结果相等的元素保持原有顺序。
 */

import type { WordEntry, WordList, WordSortKey } from '@wordmemo/shared';

/** 从未复习过的词条按最早时间处理 */
const NEVER_REVIEWED = Number.NEGATIVE_INFINITY;

type Comparator<T> = (a: T, b: T) => number;

const termCollator = new Intl.Collator(undefined, { sensitivity: 'accent' });

const entryComparators: Record<WordSortKey, Comparator<WordEntry>> = {
  alphabetical: (a, b) => termCollator.compare(a.term, b.term),
  proficiency: (a, b) => b.proficiency - a.proficiency,
  modifiedAt: (a, b) => b.modifiedAt.getTime() - a.modifiedAt.getTime(),
  lastReviewedAt: (a, b) => compareDesc(reviewedTime(a), reviewedTime(b)),
};

function reviewedTime(entry: WordEntry): number {
  return entry.lastReviewedAt?.getTime() ?? NEVER_REVIEWED;
}

function compareDesc(a: number, b: number): number {
  if (a === b) return 0;
  return a > b ? -1 : 1;
}

export function sortedEntries(list: WordList, sortKey: WordSortKey): WordEntry[] {
  return [...list.entries].sort(entryComparators[sortKey]);
}
