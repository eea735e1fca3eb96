/**
 * Scoring Policy
 * 作答结果 → 熟练度增量
 *
 * | 题型     | 结果     | 增量 |
 * |----------|----------|------|
 * | 认词     | 不认识   | 0    |
 * | 认词     | 认识     | +5   |
 * | 拼写     | 错误     | 0    |
 * | 拼写     | 正确     | +30  |
 * | 选择     | 错误     | 0    |
 * | 选择     | 正确     | +15  |
 */

import type { QuestionKind, WordEntry } from '@wordmemo/shared';
import { DEFAULT_STUDY_CONFIG, type StudyConfig } from '../config/study.config';
import { clampProficiency } from '../models/word-entry.model';

export type ScoringDeltas = StudyConfig['deltas'];

/**
 * 计算增量（纯函数）
 */
export function scoreOutcome(
  kind: QuestionKind,
  correct: boolean,
  deltas: ScoringDeltas = DEFAULT_STUDY_CONFIG.deltas,
): number {
  if (!correct) return 0;

  switch (kind) {
    case 'recognition':
      return deltas.recognitionKnown;
    case 'fill-in':
      return deltas.fillInCorrect;
    case 'multiple-choice':
      return deltas.choiceCorrect;
  }
}

/**
 * 拼写比对：忽略首尾空白与大小写
 */
export function normalizeSpelling(value: string): string {
  return value.trim().toLowerCase();
}

export function isSpellingMatch(input: string, term: string): boolean {
  return normalizeSpelling(input) === normalizeSpelling(term);
}

/**
 * 应用增量并截断到 [0,100]
 */
export function applyProficiencyDelta(entry: WordEntry, delta: number, now: Date): void {
  entry.proficiency = clampProficiency(entry.proficiency + delta);
  entry.modifiedAt = now;
}

/**
 * 记录一次作答：盖 lastReviewedAt 戳并应用增量
 *
 * 每道题只应调用一次，由会话的 scored 标记保证
 */
export function recordReview(entry: WordEntry, delta: number, now: Date): void {
  entry.lastReviewedAt = now;
  applyProficiencyDelta(entry, delta, now);
}
