import { randomUUID } from 'crypto';
import { PROFICIENCY_MAX, PROFICIENCY_MIN, type WordEntry } from '@wordmemo/shared';

export interface WordEntryInput {
  term: string;
  pronunciation?: string;
  partOfSpeech?: string;
  definition?: string;
  proficiency?: number;
}

export function clampProficiency(value: number): number {
  return Math.max(PROFICIENCY_MIN, Math.min(PROFICIENCY_MAX, value));
}

export function createWordEntry(input: WordEntryInput, listId: string, now: Date): WordEntry {
  return {
    id: randomUUID(),
    listId,
    term: input.term.trim(),
    pronunciation: input.pronunciation ?? '',
    partOfSpeech: input.partOfSpeech ?? '',
    definition: input.definition ?? '',
    proficiency: clampProficiency(input.proficiency ?? 0),
    modifiedAt: now,
    lastReviewedAt: null,
    lemmaId: null,
    derivativeIds: [],
  };
}

/**
 * 直接设置熟练度（详情页滑块）
 */
export function setProficiency(entry: WordEntry, value: number, now: Date): void {
  entry.proficiency = clampProficiency(value);
  entry.modifiedAt = now;
}

/** 待学词条：熟练度低于阈值 */
export function isDue(entry: WordEntry, threshold: number): boolean {
  return entry.proficiency < threshold;
}
