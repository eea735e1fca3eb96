/**
 * 学习会话相关类型定义
 */

import type { ID } from './common';
import type { WordEntry, WordList } from './word';

export type QuestionKind = 'recognition' | 'fill-in' | 'multiple-choice';

/** 认词题的提示面 */
export type RecognitionPrompt = 'term' | 'definition' | 'pronunciation';

/** 选择题的题干来源 */
export type ChoiceTarget = 'definition' | 'pronunciation';

export interface ChoiceOption {
  id: ID;
  term: string;
}

export interface RecognitionQuestion {
  kind: 'recognition';
  wordId: ID;
  prompt: RecognitionPrompt;
  promptText: string;
}

export interface FillInQuestion {
  kind: 'fill-in';
  wordId: ID;
  promptText: string;
}

export interface MultipleChoiceQuestion {
  kind: 'multiple-choice';
  wordId: ID;
  target: ChoiceTarget;
  promptText: string;
  /** 3 个干扰项 + 正确项，已打乱 */
  options: ChoiceOption[];
}

export type StudyQuestion = RecognitionQuestion | FillInQuestion | MultipleChoiceQuestion;

export type StudyAnswer =
  | { kind: 'recognition'; known: boolean }
  | { kind: 'fill-in'; input: string }
  | { kind: 'multiple-choice'; optionId: ID };

/**
 * 作答反馈，供展示层显示对错
 */
export interface AnswerFeedback {
  correct: boolean;
  delta: number;
  /** 正确拼写 */
  expected: string;
  /** 选择题中用户选中的选项 */
  selectedOptionId?: ID;
  /** 填空题用户输入 */
  input?: string;
}

export type SessionStatus = 'active' | 'complete';

/**
 * 会话结束原因
 * - empty: 没有待学词条，会话一开始即结束
 * - finished: 队列已走完
 */
export type SessionCompletion = 'empty' | 'finished';

/**
 * 学习会话状态（不可变值，每次操作返回新状态）
 */
export interface SessionState {
  readonly sessionId: ID;
  readonly status: SessionStatus;
  readonly completion: SessionCompletion | null;
  readonly list: WordList;
  readonly queue: readonly WordEntry[];
  readonly index: number;
  readonly question: StudyQuestion | null;
  /** 当前题目是否已计分 */
  readonly scored: boolean;
  readonly feedback: AnswerFeedback | null;
  readonly startedAt: Date;
}

export interface SessionProgress {
  remaining: number;
  total: number;
}
