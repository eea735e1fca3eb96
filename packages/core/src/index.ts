/**
 * @wordmemo/core
 *
 * 单词记忆核心：学习会话引擎、词条关系图、计分与排序、单词本仓库与本地快照
 */

export { createWordMemo } from './app';
export type { WordMemo, WordMemoOptions } from './app';
export * from './services';
export * from './repositories';

export { EventBus, eventBus } from './core/event-bus';
export type {
  WordMemoEvent,
  WordMemoEventType,
  PayloadOf,
  DomainEvent,
  EventHandler,
  SubscriptionOptions,
  EntryChangedPayload,
  EntryChangeReason,
  ListChangedPayload,
  AnswerScoredPayload,
  SessionStartedPayload,
  SessionCompletedPayload,
} from './core/event-bus';

export { AppError, isAppError } from './errors';
export type { ErrorCode } from './errors';

export { env, validateEnv } from './config/env';
export type { Env } from './config/env';
export { DEFAULT_STUDY_CONFIG, resolveStudyConfig, studyConfigSchema } from './config/study.config';
export type { StudyConfig, StudyConfigOverrides } from './config/study.config';

export { logger, createChildLogger } from './logger';

export {
  createWordList,
  touchUsage,
  markUpdated,
  findEntry,
  DEFAULT_LIST_NAME,
  NEW_LIST_NAME,
  WORD_LIST_SCHEMA_VERSION,
} from './models/word-list.model';
export { createWordEntry, setProficiency, clampProficiency, isDue } from './models/word-entry.model';
export type { WordEntryInput } from './models/word-entry.model';

export { systemClock, fixedClock, steppingClock, isSameLocalDay } from './utils/clock';
export type { Clock } from './utils/clock';
export { mathRandom, createSeededRandom, randomInt, shuffle, pickOne } from './utils/random';
export type { RandomSource } from './utils/random';
