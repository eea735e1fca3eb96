/**
 * 单词相关Zod Schema
 * 用于运行时验证和类型推断
 */

import { z } from 'zod';

export const PROFICIENCY_MIN = 0;
export const PROFICIENCY_MAX = 100;

/**
 * 熟练度：越界时截断而不是报错
 */
export const ProficiencySchema = z
  .number()
  .transform((v) => Math.min(PROFICIENCY_MAX, Math.max(PROFICIENCY_MIN, v)));

export const WordSortKeySchema = z.enum(['alphabetical', 'proficiency', 'modifiedAt', 'lastReviewedAt']);

/**
 * 编辑器提交的词条草稿
 */
export const WordEntryDraftSchema = z.object({
  term: z.string().trim().min(1, 'Term is required'),
  pronunciation: z.string().default(''),
  partOfSpeech: z.string().default(''),
  definition: z.string().default(''),
  proficiency: ProficiencySchema.default(0),
  lemmaId: z.string().min(1).nullable().default(null),
  derivativeIds: z.array(z.string().min(1)).default([]),
});

export type WordEntryDraft = z.input<typeof WordEntryDraftSchema>;
export type ParsedWordEntryDraft = z.output<typeof WordEntryDraftSchema>;

/**
 * 新建单词本
 */
export const CreateWordListSchema = z.object({
  name: z.string().trim().max(100, 'Name too long'),
});

/**
 * 持久化词条记录
 */
export const WordEntryRecordSchema = z.object({
  id: z.string().uuid(),
  listId: z.string().uuid().nullable(),
  term: z.string().trim().min(1),
  pronunciation: z.string(),
  partOfSpeech: z.string(),
  definition: z.string(),
  proficiency: ProficiencySchema,
  modifiedAt: z.coerce.date(),
  lastReviewedAt: z.coerce.date().nullable(),
  lemmaId: z.string().uuid().nullable(),
  derivativeIds: z.array(z.string().uuid()),
});

/**
 * 持久化单词本记录
 */
export const WordListRecordSchema = z.object({
  id: z.string().uuid(),
  name: z.string(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
  lastUsedAt: z.coerce.date(),
  schemaVersion: z.number().int().positive(),
  entries: z.array(WordEntryRecordSchema),
});

export const SNAPSHOT_VERSION = 1;

/**
 * 本地快照文件
 */
export const WordMemoSnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  savedAt: z.coerce.date(),
  lists: z.array(WordListRecordSchema),
});

export type WordMemoSnapshot = z.output<typeof WordMemoSnapshotSchema>;
