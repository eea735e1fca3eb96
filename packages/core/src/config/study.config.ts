/**
 * 学习会话参数
 *
 * 出题概率以 [0,100) 的整数骰子表示：
 * roll < recognitionCutoff 出认词题，roll < fillInCutoff 出拼写题，其余出选择题
 */

import { z } from 'zod';
import { env } from './env';

export const studyConfigSchema = z
  .object({
    /** 熟练度低于该值的词条进入学习队列 */
    dueThreshold: z.number().min(0).max(100),
    recognitionCutoff: z.number().int().min(0).max(100),
    fillInCutoff: z.number().int().min(0).max(100),
    /** 选择题以释义为题干的概率（百分比） */
    definitionTargetChance: z.number().int().min(0).max(100),
    /** 选择题干扰项数量 */
    distractorCount: z.number().int().min(1),
    deltas: z.object({
      recognitionKnown: z.number(),
      fillInCorrect: z.number(),
      choiceCorrect: z.number(),
    }),
  })
  .refine((c) => c.recognitionCutoff <= c.fillInCutoff, {
    message: 'recognitionCutoff 不能大于 fillInCutoff',
    path: ['recognitionCutoff'],
  });

export type StudyConfig = z.infer<typeof studyConfigSchema>;

/** 局部覆盖，deltas 可只给部分字段 */
export type StudyConfigOverrides = Partial<Omit<StudyConfig, 'deltas'>> & {
  deltas?: Partial<StudyConfig['deltas']>;
};

export const DEFAULT_STUDY_CONFIG: StudyConfig = studyConfigSchema.parse({
  dueThreshold: env.WORDMEMO_DUE_THRESHOLD,
  recognitionCutoff: 34,
  fillInCutoff: 67,
  definitionTargetChance: 95,
  distractorCount: 3,
  deltas: {
    recognitionKnown: 5,
    fillInCorrect: 30,
    choiceCorrect: 15,
  },
});

/**
 * 合并局部覆盖并重新校验
 */
export function resolveStudyConfig(overrides: StudyConfigOverrides = {}): StudyConfig {
  return studyConfigSchema.parse({
    ...DEFAULT_STUDY_CONFIG,
    ...overrides,
    deltas: { ...DEFAULT_STUDY_CONFIG.deltas, ...overrides.deltas },
  });
}
