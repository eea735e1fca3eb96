/**
 * 学习相关Zod Schema
 */

import { z } from 'zod';

/**
 * 作答
 */
export const StudyAnswerSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('recognition'), known: z.boolean() }),
  z.object({ kind: z.literal('fill-in'), input: z.string() }),
  z.object({ kind: z.literal('multiple-choice'), optionId: z.string().min(1) }),
]);
