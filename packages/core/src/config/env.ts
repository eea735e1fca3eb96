/**
 * 核心环境变量配置
 *
 * 使用 Zod 进行运行时验证，确保环境变量的类型安全和完整性
 * 所有环境变量都通过此文件统一访问，避免直接使用 process.env
 */

import { config } from 'dotenv';
import { z } from 'zod';
import { startupLogger } from '../logger';

// 加载 .env 文件
config();

/**
 * 环境变量 Schema 定义
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // ============================================
  // 日志配置
  // ============================================
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // ============================================
  // 本地快照配置
  // ============================================
  WORDMEMO_DATA_FILE: z.string().min(1).default('./data/wordmemo.json'),

  // ============================================
  // 学习配置
  // ============================================
  WORDMEMO_DUE_THRESHOLD: z
    .string()
    .default('90')
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().min(1, '熟练阈值最小为 1').max(100, '熟练阈值最大为 100')),
});

/**
 * 环境变量类型
 */
export type Env = z.infer<typeof envSchema>;

/**
 * 验证并解析环境变量
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  try {
    const parsed = envSchema.parse({
      NODE_ENV: source.NODE_ENV,
      LOG_LEVEL: source.LOG_LEVEL,
      WORDMEMO_DATA_FILE: source.WORDMEMO_DATA_FILE,
      WORDMEMO_DUE_THRESHOLD: source.WORDMEMO_DUE_THRESHOLD,
    });

    startupLogger.debug(`环境变量验证成功 (环境: ${parsed.NODE_ENV})`);
    return parsed;
  } catch (error) {
    if (error instanceof z.ZodError) {
      startupLogger.error('环境变量验证失败:');
      error.errors.forEach((err) => {
        startupLogger.error(`  - ${err.path.join('.')}: ${err.message}`);
      });
      throw new Error('环境变量配置错误，请检查 .env 文件');
    }
    throw error;
  }
}

/**
 * 导出验证后的环境变量
 *
 * @example
 * ```ts
 * import { env } from './config/env';
 * const file = env.WORDMEMO_DATA_FILE;
 * ```
 */
export const env = validateEnv();
