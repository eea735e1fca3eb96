/**
 * @wordmemo/shared
 *
 * 核心引擎与展示层共享的类型与校验 Schema
 */

export * from './types';

export * from './schemas/word.schema';
export * from './schemas/study.schema';
