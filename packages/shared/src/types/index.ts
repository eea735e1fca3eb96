/**
 * Shared Types - 类型定义导出
 */

export * from './common';
export * from './word';
export * from './study';
