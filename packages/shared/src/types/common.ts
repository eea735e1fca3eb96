/**
 * 通用类型定义
 */

/**
 * ID类型 - 统一使用 UUID 字符串
 */
export type ID = string;

/**
 * 排序方向
 */
export type SortOrder = 'asc' | 'desc';
