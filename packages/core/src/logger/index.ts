/**
 * 统一日志系统 - 基线配置
 *
 * 功能:
 * - 结构化 JSON 日志输出（生产环境）
 * - 美化控制台输出（开发环境）
 * - 支持子日志器创建
 * - 统一的日志级别控制
 */

import pino, { type Logger, type LoggerOptions, type DestinationStream } from 'pino';

// ==================== 配置常量 ====================

/** 默认日志级别 */
const DEFAULT_LOG_LEVEL = 'info';

/** 应用名称 */
const APP_NAME = 'wordmemo-core';

// ==================== 环境检测 ====================

const LOG_LEVEL = process.env.LOG_LEVEL || DEFAULT_LOG_LEVEL;
const NODE_ENV = process.env.NODE_ENV || 'development';
const IS_PRODUCTION = NODE_ENV === 'production';
const IS_TEST = NODE_ENV === 'test';

// ==================== 序列化器 ====================

/**
 * 错误序列化器 - 保留完整堆栈与错误代码
 */
function errSerializer(err: Error): pino.SerializedError {
  const serialized = pino.stdSerializers.err(err);

  if ('code' in err && typeof err.code === 'string') {
    serialized.code = err.code;
  }

  return serialized;
}

/** 序列化器集合 */
export const serializers = {
  err: errSerializer,
};

// ==================== 日志器配置 ====================

/**
 * 构建日志器配置
 */
function buildLoggerOptions(): LoggerOptions {
  return {
    level: LOG_LEVEL,

    base: {
      app: APP_NAME,
      env: NODE_ENV,
    },

    serializers,

    formatters: {
      level(label: string) {
        return { level: label };
      },
      bindings(bindings) {
        // 开发环境移除 pid/hostname 以减少噪音
        if (IS_PRODUCTION) {
          return bindings;
        }
        return {
          ...bindings,
          pid: undefined,
          hostname: undefined,
        };
      },
    },

    timestamp: pino.stdTimeFunctions.isoTime,
  };
}

/**
 * 构建日志传输
 */
function buildTransport(): DestinationStream | undefined {
  // 测试与生产环境直接输出 JSON
  if (IS_TEST || IS_PRODUCTION) {
    return undefined;
  }

  try {
    return pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        singleLine: false,
        ignore: 'pid,hostname',
        messageFormat: '{msg}',
      },
    });
  } catch (err) {
    console.warn('[Logger] Failed to create transport, falling back to JSON output:', err);
    return undefined;
  }
}

// ==================== 创建日志器实例 ====================

export const logger: Logger = pino(buildLoggerOptions(), buildTransport());

// ==================== 子日志器工厂 ====================

/**
 * 子日志器绑定字段类型
 */
export interface LoggerBindings {
  /** 模块名称 */
  module?: string;
  /** 单词本ID */
  listId?: string;
  /** 学习会话ID */
  sessionId?: string;
  [key: string]: unknown;
}

/**
 * 创建子日志器
 *
 * @example
 * ```typescript
 * const graphLogger = createChildLogger({ module: 'relation-graph' });
 * graphLogger.debug({ entryId }, 'lemma updated');
 * ```
 */
export function createChildLogger(bindings: LoggerBindings = {}): Logger {
  return logger.child(bindings);
}

// ==================== 预置模块日志器 ====================

/** 启动流程日志器 */
export const startupLogger = createChildLogger({ module: 'startup' });

/** 服务层日志器 */
export const serviceLogger = createChildLogger({ module: 'service' });

/** 学习会话日志器 */
export const studyLogger = createChildLogger({ module: 'study' });

/** 存储层日志器 */
export const storeLogger = createChildLogger({ module: 'store' });

/**
 * 检查当前日志级别是否启用
 */
export function isLevelEnabled(level: pino.Level): boolean {
  return logger.isLevelEnabled(level);
}

export type { Logger } from 'pino';
