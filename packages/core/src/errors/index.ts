import { ZodError } from 'zod';

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'DANGLING_REFERENCE'
  | 'ANSWER_MISMATCH'
  | 'NOT_FOUND'
  | 'SNAPSHOT_INVALID'
  | 'INTERNAL_ERROR';

/**
 * 结构化应用错误类
 * 用于区分可预期的业务错误（isOperational）和系统错误
 */
export class AppError extends Error {
  code: ErrorCode;
  isOperational: boolean;
  details?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = 'VALIDATION_ERROR',
    isOperational: boolean = true,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;
    Object.setPrototypeOf(this, AppError.prototype);
  }

  // 常用错误工厂方法
  static validation(message: string = '参数校验失败', details?: Record<string, unknown>): AppError {
    return new AppError(message, 'VALIDATION_ERROR', true, details);
  }

  static danglingReference(id: string): AppError {
    return new AppError(`词条 ${id} 已不存在`, 'DANGLING_REFERENCE', true, { id });
  }

  static answerMismatch(expected: string, received: string): AppError {
    return new AppError(
      `作答类型 ${received} 与当前题型 ${expected} 不符`,
      'ANSWER_MISMATCH',
      true,
      { expected, received },
    );
  }

  static notFound(message: string = '资源不存在'): AppError {
    return new AppError(message, 'NOT_FOUND');
  }

  static snapshotInvalid(message: string = '快照文件格式错误'): AppError {
    return new AppError(message, 'SNAPSHOT_INVALID');
  }

  static internal(message: string = '内部错误'): AppError {
    return new AppError(message, 'INTERNAL_ERROR', false);
  }

  /**
   * 将 Zod 校验错误转换为 VALIDATION_ERROR，保留第一条信息
   */
  static fromZod(error: ZodError): AppError {
    const first = error.errors[0];
    return AppError.validation(first?.message ?? '参数校验失败', {
      path: first?.path.join('.') ?? '',
      issues: error.errors.length,
    });
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
