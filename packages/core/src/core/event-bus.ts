/**
 * Event Bus - 领域事件总线
 *
 * 职责:
 * - 进程内事件发布/订阅
 * - 为持久化等外部协作者提供变更通知（发布方不等待处理结果）
 * - 错误隔离（单个处理器失败不影响其他订阅者）
 */

import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import type { QuestionKind, SessionCompletion } from '@wordmemo/shared';
import { serviceLogger } from '../logger';

const logger = serviceLogger.child({ module: 'event-bus' });

// ==================== 事件 Payload 定义 ====================

export type EntryChangeReason = 'created' | 'edited' | 'proficiency' | 'reviewed' | 'deleted';

export interface EntryChangedPayload {
  listId: string;
  entryId: string;
  reason: EntryChangeReason;
  timestamp: Date;
}

export interface ListChangedPayload {
  listId: string;
  reason: 'created' | 'updated' | 'used' | 'deleted';
  timestamp: Date;
}

export interface AnswerScoredPayload {
  sessionId: string;
  listId: string;
  entryId: string;
  questionKind: QuestionKind;
  correct: boolean;
  delta: number;
  proficiencyBefore: number;
  proficiencyAfter: number;
  timestamp: Date;
}

export interface SessionStartedPayload {
  sessionId: string;
  listId: string;
  queueSize: number;
  startedAt: Date;
}

export interface SessionCompletedPayload {
  sessionId: string;
  listId: string;
  completion: SessionCompletion;
  queueSize: number;
  startedAt: Date;
  endedAt: Date;
}

// ==================== 事件类型联合 ====================

export type WordMemoEvent =
  | { type: 'ENTRY_CHANGED'; payload: EntryChangedPayload }
  | { type: 'LIST_CHANGED'; payload: ListChangedPayload }
  | { type: 'ANSWER_SCORED'; payload: AnswerScoredPayload }
  | { type: 'SESSION_STARTED'; payload: SessionStartedPayload }
  | { type: 'SESSION_COMPLETED'; payload: SessionCompletedPayload };

export type WordMemoEventType = WordMemoEvent['type'];

export type PayloadOf<K extends WordMemoEventType> = Extract<WordMemoEvent, { type: K }>['payload'];

/**
 * 领域事件接口
 */
export interface DomainEvent<T = unknown> {
  type: WordMemoEventType;
  payload: T;
  timestamp: Date;
  correlationId: string;
}

/**
 * 事件处理器类型
 */
export type EventHandler<T = unknown> = (payload: T, event: DomainEvent<T>) => void | Promise<void>;

/**
 * 事件订阅配置
 */
export interface SubscriptionOptions {
  /** 错误处理器 */
  onError?: (error: unknown, event: DomainEvent) => void;
}

export interface EventBusConfig {
  /** 最大监听器数量 */
  maxListeners?: number;
}

/**
 * 事件总线类
 *
 * publish 同步分发；处理器返回的 Promise 在此处统一捕获并记录，发布方不等待
 */
export class EventBus {
  private emitter: EventEmitter;

  constructor(config: EventBusConfig = {}) {
    this.emitter = new EventEmitter();
    this.emitter.setMaxListeners(config.maxListeners ?? 100);
  }

  /**
   * 发布事件
   */
  publish(event: WordMemoEvent): void {
    const domainEvent: DomainEvent = {
      type: event.type,
      payload: event.payload,
      timestamp: new Date(),
      correlationId: randomUUID(),
    };

    logger.trace({ type: event.type, correlationId: domainEvent.correlationId }, 'Publishing event');
    this.emitter.emit(event.type, event.payload, domainEvent);
  }

  /**
   * 订阅事件
   *
   * @returns 取消订阅函数
   */
  subscribe<K extends WordMemoEventType>(
    eventType: K,
    handler: EventHandler<PayloadOf<K>>,
    options: SubscriptionOptions = {},
  ): () => void {
    const { onError } = options;

    const report = (error: unknown, event: DomainEvent<PayloadOf<K>>) => {
      logger.error({ err: error, type: event.type, correlationId: event.correlationId }, 'Event handler error');
      onError?.(error, event);
    };

    const wrappedHandler = (payload: PayloadOf<K>, event: DomainEvent<PayloadOf<K>>) => {
      try {
        const result = handler(payload, event);
        if (result instanceof Promise) {
          result.catch((err: unknown) => report(err, event));
        }
      } catch (error) {
        report(error, event);
      }
    };

    this.emitter.on(eventType, wrappedHandler);

    return () => {
      this.emitter.off(eventType, wrappedHandler);
    };
  }

  /**
   * 订阅多个事件类型
   */
  subscribeMany(
    eventTypes: WordMemoEventType[],
    handler: EventHandler<WordMemoEvent['payload']>,
    options: SubscriptionOptions = {},
  ): () => void {
    const unsubscribers = eventTypes.map((type) => this.subscribe(type, handler, options));

    return () => {
      unsubscribers.forEach((unsub) => unsub());
    };
  }

  getSubscriberCount(eventType: WordMemoEventType): number {
    return this.emitter.listenerCount(eventType);
  }

  /**
   * 移除全部订阅
   */
  clear(): void {
    this.emitter.removeAllListeners();
  }
}

/** 默认事件总线实例 */
export const eventBus = new EventBus();
