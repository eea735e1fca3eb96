/**
 * 快照持久化
 *
 * 监听事件总线上的变更事件，调度一次快照写入；核心逻辑不等待写入完成。
 * 写入进行中再次变更时只标记 dirty，当前写入结束后补写一次。
 */

import type { EventBus } from '../core/event-bus';
import { storeLogger } from '../logger';
import { systemClock, type Clock } from '../utils/clock';
import type { SnapshotStore } from './json-snapshot.store';
import type { WordRepository } from './word.repository';

export class SnapshotPersistence {
  private inFlight: Promise<void> | null = null;
  private dirty = false;
  private unsubscribe: (() => void) | null = null;

  constructor(
    private readonly repository: WordRepository,
    private readonly store: SnapshotStore,
    private readonly clock: Clock = systemClock,
  ) {}

  /**
   * 开始监听变更
   */
  attach(events: EventBus): void {
    this.detach();
    this.unsubscribe = events.subscribeMany(['ENTRY_CHANGED', 'LIST_CHANGED'], () => this.schedule());
  }

  detach(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  /**
   * 调度写入（不返回 Promise）
   */
  schedule(): void {
    if (this.inFlight) {
      this.dirty = true;
      return;
    }
    this.inFlight = this.write().finally(() => {
      this.inFlight = null;
      if (this.dirty) {
        this.dirty = false;
        this.schedule();
      }
    });
  }

  /**
   * 等待当前及补写的写入全部完成
   */
  async flush(): Promise<void> {
    while (this.inFlight) {
      await this.inFlight;
    }
  }

  private async write(): Promise<void> {
    try {
      await this.store.save(this.repository.toSnapshot(this.clock.now()));
    } catch (error) {
      storeLogger.error({ err: error }, '快照写入失败');
    }
  }
}
