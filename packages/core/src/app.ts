/**
 * WordMemo 启动装配
 *
 * 读取本地快照、装配仓库与服务，并把快照持久化挂到事件总线上。
 * 首次启动时写入默认单词本与示例词条。
 */

import type { WordList } from '@wordmemo/shared';
import { env } from './config/env';
import { eventBus as defaultEventBus, type EventBus } from './core/event-bus';
import { startupLogger } from './logger';
import { InMemoryObjectStore } from './repositories/object-store';
import { JsonSnapshotStore, type SnapshotStore } from './repositories/json-snapshot.store';
import { SnapshotPersistence } from './repositories/snapshot-persistence';
import { WordRepository } from './repositories/word.repository';
import { RelationGraphService } from './services/relation-graph.service';
import { StudySessionService } from './services/study-session.service';
import { WordEditorService } from './services/word-editor.service';
import { WordListService } from './services/word-list.service';
import { systemClock, type Clock } from './utils/clock';

export interface WordMemoOptions {
  /** 快照文件路径，缺省取 WORDMEMO_DATA_FILE */
  dataFile?: string;
  clock?: Clock;
  events?: EventBus;
}

export interface WordMemo {
  repository: WordRepository;
  store: SnapshotStore;
  persistence: SnapshotPersistence;
  lists: WordListService;
  editor: WordEditorService;
  study: StudySessionService;
  /** 启动时选中的单词本 */
  currentList: WordList;
  /** 停止监听并等待未完成的快照写入 */
  close(): Promise<void>;
}

export async function createWordMemo(options: WordMemoOptions = {}): Promise<WordMemo> {
  const clock = options.clock ?? systemClock;
  const events = options.events ?? defaultEventBus;
  const dataFile = options.dataFile ?? env.WORDMEMO_DATA_FILE;

  const graph = new RelationGraphService(clock);
  const repository = new WordRepository(new InMemoryObjectStore<WordList>(), graph);
  const store = new JsonSnapshotStore(dataFile);

  const snapshot = await store.load();
  if (snapshot) {
    repository.loadSnapshot(snapshot);
  }

  const persistence = new SnapshotPersistence(repository, store, clock);
  persistence.attach(events);

  const lists = new WordListService({ repository, clock, events });
  const editor = new WordEditorService({ repository, graph, clock, events });
  const study = new StudySessionService({ clock, events });
  const currentList = lists.bootstrap();

  startupLogger.info(
    { file: dataFile, lists: repository.queryLists().length, listId: currentList.id },
    'WordMemo 已启动',
  );

  return {
    repository,
    store,
    persistence,
    lists,
    editor,
    study,
    currentList,
    close: async () => {
      persistence.detach();
      await persistence.flush();
    },
  };
}
