/**
 * Word Editor Service
 * 词条编辑：新建、修改、删除，以及原型 / 派生关系的校验与应用
 *
 * 校验全部在修改之前完成，校验失败时词条与单词本保持原状。
 */

import {
  WordEntryDraftSchema,
  type ParsedWordEntryDraft,
  type WordEntry,
  type WordEntryDraft,
  type WordList,
} from '@wordmemo/shared';
import { eventBus as defaultEventBus, type EventBus } from '../core/event-bus';
import { AppError } from '../errors';
import { serviceLogger } from '../logger';
import { createWordEntry, setProficiency } from '../models/word-entry.model';
import { findEntry, markUpdated } from '../models/word-list.model';
import type { WordRepository } from '../repositories/word.repository';
import { systemClock, type Clock } from '../utils/clock';
import { RelationGraphService } from './relation-graph.service';
import { sortedEntries } from './word-sort.service';

const logger = serviceLogger.child({ module: 'word-editor' });

export interface WordEditorDeps {
  repository: WordRepository;
  graph?: RelationGraphService;
  clock?: Clock;
  events?: EventBus;
}

interface ResolvedRelations {
  lemma: WordEntry | null;
  derivativeIds: string[];
}

export class WordEditorService {
  private readonly repository: WordRepository;
  private readonly graph: RelationGraphService;
  private readonly clock: Clock;
  private readonly events: EventBus;

  constructor(deps: WordEditorDeps) {
    this.repository = deps.repository;
    this.clock = deps.clock ?? systemClock;
    this.graph = deps.graph ?? new RelationGraphService(this.clock);
    this.events = deps.events ?? defaultEventBus;
  }

  /**
   * 保存词条
   *
   * @param existingId 修改已有词条时传入，缺省为新建；草稿未给出的字段沿用词条当前值
   */
  saveEntry(list: WordList, draft: WordEntryDraft, existingId?: string): WordEntry {
    const existing = existingId === undefined ? undefined : findEntry(list, existingId);
    if (existingId !== undefined && !existing) {
      throw AppError.notFound(`词条 ${existingId} 不存在`);
    }

    const parsed = WordEntryDraftSchema.safeParse(existing ? fillFromEntry(draft, existing) : draft);
    if (!parsed.success) {
      throw AppError.fromZod(parsed.error);
    }

    const now = this.clock.now();
    const entry = existing ?? createWordEntry(parsed.data, list.id, now);
    const relations = this.resolveRelations(list, entry, parsed.data);

    if (existing) {
      existing.term = parsed.data.term;
      existing.pronunciation = parsed.data.pronunciation;
      existing.partOfSpeech = parsed.data.partOfSpeech;
      existing.definition = parsed.data.definition;
      setProficiency(existing, parsed.data.proficiency, now);
    } else {
      this.repository.insertEntry(list, entry);
    }

    this.graph.setLemma(list, entry, relations.lemma);
    this.graph.applyDesiredDerivativeSet(list, entry, relations.derivativeIds);
    markUpdated(list, now);

    this.events.publish({
      type: 'ENTRY_CHANGED',
      payload: { listId: list.id, entryId: entry.id, reason: existing ? 'edited' : 'created', timestamp: now },
    });
    this.events.publish({ type: 'LIST_CHANGED', payload: { listId: list.id, reason: 'updated', timestamp: now } });

    logger.debug({ listId: list.id, entryId: entry.id, created: !existing }, 'word entry saved');
    return entry;
  }

  /**
   * 删除词条，关系置空
   */
  deleteEntry(list: WordList, entryId: string): void {
    const entry = findEntry(list, entryId);
    if (!entry) {
      throw AppError.notFound(`词条 ${entryId} 不存在`);
    }

    const now = this.clock.now();
    this.repository.deleteEntry(list, entry);
    markUpdated(list, now);

    this.events.publish({
      type: 'ENTRY_CHANGED',
      payload: { listId: list.id, entryId, reason: 'deleted', timestamp: now },
    });
    this.events.publish({ type: 'LIST_CHANGED', payload: { listId: list.id, reason: 'updated', timestamp: now } });
  }

  /**
   * 详情页直接调整熟练度
   */
  updateProficiency(list: WordList, entryId: string, value: number): WordEntry {
    const entry = findEntry(list, entryId);
    if (!entry) {
      throw AppError.notFound(`词条 ${entryId} 不存在`);
    }

    const now = this.clock.now();
    setProficiency(entry, value, now);
    this.events.publish({
      type: 'ENTRY_CHANGED',
      payload: { listId: list.id, entryId, reason: 'proficiency', timestamp: now },
    });
    return entry;
  }

  /**
   * 可关联的候选词条：同一单词本中除自身外的词条，按字母序
   */
  relationCandidates(list: WordList, entryId?: string): WordEntry[] {
    return sortedEntries(list, 'alphabetical').filter((e) => e.id !== entryId);
  }

  // ==================== 关系校验 ====================

  /**
   * 校验并解析草稿中的关系 ID
   *
   * - 指向自身或其他单词本的 ID 报 VALIDATION_ERROR
   * - 已不存在的 ID 跳过
   * - 会形成原型环的组合报 VALIDATION_ERROR
   */
  private resolveRelations(list: WordList, entry: WordEntry, draft: ParsedWordEntryDraft): ResolvedRelations {
    const relatedIds = [...(draft.lemmaId === null ? [] : [draft.lemmaId]), ...draft.derivativeIds];

    if (relatedIds.includes(entry.id)) {
      throw AppError.validation('词条不能与自身关联', { entryId: entry.id });
    }

    const foreign = relatedIds.find((id) => !findEntry(list, id) && this.belongsToOtherList(list, id));
    if (foreign !== undefined) {
      throw AppError.validation('只能关联同一单词本中的词条', { entryId: foreign });
    }

    const lemma = draft.lemmaId === null ? null : (findEntry(list, draft.lemmaId) ?? null);
    if (draft.lemmaId !== null && !lemma) {
      logger.warn({ err: AppError.danglingReference(draft.lemmaId), listId: list.id }, 'skip dangling lemma');
    }

    const derivativeIds: string[] = [];
    for (const id of new Set(draft.derivativeIds)) {
      if (findEntry(list, id)) {
        derivativeIds.push(id);
      } else {
        logger.warn({ err: AppError.danglingReference(id), listId: list.id }, 'skip dangling derivative');
      }
    }

    const overrides = new Map<string, string | null>([[entry.id, lemma?.id ?? null]]);
    for (const id of entry.derivativeIds) overrides.set(id, null);
    for (const id of derivativeIds) overrides.set(id, entry.id);

    const cycle = this.graph.findLemmaCycle(list, entry.id, overrides);
    if (cycle) {
      throw AppError.validation('原型关系不能形成环', { cycle });
    }

    return { lemma, derivativeIds };
  }

  private belongsToOtherList(list: WordList, entryId: string): boolean {
    return this.repository.queryLists((other) => other.id !== list.id).some((other) => !!findEntry(other, entryId));
  }
}

/**
 * 编辑已有词条时，用词条当前值补齐草稿中缺省的字段
 */
function fillFromEntry(draft: WordEntryDraft, entry: WordEntry): WordEntryDraft {
  return {
    term: draft.term,
    pronunciation: draft.pronunciation ?? entry.pronunciation,
    partOfSpeech: draft.partOfSpeech ?? entry.partOfSpeech,
    definition: draft.definition ?? entry.definition,
    proficiency: draft.proficiency ?? entry.proficiency,
    lemmaId: draft.lemmaId === undefined ? entry.lemmaId : draft.lemmaId,
    derivativeIds: draft.derivativeIds ?? [...entry.derivativeIds],
  };
}
