/**
 * Relation Graph Service
 * 原型词 / 派生词关系图
 *
 * 图以词条 ID 为键，维护两个互逆索引：
 * - 正向：entry.lemmaId
 * - 反向：entry.derivativeIds
 * 两侧只在本服务内写入，保证 A ∈ B.derivativeIds ⇔ A.lemmaId === B.id。
 *
 * 原语假定传入的词条属于同一单词本且不指向自身，这类校验在编辑器边界完成。
 */

import type { WordEntry, WordList } from '@wordmemo/shared';
import { serviceLogger } from '../logger';
import { systemClock, type Clock } from '../utils/clock';

const logger = serviceLogger.child({ module: 'relation-graph' });

export interface SymmetryViolation {
  entryId: string;
  relatedId: string;
  issue: 'missing-derivative' | 'missing-lemma' | 'self-reference' | 'dangling';
}

export class RelationGraphService {
  constructor(private readonly clock: Clock = systemClock) {}

  /**
   * 设置原型词，null 表示清除
   */
  setLemma(list: WordList, entry: WordEntry, lemma: WordEntry | null): void {
    const now = this.clock.now();
    const nextId = lemma?.id ?? null;

    if (entry.lemmaId !== nextId) {
      this.unlinkFromLemma(list, entry, now);
      entry.lemmaId = nextId;
      entry.modifiedAt = now;
    }

    if (lemma && !lemma.derivativeIds.includes(entry.id)) {
      lemma.derivativeIds.push(entry.id);
      lemma.modifiedAt = now;
    }
  }

  /**
   * 添加派生词，并强制候选词的原型指向 entry
   */
  addDerivative(list: WordList, entry: WordEntry, candidate: WordEntry): void {
    const now = this.clock.now();

    if (!entry.derivativeIds.includes(candidate.id)) {
      entry.derivativeIds.push(candidate.id);
      entry.modifiedAt = now;
    }

    if (candidate.lemmaId !== entry.id) {
      this.unlinkFromLemma(list, candidate, now);
      candidate.lemmaId = entry.id;
      candidate.modifiedAt = now;
    }
  }

  /**
   * 将 entry 的派生词集合调整为 desiredIds
   *
   * 不在目标集合中的现有派生词只解除关联，不删除。
   * 已不存在的 ID 跳过。重复调用结果一致。
   */
  applyDesiredDerivativeSet(list: WordList, entry: WordEntry, desiredIds: Iterable<string>): void {
    const desired = new Set(desiredIds);
    const byId = indexEntries(list);
    const now = this.clock.now();

    for (const derivativeId of [...entry.derivativeIds]) {
      if (desired.has(derivativeId)) continue;

      const derivative = byId.get(derivativeId);
      if (derivative && derivative.lemmaId === entry.id) {
        derivative.lemmaId = null;
        derivative.modifiedAt = now;
      }
      removeId(entry.derivativeIds, derivativeId);
      entry.modifiedAt = now;
    }

    for (const id of desired) {
      const candidate = byId.get(id);
      if (!candidate) {
        logger.debug({ listId: list.id, entryId: entry.id, derivativeId: id }, 'skip dangling derivative');
        continue;
      }
      this.addDerivative(list, entry, candidate);
    }
  }

  /**
   * 删除前解除词条的全部关系（nullify）
   */
  detachEntry(list: WordList, entry: WordEntry): void {
    this.setLemma(list, entry, null);
    this.applyDesiredDerivativeSet(list, entry, []);
  }

  /**
   * 沿原型指针查找环
   *
   * @param overrides 预演的原型指针（编辑器保存前检查用）
   * @returns 环上的词条 ID（从首个重复节点开始），无环返回 null
   */
  findLemmaCycle(
    list: WordList,
    startId: string,
    overrides: ReadonlyMap<string, string | null> = new Map(),
  ): string[] | null {
    const byId = indexEntries(list);
    const lemmaOf = (id: string): string | null =>
      overrides.has(id) ? (overrides.get(id) ?? null) : (byId.get(id)?.lemmaId ?? null);

    const path: string[] = [];
    const seen = new Map<string, number>();
    let current: string | null = startId;

    while (current !== null) {
      const at = seen.get(current);
      if (at !== undefined) {
        return path.slice(at);
      }
      seen.set(current, path.length);
      path.push(current);
      current = lemmaOf(current);
    }
    return null;
  }

  /**
   * 检查双向索引是否一致
   */
  verifySymmetry(list: WordList): SymmetryViolation[] {
    const byId = indexEntries(list);
    const violations: SymmetryViolation[] = [];

    for (const entry of list.entries) {
      if (entry.lemmaId !== null) {
        const lemma = byId.get(entry.lemmaId);
        if (entry.lemmaId === entry.id) {
          violations.push({ entryId: entry.id, relatedId: entry.id, issue: 'self-reference' });
        } else if (!lemma) {
          violations.push({ entryId: entry.id, relatedId: entry.lemmaId, issue: 'dangling' });
        } else if (!lemma.derivativeIds.includes(entry.id)) {
          violations.push({ entryId: entry.id, relatedId: lemma.id, issue: 'missing-derivative' });
        }
      }

      for (const derivativeId of entry.derivativeIds) {
        const derivative = byId.get(derivativeId);
        if (derivativeId === entry.id) {
          violations.push({ entryId: entry.id, relatedId: entry.id, issue: 'self-reference' });
        } else if (!derivative) {
          violations.push({ entryId: entry.id, relatedId: derivativeId, issue: 'dangling' });
        } else if (derivative.lemmaId !== entry.id) {
          violations.push({ entryId: entry.id, relatedId: derivativeId, issue: 'missing-lemma' });
        }
      }
    }

    return violations;
  }

  private unlinkFromLemma(list: WordList, entry: WordEntry, now: Date): void {
    if (entry.lemmaId === null) return;

    const previous = list.entries.find((e) => e.id === entry.lemmaId);
    if (previous && removeId(previous.derivativeIds, entry.id)) {
      previous.modifiedAt = now;
    }
  }
}

function indexEntries(list: WordList): Map<string, WordEntry> {
  return new Map(list.entries.map((e) => [e.id, e]));
}

function removeId(ids: string[], id: string): boolean {
  const index = ids.indexOf(id);
  if (index === -1) return false;
  ids.splice(index, 1);
  return true;
}
