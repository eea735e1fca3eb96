/**
 * Study Session Service
 * 学习会话引擎
 *
 * 状态机：Idle（尚无会话值）→ Active(index, question, scored) → Complete
 *
 * 会话状态是不可变值，每个操作接收旧状态并返回新状态；
 * 计分直接写回词条（词条归单词本所有，由外部存储持久化）。
 */

import { randomUUID } from 'crypto';
import {
  StudyAnswerSchema,
  type AnswerFeedback,
  type ChoiceOption,
  type ChoiceTarget,
  type QuestionKind,
  type RecognitionPrompt,
  type SessionProgress,
  type SessionState,
  type StudyAnswer,
  type StudyQuestion,
  type WordEntry,
  type WordList,
} from '@wordmemo/shared';
import { resolveStudyConfig, type StudyConfig, type StudyConfigOverrides } from '../config/study.config';
import { eventBus as defaultEventBus, type EventBus } from '../core/event-bus';
import { AppError } from '../errors';
import { isLevelEnabled, studyLogger } from '../logger';
import { isDue } from '../models/word-entry.model';
import { systemClock, type Clock } from '../utils/clock';
import { mathRandom, pickOne, randomInt, shuffle, type RandomSource } from '../utils/random';
import { isSpellingMatch, recordReview, scoreOutcome } from './scoring.service';

/** 题干为空时的兜底提示 */
export const FILL_IN_FALLBACK_PROMPT = 'Type the spelling';
export const CHOICE_FALLBACK_PROMPTS: Record<ChoiceTarget, string> = {
  definition: 'Pick the word for this definition',
  pronunciation: 'Pick the word for this pronunciation',
};

export interface StudySessionDeps {
  random?: RandomSource;
  clock?: Clock;
  config?: StudyConfigOverrides;
  events?: EventBus;
}

export class StudySessionService {
  private readonly random: RandomSource;
  private readonly clock: Clock;
  private readonly config: StudyConfig;
  private readonly events: EventBus;

  constructor(deps: StudySessionDeps = {}) {
    this.random = deps.random ?? mathRandom;
    this.clock = deps.clock ?? systemClock;
    this.config = resolveStudyConfig(deps.config);
    this.events = deps.events ?? defaultEventBus;
  }

  // ==================== 会话生命周期 ====================

  /**
   * 取出待学词条并打乱，生成第一题
   *
   * 没有待学词条时直接返回 Complete（completion = 'empty'）
   */
  prepareQueue(list: WordList): SessionState {
    const due = list.entries.filter((entry) => isDue(entry, this.config.dueThreshold));
    const queue = shuffle(this.random, due);
    const startedAt = this.clock.now();
    const sessionId = randomUUID();

    const base: SessionState = {
      sessionId,
      status: 'active',
      completion: null,
      list,
      queue,
      index: 0,
      question: null,
      scored: false,
      feedback: null,
      startedAt,
    };

    this.events.publish({
      type: 'SESSION_STARTED',
      payload: { sessionId, listId: list.id, queueSize: queue.length, startedAt },
    });
    studyLogger.info({ sessionId, listId: list.id, queueSize: queue.length }, 'study session prepared');

    if (queue.length === 0) {
      return this.complete(base, 'empty');
    }
    return this.withFreshQuestion(base);
  }

  currentWord(state: SessionState): WordEntry | null {
    if (state.status !== 'active') return null;
    return state.queue[state.index] ?? null;
  }

  currentQuestion(state: SessionState): StudyQuestion | null {
    return state.status === 'active' ? state.question : null;
  }

  sessionProgress(state: SessionState): SessionProgress {
    return {
      remaining: Math.max(0, state.queue.length - state.index),
      total: state.queue.length,
    };
  }

  // ==================== 作答与导航 ====================

  /**
   * 提交答案
   *
   * - 每道题最多计分一次，已计分时原样返回
   * - 认词题计分后自动进入下一题；拼写题与选择题需显式 advance
   */
  submitAnswer(state: SessionState, answer: StudyAnswer): SessionState {
    const parsed = StudyAnswerSchema.safeParse(answer);
    if (!parsed.success) {
      throw AppError.fromZod(parsed.error);
    }

    const question = this.currentQuestion(state);
    const word = this.currentWord(state);
    if (!question || !word) return state;

    if (parsed.data.kind !== question.kind) {
      throw AppError.answerMismatch(question.kind, parsed.data.kind);
    }
    if (state.scored) return state;

    const feedback = this.evaluate(question, parsed.data, word);
    const scored = this.score(state, word, question.kind, feedback);

    return question.kind === 'recognition' ? this.goNext(scored) : scored;
  }

  /**
   * 下一题；未计分时按跳过处理（增量 0）
   */
  advance(state: SessionState): SessionState {
    const word = this.currentWord(state);
    const question = this.currentQuestion(state);
    if (!word || !question) return state;

    if (state.scored) {
      return this.goNext(state);
    }

    const skipped = this.score(state, word, question.kind, {
      correct: false,
      delta: 0,
      expected: word.term,
    });
    return this.goNext(skipped);
  }

  /**
   * 回到上一条并重新出题（不重放原题）
   */
  goPrevious(state: SessionState): SessionState {
    if (state.status !== 'active' || state.index === 0) return state;

    return this.withFreshQuestion({
      ...state,
      index: state.index - 1,
      scored: false,
      feedback: null,
    });
  }

  // ==================== 出题 ====================

  /**
   * 掷 [0,100) 骰子选择题型
   */
  buildQuestion(state: SessionState, word: WordEntry): StudyQuestion {
    const roll = randomInt(this.random, 100);

    if (roll < this.config.recognitionCutoff) {
      const prompt = this.pickRecognitionPrompt(word);
      return {
        kind: 'recognition',
        wordId: word.id,
        prompt,
        promptText: recognitionText(word, prompt),
      };
    }

    if (roll < this.config.fillInCutoff) {
      return {
        kind: 'fill-in',
        wordId: word.id,
        promptText: word.definition.length > 0 ? word.definition : FILL_IN_FALLBACK_PROMPT,
      };
    }

    const target: ChoiceTarget =
      randomInt(this.random, 100) < this.config.definitionTargetChance ? 'definition' : 'pronunciation';
    const source = target === 'definition' ? word.definition : word.pronunciation;

    return {
      kind: 'multiple-choice',
      wordId: word.id,
      target,
      promptText: source.length > 0 ? source : CHOICE_FALLBACK_PROMPTS[target],
      options: this.buildChoiceOptions(state, word),
    };
  }

  /**
   * 选择题选项
   *
   * 优先从队列中尚未出现的词条抽取干扰项，不足时用单词本其余词条补齐，
   * 最多取 distractorCount 个，加入正确项后打乱
   */
  buildChoiceOptions(state: SessionState, word: WordEntry): ChoiceOption[] {
    const pool = state.queue.slice(state.index + 1).filter((entry) => entry.id !== word.id);

    if (pool.length < this.config.distractorCount) {
      const taken = new Set(pool.map((entry) => entry.id));
      for (const candidate of state.list.entries) {
        if (candidate.id !== word.id && !taken.has(candidate.id)) {
          pool.push(candidate);
          taken.add(candidate.id);
        }
      }
    }

    const picks = shuffle(this.random, pool).slice(0, this.config.distractorCount);
    return shuffle(this.random, [...picks, word]).map((entry) => ({ id: entry.id, term: entry.term }));
  }

  private pickRecognitionPrompt(word: WordEntry): RecognitionPrompt {
    const prompts: RecognitionPrompt[] = ['term'];
    if (word.definition.length > 0) prompts.push('definition');
    if (word.pronunciation.length > 0) prompts.push('pronunciation');
    return pickOne(this.random, prompts) ?? 'term';
  }

  // ==================== 内部状态转换 ====================

  private evaluate(question: StudyQuestion, answer: StudyAnswer, word: WordEntry): AnswerFeedback {
    if (question.kind === 'recognition' && answer.kind === 'recognition') {
      return this.feedback('recognition', answer.known, word);
    }

    if (question.kind === 'fill-in' && answer.kind === 'fill-in') {
      return {
        ...this.feedback('fill-in', isSpellingMatch(answer.input, word.term), word),
        input: answer.input,
      };
    }

    if (question.kind === 'multiple-choice' && answer.kind === 'multiple-choice') {
      if (!question.options.some((option) => option.id === answer.optionId)) {
        throw AppError.validation('所选选项不在当前题目中', { optionId: answer.optionId });
      }
      return {
        ...this.feedback('multiple-choice', answer.optionId === word.id, word),
        selectedOptionId: answer.optionId,
      };
    }

    throw AppError.answerMismatch(question.kind, answer.kind);
  }

  private feedback(kind: QuestionKind, correct: boolean, word: WordEntry): AnswerFeedback {
    return {
      correct,
      delta: scoreOutcome(kind, correct, this.config.deltas),
      expected: word.term,
    };
  }

  /**
   * unscored → scored：写回熟练度与复习时间，只发生一次
   */
  private score(
    state: SessionState,
    word: WordEntry,
    kind: QuestionKind,
    feedback: AnswerFeedback,
  ): SessionState {
    const now = this.clock.now();
    const before = word.proficiency;
    recordReview(word, feedback.delta, now);

    this.events.publish({
      type: 'ANSWER_SCORED',
      payload: {
        sessionId: state.sessionId,
        listId: state.list.id,
        entryId: word.id,
        questionKind: kind,
        correct: feedback.correct,
        delta: feedback.delta,
        proficiencyBefore: before,
        proficiencyAfter: word.proficiency,
        timestamp: now,
      },
    });
    this.events.publish({
      type: 'ENTRY_CHANGED',
      payload: { listId: state.list.id, entryId: word.id, reason: 'reviewed', timestamp: now },
    });

    return { ...state, scored: true, feedback };
  }

  private goNext(state: SessionState): SessionState {
    if (state.index + 1 >= state.queue.length) {
      return this.complete({ ...state, index: state.queue.length }, 'finished');
    }

    return this.withFreshQuestion({
      ...state,
      index: state.index + 1,
      scored: false,
      feedback: null,
    });
  }

  private withFreshQuestion(state: SessionState): SessionState {
    const word = state.queue[state.index];
    if (!word) {
      throw AppError.internal(`会话索引越界: ${state.index}`);
    }

    const question = this.buildQuestion(state, word);
    if (isLevelEnabled('debug')) {
      studyLogger.debug(
        { sessionId: state.sessionId, index: state.index, kind: question.kind, wordId: word.id },
        'question built',
      );
    }
    return { ...state, question };
  }

  private complete(state: SessionState, completion: 'empty' | 'finished'): SessionState {
    const endedAt = this.clock.now();
    this.events.publish({
      type: 'SESSION_COMPLETED',
      payload: {
        sessionId: state.sessionId,
        listId: state.list.id,
        completion,
        queueSize: state.queue.length,
        startedAt: state.startedAt,
        endedAt,
      },
    });
    studyLogger.info({ sessionId: state.sessionId, completion }, 'study session complete');

    return {
      ...state,
      status: 'complete',
      completion,
      question: null,
      scored: false,
      feedback: null,
    };
  }
}

function recognitionText(word: WordEntry, prompt: RecognitionPrompt): string {
  switch (prompt) {
    case 'term':
      return word.term;
    case 'definition':
      return word.definition.length > 0 ? word.definition : word.term;
    case 'pronunciation':
      return word.pronunciation.length > 0 ? word.pronunciation : word.term;
  }
}
