/**
 * Study Session Service Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { AnswerScoredPayload, SessionCompletedPayload } from '../../../src/core/event-bus';
import { EventBus } from '../../../src/core/event-bus';
import {
  CHOICE_FALLBACK_PROMPTS,
  FILL_IN_FALLBACK_PROMPT,
  StudySessionService,
} from '../../../src/services/study-session.service';
import { fixedClock } from '../../../src/utils/clock';
import type { RandomSource } from '../../../src/utils/random';
import {
  T1,
  captureError,
  keepOrder,
  makeListWith,
  sequenceRandom,
} from '../../helpers/factories';

// 骰子取值：floor(v * 100)
const RECOGNITION = 0;
const FILL_IN = 0.5;
const CHOICE = 0.8;
const DEFINITION_TARGET = 0.5;
const PRONUNCIATION_TARGET = 0.97;

describe('StudySessionService', () => {
  let events: EventBus;
  let scored: AnswerScoredPayload[];
  let completed: SessionCompletedPayload[];

  const createService = (random: RandomSource) =>
    new StudySessionService({ random, clock: fixedClock(T1), events });

  beforeEach(() => {
    events = new EventBus();
    scored = [];
    completed = [];
    events.subscribe('ANSWER_SCORED', (payload) => {
      scored.push(payload);
    });
    events.subscribe('SESSION_COMPLETED', (payload) => {
      completed.push(payload);
    });
  });

  describe('prepareQueue', () => {
    it('should complete immediately when no entry is due', () => {
      const { list } = makeListWith([
        { term: 'alpha', proficiency: 90 },
        { term: 'beta', proficiency: 100 },
      ]);
      const service = createService(sequenceRandom([]));

      const state = service.prepareQueue(list);

      expect(state.status).toBe('complete');
      expect(state.completion).toBe('empty');
      expect(state.queue).toHaveLength(0);
      expect(state.question).toBeNull();
      expect(service.currentQuestion(state)).toBeNull();
      expect(service.sessionProgress(state)).toEqual({ remaining: 0, total: 0 });
      expect(completed).toHaveLength(1);
      expect(completed[0].completion).toBe('empty');
    });

    it('should queue only entries below the due threshold', () => {
      const { list, entries } = makeListWith([
        { term: 'alpha', proficiency: 0 },
        { term: 'beta', proficiency: 95 },
        { term: 'gamma', proficiency: 89 },
      ]);
      const service = createService(sequenceRandom([...keepOrder(1), FILL_IN]));

      const state = service.prepareQueue(list);

      expect(state.status).toBe('active');
      expect(state.queue.map((e) => e.term)).toEqual(['alpha', 'gamma']);
      expect(service.currentWord(state)).toBe(entries[0]);
      expect(service.sessionProgress(state)).toEqual({ remaining: 2, total: 2 });
    });

    it('should shuffle the due entries with the injected random source', () => {
      const { list } = makeListWith([{ term: 'a' }, { term: 'b' }, { term: 'c' }]);
      // i=2: j=floor(0*3)=0 → [c,b,a]; i=1: j=floor(0*2)=0 → [b,c,a]
      const service = createService(sequenceRandom([0, 0, FILL_IN]));

      const state = service.prepareQueue(list);

      expect(state.queue.map((e) => e.term)).toEqual(['b', 'c', 'a']);
    });
  });

  describe('buildQuestion', () => {
    it('should pick a recognition prompt among the non-empty faces', () => {
      const { list } = makeListWith([
        { term: 'lucid', definition: 'clear and easy to understand', pronunciation: '[ˈluːsɪd]' },
      ]);
      // prompts = [term, definition, pronunciation]，floor(0.5 * 3) = 1
      const service = createService(sequenceRandom([RECOGNITION, 0.5]));

      const question = service.currentQuestion(service.prepareQueue(list));

      expect(question).toEqual({
        kind: 'recognition',
        wordId: list.entries[0].id,
        prompt: 'definition',
        promptText: 'clear and easy to understand',
      });
    });

    it('should fall back to the term when the entry has no definition or pronunciation', () => {
      const { list } = makeListWith([{ term: 'lucid' }]);
      const service = createService(sequenceRandom([RECOGNITION, 0.9]));

      const question = service.currentQuestion(service.prepareQueue(list));

      expect(question).toMatchObject({ kind: 'recognition', prompt: 'term', promptText: 'lucid' });
    });

    it('should use the definition as the fill-in prompt', () => {
      const { list } = makeListWith([{ term: 'lucid', definition: 'clear' }]);
      const service = createService(sequenceRandom([FILL_IN]));

      const question = service.currentQuestion(service.prepareQueue(list));

      expect(question).toEqual({ kind: 'fill-in', wordId: list.entries[0].id, promptText: 'clear' });
    });

    it('should use the generic spelling prompt when the definition is empty', () => {
      const { list } = makeListWith([{ term: 'lucid' }]);
      const service = createService(sequenceRandom([0.66]));

      const question = service.currentQuestion(service.prepareQueue(list));

      expect(question).toMatchObject({ kind: 'fill-in', promptText: FILL_IN_FALLBACK_PROMPT });
    });

    it('should build multiple choice with distractors from the rest of the queue', () => {
      const { list, entries } = makeListWith([
        { term: 'w1', definition: 'first' },
        { term: 'w2' },
        { term: 'w3' },
        { term: 'w4' },
        { term: 'w5' },
      ]);
      const [w1, w2, w3, w4] = entries;
      const service = createService(
        sequenceRandom([...keepOrder(4), CHOICE, DEFINITION_TARGET, ...keepOrder(3), ...keepOrder(3)]),
      );

      const question = service.currentQuestion(service.prepareQueue(list));

      expect(question).toEqual({
        kind: 'multiple-choice',
        wordId: w1.id,
        target: 'definition',
        promptText: 'first',
        options: [
          { id: w2.id, term: 'w2' },
          { id: w3.id, term: 'w3' },
          { id: w4.id, term: 'w4' },
          { id: w1.id, term: 'w1' },
        ],
      });
    });

    it('should top up distractors from entries outside the queue', () => {
      const { list, entries } = makeListWith([
        { term: 'w1' },
        { term: 'w2' },
        { term: 'w3', proficiency: 95 },
        { term: 'w4', proficiency: 95 },
      ]);
      const service = createService(
        sequenceRandom([...keepOrder(1), CHOICE, DEFINITION_TARGET, ...keepOrder(2), ...keepOrder(3)]),
      );

      const question = service.currentQuestion(service.prepareQueue(list));

      expect(question?.kind).toBe('multiple-choice');
      if (question?.kind !== 'multiple-choice') return;
      expect(question.options.map((o) => o.term)).toEqual(['w2', 'w3', 'w4', 'w1']);
      expect(question.options.map((o) => o.id)).toEqual([entries[1].id, entries[2].id, entries[3].id, entries[0].id]);
    });

    it('should offer fewer options when the list is too small', () => {
      const { list } = makeListWith([{ term: 'w1' }, { term: 'w2' }]);
      const service = createService(sequenceRandom([...keepOrder(1), CHOICE, DEFINITION_TARGET]));

      const question = service.currentQuestion(service.prepareQueue(list));

      if (question?.kind !== 'multiple-choice') {
        throw new Error(`expected multiple-choice, got ${question?.kind}`);
      }
      expect(question.options.map((o) => o.term).sort()).toEqual(['w1', 'w2']);
      expect(question.promptText).toBe(CHOICE_FALLBACK_PROMPTS.definition);
    });

    it('should target the pronunciation when the second roll is at least 95', () => {
      const { list } = makeListWith([{ term: 'w1', definition: 'first', pronunciation: '[w1]' }]);
      const service = createService(sequenceRandom([CHOICE, PRONUNCIATION_TARGET]));

      const question = service.currentQuestion(service.prepareQueue(list));

      expect(question).toMatchObject({ kind: 'multiple-choice', target: 'pronunciation', promptText: '[w1]' });
    });
  });

  describe('submitAnswer', () => {
    it('should score a known recognition answer once and auto-advance', () => {
      const { list, entries } = makeListWith([
        { term: 'A', proficiency: 0 },
        { term: 'B', proficiency: 95 },
      ]);
      const [a, b] = entries;
      const service = createService(sequenceRandom([RECOGNITION, 0]));

      const started = service.prepareQueue(list);
      expect(started.queue).toEqual([a]);

      const answered = service.submitAnswer(started, { kind: 'recognition', known: true });

      expect(a.proficiency).toBe(5);
      expect(a.lastReviewedAt).toEqual(T1);
      expect(b.proficiency).toBe(95);
      expect(b.lastReviewedAt).toBeNull();
      expect(answered.status).toBe('complete');
      expect(answered.completion).toBe('finished');

      const again = service.submitAnswer(answered, { kind: 'recognition', known: true });
      expect(again).toBe(answered);
      expect(a.proficiency).toBe(5);

      const advanced = service.advance(again);
      expect(advanced.status).toBe('complete');
      expect(service.sessionProgress(advanced)).toEqual({ remaining: 0, total: 1 });
    });

    it('should not change proficiency for an unknown recognition answer', () => {
      const { list, entries } = makeListWith([{ term: 'A', proficiency: 40 }]);
      const service = createService(sequenceRandom([RECOGNITION, 0]));

      service.submitAnswer(service.prepareQueue(list), { kind: 'recognition', known: false });

      expect(entries[0].proficiency).toBe(40);
      expect(entries[0].lastReviewedAt).toEqual(T1);
      expect(scored).toHaveLength(1);
      expect(scored[0]).toMatchObject({ correct: false, delta: 0, proficiencyBefore: 40, proficiencyAfter: 40 });
    });

    it('should match fill-in answers ignoring case and surrounding whitespace', () => {
      const { list, entries } = makeListWith([{ term: 'term', definition: 'a word' }]);
      const service = createService(sequenceRandom([FILL_IN]));

      const state = service.submitAnswer(service.prepareQueue(list), { kind: 'fill-in', input: ' Term ' });

      expect(state.scored).toBe(true);
      expect(state.status).toBe('active');
      expect(state.feedback).toEqual({ correct: true, delta: 30, expected: 'term', input: ' Term ' });
      expect(entries[0].proficiency).toBe(30);
    });

    it('should apply the fill-in delta only once when submitted twice', () => {
      const { list, entries } = makeListWith([{ term: 'term' }]);
      const service = createService(sequenceRandom([FILL_IN]));

      const first = service.submitAnswer(service.prepareQueue(list), { kind: 'fill-in', input: 'term' });
      const second = service.submitAnswer(first, { kind: 'fill-in', input: 'term' });

      expect(second).toBe(first);
      expect(entries[0].proficiency).toBe(30);
      expect(scored).toHaveLength(1);
    });

    it('should score a wrong fill-in answer with zero delta', () => {
      const { list, entries } = makeListWith([{ term: 'term', proficiency: 20 }]);
      const service = createService(sequenceRandom([FILL_IN]));

      const state = service.submitAnswer(service.prepareQueue(list), { kind: 'fill-in', input: 'terms' });

      expect(state.feedback).toEqual({ correct: false, delta: 0, expected: 'term', input: 'terms' });
      expect(entries[0].proficiency).toBe(20);
    });

    it('should score multiple choice by the selected option', () => {
      const { list, entries } = makeListWith([{ term: 'w1' }, { term: 'w2' }, { term: 'w3' }, { term: 'w4' }]);
      const [w1, w2] = entries;
      const service = createService(
        sequenceRandom([...keepOrder(3), CHOICE, DEFINITION_TARGET, ...keepOrder(2), ...keepOrder(3)]),
      );

      const wrong = service.submitAnswer(service.prepareQueue(list), { kind: 'multiple-choice', optionId: w2.id });

      expect(wrong.feedback).toEqual({ correct: false, delta: 0, expected: 'w1', selectedOptionId: w2.id });
      expect(w1.proficiency).toBe(0);
      expect(w1.lastReviewedAt).toEqual(T1);
    });

    it('should raise proficiency by 15 for a correct choice', () => {
      const { list, entries } = makeListWith([{ term: 'w1', proficiency: 10 }, { term: 'w2' }]);
      const service = createService(sequenceRandom([...keepOrder(1), CHOICE, DEFINITION_TARGET]));

      const state = service.submitAnswer(service.prepareQueue(list), {
        kind: 'multiple-choice',
        optionId: entries[0].id,
      });

      expect(state.feedback?.correct).toBe(true);
      expect(entries[0].proficiency).toBe(25);
    });

    it('should reject an option that is not part of the question', () => {
      const { list } = makeListWith([{ term: 'w1' }, { term: 'w2' }]);
      const service = createService(sequenceRandom([...keepOrder(1), CHOICE, DEFINITION_TARGET]));
      const state = service.prepareQueue(list);

      const error = captureError(() =>
        service.submitAnswer(state, { kind: 'multiple-choice', optionId: 'not-an-option' }),
      );

      expect(error).toMatchObject({ code: 'VALIDATION_ERROR' });
      expect(list.entries[0].lastReviewedAt).toBeNull();
    });

    it('should reject an answer whose kind does not match the question', () => {
      const { list } = makeListWith([{ term: 'w1' }]);
      const service = createService(sequenceRandom([FILL_IN]));
      const state = service.prepareQueue(list);

      const error = captureError(() => service.submitAnswer(state, { kind: 'recognition', known: true }));

      expect(error).toMatchObject({
        code: 'ANSWER_MISMATCH',
        details: { expected: 'fill-in', received: 'recognition' },
      });
    });

    it('should reject a malformed answer', () => {
      const { list } = makeListWith([{ term: 'w1' }, { term: 'w2' }]);
      const service = createService(sequenceRandom([...keepOrder(1), CHOICE, DEFINITION_TARGET]));
      const state = service.prepareQueue(list);

      const error = captureError(() => service.submitAnswer(state, { kind: 'multiple-choice', optionId: '' }));

      expect(error).toMatchObject({ code: 'VALIDATION_ERROR' });
    });

    it('should ignore answers on a completed session', () => {
      const { list } = makeListWith([{ term: 'w1', proficiency: 99 }]);
      const service = createService(sequenceRandom([]));
      const state = service.prepareQueue(list);

      expect(service.submitAnswer(state, { kind: 'recognition', known: true })).toBe(state);
      expect(scored).toHaveLength(0);
    });
  });

  describe('advance', () => {
    it('should move to the next word after a scored answer', () => {
      const { list, entries } = makeListWith([{ term: 'w1' }, { term: 'w2' }]);
      const service = createService(sequenceRandom([...keepOrder(1), FILL_IN, FILL_IN]));

      const answered = service.submitAnswer(service.prepareQueue(list), { kind: 'fill-in', input: 'w1' });
      const next = service.advance(answered);

      expect(next.index).toBe(1);
      expect(next.scored).toBe(false);
      expect(next.feedback).toBeNull();
      expect(service.currentWord(next)).toBe(entries[1]);
      expect(service.sessionProgress(next)).toEqual({ remaining: 1, total: 2 });
      expect(scored).toHaveLength(1);
    });

    it('should score an unanswered question as a skip before moving on', () => {
      const { list, entries } = makeListWith([{ term: 'w1', proficiency: 50 }, { term: 'w2' }]);
      const service = createService(sequenceRandom([...keepOrder(1), FILL_IN, FILL_IN]));

      const next = service.advance(service.prepareQueue(list));

      expect(next.index).toBe(1);
      expect(entries[0].proficiency).toBe(50);
      expect(entries[0].lastReviewedAt).toEqual(T1);
      expect(scored).toEqual([
        expect.objectContaining({ entryId: entries[0].id, questionKind: 'fill-in', correct: false, delta: 0 }),
      ]);
    });

    it('should complete the session after the last word', () => {
      const { list } = makeListWith([{ term: 'w1' }]);
      const service = createService(sequenceRandom([FILL_IN]));

      const answered = service.submitAnswer(service.prepareQueue(list), { kind: 'fill-in', input: 'nope' });
      const done = service.advance(answered);

      expect(done.status).toBe('complete');
      expect(done.completion).toBe('finished');
      expect(done.index).toBe(1);
      expect(service.currentWord(done)).toBeNull();
      expect(completed).toEqual([expect.objectContaining({ completion: 'finished', queueSize: 1, endedAt: T1 })]);
      expect(service.advance(done)).toBe(done);
    });
  });

  describe('goPrevious', () => {
    it('should stay put on the first word', () => {
      const { list } = makeListWith([{ term: 'w1' }, { term: 'w2' }]);
      const service = createService(sequenceRandom([...keepOrder(1), FILL_IN]));
      const state = service.prepareQueue(list);

      expect(service.goPrevious(state)).toBe(state);
    });

    it('should step back and build a fresh question for that word', () => {
      const { list, entries } = makeListWith([{ term: 'w1' }, { term: 'w2' }]);
      const service = createService(sequenceRandom([...keepOrder(1), FILL_IN, FILL_IN, RECOGNITION, 0]));

      const second = service.advance(service.prepareQueue(list));
      const back = service.goPrevious(second);

      expect(back.index).toBe(0);
      expect(back.scored).toBe(false);
      expect(back.question).toEqual({
        kind: 'recognition',
        wordId: entries[0].id,
        prompt: 'term',
        promptText: 'w1',
      });
    });

    it('should allow the revisited word to be scored again', () => {
      const { list, entries } = makeListWith([{ term: 'w1' }, { term: 'w2' }]);
      const service = createService(sequenceRandom([...keepOrder(1), FILL_IN, FILL_IN, FILL_IN]));

      const answered = service.submitAnswer(service.prepareQueue(list), { kind: 'fill-in', input: 'w1' });
      const back = service.goPrevious(service.advance(answered));
      service.submitAnswer(back, { kind: 'fill-in', input: 'w1' });

      expect(entries[0].proficiency).toBe(60);
    });
  });

  describe('configuration', () => {
    it('should honour a custom due threshold and deltas', () => {
      const { list, entries } = makeListWith([
        { term: 'w1', proficiency: 60 },
        { term: 'w2', proficiency: 40 },
      ]);
      const service = new StudySessionService({
        random: sequenceRandom([RECOGNITION, 0]),
        clock: fixedClock(T1),
        events,
        config: { dueThreshold: 50, deltas: { recognitionKnown: 10 } },
      });

      const state = service.prepareQueue(list);
      expect(state.queue).toEqual([entries[1]]);

      service.submitAnswer(state, { kind: 'recognition', known: true });
      expect(entries[1].proficiency).toBe(50);
    });
  });
});
