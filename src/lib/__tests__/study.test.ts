import { afterEach, describe, expect, it, vi } from 'vitest';

import { DAY_MS, MINUTE_MS } from '../constants';
import type { SchedulerConfig } from '../env';
import { InvalidQualityError, SessionStateError } from '../errors';
import { createQuestionBank, type QuestionEntry } from '../question-bank';
import { createUserRandoms } from '../random';
import { groupQuestionIds } from '../session';
import { createCard, updateCard } from '../sm2';
import { MemoryCardStore, MemoryQueueStore } from '../stores';
import { loadSession, nextGroup, skipCurrent, startSession, submitEvaluation, type StudyDependencies } from '../study';
import type { QuestionGroup, SessionQueueState } from '../types';

const NOW = new Date('2024-04-01T09:00:00.000Z');
const USER = 'user-1';

const BANK: QuestionEntry[] = [
  { id: '112A5', subject: '保存修復学' },
  { id: '112A40', subject: '保存修復学' },
  { id: '116B30', subject: '矯正歯科学', caseId: '116B-case-1' },
  { id: '116B31', subject: '矯正歯科学', caseId: '116B-case-1' },
];

const CONFIG: SchedulerConfig = {
  newCardsPerDay: 10,
  reviewBias: 0.3,
  reviewBacklogThreshold: 5,
  shortReviewMinutes: 15,
  veryEasyBonus: 1.3,
  failureEasePenalty: 0,
  randomSeed: null,
};

const CASE_GROUP: QuestionGroup = { kind: 'case', caseId: '116B-case-1', ids: ['116B30', '116B31'] };

function single(id: string): QuestionGroup {
  return { kind: 'single', id };
}

function setup(config: Partial<SchedulerConfig> = {}, entries: QuestionEntry[] = BANK) {
  const cards = new MemoryCardStore();
  const queues = new MemoryQueueStore();
  const clock = { now: NOW };
  const deps: StudyDependencies = {
    cards,
    queues,
    questions: createQuestionBank(entries),
    clock: () => clock.now,
    randomFor: createUserRandoms(7),
    config: { ...CONFIG, ...config },
  };
  const advance = (minutes: number) => {
    clock.now = new Date(clock.now.getTime() + minutes * MINUTE_MS);
  };
  const seed = (state: Partial<SessionQueueState>) =>
    queues.saveQueueState(USER, { mainQueue: [], shortTermReviews: [], currentGroup: null, ...state });
  return { deps, cards, queues, advance, seed };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('startSession', () => {
  it('queues every new question and serves the first group', async () => {
    const { deps, queues } = setup();

    const step = await startSession(deps, USER);

    expect(step.status).toBe('active');
    expect(step.source).toBe('main');
    expect(step.queueSaved).toBe(true);
    const served = [step.currentGroup, ...step.mainQueue].flatMap((group) => (group ? groupQuestionIds(group) : []));
    expect([...served].sort()).toEqual(['112A40', '112A5', '116B30', '116B31']);
    await expect(queues.loadQueueState(USER)).resolves.toEqual({
      mainQueue: step.mainQueue,
      shortTermReviews: [],
      currentGroup: step.currentGroup,
    });
  });

  it('serves due reviews even when the new quota is used up', async () => {
    const { deps, cards } = setup({ newCardsPerDay: 0 });
    const reviewed = updateCard(createCard('112A40'), 4, new Date(NOW.getTime() - 2 * DAY_MS));
    await cards.putCard(USER, reviewed);

    const step = await startSession(deps, USER);

    expect(step.currentGroup).toEqual(single('112A40'));
    expect(step.mainQueue).toEqual([]);
  });
});

describe('submitEvaluation', () => {
  it('updates the card and moves on to the next group', async () => {
    const { deps, cards, seed } = setup();
    await seed({ currentGroup: single('112A40'), mainQueue: [single('112A5')] });

    const result = await submitEvaluation(deps, USER, 4);

    expect(result.updatedCards).toHaveLength(1);
    expect(result.updatedCards[0]).toMatchObject({ questionId: '112A40', repetitionCount: 1, interval: 1 });
    expect(result.failedWrites).toEqual([]);
    expect(result.requeued).toBe(false);
    expect(result.currentGroup).toEqual(single('112A5'));
    expect(result.source).toBe('main');
    await expect(cards.getCard(USER, '112A40')).resolves.toEqual(result.updatedCards[0]);
  });

  it('applies the lapse policy to a hard required question and requeues it', async () => {
    const { deps, cards, seed } = setup();
    await cards.putCard(USER, { ...createCard('112A5'), repetitionCount: 2, interval: 7 });
    await seed({ currentGroup: single('112A5'), mainQueue: [single('112A40')] });

    const result = await submitEvaluation(deps, USER, 2);

    expect(result.updatedCards[0].easeFactor).toBeCloseTo(2.3, 10);
    expect(result.updatedCards[0].repetitionCount).toBe(0);
    expect(result.requeued).toBe(true);
    expect(result.reviews).toEqual([
      { group: single('112A5'), readyAt: new Date(NOW.getTime() + 15 * MINUTE_MS) },
    ]);
    expect(result.currentGroup).toEqual(single('112A40'));
  });

  it('rates every member of a case group', async () => {
    const { deps, cards, seed } = setup();
    await seed({ currentGroup: CASE_GROUP });

    const result = await submitEvaluation(deps, USER, 5);

    expect(result.updatedCards.map((card) => [card.questionId, card.interval])).toEqual([
      ['116B30', 1],
      ['116B31', 1],
    ]);
    expect((await cards.listCards(USER)).size).toBe(2);
    expect(result.status).toBe('done');
    expect(result.currentGroup).toBeNull();
    expect(result.source).toBeNull();
  });

  it('rejects an invalid rating before touching anything', async () => {
    const { deps, cards, seed } = setup();
    await seed({ currentGroup: single('112A5') });

    await expect(submitEvaluation(deps, USER, 7)).rejects.toThrow(InvalidQualityError);
    expect((await cards.listCards(USER)).size).toBe(0);
    expect((await loadSession(deps, USER)).currentGroup).toEqual(single('112A5'));
  });

  it('requires an active group', async () => {
    const { deps } = setup();
    await expect(submitEvaluation(deps, USER, 4)).rejects.toThrow(SessionStateError);
  });

  it('retries a card write once after a transient error', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const { deps, cards, seed } = setup();
    await seed({ currentGroup: single('112A40') });
    const putCard = vi.spyOn(cards, 'putCard').mockRejectedValueOnce({ code: 14 });

    const result = await submitEvaluation(deps, USER, 4);

    expect(putCard).toHaveBeenCalledTimes(2);
    expect(result.failedWrites).toEqual([]);
    await expect(cards.getCard(USER, '112A40')).resolves.not.toBeNull();
  });

  it('reports a failed write and still advances the queue', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const { deps, cards, seed } = setup();
    await seed({ currentGroup: single('112A40'), mainQueue: [single('112A5')] });
    const putCard = vi
      .spyOn(cards, 'putCard')
      .mockRejectedValue(Object.assign(new Error('permission denied'), { code: 7 }));

    const result = await submitEvaluation(deps, USER, 4);

    expect(putCard).toHaveBeenCalledTimes(1);
    expect(result.failedWrites).toEqual(['112A40']);
    expect(result.currentGroup).toEqual(single('112A5'));
    expect((await loadSession(deps, USER)).currentGroup).toEqual(single('112A5'));
  });

  it('flags a queue that could not be saved', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const { deps, queues, seed } = setup();
    await seed({ currentGroup: single('112A40') });
    vi.spyOn(queues, 'saveQueueState').mockRejectedValueOnce(new Error('offline'));

    const result = await submitEvaluation(deps, USER, 4);

    expect(result.queueSaved).toBe(false);
    expect(result.status).toBe('done');
  });
});

describe('skipCurrent', () => {
  it('moves the group to the back without touching its card', async () => {
    const { deps, cards, seed } = setup();
    await seed({ currentGroup: single('112A5'), mainQueue: [single('112A40'), CASE_GROUP] });

    const step = await skipCurrent(deps, USER);

    expect(step.currentGroup).toEqual(single('112A40'));
    expect(step.mainQueue).toEqual([CASE_GROUP, single('112A5')]);
    expect((await cards.listCards(USER)).size).toBe(0);
  });

  it('requires an active group', async () => {
    const { deps } = setup();
    await expect(skipCurrent(deps, USER)).rejects.toThrow(SessionStateError);
  });
});

describe('nextGroup', () => {
  it('returns the active group unchanged', async () => {
    const { deps, seed } = setup();
    await seed({ currentGroup: single('112A5'), mainQueue: [single('112A40')] });

    const step = await nextGroup(deps, USER);

    expect(step.currentGroup).toEqual(single('112A5'));
    expect(step.source).toBeNull();
    expect(step.mainQueue).toEqual([single('112A40')]);
  });

  it('waits for a pending review and serves it once ready', async () => {
    const { deps, seed, advance } = setup();
    const readyAt = new Date(NOW.getTime() + 15 * MINUTE_MS);
    await seed({ shortTermReviews: [{ group: single('112A5'), readyAt }] });

    const waiting = await nextGroup(deps, USER);
    expect(waiting.status).toBe('idle');
    expect(waiting.currentGroup).toBeNull();
    expect(waiting.nextReadyAt).toEqual(readyAt);

    advance(15);
    const ready = await nextGroup(deps, USER);
    expect(ready.currentGroup).toEqual(single('112A5'));
    expect(ready.source).toBe('review');
    expect(ready.reviews).toEqual([]);
  });

  it('reports an empty session as done', async () => {
    const { deps } = setup();
    const step = await nextGroup(deps, USER);
    expect(step.status).toBe('done');
    expect(step.nextReadyAt).toBeNull();
  });
});

describe('per-learner randomness', () => {
  const WIDE_BANK: QuestionEntry[] = Array.from({ length: 12 }, (_, i) => ({
    id: `11${i % 4}A${i + 1}`,
    subject: ['保存修復学', '歯周病学', '口腔外科学'][i % 3],
  }));

  it("keeps a learner's queue independent of other learners' activity", async () => {
    const alone = setup({}, WIDE_BANK);
    const shared = setup({}, WIDE_BANK);

    await startSession(shared.deps, 'user-2');
    await submitEvaluation(shared.deps, 'user-2', 1);
    await skipCurrent(shared.deps, 'user-2');

    const expected = await startSession(alone.deps, USER);
    const actual = await startSession(shared.deps, USER);

    expect(actual.currentGroup).toEqual(expected.currentGroup);
    expect(actual.mainQueue).toEqual(expected.mainQueue);
  });
});
