import { describe, expect, it } from 'vitest';

import { DAY_MS } from '../constants';
import { createRandom } from '../random';
import { buildStudyQueue, collectDueCards, groupQuestions, pickNewCards, recentQuestionIds } from '../selection';
import { groupQuestionIds } from '../session';
import { createCard } from '../sm2';
import type { Card, ID, Question } from '../types';

const NOW = new Date('2024-04-01T09:00:00.000Z');

function question(id: ID, subject: string, extra: Partial<Question> = {}): Question {
  return { id, subject, isRequired: false, format: 'single', ...extra };
}

function reviewedCard(id: ID, dueAt: Date, answeredAt: Date = NOW): Card {
  return {
    ...createCard(id),
    repetitionCount: 1,
    interval: 1,
    dueAt,
    lastQuality: 4,
    level: 2,
    history: [{ timestamp: answeredAt, quality: 4, interval: 1, easeFactor: 2.5 }],
  };
}

function cardMap(cards: Card[]): Map<ID, Card> {
  return new Map(cards.map((card) => [card.questionId, card]));
}

const SUBJECTS = ['保存修復学', '歯周病学', '口腔外科学'];

describe('pickNewCards', () => {
  const bank = Array.from({ length: 30 }, (_, i) => question(`q${i}`, SUBJECTS[i % 3]));
  const reviewed = cardMap(bank.filter((_, i) => i % 3 === 0).map((q) => reviewedCard(q.id, NOW)));

  it('returns at most N distinct never-reviewed questions for any seed', () => {
    for (let seed = 1; seed <= 40; seed += 1) {
      const picked = pickNewCards({ questions: bank, cards: reviewed, count: 10, random: createRandom(seed) });

      expect(picked).toHaveLength(10);
      expect(new Set(picked).size).toBe(10);
      for (const id of picked) {
        expect(reviewed.has(id)).toBe(false);
      }
    }
  });

  it('returns every unreviewed question when fewer than N remain', () => {
    const small = [question('a1', 'A'), question('a2', 'A'), question('b1', 'B'), question('b2', 'B')];
    const picked = pickNewCards({
      questions: small,
      cards: cardMap([reviewedCard('a1', NOW)]),
      count: 10,
      random: createRandom(3),
    });
    expect([...picked].sort()).toEqual(['a2', 'b1', 'b2']);
  });

  it('returns nothing for a zero quota', () => {
    expect(pickNewCards({ questions: bank, cards: new Map(), count: 0, random: createRandom(1) })).toEqual([]);
  });

  it('still offers questions whose card was created but never answered', () => {
    const picked = pickNewCards({
      questions: [question('a1', 'A')],
      cards: cardMap([createCard('a1')]),
      count: 1,
      random: createRandom(1),
    });
    expect(picked).toEqual(['a1']);
  });

  it('favours the subject that lags behind an even share', () => {
    const questions = ['a1', 'a2', 'a3', 'a4']
      .map((id) => question(id, 'A'))
      .concat(['b1', 'b2', 'b3', 'b4'].map((id) => question(id, 'B')));
    const cards = cardMap([reviewedCard('a1', NOW), reviewedCard('a2', NOW)]);

    const picked = pickNewCards({
      questions,
      cards,
      count: 2,
      random: createRandom(11),
      poolMultiplier: 1,
      randomSpread: 0,
    });

    expect(picked).toHaveLength(2);
    for (const id of picked) {
      expect(id.startsWith('b')).toBe(true);
    }
  });

  it('steers away from recently studied subjects', () => {
    const questions = ['a1', 'a2', 'a3', 'a4']
      .map((id) => question(id, 'A'))
      .concat(['b1', 'b2', 'b3', 'b4'].map((id) => question(id, 'B')));

    const picked = pickNewCards({
      questions,
      cards: new Map(),
      count: 2,
      recentIds: ['b1', 'not-in-bank'],
      random: createRandom(11),
      poolMultiplier: 1,
      randomSpread: 0,
    });

    for (const id of picked) {
      expect(id.startsWith('a')).toBe(true);
    }
  });
});

describe('collectDueCards', () => {
  it('lists reviewed cards that are due, oldest first', () => {
    const cards = cardMap([
      reviewedCard('later', new Date(NOW.getTime() - 60 * 60 * 1000)),
      reviewedCard('future', new Date(NOW.getTime() + DAY_MS)),
      reviewedCard('oldest', new Date(NOW.getTime() - 2 * DAY_MS)),
      createCard('fresh'),
    ]);
    expect(collectDueCards(cards, NOW)).toEqual(['oldest', 'later']);
  });
});

describe('recentQuestionIds', () => {
  it('orders answered cards by their last review, newest first', () => {
    const cards = cardMap([
      reviewedCard('q1', NOW, new Date(NOW.getTime() - 3000)),
      reviewedCard('q2', NOW, new Date(NOW.getTime() - 1000)),
      reviewedCard('q3', NOW, new Date(NOW.getTime() - 2000)),
      createCard('q4'),
    ]);
    expect(recentQuestionIds(cards)).toEqual(['q2', 'q3', 'q1']);
    expect(recentQuestionIds(cards, 1)).toEqual(['q2']);
  });
});

describe('groupQuestions', () => {
  const bank: Question[] = [
    question('112A5', '保存修復学', { isRequired: true }),
    question('116B30', '矯正歯科学', { caseId: '116B-case-1' }),
    question('116B31', '矯正歯科学', { caseId: '116B-case-1' }),
    question('116B32', '矯正歯科学', { caseId: '116B-case-1' }),
    question('117C75', '歯科理工学', { format: 'ordering', expectedOrder: ['c', 'a', 'd', 'b'] }),
  ];

  it('pulls in whole cases, keeps ordering questions and drops unknown ids', () => {
    const groups = groupQuestions(['116B31', '112A5', '116B30', 'missing', '117C75', '112A5'], bank);

    expect(groups).toEqual([
      { kind: 'case', caseId: '116B-case-1', ids: ['116B30', '116B31', '116B32'] },
      { kind: 'single', id: '112A5' },
      { kind: 'ordering', ids: ['117C75'], expectedOrder: ['c', 'a', 'd', 'b'] },
    ]);
  });
});

describe('buildStudyQueue', () => {
  const bank = [
    question('112A5', 'A'),
    question('112A40', 'A'),
    question('112B12', 'B'),
    question('112B55', 'B'),
    question('113C8', 'C'),
  ];

  it('combines due reviews with new questions', () => {
    const cards = cardMap([
      reviewedCard('112A5', new Date(NOW.getTime() - DAY_MS)),
      reviewedCard('112B12', new Date(NOW.getTime() + DAY_MS)),
      reviewedCard('retired', new Date(NOW.getTime() - DAY_MS)),
    ]);

    const groups = buildStudyQueue({ questions: bank, cards, now: NOW, newCardLimit: 2, random: createRandom(9) });
    const ids = groups.flatMap(groupQuestionIds);

    expect(ids).toHaveLength(3);
    expect(ids).toContain('112A5');
    expect(ids).not.toContain('112B12');
    expect(ids).not.toContain('retired');
    expect(new Set(ids).size).toBe(3);
  });

  it('serves only due reviews when the new quota is zero', () => {
    const cards = cardMap([reviewedCard('112A5', new Date(NOW.getTime() - DAY_MS))]);
    const groups = buildStudyQueue({ questions: bank, cards, now: NOW, newCardLimit: 0, random: createRandom(9) });
    expect(groups).toEqual([{ kind: 'single', id: '112A5' }]);
  });
});
