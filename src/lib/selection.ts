import {
  RECENT_QUESTION_WINDOW,
  RECENT_SUBJECT_PENALTY,
  SELECTION_POOL_MULTIPLIER,
  SELECTION_RANDOM_SPREAD,
} from './constants';
import { shuffle, type RandomSource } from './random';
import { isDue, isReviewed } from './sm2';
import type { Card, ID, Question, QuestionGroup } from './types';

export type CardMap = ReadonlyMap<ID, Card>;

export interface PickNewCardsOptions {
  questions: readonly Question[];
  cards: CardMap;
  count: number;
  recentIds?: readonly ID[];
  random: RandomSource;
  /** Size of the shuffled top pool, as a multiple of `count`. */
  poolMultiplier?: number;
  recentPenalty?: number;
  randomSpread?: number;
}

type Candidate = { id: ID; subject: string; score: number };

type SubjectIndex = {
  subjectOf: Map<ID, string>;
  totals: Map<string, number>;
};

function buildSubjectIndex(questions: readonly Question[]): SubjectIndex {
  const subjectOf = new Map<ID, string>();
  const totals = new Map<string, number>();
  for (const question of questions) {
    if (subjectOf.has(question.id)) continue;
    subjectOf.set(question.id, question.subject);
    totals.set(question.subject, (totals.get(question.subject) ?? 0) + 1);
  }
  return { subjectOf, totals };
}

function countIntroduced(index: SubjectIndex, cards: CardMap): Map<string, number> {
  const introduced = new Map<string, number>();
  for (const [id, card] of cards) {
    const subject = index.subjectOf.get(id);
    if (subject === undefined || !isReviewed(card)) continue;
    introduced.set(subject, (introduced.get(subject) ?? 0) + 1);
  }
  return introduced;
}

/**
 * Chooses up to `count` never-reviewed questions, favouring subjects that lag
 * behind an even share and avoiding the subjects seen most recently.
 */
export function pickNewCards({
  questions,
  cards,
  count,
  recentIds = [],
  random,
  poolMultiplier = SELECTION_POOL_MULTIPLIER,
  recentPenalty = RECENT_SUBJECT_PENALTY,
  randomSpread = SELECTION_RANDOM_SPREAD,
}: PickNewCardsOptions): ID[] {
  if (count <= 0) return [];

  const index = buildSubjectIndex(questions);
  const introduced = countIntroduced(index, cards);
  const subjectCount = index.totals.size;
  const targetRatio = subjectCount > 0 ? 1 / subjectCount : 0;

  const recentSubjects = new Set<string>();
  for (const id of recentIds) {
    const subject = index.subjectOf.get(id);
    if (subject !== undefined) recentSubjects.add(subject);
  }

  const candidates: Candidate[] = [];
  const seen = new Set<ID>();
  for (const question of questions) {
    if (seen.has(question.id)) continue;
    seen.add(question.id);
    if (isReviewed(cards.get(question.id))) continue;

    const total = index.totals.get(question.subject) ?? 0;
    if (total === 0) continue;
    const currentRatio = (introduced.get(question.subject) ?? 0) / total;
    const balance = Math.max(0, targetRatio - currentRatio);
    const penalty = recentSubjects.has(question.subject) ? recentPenalty : 0;
    const jitter = random.nextFloat() * randomSpread;

    candidates.push({ id: question.id, subject: question.subject, score: balance - penalty + jitter });
  }

  const ranked = shuffle(candidates, random).sort((a, b) => b.score - a.score);
  const poolSize = Math.min(ranked.length, Math.max(count, Math.ceil(count * poolMultiplier)));
  const pool = shuffle(ranked.slice(0, poolSize), random);

  return pool.slice(0, count).map((candidate) => candidate.id);
}

/** Reviewed cards whose due time has passed, oldest first. */
export function collectDueCards(cards: CardMap, now: Date): ID[] {
  const due: Card[] = [];
  for (const card of cards.values()) {
    if (isReviewed(card) && isDue(card, now)) due.push(card);
  }
  due.sort((a, b) => (a.dueAt?.getTime() ?? 0) - (b.dueAt?.getTime() ?? 0));
  return due.map((card) => card.questionId);
}

/** Questions answered most recently, newest first. */
export function recentQuestionIds(cards: CardMap, limit: number = RECENT_QUESTION_WINDOW): ID[] {
  const answered: { id: ID; at: number }[] = [];
  for (const card of cards.values()) {
    const last = card.history[card.history.length - 1];
    if (last) answered.push({ id: card.questionId, at: last.timestamp.getTime() });
  }
  answered.sort((a, b) => b.at - a.at);
  return answered.slice(0, Math.max(0, limit)).map((entry) => entry.id);
}

/**
 * Wraps question ids into queue groups. Case questions pull in every member
 * of their case (bank order); unknown ids are dropped.
 */
export function groupQuestions(ids: readonly ID[], questions: readonly Question[]): QuestionGroup[] {
  const byId = new Map<ID, Question>();
  const caseMembers = new Map<ID, ID[]>();
  for (const question of questions) {
    if (byId.has(question.id)) continue;
    byId.set(question.id, question);
    if (question.caseId) {
      const members = caseMembers.get(question.caseId) ?? [];
      members.push(question.id);
      caseMembers.set(question.caseId, members);
    }
  }

  const placed = new Set<ID>();
  const groups: QuestionGroup[] = [];

  for (const id of ids) {
    if (placed.has(id)) continue;
    const question = byId.get(id);
    if (!question) continue;

    if (question.caseId) {
      const members = (caseMembers.get(question.caseId) ?? [id]).filter((member) => !placed.has(member));
      members.forEach((member) => placed.add(member));
      groups.push({ kind: 'case', caseId: question.caseId, ids: members });
      continue;
    }

    placed.add(id);
    if (question.format === 'ordering') {
      groups.push({ kind: 'ordering', ids: [id], expectedOrder: question.expectedOrder ?? [] });
    } else {
      groups.push({ kind: 'single', id });
    }
  }

  return groups;
}

export interface BuildStudyQueueOptions {
  questions: readonly Question[];
  cards: CardMap;
  now: Date;
  newCardLimit: number;
  recentIds?: readonly ID[];
  random: RandomSource;
}

/** Today's due reviews plus a balanced batch of new questions, shuffled and grouped. */
export function buildStudyQueue({
  questions,
  cards,
  now,
  newCardLimit,
  recentIds,
  random,
}: BuildStudyQueueOptions): QuestionGroup[] {
  const known = new Set(questions.map((question) => question.id));
  const dueIds = collectDueCards(cards, now).filter((id) => known.has(id));
  const newIds = pickNewCards({
    questions,
    cards,
    count: newCardLimit,
    recentIds: recentIds ?? recentQuestionIds(cards),
    random,
  });

  return groupQuestions(shuffle([...dueIds, ...newIds], random), questions);
}
