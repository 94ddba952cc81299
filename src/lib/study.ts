import type { SchedulerConfig } from './env';
import { EmptyGroupError, SessionStateError } from './errors';
import { isTransientFirestoreError } from './firestore-errors';
import { studyLog as log } from './logger';
import type { QuestionBank } from './question-bank';
import type { RandomFactory } from './random';
import { buildStudyQueue } from './selection';
import {
  completeGroup,
  createSessionState,
  groupQuestionIds,
  nextReadyAt,
  sessionStatus,
  skipGroup,
  takeNextGroup,
  type GroupSource,
  type NextGroupOptions,
} from './session';
import { applyReviewPolicy, assertQuality, getOrCreateCard } from './sm2';
import type { CardStore, QueueStore } from './stores';
import type { Card, Clock, ID, QuestionGroup, SessionQueueState, SessionStatus, ShortTermReview } from './types';

const MAX_CARD_WRITE_ATTEMPTS = 2;

export interface StudyDependencies {
  cards: CardStore;
  questions: QuestionBank;
  queues: QueueStore;
  clock: Clock;
  /** Returns the learner's own generator; learners never share a stream. */
  randomFor: RandomFactory;
  config: SchedulerConfig;
}

export interface SessionView {
  status: SessionStatus;
  currentGroup: QuestionGroup | null;
  mainQueue: QuestionGroup[];
  reviews: ShortTermReview[];
  nextReadyAt: Date | null;
}

export interface SessionStep extends SessionView {
  /** Where the served group came from; null when nothing was served. */
  source: GroupSource | null;
  queueSaved: boolean;
}

export interface EvaluationResult extends SessionStep {
  updatedCards: Card[];
  failedWrites: ID[];
  requeued: boolean;
}

export interface StartSessionOptions {
  recentIds?: readonly ID[];
}

export function toSessionView(state: SessionQueueState): SessionView {
  return {
    status: sessionStatus(state),
    currentGroup: state.currentGroup,
    mainQueue: state.mainQueue,
    reviews: state.shortTermReviews,
    nextReadyAt: nextReadyAt(state),
  };
}

function nextGroupOptions(deps: StudyDependencies, userId: ID, now: Date): NextGroupOptions {
  return {
    now,
    random: deps.randomFor(userId),
    reviewBias: deps.config.reviewBias,
    backlogThreshold: deps.config.reviewBacklogThreshold,
  };
}

async function saveQueue(deps: StudyDependencies, userId: ID, state: SessionQueueState): Promise<boolean> {
  try {
    await deps.queues.saveQueueState(userId, state);
    return true;
  } catch (error) {
    log.with({ userId }).error('Failed to save session state', error);
    return false;
  }
}

async function writeCard(deps: StudyDependencies, userId: ID, card: Card): Promise<boolean> {
  for (let attempt = 1; attempt <= MAX_CARD_WRITE_ATTEMPTS; attempt += 1) {
    try {
      await deps.cards.putCard(userId, card);
      return true;
    } catch (error) {
      const retry = attempt < MAX_CARD_WRITE_ATTEMPTS && isTransientFirestoreError(error);
      if (retry) {
        log.with({ userId, questionId: card.questionId }).warn('Retrying card write', error);
        continue;
      }
      log.with({ userId, questionId: card.questionId }).error('Card was not saved', error);
      return false;
    }
  }
  return false;
}

export async function loadSession(deps: StudyDependencies, userId: ID): Promise<SessionQueueState> {
  return (await deps.queues.loadQueueState(userId)) ?? createSessionState();
}

/** Builds today's queue from due reviews and new questions, then serves the first group. */
export async function startSession(
  deps: StudyDependencies,
  userId: ID,
  options: StartSessionOptions = {},
): Promise<SessionStep> {
  const now = deps.clock();
  const cards = await deps.cards.listCards(userId);
  const groups = buildStudyQueue({
    questions: deps.questions.listQuestions(),
    cards,
    now,
    newCardLimit: deps.config.newCardsPerDay,
    recentIds: options.recentIds,
    random: deps.randomFor(userId),
  });

  const next = takeNextGroup(createSessionState(groups), nextGroupOptions(deps, userId, now));
  const queueSaved = await saveQueue(deps, userId, next.state);
  log.with({ userId }).debug(`Started session with ${groups.length} groups`);

  return { ...toSessionView(next.state), source: next.source, queueSaved };
}

/** Serves a group when idle; an already active group is returned unchanged. */
export async function nextGroup(deps: StudyDependencies, userId: ID): Promise<SessionStep> {
  const state = await loadSession(deps, userId);
  if (state.currentGroup) {
    return { ...toSessionView(state), source: null, queueSaved: true };
  }

  const next = takeNextGroup(state, nextGroupOptions(deps, userId, deps.clock()));
  const queueSaved = next.group ? await saveQueue(deps, userId, next.state) : true;
  return { ...toSessionView(next.state), source: next.source, queueSaved };
}

/**
 * Records the self-evaluation for every question of the active group and
 * advances the queue. Card writes are best-effort: a failed write is
 * reported in `failedWrites` and never blocks the transition.
 */
export async function submitEvaluation(
  deps: StudyDependencies,
  userId: ID,
  rawQuality: unknown,
): Promise<EvaluationResult> {
  const quality = assertQuality(rawQuality);
  const state = await loadSession(deps, userId);
  const group = state.currentGroup;
  if (!group) {
    throw new SessionStateError('No question group is awaiting evaluation.');
  }
  const ids = groupQuestionIds(group);
  if (ids.length === 0) {
    throw new EmptyGroupError();
  }

  const now = deps.clock();
  const updatedCards: Card[] = [];
  const failedWrites: ID[] = [];

  for (const questionId of ids) {
    const question = deps.questions.getQuestion(questionId);
    const card = getOrCreateCard(await deps.cards.getCard(userId, questionId), questionId);
    const updated = applyReviewPolicy(card, quality, question?.isRequired ?? false, now, {
      veryEasyBonus: deps.config.veryEasyBonus,
      failureEasePenalty: deps.config.failureEasePenalty,
    });
    updatedCards.push(updated);
    if (!(await writeCard(deps, userId, updated))) {
      failedWrites.push(questionId);
    }
  }

  const completed = completeGroup(state, quality, { now, shortReviewMinutes: deps.config.shortReviewMinutes });
  const next = takeNextGroup(completed, nextGroupOptions(deps, userId, now));
  const queueSaved = await saveQueue(deps, userId, next.state);

  return {
    ...toSessionView(next.state),
    source: next.source,
    queueSaved,
    updatedCards,
    failedWrites,
    requeued: completed.shortTermReviews.length > state.shortTermReviews.length,
  };
}

/** Sends the active group to the back of the main queue without touching any card. */
export async function skipCurrent(deps: StudyDependencies, userId: ID): Promise<SessionStep> {
  const state = await loadSession(deps, userId);
  const next = skipGroup(state, nextGroupOptions(deps, userId, deps.clock()));
  const queueSaved = await saveQueue(deps, userId, next.state);
  return { ...toSessionView(next.state), source: next.source, queueSaved };
}
