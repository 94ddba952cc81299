import {
  DEFAULT_REVIEW_BACKLOG_THRESHOLD,
  DEFAULT_REVIEW_BIAS,
  DEFAULT_SHORT_REVIEW_MINUTES,
  MINUTE_MS,
  PASSING_QUALITY,
} from './constants';
import { EmptyGroupError, SessionStateError } from './errors';
import type { RandomSource } from './random';
import { assertQuality } from './sm2';
import type { ID, QuestionGroup, SessionQueueState, SessionStatus, ShortTermReview } from './types';

export type GroupSource = 'review' | 'main';

export interface NextGroupOptions {
  now: Date;
  random: RandomSource;
  /** Chance of serving a ready review while new material is also waiting. */
  reviewBias?: number;
  /** Ready-review count at which reviews are always served first. */
  backlogThreshold?: number;
}

export interface NextGroupResult {
  state: SessionQueueState;
  group: QuestionGroup | null;
  source: GroupSource | null;
}

export interface CompleteGroupOptions {
  now: Date;
  shortReviewMinutes?: number;
}

export function groupQuestionIds(group: QuestionGroup): ID[] {
  switch (group.kind) {
    case 'single':
      return [group.id];
    case 'case':
    case 'ordering':
      return [...group.ids];
  }
}

export function groupKey(group: QuestionGroup): string {
  return groupQuestionIds(group).join('|');
}

function assertGroup(group: QuestionGroup): QuestionGroup {
  const ids = groupQuestionIds(group);
  if (ids.length === 0 || ids.some((id) => id.trim() === '')) {
    throw new EmptyGroupError();
  }
  return group;
}

export function createSessionState(groups: readonly QuestionGroup[] = []): SessionQueueState {
  return {
    mainQueue: groups.map(assertGroup),
    shortTermReviews: [],
    currentGroup: null,
  };
}

export function sessionStatus(state: SessionQueueState): SessionStatus {
  if (state.currentGroup) return 'active';
  if (state.mainQueue.length === 0 && state.shortTermReviews.length === 0) return 'done';
  return 'idle';
}

/** Indexes of reviews eligible at `now`, earliest `readyAt` first. */
export function readyReviewIndexes(reviews: readonly ShortTermReview[], now: Date): number[] {
  const nowMs = now.getTime();
  return reviews
    .map((review, index) => ({ index, at: review.readyAt.getTime() }))
    .filter((entry) => entry.at <= nowMs)
    .sort((a, b) => a.at - b.at || a.index - b.index)
    .map((entry) => entry.index);
}

export function nextReadyAt(state: SessionQueueState): Date | null {
  let earliest: Date | null = null;
  for (const review of state.shortTermReviews) {
    if (!earliest || review.readyAt.getTime() < earliest.getTime()) {
      earliest = review.readyAt;
    }
  }
  return earliest;
}

function serveReview(state: SessionQueueState, index: number): NextGroupResult {
  const group = state.shortTermReviews[index].group;
  return {
    state: {
      mainQueue: state.mainQueue,
      shortTermReviews: state.shortTermReviews.filter((_, i) => i !== index),
      currentGroup: group,
    },
    group,
    source: 'review',
  };
}

function serveMain(state: SessionQueueState): NextGroupResult {
  const [group, ...rest] = state.mainQueue;
  return {
    state: { mainQueue: rest, shortTermReviews: state.shortTermReviews, currentGroup: group },
    group,
    source: 'main',
  };
}

/**
 * Picks the next group while idle: a backlog of ready reviews wins outright,
 * otherwise reviews are interleaved with new groups at `reviewBias`.
 */
export function takeNextGroup(state: SessionQueueState, options: NextGroupOptions): NextGroupResult {
  if (state.currentGroup) {
    throw new SessionStateError('A question group is already active; evaluate or skip it first.');
  }

  const reviewBias = options.reviewBias ?? DEFAULT_REVIEW_BIAS;
  const backlogThreshold = options.backlogThreshold ?? DEFAULT_REVIEW_BACKLOG_THRESHOLD;
  const ready = readyReviewIndexes(state.shortTermReviews, options.now);
  const hasMain = state.mainQueue.length > 0;

  if (ready.length >= backlogThreshold) {
    return serveReview(state, ready[0]);
  }
  if (ready.length > 0 && hasMain) {
    return options.random.nextFloat() < reviewBias ? serveReview(state, ready[0]) : serveMain(state);
  }
  if (ready.length > 0) {
    return serveReview(state, ready[0]);
  }
  if (hasMain) {
    return serveMain(state);
  }
  return { state, group: null, source: null };
}

export function enqueueShortReview(
  state: SessionQueueState,
  group: QuestionGroup,
  readyAt: Date,
): SessionQueueState {
  return {
    ...state,
    shortTermReviews: [...state.shortTermReviews, { group: assertGroup(group), readyAt }],
  };
}

/**
 * Closes the active group after its self-evaluation. Ratings below "good"
 * send the group back for a short-term review.
 */
export function completeGroup(
  state: SessionQueueState,
  rawQuality: number,
  options: CompleteGroupOptions,
): SessionQueueState {
  const quality = assertQuality(rawQuality);
  const group = state.currentGroup;
  if (!group) {
    throw new SessionStateError('No question group is awaiting evaluation.');
  }
  assertGroup(group);

  const idle: SessionQueueState = { ...state, currentGroup: null };
  if (quality >= PASSING_QUALITY) {
    return idle;
  }

  const minutes = options.shortReviewMinutes ?? DEFAULT_SHORT_REVIEW_MINUTES;
  return enqueueShortReview(idle, group, new Date(options.now.getTime() + minutes * MINUTE_MS));
}

/** Moves the active group to the back of the main queue and serves the next one. */
export function skipGroup(state: SessionQueueState, options: NextGroupOptions): NextGroupResult {
  const group = state.currentGroup;
  if (!group) {
    throw new SessionStateError('No question group is active to skip.');
  }
  return takeNextGroup(
    { mainQueue: [...state.mainQueue, group], shortTermReviews: state.shortTermReviews, currentGroup: null },
    options,
  );
}

/** Throws when a group appears in more than one place in the state. */
export function assertQueueInvariant(state: SessionQueueState): void {
  const seen = new Set<string>();
  const locations: QuestionGroup[] = [
    ...state.mainQueue,
    ...state.shortTermReviews.map((review) => review.group),
    ...(state.currentGroup ? [state.currentGroup] : []),
  ];
  for (const group of locations) {
    const key = groupKey(group);
    if (seen.has(key)) {
      throw new SessionStateError(`Question group ${key} is queued more than once.`);
    }
    seen.add(key);
  }
}
