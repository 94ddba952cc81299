/**
 * SM-2 review scheduling.
 *
 * Pure functions: every update returns a new card and never touches the
 * input. Success grows the interval (1 day, 4 days, then interval x EF);
 * any rating below "good" collapses it to a ten-minute retry.
 */

import {
  DAY_MS,
  DEFAULT_EASE_FACTOR,
  DEFAULT_FAILURE_EASE_PENALTY,
  DEFAULT_VERY_EASY_BONUS,
  FIRST_INTERVAL_DAYS,
  HARD_QUALITY,
  LAPSE_INTERVAL_DAYS,
  LEVEL_HISTORY_WINDOW,
  MAX_CARD_LEVEL,
  MIN_EASE_FACTOR,
  PASSING_QUALITY,
  REQUIRED_LAPSE_EASE_PENALTY,
  SECOND_INTERVAL_DAYS,
  VERY_EASY_QUALITY,
} from './constants';
import { InvalidQualityError } from './errors';
import type { Card, ID, Quality, ReviewEvent } from './types';

export interface Sm2Options {
  /** Multiplier applied to the interval on a "very easy" (5) rating. 1 disables it. */
  veryEasyBonus?: number;
  /** Ease factor decrease on an ordinary failure. */
  failureEasePenalty?: number;
}

export function isQuality(value: unknown): value is Quality {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= 5;
}

export function assertQuality(value: unknown): Quality {
  if (!isQuality(value)) {
    throw new InvalidQualityError(value);
  }
  return value;
}

export function createCard(questionId: ID): Card {
  return {
    questionId,
    repetitionCount: 0,
    easeFactor: DEFAULT_EASE_FACTOR,
    interval: 0,
    dueAt: null,
    lastQuality: null,
    level: 0,
    history: [],
  };
}

export function getOrCreateCard(card: Card | null | undefined, questionId: ID): Card {
  return card ?? createCard(questionId);
}

export function isReviewed(card: Card | undefined): boolean {
  if (!card) return false;
  return card.history.length > 0 || card.repetitionCount > 0;
}

export function isDue(card: Card, now: Date): boolean {
  return card.dueAt !== null && card.dueAt.getTime() <= now.getTime();
}

function clampEaseFactor(value: number): number {
  return Math.max(MIN_EASE_FACTOR, value);
}

function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + Math.round(days * DAY_MS));
}

function easeDelta(quality: Quality): number {
  const miss = 5 - quality;
  return 0.1 - miss * (0.08 + miss * 0.02);
}

/**
 * 0 for unseen or freshly lapsed cards, up to 5 once the card has a long
 * streak with consistently high ratings.
 */
export function calculateCardLevel(repetitionCount: number, history: readonly ReviewEvent[]): number {
  if (history.length === 0) {
    return repetitionCount === 0 ? 0 : 1;
  }

  const recent = history.slice(-LEVEL_HISTORY_WINDOW);
  const average = recent.reduce((sum, event) => sum + event.quality, 0) / recent.length;

  if (repetitionCount === 0) return 0;
  if (repetitionCount >= 5 && average >= 4.5) return MAX_CARD_LEVEL;
  if (repetitionCount >= 3 && average >= 4.0) return 4;
  if (repetitionCount >= 2 && average >= 3.5) return 3;
  if (repetitionCount >= 1 && average >= 3.0) return 2;
  return 1;
}

function finalizeCard(
  card: Card,
  quality: Quality,
  now: Date,
  next: { easeFactor: number; repetitionCount: number; interval: number },
): Card {
  const event: ReviewEvent = {
    timestamp: now,
    quality,
    interval: next.interval,
    easeFactor: next.easeFactor,
  };
  const history = [...card.history, event];

  return {
    ...card,
    easeFactor: next.easeFactor,
    repetitionCount: next.repetitionCount,
    interval: next.interval,
    dueAt: addDays(now, next.interval),
    lastQuality: quality,
    level: calculateCardLevel(next.repetitionCount, history),
    history,
  };
}

/**
 * Applies one review to a card.
 *
 * `quality` must already be validated; use {@link assertQuality} on anything
 * that came from outside the process.
 */
export function updateCard(card: Card, quality: Quality, now: Date, options: Sm2Options = {}): Card {
  const veryEasyBonus = options.veryEasyBonus ?? DEFAULT_VERY_EASY_BONUS;
  const failureEasePenalty = options.failureEasePenalty ?? DEFAULT_FAILURE_EASE_PENALTY;

  if (quality < PASSING_QUALITY) {
    return finalizeCard(card, quality, now, {
      easeFactor: clampEaseFactor(card.easeFactor - failureEasePenalty),
      repetitionCount: 0,
      interval: LAPSE_INTERVAL_DAYS,
    });
  }

  let easeFactor = card.easeFactor;
  let interval: number;
  if (card.repetitionCount === 0) {
    interval = FIRST_INTERVAL_DAYS;
  } else if (card.repetitionCount === 1) {
    interval = SECOND_INTERVAL_DAYS;
  } else {
    easeFactor = clampEaseFactor(easeFactor + easeDelta(quality));
    interval = Math.round(card.interval * easeFactor);
  }

  if (quality === VERY_EASY_QUALITY && veryEasyBonus !== 1) {
    interval = Math.max(interval, Math.round(interval * veryEasyBonus));
  }

  return finalizeCard(card, quality, now, {
    easeFactor,
    repetitionCount: card.repetitionCount + 1,
    interval,
  });
}

/**
 * A "hard" rating on a required question is treated as a full lapse with an
 * ease penalty; everything else goes through {@link updateCard}.
 */
export function applyReviewPolicy(
  card: Card,
  quality: Quality,
  isRequired: boolean,
  now: Date,
  options: Sm2Options = {},
): Card {
  if (isRequired && quality === HARD_QUALITY) {
    return finalizeCard(card, quality, now, {
      easeFactor: clampEaseFactor(card.easeFactor - REQUIRED_LAPSE_EASE_PENALTY),
      repetitionCount: 0,
      interval: LAPSE_INTERVAL_DAYS,
    });
  }
  return updateCard(card, quality, now, options);
}
