import { z } from 'zod';

import { DEFAULT_EASE_FACTOR, MIN_EASE_FACTOR } from './constants';
import { isQuality } from './sm2';
import type { Card, QuestionGroup, SessionQueueState } from './types';

const isoDate = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const qualitySchema = z.number().refine(isQuality, { message: 'Quality must be an integer from 1 to 5.' });

const reviewEventSchema = z.object({
  timestamp: isoDate,
  quality: qualitySchema,
  interval: z.number().nonnegative(),
  easeFactor: z.number().min(MIN_EASE_FACTOR),
});

export const cardDocumentSchema = z.object({
  questionId: z.string().min(1),
  repetitionCount: z.number().int().nonnegative().default(0),
  easeFactor: z.number().min(MIN_EASE_FACTOR).default(DEFAULT_EASE_FACTOR),
  interval: z.number().nonnegative().default(0),
  dueAt: isoDate.nullable().default(null),
  lastQuality: qualitySchema.nullable().default(null),
  level: z.number().int().nonnegative().default(0),
  history: z.array(reviewEventSchema).default([]),
});

export type CardDocument = z.input<typeof cardDocumentSchema>;

export const questionGroupSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('single'), id: z.string().min(1) }),
  z.object({ kind: z.literal('case'), caseId: z.string().min(1), ids: z.array(z.string().min(1)).min(1) }),
  z.object({
    kind: z.literal('ordering'),
    ids: z.array(z.string().min(1)).min(1),
    expectedOrder: z.array(z.string()),
  }),
]);

export const queueDocumentSchema = z.object({
  mainQueue: z.array(questionGroupSchema).default([]),
  shortTermReviews: z.array(z.object({ group: questionGroupSchema, readyAt: isoDate })).default([]),
  currentGroup: questionGroupSchema.nullable().default(null),
  updatedAt: z.string().optional(),
});

export type QueueDocument = z.input<typeof queueDocumentSchema>;

export function toCardDocument(card: Card): CardDocument {
  return {
    questionId: card.questionId,
    repetitionCount: card.repetitionCount,
    easeFactor: card.easeFactor,
    interval: card.interval,
    dueAt: card.dueAt ? card.dueAt.toISOString() : null,
    lastQuality: card.lastQuality,
    level: card.level,
    history: card.history.map((event) => ({
      timestamp: event.timestamp.toISOString(),
      quality: event.quality,
      interval: event.interval,
      easeFactor: event.easeFactor,
    })),
  };
}

/** `fallbackId` fills in `questionId` for documents keyed only by their path. */
export function parseCardDocument(data: unknown, fallbackId?: string): Card {
  const source = data && typeof data === 'object' && fallbackId ? { questionId: fallbackId, ...data } : data;
  return cardDocumentSchema.parse(source);
}

function copyGroup(group: QuestionGroup): QuestionGroup {
  switch (group.kind) {
    case 'single':
      return { kind: 'single', id: group.id };
    case 'case':
      return { kind: 'case', caseId: group.caseId, ids: [...group.ids] };
    case 'ordering':
      return { kind: 'ordering', ids: [...group.ids], expectedOrder: [...group.expectedOrder] };
  }
}

export function serializeQueueState(state: SessionQueueState, updatedAt?: Date): QueueDocument {
  const document: QueueDocument = {
    mainQueue: state.mainQueue.map(copyGroup),
    shortTermReviews: state.shortTermReviews.map((review) => ({
      group: copyGroup(review.group),
      readyAt: review.readyAt.toISOString(),
    })),
    currentGroup: state.currentGroup ? copyGroup(state.currentGroup) : null,
  };
  if (updatedAt) document.updatedAt = updatedAt.toISOString();
  return document;
}

export function parseQueueState(data: unknown): SessionQueueState {
  const { mainQueue, shortTermReviews, currentGroup } = queueDocumentSchema.parse(data);
  return { mainQueue, shortTermReviews, currentGroup };
}

export function safeParseQueueState(data: unknown): SessionQueueState | null {
  const result = queueDocumentSchema.safeParse(data);
  if (!result.success) return null;
  const { mainQueue, shortTermReviews, currentGroup } = result.data;
  return { mainQueue, shortTermReviews, currentGroup };
}
