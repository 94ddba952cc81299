import { z } from 'zod';

import {
  DEFAULT_FAILURE_EASE_PENALTY,
  DEFAULT_NEW_CARDS_PER_DAY,
  DEFAULT_QUESTION_BANK_PATH,
  DEFAULT_REVIEW_BACKLOG_THRESHOLD,
  DEFAULT_REVIEW_BIAS,
  DEFAULT_SHORT_REVIEW_MINUTES,
  DEFAULT_VERY_EASY_BONUS,
} from './constants';
import { parseSeed } from './random';

export interface SchedulerConfig {
  newCardsPerDay: number;
  reviewBias: number;
  reviewBacklogThreshold: number;
  shortReviewMinutes: number;
  veryEasyBonus: number;
  failureEasePenalty: number;
  randomSeed: number | null;
}

function readEnv(name: string): string | undefined {
  const value = process.env[name];
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

const schedulerEnvSchema = z.object({
  NEW_CARDS_PER_DAY: z.coerce.number().int().nonnegative().default(DEFAULT_NEW_CARDS_PER_DAY),
  REVIEW_BIAS: z.coerce.number().min(0).max(1).default(DEFAULT_REVIEW_BIAS),
  REVIEW_BACKLOG_THRESHOLD: z.coerce.number().int().positive().default(DEFAULT_REVIEW_BACKLOG_THRESHOLD),
  SHORT_REVIEW_MINUTES: z.coerce.number().positive().default(DEFAULT_SHORT_REVIEW_MINUTES),
  VERY_EASY_BONUS: z.coerce.number().min(1).default(DEFAULT_VERY_EASY_BONUS),
  FAILURE_EASE_PENALTY: z.coerce.number().min(0).default(DEFAULT_FAILURE_EASE_PENALTY),
});

type SchedulerEnvKey = keyof z.input<typeof schedulerEnvSchema>;

const SCHEDULER_ENV_KEYS: readonly SchedulerEnvKey[] = [
  'NEW_CARDS_PER_DAY',
  'REVIEW_BIAS',
  'REVIEW_BACKLOG_THRESHOLD',
  'SHORT_REVIEW_MINUTES',
  'VERY_EASY_BONUS',
  'FAILURE_EASE_PENALTY',
];

export function readSchedulerConfig(): SchedulerConfig {
  const raw: Partial<Record<SchedulerEnvKey, string>> = {};
  for (const key of SCHEDULER_ENV_KEYS) {
    raw[key] = readEnv(key);
  }

  const result = schedulerEnvSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const name = issue?.path.join('.') ?? 'scheduler configuration';
    throw new Error(`Invalid ${name} environment variable: ${issue?.message ?? 'unreadable value'}.`);
  }

  const env = result.data;
  return {
    newCardsPerDay: env.NEW_CARDS_PER_DAY,
    reviewBias: env.REVIEW_BIAS,
    reviewBacklogThreshold: env.REVIEW_BACKLOG_THRESHOLD,
    shortReviewMinutes: env.SHORT_REVIEW_MINUTES,
    veryEasyBonus: env.VERY_EASY_BONUS,
    failureEasePenalty: env.FAILURE_EASE_PENALTY,
    randomSeed: parseSeed(readEnv('SCHEDULER_RANDOM_SEED')),
  };
}

export function firestoreProjectId(): string | null {
  return readEnv('FIREBASE_PROJECT_ID') ?? null;
}

export function hasFirestoreConfig(): boolean {
  return firestoreProjectId() !== null;
}

export function questionBankPath(): string {
  return readEnv('QUESTION_BANK_PATH') ?? DEFAULT_QUESTION_BANK_PATH;
}
