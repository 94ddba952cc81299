export type ID = string;

/** Self-evaluation after answering: 1 again, 2 hard, 3 good, 4 easy, 5 very easy. */
export type Quality = 1 | 2 | 3 | 4 | 5;

export interface ReviewEvent {
  timestamp: Date;
  quality: Quality;
  /** Interval in days chosen by this review. */
  interval: number;
  easeFactor: number;
}

export interface Card {
  questionId: ID;
  repetitionCount: number;
  easeFactor: number;
  /** Days; fractional for minute-scale retries. */
  interval: number;
  dueAt: Date | null;
  lastQuality: Quality | null;
  level: number;
  history: ReviewEvent[];
}

export type QuestionFormat = 'single' | 'ordering';

export interface Question {
  id: ID;
  subject: string;
  isRequired: boolean;
  caseId?: ID;
  format: QuestionFormat;
  expectedOrder?: string[];
}

export type QuestionGroup =
  | { kind: 'single'; id: ID }
  | { kind: 'case'; caseId: ID; ids: ID[] }
  | { kind: 'ordering'; ids: ID[]; expectedOrder: string[] };

export interface ShortTermReview {
  group: QuestionGroup;
  readyAt: Date;
}

export interface SessionQueueState {
  mainQueue: QuestionGroup[];
  shortTermReviews: ShortTermReview[];
  currentGroup: QuestionGroup | null;
}

export type SessionStatus = 'idle' | 'active' | 'done';

export type Clock = () => Date;
