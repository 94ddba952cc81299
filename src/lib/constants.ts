export const MINUTE_MS = 60_000;
export const DAY_MS = 24 * 60 * MINUTE_MS;
export const MINUTES_PER_DAY = 24 * 60;

export const DEFAULT_EASE_FACTOR = 2.5;
export const MIN_EASE_FACTOR = 1.3;

export const PASSING_QUALITY = 3;
export const HARD_QUALITY = 2;
export const VERY_EASY_QUALITY = 5;

export const FIRST_INTERVAL_DAYS = 1;
export const SECOND_INTERVAL_DAYS = 4;

export const LAPSE_RETRY_MINUTES = 10;
export const LAPSE_INTERVAL_DAYS = LAPSE_RETRY_MINUTES / MINUTES_PER_DAY;
export const REQUIRED_LAPSE_EASE_PENALTY = 0.2;

export const DEFAULT_VERY_EASY_BONUS = 1.3;
export const DEFAULT_FAILURE_EASE_PENALTY = 0;

export const LEVEL_HISTORY_WINDOW = 5;
export const MAX_CARD_LEVEL = 5;

export const DEFAULT_NEW_CARDS_PER_DAY = 10;
export const DEFAULT_REVIEW_BIAS = 0.3;
export const DEFAULT_REVIEW_BACKLOG_THRESHOLD = 5;
export const DEFAULT_SHORT_REVIEW_MINUTES = 15;

export const RECENT_SUBJECT_PENALTY = 0.15;
export const SELECTION_RANDOM_SPREAD = 0.5;
export const SELECTION_POOL_MULTIPLIER = 5;
export const RECENT_QUESTION_WINDOW = 10;

export const USER_RANDOM_CACHE_LIMIT = 1000;

export const UNCATEGORIZED_SUBJECT = '未分類';
export const DEFAULT_QUESTION_BANK_PATH = 'data/questions.json';
