import { USER_RANDOM_CACHE_LIMIT } from './constants';
import type { ID } from './types';

const SEED_MODULUS = 0x7fffffff;
const LONG_LAG = 31;
const SHORT_LAG = 3;
const DISCARDED_DRAWS = LONG_LAG * 10;
const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

export interface RandomSource {
  /** Uniform float in [0, 1). */
  nextFloat(): number;
}

export type RandomFactory = (userId: ID) => RandomSource;

/** Maps any number onto a valid generator seed in [1, 2^31 - 1). */
export function normalizeSeed(rawSeed: number): number {
  const normalized = Math.abs(Math.trunc(rawSeed)) % SEED_MODULUS;
  return normalized === 0 ? 1 : normalized;
}

export function parseSeed(raw: string | undefined): number | null {
  if (!raw) return null;
  const parsed = Number.parseInt(raw.trim(), 10);
  if (!Number.isFinite(parsed)) return null;
  return normalizeSeed(parsed);
}

/** A configured seed wins; otherwise the process start time and pid. */
export function resolveSeed(seed: number | null): number {
  if (seed !== null) return normalizeSeed(seed);
  return normalizeSeed(Math.floor(Date.now() / 1000) * process.pid);
}

function rotateLeft(value: number, shift: number): number {
  return ((value << shift) | (value >>> (32 - shift))) >>> 0;
}

/**
 * Folds a learner id into the base seed, so each learner draws from an
 * independent stream that depends only on the seed and their own id.
 */
export function seedForUser(baseSeed: number, userId: ID): number {
  let hash = (FNV_OFFSET ^ normalizeSeed(baseSeed)) >>> 0;
  for (let i = 0; i < userId.length; i += 1) {
    hash ^= userId.charCodeAt(i);
    hash = rotateLeft(Math.imul(hash, FNV_PRIME), 13);
  }
  return normalizeSeed(hash);
}

// Park-Miller minimal standard step (Schrage's method), used only to fill the lag table.
function minimalStandard(previous: number): number {
  const hi = Math.floor(previous / 127773);
  const lo = previous % 127773;
  const next = 16807 * lo - 2836 * hi;
  return next > 0 ? next : next + SEED_MODULUS;
}

/** Additive lagged-Fibonacci generator; a given seed always replays the same draws. */
export function createRandom(seed: number): RandomSource {
  const table = new Uint32Array(LONG_LAG);
  table[0] = normalizeSeed(seed);
  for (let i = 1; i < LONG_LAG; i += 1) {
    table[i] = minimalStandard(table[i - 1]);
  }

  let front = SHORT_LAG;
  let rear = 0;
  const draw = (): number => {
    const sum = (table[front] + table[rear]) >>> 0;
    table[front] = sum;
    front = (front + 1) % LONG_LAG;
    rear = (rear + 1) % LONG_LAG;
    return (sum >>> 1) & SEED_MODULUS;
  };

  for (let i = 0; i < DISCARDED_DRAWS; i += 1) {
    draw();
  }

  return { nextFloat: () => draw() / (SEED_MODULUS + 1) };
}

/**
 * One generator per learner. The least recently used stream is dropped once
 * `limit` learners are held; that learner restarts from their own seed.
 */
export function createUserRandoms(baseSeed: number, limit: number = USER_RANDOM_CACHE_LIMIT): RandomFactory {
  const streams = new Map<ID, RandomSource>();

  return (userId) => {
    const existing = streams.get(userId);
    const stream = existing ?? createRandom(seedForUser(baseSeed, userId));
    streams.delete(userId);
    streams.set(userId, stream);

    if (streams.size > limit) {
      for (const oldest of streams.keys()) {
        streams.delete(oldest);
        break;
      }
    }
    return stream;
  };
}

export function shuffle<T>(items: readonly T[], random: RandomSource): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i -= 1) {
    const j = Math.floor(random.nextFloat() * (i + 1));
    const tmp = result[i];
    result[i] = result[j];
    result[j] = tmp;
  }
  return result;
}
