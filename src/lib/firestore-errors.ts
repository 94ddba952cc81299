export type FirestoreErrorCode = string | number;

// gRPC status codes surfaced by firebase-admin, with their string forms.
const TRANSIENT_CODES: ReadonlySet<FirestoreErrorCode> = new Set([
  4,
  'deadline-exceeded',
  8,
  'resource-exhausted',
  10,
  'aborted',
  13,
  'internal',
  14,
  'unavailable',
]);

export function extractFirestoreErrorCode(error: unknown): FirestoreErrorCode | undefined {
  if (!error || typeof error !== 'object') {
    return undefined;
  }

  const candidate = error as Record<string, unknown>;

  const code = candidate.code;
  if (typeof code === 'string' || typeof code === 'number') {
    return code;
  }

  const nestedSources: readonly unknown[] = [candidate.cause, candidate.err, candidate.original];
  for (const source of nestedSources) {
    const nested = extractFirestoreErrorCode(source);
    if (nested !== undefined) {
      return nested;
    }
  }

  return undefined;
}

export function isTransientFirestoreError(error: unknown): boolean {
  const code = extractFirestoreErrorCode(error);
  if (code === undefined) return false;
  return TRANSIENT_CODES.has(typeof code === 'string' ? code.replace(/^firestore\//, '') : code);
}
