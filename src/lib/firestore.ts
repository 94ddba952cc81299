import { applicationDefault, getApps, initializeApp, type App } from 'firebase-admin/app';
import { getFirestore, type CollectionReference, type DocumentReference, type Firestore } from 'firebase-admin/firestore';

import { parseCardDocument, safeParseQueueState, serializeQueueState, toCardDocument } from './codec';
import { firestoreProjectId } from './env';
import { storeLog as log } from './logger';
import type { CardStore, QueueStore } from './stores';
import type { Card, ID, SessionQueueState } from './types';

const USERS_COLLECTION = 'users';
const CARDS_COLLECTION = 'userCards';
const SESSION_COLLECTION = 'sessionState';
const CURRENT_SESSION_DOC = 'current';

type FirestoreGlobal = {
  firestoreDb?: Firestore;
};

const globalForFirestore = globalThis as unknown as FirestoreGlobal;

let firestoreDb: Firestore | undefined = globalForFirestore.firestoreDb;

function createFirebaseApp(): App {
  const existing = getApps()[0];
  if (existing) return existing;

  const projectId = firestoreProjectId();
  if (!projectId) {
    throw new Error(
      'FIREBASE_PROJECT_ID is required for the Firestore stores. Set it, or leave it unset to use the in-memory stores.',
    );
  }

  return initializeApp({ credential: applicationDefault(), projectId });
}

export function getFirestoreDb(): Firestore {
  if (!firestoreDb) {
    firestoreDb = getFirestore(createFirebaseApp());
    if (process.env.NODE_ENV !== 'production') {
      globalForFirestore.firestoreDb = firestoreDb;
    }
  }
  return firestoreDb;
}

/**
 * A document that no longer matches the card schema is logged and read as
 * missing, so the next review rewrites it from a fresh card.
 */
function readStoredCard(userId: ID, questionId: ID, data: unknown): Card | null {
  try {
    return parseCardDocument(data, questionId);
  } catch (error) {
    log.with({ userId, questionId }).error('Ignoring malformed card document', error);
    return null;
  }
}

function userDoc(db: Firestore, userId: ID): DocumentReference {
  return db.collection(USERS_COLLECTION).doc(userId);
}

export class FirestoreCardStore implements CardStore {
  constructor(private readonly db: Firestore) {}

  private cards(userId: ID): CollectionReference {
    return userDoc(this.db, userId).collection(CARDS_COLLECTION);
  }

  async getCard(userId: ID, questionId: ID): Promise<Card | null> {
    const snapshot = await this.cards(userId).doc(questionId).get();
    if (!snapshot.exists) return null;
    return readStoredCard(userId, snapshot.id, snapshot.data());
  }

  async putCard(userId: ID, card: Card): Promise<void> {
    await this.cards(userId).doc(card.questionId).set(toCardDocument(card));
  }

  async listCards(userId: ID): Promise<Map<ID, Card>> {
    const snapshot = await this.cards(userId).get();
    const result = new Map<ID, Card>();
    for (const doc of snapshot.docs) {
      const card = readStoredCard(userId, doc.id, doc.data());
      if (card) result.set(doc.id, card);
    }
    return result;
  }
}

export class FirestoreQueueStore implements QueueStore {
  constructor(private readonly db: Firestore) {}

  private current(userId: ID): DocumentReference {
    return userDoc(this.db, userId).collection(SESSION_COLLECTION).doc(CURRENT_SESSION_DOC);
  }

  async loadQueueState(userId: ID): Promise<SessionQueueState | null> {
    const snapshot = await this.current(userId).get();
    if (!snapshot.exists) return null;
    const state = safeParseQueueState(snapshot.data());
    if (!state) {
      log.with({ userId }).warn('Discarding unreadable session state');
    }
    return state;
  }

  async saveQueueState(userId: ID, state: SessionQueueState): Promise<void> {
    await this.current(userId).set(serializeQueueState(state, new Date()));
  }
}
