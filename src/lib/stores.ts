import { parseCardDocument, parseQueueState, serializeQueueState, toCardDocument, type CardDocument, type QueueDocument } from './codec';
import type { Card, ID, SessionQueueState } from './types';

export type { QuestionBank } from './question-bank';

export interface CardStore {
  getCard(userId: ID, questionId: ID): Promise<Card | null>;
  /** Rejects when the write did not reach the store. */
  putCard(userId: ID, card: Card): Promise<void>;
  listCards(userId: ID): Promise<Map<ID, Card>>;
}

export interface QueueStore {
  loadQueueState(userId: ID): Promise<SessionQueueState | null>;
  saveQueueState(userId: ID, state: SessionQueueState): Promise<void>;
}

/**
 * Keeps cards as serialised documents, the same shape the Firestore store
 * writes, so reads never alias state held by a caller.
 */
export class MemoryCardStore implements CardStore {
  private readonly users = new Map<ID, Map<ID, CardDocument>>();

  private bucket(userId: ID): Map<ID, CardDocument> {
    let cards = this.users.get(userId);
    if (!cards) {
      cards = new Map();
      this.users.set(userId, cards);
    }
    return cards;
  }

  async getCard(userId: ID, questionId: ID): Promise<Card | null> {
    const document = this.users.get(userId)?.get(questionId);
    return document ? parseCardDocument(document) : null;
  }

  async putCard(userId: ID, card: Card): Promise<void> {
    this.bucket(userId).set(card.questionId, toCardDocument(card));
  }

  async listCards(userId: ID): Promise<Map<ID, Card>> {
    const result = new Map<ID, Card>();
    for (const [id, document] of this.users.get(userId) ?? []) {
      result.set(id, parseCardDocument(document));
    }
    return result;
  }
}

export class MemoryQueueStore implements QueueStore {
  private readonly states = new Map<ID, QueueDocument>();

  async loadQueueState(userId: ID): Promise<SessionQueueState | null> {
    const document = this.states.get(userId);
    return document ? parseQueueState(document) : null;
  }

  async saveQueueState(userId: ID, state: SessionQueueState): Promise<void> {
    this.states.set(userId, serializeQueueState(state, new Date()));
  }
}
