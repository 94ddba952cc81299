import { hasFirestoreConfig, questionBankPath, readSchedulerConfig } from './env';
import { FirestoreCardStore, FirestoreQueueStore, getFirestoreDb } from './firestore';
import { storeLog as log } from './logger';
import { loadQuestionBank } from './question-bank';
import { createUserRandoms, resolveSeed } from './random';
import { MemoryCardStore, MemoryQueueStore } from './stores';
import type { StudyDependencies } from './study';

export type StoreMode = 'firestore' | 'memory';

let contextPromise: Promise<StudyDependencies> | undefined;
let warnedMemoryStores = false;

export function storeMode(): StoreMode {
  return hasFirestoreConfig() ? 'firestore' : 'memory';
}

async function createStudyDependencies(): Promise<StudyDependencies> {
  const config = readSchedulerConfig();
  const questions = await loadQuestionBank(questionBankPath());

  if (storeMode() === 'firestore') {
    const db = getFirestoreDb();
    return {
      cards: new FirestoreCardStore(db),
      queues: new FirestoreQueueStore(db),
      questions,
      clock: () => new Date(),
      randomFor: createUserRandoms(resolveSeed(config.randomSeed)),
      config,
    };
  }

  if (!warnedMemoryStores) {
    log.warn('FIREBASE_PROJECT_ID is not set; study progress is kept in memory only.');
    warnedMemoryStores = true;
  }

  return {
    cards: new MemoryCardStore(),
    queues: new MemoryQueueStore(),
    questions,
    clock: () => new Date(),
    randomFor: createUserRandoms(resolveSeed(config.randomSeed)),
    config,
  };
}

export function getStudyDependencies(): Promise<StudyDependencies> {
  if (!contextPromise) {
    contextPromise = createStudyDependencies().catch((error: unknown) => {
      contextPromise = undefined;
      throw error;
    });
  }
  return contextPromise;
}
