import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';

import { UNCATEGORIZED_SUBJECT } from './constants';
import { isRequiredQuestionNumber } from './required';
import type { ID, Question } from './types';

export interface QuestionBank {
  getQuestion(id: ID): Question | undefined;
  listQuestions(): readonly Question[];
}

const questionEntrySchema = z.object({
  id: z.string().trim().min(1),
  subject: z.string().nullish(),
  isRequired: z.boolean().optional(),
  caseId: z.string().trim().min(1).optional(),
  format: z.enum(['single', 'ordering']).default('single'),
  expectedOrder: z.array(z.string()).optional(),
});

export const questionBankSchema = z.array(questionEntrySchema);

export type QuestionEntry = z.input<typeof questionEntrySchema>;

export function standardizeSubject(subject: string | null | undefined): string {
  const trimmed = (subject ?? '').trim();
  return trimmed === '' ? UNCATEGORIZED_SUBJECT : trimmed;
}

function toQuestion(entry: z.output<typeof questionEntrySchema>): Question {
  const question: Question = {
    id: entry.id,
    subject: standardizeSubject(entry.subject),
    isRequired: entry.isRequired ?? isRequiredQuestionNumber(entry.id),
    format: entry.format,
  };
  if (entry.caseId) question.caseId = entry.caseId;
  if (entry.format === 'ordering' && entry.expectedOrder) question.expectedOrder = entry.expectedOrder;
  return question;
}

export function createQuestionBank(entries: readonly QuestionEntry[]): QuestionBank {
  const parsed = questionBankSchema.parse(entries);
  const byId = new Map<ID, Question>();
  const ordered: Question[] = [];

  for (const entry of parsed) {
    if (byId.has(entry.id)) continue;
    const question = toQuestion(entry);
    byId.set(question.id, question);
    ordered.push(question);
  }

  return {
    getQuestion: (id) => byId.get(id),
    listQuestions: () => ordered,
  };
}

const bankCache = new Map<string, Promise<QuestionBank>>();

async function readQuestionBank(path: string): Promise<QuestionBank> {
  const raw = await readFile(path, 'utf8');
  const data: unknown = JSON.parse(raw);
  return createQuestionBank(questionBankSchema.parse(data));
}

export function loadQuestionBank(path: string): Promise<QuestionBank> {
  const absolute = resolve(process.cwd(), path);
  let pending = bankCache.get(absolute);
  if (!pending) {
    pending = readQuestionBank(absolute).catch((error: unknown) => {
      bankCache.delete(absolute);
      throw error;
    });
    bankCache.set(absolute, pending);
  }
  return pending;
}
