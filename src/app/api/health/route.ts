import { NextResponse } from 'next/server';

import { getStudyDependencies, storeMode } from '@/lib/study-context';

export async function GET() {
  const mode = storeMode();
  try {
    const deps = await getStudyDependencies();
    return NextResponse.json({ ok: true, store: mode, questions: deps.questions.listQuestions().length });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return NextResponse.json({ ok: false, store: mode, error: message }, { status: 500 });
  }
}
