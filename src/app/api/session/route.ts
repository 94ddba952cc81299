import { NextResponse } from 'next/server';

import { errorResponse, requestUserId, unauthorized } from '@/lib/api';
import { loadSession, toSessionView } from '@/lib/study';
import { getStudyDependencies } from '@/lib/study-context';

export async function GET(req: Request) {
  const userId = requestUserId(req);
  if (!userId) return unauthorized();

  try {
    const deps = await getStudyDependencies();
    const state = await loadSession(deps, userId);
    return NextResponse.json({ ok: true, ...toSessionView(state) });
  } catch (error) {
    return errorResponse(error);
  }
}
