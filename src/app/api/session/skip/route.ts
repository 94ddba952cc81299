import { NextResponse } from 'next/server';

import { errorResponse, requestUserId, unauthorized } from '@/lib/api';
import { skipCurrent } from '@/lib/study';
import { getStudyDependencies } from '@/lib/study-context';

export async function POST(req: Request) {
  const userId = requestUserId(req);
  if (!userId) return unauthorized();

  try {
    const deps = await getStudyDependencies();
    const step = await skipCurrent(deps, userId);
    return NextResponse.json({ ok: true, ...step });
  } catch (error) {
    return errorResponse(error);
  }
}
