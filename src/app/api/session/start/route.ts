import { NextResponse } from 'next/server';
import { z } from 'zod';

import { errorResponse, readRequestBody, requestUserId, unauthorized } from '@/lib/api';
import { startSession } from '@/lib/study';
import { getStudyDependencies } from '@/lib/study-context';

const startBodySchema = z.object({
  recentIds: z.array(z.string().min(1)).optional(),
});

export async function POST(req: Request) {
  const userId = requestUserId(req);
  if (!userId) return unauthorized();

  try {
    const body = await readRequestBody(req, startBodySchema);
    const deps = await getStudyDependencies();
    const step = await startSession(deps, userId, { recentIds: body.recentIds });
    return NextResponse.json({ ok: true, ...step });
  } catch (error) {
    return errorResponse(error);
  }
}
