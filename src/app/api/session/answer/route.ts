import { NextResponse } from 'next/server';
import { z } from 'zod';

import { errorResponse, readRequestBody, requestUserId, unauthorized } from '@/lib/api';
import { submitEvaluation } from '@/lib/study';
import { getStudyDependencies } from '@/lib/study-context';

// Range checks stay in the scheduler so an out-of-range rating surfaces as invalid_quality.
const answerBodySchema = z.object({
  quality: z.number(),
});

export async function POST(req: Request) {
  const userId = requestUserId(req);
  if (!userId) return unauthorized();

  try {
    const { quality } = await readRequestBody(req, answerBodySchema);
    const deps = await getStudyDependencies();
    const result = await submitEvaluation(deps, userId, quality);
    return NextResponse.json({ ok: true, ...result });
  } catch (error) {
    return errorResponse(error);
  }
}
