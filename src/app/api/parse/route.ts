/**
 * Recipe Name Parse API Route
 *
 * Normalizes a handwritten recipe name into its display form.
 *
 * @route POST /api/parse
 */

import { NextResponse } from 'next/server';
import { AppError } from '@/src/lib/errors/app-error';
import {
  firstIssueMessage,
  getCookbookService,
  parseRequestSchema,
  readJsonBody,
  toErrorResponse,
  toSuccessResponse,
} from '@/src/lib/cookbook';

export const dynamic = 'force-dynamic';

export async function POST(req: Request): Promise<NextResponse> {
  const read = await readJsonBody(req);
  if (!read.ok) return read.response;

  try {
    const parsed = parseRequestSchema.safeParse(read.body);
    if (!parsed.success) {
      throw new AppError('INVALID_INPUT', firstIssueMessage(parsed.error));
    }

    const msg = getCookbookService().parse(parsed.data.input);
    return toSuccessResponse({ msg });
  } catch (error) {
    return toErrorResponse(error, 'POST /api/parse');
  }
}
