/**
 * Recipe Summary API Route
 *
 * Total cook time and flattened base ingredients for one unit of a recipe.
 * A missing or empty `name` matches no entry and answers 404.
 *
 * @route GET /api/summary?name=
 */

import { NextResponse } from 'next/server';
import {
  getCookbookService,
  toErrorResponse,
  toSuccessResponse,
} from '@/src/lib/cookbook';

export const dynamic = 'force-dynamic';

export async function GET(req: Request): Promise<NextResponse> {
  try {
    const { searchParams } = new URL(req.url);
    const name = searchParams.get('name') ?? '';
    return toSuccessResponse(getCookbookService().getSummary(name));
  } catch (error) {
    return toErrorResponse(error, 'GET /api/summary');
  }
}
