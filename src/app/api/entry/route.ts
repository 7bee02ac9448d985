/**
 * Cookbook Entry API Route
 *
 * @route POST /api/entry    add an ingredient or recipe
 * @route GET /api/entry     look up one entry (?name=) or list all entries
 * @route DELETE /api/entry  clear the whole cookbook
 */

import { NextResponse } from 'next/server';
import { AppError } from '@/src/lib/errors/app-error';
import {
  getCookbookService,
  readJsonBody,
  toErrorResponse,
  toSuccessResponse,
} from '@/src/lib/cookbook';

export const dynamic = 'force-dynamic';

export async function POST(req: Request): Promise<NextResponse> {
  const read = await readJsonBody(req);
  if (!read.ok) return read.response;

  try {
    const result = getCookbookService().createEntry(read.body);
    return toSuccessResponse(result);
  } catch (error) {
    return toErrorResponse(error, 'POST /api/entry');
  }
}

export async function GET(req: Request): Promise<NextResponse> {
  try {
    const { searchParams } = new URL(req.url);
    const name = searchParams.get('name');
    const cookbook = getCookbookService();

    // List all entries
    if (name === null) {
      return toSuccessResponse({ entries: cookbook.listEntries() });
    }

    const entry = cookbook.lookup(name);
    if (!entry) {
      throw new AppError('NOT_FOUND', `no entry named "${name}"`, { name });
    }
    return toSuccessResponse(entry);
  } catch (error) {
    return toErrorResponse(error, 'GET /api/entry');
  }
}

export async function DELETE(): Promise<NextResponse> {
  try {
    return toSuccessResponse(getCookbookService().clear());
  } catch (error) {
    return toErrorResponse(error, 'DELETE /api/entry');
  }
}
