/**
 * Response helpers for the cookbook API routes.
 *
 * Envelope: { ok: true, data } or { ok: false, error: { code, message } }.
 */

import { NextResponse } from 'next/server';
import { isAppError, type AppErrorCode } from '@/src/lib/errors/app-error';

const STATUS_BY_CODE: Partial<Record<AppErrorCode, number>> = {
  NOT_FOUND: 404,
  INTERNAL_ERROR: 500,
};

export function toSuccessResponse<T>(data: T): NextResponse {
  return NextResponse.json({ ok: true, data }, { status: 200 });
}

/**
 * Map an error to the JSON envelope. Domain errors are 400 (404 for a
 * missing recipe); anything that is not an AppError is logged and hidden
 * behind INTERNAL_ERROR.
 */
export function toErrorResponse(error: unknown, context: string): NextResponse {
  if (isAppError(error)) {
    return NextResponse.json(
      { ok: false, error: error.toJSON() },
      { status: STATUS_BY_CODE[error.code] ?? 400 },
    );
  }

  console.error(`[${context}] unexpected error:`, error);
  return NextResponse.json(
    {
      ok: false,
      error: {
        code: 'INTERNAL_ERROR' satisfies AppErrorCode,
        message: 'Something went wrong',
      },
    },
    { status: 500 },
  );
}

/** Read a JSON body; a malformed body becomes a VALIDATION_ERROR response. */
export async function readJsonBody(
  request: Request,
): Promise<{ ok: true; body: unknown } | { ok: false; response: NextResponse }> {
  try {
    const body: unknown = await request.json();
    return { ok: true, body };
  } catch {
    return {
      ok: false,
      response: NextResponse.json(
        {
          ok: false,
          error: {
            code: 'VALIDATION_ERROR' satisfies AppErrorCode,
            message: 'Invalid request format. Expected JSON body.',
          },
        },
        { status: 400 },
      ),
    };
  }
}
