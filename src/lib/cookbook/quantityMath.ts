/**
 * Integer arithmetic for quantities and cook times.
 * Results past Number.MAX_SAFE_INTEGER fail instead of losing precision.
 */

import { AppError } from '@/src/lib/errors/app-error';

function ensureSafe(
  value: number,
  what: string,
  details: Record<string, unknown>,
): number {
  if (!Number.isSafeInteger(value)) {
    throw new AppError(
      'QUANTITY_OVERFLOW',
      `${what} exceeds the largest supported integer`,
      details,
    );
  }
  return value;
}

export function checkedMultiply(
  a: number,
  b: number,
  what: string,
  details: Record<string, unknown>,
): number {
  return ensureSafe(a * b, what, details);
}

export function checkedAdd(
  a: number,
  b: number,
  what: string,
  details: Record<string, unknown>,
): number {
  return ensureSafe(a + b, what, details);
}
