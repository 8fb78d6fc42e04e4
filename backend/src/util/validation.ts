import { HttpError } from './httpError';

const entityIdPattern = /^[1-9][0-9]*$/;

/**
 * Parses a route parameter into a positive entity id. Leading zeros, signs,
 * decimals and values beyond the safe integer range are rejected.
 */
export function parseEntityId(raw: unknown): number {
  if (typeof raw !== 'string' || !entityIdPattern.test(raw)) {
    throw new HttpError(400, 'INVALID_ID', 'Entity id must be a positive integer.');
  }

  const id = Number(raw);
  if (!Number.isSafeInteger(id)) {
    throw new HttpError(400, 'INVALID_ID', 'Entity id is out of range.');
  }

  return id;
}
