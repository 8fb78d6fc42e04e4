export type Decoded<T> = { ok: true; value: T } | { ok: false; reason: string };

/**
 * Decodes a value that may be stored either natively (a JSONB column the driver
 * already parsed) or as serialized JSON text. Anything else, including `null`
 * and empty text, is a failure.
 */
export function decodeStructured<T>(
  raw: unknown,
  guard: (value: unknown) => value is T,
  expected: string,
): Decoded<T> {
  let candidate: unknown;

  if (typeof raw === 'string') {
    try {
      candidate = JSON.parse(raw);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      return { ok: false, reason: `invalid JSON text: ${detail}` };
    }
  } else if (raw !== null && typeof raw === 'object') {
    candidate = raw;
  } else {
    return { ok: false, reason: `unsupported representation: ${raw === null ? 'null' : typeof raw}` };
  }

  if (!guard(candidate)) {
    return { ok: false, reason: `decoded value is not ${expected}` };
  }

  return { ok: true, value: candidate };
}
