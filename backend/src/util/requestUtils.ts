/**
 * Request helpers shared by the express layer.
 */

export function sanitizeUrlForLogs(target: string): string {
  // Control characters would let a caller forge extra log lines.
  const sanitized = target.replace(/[\x00-\x1F\x7F-\x9F\u0085\u2028\u2029]/g, (char) => {
    return `\\x${char.charCodeAt(0).toString(16).padStart(2, '0')}`;
  });

  const queryIndex = sanitized.indexOf('?');
  if (queryIndex === -1) {
    return sanitized;
  }

  const path = sanitized.slice(0, queryIndex);
  return `${path}?<redacted>`;
}

export function elapsedMs(startedAt: bigint): number {
  return Number(process.hrtime.bigint() - startedAt) / 1_000_000;
}
