function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

function assertValid(d: Date): void {
  if (Number.isNaN(d.getTime())) {
    throw new Error(`Invalid date: ${String(d)}`);
  }
}

/**
 * Compact UTC stamp used in artifact file names: YYYYMMDD_HHmmss.
 */
export function formatRunStamp(d: Date): string {
  assertValid(d);
  return (
    `${d.getUTCFullYear()}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}` +
    `_${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}${pad(d.getUTCSeconds())}`
  );
}

/**
 * Textual form of every persisted timestamp (ISO-8601, UTC, millisecond precision).
 */
export function toIsoUtc(d: Date): string {
  assertValid(d);
  return d.toISOString();
}
