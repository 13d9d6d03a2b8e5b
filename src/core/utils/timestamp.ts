/**
 * Timestamps are kept as fixed-width `YYYY-MM-DDTHH:MM:SSZ` strings.
 * Lexical comparison equals chronological order only for this profile,
 * which is why fractional seconds and offsets are rejected.
 */
const UTC_TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})Z$/;

export function isUtcTimestamp(value: unknown): boolean {
  if (typeof value !== 'string') {
    return false;
  }

  const match = UTC_TIMESTAMP_PATTERN.exec(value);
  if (!match) {
    return false;
  }

  const [year, month, day, hour, minute, second] = match
    .slice(1)
    .map((part) => Number(part));

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, 0);

  // Out-of-range parts roll over (Feb 30 -> Mar 2), so read them back
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day &&
    date.getUTCHours() === hour &&
    date.getUTCMinutes() === minute &&
    date.getUTCSeconds() === second
  );
}
