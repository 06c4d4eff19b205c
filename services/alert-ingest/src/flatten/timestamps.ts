const ALERT_TIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})Z$/;
const EVENT_TIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})\.(\d{1,6})Z$/;

function toUtcMillis(parts: string[], fraction: string | undefined): number | null {
  const [year, month, day, hour, minute, second] = parts.map((part) => Number.parseInt(part, 10));
  const millis = Date.UTC(year, month - 1, day, hour, minute, second);
  const date = new Date(millis);
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    return null;
  }
  const micros = fraction ? Number.parseInt(fraction.padEnd(6, '0'), 10) : 0;
  return millis + micros / 1000;
}

/**
 * Parses `YYYY-MM-DDTHH:MM:SSZ`. Returns epoch milliseconds or null.
 */
export function parseAlertTimestamp(value: unknown): number | null {
  if (typeof value !== 'string') {
    return null;
  }
  const match = ALERT_TIME_PATTERN.exec(value);
  if (!match) {
    return null;
  }
  return toUtcMillis(match.slice(1, 7), undefined);
}

/**
 * Parses `YYYY-MM-DDTHH:MM:SS.ffffffZ` with one to six fraction digits.
 */
export function parseEventTimestamp(value: unknown): number | null {
  if (typeof value !== 'string') {
    return null;
  }
  const match = EVENT_TIME_PATTERN.exec(value);
  if (!match) {
    return null;
  }
  return toUtcMillis(match.slice(1, 7), match[7]);
}

/**
 * Whole seconds between the two timestamps, ignoring sign. Null when either fails to parse.
 */
export function secondsBetween(alertTime: unknown, eventTime: unknown): number | null {
  const alertMillis = parseAlertTimestamp(alertTime);
  const eventMillis = parseEventTimestamp(eventTime);
  if (alertMillis === null || eventMillis === null) {
    return null;
  }
  return Math.trunc(Math.abs(alertMillis - eventMillis) / 1000);
}
