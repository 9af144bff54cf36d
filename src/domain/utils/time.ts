const ISO_DATE_TIME_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/i;

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Parses an ISO-8601 date-time string. Returns null for anything else,
 * including values of other types and dates or times that do not exist
 * (Feb 30, hour 24).
 */
export function parseIsoTimestamp(value: unknown): Date | null {
  if (typeof value !== 'string') {
    return null;
  }

  const match = ISO_DATE_TIME_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, yearText, monthText, dayText, hourText, minuteText, secondText, fraction, zone] = match;
  const year = Number(yearText);
  const month = Number(monthText);
  const day = Number(dayText);
  const hour = Number(hourText);
  const minute = Number(minuteText);
  const second = secondText === undefined ? 0 : Number(secondText);

  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return null;
  }

  if (hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  let offset = '';
  if (zone !== undefined) {
    if (zone.toUpperCase() === 'Z') {
      offset = 'Z';
    } else if (Number(zone.slice(1, 3)) > 23 || Number(zone.slice(-2)) > 59) {
      return null;
    } else {
      offset = `${zone.slice(0, 3)}:${zone.slice(-2)}`;
    }
  }

  const time = `${hourText}:${minuteText}:${secondText ?? '00'}${fraction ?? ''}`;
  const parsed = new Date(`${yearText}-${monthText}-${dayText}T${time}${offset}`);
  if (Number.isNaN(parsed.getTime())) {
    return null;
  }

  return parsed;
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/** `YYYY-MM-DD HH:MM:SS` in the local timezone. */
export function formatLocalTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`
  );
}

/** `YYYYMMDD_HHMMSS` in the local timezone, for file names. */
export function formatFileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}_` +
    `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`
  );
}

export function secondsBetween(start: Date, end: Date): number {
  return (end.getTime() - start.getTime()) / 1000;
}
