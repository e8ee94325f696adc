/**
 * Timezone helpers built on Intl.DateTimeFormat
 */

const DEFAULT_TIMEZONE = 'UTC';

export interface ZonedParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  /** 0 = Sunday */
  weekday: number;
}

export interface ZonedTimestampOptions {
  includeMilliseconds?: boolean;
  includeOffset?: boolean;
}

export interface ZonedTimestamp {
  iso: string;
  fileSafe: string;
}

const WEEKDAYS: Record<string, number> = {
  Sun: 0,
  Mon: 1,
  Tue: 2,
  Wed: 3,
  Thu: 4,
  Fri: 5,
  Sat: 6,
};

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timezone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timezone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone: timezone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      weekday: 'short',
    });
    formatterCache.set(timezone, formatter);
  }
  return formatter;
}

export function isValidTimezone(timezone: string): boolean {
  try {
    getFormatter(timezone);
    return true;
  } catch {
    return false;
  }
}

export function getDefaultTimezone(): string {
  return DEFAULT_TIMEZONE;
}

/**
 * Returns the given IANA timezone when valid, the default otherwise
 */
export function resolveTimezone(timezone?: string): string {
  if (timezone && isValidTimezone(timezone)) {
    return timezone;
  }
  return DEFAULT_TIMEZONE;
}

export function getZonedParts(date: Date, timezone: string = DEFAULT_TIMEZONE): ZonedParts {
  const parts = getFormatter(timezone).formatToParts(date);
  const lookup = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((part) => part.type === type)?.value ?? '';

  return {
    year: Number(lookup('year')),
    month: Number(lookup('month')),
    day: Number(lookup('day')),
    hour: Number(lookup('hour')),
    minute: Number(lookup('minute')),
    second: Number(lookup('second')),
    weekday: WEEKDAYS[lookup('weekday')] ?? 0,
  };
}

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Offset of `timezone` from UTC at `date`, in minutes
 */
export function getOffsetMinutes(date: Date, timezone: string): number {
  const p = getZonedParts(date, timezone);
  const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  const truncated = Math.floor(date.getTime() / 1000) * 1000;
  return Math.round((asUtc - truncated) / 60000);
}

export function formatZonedTimestamp(
  date: Date,
  timezone: string = DEFAULT_TIMEZONE,
  options: ZonedTimestampOptions = {}
): ZonedTimestamp {
  const p = getZonedParts(date, timezone);
  const datePart = `${p.year}-${pad(p.month)}-${pad(p.day)}`;
  const timePart = `${pad(p.hour)}:${pad(p.minute)}:${pad(p.second)}`;
  const millis = options.includeMilliseconds ? `.${pad(date.getUTCMilliseconds(), 3)}` : '';

  let offset = '';
  if (options.includeOffset) {
    const minutes = getOffsetMinutes(date, timezone);
    const sign = minutes < 0 ? '-' : '+';
    const abs = Math.abs(minutes);
    offset = `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
  }

  const iso = `${datePart}T${timePart}${millis}${offset}`;
  const fileSafe = `${datePart}_${pad(p.hour)}-${pad(p.minute)}-${pad(p.second)}${
    options.includeMilliseconds ? `-${pad(date.getUTCMilliseconds(), 3)}` : ''
  }`;

  return { iso, fileSafe };
}

/**
 * YYYY-MM-DD of `date` in `timezone`
 */
export function formatDateOnly(date: Date, timezone: string = DEFAULT_TIMEZONE): string {
  const p = getZonedParts(date, timezone);
  return `${p.year}-${pad(p.month)}-${pad(p.day)}`;
}
