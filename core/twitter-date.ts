/**
 * Strict parser for the archive timestamp format
 * `EEE MMM dd HH:mm:ss ±hhmm yyyy`, e.g. "Wed Oct 10 20:19:24 +0000 2018".
 */

import { DAY_NAMES, MONTH_ABBREVIATIONS } from '../config/constants';

const TWITTER_DATE_PATTERN =
  /^([A-Z][a-z]{2}) ([A-Z][a-z]{2}) (\d{2}) (\d{2}):(\d{2}):(\d{2}) ([+-])(\d{2})(\d{2}) (\d{4})$/;

const DAY_ABBREVIATIONS = DAY_NAMES.map((name) => name.slice(0, 3));

/**
 * Returns null for anything that is not exactly in the archive format,
 * including impossible dates and a weekday that does not match the date.
 */
export function parseTwitterDate(value: string | undefined | null): Date | null {
  if (!value) return null;

  const match = TWITTER_DATE_PATTERN.exec(value.trim());
  if (!match) return null;

  const [, weekdayText, monthText, dayText, hourText, minuteText, secondText, sign, offH, offM, yearText] =
    match;

  const month = MONTH_ABBREVIATIONS.findIndex((abbr) => abbr === monthText);
  const weekday = DAY_ABBREVIATIONS.indexOf(weekdayText);
  if (month < 0 || weekday < 0) return null;

  const year = Number(yearText);
  const day = Number(dayText);
  const hour = Number(hourText);
  const minute = Number(minuteText);
  const second = Number(secondText);
  const offsetHours = Number(offH);
  const offsetMinutes = Number(offM);

  if (hour > 23 || minute > 59 || second > 59 || offsetHours > 14 || offsetMinutes > 59) {
    return null;
  }

  const wallClock = new Date(Date.UTC(year, month, day, hour, minute, second));
  if (wallClock.getUTCMonth() !== month || wallClock.getUTCDate() !== day) {
    return null;
  }
  if (wallClock.getUTCDay() !== weekday) {
    return null;
  }

  const offset = (sign === '-' ? -1 : 1) * (offsetHours * 60 + offsetMinutes);
  return new Date(wallClock.getTime() - offset * 60000);
}

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Formats a date in the archive format, always with a `+0000` offset
 */
export function formatTwitterDate(date: Date): string {
  return [
    DAY_ABBREVIATIONS[date.getUTCDay()],
    MONTH_ABBREVIATIONS[date.getUTCMonth()],
    pad(date.getUTCDate()),
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`,
    '+0000',
    String(date.getUTCFullYear()),
  ].join(' ');
}
