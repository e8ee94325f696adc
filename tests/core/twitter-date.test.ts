/**
 * Archive timestamp parsing
 */

import { describe, expect, test } from 'vitest';
import { formatTwitterDate, parseTwitterDate } from '../../core/twitter-date';

describe('parseTwitterDate', () => {
  test('should parse a UTC timestamp', () => {
    expect(parseTwitterDate('Wed Oct 10 20:19:24 +0000 2018')?.toISOString()).toBe('2018-10-10T20:19:24.000Z');
  });

  test('should apply the offset', () => {
    expect(parseTwitterDate('Wed Oct 10 22:19:24 +0200 2018')?.toISOString()).toBe('2018-10-10T20:19:24.000Z');
    expect(parseTwitterDate('Wed Oct 10 15:19:24 -0500 2018')?.toISOString()).toBe('2018-10-10T20:19:24.000Z');
  });

  test.each([
    ['empty', ''],
    ['ISO string', '2018-10-10T20:19:24Z'],
    ['wrong weekday', 'Thu Oct 10 20:19:24 +0000 2018'],
    ['impossible day', 'Fri Feb 30 10:00:00 +0000 2018'],
    ['hour out of range', 'Wed Oct 10 24:19:24 +0000 2018'],
    ['unknown month', 'Wed Okt 10 20:19:24 +0000 2018'],
  ])('should reject %s', (_label, value) => {
    expect(parseTwitterDate(value)).toBeNull();
  });

  test('should accept null and undefined', () => {
    expect(parseTwitterDate(null)).toBeNull();
    expect(parseTwitterDate(undefined)).toBeNull();
  });
});

describe('formatTwitterDate', () => {
  test('should format in archive layout', () => {
    expect(formatTwitterDate(new Date('2018-10-10T20:19:24Z'))).toBe('Wed Oct 10 20:19:24 +0000 2018');
  });

  test('should be read back by parseTwitterDate', () => {
    const date = new Date('2024-02-29T05:06:07Z');
    expect(parseTwitterDate(formatTwitterDate(date))?.getTime()).toBe(date.getTime());
  });
});
