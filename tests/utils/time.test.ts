/**
 * Time 工具单元测试
 */

import { describe, expect, test } from 'vitest';
import * as timeUtils from '../../utils/time';

const DATE = new Date('2018-10-10T20:19:24.123Z');

describe('Time Utils', () => {
  describe('resolveTimezone', () => {
    test('should return a valid timezone', () => {
      expect(timeUtils.resolveTimezone('America/New_York')).toBe('America/New_York');
    });

    test('should fall back to UTC', () => {
      expect(timeUtils.resolveTimezone(undefined)).toBe('UTC');
      expect(timeUtils.resolveTimezone('Not/AZone')).toBe('UTC');
      expect(timeUtils.isValidTimezone('Not/AZone')).toBe(false);
    });
  });

  describe('getZonedParts', () => {
    test('should read UTC parts', () => {
      expect(timeUtils.getZonedParts(DATE, 'UTC')).toEqual({
        year: 2018,
        month: 10,
        day: 10,
        hour: 20,
        minute: 19,
        second: 24,
        weekday: 3,
      });
    });

    test('should shift into another timezone', () => {
      const parts = timeUtils.getZonedParts(DATE, 'Asia/Tokyo');

      expect(parts.day).toBe(11);
      expect(parts.hour).toBe(5);
      expect(parts.weekday).toBe(4);
    });
  });

  describe('offsets and formatting', () => {
    test('should compute offsets in minutes', () => {
      expect(timeUtils.getOffsetMinutes(DATE, 'UTC')).toBe(0);
      expect(timeUtils.getOffsetMinutes(DATE, 'Asia/Tokyo')).toBe(540);
      expect(timeUtils.getOffsetMinutes(DATE, 'America/New_York')).toBe(-240);
    });

    test('should format iso and file-safe timestamps', () => {
      expect(
        timeUtils.formatZonedTimestamp(DATE, 'Asia/Tokyo', { includeMilliseconds: true, includeOffset: true })
      ).toEqual({ iso: '2018-10-11T05:19:24.123+09:00', fileSafe: '2018-10-11_05-19-24-123' });
      expect(timeUtils.formatZonedTimestamp(DATE, 'UTC')).toEqual({
        iso: '2018-10-10T20:19:24',
        fileSafe: '2018-10-10_20-19-24',
      });
    });

    test('should format a date only', () => {
      expect(timeUtils.formatDateOnly(DATE, 'America/New_York')).toBe('2018-10-10');
    });
  });
});
