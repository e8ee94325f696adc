/**
 * FileUtils 单元测试
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { createRunContext, ensureDirExists, sanitizeSegment } from '../../utils/fileutils';
import { makeTempDir, removeDir } from '../fixtures/builders';

describe('FileUtils', () => {
  describe('sanitizeSegment', () => {
    test('should lowercase and hyphenate', () => {
      expect(sanitizeSegment('Sample User!')).toBe('sample-user');
      expect(sanitizeSegment('  Mixed__Case-handle ')).toBe('mixed__case-handle');
    });

    test('should fall back for empty segments', () => {
      expect(sanitizeSegment('')).toBe('unknown-account');
      expect(sanitizeSegment('@@@')).toBe('unknown-account');
    });
  });

  describe('directories', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await makeTempDir();
    });

    afterEach(async () => {
      await removeDir(tempDir);
    });

    test('should create nested directories', async () => {
      const nested = path.join(tempDir, 'a', 'b');

      expect(await ensureDirExists(nested)).toBe(true);
      expect((await fs.stat(nested)).isDirectory()).toBe(true);
    });

    test('should report failure for an empty path', async () => {
      expect(await ensureDirExists('')).toBe(false);
    });

    test('should build the run directory from the handle and timestamp', async () => {
      const context = await createRunContext({
        handle: 'Sample_User',
        baseOutputDir: tempDir,
        timestamp: '2020-03-01T12:00:00.123Z',
        timezone: 'UTC',
      });

      expect(context.handle).toBe('sample_user');
      expect(context.runId).toBe('run-2020-03-01_12-00-00-123');
      expect(context.runDir).toBe(path.join(tempDir, 'sample_user', 'run-2020-03-01_12-00-00-123'));
      expect(context.runTimestampIso).toBe('2020-03-01T12:00:00.123+00:00');
      expect(context.runTimestampUtc).toBe('2020-03-01T12:00:00.123Z');
      expect((await fs.stat(context.runDir)).isDirectory()).toBe(true);
    });

    test('should fall back to UTC for an unknown timezone', async () => {
      const context = await createRunContext({ baseOutputDir: tempDir, timezone: 'Not/AZone' });

      expect(context.timezone).toBe('UTC');
      expect(context.handle).toBe('unknown-account');
    });
  });
});
