/**
 * Export 单元测试
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { loadArchive } from '../../core/archive-loader';
import { buildMetricsSnapshot, parseSnapshotJson } from '../../core/metrics';
import { DEFAULT_CONFIG } from '../../types/config';
import { escapeCsvField, exportAll, likeRows, toCsv, tweetRows } from '../../utils/export';
import { createRunContext } from '../../utils/fileutils';
import { makeLike, makeTempDir, makeTweet, removeDir, SAMPLE_ARCHIVE_DIR } from '../fixtures/builders';

describe('escapeCsvField', () => {
  test('should leave plain values alone', () => {
    expect(escapeCsvField('plain')).toBe('plain');
    expect(escapeCsvField(3)).toBe('3');
  });

  test('should quote separators, quotes and line breaks', () => {
    expect(escapeCsvField('a,b')).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField('line\nbreak')).toBe('"line\nbreak"');
  });

  test('should write booleans as digits and missing values as empty', () => {
    expect(escapeCsvField(true)).toBe('1');
    expect(escapeCsvField(false)).toBe('0');
    expect(escapeCsvField(null)).toBe('');
    expect(escapeCsvField(undefined)).toBe('');
  });
});

describe('toCsv', () => {
  test('should write only the header for no rows', () => {
    expect(toCsv(['a', 'b'], [])).toBe('a,b\n');
  });

  test('should end every row with a newline', () => {
    expect(toCsv(['id'], [['1'], ['2']])).toBe('id\n1\n2\n');
  });
});

describe('row builders', () => {
  test('should flatten tweets', () => {
    const rows = tweetRows([
      makeTweet({ id: '7', fullText: 'Hi, "all"', hashtags: ['a', 'b'], mentions: ['x'], likeCount: 2 }),
    ]);
    expect(rows).toEqual([['7', 'Wed Oct 10 20:19:24 +0000 2018', 'original', 'Hi, "all"', 2, 0, '#a, #b', '@x']]);
  });

  test('should flatten likes', () => {
    expect(likeRows([makeLike({ id: '9', fullText: 'ok' })])).toEqual([['9', undefined, 'ok', undefined, '']]);
  });
});

describe('exportAll', () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(outputDir);
  });

  test('should write every file into the run directory', async () => {
    const archive = await loadArchive(SAMPLE_ARCHIVE_DIR);
    const metrics = buildMetricsSnapshot(archive, DEFAULT_CONFIG, new Date('2020-03-01T12:00:00.000Z'));
    const runContext = await createRunContext({
      handle: 'sample_user',
      baseOutputDir: outputDir,
      timestamp: '2020-03-01T12:00:00.000Z',
    });

    const result = await exportAll(archive, metrics, runContext);
    const read = (name: string) => fs.readFile(path.join(result.runDir, name), 'utf-8');

    expect(result.runDir).toBe(runContext.runDir);
    expect(result.files.map((file) => path.basename(file))).toEqual([
      'followers.csv',
      'following.csv',
      'mutual.csv',
      'one_sided_followers.csv',
      'one_sided_following.csv',
      'tweets.csv',
      'likes.csv',
      'metrics.json',
      'snapshot.json',
    ]);

    expect(await read('mutual.csv')).toBe('account_id\n102\n103\n');
    expect(await read('one_sided_followers.csv')).toBe('account_id\n101\n');
    expect(await read('one_sided_following.csv')).toBe('account_id\n104\n105\n');

    const tweetLines = (await read('tweets.csv')).split('\n');
    expect(tweetLines[0]).toBe('tweet_id,created_at,type,full_text,like_count,retweet_count,hashtags,mentions');
    expect(tweetLines[1]).toBe(
      '1,Wed Oct 10 20:19:24 +0000 2018,original,Shipping the new release today #TypeScript #OpenSource,12,3,"#TypeScript, #OpenSource",'
    );

    const likeLines = (await read('likes.csv')).split('\n');
    expect(likeLines[1]).toBe(
      '500,writer_a,Handy #TypeScript tips for archive parsing,https://twitter.com/writer_a/status/500,#TypeScript'
    );
    expect(likeLines[2]).toBe('501,,Good read on parsing,https://twitter.com/i/web/status/501,');

    const metricsJson: unknown = JSON.parse(await read('metrics.json'));
    expect(metricsJson).toMatchObject({ handle: 'sample_user', network_quality_score: 85, peak_day: 'Thursday' });

    expect(parseSnapshotJson(await read('snapshot.json'))).toEqual(metrics);
  });
});
