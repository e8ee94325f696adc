/**
 * Archive record normalisation
 */

import { describe, expect, test } from 'vitest';
import {
  coerceCount,
  extractHashtags,
  extractMentions,
  handleFromStatusUrl,
  normalizeAccount,
  normalizeAccountIds,
  normalizeLikes,
  normalizeTweets,
  unwrapEntry,
} from '../../core/archive-records';

describe('coerceCount', () => {
  test.each([
    [12, 12],
    ['12', 12],
    [' 7 ', 7],
    [3.9, 3],
    ['twelve', 0],
    [null, 0],
    [undefined, 0],
    [Number.NaN, 0],
  ])('should coerce %j to %i', (input, expected) => {
    expect(coerceCount(input)).toBe(expected);
  });
});

describe('text extraction', () => {
  test('should extract hashtags keeping their casing', () => {
    expect(extractHashtags('hi #AI #ai and #日本')).toEqual(['AI', 'ai', '日本']);
  });

  test('should extract mentions', () => {
    expect(extractMentions('@alice and @bob_2, not an email')).toEqual(['alice', 'bob_2']);
  });

  test('should derive the author from a status url', () => {
    expect(handleFromStatusUrl('https://twitter.com/writer_a/status/500')).toBe('writer_a');
    expect(handleFromStatusUrl('https://x.com/writer_b/status/501')).toBe('writer_b');
    expect(handleFromStatusUrl('https://twitter.com/i/web/status/502')).toBeUndefined();
    expect(handleFromStatusUrl(undefined)).toBeUndefined();
  });
});

describe('unwrapEntry', () => {
  test('should unwrap a keyed entry and pass bare objects through', () => {
    expect(unwrapEntry({ tweet: { id_str: '1' } }, 'tweet')).toEqual({ id_str: '1' });
    expect(unwrapEntry({ id_str: '1' }, 'tweet')).toEqual({ id_str: '1' });
  });
});

describe('normalizeAccountIds', () => {
  test('should read wrapped and bare entries and count malformed ones', () => {
    const result = normalizeAccountIds([
      { follower: { accountId: '101' } },
      { accountId: '102' },
      { following: { accountId: 103 } },
      { follower: { userLink: 'https://twitter.com/intent/user?user_id=104' } },
      'garbage',
    ]);

    expect(result.records).toEqual(['101', '102', '103']);
    expect(result.dropped).toBe(2);
  });
});

describe('normalizeTweets', () => {
  test('should map archive fields', () => {
    const { records, dropped } = normalizeTweets(
      [
        {
          tweet: {
            id_str: '2',
            created_at: 'Thu Oct 11 09:05:00 +0000 2018',
            full_text: '@friend_one thanks #typescript',
            in_reply_to_status_id_str: '900',
            favorite_count: '2',
            retweet_count: 1,
            entities: {
              hashtags: [{ text: 'typescript' }],
              user_mentions: [{ screen_name: 'friend_one' }],
              media: [{}, {}],
              urls: [{}],
            },
          },
        },
      ],
      '1000'
    );

    expect(dropped).toBe(0);
    expect(records).toEqual([
      {
        id: '2',
        authorId: '1000',
        createdAt: 'Thu Oct 11 09:05:00 +0000 2018',
        fullText: '@friend_one thanks #typescript',
        replyToId: '900',
        retweetOfId: undefined,
        quotedId: undefined,
        isQuoteStatus: false,
        likeCount: 2,
        retweetCount: 1,
        hashtags: ['typescript'],
        mentions: ['friend_one'],
        mediaCount: 2,
        urlCount: 1,
      },
    ]);
  });

  test('should fall back to text extraction without entities', () => {
    const { records } = normalizeTweets([{ tweet: { id_str: '5', full_text: 'hi #AI @bob' } }], '1000');

    expect(records[0].hashtags).toEqual(['AI']);
    expect(records[0].mentions).toEqual(['bob']);
    expect(records[0].likeCount).toBe(0);
  });

  test('should flag retweets and quote statuses', () => {
    const { records } = normalizeTweets(
      [
        { tweet: { id_str: '6', full_text: 'x', retweeted_status: { id_str: '60' } } },
        { tweet: { id_str: '7', full_text: 'y', retweeted_status: {} } },
        { tweet: { id_str: '8', full_text: 'z', is_quote_status: 'true' } },
      ],
      '1000'
    );

    expect(records[0].retweetOfId).toBe('60');
    expect(records[1].retweetOfId).toBe('');
    expect(records[2].isQuoteStatus).toBe(true);
  });

  test('should drop entries without an id', () => {
    const { records, dropped } = normalizeTweets([{ tweet: { full_text: 'no id' } }, 42], '1000');

    expect(records).toEqual([]);
    expect(dropped).toBe(2);
  });
});

describe('normalizeLikes', () => {
  test('should derive author handle and hashtags', () => {
    const { records } = normalizeLikes([
      {
        like: {
          tweetId: '500',
          fullText: 'Handy #TypeScript tips',
          expandedUrl: 'https://twitter.com/writer_a/status/500',
        },
      },
    ]);

    expect(records).toEqual([
      {
        id: '500',
        originalAuthorHandle: 'writer_a',
        fullText: 'Handy #TypeScript tips',
        expandedUrl: 'https://twitter.com/writer_a/status/500',
        hashtags: ['TypeScript'],
        mentions: [],
      },
    ]);
  });

  test('should keep likes that carry no tweet id', () => {
    const { records, dropped } = normalizeLikes([
      { like: { fullText: 'Loving #TypeScript', expandedUrl: 'https://twitter.com/a/status/1' } },
      { like: { fullText: 'no url here' } },
    ]);

    expect(dropped).toBe(0);
    expect(records).toEqual([
      {
        id: '',
        originalAuthorHandle: 'a',
        fullText: 'Loving #TypeScript',
        expandedUrl: 'https://twitter.com/a/status/1',
        hashtags: ['TypeScript'],
        mentions: [],
      },
      {
        id: '',
        originalAuthorHandle: undefined,
        fullText: 'no url here',
        expandedUrl: undefined,
        hashtags: [],
        mentions: [],
      },
    ]);
  });

  test('should drop entries that are not objects', () => {
    expect(normalizeLikes(['oops', null]).dropped).toBe(2);
  });
});

describe('normalizeAccount', () => {
  test('should merge account and profile', () => {
    const account = normalizeAccount(
      [{ account: { accountId: '1000', username: 'sample_user', accountDisplayName: 'Sample User', email: ' ' } }],
      [{ profile: { description: { bio: 'Hello', location: 'Earth', website: '' } } }]
    );

    expect(account).toEqual({
      accountId: '1000',
      handle: 'sample_user',
      displayName: 'Sample User',
      createdAt: undefined,
      bio: 'Hello',
      location: 'Earth',
      website: undefined,
      email: undefined,
    });
  });

  test('should return undefined without an account entry', () => {
    expect(normalizeAccount([], [])).toBeUndefined();
  });
});
