/**
 * Record normalisation for archive export entries.
 * Raw entries are validated with zod; entries of an unknown shape are dropped and counted,
 * so analyzers only ever see typed records.
 */

import { z } from 'zod';
import type { Account, LikedTweet, Tweet } from '../types/archive';

export interface NormalizeResult<T> {
  records: T[];
  dropped: number;
}

const HASHTAG_PATTERN = /[#＃]([\p{L}\p{N}_]+)/gu;
const MENTION_PATTERN = /@([A-Za-z0-9_]{1,15})/g;
const STATUS_URL_PATTERN = /^https?:\/\/(?:www\.|mobile\.)?(?:twitter|x)\.com\/([A-Za-z0-9_]{1,15})\/status(?:es)?\//i;
const NON_USER_PATHS = new Set(['i', 'intent', 'home', 'search']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Archive entries are usually wrapped (`{ "tweet": {...} }`); bare objects are accepted too.
 */
export function unwrapEntry(entry: unknown, key: string): unknown {
  if (isRecord(entry) && isRecord(entry[key])) {
    return entry[key];
  }
  return entry;
}

/**
 * Integers arrive as numbers or numeric strings; anything else counts as 0
 */
export function coerceCount(value: unknown): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : 0;
  }
  if (typeof value === 'string' && /^\s*-?\d+\s*$/.test(value)) {
    return parseInt(value, 10);
  }
  return 0;
}

export function extractHashtags(text: string): string[] {
  return Array.from(text.matchAll(HASHTAG_PATTERN), (match) => match[1]);
}

export function extractMentions(text: string): string[] {
  return Array.from(text.matchAll(MENTION_PATTERN), (match) => match[1]);
}

export function handleFromStatusUrl(url: string | undefined): string | undefined {
  if (!url) return undefined;
  const match = STATUS_URL_PATTERN.exec(url);
  if (!match || NON_USER_PATHS.has(match[1].toLowerCase())) {
    return undefined;
  }
  return match[1];
}

function pickStrings(items: unknown[] | undefined, field: string): string[] {
  if (!items) return [];
  const values: string[] = [];
  for (const item of items) {
    const value = isRecord(item) ? item[field] : undefined;
    if (typeof value === 'string') {
      values.push(value);
    }
  }
  return values;
}

function nonEmpty(value: string | number | null | undefined): string | undefined {
  if (value === null || value === undefined) return undefined;
  const text = String(value).trim();
  return text.length > 0 ? text : undefined;
}

// ==================== 关系 ====================

const accountRefSchema = z.object({
  accountId: z.union([z.string().min(1), z.number()]).transform(String),
});

/**
 * follower / following / block / mute entries
 */
export function normalizeAccountIds(entries: readonly unknown[]): NormalizeResult<string> {
  const records: string[] = [];
  let dropped = 0;

  for (const entry of entries) {
    const candidate = isRecord(entry) && 'accountId' in entry
      ? entry
      : isRecord(entry)
        ? Object.values(entry).find(isRecord)
        : undefined;
    const parsed = accountRefSchema.safeParse(candidate);
    if (parsed.success) {
      records.push(parsed.data.accountId);
    } else {
      dropped++;
    }
  }

  return { records, dropped };
}

// ==================== 推文 ====================

const entitiesSchema = z.object({
  hashtags: z.array(z.unknown()).optional(),
  user_mentions: z.array(z.unknown()).optional(),
  media: z.array(z.unknown()).optional(),
  urls: z.array(z.unknown()).optional(),
});

const rawTweetSchema = z
  .object({
    id_str: z.string().optional(),
    id: z.union([z.string(), z.number()]).optional(),
    created_at: z.string().optional(),
    full_text: z.string().optional(),
    text: z.string().optional(),
    favorite_count: z.unknown(),
    retweet_count: z.unknown(),
    entities: entitiesSchema.optional(),
    in_reply_to_status_id_str: z.string().nullish(),
    in_reply_to_status_id: z.union([z.string(), z.number()]).nullish(),
    retweeted_status: z.object({ id_str: z.string().optional() }).nullish(),
    quoted_status_id_str: z.string().nullish(),
    is_quote_status: z.union([z.boolean(), z.string()]).optional(),
    user_id_str: z.string().optional(),
  })
  .refine((tweet) => nonEmpty(tweet.id_str ?? tweet.id) !== undefined, {
    message: 'tweet has no id',
  });

type RawTweet = z.infer<typeof rawTweetSchema>;

function toTweet(raw: RawTweet, defaultAuthorId: string): Tweet {
  const fullText = raw.full_text ?? raw.text ?? '';
  const entities = raw.entities;

  const hashtags = entities?.hashtags ? pickStrings(entities.hashtags, 'text') : extractHashtags(fullText);
  const mentions = entities?.user_mentions
    ? pickStrings(entities.user_mentions, 'screen_name')
    : extractMentions(fullText);

  const retweetOfId = raw.retweeted_status ? (nonEmpty(raw.retweeted_status.id_str) ?? '') : undefined;

  return {
    id: nonEmpty(raw.id_str ?? raw.id) ?? '',
    authorId: raw.user_id_str ?? defaultAuthorId,
    createdAt: raw.created_at ?? '',
    fullText,
    replyToId: nonEmpty(raw.in_reply_to_status_id_str ?? raw.in_reply_to_status_id),
    retweetOfId,
    quotedId: nonEmpty(raw.quoted_status_id_str),
    isQuoteStatus: raw.is_quote_status === true || raw.is_quote_status === 'true',
    likeCount: coerceCount(raw.favorite_count),
    retweetCount: coerceCount(raw.retweet_count),
    hashtags,
    mentions,
    mediaCount: entities?.media?.length ?? 0,
    urlCount: entities?.urls?.length ?? 0,
  };
}

export function normalizeTweets(entries: readonly unknown[], defaultAuthorId: string): NormalizeResult<Tweet> {
  const records: Tweet[] = [];
  let dropped = 0;

  for (const entry of entries) {
    const parsed = rawTweetSchema.safeParse(unwrapEntry(entry, 'tweet'));
    if (parsed.success) {
      records.push(toTweet(parsed.data, defaultAuthorId));
    } else {
      dropped++;
    }
  }

  return { records, dropped };
}

// ==================== 喜欢 ====================

const rawLikeSchema = z.object({
  tweetId: z.union([z.string(), z.number()]).transform(String).optional(),
  fullText: z.string().optional(),
  expandedUrl: z.string().optional(),
});

export function normalizeLikes(entries: readonly unknown[]): NormalizeResult<LikedTweet> {
  const records: LikedTweet[] = [];
  let dropped = 0;

  for (const entry of entries) {
    const parsed = rawLikeSchema.safeParse(unwrapEntry(entry, 'like'));
    if (!parsed.success) {
      dropped++;
      continue;
    }
    const fullText = parsed.data.fullText ?? '';
    records.push({
      id: parsed.data.tweetId ?? '',
      originalAuthorHandle: handleFromStatusUrl(parsed.data.expandedUrl),
      fullText,
      expandedUrl: parsed.data.expandedUrl,
      hashtags: extractHashtags(fullText),
      mentions: extractMentions(fullText),
    });
  }

  return { records, dropped };
}

// ==================== 账户 ====================

const rawAccountSchema = z.object({
  accountId: z.union([z.string().min(1), z.number()]).transform(String),
  username: z.string().default(''),
  accountDisplayName: z.string().default(''),
  createdAt: z.string().optional(),
  email: z.string().optional(),
});

const rawProfileSchema = z.object({
  description: z
    .object({
      bio: z.string().optional(),
      website: z.string().optional(),
      location: z.string().optional(),
    })
    .default({}),
});

/**
 * account.js and profile.js are single-element arrays; only the first element is read
 */
export function normalizeAccount(
  accountEntries: readonly unknown[],
  profileEntries: readonly unknown[]
): Account | undefined {
  const account = rawAccountSchema.safeParse(unwrapEntry(accountEntries[0], 'account'));
  if (!account.success) {
    return undefined;
  }

  const profile = rawProfileSchema.safeParse(unwrapEntry(profileEntries[0], 'profile'));
  const description: z.infer<typeof rawProfileSchema>['description'] = profile.success
    ? profile.data.description
    : {};

  return {
    accountId: account.data.accountId,
    handle: account.data.username,
    displayName: account.data.accountDisplayName,
    createdAt: account.data.createdAt,
    bio: description.bio ?? '',
    location: nonEmpty(description.location),
    website: nonEmpty(description.website),
    email: nonEmpty(account.data.email),
  };
}
