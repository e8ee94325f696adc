/**
 * Adapts data-service responses into the same ArchiveSnapshot the archive loader produces
 */

import type { Account, ArchiveSnapshot, Tweet } from '../types/archive';
import { createEnhancedLogger, EnhancedLogger } from '../utils/logger';
import { extractHashtags, extractMentions } from './archive-records';
import type { DataServiceClient, DataServiceTweet, DataServiceUser } from './data-service-client';
import { formatTwitterDate, parseTwitterDate } from './twitter-date';

const defaultLogger = createEnhancedLogger('DataServiceAdapter');

const URL_PATTERN = /https?:\/\/\S+/g;

export interface LoadFromDataServiceOptions {
  /** Cap on the number of tweets fetched */
  tweetLimit?: number;
  logger?: EnhancedLogger;
}

/**
 * Service timestamps come either in archive format or as ISO-8601;
 * tweets keep the archive format so the content analyzer can bucket them.
 */
export function toArchiveTimestamp(value: string | null | undefined): string {
  if (!value) return '';
  if (parseTwitterDate(value)) return value;
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? value : formatTwitterDate(new Date(parsed));
}

function toIsoTimestamp(value: string | null | undefined): string | undefined {
  if (!value) return undefined;
  const archiveDate = parseTwitterDate(value);
  if (archiveDate) return archiveDate.toISOString();
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? undefined : new Date(parsed).toISOString();
}

export function adaptUser(user: DataServiceUser, fallbackHandle: string): Account {
  return {
    accountId: user.id,
    handle: user.username ?? fallbackHandle,
    displayName: user.name ?? user.username ?? fallbackHandle,
    createdAt: toIsoTimestamp(user.created_at),
    bio: user.description ?? '',
  };
}

export function adaptTweet(tweet: DataServiceTweet, defaultAuthorId: string): Tweet {
  const text = tweet.text ?? '';
  const referenced = tweet.referenced_tweets ?? [];
  const referenceOf = (type: 'replied_to' | 'quoted' | 'retweeted'): string | undefined =>
    referenced.find((ref) => ref.type === type)?.id;

  const quotedId = referenceOf('quoted');
  return {
    id: tweet.id,
    authorId: tweet.author_id ?? defaultAuthorId,
    createdAt: toArchiveTimestamp(tweet.created_at),
    fullText: text,
    replyToId: referenceOf('replied_to') ?? tweet.in_reply_to_status_id ?? undefined,
    retweetOfId: referenceOf('retweeted'),
    quotedId,
    isQuoteStatus: quotedId !== undefined,
    likeCount: tweet.public_metrics?.like_count ?? 0,
    retweetCount: tweet.public_metrics?.retweet_count ?? 0,
    hashtags: extractHashtags(text),
    mentions: extractMentions(text),
    mediaCount: 0,
    urlCount: (text.match(URL_PATTERN) ?? []).length,
  };
}

/**
 * Builds a snapshot for `username` from the data service. Likes, blocks and mutes
 * are not exposed by the service and stay empty.
 */
export async function loadFromDataService(
  client: DataServiceClient,
  username: string,
  options: LoadFromDataServiceOptions = {}
): Promise<ArchiveSnapshot> {
  const logger = options.logger ?? defaultLogger;

  return logger.trackAsync(
    'loadFromDataService',
    async () => {
      const user = await client.getUser(username);
      const account = adaptUser(user, username);

      const [tweets, followers, following] = await Promise.all([
        client.getTweets(username, options.tweetLimit),
        client.getFollowers(username),
        client.getFollowing(username),
      ]);

      const snapshot: ArchiveSnapshot = {
        rootPath: `${client.baseUrl}/api/user/${encodeURIComponent(username)}`,
        source: 'data-service',
        account,
        followers: new Set(followers.map((follower) => follower.id)),
        following: new Set(following.map((followed) => followed.id)),
        blocks: new Set(),
        mutes: new Set(),
        tweets: tweets.map((tweet) => adaptTweet(tweet, account.accountId)),
        likes: [],
        skippedFiles: [],
        droppedRecords: 0,
      };

      logger.info('Data service snapshot loaded', {
        username,
        followers: snapshot.followers.size,
        following: snapshot.following.size,
        tweets: snapshot.tweets.length,
      });

      return snapshot;
    },
    { username }
  );
}
