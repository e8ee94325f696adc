/**
 * In-memory records produced from a Twitter/X data archive (or the data service).
 * Everything here is read-only once loaded.
 */

export interface Account {
  readonly accountId: string;
  readonly handle: string;
  readonly displayName: string;
  /** ISO-8601 creation timestamp as exported */
  readonly createdAt?: string;
  readonly bio: string;
  readonly location?: string;
  readonly website?: string;
  readonly email?: string;
}

export interface Tweet {
  readonly id: string;
  readonly authorId: string;
  /** Raw archive timestamp, e.g. "Wed Oct 10 20:19:24 +0000 2018" */
  readonly createdAt: string;
  readonly fullText: string;
  readonly replyToId?: string;
  readonly retweetOfId?: string;
  readonly quotedId?: string;
  readonly isQuoteStatus: boolean;
  readonly likeCount: number;
  readonly retweetCount: number;
  readonly hashtags: readonly string[];
  readonly mentions: readonly string[];
  readonly mediaCount: number;
  readonly urlCount: number;
}

export interface LikedTweet {
  readonly id: string;
  readonly originalAuthorHandle?: string;
  readonly fullText: string;
  readonly expandedUrl?: string;
  readonly hashtags: readonly string[];
  readonly mentions: readonly string[];
}

export type SnapshotSource = 'archive' | 'data-service';

export interface SkippedFile {
  readonly file: string;
  readonly reason: string;
}

export interface ArchiveSnapshot {
  readonly rootPath: string;
  readonly source: SnapshotSource;
  readonly account?: Account;
  readonly followers: ReadonlySet<string>;
  readonly following: ReadonlySet<string>;
  readonly blocks: ReadonlySet<string>;
  readonly mutes: ReadonlySet<string>;
  readonly tweets: readonly Tweet[];
  readonly likes: readonly LikedTweet[];
  readonly skippedFiles: readonly SkippedFile[];
  /** Entries dropped because they did not match the expected record shape */
  readonly droppedRecords: number;
}

export type TweetType = 'original' | 'reply' | 'retweet' | 'quote';
