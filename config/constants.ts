/**
 * Application Constants
 *
 * This file contains ONLY truly immutable constants:
 * - Archive file layout
 * - Export headers (downstream tools rely on column position)
 * - Calendar labels
 *
 * For configurable values (timezone, top-N, scoring weights), see:
 * - utils/config-manager.ts (ConfigManager)
 */

// ==================== 归档结构 ====================

/**
 * Subdirectory of an archive that holds the per-entity export files
 */
export const ARCHIVE_DATA_DIR = 'data';

/**
 * Export files per entity. The first existing candidate wins;
 * multi-part exports (`tweets-part1.js`, ...) are appended to it.
 */
export const ARCHIVE_FILES = {
  followers: ['follower.js'],
  following: ['following.js'],
  tweets: ['tweets.js', 'tweet.js'],
  likes: ['like.js'],
  account: ['account.js'],
  profile: ['profile.js'],
  blocks: ['block.js'],
  mutes: ['mute.js'],
} as const;

export type ArchiveEntity = keyof typeof ARCHIVE_FILES;

export const ARCHIVE_ENTITIES: readonly ArchiveEntity[] = [
  'account',
  'profile',
  'followers',
  'following',
  'tweets',
  'likes',
  'blocks',
  'mutes',
];

// ==================== 导出 ====================

export const CSV_HEADERS = {
  followers: ['account_id'],
  following: ['account_id'],
  mutual: ['account_id'],
  oneSidedFollowers: ['account_id'],
  oneSidedFollowing: ['account_id'],
  tweets: [
    'tweet_id',
    'created_at',
    'type',
    'full_text',
    'like_count',
    'retweet_count',
    'hashtags',
    'mentions',
  ],
  likes: ['tweet_id', 'original_author_handle', 'full_text', 'expanded_url', 'hashtags'],
} as const;

export const CSV_FILENAMES = {
  followers: 'followers.csv',
  following: 'following.csv',
  mutual: 'mutual.csv',
  oneSidedFollowers: 'one_sided_followers.csv',
  oneSidedFollowing: 'one_sided_following.csv',
  tweets: 'tweets.csv',
  likes: 'likes.csv',
} as const;

export const METRICS_FILENAME = 'metrics.json';
export const SNAPSHOT_FILENAME = 'snapshot.json';

/**
 * Bumped whenever the snapshot.json layout changes
 */
export const SNAPSHOT_FORMAT_VERSION = 1;

// ==================== 日历 ====================

/**
 * Index 0 is Sunday, matching Date#getUTCDay
 */
export const DAY_NAMES = [
  'Sunday',
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
] as const;

export const MONTH_ABBREVIATIONS = [
  'Jan',
  'Feb',
  'Mar',
  'Apr',
  'May',
  'Jun',
  'Jul',
  'Aug',
  'Sep',
  'Oct',
  'Nov',
  'Dec',
] as const;

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

// ==================== 数据服务 ====================

/**
 * Header the data service reads the caller's session cookies from
 */
export const DATA_SERVICE_COOKIE_HEADER = 'X-Rettiwt-Cookies';

export const DATA_SERVICE_PATHS = {
  health: '/health',
  user: (username: string) => `/api/user/${encodeURIComponent(username)}`,
  tweets: (username: string) => `/api/user/${encodeURIComponent(username)}/tweets`,
  followers: (username: string) => `/api/user/${encodeURIComponent(username)}/followers`,
  following: (username: string) => `/api/user/${encodeURIComponent(username)}/following`,
  search: '/api/tweets/search',
} as const;
