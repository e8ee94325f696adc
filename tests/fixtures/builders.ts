/**
 * Test data builders
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { Account, ArchiveSnapshot, LikedTweet, Tweet } from '../../types/archive';

export const SAMPLE_ARCHIVE_DIR = path.join(__dirname, 'sample-archive');

export function makeTweet(overrides: Partial<Tweet> = {}): Tweet {
  return {
    id: '1',
    authorId: '1000',
    createdAt: 'Wed Oct 10 20:19:24 +0000 2018',
    fullText: '',
    isQuoteStatus: false,
    likeCount: 0,
    retweetCount: 0,
    hashtags: [],
    mentions: [],
    mediaCount: 0,
    urlCount: 0,
    ...overrides,
  };
}

export function makeLike(overrides: Partial<LikedTweet> = {}): LikedTweet {
  return {
    id: '500',
    fullText: '',
    hashtags: [],
    mentions: [],
    ...overrides,
  };
}

export function makeAccount(overrides: Partial<Account> = {}): Account {
  return {
    accountId: '1000',
    handle: 'sample_user',
    displayName: 'Sample User',
    bio: '',
    ...overrides,
  };
}

export interface ArchiveSnapshotInput {
  account?: Account;
  followers?: string[];
  following?: string[];
  blocks?: string[];
  mutes?: string[];
  tweets?: Tweet[];
  likes?: LikedTweet[];
}

export function makeArchiveSnapshot(input: ArchiveSnapshotInput = {}): ArchiveSnapshot {
  return {
    rootPath: '/archives/test',
    source: 'archive',
    account: input.account,
    followers: new Set(input.followers ?? []),
    following: new Set(input.following ?? []),
    blocks: new Set(input.blocks ?? []),
    mutes: new Set(input.mutes ?? []),
    tweets: input.tweets ?? [],
    likes: input.likes ?? [],
    skippedFiles: [],
    droppedRecords: 0,
  };
}

/**
 * `window.YTD.<name>.part0 = <json>`
 */
export function archiveFile(name: string, entries: unknown[]): string {
  return `window.YTD.${name}.part0 = ${JSON.stringify(entries, null, 2)}`;
}

export async function makeTempDir(prefix: string = 'archive-insights-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * Writes an archive to a fresh temp directory; values are written verbatim
 */
export async function writeArchive(files: Record<string, string>): Promise<string> {
  const root = await makeTempDir();
  const dataDir = path.join(root, 'data');
  await fs.mkdir(dataDir);
  await Promise.all(
    Object.entries(files).map(([name, content]) => fs.writeFile(path.join(dataDir, name), content, 'utf-8'))
  );
  return root;
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}
