/**
 * Archive Loader
 * Reads the `data` directory of a Twitter/X export into typed, read-only collections.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { ARCHIVE_DATA_DIR, ARCHIVE_ENTITIES, ARCHIVE_FILES, ArchiveEntity } from '../config/constants';
import type { ArchiveSnapshot, SkippedFile } from '../types/archive';
import { createEnhancedLogger, EnhancedLogger } from '../utils/logger';
import { ErrorClassifier, MalformedRecordError, MissingArchiveError } from './errors';
import {
  normalizeAccount,
  normalizeAccountIds,
  normalizeLikes,
  normalizeTweets,
} from './archive-records';

const defaultLogger = createEnhancedLogger('ArchiveLoader');

/** `window.YTD.tweets.part0 = ` */
const ASSIGNMENT_PREFIX = /^\s*[A-Za-z_$][\w$.]*\s*=\s*/;

export interface LoadArchiveOptions {
  logger?: EnhancedLogger;
}

interface EntityFileResult {
  entries: unknown[];
  skipped: SkippedFile[];
}

/**
 * Parses one export file's text. Throws MalformedRecordError when the payload is not a JSON array.
 */
export function parseArchiveFile(content: string, file: string): unknown[] {
  const text = content.replace(/^\uFEFF/, '');
  if (text.trim().length === 0) {
    return [];
  }

  const payload = text.replace(ASSIGNMENT_PREFIX, '').trim().replace(/;$/, '');

  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch (error: unknown) {
    throw new MalformedRecordError(
      file,
      error instanceof Error ? error.message : 'invalid JSON',
      error instanceof Error ? error : undefined
    );
  }

  if (!Array.isArray(parsed)) {
    throw new MalformedRecordError(file, 'expected a JSON array');
  }
  return parsed;
}

function partNumber(fileName: string, stem: string): number | null {
  const match = new RegExp(`^${stem}-part(\\d+)\\.js$`).exec(fileName);
  return match ? Number(match[1]) : null;
}

/**
 * Files holding one entity: the first existing candidate, then its `-partN` siblings in order
 */
export function resolveEntityFiles(entity: ArchiveEntity, available: readonly string[]): string[] {
  const present = new Set(available);

  for (const candidate of ARCHIVE_FILES[entity]) {
    const stem = candidate.replace(/\.js$/, '');
    const parts = available
      .map((name) => ({ name, part: partNumber(name, stem) }))
      .filter((item): item is { name: string; part: number } => item.part !== null)
      .sort((a, b) => a.part - b.part)
      .map((item) => item.name);

    if (present.has(candidate) || parts.length > 0) {
      return present.has(candidate) ? [candidate, ...parts] : parts;
    }
  }

  return [];
}

async function readEntity(
  dataDir: string,
  files: readonly string[],
  logger: EnhancedLogger
): Promise<EntityFileResult> {
  const entries: unknown[] = [];
  const skipped: SkippedFile[] = [];

  for (const file of files) {
    const filePath = path.join(dataDir, file);
    try {
      const content = await fs.readFile(filePath, 'utf-8');
      entries.push(...parseArchiveFile(content, file));
    } catch (error: unknown) {
      const reason =
        error instanceof MalformedRecordError
          ? error.message
          : ErrorClassifier.classify(error, { file: filePath }).message;
      logger.warn(`Skipping archive file ${file}`, { file: filePath, reason });
      skipped.push({ file, reason });
    }
  }

  return { entries, skipped };
}

async function assertDataDirectory(dataDir: string): Promise<void> {
  try {
    const stat = await fs.stat(dataDir);
    if (!stat.isDirectory()) {
      throw new MissingArchiveError(dataDir);
    }
  } catch (error: unknown) {
    if (error instanceof MissingArchiveError) {
      throw error;
    }
    throw new MissingArchiveError(dataDir, error instanceof Error ? error : undefined);
  }
}

/**
 * Load an archive directory. Fails with MissingArchiveError when `<root>/data` is absent;
 * missing or malformed entity files yield empty collections.
 */
export async function loadArchive(
  rootPath: string,
  options: LoadArchiveOptions = {}
): Promise<ArchiveSnapshot> {
  const logger = options.logger ?? defaultLogger;
  const root = path.resolve(rootPath);
  const dataDir = path.join(root, ARCHIVE_DATA_DIR);

  await assertDataDirectory(dataDir);

  return logger.trackAsync(
    'loadArchive',
    async () => {
      const available = await fs.readdir(dataDir);
      const entities = ARCHIVE_ENTITIES;

      // Each entity is independent; everything settles before normalisation
      const results = await Promise.all(
        entities.map((entity) => readEntity(dataDir, resolveEntityFiles(entity, available), logger))
      );
      const raw = new Map<ArchiveEntity, EntityFileResult>();
      entities.forEach((entity, index) => raw.set(entity, results[index]));
      const entriesOf = (entity: ArchiveEntity): unknown[] => raw.get(entity)?.entries ?? [];

      const account = normalizeAccount(entriesOf('account'), entriesOf('profile'));
      const followers = normalizeAccountIds(entriesOf('followers'));
      const following = normalizeAccountIds(entriesOf('following'));
      const blocks = normalizeAccountIds(entriesOf('blocks'));
      const mutes = normalizeAccountIds(entriesOf('mutes'));
      const tweets = normalizeTweets(entriesOf('tweets'), account?.accountId ?? '');
      const likes = normalizeLikes(entriesOf('likes'));

      const droppedRecords =
        followers.dropped + following.dropped + blocks.dropped + mutes.dropped + tweets.dropped + likes.dropped;
      if (droppedRecords > 0) {
        logger.warn('Dropped archive entries with an unexpected shape', { droppedRecords });
      }

      const snapshot: ArchiveSnapshot = {
        rootPath: root,
        source: 'archive',
        account,
        followers: new Set(followers.records),
        following: new Set(following.records),
        blocks: new Set(blocks.records),
        mutes: new Set(mutes.records),
        tweets: tweets.records,
        likes: likes.records,
        skippedFiles: results.flatMap((result) => result.skipped),
        droppedRecords,
      };

      logger.info('Archive loaded', {
        root,
        account: account?.handle,
        followers: snapshot.followers.size,
        following: snapshot.following.size,
        tweets: snapshot.tweets.length,
        likes: snapshot.likes.length,
      });

      return snapshot;
    },
    { root }
  );
}
