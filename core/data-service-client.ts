/**
 * Data Service Client
 * axios client for the REST service that answers with `{ data, meta }` envelopes
 */

import axios, { AxiosAdapter, AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import { z } from 'zod';
import { DATA_SERVICE_COOKIE_HEADER, DATA_SERVICE_PATHS } from '../config/constants';
import type { DataServiceConfig } from '../types/config';
import { createModuleLogger } from '../utils/logger';
import { AnalyticsError, AnalyticsErrors, ErrorClassifier, ErrorCode, ErrorContext } from './errors';

const logger = createModuleLogger('DataServiceClient');

const publicMetricsSchema = z
  .object({
    like_count: z.number().optional(),
    retweet_count: z.number().optional(),
    reply_count: z.number().optional(),
    quote_count: z.number().optional(),
  })
  .passthrough();

export const dataServiceUserSchema = z
  .object({
    id: z.string(),
    username: z.string().optional(),
    name: z.string().optional(),
    description: z.string().nullish(),
    created_at: z.string().nullish(),
    public_metrics: z
      .object({
        followers_count: z.number().optional(),
        following_count: z.number().optional(),
        tweet_count: z.number().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const dataServiceTweetSchema = z
  .object({
    id: z.string(),
    text: z.string().nullish(),
    created_at: z.string().nullish(),
    author_id: z.string().nullish(),
    in_reply_to_status_id: z.string().nullish(),
    referenced_tweets: z
      .array(z.object({ type: z.enum(['replied_to', 'quoted', 'retweeted']), id: z.string() }))
      .optional(),
    public_metrics: publicMetricsSchema.optional(),
  })
  .passthrough();

const metaSchema = z
  .object({
    result_count: z.number().optional(),
    next_token: z.string().nullish(),
  })
  .passthrough();

const envelopeSchema = z.object({
  data: z.unknown(),
  meta: metaSchema.optional(),
});

export type DataServiceUser = z.infer<typeof dataServiceUserSchema>;
export type DataServiceTweet = z.infer<typeof dataServiceTweetSchema>;

export interface DataServiceClientOptions extends Partial<DataServiceConfig> {
  /** Replaces the HTTP transport; tests pass an in-process adapter */
  adapter?: AxiosAdapter;
}

export class DataServiceClient {
  readonly baseUrl: string;
  private readonly http: AxiosInstance;
  private readonly pageSize: number;
  private readonly maxPages: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(options: DataServiceClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? 'http://localhost:3001').replace(/\/+$/, '');
    this.pageSize = options.pageSize ?? 100;
    this.maxPages = options.maxPages ?? 32;
    this.maxRetries = options.maxRetries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 1000;

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (options.cookies) {
      headers[DATA_SERVICE_COOKIE_HEADER] = options.cookies;
    }

    const axiosConfig: AxiosRequestConfig = {
      baseURL: this.baseUrl,
      timeout: options.timeoutMs ?? 30000,
      headers,
      validateStatus: () => true, // Handle status codes manually
    };
    if (options.adapter) {
      axiosConfig.adapter = options.adapter;
    }

    this.http = axios.create(axiosConfig);
  }

  /**
   * Whether the service answers its health endpoint
   */
  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.http.get(DATA_SERVICE_PATHS.health, { timeout: 5000 });
      return response.status >= 200 && response.status < 300;
    } catch (error) {
      logger.debug('Health check failed', { error: error instanceof Error ? error.message : String(error) });
      return false;
    }
  }

  async getUser(username: string): Promise<DataServiceUser> {
    const context: ErrorContext = { operation: 'getUser', username };
    try {
      const body = await this.request(DATA_SERVICE_PATHS.user(username), {}, context);
      return this.parseEnvelope(body, dataServiceUserSchema, context).data;
    } catch (error) {
      if (error instanceof AnalyticsError && error.code === ErrorCode.NOT_FOUND) {
        throw AnalyticsErrors.userNotFound(username, context);
      }
      throw error;
    }
  }

  async getTweets(username: string, limit?: number): Promise<DataServiceTweet[]> {
    return this.paginate(DATA_SERVICE_PATHS.tweets(username), {}, dataServiceTweetSchema, limit, {
      operation: 'getTweets',
      username,
    });
  }

  async getFollowers(username: string, limit?: number): Promise<DataServiceUser[]> {
    return this.paginate(DATA_SERVICE_PATHS.followers(username), {}, dataServiceUserSchema, limit, {
      operation: 'getFollowers',
      username,
    });
  }

  async getFollowing(username: string, limit?: number): Promise<DataServiceUser[]> {
    return this.paginate(DATA_SERVICE_PATHS.following(username), {}, dataServiceUserSchema, limit, {
      operation: 'getFollowing',
      username,
    });
  }

  async searchTweets(query: string, limit?: number): Promise<DataServiceTweet[]> {
    return this.paginate(DATA_SERVICE_PATHS.search, { query }, dataServiceTweetSchema, limit, {
      operation: 'searchTweets',
      query,
    });
  }

  // ==================== 内部 ====================

  /**
   * GET with retries for failures marked `retryable`, backing off exponentially
   */
  private async request(
    path: string,
    params: Record<string, string | number>,
    context: ErrorContext
  ): Promise<unknown> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.requestOnce(path, params, context);
      } catch (error) {
        if (!(error instanceof AnalyticsError) || !error.retryable || attempt >= this.maxRetries) {
          throw error;
        }
        const delay = this.retryDelayMs * 2 ** attempt;
        logger.warn(`Retrying ${context.operation ?? path} in ${delay}ms`, {
          ...context,
          code: error.code,
          attempt: attempt + 1,
        });
        await sleep(delay);
      }
    }
  }

  private async requestOnce(
    path: string,
    params: Record<string, string | number>,
    context: ErrorContext
  ): Promise<unknown> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(path, { params });
    } catch (error) {
      throw ErrorClassifier.classify(error, context);
    }

    if (response.status < 200 || response.status >= 300) {
      throw AnalyticsError.fromHttpResponse(
        { status: response.status, statusText: errorMessageOf(response.data) ?? response.statusText },
        { ...context, statusCode: response.status }
      );
    }
    return response.data;
  }

  private parseEnvelope<T extends z.ZodTypeAny>(
    body: unknown,
    schema: T,
    context: ErrorContext
  ): { data: z.infer<T>; nextToken?: string } {
    const envelope = envelopeSchema.safeParse(body);
    const data = envelope.success ? schema.safeParse(envelope.data.data) : envelope;
    if (!envelope.success || !data.success) {
      const issue = data.success ? undefined : data.error.issues[0];
      throw AnalyticsErrors.invalidResponse(
        `Unexpected response for ${context.operation ?? 'request'}: ${
          issue ? `${issue.path.join('.') || 'body'} ${issue.message}` : 'invalid body'
        }`,
        context
      );
    }
    return { data: data.data, nextToken: envelope.data.meta?.next_token ?? undefined };
  }

  /**
   * Follows `meta.next_token` until it runs out, a page comes back empty,
   * `limit` items are collected or `maxPages` pages were read
   */
  private async paginate<T extends z.ZodTypeAny>(
    path: string,
    params: Record<string, string | number>,
    itemSchema: T,
    limit: number | undefined,
    context: ErrorContext
  ): Promise<z.infer<T>[]> {
    const items: z.infer<T>[] = [];
    const seenCursors = new Set<string>();
    let cursor: string | undefined;

    for (let page = 0; page < this.maxPages; page++) {
      const pageParams: Record<string, string | number> = { ...params, count: this.pageSize };
      if (cursor) pageParams.cursor = cursor;

      const body = await this.request(path, pageParams, { ...context, page });
      const envelope = this.parseEnvelope(body, z.array(itemSchema), context);
      const pageItems: z.infer<T>[] = envelope.data;
      items.push(...pageItems);

      const next = envelope.nextToken;
      if (!next || pageItems.length === 0 || seenCursors.has(next)) break;
      if (limit !== undefined && items.length >= limit) break;

      seenCursors.add(next);
      cursor = next;
    }

    logger.debug('Pagination finished', { ...context, items: items.length });
    return limit !== undefined ? items.slice(0, limit) : items;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function errorMessageOf(body: unknown): string | undefined {
  if (typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string') {
    return body.error;
  }
  return undefined;
}

export function createDataServiceClient(config: DataServiceConfig, adapter?: AxiosAdapter): DataServiceClient {
  return new DataServiceClient({ ...config, adapter });
}
