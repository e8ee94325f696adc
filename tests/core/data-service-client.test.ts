/**
 * DataServiceClient 单元测试
 */

import { AxiosError } from 'axios';
import { describe, expect, test } from 'vitest';
import { DataServiceClient } from '../../core/data-service-client';
import { AnalyticsError, ErrorCode } from '../../core/errors';
import { createFakeDataService, FakeHandler, page, routeTable } from '../fixtures/fake-data-service';

const USER = { id: '1000', username: 'sample_user', name: 'Sample User' };

function tweet(id: string): { id: string; text: string } {
  return { id, text: `tweet ${id}` };
}

function clientFor(handler: FakeHandler, pageSize: number = 2, maxPages: number = 10) {
  const service = createFakeDataService(handler);
  const client = new DataServiceClient({
    baseUrl: 'http://service.test/',
    cookies: 'auth_token=test-token',
    pageSize,
    maxPages,
    retryDelayMs: 0,
    adapter: service.adapter,
  });
  return { client, requests: service.requests };
}

async function captureAsync(promise: Promise<unknown>): Promise<AnalyticsError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof AnalyticsError) return error;
    throw error;
  }
  throw new Error('Expected an AnalyticsError');
}

describe('DataServiceClient', () => {
  test('should strip trailing slashes from the base url', () => {
    expect(clientFor(routeTable({})).client.baseUrl).toBe('http://service.test');
  });

  test('should fetch a user and forward cookies', async () => {
    const { client, requests } = clientFor(routeTable({ '/api/user/sample_user': { status: 200, data: { data: USER } } }));

    const user = await client.getUser('sample_user');

    expect(user).toMatchObject(USER);
    expect(requests).toEqual([{ url: '/api/user/sample_user', params: {}, cookie: 'auth_token=test-token' }]);
  });

  test('should map a 404 to a missing user', async () => {
    const { client } = clientFor(routeTable({}));
    const error = await captureAsync(client.getUser('ghost'));

    expect(error.code).toBe(ErrorCode.NOT_FOUND);
    expect(error.message).toBe('User not found: ghost');
  });

  test('should map a 5xx to a server error with the service message', async () => {
    const { client, requests } = clientFor(() => ({ status: 500, data: { error: 'boom' } }));
    const error = await captureAsync(client.getFollowers('sample_user'));

    expect(error.code).toBe(ErrorCode.SERVER_ERROR);
    expect(error.message).toBe('Server error: boom');
    expect(error.retryable).toBe(true);
    // one attempt plus the two default retries
    expect(requests).toHaveLength(3);
  });

  describe('retries', () => {
    test('should retry a retryable failure and return the later answer', async () => {
      let calls = 0;
      const { client, requests } = clientFor(() => {
        calls++;
        return calls === 1 ? { status: 503, data: { error: 'busy' } } : { status: 200, data: { data: USER } };
      });

      expect((await client.getUser('sample_user')).id).toBe('1000');
      expect(requests).toHaveLength(2);
    });

    test('should not retry a failure that is not retryable', async () => {
      const { client, requests } = clientFor(() => ({ status: 401, data: {} }));

      expect((await captureAsync(client.getUser('sample_user'))).code).toBe(ErrorCode.AUTH_FAILED);
      expect(requests).toHaveLength(1);
    });

    test('should honour maxRetries', async () => {
      const service = createFakeDataService(() => ({ status: 429, data: {} }));
      const client = new DataServiceClient({ maxRetries: 0, retryDelayMs: 0, adapter: service.adapter });

      expect((await captureAsync(client.getTweets('sample_user'))).code).toBe(ErrorCode.RATE_LIMIT_EXCEEDED);
      expect(service.requests).toHaveLength(1);
    });
  });

  test('should map a 429 to a rate limit error', async () => {
    const { client } = clientFor(() => ({ status: 429, data: {} }));
    expect((await captureAsync(client.getFollowing('sample_user'))).code).toBe(ErrorCode.RATE_LIMIT_EXCEEDED);
  });

  test('should classify transport failures', async () => {
    const { client } = clientFor(() => {
      throw new AxiosError('connect ECONNREFUSED 127.0.0.1:3001', 'ECONNREFUSED');
    });
    expect((await captureAsync(client.getUser('sample_user'))).code).toBe(ErrorCode.NETWORK_ERROR);
  });

  test('should reject bodies of the wrong shape', async () => {
    const { client } = clientFor(() => page([{ text: 'no id' }]));
    const error = await captureAsync(client.getTweets('sample_user'));

    expect(error.code).toBe(ErrorCode.INVALID_RESPONSE);
    expect(error.message).toBe('Unexpected response for getTweets: 0.id Required');
  });

  describe('pagination', () => {
    const pages = routeTable({
      '/api/user/sample_user/tweets': page([tweet('1'), tweet('2')], 'c1'),
      '/api/user/sample_user/tweets?cursor=c1': page([tweet('3')], 'c2'),
      '/api/user/sample_user/tweets?cursor=c2': page([]),
    });

    test('should follow cursors until an empty page', async () => {
      const { client, requests } = clientFor(pages);

      const tweets = await client.getTweets('sample_user');

      expect(tweets.map((t) => t.id)).toEqual(['1', '2', '3']);
      expect(requests.map((r) => r.params)).toEqual([{ count: 2 }, { count: 2, cursor: 'c1' }, { count: 2, cursor: 'c2' }]);
    });

    test('should stop once the limit is reached', async () => {
      const { client, requests } = clientFor(pages);

      expect((await client.getTweets('sample_user', 1)).map((t) => t.id)).toEqual(['1']);
      expect(requests).toHaveLength(1);
    });

    test('should stop on a repeated cursor', async () => {
      const { client, requests } = clientFor(() => page([tweet('1')], 'loop'));

      expect(await client.getTweets('sample_user')).toHaveLength(2);
      expect(requests).toHaveLength(2);
    });

    test('should stop at maxPages', async () => {
      const { client, requests } = clientFor(pages, 2, 1);

      expect(await client.getTweets('sample_user')).toHaveLength(2);
      expect(requests).toHaveLength(1);
    });
  });

  test('should pass the search query', async () => {
    const { client, requests } = clientFor(routeTable({ '/api/tweets/search': page([tweet('9')]) }));

    expect((await client.searchTweets('typescript')).map((t) => t.id)).toEqual(['9']);
    expect(requests[0].params).toEqual({ query: 'typescript', count: 2 });
  });

  describe('healthCheck', () => {
    test('should be true for a 2xx answer', async () => {
      expect(await clientFor(() => ({ status: 200, data: 'ok' })).client.healthCheck()).toBe(true);
    });

    test('should be false for an error status or a transport failure', async () => {
      expect(await clientFor(() => ({ status: 503, data: {} })).client.healthCheck()).toBe(false);
      const failing = clientFor(() => {
        throw new AxiosError('socket hang up', 'ECONNRESET');
      });
      expect(await failing.client.healthCheck()).toBe(false);
    });
  });
});
