import { beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import {
  ApiError,
  AuthenticationError,
  ConfigurationError,
  FieldUpdate,
  PatchBuilder,
  RateLimitError,
  TransientNetworkError,
  collectItems,
} from '@trackwise/http-core';
import { createCapturingLogger, createFakeTransport, createRecordingScheduler, rawResponse } from '@trackwise/http-core/testing';
import type { Page } from '@trackwise/http-core';
import type { CapturingLogger, FakeReply, RecordingScheduler } from '@trackwise/http-core/testing';
import type { Queue } from '../models';
import { TrackerClient, createTrackerClientFromEnv, readPaginationMeta } from '../trackerClient';
import type { TrackerClientConfig } from '../trackerClient';

const BASE = 'https://tracker.example.com/v3';

const issue = (key: string, summary = `Issue ${key}`) => ({ key, summary });

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected the promise to reject');
}

describe('TrackerClient', () => {
  let logger: CapturingLogger;
  let scheduler: RecordingScheduler;

  beforeEach(() => {
    logger = createCapturingLogger();
    scheduler = createRecordingScheduler();
  });

  const createClient = (replies: FakeReply[], overrides: Partial<TrackerClientConfig> = {}) => {
    const fake = createFakeTransport(replies);
    const client = new TrackerClient({
      token: 'test-token',
      orgId: 'org-1',
      baseUrl: 'https://tracker.example.com',
      transport: fake.transport,
      logger,
      scheduler,
      random: () => 0.5,
      ...overrides,
    });
    return { client, requests: fake.requests };
  };

  describe('generic calls', () => {
    it('sends auth, organization and locale headers', async () => {
      const { client, requests } = createClient([rawResponse(200, { login: 'me' })]);

      const response = await client.get('myself');

      expect(response.body).toEqual({ login: 'me' });
      expect(requests[0]?.url).toBe(`${BASE}/myself`);
      expect(requests[0]?.headers).toEqual({
        Accept: 'application/json',
        'Accept-Language': 'ru',
        Authorization: 'OAuth test-token',
        'X-Org-ID': 'org-1',
      });
    });

    it('omits X-Org-ID when no organization is configured and honours the language', async () => {
      const { client, requests } = createClient([rawResponse(200, {})], { orgId: undefined, language: 'en' });

      await client.get('myself');

      expect(requests[0]?.headers['X-Org-ID']).toBeUndefined();
      expect(requests[0]?.headers['Accept-Language']).toBe('en');
    });

    it('reads pagination metadata from the response headers', async () => {
      const { client } = createClient([
        rawResponse(200, [], { 'x-total-pages': '4', 'x-total-count': '180' }),
        rawResponse(200, []),
      ]);

      expect((await client.get('queues')).pagination).toEqual({ totalPages: 4, totalCount: 180 });
      expect((await client.get('queues')).pagination).toEqual({ totalPages: undefined, totalCount: undefined });
    });

    it('ignores empty pagination headers', async () => {
      expect(readPaginationMeta({ 'x-total-pages': '', 'x-total-count': ' ' })).toEqual({
        totalPages: undefined,
        totalCount: undefined,
      });

      const { client, requests } = createClient([
        rawResponse(200, [{ key: 'A' }, { key: 'B' }], { 'x-total-pages': '' }),
        rawResponse(200, []),
      ]);
      const items = await collectItems(client.paginate('boards', z.object({ key: z.string() }), { perPage: 2 }));

      expect(items).toHaveLength(2);
      expect(requests).toHaveLength(2);
    });

    it('defaults to the tracker API host', async () => {
      const { client, requests } = createClient([rawResponse(200, {})], { baseUrl: undefined });
      await client.get('myself');
      expect(requests[0]?.url).toBe('https://st-api.yandex-team.ru/v3/myself');
    });

    it('supports post, patch and delete with query parameters', async () => {
      const { client, requests } = createClient([rawResponse(201, {}), rawResponse(200, {}), rawResponse(204)]);

      await client.post('issues/TEST-1/comments', { text: 'Hi' }, { query: { isAddToFollowers: false } });
      await client.patch('issues/TEST-1', { summary: 'New' });
      await client.delete('issues/TEST-1/comments/5');

      expect(requests.map((request) => `${request.method} ${request.url}`)).toEqual([
        `POST ${BASE}/issues/TEST-1/comments?isAddToFollowers=false`,
        `PATCH ${BASE}/issues/TEST-1`,
        `DELETE ${BASE}/issues/TEST-1/comments/5`,
      ]);
      expect(requests[0]?.body).toBe('{"text":"Hi"}');
    });

    it('walks a listing with getPage semantics', async () => {
      const { client, requests } = createClient([
        rawResponse(200, [{ key: 'A' }, { key: 'B' }], { 'x-total-pages': '2' }),
        rawResponse(200, [{ key: 'C' }], { 'x-total-pages': '2' }),
      ]);

      const items = await collectItems(client.paginate('boards', z.object({ key: z.string() }), { perPage: 2 }));

      expect(items).toEqual([{ key: 'A' }, { key: 'B' }, { key: 'C' }]);
      expect(requests.map((request) => request.url)).toEqual([
        `${BASE}/boards?perPage=2&page=1`,
        `${BASE}/boards?perPage=2&page=2`,
      ]);
    });
  });

  describe('issues', () => {
    it('gets an issue with expanded fields and collection defaults', async () => {
      const { client, requests } = createClient([rawResponse(200, issue('TEST-1', 'Minimal task'))]);

      const result = await client.getIssue('TEST-1', { expand: ['transitions', 'attachments'] });

      expect(requests[0]?.url).toBe(`${BASE}/issues/TEST-1?expand=transitions%2Cattachments`);
      expect(result).toMatchObject({
        key: 'TEST-1',
        summary: 'Minimal task',
        votes: 0,
        favorite: false,
        tags: [],
        aliases: [],
        followers: [],
      });
    });

    it('decodes nested references', async () => {
      const { client } = createClient([
        rawResponse(200, {
          key: 'TREK-9844',
          summary: 'Test task',
          version: 7,
          status: { key: 'open', display: 'Open' },
          assignee: { id: 1120000000016876, display: 'Jane Doe' },
          tags: ['bug', 'urgent'],
          aliases: ['JUNE-3'],
          votes: 5,
        }),
      ]);

      const result = await client.getIssue('TREK-9844');

      expect(result.version).toBe(7);
      expect(result.status?.display).toBe('Open');
      expect(result.assignee?.id).toBe('1120000000016876');
      expect(result.tags).toEqual(['bug', 'urgent']);
    });

    it('rejects an issue without a key or summary', async () => {
      const { client } = createClient([rawResponse(200, { key: 'TEST-1' })]);
      await expect(client.getIssue('TEST-1')).rejects.toMatchObject({ kind: 'decode' });
    });

    it('encodes the issue key in the path', async () => {
      const { client, requests } = createClient([rawResponse(200, issue('TEST-1'))]);
      await client.getIssue('TEST/1');
      expect(requests[0]?.url).toBe(`${BASE}/issues/TEST%2F1`);
    });

    it('sends a partial update built with field updates', async () => {
      const { client, requests } = createClient([rawResponse(200, issue('TEST-1'))]);

      await client.updateIssue(
        'TEST-1',
        new PatchBuilder().update('followers', FieldUpdate.add(['user1', 'user2'])).set('summary', 'Renamed'),
        { version: 3 },
      );

      expect(requests[0]?.method).toBe('PATCH');
      expect(requests[0]?.url).toBe(`${BASE}/issues/TEST-1?version=3`);
      expect(requests[0]?.body).toBe('{"followers":{"add":["user1","user2"]},"summary":"Renamed"}');
    });

    it('sends a relative patch only once', async () => {
      const { client, requests } = createClient([new Error('socket hang up'), rawResponse(200, issue('T-1'))]);

      const error = await rejection(
        client.updateIssue('T-1', new PatchBuilder().update('followers', FieldUpdate.add(['u']))),
      );

      expect(error).toBeInstanceOf(TransientNetworkError);
      expect(error).toMatchObject({ attempts: 1 });
      expect(requests).toHaveLength(1);
    });

    it('retries a patch that only replaces values', async () => {
      const builder = createClient([new Error('socket hang up'), rawResponse(200, issue('T-1'))]);
      await builder.client.updateIssue(
        'T-1',
        new PatchBuilder().set('summary', 'Renamed').update('tags', FieldUpdate.set(['a'])),
      );
      expect(builder.requests).toHaveLength(2);

      const plain = createClient([new Error('socket hang up'), rawResponse(200, issue('T-1'))]);
      await plain.client.updateIssue('T-1', { summary: 'Renamed', followers: null });
      expect(plain.requests).toHaveLength(2);
    });

    it('lets the caller decide whether a patch is retried', async () => {
      const forced = createClient([new Error('socket hang up'), rawResponse(200, issue('T-1'))]);
      await forced.client.updateIssue('T-1', { followers: { add: ['u'] } }, { retrySafe: true });
      expect(forced.requests).toHaveLength(2);

      const once = createClient([new Error('socket hang up'), rawResponse(200, issue('T-1'))]);
      await expect(
        once.client.updateIssue('T-1', { summary: 'Renamed' }, { retrySafe: false }),
      ).rejects.toBeInstanceOf(TransientNetworkError);
      expect(once.requests).toHaveLength(1);
    });

    it('re-sends decoded values unchanged', async () => {
      const { client, requests } = createClient([
        rawResponse(200, {
          key: 'T-7',
          summary: 'Ошибка "в кавычках"\nвторая строка',
          tags: ['bug', 'ünïcode'],
          followers: [{ id: 'u1', display: 'User One' }, { id: 42 }],
        }),
        rawResponse(200, issue('T-7')),
      ]);

      const decoded = await client.getIssue('T-7');
      const followerIds = decoded.followers.flatMap((follower) => (follower.id ? [follower.id] : []));
      await client.updateIssue(
        'T-7',
        new PatchBuilder()
          .set('summary', decoded.summary)
          .update('tags', FieldUpdate.set(decoded.tags))
          .update('followers', FieldUpdate.set(followerIds)),
      );

      expect(JSON.parse(requests[1]?.body ?? '')).toEqual({
        summary: 'Ошибка "в кавычках"\nвторая строка',
        tags: { set: ['bug', 'ünïcode'] },
        followers: { set: ['u1', '42'] },
      });
    });

    it('rejects a conflicting patch before sending', async () => {
      const { client, requests } = createClient([]);
      const patch = new PatchBuilder().update('tags', FieldUpdate.clear()).update('tags', FieldUpdate.add(['x']));

      await expect(client.updateIssue('TEST-1', patch)).rejects.toBeInstanceOf(ConfigurationError);
      expect(requests).toHaveLength(0);
    });

    it('does not retry a plain create', async () => {
      const { client, requests } = createClient([rawResponse(429), rawResponse(201, issue('TEST-2'))]);

      expect(await rejection(client.createIssue({ queue: 'TEST', summary: 'New' }))).toBeInstanceOf(RateLimitError);
      expect(requests).toHaveLength(1);
    });

    it('retries a create that carries a unique key', async () => {
      const { client, requests } = createClient([rawResponse(429), rawResponse(201, issue('TEST-2', 'New'))]);

      const created = await client.createIssue({ queue: { key: 'TEST' }, summary: 'New', unique: 'import-42' });

      expect(created.key).toBe('TEST-2');
      expect(requests).toHaveLength(2);
      expect(requests[0]?.body).toBe('{"queue":{"key":"TEST"},"summary":"New","unique":"import-42"}');
    });

    it('searches with a filter and query parameters', async () => {
      const { client, requests } = createClient([rawResponse(200, [issue('TREK-1'), issue('TREK-2')])]);

      const issues = await client.searchIssues(
        { filter: { queue: 'TREK', assignee: 'empty()' }, order: '+status' },
        { expand: ['transitions'], perPage: 20 },
      );

      expect(issues.map((found) => found.key)).toEqual(['TREK-1', 'TREK-2']);
      expect(requests[0]?.url).toBe(`${BASE}/issues/_search?expand=transitions&perPage=20`);
      expect(requests[0]?.body).toBe('{"filter":{"queue":"TREK","assignee":"empty()"},"order":"+status"}');
    });

    it('retries a rate-limited search', async () => {
      const { client, requests } = createClient([
        rawResponse(429, '', { 'retry-after': '2' }),
        rawResponse(200, [issue('TREK-1')]),
      ]);

      await client.searchIssues({ query: 'Queue: TREK' });

      expect(requests).toHaveLength(2);
      expect(scheduler.delays).toEqual([2000]);
    });

    it('walks search results page by page', async () => {
      const { client, requests } = createClient([
        rawResponse(200, [issue('T-1'), issue('T-2')]),
        rawResponse(200, [issue('T-3')]),
      ]);

      const pages: string[][] = [];
      for await (const page of client.searchIssuePages({ queue: 'T' }, { perPage: 2 })) {
        pages.push(page.items.map((found) => found.key));
      }

      expect(pages).toEqual([['T-1', 'T-2'], ['T-3']]);
      expect(requests.map((request) => request.url)).toEqual([
        `${BASE}/issues/_search?perPage=2&page=1`,
        `${BASE}/issues/_search?perPage=2&page=2`,
      ]);
      expect(requests[1]?.body).toBe('{"queue":"T"}');
    });
  });

  describe('queues', () => {
    it('gets, creates and deletes queues', async () => {
      const { client, requests } = createClient([
        rawResponse(200, { key: 'TEST', id: 3, name: 'Test' }),
        rawResponse(201, { key: 'NEW', name: 'New queue' }),
        rawResponse(204),
      ]);

      const queue = await client.getQueue('TEST', { expand: ['projects'] });
      const created = await client.createQueue({
        key: 'NEW',
        name: 'New queue',
        lead: 'jdoe',
        defaultType: 'task',
        defaultPriority: 'normal',
        issueTypesConfig: [{ issueType: 'task', workflow: 'oicn', resolutions: ['wontFix'] }],
      });
      await client.deleteQueue('NEW');

      expect(queue).toMatchObject({ key: 'TEST', id: '3', name: 'Test' });
      expect(created.key).toBe('NEW');
      expect(requests.map((request) => `${request.method} ${request.url}`)).toEqual([
        `GET ${BASE}/queues/TEST?expand=projects`,
        `POST ${BASE}/queues`,
        `DELETE ${BASE}/queues/NEW`,
      ]);
    });

    it('lists queues across pages', async () => {
      const { client } = createClient([
        rawResponse(200, [{ key: 'A' }, { key: 'B' }], { 'x-total-pages': '2', 'x-total-count': '3' }),
        rawResponse(200, [{ key: 'C' }], { 'x-total-pages': '2', 'x-total-count': '3' }),
      ]);

      const pages: Page<Queue>[] = [];
      for await (const page of client.listQueues({ perPage: 2 })) {
        pages.push(page);
      }

      expect(pages).toHaveLength(2);
      expect(pages[0]).toMatchObject({ page: 1, perPage: 2, totalPages: 2, totalCount: 3 });
      expect(pages.flatMap((page) => page.items.map((queue) => queue.key))).toEqual(['A', 'B', 'C']);
    });

    it('keeps a caller-supplied expand when the option is absent', async () => {
      const { client, requests } = createClient([rawResponse(200, []), rawResponse(200, [])]);

      await collectItems(client.listQueues({ perPage: 1, query: { expand: 'all' } }));
      await collectItems(client.listQueues({ perPage: 1, expand: ['projects'], query: { expand: 'all' } }));

      expect(requests.map((request) => request.url)).toEqual([
        `${BASE}/queues?expand=all&perPage=1&page=1`,
        `${BASE}/queues?expand=projects&perPage=1&page=1`,
      ]);
    });
  });

  describe('errors', () => {
    it('surfaces authentication failures with the server message', async () => {
      const { client } = createClient([rawResponse(401, { errorMessages: ['Invalid token'], statusCode: 401 })]);
      const error = await rejection(client.getIssue('TEST-1'));
      expect(error).toBeInstanceOf(AuthenticationError);
      expect(error).toMatchObject({ message: 'Invalid token', status: 401 });
    });

    it('surfaces a missing issue as ApiError', async () => {
      const { client } = createClient([rawResponse(404, { errorMessages: ['Issue does not exist.'] })]);
      const error = await rejection(client.getIssue('NOPE-1'));
      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({ status: 404, message: 'Issue does not exist.', attempts: 1 });
    });

    it('never logs the token', async () => {
      const { client } = createClient([rawResponse(429), rawResponse(500, 'oops')]);
      await rejection(client.getIssue('TEST-1'));
      expect(logger.lines.length).toBeGreaterThan(0);
      expect(logger.dump()).not.toContain('test-token');
    });
  });
});

describe('createTrackerClientFromEnv', () => {
  it('requires TRACKER_TOKEN', () => {
    expect(() => createTrackerClientFromEnv({}, {})).toThrow('TRACKER_TOKEN environment variable is required');
    expect(() => createTrackerClientFromEnv({}, { TRACKER_TOKEN: '  ' })).toThrow(ConfigurationError);
  });

  it('reads the optional settings', async () => {
    const fake = createFakeTransport([rawResponse(200, {})]);
    const client = createTrackerClientFromEnv(
      { transport: fake.transport, logger: createCapturingLogger() },
      {
        TRACKER_TOKEN: 'env-token',
        TRACKER_ORG_ID: 'org-9',
        TRACKER_BASE_URL: 'https://tracker.internal.test',
        TRACKER_API_VERSION: 'v2',
        TRACKER_LANGUAGE: 'EN',
      },
    );

    await client.get('myself');

    expect(client.language).toBe('en');
    expect(fake.requests[0]?.url).toBe('https://tracker.internal.test/v2/myself');
    expect(fake.requests[0]?.headers).toMatchObject({ Authorization: 'OAuth env-token', 'X-Org-ID': 'org-9' });
  });

  it('rejects an unknown language', () => {
    expect(() => createTrackerClientFromEnv({}, { TRACKER_TOKEN: 'env-token', TRACKER_LANGUAGE: 'fr' })).toThrow(
      ConfigurationError,
    );
  });
});
