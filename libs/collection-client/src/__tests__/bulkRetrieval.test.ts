/**
 * Bulk retrieval tests
 *
 * Drives both strategies through CollectionClient against an in-process
 * fake of the collection service.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { HttpTransport, Logger } from '@libs/resilient-http-core';
import { CollectionClient } from '../collectionClient';
import {
  CallerContractError,
  DecodeError,
  PageFetchError,
  ProtocolContractError,
  RetrievalAbortedError,
} from '../errors';
import type { CollectionClientConfig, PageResult, ProgressEvent } from '../types';
import {
  createFakeTransport,
  hangUntilAborted,
  jsonResponse,
  makeItems,
  pageNumberOf,
  servePages,
  textResponse,
  wait,
} from './fakeTransport';

const BASE_URL = 'https://store.test/api';
const pageUrl = (pageNumber: number, perPage = 10) =>
  `${BASE_URL}/collection/articles/items?pageNumber=${pageNumber}&perPage=${perPage}`;

describe('CollectionClient bulk retrieval', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
  });

  const createClient = (transport: HttpTransport, overrides: Partial<CollectionClientConfig> = {}) =>
    new CollectionClient({
      apiToken: 'test-secret',
      baseUrl: BASE_URL,
      pageSize: 10,
      maxAttempts: 3,
      retryDelayMs: 0,
      logger,
      transport,
      ...overrides,
    });

  describe('getCollection (sequential)', () => {
    it('walks every page in order', async () => {
      const items = makeItems(25);
      const { transport, requests } = createFakeTransport(servePages(items));

      const result = await createClient(transport).getCollection({ collectionName: 'articles' });

      expect(result).toEqual({
        status: 'complete',
        items,
        totalPages: 3,
        itemCount: 25,
        pagesFetched: 3,
      });
      expect(requests.map((request) => request.url)).toEqual([pageUrl(1), pageUrl(2), pageUrl(3)]);
      expect(logger.info).toHaveBeenCalledWith('collection.retrieval.complete', {
        collection: 'articles',
        strategy: 'sequential',
        pagesFetched: 3,
        items: 25,
      });
    });

    it('sends the fixed headers on every request', async () => {
      const { transport, requests } = createFakeTransport(servePages(makeItems(15)));

      await createClient(transport).getCollection({ collectionName: 'articles' });

      expect(requests).toHaveLength(2);
      for (const request of requests) {
        expect(request.method).toBe('GET');
        expect(request.headers).toEqual({
          Authorization: 'Bearer test-secret',
          'Accept-Version': 'v1',
          Accept: 'application/json',
        });
      }
    });

    it('makes exactly itemCount / pageSize requests when that divides evenly', async () => {
      const { transport, requests } = createFakeTransport(servePages(makeItems(20)));

      const result = await createClient(transport).getCollection({ collectionName: 'articles' });

      expect(requests).toHaveLength(2);
      expect(result.items).toHaveLength(20);
    });

    it('fetches page 1 only for an empty collection', async () => {
      const { transport, requests } = createFakeTransport(servePages([]));
      const events: ProgressEvent[] = [];

      const result = await createClient(transport).getCollection(
        { collectionName: 'articles' },
        { onProgress: (event) => events.push(event) },
      );

      expect(result).toEqual({ status: 'complete', items: [], totalPages: 0, itemCount: 0, pagesFetched: 1 });
      expect(requests).toHaveLength(1);
      expect(events).toEqual([{ pageNumber: 1, completed: 1, totalPages: 1, ok: true }]);
    });

    it('returns the pages before a failing page and stops there', async () => {
      const items = makeItems(50);
      const serve = servePages(items);
      const { transport, requests } = createFakeTransport((request, signal) =>
        pageNumberOf(request) === 3 ? textResponse('boom', 500) : serve(request, signal),
      );

      const result = await createClient(transport).getCollection({ collectionName: 'articles' });

      expect(result.status).toBe('partial');
      expect(result.items).toEqual(items.slice(0, 20));
      expect(result.totalPages).toBe(5);
      expect(result.pagesFetched).toBe(2);
      expect(result.failure?.pageNumber).toBe(3);
      expect(result.failure?.url).toBe(pageUrl(3));
      expect(result.failure?.error).toBeInstanceOf(PageFetchError);
      expect(result.failure?.error).toMatchObject({ status: 500, body: 'boom' });
      expect(requests.map(pageNumberOf)).toEqual([1, 2, 3]);
      expect(logger.error).toHaveBeenCalledWith('collection.page.failed', {
        collection: 'articles',
        pageNumber: 3,
        url: pageUrl(3),
        error: 'Page 3 failed with status 500',
      });
    });

    it('recovers when a later page succeeds on retry', async () => {
      const items = makeItems(30);
      const serve = servePages(items);
      let pageTwoCalls = 0;
      const { transport, requests } = createFakeTransport((request, signal) => {
        if (pageNumberOf(request) === 2) {
          pageTwoCalls += 1;
          if (pageTwoCalls === 1) {
            throw new TypeError('fetch failed');
          }
        }
        return serve(request, signal);
      });

      const result = await createClient(transport).getCollection({ collectionName: 'articles' });

      expect(result.status).toBe('complete');
      expect(result.items).toEqual(items);
      expect(requests.map(pageNumberOf)).toEqual([1, 2, 2, 3]);
    });

    it('throws when page 1 fails', async () => {
      const { transport } = createFakeTransport(() => textResponse('unauthorized', 401));

      await expect(createClient(transport).getCollection({ collectionName: 'articles' })).rejects.toBeInstanceOf(
        PageFetchError,
      );
      expect(logger.error).toHaveBeenCalledWith(
        'collection.retrieval.failed',
        expect.objectContaining({ strategy: 'sequential', error: 'Page 1 failed with status 401' }),
      );
    });

    it('throws when page 1 has no item-count header', async () => {
      const { transport, requests } = createFakeTransport(() => jsonResponse([{ id: 'x' }]));

      await expect(createClient(transport).getCollection({ collectionName: 'articles' })).rejects.toBeInstanceOf(
        ProtocolContractError,
      );
      expect(requests).toHaveLength(1);
    });

    it('sends a single request without pagination when paginate is false', async () => {
      const items = makeItems(35);
      const { transport, requests } = createFakeTransport(servePages(items));

      const result = await createClient(transport).getCollection({
        collectionName: 'articles',
        paginate: false,
        predicates: [['status', 'published']],
      });

      expect(requests.map((request) => request.url)).toEqual([
        `${BASE_URL}/collection/articles/items?query=status:published`,
      ]);
      expect(result).toEqual({ status: 'complete', items, totalPages: 1, itemCount: undefined, pagesFetched: 1 });
    });

    it('rejects invalid input before sending anything', async () => {
      const { transport, requests } = createFakeTransport(servePages([]));
      const client = createClient(transport);

      await expect(client.getCollection({ collectionName: '' })).rejects.toBeInstanceOf(CallerContractError);
      await expect(client.getCollection({ collectionName: 'articles' }, { timeoutMs: -1 })).rejects.toBeInstanceOf(
        CallerContractError,
      );
      expect(requests).toHaveLength(0);
    });

    it('reports progress for every page', async () => {
      const { transport } = createFakeTransport(servePages(makeItems(25)));
      const events: ProgressEvent[] = [];

      await createClient(transport, { progress: true }).getCollection(
        { collectionName: 'articles' },
        { onProgress: (event) => events.push(event) },
      );

      expect(events).toEqual([
        { pageNumber: 1, completed: 1, totalPages: 3, ok: true },
        { pageNumber: 2, completed: 2, totalPages: 3, ok: true },
        { pageNumber: 3, completed: 3, totalPages: 3, ok: true },
      ]);
      expect(vi.mocked(logger.info).mock.calls.filter(([message]) => message === 'collection.page.settled')).toHaveLength(3);
    });

    it('stops when the caller aborts between pages', async () => {
      const controller = new AbortController();
      const { transport, requests } = createFakeTransport(servePages(makeItems(30)));

      const error = await createClient(transport)
        .getCollection({ collectionName: 'articles' }, { signal: controller.signal, onProgress: () => controller.abort() })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(RetrievalAbortedError);
      expect(error).toMatchObject({ reason: 'aborted', message: 'Retrieval aborted' });
      expect(requests).toHaveLength(1);
    });

    it('returns a partial result when a later page exhausts its retries', async () => {
      const items = makeItems(30);
      const serve = servePages(items);
      const { transport, requests } = createFakeTransport((request, signal) => {
        if (pageNumberOf(request) === 2) {
          throw new TypeError('fetch failed');
        }
        return serve(request, signal);
      });

      const result = await createClient(transport).getCollection({ collectionName: 'articles' });

      expect(result.status).toBe('partial');
      expect(result.items).toEqual(items.slice(0, 10));
      expect(result.pagesFetched).toBe(1);
      expect(result.failure?.pageNumber).toBe(2);
      expect(result.failure?.error).toBeInstanceOf(PageFetchError);
      expect(result.failure?.error).toMatchObject({
        reason: 'retries_exhausted',
        attempts: 3,
        message: 'Page 2 failed after 3 attempts: fetch failed',
      });
      expect(requests.map(pageNumberOf)).toEqual([1, 2, 2, 2]);
    });

    it('returns a partial result when a later page does not decode', async () => {
      const items = makeItems(30);
      const serve = servePages(items);
      const { transport, requests } = createFakeTransport((request, signal) =>
        pageNumberOf(request) === 2 ? textResponse('not json') : serve(request, signal),
      );

      const result = await createClient(transport).getCollection({ collectionName: 'articles' });

      expect(result.status).toBe('partial');
      expect(result.items).toEqual(items.slice(0, 10));
      expect(result.failure?.pageNumber).toBe(2);
      expect(result.failure?.error).toBeInstanceOf(DecodeError);
      expect(result.failure?.error.message).toBe('Page 2 body is not valid JSON');
      expect(requests.map(pageNumberOf)).toEqual([1, 2]);
    });

    it('rejects with a deadline error when timeoutMs passes', async () => {
      const serve = servePages(makeItems(30));
      const { transport, requests } = createFakeTransport((request, signal) =>
        pageNumberOf(request) === 1 ? serve(request, signal) : hangUntilAborted(signal),
      );

      const error = await createClient(transport)
        .getCollection({ collectionName: 'articles' }, { timeoutMs: 30 })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(RetrievalAbortedError);
      expect(error).toMatchObject({ reason: 'deadline', message: 'Retrieval exceeded its 30ms deadline' });
      expect(requests.map(pageNumberOf)).toEqual([1, 2]);
      expect(logger.error).toHaveBeenCalledWith('collection.retrieval.failed', {
        collection: 'articles',
        strategy: 'sequential',
        error: 'Retrieval exceeded its 30ms deadline',
      });
    });

    it('rejects an item-count too large to be a safe integer', async () => {
      const { transport, requests } = createFakeTransport(servePages(makeItems(3), '99999999999999999999'));

      const error = await createClient(transport)
        .getCollection({ collectionName: 'articles' })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ProtocolContractError);
      expect(error).toMatchObject({ headerValue: '99999999999999999999' });
      expect(requests).toHaveLength(1);
    });
  });

  describe('iterateCollection', () => {
    it('yields one result per page', async () => {
      const { transport } = createFakeTransport(servePages(makeItems(25)));
      const pages: PageResult[] = [];

      for await (const page of createClient(transport).iterateCollection({ collectionName: 'articles' })) {
        pages.push(page);
      }

      expect(pages.map((page) => [page.pageNumber, page.totalPages, page.items.length])).toEqual([
        [1, 3, 10],
        [2, 3, 10],
        [3, 3, 5],
      ]);
    });

    it('yields the failing page with its error and ends', async () => {
      const serve = servePages(makeItems(40));
      const { transport, requests } = createFakeTransport((request, signal) =>
        pageNumberOf(request) === 2 ? textResponse('', 502) : serve(request, signal),
      );
      const pages: PageResult[] = [];

      for await (const page of createClient(transport).iterateCollection({ collectionName: 'articles' })) {
        pages.push(page);
      }

      expect(pages).toHaveLength(2);
      expect(pages[1]?.items).toEqual([]);
      expect(pages[1]?.error).toBeInstanceOf(PageFetchError);
      expect(requests).toHaveLength(2);
    });
  });

  describe('getCollectionParallel (concurrent)', () => {
    it('returns the same items as the sequential walk', async () => {
      const items = makeItems(95);
      const sequential = createFakeTransport(servePages(items));
      const concurrent = createFakeTransport(servePages(items));

      const expected = await createClient(sequential.transport).getCollection({ collectionName: 'articles' });
      const result = await createClient(concurrent.transport).getCollectionParallel({ collectionName: 'articles' });

      expect(result).toEqual(expected);
      expect(concurrent.requests).toHaveLength(10);
    });

    it('keeps page order when later pages finish first', async () => {
      const items = makeItems(50);
      const serve = servePages(items);
      const { transport } = createFakeTransport(async (request, signal) => {
        const pageNumber = pageNumberOf(request) ?? 1;
        await wait((6 - pageNumber) * 5);
        return serve(request, signal);
      });

      const result = await createClient(transport).getCollectionParallel({ collectionName: 'articles' });

      expect(result.items).toEqual(items);
    });

    it('never exceeds maxConcurrency requests in flight', async () => {
      let inFlight = 0;
      let peak = 0;
      const serve = servePages(makeItems(100));
      const { transport } = createFakeTransport(async (request, signal) => {
        inFlight += 1;
        peak = Math.max(peak, inFlight);
        await wait(5);
        inFlight -= 1;
        return serve(request, signal);
      });

      const result = await createClient(transport, { maxConcurrency: 3 }).getCollectionParallel({
        collectionName: 'articles',
      });

      expect(result.items).toHaveLength(100);
      expect(peak).toBe(3);
    });

    it('takes a per-call concurrency override', async () => {
      let inFlight = 0;
      let peak = 0;
      const serve = servePages(makeItems(40));
      const { transport } = createFakeTransport(async (request, signal) => {
        inFlight += 1;
        peak = Math.max(peak, inFlight);
        await wait(2);
        inFlight -= 1;
        return serve(request, signal);
      });

      await createClient(transport).getCollectionParallel({ collectionName: 'articles' }, { maxConcurrency: 1 });

      expect(peak).toBe(1);
    });

    it('joins predicates into one query parameter', async () => {
      const { transport, requests } = createFakeTransport(servePages(makeItems(5)));

      await createClient(transport).getCollectionParallel({
        collectionName: 'articles',
        predicates: [
          ['a', '1'],
          ['b', '=', '2'],
        ],
      });

      expect(requests[0]?.url).toBe(`${BASE_URL}/collection/articles/items?query=a:1%2Bb:=:2&pageNumber=1&perPage=10`);
    });

    it('fails the whole call on the first page failure and cancels the rest', async () => {
      const serve = servePages(makeItems(100));
      const { transport, requests } = createFakeTransport((request, signal) => {
        switch (pageNumberOf(request)) {
          case 3:
            return hangUntilAborted(signal);
          case 4:
            return textResponse('boom', 500);
          default:
            return serve(request, signal);
        }
      });

      const error = await createClient(transport, { maxConcurrency: 2 })
        .getCollectionParallel({ collectionName: 'articles' })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(PageFetchError);
      expect(error).toMatchObject({ pageNumber: 4, status: 500 });
      expect(requests.map(pageNumberOf)).toEqual([1, 2, 3, 4]);
      expect(vi.mocked(logger.error).mock.calls.filter(([message]) => message === 'collection.page.failed')).toHaveLength(1);
    });

    it('rejects with a deadline error when timeoutMs passes', async () => {
      const serve = servePages(makeItems(30));
      const { transport } = createFakeTransport((request, signal) =>
        pageNumberOf(request) === 1 ? serve(request, signal) : hangUntilAborted(signal),
      );

      const error = await createClient(transport)
        .getCollectionParallel({ collectionName: 'articles' }, { timeoutMs: 30 })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(RetrievalAbortedError);
      expect(error).toMatchObject({ reason: 'deadline', message: 'Retrieval exceeded its 30ms deadline' });
    });

    it('sends nothing when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const { transport, requests } = createFakeTransport(servePages(makeItems(30)));

      await expect(
        createClient(transport).getCollectionParallel({ collectionName: 'articles' }, { signal: controller.signal }),
      ).rejects.toBeInstanceOf(RetrievalAbortedError);
      expect(requests).toHaveLength(0);
    });

    it('throws when page 1 fails', async () => {
      const { transport, requests } = createFakeTransport(() => textResponse('nope', 403));

      await expect(
        createClient(transport).getCollectionParallel({ collectionName: 'articles' }),
      ).rejects.toMatchObject({ pageNumber: 1, status: 403 });
      expect(requests).toHaveLength(1);
    });

    it('settles each page once when onProgress throws', async () => {
      const { transport, requests } = createFakeTransport(servePages(makeItems(30)));
      const events: ProgressEvent[] = [];
      const sinkError = new Error('progress sink failed');

      const error = await createClient(transport, { maxConcurrency: 1 })
        .getCollectionParallel(
          { collectionName: 'articles' },
          {
            onProgress: (event) => {
              events.push(event);
              if (event.pageNumber === 2) {
                throw sinkError;
              }
            },
          },
        )
        .catch((caught: unknown) => caught);

      expect(error).toBe(sinkError);
      expect(events).toEqual([
        { pageNumber: 1, completed: 1, totalPages: 3, ok: true },
        { pageNumber: 2, completed: 2, totalPages: 3, ok: true },
      ]);
      expect(requests.map(pageNumberOf)).toEqual([1, 2]);
      expect(vi.mocked(logger.error).mock.calls.filter(([message]) => message === 'collection.page.failed')).toHaveLength(0);
    });

    it('fails the whole call when a page does not decode', async () => {
      const serve = servePages(makeItems(30));
      const { transport, requests } = createFakeTransport((request, signal) =>
        pageNumberOf(request) === 2 ? jsonResponse({ items: [] }) : serve(request, signal),
      );

      const error = await createClient(transport, { maxConcurrency: 1 })
        .getCollectionParallel({ collectionName: 'articles' })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(DecodeError);
      expect(error).toMatchObject({ pageNumber: 2, message: 'Page 2 body is not a JSON array' });
      expect(requests.map(pageNumberOf)).toEqual([1, 2]);
    });

    it('fails the whole call when a page exhausts its retries', async () => {
      const serve = servePages(makeItems(30));
      const { transport, requests } = createFakeTransport((request, signal) => {
        if (pageNumberOf(request) === 2) {
          throw new TypeError('fetch failed');
        }
        return serve(request, signal);
      });

      const error = await createClient(transport, { maxConcurrency: 1 })
        .getCollectionParallel({ collectionName: 'articles' })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(PageFetchError);
      expect(error).toMatchObject({ pageNumber: 2, reason: 'retries_exhausted', attempts: 3 });
      expect(requests.map(pageNumberOf)).toEqual([1, 2, 2, 2]);
    });

    it('throws when page 1 has no item-count header', async () => {
      const { transport, requests } = createFakeTransport(() => jsonResponse([{ id: 'x' }]));

      await expect(
        createClient(transport).getCollectionParallel({ collectionName: 'articles' }),
      ).rejects.toBeInstanceOf(ProtocolContractError);
      expect(requests).toHaveLength(1);
    });

    it('rejects an item-count too large to be a safe integer', async () => {
      const { transport, requests } = createFakeTransport(servePages(makeItems(3), '99999999999999999999'));

      await expect(
        createClient(transport).getCollectionParallel({ collectionName: 'articles' }),
      ).rejects.toMatchObject({ name: 'ProtocolContractError', headerValue: '99999999999999999999' });
      expect(requests).toHaveLength(1);
    });
  });
});
