import { mapWithConcurrency, type Logger } from '@libs/resilient-http-core';
import { CallScope, assertRetrievalOptions } from './callScope';
import { isPageFailure } from './errors';
import type { PageFetcher } from './pageFetcher';
import { probeCollection } from './pageProber';
import { PageRequestBuilder, buildUnpaginatedRequest } from './queryEncoder';
import type {
  CollectionDocument,
  CollectionQuery,
  FetchedPage,
  PageFailure,
  PageResult,
  ProgressEvent,
  RetrievalOptions,
  RetrievalResult,
} from './types';

export interface RetrievalContext {
  baseUrl: string;
  fetcher: PageFetcher;
  logger: Logger;
  maxConcurrency: number;
  /** Log `collection.page.settled` for every settled page. */
  logProgress: boolean;
}

interface SequentialStep<TDocument> extends PageResult<TDocument> {
  itemCount?: number;
}

class ProgressTracker {
  private completed = 0;

  constructor(
    private readonly totalPages: number,
    private readonly ctx: RetrievalContext,
    private readonly onProgress?: (event: ProgressEvent) => void,
  ) {}

  settle(pageNumber: number, ok: boolean): void {
    this.completed += 1;
    const event: ProgressEvent = {
      pageNumber,
      completed: this.completed,
      // page 1 is always fetched, even when the collection is empty
      totalPages: Math.max(this.totalPages, 1),
      ok,
    };
    if (this.ctx.logProgress) {
      this.ctx.logger.info('collection.page.settled', { ...event });
    }
    this.onProgress?.(event);
  }
}

function toFailure(step: PageResult<unknown>): PageFailure | undefined {
  if (!step.error) return undefined;
  return { pageNumber: step.pageNumber, url: step.error.url, error: step.error };
}

/**
 * Init -> probe page 1 -> pages 2..N in order -> done, or aborted on the first
 * failing page. A failing page is yielded once with its error and ends the walk.
 */
async function* walkSequential<TDocument>(
  ctx: RetrievalContext,
  query: CollectionQuery,
  signal: AbortSignal,
): AsyncGenerator<SequentialStep<TDocument>, void, void> {
  if (!query.paginate) {
    const page = await ctx.fetcher.fetchPage<TDocument>(buildUnpaginatedRequest(ctx.baseUrl, query, 'repeated'), signal);
    yield { pageNumber: 1, totalPages: 1, items: page.items };
    return;
  }

  const requests = new PageRequestBuilder(ctx.baseUrl, query, 'repeated');
  const probe = await probeCollection<TDocument>(ctx.fetcher, requests.page(1), query.pageSize, ctx.logger, signal);
  const { totalPages, itemCount } = probe;
  yield { pageNumber: 1, totalPages, itemCount, items: probe.firstPage.items };

  for (let pageNumber = 2; pageNumber <= totalPages; pageNumber += 1) {
    let step: SequentialStep<TDocument>;
    try {
      const page = await ctx.fetcher.fetchPage<TDocument>(requests.page(pageNumber), signal);
      step = { pageNumber, totalPages, itemCount, items: page.items };
    } catch (error) {
      if (!isPageFailure(error)) {
        throw error;
      }
      ctx.logger.error('collection.page.failed', {
        collection: query.collectionName,
        pageNumber,
        url: error.url,
        error: error.message,
      });
      yield { pageNumber, totalPages, itemCount, items: [], error };
      return;
    }
    yield step;
  }
}

/**
 * Sequential strategy: pages strictly in order. A failure on page 2 or later
 * returns the pages before it with status `partial`; failures on page 1 throw.
 */
export async function retrieveSequential<TDocument = CollectionDocument>(
  ctx: RetrievalContext,
  query: CollectionQuery,
  options: RetrievalOptions = {},
): Promise<RetrievalResult<TDocument>> {
  assertRetrievalOptions(options);
  const scope = new CallScope(options);
  const items: TDocument[] = [];
  let tracker: ProgressTracker | undefined;
  let totalPages = 0;
  let itemCount: number | undefined;
  let pagesFetched = 0;

  try {
    for await (const step of walkSequential<TDocument>(ctx, query, scope.signal)) {
      totalPages = step.totalPages;
      itemCount = step.itemCount;
      tracker ??= new ProgressTracker(step.totalPages, ctx, options.onProgress);
      tracker.settle(step.pageNumber, step.error === undefined);

      const failure = toFailure(step);
      if (failure) {
        ctx.logger.warn('collection.retrieval.partial', {
          collection: query.collectionName,
          failedPage: failure.pageNumber,
          pagesFetched,
          totalPages,
          items: items.length,
        });
        return { status: 'partial', items, totalPages, itemCount, pagesFetched, failure };
      }

      items.push(...step.items);
      pagesFetched += 1;
    }
  } catch (error) {
    ctx.logger.error('collection.retrieval.failed', {
      collection: query.collectionName,
      strategy: 'sequential',
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  } finally {
    scope.dispose();
  }

  ctx.logger.info('collection.retrieval.complete', {
    collection: query.collectionName,
    strategy: 'sequential',
    pagesFetched,
    items: items.length,
  });
  return { status: 'complete', items, totalPages, itemCount, pagesFetched };
}

/**
 * Streams pages in order through the sequential strategy. A failing page is
 * yielded with `error` set and ends the iteration.
 */
export async function* iterateSequential<TDocument = CollectionDocument>(
  ctx: RetrievalContext,
  query: CollectionQuery,
  options: RetrievalOptions = {},
): AsyncGenerator<PageResult<TDocument>, void, void> {
  assertRetrievalOptions(options);
  const scope = new CallScope(options);
  let tracker: ProgressTracker | undefined;

  try {
    for await (const step of walkSequential<TDocument>(ctx, query, scope.signal)) {
      tracker ??= new ProgressTracker(step.totalPages, ctx, options.onProgress);
      tracker.settle(step.pageNumber, step.error === undefined);
      yield step;
    }
  } finally {
    scope.dispose();
  }
}

/**
 * Concurrent strategy: probe page 1, then pages 2..N with at most
 * `maxConcurrency` in flight. Each page lands in its own slot so the merge is
 * in page order. The first page failure cancels everything still running and
 * rejects the call.
 */
export async function retrieveConcurrent<TDocument = CollectionDocument>(
  ctx: RetrievalContext,
  query: CollectionQuery,
  options: RetrievalOptions = {},
): Promise<RetrievalResult<TDocument>> {
  assertRetrievalOptions(options);
  const limit = options.maxConcurrency ?? ctx.maxConcurrency;
  const scope = new CallScope(options);

  try {
    if (!query.paginate) {
      const page = await ctx.fetcher.fetchPage<TDocument>(
        buildUnpaginatedRequest(ctx.baseUrl, query, 'joined'),
        scope.signal,
      );
      new ProgressTracker(1, ctx, options.onProgress).settle(1, true);
      return { status: 'complete', items: page.items, totalPages: 1, pagesFetched: 1 };
    }

    const requests = new PageRequestBuilder(ctx.baseUrl, query, 'joined');
    const probe = await probeCollection<TDocument>(ctx.fetcher, requests.page(1), query.pageSize, ctx.logger, scope.signal);
    const tracker = new ProgressTracker(probe.totalPages, ctx, options.onProgress);
    tracker.settle(1, true);

    const remaining = Array.from({ length: Math.max(probe.totalPages - 1, 0) }, (_, index) => requests.page(index + 2));
    const pages = await mapWithConcurrency(
      remaining,
      limit,
      async (request) => {
        let page: FetchedPage<TDocument>;
        try {
          page = await ctx.fetcher.fetchPage<TDocument>(request, scope.signal);
        } catch (error) {
          tracker.settle(request.pageNumber, false);
          if (isPageFailure(error) && !scope.signal.aborted) {
            ctx.logger.error('collection.page.failed', {
              collection: query.collectionName,
              pageNumber: request.pageNumber,
              url: request.url,
              error: error.message,
            });
            scope.cancel(error);
          }
          throw error;
        }
        // outside the try: a throwing onProgress is not a page failure
        tracker.settle(request.pageNumber, true);
        return page.items;
      },
      { signal: scope.signal },
    );

    const items: TDocument[] = [...probe.firstPage.items];
    for (const pageItems of pages) {
      items.push(...pageItems);
    }

    ctx.logger.info('collection.retrieval.complete', {
      collection: query.collectionName,
      strategy: 'concurrent',
      pagesFetched: 1 + pages.length,
      items: items.length,
    });
    return {
      status: 'complete',
      items,
      totalPages: probe.totalPages,
      itemCount: probe.itemCount,
      pagesFetched: 1 + pages.length,
    };
  } catch (error) {
    ctx.logger.error('collection.retrieval.failed', {
      collection: query.collectionName,
      strategy: 'concurrent',
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  } finally {
    scope.dispose();
  }
}
