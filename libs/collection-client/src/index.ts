/**
 * @libs/collection-client
 *
 * Collection Store Client Library
 *
 * Retrieves whole collections from a paginated document-store API and
 * manages single items, nested items and item images.
 *
 * ## Architecture
 *
 * - **Query**: validated, immutable query model and its URL encoding
 * - **Page Fetcher**: one logical page fetch with bounded fixed-delay retry
 * - **Bulk Retrieval**: sequential (partial results on failure) and
 *   bounded-concurrent (fail fast) strategies, both ordered by page
 * - **Client**: facade holding settings, headers and the transport
 *
 * ## Usage
 *
 * ```typescript
 * import { createCollectionClientFromEnv } from '@libs/collection-client';
 *
 * const client = createCollectionClientFromEnv();
 *
 * // Everything by one author, projected on two fields
 * const result = await client.getCollectionParallel({
 *   collectionName: 'articles',
 *   projection: ['title', 'publishedAt'],
 *   predicates: [{ field: 'author.itemRefID', operator: '=', value: 'a1b2c3' }],
 * });
 *
 * // Page by page
 * for await (const page of client.iterateCollection({ collectionName: 'articles' })) {
 *   console.log(page.pageNumber, page.items.length);
 * }
 * ```
 *
 * ## Environment Variables
 *
 * Required:
 * - `COLLECTION_API_TOKEN` - bearer token
 * - `COLLECTION_API_BASE_URL` - service root URL
 *
 * Optional:
 * - `COLLECTION_PAGE_SIZE` - items per page (default: 100)
 * - `COLLECTION_MAX_ATTEMPTS` - attempts per page (default: 10)
 * - `COLLECTION_RETRY_DELAY_MS` - pause between attempts (default: 1000)
 * - `COLLECTION_TIMEOUT_MS` - per-attempt timeout (default: 30000)
 * - `COLLECTION_MAX_CONCURRENCY` - concurrent page fetches (default: 10)
 */

export { CollectionClient, createCollectionClientFromEnv, ACCEPT_VERSION } from './collectionClient';
export {
  DEFAULT_PAGE_SIZE,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_PER_ATTEMPT_TIMEOUT_MS,
  DEFAULT_MAX_CONCURRENCY,
} from './config';
export {
  CollectionClientError,
  CallerContractError,
  ConfigurationError,
  ProtocolContractError,
  PageFetchError,
  DecodeError,
  RetrievalAbortedError,
  ItemRequestError,
  isPageFailure,
  type PageFetchFailureReason,
  type RetrievalAbortReason,
} from './errors';
export { createCollectionQuery } from './query';
export { encodeQuery, encodePredicate, quotePlus, buildResourceUrl, PageRequestBuilder } from './queryEncoder';
export { ITEM_COUNT_HEADER, countPages } from './pageProber';
export * from './types';
