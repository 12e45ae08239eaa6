import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import {
  NoopLogger,
  executeAttempt,
  fetchTransport,
  type HttpHeaders,
  type HttpMethod,
  type HttpTransport,
  type Logger,
  type RawHttpResponse,
  type TransportBody,
} from '@libs/resilient-http-core';
import { iterateSequential, retrieveConcurrent, retrieveSequential, type RetrievalContext } from './bulkRetrieval';
import {
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_MAX_CONCURRENCY,
  DEFAULT_PAGE_SIZE,
  DEFAULT_PER_ATTEMPT_TIMEOUT_MS,
  DEFAULT_RETRY_DELAY_MS,
  parseNumberOrDefault,
  resolveClientSettings,
} from './config';
import { ConfigurationError, ItemRequestError } from './errors';
import { PageFetcher, decodeBody } from './pageFetcher';
import { createCollectionQuery } from './query';
import { buildResourceUrl, quotePlus } from './queryEncoder';
import type {
  CollectionClientConfig,
  CollectionDocument,
  CollectionQueryInput,
  JsonValue,
  PageResult,
  ResolvedClientSettings,
  RetrievalOptions,
  RetrievalResult,
} from './types';

export const ACCEPT_VERSION = 'v1';

/**
 * Collection Store Client
 *
 * Bulk retrieval of paginated collections (sequential or bounded-concurrent)
 * plus single-item and nested-item operations.
 *
 * Request headers are built once at construction and shared, unchanged, by
 * every request the client makes.
 */
export class CollectionClient {
  private readonly settings: ResolvedClientSettings;
  private readonly headers: Readonly<HttpHeaders>;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly fetcher: PageFetcher;

  constructor(config: CollectionClientConfig) {
    const { logger, transport, ...settings } = config;
    this.settings = resolveClientSettings(settings);
    this.logger = logger ?? new NoopLogger();
    this.transport = transport ?? fetchTransport;
    this.headers = Object.freeze({
      Authorization: `Bearer ${this.settings.apiToken}`,
      'Accept-Version': ACCEPT_VERSION,
      Accept: 'application/json',
    });
    this.fetcher = new PageFetcher({
      transport: this.transport,
      headers: this.headers,
      logger: this.logger,
      maxAttempts: this.settings.maxAttempts,
      retryDelayMs: this.settings.retryDelayMs,
      perAttemptTimeoutMs: this.settings.perAttemptTimeoutMs,
    });
  }

  // ==========================================================================
  // Bulk Retrieval
  // ==========================================================================

  /**
   * Retrieve every matching item, one page at a time in page order.
   *
   * A page failure after page 1 stops the walk and resolves with
   * `status: 'partial'`, the items gathered so far and the failure. With
   * `paginate: false` exactly one request is sent, without pagination
   * parameters.
   *
   * @example
   * ```typescript
   * const result = await client.getCollection({
   *   collectionName: 'articles',
   *   projection: ['title', 'author.name'],
   *   predicates: [['author.itemRefID', '=', 'a1b2c3']],
   * });
   * if (result.status === 'partial') {
   *   console.warn(`stopped at page ${result.failure?.pageNumber}`);
   * }
   * ```
   */
  async getCollection<TDocument = CollectionDocument>(
    input: CollectionQueryInput,
    options?: RetrievalOptions,
  ): Promise<RetrievalResult<TDocument>> {
    const query = createCollectionQuery(input, this.settings.pageSize);
    return retrieveSequential<TDocument>(this.retrievalContext(), query, options);
  }

  /**
   * Retrieve every matching item with up to `maxConcurrency` page fetches in
   * flight. Items come back in page order. Any page failure rejects the whole
   * call and cancels the fetches still running.
   */
  async getCollectionParallel<TDocument = CollectionDocument>(
    input: CollectionQueryInput,
    options?: RetrievalOptions,
  ): Promise<RetrievalResult<TDocument>> {
    const query = createCollectionQuery(input, this.settings.pageSize);
    return retrieveConcurrent<TDocument>(this.retrievalContext(), query, options);
  }

  /** Page-by-page variant of {@link getCollection}. */
  iterateCollection<TDocument = CollectionDocument>(
    input: CollectionQueryInput,
    options?: RetrievalOptions,
  ): AsyncGenerator<PageResult<TDocument>, void, void> {
    const query = createCollectionQuery(input, this.settings.pageSize);
    return iterateSequential<TDocument>(this.retrievalContext(), query, options);
  }

  private retrievalContext(): RetrievalContext {
    return {
      baseUrl: this.settings.baseUrl,
      fetcher: this.fetcher,
      logger: this.logger,
      maxConcurrency: this.settings.maxConcurrency,
      logProgress: this.settings.progress,
    };
  }

  // ==========================================================================
  // Single Items
  // ==========================================================================

  async createItem(collectionName: string, document: JsonValue): Promise<JsonValue> {
    return this.sendJson('POST', buildResourceUrl(this.settings.baseUrl, collectionName), document);
  }

  async getItem(collectionName: string, itemId: string): Promise<JsonValue> {
    return this.requestItem('GET', buildResourceUrl(this.settings.baseUrl, collectionName, itemId));
  }

  async updateItem(collectionName: string, itemId: string, patch: JsonValue): Promise<JsonValue> {
    return this.sendJson('PUT', buildResourceUrl(this.settings.baseUrl, collectionName, itemId), patch);
  }

  async deleteItem(collectionName: string, itemId: string): Promise<JsonValue> {
    return this.requestItem('DELETE', buildResourceUrl(this.settings.baseUrl, collectionName, itemId));
  }

  // ==========================================================================
  // Nested Collections
  // ==========================================================================

  async createNestedItem(
    collectionName: string,
    itemId: string,
    nestedCollection: string,
    document: JsonValue,
  ): Promise<JsonValue> {
    const url = `${buildResourceUrl(this.settings.baseUrl, collectionName, itemId)}?nestedID=${quotePlus(nestedCollection)}`;
    return this.sendJson('POST', url, document);
  }

  async updateNestedItem(
    collectionName: string,
    itemId: string,
    nestedCollection: string,
    nestedItemId: string,
    patch: JsonValue,
  ): Promise<JsonValue> {
    return this.sendJson('PUT', this.nestedItemUrl(collectionName, itemId, nestedCollection, nestedItemId), patch);
  }

  async deleteNestedItem(
    collectionName: string,
    itemId: string,
    nestedCollection: string,
    nestedItemId: string,
  ): Promise<JsonValue> {
    return this.requestItem('DELETE', this.nestedItemUrl(collectionName, itemId, nestedCollection, nestedItemId));
  }

  private nestedItemUrl(collectionName: string, itemId: string, nestedCollection: string, nestedItemId: string): string {
    const itemUrl = buildResourceUrl(this.settings.baseUrl, collectionName, itemId);
    return `${itemUrl}?nestedID=${quotePlus(nestedCollection)}.${quotePlus(nestedItemId)}`;
  }

  // ==========================================================================
  // Images
  // ==========================================================================

  /** Attach an image the service downloads from `imageUrl`. */
  async addImageFromUrl(collectionName: string, itemId: string, imageSlug: string, imageUrl: string): Promise<JsonValue> {
    const form = new URLSearchParams({ imageLink: imageUrl });
    return this.requestItem('PUT', this.imageUrl(collectionName, itemId, imageSlug), form.toString(), {
      'Content-Type': 'application/x-www-form-urlencoded',
    });
  }

  /** Upload a local image file as multipart form data. */
  async addImageFromFile(collectionName: string, itemId: string, imageSlug: string, filePath: string): Promise<JsonValue> {
    const bytes = await readFile(filePath);
    const form = new FormData();
    form.append('imageFile', new Blob([new Uint8Array(bytes)]), basename(filePath));
    // fetch sets the multipart boundary itself
    return this.requestItem('PUT', this.imageUrl(collectionName, itemId, imageSlug), form);
  }

  private imageUrl(collectionName: string, itemId: string, imageSlug: string): string {
    return `${buildResourceUrl(this.settings.baseUrl, collectionName, itemId)}/image?imageSlug=${quotePlus(imageSlug)}`;
  }

  // ==========================================================================
  // Single-request plumbing
  // ==========================================================================

  private async sendJson(method: HttpMethod, url: string, payload: JsonValue): Promise<JsonValue> {
    return this.requestItem(method, url, JSON.stringify(payload), { 'Content-Type': 'application/json' });
  }

  private async requestItem(
    method: HttpMethod,
    url: string,
    body?: TransportBody,
    extraHeaders: HttpHeaders = {},
  ): Promise<JsonValue> {
    let response: RawHttpResponse;
    try {
      response = await executeAttempt(
        this.transport,
        { method, url, headers: { ...this.headers, ...extraHeaders }, body },
        { timeoutMs: this.settings.perAttemptTimeoutMs },
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error('collection.item.failed', { method, url, error: message });
      throw new ItemRequestError(`${method} ${url} failed: ${message}`, method, url, 0, undefined, error);
    }

    const text = decodeBody(response.body);
    if (response.status < 200 || response.status >= 300) {
      this.logger.error('collection.item.failed', { method, url, status: response.status });
      throw new ItemRequestError(`${method} ${url} failed with status ${response.status}`, method, url, response.status, text);
    }

    this.logger.debug('collection.item.success', { method, url, status: response.status });
    if (!text.trim()) {
      return null;
    }
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new ItemRequestError(`${method} ${url} returned a body that is not JSON`, method, url, response.status, text, error);
    }
  }
}

/**
 * Factory function to create a collection client from environment variables
 *
 * Required: `COLLECTION_API_TOKEN`, `COLLECTION_API_BASE_URL`.
 * Optional: `COLLECTION_PAGE_SIZE`, `COLLECTION_MAX_ATTEMPTS`,
 * `COLLECTION_RETRY_DELAY_MS`, `COLLECTION_TIMEOUT_MS`,
 * `COLLECTION_MAX_CONCURRENCY`.
 *
 * @param configOverrides - applied on top of the environment
 */
export function createCollectionClientFromEnv(
  configOverrides?: Partial<CollectionClientConfig>,
  env: NodeJS.ProcessEnv = process.env,
): CollectionClient {
  const apiToken = configOverrides?.apiToken ?? env.COLLECTION_API_TOKEN;
  const baseUrl = configOverrides?.baseUrl ?? env.COLLECTION_API_BASE_URL;

  if (!apiToken) {
    throw new ConfigurationError('COLLECTION_API_TOKEN environment variable is required');
  }
  if (!baseUrl) {
    throw new ConfigurationError('COLLECTION_API_BASE_URL environment variable is required');
  }

  return new CollectionClient({
    pageSize: parseNumberOrDefault(env.COLLECTION_PAGE_SIZE, DEFAULT_PAGE_SIZE),
    maxAttempts: parseNumberOrDefault(env.COLLECTION_MAX_ATTEMPTS, DEFAULT_MAX_ATTEMPTS),
    retryDelayMs: parseNumberOrDefault(env.COLLECTION_RETRY_DELAY_MS, DEFAULT_RETRY_DELAY_MS),
    perAttemptTimeoutMs: parseNumberOrDefault(env.COLLECTION_TIMEOUT_MS, DEFAULT_PER_ATTEMPT_TIMEOUT_MS),
    maxConcurrency: parseNumberOrDefault(env.COLLECTION_MAX_CONCURRENCY, DEFAULT_MAX_CONCURRENCY),
    ...configOverrides,
    apiToken,
    baseUrl,
  });
}
