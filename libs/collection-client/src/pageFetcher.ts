import {
  executeAttempt,
  sleep,
  type HttpHeaders,
  type HttpTransport,
  type Logger,
  type RawHttpResponse,
} from '@libs/resilient-http-core';
import { DecodeError, PageFetchError } from './errors';
import type { CollectionDocument, FetchedPage, PageRequest } from './types';

export interface PageFetcherOptions {
  transport: HttpTransport;
  headers: Readonly<HttpHeaders>;
  logger: Logger;
  /** Total attempts per page, first one included. */
  maxAttempts: number;
  /** Fixed pause between attempts. */
  retryDelayMs: number;
  perAttemptTimeoutMs: number;
}

const decoder = new TextDecoder();

export function decodeBody(body: ArrayBuffer): string {
  return decoder.decode(body);
}

/**
 * Performs one logical page fetch.
 *
 * Transport failures and per-attempt timeouts are retried after a fixed delay
 * until `maxAttempts` is used up. A non-200 status or an undecodable body ends
 * the fetch at once.
 */
export class PageFetcher {
  constructor(private readonly options: PageFetcherOptions) {}

  async fetchPage<TDocument = CollectionDocument>(
    request: PageRequest,
    signal?: AbortSignal,
  ): Promise<FetchedPage<TDocument>> {
    const { maxAttempts, retryDelayMs, logger } = this.options;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      let response: RawHttpResponse;
      try {
        response = await executeAttempt(
          this.options.transport,
          { method: 'GET', url: request.url, headers: this.options.headers },
          { timeoutMs: this.options.perAttemptTimeoutMs, signal },
        );
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }
        lastError = error;
        if (attempt < maxAttempts) {
          logger.warn('collection.page.retry', {
            pageNumber: request.pageNumber,
            url: request.url,
            attempt,
            maxAttempts,
            delayMs: retryDelayMs,
            error: error instanceof Error ? error.message : String(error),
          });
          await sleep(retryDelayMs, signal);
        }
        continue;
      }

      if (response.status !== 200) {
        const body = decodeBody(response.body);
        throw new PageFetchError(`Page ${request.pageNumber} failed with status ${response.status}`, {
          reason: 'http_status',
          pageNumber: request.pageNumber,
          url: request.url,
          status: response.status,
          body,
          attempts: attempt,
        });
      }

      return {
        pageNumber: request.pageNumber,
        url: request.url,
        items: parseItems<TDocument>(response.body, request),
        headers: response.headers,
        attempts: attempt,
      };
    }

    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    throw new PageFetchError(`Page ${request.pageNumber} failed after ${maxAttempts} attempts: ${reason}`, {
      reason: 'retries_exhausted',
      pageNumber: request.pageNumber,
      url: request.url,
      attempts: maxAttempts,
      cause: lastError,
    });
  }
}

function parseItems<TDocument>(body: ArrayBuffer, request: PageRequest): TDocument[] {
  const text = decodeBody(body);
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new DecodeError(`Page ${request.pageNumber} body is not valid JSON`, request.url, text, request.pageNumber, error);
  }
  if (!Array.isArray(parsed)) {
    throw new DecodeError(`Page ${request.pageNumber} body is not a JSON array`, request.url, text, request.pageNumber);
  }
  return parsed as TDocument[];
}
