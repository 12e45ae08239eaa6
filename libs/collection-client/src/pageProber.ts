import type { Logger } from '@libs/resilient-http-core';
import { ProtocolContractError } from './errors';
import type { PageFetcher } from './pageFetcher';
import type { CollectionDocument, FetchedPage, PageRequest } from './types';

export const ITEM_COUNT_HEADER = 'item-count';

/** Largest page count a retrieval will plan for (the maximum array length). */
export const MAX_TOTAL_PAGES = 2 ** 32 - 1;

export interface ProbeResult<TDocument = CollectionDocument> {
  firstPage: FetchedPage<TDocument>;
  itemCount: number;
  totalPages: number;
}

function readHeader(headers: Record<string, string>, name: string): string | undefined {
  const match = Object.keys(headers).find((key) => key.toLowerCase() === name);
  return match === undefined ? undefined : headers[match];
}

export function parseItemCount(headers: Record<string, string>, url: string): number {
  const raw = readHeader(headers, ITEM_COUNT_HEADER);
  if (raw === undefined) {
    throw new ProtocolContractError(`Response is missing the ${ITEM_COUNT_HEADER} header`, url);
  }
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ProtocolContractError(`Invalid ${ITEM_COUNT_HEADER} header: "${raw}"`, url, raw);
  }
  const itemCount = Number(trimmed);
  if (!Number.isSafeInteger(itemCount)) {
    throw new ProtocolContractError(`${ITEM_COUNT_HEADER} header out of range: "${raw}"`, url, raw);
  }
  return itemCount;
}

export function countPages(itemCount: number, pageSize: number): number {
  return Math.ceil(itemCount / pageSize);
}

/**
 * Fetches page 1 and derives the page count from its `item-count` header.
 * The count is read once here and never revisited for later pages.
 */
export async function probeCollection<TDocument = CollectionDocument>(
  fetcher: PageFetcher,
  firstPageRequest: PageRequest,
  pageSize: number,
  logger: Logger,
  signal?: AbortSignal,
): Promise<ProbeResult<TDocument>> {
  const firstPage = await fetcher.fetchPage<TDocument>(firstPageRequest, signal);
  const itemCount = parseItemCount(firstPage.headers, firstPageRequest.url);
  const totalPages = countPages(itemCount, pageSize);
  if (totalPages > MAX_TOTAL_PAGES) {
    throw new ProtocolContractError(
      `${ITEM_COUNT_HEADER} ${itemCount} at ${pageSize} per page exceeds ${MAX_TOTAL_PAGES} pages`,
      firstPageRequest.url,
      String(itemCount),
    );
  }

  logger.debug('collection.probe', {
    url: firstPageRequest.url,
    itemCount,
    pageSize,
    totalPages,
  });

  return { firstPage, itemCount, totalPages };
}
