import type { CollectionQuery, PageRequest, Predicate, PredicateEncoding } from './types';

/** Encoded `+`, the separator between predicate terms in `joined` mode. */
export const JOINED_PREDICATE_SEPARATOR = '%2B';

/**
 * Form-style percent-encoding: spaces become `+`, everything outside
 * `A-Z a-z 0-9 _ . - ~` is percent-encoded.
 */
export function quotePlus(value: string): string {
  return encodeURIComponent(value)
    .replace(/[!'()*]/g, (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`)
    .replace(/%20/g, '+');
}

export function encodePredicate(predicate: Predicate): string {
  const value = quotePlus(predicate.value);
  switch (predicate.kind) {
    case 'withOperator':
      return `${predicate.field}:${predicate.operator}:${value}`;
    case 'implicit':
      return `${predicate.field}:${value}`;
  }
}

/**
 * Encodes everything but pagination into a query-string fragment, including
 * its leading `?`. Returns an empty string when there is nothing to encode.
 *
 * Order: raw parameters, `projectOn`, then predicates.
 */
export function encodeQuery(query: CollectionQuery, encoding: PredicateEncoding = 'repeated'): string {
  const parts: string[] = [...query.rawParams];

  if (query.projection.length > 0) {
    parts.push(`projectOn=${query.projection.join(',')}`);
  }

  if (query.predicates.length > 0) {
    const terms = query.predicates.map(encodePredicate);
    if (encoding === 'joined') {
      parts.push(`query=${terms.join(JOINED_PREDICATE_SEPARATOR)}`);
    } else {
      parts.push(...terms.map((term) => `query=${term}`));
    }
  }

  return parts.map((part, index) => `${index === 0 ? '?' : '&'}${part}`).join('');
}

export function buildResourceUrl(baseUrl: string, collectionName: string, itemId?: string): string {
  const root = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;
  const itemsPath = `${root}/collection/${encodeURIComponent(collectionName)}/items`;
  return itemId === undefined ? itemsPath : `${itemsPath}/${encodeURIComponent(itemId)}`;
}

/**
 * Computes the shared part of every page URL once and hands out PageRequests
 * that differ only in `pageNumber`.
 */
export class PageRequestBuilder {
  private readonly prefix: string;

  constructor(
    baseUrl: string,
    private readonly query: CollectionQuery,
    encoding: PredicateEncoding,
  ) {
    const fragment = encodeQuery(query, encoding);
    const resourceUrl = buildResourceUrl(baseUrl, query.collectionName);
    this.prefix = `${resourceUrl}${fragment}${fragment ? '&' : '?'}`;
  }

  page(pageNumber: number): PageRequest {
    if (!Number.isInteger(pageNumber) || pageNumber < 1) {
      throw new RangeError(`pageNumber must be a positive integer, got ${pageNumber}`);
    }
    return Object.freeze({
      url: `${this.prefix}pageNumber=${pageNumber}&perPage=${this.query.pageSize}`,
      pageNumber,
    });
  }
}

/** The single request of a non-paginated query: no pageNumber, no perPage. */
export function buildUnpaginatedRequest(baseUrl: string, query: CollectionQuery, encoding: PredicateEncoding): PageRequest {
  return Object.freeze({
    url: `${buildResourceUrl(baseUrl, query.collectionName)}${encodeQuery(query, encoding)}`,
    pageNumber: 1,
  });
}
