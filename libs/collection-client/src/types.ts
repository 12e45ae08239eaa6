import type { HttpTransport, Logger } from '@libs/resilient-http-core';
import type { DecodeError, PageFetchError } from './errors';

/**
 * Collection Client Types
 *
 * Query model, page/result shapes and client configuration.
 */

// ============================================================================
// Documents
// ============================================================================

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** Documents are passed through untouched; the client never looks inside. */
export type CollectionDocument = JsonValue;

// ============================================================================
// Query Model
// ============================================================================

export type PredicateValue = string | number | boolean;

export interface PredicateWithOperator {
  kind: 'withOperator';
  field: string;
  operator: string;
  value: string;
}

export interface ImplicitPredicate {
  kind: 'implicit';
  field: string;
  value: string;
}

/** `field:operator:value` or, without an operator, `field:value`. */
export type Predicate = PredicateWithOperator | ImplicitPredicate;

/**
 * Predicates as callers write them: an object with an optional operator, or
 * the short tuple forms `[field, value]` / `[field, operator, value]`.
 */
export type PredicateInput =
  | { field: string; operator?: string; value: PredicateValue }
  | readonly [field: string, value: PredicateValue]
  | readonly [field: string, operator: string, value: PredicateValue];

export interface CollectionQueryInput {
  collectionName: string;
  /** Items per page. Defaults to the client's pageSize. */
  pageSize?: number;
  /** Field paths to project on; empty means full documents. */
  projection?: readonly string[];
  predicates?: readonly PredicateInput[];
  /** Passed through verbatim, e.g. `sort=createdAt`. */
  rawParams?: readonly string[];
  /** When false only page 1 is requested, without pagination parameters. */
  paginate?: boolean;
}

export interface CollectionQuery {
  readonly collectionName: string;
  readonly pageSize: number;
  readonly projection: readonly string[];
  readonly predicates: readonly Predicate[];
  readonly rawParams: readonly string[];
  readonly paginate: boolean;
}

/**
 * `repeated` sends one `query=` parameter per predicate; `joined` sends a
 * single `query=` with terms separated by an encoded `+`.
 */
export type PredicateEncoding = 'repeated' | 'joined';

// ============================================================================
// Pages and Results
// ============================================================================

export interface PageRequest {
  readonly url: string;
  readonly pageNumber: number;
}

export interface FetchedPage<TDocument = CollectionDocument> {
  pageNumber: number;
  url: string;
  items: TDocument[];
  headers: Record<string, string>;
  attempts: number;
}

export type PageFailureError = PageFetchError | DecodeError;

export interface PageResult<TDocument = CollectionDocument> {
  pageNumber: number;
  totalPages: number;
  items: TDocument[];
  /** Set when the page failed; `items` is then empty. */
  error?: PageFailureError;
}

export interface PageFailure {
  pageNumber: number;
  url: string;
  error: PageFailureError;
}

export type RetrievalStatus = 'complete' | 'partial';

export interface RetrievalResult<TDocument = CollectionDocument> {
  status: RetrievalStatus;
  /** Every retrieved document, in page order. */
  items: TDocument[];
  totalPages: number;
  /** The `item-count` reported by page 1. Absent for non-paginated queries. */
  itemCount?: number;
  pagesFetched: number;
  /** Present iff status is `partial`. */
  failure?: PageFailure;
}

export interface ProgressEvent {
  pageNumber: number;
  completed: number;
  totalPages: number;
  ok: boolean;
}

export interface RetrievalOptions {
  signal?: AbortSignal;
  /** Deadline for the whole call, in milliseconds. */
  timeoutMs?: number;
  /** Called once per settled page, successful or not. */
  onProgress?: (event: ProgressEvent) => void;
  /** Overrides the client's maxConcurrency for one concurrent retrieval. */
  maxConcurrency?: number;
}

// ============================================================================
// Client Configuration
// ============================================================================

export interface CollectionClientConfig {
  apiToken: string;
  /** Service root, e.g. `https://collections.example.com/api/public`. */
  baseUrl: string;
  pageSize?: number;
  maxAttempts?: number;
  retryDelayMs?: number;
  perAttemptTimeoutMs?: number;
  maxConcurrency?: number;
  /** Log one line per settled page. */
  progress?: boolean;
  logger?: Logger;
  transport?: HttpTransport;
}

export interface ResolvedClientSettings {
  apiToken: string;
  baseUrl: string;
  pageSize: number;
  maxAttempts: number;
  retryDelayMs: number;
  perAttemptTimeoutMs: number;
  maxConcurrency: number;
  progress: boolean;
}
