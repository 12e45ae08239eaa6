export class CollectionClientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CollectionClientError';
  }
}

/** Invalid query input; raised before anything is sent. */
export class CallerContractError extends CollectionClientError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'CallerContractError';
  }
}

export class ConfigurationError extends CollectionClientError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** The `item-count` header on page 1 is missing or not a decimal integer. */
export class ProtocolContractError extends CollectionClientError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly headerValue?: string,
  ) {
    super(message);
    this.name = 'ProtocolContractError';
  }
}

export type PageFetchFailureReason = 'http_status' | 'retries_exhausted';

export class PageFetchError extends CollectionClientError {
  readonly reason: PageFetchFailureReason;
  readonly pageNumber: number;
  readonly url: string;
  readonly status?: number;
  readonly body?: string;
  readonly attempts: number;

  constructor(
    message: string,
    options: {
      reason: PageFetchFailureReason;
      pageNumber: number;
      url: string;
      attempts: number;
      status?: number;
      body?: string;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options.cause });
    this.name = 'PageFetchError';
    this.reason = options.reason;
    this.pageNumber = options.pageNumber;
    this.url = options.url;
    this.status = options.status;
    this.body = options.body;
    this.attempts = options.attempts;
  }
}

/** A 200 response whose body is not a JSON array. Never retried. */
export class DecodeError extends CollectionClientError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly body: string,
    public readonly pageNumber?: number,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'DecodeError';
  }
}

export type RetrievalAbortReason = 'aborted' | 'deadline';

export class RetrievalAbortedError extends CollectionClientError {
  constructor(public readonly reason: RetrievalAbortReason, message?: string) {
    super(message ?? (reason === 'deadline' ? 'Retrieval deadline exceeded' : 'Retrieval aborted'));
    this.name = 'RetrievalAbortedError';
  }
}

/** A single-item request failed. `status` is 0 when no response arrived. */
export class ItemRequestError extends CollectionClientError {
  constructor(
    message: string,
    public readonly method: string,
    public readonly url: string,
    public readonly status: number,
    public readonly body?: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'ItemRequestError';
  }
}

export function isPageFailure(error: unknown): error is PageFetchError | DecodeError {
  return error instanceof PageFetchError || error instanceof DecodeError;
}
