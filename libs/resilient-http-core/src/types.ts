export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type HttpHeaders = Record<string, string>;

/**
 * Request body handed to a transport. Strings carry JSON, FormData carries
 * form and multipart payloads.
 */
export type TransportBody = string | FormData;

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Readonly<HttpHeaders>;
  body?: TransportBody;
}

/**
 * Raw HTTP response as returned by a transport. Header names are lower-cased.
 */
export interface RawHttpResponse {
  status: number;
  headers: HttpHeaders;
  body: ArrayBuffer;
}

/**
 * HTTP transport abstraction.
 * Takes a transport request and abort signal, returns a raw HTTP response.
 * A transport rejects only on transport-level failure (connection refused,
 * reset, DNS, abort); any HTTP status resolves.
 */
export interface HttpTransport {
  (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse>;
}

export type LoggerMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

export interface AttemptOptions {
  /** Abort the attempt after this many milliseconds. 0 or undefined disables the limit. */
  timeoutMs?: number;
  /** Caller signal; aborting it aborts the attempt. */
  signal?: AbortSignal;
}
