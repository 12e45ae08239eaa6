import { TimeoutError, abortReason } from './errors';
import type { AttemptOptions, HttpTransport, RawHttpResponse, TransportRequest } from './types';

/**
 * Runs one transport call under a per-attempt timeout, linked to the caller's
 * signal.
 *
 * - caller abort: rejects with the caller signal's reason
 * - timeout: rejects with TimeoutError
 * - anything else the transport throws is passed through untouched
 */
export async function executeAttempt(
  transport: HttpTransport,
  request: TransportRequest,
  options: AttemptOptions = {},
): Promise<RawHttpResponse> {
  const { signal: parentSignal, timeoutMs } = options;
  if (parentSignal?.aborted) {
    throw abortReason(parentSignal);
  }

  const controller = new AbortController();
  const abortHandler = () => controller.abort(parentSignal?.reason);
  parentSignal?.addEventListener('abort', abortHandler, { once: true });

  let didTimeout = false;
  const timeoutHandle =
    timeoutMs && timeoutMs > 0
      ? setTimeout(() => {
          didTimeout = true;
          controller.abort();
        }, timeoutMs)
      : undefined;

  try {
    return await transport(request, controller.signal);
  } catch (error) {
    if (parentSignal?.aborted) {
      throw abortReason(parentSignal);
    }
    if (didTimeout) {
      throw new TimeoutError(`Request timed out after ${timeoutMs}ms`, timeoutMs);
    }
    throw error;
  } finally {
    if (timeoutHandle !== undefined) {
      clearTimeout(timeoutHandle);
    }
    parentSignal?.removeEventListener('abort', abortHandler);
  }
}
