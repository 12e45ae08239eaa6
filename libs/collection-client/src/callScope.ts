import { CallerContractError, RetrievalAbortedError } from './errors';
import type { RetrievalOptions } from './types';

export function assertRetrievalOptions(options: RetrievalOptions): void {
  const { timeoutMs, maxConcurrency } = options;
  if (timeoutMs !== undefined && !(Number.isFinite(timeoutMs) && timeoutMs > 0)) {
    throw new CallerContractError(`timeoutMs must be a positive number, got ${timeoutMs}`);
  }
  if (maxConcurrency !== undefined && !(Number.isInteger(maxConcurrency) && maxConcurrency >= 1)) {
    throw new CallerContractError(`maxConcurrency must be a positive integer, got ${maxConcurrency}`);
  }
}

/**
 * Owns the abort signal of one retrieval call. It fires when the caller's
 * signal fires, when the deadline passes, or when the retrieval cancels
 * itself; the abort reason is the error the call should reject with.
 */
export class CallScope {
  private readonly controller = new AbortController();
  private readonly deadlineHandle?: ReturnType<typeof setTimeout>;
  private readonly detachExternal: () => void;

  constructor(options: Pick<RetrievalOptions, 'signal' | 'timeoutMs'> = {}) {
    const external = options.signal;
    const onExternalAbort = () => this.cancel(new RetrievalAbortedError('aborted'));

    if (external?.aborted) {
      onExternalAbort();
    } else {
      external?.addEventListener('abort', onExternalAbort, { once: true });
    }
    this.detachExternal = () => external?.removeEventListener('abort', onExternalAbort);

    const { timeoutMs } = options;
    if (timeoutMs !== undefined) {
      this.deadlineHandle = setTimeout(
        () => this.cancel(new RetrievalAbortedError('deadline', `Retrieval exceeded its ${timeoutMs}ms deadline`)),
        timeoutMs,
      );
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** First reason wins. */
  cancel(reason: Error): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort(reason);
    }
  }

  dispose(): void {
    if (this.deadlineHandle !== undefined) {
      clearTimeout(this.deadlineHandle);
    }
    this.detachExternal();
  }
}
