export class TimeoutError extends Error {
  constructor(message: string, public readonly timeoutMs?: number) {
    super(message);
    this.name = 'TimeoutError';
  }
}

export class AbortedError extends Error {
  constructor(message = 'Request aborted') {
    super(message);
    this.name = 'AbortedError';
  }
}

/**
 * The error an aborted signal stands for: its own reason when that is an
 * Error, otherwise a generic AbortedError.
 */
export function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new AbortedError();
}
