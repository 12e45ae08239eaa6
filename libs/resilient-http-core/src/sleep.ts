import { setTimeout as delay } from 'timers/promises';
import { abortReason } from './errors';

/**
 * Waits `ms` milliseconds. Rejects with the signal's abort reason as soon as
 * the signal fires.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    throw abortReason(signal);
  }
  if (ms <= 0) {
    return;
  }
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) {
      throw abortReason(signal);
    }
    throw error;
  }
}
