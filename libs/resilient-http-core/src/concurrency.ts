import { abortReason } from './errors';

export interface ConcurrencyOptions {
  /** Stops handing out new work once aborted; the call rejects with the abort reason. */
  signal?: AbortSignal;
}

/**
 * Maps `inputs` through `worker` with at most `limit` calls in flight.
 *
 * Each result is written to the slot of its input, so the output keeps input
 * order whatever order the workers finish in. The first worker rejection stops
 * new work from starting and becomes the rejection of the whole call once the
 * workers already running have settled.
 */
export async function mapWithConcurrency<TInput, TOutput>(
  inputs: readonly TInput[],
  limit: number,
  worker: (input: TInput, index: number) => Promise<TOutput>,
  options: ConcurrencyOptions = {},
): Promise<TOutput[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`limit must be a positive integer, got ${limit}`);
  }

  const { signal } = options;
  const slots = new Array<TOutput>(inputs.length);
  let nextIndex = 0;
  let failure: { error: unknown } | undefined;

  const runner = async (): Promise<void> => {
    while (!failure && !signal?.aborted && nextIndex < inputs.length) {
      const index = nextIndex;
      nextIndex += 1;
      try {
        slots[index] = await worker(inputs[index], index);
      } catch (error) {
        failure ??= { error };
        return;
      }
    }
  };

  const runnerCount = Math.min(limit, inputs.length);
  await Promise.all(Array.from({ length: runnerCount }, runner));

  if (failure) {
    throw failure.error;
  }
  if (signal?.aborted) {
    throw abortReason(signal);
  }
  return slots;
}
