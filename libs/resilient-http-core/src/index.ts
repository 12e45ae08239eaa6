export * from './types';
export { TimeoutError, AbortedError, abortReason } from './errors';
export { ConsoleLogger, NoopLogger } from './logger';
export { sleep } from './sleep';
export { executeAttempt } from './attempt';
export { mapWithConcurrency, type ConcurrencyOptions } from './concurrency';
export * from './transport/fetchTransport';
