import { z } from 'zod';
import { ConfigurationError } from './errors';
import type { ResolvedClientSettings } from './types';

export const DEFAULT_PAGE_SIZE = 100;
export const DEFAULT_MAX_ATTEMPTS = 10;
export const DEFAULT_RETRY_DELAY_MS = 1_000;
export const DEFAULT_PER_ATTEMPT_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_CONCURRENCY = 10;

export const clientSettingsSchema = z.object({
  apiToken: z.string().min(1, 'API token is required'),
  baseUrl: z
    .string()
    .url('Base URL must be an absolute URL')
    .refine((value) => /^https?:\/\//i.test(value), 'Base URL must use http or https'),
  pageSize: z.number().int().positive().default(DEFAULT_PAGE_SIZE),
  maxAttempts: z.number().int().positive().default(DEFAULT_MAX_ATTEMPTS),
  retryDelayMs: z.number().int().nonnegative().default(DEFAULT_RETRY_DELAY_MS),
  perAttemptTimeoutMs: z.number().int().nonnegative().default(DEFAULT_PER_ATTEMPT_TIMEOUT_MS),
  maxConcurrency: z.number().int().positive().default(DEFAULT_MAX_CONCURRENCY),
  progress: z.boolean().default(false),
});

export function resolveClientSettings(input: z.input<typeof clientSettingsSchema>): ResolvedClientSettings {
  const parsed = clientSettingsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid collection client configuration: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

export function parseNumberOrDefault(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}
