import { logger } from './logger.js';

export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  /** Name used in retry log lines */
  operation?: string;
  /** Replaces the default transient-error check */
  isRetryable?: (error: unknown) => boolean;
}

const RETRYABLE_SNIPPETS = [
  'timeout',
  'timed out',
  'econnrefused',
  'etimedout',
  'econnreset',
  'rate limit',
  'overloaded',
  'service unavailable',
];

const RETRYABLE_STATUS = new Set([408, 409, 429]);

function statusOf(error: object): number | undefined {
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/**
 * Transient failures of the model API: HTTP 408/409/429 and 5xx as reported
 * by the OpenAI SDK, or a network or rate-limit message.
 */
export function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  const status = statusOf(error);
  if (status !== undefined) {
    return RETRYABLE_STATUS.has(status) || status >= 500;
  }

  const message = error.message.toLowerCase();
  return RETRYABLE_SNIPPETS.some((snippet) => message.includes(snippet));
}

export async function executeWithRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const maxRetries = options.maxRetries ?? 2;
  const initialDelayMs = options.initialDelayMs ?? 250;
  const maxDelayMs = options.maxDelayMs ?? 4000;
  const backoffMultiplier = options.backoffMultiplier ?? 2;
  const isRetryable = options.isRetryable ?? isTransientError;
  const operation = options.operation ?? 'operation';

  let delay = initialDelayMs;
  let attempt = 0;

  while (true) {
    try {
      return await fn();
    } catch (error) {
      attempt += 1;
      if (attempt > maxRetries || !isRetryable(error)) {
        throw error instanceof Error ? error : new Error(String(error));
      }

      logger.warn(`Retrying ${operation}`, {
        attempt,
        maxRetries,
        delayMs: delay,
        reason: error instanceof Error ? error.message : String(error),
      });
      await new Promise((resolve) => setTimeout(resolve, delay));
      delay = Math.min(delay * backoffMultiplier, maxDelayMs);
    }
  }
}
