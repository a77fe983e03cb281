import axios from 'axios';
import { getLogger } from './logger';

const logger = getLogger();

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  /** Extra random delay, as a share of the computed delay */
  jitterRatio: number;
  shouldRetry: (error: Error) => boolean;
}

// Bedrock and socket failures that usually clear up on their own
export const TRANSIENT_ERROR_NAMES: readonly string[] = [
  'ThrottlingException',
  'ServiceUnavailableException',
  'ModelNotReadyException',
  'InternalServerException',
  'ModelTimeoutException',
  'RequestTimeout',
  'NetworkError',
];

const TRANSIENT_ERROR_CODES: readonly string[] = ['ECONNRESET', 'ETIMEDOUT', 'ECONNABORTED', 'EAI_AGAIN'];

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * True for throttling, timeouts and 5xx answers. The AWS SDK marks such
 * errors with `$retryable`; axios exposes the HTTP status.
 */
export function isTransientError(error: Error): boolean {
  if (TRANSIENT_ERROR_NAMES.includes(error.name)) return true;

  const retryable: unknown = Reflect.get(error, '$retryable');
  if (typeof retryable === 'object' && retryable !== null) return true;

  const code: unknown = Reflect.get(error, 'code');
  if (typeof code === 'string' && TRANSIENT_ERROR_CODES.includes(code)) return true;

  if (axios.isAxiosError(error) && error.response) {
    const { status } = error.response;
    return status === 429 || status >= 500;
  }
  return false;
}

const DEFAULT_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 10_000,
  backoffMultiplier: 2,
  jitterRatio: 0.1,
  shouldRetry: isTransientError,
};

/** Delay before attempt `attempt + 1`, capped before jitter is added. */
export function backoffDelay(
  attempt: number,
  policy: Pick<RetryPolicy, 'initialDelayMs' | 'maxDelayMs' | 'backoffMultiplier' | 'jitterRatio'>,
  random: () => number = Math.random
): number {
  const base = Math.min(
    policy.initialDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1),
    policy.maxDelayMs
  );
  return Math.floor(base + random() * base * policy.jitterRatio);
}

/**
 * Runs `operation` until it succeeds, fails with an error `shouldRetry`
 * rejects, or `maxAttempts` is used up. The last error is rethrown as is.
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  policy: Partial<RetryPolicy> = {},
  context: Record<string, unknown> = {}
): Promise<T> {
  const effective: RetryPolicy = { ...DEFAULT_POLICY, ...policy };

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (caught) {
      const error = toError(caught);
      const retryable = effective.shouldRetry(error);

      if (!retryable || attempt >= effective.maxAttempts) {
        logger.debug('Giving up', {
          ...context,
          attempt,
          error_name: error.name,
          retryable,
        });
        throw error;
      }

      const delay = backoffDelay(attempt, effective);
      logger.warn(
        'Transient failure, retrying',
        { ...context, attempt, delay_ms: delay, error_name: error.name },
        error
      );
      await sleep(delay);
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
