import { RetrySettings } from '../types/index.js';
import { errorMessage, isTransient } from './errors.js';
import { Logger } from './logger.js';

export interface RetryConfig {
  /** Maximum number of attempts, including the first. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  useJitter?: boolean;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (attempt: RetryAttempt) => void;
  sleep?: (ms: number) => Promise<void>;
}

export interface RetryAttempt {
  attemptNumber: number;
  totalAttempts: number;
  delay: number;
  error: unknown;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 8000,
  useJitter: true,
  isRetryable: isTransient
};

const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

export function calculateDelay(retryIndex: number, config: Pick<RetryConfig, 'baseDelayMs' | 'maxDelayMs' | 'useJitter'>): number {
  const exponential = Math.min(config.baseDelayMs * 2 ** retryIndex, config.maxDelayMs);
  if (!config.useJitter) {
    return exponential;
  }
  // Up to 25% below the exponential value
  return Math.round(exponential * (0.75 + Math.random() * 0.25));
}

/**
 * Run an operation, retrying errors the predicate marks retryable with
 * exponential backoff. The last error is rethrown unchanged.
 */
export async function withRetry<T>(operation: () => Promise<T>, config: Partial<RetryConfig> = {}): Promise<T> {
  const finalConfig: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
  const wait = finalConfig.sleep ?? sleep;
  const retryable = finalConfig.isRetryable ?? isTransient;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= finalConfig.maxAttempts || !retryable(error)) {
        throw error;
      }

      const delay = calculateDelay(attempt - 1, finalConfig);
      finalConfig.onRetry?.({
        attemptNumber: attempt,
        totalAttempts: finalConfig.maxAttempts,
        delay,
        error
      });
      await wait(delay);
    }
  }
}

/** Retry settings from the config file, reporting each retry to the log. */
export function retryConfigFromSettings(settings: RetrySettings, label: string, logger: Logger): Partial<RetryConfig> {
  return {
    maxAttempts: settings.max_attempts,
    baseDelayMs: settings.base_delay_ms,
    maxDelayMs: settings.max_delay_ms,
    onRetry: attempt =>
      logger.warn(
        `${label} failed (attempt ${attempt.attemptNumber}/${attempt.totalAttempts}), retrying in ${attempt.delay}ms: ${errorMessage(attempt.error)}`
      )
  };
}
