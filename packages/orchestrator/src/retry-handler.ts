// ============================================================================
// Retry Handler - exponential backoff for retryable tutor errors
// ============================================================================

import { isTutorError, errorMessage } from '@stem-tutor/shared';
import type { Logger } from '@stem-tutor/shared';
import type { RetryConfig } from './types.js';

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 1,
  baseDelayMs: 500,
  backoffMultiplier: 2,
  maxDelayMs: 5000,
  useJitter: false,
};

export class RetryHandler {
  private readonly config: RetryConfig;

  constructor(
    config: Partial<RetryConfig>,
    private readonly logger: Logger
  ) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
  }

  /**
   * Run the operation, retrying errors flagged retryable. Anything else is
   * rethrown on the spot.
   */
  async executeWithRetry<T>(
    operation: () => Promise<T>,
    context: { requestId: string; step: string }
  ): Promise<{ result: T; retryCount: number }> {
    let retryCount = 0;

    for (let attempt = 0; ; attempt++) {
      try {
        const result = await operation();
        return { result, retryCount };
      } catch (error) {
        if (!this.isRetryable(error) || attempt >= this.config.maxRetries) {
          throw error;
        }

        const delay = this.calculateDelay(attempt);
        retryCount++;

        this.logger.warn(`Retrying ${context.step}`, {
          requestId: context.requestId,
          attempt: attempt + 1,
          maxRetries: this.config.maxRetries,
          delayMs: delay,
          error: errorMessage(error),
        });

        await this.sleep(delay);
      }
    }
  }

  isRetryable(error: unknown): boolean {
    return isTutorError(error) && error.retryable;
  }

  calculateDelay(attempt: number): number {
    let delay = this.config.baseDelayMs * Math.pow(this.config.backoffMultiplier, attempt);
    delay = Math.min(delay, this.config.maxDelayMs);

    if (this.config.useJitter) {
      // Up to 25% on top
      delay += delay * 0.25 * Math.random();
    }

    return Math.floor(delay);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
