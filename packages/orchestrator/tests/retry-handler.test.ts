import { describe, it, expect, beforeEach, vi } from 'vitest';
import { InvalidInputError, ProviderUnavailableError } from '@stem-tutor/shared';
import type { Logger } from '@stem-tutor/shared';
import { DEFAULT_RETRY_CONFIG, RetryHandler } from '../src/retry-handler.js';

const testLogger: Logger = {
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

const context = { requestId: 'req-1', step: 'concept-explainer' };

describe('RetryHandler', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should default to a single retry', () => {
    expect(DEFAULT_RETRY_CONFIG.maxRetries).toBe(1);
  });

  it('should return the first success without retrying', async () => {
    const handler = new RetryHandler({ baseDelayMs: 1 }, testLogger);
    const operation = vi.fn(async () => 'ok');

    await expect(handler.executeWithRetry(operation, context)).resolves.toEqual({ result: 'ok', retryCount: 0 });
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should retry a retryable failure once', async () => {
    const handler = new RetryHandler({ baseDelayMs: 1 }, testLogger);
    const operation = vi
      .fn<[], Promise<string>>()
      .mockRejectedValueOnce(new ProviderUnavailableError('concept-explainer', 'timed out after 20ms', true))
      .mockResolvedValueOnce('ok');

    await expect(handler.executeWithRetry(operation, context)).resolves.toEqual({ result: 'ok', retryCount: 1 });
    expect(testLogger.warn).toHaveBeenCalledWith(
      'Retrying concept-explainer',
      expect.objectContaining({ requestId: 'req-1', attempt: 1, delayMs: 1 })
    );
  });

  it('should give up after the retry budget', async () => {
    const handler = new RetryHandler({ baseDelayMs: 1 }, testLogger);
    const operation = vi.fn(async (): Promise<string> => {
      throw new ProviderUnavailableError('web-search', 'HTTP 503: busy');
    });

    await expect(handler.executeWithRetry(operation, context)).rejects.toBeInstanceOf(ProviderUnavailableError);
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('should not retry non-retryable errors', async () => {
    const handler = new RetryHandler({ baseDelayMs: 1 }, testLogger);
    const operation = vi.fn(async (): Promise<string> => {
      throw new InvalidInputError('message text is empty');
    });

    await expect(handler.executeWithRetry(operation, context)).rejects.toBeInstanceOf(InvalidInputError);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(handler.isRetryable(new Error('plain'))).toBe(false);
  });

  it('should back off exponentially up to the cap', () => {
    const handler = new RetryHandler({ baseDelayMs: 500, maxDelayMs: 1500 }, testLogger);

    expect(handler.calculateDelay(0)).toBe(500);
    expect(handler.calculateDelay(1)).toBe(1000);
    expect(handler.calculateDelay(2)).toBe(1500);
  });
});
