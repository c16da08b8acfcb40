// ============================================================================
// Provider Invoker - timeout-bounded capability calls
// ============================================================================

import { ProviderUnavailableError, errorMessage, noopLogger } from '@stem-tutor/shared';
import type { Logger, ProviderRequest, ProviderResponse } from '@stem-tutor/shared';
import type { ProviderRegistry } from './registry.js';
import type { ProviderInvokerOptions } from './types.js';

export const DEFAULT_PROVIDER_TIMEOUT_MS = 15000;

/**
 * Invokes providers through the registry. Every call is bounded by a timeout;
 * on expiry the provider's signal is aborted, the call fails with
 * ProviderUnavailableError and whatever the provider returns afterwards is
 * dropped.
 */
export class ProviderInvoker {
  private registry: ProviderRegistry;
  private defaultTimeoutMs: number;
  private timeouts: Partial<Record<string, number>>;
  private logger: Logger;

  constructor(registry: ProviderRegistry, options: ProviderInvokerOptions = {}) {
    this.registry = registry;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
    this.timeouts = options.timeouts ?? {};
    this.logger = options.logger ?? noopLogger;
  }

  timeoutFor(capability: string): number {
    return this.timeouts[capability] ?? this.defaultTimeoutMs;
  }

  async invoke(request: ProviderRequest): Promise<ProviderResponse> {
    const { capability } = request;
    const provider = this.registry.get(capability);
    const timeoutMs = this.timeoutFor(capability);
    const controller = new AbortController();
    const startTime = Date.now();
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;

    const timeoutPromise = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        timedOut = true;
        controller.abort();
        reject(new ProviderUnavailableError(capability, `timed out after ${timeoutMs}ms`, true));
      }, timeoutMs);
    });

    const call = Promise.resolve().then(() => provider.invoke(request, controller.signal));

    // Anything settling after the deadline is logged and dropped
    call.then(
      () => {
        if (timedOut) {
          this.logger.debug('Discarding late provider result', {
            capability,
            provider: provider.name,
            elapsedMs: Date.now() - startTime,
          });
        }
      },
      (error: unknown) => {
        if (timedOut) {
          this.logger.debug('Ignoring late provider failure', {
            capability,
            provider: provider.name,
            error: errorMessage(error),
          });
        }
      }
    );

    this.logger.debug(`Invoking ${capability}`, { provider: provider.name, timeoutMs });

    try {
      const response = await Promise.race([call, timeoutPromise]);
      this.logger.debug(`${capability} responded`, {
        provider: provider.name,
        durationMs: Date.now() - startTime,
      });
      return response;
    } catch (error) {
      this.logger.warn(`Provider ${capability} failed`, {
        provider: provider.name,
        timedOut,
        error: errorMessage(error),
      });
      if (error instanceof ProviderUnavailableError) {
        throw error;
      }
      throw new ProviderUnavailableError(capability, errorMessage(error));
    } finally {
      clearTimeout(timer);
    }
  }
}
