import type { ProviderRequest, ProviderResponse } from '@stem-tutor/shared';
import type { CapabilityProvider, ProviderHandler } from './types.js';

/**
 * Provider answering from a local handler function
 */
export class StaticCapabilityProvider implements CapabilityProvider {
  constructor(
    readonly name: string,
    private readonly handler: ProviderHandler
  ) {}

  async invoke(request: ProviderRequest, signal: AbortSignal): Promise<ProviderResponse> {
    return this.handler(request, signal);
  }
}
