// ============================================================================
// Capability Provider Types
// ============================================================================

import type { Logger, ProviderRequest, ProviderResponse } from '@stem-tutor/shared';

/**
 * Uniform contract for any external capability (explainer, quiz generator,
 * web search, classifiers). Implementations must stop work when the signal
 * aborts.
 */
export interface CapabilityProvider {
  readonly name: string;
  invoke(request: ProviderRequest, signal: AbortSignal): Promise<ProviderResponse>;
}

/**
 * Handler backing a StaticCapabilityProvider
 */
export type ProviderHandler = (
  request: ProviderRequest,
  signal: AbortSignal
) => ProviderResponse | Promise<ProviderResponse>;

export interface HttpProviderConfig {
  /** Logical capability name, used in errors and logs */
  capability: string;

  /** Endpoint receiving the request as a JSON POST */
  url: string;

  /** Sent as a Bearer token when set */
  token?: string;

  headers?: Record<string, string>;
}

export interface ProviderInvokerOptions {
  /** Timeout applied to capabilities without an override (default 15000) */
  defaultTimeoutMs?: number;

  /** Per-capability timeout overrides */
  timeouts?: Partial<Record<string, number>>;

  logger?: Logger;
}
