// ============================================================================
// @stem-tutor/providers - Capability providers
// ============================================================================

export type {
  CapabilityProvider,
  ProviderHandler,
  HttpProviderConfig,
  ProviderInvokerOptions,
} from './types.js';

export { ProviderRegistry, createRegistryFromEnv } from './registry.js';
export { ProviderInvoker, DEFAULT_PROVIDER_TIMEOUT_MS } from './invoker.js';
export { HttpCapabilityProvider, parseProviderResponse } from './http-provider.js';
export { StaticCapabilityProvider } from './static-provider.js';
