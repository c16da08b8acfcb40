// ============================================================================
// Provider Registry - capability name to provider
// ============================================================================

import { CAPABILITIES, ProviderUnavailableError, noopLogger } from '@stem-tutor/shared';
import type { EnvConfig, Logger } from '@stem-tutor/shared';
import { HttpCapabilityProvider } from './http-provider.js';
import type { CapabilityProvider } from './types.js';

export class ProviderRegistry {
  private providers: Map<string, CapabilityProvider> = new Map();
  private logger: Logger;

  constructor(logger: Logger = noopLogger) {
    this.logger = logger;
  }

  /**
   * Register a provider for a capability, replacing any existing one
   */
  register(capability: string, provider: CapabilityProvider): this {
    if (this.providers.has(capability)) {
      this.logger.warn(`Replacing provider for ${capability}`, {
        previous: this.providers.get(capability)?.name,
        next: provider.name,
      });
    }
    this.providers.set(capability, provider);
    this.logger.debug(`Registered provider for ${capability}`, { provider: provider.name });
    return this;
  }

  has(capability: string): boolean {
    return this.providers.has(capability);
  }

  /**
   * Look up the provider for a capability
   * @throws ProviderUnavailableError when nothing is registered
   */
  get(capability: string): CapabilityProvider {
    const provider = this.providers.get(capability);
    if (!provider) {
      throw new ProviderUnavailableError(capability, 'no provider registered');
    }
    return provider;
  }

  list(): string[] {
    return [...this.providers.keys()].sort();
  }
}

/**
 * Build a registry of HTTP providers from the configured endpoints.
 * Capabilities without an endpoint are left unregistered.
 */
export function createRegistryFromEnv(config: EnvConfig, logger: Logger = noopLogger): ProviderRegistry {
  const registry = new ProviderRegistry(logger);
  const endpoints: Array<[string, string | undefined]> = [
    [CAPABILITIES.CONCEPT_EXPLAINER, config.providers.explainerUrl],
    [CAPABILITIES.QUIZ_GENERATOR, config.providers.quizUrl],
    [CAPABILITIES.WEB_SEARCH, config.providers.searchUrl],
    [CAPABILITIES.INTENT_CLASSIFIER, config.providers.intentClassifierUrl],
    [CAPABILITIES.SUBJECT_CLASSIFIER, config.providers.subjectClassifierUrl],
  ];

  for (const [capability, url] of endpoints) {
    if (url) {
      registry.register(
        capability,
        new HttpCapabilityProvider({ capability, url, token: config.providerToken })
      );
    }
  }

  return registry;
}
