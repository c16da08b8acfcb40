// ============================================================================
// STEM Tutor CLI - Runtime wiring
// ============================================================================

import { CAPABILITIES, createLogger } from '@stem-tutor/shared';
import type { EnvConfig, Logger } from '@stem-tutor/shared';
import { FileSessionStore, InMemorySessionStore } from '@stem-tutor/session';
import type { SessionStore } from '@stem-tutor/session';
import { ProviderInvoker, ProviderRegistry, createRegistryFromEnv } from '@stem-tutor/providers';
import {
  KeywordIntentClassifier,
  KeywordSubjectClassifier,
  ProviderIntentClassifier,
  ProviderSubjectClassifier,
} from '@stem-tutor/classifier';
import type { IntentClassifier, SubjectClassifier } from '@stem-tutor/classifier';
import { createOrchestrator } from '@stem-tutor/orchestrator';
import type { Orchestrator } from '@stem-tutor/orchestrator';
import { registerDemoProviders } from './demo-providers.js';

export interface TutorRuntimeOptions {
  /** Serve every capability from canned in-process providers */
  demo?: boolean;

  /** Overrides STEM_TUTOR_SESSIONS_DIR */
  sessionsDir?: string;

  logger?: Logger;
}

export interface TutorRuntime {
  config: EnvConfig;
  logger: Logger;
  store: SessionStore;
  registry: ProviderRegistry;
  orchestrator: Orchestrator;
}

/**
 * Build the store, providers, classifiers and orchestrator from configuration.
 * Classification falls back to keyword matching when no classifier endpoint is set.
 */
export function createTutorRuntime(config: EnvConfig, options: TutorRuntimeOptions = {}): TutorRuntime {
  // Logs go to stderr so they never interleave with tutor replies
  const logger = options.logger ?? createLogger({ level: config.logLevel, service: 'stem-tutor', stderr: true });

  const sessionsDir = options.sessionsDir ?? config.sessionsDir;
  const storeOptions = { alpha: config.proficiencyAlpha, logger };
  const store: SessionStore = sessionsDir
    ? new FileSessionStore(sessionsDir, storeOptions)
    : new InMemorySessionStore(storeOptions);

  const registry = options.demo
    ? registerDemoProviders(new ProviderRegistry(logger))
    : createRegistryFromEnv(config, logger);
  const invoker = new ProviderInvoker(registry, { defaultTimeoutMs: config.providerTimeoutMs, logger });

  const intentClassifier: IntentClassifier = registry.has(CAPABILITIES.INTENT_CLASSIFIER)
    ? new ProviderIntentClassifier(invoker, { logger })
    : new KeywordIntentClassifier();
  const subjectClassifier: SubjectClassifier = registry.has(CAPABILITIES.SUBJECT_CLASSIFIER)
    ? new ProviderSubjectClassifier(invoker, { logger })
    : new KeywordSubjectClassifier();

  const orchestrator = createOrchestrator({
    logger,
    store,
    invoker,
    intentClassifier,
    subjectClassifier,
    retry: { baseDelayMs: config.retryDelayMs },
    contextTurns: config.contextTurns,
  });

  logger.debug('Tutor runtime ready', {
    store: sessionsDir ? 'file' : 'memory',
    providers: registry.list(),
    demo: options.demo ?? false,
  });

  return { config, logger, store, registry, orchestrator };
}
