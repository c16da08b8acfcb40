/**
 * Environment Variable Loader for STEM Tutor
 *
 * Loads and validates environment variables with type safety.
 * Values are read once at construction time by callers; nothing in the
 * request path reads the environment.
 */

import * as dotenv from 'dotenv';
import * as path from 'path';
import * as fs from 'fs';
import type { LogLevel } from '../logger.js';

// Load .env file if it exists
const envPath = path.resolve(process.cwd(), '.env');
if (fs.existsSync(envPath)) {
  dotenv.config({ path: envPath });
}

/**
 * Provider endpoint identities, keyed by capability
 */
export interface ProviderEndpoints {
  explainerUrl?: string;
  quizUrl?: string;
  searchUrl?: string;
  intentClassifierUrl?: string;
  subjectClassifierUrl?: string;
}

/**
 * Environment variable configuration
 */
export interface EnvConfig {
  providers: ProviderEndpoints;

  /** Bearer token sent to HTTP providers */
  providerToken?: string;

  providerTimeoutMs: number;
  retryDelayMs: number;

  /** Exponential weighting constant for proficiency updates */
  proficiencyAlpha: number;

  /** Number of prior turns passed to providers */
  contextTurns: number;

  /** Directory for file-backed sessions; in-memory store when unset */
  sessionsDir?: string;

  logLevel: LogLevel;
}

/**
 * Parse an integer environment variable
 */
function parseInteger(value: string | undefined, defaultValue: number): number {
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse a floating point environment variable
 */
function parseFloatValue(value: string | undefined, defaultValue: number): number {
  if (value === undefined) return defaultValue;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse an enum environment variable
 */
function parseEnum<T extends string>(
  value: string | undefined,
  validValues: readonly T[],
  defaultValue: T
): T {
  if (value === undefined) return defaultValue;
  const match = validValues.find((v) => v === value);
  return match ?? defaultValue;
}

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Load environment configuration
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return {
    providers: {
      explainerUrl: optional(env.STEM_TUTOR_EXPLAINER_URL),
      quizUrl: optional(env.STEM_TUTOR_QUIZ_URL),
      searchUrl: optional(env.STEM_TUTOR_SEARCH_URL),
      intentClassifierUrl: optional(env.STEM_TUTOR_INTENT_URL),
      subjectClassifierUrl: optional(env.STEM_TUTOR_SUBJECT_URL),
    },
    providerToken: optional(env.STEM_TUTOR_PROVIDER_TOKEN),

    providerTimeoutMs: parseInteger(env.STEM_TUTOR_PROVIDER_TIMEOUT_MS, 15000),
    retryDelayMs: parseInteger(env.STEM_TUTOR_RETRY_DELAY_MS, 500),

    proficiencyAlpha: parseFloatValue(env.STEM_TUTOR_PROFICIENCY_ALPHA, 0.3),
    contextTurns: parseInteger(env.STEM_TUTOR_CONTEXT_TURNS, 5),

    sessionsDir: optional(env.STEM_TUTOR_SESSIONS_DIR),

    logLevel: parseEnum<LogLevel>(
      env.STEM_TUTOR_LOG_LEVEL,
      ['error', 'warn', 'info', 'debug'],
      'info'
    ),
  };
}

/**
 * Validate environment configuration
 */
export function validateEnvConfig(config: EnvConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  // The explainer backs three of the five intents
  if (!config.providers.explainerUrl) {
    errors.push('STEM_TUTOR_EXPLAINER_URL is required');
  }

  for (const [key, url] of Object.entries(config.providers)) {
    if (url !== undefined && !/^https?:\/\//.test(url)) {
      errors.push(`Provider endpoint '${key}' must be an http(s) URL`);
    }
  }

  if (config.providerTimeoutMs <= 0 || config.providerTimeoutMs > 600000) {
    errors.push('STEM_TUTOR_PROVIDER_TIMEOUT_MS must be between 1 and 600000ms');
  }

  if (config.retryDelayMs < 0 || config.retryDelayMs > 60000) {
    errors.push('STEM_TUTOR_RETRY_DELAY_MS must be between 0 and 60000ms');
  }

  if (config.proficiencyAlpha <= 0 || config.proficiencyAlpha > 1) {
    errors.push('STEM_TUTOR_PROFICIENCY_ALPHA must be in (0, 1]');
  }

  if (config.contextTurns < 0) {
    errors.push('STEM_TUTOR_CONTEXT_TURNS must not be negative');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Cached environment configuration
 */
let cachedEnvConfig: EnvConfig | null = null;

/**
 * Get cached environment configuration
 */
export function getEnvConfig(): EnvConfig {
  if (!cachedEnvConfig) {
    cachedEnvConfig = loadEnvConfig();
  }
  return cachedEnvConfig;
}

/**
 * Reload environment configuration (useful for testing)
 */
export function reloadEnvConfig(): EnvConfig {
  cachedEnvConfig = loadEnvConfig();
  return cachedEnvConfig;
}
