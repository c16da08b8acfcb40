// ============================================================================
// @stem-tutor/shared
// Common types used across all tutor packages
// ============================================================================

export {
  INTENTS,
  SUBJECTS,
  CAPABILITIES,
  ERROR_KINDS,
  isIntent,
  isSubject,
  isClassifiedSubject,
  noopLogger,
} from './types.js';

export type {
  Intent,
  Subject,
  ClassifiedSubject,
  Message,
  Citation,
  Difficulty,
  QuizItem,
  QuizMetadata,
  ResponseMetadata,
  TurnResponse,
  Turn,
  NewTurn,
  Session,
  CapabilityName,
  PriorContextEntry,
  ProviderRequest,
  ProviderResponse,
  ErrorKind,
  Logger,
} from './types.js';

export {
  TutorError,
  InvalidInputError,
  ClassificationUnavailableError,
  AmbiguousRoutingError,
  ProviderUnavailableError,
  PersistenceFailureError,
  isTutorError,
  describeError,
  errorMessage,
} from './errors.js';

export { WinstonLogger, createLogger } from './logger.js';
export type { LogLevel, WinstonLoggerOptions } from './logger.js';

export {
  loadEnvConfig,
  validateEnvConfig,
  getEnvConfig,
  reloadEnvConfig,
} from './config/env-loader.js';
export type { EnvConfig, ProviderEndpoints } from './config/env-loader.js';
