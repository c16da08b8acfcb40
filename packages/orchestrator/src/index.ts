// ============================================================================
// @stem-tutor/orchestrator - Message routing and response merging
// ============================================================================

export { Orchestrator, createOrchestrator, findActiveQuiz, MAX_MESSAGE_LENGTH } from './orchestrator.js';
export { RequestLifecycle, LifecycleError } from './lifecycle.js';
export type { TransitionListener } from './lifecycle.js';
export { RetryHandler, DEFAULT_RETRY_CONFIG } from './retry-handler.js';
export {
  selectRoute,
  capabilitiesFor,
  parseQuestionCount,
  DEFAULT_QUESTION_COUNT,
  MAX_QUESTION_COUNT,
} from './routing.js';
export {
  buildMemorySummary,
  buildPriorContext,
  fallbackGreeting,
  EMPTY_MEMORY_SUMMARY,
  DEFAULT_CONTEXT_TURNS,
  DEFAULT_MEMORY_SUMMARY_TURNS,
} from './context.js';
export { extractCitations, extractQuizItems, extractGrade } from './merge.js';

export { REQUEST_STATES } from './types.js';
export type {
  TutorRequest,
  QuizAnswerRequest,
  TutorReply,
  WelcomeReply,
  RequestState,
  RoutePlan,
  RetryConfig,
  OrchestratorConfig,
  OrchestratorEvent,
} from './types.js';
