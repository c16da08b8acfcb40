// ============================================================================
// @stem-tutor/classifier - Intent and Subject classification
// ============================================================================

export type {
  IntentClassification,
  SubjectClassification,
  IntentClassifier,
  SubjectClassifier,
  TriggeredIntent,
  KeywordIntentClassifierConfig,
  SubjectKeywordTable,
  ProviderClassifierOptions,
} from './types.js';

export {
  KeywordIntentClassifier,
  INTENT_PRECEDENCE,
} from './keyword-intent-classifier.js';

export {
  KeywordSubjectClassifier,
  loadSubjectKeywords,
} from './keyword-subject-classifier.js';

export {
  ProviderIntentClassifier,
  ProviderSubjectClassifier,
  parseJsonObject,
  DEFAULT_MIN_SUBJECT_CONFIDENCE,
} from './provider-classifiers.js';
