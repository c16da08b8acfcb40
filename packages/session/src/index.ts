// ============================================================================
// @stem-tutor/session - Per-student Session Store
// Append-only turn history, proficiency tracking and transcript export
// ============================================================================

// Types
export type { SessionStore, SessionStoreOptions, TranscriptFormat } from './types.js';

// Stores
export {
  BaseSessionStore,
  InMemorySessionStore,
  createInMemorySessionStore,
} from './session-store.js';
export { FileSessionStore, createFileSessionStore } from './file-session-store.js';

// Building blocks
export { KeyedLock } from './keyed-lock.js';
export {
  applyProficiencyUpdate,
  difficultyFor,
  BASELINE_PROFICIENCY,
  DEFAULT_ALPHA,
} from './proficiency.js';
export {
  encodeSession,
  decodeSession,
  SessionDecodeError,
  SESSION_FORMAT_VERSION,
} from './session-codec.js';
export { renderTranscript, formatProficiency } from './transcript.js';
