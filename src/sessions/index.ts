/**
 * Session persistence and the per-turn lifecycle
 */

export {
  BusinessProfileSchema,
  ConversationMessageSchema,
  SessionExportSchema,
  SessionIdSchema,
  SessionMetadataSchema,
  SessionStateSchema,
  type ConversationMessage,
  type IntakeSession,
  type SessionExport,
  type SessionMetadata,
  type SessionState,
} from "./types.js";

export {
  SessionStore,
  createSessionStore,
  generateTitle,
  toMetadata,
  type SessionStoreConfig,
} from "./storage.js";

export {
  IntakeLifecycle,
  type IntakeLifecycleOptions,
  type TurnInput,
  type TurnResult,
} from "./lifecycle.js";
