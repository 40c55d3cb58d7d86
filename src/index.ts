/**
 * Password Gate - Main Entry Point
 *
 * Rejects weak passwords: too short, trivially repetitive, or present in a
 * known-weak word list.
 */

// Registry Module
export {
  WordlistRegistry,
  getDefaultRegistry,
  resetDefaultRegistry,
  BUNDLED_WORDLIST_PATH,
  DEFAULT_WORDLIST_KEY,
  loadBundledWordlist,
  normalizeWords,
  pushWordlistFile,
  readWordlistLines,
} from './registry/index.js';
export type {
  RegistryHealth,
  RegistrySnapshot,
  WordlistInfo,
  WordlistRegistryOptions,
  WordSet,
  WordSource,
} from './registry/index.js';

// Scanner Module
export { isTrivialRepetition, MAX_CORE_LENGTH, MIN_REPEATS } from './scanner/index.js';

// Evaluator Module
export {
  PasswordEvaluator,
  evaluatePassword,
  checkPassword,
  countCharacters,
  DEFAULT_MESSAGES,
  createMessageLookup,
  defaultMessageLookup,
  describeRejection,
} from './evaluator/index.js';
export type {
  EvaluateOptions,
  EvaluationResult,
  MessageLookup,
  MessageTemplates,
  PasswordCheck,
  PasswordEvaluatorConfig,
  RejectionKind,
  RejectionReason,
} from './evaluator/index.js';

// Admin Module
export { AdminServer, DEFAULT_ADMIN_CONFIG } from './admin/server.js';
export type { AdminServerConfig } from './admin/server.js';

// Shared
export { loadConfig, DEFAULT_GATE_CONFIG, DEFAULT_MIN_LENGTH } from './shared/config.js';
export type { GateConfig } from './shared/config.js';
export { GateError, GateErrorCode, wrapError } from './shared/errors.js';

// Version
export const VERSION = '0.1.0';
