/**
 * Evaluator Module - Public API
 */

export { PasswordEvaluator, evaluatePassword, checkPassword, countCharacters, default } from './password-evaluator.js';
export {
  DEFAULT_MESSAGES,
  createMessageLookup,
  defaultMessageLookup,
  describeRejection,
} from './messages.js';
export type { MessageLookup, MessageTemplates } from './messages.js';
export type {
  EvaluateOptions,
  EvaluationResult,
  PasswordCheck,
  PasswordEvaluatorConfig,
  RejectionKind,
  RejectionReason,
} from './types.js';
