/**
 * Rejection messages.
 *
 * The evaluator only returns reason tags; turning them into display text is
 * a capability the caller supplies. DEFAULT_MESSAGES is the English set.
 */

import type { EvaluationResult, RejectionKind, RejectionReason } from './types.js';

/** Maps a rejection reason to display text. */
export type MessageLookup = (reason: RejectionReason) => string;

/** Message templates keyed by reason. `{minimum}` is interpolated for too_short. */
export type MessageTemplates = Record<RejectionKind, string>;

export const DEFAULT_MESSAGES: MessageTemplates = {
  too_short: 'The password should be at least {minimum} characters long.',
  weak_password:
    'The password you have chosen is weak because it is easy to guess. Please choose another one.',
};

export function createMessageLookup(templates: MessageTemplates = DEFAULT_MESSAGES): MessageLookup {
  return (reason) => {
    switch (reason.kind) {
      case 'too_short':
        return templates.too_short.replace(/\{minimum\}/g, String(reason.minimum));
      case 'weak_password':
        return templates.weak_password;
    }
  };
}

export const defaultMessageLookup: MessageLookup = createMessageLookup();

/** Display text for a rejected result, null when accepted. */
export function describeRejection(
  result: EvaluationResult,
  lookup: MessageLookup = defaultMessageLookup
): string | null {
  return result.status === 'rejected' ? lookup(result.reason) : null;
}
