/**
 * PasswordEvaluator - accept/reject decision for a single password.
 *
 * Checks, in order:
 * - minimum length
 * - trivial repetition (e.g. `abcabcabcabc`)
 * - membership in any registered word list
 *
 * Usage:
 *   const evaluator = new PasswordEvaluator({ registry });
 *   const result = evaluator.evaluate('hunter2hunter2');
 *   if (result.status === 'rejected') {
 *     // result.reason.kind is 'too_short' or 'weak_password'
 *   }
 */

import { DEFAULT_MIN_LENGTH } from '../shared/config.js';
import { getDefaultRegistry } from '../registry/default-registry.js';
import type { WordlistRegistry } from '../registry/wordlist-registry.js';
import { isTrivialRepetition } from '../scanner/repetition-detector.js';
import { defaultMessageLookup, type MessageLookup } from './messages.js';
import type { EvaluateOptions, EvaluationResult, PasswordCheck, PasswordEvaluatorConfig } from './types.js';

const segmenter = new Intl.Segmenter();

/** Length in user-perceived characters (grapheme clusters). */
export function countCharacters(password: string): number {
  return [...segmenter.segment(password)].length;
}

export class PasswordEvaluator {
  private readonly registry: WordlistRegistry;
  private readonly minLength: number;

  constructor(config: PasswordEvaluatorConfig) {
    this.registry = config.registry;
    this.minLength = config.minLength ?? DEFAULT_MIN_LENGTH;
  }

  evaluate(password: string, options: EvaluateOptions = {}): EvaluationResult {
    const minimum = options.minLength ?? this.minLength;
    const actual = countCharacters(password);

    if (actual < minimum) {
      return { status: 'rejected', reason: { kind: 'too_short', minimum, actual } };
    }

    if (this.isEasyGuess(password)) {
      return { status: 'rejected', reason: { kind: 'weak_password' } };
    }

    return { status: 'accepted', password };
  }

  getMinLength(): number {
    return this.minLength;
  }

  private isEasyGuess(password: string): boolean {
    const key = password.toLowerCase();
    return isTrivialRepetition(key) || this.registry.query(key);
  }
}

/** Evaluates against the process-wide registry. */
export function evaluatePassword(password: string, options: EvaluateOptions = {}): EvaluationResult {
  return new PasswordEvaluator({ registry: getDefaultRegistry() }).evaluate(password, options);
}

/**
 * Evaluates against the process-wide registry and renders the rejection
 * message.
 */
export function checkPassword(
  password: string,
  options: EvaluateOptions & { messages?: MessageLookup } = {}
): PasswordCheck {
  const result = evaluatePassword(password, options);
  if (result.status === 'accepted') {
    return { ok: true, password: result.password };
  }
  const lookup = options.messages ?? defaultMessageLookup;
  return { ok: false, message: lookup(result.reason) };
}

export default PasswordEvaluator;
