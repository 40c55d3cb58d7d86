/**
 * Evaluator Module Types
 */

import type { WordlistRegistry } from '../registry/wordlist-registry.js';

/** Why a password was rejected. */
export type RejectionReason =
  | { kind: 'too_short'; minimum: number; actual: number }
  | { kind: 'weak_password' };

export type RejectionKind = RejectionReason['kind'];

/** Outcome of evaluating one password. */
export type EvaluationResult =
  | { status: 'accepted'; password: string }
  | { status: 'rejected'; reason: RejectionReason };

export interface EvaluateOptions {
  /** Minimum length in characters. Overrides the evaluator default. */
  minLength?: number;
}

export interface PasswordEvaluatorConfig {
  /** Word lists to check against. */
  registry: WordlistRegistry;
  /** Default minimum length. Default: 8 */
  minLength?: number;
}

/** Result shape of checkPassword. */
export type PasswordCheck =
  | { ok: true; password: string }
  | { ok: false; message: string };
