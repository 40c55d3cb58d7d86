/**
 * Smoke tests for the package entry point
 */

import { describe, it, expect } from 'vitest';
import {
  PasswordEvaluator,
  WordlistRegistry,
  describeRejection,
  isTrivialRepetition,
  DEFAULT_WORDLIST_KEY,
  VERSION,
} from '../index.js';

describe('Public API', () => {
  it('should expose the version', () => {
    expect(VERSION).toBe('0.1.0');
  });

  it('should wire registry, detector and evaluator together', () => {
    const registry = new WordlistRegistry({ defaultSource: () => ['letmein123'] });
    const evaluator = new PasswordEvaluator({ registry, minLength: 10 });

    expect(registry.listKeys()).toEqual([DEFAULT_WORDLIST_KEY]);
    expect(isTrivialRepetition('zzzzzzzzzz')).toBe(true);
    expect(evaluator.evaluate('LetMeIn123')).toEqual({
      status: 'rejected',
      reason: { kind: 'weak_password' },
    });
    expect(describeRejection(evaluator.evaluate('tiny'))).toBe(
      'The password should be at least 10 characters long.'
    );
  });
});
