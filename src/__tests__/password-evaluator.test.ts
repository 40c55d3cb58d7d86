/**
 * Unit tests for PasswordEvaluator
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { PasswordEvaluator, checkPassword, countCharacters, evaluatePassword } from '../evaluator/password-evaluator.js';
import { createMessageLookup, describeRejection, DEFAULT_MESSAGES } from '../evaluator/messages.js';
import { WordlistRegistry } from '../registry/wordlist-registry.js';
import { getDefaultRegistry, resetDefaultRegistry } from '../registry/default-registry.js';

describe('PasswordEvaluator', () => {
  let registry: WordlistRegistry;
  let evaluator: PasswordEvaluator;

  beforeEach(() => {
    registry = new WordlistRegistry({ defaultSource: () => ['p@$$w0rd', 'qwerty123'] });
    evaluator = new PasswordEvaluator({ registry });
  });

  describe('Length', () => {
    it('should reject passwords shorter than the default minimum', () => {
      expect(evaluator.evaluate('short')).toEqual({
        status: 'rejected',
        reason: { kind: 'too_short', minimum: 8, actual: 5 },
      });
    });

    it('should report too_short before checking content', () => {
      expect(evaluator.evaluate('aaa', { minLength: 4 })).toEqual({
        status: 'rejected',
        reason: { kind: 'too_short', minimum: 4, actual: 3 },
      });
    });

    it('should accept a password exactly at the minimum', () => {
      expect(evaluator.evaluate('Tr0ub4d!')).toEqual({ status: 'accepted', password: 'Tr0ub4d!' });
    });

    it('should prefer the per-call minimum over the evaluator default', () => {
      const strict = new PasswordEvaluator({ registry, minLength: 16 });
      expect(strict.evaluate('Tr0ub4dor&3x')).toEqual({
        status: 'rejected',
        reason: { kind: 'too_short', minimum: 16, actual: 12 },
      });
      expect(strict.evaluate('Tr0ub4dor&3x', { minLength: 10 }).status).toBe('accepted');
      expect(strict.getMinLength()).toBe(16);
    });

    it('should count characters, not UTF-16 code units', () => {
      expect(evaluator.evaluate('🔑🔒🚪🔐🧱🎲🎯')).toEqual({
        status: 'rejected',
        reason: { kind: 'too_short', minimum: 8, actual: 7 },
      });
    });

    it('should count a letter and its combining accent as one character', () => {
      const accented = 'a\u0301b\u0301c\u0301d\u0301e\u0301f\u0301g\u0301';
      expect(countCharacters(accented)).toBe(7);
      expect(evaluator.evaluate(accented)).toEqual({
        status: 'rejected',
        reason: { kind: 'too_short', minimum: 8, actual: 7 },
      });
    });

    it('should report an empty password as too short', () => {
      expect(evaluator.evaluate('')).toEqual({
        status: 'rejected',
        reason: { kind: 'too_short', minimum: 8, actual: 0 },
      });
    });
  });

  describe('Weak Passwords', () => {
    it('should reject a listed password', () => {
      expect(evaluator.evaluate('p@$$w0rd')).toEqual({
        status: 'rejected',
        reason: { kind: 'weak_password' },
      });
    });

    it('should reject a listed password in any case', () => {
      expect(evaluator.evaluate('QWERTY123').status).toBe('rejected');
    });

    it('should reject a trivially repetitive password', () => {
      expect(evaluator.evaluate('abcabcabcabc')).toEqual({
        status: 'rejected',
        reason: { kind: 'weak_password' },
      });
    });

    it('should see lists pushed after construction', () => {
      registry.add('extra', ['sparebutton']);
      expect(evaluator.evaluate('sparebutton').status).toBe('rejected');
    });
  });

  describe('Accepted Passwords', () => {
    it('should return the original, non-lowercased password', () => {
      expect(evaluator.evaluate('SpareButton')).toEqual({ status: 'accepted', password: 'SpareButton' });
    });

    it('should accept a long unit repeated only once', () => {
      expect(evaluator.evaluate('abcdefghiabcdefghi').status).toBe('accepted');
    });
  });

  describe('Push and Pop', () => {
    it('should follow list changes end to end', () => {
      expect(evaluator.evaluate('p@$$w0rd', { minLength: 8 }).status).toBe('rejected');

      registry.add('extra', ['sparebutton']);
      expect(evaluator.evaluate('sparebutton', { minLength: 8 })).toEqual({
        status: 'rejected',
        reason: { kind: 'weak_password' },
      });

      registry.remove('extra');
      expect(evaluator.evaluate('sparebutton', { minLength: 8 })).toEqual({
        status: 'accepted',
        password: 'sparebutton',
      });
    });
  });
});

describe('Rejection Messages', () => {
  it('should interpolate the minimum length', () => {
    const message = describeRejection({
      status: 'rejected',
      reason: { kind: 'too_short', minimum: 12, actual: 3 },
    });
    expect(message).toBe('The password should be at least 12 characters long.');
  });

  it('should describe weak passwords', () => {
    expect(describeRejection({ status: 'rejected', reason: { kind: 'weak_password' } })).toBe(
      DEFAULT_MESSAGES.weak_password
    );
  });

  it('should return null for accepted results', () => {
    expect(describeRejection({ status: 'accepted', password: 'SpareButton' })).toBeNull();
  });

  it('should use caller-supplied templates', () => {
    const lookup = createMessageLookup({
      too_short: 'Mindestens {minimum} Zeichen.',
      weak_password: 'Zu leicht zu erraten.',
    });
    expect(lookup({ kind: 'too_short', minimum: 10, actual: 2 })).toBe('Mindestens 10 Zeichen.');
    expect(lookup({ kind: 'weak_password' })).toBe('Zu leicht zu erraten.');
  });
});

describe('Default Registry Helpers', () => {
  beforeEach(() => {
    resetDefaultRegistry();
  });

  afterEach(() => {
    resetDefaultRegistry();
  });

  it('should reject bundled weak passwords', () => {
    expect(evaluatePassword('p@$$w0rd', { minLength: 8 })).toEqual({
      status: 'rejected',
      reason: { kind: 'weak_password' },
    });
  });

  it('should pick up lists pushed to the shared registry', () => {
    getDefaultRegistry().add('extra_wordlist.txt', ['sparebutton']);
    expect(evaluatePassword('sparebutton').status).toBe('rejected');

    getDefaultRegistry().remove('extra_wordlist.txt');
    expect(evaluatePassword('sparebutton')).toEqual({ status: 'accepted', password: 'sparebutton' });
  });

  it('should start with only the default list', () => {
    expect(getDefaultRegistry().listKeys()).toEqual(['common_passwords.txt']);
  });

  it('should return the same instance until reset', () => {
    const first = getDefaultRegistry();
    expect(getDefaultRegistry()).toBe(first);
    resetDefaultRegistry();
    expect(getDefaultRegistry()).not.toBe(first);
  });

  describe('checkPassword', () => {
    it('should return ok with the password', () => {
      expect(checkPassword('Correct-Horse-9')).toEqual({ ok: true, password: 'Correct-Horse-9' });
    });

    it('should return the too-short message', () => {
      expect(checkPassword('abc', { minLength: 6 })).toEqual({
        ok: false,
        message: 'The password should be at least 6 characters long.',
      });
    });

    it('should return the weak-password message', () => {
      expect(checkPassword('qwerty123')).toEqual({
        ok: false,
        message: DEFAULT_MESSAGES.weak_password,
      });
    });

    it('should use a custom message lookup', () => {
      const result = checkPassword('password', { messages: () => 'nope' });
      expect(result).toEqual({ ok: false, message: 'nope' });
    });
  });
});
