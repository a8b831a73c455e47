import { describe, it, expect } from '@jest/globals';
import { ValidationError } from '../../src/errors/validation-error';
import { IdentifierSchema, SessionKeySchema, ensurePositiveInteger } from '../../src/validation/common';

describe('validation/common', () => {
  describe('IdentifierSchema', () => {
    it.each(['hello-agent', 'session_1', 'v1.2', '42'])('accepts %s', (value) => {
      expect(IdentifierSchema.safeParse(value).success).toBe(true);
    });

    it.each(['', '../up', 'a/b', '.hidden', 'a..b', 'with space'])('rejects %j', (value) => {
      expect(IdentifierSchema.safeParse(value).success).toBe(false);
    });

    it('caps the length', () => {
      expect(IdentifierSchema.safeParse('a'.repeat(129)).success).toBe(false);
    });
  });

  describe('SessionKeySchema', () => {
    it('accepts agent and session ids', () => {
      expect(SessionKeySchema.parse({ agentId: 'a', sessionId: 'b' })).toEqual({
        agentId: 'a',
        sessionId: 'b',
      });
    });

    it('rejects unknown fields', () => {
      expect(SessionKeySchema.safeParse({ agentId: 'a', sessionId: 'b', extra: 1 }).success).toBe(false);
    });
  });

  describe('ensurePositiveInteger', () => {
    it('passes positive integers through', () => {
      expect(ensurePositiveInteger(3, 'maxIterations')).toBe(3);
    });

    it.each([0, -1, 1.5, Number.NaN])('rejects %p', (value) => {
      expect(() => ensurePositiveInteger(value, 'maxIterations')).toThrow(ValidationError);
    });
  });
});
