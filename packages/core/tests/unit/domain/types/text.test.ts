import { describe, it, expect } from 'vitest';
import { checkPassword, checkStr, checkUuid, textTypes } from '../../../../src/domain/types/text.js';

describe('text types', () => {
  it('should accept any defined string for str', () => {
    expect(checkStr('')).toBe(0);
    expect(checkStr(undefined)).toBe('Value is not defined');
  });

  it('should trim str but keep text as is', () => {
    const types = textTypes(8);
    expect(types['str']?.pre?.('  hello ')).toBe('hello');
    expect(types['text']?.pre).toBeUndefined();
  });

  describe('password', () => {
    it('should enforce the minimum length', () => {
      expect(checkPassword('abc123', 8)).toBe('The length should be greater than 8');
    });

    it('should require both digits and other characters', () => {
      expect(checkPassword('abcdefgh', 8)).toBe('Value must contain characters and digits');
      expect(checkPassword('12345678', 8)).toBe('Value must contain characters and digits');
      expect(checkPassword('abcd1234', 8)).toBe(0);
    });

    it('should use the configured minimum', () => {
      const valid = textTypes(4)['password']?.valid;
      expect(valid?.('ab12')).toBe(0);
    });
  });

  describe('uuid', () => {
    it('should accept dashed and undashed forms', () => {
      expect(checkUuid('550e8400-e29b-41d4-a716-446655440000')).toBe(0);
      expect(checkUuid('550e8400e29b41d4a716446655440000')).toBe(0);
      expect(checkUuid('xyz')).toBe('Wrong format');
    });

    it('should lower-case the output', () => {
      const uuid = textTypes(8)['uuid'];
      expect(uuid?.post?.('550E8400-E29B-41D4-A716-446655440000')).toBe('550e8400-e29b-41d4-a716-446655440000');
    });
  });
});
