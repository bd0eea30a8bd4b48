import { describe, it, expect } from 'vitest';
import { validateIdentifier, assertIdentifier, MAX_IDENTIFIER_LENGTH } from '../validate.js';
import { ArchiveError, ArchiveErrorKind } from '../../errors/error.js';

describe('validateIdentifier', () => {
  it('should accept letters, digits, underscore, dash and dot', () => {
    expect(validateIdentifier('a')).toBe(true);
    expect(validateIdentifier('7')).toBe(true);
    expect(validateIdentifier('my_item-2024.v1')).toBe(true);
    expect(validateIdentifier('Test_Item')).toBe(true);
  });

  it('should accept identifiers of exactly the maximum length', () => {
    expect(validateIdentifier('a'.repeat(MAX_IDENTIFIER_LENGTH))).toBe(true);
  });

  it('should reject the empty string', () => {
    expect(validateIdentifier('')).toBe(false);
  });

  it('should reject identifiers longer than the maximum', () => {
    expect(validateIdentifier('a'.repeat(MAX_IDENTIFIER_LENGTH + 1))).toBe(false);
  });

  it.each(['_item', '-item', '.item'])('should reject %s for its first character', (identifier) => {
    expect(validateIdentifier(identifier)).toBe(false);
  });

  it.each(['my item', 'item/sub', 'item+1', 'item:2', 'ítem', 'item\n'])(
    'should reject %j for a character outside the allowed set',
    (identifier) => {
      expect(validateIdentifier(identifier)).toBe(false);
    }
  );
});

describe('assertIdentifier', () => {
  it('should pass for valid identifiers', () => {
    expect(() => assertIdentifier('valid-item')).not.toThrow();
  });

  it('should throw InvalidIdentifier carrying the identifier', () => {
    try {
      assertIdentifier('bad item');
      expect.unreachable('assertIdentifier should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ArchiveError);
      if (error instanceof ArchiveError) {
        expect(error.kind).toBe(ArchiveErrorKind.InvalidIdentifier);
        expect(error.details).toEqual({ identifier: 'bad item' });
        expect(error.message).toBe('Invalid item identifier: "bad item"');
      }
    }
  });
});
