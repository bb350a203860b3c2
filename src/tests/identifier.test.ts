import { isValidIdentifier, validateIdentifier } from '../utils/identifier';
import { ValidationError } from '../utils/errors';

describe('identifier validation', () => {
  it.each(['nasa', 'abc', 'my_item-2024', 'A'.repeat(80), 'x-_'])('accepts %s', identifier => {
    expect(isValidIdentifier(identifier)).toBe(true);
    expect(validateIdentifier(identifier)).toBe(identifier);
  });

  it.each(['ab', 'A'.repeat(81), 'has space', 'dot.ted', 'slash/item', 'ümlaut', ''])('rejects %s', identifier => {
    expect(isValidIdentifier(identifier)).toBe(false);
    expect(() => validateIdentifier(identifier)).toThrow(ValidationError);
  });

  it('names the identifier in the error', () => {
    expect(() => validateIdentifier('a b')).toThrow('Invalid identifier "a b"');
  });
});
