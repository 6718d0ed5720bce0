import { describe, expect, it } from 'vitest';
import { isValidName } from './naming';

describe('isValidName', () => {
  it('accepts letters, digits and underscores', () => {
    expect(isValidName('two_body_2')).toBe(true);
  });

  it('rejects empty names and names with other characters', () => {
    expect(isValidName('')).toBe('Name cannot be empty.');
    expect(isValidName('two body')).toBe(
      'Name must contain only alphanumeric characters and underscores (no spaces).'
    );
    expect(isValidName('../escape')).not.toBe(true);
  });
});
