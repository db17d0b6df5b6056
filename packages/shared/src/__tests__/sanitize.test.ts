import { describe, it, expect } from 'vitest';

import { sanitizeInput } from '../utils/sanitize.js';
import { UserRecordSchema } from '../validation/schemas.js';

describe('sanitizeInput', () => {
  it('should strip control characters but keep tabs and newlines', () => {
    expect(sanitizeInput('a\u0000b\u0007c\td\ne\u007F')).toBe('abc\td\ne');
  });

  it('should cap the length', () => {
    expect(sanitizeInput('abcdef', 3)).toBe('abc');
  });

  it('should return an empty string for missing input', () => {
    expect(sanitizeInput(undefined)).toBe('');
    expect(sanitizeInput(null)).toBe('');
  });
});

describe('UserRecordSchema', () => {
  it('should fall back to the user role for unknown roles', () => {
    const parsed = UserRecordSchema.parse({ registeredAt: 'a', lastSeen: 'b', role: 'root' });
    expect(parsed.role).toBe('user');
    expect(parsed.pagesVisited).toEqual([]);
  });
});
