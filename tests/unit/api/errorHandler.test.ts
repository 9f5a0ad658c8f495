import { describe, it, expect } from 'vitest';
import { redactSecrets } from '../../../src/api/errorHandler.js';

describe('redactSecrets', () => {
  it('should mask sensitive keys at any depth', () => {
    expect(
      redactSecrets({
        apiKey: 'test-secret',
        nested: { password: 'test-secret', rows: 3 },
        list: [{ token: 'test-secret', path: '/inbox/a.csv' }],
      })
    ).toEqual({
      apiKey: '[REDACTED]',
      nested: { password: '[REDACTED]', rows: 3 },
      list: [{ token: '[REDACTED]', path: '/inbox/a.csv' }],
    });
  });

  it('should pass primitives through', () => {
    expect(redactSecrets('plain')).toBe('plain');
    expect(redactSecrets(null)).toBeNull();
  });
});
