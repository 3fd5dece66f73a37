import { describe, expect, it } from 'vitest';

import { UnauthenticatedError } from '../../src/core/errors/battle.errors';
import { normalizeDisplayName, TrustedHeaderSessionProvider } from '../../src/services/session.service';

describe('TrustedHeaderSessionProvider', () => {
  const sessions = new TrustedHeaderSessionProvider();

  it('returns the user from the credentials', () => {
    expect(sessions.authenticate({ userId: ' 42 ', name: '  Ana  ' })).toEqual({ id: '42', name: 'Ana' });
  });

  it('accepts numeric ids', () => {
    expect(sessions.authenticate({ userId: 7 })).toEqual({ id: '7', name: '7' });
  });

  it('fails with Unauthenticated when the id is missing or blank', () => {
    expect(() => sessions.authenticate({})).toThrow(UnauthenticatedError);
    expect(() => sessions.authenticate({ userId: '   ' })).toThrow(UnauthenticatedError);
    expect(() => sessions.authenticate({ userId: { id: 1 } })).toThrow(UnauthenticatedError);
  });
});

describe('normalizeDisplayName', () => {
  it('falls back to the id for empty names', () => {
    expect(normalizeDisplayName('   ', 'U1')).toBe('U1');
    expect(normalizeDisplayName(undefined, 'U1')).toBe('U1');
  });

  it('truncates long names to 32 characters', () => {
    expect(normalizeDisplayName('x'.repeat(40), 'U1')).toBe('x'.repeat(32));
  });
});
