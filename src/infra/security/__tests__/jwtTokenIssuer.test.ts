import { describe, it, expect, afterEach, vi } from 'vitest';
import jwt from 'jsonwebtoken';
import { JwtTokenIssuer } from '../jwtTokenIssuer.js';
import type { User } from '../../../domain/auth/user.js';

const config = {
  secret: 'test-secret-test-secret',
  issuer: 'test-issuer',
  accessTokenTtlSeconds: 600,
};

const user: User = {
  id: '6f1c2b9e-0000-4000-8000-000000000001',
  email: 'ada@example.com',
  firstName: 'Ada',
  lastName: 'Lovelace',
  passwordHash: 'hash',
  createdAt: new Date('2026-01-01T00:00:00.000Z'),
  version: 0,
  refreshTokens: [],
};

describe('JwtTokenIssuer', () => {
  const issuer = new JwtTokenIssuer(config);

  afterEach(() => {
    vi.useRealTimers();
  });

  it('issues a token with the configured lifetime', () => {
    const { accessToken, expiresIn } = issuer.generateToken(user);
    const decoded = jwt.decode(accessToken, { json: true });

    expect(expiresIn).toBe(600);
    expect(decoded?.sub).toBe(user.id);
    expect(decoded?.iss).toBe('test-issuer');
    expect(decoded?.given_name).toBe('Ada');
    expect(decoded?.family_name).toBe('Lovelace');
    expect((decoded?.exp ?? 0) - (decoded?.iat ?? 0)).toBe(600);
  });

  it('verifies its own tokens', () => {
    const { accessToken } = issuer.generateToken(user);

    expect(issuer.verifyAccessToken(accessToken)).toEqual({
      userId: user.id,
      email: 'ada@example.com',
    });
    expect(issuer.readSubject(accessToken)).toBe(user.id);
  });

  it('rejects tokens signed with another secret', () => {
    const other = new JwtTokenIssuer({ ...config, secret: 'another-secret-value' });
    const { accessToken } = other.generateToken(user);

    expect(issuer.verifyAccessToken(accessToken)).toBeNull();
    expect(issuer.readSubject(accessToken)).toBeNull();
  });

  it('rejects tokens from another issuer', () => {
    const other = new JwtTokenIssuer({ ...config, issuer: 'someone-else' });
    const { accessToken } = other.generateToken(user);

    expect(issuer.readSubject(accessToken)).toBeNull();
  });

  it('rejects malformed tokens', () => {
    expect(issuer.verifyAccessToken('not-a-jwt')).toBeNull();
    expect(issuer.readSubject('')).toBeNull();
  });

  it('reads the subject of an expired token but does not verify it', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2020-01-01T00:00:00.000Z'));
    const { accessToken } = issuer.generateToken(user);
    vi.useRealTimers();

    expect(issuer.verifyAccessToken(accessToken)).toBeNull();
    expect(issuer.readSubject(accessToken)).toBe(user.id);
  });
});
