import { describe, expect, it } from 'vitest';
import { createHs256Jwt, verifyHs256Jwt } from '../src/jwt.js';
import {
  assertTokenType,
  authenticateBearerToken,
  createCustomerAuthenticator,
  extractBearerToken
} from '../src/token.js';

const issuer = 'mobiremit-internal';
const audience = 'mobiremit-services';

function issue(secret: string, overrides: { sub?: string; tokenType?: 'customer' | 'service'; exp?: number } = {}): string {
  const now = Math.floor(Date.now() / 1000);
  return createHs256Jwt(
    {
      sub: overrides.sub ?? 'user_1',
      iss: issuer,
      aud: audience,
      exp: overrides.exp ?? now + 300,
      iat: now,
      tokenType: overrides.tokenType ?? 'customer'
    },
    secret
  );
}

describe('authenticateBearerToken', () => {
  it('accepts token with primary secret', () => {
    const claims = authenticateBearerToken({
      authorizationHeader: `Bearer ${issue('primary-secret')}`,
      secret: 'primary-secret',
      issuer,
      audience
    });

    expect(claims.sub).toBe('user_1');
    expect(claims.tokenType).toBe('customer');
  });

  it('accepts token signed by previous secret in rotation', () => {
    const claims = authenticateBearerToken({
      authorizationHeader: `Bearer ${issue('previous-secret', { sub: 'svc_ops', tokenType: 'service' })}`,
      secret: 'current-secret',
      secrets: ['previous-secret'],
      issuer,
      audience
    });

    expect(claims.sub).toBe('svc_ops');
  });

  it('fails with no configured secret', () => {
    expect(() =>
      authenticateBearerToken({
        authorizationHeader: 'Bearer dummy',
        issuer,
        audience
      })
    ).toThrow(/No JWT secret configured/);
  });

  it('reports the last verification failure', () => {
    expect(() =>
      authenticateBearerToken({
        authorizationHeader: `Bearer ${issue('other-secret')}`,
        secret: 'test-secret',
        issuer,
        audience
      })
    ).toThrow('JWT signature verification failed.');
  });
});

describe('verifyHs256Jwt', () => {
  it('rejects expired tokens against the supplied clock', () => {
    const token = issue('test-secret', { exp: 1_700_000_000 });
    expect(() => verifyHs256Jwt(token, 'test-secret', { issuer, audience, nowSeconds: 1_700_000_000 })).toThrow('Token expired.');
  });
});

describe('bearer helpers', () => {
  it('rejects non-bearer schemes', () => {
    expect(() => extractBearerToken('Basic abc')).toThrow('Invalid Authorization header format.');
  });

  it('enforces the token type', () => {
    const claims = verifyHs256Jwt(issue('test-secret', { tokenType: 'service' }), 'test-secret', { issuer, audience });
    expect(() => assertTokenType(claims, ['customer'])).toThrow('Forbidden: invalid token type.');
  });
});

describe('createCustomerAuthenticator', () => {
  const authenticate = createCustomerAuthenticator({
    secret: 'current-secret',
    previousSecret: 'previous-secret',
    issuer,
    audience
  });

  it('accepts customer tokens under either secret', () => {
    expect(authenticate(`Bearer ${issue('current-secret', { sub: 'user_2' })}`).sub).toBe('user_2');
    expect(authenticate(`Bearer ${issue('previous-secret', { sub: 'user_3' })}`).sub).toBe('user_3');
  });

  it('turns away service tokens', () => {
    expect(() => authenticate(`Bearer ${issue('current-secret', { tokenType: 'service' })}`)).toThrow(
      'Forbidden: invalid token type.'
    );
  });

  it('requires an Authorization header', () => {
    expect(() => authenticate(undefined)).toThrow('Missing Authorization header.');
  });
});
