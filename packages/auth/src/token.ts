import { verifyHs256Jwt } from './jwt.js';
import type { AuthClaims } from './types.js';

export function extractBearerToken(authorizationHeader: string | undefined): string {
  if (!authorizationHeader) {
    throw new Error('Missing Authorization header.');
  }

  const [scheme, token] = authorizationHeader.split(' ');
  if (scheme?.toLowerCase() !== 'bearer' || !token) {
    throw new Error('Invalid Authorization header format.');
  }

  return token;
}

export function authenticateBearerToken(params: {
  authorizationHeader: string | undefined;
  secret?: string;
  secrets?: string[];
  issuer: string;
  audience: string;
  nowSeconds?: number;
}): AuthClaims {
  const token = extractBearerToken(params.authorizationHeader);

  const configuredSecrets = [
    ...(params.secret ? [params.secret] : []),
    ...(params.secrets ?? [])
  ].filter((value, index, all) => all.indexOf(value) === index);

  if (configuredSecrets.length === 0) {
    throw new Error('No JWT secret configured.');
  }

  let lastError: Error | undefined;
  for (const secret of configuredSecrets) {
    try {
      return verifyHs256Jwt(token, secret, {
        issuer: params.issuer,
        audience: params.audience,
        ...(params.nowSeconds === undefined ? {} : { nowSeconds: params.nowSeconds })
      });
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
    }
  }

  throw lastError ?? new Error('Token verification failed.');
}

export function assertTokenType(claims: AuthClaims, allowedTypes: ReadonlyArray<AuthClaims['tokenType']>): void {
  if (!allowedTypes.includes(claims.tokenType)) {
    throw new Error('Forbidden: invalid token type.');
  }
}

export interface CustomerAuthSettings {
  secret: string;
  /** Still accepted while a rotation is in progress. */
  previousSecret?: string | undefined;
  issuer: string;
  audience: string;
}

/** Accepts only customer tokens signed with the current or previous secret. */
export function createCustomerAuthenticator(
  settings: CustomerAuthSettings
): (authorizationHeader: string | undefined) => AuthClaims {
  const secrets = [settings.secret, ...(settings.previousSecret ? [settings.previousSecret] : [])];
  return (authorizationHeader) => {
    const claims = authenticateBearerToken({
      authorizationHeader,
      secrets,
      issuer: settings.issuer,
      audience: settings.audience
    });
    assertTokenType(claims, ['customer']);
    return claims;
  };
}
