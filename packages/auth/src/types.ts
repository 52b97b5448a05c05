export type AuthTokenType = 'customer' | 'service';

export interface AuthClaims {
  sub: string;
  iss: string;
  aud: string;
  exp: number;
  iat: number;
  tokenType: AuthTokenType;
  scope?: string[] | undefined;
  sessionId?: string | undefined;
}
