/**
 * Account type carried in the `user_type` claim
 */
export enum UserType {
  User = 1,
  Admin = 2,
}

/**
 * Claims of an issued access token. `iss`, `aud` and `exp` are added by the
 * signer.
 */
export interface AccessTokenClaims {
  sub: string;
  iat: number;
  unique_name: string;
  username: string;
  user_type: UserType;
  role: string[];
  jti: string;
  iss?: string;
  aud?: string | string[];
  exp?: number;
}

/**
 * Subject claim of whatever passport attached to the request, if it is a
 * string
 */
export function subjectOf(user: unknown): string | undefined {
  if (typeof user !== 'object' || user === null || !('sub' in user)) {
    return undefined;
  }
  return typeof user.sub === 'string' ? user.sub : undefined;
}

export interface IssuedTokens {
  token: string;
  refreshToken: string;
  /** Access token expiry in Unix seconds */
  expires: number;
}
