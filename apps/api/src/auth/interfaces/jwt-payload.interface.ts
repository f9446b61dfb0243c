/** Purpose a token was issued for; each route accepts exactly one scope. */
export type TokenScope = 'access_token' | 'refresh_token' | 'email_token';

/**
 * JWT token payload structure.
 *
 * `sub` carries the user's email, the identity store's lookup key.
 */
export interface JwtPayload {
  sub: string;
  scope: TokenScope;
}
