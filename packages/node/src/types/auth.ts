/**
 * Caller identity types.
 *
 * The wallet trusts an already-authenticated identity. The service
 * resolves it from one of:
 * 1. API key via X-Api-Key header, mapped to a participant
 * 2. JWT bearer token via Authorization header, whose `sub` is the identity
 * 3. X-Caller-Id header, only when no auth is configured
 */

export type CallerSource = "api-key" | "jwt" | "header";

export interface CallerContext {
  readonly source: CallerSource;
  readonly identity: string;
}

export interface ApiKeyRecord {
  readonly key: string;
  readonly participant: string;
}

export interface JwtClaims {
  readonly sub: string;
  readonly iss?: string;
  readonly exp: number;
  readonly iat: number;
}
