/**
 * Caller identity middleware.
 *
 * Supports two strategies when auth is configured:
 * 1. API key via X-Api-Key header → looked up in the configured key registry
 * 2. JWT bearer token via Authorization header → HMAC-SHA256 signature verify
 *
 * Without auth, the X-Caller-Id header names the caller directly.
 *
 * On success, sets `c.set("caller", caller)`.
 */

import { createHmac, timingSafeEqual } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import { isRecord } from "@concord/types";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, CallerContext, JwtClaims } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const CALLER_HEADER = "X-Caller-Id";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
  /** JWT HMAC secret (if JWT auth is enabled) */
  readonly jwtSecret?: string | undefined;
  /** Expected JWT issuer */
  readonly jwtIssuer?: string | undefined;
}

/**
 * Create authentication middleware.
 *
 * Tries X-Api-Key first, then Authorization: Bearer.
 * Returns 401 if neither is present or valid.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    let caller: CallerContext | undefined;

    // Strategy 1: API Key
    const apiKey = c.req.header("X-Api-Key");
    if (apiKey !== undefined) {
      const record = config.apiKeys.get(apiKey);
      if (record === undefined) {
        return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
      }
      caller = { source: "api-key", identity: record.participant };
    }

    // Strategy 2: JWT Bearer
    if (caller === undefined) {
      const authHeader = c.req.header("Authorization");
      if (authHeader !== undefined && authHeader.startsWith("Bearer ")) {
        if (config.jwtSecret === undefined) {
          return c.json(
            createErrorEnvelope("UNAUTHORIZED", "JWT authentication not configured"),
            401,
          );
        }
        const claims = verifyJwt(authHeader.slice(7), config.jwtSecret, config.jwtIssuer);
        if (claims === undefined) {
          return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid or expired JWT"), 401);
        }
        caller = { source: "jwt", identity: claims.sub };
      }
    }

    if (caller === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Authentication required"), 401);
    }

    c.set("caller", caller);
    return next();
  };
}

/**
 * Unsecured mode: trust the X-Caller-Id header. Requests without one
 * proceed anonymously and may only reach read-only routes.
 */
export function headerCallerMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const identity = c.req.header(CALLER_HEADER)?.trim();
    c.set(
      "caller",
      identity !== undefined && identity !== "" ? { source: "header", identity } : undefined,
    );
    return next();
  };
}

// =============================================================================
// Caller Guard
// =============================================================================

/**
 * Require a resolved caller and expose its identity as `participant`.
 *
 * Whether that identity is a participant is the wallet's decision.
 */
export function requireCaller(): MiddlewareHandler<
  AppEnv & { Variables: { participant: string } }
> {
  return async (c, next) => {
    const caller = c.get("caller");
    if (caller === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Caller identity required"), 401);
    }
    c.set("participant", caller.identity);
    return next();
  };
}

// =============================================================================
// JWT Helpers
// =============================================================================

function decodeSegment(segment: string): Record<string, unknown> | undefined {
  try {
    const value: unknown = JSON.parse(Buffer.from(segment, "base64url").toString("utf-8"));
    return isRecord(value) ? value : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Verify a JWT token using HMAC-SHA256. Only HS256 is accepted.
 *
 * @returns Decoded claims, or undefined if invalid/expired.
 */
export function verifyJwt(
  token: string,
  secret: string,
  expectedIssuer?: string,
): JwtClaims | undefined {
  const [headerB64, payloadB64, signatureB64, ...extra] = token.split(".");
  if (
    headerB64 === undefined ||
    payloadB64 === undefined ||
    signatureB64 === undefined ||
    extra.length > 0
  ) {
    return undefined;
  }

  const expectedSig = Buffer.from(
    createHmac("sha256", secret).update(`${headerB64}.${payloadB64}`).digest("base64url"),
  );
  const actualSig = Buffer.from(signatureB64);
  if (expectedSig.length !== actualSig.length || !timingSafeEqual(expectedSig, actualSig)) {
    return undefined;
  }

  const header = decodeSegment(headerB64);
  if (header === undefined || header.alg !== "HS256") {
    return undefined;
  }

  const payload = decodeSegment(payloadB64);
  if (
    payload === undefined ||
    typeof payload.sub !== "string" ||
    payload.sub.trim() === "" ||
    typeof payload.exp !== "number" ||
    typeof payload.iat !== "number"
  ) {
    return undefined;
  }

  if (payload.exp < Math.floor(Date.now() / 1000)) {
    return undefined;
  }

  const iss = typeof payload.iss === "string" ? payload.iss : undefined;
  if (expectedIssuer !== undefined && iss !== expectedIssuer) {
    return undefined;
  }

  return {
    sub: payload.sub,
    exp: payload.exp,
    iat: payload.iat,
    ...(iss !== undefined ? { iss } : {}),
  };
}

/**
 * Create a signed JWT for testing/bootstrapping.
 */
export function signJwt(
  claims: Omit<JwtClaims, "iat"> & { iat?: number },
  secret: string,
): string {
  const header = Buffer.from(JSON.stringify({ alg: "HS256", typ: "JWT" })).toString("base64url");

  const payload = Buffer.from(
    JSON.stringify({
      ...claims,
      iat: claims.iat ?? Math.floor(Date.now() / 1000),
    }),
  ).toString("base64url");

  const signature = createHmac("sha256", secret)
    .update(`${header}.${payload}`)
    .digest("base64url");

  return `${header}.${payload}.${signature}`;
}
