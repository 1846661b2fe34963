/**
 * Tests for caller identity middleware.
 *
 * Verifies:
 * - API key auth (valid, invalid, missing)
 * - JWT bearer auth (valid, invalid, expired, wrong issuer)
 * - Header mode and the caller guard
 */

import { createHmac } from "node:crypto";
import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import type { AppEnv } from "../../src/types/api-contract.js";
import type { ApiKeyRecord } from "../../src/types/auth.js";
import {
  authMiddleware,
  headerCallerMiddleware,
  requireCaller,
  signJwt,
  verifyJwt,
} from "../../src/middleware/auth.js";

const JWT_SECRET = "test-secret";
const NOW_S = Math.floor(Date.now() / 1000);

function makeApp(apiKeys: ApiKeyRecord[] = [], jwtSecret: string | null = JWT_SECRET) {
  const keyMap = new Map<string, ApiKeyRecord>();
  for (const k of apiKeys) {
    keyMap.set(k.key, k);
  }

  const app = new Hono<AppEnv>();
  app.use("*", authMiddleware({ apiKeys: keyMap, jwtSecret: jwtSecret ?? undefined, jwtIssuer: "concord" }));
  app.get("/test", (c) => c.json({ caller: c.get("caller") }));
  return app;
}

interface ErrorBody {
  error: { code: string; message: string };
}

describe("API key auth", () => {
  it("maps a valid key to its participant", async () => {
    const app = makeApp([{ key: "key-1", participant: "alice" }]);

    const res = await app.request("/test", { headers: { "X-Api-Key": "key-1" } });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ caller: { source: "api-key", identity: "alice" } });
  });

  it("rejects an unknown key", async () => {
    const app = makeApp([{ key: "key-1", participant: "alice" }]);

    const res = await app.request("/test", { headers: { "X-Api-Key": "nope" } });

    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({ code: "UNAUTHORIZED", message: "Invalid API key" });
  });

  it("requires some credential", async () => {
    const res = await makeApp().request("/test");

    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.message).toBe("Authentication required");
  });
});

describe("JWT auth", () => {
  it("uses the subject as the caller", async () => {
    const token = signJwt({ sub: "bob", iss: "concord", exp: NOW_S + 3600 }, JWT_SECRET);

    const res = await makeApp().request("/test", {
      headers: { Authorization: `Bearer ${token}` },
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ caller: { source: "jwt", identity: "bob" } });
  });

  it("rejects a token signed with another secret", async () => {
    const token = signJwt({ sub: "bob", iss: "concord", exp: NOW_S + 3600 }, "other-secret");

    const res = await makeApp().request("/test", {
      headers: { Authorization: `Bearer ${token}` },
    });

    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.message).toBe("Invalid or expired JWT");
  });

  it("reports when JWT is not configured", async () => {
    const token = signJwt({ sub: "bob", exp: NOW_S + 3600 }, JWT_SECRET);

    const res = await makeApp([], null).request("/test", {
      headers: { Authorization: `Bearer ${token}` },
    });

    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.message).toBe("JWT authentication not configured");
  });
});

describe("verifyJwt", () => {
  it("returns the claims of a valid token", () => {
    const token = signJwt({ sub: "bob", iss: "concord", exp: NOW_S + 60, iat: NOW_S }, JWT_SECRET);
    expect(verifyJwt(token, JWT_SECRET, "concord")).toEqual({
      sub: "bob",
      iss: "concord",
      exp: NOW_S + 60,
      iat: NOW_S,
    });
  });

  it("rejects expired tokens", () => {
    const token = signJwt({ sub: "bob", exp: NOW_S - 10 }, JWT_SECRET);
    expect(verifyJwt(token, JWT_SECRET)).toBeUndefined();
  });

  it("rejects a wrong issuer", () => {
    const token = signJwt({ sub: "bob", iss: "elsewhere", exp: NOW_S + 60 }, JWT_SECRET);
    expect(verifyJwt(token, JWT_SECRET, "concord")).toBeUndefined();
    expect(verifyJwt(token, JWT_SECRET)).toBeDefined();
  });

  it("rejects a tampered payload", () => {
    const token = signJwt({ sub: "bob", exp: NOW_S + 60 }, JWT_SECRET);
    const [header, , signature] = token.split(".");
    const forged = Buffer.from(JSON.stringify({ sub: "mallory", exp: NOW_S + 60, iat: NOW_S })).toString(
      "base64url",
    );
    expect(verifyJwt(`${header}.${forged}.${signature}`, JWT_SECRET)).toBeUndefined();
  });

  it("rejects algorithms other than HS256", () => {
    const header = Buffer.from(JSON.stringify({ alg: "none", typ: "JWT" })).toString("base64url");
    const payload = Buffer.from(JSON.stringify({ sub: "bob", exp: NOW_S + 60, iat: NOW_S })).toString(
      "base64url",
    );
    const signature = createHmac("sha256", JWT_SECRET).update(`${header}.${payload}`).digest("base64url");
    expect(verifyJwt(`${header}.${payload}.${signature}`, JWT_SECRET)).toBeUndefined();
  });

  it("rejects tokens without three segments", () => {
    expect(verifyJwt("a.b", JWT_SECRET)).toBeUndefined();
    expect(verifyJwt("a.b.c.d", JWT_SECRET)).toBeUndefined();
  });
});

describe("header mode", () => {
  function makeHeaderApp() {
    const app = new Hono<AppEnv>();
    app.use("*", headerCallerMiddleware());
    app.get("/whoami", requireCaller(), (c) => c.json({ participant: c.get("participant") }));
    return app;
  }

  it("takes the caller from X-Caller-Id", async () => {
    const res = await makeHeaderApp().request("/whoami", { headers: { "X-Caller-Id": "carol" } });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ participant: "carol" });
  });

  it("requires a non-blank caller", async () => {
    const res = await makeHeaderApp().request("/whoami", { headers: { "X-Caller-Id": "  " } });

    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({ code: "UNAUTHORIZED", message: "Caller identity required" });
  });
});
