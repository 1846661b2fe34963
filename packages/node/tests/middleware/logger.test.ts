/**
 * Tests for request logging and request ids.
 */

import { describe, it, expect } from "vitest";
import type { RequestLogEntry } from "../../src/middleware/logger.js";
import { REQUEST_ID_HEADER } from "../../src/middleware/request-id.js";
import { asCaller, createTestApp, jsonRequest } from "../setup.js";

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

function appWithLog() {
  const entries: RequestLogEntry[] = [];
  const { app } = createTestApp({}, { logFn: (entry) => entries.push(entry) });
  return { app, entries };
}

describe("loggerMiddleware", () => {
  it("logs one entry per request", async () => {
    const { app, entries } = appWithLog();

    const res = await app.request(jsonRequest("/health"));

    expect(entries).toEqual([
      {
        method: "GET",
        path: "/health",
        status: 200,
        durationMs: expect.any(Number),
        requestId: res.headers.get(REQUEST_ID_HEADER),
      },
    ]);
  });

  it("records the caller and error status", async () => {
    const { app, entries } = appWithLog();

    await app.request(jsonRequest("/api/v1/proposals/7/approve", "POST", undefined, asCaller("alice")));

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      method: "POST",
      path: "/api/v1/proposals/7/approve",
      status: 404,
      caller: "alice",
    });
  });
});

describe("requestIdMiddleware", () => {
  it("propagates a well-formed incoming id", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      jsonRequest("/health", "GET", undefined, { [REQUEST_ID_HEADER]: "req-123" }),
    );

    expect(res.headers.get(REQUEST_ID_HEADER)).toBe("req-123");
  });

  it("replaces a malformed incoming id", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      jsonRequest("/health", "GET", undefined, { [REQUEST_ID_HEADER]: "bad id with spaces" }),
    );

    expect(res.headers.get(REQUEST_ID_HEADER)).toMatch(UUID);
  });

  it("generates an id when none is sent", async () => {
    const { app } = createTestApp();

    const res = await app.request(jsonRequest("/health"));

    expect(res.headers.get(REQUEST_ID_HEADER)).toMatch(UUID);
  });
});
