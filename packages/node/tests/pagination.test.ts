/**
 * Tests for cursor pagination.
 */

import { describe, it, expect } from "vitest";
import { decodeCursor, encodeCursor, paginate } from "../src/types/pagination.js";

interface Row {
  readonly id: number;
}

const rows: Row[] = [0, 1, 2, 3, 4].map((id) => ({ id }));
const byId = (row: Row): number => row.id;

describe("cursor encoding", () => {
  it("decodes what it encodes", () => {
    expect(decodeCursor(encodeCursor("id", 3))).toEqual({ field: "id", value: 3 });
  });

  it("rejects malformed cursors", () => {
    expect(decodeCursor("%%%")).toBeUndefined();
    const stringValue = Buffer.from(JSON.stringify({ f: "id", v: "3" })).toString("base64url");
    expect(decodeCursor(stringValue)).toBeUndefined();
  });
});

describe("paginate", () => {
  it("walks pages until exhausted", () => {
    const first = paginate(rows, { limit: 2 }, byId, "id");
    expect(first.data.map(byId)).toEqual([0, 1]);
    expect(first.pagination).toEqual({ cursor: encodeCursor("id", 1), hasMore: true });

    const second = paginate(rows, { cursor: first.pagination.cursor ?? undefined, limit: 2 }, byId, "id");
    expect(second.data.map(byId)).toEqual([2, 3]);
    expect(second.pagination.hasMore).toBe(true);

    const third = paginate(rows, { cursor: second.pagination.cursor ?? undefined, limit: 2 }, byId, "id");
    expect(third.data.map(byId)).toEqual([4]);
    expect(third.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("returns everything when it fits", () => {
    const page = paginate(rows, { limit: 5 }, byId, "id");
    expect(page.data).toHaveLength(5);
    expect(page.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("ignores a cursor issued for another field", () => {
    const page = paginate(rows, { cursor: encodeCursor("globalPosition", 3), limit: 10 }, byId, "id");
    expect(page.data).toHaveLength(5);
  });
});
