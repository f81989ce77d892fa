import { describe, it, expect } from "vitest";
import { advanceState, compareOrderKeys, isAfterBoundary } from "./ordering";
import { createTestItem } from "../test-utils/fixtures";

describe("compareOrderKeys", () => {
  it("should order by publishedAt first", () => {
    expect(compareOrderKeys({ publishedAt: 100, id: "z" }, { publishedAt: 200, id: "a" })).toBeLessThan(0);
  });

  it("should order by id when publishedAt is equal", () => {
    expect(compareOrderKeys({ publishedAt: 100, id: "a" }, { publishedAt: 100, id: "b" })).toBe(-1);
    expect(compareOrderKeys({ publishedAt: 100, id: "b" }, { publishedAt: 100, id: "a" })).toBe(1);
    expect(compareOrderKeys({ publishedAt: 100, id: "a" }, { publishedAt: 100, id: "a" })).toBe(0);
  });

  it("should compare ids by code unit so uppercase sorts before lowercase", () => {
    expect(compareOrderKeys({ publishedAt: 1, id: "Z" }, { publishedAt: 1, id: "a" })).toBe(-1);
  });
});

describe("isAfterBoundary", () => {
  const state = { lastSeenId: "b", lastSeenPublishedAt: 200 };

  it("should accept later items and reject earlier ones", () => {
    expect(isAfterBoundary(createTestItem({ id: "c", publishedAt: 300 }), state)).toBe(true);
    expect(isAfterBoundary(createTestItem({ id: "a", publishedAt: 100 }), state)).toBe(false);
  });

  it("should reject the committed item itself", () => {
    expect(isAfterBoundary(createTestItem({ id: "b", publishedAt: 200 }), state)).toBe(false);
  });

  it("should break publishedAt ties on id", () => {
    expect(isAfterBoundary(createTestItem({ id: "c", publishedAt: 200 }), state)).toBe(true);
    expect(isAfterBoundary(createTestItem({ id: "a", publishedAt: 200 }), state)).toBe(false);
  });
});

describe("advanceState", () => {
  it("should start from the item when there is no state", () => {
    expect(advanceState(null, createTestItem({ id: "a", publishedAt: 100 }))).toEqual({
      lastSeenId: "a",
      lastSeenPublishedAt: 100,
    });
  });

  it("should return the current state object for stale items", () => {
    const current = { lastSeenId: "b", lastSeenPublishedAt: 200 };

    expect(advanceState(current, createTestItem({ id: "a", publishedAt: 150 }))).toBe(current);
  });
});
