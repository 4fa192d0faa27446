import { describe, it, expect } from "vitest";
import type { SlowQueryRecord } from "../../../../types/index.js";
import { rankSlowQueries } from "../ranking.js";

function records(...times: number[]): SlowQueryRecord[] {
  return times.map((queryTime, i) => ({ queryTime, statement: `q${i}` }));
}

describe("rankSlowQueries", () => {
  it("should order by duration descending", () => {
    const ranked = rankSlowQueries(records(5, 50, 1, 20));
    expect(ranked.total).toBe(4);
    expect(ranked.top.map((r) => r.queryTime)).toEqual([50, 20, 5, 1]);
  });

  it("should bound the total to 50 and the top list to 5", () => {
    const many = records(...Array.from({ length: 60 }, (_, i) => i));
    const ranked = rankSlowQueries(many);
    expect(ranked.total).toBe(50);
    expect(ranked.top.map((r) => r.queryTime)).toEqual([59, 58, 57, 56, 55]);
  });

  it("should keep input order for equal durations", () => {
    const ranked = rankSlowQueries(records(10, 30, 10));
    expect(ranked.top.map((r) => r.statement)).toEqual(["q1", "q0", "q2"]);
  });

  it("should never return more top records than the limit", () => {
    const ranked = rankSlowQueries(records(1, 2, 3, 4), { limit: 2, top: 5 });
    expect(ranked.total).toBe(2);
    expect(ranked.top).toHaveLength(2);
  });

  it("should not reorder the input array", () => {
    const input = records(1, 3, 2);
    rankSlowQueries(input);
    expect(input.map((r) => r.queryTime)).toEqual([1, 3, 2]);
  });

  it("should handle no records", () => {
    expect(rankSlowQueries([])).toEqual({ total: 0, top: [] });
  });
});
