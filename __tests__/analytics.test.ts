import { describe, it, expect } from "vitest";
import {
  calculateOverview,
  calculateTagStats,
  findNeverAccessed,
  findPotentialDuplicates,
  findStaleMemories,
  findUntagged,
  formatRelativeTime,
  groupByMonth,
  rankTags,
} from "../src/analytics";
import { makeEntry } from "./helpers";

const now = new Date("2024-03-10T00:00:00.000Z");

const memories = [
  makeEntry("m1", { created: "2024-03-09T00:00:00.000Z", tags: ["a"], access: { count: 3 } }),
  makeEntry("m2", { type: "decision", scope: "global", created: "2024-02-20T00:00:00.000Z", tags: ["a", "b"] }),
  makeEntry("m3", { created: "2023-01-01T00:00:00.000Z" }),
];

describe("calculateOverview", () => {
  it("counts by scope and type", () => {
    const o = calculateOverview(memories, now);
    expect(o.total).toBe(3);
    expect(o.byScope).toEqual({ project: 2, global: 1 });
    expect(o.byType).toEqual({ session: 2, decision: 1 });
    expect(o.totalAccesses).toBe(3);
  });

  it("splits accessed and never-accessed entries", () => {
    const o = calculateOverview(memories, now);
    expect(o.mostAccessed.map((m) => m.id)).toEqual(["m1"]);
    expect(o.neverAccessed.map((m) => m.id)).toEqual(["m3", "m2"]);
  });

  it("buckets the last thirteen weeks of activity", () => {
    const o = calculateOverview(memories, now);
    expect(o.byWeek).toEqual({
      "Week 13": { count: 1, accesses: 3 },
      "Week 11": { count: 1, accesses: 0 },
    });
    expect([...o.tags.entries()]).toEqual([
      ["a", 2],
      ["b", 1],
    ]);
  });
});

describe("groupByMonth", () => {
  it("groups by year-month, newest first", () => {
    const grouped = groupByMonth(memories);
    expect([...grouped.keys()]).toEqual(["2024-03", "2024-02", "2023-01"]);
    expect(grouped.get("2024-02")?.map((m) => m.id)).toEqual(["m2"]);
  });

  it("leaves out entries without a usable date", () => {
    expect(groupByMonth([makeEntry("x", { created: "" })]).size).toBe(0);
  });
});

describe("calculateTagStats", () => {
  const tagged = [
    makeEntry("t1", { tags: ["a", "b"], access: { count: 2 } }),
    makeEntry("t2", { tags: ["a", "c"], access: { count: 4 } }),
  ];

  it("computes frequency, co-occurrence and average access", () => {
    const stats = calculateTagStats(tagged);
    expect(Object.fromEntries(stats.frequency)).toEqual({ a: 2, b: 1, c: 1 });
    expect(Object.fromEntries(stats.coOccurrence.get("a") ?? [])).toEqual({ b: 1, c: 1 });
    expect(Object.fromEntries(stats.coOccurrence.get("b") ?? [])).toEqual({ a: 1 });
    expect(Object.fromEntries(stats.averageAccess)).toEqual({ a: 3, b: 2, c: 4 });
  });

  it("ranks tags by frequency, then name", () => {
    const stats = calculateTagStats(tagged);
    expect(rankTags(stats)).toEqual([
      ["a", 2],
      ["b", 1],
      ["c", 1],
    ]);
    expect(rankTags(stats, 2)).toEqual([["a", 2]]);
  });
});

describe("health checks", () => {
  it("finds untagged and never-accessed entries", () => {
    expect(findUntagged(memories).map((m) => m.id)).toEqual(["m3"]);
    expect(findNeverAccessed(memories).map((m) => m.id)).toEqual(["m2", "m3"]);
  });

  it("finds old entries nobody has read", () => {
    expect(findStaleMemories(memories, 180, now).map((m) => m.id)).toEqual(["m3"]);
    expect(findStaleMemories(memories, 10, now).map((m) => m.id)).toEqual(["m2", "m3"]);
  });

  it("pairs entries with near-identical titles", () => {
    const pairs = findPotentialDuplicates([
      makeEntry("d1", { title: "Fix login bug in auth service" }),
      makeEntry("d2", { title: "Fix auth service login bug" }),
      makeEntry("d3", { title: "Write release notes" }),
    ]);
    expect(pairs).toHaveLength(1);
    expect(pairs[0].first.id).toBe("d1");
    expect(pairs[0].second.id).toBe("d2");
    expect(pairs[0].similarity).toBe(1);
  });
});

describe("formatRelativeTime", () => {
  const at = new Date("2024-03-10T12:00:00.000Z");

  it.each([
    ["2024-03-10T11:59:30.000Z", "just now"],
    ["2024-03-10T11:30:00.000Z", "30m ago"],
    ["2024-03-10T09:00:00.000Z", "3h ago"],
    ["2024-03-09T12:00:00.000Z", "yesterday"],
    ["2024-03-07T12:00:00.000Z", "3d ago"],
    ["2024-02-25T12:00:00.000Z", "2w ago"],
    ["2024-01-10T12:00:00.000Z", "2mo ago"],
    ["2022-03-10T12:00:00.000Z", "2y ago"],
    ["2024-03-10T12:00:05.000Z", "just now"],
    ["2024-03-12T12:00:00.000Z", "just now"],
  ])("formats %s as %s", (timestamp, expected) => {
    expect(formatRelativeTime(timestamp, at)).toBe(expected);
  });

  it("says never for a missing timestamp", () => {
    expect(formatRelativeTime(null, at)).toBe("never");
  });
});
