import { describe, it, expect } from "vitest";
import { searchPosts, postsByEngagement, appendPosts, mergeDatasets } from "../query.js";
import { datasetStatistics, tagFrequencies } from "../stats.js";
import { createSnapshot } from "../load.js";
import { post, sampleSnapshot } from "./fixtures.js";

describe("searchPosts", () => {
  it("matches text case-insensitively", () => {
    const results = searchPosts(sampleSnapshot(), "INTERNSHIP");
    expect(results.map((p) => p.engagement)).toEqual([50]);
  });

  it("searches tags", () => {
    const results = searchPosts(sampleSnapshot(), "career", "tags");
    expect(results.map((p) => p.engagement)).toEqual([120, 0]);
  });

  it("returns nothing for a blank query", () => {
    expect(searchPosts(sampleSnapshot(), "  ")).toEqual([]);
  });
});

describe("postsByEngagement", () => {
  it("filters by inclusive range", () => {
    expect(postsByEngagement(sampleSnapshot(), 30, 50).map((p) => p.engagement)).toEqual([50, 30]);
  });

  it("has an open upper bound by default", () => {
    expect(postsByEngagement(sampleSnapshot(), 100)).toHaveLength(1);
  });
});

describe("appendPosts", () => {
  it("returns a new snapshot and leaves the input alone", () => {
    const base = sampleSnapshot();
    const next = appendPosts(base, [post({ text: "New one", tags: ["Fresh"] })]);
    expect(base.posts).toHaveLength(4);
    expect(next.posts).toHaveLength(5);
    expect(next.tags).toContain("Fresh");
  });
});

describe("mergeDatasets", () => {
  it("drops duplicate texts keeping the first occurrence", () => {
    const a = createSnapshot("a", [post({ text: "same", engagement: 1 }), post({ text: "only a" })]);
    const b = createSnapshot("b", [post({ text: "same", engagement: 9 }), post({ text: "only b" })]);
    const merged = mergeDatasets(a, b, "merged");
    expect(merged.name).toBe("merged");
    expect(merged.posts.map((p) => p.text)).toEqual(["same", "only a", "only b"]);
    expect(merged.posts[0]?.engagement).toBe(1);
  });
});

describe("datasetStatistics", () => {
  it("summarises the dataset", () => {
    const stats = datasetStatistics(sampleSnapshot());
    expect(stats.totalPosts).toBe(4);
    expect(stats.languages).toEqual({ English: 3, Hinglish: 1 });
    expect(stats.lengthDistribution).toEqual({ Medium: 2, Long: 1, Short: 1 });
    expect(stats.avgEngagement).toBe(50);
    expect(stats.tones).toEqual({ Inspirational: 1 });
    expect(stats.audiences).toEqual({ Professionals: 1 });
    expect(stats.totalTags).toBe(4);
  });

  it("handles an empty dataset", () => {
    const stats = datasetStatistics(createSnapshot("empty", []));
    expect(stats.totalPosts).toBe(0);
    expect(stats.avgEngagement).toBe(0);
    expect(stats.topTags).toEqual([]);
  });
});

describe("tagFrequencies", () => {
  it("orders by count then first appearance", () => {
    const snapshot = createSnapshot("t", [
      post({ text: "1", tags: ["A", "B"] }),
      post({ text: "2", tags: ["B", "C"] }),
    ]);
    expect(tagFrequencies(snapshot)).toEqual([
      { tag: "B", count: 2 },
      { tag: "A", count: 1 },
      { tag: "C", count: 1 },
    ]);
    expect(tagFrequencies(snapshot, 1)).toEqual([{ tag: "B", count: 2 }]);
  });

  it("counts spellings of the same tag together", () => {
    const snapshot = createSnapshot("t", [
      post({ text: "1", tags: ["AI"] }),
      post({ text: "2", tags: [" ai "] }),
      post({ text: "3", tags: ["Data"] }),
    ]);
    expect(tagFrequencies(snapshot)).toEqual([
      { tag: "AI", count: 2 },
      { tag: "Data", count: 1 },
    ]);
    expect(datasetStatistics(snapshot).totalTags).toBe(2);
  });
});
