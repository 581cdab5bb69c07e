import { describe, it, expect } from "vitest";
import {
  postMetrics,
  engagementAnalytics,
  engagementBy,
  performanceInsights,
  analyzeDataset,
  formatInsights,
} from "../analytics.js";
import { createSnapshot } from "../load.js";
import { median, stdDev } from "../helpers.js";
import { post, sampleSnapshot } from "./fixtures.js";

describe("postMetrics", () => {
  it("counts hashtags, emojis and mentions", () => {
    const metrics = postMetrics("Big win 🎉🎉 today @team\n#career #growth 🚀");
    expect(metrics).toEqual({
      wordCount: 8,
      charCount: "Big win 🎉🎉 today @team\n#career #growth 🚀".length,
      lineCount: 2,
      hashtagCount: 2,
      emojiCount: 2,
      mentionCount: 1,
    });
  });
});

describe("helpers", () => {
  it("computes median for even and odd lengths", () => {
    expect(median([3, 1, 2])).toBe(2);
    expect(median([4, 1, 3, 2])).toBe(2.5);
    expect(median([])).toBe(0);
  });

  it("computes sample standard deviation", () => {
    expect(stdDev([2, 4])).toBeCloseTo(Math.SQRT2);
    expect(stdDev([5])).toBe(0);
  });
});

describe("engagementAnalytics", () => {
  it("returns null for no posts", () => {
    expect(engagementAnalytics([])).toBeNull();
  });

  it("summarises engagement and ranks top posts", () => {
    const analytics = engagementAnalytics(sampleSnapshot().posts);
    expect(analytics?.total).toBe(200);
    expect(analytics?.max).toBe(120);
    expect(analytics?.min).toBe(0);
    expect(analytics?.median).toBe(40);
    expect(analytics?.topPosts.map((p) => p.engagement)).toEqual([120, 50, 30, 0]);
  });
});

describe("engagementBy", () => {
  it("groups and sorts by average engagement", () => {
    const groups = engagementBy(sampleSnapshot().posts, (p) => p.language);
    expect(groups).toEqual([
      { key: "English", posts: 3, avgEngagement: 170 / 3 },
      { key: "Hinglish", posts: 1, avgEngagement: 30 },
    ]);
  });
});

describe("performanceInsights", () => {
  it("explains that there is no data", () => {
    expect(performanceInsights([])).toEqual([
      {
        type: "info",
        title: "No Data",
        message: "No posts to analyze yet. Load or label a dataset first.",
      },
    ]);
  });

  it("reports high performers, length and language", () => {
    const insights = performanceInsights(sampleSnapshot().posts);
    expect(insights.map((i) => i.message)).toEqual([
      "1 posts have engagement 50% above average",
      "High-performing posts average 0.0 hashtags",
      "Your highest-engaging post had 5 words",
      "English posts perform better on average",
    ]);
  });

  it("skips the language tip for a single-language dataset", () => {
    const insights = performanceInsights([post({ text: "one two", engagement: 3 })]);
    expect(insights.map((i) => i.title)).toEqual(["Optimal Length"]);
  });
});

describe("analyzeDataset", () => {
  it("handles an empty dataset", () => {
    const analytics = analyzeDataset(createSnapshot("empty", []));
    expect(analytics.engagement).toBeNull();
    expect(analytics.content).toBeNull();
    expect(analytics.byLength).toEqual([]);
    expect(analytics.insights).toHaveLength(1);
  });

  it("formats insights as a list", () => {
    const text = formatInsights([
      { type: "tip", title: "Language Performance", message: "English posts perform better on average" },
    ]);
    expect(text).toBe("- Language Performance: English posts perform better on average");
  });
});
