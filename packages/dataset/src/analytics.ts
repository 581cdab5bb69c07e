import type { ExamplePost } from "@postcraft/core";
import type { DatasetSnapshot } from "./load.js";
import { tagFrequencies } from "./stats.js";
import {
  countEmojis,
  countHashtags,
  countMentions,
  countWords,
  mean,
  median,
  stdDev,
} from "./helpers.js";

export interface PostMetrics {
  wordCount: number;
  charCount: number;
  lineCount: number;
  hashtagCount: number;
  emojiCount: number;
  mentionCount: number;
}

export interface EngagementAnalytics {
  total: number;
  mean: number;
  median: number;
  max: number;
  min: number;
  stdDev: number;
  topPosts: Array<{ text: string; engagement: number }>;
}

export interface ContentAnalytics {
  avgWordCount: number;
  avgCharCount: number;
  avgHashtags: number;
  avgEmojis: number;
  avgMentions: number;
}

export interface GroupEngagement {
  key: string;
  posts: number;
  avgEngagement: number;
}

export interface Insight {
  type: "success" | "info" | "tip";
  title: string;
  message: string;
}

export interface DatasetAnalytics {
  engagement: EngagementAnalytics | null;
  content: ContentAnalytics | null;
  byLength: GroupEngagement[];
  byLanguage: GroupEngagement[];
  topTags: Array<{ tag: string; count: number }>;
  insights: Insight[];
}

const TOP_POST_LIMIT = 5;
const TAG_LIMIT = 20;
const HIGH_PERFORMER_FACTOR = 1.5;

export function postMetrics(text: string): PostMetrics {
  return {
    wordCount: countWords(text),
    charCount: text.length,
    lineCount: text.split("\n").length,
    hashtagCount: countHashtags(text),
    emojiCount: countEmojis(text),
    mentionCount: countMentions(text),
  };
}

export function engagementAnalytics(
  posts: readonly ExamplePost[]
): EngagementAnalytics | null {
  if (posts.length === 0) return null;
  const values = posts.map((p) => p.engagement);

  const topPosts = posts
    .map((post, index) => ({ post, index }))
    .sort((a, b) => b.post.engagement - a.post.engagement || a.index - b.index)
    .slice(0, TOP_POST_LIMIT)
    .map(({ post }) => ({ text: post.text, engagement: post.engagement }));

  return {
    total: values.reduce((a, b) => a + b, 0),
    mean: mean(values),
    median: median(values),
    max: Math.max(...values),
    min: Math.min(...values),
    stdDev: stdDev(values),
    topPosts,
  };
}

export function contentAnalytics(
  posts: readonly ExamplePost[]
): ContentAnalytics | null {
  if (posts.length === 0) return null;
  const metrics = posts.map((p) => postMetrics(p.text));
  return {
    avgWordCount: mean(metrics.map((m) => m.wordCount)),
    avgCharCount: mean(metrics.map((m) => m.charCount)),
    avgHashtags: mean(metrics.map((m) => m.hashtagCount)),
    avgEmojis: mean(metrics.map((m) => m.emojiCount)),
    avgMentions: mean(metrics.map((m) => m.mentionCount)),
  };
}

/**
 * Average engagement per group, best group first.
 */
export function engagementBy(
  posts: readonly ExamplePost[],
  keyOf: (post: ExamplePost) => string
): GroupEngagement[] {
  const groups = new Map<string, number[]>();
  for (const post of posts) {
    const key = keyOf(post);
    const values = groups.get(key) ?? [];
    values.push(post.engagement);
    groups.set(key, values);
  }
  return [...groups.entries()]
    .map(([key, values]) => ({
      key,
      posts: values.length,
      avgEngagement: mean(values),
    }))
    .sort((a, b) => b.avgEngagement - a.avgEngagement);
}

export function performanceInsights(posts: readonly ExamplePost[]): Insight[] {
  if (posts.length === 0) {
    return [
      {
        type: "info",
        title: "No Data",
        message: "No posts to analyze yet. Load or label a dataset first.",
      },
    ];
  }

  const insights: Insight[] = [];
  const avg = mean(posts.map((p) => p.engagement));
  const highPerformers = posts.filter(
    (p) => p.engagement > avg * HIGH_PERFORMER_FACTOR
  );

  if (highPerformers.length > 0) {
    insights.push({
      type: "success",
      title: "High-Performing Content",
      message: `${highPerformers.length} posts have engagement 50% above average`,
    });
    const avgHashtags = mean(highPerformers.map((p) => countHashtags(p.text)));
    insights.push({
      type: "info",
      title: "Hashtag Strategy",
      message: `High-performing posts average ${avgHashtags.toFixed(1)} hashtags`,
    });
  }

  let best = posts[0];
  for (const post of posts) {
    if (best === undefined || post.engagement > best.engagement) best = post;
  }
  if (best) {
    insights.push({
      type: "info",
      title: "Optimal Length",
      message: `Your highest-engaging post had ${countWords(best.text)} words`,
    });
  }

  const byLanguage = engagementBy(posts, (p) => p.language);
  const topLanguage = byLanguage[0];
  if (byLanguage.length > 1 && topLanguage) {
    insights.push({
      type: "tip",
      title: "Language Performance",
      message: `${topLanguage.key} posts perform better on average`,
    });
  }

  return insights;
}

export function analyzeDataset(snapshot: DatasetSnapshot): DatasetAnalytics {
  const posts = snapshot.posts;
  return {
    engagement: engagementAnalytics(posts),
    content: contentAnalytics(posts),
    byLength: engagementBy(posts, (p) => p.length),
    byLanguage: engagementBy(posts, (p) => p.language),
    topTags: tagFrequencies(snapshot, TAG_LIMIT),
    insights: performanceInsights(posts),
  };
}

export function formatInsights(insights: readonly Insight[]): string {
  return insights.map((i) => `- ${i.title}: ${i.message}`).join("\n");
}
