import type { DatasetSnapshot } from "./load.js";
import { mean } from "./helpers.js";
import { normalizeTag } from "./normalize.js";

export interface DatasetStatistics {
  totalPosts: number;
  languages: Record<string, number>;
  lengthDistribution: Record<string, number>;
  avgEngagement: number;
  totalTags: number;
  topTags: Array<{ tag: string; count: number }>;
  tones: Record<string, number>;
  audiences: Record<string, number>;
}

const TOP_TAG_LIMIT = 10;

function increment(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

/**
 * Count tags across posts, most frequent first. Tags that differ only in
 * case or surrounding spaces count together under the first spelling
 * seen. Ties keep the order in which tags were first seen.
 */
export function tagFrequencies(
  snapshot: DatasetSnapshot,
  limit?: number
): Array<{ tag: string; count: number }> {
  const counts = new Map<string, { tag: string; count: number }>();
  for (const post of snapshot.posts) {
    for (const tag of post.tags) {
      const key = normalizeTag(tag);
      const entry = counts.get(key);
      if (entry) entry.count += 1;
      else counts.set(key, { tag, count: 1 });
    }
  }
  const sorted = [...counts.values()].sort((a, b) => b.count - a.count);
  return limit === undefined ? sorted : sorted.slice(0, limit);
}

export function datasetStatistics(snapshot: DatasetSnapshot): DatasetStatistics {
  const languages: Record<string, number> = {};
  const lengthDistribution: Record<string, number> = {};
  const tones: Record<string, number> = {};
  const audiences: Record<string, number> = {};

  for (const post of snapshot.posts) {
    increment(languages, post.language);
    increment(lengthDistribution, post.length);
    if (post.tone) increment(tones, post.tone);
    if (post.targetAudience) increment(audiences, post.targetAudience);
  }

  return {
    totalPosts: snapshot.posts.length,
    languages,
    lengthDistribution,
    avgEngagement: mean(snapshot.posts.map((p) => p.engagement)),
    totalTags: snapshot.tags.length,
    topTags: tagFrequencies(snapshot, TOP_TAG_LIMIT),
    tones,
    audiences,
  };
}
