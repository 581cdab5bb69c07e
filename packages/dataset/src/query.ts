import type { ExamplePost } from "@postcraft/core";
import { createSnapshot, type DatasetSnapshot } from "./load.js";
import { normalizeTag } from "./normalize.js";

export type SearchField = "text" | "tags";

/**
 * Case-insensitive substring search over post text, or over tags.
 */
export function searchPosts(
  snapshot: DatasetSnapshot,
  query: string,
  field: SearchField = "text"
): ExamplePost[] {
  const needle = query.trim().toLowerCase();
  if (!needle) return [];

  return snapshot.posts.filter((post) =>
    field === "text"
      ? post.text.toLowerCase().includes(needle)
      : post.tags.some((tag) => normalizeTag(tag).includes(needle))
  );
}

export function postsByEngagement(
  snapshot: DatasetSnapshot,
  min = 0,
  max = Number.POSITIVE_INFINITY
): ExamplePost[] {
  return snapshot.posts.filter(
    (post) => post.engagement >= min && post.engagement <= max
  );
}

/**
 * Returns a new snapshot with `posts` appended; the input is left untouched.
 */
export function appendPosts(
  snapshot: DatasetSnapshot,
  posts: readonly ExamplePost[]
): DatasetSnapshot {
  return createSnapshot(snapshot.name, [...snapshot.posts, ...posts]);
}

/**
 * Combine two datasets, dropping posts whose text already appeared.
 * The first occurrence wins.
 */
export function mergeDatasets(
  first: DatasetSnapshot,
  second: DatasetSnapshot,
  name = first.name
): DatasetSnapshot {
  const seen = new Set<string>();
  const merged: ExamplePost[] = [];
  for (const post of [...first.posts, ...second.posts]) {
    if (seen.has(post.text)) continue;
    seen.add(post.text);
    merged.push(post);
  }
  return createSnapshot(name, merged);
}
