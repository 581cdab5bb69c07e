import { MAX_EXAMPLES, type ExamplePost, type Language, type LengthBucket } from "@postcraft/core";
import { normalizeTag, type DatasetSnapshot } from "@postcraft/dataset";

export interface SelectionCriteria {
  tags: readonly string[] | ReadonlySet<string>;
  length: LengthBucket;
  language: Language;
  /** Clamped to 0..2. */
  limit?: number;
}

/**
 * Which pass produced the examples. Each pass drops one more constraint
 * than the previous one: length first, then language, then tag.
 */
export type Relaxation =
  | "exact"
  | "any-length"
  | "any-language"
  | "any-tag"
  | "none";

export interface EmptyDatasetWarning {
  kind: "empty_dataset";
  message: string;
}

export interface RelaxedMatchWarning {
  kind: "relaxed_match";
  relaxation: Exclude<Relaxation, "exact" | "none">;
  message: string;
}

export type SelectionWarning = EmptyDatasetWarning | RelaxedMatchWarning;

export interface ExampleSelection {
  examples: ExamplePost[];
  relaxation: Relaxation;
  warnings: SelectionWarning[];
}

interface Pass {
  relaxation: Exclude<Relaxation, "none">;
  matches: (post: ExamplePost) => boolean;
}

const RELAXED_MESSAGES: Record<RelaxedMatchWarning["relaxation"], string> = {
  "any-length": "No exact match; using examples of another length",
  "any-language": "No match in the requested language; using examples in another language",
  "any-tag": "No example shares a tag with the request; using the most engaging posts",
};

function clampLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit)) return MAX_EXAMPLES;
  return Math.max(0, Math.min(MAX_EXAMPLES, Math.floor(limit)));
}

/**
 * Highest engagement first; dataset order breaks ties.
 */
export function rankByEngagement(posts: readonly ExamplePost[]): ExamplePost[] {
  return posts
    .map((post, index) => ({ post, index }))
    .sort((a, b) => b.post.engagement - a.post.engagement || a.index - b.index)
    .map(({ post }) => post);
}

/**
 * Pick up to two few-shot examples for a request. Pure: the dataset is
 * only read, and the same inputs always give the same output.
 */
export function selectExamples(
  dataset: DatasetSnapshot,
  criteria: SelectionCriteria
): ExampleSelection {
  const limit = clampLimit(criteria.limit);

  if (dataset.posts.length === 0) {
    return {
      examples: [],
      relaxation: "none",
      warnings: [
        {
          kind: "empty_dataset",
          message: `Dataset "${dataset.name}" has no posts; the prompt will carry no examples`,
        },
      ],
    };
  }

  const wanted = new Set([...criteria.tags].map(normalizeTag).filter(Boolean));
  const sharesTag = (post: ExamplePost) =>
    post.tags.some((tag) => wanted.has(normalizeTag(tag)));
  const sameLanguage = (post: ExamplePost) => post.language === criteria.language;
  const sameLength = (post: ExamplePost) => post.length === criteria.length;

  const passes: Pass[] = [
    { relaxation: "exact", matches: (p) => sameLanguage(p) && sameLength(p) && sharesTag(p) },
    { relaxation: "any-length", matches: (p) => sameLanguage(p) && sharesTag(p) },
    { relaxation: "any-language", matches: sharesTag },
    { relaxation: "any-tag", matches: () => true },
  ];

  for (const pass of passes) {
    const matched = dataset.posts.filter(pass.matches);
    if (matched.length === 0) continue;

    const examples = rankByEngagement(matched).slice(0, limit);
    const warnings: SelectionWarning[] =
      pass.relaxation === "exact"
        ? []
        : [
            {
              kind: "relaxed_match",
              relaxation: pass.relaxation,
              message: RELAXED_MESSAGES[pass.relaxation],
            },
          ];
    return { examples, relaxation: pass.relaxation, warnings };
  }

  // Unreachable: the last pass accepts every post of a non-empty dataset.
  return { examples: [], relaxation: "none", warnings: [] };
}
