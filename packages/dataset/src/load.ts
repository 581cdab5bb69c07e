import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { z } from "zod";
import {
  AudienceSchema,
  LanguageSchema,
  LengthBucketSchema,
  ToneSchema,
  createChildLogger,
  isMissingFile,
  type ExamplePost,
} from "@postcraft/core";
import { categorizeLength, countLines, ensureTags, normalizeTag } from "./normalize.js";

const logger = createChildLogger({ module: "dataset:load" });

/**
 * A dataset loaded into memory. Frozen: posts, their tag lists and the
 * snapshot itself reject mutation, so one snapshot can serve any number of
 * concurrent generations.
 */
export interface DatasetSnapshot {
  readonly name: string;
  readonly posts: readonly ExamplePost[];
  /** Unique tags across all posts, sorted. */
  readonly tags: readonly string[];
}

/**
 * On-disk record shape. Accepts the snake_case keys the dataset files use
 * as well as camelCase, and `length_bucket` as an alias of `length`.
 */
export const RawPostRecordSchema = z.object({
  text: z.string().trim().min(1, "text cannot be empty"),
  engagement: z.number().nonnegative().optional(),
  tags: z.unknown().optional(),
  language: LanguageSchema.optional(),
  length: LengthBucketSchema.optional(),
  length_bucket: LengthBucketSchema.optional(),
  line_count: z.number().int().positive().optional(),
  lineCount: z.number().int().positive().optional(),
  tone: ToneSchema.optional().catch(undefined),
  target_audience: AudienceSchema.optional().catch(undefined),
  targetAudience: AudienceSchema.optional().catch(undefined),
});

export type RawPostRecord = z.infer<typeof RawPostRecordSchema>;

export function normalizeRecord(record: RawPostRecord): ExamplePost {
  const lineCount = record.lineCount ?? record.line_count ?? countLines(record.text);
  const post: ExamplePost = {
    text: record.text,
    tags: ensureTags(record.tags),
    language: record.language ?? "English",
    length: record.length ?? record.length_bucket ?? categorizeLength(lineCount),
    lineCount,
    engagement: Math.round(record.engagement ?? 0),
  };
  const tone = record.tone;
  const targetAudience = record.targetAudience ?? record.target_audience;
  if (tone) post.tone = tone;
  if (targetAudience) post.targetAudience = targetAudience;
  return post;
}

function uniqueTags(posts: readonly ExamplePost[]): string[] {
  const byKey = new Map<string, string>();
  for (const post of posts) {
    for (const tag of post.tags) {
      const key = normalizeTag(tag);
      if (!byKey.has(key)) byKey.set(key, tag);
    }
  }
  return [...byKey.values()].sort((a, b) => a.localeCompare(b));
}

export function createSnapshot(
  name: string,
  posts: readonly ExamplePost[]
): DatasetSnapshot {
  const frozen = posts.map((post) => {
    const tags = [...post.tags];
    Object.freeze(tags);
    const copy: ExamplePost = { ...post, tags };
    Object.freeze(copy);
    return copy;
  });
  Object.freeze(frozen);
  const snapshot: DatasetSnapshot = {
    name,
    posts: frozen,
    tags: Object.freeze(uniqueTags(frozen)),
  };
  return Object.freeze(snapshot);
}

export function emptySnapshot(name = "empty"): DatasetSnapshot {
  return createSnapshot(name, []);
}

/**
 * Validate and normalise a decoded dataset document.
 * Throws with every offending record index listed.
 */
export function parseDataset(raw: unknown, name = "dataset"): DatasetSnapshot {
  if (!Array.isArray(raw)) {
    throw new Error(`Invalid dataset "${name}": must be a list of posts`);
  }

  const posts: ExamplePost[] = [];
  const errors: string[] = [];

  raw.forEach((record: unknown, index) => {
    const result = RawPostRecordSchema.safeParse(record);
    if (!result.success) {
      for (const issue of result.error.issues) {
        const field = issue.path.join(".") || "(record)";
        errors.push(`  [${index}] ${field}: ${issue.message}`);
      }
      return;
    }
    posts.push(normalizeRecord(result.data));
  });

  if (errors.length > 0) {
    throw new Error(`Invalid dataset "${name}":\n${errors.join("\n")}`);
  }

  return createSnapshot(name, posts);
}

export function datasetNameFromPath(filePath: string): string {
  return basename(filePath).replace(/\.json$/i, "");
}

/**
 * Load a dataset file. A missing file yields an empty snapshot; a file
 * that is not valid JSON or fails validation throws.
 */
export async function loadDataset(filePath: string): Promise<DatasetSnapshot> {
  const name = datasetNameFromPath(filePath);

  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) {
      logger.warn({ filePath }, "Dataset file not found, using empty dataset");
      return emptySnapshot(name);
    }
    throw err;
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (err) {
    throw new Error(
      `Invalid JSON in dataset "${filePath}": ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const snapshot = parseDataset(decoded, name);
  logger.info(
    { filePath, posts: snapshot.posts.length, tags: snapshot.tags.length },
    "Dataset loaded"
  );
  return snapshot;
}
