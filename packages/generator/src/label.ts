import { readFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { z } from "zod";
import {
  AudienceSchema,
  LanguageSchema,
  ToneSchema,
  createChildLogger,
  type ExamplePost,
} from "@postcraft/core";
import { categorizeLength, countLines, ensureTags } from "@postcraft/dataset";
import { callLlmJson } from "./llm.js";

const logger = createChildLogger({ module: "generator:label" });

export const MAX_LABEL_TAGS = 4;

/** Metadata as the extractor reports it; every field is checked before use. */
export const ExtractedMetadataSchema = z.object({
  language: z.unknown().optional(),
  tags: z.unknown().optional(),
  tone: z.unknown().optional(),
  target_audience: z.unknown().optional(),
});

export type ExtractedMetadata = z.infer<typeof ExtractedMetadataSchema>;

export type MetadataExtractor = (text: string) => Promise<ExtractedMetadata>;

export type PostMetadata = Omit<ExamplePost, "text" | "engagement">;

export interface LabelOptions {
  extract?: MetadataExtractor;
  onProgress?: (done: number, total: number) => void;
}

const LABEL_SYSTEM_PROMPT = `You are an expert at analyzing LinkedIn posts. Extract metadata from the post you are given.

Return ONLY a JSON object with these fields:
- "language": "English" or "Hinglish" (a mix of Hindi and English)
- "tags": 2-4 short topic tags describing the main themes
- "tone": one of "Professional", "Casual", "Humorous", "Inspirational", "Educational"
- "target_audience": one of "Students", "Professionals", "Job Seekers", "Entrepreneurs", "General"`;

export const extractWithLlm: MetadataExtractor = async (text) => {
  const { data } = await callLlmJson(
    "sonnet",
    LABEL_SYSTEM_PROMPT,
    `Post to analyze:\n\n${text}`,
    ExtractedMetadataSchema,
    { temperature: 0, maxTokens: 300 }
  );
  return data;
};

function lengthFields(text: string): Pick<PostMetadata, "lineCount" | "length"> {
  const lineCount = countLines(text);
  return { lineCount, length: categorizeLength(lineCount) };
}

export function defaultMetadata(text: string): PostMetadata {
  return {
    ...lengthFields(text),
    language: "English",
    tags: ["General"],
    tone: "Professional",
    targetAudience: "General",
  };
}

/**
 * Length always comes from the text itself. Values outside the known
 * enumerations fall back to the defaults.
 */
export function normalizeMetadata(metadata: ExtractedMetadata, text: string): PostMetadata {
  const language = LanguageSchema.safeParse(metadata.language);
  const tone = ToneSchema.safeParse(metadata.tone);
  const audience = AudienceSchema.safeParse(metadata.target_audience);
  return {
    ...lengthFields(text),
    language: language.success ? language.data : "English",
    tags: ensureTags(metadata.tags).slice(0, MAX_LABEL_TAGS),
    tone: tone.success ? tone.data : "Professional",
    targetAudience: audience.success ? audience.data : "General",
  };
}

function recordField(record: unknown, key: string): unknown {
  if (record && typeof record === "object" && key in record) {
    return Object.getOwnPropertyDescriptor(record, key)?.value;
  }
  return undefined;
}

function engagementOf(record: unknown): number {
  const value = recordField(record, "engagement");
  return typeof value === "number" && Number.isFinite(value) && value > 0
    ? Math.round(value)
    : 0;
}

/**
 * Label raw `{ text, engagement? }` records one at a time. Records without
 * text are skipped; a failed extraction falls back to default metadata.
 */
export async function labelRawPosts(
  raw: readonly unknown[],
  options: LabelOptions = {}
): Promise<ExamplePost[]> {
  const extract = options.extract ?? extractWithLlm;
  const labelled: ExamplePost[] = [];

  for (const [index, record] of raw.entries()) {
    const text = recordField(record, "text");
    if (typeof text !== "string" || !text.trim()) {
      logger.warn({ index }, "Skipping post without text content");
      options.onProgress?.(index + 1, raw.length);
      continue;
    }

    let metadata: PostMetadata;
    try {
      metadata = normalizeMetadata(await extract(text), text);
    } catch (error) {
      logger.warn({ index, error: String(error) }, "Metadata extraction failed; using defaults");
      metadata = defaultMetadata(text);
    }

    labelled.push({ text, engagement: engagementOf(record), ...metadata });
    options.onProgress?.(index + 1, raw.length);
  }

  logger.info({ total: raw.length, labelled: labelled.length }, "Raw posts labelled");
  return labelled;
}

export async function readRawPosts(path: string): Promise<unknown[]> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, "utf-8"));
  } catch (error) {
    throw new Error(`Cannot read raw dataset "${path}": ${String(error)}`);
  }
  if (!Array.isArray(parsed)) {
    throw new Error(`Invalid raw dataset "${path}": must be a list of posts`);
  }
  return parsed;
}

/** `data/raw_x.json` → `data/processed_raw_x.json`; other names gain the `raw_` too. */
export function processedDatasetPath(rawPath: string): string {
  const name = basename(rawPath, ".json");
  const stem = name.startsWith("raw_") ? name : `raw_${name}`;
  return join(dirname(rawPath), `processed_${stem}.json`);
}
