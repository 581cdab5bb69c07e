import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { createChildLogger, type ExamplePost } from "@postcraft/core";
import type { DatasetSnapshot } from "./load.js";

const logger = createChildLogger({ module: "dataset:save" });

export const PROCESSOR_VERSION = "2.0.0";

export interface DatasetFileRecord {
  text: string;
  engagement: number;
  line_count: number;
  language: string;
  tags: string[];
  length: string;
  tone?: string;
  target_audience?: string;
}

export interface DatasetMetadata {
  processedAt: string;
  totalPosts: number;
  processorVersion: string;
}

export function toFileRecord(post: ExamplePost): DatasetFileRecord {
  const record: DatasetFileRecord = {
    text: post.text,
    engagement: post.engagement,
    line_count: post.lineCount,
    language: post.language,
    tags: [...post.tags],
    length: post.length,
  };
  if (post.tone) record.tone = post.tone;
  if (post.targetAudience) record.target_audience = post.targetAudience;
  return record;
}

export function metadataPath(filePath: string): string {
  return filePath.replace(/\.json$/i, "") + "_metadata.json";
}

/**
 * Write a dataset and its `_metadata.json` sidecar.
 */
export async function saveDataset(
  snapshot: DatasetSnapshot,
  filePath: string,
  now: Date = new Date()
): Promise<DatasetMetadata> {
  await mkdir(dirname(filePath), { recursive: true });

  const records = snapshot.posts.map(toFileRecord);
  await writeFile(filePath, JSON.stringify(records, null, 2) + "\n", "utf-8");

  const metadata: DatasetMetadata = {
    processedAt: now.toISOString(),
    totalPosts: records.length,
    processorVersion: PROCESSOR_VERSION,
  };
  await writeFile(
    metadataPath(filePath),
    JSON.stringify(metadata, null, 2) + "\n",
    "utf-8"
  );

  logger.info({ filePath, totalPosts: records.length }, "Dataset saved");
  return metadata;
}
