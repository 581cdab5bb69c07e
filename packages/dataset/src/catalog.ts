import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { createChildLogger, isMissingFile } from "@postcraft/core";
import { parseDataset } from "./load.js";
import { titleCase } from "./helpers.js";

const logger = createChildLogger({ module: "dataset:catalog" });

const SYSTEM_FILES = new Set([
  "dataset_mappings.json",
  "prompt_templates.json",
  "generated_posts_history.json",
  "analytics_report.json",
]);

export interface DatasetEntry {
  displayName: string;
  path: string;
}

export interface DatasetCheck {
  valid: boolean;
  message: string;
  totalPosts: number;
}

function isCandidateFile(file: string): boolean {
  return (
    file.endsWith(".json") &&
    !file.endsWith("_metadata.json") &&
    !file.endsWith("_history.json") &&
    !SYSTEM_FILES.has(file)
  );
}

/**
 * A dataset is ready for few-shot use when its first record has text and
 * at least one tag.
 */
export function isProcessedDataset(data: unknown): boolean {
  if (!Array.isArray(data) || data.length === 0) return false;
  const first: unknown = data[0];
  if (typeof first !== "object" || first === null) return false;
  if (!("text" in first) || typeof first.text !== "string") return false;
  return "tags" in first && Array.isArray(first.tags) && first.tags.length > 0;
}

/**
 * `processed_raw_tech_students.json` → "Tech Students";
 * `raw_tech_students.json` → "Tech Students (Raw)" when listed as raw.
 */
export function displayName(file: string, isRaw = false): string {
  const name = file.replace(/\.json$/i, "");
  const base = name.replace(/^processed_/, "").replace(/^raw_/, "");
  const pretty = titleCase(base.replace(/_/g, " "));
  return isRaw && name.startsWith("raw_") ? `${pretty} (Raw)` : pretty;
}

async function readJsonFiles(
  dataDir: string
): Promise<Array<{ file: string; path: string; data: unknown }>> {
  let files: string[];
  try {
    files = await readdir(dataDir);
  } catch (err) {
    if (isMissingFile(err)) return [];
    throw err;
  }

  const results: Array<{ file: string; path: string; data: unknown }> = [];
  for (const file of files.filter(isCandidateFile).sort()) {
    const path = join(dataDir, file);
    try {
      const data: unknown = JSON.parse(await readFile(path, "utf-8"));
      results.push({ file, path, data });
    } catch (err) {
      logger.warn({ path, err }, "Skipping unreadable dataset file");
    }
  }
  return results;
}

export async function listDatasets(dataDir: string): Promise<DatasetEntry[]> {
  const files = await readJsonFiles(dataDir);
  return files
    .filter(({ data }) => isProcessedDataset(data))
    .map(({ file, path }) => ({ displayName: displayName(file), path }));
}

export async function listRawDatasets(dataDir: string): Promise<DatasetEntry[]> {
  const files = await readJsonFiles(dataDir);
  return files
    .filter(({ data }) => Array.isArray(data) && !isProcessedDataset(data))
    .map(({ file, path }) => ({ displayName: displayName(file, true), path }));
}

/**
 * Full validation of a dataset file, reported as a value for display.
 */
export async function checkDatasetFile(filePath: string): Promise<DatasetCheck> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) {
      return { valid: false, message: "Dataset file not found", totalPosts: 0 };
    }
    throw err;
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return { valid: false, message: "Invalid JSON format", totalPosts: 0 };
  }

  if (Array.isArray(data) && data.length === 0) {
    return { valid: false, message: "Dataset is empty", totalPosts: 0 };
  }

  try {
    const snapshot = parseDataset(data, filePath);
    return {
      valid: true,
      message: "Dataset is valid",
      totalPosts: snapshot.posts.length,
    };
  } catch (err) {
    return {
      valid: false,
      message: err instanceof Error ? err.message : String(err),
      totalPosts: 0,
    };
  }
}
