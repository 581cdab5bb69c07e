import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import type { Language, LengthBucket } from "./schemas/post.js";
import { createChildLogger } from "./logger.js";

const logger = createChildLogger({ module: "core:history" });

export const DEFAULT_MAX_HISTORY_ENTRIES = 100;

export const GeneratedPostEntrySchema = z.object({
  content: z.string(),
  request: z.record(z.unknown()),
  createdAt: z.string(),
  examplesUsed: z.number().int().nonnegative(),
});

export type GeneratedPostEntry = z.infer<typeof GeneratedPostEntrySchema>;

export interface HistoryFilter {
  language?: Language;
  length?: LengthBucket;
}

/**
 * Load generated-post history. A missing or unreadable file reads as
 * empty; entries that do not match the schema are dropped.
 */
export async function loadHistory(
  historyFile: string
): Promise<GeneratedPostEntry[]> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(historyFile, "utf-8"));
  } catch (err) {
    logger.debug({ historyFile, err }, "No readable history, starting empty");
    return [];
  }
  if (!Array.isArray(parsed)) return [];

  const entries: GeneratedPostEntry[] = [];
  for (const value of parsed) {
    const result = GeneratedPostEntrySchema.safeParse(value);
    if (result.success) entries.push(result.data);
  }
  if (entries.length < parsed.length) {
    logger.warn(
      { historyFile, dropped: parsed.length - entries.length },
      "Dropped malformed history entries"
    );
  }
  return entries;
}

/** Keep entries whose request matches every given field. */
export function filterHistory(
  entries: readonly GeneratedPostEntry[],
  filter: HistoryFilter
): GeneratedPostEntry[] {
  return entries.filter(
    (entry) =>
      (filter.language === undefined || entry.request.language === filter.language) &&
      (filter.length === undefined || entry.request.length === filter.length)
  );
}

/**
 * Append an entry to the history, keeping only the most recent `maxEntries`.
 */
export async function appendHistory(
  historyFile: string,
  entry: GeneratedPostEntry,
  maxEntries = DEFAULT_MAX_HISTORY_ENTRIES
): Promise<GeneratedPostEntry[]> {
  const entries = await loadHistory(historyFile);
  entries.push(entry);

  const trimmed =
    entries.length > maxEntries
      ? entries.slice(entries.length - maxEntries)
      : entries;

  await mkdir(dirname(historyFile), { recursive: true });
  await writeFile(historyFile, JSON.stringify(trimmed, null, 2) + "\n");
  logger.info(
    { historyFile, totalEntries: trimmed.length },
    "Post history updated"
  );
  return trimmed;
}
