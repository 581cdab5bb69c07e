import type { LengthBucket } from "@postcraft/core";

export function countLines(text: string): number {
  return text.split("\n").length;
}

/** Lines that carry content; spacer lines between paragraphs are ignored. */
export function countContentLines(text: string): number {
  return text.split("\n").filter((line) => line.trim().length > 0).length;
}

export function categorizeLength(lineCount: number): LengthBucket {
  if (lineCount <= 5) return "Short";
  if (lineCount <= 10) return "Medium";
  return "Long";
}

export function normalizeTag(tag: string): string {
  return tag.trim().toLowerCase();
}

/**
 * Coerce the tag field of a raw record into a clean list.
 * A bare string becomes a one-item list; anything else non-array is empty.
 */
export function ensureTags(tags: unknown): string[] {
  const list = typeof tags === "string" ? [tags] : Array.isArray(tags) ? tags : [];
  const seen = new Set<string>();
  const result: string[] = [];
  for (const tag of list) {
    if (typeof tag !== "string") continue;
    const trimmed = tag.trim();
    if (!trimmed || seen.has(normalizeTag(trimmed))) continue;
    seen.add(normalizeTag(trimmed));
    result.push(trimmed);
  }
  return result;
}
