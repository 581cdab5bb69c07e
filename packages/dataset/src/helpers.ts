export function mean(arr: readonly number[]): number {
  return arr.length > 0 ? arr.reduce((a, b) => a + b, 0) / arr.length : 0;
}

export function median(arr: readonly number[]): number {
  if (arr.length === 0) return 0;
  const sorted = [...arr].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0;
  if (sorted.length % 2 === 1) return upper;
  return ((sorted[mid - 1] ?? 0) + upper) / 2;
}

/** Sample standard deviation (n - 1); zero for fewer than two values. */
export function stdDev(arr: readonly number[]): number {
  if (arr.length < 2) return 0;
  const avg = mean(arr);
  const variance =
    arr.reduce((sum, val) => sum + (val - avg) ** 2, 0) / (arr.length - 1);
  return Math.sqrt(variance);
}

export function countHashtags(text: string): number {
  return text.match(/#\w+/g)?.length ?? 0;
}

export function countMentions(text: string): number {
  return text.match(/@\w+/g)?.length ?? 0;
}

/** Runs of consecutive pictographic characters count as one. */
export function countEmojis(text: string): number {
  return text.match(/\p{Extended_Pictographic}+/gu)?.length ?? 0;
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((w) => w.length > 0).length;
}

export function titleCase(text: string): string {
  return text
    .split(" ")
    .filter((w) => w.length > 0)
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1).toLowerCase())
    .join(" ");
}
