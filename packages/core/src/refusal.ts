/**
 * Phrasing that usually means the model declined, apologised or wrapped
 * the post in commentary instead of writing it.
 */
export const REFUSAL_PHRASES = [
  "i cannot",
  "i can't",
  "i'm unable to",
  "i am unable to",
  "error:",
  "sorry, i",
  "i apologize",
  "as an ai",
  "as a language model",
];

export const PREAMBLE_PHRASES = [
  "here is a linkedin post",
  "here's a linkedin post",
  "here is your linkedin post",
  "here's your linkedin post",
  "sure! here",
  "sure, here",
];

/**
 * Check generated text for refusal phrasing. Case-insensitive.
 */
export function detectRefusalPhrases(content: string): string[] {
  const lower = content.toLowerCase();
  return REFUSAL_PHRASES.filter((phrase) => lower.includes(phrase));
}

/**
 * Only the opening line counts: a post may legitimately quote these words later.
 */
export function detectPreamble(content: string): string | undefined {
  const firstLine = content.trimStart().split("\n", 1)[0]?.toLowerCase() ?? "";
  return PREAMBLE_PHRASES.find((phrase) => firstLine.startsWith(phrase));
}
