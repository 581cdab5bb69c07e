import {
  LENGTH_DEFINITIONS,
  detectPreamble,
  detectRefusalPhrases,
  err,
  ok,
  type GenerationRequest,
  type LengthBucket,
  type Result,
} from "@postcraft/core";
import { countContentLines, countHashtags } from "@postcraft/dataset";

export const LINE_SLACK = 1;
export const MIN_CHARACTERS = 10;
export const DEFAULT_MAX_CHARACTERS = 2000;

export type ValidationFailureKind =
  | "empty_output"
  | "too_short"
  | "character_limit_exceeded"
  | "line_count_exceeded";

export interface ValidationFailure {
  kind: ValidationFailureKind;
  /** The rule that was broken, e.g. "lines <= 11". */
  constraint: string;
  message: string;
  /** The offending output, trimmed. */
  output: string;
}

export type ValidationWarningKind = "missing_hashtags" | "possible_refusal" | "preamble";

export interface ValidationWarning {
  kind: ValidationWarningKind;
  message: string;
}

export interface ValidatedPost {
  text: string;
  lineCount: number;
  warnings: ValidationWarning[];
}

export interface ValidateOptions {
  maxCharacters?: number;
}

export type PostShape = Pick<GenerationRequest, "length" | "includeHashtags">;

export function maxLinesFor(length: LengthBucket): number {
  return LENGTH_DEFINITIONS[length].maxLines + LINE_SLACK;
}

/**
 * Check generated text against the requested shape. Never throws: a
 * failure comes back as a value carrying the text and the broken rule.
 */
export function validatePost(
  rawOutput: string,
  request: PostShape,
  options: ValidateOptions = {}
): Result<ValidatedPost, ValidationFailure> {
  const text = rawOutput.trim();
  const maxCharacters = options.maxCharacters ?? DEFAULT_MAX_CHARACTERS;

  if (text.length === 0) {
    return err({
      kind: "empty_output",
      constraint: "non-empty output",
      message: "Generated output is empty",
      output: text,
    });
  }

  if (text.length < MIN_CHARACTERS) {
    return err({
      kind: "too_short",
      constraint: `characters >= ${MIN_CHARACTERS}`,
      message: `Generated output has only ${text.length} characters`,
      output: text,
    });
  }

  if (text.length > maxCharacters) {
    return err({
      kind: "character_limit_exceeded",
      constraint: `characters <= ${maxCharacters}`,
      message: `Generated output has ${text.length} characters`,
      output: text,
    });
  }

  const lineCount = countContentLines(text);
  const maxLines = maxLinesFor(request.length);
  if (lineCount > maxLines) {
    return err({
      kind: "line_count_exceeded",
      constraint: `lines <= ${maxLines}`,
      message: `${request.length} post has ${lineCount} lines (limit ${maxLines})`,
      output: text,
    });
  }

  const warnings: ValidationWarning[] = [];
  if (request.includeHashtags && countHashtags(text) === 0) {
    warnings.push({
      kind: "missing_hashtags",
      message: "Hashtags were requested but none were generated",
    });
  }

  const refusals = detectRefusalPhrases(text);
  if (refusals.length > 0) {
    warnings.push({
      kind: "possible_refusal",
      message: `Output contains refusal phrasing: ${refusals.join(", ")}`,
    });
  }

  const preamble = detectPreamble(text);
  if (preamble) {
    warnings.push({
      kind: "preamble",
      message: `Output opens with a preamble: "${preamble}"`,
    });
  }

  return ok({ text, lineCount, warnings });
}
