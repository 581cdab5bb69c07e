import {
  MAX_EXAMPLES,
  createChildLogger,
  type CustomPostRequest,
  type ExamplePost,
  type GenerationRequest,
  type ModelTier,
  type Result,
  type Settings,
} from "@postcraft/core";
import type { DatasetSnapshot } from "@postcraft/dataset";
import { callLlm } from "./llm.js";
import {
  buildCustomPrompt,
  buildPrompt,
  inspectExamples,
  type TemplateInjectionRisk,
} from "./prompt.js";
import { selectExamples, type Relaxation, type SelectionWarning } from "./select.js";
import {
  validatePost,
  type ValidatedPost,
  type ValidationFailure,
} from "./validate.js";

const logger = createChildLogger({ module: "generator" });

export interface GenerationParams {
  tier?: ModelTier;
  temperature?: number;
  maxTokens?: number;
}

/**
 * The external text generator. Whatever it throws reaches the caller of
 * `generatePost` unchanged.
 */
export type TextGenerator = (prompt: string, params: GenerationParams) => Promise<string>;

export type GenerationWarning = SelectionWarning | TemplateInjectionRisk;

export interface GenerationResult {
  prompt: string;
  examples: ExamplePost[];
  relaxation: Relaxation;
  warnings: GenerationWarning[];
  validation: Result<ValidatedPost, ValidationFailure>;
}

export interface CustomGenerationResult {
  prompt: string;
  validation: Result<ValidatedPost, ValidationFailure>;
}

export interface GenerateOptions {
  dataset: DatasetSnapshot;
  generate: TextGenerator;
  params?: GenerationParams;
  maxExamples?: number;
  maxCharacters?: number;
}

const SYSTEM_PROMPT =
  "You write LinkedIn posts. Reply with the post text only: no title, no preamble, no commentary.";

/** Default generator backed by the configured hosted model. */
export function createLlmGenerator(settings: Settings): TextGenerator {
  return async (prompt, params) => {
    const result = await callLlm(params.tier ?? settings.model.tier, SYSTEM_PROMPT, prompt, {
      temperature: params.temperature ?? settings.model.temperature,
      maxTokens: params.maxTokens ?? settings.model.maxTokens,
    });
    logger.info(
      { model: result.model, outputTokens: result.outputTokens, cost: result.cost },
      "Post generated"
    );
    return result.content;
  };
}

/**
 * Select examples, render the prompt, call the generator and validate what
 * comes back.
 */
export async function generatePost(
  request: GenerationRequest,
  options: GenerateOptions
): Promise<GenerationResult> {
  const { dataset, generate, params = {} } = options;

  const selection = selectExamples(dataset, {
    tags: [request.topic],
    length: request.length,
    language: request.language,
    limit: options.maxExamples ?? MAX_EXAMPLES,
  });
  const risks = inspectExamples(selection.examples);
  const warnings: GenerationWarning[] = [...selection.warnings, ...risks];
  for (const warning of warnings) {
    logger.warn({ kind: warning.kind }, warning.message);
  }

  const prompt = buildPrompt(request, selection.examples);
  logger.debug(
    { dataset: dataset.name, examples: selection.examples.length, relaxation: selection.relaxation },
    "Prompt built"
  );

  const output = await generate(prompt, params);
  const validation = validatePost(output, request, { maxCharacters: options.maxCharacters });
  if (!validation.ok) {
    logger.warn({ kind: validation.error.kind, constraint: validation.error.constraint }, validation.error.message);
  }

  return {
    prompt,
    examples: selection.examples,
    relaxation: selection.relaxation,
    warnings,
    validation,
  };
}

export async function generateCustomPost(
  request: CustomPostRequest,
  options: Omit<GenerateOptions, "dataset" | "maxExamples">
): Promise<CustomGenerationResult> {
  const prompt = buildCustomPrompt(request);
  const output = await options.generate(prompt, options.params ?? {});
  const validation = validatePost(
    output,
    { length: request.length, includeHashtags: true },
    { maxCharacters: options.maxCharacters }
  );
  if (!validation.ok) {
    logger.warn({ kind: validation.error.kind }, validation.error.message);
  }
  return { prompt, validation };
}
