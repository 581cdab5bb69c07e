export {
  selectExamples,
  rankByEngagement,
  type SelectionCriteria,
  type Relaxation,
  type ExampleSelection,
  type SelectionWarning,
  type EmptyDatasetWarning,
  type RelaxedMatchWarning,
} from "./select.js";
export {
  buildPrompt,
  buildCustomPrompt,
  inspectExamples,
  neutralizeExampleText,
  flattenInline,
  TASK_INSTRUCTION,
  CUSTOM_TASK_INSTRUCTION,
  EXAMPLES_INTRO,
  HINGLISH_NOTE,
  type TemplateInjectionRisk,
} from "./prompt.js";
export {
  TONE_GUIDELINES,
  STYLE_GUIDELINES,
  AUDIENCE_GUIDELINES,
  PURPOSE_GUIDELINES,
  audienceGuideline,
} from "./guidelines.js";
export {
  validatePost,
  maxLinesFor,
  LINE_SLACK,
  MIN_CHARACTERS,
  DEFAULT_MAX_CHARACTERS,
  type ValidationFailure,
  type ValidationFailureKind,
  type ValidationWarning,
  type ValidationWarningKind,
  type ValidatedPost,
  type ValidateOptions,
  type PostShape,
} from "./validate.js";
export {
  generatePost,
  generateCustomPost,
  createLlmGenerator,
  type TextGenerator,
  type GenerationParams,
  type GenerationWarning,
  type GenerationResult,
  type CustomGenerationResult,
  type GenerateOptions,
} from "./generate.js";
export {
  labelRawPosts,
  normalizeMetadata,
  defaultMetadata,
  extractWithLlm,
  readRawPosts,
  processedDatasetPath,
  ExtractedMetadataSchema,
  MAX_LABEL_TAGS,
  type ExtractedMetadata,
  type MetadataExtractor,
  type PostMetadata,
  type LabelOptions,
} from "./label.js";
export {
  callLlm,
  callLlmJson,
  extractJson,
  parseJsonPermissive,
  unwrapSingleKeyObject,
  type LlmCallOptions,
  type LlmCallResult,
} from "./llm.js";
