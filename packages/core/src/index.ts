export { logger, createChildLogger, type Logger } from "./logger.js";
export { env, optionalEnv } from "./env.js";
export {
  loadSettings,
  parseSettings,
  applyOverrides,
  getConfigPath,
  isMissingFile,
  type SettingsOverrides,
} from "./config.js";
export {
  loadHistory,
  appendHistory,
  filterHistory,
  GeneratedPostEntrySchema,
  DEFAULT_MAX_HISTORY_ENTRIES,
  type GeneratedPostEntry,
  type HistoryFilter,
} from "./history.js";
export {
  loadTemplates,
  addTemplate,
  removeTemplate,
  PromptTemplateSchema,
  type PromptTemplate,
  type PromptTemplateInput,
} from "./templates.js";
export {
  REFUSAL_PHRASES,
  PREAMBLE_PHRASES,
  detectRefusalPhrases,
  detectPreamble,
} from "./refusal.js";
export { ok, err, type Result } from "./result.js";
export * from "./schemas/post.js";
export * from "./schemas/settings.js";
