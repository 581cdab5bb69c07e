import { z } from "zod";
import { LanguageSchema, LengthBucketSchema, ToneSchema } from "./post.js";

export const MAX_EXAMPLES = 2;

export const ModelTierSchema = z.enum(["opus", "sonnet"]);

export const SettingsSchema = z.object({
  model: z
    .object({
      tier: ModelTierSchema.default("sonnet"),
      temperature: z.number().min(0).max(1).default(0.7),
      maxTokens: z.number().int().positive().default(1000),
    })
    .default({}),
  generation: z
    .object({
      maxExamples: z.number().int().min(0).max(MAX_EXAMPLES).default(MAX_EXAMPLES),
      maxCharacters: z.number().int().positive().default(2000),
      defaultLanguage: LanguageSchema.default("English"),
      defaultLength: LengthBucketSchema.default("Medium"),
      defaultTone: ToneSchema.default("Professional"),
    })
    .default({}),
  paths: z
    .object({
      dataDir: z.string().default("data"),
      defaultDataset: z.string().default("data/processed_posts.json"),
      historyFile: z.string().default("data/generated_posts_history.json"),
      templatesFile: z.string().default("data/prompt_templates.json"),
    })
    .default({}),
  history: z
    .object({
      maxEntries: z.number().int().positive().default(100),
    })
    .default({}),
});

export type Settings = z.infer<typeof SettingsSchema>;

export type ModelTier = z.infer<typeof ModelTierSchema>;
