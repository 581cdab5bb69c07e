import { z } from "zod";

// ─── Enumerations ───────────────────────────────────────────────────────────

export const LanguageSchema = z.enum(["English", "Hinglish"]);
export type Language = z.infer<typeof LanguageSchema>;

export const LengthBucketSchema = z.enum(["Short", "Medium", "Long"]);
export type LengthBucket = z.infer<typeof LengthBucketSchema>;

export const ToneSchema = z.enum([
  "Professional",
  "Casual",
  "Humorous",
  "Inspirational",
  "Educational",
]);
export type Tone = z.infer<typeof ToneSchema>;

export const AudienceSchema = z.enum([
  "Students",
  "Professionals",
  "Entrepreneurs",
  "Job Seekers",
  "General",
]);
export type Audience = z.infer<typeof AudienceSchema>;

export const StyleSchema = z.enum([
  "Storytelling",
  "List Format",
  "Question-Answer",
  "Tips & Tricks",
  "Personal Reflection",
]);
export type Style = z.infer<typeof StyleSchema>;

export const PurposeSchema = z.enum([
  "Share Experience",
  "Give Advice",
  "Ask Question",
  "Celebrate Achievement",
  "Educational",
]);
export type Purpose = z.infer<typeof PurposeSchema>;

// ─── Length Definitions ─────────────────────────────────────────────────────

export interface LengthDefinition {
  lines: string;
  words: string;
  description: string;
  /** Upper bound of the line range the descriptor promises. */
  maxLines: number;
}

export const LENGTH_DEFINITIONS: Record<LengthBucket, LengthDefinition> = {
  Short: {
    lines: "1 to 5 lines",
    words: "10-50 words",
    description: "Quick, punchy content",
    maxLines: 5,
  },
  Medium: {
    lines: "6 to 10 lines",
    words: "51-150 words",
    description: "Balanced, engaging content",
    maxLines: 10,
  },
  Long: {
    lines: "11 to 15 lines",
    words: "151-300 words",
    description: "Detailed, comprehensive content",
    maxLines: 15,
  },
};

// ─── Example Post ───────────────────────────────────────────────────────────

export const ExamplePostSchema = z.object({
  text: z.string().min(1),
  tags: z.array(z.string()),
  language: LanguageSchema,
  length: LengthBucketSchema,
  lineCount: z.number().int().positive(),
  engagement: z.number().int().nonnegative(),
  tone: ToneSchema.optional(),
  targetAudience: AudienceSchema.optional(),
});

export type ExamplePost = z.infer<typeof ExamplePostSchema>;

// ─── Generation Requests ────────────────────────────────────────────────────

export const GenerationRequestSchema = z.object({
  topic: z.string().trim().min(1, "Topic is required"),
  length: LengthBucketSchema,
  language: LanguageSchema,
  tone: ToneSchema.default("Professional"),
  audience: z.string().trim().min(1).optional(),
  style: StyleSchema.optional(),
  includeHashtags: z.boolean().default(true),
  includeEmojis: z.boolean().default(true),
  callToAction: z.boolean().default(false),
});

export type GenerationRequest = z.infer<typeof GenerationRequestSchema>;
export type GenerationRequestInput = z.input<typeof GenerationRequestSchema>;

export const MAX_KEYWORDS = 10;

export const CustomPostRequestSchema = z.object({
  topic: z.string().trim().min(3).max(200),
  audience: AudienceSchema,
  purpose: PurposeSchema,
  length: LengthBucketSchema,
  language: LanguageSchema,
  style: StyleSchema,
  context: z.string().trim().max(500).default(""),
  keywords: z.array(z.string().trim().min(1)).max(MAX_KEYWORDS).default([]),
});

export type CustomPostRequest = z.infer<typeof CustomPostRequestSchema>;
export type CustomPostRequestInput = z.input<typeof CustomPostRequestSchema>;
