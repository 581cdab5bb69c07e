import {
  LENGTH_DEFINITIONS,
  type CustomPostRequest,
  type ExamplePost,
  type GenerationRequest,
} from "@postcraft/core";
import {
  PURPOSE_GUIDELINES,
  STYLE_GUIDELINES,
  TONE_GUIDELINES,
  audienceGuideline,
} from "./guidelines.js";

export const TASK_INSTRUCTION =
  "Generate a LinkedIn post using the below information. No preamble.";
export const CUSTOM_TASK_INSTRUCTION =
  "Generate a LinkedIn post with the following specifications. No preamble.";
export const EXAMPLES_INTRO = "Use the writing style as per the following examples:";
export const HINGLISH_NOTE =
  "Hinglish means a mix of Hindi and English. The script of the post must always be English (Latin letters).";

const EXAMPLE_TAG = /<(\/?example)/gi;

export interface TemplateInjectionRisk {
  kind: "template_injection_risk";
  exampleIndex: number;
  message: string;
}

/**
 * Example text is data. Any sequence that could open or close an example
 * block has its `<` escaped so the block boundaries stay intact.
 */
export function neutralizeExampleText(text: string): string {
  return text.replace(EXAMPLE_TAG, "&lt;$1");
}

export function inspectExamples(
  examples: readonly ExamplePost[]
): TemplateInjectionRisk[] {
  const risks: TemplateInjectionRisk[] = [];
  examples.forEach((example, index) => {
    if (neutralizeExampleText(example.text) !== example.text) {
      risks.push({
        kind: "template_injection_risk",
        exampleIndex: index,
        message: `Example ${index + 1} contains example-block delimiters; they were escaped`,
      });
    }
  });
  return risks;
}

/** Keep user-supplied attributes on their own line of the list. */
export function flattenInline(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

function numbered(items: string[]): string {
  return items.map((item, i) => `${i + 1}) ${item}`).join("\n");
}

function bullets(items: string[]): string {
  return items.map((item) => `- ${item}`).join("\n");
}

function renderExamples(examples: readonly ExamplePost[]): string[] {
  if (examples.length === 0) return [];
  return [
    EXAMPLES_INTRO,
    ...examples.map(
      (example, i) =>
        `Example ${i + 1}:\n<example>\n${neutralizeExampleText(example.text)}\n</example>`
    ),
  ];
}

/**
 * Render the generation prompt. Pure: identical inputs give a
 * byte-identical string.
 */
export function buildPrompt(
  request: GenerationRequest,
  examples: readonly ExamplePost[]
): string {
  const attributes = [
    `Topic: ${flattenInline(request.topic)}`,
    `Length: ${LENGTH_DEFINITIONS[request.length].lines}`,
    `Language: ${request.language}`,
    `Tone: ${request.tone}`,
  ];
  const guidelines = [TONE_GUIDELINES[request.tone]];

  const audience = request.audience ? flattenInline(request.audience) : "";
  if (audience) {
    attributes.push(`Target Audience: ${audience}`);
  }
  if (request.style) {
    attributes.push(`Writing Style: ${request.style}`);
    guidelines.push(STYLE_GUIDELINES[request.style]);
  }
  if (audience) {
    guidelines.push(audienceGuideline(audience));
  }
  if (request.includeHashtags) {
    attributes.push("Hashtags: add 3-5 relevant hashtags at the end");
  }
  if (request.includeEmojis) {
    attributes.push("Emojis: use appropriate emojis throughout the post");
  }
  if (request.callToAction) {
    attributes.push(
      'Call-to-Action: end with a prompt such as "What\'s your experience?"'
    );
  }

  const sections = [
    TASK_INSTRUCTION,
    numbered(attributes),
    ...(request.language === "Hinglish" ? [HINGLISH_NOTE] : []),
    `Guidelines:\n${bullets(guidelines)}`,
    ...renderExamples(examples),
  ];

  return sections.join("\n\n");
}

/**
 * Prompt for a fully specified custom post. Carries no examples.
 */
export function buildCustomPrompt(request: CustomPostRequest): string {
  const context = flattenInline(request.context);
  const keywords = request.keywords.map(flattenInline).filter(Boolean);

  const specifications = numbered([
    `Topic: ${flattenInline(request.topic)}`,
    `Target Audience: ${request.audience}`,
    `Post Purpose: ${request.purpose}`,
    `Length: ${LENGTH_DEFINITIONS[request.length].lines}`,
    `Language: ${request.language}`,
    `Writing Style: ${request.style}`,
    `Additional Context: ${context || "None"}`,
    `Keywords to Include: ${keywords.length > 0 ? keywords.join(", ") : "None specified"}`,
  ]);

  const formatting = [
    "Use appropriate emojis for engagement",
    "Include relevant hashtags",
    "Ensure the post is engaging and authentic",
  ];
  if (request.language === "Hinglish") {
    formatting.push("Mix Hindi and English naturally, written in English (Latin) script");
  }

  return [
    CUSTOM_TASK_INSTRUCTION,
    `CONTENT SPECIFICATIONS:\n${specifications}`,
    `STYLE GUIDELINES:\n${bullets([
      STYLE_GUIDELINES[request.style],
      audienceGuideline(request.audience),
      PURPOSE_GUIDELINES[request.purpose],
    ])}`,
    `FORMATTING:\n${bullets(formatting)}`,
    "Make the post relatable, engaging, and valuable for the target audience.",
  ].join("\n\n");
}
