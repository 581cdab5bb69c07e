import Anthropic from "@anthropic-ai/sdk";
import { z } from "zod";
import { createChildLogger, env, type ModelTier } from "@postcraft/core";

const logger = createChildLogger({ module: "generator:llm" });

let _client: Anthropic | null = null;

function getClient(): Anthropic {
  if (!_client) {
    _client = new Anthropic({
      apiKey: env.anthropicApiKey || "unused",
      baseURL: env.anthropicBaseUrl,
    });
  }
  return _client;
}

type Provider = "anthropic" | "gemini";

const MODEL_MAP: Record<ModelTier, string> = {
  opus: "claude-opus-4-1-20250805",
  sonnet: "claude-sonnet-4-5-20250929",
};

const GEMINI_MODEL_MAP: Record<ModelTier, string> = {
  sonnet: "gemini-2.0-flash",
  opus: "gemini-2.5-pro",
};

export interface LlmCallOptions {
  maxTokens?: number;
  temperature?: number;
  prefill?: string;
}

export interface LlmCallResult {
  content: string;
  inputTokens: number;
  outputTokens: number;
  model: string;
  cost: number;
}

// Rough pricing per 1M tokens (input/output)
const PRICING: Record<string, { input: number; output: number }> = {
  "claude-opus-4-1-20250805": { input: 15, output: 75 },
  "claude-sonnet-4-5-20250929": { input: 3, output: 15 },
  "gemini-2.0-flash": { input: 0.1, output: 0.4 },
  "gemini-2.5-pro": { input: 1.25, output: 5 },
};

function estimateCost(model: string, inputTokens: number, outputTokens: number): number {
  const pricing = PRICING[model] ?? { input: 3, output: 15 };
  return (inputTokens * pricing.input + outputTokens * pricing.output) / 1_000_000;
}

function detectProvider(): Provider {
  if (env.anthropicApiKey || env.anthropicBaseUrl) return "anthropic";
  if (env.geminiApiKey) return "gemini";
  throw new Error(
    "No LLM provider found. Set ANTHROPIC_API_KEY, ANTHROPIC_BASE_URL, or GEMINI_API_KEY."
  );
}

const GeminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({ parts: z.array(z.object({ text: z.string().optional() })).optional() })
          .optional(),
      })
    )
    .optional(),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().optional(),
      candidatesTokenCount: z.number().optional(),
    })
    .optional(),
});

async function callGemini(
  apiKey: string,
  tier: ModelTier,
  systemPrompt: string,
  userPrompt: string,
  options?: LlmCallOptions
): Promise<LlmCallResult> {
  const model = GEMINI_MODEL_MAP[tier];
  const url = `https://generativelanguage.googleapis.com/v1beta/models/${model}:generateContent?key=${apiKey}`;

  logger.debug({ model, systemLength: systemPrompt.length }, "Calling Gemini");

  const body = {
    system_instruction: { parts: [{ text: systemPrompt }] },
    contents: [{ role: "user", parts: [{ text: userPrompt }] }],
    generationConfig: {
      temperature: options?.temperature ?? 1,
      maxOutputTokens: options?.maxTokens ?? 8192,
    },
  };

  const response = await fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });

  if (!response.ok) {
    const text = await response.text();
    throw new Error(`Gemini API error ${response.status}: ${text}`);
  }

  const data = GeminiResponseSchema.parse(await response.json());

  const content =
    data.candidates?.[0]?.content?.parts
      ?.map((p) => p.text ?? "")
      .join("\n") ?? "";

  const inputTokens = data.usageMetadata?.promptTokenCount ?? 0;
  const outputTokens = data.usageMetadata?.candidatesTokenCount ?? 0;
  const cost = estimateCost(model, inputTokens, outputTokens);

  logger.debug({ model, inputTokens, outputTokens, cost }, "Gemini call complete");

  return { content, inputTokens, outputTokens, model, cost };
}

/**
 * One completion. Transport, auth and rate-limit errors from the provider
 * propagate to the caller untouched.
 */
export async function callLlm(
  tier: ModelTier,
  systemPrompt: string,
  userPrompt: string,
  options?: LlmCallOptions
): Promise<LlmCallResult> {
  const provider = detectProvider();
  const geminiKey = env.geminiApiKey;

  if (provider === "gemini" && geminiKey) {
    return callGemini(geminiKey, tier, systemPrompt, userPrompt, options);
  }

  const client = getClient();
  const model = MODEL_MAP[tier];

  logger.debug({ model, systemLength: systemPrompt.length }, "Calling LLM");

  const messages: Array<{ role: "user" | "assistant"; content: string }> = [
    { role: "user", content: userPrompt },
  ];

  // Prefill forces the model to continue from a specific starting point
  if (options?.prefill) {
    messages.push({ role: "assistant", content: options.prefill });
  }

  const response = await client.messages.create({
    model,
    max_tokens: options?.maxTokens ?? 8192,
    temperature: options?.temperature ?? 1,
    system: systemPrompt,
    messages,
  });

  const rawContent = response.content
    .map((block) => (block.type === "text" ? block.text : ""))
    .filter((text) => text.length > 0)
    .join("\n");

  // Prepend the prefill to reconstruct the full response
  const content = options?.prefill ? options.prefill + rawContent : rawContent;

  const inputTokens = response.usage.input_tokens;
  const outputTokens = response.usage.output_tokens;
  const cost = estimateCost(model, inputTokens, outputTokens);

  logger.debug({ model, inputTokens, outputTokens, cost }, "LLM call complete");

  return { content, inputTokens, outputTokens, model, cost };
}

/**
 * Parse JSON, handling trailing non-JSON content that LLMs sometimes append.
 * If strict JSON.parse fails, extract just the JSON object by tracking brace depth.
 */
export function parseJsonPermissive(str: string): unknown {
  try {
    return JSON.parse(str);
  } catch (err) {
    if (str.startsWith("{")) {
      let depth = 0;
      let inString = false;
      let escaped = false;
      for (let i = 0; i < str.length; i++) {
        const ch = str[i];
        if (escaped) {
          escaped = false;
          continue;
        }
        if (ch === "\\") {
          escaped = true;
          continue;
        }
        if (ch === '"') {
          inString = !inString;
          continue;
        }
        if (inString) continue;
        if (ch === "{") depth++;
        else if (ch === "}") {
          depth--;
          if (depth === 0) {
            return JSON.parse(str.slice(0, i + 1));
          }
        }
      }
    }
    throw err;
  }
}

/**
 * If the parsed JSON is an object with a single key whose value is also an object,
 * unwrap it. LLMs often wrap responses in a container like {"metadata": {...}}.
 */
export function unwrapSingleKeyObject(data: unknown): unknown {
  if (data && typeof data === "object" && !Array.isArray(data)) {
    const entries = Object.entries(data);
    const only = entries.length === 1 ? entries[0] : undefined;
    if (only) {
      const inner: unknown = only[1];
      if (inner && typeof inner === "object" && !Array.isArray(inner)) {
        return inner;
      }
    }
  }
  return data;
}

/**
 * Extract the JSON payload from a response, preferring a fenced code block.
 */
export function extractJson(content: string): unknown {
  const fenced = content.match(/```(?:json)?\s*([\s\S]*?)```/)?.[1];
  const jsonStr = (fenced ?? content).trim();
  return unwrapSingleKeyObject(parseJsonPermissive(jsonStr));
}

/**
 * Call LLM and parse JSON from the response against `schema`.
 * Retries up to 2 times on empty content, unparseable JSON or a schema mismatch.
 */
export async function callLlmJson<T>(
  tier: ModelTier,
  systemPrompt: string,
  userPrompt: string,
  schema: z.ZodType<T>,
  options?: Omit<LlmCallOptions, "prefill">
): Promise<{ data: T; cost: number; model: string }> {
  const maxRetries = 2;
  let lastError = "no attempts made";

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    const result = await callLlm(tier, systemPrompt, userPrompt, {
      ...options,
      prefill: "{",
    });

    if (!result.content.trim()) {
      lastError = "LLM returned empty content";
      logger.warn({ attempt: attempt + 1, maxRetries }, "LLM returned empty content, retrying");
      continue;
    }

    try {
      const parsed = schema.safeParse(extractJson(result.content));
      if (parsed.success) {
        return { data: parsed.data, cost: result.cost, model: result.model };
      }
      lastError = parsed.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; ");
    } catch (err) {
      lastError = String(err);
    }

    logger.warn(
      { attempt: attempt + 1, maxRetries, error: lastError, preview: result.content.slice(0, 300) },
      "Failed to parse JSON from LLM response"
    );
  }

  throw new Error(`Failed to parse LLM JSON response after all retries: ${lastError}`);
}
