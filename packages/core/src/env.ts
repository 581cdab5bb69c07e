import { config } from "dotenv";
import { resolve } from "node:path";

// Load .env from the working directory
config({ path: resolve(process.cwd(), ".env") });

export function optionalEnv(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

export const env = {
  get anthropicApiKey() {
    return process.env.ANTHROPIC_API_KEY;
  },
  get anthropicBaseUrl() {
    return process.env.ANTHROPIC_BASE_URL;
  },
  get geminiApiKey() {
    return process.env.GEMINI_API_KEY;
  },
  get configPath() {
    return optionalEnv("POSTCRAFT_CONFIG", "postcraft.yml");
  },
  get modelTemperature() {
    return process.env.MODEL_TEMPERATURE;
  },
  get modelMaxTokens() {
    return process.env.MODEL_MAX_TOKENS;
  },
};
