import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { SettingsSchema, type Settings } from "./schemas/settings.js";
import { env } from "./env.js";
import { logger } from "./logger.js";

export interface SettingsOverrides {
  temperature?: string;
  maxTokens?: string;
}

export function getConfigPath(): string {
  return resolve(env.configPath);
}

export function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Parse and validate raw settings (already decoded from YAML).
 * `undefined`/`null` means an empty file and yields the defaults.
 */
export function parseSettings(raw: unknown, source = "settings"): Settings {
  const result = SettingsSchema.safeParse(raw ?? {});
  if (!result.success) {
    const errors = result.error.issues.map(
      (i) => `  ${i.path.join(".")}: ${i.message}`
    );
    throw new Error(`Invalid ${source}:\n${errors.join("\n")}`);
  }
  return result.data;
}

/**
 * Apply MODEL_TEMPERATURE / MODEL_MAX_TOKENS style overrides.
 * Values that do not parse are ignored with a warning.
 */
export function applyOverrides(
  settings: Settings,
  overrides: SettingsOverrides
): Settings {
  const model = { ...settings.model };

  if (overrides.temperature !== undefined) {
    const temperature = Number.parseFloat(overrides.temperature);
    if (Number.isFinite(temperature) && temperature >= 0 && temperature <= 1) {
      model.temperature = temperature;
    } else {
      logger.warn(
        { value: overrides.temperature },
        "Ignoring invalid temperature override"
      );
    }
  }

  if (overrides.maxTokens !== undefined) {
    const maxTokens = Number.parseInt(overrides.maxTokens, 10);
    if (Number.isInteger(maxTokens) && maxTokens > 0) {
      model.maxTokens = maxTokens;
    } else {
      logger.warn(
        { value: overrides.maxTokens },
        "Ignoring invalid max tokens override"
      );
    }
  }

  return { ...settings, model };
}

export async function loadSettings(configPath = getConfigPath()): Promise<Settings> {
  logger.debug({ configPath }, "Loading settings");

  let parsed: unknown = undefined;
  try {
    const raw = await readFile(configPath, "utf-8");
    parsed = parseYaml(raw);
  } catch (err) {
    if (!isMissingFile(err)) throw err;
    logger.debug({ configPath }, "No settings file, using defaults");
  }

  const settings = parseSettings(parsed, `settings file "${configPath}"`);
  return applyOverrides(settings, {
    temperature: env.modelTemperature,
    maxTokens: env.modelMaxTokens,
  });
}
