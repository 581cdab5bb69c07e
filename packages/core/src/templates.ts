import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { isMissingFile } from "./config.js";
import { createChildLogger } from "./logger.js";

const logger = createChildLogger({ module: "core:templates" });

export const PromptTemplateSchema = z.object({
  name: z.string().trim().min(1, "Template name is required"),
  description: z.string().trim().default(""),
  prompt: z.string().trim().min(1, "Template prompt is required"),
  createdAt: z.string(),
});

export type PromptTemplate = z.infer<typeof PromptTemplateSchema>;
export type PromptTemplateInput = Omit<z.input<typeof PromptTemplateSchema>, "createdAt">;

/**
 * Saved prompt templates. A missing file holds none; a file that does not
 * validate throws rather than being overwritten on the next save.
 */
export async function loadTemplates(templatesFile: string): Promise<PromptTemplate[]> {
  let raw: string;
  try {
    raw = await readFile(templatesFile, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) return [];
    throw err;
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (err) {
    throw new Error(
      `Invalid JSON in templates file "${templatesFile}": ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const result = z.array(PromptTemplateSchema).safeParse(decoded);
  if (!result.success) {
    const errors = result.error.issues.map(
      (i) => `  ${i.path.join(".")}: ${i.message}`
    );
    throw new Error(`Invalid templates file "${templatesFile}":\n${errors.join("\n")}`);
  }
  return result.data;
}

async function saveTemplates(templatesFile: string, templates: PromptTemplate[]): Promise<void> {
  await mkdir(dirname(templatesFile), { recursive: true });
  await writeFile(templatesFile, JSON.stringify(templates, null, 2) + "\n");
}

/** Names are unique, compared case-insensitively. */
export async function addTemplate(
  templatesFile: string,
  input: PromptTemplateInput,
  now: Date = new Date()
): Promise<PromptTemplate> {
  const template = PromptTemplateSchema.parse({ ...input, createdAt: now.toISOString() });
  const templates = await loadTemplates(templatesFile);
  const key = template.name.toLowerCase();
  if (templates.some((t) => t.name.toLowerCase() === key)) {
    throw new Error(`A template named "${template.name}" already exists`);
  }

  templates.push(template);
  await saveTemplates(templatesFile, templates);
  logger.info({ templatesFile, name: template.name }, "Prompt template saved");
  return template;
}

/** Returns false when no template has that name. */
export async function removeTemplate(templatesFile: string, name: string): Promise<boolean> {
  const templates = await loadTemplates(templatesFile);
  const key = name.trim().toLowerCase();
  const remaining = templates.filter((t) => t.name.toLowerCase() !== key);
  if (remaining.length === templates.length) return false;

  await saveTemplates(templatesFile, remaining);
  logger.info({ templatesFile, name }, "Prompt template removed");
  return true;
}
