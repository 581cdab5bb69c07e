import {
  AudienceSchema,
  LanguageSchema,
  LengthBucketSchema,
  PurposeSchema,
  StyleSchema,
  ToneSchema,
} from "@postcraft/core";
import { Command, Option } from "commander";
import { generateCommand } from "./commands/generate.js";
import { customCommand } from "./commands/custom.js";
import { datasetsCommand } from "./commands/datasets.js";
import { statsCommand, tagsCommand } from "./commands/stats.js";
import { analyticsCommand } from "./commands/analytics.js";
import { checkCommand } from "./commands/check.js";
import { labelCommand } from "./commands/label.js";
import { mergeCommand } from "./commands/merge.js";
import { historyCommand } from "./commands/history.js";
import {
  templatesAddCommand,
  templatesListCommand,
  templatesRemoveCommand,
} from "./commands/templates.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("postcraft")
    .description("Few-shot LinkedIn post generator")
    .version("0.1.0");

  program
    .command("generate")
    .description("Generate a post using examples from a dataset")
    .requiredOption("-t, --topic <topic>", "Topic or tag of the post")
    .addOption(new Option("-l, --length <length>", "Post length").choices(LengthBucketSchema.options))
    .addOption(new Option("--language <language>", "Post language").choices(LanguageSchema.options))
    .addOption(new Option("--tone <tone>", "Tone of voice").choices(ToneSchema.options))
    .option("-a, --audience <audience>", "Target audience")
    .addOption(new Option("-s, --style <style>", "Writing style").choices(StyleSchema.options))
    .option("--no-hashtags", "Do not ask for hashtags")
    .option("--no-emojis", "Do not ask for emojis")
    .option("--cta", "End with a call to action", false)
    .option("-d, --dataset <dataset>", "Dataset name or path")
    .option("--dry-run", "Print the prompt without calling the model", false)
    .action(generateCommand);

  program
    .command("custom")
    .description("Generate a fully specified post without examples")
    .requiredOption("-t, --topic <topic>", "Topic of the post")
    .addOption(new Option("-a, --audience <audience>", "Target audience").choices(AudienceSchema.options).default("General"))
    .addOption(new Option("-p, --purpose <purpose>", "Purpose of the post").choices(PurposeSchema.options).default("Share Experience"))
    .addOption(new Option("-l, --length <length>", "Post length").choices(LengthBucketSchema.options))
    .addOption(new Option("--language <language>", "Post language").choices(LanguageSchema.options))
    .addOption(new Option("-s, --style <style>", "Writing style").choices(StyleSchema.options).default("Storytelling"))
    .option("-c, --context <context>", "Additional context", "")
    .option("-k, --keywords <keywords>", "Comma-separated keywords to include")
    .option("--dry-run", "Print the prompt without calling the model", false)
    .action(customCommand);

  program
    .command("datasets")
    .description("List processed and raw datasets")
    .action(datasetsCommand);

  program
    .command("stats [dataset]")
    .description("Show dataset statistics")
    .action(statsCommand);

  program
    .command("tags [dataset]")
    .description("Show tag frequencies")
    .option("-n, --limit <number>", "Number of tags", "20")
    .action(tagsCommand);

  program
    .command("analytics [dataset]")
    .description("Show engagement and content analytics")
    .option("-e, --export [path]", "Also write the report as JSON")
    .action(analyticsCommand);

  program
    .command("check <dataset>")
    .description("Validate a dataset file")
    .action(checkCommand);

  program
    .command("label <raw>")
    .description("Label a raw dataset with AI-extracted metadata")
    .option("-o, --out <path>", "Output path for the processed dataset")
    .action(labelCommand);

  program
    .command("merge <first> <second>")
    .description("Merge two datasets, dropping duplicate posts")
    .requiredOption("-o, --out <path>", "Output path for the merged dataset")
    .action(mergeCommand);

  program
    .command("history")
    .description("Show recently generated posts")
    .option("-n, --lines <number>", "Number of entries", "5")
    .addOption(new Option("--language <language>", "Only posts in this language").choices(LanguageSchema.options))
    .addOption(new Option("-l, --length <length>", "Only posts of this length").choices(LengthBucketSchema.options))
    .action(historyCommand);

  const templates = program
    .command("templates")
    .description("Manage saved prompt templates");

  templates
    .command("list", { isDefault: true })
    .description("List saved templates")
    .action(templatesListCommand);

  templates
    .command("add")
    .description("Save a prompt template")
    .requiredOption("--name <name>", "Template name")
    .requiredOption("-p, --prompt <prompt>", "Prompt text")
    .option("--description <description>", "Short description")
    .action(templatesAddCommand);

  templates
    .command("remove <name>")
    .description("Delete a saved template")
    .action(templatesRemoveCommand);

  return program;
}
