import { CustomPostRequestSchema, appendHistory, loadSettings } from "@postcraft/core";
import { buildCustomPrompt, createLlmGenerator, generateCustomPost } from "@postcraft/generator";
import chalk from "chalk";
import ora from "ora";
import { formatIssues, reportFailure, splitList } from "../context.js";

interface CustomOptions {
  topic: string;
  audience: string;
  purpose: string;
  length?: string;
  language?: string;
  style: string;
  context: string;
  keywords?: string;
  dryRun: boolean;
}

export async function customCommand(options: CustomOptions) {
  const spinner = ora();

  try {
    const settings = await loadSettings();
    const parsed = CustomPostRequestSchema.safeParse({
      topic: options.topic,
      audience: options.audience,
      purpose: options.purpose,
      length: options.length ?? settings.generation.defaultLength,
      language: options.language ?? settings.generation.defaultLanguage,
      style: options.style,
      context: options.context,
      keywords: splitList(options.keywords),
    });
    if (!parsed.success) {
      console.log(chalk.red(`Invalid request:\n${formatIssues(parsed.error)}`));
      process.exitCode = 1;
      return;
    }
    const request = parsed.data;

    if (options.dryRun) {
      console.log(chalk.blue("\n─── Prompt ───\n"));
      console.log(buildCustomPrompt(request));
      console.log();
      return;
    }

    spinner.start(`Generating custom post about "${request.topic}"...`);
    const result = await generateCustomPost(request, {
      generate: createLlmGenerator(settings),
      maxCharacters: settings.generation.maxCharacters,
    });
    spinner.stop();

    if (!result.validation.ok) {
      const failure = result.validation.error;
      console.log(chalk.red(`\n  Validation failed: ${failure.message} (${failure.constraint})\n`));
      console.log(chalk.gray(failure.output));
      process.exitCode = 1;
      return;
    }

    const post = result.validation.value;
    console.log(chalk.blue("\n─── Generated Post ───\n"));
    console.log(post.text);
    console.log();
    for (const warning of post.warnings) {
      console.log(chalk.yellow(`  ! ${warning.message}`));
    }

    await appendHistory(
      settings.paths.historyFile,
      {
        content: post.text,
        request: { ...request, type: "custom" },
        createdAt: new Date().toISOString(),
        examplesUsed: 0,
      },
      settings.history.maxEntries
    );
  } catch (err) {
    reportFailure(err, spinner);
  }
}
