import {
  GenerationRequestSchema,
  appendHistory,
  loadSettings,
} from "@postcraft/core";
import { loadDataset } from "@postcraft/dataset";
import {
  buildPrompt,
  createLlmGenerator,
  generatePost,
  inspectExamples,
  selectExamples,
} from "@postcraft/generator";
import chalk from "chalk";
import ora from "ora";
import { formatIssues, reportFailure, resolveDatasetPath } from "../context.js";

interface GenerateOptions {
  topic: string;
  length?: string;
  language?: string;
  tone?: string;
  audience?: string;
  style?: string;
  hashtags: boolean;
  emojis: boolean;
  cta: boolean;
  dataset?: string;
  dryRun: boolean;
}

export async function generateCommand(options: GenerateOptions) {
  const spinner = ora();

  try {
    const settings = await loadSettings();
    const parsed = GenerationRequestSchema.safeParse({
      topic: options.topic,
      length: options.length ?? settings.generation.defaultLength,
      language: options.language ?? settings.generation.defaultLanguage,
      tone: options.tone ?? settings.generation.defaultTone,
      audience: options.audience,
      style: options.style,
      includeHashtags: options.hashtags,
      includeEmojis: options.emojis,
      callToAction: options.cta,
    });
    if (!parsed.success) {
      console.log(chalk.red(`Invalid request:\n${formatIssues(parsed.error)}`));
      process.exitCode = 1;
      return;
    }
    const request = parsed.data;

    const datasetPath = resolveDatasetPath(options.dataset, settings);
    spinner.start(`Loading dataset ${datasetPath}...`);
    const dataset = await loadDataset(datasetPath);
    spinner.succeed(`Loaded ${dataset.posts.length} example posts from "${dataset.name}"`);

    if (options.dryRun) {
      const selection = selectExamples(dataset, {
        tags: [request.topic],
        length: request.length,
        language: request.language,
        limit: settings.generation.maxExamples,
      });
      const warnings = [...selection.warnings, ...inspectExamples(selection.examples)];
      for (const warning of warnings) {
        console.log(chalk.yellow(`  ! ${warning.message}`));
      }
      console.log(chalk.blue("\n─── Prompt ───\n"));
      console.log(buildPrompt(request, selection.examples));
      console.log();
      return;
    }

    spinner.start(`Generating ${request.length.toLowerCase()} post about "${request.topic}"...`);
    const result = await generatePost(request, {
      dataset,
      generate: createLlmGenerator(settings),
      maxExamples: settings.generation.maxExamples,
      maxCharacters: settings.generation.maxCharacters,
    });
    spinner.stop();

    for (const warning of result.warnings) {
      console.log(chalk.yellow(`  ! ${warning.message}`));
    }

    console.log(
      chalk.gray(`\n  Examples used: ${result.examples.length} (${result.relaxation})`)
    );

    if (!result.validation.ok) {
      const failure = result.validation.error;
      console.log(chalk.red(`\n  Validation failed: ${failure.message} (${failure.constraint})\n`));
      console.log(chalk.gray(failure.output));
      console.log();
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
        request,
        createdAt: new Date().toISOString(),
        examplesUsed: result.examples.length,
      },
      settings.history.maxEntries
    );
    console.log(chalk.gray(`  Saved to ${settings.paths.historyFile}\n`));
  } catch (err) {
    reportFailure(err, spinner);
  }
}
