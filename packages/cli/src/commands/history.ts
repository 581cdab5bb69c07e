import {
  LanguageSchema,
  LengthBucketSchema,
  filterHistory,
  loadHistory,
  loadSettings,
} from "@postcraft/core";
import chalk from "chalk";
import { reportFailure } from "../context.js";

interface HistoryOptions {
  lines: string;
  language?: string;
  length?: string;
}

export async function historyCommand(options: HistoryOptions) {
  try {
    const settings = await loadSettings();
    const limit = parseInt(options.lines, 10) || 5;
    const all = await loadHistory(settings.paths.historyFile);

    if (all.length === 0) {
      console.log(chalk.yellow("\nNo generated posts yet. Run: postcraft generate --topic <topic>\n"));
      return;
    }

    const language = LanguageSchema.safeParse(options.language);
    const length = LengthBucketSchema.safeParse(options.length);
    const entries = filterHistory(all, {
      language: language.success ? language.data : undefined,
      length: length.success ? length.data : undefined,
    });
    console.log(chalk.gray(`\nTotal posts generated: ${all.length}, matching: ${entries.length}`));

    for (const entry of entries.slice(-limit).reverse()) {
      const topic = typeof entry.request.topic === "string" ? entry.request.topic : "(unknown)";
      console.log(
        chalk.blue(`\n${entry.createdAt}  ${topic}`) +
          chalk.gray(`  (${entry.examplesUsed} examples)`)
      );
      console.log(entry.content);
    }
    console.log();
  } catch (err) {
    reportFailure(err);
  }
}
