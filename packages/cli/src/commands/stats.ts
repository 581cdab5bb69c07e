import { loadSettings } from "@postcraft/core";
import { datasetStatistics, loadDataset, tagFrequencies } from "@postcraft/dataset";
import chalk from "chalk";
import Table from "cli-table3";
import { reportFailure, resolveDatasetPath } from "../context.js";

function countsTable(title: string, counts: Record<string, number>): string {
  const table = new Table({ head: [chalk.blue(title), chalk.blue("Posts")] });
  for (const [key, count] of Object.entries(counts)) {
    table.push([key, count]);
  }
  return table.toString();
}

export async function statsCommand(dataset?: string) {
  try {
    const settings = await loadSettings();
    const snapshot = await loadDataset(resolveDatasetPath(dataset, settings));
    const stats = datasetStatistics(snapshot);

    console.log(chalk.blue(`\nDataset: ${snapshot.name}\n`));
    console.log(`  Posts:          ${stats.totalPosts}`);
    console.log(`  Unique tags:    ${stats.totalTags}`);
    console.log(`  Avg engagement: ${stats.avgEngagement.toFixed(1)}`);
    if (stats.totalPosts === 0) {
      console.log();
      return;
    }

    console.log(`\n${countsTable("Language", stats.languages)}`);
    console.log(countsTable("Length", stats.lengthDistribution));
    if (Object.keys(stats.tones).length > 0) {
      console.log(countsTable("Tone", stats.tones));
    }
    if (Object.keys(stats.audiences).length > 0) {
      console.log(countsTable("Audience", stats.audiences));
    }

    const tags = new Table({ head: [chalk.blue("Top tag"), chalk.blue("Posts")] });
    for (const { tag, count } of stats.topTags) {
      tags.push([tag, count]);
    }
    console.log(`${tags.toString()}\n`);
  } catch (err) {
    reportFailure(err);
  }
}

interface TagsOptions {
  limit: string;
}

export async function tagsCommand(dataset: string | undefined, options: TagsOptions) {
  try {
    const settings = await loadSettings();
    const snapshot = await loadDataset(resolveDatasetPath(dataset, settings));
    const limit = parseInt(options.limit, 10) || 20;
    const frequencies = tagFrequencies(snapshot, limit);

    if (frequencies.length === 0) {
      console.log(chalk.yellow(`\nNo tags in ${snapshot.name}\n`));
      return;
    }

    const table = new Table({ head: [chalk.blue("Tag"), chalk.blue("Posts")] });
    for (const { tag, count } of frequencies) {
      table.push([tag, count]);
    }
    console.log(`\n${table.toString()}\n`);
  } catch (err) {
    reportFailure(err);
  }
}
