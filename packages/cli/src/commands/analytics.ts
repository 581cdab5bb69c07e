import { loadSettings } from "@postcraft/core";
import {
  analyzeDataset,
  defaultReportPath,
  exportAnalyticsReport,
  formatInsights,
  loadDataset,
  type GroupEngagement,
} from "@postcraft/dataset";
import chalk from "chalk";
import Table from "cli-table3";
import { reportFailure, resolveDatasetPath } from "../context.js";

function groupTable(title: string, groups: GroupEngagement[]): string {
  const table = new Table({
    head: [chalk.blue(title), chalk.blue("Posts"), chalk.blue("Avg engagement")],
  });
  for (const group of groups) {
    table.push([group.key, group.posts, group.avgEngagement.toFixed(1)]);
  }
  return table.toString();
}

interface AnalyticsOptions {
  /** `true` when the flag is given without a path. */
  export?: string | boolean;
}

export async function analyticsCommand(dataset: string | undefined, options: AnalyticsOptions = {}) {
  try {
    const settings = await loadSettings();
    const snapshot = await loadDataset(resolveDatasetPath(dataset, settings));
    const analytics = analyzeDataset(snapshot);

    console.log(chalk.blue(`\nAnalytics: ${snapshot.name}\n`));

    if (analytics.engagement) {
      const e = analytics.engagement;
      console.log(`  Total engagement: ${e.total}`);
      console.log(`  Mean / median:    ${e.mean.toFixed(1)} / ${e.median.toFixed(1)}`);
      console.log(`  Min / max:        ${e.min} / ${e.max}`);
      console.log(`  Std deviation:    ${e.stdDev.toFixed(1)}`);

      console.log(chalk.blue("\n─── Top Posts ───\n"));
      for (const post of e.topPosts) {
        const preview = post.text.replace(/\s+/g, " ").slice(0, 70);
        console.log(`  ${chalk.green(String(post.engagement).padStart(6))}  ${preview}`);
      }
    }

    if (analytics.content) {
      const c = analytics.content;
      console.log(chalk.blue("\n─── Content ───\n"));
      console.log(`  Avg words:    ${c.avgWordCount.toFixed(1)}`);
      console.log(`  Avg chars:    ${c.avgCharCount.toFixed(1)}`);
      console.log(`  Avg hashtags: ${c.avgHashtags.toFixed(1)}`);
      console.log(`  Avg emojis:   ${c.avgEmojis.toFixed(1)}`);
      console.log(`  Avg mentions: ${c.avgMentions.toFixed(1)}`);
    }

    if (analytics.byLength.length > 0) {
      console.log(`\n${groupTable("Length", analytics.byLength)}`);
      console.log(groupTable("Language", analytics.byLanguage));
    }

    console.log(chalk.blue("\n─── Insights ───\n"));
    console.log(formatInsights(analytics.insights));
    console.log();

    if (options.export) {
      const path =
        typeof options.export === "string"
          ? options.export
          : defaultReportPath(settings.paths.dataDir);
      await exportAnalyticsReport(snapshot, path);
      console.log(chalk.green(`  Report exported: ${path}\n`));
    }
  } catch (err) {
    reportFailure(err);
  }
}
