import { loadSettings } from "@postcraft/core";
import {
  datasetNameFromPath,
  loadDataset,
  mergeDatasets,
  saveDataset,
} from "@postcraft/dataset";
import chalk from "chalk";
import { reportFailure, resolveDatasetPath } from "../context.js";

interface MergeOptions {
  out: string;
}

export async function mergeCommand(first: string, second: string, options: MergeOptions) {
  try {
    const settings = await loadSettings();
    const a = await loadDataset(resolveDatasetPath(first, settings));
    const b = await loadDataset(resolveDatasetPath(second, settings));
    const merged = mergeDatasets(a, b, datasetNameFromPath(options.out));
    await saveDataset(merged, options.out);

    const dropped = a.posts.length + b.posts.length - merged.posts.length;
    console.log(
      chalk.green(`\n  Merged ${a.name} + ${b.name} → ${options.out} (${merged.posts.length} posts)`)
    );
    if (dropped > 0) {
      console.log(chalk.gray(`  ${dropped} duplicate posts dropped`));
    }
    console.log();
  } catch (err) {
    reportFailure(err);
  }
}
