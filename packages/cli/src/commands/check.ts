import { loadSettings } from "@postcraft/core";
import { checkDatasetFile } from "@postcraft/dataset";
import chalk from "chalk";
import { reportFailure, resolveDatasetPath } from "../context.js";

export async function checkCommand(dataset: string) {
  try {
    const settings = await loadSettings();
    const path = resolveDatasetPath(dataset, settings);
    const check = await checkDatasetFile(path);

    if (check.valid) {
      console.log(chalk.green(`  [PASS] ${path}: ${check.message} (${check.totalPosts} posts)`));
    } else {
      console.log(chalk.red(`  [FAIL] ${path}: ${check.message}`));
      process.exitCode = 1;
    }
  } catch (err) {
    reportFailure(err);
  }
}
