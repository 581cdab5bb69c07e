import { loadSettings } from "@postcraft/core";
import { listDatasets, listRawDatasets } from "@postcraft/dataset";
import chalk from "chalk";
import Table from "cli-table3";
import { reportFailure } from "../context.js";

export async function datasetsCommand() {
  try {
    const settings = await loadSettings();
    const dataDir = settings.paths.dataDir;
    const processed = await listDatasets(dataDir);
    const raw = await listRawDatasets(dataDir);

    if (processed.length === 0 && raw.length === 0) {
      console.log(chalk.yellow(`\nNo datasets found in ${dataDir}/\n`));
      return;
    }

    const table = new Table({
      head: [chalk.blue("Name"), chalk.blue("Path"), chalk.blue("Kind")],
    });
    for (const entry of processed) {
      table.push([entry.displayName, entry.path, chalk.green("processed")]);
    }
    for (const entry of raw) {
      table.push([entry.displayName, entry.path, chalk.yellow("raw")]);
    }

    console.log(`\n${table.toString()}\n`);
    if (raw.length > 0) {
      console.log(chalk.gray("  Label a raw dataset with: postcraft label <raw>\n"));
    }
  } catch (err) {
    reportFailure(err);
  }
}
