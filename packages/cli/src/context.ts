import { join } from "node:path";
import type { Settings } from "@postcraft/core";
import chalk from "chalk";
import type { Ora } from "ora";
import type { ZodError } from "zod";

/**
 * A bare name such as `interns` resolves inside the data directory;
 * anything that looks like a path is used as given.
 */
export function resolveDatasetPath(dataset: string | undefined, settings: Settings): string {
  if (!dataset) return settings.paths.defaultDataset;
  if (dataset.endsWith(".json") || dataset.includes("/")) return dataset;
  return join(settings.paths.dataDir, `${dataset}.json`);
}

export function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

export function formatIssues(error: ZodError): string {
  return error.issues
    .map((i) => `  --${i.path.join(".")}: ${i.message}`)
    .join("\n");
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Report a command failure without exiting mid-command. */
export function reportFailure(err: unknown, spinner?: Ora): void {
  if (spinner?.isSpinning) {
    spinner.fail(errorMessage(err));
  } else {
    console.log(chalk.red(`Error: ${errorMessage(err)}`));
  }
  process.exitCode = 1;
}
