import { createSnapshot, datasetNameFromPath, saveDataset } from "@postcraft/dataset";
import { labelRawPosts, processedDatasetPath, readRawPosts } from "@postcraft/generator";
import chalk from "chalk";
import ora from "ora";
import { reportFailure } from "../context.js";

interface LabelOptions {
  out?: string;
}

export async function labelCommand(rawPath: string, options: LabelOptions) {
  const spinner = ora();

  try {
    spinner.start(`Reading ${rawPath}...`);
    const raw = await readRawPosts(rawPath);
    spinner.succeed(`Read ${raw.length} raw posts`);

    spinner.start("Labelling posts...");
    const posts = await labelRawPosts(raw, {
      onProgress: (done, total) => {
        spinner.text = `Labelling post ${done}/${total}...`;
      },
    });
    spinner.succeed(`Labelled ${posts.length} posts`);

    const outPath = options.out ?? processedDatasetPath(rawPath);
    const snapshot = createSnapshot(datasetNameFromPath(outPath), posts);
    const metadata = await saveDataset(snapshot, outPath);

    console.log(chalk.green(`\n  Processed dataset saved: ${outPath}`));
    console.log(chalk.gray(`  ${metadata.totalPosts} posts, ${snapshot.tags.length} tags\n`));
  } catch (err) {
    reportFailure(err, spinner);
  }
}
