import { addTemplate, loadSettings, loadTemplates, removeTemplate } from "@postcraft/core";
import chalk from "chalk";
import Table from "cli-table3";
import { ZodError } from "zod";
import { formatIssues, reportFailure } from "../context.js";

interface AddTemplateOptions {
  name: string;
  prompt: string;
  description?: string;
}

export async function templatesListCommand() {
  try {
    const settings = await loadSettings();
    const templates = await loadTemplates(settings.paths.templatesFile);

    if (templates.length === 0) {
      console.log(chalk.yellow("\nNo saved templates. Add one with: postcraft templates add --name <name> --prompt <prompt>\n"));
      return;
    }

    const table = new Table({
      head: [chalk.blue("Name"), chalk.blue("Description"), chalk.blue("Prompt")],
    });
    for (const template of templates) {
      const preview = template.prompt.replace(/\s+/g, " ").slice(0, 60);
      table.push([template.name, template.description, preview]);
    }
    console.log(`\n${table.toString()}\n`);
  } catch (err) {
    reportFailure(err);
  }
}

export async function templatesAddCommand(options: AddTemplateOptions) {
  try {
    const settings = await loadSettings();
    const template = await addTemplate(settings.paths.templatesFile, options);
    console.log(chalk.green(`\nTemplate saved: ${template.name}\n`));
  } catch (err) {
    if (err instanceof ZodError) {
      console.log(chalk.red(`Invalid template:\n${formatIssues(err)}`));
      process.exitCode = 1;
      return;
    }
    reportFailure(err);
  }
}

export async function templatesRemoveCommand(name: string) {
  try {
    const settings = await loadSettings();
    if (!(await removeTemplate(settings.paths.templatesFile, name))) {
      console.log(chalk.red(`Error: No template named "${name}"`));
      process.exitCode = 1;
      return;
    }
    console.log(chalk.green(`\nTemplate removed: ${name}\n`));
  } catch (err) {
    reportFailure(err);
  }
}
