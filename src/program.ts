import { Command } from "commander";
import { parseCommand } from "./commands/parse.js";
import { batchCommand } from "./commands/batch.js";
import { status } from "./commands/status.js";
import { configShow, configSet } from "./commands/config.js";
import { errorMessage } from "./core/errors.js";

export const VERSION = "0.1.0";

/** One line for stderr, never a stack trace */
export function failureMessage(err: unknown): string {
  return `Error: ${errorMessage(err)}`;
}

async function guarded(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err) {
    console.error(failureMessage(err));
    process.exitCode = 1;
  }
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("diskmark")
    .description("Parse disk benchmark result.txt reports into tables")
    .version(VERSION);

  program
    .command("parse <file>")
    .description("Parse one benchmark report")
    .option("-e, --encoding <encoding>", "Report encoding (utf-8, utf-16le, auto)")
    .option("-f, --format <format>", "Output format (table, json, csv)")
    .option("-o, --output <file>", "Write rows to a file (.csv, .xlsx) or the run to .json")
    .option("--legacy", "Only accept SEQ/RND result tokens")
    .option("--no-legacy", "Accept Sequential/Random tokens even when config sets legacy")
    .option("-v, --verbose", "Print how every line was classified (stderr)")
    .action(async (file: string, options: { encoding?: string; format?: string; output?: string; legacy?: boolean; verbose?: boolean }) => {
      await guarded(async () => {
        await parseCommand(file, options);
      });
    });

  program
    .command("batch <folder>")
    .description("Parse every .txt report in a folder")
    .option("-e, --encoding <encoding>", "Report encoding (utf-8, utf-16le, auto)")
    .option("-o, --output <file>", "Write all rows to a file (.csv, .xlsx)")
    .option("--legacy", "Only accept SEQ/RND result tokens")
    .option("--no-legacy", "Accept Sequential/Random tokens even when config sets legacy")
    .action(async (folder: string, options: { encoding?: string; output?: string; legacy?: boolean }) => {
      await guarded(async () => {
        const summary = await batchCommand(folder, options);
        if (summary.failed > 0) process.exitCode = 1;
      });
    });

  program
    .command("status")
    .description("Show parse history and current settings")
    .action(async () => {
      await guarded(status);
    });

  const configCmd = program
    .command("config")
    .description("View and modify configuration");

  configCmd
    .command("show")
    .description("Show current configuration")
    .action(async () => {
      await guarded(configShow);
    });

  configCmd
    .command("set <key> <value>")
    .description("Set a config value (encoding, format, legacy)")
    .action(async (key: string, value: string) => {
      await guarded(() => configSet(key, value));
    });

  // `diskmark config` with no subcommand → show
  configCmd.action(async () => {
    await guarded(configShow);
  });

  return program;
}
