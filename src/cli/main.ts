#!/usr/bin/env node

import { Command } from "commander";
import { runOnce, type RunOptions, type RunReport } from "../core/runner";
import { watchDeclarations } from "../core/watcher";
import { attrTypeKeywords } from "../attr/registry";
import { defaultLogger, type Logger } from "../util/logger";
import { displayPath } from "../util/fs-utils";
import { DECLARATION_FILE_BASENAME } from "../schema";

interface BaseCliOptions {
  quiet?: boolean;
  debug?: boolean;
}

interface CheckCliOptions {
  filter?: string[];
  singleQuotes?: boolean;
  json?: boolean;
  watch?: boolean;
}

/**
 * Create a logger with the appropriate level from CLI flags.
 */
function createCliLogger(opts: BaseCliOptions): Logger {
  if (opts.quiet) {
    defaultLogger.setLevel("silent");
  } else if (opts.debug) {
    defaultLogger.setLevel("debug");
  }
  return defaultLogger.child("[cli]");
}

function printReport(cwd: string, report: RunReport, json: boolean): void {
  if (json) {
    process.stdout.write(JSON.stringify(report, null, 2) + "\n");
    return;
  }

  if (report.sourcePath) {
    process.stdout.write(`# ${displayPath(cwd, report.sourcePath)} (package ${report.package})\n`);
  }
  for (const result of report.results) {
    const name = `${result.rule}.${result.attribute}`;
    if (result.ok) {
      process.stdout.write(`${name}: ${result.type} = ${result.rendered ?? ""}\n`);
    } else {
      process.stdout.write(`${name}: ${result.type} ! ${result.error?.message ?? "unknown error"}\n`);
    }
  }
}

async function handleCheckCommand(
  cwd: string,
  target: string,
  checkOpts: CheckCliOptions,
  baseOpts: BaseCliOptions,
) {
  const logger = createCliLogger(baseOpts);

  const runOptions: RunOptions = {
    filter: checkOpts.filter,
    quote: checkOpts.singleQuotes ? "'" : undefined,
    logger: defaultLogger.child("[runner]"),
  };

  logger.debug(`Checking ${target} (cwd=${cwd}, watch=${checkOpts.watch ? "yes" : "no"})`);

  if (checkOpts.watch) {
    // Watch mode – runs until the process is interrupted
    watchDeclarations(target, cwd, {
      ...runOptions,
      onReport: (report) => printReport(cwd, report, Boolean(checkOpts.json)),
    });
    return;
  }

  const report = await runOnce(target, cwd, runOptions);
  printReport(cwd, report, Boolean(checkOpts.json));

  if (report.errorCount > 0) {
    process.exitCode = 1;
  }
}

async function main() {
  const cwd = process.cwd();

  const program = new Command();

  program
    .name("attrtype")
    .description("Typed build-attribute conversion and select() checking")
    .option("--quiet", "Silence logs")
    .option("--debug", "Enable debug logging");

  program
    .command("check")
    .description("Convert every attribute in a declaration file and report the results")
    .argument(
      "[target]",
      `Declaration file, or a directory containing ${DECLARATION_FILE_BASENAME}.*`,
      ".",
    )
    .option("--filter <patterns...>", "Only check attributes matching <rule>.<attribute> globs")
    .option("--single-quotes", "Render strings with single quotes")
    .option("--json", "Print the report as JSON")
    .option("-w, --watch", "Re-check whenever the declaration file changes")
    .action(async (target: string, checkOpts: CheckCliOptions, cmd: Command) => {
      const baseOpts = cmd.parent?.opts<BaseCliOptions>() ?? {};
      await handleCheckCommand(cwd, target, checkOpts, baseOpts);
    });

  program
    .command("types")
    .description("List the attribute type keywords a declaration may use")
    .action(() => {
      process.stdout.write(attrTypeKeywords().join("\n") + "\n");
    });

  await program.parseAsync(process.argv);
}

// Run and handle errors
main().catch((err) => {
  defaultLogger.error(err);
  process.exit(1);
});
