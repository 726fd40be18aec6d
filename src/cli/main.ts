#!/usr/bin/env node

import { Command } from "commander";
import { runOnce } from "../core/runner";
import { DEFAULT_SCRIPT } from "../extensions/script";
import { defaultLogger, type Logger } from "../util/logger";

interface CliOptions {
  json?: string;
  config?: string;
  exclude?: string[];
  script?: string | false;
  quiet?: boolean;
  debug?: boolean;
}

/**
 * Create a logger with the appropriate level from CLI flags.
 */
function createCliLogger(opts: { quiet?: boolean; debug?: boolean }): Logger {
  if (opts.quiet) {
    defaultLogger.setLevel("silent");
  } else if (opts.debug) {
    defaultLogger.setLevel("debug");
  }
  return defaultLogger.child("[cli]");
}

async function handleRunCommand(
  cwd: string,
  template: string,
  dest: string,
  opts: CliOptions,
) {
  const logger = createCliLogger(opts);

  await runOnce(cwd, {
    template,
    dest,
    jsonPath: opts.json,
    configPath: opts.config,
    exclude: opts.exclude,
    script: opts.script,
    logger,
  });
}

async function main() {
  const cwd = process.cwd();

  const program = new Command();

  program
    .name("tree-scaffolder")
    .description("Render a template directory tree into a destination directory")
    .argument("<template>", "Template directory")
    .argument("<dest>", "Destination directory to scaffold")
    .option("--json <file>", "JSON file containing the context to use")
    .option("-c, --config <path>", "Path to a config module (.ts/.js)")
    .option(
      "-x, --exclude <patterns...>",
      "Regexes of template-relative paths to skip",
    )
    .option(
      "--script <name>",
      "Template script defining extra functions",
      DEFAULT_SCRIPT,
    )
    .option("--no-script", "Do not run the template script")
    .option("--quiet", "Silence logs")
    .option("--debug", "Enable debug logging")
    .action(async (template: string, dest: string, opts: CliOptions) => {
      await handleRunCommand(cwd, template, dest, opts);
    });

  await program.parseAsync(process.argv);
}

// Run and handle errors
main().catch((err) => {
  defaultLogger.error(err);
  process.exit(1);
});
