import { Command } from "commander";

import { releaseCommand, tagCommand, versionCommand } from "./release.js";

type GlobalOptions = {
  config?: string;
  cwd?: string;
  dryRun?: boolean;
  debug?: boolean;
};

export function buildCli(): Command {
  const program = new Command();

  const contextArgs = () => {
    const globals = program.opts<GlobalOptions>();
    return {
      cwd: globals.cwd,
      explicitConfigPath: globals.config,
      debug: globals.debug ?? false,
    };
  };

  program
    .name("release-gate")
    .description(
      "Check the release branch and a clean tree, then tag the current version if it is untagged",
    )
    .version("0.1.0")
    .option("--config <path>", "Override config path (defaults to <repo>/.release-gate.yaml)")
    .option("-C, --cwd <dir>", "Run as if started in <dir>")
    .option("--dry-run", "Run every check but do not create the tag", false)
    .option("--debug", "Show error codes, causes and stack traces")
    .option("--no-debug", "Hide error details")
    .action(async () => {
      await releaseCommand({ ...contextArgs(), dryRun: program.opts<GlobalOptions>().dryRun });
    });

  program
    .command("tag")
    .description("Create the tag for the current version (fails if it already exists)")
    .action(async () => {
      await tagCommand(contextArgs());
    });

  program
    .command("version")
    .description("Print the current version and its tag name")
    .action(async () => {
      await versionCommand(contextArgs());
    });

  return program;
}
