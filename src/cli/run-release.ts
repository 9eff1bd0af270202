#!/usr/bin/env node
import { CommanderError } from "commander";
import { CommandBuildRunner } from "../core/build";
import { ConfigOverrides, resolveConfig } from "../core/config";
import { GitClient } from "../core/git";
import { ReleaseOrchestrator } from "../core/release";
import { isReleaseError, VcsOperationFailedError } from "../types/errors";
import { ConsoleReporter } from "./console-reporter";
import { parseCliOptions } from "./options";
import { TerminalOperator } from "./terminal-operator";

async function main(argv: string[]): Promise<number> {
  let overrides: ConfigOverrides;
  try {
    overrides = parseCliOptions(argv);
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }
  const config = resolveConfig(overrides);
  const reporter = new ConsoleReporter({ debug: config.debug });
  const operator = new TerminalOperator((p) => reporter.prompt(p));

  const onSigint = () => {
    reporter.line();
    reporter.warning("Release cancelled by user");
    process.exit(1);
  };
  process.once("SIGINT", onSigint);

  const orchestrator = new ReleaseOrchestrator({
    config,
    reporter,
    operator,
    vcs: new GitClient(config.root, reporter),
    build: new CommandBuildRunner(
      config.root,
      config.checkSentinel,
      config.checkCommand,
      reporter,
    ),
  });

  reporter.header(`${config.projectName} release`);
  try {
    await orchestrator.run();
    return 0;
  } catch (err) {
    if (
      err instanceof VcsOperationFailedError &&
      orchestrator.failedAt === "VcsCommit"
    ) {
      reporter.error(err.message);
      reporter.error(
        "Failed to complete git operations; the release may be partially " +
          "applied. Check the commit, tag and remote by hand.",
      );
      return 1;
    }
    if (isReleaseError(err)) {
      reporter.error(err.message);
    } else {
      reporter.error(
        `Unexpected error: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    return 1;
  } finally {
    operator.close();
    process.off("SIGINT", onSigint);
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("[release] failed:", err);
    process.exit(1);
  });
