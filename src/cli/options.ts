import { Command } from "commander";
import { ConfigOverrides } from "../core/config";

type CliOptions = {
  cwd?: string;
  manifest?: string;
  versionModule?: string;
  changelog?: string;
};

export function buildProgram(): Command {
  return new Command()
    .name("release-bump")
    .description(
      "Bump the project version, update the changelog, then commit, tag and push",
    )
    .option("-C, --cwd <dir>", "project root (env RELEASE_ROOT)")
    .option("--manifest <file>", "manifest holding version = \"X.Y.Z\"")
    .option(
      "--version-module <file>",
      "module holding __version__ = \"X.Y.Z\"",
    )
    .option("--changelog <file>", "changelog file (env CHANGELOG_FILE)")
    .exitOverride();
}

export function parseCliOptions(argv: string[]): ConfigOverrides {
  const program = buildProgram();
  program.parse(argv, { from: "user" });
  const opts = program.opts<CliOptions>();
  return {
    cwd: opts.cwd,
    manifest: opts.manifest,
    versionModule: opts.versionModule,
    changelog: opts.changelog,
  };
}
