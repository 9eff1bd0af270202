import * as path from "node:path";
import {
  InvalidVersionFormatError,
  VcsOperationFailedError,
} from "../types/errors";
import { BuildRunner } from "./build";
import { formatReleaseDate, updateChangelog } from "./changelog";
import { ReleaseConfig } from "./config";
import {
  anchored,
  applyVersionUpdate,
  UpdateResult,
  VersionedFile,
} from "./content-update";
import { CommandResult, parseGitHubSlug, VcsClient } from "./git";
import { assertCleanTree, checkBranch, runTestGate } from "./guards";
import {
  MANIFEST_VERSION_PATTERN,
  MODULE_VERSION_PATTERN,
  readManifest,
} from "./manifest";
import { Choice, Operator } from "./operator";
import { Reporter } from "./reporter";
import {
  bumpVersion,
  BumpType,
  formatVersion,
  isVersionIncrease,
  SemanticVersion,
  tagName,
} from "./version";

export type ReleaseState =
  | "CleanTree"
  | "BranchCheck"
  | "TestGate"
  | "VersionResolution"
  | "FileUpdates"
  | "ChangelogUpdate"
  | "Confirmation"
  | "VcsCommit"
  | "Done"
  | "Cancelled"
  | "Failed";

export type ReleaseWarningKind =
  | "FileMutationSkipped"
  | "ChangelogSectionExists"
  | "NonIncreasingVersion"
  | "RollbackFailed";

export interface ReleaseWarning {
  kind: ReleaseWarningKind;
  message: string;
}

export interface ReleaseOutcome {
  status: "released" | "cancelled";
  oldVersion: string;
  newVersion: string;
  tag: string;
  warnings: ReleaseWarning[];
  states: ReleaseState[];
}

export interface ReleaseDeps {
  config: ReleaseConfig;
  vcs: VcsClient;
  build: BuildRunner;
  operator: Operator;
  reporter: Reporter;
  now?: () => Date;
}

export function commitMessage(version: string): string {
  return `chore: release v${version}`;
}

export function tagMessage(version: string): string {
  return `Release version ${version}`;
}

export function trackedFiles(config: ReleaseConfig): VersionedFile[] {
  return [
    { path: config.manifestPath, strategy: anchored(MANIFEST_VERSION_PATTERN) },
    {
      path: config.versionModulePath,
      strategy: anchored(MODULE_VERSION_PATTERN),
    },
  ];
}

type MenuValue = BumpType | "custom";

/**
 * Drives one release from precondition checks to push. States advance in
 * a fixed order; every gate throws a ReleaseError to abort the run.
 */
export class ReleaseOrchestrator {
  private readonly visited: ReleaseState[] = [];
  private readonly warnings: ReleaseWarning[] = [];
  private readonly now: () => Date;
  private failedIn: ReleaseState | undefined;

  constructor(private readonly deps: ReleaseDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  get state(): ReleaseState | undefined {
    return this.visited[this.visited.length - 1];
  }

  /** The state that was active when the run threw, if it did. */
  get failedAt(): ReleaseState | undefined {
    return this.failedIn;
  }

  async run(): Promise<ReleaseOutcome> {
    try {
      return await this.advance();
    } catch (err) {
      this.failedIn = this.state;
      this.enter("Failed");
      throw err;
    }
  }

  private async advance(): Promise<ReleaseOutcome> {
    const { config, vcs, build, operator, reporter } = this.deps;

    reporter.header("Pre-flight Checks");
    this.enter("CleanTree");
    assertCleanTree(vcs, reporter);
    reporter.success("Git working directory is clean");

    this.enter("BranchCheck");
    await checkBranch(vcs, operator, reporter, config.acceptedBranches);
    reporter.success("On appropriate branch");

    this.enter("TestGate");
    await runTestGate(build, operator, reporter);
    reporter.success("Tests passed");

    reporter.header("Version Management");
    this.enter("VersionResolution");
    const manifest = readManifest(config.manifestPath);
    const current = manifest.version;
    const next = await this.resolveNextVersion(current);
    // substitute the text as written, e.g. "0.3.01" rather than "0.3.1"
    const oldVersion = manifest.raw;
    const newVersion = formatVersion(next);
    reporter.info(`Bumping version from ${oldVersion} to ${newVersion}`);

    this.enter("FileUpdates");
    const changed: string[] = [];
    for (const file of trackedFiles(config)) {
      const result = applyVersionUpdate(file, oldVersion, newVersion);
      if (result.status === "changed") changed.push(result.path);
      this.report(result);
    }

    this.enter("ChangelogUpdate");
    await this.updateChangelog(newVersion);

    this.enter("Confirmation");
    const tag = tagName(next);
    if (!(await this.confirmRelease(oldVersion, newVersion, tag))) {
      reporter.warning("Release cancelled");
      this.rollback(changed);
      this.enter("Cancelled");
      return this.outcome("cancelled", oldVersion, newVersion, tag);
    }

    this.enter("VcsCommit");
    this.commitAndPush(newVersion, tag);

    this.enter("Done");
    this.printFollowUp(newVersion, tag);
    return this.outcome("released", oldVersion, newVersion, tag);
  }

  private enter(state: ReleaseState): void {
    this.visited.push(state);
    this.deps.reporter.debug(`state: ${state}`);
  }

  private warn(kind: ReleaseWarningKind, message: string): void {
    this.warnings.push({ kind, message });
    this.deps.reporter.warning(message);
  }

  private outcome(
    status: ReleaseOutcome["status"],
    oldVersion: string,
    newVersion: string,
    tag: string,
  ): ReleaseOutcome {
    return {
      status,
      oldVersion,
      newVersion,
      tag,
      warnings: [...this.warnings],
      states: [...this.visited],
    };
  }

  private async resolveNextVersion(
    current: SemanticVersion,
  ): Promise<SemanticVersion> {
    const { operator, reporter } = this.deps;
    const show = (type: BumpType) =>
      formatVersion(bumpVersion(current, { type }));
    const options: Choice<MenuValue>[] = [
      {
        key: "1",
        label: `Major (${show("major")}) - Breaking changes`,
        value: "major",
      },
      {
        key: "2",
        label: `Minor (${show("minor")}) - New features`,
        value: "minor",
      },
      {
        key: "3",
        label: `Patch (${show("patch")}) - Bug fixes`,
        value: "patch",
      },
      { key: "4", label: "Custom version", value: "custom" },
    ];

    reporter.info(`Current version: ${formatVersion(current)}`);
    reporter.line();
    reporter.line("Select version bump type:");
    for (const option of options) {
      reporter.line(`  ${option.key}) ${option.label}`);
    }

    while (true) {
      const choice = await operator.choose("Enter choice (1-4): ", options);
      if (choice === undefined) {
        reporter.error("Invalid choice. Please enter 1, 2, 3, or 4.");
        continue;
      }
      if (choice !== "custom") {
        return bumpVersion(current, { type: choice });
      }
      const custom = await operator.ask(
        "Enter custom version (e.g., 1.2.3): ",
      );
      let next: SemanticVersion;
      try {
        next = bumpVersion(current, {
          type: "explicit",
          version: custom.trim(),
        });
      } catch (err) {
        if (err instanceof InvalidVersionFormatError) {
          reporter.error(err.message);
          continue;
        }
        throw err;
      }
      if (!isVersionIncrease(current, next)) {
        // accepted as entered; a lower or equal version is only flagged
        const [to, from] = [formatVersion(next), formatVersion(current)];
        this.warn(
          "NonIncreasingVersion",
          `Version ${to} is not greater than current version ${from}`,
        );
      }
      return next;
    }
  }

  private report(result: UpdateResult): void {
    const rel = path.relative(this.deps.config.root, result.path);
    if (result.status === "changed") {
      this.deps.reporter.success(`Updated ${rel}`);
      return;
    }
    this.warn(
      "FileMutationSkipped",
      result.reason === "missing"
        ? `${rel} not found, skipping`
        : `No version string found in ${rel}`,
    );
  }

  private async updateChangelog(newVersion: string): Promise<void> {
    const { config, operator, reporter } = this.deps;
    const rel = path.relative(config.root, config.changelogPath);
    const result = updateChangelog(
      config.changelogPath,
      config.projectName,
      newVersion,
      formatReleaseDate(this.now()),
    );
    if (result.status === "exists") {
      this.warn(
        "ChangelogSectionExists",
        `Version ${newVersion} already exists in ${rel}`,
      );
      return;
    }
    if (result.created) reporter.warning(`${rel} not found, created it`);
    reporter.success(`Updated ${rel} with version ${newVersion}`);
    reporter.warning(
      `Please edit ${rel} to add your changes before finalizing the release`,
    );
    await operator.acknowledge(
      "Press Enter when you've updated the changelog...",
    );
  }

  private async confirmRelease(
    oldVersion: string,
    newVersion: string,
    tag: string,
  ): Promise<boolean> {
    const { operator, reporter } = this.deps;
    reporter.header("Release Summary");
    reporter.line(`  Old version: ${oldVersion}`);
    reporter.line(`  New version: ${newVersion}`);
    reporter.line(`  Git tag:     ${tag}`);
    reporter.line(`  Commit msg:  ${commitMessage(newVersion)}`);
    reporter.line();
    return operator.confirm("Proceed with release? (y/N): ");
  }

  private rollback(paths: string[]): void {
    const { config, vcs, reporter } = this.deps;
    if (paths.length === 0) return;
    const rel = paths.map((p) => path.relative(config.root, p));
    const res = vcs.restore(rel);
    if (res.exitCode !== 0) {
      this.warn(
        "RollbackFailed",
        `Could not restore ${rel.join(", ")}: ${res.stderr.trim()}`,
      );
      return;
    }
    reporter.info(`Restored ${rel.join(", ")}`);
  }

  private commitAndPush(newVersion: string, tag: string): void {
    const { vcs, reporter } = this.deps;
    reporter.header("Performing Git Operations");
    const steps: Array<[string, string, () => CommandResult]> = [
      ["Staging changes...", "stage changes", () => vcs.addAll()],
      [
        `Creating commit: ${commitMessage(newVersion)}`,
        "commit",
        () => vcs.commit(commitMessage(newVersion)),
      ],
      [
        `Creating tag: ${tag}`,
        "create tag",
        () => vcs.tag(tag, tagMessage(newVersion)),
      ],
      ["Pushing to remote...", "push commit", () => vcs.push()],
      ["Pushing tags...", "push tags", () => vcs.pushTags()],
    ];
    for (const [label, step, exec] of steps) {
      reporter.info(label);
      const res = exec();
      if (res.exitCode !== 0) {
        throw new VcsOperationFailedError(step, res.stderr);
      }
    }
  }

  private printFollowUp(newVersion: string, tag: string): void {
    const { config, vcs, reporter } = this.deps;
    reporter.header("Release Complete!");
    reporter.success(`Version ${newVersion} has been released`);
    const remote = vcs.remoteUrl(config.remote);
    const slug =
      remote.exitCode === 0 ? parseGitHubSlug(remote.stdout) : undefined;
    if (slug) {
      reporter.info(
        `GitHub release page: https://github.com/${slug}/releases/tag/${tag}`,
      );
    }
    const pypi = `https://pypi.org/project/${config.projectName}`;
    reporter.info(`PyPI package page: ${pypi}/${newVersion}/`);
    reporter.line();
    reporter.info("Next steps:");
    reporter.line("  1. Wait for CI to publish the package (if configured)");
    reporter.line(
      "  2. Or publish manually: python -m build && twine upload dist/*",
    );
    reporter.line("  3. Create a GitHub release from the tag (optional)");
  }
}
