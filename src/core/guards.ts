import {
  DirtyWorkingTreeError,
  TestsFailedError,
  UserAbortedError,
  VcsOperationFailedError,
} from "../types/errors";
import { BuildRunner } from "./build";
import { parsePorcelain, VcsClient } from "./git";
import { Operator } from "./operator";
import { Reporter } from "./reporter";

export function assertCleanTree(vcs: VcsClient, reporter: Reporter): void {
  const res = vcs.status();
  if (res.exitCode !== 0) {
    const detail = res.stderr.trim();
    throw new DirtyWorkingTreeError(
      `Failed to check git status${detail ? `: ${detail}` : ""}`,
    );
  }
  const paths = parsePorcelain(res.stdout);
  if (paths.length) {
    reporter.info("Uncommitted files:");
    for (const line of res.stdout.trimEnd().split("\n")) {
      reporter.line(`  ${line}`);
    }
    throw new DirtyWorkingTreeError(
      "There are uncommitted changes. Please commit or stash them first.",
      paths,
    );
  }
}

export async function checkBranch(
  vcs: VcsClient,
  operator: Operator,
  reporter: Reporter,
  accepted: string[],
): Promise<string> {
  const res = vcs.currentBranch();
  if (res.exitCode !== 0) {
    throw new VcsOperationFailedError("get current branch", res.stderr);
  }
  const branch = res.stdout.trim();
  if (!accepted.includes(branch)) {
    const names = accepted.map((b) => `'${b}'`).join(" or ");
    reporter.warning(`You are on branch '${branch}', not ${names}`);
    if (!(await operator.confirm("Continue anyway? (y/N): "))) {
      throw new UserAbortedError(`Release aborted on branch '${branch}'`);
    }
  }
  return branch;
}

export async function runTestGate(
  build: BuildRunner,
  operator: Operator,
  reporter: Reporter,
): Promise<"automated" | "attested"> {
  reporter.info("Running tests...");
  if (build.isAvailable()) {
    if (build.runChecks() !== 0) {
      throw new TestsFailedError(
        "Tests failed. Please fix them before releasing.",
      );
    }
    return "automated";
  }
  reporter.warning(
    `No build file found for \`${build.describe()}\`, skipping automated tests`,
  );
  if (
    !(await operator.confirm(
      "Have you manually verified that tests pass? (y/N): ",
    ))
  ) {
    throw new UserAbortedError("Tests were not verified");
  }
  return "attested";
}
