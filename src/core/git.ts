import { spawnSync } from "node:child_process";
import { Reporter, silentReporter } from "./reporter";

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Version-control operations the release flow needs. Only the exit code
 * and, for status/branch/remote queries, stdout are interpreted.
 */
export interface VcsClient {
  status(): CommandResult;
  currentBranch(): CommandResult;
  addAll(): CommandResult;
  commit(message: string): CommandResult;
  tag(name: string, message: string): CommandResult;
  push(): CommandResult;
  pushTags(): CommandResult;
  restore(paths: string[]): CommandResult;
  remoteUrl(name: string): CommandResult;
}

export function runCommand(
  cwd: string,
  command: string,
  args: string[],
  opts: { inherit?: boolean } = {},
): CommandResult {
  const res = spawnSync(command, args, {
    cwd,
    encoding: "utf8",
    stdio: opts.inherit ? "inherit" : ["ignore", "pipe", "pipe"],
  });
  if (res.error) {
    return { exitCode: 127, stdout: "", stderr: res.error.message };
  }
  return {
    exitCode: res.status ?? 1,
    stdout: res.stdout ?? "",
    stderr: res.stderr ?? "",
  };
}

export class GitClient implements VcsClient {
  constructor(
    private readonly cwd: string,
    private readonly reporter: Reporter = silentReporter,
  ) {}

  status(): CommandResult {
    return this.git(["status", "--porcelain"]);
  }
  currentBranch(): CommandResult {
    return this.git(["rev-parse", "--abbrev-ref", "HEAD"]);
  }
  addAll(): CommandResult {
    return this.git(["add", "-A"]);
  }
  commit(message: string): CommandResult {
    return this.git(["commit", "-m", message]);
  }
  tag(name: string, message: string): CommandResult {
    return this.git(["tag", "-a", name, "-m", message]);
  }
  push(): CommandResult {
    return this.git(["push"]);
  }
  pushTags(): CommandResult {
    return this.git(["push", "--tags"]);
  }
  restore(paths: string[]): CommandResult {
    return this.git(["checkout", "--", ...paths]);
  }
  remoteUrl(name: string): CommandResult {
    return this.git(["remote", "get-url", name]);
  }

  private git(args: string[]): CommandResult {
    this.reporter.debug(`git ${args.join(" ")}`);
    return runCommand(this.cwd, "git", args);
  }
}

/** Paths from `git status --porcelain` output, without the status columns. */
export function parsePorcelain(stdout: string): string[] {
  return stdout
    .split("\n")
    .filter((line) => line.trim().length > 0)
    .map((line) => line.slice(3));
}

export function parseGitHubSlug(remote: string): string | undefined {
  const trimmed = remote.trim().replace(/^git\+/, "");
  const ssh = /^git@github\.com:([^/]+)\/(.+)$/.exec(trimmed);
  const https =
    /^(?:https?|ssh):\/\/(?:[^@/]+@)?github\.com\/([^/]+)\/([^/]+)/.exec(
      trimmed,
    );
  const match = ssh ?? https;
  if (!match) return undefined;
  const repo = match[2].endsWith(".git") ? match[2].slice(0, -4) : match[2];
  return `${match[1]}/${repo}`;
}
