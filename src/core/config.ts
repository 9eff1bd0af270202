import * as fs from "node:fs";
import * as path from "node:path";
import { moduleNameFor, readProjectName } from "./manifest";

export interface ReleaseConfig {
  root: string;
  manifestPath: string;
  versionModulePath: string;
  changelogPath: string;
  projectName: string;
  acceptedBranches: string[];
  checkSentinel: string;
  checkCommand: string[];
  remote: string;
  debug: boolean;
}

export interface ConfigOverrides {
  cwd?: string;
  manifest?: string;
  versionModule?: string;
  changelog?: string;
}

type Env = Record<string, string | undefined>;

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() ? value.trim() : undefined;
}

function splitList(value: string | undefined, fallback: string[]): string[] {
  const items = (value ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  return items.length ? items : fallback;
}

function isTruthy(value: string | undefined): boolean {
  return value === "1" || value?.toLowerCase() === "true";
}

/**
 * Resolves settings from CLI flags first, then environment, then defaults.
 * Relative paths are taken from the project root.
 */
export function resolveConfig(
  overrides: ConfigOverrides = {},
  env: Env = process.env,
): ReleaseConfig {
  const root = path.resolve(
    nonEmpty(overrides.cwd) ?? nonEmpty(env["RELEASE_ROOT"]) ?? process.cwd(),
  );
  const fromRoot = (p: string) => path.resolve(root, p);

  const manifestPath = fromRoot(
    nonEmpty(overrides.manifest) ??
      nonEmpty(env["RELEASE_MANIFEST"]) ??
      "pyproject.toml",
  );
  const manifestName = fs.existsSync(manifestPath)
    ? readProjectName(fs.readFileSync(manifestPath, "utf8"))
    : undefined;
  const projectName = manifestName ?? path.basename(root);

  const versionModulePath = fromRoot(
    nonEmpty(overrides.versionModule) ??
      nonEmpty(env["RELEASE_VERSION_MODULE"]) ??
      (manifestName
        ? path.join(moduleNameFor(manifestName), "__init__.py")
        : path.join("src", "__init__.py")),
  );

  return {
    root,
    manifestPath,
    versionModulePath,
    changelogPath: fromRoot(
      nonEmpty(overrides.changelog) ??
        nonEmpty(env["CHANGELOG_FILE"]) ??
        "CHANGELOG.md",
    ),
    projectName,
    acceptedBranches: splitList(env["RELEASE_BRANCHES"], ["main", "master"]),
    checkSentinel: nonEmpty(env["RELEASE_CHECK_SENTINEL"]) ?? "Makefile",
    checkCommand: splitList(
      env["RELEASE_CHECK_COMMAND"]?.replace(/\s+/g, ","),
      ["make", "check"],
    ),
    remote: nonEmpty(env["RELEASE_REMOTE"]) ?? "origin",
    debug: isTruthy(env["RELEASE_DEBUG"]),
  };
}
