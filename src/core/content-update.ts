import * as fs from "node:fs";

const PLACEHOLDER = "{version}";

/**
 * How a version string is located inside a tracked file.
 *  - anchored: only where the surrounding pattern matches
 *  - literal: every occurrence of the old version
 */
export type UpdateStrategy =
  | { kind: "anchored"; pattern: string }
  | { kind: "literal" };

export type UpdateStatus = "changed" | "unchanged";

export interface UpdateResult {
  status: UpdateStatus;
  path: string;
  reason?: "missing" | "no-match";
}

export interface VersionedFile {
  path: string;
  strategy: UpdateStrategy;
}

export function anchored(pattern: string): UpdateStrategy {
  const at = pattern.indexOf(PLACEHOLDER);
  if (at === -1 || pattern.indexOf(PLACEHOLDER, at + 1) !== -1) {
    throw new Error(
      `Version pattern must contain exactly one ${PLACEHOLDER}: ${pattern}`,
    );
  }
  return { kind: "anchored", pattern };
}

export function literal(): UpdateStrategy {
  return { kind: "literal" };
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Builds a regex matching just the version text, with the rest of the
 * pattern held in lookarounds so a replacement never touches the anchor.
 */
export function instantiatePattern(pattern: string, version: string): RegExp {
  const at = pattern.indexOf(PLACEHOLDER);
  const before = pattern.slice(0, at);
  const after = pattern.slice(at + PLACEHOLDER.length);
  const source =
    (before ? `(?<=${before})` : "") +
    escapeRegExp(version) +
    (after ? `(?=${after})` : "");
  return new RegExp(source, "gm");
}

export function replaceVersion(
  content: string,
  oldVersion: string,
  newVersion: string,
  strategy: UpdateStrategy,
): string {
  if (strategy.kind === "literal") {
    return content.split(oldVersion).join(newVersion);
  }
  return content.replace(
    instantiatePattern(strategy.pattern, oldVersion),
    () => newVersion,
  );
}

export function applyVersionUpdate(
  file: VersionedFile,
  oldVersion: string,
  newVersion: string,
): UpdateResult {
  if (!fs.existsSync(file.path)) {
    return { status: "unchanged", path: file.path, reason: "missing" };
  }
  const content = fs.readFileSync(file.path, "utf8");
  const updated = replaceVersion(
    content,
    oldVersion,
    newVersion,
    file.strategy,
  );
  if (updated === content) {
    return { status: "unchanged", path: file.path, reason: "no-match" };
  }
  fs.writeFileSync(file.path, updated, "utf8");
  return { status: "changed", path: file.path };
}
