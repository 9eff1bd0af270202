import * as semver from "semver";
import { InvalidVersionFormatError } from "../types/errors";

export interface SemanticVersion {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
}

export type BumpType = "major" | "minor" | "patch";

export type BumpDirective =
  | { type: BumpType }
  | { type: "explicit"; version: string };

const COMPONENT = /^[0-9]+$/;

/**
 * Parses a strict `MAJOR.MINOR.PATCH` string. Pre-release and build
 * suffixes are not accepted.
 */
export function parseVersion(text: string): SemanticVersion {
  const parts = text.split(".");
  if (parts.length !== 3 || !parts.every((p) => COMPONENT.test(p))) {
    throw new InvalidVersionFormatError(text);
  }
  const [major, minor, patch] = parts.map((p) => parseInt(p, 10));
  if (![major, minor, patch].every(Number.isSafeInteger)) {
    throw new InvalidVersionFormatError(text);
  }
  return Object.freeze({ major, minor, patch });
}

export function formatVersion(version: SemanticVersion): string {
  return `${version.major}.${version.minor}.${version.patch}`;
}

export function bumpVersion(
  current: SemanticVersion,
  directive: BumpDirective,
): SemanticVersion {
  switch (directive.type) {
    case "major":
      return Object.freeze({ major: current.major + 1, minor: 0, patch: 0 });
    case "minor":
      return Object.freeze({
        major: current.major,
        minor: current.minor + 1,
        patch: 0,
      });
    case "patch":
      return Object.freeze({
        major: current.major,
        minor: current.minor,
        patch: current.patch + 1,
      });
    case "explicit":
      // no ordering check against `current`; the caller decides what to do
      return parseVersion(directive.version);
  }
}

export function compareVersions(
  a: SemanticVersion,
  b: SemanticVersion,
): -1 | 0 | 1 {
  return semver.compare(formatVersion(a), formatVersion(b));
}

export function isVersionIncrease(
  current: SemanticVersion,
  next: SemanticVersion,
): boolean {
  return semver.gt(formatVersion(next), formatVersion(current));
}

export function tagName(version: SemanticVersion): string {
  return `v${formatVersion(version)}`;
}
