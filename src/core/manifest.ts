import * as fs from "node:fs";
import { ManifestVersionMissingError } from "../types/errors";
import { parseVersion, SemanticVersion } from "./version";

export const MANIFEST_VERSION_PATTERN = '^version\\s*=\\s*"{version}"';
export const MODULE_VERSION_PATTERN = '^__version__\\s*=\\s*"{version}"';

const VERSION_LINE = /^version\s*=\s*"([^"]+)"/m;
const NAME_LINE = /^name\s*=\s*"([^"]+)"/m;

export interface ManifestInfo {
  raw: string;
  version: SemanticVersion;
  name?: string;
}

export function readManifest(manifestPath: string): ManifestInfo {
  if (!fs.existsSync(manifestPath)) {
    throw new ManifestVersionMissingError(`${manifestPath} not found`);
  }
  const content = fs.readFileSync(manifestPath, "utf8");
  const match = VERSION_LINE.exec(content);
  if (!match) {
    throw new ManifestVersionMissingError(
      `Could not find version in ${manifestPath}`,
    );
  }
  const raw = match[1];
  let version: SemanticVersion;
  try {
    version = parseVersion(raw);
  } catch {
    throw new ManifestVersionMissingError(
      `Malformed version "${raw}" in ${manifestPath}`,
    );
  }
  return { raw, version, name: readProjectName(content) };
}

export function readProjectName(content: string): string | undefined {
  return NAME_LINE.exec(content)?.[1];
}

/** Python import name for a distribution name, e.g. `my-tool` -> `my_tool`. */
export function moduleNameFor(projectName: string): string {
  return projectName.replace(/[-.]/g, "_").toLowerCase();
}
