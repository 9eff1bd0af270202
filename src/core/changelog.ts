import * as fs from "node:fs";

const SECTION_SENTINEL = "## [";
const SUBSECTIONS = ["Added", "Changed", "Fixed", "Removed"];

export interface ChangelogDocument {
  content: string;
  created: boolean;
}

export interface InsertResult {
  status: "inserted" | "exists";
  content: string;
}

export function changelogPreamble(projectName: string): string {
  return [
    "# Changelog",
    "",
    `All notable changes to ${projectName} will be documented in this file.`,
    "",
    "The format is based on [Keep a Changelog](https://keepachangelog.com/en/1.0.0/),",
    "and this project adheres to [Semantic Versioning](https://semver.org/spec/v2.0.0.html).",
    "",
    "",
  ].join("\n");
}

export function ensureDocument(
  path: string,
  projectName: string,
): ChangelogDocument {
  if (!fs.existsSync(path)) {
    return { content: changelogPreamble(projectName), created: true };
  }
  return { content: fs.readFileSync(path, "utf8"), created: false };
}

/** Section template: one empty bullet per subsection, then a blank line. */
export function renderSection(version: string, date: string): string {
  const lines = [`## [${version}] - ${date}`, ""];
  for (const heading of SUBSECTIONS) {
    lines.push(`### ${heading}`, "-", "");
  }
  return lines.join("\n") + "\n";
}

export function hasSection(document: string, version: string): boolean {
  return document.includes(`${SECTION_SENTINEL}${version}]`);
}

export function insertSection(
  document: string,
  version: string,
  date: string,
): InsertResult {
  if (hasSection(document, version)) {
    return { status: "exists", content: document };
  }
  const section = renderSection(version, date);
  const lines = document.split("\n");
  const first = lines.findIndex((line) => line.startsWith(SECTION_SENTINEL));
  if (first === -1) {
    return { status: "inserted", content: `${document}\n${section}` };
  }
  lines.splice(first, 0, section.trimEnd(), "");
  return { status: "inserted", content: lines.join("\n") };
}

export function updateChangelog(
  path: string,
  projectName: string,
  version: string,
  date: string,
): InsertResult & { created: boolean } {
  const doc = ensureDocument(path, projectName);
  const result = insertSection(doc.content, version, date);
  if (result.status === "inserted") {
    fs.writeFileSync(path, result.content, "utf8");
  }
  return { ...result, created: doc.created };
}

export function formatReleaseDate(date: Date): string {
  const yyyy = String(date.getFullYear());
  const mm = String(date.getMonth() + 1).padStart(2, "0");
  const dd = String(date.getDate()).padStart(2, "0");
  return `${yyyy}-${mm}-${dd}`;
}
