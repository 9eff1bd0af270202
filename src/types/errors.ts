export type ReleaseErrorCode =
  | "DirtyWorkingTree"
  | "UserAborted"
  | "TestsFailed"
  | "ManifestVersionMissing"
  | "InvalidVersionFormat"
  | "VcsOperationFailed";

export class ReleaseError extends Error {
  readonly code: ReleaseErrorCode;
  constructor(code: ReleaseErrorCode, message: string) {
    super(message);
    this.name = "ReleaseError";
    this.code = code;
  }
}
export class DirtyWorkingTreeError extends ReleaseError {
  readonly paths: string[];
  constructor(message: string, paths: string[] = []) {
    super("DirtyWorkingTree", message);
    this.name = "DirtyWorkingTreeError";
    this.paths = paths;
  }
}
export class UserAbortedError extends ReleaseError {
  constructor(message: string) {
    super("UserAborted", message);
    this.name = "UserAbortedError";
  }
}
export class TestsFailedError extends ReleaseError {
  constructor(message: string) {
    super("TestsFailed", message);
    this.name = "TestsFailedError";
  }
}
export class ManifestVersionMissingError extends ReleaseError {
  constructor(message: string) {
    super("ManifestVersionMissing", message);
    this.name = "ManifestVersionMissingError";
  }
}
export class InvalidVersionFormatError extends ReleaseError {
  readonly input: string;
  constructor(input: string) {
    super("InvalidVersionFormat", `Invalid version format: ${input}`);
    this.name = "InvalidVersionFormatError";
    this.input = input;
  }
}
export class VcsOperationFailedError extends ReleaseError {
  readonly step: string;
  readonly stderr: string;
  constructor(step: string, stderr: string) {
    super(
      "VcsOperationFailed",
      `Failed to ${step}${stderr.trim() ? `: ${stderr.trim()}` : ""}`,
    );
    this.name = "VcsOperationFailedError";
    this.step = step;
    this.stderr = stderr;
  }
}

export function isReleaseError(err: unknown): err is ReleaseError {
  return err instanceof ReleaseError;
}
