import * as fs from "node:fs";
import * as path from "node:path";
import { runCommand } from "./git";
import { Reporter, silentReporter } from "./reporter";

export interface BuildRunner {
  /** True when the build file that signals a check target exists. */
  isAvailable(): boolean;
  /** Exit code of the check run; 0 means passing. */
  runChecks(): number;
  describe(): string;
}

export class CommandBuildRunner implements BuildRunner {
  constructor(
    private readonly cwd: string,
    private readonly sentinel: string,
    private readonly command: string[],
    private readonly reporter: Reporter = silentReporter,
  ) {}

  isAvailable(): boolean {
    return fs.existsSync(path.join(this.cwd, this.sentinel));
  }

  runChecks(): number {
    const [bin, ...args] = this.command;
    if (!bin) return 1;
    this.reporter.debug(this.command.join(" "));
    return runCommand(this.cwd, bin, args, { inherit: true }).exitCode;
  }

  describe(): string {
    return this.command.join(" ");
  }
}
