import { createInterface, Interface } from "node:readline/promises";
import { Choice, isAffirmative, Operator, pickChoice } from "../core/operator";
import { UserAbortedError } from "../types/errors";

/** Reads operator answers line by line; closing input aborts the release. */
export class TerminalOperator implements Operator {
  private readonly rl: Interface;
  private closed = false;

  constructor(
    private readonly decorate: (prompt: string) => string = (p) => p,
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout,
  ) {
    this.rl = createInterface({ input, output });
    this.rl.on("close", () => {
      this.closed = true;
    });
    // Ctrl+C while a prompt is open
    this.rl.on("SIGINT", () => this.rl.close());
  }

  async choose<T>(
    prompt: string,
    options: Choice<T>[],
  ): Promise<T | undefined> {
    return pickChoice(await this.question(`\n${prompt}`), options);
  }

  async confirm(prompt: string): Promise<boolean> {
    return isAffirmative(await this.question(prompt));
  }

  ask(prompt: string): Promise<string> {
    return this.question(prompt);
  }

  async acknowledge(prompt: string): Promise<void> {
    await this.question(prompt);
  }

  close(): void {
    if (!this.closed) this.rl.close();
  }

  private async question(prompt: string): Promise<string> {
    if (this.closed) throw new UserAbortedError("Input closed");
    const controller = new AbortController();
    const onClose = () => controller.abort();
    this.rl.once("close", onClose);
    try {
      return await this.rl.question(this.decorate(prompt), {
        signal: controller.signal,
      });
    } catch (err) {
      if (controller.signal.aborted) {
        throw new UserAbortedError("Release cancelled by user");
      }
      throw err;
    } finally {
      this.rl.off("close", onClose);
    }
  }
}
