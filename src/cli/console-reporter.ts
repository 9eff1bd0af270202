import { Reporter } from "../core/reporter";

const CODES = {
  header: "\x1b[95m",
  blue: "\x1b[94m",
  cyan: "\x1b[96m",
  green: "\x1b[92m",
  warning: "\x1b[93m",
  fail: "\x1b[91m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  reset: "\x1b[0m",
} as const;

export type Paint = (code: keyof typeof CODES, text: string) => string;

export function createPaint(enabled: boolean): Paint {
  return (code, text) =>
    enabled ? `${CODES[code]}${text}${CODES.reset}` : text;
}

export function colorEnabled(
  stream: { isTTY?: boolean },
  env: Record<string, string | undefined> = process.env,
): boolean {
  return !!stream.isTTY && env["NO_COLOR"] === undefined;
}

export interface ConsoleReporterOptions {
  color?: boolean;
  debug?: boolean;
  write?: (text: string) => void;
  writeErr?: (text: string) => void;
}

export class ConsoleReporter implements Reporter {
  private readonly paint: Paint;
  private readonly debugEnabled: boolean;
  private readonly out: (text: string) => void;
  private readonly err: (text: string) => void;

  constructor(opts: ConsoleReporterOptions = {}) {
    this.paint = createPaint(opts.color ?? colorEnabled(process.stdout));
    this.debugEnabled = opts.debug ?? false;
    this.out = opts.write ?? ((text) => console.log(text));
    this.err = opts.writeErr ?? ((text) => console.error(text));
  }

  header(message: string): void {
    this.out(`\n${this.paint("header", this.paint("bold", message))}`);
  }
  info(message: string): void {
    this.out(this.paint("cyan", `ℹ ${message}`));
  }
  success(message: string): void {
    this.out(this.paint("green", `✓ ${message}`));
  }
  warning(message: string): void {
    this.err(this.paint("warning", `⚠ ${message}`));
  }
  error(message: string): void {
    this.err(this.paint("fail", `✗ ${message}`));
  }
  line(message = ""): void {
    this.out(message);
  }
  debug(message: string): void {
    if (this.debugEnabled) this.err(this.paint("dim", `[release] ${message}`));
  }

  prompt(message: string): string {
    return this.paint("blue", message);
  }
}
