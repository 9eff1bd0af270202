import { expect } from "chai";
import { PassThrough } from "node:stream";
import {
  colorEnabled,
  ConsoleReporter,
  createPaint,
} from "../../src/cli/console-reporter";
import { parseCliOptions } from "../../src/cli/options";
import { TerminalOperator } from "../../src/cli/terminal-operator";
import { UserAbortedError } from "../../src/types/errors";
import { rejectionOf } from "../helpers/fakes";

describe("cli options", () => {
  it("maps flags onto config overrides", () => {
    expect(
      parseCliOptions([
        "--cwd",
        "/tmp/proj",
        "--manifest",
        "meta.toml",
        "--version-module",
        "pkg/v.py",
        "--changelog",
        "HISTORY.md",
      ]),
    ).to.deep.equal({
      cwd: "/tmp/proj",
      manifest: "meta.toml",
      versionModule: "pkg/v.py",
      changelog: "HISTORY.md",
    });
  });

  it("leaves unset flags undefined", () => {
    expect(parseCliOptions([])).to.deep.equal({
      cwd: undefined,
      manifest: undefined,
      versionModule: undefined,
      changelog: undefined,
    });
  });
});

describe("ConsoleReporter", () => {
  it("prefixes status markers and splits streams", () => {
    const out: string[] = [];
    const err: string[] = [];
    const reporter = new ConsoleReporter({
      color: false,
      write: (t) => out.push(t),
      writeErr: (t) => err.push(t),
    });
    reporter.header("Pre-flight Checks");
    reporter.info("Running tests...");
    reporter.success("Tests passed");
    reporter.warning("No version string found in x.py");
    reporter.error("boom");
    reporter.debug("hidden");
    reporter.line();
    expect(out).to.deep.equal([
      "\nPre-flight Checks",
      "ℹ Running tests...",
      "✓ Tests passed",
      "",
    ]);
    expect(err).to.deep.equal([
      "⚠ No version string found in x.py",
      "✗ boom",
    ]);
  });

  it("emits debug lines only when enabled", () => {
    const err: string[] = [];
    const reporter = new ConsoleReporter({
      color: false,
      debug: true,
      write: () => undefined,
      writeErr: (t) => err.push(t),
    });
    reporter.debug("git status --porcelain");
    expect(err).to.deep.equal(["[release] git status --porcelain"]);
  });

  it("wraps text in ANSI codes when colour is on", () => {
    expect(createPaint(true)("green", "ok")).to.equal("\x1b[92mok\x1b[0m");
    expect(createPaint(false)("green", "ok")).to.equal("ok");
  });

  it("disables colour off a TTY or with NO_COLOR", () => {
    expect(colorEnabled({ isTTY: true }, {})).to.equal(true);
    expect(colorEnabled({ isTTY: false }, {})).to.equal(false);
    expect(colorEnabled({ isTTY: true }, { NO_COLOR: "" })).to.equal(false);
  });
});

describe("TerminalOperator", () => {
  function make() {
    const input = new PassThrough();
    const output = new PassThrough();
    const operator = new TerminalOperator((p) => p, input, output);
    return { input, operator };
  }

  it("reads answers line by line", async () => {
    const { input, operator } = make();
    const choice = operator.choose("Pick: ", [
      { key: "1", label: "one", value: "first" },
      { key: "2", label: "two", value: "second" },
    ]);
    input.write("2\n");
    expect(await choice).to.equal("second");

    const confirmed = operator.confirm("Go? ");
    input.write("YES\n");
    expect(await confirmed).to.equal(true);

    const typed = operator.ask("Version: ");
    input.write("1.2.3\n");
    expect(await typed).to.equal("1.2.3");
    operator.close();
  });

  it("returns undefined for an unknown choice", async () => {
    const { input, operator } = make();
    const choice = operator.choose("Pick: ", [
      { key: "1", label: "one", value: 1 },
    ]);
    input.write("7\n");
    expect(await choice).to.equal(undefined);
    operator.close();
  });

  it("turns closed input into a user abort", async () => {
    const { input, operator } = make();
    const pending = operator.confirm("Proceed? ");
    input.end();
    expect(await rejectionOf(pending)).to.be.instanceOf(UserAbortedError);
    expect(await rejectionOf(operator.ask("again? "))).to.be.instanceOf(
      UserAbortedError,
    );
  });
});
