import { expect } from "chai";
import * as path from "node:path";
import {
  anchored,
  applyVersionUpdate,
  escapeRegExp,
  instantiatePattern,
  literal,
  replaceVersion,
} from "../../src/core/content-update";
import {
  MANIFEST_VERSION_PATTERN,
  MODULE_VERSION_PATTERN,
} from "../../src/core/manifest";
import { makeTempDir, readFile, writeFiles } from "../helpers/fakes";

const PYPROJECT = [
  "[project]",
  'name = "widget"',
  'version = "0.3.1"',
  'dependencies = ["requests==0.3.1"]',
  "",
].join("\n");

describe("replaceVersion", () => {
  it("anchored strategy touches only the anchored line", () => {
    const out = replaceVersion(
      PYPROJECT,
      "0.3.1",
      "0.3.2",
      anchored(MANIFEST_VERSION_PATTERN),
    );
    expect(out).to.equal(
      [
        "[project]",
        'name = "widget"',
        'version = "0.3.2"',
        'dependencies = ["requests==0.3.1"]',
        "",
      ].join("\n"),
    );
  });

  it("anchored strategy keeps the spacing around the assignment", () => {
    const out = replaceVersion(
      '__version__   =  "1.0.0"\n',
      "1.0.0",
      "2.0.0",
      anchored(MODULE_VERSION_PATTERN),
    );
    expect(out).to.equal('__version__   =  "2.0.0"\n');
  });

  it("anchored strategy requires the pattern at the start of a line", () => {
    const content = '# version = "1.0.0"\n';
    expect(
      replaceVersion(
        content,
        "1.0.0",
        "2.0.0",
        anchored(MANIFEST_VERSION_PATTERN),
      ),
    ).to.equal(content);
  });

  it("treats dots in the old version literally", () => {
    const content = 'version = "1x2x3"\n';
    expect(
      replaceVersion(
        content,
        "1.2.3",
        "1.2.4",
        anchored(MANIFEST_VERSION_PATTERN),
      ),
    ).to.equal(content);
  });

  it("literal strategy replaces every occurrence", () => {
    expect(
      replaceVersion("a 1.0.0 b 1.0.0", "1.0.0", "1.1.0", literal()),
    ).to.equal("a 1.1.0 b 1.1.0");
  });

  it("rejects a pattern without exactly one placeholder", () => {
    expect(() => anchored("^version")).to.throw(/exactly one \{version\}/);
    expect(() => anchored("{version}{version}")).to.throw(/exactly one/);
  });

  it("builds a regex that matches only the version text", () => {
    const re = instantiatePattern(MANIFEST_VERSION_PATTERN, "0.3.1");
    const match = re.exec('version = "0.3.1"');
    expect(match?.[0]).to.equal("0.3.1");
    expect(escapeRegExp("1.2.3")).to.equal("1\\.2\\.3");
  });
});

describe("applyVersionUpdate", () => {
  it("changes once, then reports unchanged", () => {
    const root = makeTempDir();
    writeFiles(root, { "pyproject.toml": PYPROJECT });
    const file = {
      path: path.join(root, "pyproject.toml"),
      strategy: anchored(MANIFEST_VERSION_PATTERN),
    };

    const first = applyVersionUpdate(file, "0.3.1", "0.3.2");
    expect(first.status).to.equal("changed");
    const afterFirst = readFile(root, "pyproject.toml");
    expect(afterFirst).to.contain('version = "0.3.2"');

    const second = applyVersionUpdate(file, "0.3.1", "0.3.2");
    expect(second).to.deep.equal({
      status: "unchanged",
      path: file.path,
      reason: "no-match",
    });
    expect(readFile(root, "pyproject.toml")).to.equal(afterFirst);
  });

  it("reports a missing file as unchanged", () => {
    const root = makeTempDir();
    const result = applyVersionUpdate(
      { path: path.join(root, "nope.py"), strategy: literal() },
      "1.0.0",
      "1.0.1",
    );
    expect(result.status).to.equal("unchanged");
    expect(result.reason).to.equal("missing");
  });
});
