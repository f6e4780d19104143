/**
 * Tests for discovery and whole-directory scans.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";

import { collectPythonFiles, matchesAnyPattern } from "../src/analysis/discovery";
import { scanPath } from "../src/analysis/orchestration";
import { loadConfigFromString } from "../src/config/loader";
import { logger } from "../src/logger";
import { ReportSink } from "../src/report/sink";

function writeFile(root: string, relativePath: string, content: string): string {
  const fullPath = path.join(root, relativePath);
  fs.mkdirSync(path.dirname(fullPath), { recursive: true });
  fs.writeFileSync(fullPath, content);
  return fullPath;
}

const lines = (count: number, first: string): string =>
  [first, ...Array.from({ length: count - 1 }, (_, i) => `item_${i} = ${i}`)].join("\n") + "\n";

describe("collectPythonFiles", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "pyreview-discovery-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("should find .py files recursively in sorted order", () => {
    writeFile(tmpDir, "zeta.py", "");
    writeFile(tmpDir, "pkg/alpha.py", "");
    writeFile(tmpDir, "pkg/notes.txt", "");
    writeFile(tmpDir, "alpha.py", "");

    expect(collectPythonFiles(tmpDir)).toEqual([
      path.join(tmpDir, "alpha.py"),
      path.join(tmpDir, "pkg", "alpha.py"),
      path.join(tmpDir, "zeta.py"),
    ]);
  });

  it("should descend into every directory, hidden and tooling ones included", () => {
    writeFile(tmpDir, ".venv/lib/site.py", "");
    writeFile(tmpDir, "__pycache__/cached.py", "");
    writeFile(tmpDir, "venv/a.py", "");
    writeFile(tmpDir, "app.py", "");

    expect(collectPythonFiles(tmpDir)).toEqual([
      path.join(tmpDir, ".venv", "lib", "site.py"),
      path.join(tmpDir, "__pycache__", "cached.py"),
      path.join(tmpDir, "app.py"),
      path.join(tmpDir, "venv", "a.py"),
    ]);
  });

  it("should leave out directories matched by ignore globs", () => {
    writeFile(tmpDir, "venv/lib/site.py", "");
    writeFile(tmpDir, "app.py", "");
    const config = loadConfigFromString('files:\n  ignore: ["venv/**"]\n');

    expect(collectPythonFiles(tmpDir, { isIgnored: config.isFileIgnored })).toEqual([path.join(tmpDir, "app.py")]);
  });

  it("should accept a single .py file as the root", () => {
    const file = writeFile(tmpDir, "single.py", "");
    const other = writeFile(tmpDir, "readme.md", "");

    expect(collectPythonFiles(file)).toEqual([file]);
    expect(collectPythonFiles(other)).toEqual([]);
  });

  it("should throw for a root that does not exist", () => {
    expect(() => collectPythonFiles(path.join(tmpDir, "nope"))).toThrow();
  });

  it("should hand the ignore hook paths relative to the root", () => {
    writeFile(tmpDir, "src/app.py", "");
    writeFile(tmpDir, "tests/test_app.py", "");
    const seen: string[] = [];

    const files = collectPythonFiles(tmpDir, {
      isIgnored: (relativePath) => {
        seen.push(relativePath.split(path.sep).join("/"));
        return relativePath.startsWith("tests");
      },
    });

    expect(files).toEqual([path.join(tmpDir, "src", "app.py")]);
    expect(seen.sort()).toEqual(["src/app.py", "tests/test_app.py"]);
  });
});

describe("matchesAnyPattern", () => {
  it("should match globs including dotfiles and windows separators", () => {
    expect(matchesAnyPattern("tests/unit/test_x.py", ["tests/**"])).toBe(true);
    expect(matchesAnyPattern("app\\migrations\\0001.py", ["**/migrations/*.py"])).toBe(true);
    expect(matchesAnyPattern(".hidden/x.py", ["**/x.py"])).toBe(true);
    expect(matchesAnyPattern("src/app.py", ["tests/**"])).toBe(false);
    expect(matchesAnyPattern("src/app.py", [])).toBe(false);
  });
});

describe("scanPath", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "pyreview-scan-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
    jest.restoreAllMocks();
  });

  it("should keep going past a file that does not parse", () => {
    const bad = writeFile(tmpDir, "bad.py", lines(600, "def broken(:"));
    const good = writeFile(tmpDir, "good.py", lines(10, "import imp"));

    const result = scanPath(tmpDir);

    expect(result.diagnostics).toEqual([
      {
        file: bad,
        ruleId: "ORG_001",
        category: "Organization",
        severity: "MEDIUM",
        message: "File too large (600 lines)",
        line: 1,
      },
      {
        file: good,
        ruleId: "DEPR_001",
        category: "Deprecated",
        severity: "HIGH",
        message: "Deprecated module 'imp' used",
        line: 1,
      },
    ]);
    expect(result).toMatchObject({ filesAnalyzed: 2, filesSkipped: 0, filesUnparsed: 1, truncated: false });
  });

  it("should report an empty directory as clean", () => {
    expect(scanPath(tmpDir)).toEqual({
      diagnostics: [],
      filesAnalyzed: 0,
      filesSkipped: 0,
      filesUnparsed: 0,
      truncated: false,
    });
  });

  it("should stop at the file budget", () => {
    const warn = jest.spyOn(logger, "warn").mockImplementation(() => undefined);
    writeFile(tmpDir, "a.py", "import imp\n");
    writeFile(tmpDir, "b.py", "import imp\n");
    writeFile(tmpDir, "c.py", "import imp\n");

    const result = scanPath(tmpDir, { maxFiles: 2 });

    expect(result.filesAnalyzed).toBe(2);
    expect(result.truncated).toBe(true);
    expect(result.diagnostics.map((d) => path.basename(d.file))).toEqual(["a.py", "b.py"]);
    expect(warn).toHaveBeenCalledWith(
      "File budget reached, remaining files not analyzed",
      { maxFiles: 2, remaining: 1 }
    );
  });

  it("should not mark a scan truncated when the budget exactly fits", () => {
    writeFile(tmpDir, "a.py", "");
    writeFile(tmpDir, "b.py", "");

    expect(scanPath(tmpDir, { maxFiles: 2 }).truncated).toBe(false);
  });

  it("should apply config ignore patterns and budget", () => {
    const warn = jest.spyOn(logger, "warn").mockImplementation(() => undefined);
    writeFile(tmpDir, "app/main.py", "import optparse\n");
    writeFile(tmpDir, "app/migrations/0001.py", "import imp\n");
    writeFile(tmpDir, "tests/test_main.py", "import imp\n");
    writeFile(tmpDir, "zz.py", "import imp\n");
    const config = loadConfigFromString(
      ["files:", "  ignore:", '    - "tests/**"', '    - "**/migrations/*.py"', "analysis:", "  max_files: 1"].join(
        "\n"
      )
    );

    const result = scanPath(tmpDir, { config });

    expect(result.diagnostics.map((d) => d.message)).toEqual(["Deprecated module 'optparse' used"]);
    expect(result.truncated).toBe(true);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("should let an explicit maxFiles override the config", () => {
    writeFile(tmpDir, "a.py", "import imp\n");
    writeFile(tmpDir, "b.py", "import imp\n");
    const config = loadConfigFromString("analysis:\n  max_files: 1\n");

    const result = scanPath(tmpDir, { config, maxFiles: 5 });

    expect(result.filesAnalyzed).toBe(2);
    expect(result.truncated).toBe(false);
  });

  it("should add to a caller-provided sink", () => {
    writeFile(tmpDir, "a.py", "import imp\n");
    const sink = new ReportSink();

    scanPath(tmpDir, { sink });
    scanPath(tmpDir, { sink });

    expect(sink.size).toBe(2);
  });

  it("should throw for a missing root", () => {
    expect(() => scanPath(path.join(tmpDir, "missing"))).toThrow();
  });
});
