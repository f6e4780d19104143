/**
 * Tests for the per-file analyzer.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";

import { analyzeFile, analyzeFileDetailed, analyzeSource } from "../src/analysis/analyzer";
import { logger } from "../src/logger";

const filler = (count: number): string[] => Array.from({ length: count }, (_, i) => `value_${i} = ${i}`);

describe("analyzeSource", () => {
  it("should put text-rule results before tree-rule results", () => {
    const source = ["import imp", ...filler(500)].join("\n");

    const result = analyzeSource(source, "pkg/big.py");

    expect(result.parseSuccess).toBe(true);
    expect(result.diagnostics).toEqual([
      {
        file: "pkg/big.py",
        ruleId: "ORG_001",
        category: "Organization",
        severity: "MEDIUM",
        message: "File too large (501 lines)",
        line: 1,
      },
      {
        file: "pkg/big.py",
        ruleId: "DEPR_001",
        category: "Deprecated",
        severity: "HIGH",
        message: "Deprecated module 'imp' used",
        line: 1,
      },
    ]);
  });

  it("should run only text rules when the file does not parse", () => {
    const source = ["def broken(:", "import imp", ...filler(499)].join("\n");

    const result = analyzeSource(source, "broken.py");

    expect(result.parseSuccess).toBe(false);
    expect(result.parseError).toContain("line 1");
    expect(result.diagnostics.map((d) => [d.ruleId, d.message])).toEqual([
      ["ORG_001", "File too large (501 lines)"],
    ]);
  });

  it("should report nothing for a clean small file", () => {
    const source = ["import os", "", "def main(argv):", "    return len(argv)", ""].join("\n");

    expect(analyzeSource(source, "main.py").diagnostics).toEqual([]);
  });

  it("should return nothing for an empty file", () => {
    const result = analyzeSource("", "empty.py");

    expect(result.parseSuccess).toBe(true);
    expect(result.diagnostics).toEqual([]);
  });

  it.each(["\0\0\0", "))))", "def", "if x:\n", "\t\t\n  x = (", "class :"])(
    "should not throw on odd input %j",
    (source) => {
      expect(() => analyzeSource(source, "odd.py")).not.toThrow();
    }
  );

  describe("parse timeout", () => {
    const huge = Array.from({ length: 50000 }, (_, i) => `items_${i} = [1, 2, 3, 4, 5, 6, 7, 8]`).join("\n");

    it("should keep text-rule results for a file whose parse timed out", () => {
      const result = analyzeSource(huge, "huge.py", { parseTimeoutMs: 1 });

      expect(result.parseSuccess).toBe(false);
      expect(result.parseError).toBe("Parsing timed out after 1ms (line 1, column 1)");
      expect(result.diagnostics.map((d) => [d.ruleId, d.message, d.line])).toEqual([
        ["ORG_001", "File too large (50000 lines)", 1],
      ]);
    });

    it("should analyze the next file normally after a timeout", () => {
      analyzeSource(huge, "huge.py", { parseTimeoutMs: 1 });

      const result = analyzeSource("import imp\n", "small.py");

      expect(result.parseSuccess).toBe(true);
      expect(result.diagnostics.map((d) => [d.ruleId, d.line])).toEqual([["DEPR_001", 1]]);
    });
  });

  it("should be idempotent", () => {
    const source = [
      "from optparse import OptionParser",
      "def f(a, b, c, d, e, f):",
      "    if a:",
      "        if b:",
      "            if c:",
      "                if d:",
      "                    return e",
    ].join("\n");

    const first = analyzeSource(source, "x.py").diagnostics;
    const second = analyzeSource(source, "x.py").diagnostics;

    expect(second).toEqual(first);
    expect(first.map((d) => [d.ruleId, d.line])).toEqual([
      ["DEPR_001", 1],
      ["MAINT_002", 2],
      ["SMELL_001", 6],
    ]);
  });
});

describe("analyzeFile", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "pyreview-analyzer-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
    jest.restoreAllMocks();
  });

  it("should read and analyze a file from disk", () => {
    const file = path.join(tmpDir, "legacy.py");
    fs.writeFileSync(file, "import optparse\n");

    expect(analyzeFile(file).map((d) => [d.file, d.ruleId, d.line])).toEqual([[file, "DEPR_001", 1]]);
  });

  it("should return nothing for an unreadable file and log a warning", () => {
    const warn = jest.spyOn(logger, "warn").mockImplementation(() => undefined);
    const missing = path.join(tmpDir, "missing.py");

    expect(analyzeFile(missing)).toEqual([]);
    expect(analyzeFileDetailed(missing)).toBeNull();
    expect(warn).toHaveBeenCalledWith("Skipping unreadable file", expect.objectContaining({ file: missing }));
  });
});
