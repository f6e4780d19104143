/**
 * Repository scan: discovery plus per-file analysis.
 */

import { logger } from "../logger";
import { LoadedConfig, createDefaultConfig } from "../config/loader";
import { ReportSink } from "../report/sink";
import { analyzeFileDetailed } from "./analyzer";
import { collectPythonFiles } from "./discovery";
import type { Diagnostic } from "./diagnostic";

/**
 * Result of scanning a file or directory.
 */
export interface ScanResult {
  /** All diagnostics, grouped by file in discovery order */
  diagnostics: readonly Diagnostic[];
  /** Files that were read and analyzed */
  filesAnalyzed: number;
  /** Files that could not be read */
  filesSkipped: number;
  /** Files analyzed by text rules only because they did not parse */
  filesUnparsed: number;
  /** Whether the scan stopped early because of maxFiles */
  truncated: boolean;
}

export interface ScanOptions {
  /** The loaded configuration. If not provided, uses defaults. */
  config?: LoadedConfig;
  /** Maximum number of files to analyze; overrides the config value */
  maxFiles?: number;
  /** Where diagnostics accumulate; a fresh sink by default */
  sink?: ReportSink;
}

/**
 * Analyze every Python file under `root`.
 *
 * Files are analyzed one after another in discovery order. Once `maxFiles`
 * files have been submitted no more are started and the result is marked
 * truncated.
 *
 * @throws when `root` does not exist
 */
export function scanPath(root: string, options: ScanOptions = {}): ScanResult {
  const config = options.config ?? createDefaultConfig();
  const maxFiles = options.maxFiles ?? config.maxFiles ?? Infinity;
  const sink = options.sink ?? new ReportSink();

  const files = collectPythonFiles(root, { isIgnored: config.isFileIgnored });
  logger.info("Discovered Python files", { root, count: files.length });

  let filesAnalyzed = 0;
  let filesSkipped = 0;
  let filesUnparsed = 0;
  let truncated = false;

  for (const file of files) {
    if (filesAnalyzed + filesSkipped >= maxFiles) {
      truncated = true;
      logger.warn("File budget reached, remaining files not analyzed", {
        maxFiles,
        remaining: files.length - filesAnalyzed - filesSkipped,
      });
      break;
    }

    const result = analyzeFileDetailed(file, { parseTimeoutMs: config.parseTimeoutMs });
    if (!result) {
      filesSkipped++;
      continue;
    }

    filesAnalyzed++;
    if (!result.parseSuccess) filesUnparsed++;
    sink.add(result.diagnostics);
  }

  return {
    diagnostics: sink.diagnostics,
    filesAnalyzed,
    filesSkipped,
    filesUnparsed,
    truncated,
  };
}
