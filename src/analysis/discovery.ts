/**
 * Python source discovery.
 */

import * as fs from "fs";
import * as path from "path";
import { minimatch } from "minimatch";

import { logger } from "../logger";

export const PYTHON_EXTENSION = ".py";

export interface DiscoveryOptions {
  /** Receives each file's path relative to the scan root; true drops it */
  isIgnored?: (relativePath: string) => boolean;
}

export function isPythonFile(filePath: string): boolean {
  return filePath.endsWith(PYTHON_EXTENSION);
}

/**
 * Check if a relative path matches any of the given glob patterns.
 */
export function matchesAnyPattern(relativePath: string, patterns: string[]): boolean {
  const normalizedPath = relativePath.replace(/\\/g, "/");
  return patterns.some((pattern) => minimatch(normalizedPath, pattern, { dot: true }));
}

/**
 * Collect Python files under `root`.
 *
 * A file root is returned as-is when it is a .py file. A directory root is
 * walked recursively, every directory included, and the result is sorted so
 * reports are reproducible. Use `isIgnored` to leave directories out.
 *
 * @throws when `root` itself cannot be stat'ed
 */
export function collectPythonFiles(root: string, options: DiscoveryOptions = {}): string[] {
  const stat = fs.statSync(root);

  if (!stat.isDirectory()) {
    return isPythonFile(root) ? [root] : [];
  }

  const isIgnored = options.isIgnored ?? (() => false);
  const files: string[] = [];
  walkDir(root, root, isIgnored, files);
  return files.sort();
}

function walkDir(
  root: string,
  dir: string,
  isIgnored: (relativePath: string) => boolean,
  fileList: string[]
): void {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (error) {
    logger.warn("Skipping unreadable directory", {
      dir,
      error: error instanceof Error ? error.message : String(error),
    });
    return;
  }

  for (const entry of entries) {
    const filepath = path.join(dir, entry.name);

    if (entry.isDirectory()) {
      walkDir(root, filepath, isIgnored, fileList);
      continue;
    }

    if (!isPythonFile(entry.name)) continue;

    if (isIgnored(path.relative(root, filepath))) {
      logger.debug("Ignoring file by config", { file: filepath });
      continue;
    }

    fileList.push(filepath);
  }
}
