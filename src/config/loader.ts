/**
 * Configuration loader for pyreview.
 *
 * Loads and validates .pyreview.yml files, applying defaults.
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";

import { ConfigError } from "../errors";
import { logger } from "../logger";
import { matchesAnyPattern } from "../analysis/discovery";
import { DEFAULT_CONFIG, KNOWN_TOP_LEVEL_KEYS, PyreviewConfig, pyreviewConfigSchema } from "./schema";

/**
 * Config file name to search for in the scan root.
 */
export const CONFIG_FILE_NAME = ".pyreview.yml";

/**
 * The loaded and resolved configuration with helper methods.
 */
export interface LoadedConfig {
  /**
   * The validated configuration (or defaults if no file found).
   */
  raw: PyreviewConfig;

  /**
   * Path of the file the config came from, or null for defaults.
   */
  source: string | null;

  /**
   * Check if a file should be left out of a scan.
   * @param relativePath - Path relative to the scan root
   */
  isFileIgnored(relativePath: string): boolean;

  /** File budget, or null for unlimited */
  maxFiles: number | null;

  /** Per-file parse budget in ms (0 = no limit) */
  parseTimeoutMs: number;

  /** Report path from the config file, if any */
  output: string | null;
}

/**
 * Parse and validate YAML config text.
 *
 * @throws ConfigError on invalid YAML or values that fail validation
 */
export function loadConfigFromString(text: string, source: string | null = null): LoadedConfig {
  const label = source ?? "<inline config>";

  let parsed: unknown;
  try {
    parsed = yaml.load(text);
  } catch (err) {
    throw new ConfigError(`Could not parse ${label}: ${describe(err)}`, source ?? undefined);
  }

  // An empty file is a valid, empty config
  if (parsed === undefined || parsed === null) {
    parsed = {};
  }

  const result = pyreviewConfigSchema.safeParse(parsed);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid ${label}: ${details}`, source ?? undefined);
  }

  for (const key of Object.keys(result.data)) {
    if (!KNOWN_TOP_LEVEL_KEYS.has(key)) {
      logger.warn(`Unknown config key '${key}'`, { source: label });
    }
  }

  return buildLoadedConfig(result.data, source);
}

/**
 * Load an explicitly named config file.
 *
 * @throws ConfigError when the file is missing, unreadable or invalid
 */
export function loadConfigFile(configPath: string): LoadedConfig {
  let text: string;
  try {
    text = fs.readFileSync(configPath, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${configPath}: ${describe(err)}`, configPath);
  }
  return loadConfigFromString(text, configPath);
}

/**
 * Load .pyreview.yml from a directory if one exists.
 *
 * A broken config found this way is reported and replaced by defaults, so a
 * stray file never stops a scan.
 *
 * @param dir - Directory to look in (usually the scan root)
 */
export function loadConfig(dir: string): LoadedConfig {
  const configPath = path.join(dir, CONFIG_FILE_NAME);

  if (!fs.existsSync(configPath)) {
    return createDefaultConfig();
  }

  try {
    return loadConfigFile(configPath);
  } catch (err) {
    logger.warn(`Ignoring ${CONFIG_FILE_NAME}, using defaults`, {
      error: describe(err),
    });
    return createDefaultConfig();
  }
}

/**
 * Create a default LoadedConfig without any file.
 */
export function createDefaultConfig(): LoadedConfig {
  return buildLoadedConfig(DEFAULT_CONFIG, null);
}

function buildLoadedConfig(raw: PyreviewConfig, source: string | null): LoadedConfig {
  const ignorePatterns = [...raw.files.ignore];

  return {
    raw,
    source,
    isFileIgnored: (relativePath) => matchesAnyPattern(relativePath, ignorePatterns),
    maxFiles: raw.analysis.max_files ?? null,
    parseTimeoutMs: raw.analysis.parse_timeout_ms,
    output: raw.output ?? null,
  };
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
